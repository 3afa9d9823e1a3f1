import { TaskRunner } from './runner/task-runner.js';
import { StdoutReporter } from './reporter/stdout-reporter.js';
import type { IReporter } from './reporter/index.js';
import { EnvConfig, type IConfig, readFlag } from './infra/config.js';
import { type ILogger, WinstonLogger } from './infra/logger.js';
import { type ITemplateRenderer, TemplateManager } from './infra/template-manager.js';
import type { IHost } from './host/index.js';
import { createHost, getHostType } from './host/host-factory.js';
import { loadSettings } from './types/settings.js';
import { buildMonitoringPlaybook } from './playbooks/monitoring.js';
import type { IRunResult } from './types/index.js';
import { CONFIG_KEYS, EXIT_CODES } from './constants/index.js';

export interface ProvisionOptions {
  config?: IConfig;
  logger?: ILogger;
  host?: IHost;
  reporter?: IReporter;
  templates?: ITemplateRenderer;
  // Override the CHECK_MODE / CONTINUE_AFTER_HANDLER_FAILURE configuration values
  checkMode?: boolean;
  continueAfterHandlerFailure?: boolean;
}

/**
 * Converges one host to the monitoring playbook and reports the outcome.
 * Settings errors and handler wiring errors reject before the host is touched.
 */
export async function provision(options: ProvisionOptions = {}): Promise<IRunResult> {
  const config = options.config ?? new EnvConfig();
  const logger = options.logger ?? new WinstonLogger({ level: config.get(CONFIG_KEYS.LOG_LEVEL) });
  const settings = loadSettings(config);
  const host = options.host ?? createHost(getHostType(config), logger, settings);
  const reporter = options.reporter ?? new StdoutReporter();
  const templates = options.templates ?? TemplateManager.getInstance();

  if (!options.host && getHostType(config) === 'local' && process.getuid?.() !== 0) {
    logger.warn('Not running as root; package, user and service tasks will likely fail');
  }

  const playbook = buildMonitoringPlaybook(settings, templates);
  const runner = new TaskRunner(host, logger);
  const result = await runner.execute(playbook.actions, playbook.handlers, {
    playbook: playbook.name,
    checkMode: options.checkMode ?? readFlag(config, CONFIG_KEYS.CHECK_MODE),
    continueAfterHandlerFailure:
      options.continueAfterHandlerFailure ?? readFlag(config, CONFIG_KEYS.CONTINUE_AFTER_HANDLER_FAILURE),
    onProgress: (taskResult) => reporter.reportTask(taskResult),
  });

  await reporter.report(result);
  return result;
}

/**
 * 0 when converged, 1 when the main sequence aborted, 2 when only handlers failed.
 */
export function exitCodeFor(result: IRunResult): number {
  if (result.summary.success) {
    return EXIT_CODES.SUCCESS;
  }
  return result.summary.fatal ? EXIT_CODES.FATAL : EXIT_CODES.HANDLER_FAILED;
}

export { TaskRunner } from './runner/task-runner.js';
export { NotificationQueue } from './runner/notification-queue.js';
export * from './runner/errors.js';
export type { IRunOptions, ITaskRunner } from './runner/index.js';
export type * from './types/index.js';
export { InMemoryHost } from './host/in-memory-host.js';
export { LocalHost } from './host/local-host.js';
export type { IHost, ICommandResult, IPathInfo } from './host/index.js';
export * from './resources/index.js';
