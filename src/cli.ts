#!/usr/bin/env node
import { Command } from 'commander';
import { exitCodeFor, provision } from './index.js';
import { ConfigStub, EnvConfig, type IConfig } from './infra/config.js';
import { CONFIG_KEYS, EXIT_CODES } from './constants/index.js';

interface ProvisionCliOptions {
  check?: boolean;
  simulate?: boolean;
  continueAfterHandlerFailure?: boolean;
  logLevel?: string;
}

/**
 * Layers CLI flags over the environment configuration.
 */
function withOverrides(base: IConfig, options: ProvisionCliOptions): IConfig {
  const overrides = new ConfigStub({
    [CONFIG_KEYS.HOST_TYPE]: options.simulate ? 'memory' : undefined,
    [CONFIG_KEYS.LOG_LEVEL]: options.logLevel,
  });
  return {
    get: (key: string) => overrides.get(key) ?? base.get(key),
  };
}

const program = new Command()
  .name('hostforge')
  .description('Converge this machine to Prometheus behind an Nginx TLS proxy');

program
  .command('provision')
  .description('Run the monitoring playbook against this host')
  .option('--check', 'report what would change without changing anything')
  .option('--simulate', 'run against an empty in-memory host')
  .option('--continue-after-handler-failure', 'keep running notified handlers after one fails')
  .option('--log-level <level>', 'winston log level (error, warn, info, debug)')
  .action(async (options: ProvisionCliOptions) => {
    const result = await provision({
      config: withOverrides(new EnvConfig(), options),
      checkMode: options.check,
      continueAfterHandlerFailure: options.continueAfterHandlerFailure,
    });
    process.exitCode = exitCodeFor(result);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = EXIT_CODES.FATAL;
});
