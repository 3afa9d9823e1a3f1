import type {
  IAction,
  IApplyResult,
  ICheckResult,
  IHandler,
  IRunResult,
  ITask,
  ITaskResult,
  TaskKind,
} from '../types/index.js';
import type { IRunOptions, ITaskRunner } from './index.js';
import {
  ActionError,
  ApplyError,
  CheckError,
  HandlerError,
  UnknownHandlerError,
  errorMessage,
} from './errors.js';
import { NotificationQueue } from './notification-queue.js';
import type { IHost } from '../host/index.js';
import type { ILogger } from '../infra/logger.js';
import { TASK_STATUS } from '../constants/index.js';

/**
 * Runs actions strictly in order against one host, then drains the handlers
 * they notified. A check or apply failure in the main sequence aborts the run
 * before any handler; whatever earlier actions did stays on the host.
 */
export class TaskRunner implements ITaskRunner {
  constructor(
    protected host: IHost,
    protected logger: ILogger
  ) {}

  async execute(
    actions: readonly IAction[],
    handlers: readonly IHandler[] = [],
    options: IRunOptions = {}
  ): Promise<IRunResult> {
    const { checkMode = false, continueAfterHandlerFailure = false, playbook, onProgress } = options;
    const registry = this.buildRegistry(actions, handlers);
    const queue = new NotificationQueue();
    const results: ITaskResult[] = [];
    const startTime = Date.now();
    let fatalError: ActionError | undefined;
    const handlerErrors: HandlerError[] = [];

    const record = async (result: ITaskResult): Promise<void> => {
      results.push(result);
      if (onProgress) {
        await onProgress(result, results.length);
      }
    };

    this.logger.info(`Starting run on host ${this.host.name}`, {
      playbook,
      actions: actions.length,
      handlers: registry.size,
      checkMode,
    });

    for (const action of actions) {
      const taskStart = Date.now();
      try {
        const result = await this.runTask(action, 'action', checkMode);
        if (result.status === TASK_STATUS.CHANGED && action.notify?.length) {
          result.notified = queue.addAll(action.notify);
        }
        await record(result);
      } catch (error) {
        if (!(error instanceof ActionError)) {
          throw error;
        }
        this.logger.error(`ACTION FAILED: ${action.name}`, error);
        fatalError = error;
        await record(this.failedResult(action, 'action', error, taskStart));
        break;
      }
    }

    if (fatalError) {
      this.logger.warn('Main sequence aborted; notified handlers will not run', {
        pending: [...queue],
      });
    } else {
      for (const handlerName of queue) {
        // Registry was validated up front
        const handler = registry.get(handlerName);
        if (!handler) {
          continue;
        }

        const taskStart = Date.now();
        try {
          const result = await this.runTask(handler, 'handler', checkMode);
          if (result.status === TASK_STATUS.CHANGED && handler.notify?.length) {
            result.notified = queue.addAll(handler.notify);
          }
          await record(result);
        } catch (error) {
          if (!(error instanceof HandlerError)) {
            throw error;
          }
          this.logger.error(`HANDLER FAILED: ${handler.name}`, error);
          handlerErrors.push(error);
          await record(this.failedResult(handler, 'handler', error, taskStart));
          if (!continueAfterHandlerFailure) {
            break;
          }
        }
      }
    }

    const endTime = Date.now();
    const success = !fatalError && handlerErrors.length === 0;
    const failures = [fatalError, ...handlerErrors].filter((error): error is ActionError => error !== undefined);
    const count = (status: string) => results.filter((result) => result.status === status).length;

    const report: IRunResult = {
      host: this.host.name,
      playbook,
      results,
      summary: {
        startTime,
        endTime,
        success,
        fatal: fatalError !== undefined,
        unchanged: count(TASK_STATUS.UNCHANGED),
        changed: count(TASK_STATUS.CHANGED),
        failed: count(TASK_STATUS.FAILED),
        reason: success ? undefined : failures.map((error) => error.message).join('; '),
      },
    };

    this.logger.info(`Run finished. Success: ${success}`, {
      duration: endTime - startTime,
      changed: report.summary.changed,
      failed: report.summary.failed,
    });

    return report;
  }

  /**
   * Check, and apply when needed. Failures come back as the error type that
   * matches the task's role and phase.
   */
  private async runTask(task: ITask, kind: TaskKind, checkMode: boolean): Promise<ITaskResult> {
    const taskStart = Date.now();
    const resource = task.resource.describe();
    this.logger.debug(`Checking ${kind} ${task.name}`, { resource });

    let check: ICheckResult;
    try {
      check = await task.resource.check(this.host);
    } catch (error) {
      throw kind === 'handler' ? new HandlerError(task.name, 'check', error) : new CheckError(task.name, error);
    }

    if (check.satisfied) {
      this.logger.info(`UNCHANGED: ${task.name}`, { reason: check.reason });
      return this.result(task, kind, TASK_STATUS.UNCHANGED, taskStart, { detail: check.reason });
    }

    if (checkMode) {
      this.logger.info(`WOULD CHANGE: ${task.name}`, { reason: check.reason });
      return this.result(task, kind, TASK_STATUS.CHANGED, taskStart, { detail: check.reason, checkMode: true });
    }

    let applied: IApplyResult;
    try {
      applied = await task.resource.apply(this.host);
    } catch (error) {
      throw kind === 'handler' ? new HandlerError(task.name, 'apply', error) : new ApplyError(task.name, error);
    }

    const status = applied.changed ? TASK_STATUS.CHANGED : TASK_STATUS.UNCHANGED;
    this.logger.info(`${status.toUpperCase()}: ${task.name}`, {
      reason: check.reason,
      detail: applied.detail,
      durationMs: Date.now() - taskStart,
    });
    return this.result(task, kind, status, taskStart, { detail: applied.detail });
  }

  private result(
    task: ITask,
    kind: TaskKind,
    status: ITaskResult['status'],
    taskStart: number,
    extra: Pick<ITaskResult, 'detail' | 'checkMode'> = {}
  ): ITaskResult {
    return {
      name: task.name,
      kind,
      status,
      resource: task.resource.describe(),
      durationMs: Date.now() - taskStart,
      ...(extra.detail !== undefined ? { detail: extra.detail } : {}),
      ...(extra.checkMode ? { checkMode: true } : {}),
    };
  }

  private failedResult(task: ITask, kind: TaskKind, error: ActionError, taskStart: number): ITaskResult {
    return {
      ...this.result(task, kind, TASK_STATUS.FAILED, taskStart),
      error: errorMessage(error.cause),
    };
  }

  /**
   * Indexes handlers by name and rejects notifications nobody can answer,
   * before anything touches the host. A later handler with a repeated name
   * replaces the earlier one.
   */
  private buildRegistry(actions: readonly IAction[], handlers: readonly IHandler[]): Map<string, IHandler> {
    const registry = new Map<string, IHandler>();
    for (const handler of handlers) {
      if (registry.has(handler.name)) {
        this.logger.warn(`Handler "${handler.name}" is defined twice; the last definition wins`);
      }
      registry.set(handler.name, handler);
    }

    for (const task of [...actions, ...handlers]) {
      for (const handlerName of task.notify ?? []) {
        if (!registry.has(handlerName)) {
          throw new UnknownHandlerError(task.name, handlerName);
        }
      }
    }
    return registry;
  }
}
