import type { IAction, IHandler, IRunResult, ITaskResult } from '../types/index.js';

export interface IRunOptions {
  // Report what would change without applying anything
  checkMode?: boolean;
  // Keep draining handlers after one fails instead of stopping there
  continueAfterHandlerFailure?: boolean;
  playbook?: string;
  onProgress?: (result: ITaskResult, completed: number) => void | Promise<void>;
}

export interface ITaskRunner {
  execute(actions: readonly IAction[], handlers?: readonly IHandler[], options?: IRunOptions): Promise<IRunResult>;
}
