import type { IRunResult, ITaskResult } from '../types/index.js';

/**
 * Reporter responsible for presenting the progress and outcome of a run.
 */
export interface IReporter {
  /**
   * Called as each action or handler finishes.
   */
  reportTask(result: ITaskResult): void | Promise<void>;

  /**
   * Summarizes the finished run.
   */
  report(data: IRunResult): Promise<void>;
}
