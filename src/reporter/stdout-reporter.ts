import chalk from 'chalk';
import type { IReporter } from './index.js';
import type { IRunResult, ITaskResult, TaskStatus } from '../types/index.js';

const STATUS_LABELS: Record<TaskStatus, string> = {
  unchanged: 'ok',
  changed: 'changed',
  failed: 'failed',
};

const STATUS_COLORS: Record<TaskStatus, (text: string) => string> = {
  unchanged: chalk.green,
  changed: chalk.yellow,
  failed: chalk.red,
};

export class StdoutReporter implements IReporter {
  reportTask(result: ITaskResult): void {
    const prefix = result.kind === 'handler' ? 'HANDLER' : 'TASK';
    const label = STATUS_COLORS[result.status](STATUS_LABELS[result.status]);
    const suffix = result.checkMode ? chalk.dim(' (check mode)') : '';
    console.log(`${prefix} [${result.name}] ${label}${suffix}`);
    if (result.detail) {
      console.log(chalk.dim(`     ${result.detail}`));
    }
    if (result.error) {
      console.log(chalk.red(`     ${result.error}`));
    }
  }

  async report(data: IRunResult): Promise<void> {
    const { summary } = data;
    console.log('\n' + chalk.bold.blue('=== HOSTFORGE RUN RECAP ==='));
    if (data.playbook) {
      console.log(`Playbook:  ${data.playbook}`);
    }
    console.log(`Host:      ${data.host}`);
    console.log(`Duration:  ${summary.endTime - summary.startTime}ms`);
    console.log('---------------------------');
    console.log(
      `${chalk.green(`ok=${summary.unchanged}`)} ${chalk.yellow(`changed=${summary.changed}`)} ${chalk.red(`failed=${summary.failed}`)}`
    );
    if (summary.reason) {
      console.log(`Reason:    ${summary.reason}`);
    }
    console.log('---------------------------');
    if (summary.success) {
      console.log(chalk.bold.green('FINAL STATUS: CONVERGED'));
    } else if (summary.fatal) {
      console.log(chalk.bold.red('FINAL STATUS: FAILED'));
    } else {
      console.log(chalk.bold.red('FINAL STATUS: HANDLERS FAILED'));
    }
    console.log(chalk.bold.blue('===========================') + '\n');
  }
}
