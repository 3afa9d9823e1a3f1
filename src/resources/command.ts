import type { IApplyResult, ICheckResult, IResource } from '../types/index.js';
import { type IHost, runChecked } from '../host/index.js';
import { RESOURCE_KINDS } from '../constants/index.js';

export interface CommandParams {
  argv: string[];
  // Skip when this path exists
  creates?: string;
  // Skip when this path is missing
  removes?: string;
  env?: Record<string, string>;
}

/**
 * An arbitrary command. Without a creates/removes guard it runs, and reports a
 * change, every time.
 */
export class Command implements IResource {
  readonly kind = RESOURCE_KINDS.COMMAND;

  constructor(private params: CommandParams) {
    if (params.argv.length === 0) {
      throw new Error('Command needs a program to run');
    }
  }

  describe(): string {
    return this.params.argv.join(' ');
  }

  async check(host: IHost): Promise<ICheckResult> {
    const { creates, removes } = this.params;
    if (creates && (await host.stat(creates))) {
      return { satisfied: true, reason: `${creates} exists` };
    }
    if (removes && !(await host.stat(removes))) {
      return { satisfied: true, reason: `${removes} missing` };
    }
    return { satisfied: false };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    const result = await runChecked(host, this.params.argv, { env: this.params.env });
    const lastLine = result.stdout.trim().split('\n').pop();
    return { changed: true, detail: lastLine || undefined };
  }
}
