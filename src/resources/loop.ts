import type { IApplyResult, ICheckResult, IResource } from '../types/index.js';
import type { IHost } from '../host/index.js';
import { RESOURCE_KINDS } from '../constants/index.js';

/**
 * One task over several resources. Satisfied when every item is; applying
 * touches only the items that are not.
 */
export class ResourceLoop implements IResource {
  readonly kind = RESOURCE_KINDS.LOOP;

  constructor(private items: IResource[]) {
    if (items.length === 0) {
      throw new Error('ResourceLoop needs at least one item');
    }
  }

  describe(): string {
    return this.items.map((item) => item.describe()).join('; ');
  }

  async check(host: IHost): Promise<ICheckResult> {
    const pending: string[] = [];
    for (const item of this.items) {
      const result = await item.check(host);
      if (!result.satisfied) {
        pending.push(item.describe());
      }
    }
    return pending.length === 0
      ? { satisfied: true }
      : { satisfied: false, reason: `${pending.length} of ${this.items.length} items pending: ${pending.join('; ')}` };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    let changed = false;
    const details: string[] = [];
    for (const item of this.items) {
      if ((await item.check(host)).satisfied) {
        continue;
      }
      const result = await item.apply(host);
      changed = changed || result.changed;
      if (result.changed) {
        details.push(item.describe());
      }
    }
    return { changed, detail: details.length ? `changed ${details.join('; ')}` : undefined };
  }
}
