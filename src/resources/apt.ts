import type { IApplyResult, ICheckResult, IResource } from '../types/index.js';
import { type IHost, runChecked } from '../host/index.js';
import { DPKG_INSTALLED_STATUS, PATHS, RESOURCE_KINDS } from '../constants/index.js';

const APT_ENV = { DEBIAN_FRONTEND: 'noninteractive' };

export interface AptCacheUpdatedParams {
  // Skip the update when the package lists are younger than this
  validSeconds?: number;
  now?: () => number;
}

export class AptCacheUpdated implements IResource {
  readonly kind = RESOURCE_KINDS.APT_CACHE;

  constructor(private params: AptCacheUpdatedParams = {}) {}

  describe(): string {
    return this.params.validSeconds !== undefined
      ? `apt cache younger than ${this.params.validSeconds}s`
      : 'apt cache updated';
  }

  async check(host: IHost): Promise<ICheckResult> {
    const { validSeconds, now = Date.now } = this.params;
    if (validSeconds === undefined) {
      return { satisfied: false, reason: 'update requested' };
    }
    const lists = await host.stat(PATHS.APT_LISTS);
    if (!lists) {
      return { satisfied: false, reason: 'package lists missing' };
    }
    const ageSeconds = Math.floor((now() - lists.mtimeMs) / 1000);
    return ageSeconds < validSeconds
      ? { satisfied: true, reason: `updated ${ageSeconds}s ago` }
      : { satisfied: false, reason: `updated ${ageSeconds}s ago` };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    await runChecked(host, ['apt-get', 'update'], { env: APT_ENV });
    return { changed: true };
  }
}

export class PackagePresent implements IResource {
  readonly kind = RESOURCE_KINDS.PACKAGE;
  private packages: string[];

  constructor(packages: string | string[]) {
    this.packages = Array.isArray(packages) ? packages : [packages];
    if (this.packages.length === 0) {
      throw new Error('PackagePresent needs at least one package');
    }
  }

  describe(): string {
    return `packages present: ${this.packages.join(', ')}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    const missing = await this.missing(host);
    return missing.length === 0
      ? { satisfied: true }
      : { satisfied: false, reason: `missing ${missing.join(', ')}` };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    const missing = await this.missing(host);
    if (missing.length === 0) {
      return { changed: false };
    }
    await runChecked(host, ['apt-get', 'install', '-y', ...missing], { env: APT_ENV });
    return { changed: true, detail: `installed ${missing.join(', ')}` };
  }

  private async missing(host: IHost): Promise<string[]> {
    const missing: string[] = [];
    for (const pkg of this.packages) {
      const result = await host.exec(['dpkg-query', '-W', '-f=${Status}', pkg]);
      if (result.exitCode !== 0 || !result.stdout.includes(DPKG_INSTALLED_STATUS)) {
        missing.push(pkg);
      }
    }
    return missing;
  }
}
