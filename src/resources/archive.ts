import type { IApplyResult, ICheckResult, IResource } from '../types/index.js';
import { type IHost, runChecked } from '../host/index.js';
import { RESOURCE_KINDS } from '../constants/index.js';
import { type IFileAttributes, applyAttributes } from './attributes.js';

export interface DownloadParams extends IFileAttributes {
  url: string;
  dest: string;
}

/**
 * A remote file fetched once; an existing destination is left alone.
 */
export class Download implements IResource {
  readonly kind = RESOURCE_KINDS.DOWNLOAD;

  constructor(private params: DownloadParams) {}

  describe(): string {
    return `download ${this.params.url} -> ${this.params.dest}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    const info = await host.stat(this.params.dest);
    return info ? { satisfied: true, reason: 'already downloaded' } : { satisfied: false, reason: 'missing' };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    await host.download(this.params.url, this.params.dest);
    await applyAttributes(host, this.params.dest, this.params);
    return { changed: true };
  }
}

export interface UnarchiveParams {
  src: string;
  dest: string;
  // Extraction is skipped when this path exists
  creates?: string;
}

export class Unarchive implements IResource {
  readonly kind = RESOURCE_KINDS.UNARCHIVE;

  constructor(private params: UnarchiveParams) {}

  describe(): string {
    return `unarchive ${this.params.src} -> ${this.params.dest}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    if (this.params.creates && (await host.stat(this.params.creates))) {
      return { satisfied: true, reason: `${this.params.creates} exists` };
    }
    return { satisfied: false, reason: this.params.creates ? `${this.params.creates} missing` : 'no creates marker' };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    if (!(await host.stat(this.params.src))) {
      throw new Error(`Archive ${this.params.src} does not exist`);
    }
    await runChecked(host, ['tar', '-xzf', this.params.src, '-C', this.params.dest]);
    return { changed: true };
  }
}
