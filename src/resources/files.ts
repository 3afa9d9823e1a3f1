import type { IApplyResult, ICheckResult, IResource } from '../types/index.js';
import type { IHost } from '../host/index.js';
import { RESOURCE_KINDS } from '../constants/index.js';
import { type IFileAttributes, applyAttributes, attributeDrift, describeAttributes } from './attributes.js';

export interface DirectoryParams extends IFileAttributes {
  path: string;
}

export class Directory implements IResource {
  readonly kind = RESOURCE_KINDS.DIRECTORY;

  constructor(private params: DirectoryParams) {}

  describe(): string {
    return `directory ${this.params.path}${describeAttributes(this.params)}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    const info = await host.stat(this.params.path);
    if (!info) {
      return { satisfied: false, reason: 'missing' };
    }
    if (info.type !== 'directory') {
      return { satisfied: false, reason: `exists as ${info.type}` };
    }
    const drift = attributeDrift(info, this.params);
    return drift.length === 0 ? { satisfied: true } : { satisfied: false, reason: drift.join(', ') };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    const info = await host.stat(this.params.path);
    if (info && info.type !== 'directory') {
      throw new Error(`${this.params.path} exists and is not a directory`);
    }
    if (!info) {
      await host.mkdir(this.params.path);
    }
    await applyAttributes(host, this.params.path, this.params);
    return { changed: true, detail: info ? 'attributes updated' : 'created' };
  }
}

export interface FileContentParams extends IFileAttributes {
  path: string;
  content: string;
}

/**
 * A file with literal content. A symlink at the path is replaced by a regular
 * file rather than written through.
 */
export class FileContent implements IResource {
  readonly kind = RESOURCE_KINDS.FILE;

  constructor(private params: FileContentParams) {}

  describe(): string {
    return `file ${this.params.path}${describeAttributes(this.params)}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    const info = await host.stat(this.params.path);
    if (!info) {
      return { satisfied: false, reason: 'missing' };
    }
    if (info.type !== 'file') {
      return { satisfied: false, reason: `exists as ${info.type}` };
    }
    const drift = attributeDrift(info, this.params);
    const content = await host.readFile(this.params.path);
    if (content !== this.params.content) {
      drift.unshift('content differs');
    }
    return drift.length === 0 ? { satisfied: true } : { satisfied: false, reason: drift.join(', ') };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    const info = await host.stat(this.params.path);
    if (info && info.type === 'directory') {
      throw new Error(`${this.params.path} is a directory`);
    }
    if (info && info.type === 'symlink') {
      await host.remove(this.params.path);
    }
    const current = info && info.type !== 'symlink' ? await host.readFile(this.params.path) : null;
    if (current !== this.params.content) {
      await host.writeFile(this.params.path, this.params.content);
    }
    await applyAttributes(host, this.params.path, this.params);
    return { changed: true, detail: current === null ? 'created' : 'updated' };
  }
}

export interface FileCopyParams extends IFileAttributes {
  src: string;
  dest: string;
}

/**
 * A copy of another file already on the host.
 */
export class FileCopy implements IResource {
  readonly kind = RESOURCE_KINDS.COPY;

  constructor(private params: FileCopyParams) {}

  describe(): string {
    return `copy ${this.params.src} -> ${this.params.dest}${describeAttributes(this.params)}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    const source = await host.checksum(this.params.src);
    if (source === null) {
      return { satisfied: false, reason: `source ${this.params.src} missing` };
    }
    const info = await host.stat(this.params.dest);
    if (!info) {
      return { satisfied: false, reason: 'missing' };
    }
    const drift = attributeDrift(info, this.params);
    if ((await host.checksum(this.params.dest)) !== source) {
      drift.unshift('checksum differs');
    }
    return drift.length === 0 ? { satisfied: true } : { satisfied: false, reason: drift.join(', ') };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    const source = await host.checksum(this.params.src);
    if (source === null) {
      throw new Error(`Source ${this.params.src} does not exist`);
    }
    if ((await host.checksum(this.params.dest)) !== source) {
      await host.copyFile(this.params.src, this.params.dest);
    }
    await applyAttributes(host, this.params.dest, this.params);
    return { changed: true };
  }
}

export interface SymlinkParams {
  target: string; // What the link points at
  path: string; // Where the link lives
}

export class Symlink implements IResource {
  readonly kind = RESOURCE_KINDS.LINK;

  constructor(private params: SymlinkParams) {}

  describe(): string {
    return `link ${this.params.path} -> ${this.params.target}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    const info = await host.stat(this.params.path);
    if (!info) {
      return { satisfied: false, reason: 'missing' };
    }
    if (info.type !== 'symlink') {
      return { satisfied: false, reason: `exists as ${info.type}` };
    }
    return info.linkTarget === this.params.target
      ? { satisfied: true }
      : { satisfied: false, reason: `points at ${info.linkTarget ?? 'nothing'}` };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    const info = await host.stat(this.params.path);
    if (info && info.type === 'directory') {
      throw new Error(`${this.params.path} is a directory; refusing to replace it with a link`);
    }
    if (info) {
      await host.remove(this.params.path);
    }
    await host.symlink(this.params.target, this.params.path);
    return { changed: true };
  }
}

export class PathAbsent implements IResource {
  readonly kind = RESOURCE_KINDS.ABSENT;

  constructor(private path: string) {}

  describe(): string {
    return `absent ${this.path}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    const info = await host.stat(this.path);
    return info ? { satisfied: false, reason: `exists as ${info.type}` } : { satisfied: true };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    await host.remove(this.path);
    return { changed: true, detail: 'removed' };
  }
}
