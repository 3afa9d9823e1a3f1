/**
 * In-memory implementation of IHost.
 * Keeps a simulated filesystem and answers commands from registered responders,
 * so a run can be rehearsed (and tested) without touching a real machine.
 *
 * Commands with no matching responder succeed with empty output.
 */

import { createHash } from 'crypto';
import path from 'path';
import {
  type ICommandResult,
  type IExecOptions,
  type IHost,
  type IPathInfo,
  type PathType,
  normalizeMode,
} from './index.js';
import { DownloadError } from './errors.js';

interface MemoryEntry {
  type: PathType;
  content: string;
  mode: string;
  owner: string;
  group: string;
  mtimeMs: number;
  linkTarget?: string;
}

export type CommandResponder = (argv: readonly string[], options?: IExecOptions) => Partial<ICommandResult>;

interface RegisteredResponder {
  prefix: readonly string[];
  respond: CommandResponder;
}

const DEFAULT_MODES: Record<PathType, string> = {
  file: '0644',
  directory: '0755',
  symlink: '0777',
  other: '0644',
};

export class InMemoryHost implements IHost {
  // Every command run against this host, in order
  readonly executed: string[][] = [];

  private entries: Map<string, MemoryEntry> = new Map();
  private responders: RegisteredResponder[] = [];
  private remote: Map<string, string> = new Map();

  constructor(
    readonly name: string = 'memory',
    private now: () => number = Date.now
  ) {
    this.addEntry('/', 'directory', '');
  }

  /**
   * Answers commands whose argv starts with `prefix`. Later registrations win.
   */
  respond(prefix: readonly string[], result: Partial<ICommandResult> | CommandResponder): this {
    const respond: CommandResponder = typeof result === 'function' ? result : () => result;
    this.responders.unshift({ prefix, respond });
    return this;
  }

  /**
   * Makes `url` downloadable with the given body.
   */
  serve(url: string, content: string): this {
    this.remote.set(url, content);
    return this;
  }

  /**
   * Seeds a file, creating parent directories as needed.
   */
  seedFile(filePath: string, content: string, attrs: Partial<Pick<IPathInfo, 'mode' | 'owner' | 'group'>> = {}): this {
    this.ensureParents(filePath);
    this.addEntry(filePath, 'file', content, attrs);
    return this;
  }

  seedDirectory(dirPath: string, attrs: Partial<Pick<IPathInfo, 'mode' | 'owner' | 'group'>> = {}): this {
    this.ensureParents(dirPath);
    this.addEntry(dirPath, 'directory', '', attrs);
    return this;
  }

  commandLines(): string[] {
    return this.executed.map((argv) => argv.join(' '));
  }

  async exec(argv: readonly string[], options?: IExecOptions): Promise<ICommandResult> {
    this.executed.push([...argv]);
    const responder = this.responders.find(({ prefix }) => prefix.every((part, i) => argv[i] === part));
    const partial = responder ? responder.respond(argv, options) : {};
    return {
      exitCode: partial.exitCode ?? 0,
      stdout: partial.stdout ?? '',
      stderr: partial.stderr ?? '',
    };
  }

  async stat(filePath: string): Promise<IPathInfo | null> {
    const entry = this.entries.get(path.resolve(filePath));
    if (!entry) {
      return null;
    }
    return {
      type: entry.type,
      mode: entry.mode,
      owner: entry.owner,
      group: entry.group,
      mtimeMs: entry.mtimeMs,
      linkTarget: entry.linkTarget,
    };
  }

  async readFile(filePath: string): Promise<string | null> {
    const entry = this.entries.get(path.resolve(filePath));
    return entry && entry.type === 'file' ? entry.content : null;
  }

  async checksum(filePath: string): Promise<string | null> {
    const content = await this.readFile(filePath);
    return content === null ? null : createHash('sha256').update(content).digest('hex');
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    const key = path.resolve(filePath);
    const existing = this.entries.get(key);
    if (existing && existing.type === 'directory') {
      throw new Error(`EISDIR: illegal operation on a directory, open '${filePath}'`);
    }
    this.ensureParents(key);
    if (existing) {
      existing.content = content;
      existing.mtimeMs = this.now();
    } else {
      this.addEntry(key, 'file', content);
    }
  }

  async copyFile(src: string, dest: string): Promise<void> {
    const content = await this.readFile(src);
    if (content === null) {
      throw new Error(`ENOENT: no such file or directory, copyfile '${src}'`);
    }
    await this.writeFile(dest, content);
  }

  async mkdir(dirPath: string): Promise<void> {
    const key = path.resolve(dirPath);
    this.ensureParents(key);
    if (!this.entries.has(key)) {
      this.addEntry(key, 'directory', '');
    }
  }

  async chmod(filePath: string, mode: string): Promise<void> {
    this.require(filePath).mode = normalizeMode(mode);
  }

  async chown(filePath: string, owner?: string, group?: string): Promise<void> {
    const entry = this.require(filePath);
    if (owner) entry.owner = owner;
    if (group) entry.group = group;
  }

  async symlink(target: string, linkPath: string): Promise<void> {
    const key = path.resolve(linkPath);
    if (this.entries.has(key)) {
      throw new Error(`EEXIST: file already exists, symlink '${target}' -> '${linkPath}'`);
    }
    this.ensureParents(key);
    this.addEntry(key, 'symlink', '', {}, target);
  }

  async remove(filePath: string): Promise<void> {
    const key = path.resolve(filePath);
    for (const existing of [...this.entries.keys()]) {
      if (existing === key || existing.startsWith(`${key}/`)) {
        this.entries.delete(existing);
      }
    }
  }

  async download(url: string, dest: string): Promise<void> {
    const body = this.remote.get(url);
    if (body === undefined) {
      throw new DownloadError(url, 404);
    }
    await this.writeFile(dest, body);
  }

  private require(filePath: string): MemoryEntry {
    const entry = this.entries.get(path.resolve(filePath));
    if (!entry) {
      throw new Error(`ENOENT: no such file or directory '${filePath}'`);
    }
    return entry;
  }

  private ensureParents(filePath: string): void {
    const parent = path.dirname(path.resolve(filePath));
    if (parent === filePath || this.entries.has(parent)) {
      return;
    }
    this.ensureParents(parent);
    this.addEntry(parent, 'directory', '');
  }

  private addEntry(
    filePath: string,
    type: PathType,
    content: string,
    attrs: Partial<Pick<IPathInfo, 'mode' | 'owner' | 'group'>> = {},
    linkTarget?: string
  ): void {
    this.entries.set(path.resolve(filePath), {
      type,
      content,
      mode: attrs.mode ? normalizeMode(attrs.mode) : DEFAULT_MODES[type],
      owner: attrs.owner ?? 'root',
      group: attrs.group ?? 'root',
      mtimeMs: this.now(),
      linkTarget,
    });
  }
}
