import { spawn } from 'child_process';
import { createHash } from 'crypto';
import { createWriteStream } from 'fs';
import fs from 'fs/promises';
import os from 'os';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  type ICommandResult,
  type IExecOptions,
  type IHost,
  type IPathInfo,
  type PathType,
  formatMode,
  runChecked,
} from './index.js';
import { DownloadError, isNotFound } from './errors.js';
import type { ILogger } from '../infra/logger.js';

/**
 * The machine this process runs on. Commands are spawned without a shell;
 * file operations go through fs.
 */
export class LocalHost implements IHost {
  readonly name: string;

  constructor(
    private logger: ILogger,
    name: string = os.hostname()
  ) {
    this.name = name;
  }

  exec(argv: readonly string[], options: IExecOptions = {}): Promise<ICommandResult> {
    const [program, ...args] = argv;
    if (!program) {
      return Promise.reject(new Error('Cannot execute an empty command'));
    }

    this.logger.debug(`exec: ${argv.join(' ')}`);

    return new Promise((resolve, reject) => {
      const proc = spawn(program, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, ...options.env },
      });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      proc.on('error', (err) => {
        reject(new Error(`Failed to spawn ${program}: ${err.message}`));
      });
    });
  }

  async stat(path: string): Promise<IPathInfo | null> {
    let stats;
    try {
      stats = await fs.lstat(path);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    const type: PathType = stats.isSymbolicLink()
      ? 'symlink'
      : stats.isDirectory()
        ? 'directory'
        : stats.isFile()
          ? 'file'
          : 'other';

    // Names rather than ids: resources declare owners the way useradd knows them
    const { stdout } = await runChecked(this, ['stat', '-c', '%U %G', path]);
    const [owner = '', group = ''] = stdout.trim().split(' ');

    return {
      type,
      mode: formatMode(stats.mode),
      owner,
      group,
      mtimeMs: stats.mtimeMs,
      linkTarget: type === 'symlink' ? await fs.readlink(path) : undefined,
    };
  }

  async readFile(path: string): Promise<string | null> {
    try {
      return await fs.readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async checksum(path: string): Promise<string | null> {
    try {
      const data = await fs.readFile(path);
      return createHash('sha256').update(data).digest('hex');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    await fs.writeFile(path, content, 'utf-8');
  }

  async copyFile(src: string, dest: string): Promise<void> {
    await fs.copyFile(src, dest);
  }

  async mkdir(path: string): Promise<void> {
    await fs.mkdir(path, { recursive: true });
  }

  async chmod(path: string, mode: string): Promise<void> {
    await fs.chmod(path, parseInt(mode, 8));
  }

  async chown(path: string, owner?: string, group?: string): Promise<void> {
    if (!owner && !group) {
      return;
    }
    const spec = owner && group ? `${owner}:${group}` : owner ? owner : `:${group}`;
    await runChecked(this, ['chown', '-h', spec, path]);
  }

  async symlink(target: string, path: string): Promise<void> {
    await fs.symlink(target, path);
  }

  async remove(path: string): Promise<void> {
    await fs.rm(path, { recursive: true, force: true });
  }

  /**
   * Streams into `<dest>.part` and renames on success, so an interrupted
   * download never leaves a partial file at `dest`.
   */
  async download(url: string, dest: string): Promise<void> {
    this.logger.info(`Downloading ${url}`, { dest });
    const response = await fetch(url);
    if (!response.ok || !response.body) {
      throw new DownloadError(url, response.status);
    }

    const partial = `${dest}.part`;
    try {
      await pipeline(Readable.fromWeb(response.body), createWriteStream(partial));
    } catch (error) {
      await fs.rm(partial, { force: true });
      throw error;
    }
    await fs.rename(partial, dest);
  }
}
