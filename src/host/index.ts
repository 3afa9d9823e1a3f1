import { CommandError } from './errors.js';

export interface ICommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface IExecOptions {
  env?: Record<string, string>;
}

export type PathType = 'file' | 'directory' | 'symlink' | 'other';

export interface IPathInfo {
  type: PathType;
  mode: string; // Octal permission bits, e.g. '0644'
  owner: string;
  group: string;
  mtimeMs: number;
  linkTarget?: string;
}

/**
 * The target machine. Every resource reads and writes host state only through
 * this interface; nothing else is shared between tasks.
 */
export interface IHost {
  readonly name: string;

  /**
   * Runs a program. Resolves with the exit code instead of rejecting on a
   * non-zero exit; rejects only when the program cannot be started.
   */
  exec(argv: readonly string[], options?: IExecOptions): Promise<ICommandResult>;

  /**
   * Describes a path without following a final symlink. Null when missing.
   */
  stat(path: string): Promise<IPathInfo | null>;
  readFile(path: string): Promise<string | null>;
  checksum(path: string): Promise<string | null>;
  writeFile(path: string, content: string): Promise<void>;
  copyFile(src: string, dest: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  chmod(path: string, mode: string): Promise<void>;
  chown(path: string, owner?: string, group?: string): Promise<void>;
  symlink(target: string, path: string): Promise<void>;
  remove(path: string): Promise<void>;
  download(url: string, dest: string): Promise<void>;
}

/**
 * Runs a command and throws CommandError on a non-zero exit.
 */
export async function runChecked(
  host: IHost,
  argv: readonly string[],
  options?: IExecOptions
): Promise<ICommandResult> {
  const result = await host.exec(argv, options);
  if (result.exitCode !== 0) {
    throw new CommandError(argv, result.exitCode, result.stderr.trim(), result.stdout.trim());
  }
  return result;
}

export function formatMode(bits: number): string {
  return (bits & 0o7777).toString(8).padStart(4, '0');
}

export function normalizeMode(mode: string): string {
  return formatMode(parseInt(mode, 8));
}
