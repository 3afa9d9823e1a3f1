/**
 * Error thrown when a command on the target host exits non-zero
 */
export class CommandError extends Error {
  constructor(
    public readonly argv: readonly string[],
    public readonly exitCode: number,
    public readonly stderr: string,
    public readonly stdout: string,
  ) {
    super(`Command "${argv.join(' ')}" failed with exit code ${exitCode}${stderr ? `: ${stderr}` : ''}`);
    this.name = 'CommandError';
  }
}

export class DownloadError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number,
  ) {
    super(`Download of ${url} failed with HTTP status ${status}`);
    this.name = 'DownloadError';
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
