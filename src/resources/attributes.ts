import { type IHost, type IPathInfo, normalizeMode } from '../host/index.js';

export interface IFileAttributes {
  mode?: string; // Octal, e.g. '0755'
  owner?: string;
  group?: string;
}

/**
 * Lists the declared attributes the path does not have yet.
 */
export function attributeDrift(info: IPathInfo, attrs: IFileAttributes): string[] {
  const drift: string[] = [];
  if (attrs.mode && normalizeMode(attrs.mode) !== info.mode) {
    drift.push(`mode ${info.mode} != ${normalizeMode(attrs.mode)}`);
  }
  if (attrs.owner && attrs.owner !== info.owner) {
    drift.push(`owner ${info.owner} != ${attrs.owner}`);
  }
  if (attrs.group && attrs.group !== info.group) {
    drift.push(`group ${info.group} != ${attrs.group}`);
  }
  return drift;
}

export async function applyAttributes(host: IHost, path: string, attrs: IFileAttributes): Promise<void> {
  if (attrs.owner || attrs.group) {
    await host.chown(path, attrs.owner, attrs.group);
  }
  if (attrs.mode) {
    await host.chmod(path, attrs.mode);
  }
}

export function describeAttributes(attrs: IFileAttributes): string {
  const parts = [
    attrs.mode ? `mode=${attrs.mode}` : '',
    attrs.owner ? `owner=${attrs.owner}` : '',
    attrs.group ? `group=${attrs.group}` : '',
  ].filter(Boolean);
  return parts.length ? ` (${parts.join(' ')})` : '';
}
