import type { IApplyResult, ICheckResult, IResource } from '../types/index.js';
import { type IHost, runChecked } from '../host/index.js';
import { RESOURCE_KINDS } from '../constants/index.js';

export interface GroupPresentParams {
  name: string;
  system?: boolean;
}

export class GroupPresent implements IResource {
  readonly kind = RESOURCE_KINDS.GROUP;

  constructor(private params: GroupPresentParams) {}

  describe(): string {
    return `group ${this.params.name}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    const result = await host.exec(['getent', 'group', this.params.name]);
    return result.exitCode === 0 ? { satisfied: true } : { satisfied: false, reason: 'group missing' };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    await runChecked(host, ['groupadd', ...(this.params.system ? ['--system'] : []), this.params.name]);
    return { changed: true };
  }
}

export interface UserPresentParams {
  name: string;
  group?: string;
  shell?: string;
  system?: boolean;
}

interface PasswdEntry {
  shell: string;
  primaryGroup: string;
}

export class UserPresent implements IResource {
  readonly kind = RESOURCE_KINDS.USER;

  constructor(private params: UserPresentParams) {}

  describe(): string {
    return `user ${this.params.name}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    const entry = await this.lookup(host);
    if (!entry) {
      return { satisfied: false, reason: 'user missing' };
    }
    const drift = this.drift(entry);
    return drift.length === 0 ? { satisfied: true } : { satisfied: false, reason: drift.join(', ') };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    const { name, group, shell, system } = this.params;
    const entry = await this.lookup(host);
    const options = [...(group ? ['--gid', group] : []), ...(shell ? ['--shell', shell] : [])];

    if (!entry) {
      await runChecked(host, ['useradd', ...(system ? ['--system'] : []), ...options, name]);
      return { changed: true, detail: 'created' };
    }
    if (this.drift(entry).length === 0) {
      return { changed: false };
    }
    await runChecked(host, ['usermod', ...options, name]);
    return { changed: true, detail: 'modified' };
  }

  private drift(entry: PasswdEntry): string[] {
    const drift: string[] = [];
    if (this.params.shell && entry.shell !== this.params.shell) {
      drift.push(`shell ${entry.shell} != ${this.params.shell}`);
    }
    if (this.params.group && entry.primaryGroup !== this.params.group) {
      drift.push(`group ${entry.primaryGroup} != ${this.params.group}`);
    }
    return drift;
  }

  private async lookup(host: IHost): Promise<PasswdEntry | null> {
    const passwd = await host.exec(['getent', 'passwd', this.params.name]);
    if (passwd.exitCode !== 0) {
      return null;
    }
    // name:password:uid:gid:gecos:home:shell
    const shell = passwd.stdout.trim().split(':')[6] ?? '';
    const group = await runChecked(host, ['id', '-gn', this.params.name]);
    return { shell, primaryGroup: group.stdout.trim() };
  }
}
