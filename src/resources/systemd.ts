import type { IApplyResult, ICheckResult, IResource } from '../types/index.js';
import { type IHost, runChecked } from '../host/index.js';
import { RESOURCE_KINDS } from '../constants/index.js';

export class SystemdDaemonReload implements IResource {
  readonly kind = RESOURCE_KINDS.DAEMON_RELOAD;

  describe(): string {
    return 'systemd daemon-reload';
  }

  async check(): Promise<ICheckResult> {
    return { satisfied: false, reason: 'reload requested' };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    await runChecked(host, ['systemctl', 'daemon-reload']);
    return { changed: true };
  }
}

export type ServiceRunState = 'started' | 'stopped' | 'restarted' | 'reloaded';

export interface ServiceStateParams {
  name: string;
  enabled?: boolean;
  state?: ServiceRunState;
}

interface ServiceStatus {
  enabled: boolean;
  active: boolean;
}

/**
 * A systemd unit's boot and run state. `restarted` and `reloaded` are actions
 * rather than states, so they are never already satisfied.
 */
export class ServiceState implements IResource {
  readonly kind = RESOURCE_KINDS.SERVICE;

  constructor(private params: ServiceStateParams) {
    if (params.enabled === undefined && params.state === undefined) {
      throw new Error(`Service ${params.name} needs enabled and/or state`);
    }
  }

  describe(): string {
    const parts = [
      this.params.enabled !== undefined ? (this.params.enabled ? 'enabled' : 'disabled') : '',
      this.params.state ?? '',
    ].filter(Boolean);
    return `service ${this.params.name} ${parts.join(' ')}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    const drift = this.drift(await this.status(host));
    return drift.length === 0 ? { satisfied: true } : { satisfied: false, reason: drift.join(', ') };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    const { name, enabled, state } = this.params;
    const status = await this.status(host);
    const performed: string[] = [];

    if (enabled !== undefined && enabled !== status.enabled) {
      await runChecked(host, ['systemctl', enabled ? 'enable' : 'disable', name]);
      performed.push(enabled ? 'enabled' : 'disabled');
    }

    const verb =
      state === 'started' && !status.active ? 'start'
      : state === 'stopped' && status.active ? 'stop'
      : state === 'restarted' ? 'restart'
      : state === 'reloaded' ? 'reload'
      : undefined;
    if (verb) {
      await runChecked(host, ['systemctl', verb, name]);
      performed.push(state ?? verb);
    }

    return { changed: performed.length > 0, detail: performed.join(', ') || undefined };
  }

  private drift(status: ServiceStatus): string[] {
    const { enabled, state } = this.params;
    const drift: string[] = [];
    if (enabled !== undefined && enabled !== status.enabled) {
      drift.push(status.enabled ? 'enabled' : 'not enabled');
    }
    if (state === 'started' && !status.active) drift.push('not running');
    if (state === 'stopped' && status.active) drift.push('running');
    if (state === 'restarted' || state === 'reloaded') drift.push(`${state} requested`);
    return drift;
  }

  private async status(host: IHost): Promise<ServiceStatus> {
    const { name, enabled, state } = this.params;
    const needsActive = state === 'started' || state === 'stopped';
    return {
      enabled: enabled !== undefined
        ? (await host.exec(['systemctl', 'is-enabled', '--quiet', name])).exitCode === 0
        : false,
      active: needsActive
        ? (await host.exec(['systemctl', 'is-active', '--quiet', name])).exitCode === 0
        : false,
    };
  }
}
