import type { IApplyResult, ICheckResult, IResource } from '../types/index.js';
import { type IHost, runChecked } from '../host/index.js';
import { RESOURCE_KINDS } from '../constants/index.js';

export type FirewallRuleAction = 'allow' | 'deny' | 'reject' | 'limit';

export interface FirewallRuleParams {
  port: number;
  proto?: 'tcp' | 'udp';
  rule?: FirewallRuleAction;
}

/**
 * A UFW rule. Rules can be added while UFW is still inactive, so the check
 * reads `ufw show added` rather than the live status.
 */
export class FirewallRule implements IResource {
  readonly kind = RESOURCE_KINDS.FIREWALL_RULE;

  constructor(private params: FirewallRuleParams) {
    if (!Number.isInteger(params.port) || params.port < 1 || params.port > 65535) {
      throw new Error(`Invalid firewall port ${params.port}`);
    }
  }

  describe(): string {
    return `ufw ${this.rule()} ${this.target()}`;
  }

  async check(host: IHost): Promise<ICheckResult> {
    const { stdout } = await runChecked(host, ['ufw', 'show', 'added']);
    const wanted = this.describe();
    const present = stdout.split('\n').some((line) => line.trim() === wanted);
    return present ? { satisfied: true } : { satisfied: false, reason: 'rule missing' };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    await runChecked(host, ['ufw', this.rule(), this.target()]);
    return { changed: true };
  }

  private rule(): FirewallRuleAction {
    return this.params.rule ?? 'allow';
  }

  private target(): string {
    return this.params.proto ? `${this.params.port}/${this.params.proto}` : String(this.params.port);
  }
}

export class FirewallEnabled implements IResource {
  readonly kind = RESOURCE_KINDS.FIREWALL;

  describe(): string {
    return 'ufw enabled';
  }

  async check(host: IHost): Promise<ICheckResult> {
    const { stdout } = await runChecked(host, ['ufw', 'status']);
    return /^Status:\s+active\b/m.test(stdout)
      ? { satisfied: true }
      : { satisfied: false, reason: 'inactive' };
  }

  async apply(host: IHost): Promise<IApplyResult> {
    await runChecked(host, ['ufw', '--force', 'enable']);
    return { changed: true };
  }
}
