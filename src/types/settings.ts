/**
 * Provisioning settings for the monitoring playbook.
 * Read from configuration (environment / .env) and validated up front so a bad
 * value never reaches the target host.
 */

import { z } from 'zod';
import type { IConfig } from '../infra/config.js';

const port = z.coerce.number().int().min(1).max(65535);
const systemName = z.string().regex(/^[a-z_][a-z0-9_-]*$/, 'must be a valid system user/group name');
const absolutePath = z.string().startsWith('/', 'must be an absolute path');

export const ProvisionSettingsSchema = z.object({
  prometheusVersion: z.string().regex(/^\d+\.\d+\.\d+$/, 'must look like 2.26.0').default('2.26.0'),
  prometheusArch: z.string().min(1).default('linux-amd64'),
  prometheusUser: systemName.default('prometheus'),
  prometheusGroup: systemName.default('prometheus'),
  prometheusDir: absolutePath.default('/etc/prometheus'),
  prometheusDataDir: absolutePath.default('/var/lib/prometheus'),
  prometheusPort: port.default(9090),
  scrapeInterval: z.string().regex(/^\d+[smh]$/, 'must be a duration like 15s').default('15s'),
  downloadDir: absolutePath.default('/tmp'),
  serverName: z.string().min(1).default('example.com'),
  certificateSubject: z.string().startsWith('/').default('/C=US/ST=State/L=City/O=Org/OU=Unit/CN=example.com'),
  certificateDays: z.coerce.number().int().positive().default(365),
  keyBits: z.coerce.number().int().min(2048).default(2048),
  dhparamBits: z.coerce.number().int().min(1024).default(2048),
  resolvers: z.string().min(1).default('8.8.8.8 8.8.4.4'),
  sshPort: port.default(22),
  aptCacheValidSeconds: z.coerce.number().int().nonnegative().default(3600),
});

export type ProvisionSettings = z.infer<typeof ProvisionSettingsSchema>;

/**
 * Environment variable that feeds each setting.
 */
export const SETTING_ENV_KEYS: Record<keyof ProvisionSettings, string> = {
  prometheusVersion: 'PROMETHEUS_VERSION',
  prometheusArch: 'PROMETHEUS_ARCH',
  prometheusUser: 'PROMETHEUS_USER',
  prometheusGroup: 'PROMETHEUS_GROUP',
  prometheusDir: 'PROMETHEUS_DIR',
  prometheusDataDir: 'PROMETHEUS_DATA_DIR',
  prometheusPort: 'PROMETHEUS_PORT',
  scrapeInterval: 'PROMETHEUS_SCRAPE_INTERVAL',
  downloadDir: 'DOWNLOAD_DIR',
  serverName: 'NGINX_SERVER_NAME',
  certificateSubject: 'TLS_SUBJECT',
  certificateDays: 'TLS_DAYS',
  keyBits: 'TLS_KEY_BITS',
  dhparamBits: 'DHPARAM_BITS',
  resolvers: 'NGINX_RESOLVERS',
  sshPort: 'SSH_PORT',
  aptCacheValidSeconds: 'APT_CACHE_VALID_SECONDS',
};

export class SettingsError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid settings: ${issues.join('; ')}`);
    this.name = 'SettingsError';
  }
}

function envKeyFor(field: string): string {
  const entry = Object.entries(SETTING_ENV_KEYS).find(([name]) => name === field);
  return entry ? entry[1] : field;
}

export function loadSettings(config: IConfig): ProvisionSettings {
  const raw: Record<string, string | undefined> = {};
  for (const [field, key] of Object.entries(SETTING_ENV_KEYS)) {
    raw[field] = config.get(key);
  }

  const parsed = ProvisionSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map((issue) => `${envKeyFor(String(issue.path[0]))}: ${issue.message}`)
    );
  }
  return parsed.data;
}
