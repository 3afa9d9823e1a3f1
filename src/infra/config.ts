import { config as loadDotenv } from 'dotenv';
import path from 'path';
import { findPackageRoot } from './paths.js';

export interface IConfig {
  get(key: string): string | undefined;
}

/**
 * Reads configuration from the process environment, seeded from the .env file
 * at the package root. Values already present in the environment win.
 */
export class EnvConfig implements IConfig {
  private static loadedFrom: string | null = null;

  constructor(envPath: string = path.join(findPackageRoot(), '.env')) {
    if (EnvConfig.loadedFrom !== envPath) {
      // A missing .env is normal on provisioned hosts; only the environment is used then
      loadDotenv({ path: envPath });
      EnvConfig.loadedFrom = envPath;
    }
  }

  get(key: string): string | undefined {
    const val = process.env[key];
    return val === '' ? undefined : val;
  }
}

/**
 * Fixed key/value configuration for tests and programmatic runs.
 */
export class ConfigStub implements IConfig {
  constructor(private values: Record<string, string | undefined> = {}) {}

  get(key: string): string | undefined {
    return this.values[key];
  }

  set(key: string, value: string | undefined): void {
    this.values[key] = value;
  }
}

/**
 * Parses a boolean-ish configuration value ("true", "1", "yes", "on").
 */
export function readFlag(config: IConfig, key: string, fallback = false): boolean {
  const raw = config.get(key);
  if (raw === undefined) {
    return fallback;
  }
  return ['true', '1', 'yes', 'on'].includes(raw.trim().toLowerCase());
}
