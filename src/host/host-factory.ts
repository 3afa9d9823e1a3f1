/**
 * Factory for creating the target host based on configuration.
 * Supports the local machine and an in-memory simulation.
 */

import type { IHost } from './index.js';
import { LocalHost } from './local-host.js';
import { createSimulatedHost } from './simulated-host.js';
import type { IConfig } from '../infra/config.js';
import type { ILogger } from '../infra/logger.js';
import type { ProvisionSettings } from '../types/settings.js';
import { CONFIG_KEYS } from '../constants/index.js';

export type HostType = 'local' | 'memory';

/**
 * Get the configured host type. Defaults to 'local'.
 */
export function getHostType(config: IConfig): HostType {
  const raw = (config.get(CONFIG_KEYS.HOST_TYPE) ?? 'local').trim().toLowerCase();
  switch (raw) {
    case 'local':
    case 'memory':
      return raw;
    default:
      throw new Error(`Unsupported ${CONFIG_KEYS.HOST_TYPE} "${raw}" (expected "local" or "memory")`);
  }
}

export function createHost(type: HostType, logger: ILogger, settings: ProvisionSettings): IHost {
  switch (type) {
    case 'memory':
      logger.warn('Using a simulated host: nothing on this machine will be changed');
      return createSimulatedHost(settings);
    case 'local':
    default:
      return new LocalHost(logger);
  }
}
