import { InMemoryHost } from './in-memory-host.js';
import type { ProvisionSettings } from '../types/settings.js';
import { prometheusDownloadUrl, prometheusRelease } from '../playbooks/monitoring.js';
import { PATHS } from '../constants/index.js';

const RELEASE_BINARIES = ['prometheus', 'promtool'];

/**
 * An in-memory stand-in for a freshly installed machine: no packages or
 * accounts, services stopped, UFW inactive and the stock Nginx default site in
 * place. The Prometheus release can be downloaded and extracting it yields the
 * release binaries, so a full run converges.
 */
export function createSimulatedHost(settings: ProvisionSettings, name = 'simulated'): InMemoryHost {
  const host = new InMemoryHost(name);
  const extracted = `${settings.downloadDir}/${prometheusRelease(settings)}`;

  host.respond(['getent'], { exitCode: 2 });
  host.respond(['systemctl', 'is-enabled'], { exitCode: 1 });
  host.respond(['systemctl', 'is-active'], { exitCode: 3 });
  host.respond(['ufw', 'status'], { stdout: 'Status: inactive\n' });
  host.respond(['tar'], () => {
    for (const binary of RELEASE_BINARIES) {
      host.seedFile(`${extracted}/${binary}`, `${binary} ${settings.prometheusVersion}`);
    }
    return {};
  });

  host.serve(prometheusDownloadUrl(settings), `${prometheusRelease(settings)}.tar.gz`);
  host.seedFile(`${PATHS.NGINX_SITES_ENABLED}/default`, 'server {\n    listen 80 default_server;\n}\n');
  return host;
}
