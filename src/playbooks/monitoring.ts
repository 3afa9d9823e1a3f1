/**
 * Prometheus behind an Nginx TLS proxy, with UFW in front.
 *
 * Order matters: the service user must exist before its directories, the unit
 * file before daemon-reload, and every allow rule before UFW is enabled so an
 * SSH session is never cut off.
 */

import type { IAction, IHandler, IPlaybook } from '../types/index.js';
import type { ProvisionSettings } from '../types/settings.js';
import type { ITemplateRenderer } from '../infra/template-manager.js';
import { HANDLERS, PATHS } from '../constants/index.js';
import {
  AptCacheUpdated,
  Command,
  Directory,
  Download,
  FileContent,
  FileCopy,
  FirewallEnabled,
  FirewallRule,
  GroupPresent,
  PackagePresent,
  PathAbsent,
  ResourceLoop,
  ServiceState,
  Symlink,
  SystemdDaemonReload,
  Unarchive,
  UserPresent,
} from '../resources/index.js';

export const MONITORING_PLAYBOOK = 'Setup Security and Monitoring';

const NGINX_CHANGED = [HANDLERS.VALIDATE_NGINX, HANDLERS.RELOAD_NGINX];
const PROMETHEUS_BINARIES = ['prometheus', 'promtool'];

export function prometheusRelease(settings: ProvisionSettings): string {
  return `prometheus-${settings.prometheusVersion}.${settings.prometheusArch}`;
}

export function prometheusDownloadUrl(settings: ProvisionSettings): string {
  return (
    `https://github.com/prometheus/prometheus/releases/download/` +
    `v${settings.prometheusVersion}/${prometheusRelease(settings)}.tar.gz`
  );
}

export function buildMonitoringHandlers(): IHandler[] {
  return [
    {
      name: HANDLERS.VALIDATE_NGINX,
      resource: new Command({ argv: ['nginx', '-t'] }),
      notify: [HANDLERS.RESTART_NGINX],
    },
    {
      name: HANDLERS.RELOAD_NGINX,
      resource: new ServiceState({ name: 'nginx', state: 'reloaded' }),
    },
    {
      name: HANDLERS.RESTART_NGINX,
      resource: new ServiceState({ name: 'nginx', state: 'restarted' }),
    },
  ];
}

export function buildMonitoringActions(settings: ProvisionSettings, templates: ITemplateRenderer): IAction[] {
  const owner = { owner: settings.prometheusUser, group: settings.prometheusGroup };
  const archive = `${settings.downloadDir}/prometheus.tar.gz`;
  const extracted = `${settings.downloadDir}/${prometheusRelease(settings)}`;
  const site = `${PATHS.NGINX_SITES_AVAILABLE}/prometheus`;

  const templateData = {
    prometheusUser: settings.prometheusUser,
    prometheusGroup: settings.prometheusGroup,
    prometheusDir: settings.prometheusDir,
    prometheusDataDir: settings.prometheusDataDir,
    prometheusPort: settings.prometheusPort,
    scrapeInterval: settings.scrapeInterval,
    binDir: PATHS.BIN_DIR,
    serverName: settings.serverName,
    certificatePath: PATHS.TLS_CERT,
    keyPath: PATHS.TLS_KEY,
    dhparamPath: PATHS.DHPARAM,
    resolvers: settings.resolvers,
  };

  return [
    {
      name: 'Update apt package index',
      resource: new AptCacheUpdated({ validSeconds: settings.aptCacheValidSeconds }),
    },
    {
      name: 'Ensure Nginx is installed',
      resource: new PackagePresent('nginx'),
    },
    {
      name: 'Install other required packages',
      resource: new PackagePresent(['wget', 'tar', 'ufw', 'openssl']),
    },
    {
      name: 'Create Prometheus group',
      resource: new GroupPresent({ name: settings.prometheusGroup, system: true }),
    },
    {
      name: 'Create Prometheus user',
      resource: new UserPresent({
        name: settings.prometheusUser,
        group: settings.prometheusGroup,
        shell: PATHS.NOLOGIN_SHELL,
        system: true,
      }),
    },
    {
      name: 'Create Prometheus directories',
      resource: new ResourceLoop(
        [settings.prometheusDir, settings.prometheusDataDir].map(
          (path) => new Directory({ path, mode: '0755', ...owner })
        )
      ),
    },
    {
      name: 'Download Prometheus',
      resource: new Download({ url: prometheusDownloadUrl(settings), dest: archive }),
    },
    {
      name: 'Extract Prometheus',
      resource: new Unarchive({ src: archive, dest: settings.downloadDir, creates: extracted }),
    },
    {
      name: 'Move Prometheus binaries',
      resource: new ResourceLoop(
        PROMETHEUS_BINARIES.map(
          (binary) =>
            new FileCopy({
              src: `${extracted}/${binary}`,
              dest: `${PATHS.BIN_DIR}/${binary}`,
              owner: 'root',
              group: 'root',
              mode: '0755',
            })
        )
      ),
    },
    {
      name: 'Move Prometheus configuration',
      resource: new FileContent({
        path: `${settings.prometheusDir}/prometheus.yml`,
        content: templates.render('prometheus.yml', templateData),
        mode: '0644',
        ...owner,
      }),
    },
    {
      name: 'Create Prometheus systemd service',
      resource: new FileContent({
        path: `${PATHS.SYSTEMD_UNIT_DIR}/prometheus.service`,
        content: templates.render('prometheus.service', templateData),
      }),
    },
    {
      name: 'Reload systemd to register Prometheus service',
      resource: new SystemdDaemonReload(),
    },
    {
      name: 'Enable and start Prometheus service',
      resource: new ServiceState({ name: 'prometheus', enabled: true, state: 'started' }),
    },
    {
      name: 'Configure UFW - Allow SSH',
      resource: new FirewallRule({ port: settings.sshPort }),
    },
    {
      name: 'Configure UFW - Allow Prometheus',
      resource: new FirewallRule({ port: settings.prometheusPort }),
    },
    {
      name: 'Generate OpenSSL certificate (non-interactive)',
      resource: new Command({
        argv: [
          'openssl', 'req', '-x509', '-nodes',
          '-days', String(settings.certificateDays),
          '-newkey', `rsa:${settings.keyBits}`,
          '-keyout', PATHS.TLS_KEY,
          '-out', PATHS.TLS_CERT,
          '-subj', settings.certificateSubject,
        ],
        creates: PATHS.TLS_KEY,
      }),
    },
    {
      name: 'Create Diffie-Hellman group',
      resource: new Command({
        argv: ['openssl', 'dhparam', '-out', PATHS.DHPARAM, String(settings.dhparamBits)],
        creates: PATHS.DHPARAM,
      }),
    },
    {
      name: 'Configure Nginx for SSL',
      resource: new FileContent({
        path: `${PATHS.NGINX_SNIPPETS}/self-signed.conf`,
        content: templates.render('self-signed.conf', templateData),
      }),
    },
    {
      name: 'Configure Nginx SSL parameters',
      resource: new FileContent({
        path: `${PATHS.NGINX_SNIPPETS}/ssl-params.conf`,
        content: templates.render('ssl-params.conf', templateData),
      }),
    },
    {
      name: 'Configure Nginx server block for Prometheus',
      resource: new FileContent({ path: site, content: templates.render('nginx-site', templateData) }),
      notify: NGINX_CHANGED,
    },
    {
      name: 'Enable Nginx site for Prometheus',
      resource: new Symlink({ target: site, path: `${PATHS.NGINX_SITES_ENABLED}/prometheus` }),
    },
    {
      name: 'Remove default Nginx configuration',
      resource: new PathAbsent(`${PATHS.NGINX_SITES_ENABLED}/default`),
      notify: NGINX_CHANGED,
    },
    {
      name: 'Enable and start Nginx',
      resource: new ServiceState({ name: 'nginx', enabled: true, state: 'started' }),
    },
    {
      name: 'Enable UFW (after all allow rules)',
      resource: new FirewallEnabled(),
    },
  ];
}

export function buildMonitoringPlaybook(settings: ProvisionSettings, templates: ITemplateRenderer): IPlaybook {
  return {
    name: MONITORING_PLAYBOOK,
    actions: buildMonitoringActions(settings, templates),
    handlers: buildMonitoringHandlers(),
  };
}
