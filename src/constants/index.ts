/**
 * Centralized constants for hostforge.
 * Paths on the target host and magic strings live here.
 */

// Task outcome values
export const TASK_STATUS = {
  UNCHANGED: 'unchanged',
  CHANGED: 'changed',
  FAILED: 'failed',
} as const;

// Resource variants
export const RESOURCE_KINDS = {
  APT_CACHE: 'apt_cache',
  PACKAGE: 'package',
  GROUP: 'group',
  USER: 'user',
  DIRECTORY: 'directory',
  FILE: 'file',
  COPY: 'copy',
  LINK: 'link',
  ABSENT: 'absent',
  DOWNLOAD: 'download',
  UNARCHIVE: 'unarchive',
  COMMAND: 'command',
  DAEMON_RELOAD: 'daemon_reload',
  SERVICE: 'service',
  FIREWALL_RULE: 'firewall_rule',
  FIREWALL: 'firewall',
  LOOP: 'loop',
} as const;

// Handler names used by the monitoring playbook
export const HANDLERS = {
  VALIDATE_NGINX: 'Validate Nginx Config',
  RELOAD_NGINX: 'Reload Nginx',
  RESTART_NGINX: 'Restart Nginx',
} as const;

// Well-known paths on the target host
export const PATHS = {
  APT_LISTS: '/var/lib/apt/lists',
  BIN_DIR: '/usr/local/bin',
  SYSTEMD_UNIT_DIR: '/etc/systemd/system',
  TLS_KEY: '/etc/ssl/private/nginx-selfsigned.key',
  TLS_CERT: '/etc/ssl/certs/nginx-selfsigned.crt',
  DHPARAM: '/etc/ssl/certs/dhparam.pem',
  NGINX_SNIPPETS: '/etc/nginx/snippets',
  NGINX_SITES_AVAILABLE: '/etc/nginx/sites-available',
  NGINX_SITES_ENABLED: '/etc/nginx/sites-enabled',
  NOLOGIN_SHELL: '/sbin/nologin',
} as const;

// Configuration keys read from the environment / .env
export const CONFIG_KEYS = {
  LOG_LEVEL: 'LOG_LEVEL',
  HOST_TYPE: 'HOST_TYPE',
  CHECK_MODE: 'CHECK_MODE',
  CONTINUE_AFTER_HANDLER_FAILURE: 'CONTINUE_AFTER_HANDLER_FAILURE',
} as const;

// Process exit codes
export const EXIT_CODES = {
  SUCCESS: 0,
  FATAL: 1,
  HANDLER_FAILED: 2,
} as const;

export const DPKG_INSTALLED_STATUS = 'install ok installed';
