export { AptCacheUpdated, PackagePresent } from './apt.js';
export { GroupPresent, UserPresent } from './accounts.js';
export { Directory, FileContent, FileCopy, Symlink, PathAbsent } from './files.js';
export { Download, Unarchive } from './archive.js';
export { Command } from './command.js';
export { SystemdDaemonReload, ServiceState } from './systemd.js';
export type { ServiceRunState } from './systemd.js';
export { FirewallRule, FirewallEnabled } from './firewall.js';
export type { FirewallRuleAction } from './firewall.js';
export { ResourceLoop } from './loop.js';
export type { IFileAttributes } from './attributes.js';
