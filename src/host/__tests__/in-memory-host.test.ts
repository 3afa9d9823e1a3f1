/**
 * InMemoryHost Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryHost } from '../in-memory-host.js';
import { runChecked } from '../index.js';
import { CommandError } from '../errors.js';

describe('InMemoryHost', () => {
  let host: InMemoryHost;

  beforeEach(() => {
    host = new InMemoryHost('sim', () => 42);
  });

  describe('Commands', () => {
    it('should succeed with empty output when nothing responds', async () => {
      expect(await host.exec(['systemctl', 'daemon-reload'])).toEqual({ exitCode: 0, stdout: '', stderr: '' });
      expect(host.executed).toEqual([['systemctl', 'daemon-reload']]);
    });

    it('should prefer the most recently registered responder', async () => {
      host.respond(['ufw'], { stdout: 'generic' });
      host.respond(['ufw', 'status'], { stdout: 'Status: active' });

      expect((await host.exec(['ufw', 'status'])).stdout).toBe('Status: active');
      expect((await host.exec(['ufw', 'show', 'added'])).stdout).toBe('generic');
    });

    it('should pass argv and options to function responders', async () => {
      host.respond(['apt-get'], (argv, options) => ({ stdout: `${argv.length} ${options?.env?.DEBIAN_FRONTEND}` }));

      const result = await host.exec(['apt-get', 'update'], { env: { DEBIAN_FRONTEND: 'noninteractive' } });

      expect(result.stdout).toBe('2 noninteractive');
    });

    it('should raise CommandError through runChecked', async () => {
      host.respond(['false'], { exitCode: 1, stderr: 'nope\n' });

      await expect(runChecked(host, ['false'])).rejects.toBeInstanceOf(CommandError);
      await expect(runChecked(host, ['false'])).rejects.toThrow('Command "false" failed with exit code 1: nope');
    });
  });

  describe('Filesystem', () => {
    it('should create parent directories when writing', async () => {
      await host.writeFile('/etc/nginx/snippets/ssl-params.conf', 'ssl on;');

      expect(await host.stat('/etc/nginx')).toEqual({
        type: 'directory',
        mode: '0755',
        owner: 'root',
        group: 'root',
        mtimeMs: 42,
        linkTarget: undefined,
      });
      expect(await host.readFile('/etc/nginx/snippets/ssl-params.conf')).toBe('ssl on;');
    });

    it('should remove a directory recursively', async () => {
      host.seedFile('/opt/a/b.txt', 'b');

      await host.remove('/opt/a');

      expect(await host.stat('/opt/a')).toBeNull();
      expect(await host.stat('/opt/a/b.txt')).toBeNull();
      expect(await host.stat('/opt')).not.toBeNull();
    });

    it('should refuse to create a symlink over an existing path', async () => {
      host.seedFile('/etc/nginx/sites-enabled/prometheus', 'x');

      await expect(host.symlink('/elsewhere', '/etc/nginx/sites-enabled/prometheus')).rejects.toThrow('EEXIST');
    });

    it('should normalize modes and track owners', async () => {
      host.seedFile('/usr/local/bin/prometheus', 'bin');

      await host.chmod('/usr/local/bin/prometheus', '755');
      await host.chown('/usr/local/bin/prometheus', undefined, 'staff');

      expect(await host.stat('/usr/local/bin/prometheus')).toMatchObject({ mode: '0755', owner: 'root', group: 'staff' });
    });

    it('should checksum file content', async () => {
      host.seedFile('/a', 'same');
      host.seedFile('/b', 'same');

      expect(await host.checksum('/a')).toBe(await host.checksum('/b'));
      expect(await host.checksum('/missing')).toBeNull();
    });

    it('should fail to copy a missing source', async () => {
      await expect(host.copyFile('/missing', '/dest')).rejects.toThrow('ENOENT');
    });
  });
});
