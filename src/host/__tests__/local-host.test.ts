/**
 * LocalHost Unit Tests
 *
 * Exercises the fs backed operations inside a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ReadableStream } from 'stream/web';
import { LocalHost } from '../local-host.js';
import { DownloadError } from '../errors.js';
import { LoggerStub } from '../../infra/logger.js';
import { Download } from '../../resources/archive.js';

describe('LocalHost', () => {
  let host: LocalHost;
  let dir: string;

  beforeEach(async () => {
    host = new LocalHost(new LoggerStub(), 'unit');
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hostforge-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should use the given name', () => {
    expect(host.name).toBe('unit');
  });

  it('should write, read and checksum files', async () => {
    const file = path.join(dir, 'prometheus.yml');

    await host.writeFile(file, 'global: {}\n');

    expect(await host.readFile(file)).toBe('global: {}\n');
    expect(await host.checksum(file)).toMatch(/^[a-f0-9]{64}$/);
  });

  it('should return null for missing paths', async () => {
    const missing = path.join(dir, 'missing');

    expect(await host.readFile(missing)).toBeNull();
    expect(await host.checksum(missing)).toBeNull();
    expect(await host.stat(missing)).toBeNull();
  });

  it('should create nested directories and change modes', async () => {
    const nested = path.join(dir, 'a', 'b');

    await host.mkdir(nested);
    await host.chmod(nested, '0700');

    const stats = await fs.stat(nested);
    expect(stats.isDirectory()).toBe(true);
    expect(stats.mode & 0o777).toBe(0o700);
  });

  it('should create and remove symlinks', async () => {
    const target = path.join(dir, 'site');
    const link = path.join(dir, 'enabled');
    await host.writeFile(target, 'server {}');

    await host.symlink(target, link);
    expect(await fs.readlink(link)).toBe(target);

    await host.remove(link);
    await expect(fs.lstat(link)).rejects.toThrow();
    expect(await host.readFile(target)).toBe('server {}');
  });

  it('should copy files', async () => {
    const src = path.join(dir, 'promtool');
    const dest = path.join(dir, 'bin-promtool');
    await host.writeFile(src, 'tool');

    await host.copyFile(src, dest);

    expect(await host.readFile(dest)).toBe('tool');
  });

  it('should not run chown without an owner or group', async () => {
    const exec = vi.spyOn(host, 'exec');

    await host.chown(path.join(dir, 'anything'));

    expect(exec).not.toHaveBeenCalled();
  });

  it('should reject an empty command', async () => {
    await expect(host.exec([])).rejects.toThrow('Cannot execute an empty command');
  });

  describe('download', () => {
    it('should write the response body', async () => {
      const fetchMock = vi.fn(async () => new Response('tarball', { status: 200 }));
      vi.stubGlobal('fetch', fetchMock);
      const dest = path.join(dir, 'prometheus.tar.gz');

      await host.download('https://downloads.example.test/prometheus.tar.gz', dest);

      expect(fetchMock).toHaveBeenCalledWith('https://downloads.example.test/prometheus.tar.gz');
      expect(await fs.readFile(dest, 'utf-8')).toBe('tarball');
      await expect(fs.access(`${dest}.part`)).rejects.toThrow();
    });

    it('should leave nothing at the destination when the transfer breaks off', async () => {
      let pulls = 0;
      const body = new ReadableStream<Uint8Array>({
        pull(controller) {
          pulls += 1;
          if (pulls === 1) {
            controller.enqueue(new TextEncoder().encode('full-'));
          } else {
            controller.error(new Error('ENOSPC: no space left on device'));
          }
        },
      });
      vi.stubGlobal('fetch', vi.fn(async () => new Response(body, { status: 200 })));
      const url = 'https://downloads.example.test/prometheus.tar.gz';
      const dest = path.join(dir, 'prometheus.tar.gz');

      await expect(host.download(url, dest)).rejects.toThrow('ENOSPC: no space left on device');

      await expect(fs.access(dest)).rejects.toThrow();
      await expect(fs.access(`${dest}.part`)).rejects.toThrow();
      expect(await new Download({ url, dest }).check(host)).toEqual({ satisfied: false, reason: 'missing' });
    });

    it('should raise DownloadError on a non-2xx response', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404 })));

      await expect(host.download('https://downloads.example.test/x', path.join(dir, 'x'))).rejects.toEqual(
        new DownloadError('https://downloads.example.test/x', 404)
      );
    });
  });
});
