import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import path from 'path';
import { TarStreamAdapter, sanitizeFileMode } from '../src/adapters/TarStreamAdapter.js';
import { loadXzBackend } from '../src/adapters/optional.js';
import { ArchiveMemberUnsafeError, ArchiveReadError } from '../src/core/errors.js';
import { logger } from '../src/core/logger.js';
import {
  NESTED_TEXT,
  SAMPLE_TAR_BZ2,
  SAMPLE_TAR_XZ,
  SAMPLE_TEXT,
  makeTempDir,
  removeDir,
  sampleTarEntries,
  writeTar,
} from './helpers/fixtures.js';

const xzAvailable = (await loadXzBackend()) !== null;

describe('TarStreamAdapter', () => {
  let dir: string;
  const file = (name: string) => path.join(dir, name);
  const open = (name: string) => TarStreamAdapter.open(file(name), { logger });

  beforeAll(async () => {
    dir = makeTempDir('tar');

    await writeTar(file('links.tar'), [
      ...sampleTarEntries(),
      { header: { name: 'docs/link.txt', type: 'symlink', linkname: 'nested.txt' } },
      { header: { name: 'copy.txt', type: 'link', linkname: 'hello.txt' } },
      { header: { name: 'run.sh', mode: 0o4777 }, content: '#!/bin/sh\n' },
      { header: { name: 'shared.txt', mode: 0o666 }, content: 'shared' },
    ]);
    await writeTar(file('traversal.tar'), [
      { header: { name: 'safe.txt' }, content: 'ok' },
      { header: { name: '../evil.txt' }, content: 'evil' },
    ]);
    await writeTar(file('absolute.tar'), [{ header: { name: '/tmp/absolute-evil.txt' }, content: 'evil' }]);
    await writeTar(file('device.tar'), [
      { header: { name: 'dev/null', type: 'character-device', devmajor: 1, devminor: 3 } },
    ]);
    await writeTar(file('fifo.tar'), [{ header: { name: 'pipe', type: 'fifo' } }]);
    await writeTar(file('symlink-out.tar'), [
      { header: { name: 'docs/escape', type: 'symlink', linkname: '../../outside' } },
    ]);
    await writeTar(file('symlink-abs.tar'), [
      { header: { name: 'passwd', type: 'symlink', linkname: '/etc/passwd' } },
    ]);
    await writeTar(file('hardlink-out.tar'), [
      { header: { name: 'grab', type: 'link', linkname: '../outside.txt' } },
    ]);
    await writeTar(file('duplicate.tar'), [
      { header: { name: 'twice.txt' }, content: 'first' },
      { header: { name: 'twice.txt' }, content: 'second' },
    ]);

    // Segunda cabecera (offset 1024) con el checksum roto
    const corrupted = fs.readFileSync(file('links.tar'));
    corrupted[1024] ^= 0xff;
    fs.writeFileSync(file('corrupted.tar'), corrupted);
  });

  afterAll(() => {
    removeDir(dir);
  });

  describe('reading', () => {
    test('should report links as files', async () => {
      const adapter = await open('links.tar');
      const link = await adapter.getMember('docs/link.txt');
      expect(link.isFile).toBe(true);
      expect(link.size).toBe(0);
      await adapter.close();
    });

    test('should follow symbolic and hard links when reading', async () => {
      const adapter = await open('links.tar');
      expect(await adapter.readText('docs/link.txt')).toBe(NESTED_TEXT);
      expect(await adapter.readText('copy.txt')).toBe(SAMPLE_TEXT);
      await adapter.close();
    });

    test('should read a bzip2-compressed TAR', async () => {
      const adapter = await TarStreamAdapter.open(SAMPLE_TAR_BZ2, { logger });
      expect(await adapter.getNames()).toEqual(['hello.txt', 'docs', 'docs/nested.txt']);
      expect(await adapter.readText('docs/nested.txt')).toBe(NESTED_TEXT);

      const destination = path.join(dir, 'out-bzip2');
      await adapter.extractAll({ destination });
      expect(fs.readFileSync(path.join(destination, 'hello.txt'), 'utf8')).toBe(SAMPLE_TEXT);
      await adapter.close();
    });

    test.skipIf(!xzAvailable)('should read an xz-compressed TAR', async () => {
      const adapter = await TarStreamAdapter.open(SAMPLE_TAR_XZ, { logger });
      expect(await adapter.getNames()).toEqual(['hello.txt', 'docs', 'docs/nested.txt']);
      expect(await adapter.readText('hello.txt')).toBe(SAMPLE_TEXT);
      await adapter.close();
    });

    test('should return the last occurrence of a repeated name', async () => {
      const adapter = await open('duplicate.tar');
      expect(await adapter.getNames()).toEqual(['twice.txt', 'twice.txt']);
      expect(await adapter.readText('twice.txt')).toBe('second');
      await adapter.close();
    });

    test('should translate stream failures', async () => {
      const adapter = await open('corrupted.tar');
      await expect(adapter.getNames()).rejects.toBeInstanceOf(ArchiveReadError);
      await adapter.close();
    });

    test('should mask the password in its string form', async () => {
      const adapter = await TarStreamAdapter.open(file('links.tar'), { logger, password: 'test-secret' });
      expect(adapter.toString()).toBe(`TarStreamAdapter('${file('links.tar')}', password='********')`);
      await adapter.close();
    });
  });

  describe('extraction filter', () => {
    const expectUnsafe = async (archive: string, reason: string) => {
      const adapter = await open(archive);
      const destination = path.join(dir, `out-${archive}`);
      try {
        await expect(adapter.extractAll({ destination })).rejects.toSatisfy(
          (err: unknown) => err instanceof ArchiveMemberUnsafeError && err.reason === reason
        );
      } finally {
        await adapter.close();
      }
    };

    test('should extract links and sanitize modes', async () => {
      const adapter = await open('links.tar');
      const destination = path.join(dir, 'out-links');
      await adapter.extractAll({ destination });
      await adapter.close();

      expect(fs.readlinkSync(path.join(destination, 'docs', 'link.txt'))).toBe('nested.txt');
      expect(fs.readFileSync(path.join(destination, 'docs', 'link.txt'), 'utf8')).toBe(NESTED_TEXT);
      expect(fs.readFileSync(path.join(destination, 'copy.txt'), 'utf8')).toBe(SAMPLE_TEXT);
      expect(fs.statSync(path.join(destination, 'run.sh')).mode & 0o7777).toBe(0o755);
      expect(fs.statSync(path.join(destination, 'shared.txt')).mode & 0o7777).toBe(0o644);
    });

    test('should copy a hard link whose target was not extracted', async () => {
      const adapter = await open('links.tar');
      const destination = path.join(dir, 'out-copy');
      const written = await adapter.extract('copy.txt', { destination });
      await adapter.close();

      expect(written).toBe(path.join(destination, 'copy.txt'));
      expect(fs.readdirSync(destination)).toEqual(['copy.txt']);
      expect(fs.readFileSync(written, 'utf8')).toBe(SAMPLE_TEXT);
    });

    test('should reject names escaping the destination', async () => {
      await expectUnsafe('traversal.tar', 'path escapes the destination directory');
      expect(fs.existsSync(path.join(dir, 'evil.txt'))).toBe(false);
    });

    test('should reject absolute names', async () => {
      await expectUnsafe('absolute.tar', 'absolute path');
    });

    test('should reject device files and FIFOs', async () => {
      await expectUnsafe('device.tar', 'special file (character-device)');
      await expectUnsafe('fifo.tar', 'special file (fifo)');
    });

    test('should reject symlinks leaving the destination', async () => {
      await expectUnsafe('symlink-out.tar', "symlink target '../../outside' is outside the destination");
      await expectUnsafe('symlink-abs.tar', "symlink to absolute path '/etc/passwd'");
    });

    test('should reject hard links leaving the destination', async () => {
      await expectUnsafe('hardlink-out.tar', "hard link target '../outside.txt' is outside the destination");
    });
  });

  describe('sanitizeFileMode', () => {
    test('should drop special and group/other write bits', () => {
      expect(sanitizeFileMode(0o4777)).toBe(0o755);
      expect(sanitizeFileMode(0o2775)).toBe(0o755);
    });

    test('should keep files owner-readable and owner-writable', () => {
      expect(sanitizeFileMode(0o400)).toBe(0o600);
      expect(sanitizeFileMode(0o000)).toBe(0o600);
    });

    test('should clear execute bits when the owner cannot execute', () => {
      expect(sanitizeFileMode(0o655)).toBe(0o644);
      expect(sanitizeFileMode(undefined)).toBe(0o644);
    });
  });
});
