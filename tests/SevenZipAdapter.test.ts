import { describe, test, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import fs from 'fs';
import path from 'path';
import { PassThrough, Readable } from 'stream';
import { ArchiveFile } from '../src/core/ArchiveFile.js';
import { SevenZipAdapter, toMember } from '../src/adapters/SevenZipAdapter.js';
import { ArchiveMemberNotAFileError, ArchivePasswordError, ArchiveReadError } from '../src/core/errors.js';
import { logger } from '../src/core/logger.js';
import { makeTempDir, removeDir } from './helpers/fixtures.js';

/**
 * Sustituto en proceso de node-7z: lista un archivo fijo y "extrae"
 * escribiendo su contenido en el destino
 */
const sevenZip = vi.hoisted(() => {
  const listing = [
    { file: 'a.txt', size: 5, sizeCompressed: 3, attributes: '....A' },
    { file: 'dir', size: 0, sizeCompressed: 0, attributes: 'D....' },
    { file: 'dir/b.txt', size: 4, sizeCompressed: 0, attributes: '....A' },
  ];
  const contents: Record<string, string> = { 'a.txt': 'alpha', 'dir/b.txt': 'beta' };
  return { listing, contents, list: vi.fn(), extractFull: vi.fn() };
});

vi.mock('node-7z', () => ({ default: { list: sevenZip.list, extractFull: sevenZip.extractFull } }));
vi.mock('7zip-bin', () => ({ path7za: '/fake/7za' }));

/**
 * `7za e -so` simulado: escribe el contenido del miembro en stdout
 */
const childProcess = vi.hoisted(() => ({ spawn: vi.fn() }));

vi.mock('child_process', async (importOriginal) => ({
  ...(await importOriginal<typeof import('child_process')>()),
  spawn: childProcess.spawn,
}));

function fakeProcess(stdout: string, code: number, stderr = ''): EventEmitter {
  const child = Object.assign(new EventEmitter(), {
    stdout: Readable.from(stdout ? [Buffer.from(stdout)] : []),
    stderr: Readable.from(stderr ? [Buffer.from(stderr)] : []),
  });
  setTimeout(() => child.emit('close', code), 5);
  return child;
}

function fakeSpawn(_bin: string, args: string[]): EventEmitter {
  const name = args[args.length - 1];
  return fakeProcess(sevenZip.contents[name] ?? '', 0);
}

const SEVEN_ZIP_MAGIC = Buffer.from([0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c, 0x00, 0x04]);

function failingStream(message: string): PassThrough {
  const stream = new PassThrough({ objectMode: true });
  process.nextTick(() => stream.destroy(new Error(message)));
  return stream;
}

function fakeExtract(_archive: string, destination: string, options: { $cherryPick?: string[] }): Readable {
  const names = options.$cherryPick ?? Object.keys(sevenZip.contents);
  for (const name of names) {
    const target = path.join(destination, name);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, sevenZip.contents[name]);
  }
  return Readable.from(names.map((file) => ({ file, status: 'extracted' })));
}

describe('SevenZipAdapter', () => {
  let dir: string;
  let archivePath: string;

  beforeAll(() => {
    dir = makeTempDir('7z');
    archivePath = path.join(dir, 'sample.7z');
    fs.writeFileSync(archivePath, Buffer.concat([SEVEN_ZIP_MAGIC, Buffer.alloc(24)]));
  });

  afterAll(() => {
    removeDir(dir);
  });

  beforeEach(() => {
    sevenZip.list.mockReset();
    sevenZip.extractFull.mockReset();
    childProcess.spawn.mockReset();
    sevenZip.list.mockImplementation(() => Readable.from(sevenZip.listing));
    sevenZip.extractFull.mockImplementation(fakeExtract);
    childProcess.spawn.mockImplementation(fakeSpawn);
  });

  test('should open through the facade and normalise the listing', async () => {
    const archive = await ArchiveFile.open(archivePath);
    expect(archive.format).toBe('7z');

    const members = await archive.getMembers();
    expect(members.map((member) => member.toJSON())).toEqual([
      { name: 'a.txt', size: 5, compressedSize: 3, isDir: false, isFile: true },
      { name: 'dir', size: 0, compressedSize: 0, isDir: true, isFile: false },
      { name: 'dir/b.txt', size: 4, compressedSize: 4, isDir: false, isFile: true },
    ]);
    expect(sevenZip.list).toHaveBeenCalledWith(archive.file, { $bin: '/fake/7za' });
    await archive.close();
  });

  test('should read bytes from 7za standard output without touching the disk', async () => {
    const adapter = await SevenZipAdapter.open(archivePath, { logger, password: 'test-secret' });

    expect((await adapter.readBytes('dir/b.txt')).toString()).toBe('beta');
    expect(childProcess.spawn).toHaveBeenCalledWith(
      '/fake/7za',
      ['e', '-so', '-bd', '-y', '-spd', '-ptest-secret', '--', archivePath, 'dir/b.txt'],
      { stdio: ['ignore', 'pipe', 'pipe'] }
    );
    expect(sevenZip.extractFull).not.toHaveBeenCalled();
    await adapter.close();
  });

  test('should pass an empty password so 7za never prompts', async () => {
    const adapter = await SevenZipAdapter.open(archivePath, { logger });

    expect(await adapter.readText('a.txt')).toBe('alpha');
    expect(childProcess.spawn.mock.calls[0][1]).toContain('-p');
    await adapter.close();
  });

  test('should map a failing 7za exit to a password error', async () => {
    const adapter = await SevenZipAdapter.open(archivePath, { logger, password: 'not-the-secret' });
    childProcess.spawn.mockImplementation(() =>
      fakeProcess('', 2, 'ERROR: Wrong password : a.txt\n')
    );

    await expect(adapter.readBytes('a.txt')).rejects.toSatisfy(
      (err: unknown) => err instanceof ArchivePasswordError && err.member === 'a.txt'
    );
    await adapter.close();
  });

  test('should refuse to read a directory', async () => {
    const adapter = await SevenZipAdapter.open(archivePath, { logger });
    await expect(adapter.readBytes('dir/')).rejects.toBeInstanceOf(ArchiveMemberNotAFileError);
    expect(sevenZip.extractFull).not.toHaveBeenCalled();
    await adapter.close();
  });

  test('should extract single members with a cherry-pick', async () => {
    const adapter = await SevenZipAdapter.open(archivePath, { logger });
    const destination = path.join(dir, 'out-single');

    const written = await adapter.extract('a.txt', { destination });
    expect(written).toBe(path.join(destination, 'a.txt'));
    expect(fs.readFileSync(written, 'utf8')).toBe('alpha');
    expect(sevenZip.extractFull).toHaveBeenCalledWith(archivePath, destination, {
      $bin: '/fake/7za',
      $cherryPick: ['a.txt'],
    });
    await adapter.close();
  });

  test('should cherry-pick when only some members are requested', async () => {
    sevenZip.list.mockImplementation(() =>
      Readable.from([
        { file: 'empty', size: 0, sizeCompressed: 0, attributes: 'D....' },
        { file: 'a.txt', size: 5, sizeCompressed: 3, attributes: '....A' },
      ])
    );
    const adapter = await SevenZipAdapter.open(archivePath, { logger });
    const destination = path.join(dir, 'out-picked');

    await adapter.extractAll({ destination, members: ['a.txt'] });
    expect(sevenZip.extractFull).toHaveBeenCalledWith(archivePath, destination, {
      $bin: '/fake/7za',
      $cherryPick: ['a.txt'],
    });
    expect(fs.readdirSync(destination)).toEqual(['a.txt']);
    await adapter.close();
  });

  test('should extract everything in one call', async () => {
    const adapter = await SevenZipAdapter.open(archivePath, { logger });
    const destination = path.join(dir, 'out-all');

    await adapter.extractAll({ destination });
    expect(sevenZip.extractFull).toHaveBeenCalledTimes(1);
    expect(sevenZip.extractFull).toHaveBeenCalledWith(archivePath, destination, { $bin: '/fake/7za' });
    expect(fs.readFileSync(path.join(destination, 'dir', 'b.txt'), 'utf8')).toBe('beta');
    await adapter.close();
  });

  test('should only create directories without calling 7z', async () => {
    const adapter = await SevenZipAdapter.open(archivePath, { logger });
    const destination = path.join(dir, 'out-dir');

    await adapter.extract('dir', { destination });
    expect(fs.statSync(path.join(destination, 'dir')).isDirectory()).toBe(true);
    expect(sevenZip.extractFull).not.toHaveBeenCalled();
    await adapter.close();
  });

  test('should translate password failures', async () => {
    sevenZip.list.mockImplementation(() => failingStream('Wrong password : sample.7z'));
    await expect(SevenZipAdapter.open(archivePath, { logger })).rejects.toBeInstanceOf(ArchivePasswordError);
  });

  test('should translate other failures with the member name', async () => {
    const adapter = await SevenZipAdapter.open(archivePath, { logger });
    childProcess.spawn.mockImplementation(() => fakeProcess('', 2, 'ERROR: Data Error : a.txt'));
    await expect(adapter.readBytes('a.txt')).rejects.toSatisfy(
      (err: unknown) => err instanceof ArchiveReadError && err.member === 'a.txt'
    );
    await adapter.close();
  });

  describe('toMember', () => {
    test('should accept the short attribute field', () => {
      expect(toMember({ file: 'x\\y', size: 2, attr: 'D' })?.toJSON()).toEqual({
        name: 'x/y',
        size: 0,
        compressedSize: 0,
        isDir: true,
        isFile: false,
      });
    });

    test('should ignore records without a file name', () => {
      expect(toMember({ size: 3 })).toBeNull();
      expect(toMember('progress')).toBeNull();
    });
  });
});
