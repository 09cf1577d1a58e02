import { createCipheriv, createHmac, pbkdf2Sync } from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import zlib from 'zlib';
import tar from 'tar-stream';
import type { Headers } from 'tar-stream';
import { strToU8, zipSync, type Zippable } from 'fflate';

/**
 * Directorio temporal propio de una suite
 */
export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `archive-handle-${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Escribe un ZIP con fflate. Un objeto anidado crea la entrada de directorio 'nombre/'.
 */
export function writeZip(filePath: string, files: Zippable, level: 0 | 6 = 6): string {
  fs.writeFileSync(filePath, zipSync(files, { level }));
  return filePath;
}

export const text = strToU8;

/**
 * Archivos binarios versionados junto a los tests.
 * encrypted.zip (ZipCrypto, contraseña 'test-secret'):
 *   secret.txt      almacenado, 'classified'
 *   docs/notes.txt  deflate, ENCRYPTED_NOTES
 * sample.tar.bz2 y sample.tar.xz: las entradas de sampleTarEntries()
 */
export const FIXTURES_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));
export const SAMPLE_TAR_BZ2 = path.join(FIXTURES_DIR, 'sample.tar.bz2');
export const SAMPLE_TAR_XZ = path.join(FIXTURES_DIR, 'sample.tar.xz');
export const ENCRYPTED_ZIP = path.join(FIXTURES_DIR, 'encrypted.zip');
export const ENCRYPTED_ZIP_PASSWORD = 'test-secret';
export const ENCRYPTED_NOTES = Array.from({ length: 200 }, (_, i) => `line ${i} of the encrypted notes\n`).join('');

/**
 * Escribe un ZIP de una sola entrada cifrada con WinZip AES-256 (AE-2, sin compresión).
 * El contenido cabe en un bloque AES, así que basta el CTR de Node con el contador en 1.
 */
export function writeAesZip(filePath: string, name: string, content: string, password: string): string {
  const plain = Buffer.from(content, 'utf8');
  if (plain.length > 16) {
    throw new RangeError('AES fixture content must fit in one block');
  }

  const salt = Buffer.alloc(16, 0x5a);
  const derived = pbkdf2Sync(password, salt, 1000, 66, 'sha1');
  const counter = Buffer.alloc(16);
  counter[0] = 1;
  const cipher = createCipheriv('aes-256-ctr', derived.subarray(0, 32), counter);
  const encrypted = Buffer.concat([cipher.update(plain), cipher.final()]);
  const authCode = createHmac('sha1', derived.subarray(32, 64)).update(encrypted).digest().subarray(0, 10);
  const data = Buffer.concat([salt, derived.subarray(64, 66), encrypted, authCode]);

  const fileName = Buffer.from(name, 'utf8');
  // Campo 0x9901: AE-2, 'AE', AES-256, método real 0 (almacenado)
  const extra = Buffer.from([0x01, 0x99, 0x07, 0x00, 0x02, 0x00, 0x41, 0x45, 0x03, 0x00, 0x00]);

  const local = Buffer.alloc(30);
  local.writeUInt32LE(0x04034b50, 0);
  local.writeUInt16LE(51, 4);
  local.writeUInt16LE(0x0001, 6);
  local.writeUInt16LE(99, 8);
  local.writeUInt16LE(0, 10);
  local.writeUInt16LE(0x21, 12);
  local.writeUInt32LE(0, 14);
  local.writeUInt32LE(data.length, 18);
  local.writeUInt32LE(plain.length, 22);
  local.writeUInt16LE(fileName.length, 26);
  local.writeUInt16LE(extra.length, 28);

  const central = Buffer.alloc(46);
  central.writeUInt32LE(0x02014b50, 0);
  central.writeUInt16LE(51, 4);
  central.writeUInt16LE(51, 6);
  central.writeUInt16LE(0x0001, 8);
  central.writeUInt16LE(99, 10);
  central.writeUInt16LE(0, 12);
  central.writeUInt16LE(0x21, 14);
  central.writeUInt32LE(0, 16);
  central.writeUInt32LE(data.length, 20);
  central.writeUInt32LE(plain.length, 24);
  central.writeUInt16LE(fileName.length, 28);
  central.writeUInt16LE(extra.length, 30);
  central.writeUInt32LE(0, 42);

  const localRecord = Buffer.concat([local, fileName, extra, data]);
  const centralRecord = Buffer.concat([central, fileName, extra]);

  const eocd = Buffer.alloc(22);
  eocd.writeUInt32LE(0x06054b50, 0);
  eocd.writeUInt16LE(1, 8);
  eocd.writeUInt16LE(1, 10);
  eocd.writeUInt32LE(centralRecord.length, 12);
  eocd.writeUInt32LE(localRecord.length, 16);

  fs.writeFileSync(filePath, Buffer.concat([localRecord, centralRecord, eocd]));
  return filePath;
}

export interface TarFixtureEntry {
  header: Headers;
  content?: string | Buffer;
}

/**
 * Construye un TAR en memoria con tar-stream
 */
export async function buildTar(entries: TarFixtureEntry[]): Promise<Buffer> {
  const pack = tar.pack();
  for (const { header, content } of entries) {
    if (content !== undefined) {
      pack.entry(header, content);
    } else {
      pack.entry(header);
    }
  }
  pack.finalize();

  const chunks: Buffer[] = [];
  for await (const chunk of pack) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export async function writeTar(filePath: string, entries: TarFixtureEntry[], gzip = false): Promise<string> {
  const data = await buildTar(entries);
  fs.writeFileSync(filePath, gzip ? zlib.gzipSync(data) : data);
  return filePath;
}

/**
 * Contenido de ejemplo común a los formatos
 */
export const SAMPLE_TEXT = 'Hello from the archive!\n';
export const NESTED_TEXT = 'Nested file content';

export function sampleTarEntries(): TarFixtureEntry[] {
  return [
    { header: { name: 'hello.txt', mode: 0o644 }, content: SAMPLE_TEXT },
    { header: { name: 'docs/', type: 'directory', mode: 0o755 } },
    { header: { name: 'docs/nested.txt', mode: 0o644 }, content: NESTED_TEXT },
  ];
}

export function sampleZipFiles(): Zippable {
  return {
    'hello.txt': text(SAMPLE_TEXT),
    docs: {
      'nested.txt': text(NESTED_TEXT),
    },
  };
}
