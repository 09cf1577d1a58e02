// src/adapters/compression.ts
import fs from 'fs';
import type { Duplex } from 'stream';
import zlib from 'zlib';
import unbzip2Stream from 'unbzip2-stream';
import { CHUNK_SIZE, HIGH_WATER_MARK } from '../core/constants.js';
import { loadXzBackend } from './optional.js';
import { readWindow } from './utils.js';

/**
 * Compresión exterior de un TAR
 */
export type TarCompression = 'none' | 'gzip' | 'bzip2' | 'xz';

const MAGIC: ReadonlyArray<[Exclude<TarCompression, 'none'>, Buffer]> = [
  ['gzip', Buffer.from([0x1f, 0x8b])],
  // 'BZh' + nivel de bloque '1'-'9'
  ['bzip2', Buffer.from('BZh', 'latin1')],
  ['xz', Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00])],
];

/**
 * Detecta la compresión por magic bytes; 'none' si no reconoce ninguna
 */
export async function detectCompression(filePath: string): Promise<TarCompression> {
  const head = await readWindow(filePath, 0, 6);
  for (const [compression, magic] of MAGIC) {
    if (head.subarray(0, magic.length).equals(magic)) {
      if (compression === 'bzip2' && !(head[3] >= 0x31 && head[3] <= 0x39)) continue;
      return compression;
    }
  }
  return 'none';
}

/**
 * Transform de descompresión. Devuelve null si la compresión es xz y
 * lzma-native no está instalado.
 */
export async function createDecompressor(compression: TarCompression): Promise<Duplex | null | undefined> {
  switch (compression) {
    case 'none':
      return undefined;
    case 'gzip':
      return zlib.createGunzip({ chunkSize: CHUNK_SIZE });
    case 'bzip2':
      return unbzip2Stream();
    case 'xz': {
      const lzma = await loadXzBackend();
      return lzma ? lzma.createDecompressor() : null;
    }
  }
}

/**
 * Primeros `length` bytes descomprimidos del archivo (menos si es más corto).
 * Solo se lee lo necesario.
 */
export async function readDecompressedHead(filePath: string, decoder: Duplex, length: number): Promise<Buffer> {
  const source = fs.createReadStream(filePath, { highWaterMark: HIGH_WATER_MARK });

  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    let settled = false;

    const settle = (error?: unknown) => {
      if (settled) return;
      settled = true;
      source.destroy();
      decoder.destroy();
      if (error !== undefined) {
        reject(error);
      } else {
        resolve(Buffer.concat(chunks).subarray(0, length));
      }
    };

    decoder.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
      total += chunk.length;
      if (total >= length) settle();
    });
    decoder.on('end', () => settle());
    decoder.on('error', (err: unknown) => settle(err));
    source.on('error', (err: unknown) => settle(err));

    source.pipe(decoder);
  });
}
