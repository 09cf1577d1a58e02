// src/adapters/detectors.ts
import fs from 'fs';
import {
  RAR_SFX_SEARCH_BYTES,
  TAR_BLOCK_SIZE,
  ZIP_EOCD_MIN_SIZE,
  ZIP_EOCD_SEARCH_BYTES,
} from '../core/constants.js';
import { createDecompressor, detectCompression, readDecompressedHead } from './compression.js';
import { loadSevenZipBackend, loadUnrarBackend } from './optional.js';
import { readWindow } from './utils.js';

/**
 * Firmas (magic bytes) de los formatos
 */
const SIGNATURES = {
  // End of central directory: PK\x05\x06
  ZIP_EOCD: Buffer.from([0x50, 0x4b, 0x05, 0x06]),
  SEVEN_ZIP: Buffer.from([0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c]),
  // Rar!\x1A\x07\x00 (1.5 - 4.x)
  RAR4: Buffer.from([0x52, 0x61, 0x72, 0x21, 0x1a, 0x07, 0x00]),
  // Rar!\x1A\x07\x01\x00 (5.x)
  RAR5: Buffer.from([0x52, 0x61, 0x72, 0x21, 0x1a, 0x07, 0x01, 0x00]),
};

// Campo checksum de la cabecera TAR: offset 148, 8 bytes
const TAR_CHECKSUM_OFFSET = 148;
const TAR_CHECKSUM_LENGTH = 8;

/**
 * Verifica si un archivo es ZIP buscando el registro EOCD al final del archivo.
 * No basta con 'PK' al principio: un texto cualquiera puede empezar así.
 */
export async function isZipFile(filePath: string): Promise<boolean> {
  try {
    const { size } = await fs.promises.stat(filePath);
    if (size < ZIP_EOCD_MIN_SIZE) return false;

    const length = Math.min(size, ZIP_EOCD_SEARCH_BYTES);
    const tail = await readWindow(filePath, size - length, length);
    return tail.lastIndexOf(SIGNATURES.ZIP_EOCD) !== -1;
  } catch {
    return false;
  }
}

/**
 * Valida el checksum de un bloque de cabecera TAR (sin signo o con signo).
 */
export function isTarHeaderBlock(block: Buffer): boolean {
  if (block.length < TAR_BLOCK_SIZE) return false;

  const field = block
    .subarray(TAR_CHECKSUM_OFFSET, TAR_CHECKSUM_OFFSET + TAR_CHECKSUM_LENGTH)
    .toString('latin1')
    .replace(/[\0 ]+$/, '')
    .replace(/^ +/, '');
  if (!/^[0-7]+$/.test(field)) return false;
  const expected = parseInt(field, 8);

  let unsigned = 0;
  let signed = 0;
  for (let i = 0; i < TAR_BLOCK_SIZE; i++) {
    const inChecksum = i >= TAR_CHECKSUM_OFFSET && i < TAR_CHECKSUM_OFFSET + TAR_CHECKSUM_LENGTH;
    const byte = inChecksum ? 0x20 : block[i];
    unsigned += byte;
    signed += byte > 127 ? byte - 256 : byte;
  }

  return expected === unsigned || expected === signed;
}

/**
 * Verifica si un archivo es TAR, sin comprimir o comprimido con gzip, bzip2
 * o xz, validando la primera cabecera. Un bloque inicial de ceros no cuenta como TAR.
 */
export async function isTarFile(filePath: string): Promise<boolean> {
  try {
    const compression = await detectCompression(filePath);
    const decoder = await createDecompressor(compression);
    if (decoder === null) return false;

    const block = decoder
      ? await readDecompressedHead(filePath, decoder, TAR_BLOCK_SIZE)
      : await readWindow(filePath, 0, TAR_BLOCK_SIZE);
    return isTarHeaderBlock(block);
  } catch {
    return false;
  }
}

/**
 * Verifica si un archivo es 7z. Devuelve false si el backend opcional no está instalado.
 */
export async function isSevenZipFile(filePath: string): Promise<boolean> {
  try {
    const head = await readWindow(filePath, 0, SIGNATURES.SEVEN_ZIP.length);
    if (!head.equals(SIGNATURES.SEVEN_ZIP)) return false;
    return (await loadSevenZipBackend()) !== null;
  } catch {
    return false;
  }
}

/**
 * Verifica si un archivo es RAR (también autoextraíble, buscando la firma
 * en el primer MiB). Devuelve false si node-unrar-js no está instalado.
 */
export async function isRarFile(filePath: string): Promise<boolean> {
  try {
    const head = await readWindow(filePath, 0, RAR_SFX_SEARCH_BYTES);
    const found = head.includes(SIGNATURES.RAR4) || head.includes(SIGNATURES.RAR5);
    if (!found) return false;
    return (await loadUnrarBackend()) !== null;
  } catch {
    return false;
  }
}
