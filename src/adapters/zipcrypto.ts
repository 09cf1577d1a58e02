// src/adapters/zipcrypto.ts
import { createCipheriv, createHmac, pbkdf2Sync, timingSafeEqual } from 'crypto';
import zlib from 'zlib';
import { ArchivePasswordError, ArchiveReadError } from '../core/errors.js';

/**
 * Datos de la entrada cifrada que hacen falta para descifrarla
 */
export interface EncryptedEntry {
  filename: string;
  compressionMethod: number;
  crc32: number;
  extraFields: ReadonlyArray<{ id: number; data: Buffer }>;
}

const STORED = 0;
const DEFLATED = 8;
const WINZIP_AES = 99;

const AES_EXTRA_FIELD = 0x9901;
const ZIPCRYPTO_HEADER_SIZE = 12;
const AES_VERIFIER_SIZE = 2;
const AES_AUTH_CODE_SIZE = 10;
const AES_BLOCK_SIZE = 16;

const CRC_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i += 1) {
    let c = i;
    for (let k = 0; k < 8; k += 1) {
      c = (c & 1) !== 0 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[i] = c >>> 0;
  }
  return table;
})();

function crc32Update(crc: number, byte: number): number {
  return CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
}

export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of data) {
    crc = crc32Update(crc, byte);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// --- ZipCrypto (PKWARE tradicional) ---

interface ZipCryptoKeys {
  key0: number;
  key1: number;
  key2: number;
}

function updateKeys(keys: ZipCryptoKeys, byte: number): void {
  keys.key0 = crc32Update(keys.key0, byte);
  keys.key1 = (keys.key1 + (keys.key0 & 0xff)) >>> 0;
  keys.key1 = (Math.imul(keys.key1, 134775813) + 1) >>> 0;
  keys.key2 = crc32Update(keys.key2, keys.key1 >>> 24);
}

function decryptByte(keys: ZipCryptoKeys): number {
  const temp = (keys.key2 | 2) >>> 0;
  return (Math.imul(temp, temp ^ 1) >>> 8) & 0xff;
}

/**
 * Descifra la cabecera de 12 bytes y el contenido; devuelve solo el contenido
 */
export function zipCryptoDecrypt(raw: Uint8Array, password: string): Buffer {
  const keys: ZipCryptoKeys = { key0: 0x12345678, key1: 0x23456789, key2: 0x34567890 };
  for (const byte of Buffer.from(password, 'utf8')) {
    updateKeys(keys, byte);
  }

  const plain = Buffer.alloc(raw.length);
  for (let i = 0; i < raw.length; i += 1) {
    plain[i] = raw[i] ^ decryptByte(keys);
    updateKeys(keys, plain[i]);
  }
  return plain.subarray(ZIPCRYPTO_HEADER_SIZE);
}

// --- WinZip AES (AE-1 / AE-2) ---

/**
 * Campo extra 0x9901: versión AE, fuerza de la clave y método real de compresión
 */
export interface AesParameters {
  vendorVersion: number;
  keyLength: number;
  saltLength: number;
  compressionMethod: number;
}

export function parseAesExtraField(data: Buffer): AesParameters | undefined {
  if (data.length < 7 || data.toString('latin1', 2, 4) !== 'AE') {
    return undefined;
  }
  const strength = data[4];
  if (strength < 1 || strength > 3) {
    return undefined;
  }
  return {
    vendorVersion: data.readUInt16LE(0),
    keyLength: 8 + strength * 8,
    saltLength: 4 + strength * 4,
    compressionMethod: data.readUInt16LE(5),
  };
}

/**
 * AES-CTR con contador little-endian de 128 bits que empieza en 1
 */
export function aesCtr(key: Uint8Array, input: Uint8Array): Buffer {
  const cipher = createCipheriv(`aes-${key.length * 8}-ecb`, key, null);
  cipher.setAutoPadding(false);

  const counter = Buffer.alloc(AES_BLOCK_SIZE);
  const output = Buffer.alloc(input.length);
  for (let offset = 0; offset < input.length; offset += AES_BLOCK_SIZE) {
    incrementCounter(counter);
    const keystream = cipher.update(counter);
    const end = Math.min(offset + AES_BLOCK_SIZE, input.length);
    for (let i = offset; i < end; i += 1) {
      output[i] = input[i] ^ keystream[i - offset];
    }
  }
  cipher.final();
  return output;
}

function incrementCounter(counter: Buffer): void {
  for (let i = 0; i < counter.length; i += 1) {
    counter[i] = (counter[i] + 1) & 0xff;
    if (counter[i] !== 0) return;
  }
}

// --- Entrada completa ---

/**
 * Descifra y descomprime una entrada ZIP cifrada a partir de sus bytes en bruto
 * (tal como están tras la cabecera local). La contraseña se comprueba con el
 * verificador AES o, en ZipCrypto, con el CRC del resultado.
 */
export function decryptEntry(raw: Buffer, entry: EncryptedEntry, password: string, file: string): Buffer {
  const wrongPassword = (cause?: unknown): ArchivePasswordError =>
    new ArchivePasswordError(
      `Wrong password for encrypted ZIP member '${entry.filename}'`,
      file,
      entry.filename,
      cause !== undefined ? { cause } : undefined
    );

  if (entry.compressionMethod === WINZIP_AES) {
    const field = entry.extraFields.find((extra) => extra.id === AES_EXTRA_FIELD);
    const params = field && parseAesExtraField(field.data);
    if (!params) {
      throw new ArchiveReadError(`ZIP member '${entry.filename}' has no valid AES extra field`, file, entry.filename);
    }
    const dataStart = params.saltLength + AES_VERIFIER_SIZE;
    if (raw.length < dataStart + AES_AUTH_CODE_SIZE) {
      throw new ArchiveReadError(`AES data for ZIP member '${entry.filename}' is truncated`, file, entry.filename);
    }

    const salt = raw.subarray(0, params.saltLength);
    const verifier = raw.subarray(params.saltLength, dataStart);
    const encrypted = raw.subarray(dataStart, raw.length - AES_AUTH_CODE_SIZE);
    const authCode = raw.subarray(raw.length - AES_AUTH_CODE_SIZE);

    const derived = pbkdf2Sync(password, salt, 1000, params.keyLength * 2 + AES_VERIFIER_SIZE, 'sha1');
    if (!timingSafeEqual(derived.subarray(params.keyLength * 2), verifier)) {
      throw wrongPassword();
    }

    const mac = createHmac('sha1', derived.subarray(params.keyLength, params.keyLength * 2))
      .update(encrypted)
      .digest()
      .subarray(0, AES_AUTH_CODE_SIZE);
    if (!timingSafeEqual(mac, authCode)) {
      throw new ArchiveReadError(`AES authentication failed for ZIP member '${entry.filename}'`, file, entry.filename);
    }

    const content = inflate(aesCtr(derived.subarray(0, params.keyLength), encrypted), params.compressionMethod, entry, file);
    // AE-2 guarda CRC 0; solo AE-1 lo valida
    if (params.vendorVersion === 1 && crc32(content) !== entry.crc32) {
      throw new ArchiveReadError(`CRC mismatch for ZIP member '${entry.filename}'`, file, entry.filename);
    }
    return content;
  }

  if (raw.length < ZIPCRYPTO_HEADER_SIZE) {
    throw new ArchiveReadError(`Encrypted data for ZIP member '${entry.filename}' is truncated`, file, entry.filename);
  }

  let content: Buffer;
  try {
    content = inflate(zipCryptoDecrypt(raw, password), entry.compressionMethod, entry, file);
  } catch (err) {
    // Con una contraseña errónea el flujo deflate suele ser inválido
    if (err instanceof ArchiveReadError && err.cause !== undefined) {
      throw wrongPassword(err);
    }
    throw err;
  }
  if (crc32(content) !== entry.crc32) {
    throw wrongPassword();
  }
  return content;
}

function inflate(data: Buffer, method: number, entry: EncryptedEntry, file: string): Buffer {
  if (method === STORED) {
    return data;
  }
  if (method !== DEFLATED) {
    throw new ArchiveReadError(
      `Unsupported compression method ${method} for ZIP member '${entry.filename}'`,
      file,
      entry.filename
    );
  }
  try {
    return zlib.inflateRawSync(data);
  } catch (err) {
    throw new ArchiveReadError(`Failed to inflate ZIP member '${entry.filename}'`, file, entry.filename, { cause: err });
  }
}
