// src/adapters/optional.ts
import type lzma from 'lzma-native';
import type Seven from 'node-7z';
import { logger } from '../core/logger.js';

/**
 * Backend 7z: node-7z más el binario 7za de 7zip-bin
 */
export interface SevenZipBackend {
  seven: typeof Seven;
  bin: string;
}

export type UnrarBackend = typeof import('node-unrar-js');

/**
 * Enlaces nativos de liblzma para TAR+xz
 */
export type XzBackend = typeof lzma;

let sevenZipBackend: Promise<SevenZipBackend | null> | undefined;
let unrarBackend: Promise<UnrarBackend | null> | undefined;
let xzBackend: Promise<XzBackend | null> | undefined;

/**
 * Carga (una sola vez) las dependencias opcionales de 7z.
 * Devuelve null si no están instaladas.
 */
export function loadSevenZipBackend(): Promise<SevenZipBackend | null> {
  sevenZipBackend ??= (async () => {
    try {
      const [sevenModule, binModule] = await Promise.all([import('node-7z'), import('7zip-bin')]);
      return { seven: sevenModule.default, bin: binModule.path7za };
    } catch (err) {
      logger.debug({ err }, '7z backend unavailable');
      return null;
    }
  })();
  return sevenZipBackend;
}

/**
 * Carga (una sola vez) node-unrar-js. Devuelve null si no está instalado.
 */
export function loadUnrarBackend(): Promise<UnrarBackend | null> {
  unrarBackend ??= (async () => {
    try {
      return await import('node-unrar-js');
    } catch (err) {
      logger.debug({ err }, 'RAR backend unavailable');
      return null;
    }
  })();
  return unrarBackend;
}

/**
 * Carga (una sola vez) lzma-native. Devuelve null si no está instalado
 * o su módulo nativo no carga en esta plataforma.
 */
export function loadXzBackend(): Promise<XzBackend | null> {
  xzBackend ??= (async () => {
    try {
      const lzmaModule = await import('lzma-native');
      return lzmaModule.default;
    } catch (err) {
      logger.debug({ err }, 'xz backend unavailable');
      return null;
    }
  })();
  return xzBackend;
}
