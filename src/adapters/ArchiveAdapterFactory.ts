// src/adapters/ArchiveAdapterFactory.ts
import { ArchiveFormat } from '../core/constants.js';
import { UnsupportedArchiveFormatError } from '../core/errors.js';
import { isRarFile, isSevenZipFile, isTarFile, isZipFile } from './detectors.js';
import type { AdapterOpenOptions, IArchiveAdapter } from './IArchiveAdapter.js';
import { SevenZipAdapter } from './SevenZipAdapter.js';
import { TarStreamAdapter } from './TarStreamAdapter.js';
import { UnrarAdapter } from './UnrarAdapter.js';
import { YauzlZipAdapter } from './YauzlZipAdapter.js';

/**
 * Un formato: cómo se detecta y cómo se abre su adaptador
 */
export interface AdapterDescriptor {
  readonly format: ArchiveFormat;
  detect(filePath: string): Promise<boolean>;
  open(filePath: string, options: AdapterOpenOptions): Promise<IArchiveAdapter>;
}

/**
 * Cadena de detección por defecto. El orden es fijo: ZIP, TAR, 7z, RAR.
 */
export const DEFAULT_ADAPTERS: readonly AdapterDescriptor[] = [
  { format: ArchiveFormat.ZIP, detect: isZipFile, open: (file, options) => YauzlZipAdapter.open(file, options) },
  { format: ArchiveFormat.TAR, detect: isTarFile, open: (file, options) => TarStreamAdapter.open(file, options) },
  { format: ArchiveFormat.SEVEN_ZIP, detect: isSevenZipFile, open: (file, options) => SevenZipAdapter.open(file, options) },
  { format: ArchiveFormat.RAR, detect: isRarFile, open: (file, options) => UnrarAdapter.open(file, options) },
];

/**
 * Factory que elige el adaptador según el contenido del archivo.
 * Gana el primer descriptor cuya detección acepta el archivo.
 */
export class ArchiveAdapterFactory {
  private adapters: AdapterDescriptor[];

  constructor(adapters: readonly AdapterDescriptor[] = DEFAULT_ADAPTERS) {
    this.adapters = [...adapters];
  }

  /**
   * Primer descriptor que reconoce el archivo, o undefined
   */
  async detect(filePath: string): Promise<AdapterDescriptor | undefined> {
    for (const adapter of this.adapters) {
      if (await adapter.detect(filePath)) {
        return adapter;
      }
    }
    return undefined;
  }

  /**
   * Detecta el formato y abre su adaptador
   * @throws UnsupportedArchiveFormatError si ningún detector lo reconoce
   */
  async open(filePath: string, options: AdapterOpenOptions): Promise<IArchiveAdapter> {
    const adapter = await this.detect(filePath);
    if (!adapter) {
      throw new UnsupportedArchiveFormatError(filePath);
    }
    options.logger.debug({ file: filePath, format: adapter.format }, 'Archive format detected');
    return adapter.open(filePath, options);
  }

  /**
   * Registra un adaptador con prioridad sobre los existentes
   */
  registerAdapter(adapter: AdapterDescriptor): void {
    this.adapters.unshift(adapter);
  }

  getAdapters(): AdapterDescriptor[] {
    return [...this.adapters];
  }

  /**
   * Verifica si algún adaptador reconoce el archivo
   */
  async hasAdapter(filePath: string): Promise<boolean> {
    return (await this.detect(filePath)) !== undefined;
  }
}

/**
 * Singleton de la factory por defecto
 */
let defaultFactory: ArchiveAdapterFactory | null = null;

export function getDefaultFactory(): ArchiveAdapterFactory {
  if (!defaultFactory) {
    defaultFactory = new ArchiveAdapterFactory();
  }
  return defaultFactory;
}

/**
 * Reinicia la factory por defecto (útil para tests)
 */
export function resetDefaultFactory(): void {
  defaultFactory = null;
}
