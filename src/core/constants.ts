// src/core/constants.ts

/**
 * Formatos de contenedor soportados, en el orden en que se detectan.
 */
export enum ArchiveFormat {
    ZIP = 'zip',
    TAR = 'tar',
    SEVEN_ZIP = '7z',
    RAR = 'rar'
};

/**
 * Configuración de streaming para archivos grandes
 */
export const CHUNK_SIZE = 64 * 1024;
export const HIGH_WATER_MARK = 256 * 1024;

// --- Detección por contenido ---

/** Tamaño de un bloque de cabecera TAR */
export const TAR_BLOCK_SIZE = 512;

/** El registro EOCD de un ZIP está dentro de los últimos 64KiB + 22 bytes */
export const ZIP_EOCD_MIN_SIZE = 22;
export const ZIP_EOCD_SEARCH_BYTES = 0x10000 + ZIP_EOCD_MIN_SIZE;

/** Ventana en la que se busca la firma de un RAR autoextraíble */
export const RAR_SFX_SEARCH_BYTES = 1024 * 1024;

// --- Presentación ---

export const MASKED_PASSWORD = '********';

// --- Logging ---

export const LOGGER_NAME = 'archive-handle';
export const LOG_LEVEL_ENV = 'ARCHIVE_HANDLE_LOG_LEVEL';
export const DEFAULT_LOG_LEVEL = 'silent';
