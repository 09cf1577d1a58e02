// src/Types.ts
import type { Logger } from 'pino';
import type { ArchiveMember } from './core/ArchiveMember.js';

// --- REFERENCIAS A MIEMBROS ---

/**
 * Nombre de un miembro, su ruta como Buffer, o un ArchiveMember ya obtenido.
 */
export type MemberLike = string | Buffer | ArchiveMember;

// --- OPCIONES ---

export interface ArchiveFileOptions {
    /** Contraseña para miembros cifrados (ZIP, 7z y RAR; TAR la ignora) */
    password?: string;
    /** Logger pino propio; por defecto el del paquete */
    logger?: Logger;
}

export interface ExtractOptions {
    /** Directorio destino; por defecto process.cwd() */
    destination?: string;
}

export interface ExtractAllOptions extends ExtractOptions {
    /** Miembros a extraer; si se omite se extrae todo */
    members?: Iterable<MemberLike>;
}

/**
 * Política ante secuencias inválidas al decodificar texto
 */
export type TextErrorPolicy = 'strict' | 'replace' | 'ignore';

export interface ReadTextOptions {
    /** Etiqueta de codificación WHATWG, 'utf-8' por defecto. Una etiqueta desconocida lanza ArchiveUnknownEncodingError */
    encoding?: string;
    errors?: TextErrorPolicy;
}
