// src/core/errors.ts
import path from 'path';

/** Códigos estables de error */
export type ArchiveErrorCode =
    | 'ARCHIVE_FILE_NOT_FOUND'
    | 'ARCHIVE_UNSUPPORTED_FORMAT'
    | 'ARCHIVE_MEMBER_NOT_FOUND'
    | 'ARCHIVE_MEMBER_NOT_A_FILE'
    | 'ARCHIVE_MEMBER_UNSAFE'
    | 'ARCHIVE_PASSWORD'
    | 'ARCHIVE_READ_FAILED'
    | 'ARCHIVE_MEMBER_DECODE_FAILED'
    | 'ARCHIVE_UNKNOWN_ENCODING'
    | 'ARCHIVE_CLOSED'
    | 'ARCHIVE_MEMBER_TYPE';

export interface ArchiveErrorJSON {
    name: string;
    code: ArchiveErrorCode;
    message: string;
    file?: string;
    member?: string;
}

interface CauseOptions {
    cause?: unknown;
}

const toPosix = (file: string): string => file.split(path.sep).join('/');

/**
 * Error base de todos los fallos relacionados con un archivo concreto.
 */
export class ArchiveFileError extends Error {
    readonly code: ArchiveErrorCode;
    /** Ruta del archivo relacionado con el error */
    readonly file: string;

    constructor(code: ArchiveErrorCode, message: string, file: string, options?: CauseOptions) {
        super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = new.target.name;
        this.code = code;
        this.file = file;
    }

    toJSON(): ArchiveErrorJSON {
        return { name: this.name, code: this.code, message: this.message, file: this.file };
    }
}

/**
 * La ruta no existe o no es un archivo regular. Se lanza antes de detectar el formato.
 */
export class ArchiveFileNotFoundError extends ArchiveFileError {
    constructor(file: string) {
        super('ARCHIVE_FILE_NOT_FOUND', `Archive file not found or not a regular file: '${toPosix(file)}'`, file);
    }
}

export class UnsupportedArchiveFormatError extends ArchiveFileError {
    constructor(file: string) {
        super(
            'ARCHIVE_UNSUPPORTED_FORMAT',
            `Unsupported or unrecognized archive format for file: '${toPosix(file)}'.\n` +
            'If this is a 7z or rar archive, support is available through the optional ' +
            "dependencies 'node-7z' + '7zip-bin' (7z) and 'node-unrar-js' (rar).",
            file
        );
    }
}

/**
 * Clase común para los errores que apuntan a un miembro del archivo.
 */
export abstract class ArchiveMemberError extends ArchiveFileError {
    /** Nombre del miembro */
    readonly member: string;

    constructor(code: ArchiveErrorCode, message: string, member: string, file: string, options?: CauseOptions) {
        super(code, message, file, options);
        this.member = member;
    }

    toJSON(): ArchiveErrorJSON {
        return { ...super.toJSON(), member: this.member };
    }
}

export class ArchiveMemberNotFoundError extends ArchiveMemberError {
    constructor(member: string, file: string) {
        super('ARCHIVE_MEMBER_NOT_FOUND', `Archive member '${member}' not found in file: '${toPosix(file)}'`, member, file);
    }
}

/**
 * Se pidió el contenido de un miembro que es un directorio.
 */
export class ArchiveMemberNotAFileError extends ArchiveMemberError {
    constructor(member: string, file: string) {
        super(
            'ARCHIVE_MEMBER_NOT_A_FILE',
            `Archive member '${member}' is a directory, not a file, in file: '${toPosix(file)}'`,
            member,
            file
        );
    }
}

/**
 * El miembro no supera el filtro de extracción (rutas absolutas, salida del destino,
 * dispositivos, enlaces peligrosos).
 */
export class ArchiveMemberUnsafeError extends ArchiveMemberError {
    readonly reason: string;

    constructor(member: string, file: string, reason: string) {
        super('ARCHIVE_MEMBER_UNSAFE', `Refusing to extract archive member '${member}' from '${toPosix(file)}': ${reason}`, member, file);
        this.reason = reason;
    }
}

export class ArchiveMemberDecodeError extends ArchiveMemberError {
    readonly encoding: string;

    constructor(member: string, file: string, encoding: string, options?: CauseOptions) {
        super(
            'ARCHIVE_MEMBER_DECODE_FAILED',
            `Archive member '${member}' in '${toPosix(file)}' is not valid ${encoding} text`,
            member,
            file,
            options
        );
        this.encoding = encoding;
    }
}

/**
 * La etiqueta de codificación pedida a readText no existe. El RangeError de
 * TextDecoder queda en `cause`.
 */
export class ArchiveUnknownEncodingError extends ArchiveMemberError {
    readonly encoding: string;

    constructor(member: string, file: string, encoding: string, options?: CauseOptions) {
        super(
            'ARCHIVE_UNKNOWN_ENCODING',
            `Unknown text encoding '${encoding}' requested for archive member '${member}' in '${toPosix(file)}'`,
            member,
            file,
            options
        );
        this.encoding = encoding;
    }
}

/**
 * Falta la contraseña, es incorrecta, o el backend no puede descifrar el miembro.
 */
export class ArchivePasswordError extends ArchiveFileError {
    readonly member: string | undefined;

    constructor(message: string, file: string, member?: string, options?: CauseOptions) {
        super('ARCHIVE_PASSWORD', message, file, options);
        this.member = member;
    }

    toJSON(): ArchiveErrorJSON {
        const json = super.toJSON();
        return this.member !== undefined ? { ...json, member: this.member } : json;
    }
}

/**
 * Cualquier otro fallo de la librería subyacente (archivo corrupto, E/S, método no soportado).
 * El error original queda en `cause`.
 */
export class ArchiveReadError extends ArchiveFileError {
    readonly member: string | undefined;

    constructor(message: string, file: string, member?: string, options?: CauseOptions) {
        super('ARCHIVE_READ_FAILED', message, file, options);
        this.member = member;
    }

    toJSON(): ArchiveErrorJSON {
        const json = super.toJSON();
        return this.member !== undefined ? { ...json, member: this.member } : json;
    }
}

export class ArchiveClosedError extends ArchiveFileError {
    constructor(file: string) {
        super('ARCHIVE_CLOSED', `Archive is closed: '${toPosix(file)}'`, file);
    }
}

/**
 * Se pasó como referencia de miembro un valor de un tipo no soportado.
 */
export class ArchiveMemberTypeError extends TypeError {
    readonly code: ArchiveErrorCode = 'ARCHIVE_MEMBER_TYPE';
    readonly receivedType: string;

    constructor(receivedType: string) {
        super(
            "Unsupported type for 'member'. Expected 'string', 'Buffer', or 'ArchiveMember', " +
            `but got '${receivedType}'.`
        );
        this.name = 'ArchiveMemberTypeError';
        this.receivedType = receivedType;
    }
}
