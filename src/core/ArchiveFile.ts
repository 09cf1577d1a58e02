// src/core/ArchiveFile.ts

import fs from 'fs';
import { inspect } from 'util';
import { getDefaultFactory, type ArchiveAdapterFactory } from '../adapters/ArchiveAdapterFactory.js';
import type { IArchiveAdapter } from '../adapters/IArchiveAdapter.js';
import { absolutePath, isRegularFile } from '../adapters/utils.js';
import type { ArchiveMember } from './ArchiveMember.js';
import { MASKED_PASSWORD, type ArchiveFormat } from './constants.js';
import { ArchiveClosedError, ArchiveFileNotFoundError } from './errors.js';
import { logger } from './logger.js';
import type {
    ArchiveFileOptions,
    ExtractAllOptions,
    ExtractOptions,
    MemberLike,
    ReadTextOptions,
} from '../Types.js';

/**
 * Manejador de un archivo comprimido. Detecta el formato una sola vez al abrir
 * y delega todas las operaciones en el adaptador elegido.
 *
 * @example
 * const archive = await ArchiveFile.open('backup.tar.gz');
 * try {
 *     for (const member of await archive.getMembers()) console.log(member.name);
 * } finally {
 *     await archive.close();
 * }
 */
export class ArchiveFile {
    private readonly _file: string;
    private readonly _password: string | undefined;
    private readonly adapter: IArchiveAdapter;
    private _closed = false;

    private constructor(file: string, password: string | undefined, adapter: IArchiveAdapter) {
        this._file = file;
        this._password = password;
        this.adapter = adapter;
    }

    /**
     * Abre un archivo: expande '~', comprueba que sea un archivo regular,
     * resuelve enlaces y elige el adaptador por contenido.
     * @throws ArchiveFileNotFoundError si la ruta no existe o no es un archivo
     * @throws UnsupportedArchiveFormatError si ningún formato lo reconoce
     */
    public static async open(
        file: string,
        options: ArchiveFileOptions = {},
        factory: ArchiveAdapterFactory = getDefaultFactory()
    ): Promise<ArchiveFile> {
        const expanded = absolutePath(file);
        if (!(await isRegularFile(expanded))) {
            throw new ArchiveFileNotFoundError(expanded);
        }

        const resolved = await fs.promises.realpath(expanded);
        const adapter = await factory.open(resolved, {
            password: options.password,
            logger: options.logger ?? logger,
        });
        return new ArchiveFile(resolved, options.password, adapter);
    }

    // --- Accesores ---

    /** Ruta absoluta (enlaces resueltos) */
    public get file(): string {
        return this._file;
    }

    public get password(): string | undefined {
        return this._password;
    }

    public get format(): ArchiveFormat {
        return this.adapter.format;
    }

    public get closed(): boolean {
        return this._closed;
    }

    // --- Operaciones ---

    public async getMember(member: MemberLike): Promise<ArchiveMember> {
        this.ensureOpen();
        return this.adapter.getMember(member);
    }

    public async getMembers(): Promise<ArchiveMember[]> {
        this.ensureOpen();
        return this.adapter.getMembers();
    }

    public async getNames(): Promise<string[]> {
        this.ensureOpen();
        return this.adapter.getNames();
    }

    /**
     * Extrae un miembro y devuelve la ruta absoluta escrita
     */
    public async extract(member: MemberLike, options: ExtractOptions = {}): Promise<string> {
        this.ensureOpen();
        return this.adapter.extract(member, options);
    }

    /**
     * Extrae todo, o solo `members`. Si alguno no existe no se escribe nada.
     */
    public async extractAll(options: ExtractAllOptions = {}): Promise<string> {
        this.ensureOpen();
        return this.adapter.extractAll(options);
    }

    public async readBytes(member: MemberLike): Promise<Buffer> {
        this.ensureOpen();
        return this.adapter.readBytes(member);
    }

    public async readText(member: MemberLike, options: ReadTextOptions = {}): Promise<string> {
        this.ensureOpen();
        return this.adapter.readText(member, options);
    }

    /**
     * Cierra el archivo. Llamadas repetidas no hacen nada.
     */
    public async close(): Promise<void> {
        if (this._closed) return;
        this._closed = true;
        await this.adapter.close();
    }

    public toString(): string {
        const password = this._password !== undefined ? `, password='${MASKED_PASSWORD}'` : '';
        return `ArchiveFile('${this._file}'${password})`;
    }

    public [inspect.custom](): string {
        return this.toString();
    }

    private ensureOpen(): void {
        if (this._closed) {
            throw new ArchiveClosedError(this._file);
        }
    }
}

/**
 * Abre el archivo, ejecuta `fn` y lo cierra siempre, también si `fn` falla.
 */
export async function withArchive<T>(
    file: string,
    fn: (archive: ArchiveFile) => Promise<T> | T,
    options: ArchiveFileOptions = {}
): Promise<T> {
    const archive = await ArchiveFile.open(file, options);
    try {
        return await fn(archive);
    } finally {
        await archive.close();
    }
}

/**
 * true si la ruta es un archivo regular en algún formato soportado
 */
export async function isArchive(
    file: string,
    factory: ArchiveAdapterFactory = getDefaultFactory()
): Promise<boolean> {
    const expanded = absolutePath(file);
    if (!(await isRegularFile(expanded))) {
        return false;
    }
    return factory.hasAdapter(expanded);
}
