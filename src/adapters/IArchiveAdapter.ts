// src/adapters/IArchiveAdapter.ts
import type { Logger } from 'pino';
import type { ArchiveMember } from '../core/ArchiveMember.js';
import type { ArchiveFormat } from '../core/constants.js';
import { MASKED_PASSWORD } from '../core/constants.js';
import { ArchiveMemberNotAFileError, ArchiveMemberNotFoundError } from '../core/errors.js';
import { decodeText } from '../core/text.js';
import type { ExtractAllOptions, ExtractOptions, MemberLike, ReadTextOptions } from '../Types.js';
import { findMemberName, resolveMemberName, validateMembers } from './members.js';
import { prepareDestination, resolveInside } from './utils.js';

/**
 * Contrato que cumple cada backend de formato.
 * Todas las operaciones son asíncronas y traducen los errores de la librería
 * a la jerarquía de ArchiveFileError.
 */
export interface IArchiveAdapter {
  /** Formato que maneja este adaptador */
  readonly format: ArchiveFormat;
  /** Ruta absoluta del archivo */
  readonly file: string;

  getMember(member: MemberLike): Promise<ArchiveMember>;

  /** Miembros en el orden en que están almacenados */
  getMembers(): Promise<ArchiveMember[]>;

  getNames(): Promise<string[]>;

  /**
   * Extrae un miembro bajo `destination` (cwd por defecto)
   * @returns Ruta absoluta escrita
   */
  extract(member: MemberLike, options?: ExtractOptions): Promise<string>;

  /**
   * Extrae todos los miembros, o solo `members` una vez validados todos
   * @returns Ruta absoluta del destino
   */
  extractAll(options?: ExtractAllOptions): Promise<string>;

  readBytes(member: MemberLike): Promise<Buffer>;

  readText(member: MemberLike, options?: ReadTextOptions): Promise<string>;

  /** Libera los recursos. Idempotente, nunca falla */
  close(): Promise<void>;
}

/**
 * Opciones con las que la factoría abre un adaptador
 */
export interface AdapterOpenOptions {
  password?: string;
  logger: Logger;
}

/**
 * Implementación común: búsqueda de miembros, validación, destino y texto.
 * Cada backend solo aporta el listado, la lectura, la escritura y el cierre.
 */
export abstract class BaseArchiveAdapter implements IArchiveAdapter {
  abstract readonly format: ArchiveFormat;
  readonly file: string;
  protected readonly password: string | undefined;
  protected readonly log: Logger;
  private closed = false;

  protected constructor(file: string, options: AdapterOpenOptions) {
    this.file = file;
    this.password = options.password;
    this.log = options.logger.child({ adapter: new.target.name, file });
  }

  abstract getMembers(): Promise<ArchiveMember[]>;

  abstract readBytes(member: MemberLike): Promise<Buffer>;

  /**
   * Escribe los miembros (nombres canónicos ya validados) en el destino
   */
  protected abstract extractMembers(names: string[], destination: string): Promise<void>;

  /**
   * Cierre específico de la librería
   */
  protected abstract closeBackend(): Promise<void>;

  async getNames(): Promise<string[]> {
    const members = await this.getMembers();
    return members.map((member) => member.name);
  }

  async getMember(member: MemberLike): Promise<ArchiveMember> {
    const name = resolveMemberName(member);
    const members = await this.getMembers();
    const canonical = findMemberName(name, new Set(members.map((m) => m.name)));
    const found = members.find((m) => m.name === canonical);
    if (!found) {
      throw new ArchiveMemberNotFoundError(name, this.file);
    }
    return found;
  }

  async extract(member: MemberLike, options: ExtractOptions = {}): Promise<string> {
    const found = await this.getMember(member);
    const destination = await prepareDestination(options.destination);
    const target = resolveInside(destination, found.name, this.file);

    this.log.debug({ member: found.name, destination }, 'Extracting member');
    await this.extractMembers([found.name], destination);
    return target;
  }

  async extractAll(options: ExtractAllOptions = {}): Promise<string> {
    const available = await this.getNames();
    // Se valida todo antes de escribir nada
    const names = options.members ? validateMembers(options.members, available, this.file) : available;
    const destination = await prepareDestination(options.destination);

    this.log.debug({ count: names.length, destination }, 'Extracting members');
    await this.extractMembers(names, destination);
    return destination;
  }

  async readText(member: MemberLike, options: ReadTextOptions = {}): Promise<string> {
    const bytes = await this.readBytes(member);
    return decodeText(bytes, resolveMemberName(member), this.file, options);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.closeBackend();
      this.log.debug('Archive closed');
    } catch (err) {
      this.log.warn({ err }, 'Failed to close archive backend');
    }
  }

  /**
   * Miembro que debe ser un archivo; falla para directorios
   */
  protected async requireFile(member: MemberLike): Promise<ArchiveMember> {
    const found = await this.getMember(member);
    if (found.isDir) {
      throw new ArchiveMemberNotAFileError(found.name, this.file);
    }
    return found;
  }

  toString(): string {
    const password = this.password !== undefined ? `, password='${MASKED_PASSWORD}'` : '';
    return `${this.constructor.name}('${this.file}'${password})`;
  }
}
