// src/adapters/UnrarAdapter.ts
import fs from 'fs';
import { ArchiveMember } from '../core/ArchiveMember.js';
import { ArchiveFormat } from '../core/constants.js';
import {
  ArchiveFileError,
  ArchiveMemberNotFoundError,
  ArchivePasswordError,
  ArchiveReadError,
  UnsupportedArchiveFormatError,
} from '../core/errors.js';
import type { MemberLike } from '../Types.js';
import { BaseArchiveAdapter, type AdapterOpenOptions } from './IArchiveAdapter.js';
import { loadUnrarBackend, type UnrarBackend } from './optional.js';
import { errorMessage, resolveInside } from './utils.js';

/**
 * Entrada del listado con su nombre nativo (el que entiende unrar)
 */
interface RarEntry {
  member: ArchiveMember;
  nativeName: string;
}

const PASSWORD_REASONS = ['ERAR_MISSING_PASSWORD', 'ERAR_BAD_PASSWORD'];

/**
 * Adaptador RAR usando node-unrar-js (unrar compilado a WebAssembly).
 * Los nombres nativos usan el separador del sistema y los directorios no llevan '/':
 * aquí se normalizan a '/' y los directorios terminan en '/'.
 */
export class UnrarAdapter extends BaseArchiveAdapter {
  readonly format = ArchiveFormat.RAR;
  private readonly unrar: UnrarBackend;
  private readonly entries: RarEntry[];

  private constructor(file: string, unrar: UnrarBackend, entries: RarEntry[], options: AdapterOpenOptions) {
    super(file, options);
    this.unrar = unrar;
    this.entries = entries;
  }

  static async open(file: string, options: AdapterOpenOptions): Promise<UnrarAdapter> {
    const unrar = await loadUnrarBackend();
    if (!unrar) {
      throw new UnsupportedArchiveFormatError(file);
    }

    let entries: RarEntry[];
    try {
      const extractor = await unrar.createExtractorFromFile({ filepath: file, password: options.password });
      const list = extractor.getFileList();
      entries = [...list.fileHeaders].map((header) => {
        const isDir = header.flags.directory || /[\\/]$/.test(header.name);
        return {
          nativeName: header.name,
          member: new ArchiveMember({
            name: normalizeName(header.name, isDir),
            size: header.unpSize,
            compressedSize: header.packSize,
            isDir,
          }),
        };
      });
    } catch (err) {
      throw translateError(err, file);
    }

    const adapter = new UnrarAdapter(file, unrar, entries, options);
    adapter.log.debug({ entries: entries.length }, 'RAR archive opened');
    return adapter;
  }

  async getMembers(): Promise<ArchiveMember[]> {
    return this.entries.map((entry) => entry.member);
  }

  async readBytes(member: MemberLike): Promise<Buffer> {
    const found = await this.requireFile(member);
    const nativeName = this.nativeName(found.name);

    try {
      const data = await fs.promises.readFile(this.file);
      const extractor = await this.unrar.createExtractorFromData({
        data: toArrayBuffer(data),
        password: this.password,
      });
      const extracted = [...extractor.extract({ files: [nativeName] }).files];
      const content = extracted[0]?.extraction;
      if (!content) {
        throw new ArchiveMemberNotFoundError(found.name, this.file);
      }
      return Buffer.from(content);
    } catch (err) {
      throw translateError(err, this.file, found.name);
    }
  }

  protected async extractMembers(names: string[], destination: string): Promise<void> {
    const natives: string[] = [];

    // Todas las rutas se validan antes de escribir
    for (const name of names) {
      resolveInside(destination, name, this.file);
      natives.push(this.nativeName(name));
    }
    if (natives.length === 0) return;

    try {
      const extractor = await this.unrar.createExtractorFromFile({
        filepath: this.file,
        targetPath: destination,
        password: this.password,
      });
      const extracted = [...extractor.extract({ files: natives }).files];

      // unrar no informa de los nombres ausentes: simplemente no los entrega
      if (extracted.length === 0) {
        throw new ArchiveMemberNotFoundError(names[0], this.file);
      }
    } catch (err) {
      throw translateError(err, this.file, names.length === 1 ? names[0] : undefined);
    }
  }

  protected async closeBackend(): Promise<void> {
    // Cada operación crea su propio extractor
  }

  private nativeName(name: string): string {
    const entry = this.entries.find((candidate) => candidate.member.name === name);
    if (!entry) {
      throw new ArchiveMemberNotFoundError(name, this.file);
    }
    return entry.nativeName;
  }
}

/**
 * Separadores '/' y directorios con '/' final
 */
export function normalizeName(nativeName: string, isDir: boolean): string {
  const name = nativeName.replace(/\\/g, '/');
  return isDir && !name.endsWith('/') ? `${name}/` : name;
}

/**
 * Copia el contenido en un ArrayBuffer propio (el de un Buffer puede ser compartido)
 */
function toArrayBuffer(data: Buffer): ArrayBuffer {
  const arrayBuffer = new ArrayBuffer(data.byteLength);
  new Uint8Array(arrayBuffer).set(data);
  return arrayBuffer;
}

function failureReason(err: unknown): string | undefined {
  if (err instanceof Error && 'reason' in err && typeof err.reason === 'string') {
    return err.reason;
  }
  return undefined;
}

/**
 * Traduce los UnrarError (identificados por su `reason`) a la jerarquía propia
 */
export function translateError(err: unknown, file: string, member?: string): ArchiveFileError {
  if (err instanceof ArchiveFileError) {
    return err;
  }

  const reason = failureReason(err);
  if (reason && PASSWORD_REASONS.includes(reason)) {
    return new ArchivePasswordError(
      reason === 'ERAR_MISSING_PASSWORD' ? 'Password required for RAR archive' : 'Wrong password for RAR archive',
      file,
      member,
      { cause: err }
    );
  }
  return new ArchiveReadError(`Failed to read RAR archive: ${errorMessage(err)}`, file, member, { cause: err });
}
