// src/adapters/SevenZipAdapter.ts
import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import fs from 'fs';
import type { Readable } from 'stream';
import { ArchiveMember } from '../core/ArchiveMember.js';
import { ArchiveFormat } from '../core/constants.js';
import { ArchiveFileError, ArchivePasswordError, ArchiveReadError, UnsupportedArchiveFormatError } from '../core/errors.js';
import type { MemberLike } from '../Types.js';
import { BaseArchiveAdapter, type AdapterOpenOptions } from './IArchiveAdapter.js';
import { loadSevenZipBackend, type SevenZipBackend } from './optional.js';
import { errorMessage, resolveInside } from './utils.js';

const PASSWORD_FAILURES = /wrong password|encrypted|password is required/i;

/**
 * Adaptador 7z usando node-7z sobre el binario de 7zip-bin.
 * No hay consulta de un solo miembro: el listado completo se lee al abrir.
 */
export class SevenZipAdapter extends BaseArchiveAdapter {
  readonly format = ArchiveFormat.SEVEN_ZIP;
  private readonly backend: SevenZipBackend;
  private readonly members: ArchiveMember[];

  private constructor(file: string, backend: SevenZipBackend, members: ArchiveMember[], options: AdapterOpenOptions) {
    super(file, options);
    this.backend = backend;
    this.members = members;
  }

  static async open(file: string, options: AdapterOpenOptions): Promise<SevenZipAdapter> {
    const backend = await loadSevenZipBackend();
    if (!backend) {
      throw new UnsupportedArchiveFormatError(file);
    }

    const records = await run(
      backend.seven.list(file, {
        $bin: backend.bin,
        ...(options.password !== undefined && { password: options.password }),
      }),
      file
    );
    const members = records.map(toMember).filter((member): member is ArchiveMember => member !== null);

    const adapter = new SevenZipAdapter(file, backend, members, options);
    adapter.log.debug({ entries: members.length }, '7z archive opened');
    return adapter;
  }

  async getMembers(): Promise<ArchiveMember[]> {
    return [...this.members];
  }

  /**
   * node-7z solo extrae a disco: el miembro se lee de la salida estándar de
   * `7za e -so` directamente a memoria
   */
  async readBytes(member: MemberLike): Promise<Buffer> {
    const found = await this.requireFile(member);

    try {
      return await this.readToMemory(found.name);
    } catch (err) {
      throw this.withMember(err, found.name);
    }
  }

  protected async extractMembers(names: string[], destination: string): Promise<void> {
    const byName = new Map(this.members.map((member) => [member.name, member]));
    const files: string[] = [];

    // Todas las rutas se validan antes de invocar 7z
    for (const name of names) {
      const target = resolveInside(destination, name, this.file);
      if (byName.get(name)?.isDir) {
        await fs.promises.mkdir(target, { recursive: true });
      } else {
        files.push(name);
      }
    }
    if (files.length === 0) return;

    // Sin selección explícita se extrae todo de una vez; si no, solo lo pedido
    const everything = new Set(names).size === this.members.length;
    await this.extractFull(destination, everything ? undefined : files);
  }

  protected async closeBackend(): Promise<void> {
    // Cada operación lanza su propio proceso 7z
  }

  private async extractFull(destination: string, files: string[] | undefined): Promise<void> {
    const { seven, bin } = this.backend;
    await run(
      seven.extractFull(this.file, destination, {
        $bin: bin,
        ...(this.password !== undefined && { password: this.password }),
        ...(files && { $cherryPick: files }),
      }),
      this.file
    );
  }

  private async readToMemory(name: string): Promise<Buffer> {
    // -spd desactiva los comodines; -p vacío evita que 7za pida la contraseña
    const args = ['e', '-so', '-bd', '-y', '-spd', `-p${this.password ?? ''}`, '--', this.file, name];
    const child = spawn(this.backend.bin, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const exited = new Promise<number | null>((resolve, reject) => {
      child.once('error', reject);
      child.once('close', resolve);
    });
    const [content, stderr, code] = await Promise.all([collect(child.stdout), collect(child.stderr), exited]);

    if (code !== 0) {
      const message = stderr.toString('utf8').trim() || `7za exited with code ${code}`;
      throw toSevenZipError(message, this.file, new Error(message));
    }
    this.log.debug({ member: name, size: content.length }, '7z member read');
    return content;
  }

  /**
   * Asocia el miembro a los errores de 7z; cualquier otro fallo pasa a ArchiveReadError
   */
  private withMember(err: unknown, member: string): ArchiveFileError {
    if (err instanceof ArchivePasswordError && err.member === undefined) {
      return new ArchivePasswordError(err.message, this.file, member, { cause: err.cause });
    }
    if (err instanceof ArchiveReadError && err.member === undefined) {
      return new ArchiveReadError(err.message, this.file, member, { cause: err.cause });
    }
    if (err instanceof ArchiveFileError) {
      return err;
    }
    return new ArchiveReadError(`Failed to read 7z member: ${errorMessage(err)}`, this.file, member, { cause: err });
  }
}

/**
 * Espera a que termine un stream de node-7z recogiendo sus eventos 'data'
 */
function run(stream: EventEmitter, file: string): Promise<unknown[]> {
  return new Promise((resolve, reject) => {
    const records: unknown[] = [];

    stream.on('data', (data: unknown) => {
      records.push(data);
    });
    stream.on('end', () => resolve(records));
    stream.on('error', (err: unknown) => {
      reject(toSevenZipError(errorMessage(err), file, err));
    });
  });
}

function toSevenZipError(message: string, file: string, cause: unknown): ArchiveFileError {
  return PASSWORD_FAILURES.test(message)
    ? new ArchivePasswordError(`Wrong or missing password for 7z archive: ${message}`, file, undefined, { cause })
    : new ArchiveReadError(`7z failed: ${message}`, file, undefined, { cause });
}

async function collect(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function numberField(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Convierte una línea del listado de node-7z (`file`, `size`, `sizeCompressed`,
 * `attributes`) en un ArchiveMember. Devuelve null si no describe una entrada.
 */
export function toMember(record: unknown): ArchiveMember | null {
  if (!isRecord(record) || typeof record.file !== 'string' || !record.file) {
    return null;
  }

  const attributes = typeof record.attributes === 'string'
    ? record.attributes
    : typeof record.attr === 'string' ? record.attr : '';
  const isDir = attributes.includes('D');
  const size = numberField(record, 'size');
  const compressed = numberField(record, 'sizeCompressed');

  return new ArchiveMember({
    name: record.file.replace(/\\/g, '/'),
    size,
    // Miembros de bloques sólidos y archivos vacíos reportan 0
    compressedSize: compressed || size,
    isDir,
  });
}
