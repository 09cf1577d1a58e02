// src/adapters/TarStreamAdapter.ts
import fs from 'fs';
import path from 'path';
import tar from 'tar-stream';
import type { Headers } from 'tar-stream';
import { pipeline as pipelineCallback } from 'stream';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import { ArchiveMember } from '../core/ArchiveMember.js';
import { ArchiveFormat, HIGH_WATER_MARK } from '../core/constants.js';
import {
  ArchiveFileError,
  ArchiveMemberNotAFileError,
  ArchiveMemberUnsafeError,
  ArchiveReadError,
  UnsupportedArchiveFormatError,
} from '../core/errors.js';
import type { MemberLike } from '../Types.js';
import { createDecompressor, detectCompression, type TarCompression } from './compression.js';
import { loadXzBackend } from './optional.js';
import { BaseArchiveAdapter, type AdapterOpenOptions } from './IArchiveAdapter.js';
import { errorMessage, resolveInside } from './utils.js';

/**
 * Cabecera indexada: nombre canónico y cabecera original
 */
interface IndexedHeader {
  name: string;
  header: Headers;
}

/**
 * Callback por entrada
 */
type EntryHandler = (entry: IndexedHeader, stream: Readable) => Promise<void>;

const SPECIAL_TYPES = new Set(['character-device', 'block-device', 'fifo']);

// Profundidad máxima al seguir enlaces dentro del archivo
const MAX_LINK_DEPTH = 16;

/**
 * Adaptador de lectura TAR (sin comprimir, gzip, bzip2 o xz) usando tar-stream.
 * El formato es secuencial: las cabeceras se indexan una vez y cada
 * lectura o extracción vuelve a recorrer el archivo.
 */
export class TarStreamAdapter extends BaseArchiveAdapter {
  readonly format = ArchiveFormat.TAR;
  private readonly compression: TarCompression;
  private index: Promise<IndexedHeader[]> | undefined;

  private constructor(file: string, compression: TarCompression, options: AdapterOpenOptions) {
    super(file, options);
    this.compression = compression;
  }

  static async open(file: string, options: AdapterOpenOptions): Promise<TarStreamAdapter> {
    const compression = await detectCompression(file);
    // xz depende de lzma-native, que es opcional
    if (compression === 'xz' && !(await loadXzBackend())) {
      throw new UnsupportedArchiveFormatError(file);
    }
    const adapter = new TarStreamAdapter(file, compression, options);
    adapter.log.debug({ compression }, 'TAR archive opened');
    return adapter;
  }

  async getMembers(): Promise<ArchiveMember[]> {
    const headers = await this.headers();
    return headers.map(({ name, header }) => new ArchiveMember({
      name,
      size: header.size ?? 0,
      isDir: header.type === 'directory',
    }));
  }

  async readBytes(member: MemberLike): Promise<Buffer> {
    const found = await this.requireFile(member);
    return this.readContent(found.name, 0);
  }

  protected async extractMembers(names: string[], destination: string): Promise<void> {
    const wanted = new Set(names);
    const deferredLinks: IndexedHeader[] = [];

    await this.walk(async (entry, stream) => {
      if (!wanted.has(entry.name)) {
        stream.resume();
        return;
      }

      const target = resolveInside(destination, entry.name, this.file);
      const { header } = entry;

      switch (header.type) {
        case 'directory':
          stream.resume();
          await fs.promises.mkdir(target, { recursive: true });
          break;

        case 'symlink':
          stream.resume();
          await this.writeSymlink(entry, target, destination);
          break;

        case 'link':
          stream.resume();
          if (!(await this.writeHardLink(entry, target, destination))) {
            deferredLinks.push(entry);
          }
          break;

        default:
          if (header.type && SPECIAL_TYPES.has(header.type)) {
            stream.resume();
            throw new ArchiveMemberUnsafeError(entry.name, this.file, `special file (${header.type})`);
          }
          await fs.promises.mkdir(path.dirname(target), { recursive: true });
          await pipeline(stream, fs.createWriteStream(target, { highWaterMark: HIGH_WATER_MARK }));
          await fs.promises.chmod(target, sanitizeFileMode(header.mode));
      }
    });

    // Enlaces duros cuyo destino no se extrajo: se copia el contenido
    for (const entry of deferredLinks) {
      const target = resolveInside(destination, entry.name, this.file);
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, await this.readContent(entry.name, 0));
      await fs.promises.chmod(target, sanitizeFileMode(entry.header.mode));
    }
  }

  protected async closeBackend(): Promise<void> {
    // Cada recorrido abre y cierra su propio stream
    this.index = undefined;
  }

  /**
   * Índice de cabeceras, construido en el primer uso
   */
  private headers(): Promise<IndexedHeader[]> {
    // Un fallo no queda cacheado
    this.index ??= this.buildIndex().catch((err: unknown) => {
      this.index = undefined;
      throw err;
    });
    return this.index;
  }

  private async buildIndex(): Promise<IndexedHeader[]> {
    const headers: IndexedHeader[] = [];
    await this.walk(async (entry, stream) => {
      stream.resume();
      headers.push(entry);
    });
    this.log.debug({ entries: headers.length }, 'TAR headers indexed');
    return headers;
  }

  /**
   * Contenido de un miembro; los enlaces se siguen hasta su destino
   */
  private async readContent(name: string, depth: number): Promise<Buffer> {
    const headers = await this.headers();
    const entry = findLast(headers, name);
    if (!entry) {
      throw new ArchiveReadError(`TAR link target '${name}' not found`, this.file, name);
    }

    const { header } = entry;
    if (header.type === 'symlink' || header.type === 'link') {
      if (depth >= MAX_LINK_DEPTH) {
        throw new ArchiveReadError(`Too many levels of links for TAR member '${name}'`, this.file, name);
      }
      return this.readContent(linkSource(entry), depth + 1);
    }
    if (header.type && SPECIAL_TYPES.has(header.type)) {
      throw new ArchiveReadError(`TAR member '${name}' is a ${header.type}, not a regular file`, this.file, name);
    }
    if (header.type === 'directory') {
      throw new ArchiveMemberNotAFileError(name, this.file);
    }

    const contents: Buffer[] = [];
    await this.walk(async (current, stream) => {
      if (current.name !== name) {
        stream.resume();
        return;
      }
      contents.push(await collect(stream));
    });

    // Si el nombre se repite gana la última aparición
    const content = contents.at(-1);
    if (content === undefined) {
      throw new ArchiveReadError(`TAR member '${name}' disappeared while reading`, this.file, name);
    }
    return content;
  }

  private async writeSymlink(entry: IndexedHeader, target: string, destination: string): Promise<void> {
    const linkname = entry.header.linkname ?? '';
    if (!linkname || path.isAbsolute(linkname) || path.posix.isAbsolute(linkname)) {
      throw new ArchiveMemberUnsafeError(entry.name, this.file, `symlink to absolute path '${linkname}'`);
    }
    const resolved = path.join(path.dirname(entry.name), linkname);
    try {
      resolveInside(destination, resolved, this.file);
    } catch {
      throw new ArchiveMemberUnsafeError(entry.name, this.file, `symlink target '${linkname}' is outside the destination`);
    }

    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.rm(target, { force: true });
    await fs.promises.symlink(linkname, target);
  }

  /**
   * Crea el enlace duro si el destino ya existe en disco.
   * Devuelve false cuando hay que copiar el contenido más tarde.
   */
  private async writeHardLink(entry: IndexedHeader, target: string, destination: string): Promise<boolean> {
    const linkname = entry.header.linkname ?? '';
    if (!linkname) {
      throw new ArchiveMemberUnsafeError(entry.name, this.file, 'hard link without target');
    }
    let source: string;
    try {
      source = resolveInside(destination, linkname, this.file);
    } catch {
      throw new ArchiveMemberUnsafeError(entry.name, this.file, `hard link target '${linkname}' is outside the destination`);
    }

    try {
      await fs.promises.access(source);
    } catch {
      return false;
    }
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.rm(target, { force: true });
    await fs.promises.link(source, target);
    return true;
  }

  /**
   * Recorre secuencialmente todas las entradas del archivo.
   * El handler debe consumir (o descartar con resume) el stream de cada entrada.
   */
  private async walk(handler: EntryHandler): Promise<void> {
    const decoder = await createDecompressor(this.compression);
    if (decoder === null) {
      throw new UnsupportedArchiveFormatError(this.file);
    }
    const readStream = fs.createReadStream(this.file, {
      highWaterMark: HIGH_WATER_MARK,
    });
    const extractor = tar.extract();
    const streams = decoder ? [readStream, decoder, extractor] : [readStream, extractor];

    return new Promise<void>((resolve, reject) => {
      let isResolved = false;

      const teardown = () => {
        for (const stream of streams) {
          stream.destroy();
        }
      };

      const safeResolve = () => {
        if (!isResolved) {
          isResolved = true;
          resolve();
        }
      };

      const safeReject = (error: unknown) => {
        if (!isResolved) {
          isResolved = true;
          teardown();
          reject(
            error instanceof ArchiveFileError
              ? error
              : new ArchiveReadError(`Failed to read TAR archive: ${errorMessage(error)}`, this.file, undefined, { cause: error })
          );
        }
      };

      extractor.on('entry', (header, stream, next) => {
        const entry = { name: canonicalName(header), header };

        handler(entry, stream).then(
          () => next(),
          (err: unknown) => {
            stream.resume();
            safeReject(err);
          }
        );
      });

      extractor.on('finish', safeResolve);

      // pipeline propaga el error de cualquier etapa (lectura, descompresión o tar)
      pipelineCallback(streams, (err) => {
        if (err) {
          safeReject(err);
        } else {
          safeResolve();
        }
      });
    });
  }
}

/**
 * Los directorios se publican sin la '/' final
 */
function canonicalName(header: Headers): string {
  if (header.type === 'directory' && header.name.length > 1) {
    return header.name.replace(/\/+$/, '');
  }
  return header.name;
}

function findLast(headers: IndexedHeader[], name: string): IndexedHeader | undefined {
  for (let i = headers.length - 1; i >= 0; i--) {
    if (headers[i].name === name) return headers[i];
  }
  return undefined;
}

/**
 * Miembro al que apunta un enlace: los simbólicos son relativos a su directorio,
 * los duros a la raíz del archivo
 */
function linkSource({ name, header }: IndexedHeader): string {
  const linkname = header.linkname ?? '';
  if (header.type === 'symlink') {
    return path.posix.normalize(path.posix.join(path.posix.dirname(name), linkname));
  }
  return linkname;
}

/**
 * Sin setuid/setgid/sticky ni escritura de grupo/otros; el dueño siempre lee y escribe.
 * Sin permiso de ejecución del dueño se quitan todos los de ejecución.
 */
export function sanitizeFileMode(mode: number | undefined): number {
  let sanitized = (mode ?? 0o644) & 0o755;
  if (!(sanitized & 0o100)) {
    sanitized &= ~0o111;
  }
  return sanitized | 0o600;
}

async function collect(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}
