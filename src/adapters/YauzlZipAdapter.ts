// src/adapters/YauzlZipAdapter.ts
import fs from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import yauzl from 'yauzl-promise';
import type { Entry, ZipFile as Zip } from 'yauzl-promise';
import { ArchiveMember } from '../core/ArchiveMember.js';
import { ArchiveFormat, HIGH_WATER_MARK } from '../core/constants.js';
import { ArchivePasswordError, ArchiveReadError } from '../core/errors.js';
import type { MemberLike } from '../Types.js';
import { BaseArchiveAdapter, type AdapterOpenOptions } from './IArchiveAdapter.js';
import { errorMessage, resolveInside } from './utils.js';
import { decryptEntry } from './zipcrypto.js';

/**
 * Adaptador de lectura ZIP usando yauzl-promise.
 * El directorio central se lee una sola vez al abrir.
 * yauzl no descifra: los miembros cifrados (ZipCrypto o WinZip AES) se leen
 * en bruto y se descifran con la contraseña del manejador.
 */
export class YauzlZipAdapter extends BaseArchiveAdapter {
  readonly format = ArchiveFormat.ZIP;
  private readonly zipFile: Zip;
  private readonly entries: Entry[];
  private readonly byName: Map<string, Entry>;

  private constructor(file: string, zipFile: Zip, entries: Entry[], options: AdapterOpenOptions) {
    super(file, options);
    this.zipFile = zipFile;
    this.entries = entries;
    this.byName = new Map(entries.map((entry) => [entry.filename, entry]));
  }

  static async open(file: string, options: AdapterOpenOptions): Promise<YauzlZipAdapter> {
    let zipFile: Zip;
    try {
      zipFile = await yauzl.open(file);
    } catch (err) {
      throw new ArchiveReadError(`Failed to open ZIP archive: ${errorMessage(err)}`, file, undefined, { cause: err });
    }

    try {
      const entries: Entry[] = [];
      for await (const entry of zipFile) {
        entries.push(entry);
      }
      const adapter = new YauzlZipAdapter(file, zipFile, entries, options);
      adapter.log.debug({ entries: entries.length }, 'ZIP archive opened');
      return adapter;
    } catch (err) {
      await zipFile.close();
      throw new ArchiveReadError(`Failed to read ZIP central directory: ${errorMessage(err)}`, file, undefined, { cause: err });
    }
  }

  async getMembers(): Promise<ArchiveMember[]> {
    return this.entries.map(toMember);
  }

  async readBytes(member: MemberLike): Promise<Buffer> {
    const found = await this.requireFile(member);
    const entry = this.entryFor(found.name);

    if (entry.isEncrypted()) {
      return this.readEncrypted(entry);
    }
    return this.collect(entry, await this.openEntry(entry));
  }

  protected async extractMembers(names: string[], destination: string): Promise<void> {
    for (const name of names) {
      const entry = this.entryFor(name);
      const entryPath = resolveInside(destination, entry.filename, this.file);

      if (isDirectory(entry)) {
        await fs.promises.mkdir(entryPath, { recursive: true });
        continue;
      }

      await fs.promises.mkdir(path.dirname(entryPath), { recursive: true });

      if (entry.isEncrypted()) {
        await fs.promises.writeFile(entryPath, await this.readEncrypted(entry));
        continue;
      }

      const readStream = await this.openEntry(entry);
      const writeStream = fs.createWriteStream(entryPath, {
        highWaterMark: HIGH_WATER_MARK,
      });

      try {
        await pipeline(readStream, writeStream);
      } catch (err) {
        throw new ArchiveReadError(`Failed to extract ZIP member: ${errorMessage(err)}`, this.file, entry.filename, { cause: err });
      }
    }
  }

  protected async closeBackend(): Promise<void> {
    await this.zipFile.close();
  }

  private entryFor(name: string): Entry {
    const entry = this.byName.get(name);
    if (!entry) {
      throw new ArchiveReadError(`ZIP entry index is missing '${name}'`, this.file, name);
    }
    return entry;
  }

  private async openEntry(entry: Entry, raw = false): Promise<NodeJS.ReadableStream> {
    try {
      return await entry.openReadStream(raw ? { decompress: false, decrypt: false, validateCrc32: false } : undefined);
    } catch (err) {
      throw new ArchiveReadError(`Failed to open ZIP member: ${errorMessage(err)}`, this.file, entry.filename, { cause: err });
    }
  }

  private async collect(entry: Entry, stream: NodeJS.ReadableStream): Promise<Buffer> {
    const chunks: Buffer[] = [];
    try {
      for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
    } catch (err) {
      throw new ArchiveReadError(`Failed to read ZIP member: ${errorMessage(err)}`, this.file, entry.filename, { cause: err });
    }
    return Buffer.concat(chunks);
  }

  /**
   * Lee los bytes cifrados sin descomprimir y los descifra en memoria
   */
  private async readEncrypted(entry: Entry): Promise<Buffer> {
    if (this.password === undefined) {
      throw new ArchivePasswordError(`Password required for encrypted ZIP member '${entry.filename}'`, this.file, entry.filename);
    }
    const raw = await this.collect(entry, await this.openEntry(entry, true));
    const content = decryptEntry(raw, entry, this.password, this.file);
    this.log.debug({ member: entry.filename, size: content.length }, 'ZIP member decrypted');
    return content;
  }
}

function isDirectory(entry: Entry): boolean {
  return entry.filename.endsWith('/');
}

function toMember(entry: Entry): ArchiveMember {
  return new ArchiveMember({
    name: entry.filename,
    size: entry.uncompressedSize,
    compressedSize: entry.compressedSize,
    isDir: isDirectory(entry),
  });
}
