// src/adapters/utils.ts
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ArchiveMemberUnsafeError } from '../core/errors.js';

/**
 * Expande '~' y devuelve una ruta absoluta
 */
export function absolutePath(target: string): string {
  if (target === '~' || target.startsWith('~/') || target.startsWith(`~${path.sep}`)) {
    return path.resolve(os.homedir(), target.slice(2));
  }
  return path.resolve(target);
}

/**
 * Resuelve el directorio destino (cwd por defecto) y lo crea con sus padres
 */
export async function prepareDestination(destination?: string): Promise<string> {
  const resolved = destination ? absolutePath(destination) : process.cwd();
  await fs.promises.mkdir(resolved, { recursive: true });
  return resolved;
}

/**
 * Ruta de escritura de un miembro dentro del destino.
 * Rechaza nombres absolutos y los que escapan del destino con '..'.
 */
export function resolveInside(destination: string, name: string, file: string): string {
  if (path.isAbsolute(name) || /^[a-zA-Z]:[\\/]/.test(name)) {
    throw new ArchiveMemberUnsafeError(name, file, 'absolute path');
  }
  const target = path.resolve(destination, name);
  const relative = path.relative(destination, target);
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new ArchiveMemberUnsafeError(name, file, 'path escapes the destination directory');
  }
  return target;
}

/**
 * Lee `length` bytes a partir de `position` (o menos si el archivo es más corto)
 */
export async function readWindow(filePath: string, position: number, length: number): Promise<Buffer> {
  const fd = await fs.promises.open(filePath, 'r');

  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await fd.read(buffer, 0, length, position);
    return buffer.subarray(0, bytesRead);
  } finally {
    await fd.close();
  }
}

/**
 * Verifica que la ruta sea un archivo regular (siguiendo enlaces)
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Mensaje legible de un error desconocido
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
