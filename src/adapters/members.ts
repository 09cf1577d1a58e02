// src/adapters/members.ts
import { ArchiveMember } from '../core/ArchiveMember.js';
import { ArchiveMemberNotFoundError, ArchiveMemberTypeError } from '../core/errors.js';
import type { MemberLike } from '../Types.js';

/**
 * Nombre del tipo en tiempo de ejecución, para los mensajes de error
 */
function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  return Object.prototype.toString.call(value).slice(8, -1);
}

/**
 * Convierte una referencia de miembro en su nombre canónico.
 * - string: se devuelve tal cual
 * - ArchiveMember: su `name`
 * - Buffer (ruta): texto UTF-8 con separadores '/'
 */
export function resolveMemberName(member: MemberLike): string {
  if (typeof member === 'string') {
    return member;
  }
  if (member instanceof ArchiveMember) {
    return member.name;
  }
  if (Buffer.isBuffer(member)) {
    return member.toString('utf8').replace(/\\/g, '/');
  }
  throw new ArchiveMemberTypeError(describeType(member));
}

/**
 * Busca un nombre entre los disponibles. Para directorios se acepta
 * la variante con o sin '/' final ('docs' encuentra 'docs/' y viceversa).
 */
export function findMemberName(name: string, available: ReadonlySet<string>): string | undefined {
  if (available.has(name)) return name;
  const variant = name.endsWith('/') ? name.slice(0, -1) : `${name}/`;
  if (variant && available.has(variant)) return variant;
  return undefined;
}

/**
 * Valida una colección de miembros contra los nombres del archivo.
 * Falla con el primer nombre desconocido, sin resultados parciales.
 * Devuelve los nombres canónicos sin duplicados, en el orden pedido.
 */
export function validateMembers(
  requested: Iterable<MemberLike>,
  available: Iterable<string>,
  file: string
): string[] {
  const names = new Set(available);
  const seen = new Set<string>();
  const result: string[] = [];

  for (const member of requested) {
    const name = resolveMemberName(member);
    const canonical = findMemberName(name, names);
    if (canonical === undefined) {
      throw new ArchiveMemberNotFoundError(name, file);
    }
    if (!seen.has(canonical)) {
      seen.add(canonical);
      result.push(canonical);
    }
  }

  return result;
}
