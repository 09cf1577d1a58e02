// src/core/text.ts
import { ArchiveMemberDecodeError, ArchiveUnknownEncodingError } from './errors.js';
import type { ReadTextOptions } from '../Types.js';

export const DEFAULT_ENCODING = 'utf-8';

/**
 * Decodifica el contenido de un miembro con TextDecoder.
 * - strict: una secuencia inválida lanza ArchiveMemberDecodeError
 * - replace: se sustituye por U+FFFD
 * - ignore: se descartan solo los bytes inválidos
 * Una etiqueta de codificación desconocida lanza ArchiveUnknownEncodingError.
 */
export function decodeText(bytes: Uint8Array, member: string, file: string, options: ReadTextOptions = {}): string {
    const encoding = options.encoding ?? DEFAULT_ENCODING;
    const policy = options.errors ?? 'strict';
    const createDecoder = (init: TextDecoderOptions): TextDecoder => {
        try {
            return new TextDecoder(encoding, init);
        } catch (err) {
            throw new ArchiveUnknownEncodingError(member, file, encoding, { cause: err });
        }
    };

    if (policy === 'replace') {
        return createDecoder({}).decode(bytes);
    }

    if (policy === 'ignore') {
        return decodeSkippingInvalid(bytes, createDecoder);
    }

    const decoder = createDecoder({ fatal: true });
    try {
        return decoder.decode(bytes);
    } catch (err) {
        throw new ArchiveMemberDecodeError(member, file, decoder.encoding, { cause: err });
    }
}

/**
 * Decodifica byte a byte en modo stream. Cuando el decodificador falla se
 * descartan los bytes pendientes desde el último carácter completo y se
 * reanuda con un decodificador nuevo.
 */
function decodeSkippingInvalid(bytes: Uint8Array, createDecoder: (init: TextDecoderOptions) => TextDecoder): string {
    let text = '';
    let decoder = createDecoder({ fatal: true });
    // Inicio de la secuencia aún sin carácter completo
    let boundary = 0;

    for (let i = 0; i < bytes.length; i += 1) {
        try {
            const chunk = decoder.decode(bytes.subarray(i, i + 1), { stream: true });
            if (chunk) {
                text += chunk;
                boundary = i + 1;
            }
        } catch {
            // El byte que falla se reprocesa salvo que sea él mismo el inválido
            if (boundary === i) {
                boundary = i + 1;
            } else {
                boundary = i;
                i -= 1;
            }
            decoder = createDecoder({ fatal: true, ignoreBOM: true });
        }
    }

    // Lo que quede pendiente tras `boundary` es una secuencia incompleta y se descarta
    return text;
}
