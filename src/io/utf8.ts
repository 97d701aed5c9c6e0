/**
 * UTF-8 encoding, strict decoding and lossy decoding.
 *
 * @packageDocumentation
 */

import { CodecError } from '../errors.js';

const encoder = new TextEncoder();
// ignoreBOM keeps a leading U+FEFF in the output instead of eating it.
const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const lossyDecoder = new TextDecoder('utf-8', { ignoreBOM: true });

/**
 * Creates a Uint8Array from a string using UTF-8 encoding.
 * Lone surrogates are encoded as U+FFFD.
 *
 * @example
 * ```typescript
 * toHex(fromUtf8('hello')); // '68656C6C6F'
 * ```
 */
export function fromUtf8(str: string): Uint8Array {
    return encoder.encode(str);
}

/**
 * Decodes well-formed UTF-8.
 *
 * @param bytes - UTF-8 bytes
 * @returns Decoded string
 * @throws {@link CodecError} `InvalidUtf8` if the bytes are ill-formed
 */
export function toUtf8(bytes: Uint8Array): string {
    try {
        return strictDecoder.decode(bytes);
    } catch (err) {
        const position = firstInvalidOffset(bytes);
        throw new CodecError('InvalidUtf8', `Invalid UTF-8 sequence at byte ${position}`, { position, cause: err });
    }
}

/**
 * Decodes UTF-8, replacing every maximal subpart of an ill-formed sequence
 * with one U+FFFD.
 *
 * @example
 * ```typescript
 * decodeUtf8Lossy(fromHex('C080')); // '\uFFFD\uFFFD'
 * decodeUtf8Lossy(fromHex('F09F8D')); // '\uFFFD' (truncated sequence)
 * ```
 */
export function decodeUtf8Lossy(bytes: Uint8Array): string {
    return lossyDecoder.decode(bytes);
}

/**
 * Byte offset where the first ill-formed sequence starts, or `bytes.length`
 * if there is none.
 */
export function firstInvalidOffset(bytes: Uint8Array): number {
    const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
    // Start of the sequence the decoder is still waiting to complete.
    let boundary = 0;
    try {
        for (let i = 0; i < bytes.length; i++) {
            if (decoder.decode(bytes.subarray(i, i + 1), { stream: true }).length > 0) {
                boundary = i + 1;
            }
        }
        decoder.decode();
    } catch {
        return boundary;
    }
    return bytes.length;
}
