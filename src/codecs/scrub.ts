/**
 * Lossy UTF-8 recovery.
 *
 * @packageDocumentation
 */

import { decodeUtf8Lossy, fromUtf8 } from '../io/utf8.js';
import { InputFormat } from '../types.js';
import { hex2bytes } from './hex.js';

/**
 * Decodes bytes as UTF-8, replacing each maximal invalid subpart with U+FFFD.
 *
 * With {@link InputFormat.Hex} the input is a hex dump in any supported format;
 * the hex layer can still throw `OddLength` or `InvalidHexDigit`, but bad UTF-8
 * in the decoded bytes never throws.
 *
 * @param input - Bytes (or text, which is UTF-8 encoded) for Binary; hex text for Hex
 * @param sourceFormat - Default {@link InputFormat.Binary}
 *
 * @example
 * ```typescript
 * scrub('C080', InputFormat.Hex); // '��'
 * scrub(new Uint8Array([0x61, 0xff, 0x62])); // 'a�b'
 * ```
 */
export function scrub(input: Uint8Array | string, sourceFormat: InputFormat = InputFormat.Binary): string {
    switch (sourceFormat) {
        case InputFormat.Binary:
            return decodeUtf8Lossy(typeof input === 'string' ? fromUtf8(input) : input);
        case InputFormat.Hex: {
            const text = typeof input === 'string' ? input : decodeUtf8Lossy(input);
            return decodeUtf8Lossy(hex2bytes(text));
        }
        default:
            throw new TypeError(`Unknown input format: ${String(sourceFormat)}`);
    }
}
