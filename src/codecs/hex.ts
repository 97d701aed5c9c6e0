/**
 * Conversion between bytes and hex dumps in the three {@link HexFormat}s.
 *
 * @packageDocumentation
 */

import { fromHex, sniffHexFormat, stripHexMarkers, toHex } from '../io/hex.js';
import { fromUtf8, toUtf8 } from '../io/utf8.js';
import { HexFormat } from '../types.js';
import type { HexEncodeOptions } from './types.js';

/**
 * Renders bytes as a hex dump.
 *
 * @param input - Raw bytes, or text to be UTF-8 encoded first
 * @param options - Digit case and output format
 *
 * @example
 * ```typescript
 * bin2hex('🍣'); // 'F09F8DA3'
 * bin2hex('🍣', { format: HexFormat.Spaced, lowercase: true }); // 'f0 9f 8d a3'
 * bin2hex('🍣', { format: HexFormat.Escaped }); // '\xF0\x9F\x8D\xA3'
 * ```
 */
export function bin2hex(input: Uint8Array | string, options: HexEncodeOptions = {}): string {
    const bytes = typeof input === 'string' ? fromUtf8(input) : input;
    const format = options.format ?? HexFormat.Default;
    const digits = toHex(bytes, options.lowercase ?? false);

    if (format === HexFormat.Default) return digits;

    const pairs: string[] = [];
    for (let i = 0; i < digits.length; i += 2) {
        pairs.push(digits.slice(i, i + 2));
    }
    switch (format) {
        case HexFormat.Spaced:
            return pairs.join(' ');
        case HexFormat.Escaped:
            return pairs.map((pair) => `\\x${pair}`).join('');
        default:
            throw new TypeError(`Unknown hex format: ${String(format)}`);
    }
}

/**
 * Decodes a hex dump in any {@link HexFormat} to bytes.
 *
 * @throws {@link CodecError} `OddLength` or `InvalidHexDigit`
 */
export function hex2bytes(input: string): Uint8Array {
    return fromHex(stripHexMarkers(input, sniffHexFormat(input)));
}

/**
 * Decodes a hex dump to text. The bytes must be well-formed UTF-8; use
 * {@link scrub} with {@link InputFormat.Hex} to recover from bad bytes instead.
 *
 * @throws {@link CodecError} `OddLength`, `InvalidHexDigit` or `InvalidUtf8`
 *
 * @example
 * ```typescript
 * hex2bin('F0 9F 8D A3'); // '🍣'
 * hex2bin('F0F'); // throws CodecError (OddLength)
 * ```
 */
export function hex2bin(input: string): string {
    return toUtf8(hex2bytes(input));
}
