/**
 * Hex digit primitives shared by the byte and codepoint codecs.
 *
 * @packageDocumentation
 */

import { hex } from '@scure/base';
import { CodecError } from '../errors.js';
import { HexFormat } from '../types.js';

const ESCAPE_MARKER = '\\x';

/**
 * Checks whether a UTF-16 code unit is an ASCII hex digit.
 *
 * @param code - Value returned by `charCodeAt`
 */
export function isHexDigit(code: number): boolean {
    return (
        (code >= 0x30 && code <= 0x39) || // 0-9
        (code >= 0x41 && code <= 0x46) || // A-F
        (code >= 0x61 && code <= 0x66) // a-f
    );
}

/**
 * Checks whether every character of `value` is an ASCII hex digit.
 * The empty string passes.
 */
export function isHexDigits(value: string): boolean {
    for (let i = 0; i < value.length; i++) {
        if (!isHexDigit(value.charCodeAt(i))) return false;
    }
    return true;
}

/**
 * Counts the hex digits at the start of `input[start..]`, stopping after `max`.
 */
export function countHexDigits(input: string, start: number, max: number = Infinity): number {
    let count = 0;
    while (count < max && start + count < input.length && isHexDigit(input.charCodeAt(start + count))) {
        count++;
    }
    return count;
}

/** Removes a leading `0x` or `0X`. */
export function stripHexPrefix(token: string): string {
    if (token.startsWith('0x') || token.startsWith('0X')) {
        return token.slice(2);
    }
    return token;
}

/**
 * Detects which {@link HexFormat} a hex dump is written in.
 *
 * A leading `\x` means Escaped; any space means Spaced; anything else is Default.
 */
export function sniffHexFormat(input: string): HexFormat {
    if (input.startsWith(ESCAPE_MARKER)) return HexFormat.Escaped;
    if (input.includes(' ')) return HexFormat.Spaced;
    return HexFormat.Default;
}

/**
 * Strips the separators or prefixes of `format`, leaving bare digits.
 * Only the markers of the given format are removed.
 */
export function stripHexMarkers(input: string, format: HexFormat): string {
    switch (format) {
        case HexFormat.Escaped:
            return input.split(ESCAPE_MARKER).join('');
        case HexFormat.Spaced:
            return input.split(' ').join('');
        case HexFormat.Default:
            return input;
    }
}

/**
 * Converts a string of bare hex digits to bytes.
 *
 * @param digits - Hex digits, any case, no prefix or separators
 * @returns Decoded bytes
 * @throws {@link CodecError} `OddLength` if there is an odd number of digits,
 * `InvalidHexDigit` on the first pair holding a non-hex character
 *
 * @example
 * ```typescript
 * fromHex('F09f8DA3'); // Uint8Array [0xf0, 0x9f, 0x8d, 0xa3]
 * ```
 */
export function fromHex(digits: string): Uint8Array {
    if (digits.length % 2 !== 0) {
        throw new CodecError('OddLength', `Invalid hex string: odd length (${digits.length})`, {
            position: digits.length,
        });
    }
    const length = digits.length / 2;
    const result = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
        const hi = digits.charCodeAt(i * 2);
        const lo = digits.charCodeAt(i * 2 + 1);
        if (!isHexDigit(hi) || !isHexDigit(lo)) {
            const pair = digits.slice(i * 2, i * 2 + 2);
            throw new CodecError('InvalidHexDigit', `Invalid hex digit in "${pair}" at position ${i * 2}`, {
                position: i * 2,
                token: pair,
            });
        }
        result[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
    }
    return result;
}

/**
 * Converts a Uint8Array to a hex string, two digits per byte.
 *
 * @param bytes - Bytes to render
 * @param lowercase - Use `a-f` instead of `A-F`
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([222, 173, 190, 239])); // 'DEADBEEF'
 * toHex(new Uint8Array([222, 173, 190, 239]), true); // 'deadbeef'
 * ```
 */
export function toHex(bytes: Uint8Array, lowercase: boolean = false): string {
    const digits = hex.encode(bytes);
    return lowercase ? digits : digits.toUpperCase();
}

/**
 * Renders a code point as hex without padding.
 */
export function codePointToHex(value: number, lowercase: boolean = false): string {
    const digits = value.toString(16);
    return lowercase ? digits : digits.toUpperCase();
}
