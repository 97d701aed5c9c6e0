/**
 * Code point listings (`ord`) and their inverse (`chr`).
 *
 * @packageDocumentation
 */

import { CodecError } from '../errors.js';
import { codePointToHex, isHexDigits, stripHexPrefix } from '../io/hex.js';
import { MAX_CODEPOINT, isSurrogate } from '../types.js';
import type { OrdOptions } from './types.js';

/**
 * Lists the code points of `text` as hex tokens, one per code point.
 *
 * @example
 * ```typescript
 * ord('A🍣'); // ['0x41', '0x1F363']
 * ord('A🍣', { lowercase: true, noPrefix: true }); // ['41', '1f363']
 * ```
 */
export function ord(text: string, options: OrdOptions = {}): string[] {
    const prefix = options.noPrefix ? '' : '0x';
    const lowercase = options.lowercase ?? false;
    const tokens: string[] = [];
    for (const char of text) {
        // for..of yields whole code points, so codePointAt(0) is always defined
        tokens.push(prefix + codePointToHex(char.codePointAt(0) ?? 0, lowercase));
    }
    return tokens;
}

function parseToken(token: string): number {
    const digits = stripHexPrefix(token);
    if (digits.length === 0 || !isHexDigits(digits)) {
        throw new CodecError('InvalidHex', `Invalid hex codepoint: ${token}`, { token });
    }
    const value = parseInt(digits, 16);
    if (value > MAX_CODEPOINT || isSurrogate(value)) {
        throw new CodecError('InvalidCodepoint', `Invalid codepoint: ${token}`, { token });
    }
    return value;
}

/**
 * Builds text from hex code point tokens, each with an optional `0x`/`0X` prefix.
 *
 * @throws {@link CodecError} `InvalidHex` or `InvalidCodepoint` on the first bad token
 *
 * @example
 * ```typescript
 * chr(['0x41', '1F363']); // 'A🍣'
 * chr(['0x110000']); // throws CodecError (InvalidCodepoint)
 * ```
 */
export function chr(tokens: readonly string[]): string {
    const values = tokens.map(parseToken);
    let result = '';
    for (const value of values) {
        result += String.fromCodePoint(value);
    }
    return result;
}
