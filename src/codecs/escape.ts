/**
 * Backslash escape notation for Unicode text.
 *
 * Two notations are written: `\u{1F363}` (one variable-width token per code
 * point) and `\uD83C\uDF63` (fixed-width UTF-16 units, as in JSON). Decoding
 * reads both, mixed freely with literal text, and never fails: malformed
 * escapes turn into U+FFFD one token at a time.
 *
 * @packageDocumentation
 */

import { codePointToHex, countHexDigits, isHexDigits } from '../io/hex.js';
import {
    EscapeFormat,
    HIGH_SURROGATE_MIN,
    LOW_SURROGATE_MIN,
    REPLACEMENT_CHARACTER,
    SUPPLEMENTARY_MIN,
    isHighSurrogate,
    isLowSurrogate,
    isScalarValue,
} from '../types.js';

const UNIT_MARKER = '\\u';
const BRACE_MARKER = '\\u{';
const UNIT_DIGITS = 4;
/** Length of one `\uHHHH` token. */
const UNIT_TOKEN_LENGTH = UNIT_MARKER.length + UNIT_DIGITS;

/**
 * Outcome of decoding the token at the cursor.
 *
 * Every step consumes at least one UTF-16 unit of the input.
 */
export type EscapeStep =
    | { readonly kind: 'char'; readonly text: string; readonly consumed: number }
    | { readonly kind: 'replacement'; readonly count: 1 | 2; readonly consumed: number };

/**
 * Splits a supplementary code point into its UTF-16 surrogate pair.
 *
 * @example
 * ```typescript
 * toSurrogatePair(0x1f363); // [0xd83c, 0xdf63]
 * ```
 */
export function toSurrogatePair(codePoint: number): [high: number, low: number] {
    const adjusted = codePoint - SUPPLEMENTARY_MIN;
    return [HIGH_SURROGATE_MIN + (adjusted >> 10), LOW_SURROGATE_MIN + (adjusted & 0x3ff)];
}

/** Inverse of {@link toSurrogatePair}. */
export function fromSurrogatePair(high: number, low: number): number {
    return SUPPLEMENTARY_MIN + ((high - HIGH_SURROGATE_MIN) << 10) + (low - LOW_SURROGATE_MIN);
}

function unitToken(unit: number): string {
    return UNIT_MARKER + codePointToHex(unit).padStart(UNIT_DIGITS, '0');
}

/**
 * Escapes every code point of `text`.
 *
 * A lone surrogate in the string is written as its own unit value, which
 * {@link unescape} later reads back as U+FFFD.
 *
 * @example
 * ```typescript
 * escape('A🍣'); // '\u{41}\u{1F363}'
 * escape('A🍣', EscapeFormat.Json); // '\u0041\uD83C\uDF63'
 * ```
 */
export function escape(text: string, format: EscapeFormat = EscapeFormat.Default): string {
    let result = '';
    for (const symbol of text) {
        const codePoint = symbol.codePointAt(0) ?? 0;
        switch (format) {
            case EscapeFormat.Default:
                result += `${BRACE_MARKER}${codePointToHex(codePoint)}}`;
                break;
            case EscapeFormat.Json:
                if (codePoint < SUPPLEMENTARY_MIN) {
                    result += unitToken(codePoint);
                } else {
                    const [high, low] = toSurrogatePair(codePoint);
                    result += unitToken(high) + unitToken(low);
                }
                break;
            default:
                throw new TypeError(`Unknown escape format: ${String(format)}`);
        }
    }
    return result;
}

function char(text: string, consumed: number): EscapeStep {
    return { kind: 'char', text, consumed };
}

function replacement(count: 1 | 2, consumed: number): EscapeStep {
    return { kind: 'replacement', count, consumed };
}

/** Reads a complete `\uHHHH` token at `offset`, if there is one. */
function readUnit(input: string, offset: number): number | undefined {
    if (!input.startsWith(UNIT_MARKER, offset)) return undefined;
    const start = offset + UNIT_MARKER.length;
    if (countHexDigits(input, start, UNIT_DIGITS) < UNIT_DIGITS) return undefined;
    return parseInt(input.slice(start, start + UNIT_DIGITS), 16);
}

function scanBraced(input: string, offset: number): EscapeStep {
    const start = offset + BRACE_MARKER.length;
    const close = input.indexOf('}', start);
    // An unterminated brace swallows the rest of the input.
    if (close === -1) return replacement(1, input.length - offset);

    const consumed = close + 1 - offset;
    const digits = input.slice(start, close);
    if (digits.length === 0 || !isHexDigits(digits)) return replacement(1, consumed);

    const value = parseInt(digits, 16);
    if (!isScalarValue(value)) return replacement(1, consumed);
    return char(String.fromCodePoint(value), consumed);
}

function scanUnit(input: string, offset: number, unit: number): EscapeStep {
    if (isHighSurrogate(unit)) {
        const low = readUnit(input, offset + UNIT_TOKEN_LENGTH);
        if (low === undefined) return replacement(1, UNIT_TOKEN_LENGTH);
        if (!isLowSurrogate(low)) return replacement(2, UNIT_TOKEN_LENGTH * 2);
        return char(String.fromCodePoint(fromSurrogatePair(unit, low)), UNIT_TOKEN_LENGTH * 2);
    }
    if (isLowSurrogate(unit)) return replacement(1, UNIT_TOKEN_LENGTH);
    return char(String.fromCharCode(unit), UNIT_TOKEN_LENGTH);
}

/**
 * Decodes the token starting at `offset`.
 *
 * Looks ahead at most one `\uHHHH` token (to complete a surrogate pair).
 */
export function scanEscape(input: string, offset: number): EscapeStep {
    if (input.startsWith(BRACE_MARKER, offset)) {
        return scanBraced(input, offset);
    }
    if (input.startsWith(UNIT_MARKER, offset)) {
        const start = offset + UNIT_MARKER.length;
        const digits = countHexDigits(input, start, UNIT_DIGITS);
        if (digits === UNIT_DIGITS) {
            return scanUnit(input, offset, parseInt(input.slice(start, start + UNIT_DIGITS), 16));
        }
        // Truncated unit: drop the marker and the digits it has.
        return replacement(1, UNIT_MARKER.length + digits);
    }
    const codePoint = input.codePointAt(offset) ?? 0;
    const width = codePoint >= SUPPLEMENTARY_MIN ? 2 : 1;
    return char(input.slice(offset, offset + width), width);
}

/**
 * Decodes `\u{…}` and `\uHHHH` escapes in `text`, leaving other text as is.
 *
 * Never throws. Each malformed escape becomes U+FFFD (two for a high surrogate
 * followed by a non-low unit); a `\u{` without a closing brace turns the whole
 * rest of the input into a single U+FFFD.
 *
 * @example
 * ```typescript
 * unescape('\\uD83C\\uDF63'); // '🍣'
 * unescape('x\\u{41}y'); // 'xAy'
 * unescape('\\uDF63\\uD83C'); // '��'
 * ```
 */
export function unescape(text: string): string {
    let result = '';
    let offset = 0;
    while (offset < text.length) {
        const step = scanEscape(text, offset);
        result += step.kind === 'char' ? step.text : REPLACEMENT_CHARACTER.repeat(step.count);
        offset += step.consumed;
    }
    return result;
}
