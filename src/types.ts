/**
 * Core type definitions, constants and type guard functions.
 *
 * @packageDocumentation
 */
import type { CodePoint, CodeUnit, ScalarValue } from './branded.js';

export type { CodePoint, CodeUnit, ScalarValue } from './branded.js';

// ============================================================================
// Constants
// ============================================================================

export const MAX_CODEPOINT = 0x10ffff;

export const HIGH_SURROGATE_MIN = 0xd800;
export const HIGH_SURROGATE_MAX = 0xdbff;
export const LOW_SURROGATE_MIN = 0xdc00;
export const LOW_SURROGATE_MAX = 0xdfff;

/** First code point that needs a surrogate pair in UTF-16. */
export const SUPPLEMENTARY_MIN = 0x10000;

/** U+FFFD, substituted for anything that cannot be decoded. */
export const REPLACEMENT_CHARACTER = '\uFFFD';

// ============================================================================
// Formats
// ============================================================================

/** Surface syntax of a hex byte dump. */
export const HexFormat = {
    /** Contiguous digits: `F09F8DA3` */
    Default: 'default',
    /** Space separated pairs: `F0 9F 8D A3` */
    Spaced: 'spaced',
    /** `\x` prefixed pairs: `\xF0\x9F\x8D\xA3` */
    Escaped: 'escaped',
} as const;

export type HexFormat = (typeof HexFormat)[keyof typeof HexFormat];

/** Backslash escape notation. */
export const EscapeFormat = {
    /** One `\u{HEX}` token per code point. */
    Default: 'default',
    /** Fixed width `\uHHHH` tokens, surrogate pairs above the BMP. */
    Json: 'json',
} as const;

export type EscapeFormat = (typeof EscapeFormat)[keyof typeof EscapeFormat];

/** How the input of {@link scrub} is to be read. */
export const InputFormat = {
    Binary: 'binary',
    Hex: 'hex',
} as const;

export type InputFormat = (typeof InputFormat)[keyof typeof InputFormat];

/** Unit used when splitting, counting or slicing text. */
export const ProcessingMode = {
    Grapheme: 'grapheme',
    Codepoint: 'codepoint',
    Byte: 'byte',
} as const;

export type ProcessingMode = (typeof ProcessingMode)[keyof typeof ProcessingMode];

export const DumpFormat = {
    Text: 'text',
    Json: 'json',
    Jsonl: 'jsonl',
} as const;

export type DumpFormat = (typeof DumpFormat)[keyof typeof DumpFormat];

// ============================================================================
// Type Guards
// ============================================================================

export function isCodePoint(value: unknown): value is CodePoint {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_CODEPOINT;
}

export function isHighSurrogate(value: number): value is CodeUnit {
    return value >= HIGH_SURROGATE_MIN && value <= HIGH_SURROGATE_MAX;
}

export function isLowSurrogate(value: number): value is CodeUnit {
    return value >= LOW_SURROGATE_MIN && value <= LOW_SURROGATE_MAX;
}

export function isSurrogate(value: number): boolean {
    return value >= HIGH_SURROGATE_MIN && value <= LOW_SURROGATE_MAX;
}

/** True for code points that denote a character on their own. */
export function isScalarValue(value: unknown): value is ScalarValue {
    return isCodePoint(value) && !isSurrogate(value);
}

export function isHexFormat(value: unknown): value is HexFormat {
    return Object.values<unknown>(HexFormat).includes(value);
}

export function isEscapeFormat(value: unknown): value is EscapeFormat {
    return Object.values<unknown>(EscapeFormat).includes(value);
}

export function isInputFormat(value: unknown): value is InputFormat {
    return Object.values<unknown>(InputFormat).includes(value);
}

export function isProcessingMode(value: unknown): value is ProcessingMode {
    return Object.values<unknown>(ProcessingMode).includes(value);
}

export function isDumpFormat(value: unknown): value is DumpFormat {
    return Object.values<unknown>(DumpFormat).includes(value);
}
