/**
 * Error thrown by the fail-fast codecs.
 *
 * @packageDocumentation
 */

export const CodecErrorKind = {
    /** Hex cleanup produced an odd number of digits. */
    OddLength: 'OddLength',
    /** A two-character hex pair contains a non-hex character. */
    InvalidHexDigit: 'InvalidHexDigit',
    /** Strict byte to text decoding met ill-formed UTF-8. */
    InvalidUtf8: 'InvalidUtf8',
    /** A value above U+10FFFF or a surrogate where a character is required. */
    InvalidCodepoint: 'InvalidCodepoint',
    /** A codepoint token that does not parse as hex. */
    InvalidHex: 'InvalidHex',
} as const;

export type CodecErrorKind = (typeof CodecErrorKind)[keyof typeof CodecErrorKind];

export interface CodecErrorDetails {
    /** Offset into the cleaned input (hex digits) or byte offset (UTF-8). */
    readonly position?: number;
    /** The offending token, as given by the caller. */
    readonly token?: string;
    /** Underlying error, when the failure was reported by another decoder. */
    readonly cause?: unknown;
}

export class CodecError extends Error {
    readonly kind: CodecErrorKind;
    readonly position?: number;
    readonly token?: string;

    constructor(kind: CodecErrorKind, message: string, details: CodecErrorDetails = {}) {
        super(message, details.cause === undefined ? undefined : { cause: details.cause });
        this.name = 'CodecError';
        this.kind = kind;
        if (details.position !== undefined) this.position = details.position;
        if (details.token !== undefined) this.token = details.token;
    }
}

export function isCodecError(value: unknown): value is CodecError {
    return value instanceof CodecError;
}
