/**
 * Branded type definitions for type-safe primitives.
 *
 * @packageDocumentation
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** An integer in [0, 0x10FFFF]. May be a surrogate. */
export type CodePoint = Brand<number, 'CodePoint'>;
/** A code point outside the surrogate range, i.e. one that stands for a character. */
export type ScalarValue = Brand<number, 'ScalarValue'>;
/** A single UTF-16 code unit, 0 to 0xFFFF. */
export type CodeUnit = Brand<number, 'CodeUnit'>;
