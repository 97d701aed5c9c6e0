/**
 * Splitting, counting and slicing text by grapheme cluster, code point or byte.
 *
 * @packageDocumentation
 */

import { fromUtf8 } from '../io/utf8.js';
import { ProcessingMode } from '../types.js';
import type { GraphemeSegmenter } from './segmenter.js';
import { getDefaultSegmenter } from './segmenter.js';

export { IntlGraphemeSegmenter, getDefaultSegmenter } from './segmenter.js';
export type { GraphemeSegmenter } from './segmenter.js';

function checkCount(n: number): void {
    if (typeof n !== 'number' || !Number.isInteger(n)) throw new RangeError('unit count must be an integer');
    if (n < 0) throw new RangeError('unit count must not be negative');
}

/**
 * Splits `text` into grapheme clusters.
 *
 * @example
 * ```typescript
 * graphemes('が🍣'); // ['が', '🍣']
 * ```
 */
export function graphemes(text: string, segmenter: GraphemeSegmenter = getDefaultSegmenter()): string[] {
    const boundaries = segmenter.segment(text);
    const result: string[] = [];
    for (let i = 1; i < boundaries.length; i++) {
        result.push(text.slice(boundaries[i - 1], boundaries[i]));
    }
    return result;
}

/**
 * Splits `text` into units of the given mode.
 *
 * In {@link ProcessingMode.Byte} every UTF-8 byte becomes the character with
 * the same value (U+0000 to U+00FF).
 */
export function splitUnits(
    text: string,
    mode: ProcessingMode = ProcessingMode.Grapheme,
    segmenter?: GraphemeSegmenter,
): string[] {
    switch (mode) {
        case ProcessingMode.Grapheme:
            return graphemes(text, segmenter);
        case ProcessingMode.Codepoint:
            return Array.from(text);
        case ProcessingMode.Byte:
            return Array.from(fromUtf8(text), (byte) => String.fromCharCode(byte));
        default:
            throw new TypeError(`Unknown processing mode: ${String(mode)}`);
    }
}

/**
 * Counts the units of `text`.
 *
 * @example
 * ```typescript
 * countUnits('🍣'); // 1
 * countUnits('🍣', ProcessingMode.Codepoint); // 1
 * countUnits('🍣', ProcessingMode.Byte); // 4
 * ```
 */
export function countUnits(
    text: string,
    mode: ProcessingMode = ProcessingMode.Grapheme,
    segmenter?: GraphemeSegmenter,
): number {
    switch (mode) {
        case ProcessingMode.Grapheme:
            return Math.max(0, (segmenter ?? getDefaultSegmenter()).segment(text).length - 1);
        case ProcessingMode.Codepoint: {
            let count = 0;
            for (const _ of text) count++;
            return count;
        }
        case ProcessingMode.Byte:
            return fromUtf8(text).length;
        default:
            throw new TypeError(`Unknown processing mode: ${String(mode)}`);
    }
}

/**
 * Returns the first `n` units of `text` (all of them if there are fewer).
 *
 * @throws RangeError if `n` is not a non-negative integer
 */
export function takeUnits(text: string, mode: ProcessingMode, n: number, segmenter?: GraphemeSegmenter): string[] {
    checkCount(n);
    return splitUnits(text, mode, segmenter).slice(0, n);
}

/**
 * Returns the units of `text` after the first `n`.
 *
 * @throws RangeError if `n` is not a non-negative integer
 */
export function dropUnits(text: string, mode: ProcessingMode, n: number, segmenter?: GraphemeSegmenter): string[] {
    checkCount(n);
    return splitUnits(text, mode, segmenter).slice(n);
}
