/**
 * Grapheme cluster segmentation.
 *
 * The library never segments text itself; it asks a {@link GraphemeSegmenter}
 * for cluster boundaries. {@link IntlGraphemeSegmenter} is the default.
 *
 * @packageDocumentation
 */

/**
 * Finds grapheme cluster boundaries.
 */
export interface GraphemeSegmenter {
    /**
     * Returns the boundary offsets of `text`, in UTF-16 code units, in
     * ascending order. The first is `0`, the last is `text.length`; for the
     * empty string the result is `[0]`.
     */
    segment(text: string): number[];
}

/**
 * {@link GraphemeSegmenter} backed by `Intl.Segmenter`.
 *
 * @example
 * ```typescript
 * new IntlGraphemeSegmenter().segment('a👨‍💻b'); // [0, 1, 6, 7]
 * ```
 */
export class IntlGraphemeSegmenter implements GraphemeSegmenter {
    readonly #segmenter: Intl.Segmenter;

    constructor(locale?: string) {
        this.#segmenter = new Intl.Segmenter(locale, { granularity: 'grapheme' });
    }

    segment(text: string): number[] {
        const boundaries: number[] = [];
        for (const { index } of this.#segmenter.segment(text)) {
            boundaries.push(index);
        }
        boundaries.push(text.length);
        return boundaries;
    }
}

let defaultSegmenter: GraphemeSegmenter | undefined;

/** Shared {@link IntlGraphemeSegmenter} for the root locale, created on first use. */
export function getDefaultSegmenter(): GraphemeSegmenter {
    defaultSegmenter ??= new IntlGraphemeSegmenter();
    return defaultSegmenter;
}
