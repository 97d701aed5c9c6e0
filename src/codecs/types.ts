/**
 * Option objects accepted by the codecs.
 * @packageDocumentation
 */

import type { HexFormat } from '../types.js';

export interface HexEncodeOptions {
    /** Render `a-f` instead of `A-F`. Default `false`. */
    readonly lowercase?: boolean;
    /** Default {@link HexFormat.Default}. */
    readonly format?: HexFormat;
}

export interface OrdOptions {
    /** Render `a-f` instead of `A-F`. Default `false`. */
    readonly lowercase?: boolean;
    /** Leave out the `0x` prefix. Default `false`. */
    readonly noPrefix?: boolean;
}
