/**
 * Per-cluster code point tables and their text / JSON / JSON lines renderings.
 *
 * @packageDocumentation
 */

import { bin2hex } from './codecs/hex.js';
import { codePointToHex } from './io/hex.js';
import type { CharacterNameLookup } from './names.js';
import { DumpFormat, HexFormat } from './types.js';
import type { GraphemeSegmenter } from './units/segmenter.js';
import { getDefaultSegmenter } from './units/segmenter.js';

export interface CodepointInfo {
    /** `U+` and at least four uppercase hex digits. */
    readonly codepoint: string;
    readonly character: string;
    /** UTF-8 bytes, space separated. */
    readonly utf8: string;
    /** Present only when the name lookup knows the code point. */
    readonly name?: string;
}

export interface GraphemeInfo {
    readonly index: number;
    /** Start of the cluster in UTF-16 code units. */
    readonly offset: number;
    readonly grapheme: string;
    readonly codepoints: CodepointInfo[];
}

export interface DumpOptions {
    readonly segmenter?: GraphemeSegmenter;
    readonly names?: CharacterNameLookup;
}

/**
 * Formats a code point in `U+XXXX` notation.
 *
 * @example
 * ```typescript
 * formatCodePoint(0x41); // 'U+0041'
 * formatCodePoint(0x1f363); // 'U+1F363'
 * ```
 */
export function formatCodePoint(codePoint: number): string {
    return `U+${codePointToHex(codePoint).padStart(4, '0')}`;
}

function describeCodepoint(symbol: string, names: CharacterNameLookup | undefined): CodepointInfo {
    const codePoint = symbol.codePointAt(0) ?? 0;
    const info: CodepointInfo = {
        codepoint: formatCodePoint(codePoint),
        character: symbol,
        utf8: bin2hex(symbol, { format: HexFormat.Spaced }),
    };
    const name = names?.nameOf(codePoint);
    return name === undefined ? info : { ...info, name };
}

/**
 * Breaks `text` into grapheme clusters and lists the code points of each.
 */
export function describeGraphemes(text: string, options: DumpOptions = {}): GraphemeInfo[] {
    const boundaries = (options.segmenter ?? getDefaultSegmenter()).segment(text);
    const result: GraphemeInfo[] = [];
    for (let i = 1; i < boundaries.length; i++) {
        const offset = boundaries[i - 1];
        const grapheme = text.slice(offset, boundaries[i]);
        result.push({
            index: i - 1,
            offset,
            grapheme,
            codepoints: Array.from(grapheme, (symbol) => describeCodepoint(symbol, options.names)),
        });
    }
    return result;
}

function renderText(infos: GraphemeInfo[]): string {
    let out = '';
    for (const info of infos) {
        out += `#${info.index} ${JSON.stringify(info.grapheme)} (offset ${info.offset})\n`;
        for (const cp of info.codepoints) {
            out += `  ${cp.codepoint}  ${cp.utf8}`;
            if (cp.name !== undefined) out += `  ${cp.name}`;
            out += '\n';
        }
    }
    return out;
}

/**
 * Renders the {@link describeGraphemes} table of `text`.
 *
 * @example
 * ```typescript
 * dumpGraphemes('A');
 * // #0 "A" (offset 0)
 * //   U+0041  41
 * ```
 */
export function dumpGraphemes(text: string, format: DumpFormat = DumpFormat.Text, options: DumpOptions = {}): string {
    const infos = describeGraphemes(text, options);
    switch (format) {
        case DumpFormat.Text:
            return renderText(infos);
        case DumpFormat.Json:
            return `${JSON.stringify(infos, null, 2)}\n`;
        case DumpFormat.Jsonl:
            return infos.map((info) => `${JSON.stringify(info)}\n`).join('');
        default:
            throw new TypeError(`Unknown dump format: ${String(format)}`);
    }
}
