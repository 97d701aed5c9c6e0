/**
 * Character name lookup.
 *
 * No name table ships with the library; callers provide one.
 *
 * @packageDocumentation
 */

/** Read-only code point to display name dictionary. */
export interface CharacterNameLookup {
    nameOf(codePoint: number): string | undefined;
}

/**
 * Builds a {@link CharacterNameLookup} from code point / name pairs.
 *
 * @example
 * ```typescript
 * const names = createNameLookup([[0x41, 'LATIN CAPITAL LETTER A']]);
 * names.nameOf(0x41); // 'LATIN CAPITAL LETTER A'
 * names.nameOf(0x42); // undefined
 * ```
 */
export function createNameLookup(entries: Iterable<readonly [number, string]>): CharacterNameLookup {
    const table = new Map<number, string>(entries);
    return {
        nameOf: (codePoint) => table.get(codePoint),
    };
}
