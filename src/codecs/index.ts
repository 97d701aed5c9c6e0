/**
 * The codec layer: hex dumps, escape notation, UTF-8 scrubbing and code point listings.
 *
 * @packageDocumentation
 */

export type { HexEncodeOptions, OrdOptions } from './types.js';
export { bin2hex, hex2bin, hex2bytes } from './hex.js';
export { scrub } from './scrub.js';
export { escape, unescape, scanEscape, toSurrogatePair, fromSurrogatePair } from './escape.js';
export type { EscapeStep } from './escape.js';
export { ord, chr } from './codepoint.js';
