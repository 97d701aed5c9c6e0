/**
 * Byte-level I/O: hex digits and UTF-8.
 *
 * @packageDocumentation
 */

// Hex encoding/decoding
export { sniffHexFormat, stripHexMarkers, fromHex, toHex, codePointToHex } from './hex.js';

// UTF-8
export { fromUtf8, toUtf8, decodeUtf8Lossy, firstInvalidOffset } from './utf8.js';
