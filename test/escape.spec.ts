import assert from 'assert';
import { describe, it } from 'vitest';

import { EscapeFormat, escape, fromSurrogatePair, scanEscape, toSurrogatePair, unescape } from '../src/index.js';

const SUSHI = '\u{1F363}';
const FFFD = '\uFFFD';

describe('escape', () => {
    it('should write one braced token per code point by default', () => {
        assert.strictEqual(escape('A' + SUSHI), '\\u{41}\\u{1F363}');
        assert.strictEqual(escape('\u0000'), '\\u{0}');
        assert.strictEqual(escape('\u{10FFFF}', EscapeFormat.Default), '\\u{10FFFF}');
    });

    it('should write fixed-width units and surrogate pairs in the json format', () => {
        assert.strictEqual(escape(SUSHI, EscapeFormat.Json), '\\uD83C\\uDF63');
        assert.strictEqual(escape('Aé', EscapeFormat.Json), '\\u0041\\u00E9');
        assert.strictEqual(escape('\uFFFF\u{10000}', EscapeFormat.Json), '\\uFFFF\\uD800\\uDC00');
        assert.strictEqual(escape('\u{10FFFF}', EscapeFormat.Json), '\\uDBFF\\uDFFF');
    });

    it('should return an empty string for empty input', () => {
        assert.strictEqual(escape(''), '');
        assert.strictEqual(escape('', EscapeFormat.Json), '');
    });

    it('should escape backslashes like any other character', () => {
        assert.strictEqual(escape('\\u'), '\\u{5C}\\u{75}');
    });

    it('should reject an unknown format', () => {
        // Untyped input, as from a parsed config file.
        const format: EscapeFormat = JSON.parse('"bogus"');
        assert.throws(() => escape('A', format), {
            name: 'TypeError',
            message: 'Unknown escape format: bogus',
        });
    });

    it('should write a lone surrogate as its unit value', () => {
        assert.strictEqual(escape('\uD800'), '\\u{D800}');
        assert.strictEqual(escape('\uD800', EscapeFormat.Json), '\\uD800');
    });
});

describe('unescape', () => {
    it('should combine a surrogate pair', () => {
        assert.strictEqual(unescape('\\uD83C\\uDF63'), SUSHI);
        assert.strictEqual(unescape('\\ud83c\\udf63'), SUSHI);
    });

    it('should decode braced tokens mixed with literal text', () => {
        assert.strictEqual(unescape('x\\u{41}y'), 'xAy');
        assert.strictEqual(unescape('\\u{1f363}'), SUSHI);
        assert.strictEqual(unescape('\\u{0000041}'), 'A');
    });

    it('should decode a BMP unit', () => {
        assert.strictEqual(unescape('caf\\u00e9'), 'café');
    });

    it('should replace a reversed pair with two replacement characters', () => {
        assert.strictEqual(unescape('\\uDF63\\uD83C'), FFFD + FFFD);
    });

    it('should replace a high surrogate and the unit after it when that unit is not a low surrogate', () => {
        assert.strictEqual(unescape('\\uD83C\\u0041'), FFFD + FFFD);
        assert.strictEqual(unescape('\\uD83C\\uD83C'), FFFD + FFFD);
    });

    it('should replace an unmatched high surrogate once', () => {
        assert.strictEqual(unescape('\\uD83Cx'), FFFD + 'x');
        assert.strictEqual(unescape('\\uD83C'), FFFD);
        assert.strictEqual(unescape('\\uD83C\\u{1F363}'), FFFD + SUSHI);
    });

    it('should treat an incomplete unit after a high surrogate as its own token', () => {
        assert.strictEqual(unescape('\\uD83C\\u12'), FFFD + FFFD);
        assert.strictEqual(unescape('\\uD83C\\u12z'), FFFD + FFFD + 'z');
    });

    it('should replace a lone low surrogate', () => {
        assert.strictEqual(unescape('a\\uDC00b'), 'a' + FFFD + 'b');
    });

    it('should replace invalid braced content', () => {
        assert.strictEqual(unescape('\\u{}'), FFFD);
        assert.strictEqual(unescape('\\u{xyz}ok'), FFFD + 'ok');
        assert.strictEqual(unescape('\\u{110000}'), FFFD);
        assert.strictEqual(unescape('\\u{D800}ok'), FFFD + 'ok');
        assert.strictEqual(unescape('\\u{FFFFFFFFFFFFFFFFFFFF}'), FFFD);
    });

    it('should turn the rest of the input into one replacement when a brace is never closed', () => {
        assert.strictEqual(unescape('ab\\u{41 and more \\u0041'), 'ab' + FFFD);
    });

    it('should resume after the hex digits of a truncated unit', () => {
        assert.strictEqual(unescape('\\u12x'), FFFD + 'x');
        assert.strictEqual(unescape('\\uZ'), FFFD + 'Z');
        assert.strictEqual(unescape('end\\u'), 'end' + FFFD);
    });

    it('should copy other text unchanged', () => {
        assert.strictEqual(unescape('C:\\path\\n'), 'C:\\path\\n');
        assert.strictEqual(unescape('\\U0041'), '\\U0041');
        assert.strictEqual(unescape('x' + SUSHI + 'y'), 'x' + SUSHI + 'y');
        assert.strictEqual(unescape(''), '');
    });

    it('should invert escape in both formats', () => {
        const texts = ['hello', 'あいうえお', SUSHI + '🍺', '👨‍💻', 'C:\\u{41}\\uD83C', '\u0000\u{10FFFF}'];
        for (const text of texts) {
            assert.strictEqual(unescape(escape(text)), text);
            assert.strictEqual(unescape(escape(text, EscapeFormat.Json)), text);
        }
    });
});

describe('scanEscape', () => {
    it('should report a decoded pair as one step', () => {
        assert.deepStrictEqual(scanEscape('\\uD83C\\uDF63', 0), { kind: 'char', text: SUSHI, consumed: 12 });
    });

    it('should report a broken pair as two replacements', () => {
        assert.deepStrictEqual(scanEscape('\\uD83C\\u0041', 0), { kind: 'replacement', count: 2, consumed: 12 });
    });

    it('should consume the rest of the input for an unterminated brace', () => {
        assert.deepStrictEqual(scanEscape('ab\\u{41', 2), { kind: 'replacement', count: 1, consumed: 5 });
    });

    it('should step over a literal astral character in one go', () => {
        assert.deepStrictEqual(scanEscape(SUSHI + '!', 0), { kind: 'char', text: SUSHI, consumed: 2 });
    });
});

describe('surrogate pairs', () => {
    it('should split and combine code points', () => {
        assert.deepStrictEqual(toSurrogatePair(0x1f363), [0xd83c, 0xdf63]);
        assert.deepStrictEqual(toSurrogatePair(0x10000), [0xd800, 0xdc00]);
        assert.deepStrictEqual(toSurrogatePair(0x10ffff), [0xdbff, 0xdfff]);
        assert.strictEqual(fromSurrogatePair(0xd83c, 0xdf63), 0x1f363);
    });
});
