import assert from 'assert';
import { describe, it } from 'vitest';

import { CodecError, chr, ord } from '../src/index.js';
import type { CodecErrorKind } from '../src/index.js';

const SUSHI = '\u{1F363}';

function assertCodecError(fn: () => unknown, kind: CodecErrorKind, token: string): void {
    assert.throws(fn, (err: unknown) => {
        assert.ok(err instanceof CodecError);
        assert.strictEqual(err.kind, kind);
        assert.strictEqual(err.token, token);
        return true;
    });
}

describe('ord', () => {
    it('should list one prefixed uppercase token per code point', () => {
        assert.deepStrictEqual(ord('A' + SUSHI), ['0x41', '0x1F363']);
    });

    it('should honour lowercase and noPrefix', () => {
        assert.deepStrictEqual(ord('A' + SUSHI, { lowercase: true }), ['0x41', '0x1f363']);
        assert.deepStrictEqual(ord('A' + SUSHI, { noPrefix: true }), ['41', '1F363']);
        assert.deepStrictEqual(ord('A' + SUSHI, { lowercase: true, noPrefix: true }), ['41', '1f363']);
    });

    it('should not pad small code points', () => {
        assert.deepStrictEqual(ord('\u0000\u0009'), ['0x0', '0x9']);
    });

    it('should return an empty list for empty input', () => {
        assert.deepStrictEqual(ord(''), []);
    });
});

describe('chr', () => {
    it('should accept tokens with and without a prefix', () => {
        assert.strictEqual(chr(['0x41', '1F363']), 'A' + SUSHI);
        assert.strictEqual(chr(['0X1f363', '0042']), SUSHI + 'B');
    });

    it('should return an empty string for no tokens', () => {
        assert.strictEqual(chr([]), '');
    });

    it('should reject values above U+10FFFF', () => {
        assertCodecError(() => chr(['0x110000']), 'InvalidCodepoint', '0x110000');
    });

    it('should reject surrogates', () => {
        assertCodecError(() => chr(['D800']), 'InvalidCodepoint', 'D800');
        assertCodecError(() => chr(['0xDFFF']), 'InvalidCodepoint', '0xDFFF');
    });

    it('should reject tokens that are not hex', () => {
        assertCodecError(() => chr(['zz']), 'InvalidHex', 'zz');
        assertCodecError(() => chr(['0x']), 'InvalidHex', '0x');
        assertCodecError(() => chr(['']), 'InvalidHex', '');
        assertCodecError(() => chr(['-41']), 'InvalidHex', '-41');
        assertCodecError(() => chr(['U+0041']), 'InvalidHex', 'U+0041');
    });

    it('should stop at the first bad token', () => {
        assertCodecError(() => chr(['41', 'zz', '0x110000']), 'InvalidHex', 'zz');
    });

    it('should invert ord', () => {
        const texts = ['hello', 'あいうえお', SUSHI + '🍺', '👨‍💻👩‍🍳', '\u0000\u{10FFFF}'];
        for (const text of texts) {
            assert.strictEqual(chr(ord(text)), text);
            assert.strictEqual(chr(ord(text, { lowercase: true, noPrefix: true })), text);
        }
    });
});
