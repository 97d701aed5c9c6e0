export * as io from './io/index.js';

export {
    bin2hex,
    hex2bin,
    hex2bytes,
    scrub,
    escape,
    unescape,
    scanEscape,
    toSurrogatePair,
    fromSurrogatePair,
    ord,
    chr,
} from './codecs/index.js';
export type { EscapeStep, HexEncodeOptions, OrdOptions } from './codecs/index.js';

export {
    graphemes,
    splitUnits,
    countUnits,
    takeUnits,
    dropUnits,
    IntlGraphemeSegmenter,
    getDefaultSegmenter,
} from './units/index.js';
export type { GraphemeSegmenter } from './units/index.js';

export { describeGraphemes, dumpGraphemes, formatCodePoint } from './dump.js';
export type { CodepointInfo, GraphemeInfo, DumpOptions } from './dump.js';

export { createNameLookup } from './names.js';
export type { CharacterNameLookup } from './names.js';

export { CodecError, CodecErrorKind, isCodecError } from './errors.js';
export type { CodecErrorDetails } from './errors.js';

export {
    MAX_CODEPOINT,
    REPLACEMENT_CHARACTER,
    HexFormat,
    EscapeFormat,
    InputFormat,
    ProcessingMode,
    DumpFormat,
    isCodePoint,
    isScalarValue,
    isHighSurrogate,
    isLowSurrogate,
    isSurrogate,
    isHexFormat,
    isEscapeFormat,
    isInputFormat,
    isProcessingMode,
    isDumpFormat,
} from './types.js';
export type { CodePoint, CodeUnit, ScalarValue } from './types.js';
