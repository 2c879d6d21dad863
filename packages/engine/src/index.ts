/**
 * @fileoverview Phonetic Text Engine
 *
 * Spells text out character by character as unambiguous spoken words,
 * and reverses the spelling.
 *
 * The engine provides:
 * - Encoding: one phonetic line per character, ending with STOP
 * - Decoding: the original text from those lines
 * - Swappable tables loaded from YAML, NATO/ICAO by default
 * - Swappable emoji detection policy
 *
 * @module @phonetic-text/engine
 * @example
 * ```typescript
 * import { PhoneticConverter } from "@phonetic-text/engine";
 *
 * const converter = new PhoneticConverter();
 * converter.encode("Hi 9");
 * // "H: Hotel\ni: india\nSPACE\n9: Niner\nSTOP"
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    CharacterClass,
    CharacterKind,
    DigitCharacter,
    EmojiCharacter,
    LetterCase,
    LetterCharacter,
    SpaceCharacter,
    SpecialCharacter,
    UnmappedCharacter,
    PhoneticTable,
    PhoneticTableSet,
    ConverterConfig,
    EmojiPolicy,
    ResolvedConverterConfig,
    ConverterLogger,
} from "./contracts/index.js";
export {
    hasTableWord,
    createPhoneticTable,
    createPhoneticTableSet,
    joinerFor,
    consoleLogger,
    silentLogger,
} from "./contracts/index.js";

// ============================================================================
// Classification exports
// ============================================================================

export {
    classifyCharacter,
    isEmojiGrapheme,
    kMIN_EMOJI_CODE_POINT,
    firstGrapheme,
    splitGraphemes,
} from "./classify/index.js";

// ============================================================================
// Table exports
// ============================================================================

export {
    loadPhoneticTables,
    parsePhoneticTables,
    getDefaultPhoneticTables,
    loadPhoneticTablesWithFallback,
} from "./tables/index.js";

// ============================================================================
// Converter exports
// ============================================================================

export {
    PhoneticConverter,
    encodePhonetic,
    decodePhonetic,
    kDEFAULT_DELIMITER,
    resolveConverterConfig,
    kEMOJI_WORD,
    kSPACE_TOKEN,
    kSTOP_TOKEN,
    renderLine,
} from "./converter/index.js";
