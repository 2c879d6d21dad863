/**
 * @fileoverview Contract barrel exports
 *
 * Types and small helpers shared by the classifier, the table
 * loader and the converter.
 *
 * @module @phonetic-text/engine/contracts
 */

// Character classes
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
} from "./CharacterClass.js";
export { hasTableWord } from "./CharacterClass.js";

// Phonetic tables
export type { PhoneticTable, PhoneticTableSet } from "./PhoneticTable.js";
export {
    createPhoneticTable,
    createPhoneticTableSet,
} from "./PhoneticTable.js";

// Converter configuration
export type {
    ConverterConfig,
    EmojiPolicy,
    ResolvedConverterConfig,
} from "./ConverterConfig.js";
export { joinerFor } from "./ConverterConfig.js";

// Logger
export type { ConverterLogger } from "./Logger.js";
export { consoleLogger, silentLogger } from "./Logger.js";
