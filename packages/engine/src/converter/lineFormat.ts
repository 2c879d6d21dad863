/**
 * @fileoverview Phonetic line format
 *
 * Tokens and the per-class line shapes. Text produced elsewhere stays
 * decodable only while these spellings and separators match exactly:
 *
 * | Class    | Line                         |
 * |----------|------------------------------|
 * | space    | `SPACE`                      |
 * | emoji    | `<char>: Emoji`              |
 * | letter   | `<char>: [Capital |Lowercase ]<word>` |
 * | digit    | `<char>: <word>`             |
 * | special  | `<char> <word>`              |
 * | unmapped | `<char>: <char>`             |
 *
 * @module converter/lineFormat
 */

import type { CharacterClass, LetterCase } from "../contracts/CharacterClass.js";

/** Line emitted for a space character */
export const kSPACE_TOKEN = "SPACE";

/** Final line of every encoded text */
export const kSTOP_TOKEN = "STOP";

/** Word emitted for an emoji */
export const kEMOJI_WORD = "Emoji";

const kCASE_PREFIXES: Readonly<Record<LetterCase, string>> = {
    upper: "Capital ",
    lower: "Lowercase ",
};

/**
 * Render one classified character as a phonetic line.
 *
 * @param character - Classified character
 * @param includeCasePrefix - Prefix letter words with their case
 * @returns The line, without joiner
 *
 * @example
 * ```typescript
 * renderLine({ kind: "letter", char: "A", word: "Alpha", letterCase: "upper" }, true);
 * // "A: Capital Alpha"
 * renderLine({ kind: "special", char: ";", word: "Semicolon" }, false);
 * // "; Semicolon"
 * ```
 */
export function renderLine(character: CharacterClass, includeCasePrefix: boolean): string {
    switch (character.kind) {
        case "space":
            return kSPACE_TOKEN;
        case "emoji":
            return `${character.char}: ${kEMOJI_WORD}`;
        case "letter": {
            const prefix = includeCasePrefix ? kCASE_PREFIXES[character.letterCase] : "";
            return `${character.char}: ${prefix}${character.word}`;
        }
        case "digit":
            return `${character.char}: ${character.word}`;
        case "special":
            return `${character.char} ${character.word}`;
        case "unmapped":
            return `${character.char}: ${character.char}`;
        default: {
            const unhandled: never = character;
            return unhandled;
        }
    }
}
