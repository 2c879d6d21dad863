/**
 * @fileoverview Character classification
 *
 * Maps one grapheme to its {@link CharacterClass}. Lookup order:
 *
 * 1. Space
 * 2. Letter table
 * 3. Digit table
 * 4. Emoji policy
 * 5. Special-symbol table
 * 6. Unmapped
 *
 * @module classify/classifyCharacter
 */

import type { CharacterClass } from "../contracts/CharacterClass.js";
import type { EmojiPolicy } from "../contracts/ConverterConfig.js";
import type { PhoneticTableSet } from "../contracts/PhoneticTable.js";

/**
 * Classify a single grapheme against a table set.
 *
 * @param grapheme - One grapheme cluster from the input
 * @param tables - Tables to look the grapheme up in
 * @param isEmoji - Emoji policy, consulted after letters and digits
 * @returns Exactly one character class
 *
 * @example
 * ```typescript
 * classifyCharacter("A", tables, isEmojiGrapheme);
 * // { kind: "letter", char: "A", word: "Alpha", letterCase: "upper" }
 * ```
 */
export function classifyCharacter(
    grapheme: string,
    tables: PhoneticTableSet,
    isEmoji: EmojiPolicy
): CharacterClass {
    if (grapheme === " ") {
        return { kind: "space", char: " " };
    }

    const letterWord = tables.letters.get(grapheme);
    if (letterWord !== undefined) {
        return {
            kind      : "letter",
            char      : grapheme,
            word      : letterWord,
            letterCase: grapheme === grapheme.toLowerCase() ? "lower" : "upper",
        };
    }

    const digitWord = tables.digits.get(grapheme);
    if (digitWord !== undefined) {
        return { kind: "digit", char: grapheme, word: digitWord };
    }

    if (isEmoji(grapheme)) {
        return { kind: "emoji", char: grapheme };
    }

    const specialWord = tables.specials.get(grapheme);
    if (specialWord !== undefined) {
        return { kind: "special", char: grapheme, word: specialWord };
    }

    return { kind: "unmapped", char: grapheme };
}
