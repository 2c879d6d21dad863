/**
 * @fileoverview Unit tests for character classification
 *
 * Tests cover:
 * - Lookup order across space, letters, digits, emoji and specials
 * - Unmapped fallback
 * - Default emoji policy and its threshold
 * - Grapheme segmentation
 *
 * @module @phonetic-text/engine/__tests__/classifyCharacter
 */

import { describe, it, expect } from "vitest";
import { classifyCharacter } from "../classify/classifyCharacter.js";
import { isEmojiGrapheme, kMIN_EMOJI_CODE_POINT } from "../classify/emoji.js";
import { firstGrapheme, splitGraphemes } from "../classify/graphemes.js";
import { hasTableWord } from "../contracts/CharacterClass.js";
import { getDefaultPhoneticTables } from "../tables/defaultTables.js";

describe("classifyCharacter", () => {
    const tables = getDefaultPhoneticTables();
    const classify = (grapheme: string) => classifyCharacter(grapheme, tables, isEmojiGrapheme);

    // Scenario: Uppercase letter
    it("should classify an uppercase letter", () => {
        expect(classify("A")).toEqual({
            kind      : "letter",
            char      : "A",
            word      : "Alpha",
            letterCase: "upper",
        });
    });

    // Scenario: Lowercase letter
    it("should classify a lowercase letter", () => {
        expect(classify("z")).toEqual({
            kind      : "letter",
            char      : "z",
            word      : "zulu",
            letterCase: "lower",
        });
    });

    // Scenario: Digit
    it("should classify a digit", () => {
        expect(classify("9")).toEqual({ kind: "digit", char: "9", word: "Niner" });
    });

    // Scenario: Space gets its own class
    it("should classify a space", () => {
        expect(classify(" ")).toEqual({ kind: "space", char: " " });
    });

    // Scenario: Special symbol
    it("should classify a special symbol", () => {
        expect(classify(";")).toEqual({ kind: "special", char: ";", word: "Semicolon" });
    });

    // Scenario: Symbols flagged as emoji by Unicode but below the threshold
    it("should classify '#' and '*' as specials, not emoji", () => {
        expect(classify("#")).toEqual({ kind: "special", char: "#", word: "Hash" });
        expect(classify("*")).toEqual({ kind: "special", char: "*", word: "Asterisk" });
    });

    // Scenario: Emoji
    it("should classify an emoji", () => {
        expect(classify("😀")).toEqual({ kind: "emoji", char: "😀" });
    });

    // Scenario: Anything else
    it("should classify other characters as unmapped", () => {
        expect(classify("é")).toEqual({ kind: "unmapped", char: "é" });
        expect(classify("\t")).toEqual({ kind: "unmapped", char: "\t" });
    });

    // Scenario: Letters and digits win over the emoji policy
    it("should consult the emoji policy after letters and digits", () => {
        const everything = () => true;

        expect(classifyCharacter("A", tables, everything).kind).toBe("letter");
        expect(classifyCharacter("1", tables, everything).kind).toBe("digit");
        expect(classifyCharacter(";", tables, everything).kind).toBe("emoji");
    });
});

describe("hasTableWord", () => {
    // Scenario: Only table classes carry a word
    it("should be true for letters, digits and specials only", () => {
        expect(hasTableWord({ kind: "letter", char: "a", word: "alpha", letterCase: "lower" })).toBe(true);
        expect(hasTableWord({ kind: "digit", char: "1", word: "One" })).toBe(true);
        expect(hasTableWord({ kind: "special", char: "+", word: "Plus" })).toBe(true);
        expect(hasTableWord({ kind: "space", char: " " })).toBe(false);
        expect(hasTableWord({ kind: "emoji", char: "😀" })).toBe(false);
        expect(hasTableWord({ kind: "unmapped", char: "é" })).toBe(false);
    });
});

describe("isEmojiGrapheme", () => {
    // Scenario: Pictographs above the threshold
    it("should accept emoji", () => {
        expect(isEmojiGrapheme("😀")).toBe(true);
        expect(isEmojiGrapheme("👍🏽")).toBe(true);
        expect(isEmojiGrapheme("🚀")).toBe(true);
        expect(isEmojiGrapheme("❤️")).toBe(true);
    });

    // Scenario: Emoji-property characters at or below the threshold
    it("should reject symbols at or below the threshold", () => {
        expect(kMIN_EMOJI_CODE_POINT).toBe(0x238c);
        expect(isEmojiGrapheme("#")).toBe(false);
        expect(isEmojiGrapheme("5")).toBe(false);
        expect(isEmojiGrapheme("©")).toBe(false);
        expect(isEmojiGrapheme("™")).toBe(false);
    });

    // Scenario: Plain text and empty input
    it("should reject letters and the empty string", () => {
        expect(isEmojiGrapheme("a")).toBe(false);
        expect(isEmojiGrapheme("")).toBe(false);
    });
});

describe("graphemes", () => {
    // Scenario: Multi-code-point emoji stay whole
    it("should split text into grapheme clusters", () => {
        expect(splitGraphemes("a👍🏽b")).toEqual(["a", "👍🏽", "b"]);
        expect(splitGraphemes("👨‍👩‍👧🇺🇸")).toEqual(["👨‍👩‍👧", "🇺🇸"]);
        expect(splitGraphemes("")).toEqual([]);
    });

    // Scenario: First grapheme of a line
    it("should return the first grapheme or undefined", () => {
        expect(firstGrapheme("👍🏽: Emoji")).toBe("👍🏽");
        expect(firstGrapheme("A: Alpha")).toBe("A");
        expect(firstGrapheme("")).toBeUndefined();
    });
});
