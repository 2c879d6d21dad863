/**
 * Character Class Contract
 *
 * The closed set of shapes a single input character can take.
 * Classification produces exactly one of these; rendering matches
 * over all of them.
 *
 * Design principles:
 * - Closed: every character lands in exactly one variant
 * - Explicit: unmapped characters are a variant, not a fallthrough
 * - Immutable: variants are plain readonly data
 */

/**
 * Letter case, derived from which table entry matched.
 */
export type LetterCase = "upper" | "lower";

/**
 * A character found in the letter table.
 */
export interface LetterCharacter {
    readonly kind: "letter";
    readonly char: string;
    readonly word: string;
    readonly letterCase: LetterCase;
}

/**
 * A character found in the digit table.
 */
export interface DigitCharacter {
    readonly kind: "digit";
    readonly char: string;
    readonly word: string;
}

/**
 * A character found in the special-symbol table.
 */
export interface SpecialCharacter {
    readonly kind: "special";
    readonly char: string;
    readonly word: string;
}

/**
 * The space character, rendered as a dedicated token.
 */
export interface SpaceCharacter {
    readonly kind: "space";
    readonly char: " ";
}

/**
 * A grapheme accepted by the emoji policy.
 */
export interface EmojiCharacter {
    readonly kind: "emoji";
    readonly char: string;
}

/**
 * Anything else. Echoes itself on encode.
 */
export interface UnmappedCharacter {
    readonly kind: "unmapped";
    readonly char: string;
}

/**
 * Tagged union over every character class.
 */
export type CharacterClass =
    | LetterCharacter
    | DigitCharacter
    | SpecialCharacter
    | SpaceCharacter
    | EmojiCharacter
    | UnmappedCharacter;

/**
 * Discriminator values of {@link CharacterClass}.
 */
export type CharacterKind = CharacterClass["kind"];

/**
 * Type guard for classes that carry a table word.
 */
export function hasTableWord(
    character: CharacterClass
): character is LetterCharacter | DigitCharacter | SpecialCharacter {
    return character.kind === "letter"
        || character.kind === "digit"
        || character.kind === "special";
}
