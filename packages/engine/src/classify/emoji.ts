/**
 * @fileoverview Emoji detection policy
 *
 * Approximate: a grapheme counts as an emoji when its first code point
 * carries the Unicode `Emoji` property and sits above
 * {@link kMIN_EMOJI_CODE_POINT}. The threshold keeps out `#`, `*`,
 * digits, `©`, `®` and other symbols the property also flags, but it
 * will still misclassify some pictographic symbols either way. Callers
 * that need something stricter pass their own policy through
 * `ConverterConfig.isEmoji`.
 *
 * @module classify/emoji
 */

/**
 * Code points at or below this value are never treated as emoji.
 */
export const kMIN_EMOJI_CODE_POINT = 0x238c;

const kEMOJI_PROPERTY = /^\p{Emoji}$/u;

/**
 * Default emoji policy.
 *
 * @param grapheme - A single grapheme cluster
 * @returns True when the grapheme should be rendered as an emoji line
 *
 * @example
 * ```typescript
 * isEmojiGrapheme("😀"); // true
 * isEmojiGrapheme("#");  // false
 * ```
 */
export function isEmojiGrapheme(grapheme: string): boolean {
    const codePoint = grapheme.codePointAt(0);
    if (codePoint === undefined || codePoint <= kMIN_EMOJI_CODE_POINT) {
        return false;
    }

    return kEMOJI_PROPERTY.test(String.fromCodePoint(codePoint));
}
