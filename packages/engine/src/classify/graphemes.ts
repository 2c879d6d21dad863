/**
 * @fileoverview Grapheme segmentation
 *
 * Input is walked one user-perceived character at a time, so an emoji
 * built from several code points (skin tones, ZWJ sequences, flags)
 * stays a single unit through encode and decode.
 *
 * @module classify/graphemes
 */

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * Split text into extended grapheme clusters.
 *
 * @example
 * ```typescript
 * splitGraphemes("a👍🏽b"); // ["a", "👍🏽", "b"]
 * ```
 */
export function splitGraphemes(text: string): string[] {
    return Array.from(segmenter.segment(text), (part) => part.segment);
}

/**
 * Get the first grapheme of a string, or undefined when it is empty.
 */
export function firstGrapheme(text: string): string | undefined {
    for (const part of segmenter.segment(text)) {
        return part.segment;
    }
    return undefined;
}
