/**
 * @fileoverview Phonetic encoder
 *
 * @module converter/encodePhonetic
 */

import { classifyCharacter } from "../classify/classifyCharacter.js";
import { splitGraphemes } from "../classify/graphemes.js";
import type { ConverterConfig } from "../contracts/ConverterConfig.js";
import { joinerFor } from "../contracts/ConverterConfig.js";
import { kSTOP_TOKEN, renderLine } from "./lineFormat.js";
import { resolveConverterConfig } from "./resolveConfig.js";

/**
 * Encode text as phonetic lines, one per grapheme, followed by `STOP`.
 *
 * Pure: the same input and configuration always give the same output.
 *
 * @param input - Text to spell out
 * @param config - Converter configuration
 * @returns Phonetic text joined by newline or the configured delimiter
 *
 * @example
 * ```typescript
 * encodePhonetic("A1;");
 * // "A: Alpha\n1: One\n; Semicolon\nSTOP"
 *
 * encodePhonetic("AB", { newLineOutput: false, delimiter: " | " });
 * // "A: Alpha | B: Bravo | STOP"
 * ```
 */
export function encodePhonetic(input: string, config: ConverterConfig = {}): string {
    const resolved = resolveConverterConfig(config);
    const lines: string[] = [];
    let unmapped = 0;

    for (const grapheme of splitGraphemes(input)) {
        const character = classifyCharacter(grapheme, resolved.tables, resolved.isEmoji);

        if (character.kind === "unmapped") {
            unmapped++;
            resolved.logger.debug("Unmapped character echoed", { character: character.char });
        }

        lines.push(renderLine(character, resolved.includeCasePrefix));
    }

    lines.push(kSTOP_TOKEN);

    resolved.logger.debug("Encoded text", {
        characters: lines.length - 1,
        unmapped,
    });

    return lines.join(joinerFor(resolved));
}
