/**
 * @fileoverview Phonetic decoder
 *
 * Recovers one character per line. Every line shape except `SPACE`
 * starts with the original character, so decoding never needs the
 * tables and never fails: a line in an unexpected shape still yields
 * its first grapheme.
 *
 * @module converter/decodePhonetic
 */

import { firstGrapheme } from "../classify/graphemes.js";
import type { ConverterConfig } from "../contracts/ConverterConfig.js";
import { joinerFor } from "../contracts/ConverterConfig.js";
import { kSPACE_TOKEN, kSTOP_TOKEN } from "./lineFormat.js";
import { resolveConverterConfig } from "./resolveConfig.js";

/**
 * Check that a line has one of the shapes encode emits after its
 * leading character: `<char>: ...` or `<char> <word>`.
 */
function isEncodedLine(line: string, char: string): boolean {
    const rest = line.slice(char.length);
    return rest.startsWith(": ") || (rest.startsWith(" ") && rest.length > 1);
}

/**
 * Decode phonetic text back into the original string.
 *
 * Must be called with the configuration that encoded the text, since
 * it decides the joiner lines are split on.
 *
 * @param phoneticText - Text produced by {@link encodePhonetic}
 * @param config - Converter configuration
 * @returns The recovered string; best effort for malformed input
 *
 * @example
 * ```typescript
 * decodePhonetic("A: Alpha\nSPACE\n; Semicolon\nSTOP"); // "A ;"
 * ```
 */
export function decodePhonetic(phoneticText: string, config: ConverterConfig = {}): string {
    const resolved = resolveConverterConfig(config);
    const lines = phoneticText.trim().split(joinerFor(resolved));

    if (lines[lines.length - 1] === kSTOP_TOKEN) {
        lines.pop();
    }
    else {
        resolved.logger.debug("Terminator missing, decoding all lines", { lines: lines.length });
    }

    let output = "";
    let characters = 0;
    let unrecognised = 0;

    for (const line of lines) {
        if (line === kSPACE_TOKEN) {
            output += " ";
            characters++;
            continue;
        }

        const char = firstGrapheme(line);
        if (char === undefined) {
            continue;
        }

        if (!isEncodedLine(line, char)) {
            unrecognised++;
            resolved.logger.debug("Unrecognised line, using first character", { line });
        }

        output += char;
        characters++;
    }

    resolved.logger.debug("Decoded text", { characters, unrecognised });

    return output;
}
