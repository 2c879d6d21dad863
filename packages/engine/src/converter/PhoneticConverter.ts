/**
 * @fileoverview PhoneticConverter
 *
 * Spells text out as phonetic lines for dictation over a voice
 * channel, and reads such lines back.
 *
 * @module @phonetic-text/engine/converter/PhoneticConverter
 */

import type { ConverterConfig, ResolvedConverterConfig } from "../contracts/ConverterConfig.js";
import { decodePhonetic } from "./decodePhonetic.js";
import { encodePhonetic } from "./encodePhonetic.js";
import { resolveConverterConfig } from "./resolveConfig.js";

/**
 * Phonetic converter bound to one configuration.
 *
 * Instances hold no mutable state; encode and decode may be called
 * any number of times, in any order.
 *
 * @example
 * ```typescript
 * const converter = new PhoneticConverter({ includeCasePrefix: true });
 *
 * const spoken = converter.encode("aB");
 * // "a: Lowercase alpha\nB: Capital Bravo\nSTOP"
 *
 * converter.decode(spoken); // "aB"
 * ```
 */
export class PhoneticConverter {
    /** Resolved configuration used for both directions */
    public readonly config: ResolvedConverterConfig;

    constructor(config: ConverterConfig = {}) {
        this.config = resolveConverterConfig(config);
    }

    /**
     * Convert text into phonetic lines ending with `STOP`.
     */
    encode(text: string): string {
        return encodePhonetic(text, this.config);
    }

    /**
     * Convert phonetic lines back into text.
     */
    decode(phoneticText: string): string {
        return decodePhonetic(phoneticText, this.config);
    }
}
