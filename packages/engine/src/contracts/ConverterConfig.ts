/**
 * Converter Configuration Contract
 *
 * Options that shape the phonetic line format. The same configuration
 * must be used to decode text that it encoded, since it decides how
 * lines are joined and split.
 */

import type { ConverterLogger } from "./Logger.js";
import type { PhoneticTableSet } from "./PhoneticTable.js";

/**
 * Predicate deciding whether a grapheme is rendered as an emoji line.
 */
export type EmojiPolicy = (grapheme: string) => boolean;

/**
 * Converter configuration options. Every field is optional.
 */
export interface ConverterConfig {
    /** Prefix letter words with "Capital " or "Lowercase " (default: false) */
    readonly includeCasePrefix?: boolean;

    /** Joiner used when newLineOutput is false (default: "\n") */
    readonly delimiter?: string;

    /** Join lines with "\n", ignoring delimiter (default: true) */
    readonly newLineOutput?: boolean;

    /** Lookup tables (default: bundled NATO/ICAO tables) */
    readonly tables?: PhoneticTableSet;

    /** Emoji detection policy (default: isEmojiGrapheme) */
    readonly isEmoji?: EmojiPolicy;

    /** Logger for converter operations (default: silentLogger) */
    readonly logger?: ConverterLogger;
}

/**
 * Fully populated, frozen configuration.
 */
export type ResolvedConverterConfig = Readonly<Required<ConverterConfig>>;

/**
 * Get the string lines are joined with, and split on, under a configuration.
 *
 * @example
 * ```typescript
 * joinerFor({ newLineOutput: false, delimiter: " | " }); // " | "
 * joinerFor({ newLineOutput: true, delimiter: " | " });  // "\n"
 * ```
 */
export function joinerFor(
    config: Pick<ResolvedConverterConfig, "newLineOutput" | "delimiter">
): string {
    return config.newLineOutput ? "\n" : config.delimiter;
}
