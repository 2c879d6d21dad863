/**
 * @fileoverview Converter configuration resolution
 *
 * @module converter/resolveConfig
 */

import { isEmojiGrapheme } from "../classify/emoji.js";
import type { ConverterConfig, ResolvedConverterConfig } from "../contracts/ConverterConfig.js";
import { silentLogger } from "../contracts/Logger.js";
import { getDefaultPhoneticTables } from "../tables/defaultTables.js";

/**
 * Default joiner, also the fallback for an empty delimiter.
 */
export const kDEFAULT_DELIMITER = "\n";

/**
 * Fill in defaults and freeze a configuration.
 *
 * An empty delimiter with `newLineOutput: false` can't be split again,
 * so it is replaced by {@link kDEFAULT_DELIMITER} with a warning.
 *
 * @param config - Partial configuration
 * @returns Frozen configuration with every field set
 */
export function resolveConverterConfig(config: ConverterConfig = {}): ResolvedConverterConfig {
    const logger = config.logger ?? silentLogger;
    const newLineOutput = config.newLineOutput ?? true;
    let delimiter = config.delimiter ?? kDEFAULT_DELIMITER;

    if (delimiter === "" && !newLineOutput) {
        logger.warn("Empty delimiter is not decodable, using newline", {
            delimiter: kDEFAULT_DELIMITER,
        });
        delimiter = kDEFAULT_DELIMITER;
    }

    return Object.freeze({
        includeCasePrefix: config.includeCasePrefix ?? false,
        delimiter,
        newLineOutput,
        tables           : config.tables ?? getDefaultPhoneticTables(),
        isEmoji          : config.isEmoji ?? isEmojiGrapheme,
        logger,
    });
}
