/**
 * @fileoverview Converter barrel exports
 *
 * @module @phonetic-text/engine/converter
 */

export { PhoneticConverter } from "./PhoneticConverter.js";
export { encodePhonetic } from "./encodePhonetic.js";
export { decodePhonetic } from "./decodePhonetic.js";
export { kDEFAULT_DELIMITER, resolveConverterConfig } from "./resolveConfig.js";
export {
    kEMOJI_WORD,
    kSPACE_TOKEN,
    kSTOP_TOKEN,
    renderLine,
} from "./lineFormat.js";
