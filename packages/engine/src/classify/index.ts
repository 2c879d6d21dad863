/**
 * @fileoverview Classification barrel exports
 *
 * @module @phonetic-text/engine/classify
 */

export { classifyCharacter } from "./classifyCharacter.js";
export { isEmojiGrapheme, kMIN_EMOJI_CODE_POINT } from "./emoji.js";
export { firstGrapheme, splitGraphemes } from "./graphemes.js";
