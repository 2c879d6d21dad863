/**
 * @fileoverview Table barrel exports
 *
 * @module @phonetic-text/engine/tables
 */

export { loadPhoneticTables, parsePhoneticTables } from "./loadTables.js";
export {
    getDefaultPhoneticTables,
    loadPhoneticTablesWithFallback,
} from "./defaultTables.js";
