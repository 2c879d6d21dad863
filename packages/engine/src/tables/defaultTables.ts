/**
 * @fileoverview Default phonetic tables
 *
 * The NATO/ICAO spelling alphabet, digits with the radiotelephony
 * "Niner", and the symbols of a US keyboard. Built once at module
 * start and shared by reference; YAML table files only replace them.
 *
 * @module tables/defaultTables
 */

import type { ConverterLogger } from "../contracts/Logger.js";
import { consoleLogger } from "../contracts/Logger.js";
import {
    createPhoneticTable,
    createPhoneticTableSet,
    type PhoneticTableSet,
} from "../contracts/PhoneticTable.js";
import { loadPhoneticTables } from "./loadTables.js";

/**
 * Capitalised letter words, A to Z. Lowercase entries use the same
 * words in lowercase.
 */
const kLETTER_WORDS = [
    "Alpha", "Bravo", "Charlie", "Delta", "Echo", "Foxtrot", "Golf",
    "Hotel", "India", "Juliett", "Kilo", "Lima", "Mike", "November",
    "Oscar", "Papa", "Quebec", "Romeo", "Sierra", "Tango", "Uniform",
    "Victor", "Whiskey", "Xray", "Yankee", "Zulu",
] as const;

/**
 * Digit words, 0 to 9.
 */
const kDIGIT_WORDS = [
    "Zero", "One", "Two", "Three", "Four",
    "Five", "Six", "Seven", "Eight", "Niner",
] as const;

const kSPECIAL_WORDS: Readonly<Record<string, string>> = {
    ";" : "Semicolon",
    ":" : "Colon",
    "," : "Comma",
    "." : "Period",
    "!" : "Exclamation",
    "?" : "Question Mark",
    "'" : "Apostrophe",
    "\"": "Quotation",
    "(" : "Open Parenthesis",
    ")" : "Close Parenthesis",
    "[" : "Open Bracket",
    "]" : "Close Bracket",
    "{" : "Open Brace",
    "}" : "Close Brace",
    "-" : "Hyphen",
    "_" : "Underscore",
    "+" : "Plus",
    "=" : "Equals",
    "/" : "Slash",
    "\\": "Backslash",
    "*" : "Asterisk",
    "&" : "Ampersand",
    "^" : "Caret",
    "%" : "Percent",
    "$" : "Dollar",
    "#" : "Hash",
    "@" : "At",
    "`" : "Backtick",
    "~" : "Tilde",
    "<" : "Less Than",
    ">" : "Greater Than",
    "|" : "Pipe",
};

const kDEFAULT_TABLES: PhoneticTableSet = createPhoneticTableSet({
    letters: createPhoneticTable([
        ...kLETTER_WORDS.map((word): [string, string] => [word.charAt(0), word]),
        ...kLETTER_WORDS.map((word): [string, string] => [word.charAt(0).toLowerCase(), word.toLowerCase()]),
    ]),
    digits  : createPhoneticTable(kDIGIT_WORDS.map((word, digit): [string, string] => [String(digit), word])),
    specials: createPhoneticTable(kSPECIAL_WORDS),
});

/**
 * Get the built-in table set. Always the same instance.
 */
export function getDefaultPhoneticTables(): PhoneticTableSet {
    return kDEFAULT_TABLES;
}

/**
 * Load a table set with fallback to the built-in tables.
 *
 * @param filePath - Path to the table file
 * @param logger - Receives a warning when the file can't be used
 * @returns The loaded tables, or the built-in ones on failure
 */
export function loadPhoneticTablesWithFallback(
    filePath: string,
    logger: ConverterLogger = consoleLogger
): PhoneticTableSet {
    try {
        return loadPhoneticTables(filePath);
    }
    catch (error) {
        logger.warn("Failed to load phonetic tables, using defaults", {
            filePath,
            error: error instanceof Error ? error.message : String(error),
        });
        return kDEFAULT_TABLES;
    }
}
