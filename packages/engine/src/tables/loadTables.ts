/**
 * @fileoverview Phonetic Table Loader
 *
 * Loads letter, digit and special-symbol tables from YAML files.
 *
 * @module tables/loadTables
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { splitGraphemes } from "../classify/graphemes.js";
import {
    createPhoneticTable,
    createPhoneticTableSet,
    type PhoneticTable,
    type PhoneticTableSet,
} from "../contracts/PhoneticTable.js";

/**
 * Section names in a table file, in lookup order.
 */
const kTABLE_SECTIONS = ["letters", "digits", "specials"] as const;

type TableSection = (typeof kTABLE_SECTIONS)[number];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate the contents of a table file.
 *
 * @param content - YAML text
 * @returns Frozen table set
 * @throws Error if the document shape or any entry is invalid
 */
export function parsePhoneticTables(content: string): PhoneticTableSet {
    const parsed: unknown = parseYaml(content);

    if (!isRecord(parsed) || !kTABLE_SECTIONS.every((section) => isRecord(parsed[section]))) {
        throw new Error("Invalid phonetic table file: expected { letters, digits, specials }");
    }

    const owners = new Map<string, TableSection>();

    const buildSection = (section: TableSection): PhoneticTable => {
        const raw = parsed[section];
        const entries: [string, string][] = [];

        for (const [char, word] of Object.entries(isRecord(raw) ? raw : {})) {
            if (splitGraphemes(char).length !== 1) {
                throw new Error(`Invalid ${section} entry "${char}": key must be a single character`);
            }

            if (char === " ") {
                throw new Error(`Invalid ${section} entry " ": the space character is reserved`);
            }

            if (typeof word !== "string" || word.trim() === "") {
                throw new Error(`Invalid ${section} entry "${char}": word must be a non-empty string`);
            }

            const owner = owners.get(char);
            if (owner) {
                throw new Error(`Duplicate entry "${char}" in ${owner} and ${section}`);
            }

            owners.set(char, section);
            entries.push([char, word]);
        }

        return createPhoneticTable(entries);
    };

    // Sections are built in lookup order so duplicates name the earlier owner first
    return createPhoneticTableSet({
        letters : buildSection("letters"),
        digits  : buildSection("digits"),
        specials: buildSection("specials"),
    });
}

/**
 * Load a table set from a YAML file.
 *
 * @param filePath - Path to the table file
 * @returns Frozen table set
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const tables = loadPhoneticTables("./config/phonetic.yml");
 * tables.letters.get("A"); // "Alpha"
 * ```
 */
export function loadPhoneticTables(filePath: string): PhoneticTableSet {
    if (!existsSync(filePath)) {
        throw new Error(`Phonetic table file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    return parsePhoneticTables(content);
}
