/**
 * Phonetic Table Contract
 *
 * Immutable mappings from a single character to the word spoken for it.
 * A converter holds three of them: letters, digits and special symbols.
 */

/**
 * Read-only mapping from one character to its spoken word.
 */
export type PhoneticTable = ReadonlyMap<string, string>;

/**
 * The three tables a converter looks characters up in.
 */
export interface PhoneticTableSet {
    /** Upper and lower case letters, each with its own entry */
    readonly letters: PhoneticTable;

    /** Digits 0-9 */
    readonly digits: PhoneticTable;

    /** Punctuation and symbols, rendered without a colon */
    readonly specials: PhoneticTable;
}

/**
 * Build an immutable phonetic table from plain entries.
 *
 * The entries are copied into a private map; the returned table is a
 * frozen read-only view of it, with no mutators to reach.
 *
 * @param entries - Character/word pairs, or a record keyed by character
 * @returns Frozen read-only table
 *
 * @example
 * ```typescript
 * const digits = createPhoneticTable({ "0": "Zero", "1": "One" });
 * digits.get("1"); // "One"
 * ```
 */
export function createPhoneticTable(
    entries: Iterable<readonly [string, string]> | Readonly<Record<string, string>>
): PhoneticTable {
    const pairs: Iterable<readonly [string, string]> = isIterable(entries)
        ? entries
        : Object.entries(entries);

    const backing = new Map<string, string>(pairs);

    const table: PhoneticTable = {
        get size() {
            return backing.size;
        },
        get    : (key) => backing.get(key),
        has    : (key) => backing.has(key),
        entries: () => backing.entries(),
        keys   : () => backing.keys(),
        values : () => backing.values(),
        forEach(callback, thisArg) {
            backing.forEach((word, char) => callback.call(thisArg, word, char, table));
        },
        [Symbol.iterator]: () => backing.entries(),
    };

    return Object.freeze(table);
}

/**
 * Freeze a table set so neither the set nor its tables can change.
 */
export function createPhoneticTableSet(tables: PhoneticTableSet): PhoneticTableSet {
    return Object.freeze({
        letters : tables.letters,
        digits  : tables.digits,
        specials: tables.specials,
    });
}

function isIterable(
    value: Iterable<readonly [string, string]> | Readonly<Record<string, string>>
): value is Iterable<readonly [string, string]> {
    return Symbol.iterator in value;
}
