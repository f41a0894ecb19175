import { entriesEqual, entryHash } from '../entries/entry.js';
import type { Entry } from '../schema/fields.js';
import { generateKey } from './generate-key.js';

/**
 * Letter suffix for the n-th member (0-based) of a collision group.
 * 0 → "a", 25 → "z", 26 → "aa", 27 → "ab", ...
 */
export function keySuffix(index: number): string {
    let n = index + 1;
    let suffix = '';
    while (n > 0) {
        n -= 1;
        suffix = String.fromCharCode(97 + (n % 26)) + suffix;
        n = Math.floor(n / 26);
    }
    return suffix;
}

const SUFFIX = /^[a-z]+$/;

/**
 * Base key an entry is grouped under. A key this module could have produced
 * (the generated key, bare or with a letter suffix) is recomputed; any other
 * key was chosen by the caller and is kept.
 */
function baseKey(entry: Entry): string {
    const generated = generateKey(entry);
    const { key } = entry;
    if (key === undefined || key === generated) return generated;

    const prefix = `${generated}.`;
    if (key.startsWith(prefix) && SUFFIX.test(key.slice(prefix.length))) {
        return generated;
    }
    return key;
}

/**
 * Stable value dedup: the first occurrence of each equal entry is kept.
 */
function dedupe(entries: readonly Entry[]): Entry[] {
    const buckets = new Map<string, Entry[]>();
    const retained: Entry[] = [];

    for (const entry of entries) {
        const hash = entryHash(entry);
        const bucket = buckets.get(hash) ?? [];
        if (bucket.some((kept) => entriesEqual(kept, entry))) continue;

        bucket.push(entry);
        buckets.set(hash, bucket);
        retained.push(entry);
    }

    return retained;
}

/**
 * Deduplicate a collection of citations and give every survivor a unique key.
 *
 * Keys are recomputed with `generateKey(entry)` unless the entry carries a
 * key the caller chose. Keys assigned by an earlier run count as generated, so
 * adding an entry and resolving again regroups it with its namesakes.
 * Entries whose base key is shared get `.a`, `.b`, ... in input order; a lone
 * entry keeps its base key unsuffixed.
 *
 * Returns new entry objects in input order; the input is not modified.
 * Running it again on its own output changes nothing.
 */
export function assignUniqueKeys(entries: readonly Entry[]): Entry[] {
    const retained = dedupe(entries);
    const baseKeys = retained.map(baseKey);

    const groups = new Map<string, number[]>();
    baseKeys.forEach((base, index) => {
        const members = groups.get(base);
        if (members) {
            members.push(index);
        } else {
            groups.set(base, [index]);
        }
    });

    // Unsuffixed keys are claimed first so a suffixed key never shadows one.
    const taken = new Set<string>();
    for (const [base, members] of groups) {
        if (members.length === 1) taken.add(base);
    }

    const resolved = new Map<number, string>();
    for (const [base, members] of groups) {
        if (members.length === 1) {
            for (const member of members) resolved.set(member, base);
            continue;
        }

        let next = 0;
        for (const member of members) {
            let candidate = `${base}.${keySuffix(next++)}`;
            while (taken.has(candidate)) {
                candidate = `${base}.${keySuffix(next++)}`;
            }
            taken.add(candidate);
            resolved.set(member, candidate);
        }
    }

    return retained.map((entry, index) => ({
        ...entry,
        key: resolved.get(index) ?? baseKeys[index] ?? generateKey(entry),
    }));
}
