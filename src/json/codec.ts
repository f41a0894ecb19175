import { readFileSync, writeFileSync } from 'node:fs';
import { createEntry } from '../entries/entry.js';
import type { Entry } from '../schema/fields.js';
import { ParseError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * JSON form of a citation collection.
 *
 * Unlike BibTeX, the JSON document keeps every field, `key` and `app`
 * included, so a host can store plugin citations and restore them exactly.
 */
export function toJson(entries: readonly Entry[]): string {
    return JSON.stringify(entries);
}

export function fromJson(text: string): Entry[] {
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ParseError(`Invalid citation JSON: ${reason}`);
    }

    if (!Array.isArray(data)) {
        throw new ParseError('Citation JSON must be an array of entries');
    }

    return data.map((item: unknown) => createEntry(item));
}

export function writeJson(entries: readonly Entry[], outputPath: string): void {
    writeFileSync(outputPath, toJson(entries), 'utf-8');
    getLogger().debug({ outputPath, entries: entries.length }, 'Citation JSON written');
}

export function loadJson(inputPath: string): Entry[] {
    const entries = fromJson(readFileSync(inputPath, 'utf-8'));
    getLogger().debug({ inputPath, entries: entries.length }, 'Citation JSON loaded');
    return entries;
}
