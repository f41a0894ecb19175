import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parseBibliography } from '../bibtex/parse.js';
import { writeBibliography } from '../bibtex/writer.js';
import { summarizeEntry } from '../entries/entry.js';
import { loadJson } from '../json/codec.js';
import { assignUniqueKeys } from '../keys/resolve-keys.js';
import type { Entry } from '../schema/fields.js';
import { getLogger } from '../utils/logger.js';

/**
 * Load citations from a file: `.json` files use the JSON codec, anything
 * else is read as a BibTeX bibliography.
 */
export function loadCitationFile(inputPath: string): Entry[] {
    if (extname(inputPath).toLowerCase() === '.json') {
        return loadJson(inputPath);
    }
    return parseBibliography(readFileSync(inputPath, 'utf-8'));
}

export interface MergeResult {
    /** Entries read across all inputs */
    read: number;
    /** Entries written after value dedup */
    written: number;
    outputPath: string;
}

/**
 * Merge citation files into one bibliography with unique keys.
 */
export function mergeCitationFiles(inputPaths: readonly string[], outputPath: string): MergeResult {
    const logger = getLogger();
    const entries: Entry[] = [];

    for (const inputPath of inputPaths) {
        const loaded = loadCitationFile(inputPath);
        logger.debug({ inputPath, entries: loaded.length }, 'Loaded citations');
        entries.push(...loaded);
    }

    const resolved = assignUniqueKeys(entries);
    writeBibliography(resolved, outputPath);

    const result = { read: entries.length, written: resolved.length, outputPath };
    logger.info(
        { ...result, duplicates: result.read - result.written },
        'Bibliography merged'
    );
    return result;
}

/**
 * One summary line per citation: `<app>\t<citation>`, or just the citation
 * when the entry names no app.
 */
export function describeCitationFiles(inputPaths: readonly string[]): string[] {
    return inputPaths.flatMap((inputPath) =>
        loadCitationFile(inputPath).map((entry) => {
            const { app, citation } = summarizeEntry(entry);
            return app ? `${app}\t${citation}` : citation;
        })
    );
}
