import { writeFileSync } from 'node:fs';
import { assignUniqueKeys } from '../keys/resolve-keys.js';
import type { Entry } from '../schema/fields.js';
import { getLogger } from '../utils/logger.js';
import { toBibtex } from './serialize.js';

/**
 * Render a collection as a bibliography body: duplicates dropped, keys made
 * unique, records separated by exactly one blank line.
 */
export function formatBibliography(entries: readonly Entry[]): string {
    return joinRecords(renderRecords(entries));
}

function renderRecords(entries: readonly Entry[]): string[] {
    return assignUniqueKeys(entries).map(toBibtex);
}

function joinRecords(records: readonly string[]): string {
    return records.length === 0 ? '' : `${records.join('\n\n')}\n`;
}

/**
 * Format a collection and write it to `outputPath` as UTF-8.
 */
export function writeBibliography(entries: readonly Entry[], outputPath: string): void {
    const records = renderRecords(entries);
    writeFileSync(outputPath, joinRecords(records), 'utf-8');
    getLogger().debug({ outputPath, records: records.length }, 'Bibliography written');
}
