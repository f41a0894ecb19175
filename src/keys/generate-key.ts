import type { Entry } from '../schema/fields.js';

const FALLBACK_SURNAME = 'Anon';

/**
 * Surname of a single author name.
 * "Huttley, Gavin" → "Huttley"; "Jane Smith" → "Smith"
 */
export function extractSurname(name: string): string {
    const comma = name.indexOf(',');
    if (comma !== -1) {
        return name.slice(0, comma).trim();
    }
    const tokens = name.trim().split(/\s+/);
    return tokens[tokens.length - 1] ?? '';
}

/**
 * Default citation key from the first author and year: `"{Surname}.{year}"`.
 *
 * Non-ASCII characters, whitespace and characters a citation key cannot hold
 * are stripped from the surname before it is title-cased, so
 * "van Rossum, Guido" gives "Vanrossum".
 */
export function generateKey(entry: Entry): string {
    const cleaned = extractSurname(entry.author[0] ?? '')
        .replace(/[^\u0000-\u007f]/g, '')
        .replace(/[\s,{}"=#%]+/g, '');

    const surname =
        cleaned.length > 0
            ? cleaned.charAt(0).toUpperCase() + cleaned.slice(1).toLowerCase()
            : FALLBACK_SURNAME;

    return `${surname}.${entry.year}`;
}
