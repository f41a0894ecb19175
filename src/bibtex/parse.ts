import { createEntry } from '../entries/entry.js';
import {
    CITATION_KEY,
    FIELD_SCHEMA,
    variantForTag,
    type Entry,
    type FieldSpec,
} from '../schema/fields.js';
import { ParseError } from '../utils/errors.js';

/** Top-level blocks that carry no citation and are skipped. */
const IGNORED_TAGS = new Set(['comment', 'preamble', 'string']);

const RECORD_OPEN = /@\s*([A-Za-z]+)\s*/y;
const FIELD_NAME = /[A-Za-z][\w:.-]*/y;
const INTEGER = /^[+-]?\d+$/;

interface RawRecord {
    tag: string;
    key: string;
    /** Field name (lowercase) → raw value and the offset it starts at. */
    fields: Map<string, { value: string; offset: number }>;
    /** Offset of the record's '@'. */
    offset: number;
    /** Whole input, kept for turning offsets into line numbers. */
    source: string;
}

function lineAt(text: string, index: number): number {
    let line = 1;
    for (let i = 0; i < index && i < text.length; i++) {
        if (text[i] === '\n') line++;
    }
    return line;
}

function isSpace(ch: string | undefined): boolean {
    return ch !== undefined && /\s/.test(ch);
}

/**
 * Index just past the brace that closes the one at `open`, or -1 when the
 * text ends first. Backslash-escaped braces do not count.
 */
function matchBrace(text: string, open: number, limit = text.length): number {
    let depth = 0;
    for (let i = open; i < limit; i++) {
        const ch = text[i];
        if (ch === '\\') {
            i++;
        } else if (ch === '{') {
            depth++;
        } else if (ch === '}') {
            depth--;
            if (depth === 0) return i + 1;
        }
    }
    return -1;
}

function isRecordTag(tag: string): boolean {
    return IGNORED_TAGS.has(tag.toLowerCase()) || variantForTag(tag) !== null;
}

// ─── Field values ────────────────────────────────────────

/**
 * Read one field value starting at `start`. Braced values may nest; quoted
 * values may hold braces; bare values run to the next comma.
 */
function readValue(
    text: string,
    start: number,
    limit: number,
    name: string
): { value: string; end: number } {
    const first = text[start];

    if (first === '{') {
        const end = matchBrace(text, start, limit);
        if (end === -1) {
            throw new ParseError(`Unbalanced braces in field '${name}'`, lineAt(text, start));
        }
        return { value: text.slice(start + 1, end - 1), end };
    }

    if (first === '"') {
        let depth = 0;
        for (let i = start + 1; i < limit; i++) {
            const ch = text[i];
            if (ch === '\\') {
                i++;
            } else if (ch === '{') {
                depth++;
            } else if (ch === '}') {
                depth--;
            } else if (ch === '"' && depth === 0) {
                return { value: text.slice(start + 1, i), end: i + 1 };
            }
        }
        throw new ParseError(`Unterminated quoted value in field '${name}'`, lineAt(text, start));
    }

    let end = start;
    while (end < limit && text[end] !== ',') end++;
    const value = text.slice(start, end).trim();
    if (!value) {
        throw new ParseError(`Field '${name}' has no value`, lineAt(text, start));
    }
    return { value, end };
}

function readFields(text: string, start: number, limit: number): RawRecord['fields'] {
    const fields: RawRecord['fields'] = new Map();
    let pos = start;

    const skipSpace = () => {
        while (pos < limit && isSpace(text[pos])) pos++;
    };

    for (;;) {
        while (pos < limit && (isSpace(text[pos]) || text[pos] === ',')) pos++;
        if (pos >= limit) break;

        FIELD_NAME.lastIndex = pos;
        const match = FIELD_NAME.exec(text);
        if (!match || match.index >= limit) {
            throw new ParseError(
                `Expected a field name, found "${text.slice(pos, Math.min(pos + 20, limit)).trim()}"`,
                lineAt(text, pos)
            );
        }

        const name = match[0].toLowerCase();
        const offset = pos;
        pos += match[0].length;

        skipSpace();
        if (text[pos] !== '=') {
            throw new ParseError(`Field '${name}' is missing '='`, lineAt(text, offset));
        }
        pos++;
        skipSpace();

        const { value, end } = readValue(text, pos, limit, name);
        fields.set(name, { value, offset });
        pos = end;
    }

    return fields;
}

// ─── Records ─────────────────────────────────────────────

/**
 * Split text into raw records. Text between records is ignored, as are
 * @comment, @preamble and @string blocks.
 */
function scanRecords(text: string): RawRecord[] {
    const records: RawRecord[] = [];
    let pos = 0;

    for (;;) {
        const at = text.indexOf('@', pos);
        if (at === -1) break;

        RECORD_OPEN.lastIndex = at;
        const open = RECORD_OPEN.exec(text);
        if (!open?.[1] || /\w/.test(text[at - 1] ?? '')) {
            // A stray '@' in free text between records, e.g. an email address.
            pos = at + 1;
            continue;
        }

        const tag = open[1];
        const brace = at + open[0].length;
        if (text[brace] !== '{') {
            // `@misc(...)` is a record in the parenthesized form, which is not supported.
            if (text[brace] === '(' && isRecordTag(tag)) {
                throw new ParseError(`Expected '{' after @${tag}`, lineAt(text, at));
            }
            pos = at + 1;
            continue;
        }

        const end = matchBrace(text, brace);
        if (end === -1) {
            throw new ParseError(`Unbalanced braces in @${tag} record`, lineAt(text, at));
        }
        pos = end;

        if (IGNORED_TAGS.has(tag.toLowerCase())) continue;

        const bodyStart = brace + 1;
        const bodyEnd = end - 1;
        const comma = text.indexOf(',', bodyStart);
        const keyEnd = comma === -1 || comma > bodyEnd ? bodyEnd : comma;
        const key = text.slice(bodyStart, keyEnd).trim();

        if (!CITATION_KEY.test(key)) {
            throw new ParseError(
                `Could not read the citation key of @${tag} record`,
                lineAt(text, at)
            );
        }

        records.push({
            tag,
            key,
            fields: keyEnd === bodyEnd ? new Map() : readFields(text, keyEnd + 1, bodyEnd),
            offset: at,
            source: text,
        });
    }

    return records;
}

// ─── Value coercion ──────────────────────────────────────

function normalizeName(raw: string): string {
    const name = raw.trim();
    if (name.includes(',')) return name;

    const tokens = name.split(' ');
    return tokens.length === 2 ? `${tokens[1]}, ${tokens[0]}` : name;
}

/**
 * Split an author/editor list on " and ", rewriting "First Last" as
 * "Last, First". Other name forms are kept as written.
 */
export function parseNames(raw: string): string[] {
    return raw
        .replace(/\s+/g, ' ')
        .trim()
        .split(' and ')
        .map(normalizeName);
}

/**
 * Convert a raw value to its field kind. `at` is only turned into a line
 * number when the value is rejected.
 */
function coerce(spec: FieldSpec, raw: string, source: string, at: number): string | number | string[] {
    switch (spec.kind) {
        case 'integer': {
            const text = raw.trim();
            if (!INTEGER.test(text)) {
                throw new ParseError(
                    `Field '${spec.name}' expects an integer; received "${raw}"`,
                    lineAt(source, at)
                );
            }
            const value = Number.parseInt(text, 10);
            if (!Number.isSafeInteger(value)) {
                throw new ParseError(
                    `Field '${spec.name}' is too large for an integer; received "${raw}"`,
                    lineAt(source, at)
                );
            }
            return value;
        }
        case 'names':
            return parseNames(raw);
        case 'string':
            return raw;
    }
}

function buildEntry(record: RawRecord): Entry {
    const variant = variantForTag(record.tag);
    if (!variant) {
        throw new ParseError(
            `Unsupported BibTeX entry type: @${record.tag.toLowerCase()}`,
            lineAt(record.source, record.offset)
        );
    }

    const input: Record<string, unknown> = { type: variant.type, key: record.key };
    if (variant.thesisType) {
        input['thesis_type'] = variant.thesisType;
    }

    for (const spec of FIELD_SCHEMA[variant.type]) {
        const raw = record.fields.get(spec.name);
        // `field = {}` is treated as an absent field.
        if (raw && raw.value.trim() !== '') {
            input[spec.name] = coerce(spec, raw.value, record.source, raw.offset);
        }
    }

    return createEntry(input);
}

/**
 * Parse text holding exactly one BibTeX record into a validated entry.
 * The record's key is kept verbatim; unknown fields are ignored.
 */
export function fromBibtex(text: string): Entry {
    const records = scanRecords(text);

    if (records.length === 0) {
        throw new ParseError('No BibTeX record found in input');
    }
    if (records.length > 1) {
        throw new ParseError(
            `Expected exactly one BibTeX record; found ${records.length}`,
            records[1] && lineAt(text, records[1].offset)
        );
    }

    const [record] = records;
    if (!record) {
        throw new ParseError('No BibTeX record found in input');
    }
    return buildEntry(record);
}

/**
 * Parse every record of a bibliography file, in order.
 */
export function parseBibliography(text: string): Entry[] {
    return scanRecords(text).map(buildEntry);
}
