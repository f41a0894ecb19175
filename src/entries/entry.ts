import { createHash } from 'node:crypto';
import { ZodIssueCode, ZodParsedType, type ZodIssue, type ZodTypeDef, type ZodType } from 'zod';
import {
    ArticleSchema,
    BookSchema,
    ENTRY_SCHEMAS,
    ENTRY_TYPES,
    InProceedingsSchema,
    MiscSchema,
    SoftwareSchema,
    TechReportSchema,
    ThesisSchema,
    fieldValues,
    typeTag,
    type Article,
    type Book,
    type Entry,
    type EntryFields,
    type EntryType,
    type FieldValue,
    type InProceedings,
    type Misc,
    type Software,
    type TechReport,
    type Thesis,
} from '../schema/fields.js';
import { ValidationError } from '../utils/errors.js';
import { extractSurname } from '../keys/generate-key.js';

// ─── Validation ──────────────────────────────────────────

function describeIssue(entryType: EntryType, issue: ZodIssue): ValidationError {
    const field = issue.path.length > 0 ? String(issue.path[0]) : 'entry';

    if (issue.code === ZodIssueCode.custom) {
        return new ValidationError(issue.message, entryType, field);
    }
    if (
        issue.code === ZodIssueCode.invalid_type &&
        (issue.received === ZodParsedType.undefined || issue.received === ZodParsedType.null)
    ) {
        return new ValidationError(`${entryType} requires '${field}'; received none`, entryType, field);
    }
    if (issue.code === ZodIssueCode.too_small && issue.path.length === 1) {
        return new ValidationError(`${entryType} field '${field}' must not be empty`, entryType, field);
    }
    return new ValidationError(
        `${entryType} field '${field}' is invalid: ${issue.message}`,
        entryType,
        field
    );
}

function validate<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    entryType: EntryType,
    input: unknown
): T {
    const result = schema.safeParse(input);
    if (!result.success) {
        const [first] = result.error.issues;
        throw first
            ? describeIssue(entryType, first)
            : new ValidationError(`${entryType} is invalid`, entryType, 'entry');
    }
    return result.data;
}

function isEntryType(value: unknown): value is EntryType {
    return ENTRY_TYPES.some((type) => type === value);
}

// ─── Constructors ────────────────────────────────────────

export function createArticle(fields: EntryFields<typeof ArticleSchema>): Article {
    return validate(ArticleSchema, 'Article', { ...fields, type: 'Article' });
}

export function createBook(fields: EntryFields<typeof BookSchema>): Book {
    return validate(BookSchema, 'Book', { ...fields, type: 'Book' });
}

export function createInProceedings(
    fields: EntryFields<typeof InProceedingsSchema>
): InProceedings {
    return validate(InProceedingsSchema, 'InProceedings', { ...fields, type: 'InProceedings' });
}

export function createTechReport(fields: EntryFields<typeof TechReportSchema>): TechReport {
    return validate(TechReportSchema, 'TechReport', { ...fields, type: 'TechReport' });
}

export function createThesis(fields: EntryFields<typeof ThesisSchema>): Thesis {
    return validate(ThesisSchema, 'Thesis', { ...fields, type: 'Thesis' });
}

export function createSoftware(fields: EntryFields<typeof SoftwareSchema>): Software {
    return validate(SoftwareSchema, 'Software', { ...fields, type: 'Software' });
}

export function createMisc(fields: EntryFields<typeof MiscSchema>): Misc {
    return validate(MiscSchema, 'Misc', { ...fields, type: 'Misc' });
}

/**
 * Validate an untyped `{ type, ...fields }` object into an Entry.
 * Used wherever entries arrive as data: parsed records and JSON documents.
 */
export function createEntry(input: unknown): Entry {
    const type =
        typeof input === 'object' && input !== null && 'type' in input ? input.type : undefined;

    if (type === undefined || type === null) {
        throw new ValidationError("Entry requires 'type'; received none", 'Entry', 'type');
    }
    if (!isEntryType(type)) {
        throw new ValidationError(
            `Entry field 'type' is invalid: unknown citation type ${JSON.stringify(type)}`,
            'Entry',
            'type'
        );
    }

    return validate<Entry>(ENTRY_SCHEMAS[type], type, input);
}

// ─── Equality & hashing ──────────────────────────────────

function valuesEqual(a: FieldValue, b: FieldValue): boolean {
    if (typeof a === 'string' || typeof a === 'number' || typeof b === 'string' || typeof b === 'number') {
        return a === b;
    }
    return a.length === b.length && a.every((name, i) => name === b[i]);
}

/**
 * Value equality over every bibliographic field. `key` and `app` are ignored.
 */
export function entriesEqual(a: Entry, b: Entry): boolean {
    if (a === b) return true;
    if (a.type !== b.type || typeTag(a) !== typeTag(b)) return false;

    const left = fieldValues(a);
    const right = fieldValues(b);
    if (left.length !== right.length) return false;

    return left.every((item, i) => {
        const other = right[i];
        return other !== undefined && other.spec.name === item.spec.name && valuesEqual(item.value, other.value);
    });
}

/**
 * Deterministic hash over the same fields `entriesEqual` compares,
 * so equal entries always hash identically.
 */
export function entryHash(entry: Entry): string {
    const canonical = JSON.stringify([
        entry.type,
        typeTag(entry),
        ...fieldValues(entry).map(({ spec, value }) => [spec.name, value]),
    ]);
    return createHash('sha256').update(canonical).digest('hex');
}

// ─── Summary ─────────────────────────────────────────────

const TITLE_EXCERPT_LENGTH = 50;

/**
 * One-line summary for host listings: `"Huttley et al. 2025 diverse-seq…"`.
 */
export function summarizeEntry(entry: Entry): { app: string; citation: string } {
    const first = entry.author[0] ?? '';
    const surname = extractSurname(first);
    const authors = entry.author.length > 1 ? `${surname} et al.` : surname;
    // Code points, not UTF-16 units.
    const chars = Array.from(entry.title);
    const title =
        chars.length <= TITLE_EXCERPT_LENGTH
            ? entry.title
            : `${chars.slice(0, TITLE_EXCERPT_LENGTH).join('')}…`;

    return {
        app: entry.app ?? '',
        citation: `${authors} ${entry.year} ${title}`,
    };
}
