import { z } from 'zod';

/**
 * Field schema for every citation variant.
 *
 * Two views of the same declaration live here:
 *   - zod schemas, which decide what is required and what shape each value has
 *   - FIELD_SCHEMA, the ordered field layout used for BibTeX emission,
 *     integer coercion while parsing, and equality/hashing
 */

export const ENTRY_TYPES = [
    'Article',
    'Book',
    'InProceedings',
    'TechReport',
    'Thesis',
    'Software',
    'Misc',
] as const;

export type EntryType = (typeof ENTRY_TYPES)[number];

export const THESIS_TYPES = ['phd', 'masters'] as const;

export type ThesisType = (typeof THESIS_TYPES)[number];

// ─── Value shapes ────────────────────────────────────────

/** Characters a citation key may not contain, or the record opening could not be read back. */
export const CITATION_KEY = /^[^\s,{}"=#%]+$/;

/** Optional values accept null from loosely typed callers and store it as absent. */
const optionalText = z.string().min(1).nullish().transform((value) => value ?? undefined);
const optionalInteger = z.number().int().nullish().transform((value) => value ?? undefined);
const optionalNames = z
    .array(z.string().min(1))
    .nullish()
    .transform((value) => value ?? undefined);

const requiredText = z.string().min(1);
const requiredInteger = z.number().int();
const requiredNames = z.array(z.string().min(1)).min(1);

const citationKey = z
    .string()
    .min(1)
    .regex(CITATION_KEY, 'must not contain whitespace or any of , { } " = # %')
    .nullish()
    .transform((value) => value ?? undefined);

const commonFields = {
    key: citationKey,
    author: requiredNames,
    title: requiredText,
    year: requiredInteger,
    doi: optionalText,
    url: optionalText,
    note: optionalText,
    app: optionalText,
};

// ─── Variant schemas ─────────────────────────────────────

export const ArticleSchema = z
    .object({
        type: z.literal('Article'),
        ...commonFields,
        journal: requiredText,
        volume: requiredInteger,
        number: optionalInteger,
        pages: optionalText,
        article_number: optionalText,
    })
    .superRefine((entry, ctx) => {
        if (entry.pages === undefined && entry.article_number === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['pages'],
                message: "Article requires 'pages' or 'article_number'; received neither",
            });
        }
    });

export const BookSchema = z.object({
    type: z.literal('Book'),
    ...commonFields,
    publisher: requiredText,
    edition: optionalText,
    editor: optionalNames,
});

export const InProceedingsSchema = z.object({
    type: z.literal('InProceedings'),
    ...commonFields,
    booktitle: requiredText,
    pages: optionalText,
    publisher: optionalText,
    editor: optionalNames,
});

export const TechReportSchema = z.object({
    type: z.literal('TechReport'),
    ...commonFields,
    institution: requiredText,
    number: optionalText,
});

export const ThesisSchema = z.object({
    type: z.literal('Thesis'),
    ...commonFields,
    school: requiredText,
    thesis_type: z.enum(THESIS_TYPES),
});

export const SoftwareSchema = z.object({
    type: z.literal('Software'),
    ...commonFields,
    publisher: optionalText,
    version: optionalText,
    license: optionalText,
});

export const MiscSchema = z.object({
    type: z.literal('Misc'),
    ...commonFields,
});

export const ENTRY_SCHEMAS = {
    Article: ArticleSchema,
    Book: BookSchema,
    InProceedings: InProceedingsSchema,
    TechReport: TechReportSchema,
    Thesis: ThesisSchema,
    Software: SoftwareSchema,
    Misc: MiscSchema,
} as const;

export type Article = z.output<typeof ArticleSchema>;
export type Book = z.output<typeof BookSchema>;
export type InProceedings = z.output<typeof InProceedingsSchema>;
export type TechReport = z.output<typeof TechReportSchema>;
export type Thesis = z.output<typeof ThesisSchema>;
export type Software = z.output<typeof SoftwareSchema>;
export type Misc = z.output<typeof MiscSchema>;

/** One validated citation. `type` is the variant discriminator. */
export type Entry = Article | Book | InProceedings | TechReport | Thesis | Software | Misc;

/** Constructor input for a variant: its fields by name, without the discriminator. */
export type EntryFields<S extends z.ZodTypeAny> = Omit<z.input<S>, 'type'>;

// ─── Field layout ────────────────────────────────────────

export type FieldKind = 'string' | 'integer' | 'names';

export type FieldName =
    | 'author'
    | 'title'
    | 'year'
    | 'journal'
    | 'volume'
    | 'number'
    | 'pages'
    | 'article_number'
    | 'publisher'
    | 'edition'
    | 'editor'
    | 'booktitle'
    | 'institution'
    | 'school'
    | 'version'
    | 'license'
    | 'doi'
    | 'url'
    | 'note';

export interface FieldSpec {
    name: FieldName;
    kind: FieldKind;
}

export type FieldValue = string | number | readonly string[];

function field(name: FieldName, kind: FieldKind = 'string'): FieldSpec {
    return { name, kind };
}

const LEAD: readonly FieldSpec[] = [field('author', 'names'), field('title')];
const YEAR = field('year', 'integer');
const TRAIL: readonly FieldSpec[] = [field('doi'), field('url'), field('note')];

/**
 * Ordered field layout per variant. `key`, `app` and `thesis_type` are not
 * fields of the record body and are absent here.
 */
export const FIELD_SCHEMA: Readonly<Record<EntryType, readonly FieldSpec[]>> = {
    Article: [
        ...LEAD,
        field('journal'),
        YEAR,
        field('volume', 'integer'),
        field('number', 'integer'),
        field('pages'),
        field('article_number'),
        ...TRAIL,
    ],
    Book: [...LEAD, field('publisher'), YEAR, field('edition'), field('editor', 'names'), ...TRAIL],
    InProceedings: [
        ...LEAD,
        field('booktitle'),
        YEAR,
        field('pages'),
        field('publisher'),
        field('editor', 'names'),
        ...TRAIL,
    ],
    TechReport: [...LEAD, field('institution'), YEAR, field('number'), ...TRAIL],
    Thesis: [...LEAD, field('school'), YEAR, ...TRAIL],
    Software: [...LEAD, YEAR, field('publisher'), field('version'), field('license'), ...TRAIL],
    Misc: [...LEAD, YEAR, ...TRAIL],
};

type FieldValues = Partial<Record<FieldName, FieldValue>>;

function variantValues(entry: Entry): FieldValues {
    switch (entry.type) {
        case 'Article':
            return {
                journal: entry.journal,
                volume: entry.volume,
                number: entry.number,
                pages: entry.pages,
                article_number: entry.article_number,
            };
        case 'Book':
            return { publisher: entry.publisher, edition: entry.edition, editor: entry.editor };
        case 'InProceedings':
            return {
                booktitle: entry.booktitle,
                pages: entry.pages,
                publisher: entry.publisher,
                editor: entry.editor,
            };
        case 'TechReport':
            return { institution: entry.institution, number: entry.number };
        case 'Thesis':
            return { school: entry.school };
        case 'Software':
            return { publisher: entry.publisher, version: entry.version, license: entry.license };
        case 'Misc':
            return {};
    }
}

/**
 * Populated fields of an entry in layout order. Absent optional fields are
 * skipped, so the result is exactly what a record body would contain.
 */
export function fieldValues(entry: Entry): Array<{ spec: FieldSpec; value: FieldValue }> {
    const values: FieldValues = {
        author: entry.author,
        title: entry.title,
        year: entry.year,
        doi: entry.doi,
        url: entry.url,
        note: entry.note,
        ...variantValues(entry),
    };

    return FIELD_SCHEMA[entry.type].flatMap((spec) => {
        const value = values[spec.name];
        return value === undefined ? [] : [{ spec, value }];
    });
}

/**
 * Canonical lowercase BibTeX tag for an entry.
 */
export function typeTag(entry: Entry): string {
    if (entry.type === 'Thesis') {
        return entry.thesis_type === 'phd' ? 'phdthesis' : 'mastersthesis';
    }
    return entry.type.toLowerCase();
}

/**
 * Resolve a BibTeX tag (any case) to its variant, or null when unsupported.
 */
export function variantForTag(
    tag: string
): { type: EntryType; thesisType?: ThesisType } | null {
    switch (tag.toLowerCase()) {
        case 'phdthesis':
            return { type: 'Thesis', thesisType: 'phd' };
        case 'mastersthesis':
            return { type: 'Thesis', thesisType: 'masters' };
        default: {
            const type = ENTRY_TYPES.find((t) => t.toLowerCase() === tag.toLowerCase());
            return type && type !== 'Thesis' ? { type } : null;
        }
    }
}
