import { fieldValues, typeTag, type Entry, type FieldValue } from '../schema/fields.js';
import { ValidationError } from '../utils/errors.js';

/** Field names are padded so the `=` signs line up for common fields. */
const FIELD_NAME_WIDTH = 9;

function formatValue(value: FieldValue): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return value.join(' and ');
}

export function formatField(name: string, value: FieldValue): string {
    return `  ${name.padEnd(FIELD_NAME_WIDTH)} = {${formatValue(value)}},`;
}

/**
 * Serialize one entry as a BibTeX record.
 *
 * Fields are emitted in the variant's fixed layout order, so equal entries
 * with equal keys always produce byte-identical text. `app` and
 * `thesis_type` are never written.
 */
export function toBibtex(entry: Entry): string {
    if (!entry.key) {
        throw new ValidationError(
            `${entry.type} has no key; assign keys before serializing`,
            entry.type,
            'key'
        );
    }

    const lines = [`@${typeTag(entry)}{${entry.key},`];
    for (const { spec, value } of fieldValues(entry)) {
        lines.push(formatField(spec.name, value));
    }
    lines.push('}');

    return lines.join('\n');
}
