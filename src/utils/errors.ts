import type { EntryType } from '../schema/fields.js';

/**
 * A required field is missing, empty, or has the wrong shape.
 * Raised synchronously by every construction path (direct, parsed, JSON).
 */
export class ValidationError extends Error {
    constructor(
        message: string,
        public readonly entryType: EntryType | 'Entry',
        public readonly field: string
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}

/**
 * Input text does not follow the bibliography record grammar.
 */
export class ParseError extends Error {
    constructor(
        message: string,
        public readonly line?: number
    ) {
        super(line === undefined ? message : `${message} (line ${line})`);
        this.name = 'ParseError';
    }
}
