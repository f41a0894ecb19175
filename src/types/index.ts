/**
 * Barrel export for all shared types.
 */
export { DEFAULT_CONFIG, LOG_LEVELS } from './config.js';
export type { CitebundleConfig, LogLevel } from './config.js';
export type {
    Article,
    Book,
    Entry,
    EntryFields,
    EntryType,
    FieldKind,
    FieldName,
    FieldSpec,
    FieldValue,
    InProceedings,
    Misc,
    Software,
    TechReport,
    Thesis,
    ThesisType,
} from '../schema/fields.js';
