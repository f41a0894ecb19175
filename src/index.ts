/**
 * citebundle: structured BibTeX citations for plugins, and the tools a host
 * needs to merge them into one bibliography.
 */
export {
    createArticle,
    createBook,
    createEntry,
    createInProceedings,
    createMisc,
    createSoftware,
    createTechReport,
    createThesis,
    entriesEqual,
    entryHash,
    summarizeEntry,
} from './entries/entry.js';
export { ENTRY_TYPES, FIELD_SCHEMA, THESIS_TYPES, fieldValues, typeTag } from './schema/fields.js';
export { extractSurname, generateKey } from './keys/generate-key.js';
export { assignUniqueKeys, keySuffix } from './keys/resolve-keys.js';
export { toBibtex } from './bibtex/serialize.js';
export { fromBibtex, parseBibliography, parseNames } from './bibtex/parse.js';
export { formatBibliography, writeBibliography } from './bibtex/writer.js';
export { fromJson, loadJson, toJson, writeJson } from './json/codec.js';
export { ParseError, ValidationError } from './utils/errors.js';
export { getLogger, initLogger } from './utils/logger.js';
export { resolveConfig } from './utils/config.js';
export { DEFAULT_CONFIG, LOG_LEVELS } from './types/index.js';
export type {
    Article,
    Book,
    CitebundleConfig,
    Entry,
    EntryFields,
    EntryType,
    FieldKind,
    FieldName,
    FieldSpec,
    FieldValue,
    InProceedings,
    LogLevel,
    Misc,
    Software,
    TechReport,
    Thesis,
    ThesisType,
} from './types/index.js';
