/**
 * Shared type definitions for field-graft
 */

// Re-export error types
export {
    GraftException,
    createNotFoundError,
    createNoTypeError,
    createMultipleTypesError,
    createInvalidStatementError,
    createDecodeError,
    createParseError,
    serializeGraftError,
} from './errors.js';

export type {
    GraftErrorCode,
    GraftError,
} from './errors.js';

// Re-export graph types
export type {
    Term,
    Statement,
    StatementFilter,
    StatementCallback,
} from './graph.js';

// Re-export field document types
export type {
    MultiField,
    TaxonomyField,
    TaxonomyDocument,
    AuthoredField,
    AuthoredDocument,
    Namespace,
} from './fields.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    BuildGraphOptions
} from './options.js';
