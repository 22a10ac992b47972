/**
 * field-graft - Library Entry Point
 *
 * Exports the core functionality for use in other projects.
 * This file should NOT import the CLI.
 */

// Graph model and query algebra
export * from './graph/index.js';

// Flatteners
export * from './flatten/index.js';

// Graft queries
export { candidateGraftsFor, candidateGraftsIn, publishedFieldsIn } from './query/grafting.js';
export type { GraftResult } from './query/grafting.js';

// Pipeline
export {
    buildGraph,
    collectStatements,
    loadGraph,
    flattenTaxonomyDocument,
    flattenAuthoredDocument,
} from './pipeline.js';
export type { GraphSources, StatementBuffer } from './pipeline.js';

// Documents
export {
    decodeTaxonomyDocument,
    decodeAuthoredDocument,
    taxonomyDocumentSchema,
    authoredDocumentSchema,
} from './documents.js';

// Reporting
export { graftReport } from './report.js';
export type { GraftReportEntry, GraftReportOptions } from './report.js';

// Types and Interfaces
export * from './types/index.js';
