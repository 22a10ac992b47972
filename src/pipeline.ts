/**
 * Graph building pipeline
 *
 * Flattens each document into its own buffer, concatenates the buffers
 * in input order, canonicalizes the whole set once, and loads the graph.
 */

import type { Statement } from './types/graph.js';
import type { AuthoredDocument, TaxonomyDocument } from './types/fields.js';
import type { BuildGraphOptions } from './types/options.js';
import type { GraftException } from './types/errors.js';
import { deduplicatingCanonicalizer } from './graph/canonical.js';
import { Graph } from './graph/graph.js';
import { flattenAuthored } from './flatten/authored.js';
import { flattenTaxonomy } from './flatten/taxonomy.js';

export interface GraphSources {
    taxonomy?: TaxonomyDocument[];
    authored?: AuthoredDocument[];
}

/**
 * Statements of one flattened document, with the statements that
 * failed construction.
 */
export interface StatementBuffer {
    statements: Statement[];
    errors: GraftException[];
}

export function flattenTaxonomyDocument(document: TaxonomyDocument): StatementBuffer {
    const buffer: StatementBuffer = { statements: [], errors: [] };
    flattenTaxonomy(document, collector(buffer));
    return buffer;
}

export function flattenAuthoredDocument(document: AuthoredDocument): StatementBuffer {
    const buffer: StatementBuffer = { statements: [], errors: [] };
    flattenAuthored(document, collector(buffer));
    return buffer;
}

/**
 * Flatten every source document. Construction errors are reported
 * through `onStatementError` (logged to stderr by default) and skipped.
 */
export function collectStatements(
    sources: GraphSources,
    options: BuildGraphOptions = {}
): Statement[] {
    const onError = options.onStatementError ?? logStatementError;
    const buffers = [
        ...(sources.taxonomy ?? []).map(flattenTaxonomyDocument),
        ...(sources.authored ?? []).map(flattenAuthoredDocument),
    ];

    const statements: Statement[] = [];
    for (const buffer of buffers) {
        buffer.errors.forEach(onError);
        statements.push(...buffer.statements);
    }
    return statements;
}

/**
 * Canonicalize a finished statement multiset and load it.
 */
export function loadGraph(
    statements: readonly Statement[],
    options: BuildGraphOptions = {}
): Graph {
    const canonicalizer = options.canonicalizer ?? deduplicatingCanonicalizer;
    return Graph.load(canonicalizer.canonicalize(statements));
}

export function buildGraph(sources: GraphSources, options: BuildGraphOptions = {}): Graph {
    return loadGraph(collectStatements(sources, options), options);
}

function collector(buffer: StatementBuffer) {
    return (statement: Statement | undefined, error: GraftException | undefined): void => {
        if (error) {
            buffer.errors.push(error);
        } else if (statement) {
            buffer.statements.push(statement);
        }
    };
}

function logStatementError(error: GraftException): void {
    const path = error.error.details?.path;
    console.error(typeof path === 'string' ? `${path}: ${error.message}` : error.message);
}
