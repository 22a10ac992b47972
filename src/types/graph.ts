import type { BlankNode, Literal, NamedNode } from 'n3';
import type { GraftException } from './errors.js';

// === Terms ===
// Blank nodes are content-addressed fields, literals are quoted strings,
// named nodes are the fixed predicate tokens.

/**
 * An atomic graph value. Terms are compared by their `id`
 * (`_:label`, `"text"` or the bare IRI).
 */
export type Term = BlankNode | Literal | NamedNode;

export interface Statement {
    readonly subject: BlankNode;
    readonly predicate: NamedNode;
    readonly object: BlankNode | Literal;
}

/**
 * Selects statements during an adjacency step. Filters are plain
 * closures so callers can bind names and types at query time.
 */
export type StatementFilter = (statement: Statement) => boolean;

/**
 * Receives each statement produced by a flattener, or the error
 * raised while constructing it. Exactly one argument is set.
 */
export type StatementCallback = (
    statement: Statement | undefined,
    error: GraftException | undefined
) => void;
