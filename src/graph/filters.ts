import type { NamedNode } from 'n3';
import type { StatementFilter, Term } from '../types/graph.js';
import { DEFAULTS } from '../types/options.js';
import { iri, literal } from './term.js';

// === Predicate tokens ===
export const IS_NAME = iri('is:name');
export const IS_PATH = iri('is:path');
/** Declared type of taxonomy nodes. */
export const IS_TYPE = iri('is:type');
/** Declared type of authored nodes. */
export const AS_TYPE = iri('as:type');
export const IS_PUBLISHED = iri('is:published');
export const EXTERNAL_TYPE = iri('external:type');
export const HAS_CHILD = iri('has:child');
export const HAS_MULTI = iri('has:multi');

const PUBLISHED = literal(DEFAULTS.publishedValue);

/**
 * Filter statements on a predicate, and on the object when one is given.
 * Used to bind names and types while a query runs.
 */
export function matching(predicate: NamedNode, object?: Term): StatementFilter {
    if (object === undefined) {
        return s => s.predicate.equals(predicate);
    }
    return s => s.predicate.equals(predicate) && s.object.equals(object);
}

/** Statements naming a node with the given text. */
export function namedAs(name: string): StatementFilter {
    return matching(IS_NAME, literal(name));
}

// Fixed filters.
export const byName = matching(IS_NAME);
export const byPath = matching(IS_PATH);
export const byUsedType = matching(AS_TYPE);
export const hasChild = matching(HAS_CHILD);
export const hasMulti = matching(HAS_MULTI);
export const isPublished = matching(IS_PUBLISHED, PUBLISHED);
