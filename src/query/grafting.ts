/**
 * Graft queries over the field graph.
 *
 * A graft candidate is a taxonomy field with the same declared type as the
 * queried field and the longest run of matching trailing path segments.
 */

import type { Term } from '../types/graph.js';
import type { GraftError } from '../types/errors.js';
import {
    createMultipleTypesError,
    createNotFoundError,
    createNoTypeError,
} from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';
import type { Graph } from '../graph/graph.js';
import type { Query } from '../graph/query.js';
import {
    IS_TYPE,
    byName,
    byPath,
    byUsedType,
    hasChild,
    isPublished,
    matching,
    namedAs,
} from '../graph/filters.js';
import { literalText } from '../graph/term.js';

export type GraftResult =
    | { success: true; candidates: string[] }
    | { success: false; error: GraftError };

/**
 * Candidate graft destinations for a field that is already in the graph
 * and published. The field's own type is used, and no node carrying the
 * queried path (in any namespace) is returned.
 */
export function candidateGraftsIn(graph: Graph, full: string): GraftResult {
    const path = full.split('.');
    const node = graph.literalFor(full);
    if (!node) {
        return failure(createNotFoundError(full).error);
    }

    // Nodes with exactly this path, in either namespace.
    const q = graph.query(node).in(byPath);
    const published = q.and(q.out(isPublished).in(isPublished));
    if (published.isEmpty()) {
        return failure(createNotFoundError(full, `not found: no published field at ${full}`).error);
    }

    // There should be exactly one type.
    const types = published.out(byUsedType).unique().result();
    if (types.length === 0) {
        return failure(createNoTypeError(full).error);
    }
    if (types.length > 1) {
        return failure(createMultipleTypesError(full, types.map(literalText)).error);
    }

    // Every other node with the same name.
    const pool = q.out(byName).in(byName).not(q);

    return { success: true, candidates: walkMatchingPath(pool, types[0], path) };
}

/**
 * Candidate graft destinations for a field with the given path and type.
 * The field itself need not be in the graph.
 */
export function candidateGraftsFor(graph: Graph, full: string, type: string): GraftResult {
    const path = full.split('.');
    const leaf = path[path.length - 1];

    // The leaf text must name a field, not just appear as some value.
    const name = graph.literalFor(leaf);
    const named = name ? graph.query(name).in(byName) : graph.query();
    if (named.isEmpty()) {
        return failure(createNotFoundError(full, `not found: no field named ${leaf}`).error);
    }

    // A type nothing declares cannot match.
    const typ = graph.literalFor(type);
    if (!typ) {
        return { success: true, candidates: [] };
    }

    return { success: true, candidates: walkMatchingPath(named, typ, path) };
}

/**
 * Every node flagged as published.
 */
export function publishedFieldsIn(graph: Graph): Query {
    const published = graph.literalFor(DEFAULTS.publishedValue);
    if (!published) {
        return graph.query();
    }
    return graph.query(published).in(isPublished);
}

/**
 * Keep the pool nodes of the right type, then climb one parent per
 * leading segment while the parent names keep matching. A step with no
 * match ends the walk; the last non-empty level stands.
 *
 * The paths of the typed nodes under the surviving ancestors are
 * returned, so the leaf-only match reports the typed nodes themselves.
 */
function walkMatchingPath(pool: Query, typ: Term, path: string[]): string[] {
    const matchingType = matching(IS_TYPE, typ);
    const typed = pool.and(pool.out(matchingType).in(matchingType)).unique();

    let level = typed;
    let depth = 0;
    for (let i = path.length - 2; i >= 0; i--) {
        const parents = level.in(hasChild);
        const next = parents.out(namedAs(path[i])).in(byName).and(parents).unique();
        if (next.isEmpty()) {
            break;
        }
        level = next;
        depth++;
    }

    // Come back down along the matched segments to the typed nodes.
    let leaves = level;
    for (let i = path.length - depth; i < path.length; i++) {
        const children = leaves.out(hasChild);
        leaves = children.out(namedAs(path[i])).in(byName).and(children).unique();
    }
    leaves = leaves.and(typed);

    return leaves.out(byPath).unique().result().map(literalText);
}

function failure(error: GraftError): GraftResult {
    return { success: false, error };
}
