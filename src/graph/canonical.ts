import type { Statement } from '../types/graph.js';
import { formatStatement } from './nquads.js';

/**
 * Batch step run once over the merged statement multiset before the
 * graph is loaded. Implementations return a set with consistent blank
 * node labels and no duplicates.
 */
export interface Canonicalizer {
    canonicalize(statements: readonly Statement[]): Statement[];
}

/**
 * Remove repeated statements and order the rest by their N-Quads form.
 *
 * This stands in for full blank node canonicalization. Node labels are
 * already content hashes of (namespace, path), so equal nodes from
 * different documents carry equal labels and relabeling is not needed.
 * A true isomorphism canonicalizer can be supplied through the
 * Canonicalizer interface if labels ever become arbitrary.
 */
export function deduplicate(statements: readonly Statement[]): Statement[] {
    const byLine = new Map<string, Statement>();
    for (const s of statements) {
        const line = formatStatement(s);
        if (!byLine.has(line)) byLine.set(line, s);
    }
    return [...byLine.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([, s]) => s);
}

export const deduplicatingCanonicalizer: Canonicalizer = {
    canonicalize: deduplicate,
};
