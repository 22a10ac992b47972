import type { GraftError } from './types/errors.js';
import type { Graph } from './graph/graph.js';
import { byPath } from './graph/filters.js';
import { literalText } from './graph/term.js';
import { candidateGraftsIn, publishedFieldsIn } from './query/grafting.js';

export interface GraftReportEntry {
    path: string;
    candidates: string[];
    error?: GraftError;
}

export interface GraftReportOptions {
    /** Keep fields that have no candidates. Fields with errors are always kept. */
    includeEmpty?: boolean;
}

/**
 * Graft candidates for every published field, ordered by path.
 */
export function graftReport(graph: Graph, options: GraftReportOptions = {}): GraftReportEntry[] {
    const paths = publishedFieldsIn(graph).out(byPath).unique().result().map(literalText);

    const entries: GraftReportEntry[] = [];
    for (const path of paths) {
        const result = candidateGraftsIn(graph, path);
        if (!result.success) {
            entries.push({ path, candidates: [], error: result.error });
        } else if (result.candidates.length > 0 || options.includeEmpty) {
            entries.push({ path, candidates: result.candidates });
        }
    }
    return entries;
}
