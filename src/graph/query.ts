import type { Statement, StatementFilter, Term } from '../types/graph.js';
import { compareTerms } from './term.js';

/**
 * Adjacency lookups a query walks over.
 */
export interface Adjacency {
    /** Statements with the term in subject position. */
    outgoing(term: Term): readonly Statement[];
    /** Statements with the term in object position. */
    incoming(term: Term): readonly Statement[];
}

/**
 * A set of terms with composable steps over graph adjacency.
 *
 * Queries are immutable: every step returns a new Query. Steps cost one
 * adjacency lookup per current term, so a chain is proportional to the
 * sizes of the intermediate sets rather than to the graph.
 */
export class Query {
    private readonly graph: Adjacency;
    private readonly terms: readonly Term[];

    constructor(graph: Adjacency, terms: readonly Term[]) {
        this.graph = graph;
        this.terms = terms;
    }

    /**
     * Objects of the matching statements whose subject is in the set.
     */
    out(filter: StatementFilter): Query {
        const next: Term[] = [];
        for (const term of this.terms) {
            for (const s of this.graph.outgoing(term)) {
                if (filter(s)) next.push(s.object);
            }
        }
        return new Query(this.graph, next);
    }

    /**
     * Subjects of the matching statements whose object is in the set.
     */
    in(filter: StatementFilter): Query {
        const next: Term[] = [];
        for (const term of this.terms) {
            for (const s of this.graph.incoming(term)) {
                if (filter(s)) next.push(s.subject);
            }
        }
        return new Query(this.graph, next);
    }

    /** Terms also present in the other query. */
    and(other: Query): Query {
        const keep = other.valueSet();
        return new Query(this.graph, this.terms.filter(t => keep.has(t.id)));
    }

    /** Terms not present in the other query. */
    not(other: Query): Query {
        const drop = other.valueSet();
        return new Query(this.graph, this.terms.filter(t => !drop.has(t.id)));
    }

    unique(): Query {
        const seen = new Set<string>();
        const next: Term[] = [];
        for (const term of this.terms) {
            if (seen.has(term.id)) continue;
            seen.add(term.id);
            next.push(term);
        }
        return new Query(this.graph, next);
    }

    /**
     * The current terms, ordered by id.
     */
    result(): Term[] {
        return [...this.terms].sort(compareTerms);
    }

    get size(): number {
        return this.terms.length;
    }

    isEmpty(): boolean {
        return this.terms.length === 0;
    }

    private valueSet(): Set<string> {
        return new Set(this.terms.map(t => t.id));
    }
}
