import type { Statement, Term } from '../types/graph.js';
import { Query } from './query.js';
import type { Adjacency } from './query.js';
import { literal } from './term.js';

const NONE: readonly Statement[] = [];

/**
 * Immutable statement set indexed by subject and by object.
 *
 * Statements are expected to be deduplicated already (see canonical.ts);
 * a repeated statement is indexed twice and shows up twice in query steps.
 */
export class Graph implements Adjacency {
    private readonly statements: readonly Statement[];
    private readonly bySubject = new Map<string, Statement[]>();
    private readonly byObject = new Map<string, Statement[]>();
    private readonly terms = new Map<string, Term>();

    constructor(statements: Iterable<Statement>) {
        this.statements = [...statements];
        for (const s of this.statements) {
            index(this.bySubject, s.subject, s);
            index(this.byObject, s.object, s);
            this.terms.set(s.subject.id, s.subject);
            this.terms.set(s.predicate.id, s.predicate);
            this.terms.set(s.object.id, s.object);
        }
    }

    static load(statements: Iterable<Statement>): Graph {
        return new Graph(statements);
    }

    /**
     * The term with the given id, e.g. `"registry.path"` for a literal.
     */
    termFor(id: string): Term | undefined {
        return this.terms.get(id);
    }

    /**
     * The literal term holding the given text.
     */
    literalFor(text: string): Term | undefined {
        return this.termFor(literal(text).id);
    }

    query(...terms: Term[]): Query {
        return new Query(this, terms);
    }

    outgoing(term: Term): readonly Statement[] {
        return this.bySubject.get(term.id) ?? NONE;
    }

    incoming(term: Term): readonly Statement[] {
        return this.byObject.get(term.id) ?? NONE;
    }

    allStatements(): readonly Statement[] {
        return this.statements;
    }

    get size(): number {
        return this.statements.length;
    }
}

function index(map: Map<string, Statement[]>, key: Term, s: Statement): void {
    const list = map.get(key.id);
    if (list) {
        list.push(s);
    } else {
        map.set(key.id, [s]);
    }
}
