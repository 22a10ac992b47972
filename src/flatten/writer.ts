import { createHash } from 'crypto';
import type { BlankNode, NamedNode } from 'n3';
import type { Statement, StatementCallback } from '../types/graph.js';
import type { Namespace } from '../types/fields.js';
import { GraftException } from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';
import { HAS_CHILD, IS_NAME, IS_PATH, IS_PUBLISHED } from '../graph/filters.js';
import { blank, createStatement, literal } from '../graph/term.js';

/**
 * Lowercase hex digest of namespace + path. Equal inputs give equal
 * labels, so nodes from different documents merge.
 */
export function nodeLabel(namespace: Namespace, path: string): string {
    return createHash(DEFAULTS.hashAlgorithm)
        .update(namespace, 'utf8')
        .update(path, 'utf8')
        .digest('hex');
}

export function nodeId(namespace: Namespace, path: string): BlankNode {
    return blank(nodeLabel(namespace, path));
}

/**
 * Emits the statements of one namespace. Each statement is built on its
 * own; a failure is passed to the callback and the caller carries on.
 */
export class StatementWriter {
    private readonly namespace: Namespace;
    private readonly emit: StatementCallback;

    constructor(namespace: Namespace, emit: StatementCallback) {
        this.namespace = namespace;
        this.emit = emit;
    }

    /** `_:node <predicate> "value" .` */
    attribute(path: string, predicate: NamedNode, value: string): void {
        this.write(path, () => createStatement(nodeId(this.namespace, path), predicate, literal(value)));
    }

    /** `_:from <predicate> _:to .` */
    edge(from: string, predicate: NamedNode, to: string): void {
        this.write(from, () => createStatement(nodeId(this.namespace, from), predicate, nodeId(this.namespace, to)));
    }

    /**
     * Name and path of a node.
     */
    identify(path: string, name: string): void {
        this.attribute(path, IS_NAME, name);
        this.attribute(path, IS_PATH, path);
    }

    /**
     * Synthesize one group node per leading segment of `segments`, each
     * linked to the next by `has:child`.
     */
    groups(segments: string[], typePredicate: NamedNode, published: boolean): void {
        for (let i = 0; i < segments.length - 1; i++) {
            const sub = segments.slice(0, i + 1).join('.');
            const child = segments.slice(0, i + 2).join('.');
            if (published) this.published(sub);
            this.attribute(sub, typePredicate, DEFAULTS.groupType);
            this.identify(sub, segments[i]);
            this.edge(sub, HAS_CHILD, child);
        }
    }

    published(path: string): void {
        this.attribute(path, IS_PUBLISHED, DEFAULTS.publishedValue);
    }

    private write(path: string, build: () => Statement): void {
        let statement: Statement;
        try {
            statement = build();
        } catch (e) {
            if (!(e instanceof GraftException)) throw e;
            this.emit(undefined, new GraftException({
                ...e.error,
                details: { ...e.error.details, namespace: this.namespace, path },
            }));
            return;
        }
        this.emit(statement, undefined);
    }
}
