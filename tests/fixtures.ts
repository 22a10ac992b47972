/**
 * Shared test fixtures for consistent, DRY testing.
 */
import { buildGraph } from '../src/pipeline.js';
import type { Graph } from '../src/graph/graph.js';
import type { AuthoredDocument, TaxonomyDocument } from '../src/types/fields.js';
import type { Statement } from '../src/types/graph.js';
import type { GraftException } from '../src/types/errors.js';

// === Taxonomy ===
export const TAXONOMY: TaxonomyDocument = {
    base: {
        name: 'base',
        fields: {
            '@timestamp': { type: 'date' },
            message: { type: 'match_only_text' },
        },
    },
    file: {
        name: 'file',
        type: 'group',
        fields: {
            'file.path': {
                type: 'keyword',
                multi_fields: [{ name: 'text', type: 'match_only_text', flat_name: 'file.path.text' }],
            },
            'file.size': { type: 'long' },
        },
    },
    registry: {
        name: 'registry',
        type: 'group',
        fields: {
            'registry.path': { type: 'keyword' },
            'registry.data.type': { type: 'keyword' },
            'registry.value': {
                type: 'keyword',
                multi_fields: [{ name: 'text', type: 'match_only_text', flat_name: 'registry.value.text' }],
            },
        },
    },
};

// === Authored fields ===
export const AUTHORED: AuthoredDocument = [
    {
        name: 'registry',
        type: 'group',
        fields: [{ name: 'path', type: 'keyword' }],
    },
    {
        name: 'foo_package',
        type: 'group',
        fields: [
            {
                name: 'registry',
                type: 'group',
                fields: [{ name: 'path', type: 'keyword' }],
            },
            { name: 'size', type: 'long' },
            { name: 'message', type: 'match_only_text', external: 'ecs' },
            { name: 'host.name', type: 'keyword', multi_fields: [{ name: 'text', type: 'text' }] },
        ],
    },
    { name: 'untyped' },
];

/** Declares foo_package.size again with a different type. */
export const CONFLICTING: AuthoredDocument = [
    { name: 'foo_package', fields: [{ name: 'size', type: 'keyword' }] },
];

export function fixtureGraph(authored: AuthoredDocument[] = [AUTHORED]): Graph {
    return buildGraph({ taxonomy: [TAXONOMY], authored }, { onStatementError: () => undefined });
}

/**
 * Run a flattener and keep its output apart.
 */
export function collect(run: (emit: (s: Statement | undefined, e: GraftException | undefined) => void) => void): {
    statements: Statement[];
    errors: GraftException[];
} {
    const statements: Statement[] = [];
    const errors: GraftException[] = [];
    run((s, e) => {
        if (e) errors.push(e);
        if (s) statements.push(s);
    });
    return { statements, errors };
}

// Node labels: lowercase hex SHA-1 of namespace + path.
export const LABELS = {
    schemaRegistry: '564deeff7a01cc8a86e8856c36fabcc877f56258',
    schemaRegistryPath: 'ac33c9d70516f62ce8c0a376ac28605b35214431',
    packageRegistry: '099e56482a385b8113ed19b74cbf50410549528a',
    packageRegistryPath: '1af4fb60ce7c37384ffa54149093f6510ab041fd',
} as const;
