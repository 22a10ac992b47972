import {
    buildGraph,
    collectStatements,
    flattenTaxonomyDocument,
    loadGraph,
} from '../src/pipeline.js';
import { deduplicate } from '../src/graph/canonical.js';
import type { Canonicalizer } from '../src/graph/canonical.js';
import { formatStatement, parseStatements } from '../src/graph/nquads.js';
import { candidateGraftsFor, candidateGraftsIn } from '../src/query/grafting.js';
import { AUTHORED, TAXONOMY } from './fixtures.js';

const BROKEN = { x: { fields: { 'x.missing': {}, 'x.ok': { type: 'keyword' } } } };

describe('deduplicate', () => {
    test('drops repeats and orders by N-Quads line', () => {
        const statements = parseStatements([
            '_:b <is:name> "b" .',
            '_:a <is:name> "a" .',
            '_:b <is:name> "b" .',
        ].join('\n'));

        expect(deduplicate(statements).map(formatStatement)).toEqual([
            '_:a <is:name> "a" .',
            '_:b <is:name> "b" .',
        ]);
    });
});

describe('pipeline', () => {
    const sources = { taxonomy: [TAXONOMY], authored: [AUTHORED] };

    test('loading a doubled multiset gives the same graph', () => {
        const statements = collectStatements(sources);
        const once = loadGraph(statements);
        const twice = loadGraph([...statements, ...statements]);

        expect(twice.size).toBe(once.size);
        expect(twice.allStatements().map(formatStatement)).toEqual(once.allStatements().map(formatStatement));
        expect(candidateGraftsIn(twice, 'foo_package.registry.path')).toEqual(candidateGraftsIn(once, 'foo_package.registry.path'));
        expect(candidateGraftsFor(twice, 'other.path', 'keyword')).toEqual(candidateGraftsFor(once, 'other.path', 'keyword'));
    });

    test('document order does not change the graph', () => {
        const forward = buildGraph({ taxonomy: [TAXONOMY], authored: [AUTHORED, [{ name: 'extra', type: 'long' }]] });
        const backward = buildGraph({ taxonomy: [TAXONOMY], authored: [[{ name: 'extra', type: 'long' }], AUTHORED] });
        expect(backward.allStatements().map(formatStatement)).toEqual(forward.allStatements().map(formatStatement));
    });

    test('statement errors are reported and the rest is loaded', () => {
        const onStatementError = jest.fn();
        const graph = buildGraph({ taxonomy: [BROKEN] }, { onStatementError });

        expect(onStatementError).toHaveBeenCalledTimes(1);
        expect(onStatementError.mock.calls[0][0].error.code).toBe('INVALID_STATEMENT');
        expect(graph.literalFor('x.missing')).toBeDefined();
        expect(graph.literalFor('x.ok')).toBeDefined();
    });

    test('statement errors are logged by default', () => {
        const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        try {
            buildGraph({ taxonomy: [BROKEN] });
            expect(spy).toHaveBeenCalledWith('x.missing: Invalid statement: empty literal for <is:type>');
        } finally {
            spy.mockRestore();
        }
    });

    test('a supplied canonicalizer replaces deduplication', () => {
        const canonicalize = jest.fn(() => []);
        const canonicalizer: Canonicalizer = { canonicalize };
        const graph = buildGraph(sources, { canonicalizer, onStatementError: () => undefined });

        expect(canonicalize).toHaveBeenCalledTimes(1);
        expect(graph.size).toBe(0);
    });

    test('flattenTaxonomyDocument keeps errors beside statements', () => {
        const buffer = flattenTaxonomyDocument(BROKEN);
        expect(buffer.statements).toHaveLength(13);
        expect(buffer.errors.map(e => e.error.details?.path)).toEqual(['x.missing']);
    });
});
