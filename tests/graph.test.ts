import { Graph } from '../src/graph/graph.js';
import { IS_NAME, byName, hasChild, matching } from '../src/graph/filters.js';
import { parseStatements } from '../src/graph/nquads.js';
import { blank, literal } from '../src/graph/term.js';

const GRAPH_TEXT = `
# two parents share one child
_:a <has:child> _:b .
_:a <is:name> "a" .
_:b <is:name> "b" .
_:c <has:child> _:b .
_:c <is:name> "c" .
_:b <is:type> "keyword" .
`;

describe('Graph', () => {
    let graph: Graph;

    beforeEach(() => {
        graph = Graph.load(parseStatements(GRAPH_TEXT));
    });

    test('indexes every statement', () => {
        expect(graph.size).toBe(6);
        expect(graph.outgoing(blank('a'))).toHaveLength(2);
        expect(graph.incoming(blank('b'))).toHaveLength(2);
    });

    test('unknown terms have no adjacency', () => {
        expect(graph.outgoing(blank('zzz'))).toEqual([]);
        expect(graph.incoming(literal('zzz'))).toEqual([]);
    });

    test('termFor finds terms by id', () => {
        expect(graph.termFor('"a"')?.termType).toBe('Literal');
        expect(graph.termFor('has:child')?.termType).toBe('NamedNode');
        expect(graph.termFor('_:b')?.value).toBe('b');
        expect(graph.termFor('"zzz"')).toBeUndefined();
        expect(graph.literalFor('keyword')?.equals(literal('keyword'))).toBe(true);
        expect(graph.literalFor('text')).toBeUndefined();
    });
});

describe('Query', () => {
    let graph: Graph;

    beforeEach(() => {
        graph = Graph.load(parseStatements(GRAPH_TEXT));
    });

    const ids = (terms: { id: string }[]) => terms.map(t => t.id);

    test('out follows subject to object', () => {
        expect(ids(graph.query(blank('a'), blank('c')).out(hasChild).result())).toEqual(['_:b', '_:b']);
    });

    test('in follows object to subject', () => {
        expect(ids(graph.query(blank('b')).in(hasChild).result())).toEqual(['_:a', '_:c']);
    });

    test('unique drops repeats', () => {
        const q = graph.query(blank('a'), blank('c')).out(hasChild).unique();
        expect(ids(q.result())).toEqual(['_:b']);
        expect(q.size).toBe(1);
    });

    test('and intersects, not subtracts', () => {
        const all = graph.query(blank('a'), blank('b'), blank('c'));
        expect(ids(all.and(graph.query(blank('b'))).result())).toEqual(['_:b']);
        expect(ids(all.not(graph.query(blank('b'))).result())).toEqual(['_:a', '_:c']);
    });

    test('filters can bind objects at query time', () => {
        const named = matching(IS_NAME, literal('a'));
        const q = graph.query(blank('a'), blank('b'));
        expect(ids(q.out(named).result())).toEqual(['"a"']);
        expect(ids(q.out(named).in(byName).result())).toEqual(['_:a']);
    });

    test('result is ordered by term id', () => {
        expect(ids(graph.query(blank('c'), blank('a'), blank('b')).result())).toEqual(['_:a', '_:b', '_:c']);
    });

    test('an empty step leaves an empty query', () => {
        const q = graph.query(blank('b')).out(hasChild);
        expect(q.isEmpty()).toBe(true);
        expect(q.in(hasChild).result()).toEqual([]);
    });
});
