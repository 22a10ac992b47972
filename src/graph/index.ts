export { Graph } from './graph.js';
export { Query } from './query.js';
export type { Adjacency } from './query.js';
export { deduplicate, deduplicatingCanonicalizer } from './canonical.js';
export type { Canonicalizer } from './canonical.js';
export { formatStatement, parseStatement, parseStatements } from './nquads.js';
export { blank, literal, iri, isBlank, isLiteral, isNamed, literalText, compareTerms, createStatement } from './term.js';
export type { AnyTerm } from './term.js';
export * from './filters.js';
