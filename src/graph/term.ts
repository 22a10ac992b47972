import { DataFactory } from 'n3';
import type { BlankNode, Literal, NamedNode, Quad_Object, Quad_Predicate, Quad_Subject } from 'n3';
import type { Statement, Term } from '../types/graph.js';
import { createInvalidStatementError } from '../types/errors.js';

const { blankNode, namedNode } = DataFactory;

const BLANK_LABEL = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;
const IRI_TOKEN = /^[^\s<>"{}|^`\\]+$/;
const XSD_STRING = 'http://www.w3.org/2001/XMLSchema#string';

/** Anything that can sit in a statement position. */
export type AnyTerm = Quad_Subject | Quad_Predicate | Quad_Object;

/**
 * Create a blank node term from its label (without the `_:` prefix).
 */
export function blank(label: string): BlankNode {
    if (!BLANK_LABEL.test(label)) {
        throw createInvalidStatementError(`bad blank node label '${label}'`, label);
    }
    return blankNode(label);
}

/**
 * Create a plain string literal.
 */
export function literal(text: string): Literal {
    return DataFactory.literal(text);
}

export function iri(token: string): NamedNode {
    if (!IRI_TOKEN.test(token)) {
        throw createInvalidStatementError(`bad IRI '${token}'`, token);
    }
    return namedNode(token);
}

export function isBlank(term: AnyTerm): term is BlankNode {
    return term.termType === 'BlankNode';
}

export function isNamed(term: AnyTerm): term is NamedNode {
    return term.termType === 'NamedNode';
}

export function isLiteral(term: AnyTerm): term is Literal {
    return term.termType === 'Literal';
}

/**
 * Recover the text of a literal term.
 */
export function literalText(term: Term): string {
    if (!isLiteral(term)) {
        throw createInvalidStatementError(`${term.id} is not a literal`, term.id);
    }
    return term.value;
}

function show(term: AnyTerm): string {
    return isBlank(term) || isNamed(term) || isLiteral(term) ? term.id : term.termType;
}

export function compareTerms(a: Term, b: Term): number {
    if (a.id < b.id) return -1;
    if (a.id > b.id) return 1;
    return 0;
}

/**
 * Build a statement, rejecting shapes the field graph never holds:
 * a non-blank subject, a non-IRI predicate, an IRI object, a typed or
 * tagged literal, or an empty literal.
 */
export function createStatement(subject: AnyTerm, predicate: AnyTerm, object: AnyTerm): Statement {
    const context = `${show(subject)} ${show(predicate)} ${show(object)}`;
    if (!isBlank(subject)) {
        throw createInvalidStatementError(`subject must be a blank node, got ${show(subject)}`, context);
    }
    if (!isNamed(predicate)) {
        throw createInvalidStatementError(`predicate must be an IRI, got ${show(predicate)}`, context);
    }
    if (isBlank(object)) {
        return { subject, predicate, object };
    }
    if (!isLiteral(object)) {
        throw createInvalidStatementError(`object must be a blank node or literal, got ${show(object)}`, context);
    }
    if (object.language !== '' || object.datatype.value !== XSD_STRING) {
        throw createInvalidStatementError(`object must be a plain string, got ${object.id}`, context);
    }
    if (object.value === '') {
        throw createInvalidStatementError(`empty literal for <${predicate.value}>`, context);
    }
    return { subject, predicate, object };
}
