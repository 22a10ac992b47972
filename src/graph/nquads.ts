import { Parser, Writer } from 'n3';
import type { Quad } from 'n3';
import type { Statement } from '../types/graph.js';
import { createParseError, GraftException } from '../types/errors.js';
import { createStatement } from './term.js';

const writer = new Writer({ format: 'N-Quads' });

/**
 * Format a statement as a single N-Quads line in the default graph.
 */
export function formatStatement(statement: Statement): string {
    return writer.quadToString(statement.subject, statement.predicate, statement.object).trimEnd();
}

/**
 * Parse a single N-Quads line.
 */
export function parseStatement(line: string): Statement {
    const statements = parseStatements(line);
    if (statements.length !== 1) {
        throw createParseError(`Expected one statement, found ${statements.length}`, line);
    }
    return statements[0];
}

/**
 * Parse a block of N-Quads text. Blank lines and `#` comments are
 * skipped; every statement must be one the field graph can hold.
 */
export function parseStatements(text: string): Statement[] {
    // An empty prefix keeps blank node labels as written.
    const parser = new Parser({ format: 'N-Quads', blankNodePrefix: '' });
    let quads: Quad[];
    try {
        quads = parser.parse(text);
    } catch (e) {
        throw createParseError(e instanceof Error ? e.message : String(e), text);
    }
    return quads.map(q => toStatement(q, text));
}

function toStatement(quad: Quad, text: string): Statement {
    if (quad.graph.termType !== 'DefaultGraph') {
        throw createParseError(`statement in named graph ${quad.graph.value}`, text);
    }
    try {
        return createStatement(quad.subject, quad.predicate, quad.object);
    } catch (e) {
        if (e instanceof GraftException) {
            throw createParseError(e.message, text);
        }
        throw e;
    }
}
