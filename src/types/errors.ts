/**
 * Structured Error System for field-graft
 *
 * Provides machine-readable errors with codes, context, and suggestions.
 */

/**
 * Error codes for flattening, decoding and graft queries
 */
export type GraftErrorCode =
  | 'NOT_FOUND'           // Path or name anchor is not in the graph
  | 'NO_TYPE'             // Field carries no declared type
  | 'MULTIPLE_TYPES'      // Field carries conflicting declared types
  | 'INVALID_STATEMENT'   // Statement could not be constructed
  | 'DECODE_ERROR'        // Source document is malformed
  | 'PARSE_ERROR';        // N-Quads line could not be parsed

/**
 * Structured error with code, message and optional diagnostics
 */
export interface GraftError {
  code: GraftErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The offending path, document or line
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping GraftError for throw/catch patterns
 */
export class GraftException extends Error {
  public readonly error: GraftError;

  constructor(error: GraftError) {
    super(error.message);
    this.name = 'GraftException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GraftException);
    }
  }

  toJSON(): GraftError {
    return this.error;
  }
}

/**
 * Create a not found error for a path or name that is absent from the graph
 */
export function createNotFoundError(
  path: string,
  message: string = `not found: ${path}`
): GraftException {
  return new GraftException({
    code: 'NOT_FOUND',
    message,
    suggestion: 'Check that the document declaring this field was loaded',
    context: path,
    details: { path },
  });
}

/**
 * Create a no type error
 */
export function createNoTypeError(path: string): GraftException {
  return new GraftException({
    code: 'NO_TYPE',
    message: `no type: ${path}`,
    context: path,
    details: { path },
  });
}

/**
 * Create an error naming every conflicting declared type of a field
 */
export function createMultipleTypesError(
  path: string,
  types: string[]
): GraftException {
  return new GraftException({
    code: 'MULTIPLE_TYPES',
    message: `found multiple types: ${types.join(', ')}`,
    suggestion: 'Declare the field with a single type in every document',
    context: path,
    details: { path, types },
  });
}

/**
 * Create an error for a statement the field graph cannot hold
 */
export function createInvalidStatementError(
  message: string,
  context?: string
): GraftException {
  return new GraftException({
    code: 'INVALID_STATEMENT',
    message: `Invalid statement: ${message}`,
    context,
  });
}

/**
 * Create a decode error for a malformed source document
 */
export function createDecodeError(
  message: string,
  source?: string,
  issues?: string[]
): GraftException {
  return new GraftException({
    code: 'DECODE_ERROR',
    message: source ? `Failed to decode ${source}: ${message}` : `Failed to decode document: ${message}`,
    context: source,
    details: issues ? { issues } : undefined,
  });
}

/**
 * Create a parse error for N-Quads input
 */
export function createParseError(
  message: string,
  input: string
): GraftException {
  return new GraftException({
    code: 'PARSE_ERROR',
    message: `Failed to parse statements: ${message}`,
    context: input,
  });
}

/**
 * Serialize a GraftError for JSON output
 */
export function serializeGraftError(error: GraftError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
