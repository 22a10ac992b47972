/**
 * Field document decoding
 *
 * Documents arrive as JSON text. Only the properties the flattener reads
 * are kept; anything else in a record is dropped.
 */

import { z } from 'zod';
import type {
    AuthoredDocument,
    AuthoredField,
    MultiField,
    TaxonomyDocument,
    TaxonomyField,
} from './types/fields.js';
import { createDecodeError } from './types/errors.js';

const multiFieldSchema: z.ZodType<MultiField> = z.object({
    name: z.string().min(1),
    type: z.string().min(1),
    flat_name: z.string().optional(),
});

const taxonomyFieldSchema: z.ZodType<TaxonomyField> = z.lazy(() =>
    z.object({
        name: z.string().optional(),
        type: z.string().optional(),
        fields: z.record(taxonomyFieldSchema).optional(),
        multi_fields: z.array(multiFieldSchema).optional(),
    })
);

const authoredFieldSchema: z.ZodType<AuthoredField> = z.lazy(() =>
    z.object({
        name: z.string().min(1),
        type: z.string().optional(),
        fields: z.array(authoredFieldSchema).optional(),
        multi_fields: z.array(multiFieldSchema).optional(),
        external: z.string().optional(),
    })
);

export const taxonomyDocumentSchema: z.ZodType<TaxonomyDocument> = z.record(taxonomyFieldSchema);
export const authoredDocumentSchema: z.ZodType<AuthoredDocument> = z.array(authoredFieldSchema);

export function decodeTaxonomyDocument(text: string, source?: string): TaxonomyDocument {
    return decode(taxonomyDocumentSchema, text, source);
}

export function decodeAuthoredDocument(text: string, source?: string): AuthoredDocument {
    return decode(authoredDocumentSchema, text, source);
}

function decode<T>(schema: z.ZodType<T>, text: string, source?: string): T {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (e) {
        throw createDecodeError(e instanceof Error ? e.message : String(e), source);
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw createDecodeError(issues[0] ?? 'invalid document', source, issues);
    }
    return parsed.data;
}
