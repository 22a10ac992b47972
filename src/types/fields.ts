// === Field documents ===

/**
 * Alternate indexing of a field, e.g. a `text` sub-field of a `keyword`.
 */
export interface MultiField {
    name: string;
    type: string;
    /** Full dotted path of the sub-field. Taxonomy documents carry it. */
    flat_name?: string;
}

/**
 * A taxonomy field-set record. Nested `fields` are keyed by their
 * full dotted path, not by a relative name.
 */
export interface TaxonomyField {
    name?: string;
    type?: string;
    fields?: Record<string, TaxonomyField>;
    multi_fields?: MultiField[];
}

/** Field-set name to record, as in the canonical taxonomy. */
export type TaxonomyDocument = Record<string, TaxonomyField>;

/**
 * An authored field record. `name` is relative to the enclosing
 * record, and may itself be dotted.
 */
export interface AuthoredField {
    name: string;
    type?: string;
    fields?: AuthoredField[];
    multi_fields?: MultiField[];
    /** Origin tag for fields whose definition comes from elsewhere. */
    external?: string;
}

export type AuthoredDocument = AuthoredField[];

/** Hash namespace that keeps the two hierarchies apart. */
export type Namespace = 'schema' | 'package';
