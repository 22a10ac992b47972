import type { Canonicalizer } from '../graph/canonical.js';
import type { GraftException } from './errors.js';

export interface BuildGraphOptions {
    /** Batch step applied once to the merged statements. Defaults to deduplication. */
    canonicalizer?: Canonicalizer;
    /**
     * Called for every statement that failed construction. The statement
     * is skipped and flattening continues.
     */
    onStatementError?: (error: GraftException) => void;
}

export const DEFAULTS = {
    schemaNamespace: 'schema',
    packageNamespace: 'package',
    hashAlgorithm: 'sha1',
    groupType: 'group',
    publishedValue: 'true',
    taxonomyEnvVar: 'FIELD_GRAFT_TAXONOMY',
} as const;
