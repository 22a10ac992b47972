import type { StatementCallback } from '../types/graph.js';
import type { TaxonomyDocument } from '../types/fields.js';
import { createInvalidStatementError } from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';
import { HAS_MULTI, IS_TYPE } from '../graph/filters.js';
import { StatementWriter } from './writer.js';

/**
 * Calls emit on every statement built from a taxonomy document.
 *
 * The resulting graph has this shape:
 *
 *   _:field <is:name> "name" .
 *   _:field <is:path> "full.dotted.path.to.name" .
 *   _:field <is:type> "type" .
 *   _:field <has:child> _:child .
 *   _:field <has:multi> _:multichild .
 *
 * _:multichild nodes only carry is: statements.
 *
 * Top-level keys are field-set names and emit nothing themselves;
 * keys below them are full dotted paths.
 */
export function flattenTaxonomy(
    document: TaxonomyDocument,
    emit: StatementCallback,
    parent: string = ''
): void {
    const writer = new StatementWriter(DEFAULTS.schemaNamespace, emit);

    for (const [field, props] of Object.entries(document)) {
        flattenTaxonomy(props.fields ?? {}, emit, field);
        if (parent === '') continue;

        const path = field.split('.');
        writer.groups(path, IS_TYPE, false);

        writer.attribute(field, IS_TYPE, props.type ?? '');
        writer.identify(field, path[path.length - 1]);

        for (const m of props.multi_fields ?? []) {
            const flatName = m.flat_name ?? `${field}.${m.name}`;
            const dot = flatName.lastIndexOf('.');
            if (dot < 0) {
                emit(undefined, createInvalidStatementError(
                    `multi-field '${flatName}' has no parent field`, flatName
                ));
                continue;
            }
            writer.edge(flatName.slice(0, dot), HAS_MULTI, flatName);
            writer.attribute(flatName, IS_TYPE, m.type);
            writer.identify(flatName, m.name);
        }
    }
}
