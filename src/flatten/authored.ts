import type { StatementCallback } from '../types/graph.js';
import type { AuthoredField } from '../types/fields.js';
import { DEFAULTS } from '../types/options.js';
import { AS_TYPE, EXTERNAL_TYPE, HAS_MULTI } from '../graph/filters.js';
import { StatementWriter } from './writer.js';

/**
 * Calls emit on every statement built from authored field records.
 *
 * The shape matches the taxonomy graph with <as:type> in place of
 * <is:type>, plus two statements:
 *
 *   _:field <is:published> "true" .
 *   _:field <external:type> "origin" .
 *
 * Every node is published. The external tag is only written for leaves
 * whose record carries one.
 */
export function flattenAuthored(
    fields: AuthoredField[],
    emit: StatementCallback,
    parent: string = ''
): void {
    const writer = new StatementWriter(DEFAULTS.packageNamespace, emit);

    for (const props of fields) {
        const full = parent ? `${parent}.${props.name}` : props.name;
        flattenAuthored(props.fields ?? [], emit, full);

        const path = full.split('.');
        writer.groups(path, AS_TYPE, true);

        writer.published(full);
        writer.identify(full, path[path.length - 1]);
        if (props.external) {
            writer.attribute(full, EXTERNAL_TYPE, props.external);
        }
        if (props.type) {
            writer.attribute(full, AS_TYPE, props.type);
        }

        for (const m of props.multi_fields ?? []) {
            const flatName = `${full}.${m.name}`;
            writer.edge(full, HAS_MULTI, flatName);
            writer.published(flatName);
            writer.attribute(flatName, AS_TYPE, m.type);
            writer.identify(flatName, m.name);
        }
    }
}
