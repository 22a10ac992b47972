import { graftReport } from '../src/report.js';
import { fixtureGraph } from './fixtures.js';

describe('graftReport', () => {
    test('lists fields with candidates and fields with errors', () => {
        const entries = graftReport(fixtureGraph());

        expect(entries.map(e => [e.path, e.candidates, e.error?.code])).toEqual([
            ['foo_package.message', ['message'], undefined],
            ['foo_package.registry', ['registry'], undefined],
            ['foo_package.registry.path', ['registry.path'], undefined],
            ['foo_package.size', ['file.size'], undefined],
            ['registry.path', ['file.path'], undefined],
            ['untyped', [], 'NO_TYPE'],
        ]);
    });

    test('includeEmpty keeps every published field', () => {
        const entries = graftReport(fixtureGraph(), { includeEmpty: true });
        expect(entries).toHaveLength(11);
        expect(entries[0]).toEqual({ path: 'foo_package', candidates: [] });
    });

    test('a taxonomy-only graph has nothing to report', () => {
        expect(graftReport(fixtureGraph([]))).toEqual([]);
    });
});
