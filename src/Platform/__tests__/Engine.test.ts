import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Engine } from '../Engine.js';
import { SQLiteKeyStore } from '../../infrastructure/persistence/SQLiteKeyStore.js';
import { MemoryBlobStore } from '../../infrastructure/blob/LocalBlobStore.js';
import { GENESIS_CATALOG } from '../../kernel-core/L5/Genesis.js';
import { StubFetcher, StubManifestSource } from '../../__tests__/fixtures.js';

describe('Engine', () => {
    let engine: Engine;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        engine = new Engine({
            store: new SQLiteKeyStore(':memory:'),
            blobs: new MemoryBlobStore(),
            fetcher: new StubFetcher({ 'http://stock.local/items': [{ sku: 'A1', qty: 3 }, { sku: 'B2', qty: 0 }] }),
            manifests: new StubManifestSource(),
        }, { sovereignSuffixes: ['.local'], optimizerThresholdNs: 1_000_000 });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('boot seeds the registry', async () => {
        expect(engine.Registry.size).toBe(0);
        const registry = await engine.boot();
        expect(registry.size).toBe(GENESIS_CATALOG.length);
        expect(engine.Registry).toBe(registry);
    });

    test('a manifest compiles and evaluates end to end', async () => {
        const project = await engine.orchestrator.deployProject(`
app_name: stock
nodes:
  - name: items
    intent: Fetch http://stock.local/items as sovereign
  - name: root
    intent: Filter qty > 0
    dependencies: [items]
`, 'org-1');

        expect(project.status).toBe('ACTIVE');
        expect(await engine.kernel.executeSmart(project.rootHash)).toEqual([{ sku: 'A1', qty: 3 }]);
    });
});
