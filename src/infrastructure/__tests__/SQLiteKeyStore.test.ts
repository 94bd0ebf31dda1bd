import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { SQLiteKeyStore } from '../persistence/SQLiteKeyStore.js';
import { ErrorCode } from '../../kernel-core/Errors.js';

describe('SQLiteKeyStore', () => {
    let store: SQLiteKeyStore;

    beforeEach(() => {
        store = new SQLiteKeyStore(':memory:');
    });

    afterEach(() => {
        store.close();
    });

    test('put overwrites and get misses return null', async () => {
        expect(await store.get('k')).toBeNull();
        await store.put('k', 'v1');
        await store.put('k', 'v2');
        expect(await store.get('k')).toBe('v2');
        expect(await store.has('k')).toBe(true);
        expect(await store.has('other')).toBe(false);
    });

    test('entries filter by literal prefix in key order', async () => {
        await store.put('atom:b', '2');
        await store.put('atom:a', '1');
        await store.put('identity:x', '3');
        await store.put('atom_like', '4');

        expect(await store.entries('atom:')).toEqual([['atom:a', '1'], ['atom:b', '2']]);
        expect((await store.entries()).map(([k]) => k)).toEqual(['atom:a', 'atom:b', 'atom_like', 'identity:x']);
    });

    test('prefix characters are not wildcards', async () => {
        await store.put('a%b', '1');
        await store.put('axb', '2');
        expect(await store.entries('a%')).toEqual([['a%b', '1']]);
    });

    test('a closed store reports STORAGE_FAILURE', async () => {
        const closed = new SQLiteKeyStore(':memory:');
        closed.close();
        await expect(closed.get('k')).rejects.toMatchObject({ code: ErrorCode.STORAGE_FAILURE, context: { operation: 'get' } });
    });
});
