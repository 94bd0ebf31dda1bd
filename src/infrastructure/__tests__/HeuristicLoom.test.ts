import { describe, test, expect } from '@jest/globals';
import { HeuristicLoom } from '../loom/HeuristicLoom.js';
import { MemoryBlobStore } from '../blob/LocalBlobStore.js';
import { OpCode } from '../../kernel-core/L0/Ontology.js';
import { decodeJson, decodeText, encodeI32s } from '../../kernel-core/L0/Codec.js';
import { ErrorCode } from '../../kernel-core/Errors.js';

describe('HeuristicLoom', () => {
    const blobs = new MemoryBlobStore();
    const loom = new HeuristicLoom(blobs);

    const weave = async (intent: string) => {
        const atom = await loom.weave(intent, 'shop');
        return { atom, payload: await blobs.read(atom.payloadRef) };
    };

    test('arithmetic intents become ADD', async () => {
        const { atom, payload } = await weave('Add 10 and 20');
        expect(atom).toMatchObject({ opCode: OpCode.ADD, inputs: [], contextId: 'shop' });
        expect(payload).toEqual(encodeI32s(10, 20));
    });

    test('financial intents carry their rate first', async () => {
        const zakat = await weave('Calculate Zakat for 5000');
        expect(zakat.atom.opCode).toBe(OpCode.FINANCIAL);
        expect(zakat.payload).toEqual(encodeI32s(0, 5000));

        const interest = await weave('charge 12% interest');
        expect(interest.payload).toEqual(encodeI32s(12));
    });

    test('filters parse numeric and text operands', async () => {
        const numeric = await weave('Filter built > 2020');
        expect(numeric.atom.opCode).toBe(OpCode.FILTER);
        expect(decodeJson(numeric.payload)).toEqual({ field: 'built', op: '>', val: 2020 });

        const text = await weave('filter name contains bolt');
        expect(decodeJson(text.payload)).toEqual({ field: 'name', op: 'contains', val: 'bolt' });
    });

    test('fetch intents carry a sensitivity', async () => {
        expect(decodeJson((await weave('Fetch http://ids.local/people as sovereign')).payload))
            .toEqual({ endpoint: 'http://ids.local/people', schema: {}, sensitivity: 2 });
        expect(decodeJson((await weave('fetch https://example.com/rates')).payload))
            .toEqual({ endpoint: 'https://example.com/rates', schema: {}, sensitivity: 0 });
    });

    test('merge, mask and trigger intents', async () => {
        expect((await weave('Merge the feeds')).atom.opCode).toBe(OpCode.MERGE);

        const mask = await weave('Mask phone, national_id');
        expect(mask.atom.opCode).toBe(OpCode.GATEWAY);
        expect(decodeJson(mask.payload)).toEqual({ mask: ['phone', 'national_id'] });

        const on = await weave('On order_created');
        expect(on.atom.opCode).toBe(OpCode.TRIGGER);
        expect(decodeJson(on.payload)).toEqual({ event: 'order_created' });
    });

    test('anything else is left for synthesis', async () => {
        const { atom, payload } = await weave('  Build a loyalty ledger  ');
        expect(atom.opCode).toBe(OpCode.SYNTHESIS);
        expect(decodeText(payload)).toBe('Build a loyalty ledger');
    });

    test('blank intents fail', async () => {
        await expect(loom.weave('   ', 'shop')).rejects.toMatchObject({ code: ErrorCode.WEAVE_FAILED });
    });
});
