// src/kernel-core/L5/Genesis.ts
import type { Atom, Hash } from '../L0/Ontology.js';
import { GLOBAL_CONTEXT, OpCode } from '../L0/Ontology.js';
import { encodeI32s, encodeJson } from '../L0/Codec.js';
import type { Vault } from '../L2/Vault.js';

interface GenesisEntry {
    name: string;
    opCode: number;
    payload: Uint8Array;
}

// The shared catalogue every project may import. All entries are global.
export const GENESIS_CATALOG: readonly GenesisEntry[] = [
    { name: 'law.interest_free', opCode: OpCode.FINANCIAL, payload: encodeI32s(0) },
    { name: 'law.sovereignty', opCode: OpCode.GATEWAY, payload: encodeJson({ origin: 'sovereign-gateway', mask: ['national_id', 'phone'] }) },
    { name: 'std.merge', opCode: OpCode.MERGE, payload: new Uint8Array(0) },
    { name: 'std.trigger', opCode: OpCode.TRIGGER, payload: encodeJson({ event: 'manual' }) },
];

/**
 * Ensures the catalogue exists in the vault and returns name -> hash.
 * Safe to call on every boot: content addressing makes re-writes no-ops.
 */
export async function ensureGenesis(vault: Vault): Promise<ReadonlyMap<string, Hash>> {
    const table = new Map<string, Hash>();
    for (const entry of GENESIS_CATALOG) {
        const atom: Atom = {
            opCode: entry.opCode,
            inputs: [],
            payloadRef: await vault.Blobs.write(entry.payload),
            contextId: GLOBAL_CONTEXT,
        };
        table.set(entry.name, await vault.persist(atom));
    }
    return table;
}
