import type { Atom, ContextID, Hash } from '../kernel-core/L0/Ontology.js';
import { GLOBAL_CONTEXT } from '../kernel-core/L0/Ontology.js';
import { Vault } from '../kernel-core/L2/Vault.js';
import type { IBlobStore, IFetcher, IManifestSource } from '../Platform/Ports.js';
import { SQLiteKeyStore } from '../infrastructure/persistence/SQLiteKeyStore.js';
import { MemoryBlobStore } from '../infrastructure/blob/LocalBlobStore.js';
import { ErrorCode, KernelError } from '../kernel-core/Errors.js';

export const FIXED_NOW = '2026-01-01T00:00:00.000Z';

export function makeVault() {
    const store = new SQLiteKeyStore(':memory:');
    const blobs = new MemoryBlobStore();
    const vault = new Vault(store, blobs, { now: () => FIXED_NOW });
    return { store, blobs, vault };
}

export async function draft(
    blobs: IBlobStore,
    opCode: number,
    payload: Uint8Array = new Uint8Array(0),
    contextId: ContextID = GLOBAL_CONTEXT,
    inputs: Hash[] = []
): Promise<Atom> {
    return { opCode, inputs, payloadRef: await blobs.write(payload), contextId };
}

export class StubFetcher implements IFetcher {
    public readonly calls: string[] = [];

    constructor(private readonly responses: Record<string, unknown> = {}) { }

    async fetchJson(endpoint: string): Promise<unknown> {
        this.calls.push(endpoint);
        if (!(endpoint in this.responses)) {
            throw new KernelError(ErrorCode.NETWORK_FAILURE, `No route to ${endpoint}`);
        }
        return this.responses[endpoint];
    }
}

export class StubManifestSource implements IManifestSource {
    constructor(private readonly manifests: Record<string, string> = {}) { }

    async load(name: string): Promise<string> {
        const raw = this.manifests[name];
        if (raw === undefined) throw new KernelError(ErrorCode.NOT_FOUND, `No manifest '${name}'`);
        return raw;
    }
}
