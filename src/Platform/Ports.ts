import type { Atom, BlobRef, ContextID } from '../kernel-core/L0/Ontology.js';

/**
 * Persistence Port: Key-Value Store
 * Flat string keyspace; namespaces are key prefixes.
 * A single put() must be atomic.
 */
export interface IKeyValueStore {
    get(key: string): Promise<string | null>;
    put(key: string, value: string): Promise<void>;
    has(key: string): Promise<boolean>;
    entries(prefix?: string): Promise<Array<[string, string]>>;
}

/**
 * Persistence Port: Blob Store
 * Append-only bytes addressed by the hash of their content.
 */
export interface IBlobStore {
    write(data: Uint8Array): Promise<BlobRef>;
    read(ref: BlobRef): Promise<Uint8Array>;
}

/**
 * Generative Port: Loom
 * Turns a text instruction into a candidate atom scoped to a context.
 * Payload bytes are written to the blob store by the loom itself.
 */
export interface ILoom {
    weave(intent: string, contextId: ContextID): Promise<Atom>;
}

/**
 * Network Port: Fetcher
 * Retrieves an endpoint and returns its parsed JSON body.
 */
export interface IFetcher {
    fetchJson(endpoint: string): Promise<unknown>;
}

/**
 * Source Port: Manifests
 * Resolves a parent manifest name to its raw text.
 */
export interface IManifestSource {
    load(name: string): Promise<string>;
}

/**
 * Environment Port: System Clock
 */
export interface ISystemClock {
    now(): string; // ISO-8601
}
