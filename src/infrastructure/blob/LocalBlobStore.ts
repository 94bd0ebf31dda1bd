import fs from 'fs';
import path from 'path';
import type { IBlobStore } from '../../Platform/Ports.js';
import type { BlobRef } from '../../kernel-core/L0/Ontology.js';
import { hash } from '../../kernel-core/L0/Crypto.js';
import { ErrorCode, KernelError } from '../../kernel-core/Errors.js';

export const LOCAL_SCHEME = 'local://';

export function blobRefFor(data: Uint8Array): BlobRef {
    return `${LOCAL_SCHEME}${hash(data)}`;
}

export function blobKeyOf(ref: BlobRef): string {
    if (!ref.startsWith(LOCAL_SCHEME)) {
        throw new KernelError(ErrorCode.STORAGE_FAILURE, `Unsupported storage scheme: ${ref}`, { operation: 'blob.read' });
    }
    const key = ref.slice(LOCAL_SCHEME.length);
    if (!/^[0-9a-f]{64}$/.test(key)) {
        throw new KernelError(ErrorCode.STORAGE_FAILURE, `Malformed blob reference: ${ref}`, { operation: 'blob.read' });
    }
    return key;
}

/**
 * Filesystem blob store. One file per blob, named by its sha256;
 * identical payloads deduplicate to a single file.
 */
export class LocalBlobStore implements IBlobStore {
    constructor(private readonly dir: string = 'blobs') { }

    async write(data: Uint8Array): Promise<BlobRef> {
        const ref = blobRefFor(data);
        const file = path.join(this.dir, blobKeyOf(ref));
        await fs.promises.mkdir(this.dir, { recursive: true });
        if (!fs.existsSync(file)) {
            await fs.promises.writeFile(file, data);
        }
        return ref;
    }

    async read(ref: BlobRef): Promise<Uint8Array> {
        const file = path.join(this.dir, blobKeyOf(ref));
        try {
            return new Uint8Array(await fs.promises.readFile(file));
        } catch (e) {
            throw new KernelError(ErrorCode.NOT_FOUND, `Blob ${ref} not found`, { operation: 'blob.read' }, { cause: e });
        }
    }
}

/** In-process blob store with the same addressing as LocalBlobStore. */
export class MemoryBlobStore implements IBlobStore {
    private blobs: Map<string, Uint8Array> = new Map();

    async write(data: Uint8Array): Promise<BlobRef> {
        const ref = blobRefFor(data);
        if (!this.blobs.has(ref)) this.blobs.set(ref, new Uint8Array(data));
        return ref;
    }

    async read(ref: BlobRef): Promise<Uint8Array> {
        blobKeyOf(ref);
        const data = this.blobs.get(ref);
        if (!data) throw new KernelError(ErrorCode.NOT_FOUND, `Blob ${ref} not found`, { operation: 'blob.read' });
        return new Uint8Array(data);
    }

    public get size(): number {
        return this.blobs.size;
    }
}
