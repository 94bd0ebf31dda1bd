import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { LocalBlobStore, MemoryBlobStore, blobKeyOf, blobRefFor } from '../blob/LocalBlobStore.js';
import { hash } from '../../kernel-core/L0/Crypto.js';
import { ErrorCode } from '../../kernel-core/Errors.js';

const bytes = (s: string) => new Uint8Array(Buffer.from(s, 'utf8'));

describe('Blob stores', () => {
    test('references are the content hash under the local scheme', () => {
        expect(blobRefFor(bytes('abc'))).toBe(`local://${hash(bytes('abc'))}`);
        expect(blobKeyOf(blobRefFor(bytes('abc')))).toBe(hash(bytes('abc')));
    });

    test('foreign schemes and malformed keys are refused', () => {
        expect(() => blobKeyOf('s3://bucket/key')).toThrow('Unsupported storage scheme: s3://bucket/key');
        expect(() => blobKeyOf('local://../../etc/passwd')).toThrow(expect.objectContaining({ code: ErrorCode.STORAGE_FAILURE }));
    });

    describe('MemoryBlobStore', () => {
        test('deduplicates identical payloads', async () => {
            const blobs = new MemoryBlobStore();
            const a = await blobs.write(bytes('same'));
            const b = await blobs.write(bytes('same'));
            expect(a).toBe(b);
            expect(blobs.size).toBe(1);
            expect(Buffer.from(await blobs.read(a)).toString('utf8')).toBe('same');
        });

        test('unknown references are NOT_FOUND', async () => {
            await expect(new MemoryBlobStore().read(blobRefFor(bytes('x')))).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
        });
    });

    describe('LocalBlobStore', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'blobs-'));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        test('writes one file per distinct payload', async () => {
            const blobs = new LocalBlobStore(path.join(dir, 'nested'));
            const ref = await blobs.write(bytes('payload'));
            await blobs.write(bytes('payload'));

            expect(fs.readdirSync(path.join(dir, 'nested'))).toEqual([hash(bytes('payload'))]);
            expect(Buffer.from(await blobs.read(ref)).toString('utf8')).toBe('payload');
        });

        test('empty payloads round-trip', async () => {
            const blobs = new LocalBlobStore(dir);
            expect((await blobs.read(await blobs.write(new Uint8Array(0)))).length).toBe(0);
        });

        test('missing blobs are NOT_FOUND', async () => {
            await expect(new LocalBlobStore(dir).read(blobRefFor(bytes('never')))).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
        });
    });
});
