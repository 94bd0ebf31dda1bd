import { describe, test, expect, beforeAll, afterAll, afterEach, jest } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileManifestSource } from '../io/FileManifestSource.js';
import { HttpFetcher } from '../io/HttpFetcher.js';
import { ErrorCode } from '../../kernel-core/Errors.js';

describe('FileManifestSource', () => {
    let root: string;

    beforeAll(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'manifests-'));
        fs.mkdirSync(path.join(root, 'base'));
        fs.writeFileSync(path.join(root, 'base', 'manifest.yaml'), 'app_name: base\n');
    });

    afterAll(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    test('loads <root>/<name>/manifest.yaml', async () => {
        expect(await new FileManifestSource(root).load('base')).toBe('app_name: base\n');
    });

    test('a missing parent is NOT_FOUND', async () => {
        await expect(new FileManifestSource(root).load('ghost')).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
    });

    test('names cannot leave the root', async () => {
        await expect(new FileManifestSource(root).load('../base')).rejects.toMatchObject({ code: ErrorCode.MANIFEST_INVALID });
        await expect(new FileManifestSource(root).load('..')).rejects.toMatchObject({ code: ErrorCode.MANIFEST_INVALID });
    });
});

describe('HttpFetcher', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('returns the parsed body', async () => {
        const fetchSpy = jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
        expect(await new HttpFetcher().fetchJson('http://svc.local/x')).toEqual({ ok: true });
        expect(fetchSpy.mock.calls[0]?.[0]).toBe('http://svc.local/x');
    });

    test('non-2xx answers are NETWORK_FAILURE', async () => {
        jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('nope', { status: 503 }));
        await expect(new HttpFetcher().fetchJson('http://svc.local/x')).rejects.toMatchObject({
            code: ErrorCode.NETWORK_FAILURE,
            reason: 'Endpoint http://svc.local/x answered 503',
        });
    });

    test('transport errors are NETWORK_FAILURE', async () => {
        jest.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
        await expect(new HttpFetcher().fetchJson('http://svc.local/x')).rejects.toMatchObject({ code: ErrorCode.NETWORK_FAILURE });
    });

    test('non-JSON bodies are MALFORMED_PAYLOAD', async () => {
        jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('<html>', { status: 200 }));
        await expect(new HttpFetcher().fetchJson('http://svc.local/x')).rejects.toMatchObject({ code: ErrorCode.MALFORMED_PAYLOAD });
    });
});
