import { describe, test, expect } from '@jest/globals';
import { loadConfig } from '../Config.js';
import { renderTemplate } from '../Template.js';
import { ErrorCode } from '../../kernel-core/Errors.js';

describe('loadConfig', () => {
    test('defaults', () => {
        expect(loadConfig({})).toEqual({
            port: 3000,
            vaultDbPath: 'vault.db',
            blobDir: 'blobs',
            manifestDir: 'products',
            sovereignSuffixes: ['.local', '.internal'],
            optimizerThresholdNs: 1_000_000,
        });
    });

    test('reads overrides from the environment', () => {
        const config = loadConfig({
            PORT: '8080',
            VAULT_DB_PATH: '/data/vault.db',
            SOVEREIGN_SUFFIXES: '.gov.example, .mil.example,',
            OPTIMIZER_THRESHOLD_NS: '250',
        });
        expect(config.port).toBe(8080);
        expect(config.vaultDbPath).toBe('/data/vault.db');
        expect(config.sovereignSuffixes).toEqual(['.gov.example', '.mil.example']);
        expect(config.optimizerThresholdNs).toBe(250);
    });

    test('rejects malformed integers', () => {
        expect(() => loadConfig({ PORT: 'eighty' })).toThrow("Config: PORT must be a non-negative integer, got 'eighty'");
        expect(() => loadConfig({ OPTIMIZER_THRESHOLD_NS: '-1' })).toThrow('OPTIMIZER_THRESHOLD_NS');
    });
});

describe('renderTemplate', () => {
    test('substitutes every placeholder', () => {
        expect(renderTemplate('app_name: {{ name }}\nlimit: {{limit}}\nagain: {{name}}', { name: 'shop', limit: 5 }))
            .toBe('app_name: shop\nlimit: 5\nagain: shop');
    });

    test('lists every missing variable once', () => {
        expect(() => renderTemplate('{{a}} {{b}} {{a}}', {})).toThrow(expect.objectContaining({
            code: ErrorCode.MANIFEST_INVALID,
            reason: 'Template variables missing: a, b',
        }));
    });

    test('text without placeholders is unchanged', () => {
        expect(renderTemplate('app_name: plain', { unused: 'x' })).toBe('app_name: plain');
    });
});
