import { DEFAULT_SOVEREIGN_SUFFIXES } from '../kernel-core/L0/PolicyGuard.js';

export interface EngineConfig {
    port: number;
    vaultDbPath: string;
    blobDir: string;
    manifestDir: string;
    sovereignSuffixes: string[];
    optimizerThresholdNs: number;
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < 0) {
        throw new Error(`Config: ${key} must be a non-negative integer, got '${raw}'`);
    }
    return n;
}

function listFrom(env: Env, key: string, fallback: readonly string[]): string[] {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return [...fallback];
    return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export function loadConfig(env: Env = process.env): EngineConfig {
    return {
        port: intFrom(env, 'PORT', 3000),
        vaultDbPath: env['VAULT_DB_PATH'] || 'vault.db',
        blobDir: env['BLOB_DIR'] || 'blobs',
        manifestDir: env['MANIFEST_DIR'] || 'products',
        sovereignSuffixes: listFrom(env, 'SOVEREIGN_SUFFIXES', DEFAULT_SOVEREIGN_SUFFIXES),
        optimizerThresholdNs: intFrom(env, 'OPTIMIZER_THRESHOLD_NS', 1_000_000),
    };
}
