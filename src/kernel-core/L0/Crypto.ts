// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';
import * as ed from '@noble/ed25519';

// 1.1 Hash Function (SHA-256)
export function hash(data: string | Uint8Array): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical Serialization (sorted keys, no whitespace)
export function canonicalize(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value) ?? 'null';
    }
    if (Array.isArray(value)) {
        return `[${value.map(canonicalize).join(',')}]`;
    }
    const entries = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
}

// 1.3 Merkle Fold
// Pairwise concatenate-and-hash; an odd tail is paired with itself.
export function merkleRoot(leaves: readonly string[]): string {
    let level = [...leaves];
    while (level.length > 1) {
        const next: string[] = [];
        for (let i = 0; i < level.length; i += 2) {
            const left = level[i];
            if (left === undefined) continue;
            next.push(hash(left + (level[i + 1] ?? left)));
        }
        level = next;
    }
    const [root] = level;
    if (root === undefined) throw new Error('Merkle root of an empty set is undefined');
    return root;
}

// 1.4 Digital Signatures (Ed25519, hex encoded)
export type Ed25519PublicKey = string;
export type Ed25519PrivateKey = string;
export type Signature = string;

export interface KeyPair {
    publicKey: Ed25519PublicKey;
    privateKey: Ed25519PrivateKey;
}

const toHex = (bytes: Uint8Array): string => Buffer.from(bytes).toString('hex');

export async function generateKeyPair(): Promise<KeyPair> {
    const priv = ed.utils.randomPrivateKey();
    const pub = await ed.getPublicKey(priv);
    return { publicKey: toHex(pub), privateKey: toHex(priv) };
}

export async function signData(data: string, privateKeyHex: Ed25519PrivateKey): Promise<Signature> {
    const sig = await ed.sign(Buffer.from(data, 'utf8'), privateKeyHex);
    return toHex(sig);
}

export async function verifySignature(data: string, signature: Signature, publicKeyHex: Ed25519PublicKey): Promise<boolean> {
    try {
        return await ed.verify(signature, Buffer.from(data, 'utf8'), publicKeyHex);
    } catch {
        return false;
    }
}
