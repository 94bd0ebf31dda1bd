import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { canonicalize, generateKeyPair, hash, merkleRoot, signData, verifySignature } from '../Crypto.js';

describe('L0 Crypto', () => {
    test('hash is sha256 hex', () => {
        expect(hash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
        expect(hash(new Uint8Array(Buffer.from('abc', 'utf8')))).toBe(hash('abc'));
    });

    test('canonicalize sorts keys and drops undefined fields', () => {
        expect(canonicalize({ b: 1, a: [2, { d: null, c: 'x' }], z: undefined })).toBe('{"a":[2,{"c":"x","d":null}],"b":1}');
    });

    test('canonical form does not depend on key insertion order', () => {
        fc.assert(fc.property(
            fc.dictionary(fc.string({ maxLength: 8 }).filter(k => k !== '__proto__'), fc.oneof(fc.integer(), fc.string(), fc.boolean())),
            dict => {
                const reversed = Object.fromEntries(Object.entries(dict).reverse());
                expect(canonicalize(reversed)).toBe(canonicalize(dict));
            }
        ));
    });

    describe('merkleRoot', () => {
        const h1 = hash('a');
        const h2 = hash('b');
        const h3 = hash('c');

        test('a single leaf is its own root', () => {
            expect(merkleRoot([hash('only')])).toBe(hash('only'));
        });

        test('odd tail is paired with itself', () => {
            const expected = hash(hash(`${h1}${h2}`) + hash(`${h3}${h3}`));
            expect(merkleRoot([h1, h2, h3])).toBe(expected);
        });

        test('leaf order matters', () => {
            expect(merkleRoot([h1, h2])).not.toBe(merkleRoot([h2, h1]));
        });

        test('empty set has no root', () => {
            expect(() => merkleRoot([])).toThrow('empty set');
        });
    });

    describe('Ed25519', () => {
        test('signatures verify against the signing key only', async () => {
            const alice = await generateKeyPair();
            const bob = await generateKeyPair();
            const sig = await signData('claim', alice.privateKey);

            expect(await verifySignature('claim', sig, alice.publicKey)).toBe(true);
            expect(await verifySignature('claim!', sig, alice.publicKey)).toBe(false);
            expect(await verifySignature('claim', sig, bob.publicKey)).toBe(false);
        });

        test('malformed signature is a failed verification, not an exception', async () => {
            const alice = await generateKeyPair();
            expect(await verifySignature('claim', 'zz', alice.publicKey)).toBe(false);
        });
    });
});
