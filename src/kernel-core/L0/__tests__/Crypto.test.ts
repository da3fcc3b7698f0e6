import { describe, test, expect } from '@jest/globals';
import { keccak256, toHex } from 'viem';
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';
import { canonicalize, hash, isZeroIdentity, recoverSigner, sameIdentity } from '../Crypto.js';
import { ZERO_ADDRESS } from '../Primitives.js';

describe('Crypto Primitives', () => {
    const signer = privateKeyToAccount(generatePrivateKey());
    const digest = keccak256(toHex('payload'));

    test('hash is hex sha256', () => {
        expect(hash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    test('canonicalize sorts keys and renders bigints as strings', () => {
        expect(canonicalize({ b: 1n, a: [2n, { d: true, c: null }] })).toBe('{"a":["2",{"c":null,"d":true}],"b":"1"}');
    });

    test('recovers the signer of a raw digest', async () => {
        const signature = await signer.signMessage({ message: { raw: digest } });
        expect(await recoverSigner(digest, signature)).toBe(signer.address);
    });

    test('malformed signatures recover to the zero identity', async () => {
        expect(await recoverSigner(digest, '0xdeadbeef')).toBe(ZERO_ADDRESS);
    });

    test('identity equality is case-insensitive', () => {
        expect(sameIdentity('0x00000000000000000000000000000000000000aB', '0x00000000000000000000000000000000000000Ab')).toBe(true);
        expect(isZeroIdentity(ZERO_ADDRESS)).toBe(true);
        expect(isZeroIdentity(signer.address)).toBe(false);
    });
});
