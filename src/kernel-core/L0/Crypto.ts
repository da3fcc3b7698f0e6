// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';
import { recoverMessageAddress } from 'viem';
import type { Address, Hex } from './Primitives.js';
import { ZERO_ADDRESS } from './Primitives.js';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical serialization: sorted keys, bigints as decimal strings
export function canonicalize(value: unknown): string {
    return JSON.stringify(normalize(value));
}

function normalize(value: unknown): unknown {
    if (typeof value === 'bigint') return value.toString();
    if (Array.isArray(value)) return value.map(normalize);
    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        const entries: [string, unknown][] = Object.entries(value);
        entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        for (const [key, field] of entries) {
            out[key] = normalize(field);
        }
        return out;
    }
    return value;
}

// 1.3 Signer Recovery (secp256k1, EIP-191 personal message over the raw digest)
export type SignerRecovery = (digest: Hex, signature: Hex) => Promise<Address>;

/**
 * Recovers the identity that signed `digest`. Any malformed signature maps to
 * ZERO_ADDRESS, which never equals a configured owner.
 */
export const recoverSigner: SignerRecovery = async (digest, signature) => {
    try {
        return await recoverMessageAddress({ message: { raw: digest }, signature });
    } catch (e) {
        return ZERO_ADDRESS;
    }
};

// 1.4 Identity equality (hex addresses compare case-insensitively)
export function sameIdentity(a: Address, b: Address): boolean {
    return a.toLowerCase() === b.toLowerCase();
}

export function isZeroIdentity(a: Address): boolean {
    return sameIdentity(a, ZERO_ADDRESS);
}
