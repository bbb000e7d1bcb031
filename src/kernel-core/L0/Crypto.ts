// src/kernel-core/L0/Crypto.ts
import { createHash, randomBytes } from 'crypto';
import * as ed from '@noble/ed25519';

// 1.1 Hash Functions
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

/** 128-bit digest: blake2b-512 truncated to its first 16 bytes. */
export function blake2_128(data: Uint8Array): Uint8Array {
    const digest = createHash('blake2b512').update(data).digest();
    return new Uint8Array(digest.subarray(0, 16));
}

export function blake2_256(data: Uint8Array): Uint8Array {
    return new Uint8Array(createHash('blake2s256').update(data).digest());
}

// 1.2 Byte helpers
export function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
}

export function fromHex(hex: string): Uint8Array {
    if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
        throw new Error(`Invalid hex string: ${hex}`);
    }
    return new Uint8Array(Buffer.from(hex, 'hex'));
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
    const total = parts.reduce((sum, p) => sum + p.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const p of parts) {
        out.set(p, offset);
        offset += p.length;
    }
    return out;
}

export function u64ToBytesLE(n: bigint): Uint8Array {
    const buf = Buffer.alloc(8);
    buf.writeBigUInt64LE(n);
    return new Uint8Array(buf);
}

/**
 * Deterministic JSON: object keys sorted, bigints written as decimal strings.
 */
export function canonicalize(value: unknown): string {
    if (typeof value === 'bigint') return JSON.stringify(value.toString());
    if (value === null || typeof value !== 'object') return JSON.stringify(value) ?? 'null';
    if (Array.isArray(value)) return `[${value.map(canonicalize).join(',')}]`;

    const entries = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
}

// 1.3 Digital Signatures (Ed25519, hex encoded)
export type Ed25519PublicKey = string;
export type Ed25519PrivateKey = string;
export type Signature = string;

export interface KeyPair {
    publicKey: Ed25519PublicKey;
    privateKey: Ed25519PrivateKey;
}

export async function keyPairFromPrivate(privateKey: Ed25519PrivateKey): Promise<KeyPair> {
    const publicKey = await ed.getPublicKey(privateKey);
    return { publicKey: toHex(publicKey), privateKey };
}

export async function generateKeyPair(): Promise<KeyPair> {
    return keyPairFromPrivate(toHex(ed.utils.randomPrivateKey()));
}

export async function signData(data: string, privateKey: Ed25519PrivateKey): Promise<Signature> {
    const sig = await ed.sign(Buffer.from(data).toString('hex'), privateKey);
    return toHex(sig);
}

export async function verifySignature(data: string, signature: Signature, publicKey: Ed25519PublicKey): Promise<boolean> {
    try {
        return await ed.verify(signature, Buffer.from(data).toString('hex'), publicKey);
    } catch (e) {
        return false;
    }
}

// 1.4 Randomness
export function randomNonce(bytes: number = 32): string {
    return randomBytes(bytes).toString('hex');
}
