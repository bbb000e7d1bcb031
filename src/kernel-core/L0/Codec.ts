// src/kernel-core/L0/Codec.ts
import { Gender, DNA_LENGTH } from './Ontology.js';
import type { Asset } from './Ontology.js';
import { fromHex, toHex, concatBytes } from './Crypto.js';
import { MAX_U128 } from './Primitives.js';
import { ErrorCode, KernelError } from '../Errors.js';

/*
 * Asset byte layout:
 *   dna        16 bytes
 *   price tag  1 byte   (0 = none, 1 = some)
 *   price      16 bytes u128 LE, present only when tag = 1
 *   gender     1 byte   (0 = Male, 1 = Female)
 *   owner len  4 bytes  u32 LE
 *   owner      UTF-8
 */

const GENDER_BYTE: Record<Gender, number> = {
    [Gender.Male]: 0,
    [Gender.Female]: 1
};

function fail(msg: string): never {
    throw new KernelError(ErrorCode.CODEC_ERROR, msg);
}

export function u128ToBytesLE(n: bigint): Uint8Array {
    if (n < 0n || n > MAX_U128) fail(`price out of u128 range: ${n}`);
    const out = new Uint8Array(16);
    let v = n;
    for (let i = 0; i < 16; i++) {
        out[i] = Number(v & 0xffn);
        v >>= 8n;
    }
    return out;
}

export function u128FromBytesLE(bytes: Uint8Array): bigint {
    let v = 0n;
    for (let i = bytes.length - 1; i >= 0; i--) {
        v = (v << 8n) | BigInt(bytes[i] ?? 0);
    }
    return v;
}

export function dnaToBytes(dna: string): Uint8Array {
    const bytes = fromHex(dna);
    if (bytes.length !== DNA_LENGTH) fail(`dna must be ${DNA_LENGTH} bytes, got ${bytes.length}`);
    return bytes;
}

export function encodeAsset(asset: Asset): Uint8Array {
    const owner = new TextEncoder().encode(asset.owner);
    const ownerLen = new Uint8Array(4);
    new DataView(ownerLen.buffer).setUint32(0, owner.length, true);

    const price = asset.price === null
        ? new Uint8Array([0])
        : concatBytes(new Uint8Array([1]), u128ToBytesLE(asset.price));

    return concatBytes(
        dnaToBytes(asset.dna),
        price,
        new Uint8Array([GENDER_BYTE[asset.gender]]),
        ownerLen,
        owner
    );
}

export function decodeAsset(bytes: Uint8Array): Asset {
    let offset = 0;
    const take = (n: number): Uint8Array => {
        if (offset + n > bytes.length) fail(`truncated asset: need ${n} bytes at offset ${offset}`);
        const slice = bytes.subarray(offset, offset + n);
        offset += n;
        return slice;
    };

    const dna = toHex(take(DNA_LENGTH));

    const tag = take(1)[0];
    let price: bigint | null = null;
    if (tag === 1) price = u128FromBytesLE(take(16));
    else if (tag !== 0) fail(`unknown price tag ${tag}`);

    const genderByte = take(1)[0];
    let gender: Gender = Gender.Male;
    if (genderByte === 1) gender = Gender.Female;
    else if (genderByte !== 0) fail(`unknown gender byte ${genderByte}`);

    const lenBytes = take(4);
    const len = new DataView(lenBytes.buffer, lenBytes.byteOffset, 4).getUint32(0, true);

    const ownerBytes = take(len);
    let owner: string;
    try {
        owner = new TextDecoder('utf-8', { fatal: true }).decode(ownerBytes);
    } catch (e) {
        fail('owner is not valid UTF-8');
    }

    if (offset !== bytes.length) fail(`trailing bytes after asset: ${bytes.length - offset}`);
    return { dna, price, gender, owner };
}

export function assetsEqual(a: Asset, b: Asset): boolean {
    return Buffer.from(encodeAsset(a)).equals(Buffer.from(encodeAsset(b)));
}
