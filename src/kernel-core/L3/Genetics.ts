import { Gender, DNA_LENGTH } from '../L0/Ontology.js';
import type { AssetId } from '../L0/Ontology.js';
import { blake2_128, concatBytes, u64ToBytesLE } from '../L0/Crypto.js';
import { dnaToBytes } from '../L0/Codec.js';
import { DnaGuard, enforce } from '../L0/Guards.js';
import type { AssetStore } from '../L2/State.js';
import type { RandomnessSource, HeightOracle } from './Entropy.js';

const DNA_SUBJECT = new TextEncoder().encode('dna');
const GENDER_SUBJECT = new TextEncoder().encode('gender');

/** Parity rule on the first DNA byte: even is Male, odd is Female. */
export function genderOf(dna: Uint8Array): Gender {
    enforce(DnaGuard({ dna }));
    return (dna[0] ?? 0) % 2 === 0 ? Gender.Male : Gender.Female;
}

/**
 * Bitwise inheritance: each child bit comes from `dna1` where the mask bit is 1
 * and from `dna2` where it is 0.
 */
export function mix(mask: Uint8Array, dna1: Uint8Array, dna2: Uint8Array): Uint8Array {
    for (const dna of [mask, dna1, dna2]) enforce(DnaGuard({ dna }));

    const child = new Uint8Array(DNA_LENGTH);
    for (let i = 0; i < DNA_LENGTH; i++) {
        const m = mask[i] ?? 0;
        child[i] = (m & (dna1[i] ?? 0)) | (~m & (dna2[i] ?? 0));
    }
    return child;
}

export class GeneticsEngine {
    constructor(
        private randomness: RandomnessSource,
        private height: HeightOracle
    ) { }

    /**
     * blake2-128 over (randomness("dna") || height as u64 LE). Two draws at the
     * same height from a per-block source are identical.
     */
    public generateDna(): Uint8Array {
        const { output } = this.randomness.random(DNA_SUBJECT);
        return blake2_128(concatBytes(output, u64ToBytesLE(this.height.current())));
    }

    public generateGender(): Gender {
        const { output } = this.randomness.random(GENDER_SUBJECT);
        return (output[0] ?? 0) % 2 === 0 ? Gender.Male : Gender.Female;
    }

    public combine(assets: AssetStore, parent1: AssetId, parent2: AssetId): Uint8Array {
        const p1 = assets.require(parent1);
        const p2 = assets.require(parent2);
        return mix(this.generateDna(), dnaToBytes(p1.dna), dnaToBytes(p2.dna));
    }
}
