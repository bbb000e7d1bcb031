import { blake2_256, concatBytes, u64ToBytesLE } from '../L0/Crypto.js';
import type { RegistryState } from '../L0/Ontology.js';
import { ManualHeightOracle } from '../L3/Entropy.js';
import type { RandomnessOutput, RandomnessSource } from '../L3/Entropy.js';
import { GeneticsEngine } from '../L3/Genetics.js';
import type { EventSink } from '../L5/Audit.js';
import { LifecycleService } from '../Kernel.js';

/** Returns the same 32 bytes on every draw. */
export class FixedRandomness implements RandomnessSource {
    constructor(private output: Uint8Array) { }

    random(_subject: Uint8Array): RandomnessOutput {
        return { output: this.output, blockNumber: 0n };
    }
}

/** A different, reproducible output on every draw. */
export class CountingRandomness implements RandomnessSource {
    private draws = 0n;

    random(subject: Uint8Array): RandomnessOutput {
        this.draws++;
        return { output: blake2_256(concatBytes(u64ToBytesLE(this.draws), subject)), blockNumber: 0n };
    }
}

export function makeLifecycle(
    maxOwned: number = 10,
    options: { events?: EventSink; initial?: RegistryState; randomness?: RandomnessSource; verifyInvariants?: boolean } = {}
): LifecycleService {
    const genetics = new GeneticsEngine(options.randomness ?? new CountingRandomness(), new ManualHeightOracle());
    return new LifecycleService(
        { maxOwned, verifyInvariants: options.verifyInvariants ?? true },
        genetics,
        options.events,
        options.initial
    );
}

export const dnaOf = (byte: number): Uint8Array => new Uint8Array(16).fill(byte);
