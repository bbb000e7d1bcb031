import { randomBytes } from 'crypto';
import { blake2_256, concatBytes, u64ToBytesLE } from '../L0/Crypto.js';

/**
 * Output of one randomness draw: 32 bytes plus the block at which the
 * source last became unpredictable.
 */
export interface RandomnessOutput {
    output: Uint8Array;
    blockNumber: bigint;
}

/**
 * Domain-separated randomness. `subject` keeps draws for different purposes
 * (e.g. "dna" and "gender") independent of each other.
 */
export interface RandomnessSource {
    random(subject: Uint8Array): RandomnessOutput;
}

export interface HeightOracle {
    current(): bigint;
}

/**
 * Environment Port: System Clock
 */
export interface ISystemClock {
    now(): number; // ms since epoch
}

export const systemClock: ISystemClock = { now: () => Date.now() };

// --- Height Oracles ---

export class ManualHeightOracle implements HeightOracle {
    constructor(private height: bigint = 0n) { }

    public current(): bigint { return this.height; }

    public advance(blocks: bigint = 1n): bigint {
        this.height += blocks;
        return this.height;
    }
}

/** Slot height derived from wall-clock time: floor((now - genesis) / blockTimeMs). */
export class ClockHeightOracle implements HeightOracle {
    constructor(
        private blockTimeMs: number,
        private clock: ISystemClock = systemClock,
        private genesisMs: number = clock.now()
    ) {
        if (!Number.isInteger(blockTimeMs) || blockTimeMs <= 0) {
            throw new RangeError('blockTimeMs must be a positive integer');
        }
    }

    public current(): bigint {
        const elapsed = Math.max(0, this.clock.now() - this.genesisMs);
        return BigInt(Math.floor(elapsed / this.blockTimeMs));
    }
}

// --- Randomness Sources ---

/**
 * Deterministic per block: the same subject drawn twice at one height yields
 * the same output. Whoever controls the seed or the height can steer it.
 */
export class BlockHashRandomness implements RandomnessSource {
    constructor(private seed: Uint8Array, private height: HeightOracle) { }

    public random(subject: Uint8Array): RandomnessOutput {
        const blockNumber = this.height.current();
        const output = blake2_256(concatBytes(this.seed, u64ToBytesLE(blockNumber), subject));
        return { output, blockNumber };
    }
}

/** Fresh OS randomness on every draw. */
export class SystemRandomness implements RandomnessSource {
    constructor(private height: HeightOracle) { }

    public random(_subject: Uint8Array): RandomnessOutput {
        return { output: new Uint8Array(randomBytes(32)), blockNumber: this.height.current() };
    }
}
