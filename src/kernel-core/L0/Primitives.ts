import { ErrorCode, KernelError } from '../Errors.js';

export const MAX_U32 = 0xffffffff;
export const MAX_U64 = (1n << 64n) - 1n;
export const MAX_U128 = (1n << 128n) - 1n;

/**
 * Constants injected at construction time.
 */
export interface RegistryConfig {
    /** Owner capacity ceiling (u32). */
    maxOwned: number;
    /** Run the invariant catalogue inside every transaction before it commits. */
    verifyInvariants?: boolean;
}

export function validateRegistryConfig(config: RegistryConfig): RegistryConfig {
    const { maxOwned } = config;
    if (!Number.isInteger(maxOwned) || maxOwned < 0 || maxOwned > MAX_U32) {
        throw new KernelError(ErrorCode.INVALID_CONFIG, `maxOwned must be a u32, got ${maxOwned}`);
    }
    return { ...config, verifyInvariants: config.verifyInvariants ?? false };
}

// --- Keyed tables ---
// Asset ids and account ids are caller-chosen strings, so tables have no
// prototype and reads only see own keys ('constructor', '__proto__' are plain keys).

export function createTable<T>(source: Readonly<Record<string, T>> = {}): Record<string, T> {
    const table: Record<string, T> = Object.create(null);
    for (const [key, value] of Object.entries(source)) table[key] = value;
    return table;
}

export function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
    return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}
