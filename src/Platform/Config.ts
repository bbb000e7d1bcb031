import * as fs from 'fs';
import { ErrorCode, KernelError } from '../kernel-core/Errors.js';
import { MAX_U32 } from '../kernel-core/L0/Primitives.js';
import type { RegistryConfig } from '../kernel-core/L0/Primitives.js';

/**
 * Registry runtime configuration.
 * Precedence: defaults < JSON file < environment.
 */
export interface PlatformConfig {
    registry: RegistryConfig & { verifyInvariants: boolean };
    port: number;
    databasePath: string;
    blockTimeMs: number;
}

export const DEFAULT_CONFIG: PlatformConfig = {
    registry: { maxOwned: 9999, verifyInvariants: false },
    port: 3000,
    databasePath: 'registry.db',
    blockTimeMs: 6000
};

type Env = Record<string, string | undefined>;

function invalid(key: string, value: unknown): never {
    throw new KernelError(ErrorCode.INVALID_CONFIG, `Invalid value for ${key}: ${String(value)}`, { key });
}

function toInteger(key: string, value: unknown, min: number, max: number): number {
    const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof n !== 'number' || !Number.isInteger(n) || n < min || n > max) invalid(key, value);
    return n;
}

function toBoolean(key: string, value: unknown): boolean {
    if (typeof value === 'boolean') return value;
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    return invalid(key, value);
}

function toPath(key: string, value: unknown): string {
    if (typeof value !== 'string' || value.length === 0) invalid(key, value);
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFile(file: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (e) {
        throw new KernelError(ErrorCode.INVALID_CONFIG, `Cannot read config file ${file}: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!isRecord(parsed)) invalid(file, 'not an object');
    return parsed;
}

export function loadConfig(env: Env = process.env, file?: string): PlatformConfig {
    const raw: Record<string, unknown> = file ? readFile(file) : {};

    const pick = (envKey: string, fileKey: string): unknown => env[envKey] ?? raw[fileKey];

    const maxOwned = pick('REGISTRY_MAX_OWNED', 'maxOwned');
    const verify = pick('REGISTRY_VERIFY_INVARIANTS', 'verifyInvariants');
    const port = pick('REGISTRY_PORT', 'port');
    const databasePath = pick('REGISTRY_DB_PATH', 'databasePath');
    const blockTimeMs = pick('REGISTRY_BLOCK_TIME_MS', 'blockTimeMs');

    return {
        registry: {
            maxOwned: maxOwned === undefined ? DEFAULT_CONFIG.registry.maxOwned : toInteger('maxOwned', maxOwned, 0, MAX_U32),
            verifyInvariants: verify === undefined ? DEFAULT_CONFIG.registry.verifyInvariants : toBoolean('verifyInvariants', verify)
        },
        port: port === undefined ? DEFAULT_CONFIG.port : toInteger('port', port, 0, 65535),
        databasePath: databasePath === undefined ? DEFAULT_CONFIG.databasePath : toPath('databasePath', databasePath),
        blockTimeMs: blockTimeMs === undefined ? DEFAULT_CONFIG.blockTimeMs : toInteger('blockTimeMs', blockTimeMs, 1, Number.MAX_SAFE_INTEGER)
    };
}
