import Database from 'better-sqlite3';
import { Gender } from '../../kernel-core/L0/Ontology.js';
import type { Asset, AssetId, AccountId, RegistryState } from '../../kernel-core/L0/Ontology.js';
import { ErrorCode, KernelError } from '../../kernel-core/Errors.js';
import { createTable } from '../../kernel-core/L0/Primitives.js';
import type { IStateRepository } from '../../Platform/Ports.js';

interface StateRow {
    version: number;
    body: string;
}

function corrupt(detail: string): never {
    throw new KernelError(ErrorCode.CODEC_ERROR, `Stored registry state is corrupt: ${detail}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toBigInt(value: unknown, field: string): bigint {
    if (typeof value !== 'string' || !/^[0-9]+$/.test(value)) corrupt(field);
    return BigInt(value);
}

function toAsset(value: unknown, id: string): Asset {
    if (!isRecord(value)) corrupt(`asset ${id}`);
    const { dna, price, gender, owner } = value;
    if (typeof dna !== 'string' || typeof owner !== 'string') corrupt(`asset ${id}`);
    if (gender !== Gender.Male && gender !== Gender.Female) corrupt(`gender of ${id}`);
    return { dna, owner, gender, price: price === null ? null : toBigInt(price, `price of ${id}`) };
}

export function serializeState(state: RegistryState): string {
    return JSON.stringify(state, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));
}

export function deserializeState(body: string): RegistryState {
    const raw: unknown = JSON.parse(body);
    if (!isRecord(raw) || !isRecord(raw.assets) || !isRecord(raw.ownership)) corrupt('shape');
    if (typeof raw.version !== 'number') corrupt('version');

    const assets: Record<AssetId, Asset> = createTable();
    for (const [id, asset] of Object.entries(raw.assets)) assets[id] = toAsset(asset, id);

    const ownership: Record<AccountId, AssetId[]> = createTable();
    for (const [owner, ids] of Object.entries(raw.ownership)) {
        if (!Array.isArray(ids) || !ids.every((x): x is string => typeof x === 'string')) corrupt(`index of ${owner}`);
        ownership[owner] = ids;
    }

    return { assetCount: toBigInt(raw.assetCount, 'assetCount'), assets, ownership, version: raw.version };
}

/**
 * Keeps the latest committed state as a single row.
 */
export class SQLiteStateRepository implements IStateRepository {
    private db: Database.Database;

    constructor(dbPath: string = 'registry.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS registry_state (
                id INTEGER PRIMARY KEY CHECK (id = 1),
                version INTEGER NOT NULL,
                body TEXT NOT NULL
            )
        `);
    }

    load(): RegistryState | null {
        const row = this.db.prepare<[], StateRow>('SELECT version, body FROM registry_state WHERE id = 1').get();
        if (!row) return null;
        return deserializeState(row.body);
    }

    save(state: RegistryState): void {
        this.db.prepare(`
            INSERT INTO registry_state (id, version, body) VALUES (1, ?, ?)
            ON CONFLICT(id) DO UPDATE SET version = excluded.version, body = excluded.body
        `).run(state.version, serializeState(state));
    }

    public close() {
        this.db.close();
    }
}
