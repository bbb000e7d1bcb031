import Database from 'better-sqlite3';
import type { RegistryEvent } from '../../kernel-core/L0/Ontology.js';
import type { IEventStore, EventRecord } from '../../kernel-core/L5/Audit.js';
import { ErrorCode, KernelError } from '../../kernel-core/Errors.js';

interface EventRow {
    sequence: number;
    eventId: string;
    previousEventId: string;
    type: string;
    timestamp: number;
    payload: string;
}

function corrupt(detail: string): never {
    throw new KernelError(ErrorCode.CODEC_ERROR, `Stored event is corrupt: ${detail}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(payload: Record<string, unknown>, key: string): string {
    const value = payload[key];
    if (typeof value !== 'string') corrupt(`missing ${key}`);
    return value;
}

function amount(payload: Record<string, unknown>, key: string): bigint {
    return BigInt(field(payload, key));
}

export function decodeEvent(type: string, payload: Record<string, unknown>): RegistryEvent {
    switch (type) {
        case 'Created':
            return { type: 'Created', owner: field(payload, 'owner'), assetId: field(payload, 'assetId') };
        case 'PriceSet':
            return {
                type: 'PriceSet',
                owner: field(payload, 'owner'),
                assetId: field(payload, 'assetId'),
                price: payload.price === null ? null : amount(payload, 'price')
            };
        case 'Transferred':
            return { type: 'Transferred', from: field(payload, 'from'), to: field(payload, 'to'), assetId: field(payload, 'assetId') };
        case 'Bought':
            return {
                type: 'Bought',
                buyer: field(payload, 'buyer'),
                seller: field(payload, 'seller'),
                assetId: field(payload, 'assetId'),
                price: amount(payload, 'price')
            };
        default:
            return corrupt(`unknown event type ${type}`);
    }
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'registry.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS event_log (
                sequence INTEGER PRIMARY KEY,
                eventId TEXT UNIQUE NOT NULL,
                previousEventId TEXT NOT NULL,
                type TEXT NOT NULL,
                timestamp INTEGER NOT NULL,
                payload TEXT NOT NULL
            )
        `);
    }

    append(record: EventRecord): void {
        const stmt = this.db.prepare(`
            INSERT INTO event_log (
                sequence, eventId, previousEventId, type, timestamp, payload
            ) VALUES (
                ?, ?, ?, ?, ?, ?
            )
        `);

        const payload = JSON.stringify(record.event, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));

        stmt.run(
            record.sequence,
            record.eventId,
            record.previousEventId,
            record.event.type,
            record.timestamp,
            payload
        );
    }

    history(): EventRecord[] {
        const stmt = this.db.prepare<[], EventRow>('SELECT * FROM event_log ORDER BY sequence ASC');
        return stmt.all().map(row => this.mapRowToRecord(row));
    }

    latest(): EventRecord | null {
        const stmt = this.db.prepare<[], EventRow>('SELECT * FROM event_log ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToRecord(row);
    }

    private mapRowToRecord(row: EventRow): EventRecord {
        const payload: unknown = JSON.parse(row.payload);
        if (!isRecord(payload)) corrupt(`payload of ${row.eventId}`);

        return {
            eventId: row.eventId,
            previousEventId: row.previousEventId,
            sequence: row.sequence,
            event: decodeEvent(row.type, payload),
            timestamp: row.timestamp
        };
    }

    public close() {
        this.db.close();
    }
}
