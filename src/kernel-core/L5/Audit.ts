// src/kernel-core/L5/Audit.ts
import { hash, canonicalize } from '../L0/Crypto.js';
import type { RegistryEvent } from '../L0/Ontology.js';
import { systemClock } from '../L3/Entropy.js';
import type { ISystemClock } from '../L3/Entropy.js';

/**
 * Fire-and-forget notification of registry occurrences.
 */
export interface EventSink {
    notify(event: RegistryEvent): void;
}

/** Delivers to a sink without letting a sink failure reach the caller. */
export function emit(sink: EventSink | undefined, event: RegistryEvent): void {
    if (!sink) return;
    try {
        sink.notify(event);
    } catch (e) {
        console.warn(`[AuditLog] Event ${event.type} not delivered: ${e instanceof Error ? e.message : String(e)}`);
    }
}

/**
 * Event Store Port
 */
export interface IEventStore {
    append(record: EventRecord): void;
    history(): EventRecord[];
    latest(): EventRecord | null;
}

// --- Event Record (hash-chained) ---
export interface EventRecord {
    eventId: string; // The identifying hash
    previousEventId: string; // Chain linkage
    sequence: number;
    event: RegistryEvent;
    timestamp: number;
}

export const GENESIS_EVENT_ID = '0000000000000000000000000000000000000000000000000000000000000000';

export class AuditLog implements EventSink {
    // Full chain only without a store; with one, just the tip is kept.
    private localChain: EventRecord[] = [];
    private tip: EventRecord | null = null;

    constructor(
        private store?: IEventStore,
        private clock: ISystemClock = systemClock
    ) { }

    public notify(event: RegistryEvent): void {
        this.append(event);
    }

    public append(event: RegistryEvent): EventRecord {
        const latest = this.getTip();
        const previousEventId = latest ? latest.eventId : GENESIS_EVENT_ID;
        const sequence = latest ? latest.sequence + 1 : 0;
        const timestamp = this.clock.now();

        const record: EventRecord = {
            eventId: AuditLog.calculateHash(previousEventId, sequence, event, timestamp),
            previousEventId,
            sequence,
            event,
            timestamp
        };

        Object.freeze(record);

        if (this.store) this.store.append(record);
        else this.localChain.push(record);

        this.tip = record;
        return record;
    }

    public history(): EventRecord[] {
        if (this.store) {
            return this.store.history();
        }
        return [...this.localChain];
    }

    public verifyChain(): boolean {
        let prev = GENESIS_EVENT_ID;
        let expectedSequence = 0;

        for (const entry of this.history()) {
            if (entry.previousEventId !== prev) return false;
            if (entry.sequence !== expectedSequence) return false;

            const h = AuditLog.calculateHash(prev, entry.sequence, entry.event, entry.timestamp);
            if (h !== entry.eventId) return false;

            prev = entry.eventId;
            expectedSequence++;
        }
        return true;
    }

    public getTip(): EventRecord | null {
        if (this.tip) return this.tip;
        return this.store ? this.store.latest() : null;
    }

    private static calculateHash(prevId: string, sequence: number, event: RegistryEvent, timestamp: number): string {
        const canonical: [string, number, string, number] = [prevId, sequence, canonicalize(event), timestamp];
        return hash(canonicalize(canonical));
    }
}
