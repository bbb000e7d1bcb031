import type { RegistryState } from '../kernel-core/L0/Ontology.js';
export type { IEventStore, EventRecord } from '../kernel-core/L5/Audit.js';
export type { ISystemClock } from '../kernel-core/L3/Entropy.js';
export type { OriginResolver } from '../kernel-core/L1/Identity.js';

/**
 * Persistence Port: State Repository
 * Holds the latest committed registry state.
 */
export interface IStateRepository {
    load(): RegistryState | null;
    save(state: RegistryState): void;
}

/**
 * Persistence Port: Replay Store
 * Command ids already consumed by the platform.
 */
export interface IReplayStore {
    has(commandId: string): boolean;
    add(commandId: string): void;
}

/** Keeps seen ids in memory for the life of the process. */
export class MemoryReplayStore implements IReplayStore {
    private seen: Set<string> = new Set();

    has(commandId: string): boolean {
        return this.seen.has(commandId);
    }

    add(commandId: string): void {
        this.seen.add(commandId);
    }
}

/** Keeps state in memory only. */
export class MemoryStateRepository implements IStateRepository {
    private state: RegistryState | null = null;

    load(): RegistryState | null {
        return this.state;
    }

    save(state: RegistryState): void {
        this.state = state;
    }
}
