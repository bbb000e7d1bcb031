import { produce, freeze } from 'immer';
import type { AccountId, Asset, AssetId, RegistryState } from '../L0/Ontology.js';
import type { RegistryConfig } from '../L0/Primitives.js';
import { createTable, lookup } from '../L0/Primitives.js';
import { CounterGuard, CapacityGuard, enforce } from '../L0/Guards.js';
import { checkInvariants } from '../L0/Invariants.js';
import { ErrorCode, KernelError } from '../Errors.js';

export function emptyState(): RegistryState {
    return { assetCount: 0n, assets: createTable(), ownership: createTable(), version: 0 };
}

/** Rebuilds the tables of a state that came from outside, such as storage. */
export function adoptState(state: RegistryState): RegistryState {
    return { ...state, assets: createTable(state.assets), ownership: createTable(state.ownership) };
}

// --- AssetStore ---
// Authoritative table of assets plus the global counter.
export class AssetStore {
    constructor(private state: RegistryState) { }

    public count(): bigint {
        return this.state.assetCount;
    }

    public get(id: AssetId): Asset | undefined {
        const asset = lookup(this.state.assets, id);
        return asset ? { ...asset } : undefined;
    }

    /** Like `get`, but a missing asset is an ASSET_NOT_FOUND error. */
    public require(id: AssetId): Asset {
        const asset = this.get(id);
        if (!asset) throw new KernelError(ErrorCode.ASSET_NOT_FOUND, `Asset ${id} does not exist`, { assetId: id });
        return asset;
    }

    public has(id: AssetId): boolean {
        return Object.prototype.hasOwnProperty.call(this.state.assets, id);
    }

    public insert(id: AssetId, asset: Asset): void {
        if (this.has(id)) {
            throw new KernelError(ErrorCode.DUPLICATE_IDENTIFIER, `Identifier collision on ${id}`, { assetId: id });
        }
        this.state.assets[id] = { ...asset };
    }

    /**
     * Returns count + 1 without storing it. Pair with putCount once the insert succeeded.
     */
    public incrementCount(): bigint {
        enforce(CounterGuard({ count: this.state.assetCount }));
        return this.state.assetCount + 1n;
    }

    public putCount(count: bigint): void {
        this.state.assetCount = count;
    }

    public update(id: AssetId, patch: Partial<Pick<Asset, 'price' | 'owner'>>): void {
        const asset = lookup(this.state.assets, id);
        if (!asset) throw new KernelError(ErrorCode.ASSET_NOT_FOUND, `Asset ${id} does not exist`, { assetId: id });
        if (patch.price !== undefined) asset.price = patch.price;
        if (patch.owner !== undefined) asset.owner = patch.owner;
    }

    public entries(): [AssetId, Asset][] {
        return Object.entries(this.state.assets).map(([id, asset]) => [id, { ...asset }]);
    }
}

// --- OwnershipIndex ---
// Per-owner bounded sequence of identifiers, in arrival order.
export class OwnershipIndex {
    constructor(private state: RegistryState, private maxOwned: number) { }

    public tryAppend(owner: AccountId, id: AssetId): void {
        const owned = lookup(this.state.ownership, owner) ?? [];
        enforce(CapacityGuard({ owner, owned: owned.length, maxOwned: this.maxOwned }));
        this.state.ownership[owner] = [...owned, id];
    }

    public ownedBy(owner: AccountId): AssetId[] {
        return [...(lookup(this.state.ownership, owner) ?? [])];
    }

    /** Removes `id` from the owner's sequence; drops the entry once empty. */
    public remove(owner: AccountId, id: AssetId): boolean {
        const owned = lookup(this.state.ownership, owner);
        if (!owned || !owned.includes(id)) return false;

        const rest = owned.filter(x => x !== id);
        if (rest.length === 0) delete this.state.ownership[owner];
        else this.state.ownership[owner] = rest;
        return true;
    }

    public owners(): AccountId[] {
        return Object.keys(this.state.ownership);
    }
}

export interface RegistryTransaction {
    assets: AssetStore;
    ownership: OwnershipIndex;
}

export type CommitListener = (state: RegistryState) => void;
export type Persister = (state: RegistryState) => void;

/**
 * Holds the registry state as an immutable value. Every mutation runs through
 * `transact`, which works on an immer draft: if the recipe throws, the draft is
 * discarded and readers never see a partial write.
 *
 * Order of a commit: recipe, invariant check, persisters, settle, publish,
 * commit listeners. Anything throwing before publish abandons the draft.
 */
export class StateModel {
    private current: RegistryState;
    private listeners: CommitListener[] = [];
    private persisters: Persister[] = [];

    constructor(private config: RegistryConfig, initial: RegistryState = emptyState()) {
        this.current = freeze(adoptState(initial), true);
    }

    public get maxOwned(): number { return this.config.maxOwned; }

    /**
     * `settle` runs after the new state is computed, verified and persisted but
     * before it is published; throwing from it abandons the transaction and
     * writes the previous state back to the persisters.
     */
    public transact<T>(recipe: (tx: RegistryTransaction) => T, settle?: (next: RegistryState) => void): T {
        const box: { outcome?: { value: T } } = {};

        const next = produce(this.current, draft => {
            const tx: RegistryTransaction = {
                assets: new AssetStore(draft),
                ownership: new OwnershipIndex(draft, this.config.maxOwned)
            };
            box.outcome = { value: recipe(tx) };
            draft.version++;

            if (this.config.verifyInvariants) {
                const check = checkInvariants({ state: draft, config: this.config });
                if (!check.ok) {
                    throw new KernelError(ErrorCode.INTEGRITY_BREACH, check.rejection.message, { ...check.rejection });
                }
            }
        });

        const { outcome } = box;
        if (!outcome) throw new KernelError(ErrorCode.INTEGRITY_BREACH, 'Transaction produced no outcome');
        this.persist(next);
        try {
            settle?.(next);
        } catch (e) {
            this.restorePersisted();
            throw e;
        }

        this.current = next;
        for (const listener of this.listeners) listener(next);
        return outcome.value;
    }

    /** Read-only views over the committed state. */
    public get assets(): AssetStore { return new AssetStore(this.current); }
    public get ownership(): OwnershipIndex { return new OwnershipIndex(this.current, this.config.maxOwned); }

    public snapshot(): RegistryState {
        return this.current;
    }

    /** Observers of published states. */
    public onCommit(listener: CommitListener): void {
        this.listeners.push(listener);
    }

    /** Durable writers. A throwing persister fails the transaction. */
    public onPersist(persister: Persister): void {
        this.persisters.push(persister);
    }

    private persist(state: RegistryState): void {
        for (const persister of this.persisters) persister(state);
    }

    private restorePersisted(): void {
        try {
            this.persist(this.current);
        } catch (e) {
            console.error(`[Registry] Could not restore persisted state to version ${this.current.version}: ${e instanceof Error ? e.message : String(e)}`);
        }
    }
}
