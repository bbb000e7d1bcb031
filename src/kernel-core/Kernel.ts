import { StateModel } from './L2/State.js';
import type { RegistryTransaction, CommitListener, Persister } from './L2/State.js';
import type { AccountId, Asset, AssetId, Balance, Gender, MintPhase, RegistryState } from './L0/Ontology.js';
import { toHex } from './L0/Crypto.js';
import { DnaGuard, enforce } from './L0/Guards.js';
import { checkInvariants } from './L0/Invariants.js';
import type { Rejection } from './L0/Invariants.js';
import type { RegistryConfig } from './L0/Primitives.js';
import { validateRegistryConfig } from './L0/Primitives.js';
import { deriveAssetId } from './L1/Identity.js';
import { GeneticsEngine } from './L3/Genetics.js';
import { emit } from './L5/Audit.js';
import type { EventSink } from './L5/Audit.js';
import { ErrorCode, KernelError } from './Errors.js';

/**
 * LifecycleService: the only writer of the asset store and ownership index.
 *
 * A mint moves Pending -> CounterReserved -> IndexReserved -> Committed; any
 * failure on the way jumps to Aborted, and because the whole chain runs inside
 * one StateModel transaction, an aborted mint leaves no trace.
 */
export class LifecycleService {
    private state: StateModel;
    private config: RegistryConfig;
    private phase: MintPhase = 'PENDING';

    constructor(
        config: RegistryConfig,
        private genetics: GeneticsEngine,
        private events?: EventSink,
        initial?: RegistryState
    ) {
        this.config = validateRegistryConfig(config);
        this.state = new StateModel(this.config, initial);
    }

    public mint(owner: AccountId, dna?: Uint8Array, gender?: Gender): AssetId {
        this.phase = 'PENDING';

        if (dna) enforce(DnaGuard({ dna }));
        const asset: Asset = {
            dna: toHex(dna ?? this.genetics.generateDna()),
            price: null,
            gender: gender ?? this.genetics.generateGender(),
            owner
        };
        const assetId = deriveAssetId(asset);

        try {
            this.state.transact((tx: RegistryTransaction) => {
                const newCount = tx.assets.incrementCount();
                this.phase = 'COUNTER_RESERVED';

                tx.ownership.tryAppend(owner, assetId);
                this.phase = 'INDEX_RESERVED';

                tx.assets.insert(assetId, asset);
                tx.assets.putCount(newCount);
            });
        } catch (e) {
            const code = e instanceof KernelError ? e.code : 'UNKNOWN';
            console.warn(`[Registry] Mint aborted in ${this.phase} for ${owner}: ${code}`);
            this.phase = 'ABORTED';
            throw e;
        }

        this.phase = 'COMMITTED';
        console.log(`[Registry] Minted ${assetId} for ${owner}`);
        emit(this.events, { type: 'Created', owner, assetId });
        return assetId;
    }

    /**
     * New asset whose DNA mixes both parents'. Gender is drawn fresh, not inherited.
     */
    public breed(owner: AccountId, parent1: AssetId, parent2: AssetId): AssetId {
        const dna = this.genetics.combine(this.state.assets, parent1, parent2);
        return this.mint(owner, dna);
    }

    public isOwner(assetId: AssetId, account: AccountId): boolean {
        return this.require(assetId).owner === account;
    }

    // --- Ownership & Price (driven by the market) ---

    public reprice(assetId: AssetId, price: Balance | null): void {
        this.state.transact(tx => tx.assets.update(assetId, { price }));
    }

    /**
     * Moves an asset to `to` and clears its price. `settle` runs before the move
     * is published, so a payment failure leaves the asset where it was.
     */
    public reassign(assetId: AssetId, to: AccountId, settle?: () => void): void {
        this.state.transact(tx => {
            const asset = tx.assets.require(assetId);
            tx.ownership.tryAppend(to, assetId);
            if (!tx.ownership.remove(asset.owner, assetId)) {
                throw new KernelError(ErrorCode.INTEGRITY_BREACH, `Asset ${assetId} missing from index of ${asset.owner}`);
            }
            tx.assets.update(assetId, { owner: to, price: null });
        }, settle);
    }

    // --- Queries ---

    public count(): bigint {
        return this.state.assets.count();
    }

    public getAsset(assetId: AssetId): Asset | undefined {
        return this.state.assets.get(assetId);
    }

    public require(assetId: AssetId): Asset {
        return this.state.assets.require(assetId);
    }

    public ownedBy(account: AccountId): AssetId[] {
        return this.state.ownership.ownedBy(account);
    }

    /** Where the most recent mint ended up. */
    public get lastMintPhase(): MintPhase {
        return this.phase;
    }

    public get maxOwned(): number {
        return this.config.maxOwned;
    }

    public snapshot(): RegistryState {
        return this.state.snapshot();
    }

    public onCommit(listener: CommitListener): void {
        this.state.onCommit(listener);
    }

    public onPersist(persister: Persister): void {
        this.state.onPersist(persister);
    }

    public verifyIntegrity(): { ok: true } | { ok: false; rejection: Rejection } {
        return checkInvariants({ state: this.state.snapshot(), config: this.config });
    }
}
