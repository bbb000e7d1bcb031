import type { AccountId, AssetId, Balance } from '../L0/Ontology.js';
import {
    OwnershipGuard, SelfTransferGuard, BuyerGuard, SaleGuard, BalanceGuard, CapacityGuard, enforce
} from '../L0/Guards.js';
import { LifecycleService } from '../Kernel.js';
import { emit } from '../L5/Audit.js';
import type { EventSink } from '../L5/Audit.js';

/**
 * Balance transfer primitive of the host currency.
 */
export interface CurrencyLedger {
    freeBalance(account: AccountId): Balance;
    transfer(from: AccountId, to: AccountId, amount: Balance): void;
}

export class InMemoryCurrencyLedger implements CurrencyLedger {
    private balances: Map<AccountId, Balance> = new Map();

    constructor(initial: Record<AccountId, Balance> = {}) {
        for (const [account, balance] of Object.entries(initial)) this.deposit(account, balance);
    }

    public deposit(account: AccountId, amount: Balance): void {
        if (amount < 0n) throw new RangeError('deposit must be non-negative');
        this.balances.set(account, this.freeBalance(account) + amount);
    }

    public freeBalance(account: AccountId): Balance {
        return this.balances.get(account) ?? 0n;
    }

    public transfer(from: AccountId, to: AccountId, amount: Balance): void {
        if (amount < 0n) throw new RangeError('transfer amount must be non-negative');
        enforce(BalanceGuard({ account: from, balance: this.freeBalance(from), amount }));
        this.balances.set(from, this.freeBalance(from) - amount);
        this.balances.set(to, this.freeBalance(to) + amount);
    }
}

/**
 * Price setting, gifting and purchase of existing assets.
 */
export class MarketService {
    constructor(
        private lifecycle: LifecycleService,
        private currency: CurrencyLedger,
        private events?: EventSink
    ) { }

    public setPrice(caller: AccountId, assetId: AssetId, price: Balance | null): void {
        if (price !== null && price < 0n) throw new RangeError('price must be non-negative');
        const asset = this.lifecycle.require(assetId);
        enforce(OwnershipGuard({ asset, caller }));

        this.lifecycle.reprice(assetId, price);
        emit(this.events, { type: 'PriceSet', owner: caller, assetId, price });
    }

    public transfer(caller: AccountId, to: AccountId, assetId: AssetId): void {
        const asset = this.lifecycle.require(assetId);
        enforce(OwnershipGuard({ asset, caller }));
        enforce(SelfTransferGuard({ from: caller, to }));
        this.checkCapacity(to);

        this.lifecycle.reassign(assetId, to);
        emit(this.events, { type: 'Transferred', from: caller, to, assetId });
    }

    public buy(buyer: AccountId, assetId: AssetId, bidPrice: Balance): void {
        const asset = this.lifecycle.require(assetId);
        enforce(BuyerGuard({ asset, buyer }));
        enforce(SaleGuard({ asset, bidPrice }));
        enforce(BalanceGuard({ account: buyer, balance: this.currency.freeBalance(buyer), amount: bidPrice }));
        this.checkCapacity(buyer);

        const seller = asset.owner;
        this.lifecycle.reassign(assetId, buyer, () => this.currency.transfer(buyer, seller, bidPrice));
        emit(this.events, { type: 'Bought', buyer, seller, assetId, price: bidPrice });
    }

    private checkCapacity(account: AccountId): void {
        enforce(CapacityGuard({
            owner: account,
            owned: this.lifecycle.ownedBy(account).length,
            maxOwned: this.lifecycle.maxOwned
        }));
    }
}
