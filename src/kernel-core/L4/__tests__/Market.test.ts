import { describe, test, expect, beforeEach } from '@jest/globals';
import { InMemoryCurrencyLedger, MarketService } from '../Market.js';
import type { LifecycleService } from '../../Kernel.js';
import type { RegistryEvent } from '../../L0/Ontology.js';
import { ErrorCode, isKernelError } from '../../Errors.js';
import { makeLifecycle } from '../../__tests__/fixtures.js';

function codeOf(fn: () => unknown): string {
    try {
        fn();
    } catch (e) {
        return isKernelError(e) ? e.code : e instanceof RangeError ? 'RANGE' : 'OTHER';
    }
    return 'OK';
}

describe('Market (Price, Transfer, Purchase)', () => {
    let lifecycle: LifecycleService;
    let currency: InMemoryCurrencyLedger;
    let market: MarketService;
    let events: RegistryEvent[];
    let creature: string;

    beforeEach(() => {
        events = [];
        const sink = { notify: (e: RegistryEvent) => { events.push(e); } };
        lifecycle = makeLifecycle(2, { events: sink });
        currency = new InMemoryCurrencyLedger({ alice: 0n, bob: 500n });
        market = new MarketService(lifecycle, currency, sink);
        creature = lifecycle.mint('alice');
        events.length = 0;
    });

    describe('setPrice', () => {
        test('Owner sets and clears the price', () => {
            market.setPrice('alice', creature, 100n);
            expect(lifecycle.require(creature).price).toBe(100n);

            market.setPrice('alice', creature, null);
            expect(lifecycle.require(creature).price).toBeNull();

            expect(events).toEqual([
                { type: 'PriceSet', owner: 'alice', assetId: creature, price: 100n },
                { type: 'PriceSet', owner: 'alice', assetId: creature, price: null }
            ]);
        });

        test('Rejections', () => {
            expect(codeOf(() => market.setPrice('bob', creature, 1n))).toBe(ErrorCode.NOT_OWNER);
            expect(codeOf(() => market.setPrice('alice', 'missing', 1n))).toBe(ErrorCode.ASSET_NOT_FOUND);
            expect(codeOf(() => market.setPrice('alice', creature, -1n))).toBe('RANGE');
            expect(events).toEqual([]);
        });

        test('Identifier does not change with the price', () => {
            market.setPrice('alice', creature, 7n);
            expect(lifecycle.ownedBy('alice')).toEqual([creature]);
        });
    });

    describe('transfer', () => {
        test('Moves the asset and clears its price', () => {
            market.setPrice('alice', creature, 100n);
            market.transfer('alice', 'bob', creature);

            expect(lifecycle.isOwner(creature, 'bob')).toBe(true);
            expect(lifecycle.ownedBy('alice')).toEqual([]);
            expect(lifecycle.ownedBy('bob')).toEqual([creature]);
            expect(lifecycle.require(creature).price).toBeNull();
            expect(lifecycle.verifyIntegrity()).toEqual({ ok: true });
            expect(events[events.length - 1]).toEqual({ type: 'Transferred', from: 'alice', to: 'bob', assetId: creature });
        });

        test('Rejections leave state untouched', () => {
            lifecycle.mint('bob');
            lifecycle.mint('bob');
            const before = lifecycle.snapshot();

            expect(codeOf(() => market.transfer('bob', 'carol', creature))).toBe(ErrorCode.NOT_OWNER);
            expect(codeOf(() => market.transfer('alice', 'alice', creature))).toBe(ErrorCode.TRANSFER_TO_SELF);
            expect(codeOf(() => market.transfer('alice', 'bob', creature))).toBe(ErrorCode.EXCEED_MAX_OWNED);
            expect(codeOf(() => market.transfer('alice', 'bob', 'missing'))).toBe(ErrorCode.ASSET_NOT_FOUND);

            expect(lifecycle.snapshot()).toBe(before);
        });
    });

    describe('buy', () => {
        test('Pays the seller and moves the asset', () => {
            market.setPrice('alice', creature, 100n);
            market.buy('bob', creature, 120n);

            expect(currency.freeBalance('bob')).toBe(380n);
            expect(currency.freeBalance('alice')).toBe(120n);
            expect(lifecycle.isOwner(creature, 'bob')).toBe(true);
            expect(lifecycle.require(creature).price).toBeNull();
            expect(events[events.length - 1]).toEqual({ type: 'Bought', buyer: 'bob', seller: 'alice', assetId: creature, price: 120n });
        });

        test('Rejections', () => {
            expect(codeOf(() => market.buy('bob', creature, 100n))).toBe(ErrorCode.NOT_FOR_SALE);

            market.setPrice('alice', creature, 100n);
            expect(codeOf(() => market.buy('alice', creature, 100n))).toBe(ErrorCode.BUYER_IS_OWNER);
            expect(codeOf(() => market.buy('bob', creature, 99n))).toBe(ErrorCode.BID_PRICE_TOO_LOW);
            expect(codeOf(() => market.buy('carol', creature, 100n))).toBe(ErrorCode.NOT_ENOUGH_BALANCE);
            expect(codeOf(() => market.buy('bob', 'missing', 100n))).toBe(ErrorCode.ASSET_NOT_FOUND);
        });

        test('Buyer at capacity: no currency moves', () => {
            market.setPrice('alice', creature, 100n);
            lifecycle.mint('bob');
            lifecycle.mint('bob');
            const before = lifecycle.snapshot();

            expect(codeOf(() => market.buy('bob', creature, 100n))).toBe(ErrorCode.EXCEED_MAX_OWNED);

            expect(currency.freeBalance('bob')).toBe(500n);
            expect(currency.freeBalance('alice')).toBe(0n);
            expect(lifecycle.snapshot()).toBe(before);
        });

        test('A failing payment leaves the asset with the seller', () => {
            market.setPrice('alice', creature, 100n);
            const broken = new MarketService(lifecycle, {
                freeBalance: () => 1000n,
                transfer: () => { throw new Error('ledger offline'); }
            });
            const before = lifecycle.snapshot();

            expect(() => broken.buy('bob', creature, 100n)).toThrow('ledger offline');
            expect(lifecycle.snapshot()).toBe(before);
            expect(lifecycle.isOwner(creature, 'alice')).toBe(true);
        });
    });
});

describe('InMemoryCurrencyLedger', () => {
    test('Deposits and transfers', () => {
        const ledger = new InMemoryCurrencyLedger();
        ledger.deposit('a', 10n);
        ledger.transfer('a', 'b', 4n);
        expect(ledger.freeBalance('a')).toBe(6n);
        expect(ledger.freeBalance('b')).toBe(4n);
        expect(() => ledger.transfer('a', 'b', 7n)).toThrow(/NOT_ENOUGH_BALANCE/);
        expect(() => ledger.deposit('a', -1n)).toThrow(RangeError);
    });
});
