import { describe, test, expect, jest, beforeAll, afterAll } from '@jest/globals';
import fc from 'fast-check';
import { InMemoryCurrencyLedger, MarketService } from '../L4/Market.js';
import { KernelError } from '../Errors.js';
import { makeLifecycle } from './fixtures.js';

const OWNERS = ['A', 'B', 'C'];

const genOp = fc.oneof(
    fc.record({ kind: fc.constant('mint' as const), owner: fc.constantFrom(...OWNERS) }),
    fc.record({ kind: fc.constant('breed' as const), owner: fc.constantFrom(...OWNERS), p1: fc.nat(), p2: fc.nat() }),
    fc.record({ kind: fc.constant('transfer' as const), to: fc.constantFrom(...OWNERS), pick: fc.nat() }),
    fc.record({ kind: fc.constant('list' as const), pick: fc.nat(), price: fc.bigInt({ min: 0n, max: 50n }) }),
    fc.record({ kind: fc.constant('buy' as const), buyer: fc.constantFrom(...OWNERS), pick: fc.nat(), bid: fc.bigInt({ min: 0n, max: 60n }) })
);

describe('Registry Property Verification', () => {
    beforeAll(() => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterAll(() => {
        jest.restoreAllMocks();
    });

    test('Invariants hold and the counter tracks successful mints over any operation sequence', () => {
        fc.assert(fc.property(fc.integer({ min: 1, max: 4 }), fc.array(genOp, { maxLength: 40 }), (maxOwned, ops) => {
            const lifecycle = makeLifecycle(maxOwned);
            const currency = new InMemoryCurrencyLedger({ A: 100n, B: 100n, C: 100n });
            const market = new MarketService(lifecycle, currency);
            const minted: string[] = [];
            const total = () => OWNERS.reduce((sum, o) => sum + currency.freeBalance(o), 0n);

            for (const op of ops) {
                const before = lifecycle.snapshot();
                const pick = (n: number) => minted[n % Math.max(1, minted.length)] ?? 'none';
                try {
                    switch (op.kind) {
                        case 'mint':
                            minted.push(lifecycle.mint(op.owner));
                            break;
                        case 'breed':
                            minted.push(lifecycle.breed(op.owner, pick(op.p1), pick(op.p2)));
                            break;
                        case 'transfer': {
                            const id = pick(op.pick);
                            const owner = lifecycle.getAsset(id)?.owner ?? 'none';
                            market.transfer(owner, op.to, id);
                            break;
                        }
                        case 'list': {
                            const id = pick(op.pick);
                            market.setPrice(lifecycle.getAsset(id)?.owner ?? 'none', id, op.price);
                            break;
                        }
                        case 'buy':
                            market.buy(op.buyer, pick(op.pick), op.bid);
                            break;
                    }
                } catch (e) {
                    if (!(e instanceof KernelError)) throw e;
                    expect(lifecycle.snapshot()).toBe(before);
                }

                expect(lifecycle.verifyIntegrity()).toEqual({ ok: true });
                expect(lifecycle.count()).toBe(BigInt(minted.length));
                for (const owner of OWNERS) expect(lifecycle.ownedBy(owner).length).toBeLessThanOrEqual(maxOwned);
                expect(total()).toBe(300n);
            }
        }), { numRuns: 100 });
    });
});
