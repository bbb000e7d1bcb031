// src/kernel-core/L0/Guards.ts
import type { Asset, AccountId, Balance } from './Ontology.js';
import { DNA_LENGTH } from './Ontology.js';
import { MAX_U64 } from './Primitives.js';
import { ErrorCode, KernelError } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string; details?: Record<string, unknown> };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string, details?: Record<string, unknown>): GuardResult =>
    ({ ok: false, code, violation: msg, ...(details ? { details } : {}) });

/**
 * Converts a failed guard into a thrown KernelError.
 */
export function enforce(result: GuardResult): void {
    if (!result.ok) throw new KernelError(result.code, result.violation, result.details);
}

// --- Lifecycle Guards ---

// 1. Counter (u64 ceiling)
export const CounterGuard: Guard<{ count: bigint }> = ({ count }) => {
    if (count >= MAX_U64) return FAIL(ErrorCode.COUNTER_OVERFLOW, `Asset counter at u64 maximum (${count})`);
    return OK;
};

// 2. Capacity (per-owner bound)
export const CapacityGuard: Guard<{ owner: AccountId, owned: number, maxOwned: number }> = ({ owner, owned, maxOwned }) => {
    if (owned >= maxOwned) {
        return FAIL(ErrorCode.EXCEED_MAX_OWNED, `${owner} already owns ${owned} of ${maxOwned} assets`, { owner, maxOwned });
    }
    return OK;
};

// 3. DNA shape
export const DnaGuard: Guard<{ dna: Uint8Array }> = ({ dna }) => {
    if (dna.length !== DNA_LENGTH) return FAIL(ErrorCode.INVALID_DNA, `DNA must be ${DNA_LENGTH} bytes, got ${dna.length}`);
    return OK;
};

// --- Market Guards ---

export const OwnershipGuard: Guard<{ asset: Asset, caller: AccountId }> = ({ asset, caller }) => {
    if (asset.owner !== caller) return FAIL(ErrorCode.NOT_OWNER, `${caller} is not the owner`);
    return OK;
};

export const SelfTransferGuard: Guard<{ from: AccountId, to: AccountId }> = ({ from, to }) => {
    if (from === to) return FAIL(ErrorCode.TRANSFER_TO_SELF, `Cannot transfer to self (${from})`);
    return OK;
};

export const BuyerGuard: Guard<{ asset: Asset, buyer: AccountId }> = ({ asset, buyer }) => {
    if (asset.owner === buyer) return FAIL(ErrorCode.BUYER_IS_OWNER, `${buyer} already owns this asset`);
    return OK;
};

export const SaleGuard: Guard<{ asset: Asset, bidPrice: Balance }> = ({ asset, bidPrice }) => {
    if (asset.price === null) return FAIL(ErrorCode.NOT_FOR_SALE, 'Asset is not for sale');
    if (bidPrice < asset.price) {
        return FAIL(ErrorCode.BID_PRICE_TOO_LOW, `Bid ${bidPrice} below asking price ${asset.price}`);
    }
    return OK;
};

export const BalanceGuard: Guard<{ account: AccountId, balance: Balance, amount: Balance }> = ({ account, balance, amount }) => {
    if (balance < amount) return FAIL(ErrorCode.NOT_ENOUGH_BALANCE, `${account} holds ${balance}, needs ${amount}`);
    return OK;
};

// --- Dispatch Guards ---

// Replay Guard (command ids are single-use)
export const ReplayGuard: Guard<{ commandId: string, seen: { has(commandId: string): boolean } }> = ({ commandId, seen }) => {
    if (seen.has(commandId)) return FAIL(ErrorCode.REPLAY_DETECTED, `Replay Violation: Command ${commandId} already processed`);
    return OK;
};
