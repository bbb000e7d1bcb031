// src/kernel-core/L0/Invariants.ts
import type { RegistryState } from './Ontology.js';
import type { RegistryConfig } from './Primitives.js';
import { MAX_U64, lookup } from './Primitives.js';
import { ErrorCode } from '../Errors.js';

export interface Invariant {
    id: string;
    boundary: string; // The named boundary (e.g. "Counter Integrity")
    description: string;
    permits: string; // "What would make this permissible?"
    predicate: (context: InvariantContext) => boolean;
    violation: ErrorCode;
}

export interface InvariantContext {
    state: RegistryState;
    config: RegistryConfig;
}

export interface Rejection {
    code: ErrorCode;
    invariantId: string;
    boundary: string;
    permissible: string;
    message: string;
}

// I. Counter Integrity
export const INV_CNT_01: Invariant = {
    id: 'INV-CNT-01',
    boundary: 'Counter Integrity',
    description: 'Global counter equals the number of stored assets',
    permits: 'Every insertion must be paired with exactly one counter increment.',
    predicate: ({ state }) => state.assetCount === BigInt(Object.keys(state.assets).length),
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_CNT_02: Invariant = {
    id: 'INV-CNT-02',
    boundary: 'Counter Integrity',
    description: 'Global counter fits in u64',
    permits: 'Counter must lie in [0, 2^64 - 1].',
    predicate: ({ state }) => state.assetCount >= 0n && state.assetCount <= MAX_U64,
    violation: ErrorCode.COUNTER_OVERFLOW
};

// II. Ownership Bounds
export const INV_OWN_01: Invariant = {
    id: 'INV-OWN-01',
    boundary: 'Ownership Bounds',
    description: 'No owner holds more than maxOwned assets',
    permits: 'Owner must release an asset before acquiring another.',
    predicate: ({ state, config }) => Object.values(state.ownership).every(ids => ids.length <= config.maxOwned),
    violation: ErrorCode.EXCEED_MAX_OWNED
};

export const INV_OWN_02: Invariant = {
    id: 'INV-OWN-02',
    boundary: 'Ownership Bounds',
    description: 'Ownership sequences are duplicate-free',
    permits: 'An identifier may appear at most once per owner.',
    predicate: ({ state }) => Object.values(state.ownership).every(ids => new Set(ids).size === ids.length),
    violation: ErrorCode.INTEGRITY_BREACH
};

// III. Index Consistency
export const INV_IDX_01: Invariant = {
    id: 'INV-IDX-01',
    boundary: 'Index Consistency',
    description: 'Every indexed identifier exists and is owned by the index key',
    permits: 'Index entries must follow the stored owner field.',
    predicate: ({ state }) => Object.entries(state.ownership).every(([owner, ids]) =>
        ids.every(id => lookup(state.assets, id)?.owner === owner)),
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_IDX_02: Invariant = {
    id: 'INV-IDX-02',
    boundary: 'Index Consistency',
    description: 'Every stored asset is listed under its owner',
    permits: 'Stored assets must be reachable from the ownership index.',
    predicate: ({ state }) => Object.entries(state.assets).every(([id, asset]) =>
        (lookup(state.ownership, asset.owner) ?? []).includes(id)),
    violation: ErrorCode.INTEGRITY_BREACH
};

// --- Aggregate Registry Check ---
export const REGISTRY_INVARIANTS: Invariant[] = [
    INV_CNT_01, INV_CNT_02,
    INV_OWN_01, INV_OWN_02,
    INV_IDX_01, INV_IDX_02
];

const toRejection = (inv: Invariant): Rejection => ({
    code: inv.violation,
    invariantId: inv.id,
    boundary: inv.boundary,
    permissible: inv.permits,
    message: `Invariant Violation: ${inv.description}`
});

export function checkInvariants(context: InvariantContext): { ok: true } | { ok: false; rejection: Rejection } {
    for (const inv of REGISTRY_INVARIANTS) {
        if (!inv.predicate(context)) {
            return { ok: false, rejection: toRejection(inv) };
        }
    }
    return { ok: true };
}

/** Every violated invariant, for diagnostics. */
export function listViolations(context: InvariantContext): Rejection[] {
    return REGISTRY_INVARIANTS.filter(inv => !inv.predicate(context)).map(toRejection);
}
