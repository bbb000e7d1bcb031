/**
 * CREATURE ONTOLOGY
 * The single source of truth for the registry's primitives.
 */

// --- 1. Account ---
export type AccountId = string;

// --- 2. Asset ---
export type AssetId = string; // 64 hex chars, content-derived

/** Balance units of the host currency. `null` price means "not for sale". */
export type Balance = bigint;

export enum Gender {
    Male = 'Male',
    Female = 'Female'
}

export interface Asset {
    dna: string; // 16 bytes, lowercase hex
    price: Balance | null;
    gender: Gender;
    owner: AccountId;
}

export const DNA_LENGTH = 16;

// --- 3. Registry State ---
export interface RegistryState {
    assetCount: bigint;
    assets: Record<AssetId, Asset>;
    ownership: Record<AccountId, AssetId[]>;
    version: number;
}

// --- 4. Mint Transaction ---
export type MintPhase = 'PENDING' | 'COUNTER_RESERVED' | 'INDEX_RESERVED' | 'COMMITTED' | 'ABORTED';

// --- 5. Events ---
export type RegistryEvent =
    | { type: 'Created'; owner: AccountId; assetId: AssetId }
    | { type: 'PriceSet'; owner: AccountId; assetId: AssetId; price: Balance | null }
    | { type: 'Transferred'; from: AccountId; to: AccountId; assetId: AssetId }
    | { type: 'Bought'; buyer: AccountId; seller: AccountId; assetId: AssetId; price: Balance };

// --- 6. Calls (dispatchable surface) ---
export type Call =
    | { type: 'create' }
    | { type: 'breed'; parent1: AssetId; parent2: AssetId }
    | { type: 'setPrice'; assetId: AssetId; price: Balance | null }
    | { type: 'transfer'; to: AccountId; assetId: AssetId }
    | { type: 'buy'; assetId: AssetId; bidPrice: Balance };

export interface SignedCommand {
    id: string;
    origin: AccountId;
    call: Call;
    signature: string; // ed25519, hex
}
