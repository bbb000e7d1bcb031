import { blake2_256, toHex, canonicalize, verifySignature } from '../L0/Crypto.js';
import type { Ed25519PublicKey } from '../L0/Crypto.js';
import { encodeAsset } from '../L0/Codec.js';
import type { AccountId, Asset, AssetId, SignedCommand } from '../L0/Ontology.js';
import { ErrorCode, KernelError } from '../Errors.js';

// --- 1. Asset Identity ---

/**
 * Content-derived identifier: blake2s-256 over the asset's byte layout.
 * Equal records always collide; uniqueness has to come from the content.
 */
export function deriveAssetId(asset: Asset): AssetId {
    return toHex(blake2_256(encodeAsset(asset)));
}

// --- 2. Accounts ---

export interface Account {
    id: AccountId;
    publicKey: Ed25519PublicKey;
    status: 'ACTIVE' | 'REVOKED';
}

export class AccountRegistry {
    private accounts: Map<AccountId, Account> = new Map();

    public register(id: AccountId, publicKey: Ed25519PublicKey) {
        const existing = this.accounts.get(id);
        if (existing && existing.status === 'REVOKED') {
            throw new Error(`Identity Violation: No Resurrection allowed for REVOKED account ${id}`);
        }
        this.accounts.set(id, { id, publicKey: publicKey.toLowerCase(), status: 'ACTIVE' });
    }

    public revoke(id: AccountId) {
        const account = this.accounts.get(id);
        if (!account) throw new Error(`Identity Violation: Unknown account ${id}`);
        this.accounts.set(id, { ...account, status: 'REVOKED' });
    }

    public get(id: AccountId): Account | undefined {
        return this.accounts.get(id);
    }

    public list(): Account[] {
        return Array.from(this.accounts.values());
    }
}

// --- 3. Origin Resolution ---

/**
 * Turns a signed command into the account it speaks for.
 */
export interface OriginResolver {
    resolve(command: SignedCommand): Promise<AccountId>;
}

/** The exact bytes an origin signs. */
export function commandMessage(command: Omit<SignedCommand, 'signature'>): string {
    return `${command.id}:${command.origin}:${canonicalize(command.call)}`;
}

export class SignatureOriginResolver implements OriginResolver {
    constructor(private accounts: AccountRegistry) { }

    public async resolve(command: SignedCommand): Promise<AccountId> {
        const account = this.accounts.get(command.origin);
        if (!account) throw new KernelError(ErrorCode.UNAUTHENTICATED, `Unknown origin ${command.origin}`);
        if (account.status === 'REVOKED') throw new KernelError(ErrorCode.UNAUTHENTICATED, `Origin ${command.origin} is revoked`);

        const valid = await verifySignature(commandMessage(command), command.signature, account.publicKey);
        if (!valid) throw new KernelError(ErrorCode.UNAUTHENTICATED, `Invalid signature for ${command.origin}`);

        return account.id;
    }
}
