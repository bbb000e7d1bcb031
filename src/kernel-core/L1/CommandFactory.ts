// src/kernel-core/L1/CommandFactory.ts
import type { AccountId, Call, SignedCommand } from '../L0/Ontology.js';
import { signData, hash, canonicalize, randomNonce } from '../L0/Crypto.js';
import type { Ed25519PrivateKey } from '../L0/Crypto.js';
import { commandMessage } from './Identity.js';

export class CommandFactory {
    /**
     * Builds and signs a command with id SHA256(origin + call + nonce). Retries
     * with the same nonce replay-collide; without one, a random nonce is drawn.
     */
    static async create(
        origin: AccountId,
        call: Call,
        privateKey: Ed25519PrivateKey,
        nonce: string | number = randomNonce()
    ): Promise<SignedCommand> {
        const id = hash(`${origin}:${canonicalize(call)}:${nonce}`);
        const signature = await signData(commandMessage({ id, origin, call }), privateKey);
        return { id, origin, call, signature };
    }
}
