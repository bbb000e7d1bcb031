import { LifecycleService } from '../kernel-core/Kernel.js';
import type { AccountId, Asset, AssetId, Balance, Call, SignedCommand } from '../kernel-core/L0/Ontology.js';
import type { RegistryConfig } from '../kernel-core/L0/Primitives.js';
import { ReplayGuard, enforce } from '../kernel-core/L0/Guards.js';
import { AccountRegistry, SignatureOriginResolver } from '../kernel-core/L1/Identity.js';
import type { OriginResolver } from '../kernel-core/L1/Identity.js';
import { ManualHeightOracle, SystemRandomness, systemClock } from '../kernel-core/L3/Entropy.js';
import type { HeightOracle, RandomnessSource, ISystemClock } from '../kernel-core/L3/Entropy.js';
import { GeneticsEngine } from '../kernel-core/L3/Genetics.js';
import { InMemoryCurrencyLedger, MarketService } from '../kernel-core/L4/Market.js';
import type { CurrencyLedger } from '../kernel-core/L4/Market.js';
import { AuditLog } from '../kernel-core/L5/Audit.js';
import type { EventRecord, IEventStore } from '../kernel-core/L5/Audit.js';
import { InvalidRequestError, NotFoundError, PlatformError, translateError } from './Errors.js';
import { MemoryReplayStore } from './Ports.js';
import type { IReplayStore, IStateRepository } from './Ports.js';

export interface CommandReceipt {
    commandId: string;
    origin: AccountId;
    call: Call['type'];
    assetId?: AssetId;
}

export type CommandResult =
    | { ok: true; receipt: CommandReceipt }
    | { ok: false; error: PlatformError };

export interface RegistryStats {
    assetCount: bigint;
    version: number;
    owners: number;
    integrity: boolean;
}

export interface PlatformOptions {
    config: RegistryConfig;
    height?: HeightOracle;
    randomness?: RandomnessSource;
    accounts?: AccountRegistry;
    resolver?: OriginResolver;
    currency?: CurrencyLedger;
    stateRepository?: IStateRepository;
    eventStore?: IEventStore;
    replayStore?: IReplayStore;
    clock?: ISystemClock;
}

/**
 * KernelPlatform: the authenticated entry point.
 * Resolves the origin of a signed command, rejects replays, then dispatches
 * the call to the lifecycle or market service. Nothing outside this class
 * talks to the kernel services directly.
 */
export class KernelPlatform {
    constructor(
        private lifecycle: LifecycleService,
        private market: MarketService,
        private resolver: OriginResolver,
        private audit: AuditLog,
        private seen: IReplayStore = new MemoryReplayStore(),
        private repo?: IStateRepository
    ) {
        if (this.repo) {
            const repo = this.repo;
            this.lifecycle.onPersist(state => repo.save(state));
        }
    }

    /**
     * Wires the default services. State is restored from the repository when it
     * holds any.
     */
    static create(options: PlatformOptions): KernelPlatform {
        const height = options.height ?? new ManualHeightOracle();
        const randomness = options.randomness ?? new SystemRandomness(height);
        const audit = new AuditLog(options.eventStore, options.clock ?? systemClock);
        const initial = options.stateRepository?.load() ?? undefined;

        const lifecycle = new LifecycleService(options.config, new GeneticsEngine(randomness, height), audit, initial);
        const market = new MarketService(lifecycle, options.currency ?? new InMemoryCurrencyLedger(), audit);
        const resolver = options.resolver ?? new SignatureOriginResolver(options.accounts ?? new AccountRegistry());

        if (initial) console.log(`[Platform] Restored ${initial.assetCount} assets at version ${initial.version}`);
        return new KernelPlatform(lifecycle, market, resolver, audit, options.replayStore, options.stateRepository);
    }

    /**
     * Standard execution entry. Throws a PlatformError on any rejection.
     */
    public async execute(command: SignedCommand): Promise<CommandReceipt> {
        let origin: AccountId = command.origin;
        try {
            origin = await this.resolver.resolve(command);
            enforce(ReplayGuard({ commandId: command.id, seen: this.seen }));
            this.seen.add(command.id);

            const assetId = this.dispatch(origin, command.call);
            const receipt: CommandReceipt = { commandId: command.id, origin, call: command.call.type };
            if (assetId !== undefined) receipt.assetId = assetId;
            return receipt;
        } catch (e) {
            const error = translateError(e, origin);
            console.warn(`[Platform] Command ${command.id} (${command.call.type}) rejected: ${error.code} ${error.message}`);
            throw error;
        }
    }

    /** Like `execute`, but reports failure as a value. */
    public async tryExecute(command: SignedCommand): Promise<CommandResult> {
        try {
            return { ok: true, receipt: await this.execute(command) };
        } catch (e) {
            return { ok: false, error: translateError(e, command.origin) };
        }
    }

    private dispatch(origin: AccountId, call: Call): AssetId | undefined {
        switch (call.type) {
            case 'create':
                return this.lifecycle.mint(origin);
            case 'breed':
                return this.lifecycle.breed(origin, call.parent1, call.parent2);
            case 'setPrice':
                this.market.setPrice(origin, call.assetId, call.price);
                return call.assetId;
            case 'transfer':
                this.market.transfer(origin, call.to, call.assetId);
                return call.assetId;
            case 'buy':
                this.market.buy(origin, call.assetId, call.bidPrice);
                return call.assetId;
        }
    }

    // --- Queries ---

    public getAsset(assetId: AssetId): Asset {
        const asset = this.lifecycle.getAsset(assetId);
        if (!asset) throw new NotFoundError(`Asset ${assetId} does not exist`, assetId);
        return asset;
    }

    public ownedBy(account: AccountId): AssetId[] {
        return this.lifecycle.ownedBy(account);
    }

    public isOwner(assetId: AssetId, account: AccountId): boolean {
        try {
            return this.lifecycle.isOwner(assetId, account);
        } catch (e) {
            throw translateError(e);
        }
    }

    public stats(): RegistryStats {
        const state = this.lifecycle.snapshot();
        return {
            assetCount: state.assetCount,
            version: state.version,
            owners: Object.keys(state.ownership).length,
            integrity: this.lifecycle.verifyIntegrity().ok
        };
    }

    public getHistory(): EventRecord[] {
        return this.audit.history();
    }

    public verifyHistory(): boolean {
        return this.audit.verifyChain();
    }
}

// --- Wire format ---

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(obj: Record<string, unknown>, key: string): string {
    const value = obj[key];
    if (typeof value !== 'string' || value.length === 0) {
        throw new InvalidRequestError(`Field '${key}' must be a non-empty string`);
    }
    return value;
}

function requireAmount(obj: Record<string, unknown>, key: string): Balance {
    const value = obj[key];
    if (typeof value === 'string' && /^[0-9]+$/.test(value)) return BigInt(value);
    if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
    throw new InvalidRequestError(`Field '${key}' must be a non-negative integer`);
}

function parseCall(raw: unknown): Call {
    if (!isRecord(raw)) throw new InvalidRequestError('Field \'call\' must be an object');
    const type = requireString(raw, 'type');

    switch (type) {
        case 'create':
            return { type: 'create' };
        case 'breed':
            return { type: 'breed', parent1: requireString(raw, 'parent1'), parent2: requireString(raw, 'parent2') };
        case 'setPrice':
            return { type: 'setPrice', assetId: requireString(raw, 'assetId'), price: raw.price === null ? null : requireAmount(raw, 'price') };
        case 'transfer':
            return { type: 'transfer', to: requireString(raw, 'to'), assetId: requireString(raw, 'assetId') };
        case 'buy':
            return { type: 'buy', assetId: requireString(raw, 'assetId'), bidPrice: requireAmount(raw, 'bidPrice') };
        default:
            throw new InvalidRequestError(`Unknown call type '${type}'`);
    }
}

/**
 * Parses a JSON command body. Amounts arrive as decimal strings (or safe
 * integers) and become bigints.
 */
export function parseCommand(body: unknown): SignedCommand {
    if (!isRecord(body)) throw new InvalidRequestError('Command must be a JSON object');
    return {
        id: requireString(body, 'id'),
        origin: requireString(body, 'origin'),
        call: parseCall(body.call),
        signature: requireString(body, 'signature')
    };
}
