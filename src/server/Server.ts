import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import { KernelPlatform, parseCommand } from '../Platform/KernelPlatform.js';
import {
    PlatformError,
    PolicyViolationError,
    SecurityViolationError,
    DataIntegrityError,
    ResourceExhaustionError,
    NotFoundError,
    InfrastructureError,
    translateError
} from '../Platform/Errors.js';
import { loadConfig } from '../Platform/Config.js';
import type { PlatformConfig } from '../Platform/Config.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { SQLiteStateRepository } from '../infrastructure/persistence/SQLiteStateRepository.js';
import { SQLiteReplayStore } from '../infrastructure/persistence/SQLiteReplayStore.js';
import { ClockHeightOracle, SystemRandomness } from '../kernel-core/L3/Entropy.js';
import { AccountRegistry } from '../kernel-core/L1/Identity.js';

export function statusOf(error: PlatformError): number {
    if (error instanceof SecurityViolationError) return 401;
    if (error instanceof PolicyViolationError) return 403;
    if (error instanceof NotFoundError) return 404;
    if (error instanceof ResourceExhaustionError) return 409;
    if (error instanceof DataIntegrityError || error instanceof InfrastructureError) return 500;
    return 400;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(res: Response, e: unknown) {
    const error = translateError(e);
    res.status(statusOf(error)).json({ error: error.code, message: error.message, metadata: error.metadata });
}

/**
 * HTTP surface over a platform. Bigints go out as decimal strings.
 */
export function createApp(platform: KernelPlatform, accounts?: AccountRegistry): express.Express {
    const app = express();
    app.set('json replacer', (_key: string, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));
    app.use(cors());
    app.use(bodyParser.json());

    app.use((req, _res, next) => {
        console.log(`[Server] ${req.method} ${req.url}`);
        next();
    });

    // Command Execution
    app.post('/commands', async (req, res) => {
        try {
            const command = parseCommand(req.body);
            const receipt = await platform.execute(command);
            res.status(201).json(receipt);
        } catch (e) {
            fail(res, e);
        }
    });

    // Origin Registration
    if (accounts) {
        app.post('/accounts', (req, res) => {
            const body: unknown = req.body;
            const id = isRecord(body) ? body.id : undefined;
            const publicKey = isRecord(body) ? body.publicKey : undefined;
            if (typeof id !== 'string' || typeof publicKey !== 'string' || !/^[0-9a-fA-F]{64}$/.test(publicKey)) {
                res.status(400).json({ error: 'INVALID_REQUEST', message: 'id and a 32-byte hex publicKey are required' });
                return;
            }
            try {
                accounts.register(id, publicKey);
                res.status(201).json({ id });
            } catch (e) {
                res.status(409).json({ error: 'ACCOUNT_REVOKED', message: e instanceof Error ? e.message : String(e) });
            }
        });
    }

    // State Queries
    app.get('/assets/:id', (req, res) => {
        try {
            res.json({ assetId: req.params.id, ...platform.getAsset(req.params.id) });
        } catch (e) {
            fail(res, e);
        }
    });

    app.get('/assets/:id/owner/:account', (req, res) => {
        try {
            res.json({ assetId: req.params.id, account: req.params.account, isOwner: platform.isOwner(req.params.id, req.params.account) });
        } catch (e) {
            fail(res, e);
        }
    });

    app.get('/accounts/:account/assets', (req, res) => {
        res.json({ account: req.params.account, assets: platform.ownedBy(req.params.account) });
    });

    app.get('/stats', (_req, res) => {
        res.json(platform.stats());
    });

    // Audit Query
    app.get('/events', (_req, res) => {
        res.json({ verified: platform.verifyHistory(), events: platform.getHistory() });
    });

    // Malformed JSON and anything thrown past a route
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'INVALID_REQUEST', message: err.message });
            return;
        }
        console.error('[Server] Unhandled error:', err);
        fail(res, err);
    });

    return app;
}

export class RegistryServer {
    private app: express.Express;
    private stateRepository: SQLiteStateRepository;
    private eventStore: SQLiteEventStore;
    private replayStore: SQLiteReplayStore;

    readonly accounts = new AccountRegistry();

    constructor(private config: PlatformConfig) {
        // 1. Initialize Infrastructure
        this.stateRepository = new SQLiteStateRepository(config.databasePath);
        this.eventStore = new SQLiteEventStore(config.databasePath);
        this.replayStore = new SQLiteReplayStore(config.databasePath);

        // 2. Initialize Platform
        const height = new ClockHeightOracle(config.blockTimeMs);
        const platform = KernelPlatform.create({
            config: config.registry,
            height,
            randomness: new SystemRandomness(height),
            accounts: this.accounts,
            stateRepository: this.stateRepository,
            eventStore: this.eventStore,
            replayStore: this.replayStore
        });

        // 3. Setup Routes
        this.app = createApp(platform, this.accounts);
    }

    public start(): void {
        this.app.listen(this.config.port, () => {
            console.log(`[Server] Listening on port ${this.config.port}`);
        });
    }
}

// Start if run directly
if (require.main === module) {
    new RegistryServer(loadConfig(process.env, process.env.REGISTRY_CONFIG_FILE)).start();
}
