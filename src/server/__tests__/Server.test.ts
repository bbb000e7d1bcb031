import { describe, test, expect, beforeAll, beforeEach, afterEach, jest } from '@jest/globals';
import request from 'supertest';
import type express from 'express';
import { createApp, statusOf } from '../Server.js';
import { KernelPlatform } from '../../Platform/KernelPlatform.js';
import { InvalidRequestError, PolicyViolationError } from '../../Platform/Errors.js';
import { keyPairFromPrivate } from '../../kernel-core/L0/Crypto.js';
import type { KeyPair } from '../../kernel-core/L0/Crypto.js';
import type { Call, SignedCommand } from '../../kernel-core/L0/Ontology.js';
import { AccountRegistry } from '../../kernel-core/L1/Identity.js';
import { CommandFactory } from '../../kernel-core/L1/CommandFactory.js';
import { ManualHeightOracle } from '../../kernel-core/L3/Entropy.js';
import { InMemoryCurrencyLedger } from '../../kernel-core/L4/Market.js';
import { ErrorCode } from '../../kernel-core/Errors.js';
import { CountingRandomness } from '../../kernel-core/__tests__/fixtures.js';

const toWire = (cmd: SignedCommand) =>
    JSON.stringify(cmd, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));

describe('Registry HTTP API', () => {
    let alice: KeyPair;
    let bob: KeyPair;
    let platform: KernelPlatform;
    let app: express.Express;
    let nonce: number;

    const sign = (origin: string, keys: KeyPair, call: Call) => CommandFactory.create(origin, call, keys.privateKey, nonce++);

    const post = (cmd: SignedCommand) =>
        request(app).post('/commands').set('Content-Type', 'application/json').send(toWire(cmd));

    const mintFor = async (origin: string, keys: KeyPair): Promise<string> => {
        await post(await sign(origin, keys, { type: 'create' }));
        const owned = platform.ownedBy(origin);
        const id = owned[owned.length - 1];
        if (!id) throw new Error('mint failed');
        return id;
    };

    beforeAll(async () => {
        alice = await keyPairFromPrivate('01'.repeat(32));
        bob = await keyPairFromPrivate('02'.repeat(32));
    });

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        const accounts = new AccountRegistry();
        platform = KernelPlatform.create({
            config: { maxOwned: 2 },
            height: new ManualHeightOracle(),
            randomness: new CountingRandomness(),
            accounts,
            currency: new InMemoryCurrencyLedger({ bob: 1000n })
        });
        app = createApp(platform, accounts);
        nonce = 0;

        await request(app).post('/accounts').send({ id: 'alice', publicKey: alice.publicKey }).expect(201);
        await request(app).post('/accounts').send({ id: 'bob', publicKey: bob.publicKey }).expect(201);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('POST /commands mints and returns a receipt', async () => {
        const cmd = await sign('alice', alice, { type: 'create' });
        const response = await post(cmd);

        expect(response.status).toBe(201);
        expect(response.body).toEqual({
            commandId: cmd.id,
            origin: 'alice',
            call: 'create',
            assetId: platform.ownedBy('alice')[0]
        });
    });

    test('GET /assets/:id returns the asset with the price as a string', async () => {
        const id = await mintFor('alice', alice);
        await post(await sign('alice', alice, { type: 'setPrice', assetId: id, price: 250n })).expect(201);

        const response = await request(app).get(`/assets/${id}`);
        const asset = platform.getAsset(id);

        expect(response.status).toBe(200);
        expect(response.body).toEqual({ assetId: id, dna: asset.dna, price: '250', gender: asset.gender, owner: 'alice' });
    });

    test('Ownership queries', async () => {
        const id = await mintFor('alice', alice);

        const owned = await request(app).get('/accounts/alice/assets');
        expect(owned.body).toEqual({ account: 'alice', assets: [id] });

        const yes = await request(app).get(`/assets/${id}/owner/alice`);
        expect(yes.body).toEqual({ assetId: id, account: 'alice', isOwner: true });

        const no = await request(app).get(`/assets/${id}/owner/bob`);
        expect(no.body.isOwner).toBe(false);

        const missing = await request(app).get(`/assets/${'0'.repeat(64)}/owner/alice`);
        expect(missing.status).toBe(404);
        expect(missing.body.error).toBe('NOT_FOUND');
    });

    test('Purchase over HTTP', async () => {
        const id = await mintFor('alice', alice);
        await post(await sign('alice', alice, { type: 'setPrice', assetId: id, price: 300n })).expect(201);

        const bought = await post(await sign('bob', bob, { type: 'buy', assetId: id, bidPrice: 300n }));
        expect(bought.status).toBe(201);

        const events = await request(app).get('/events');
        expect(events.body.verified).toBe(true);
        expect(events.body.events).toHaveLength(3);
        expect(events.body.events[2].event).toEqual({ type: 'Bought', buyer: 'bob', seller: 'alice', assetId: id, price: '300' });
    });

    test('GET /stats', async () => {
        await mintFor('alice', alice);
        await mintFor('bob', bob);

        const response = await request(app).get('/stats');
        expect(response.body).toEqual({ assetCount: '2', version: 2, owners: 2, integrity: true });
    });

    test('Error statuses', async () => {
        const id = await mintFor('alice', alice);
        await mintFor('alice', alice);

        const replayed = await sign('alice', alice, { type: 'setPrice', assetId: id, price: 1n });
        await post(replayed).expect(201);
        const replay = await post(replayed);
        expect(replay.status).toBe(401);
        expect(replay.body.metadata.kernelCode).toBe(ErrorCode.REPLAY_DETECTED);

        const notOwner = await post(await sign('bob', bob, { type: 'setPrice', assetId: id, price: 1n }));
        expect(notOwner.status).toBe(403);
        expect(notOwner.body.error).toBe('POLICY_VIOLATION');

        const full = await post(await sign('alice', alice, { type: 'create' }));
        expect(full.status).toBe(409);
        expect(full.body.error).toBe('RESOURCE_EXHAUSTED');

        const unknown = await request(app).get('/assets/nope');
        expect(unknown.status).toBe(404);

        const malformed = await request(app).post('/commands').send({ id: 'x', origin: 'alice', call: { type: 'create' } });
        expect(malformed.status).toBe(400);
        expect(malformed.body.message).toBe("Field 'signature' must be a non-empty string");

        const garbage = await request(app).post('/commands').set('Content-Type', 'application/json').send('{"id":');
        expect(garbage.status).toBe(400);
    });

    test('Names that match Object members', async () => {
        const empty = await request(app).get('/accounts/constructor/assets');
        expect(empty.status).toBe(200);
        expect(empty.body).toEqual({ account: 'constructor', assets: [] });

        const missing = await request(app).get('/assets/toString/owner/alice');
        expect(missing.status).toBe(404);

        await request(app).post('/accounts').send({ id: 'toString', publicKey: alice.publicKey }).expect(201);
        const id = await mintFor('toString', alice);
        const owned = await request(app).get('/accounts/toString/assets');
        expect(owned.body).toEqual({ account: 'toString', assets: [id] });
    });

    test('POST /accounts validates the key', async () => {
        const response = await request(app).post('/accounts').send({ id: 'carol', publicKey: 'xyz' });
        expect(response.status).toBe(400);
    });

    test('statusOf', () => {
        expect(statusOf(new PolicyViolationError('no', ErrorCode.NOT_OWNER))).toBe(403);
        expect(statusOf(new InvalidRequestError('bad'))).toBe(400);
    });
});
