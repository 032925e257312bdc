import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Server } from 'node:http';
import type { Express } from 'express';
import { createApp } from '../src/server/app.js';
import { initializeDatabase, closeDatabase, getDatabase } from '../src/server/database.js';
import { VestingLedger } from '../src/server/ledger/vesting-ledger.js';
import { SqliteTicketStore } from '../src/server/ledger/ticket-store.js';
import { BalanceBook } from '../src/server/ledger/asset-transfer.js';
import { SECONDS_PER_DAY } from '../src/server/ledger/vesting-math.js';
import { resetRateLimiter } from '../src/server/middleware/rate-limit.js';

const T0 = 1_700_000_000;
const DAY = SECONDS_PER_DAY;
const GRANTOR = '0xgrantor';
const BENEFICIARY = '0xbeneficiary';

const grant = {
  asset: 'TKN',
  beneficiary: BENEFICIARY,
  cliffDays: 30,
  vestingDays: 90,
  amount: '900',
};

interface CallOptions {
  caller?: string;
  body?: unknown;
  raw?: string;
}

async function request(baseUrl: string, method: string, path: string, options: CallOptions = {}) {
  const headers: Record<string, string> = {};
  if (options.caller) headers['x-caller-address'] = options.caller;

  let payload: string | undefined;
  if (options.raw !== undefined) {
    payload = options.raw;
  } else if (options.body !== undefined) {
    payload = JSON.stringify(options.body);
  }
  if (payload !== undefined) headers['content-type'] = 'application/json';

  const response = await fetch(`${baseUrl}${path}`, { method, headers, body: payload });
  const body: unknown = await response.json();
  return { status: response.status, body };
}

async function listenOnLoopback(app: Express): Promise<{ server: Server; baseUrl: string }> {
  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server has no TCP address');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}/api` };
}

async function stop(server: Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

describe('ticket routes', () => {
  let server: Server;
  let baseUrl: string;
  let now: number;

  function call(method: string, path: string, options: CallOptions = {}) {
    return request(baseUrl, method, path, options);
  }

  beforeEach(async () => {
    initializeDatabase(':memory:');
    resetRateLimiter();
    now = T0;

    const balances = new BalanceBook();
    balances.deposit('TKN', GRANTOR, 10_000n);
    const ledger = new VestingLedger({ store: new SqliteTicketStore(), transfer: balances, unlockMode: 'linear' });
    const app = createApp({ ledger, balances, clock: () => now, maxBatchSize: 3 });

    ({ server, baseUrl } = await listenOnLoopback(app));
  });

  afterEach(async () => {
    await stop(server);
    closeDatabase();
  });

  it('reports health with the unlock mode', async () => {
    expect(await call('GET', '/health')).toEqual({ status: 200, body: { status: 'ok', unlockMode: 'linear' } });
  });

  it('requires a caller for mutations', async () => {
    expect(await call('POST', '/tickets', { body: grant })).toEqual({
      status: 401,
      body: { error: 'Unauthenticated', message: 'Missing x-caller-address header' },
    });
  });

  it('creates a ticket and serves it back', async () => {
    expect(await call('POST', '/tickets', { caller: GRANTOR, body: grant })).toEqual({ status: 201, body: { id: 0 } });

    const { status, body } = await call('GET', '/tickets/0');
    expect(status).toBe(200);
    expect(body).toEqual({
      id: 0,
      asset: 'TKN',
      grantor: GRANTOR,
      beneficiary: BENEFICIARY,
      cliffDays: 30,
      vestingDays: 90,
      amount: '900',
      claimed: '0',
      balance: '900',
      createdAt: T0,
      lastClaimedAt: null,
      numClaims: 0,
      irrevocable: false,
      isRevoked: false,
      revokedAt: null,
    });
  });

  it('walks a ticket through claim and revoke', async () => {
    await call('POST', '/tickets', { caller: GRANTOR, body: grant });
    now = T0 + 45 * DAY;

    expect(await call('GET', '/tickets/0/available', { caller: BENEFICIARY })).toEqual({
      status: 200,
      body: { ticketId: 0, available: '450' },
    });
    expect(await call('GET', '/tickets/0/cliff', { caller: GRANTOR })).toEqual({
      status: 200,
      body: { ticketId: 0, hasCliffed: true },
    });
    expect(await call('POST', '/tickets/0/claim', { caller: BENEFICIARY })).toEqual({
      status: 200,
      body: { ticketId: 0, claimed: '450' },
    });
    expect(await call('GET', `/balances/TKN/${BENEFICIARY}`)).toEqual({
      status: 200,
      body: { asset: 'TKN', holder: BENEFICIARY, balance: '450' },
    });

    now = T0 + 50 * DAY;
    expect(await call('POST', '/tickets/0/revoke', { caller: GRANTOR })).toEqual({
      status: 200,
      body: { ticketId: 0, returned: '450' },
    });
    expect(await call('POST', '/tickets/0/revoke', { caller: GRANTOR })).toEqual({
      status: 409,
      body: { error: 'AlreadyRevoked', message: 'ticket #0 was revoked' },
    });

    expect(await call('GET', '/tickets/0/events')).toEqual({
      status: 200,
      body: {
        events: [
          { type: 'TicketCreated', ticketId: 0, asset: 'TKN', amount: '900', irrevocable: false, at: T0 },
          { type: 'Claimed', ticketId: 0, asset: 'TKN', amount: '450', at: T0 + 45 * DAY },
          { type: 'Revoked', ticketId: 0, remainingBalance: '450', at: T0 + 50 * DAY },
        ],
      },
    });
  });

  it('reports vesting progress', async () => {
    await call('POST', '/tickets', { caller: GRANTOR, body: grant });
    now = T0 + 60 * DAY;

    expect(await call('GET', '/tickets/0/progress', { caller: BENEFICIARY })).toEqual({
      status: 200,
      body: {
        ticketId: 0,
        cliffed: true,
        daysLapsed: 60,
        unlocked: '600',
        claimable: '600',
        cliffEndsAt: T0 + 30 * DAY,
        vestingEndsAt: T0 + 90 * DAY,
      },
    });
  });

  it('maps ledger failures to status codes', async () => {
    await call('POST', '/tickets', { caller: GRANTOR, body: { ...grant, irrevocable: true } });

    expect(await call('GET', '/tickets/0/available', { caller: '0xstranger' })).toEqual({
      status: 403,
      body: { error: 'Unauthorized', message: 'caller is not a party to ticket #0' },
    });
    expect(await call('POST', '/tickets/0/revoke', { caller: GRANTOR })).toEqual({
      status: 409,
      body: { error: 'Irrevocable', message: 'ticket #0 is irrevocable' },
    });
    expect(await call('GET', '/tickets/7')).toEqual({
      status: 404,
      body: { error: 'NotFound', message: 'ticket #7 does not exist' },
    });
    expect(await call('POST', '/tickets', { caller: GRANTOR, body: { ...grant, amount: '20000' } })).toEqual({
      status: 422,
      body: { error: 'TransferFailed', message: 'could not escrow 20000 TKN from 0xgrantor' },
    });
  });

  it('refuses the custody account as a grantor', async () => {
    expect(await call('POST', '/tickets', { caller: 'ledger:custody', body: grant })).toEqual({
      status: 400,
      body: { error: 'InvalidArgument', message: 'grantor cannot be the ledger custody account' },
    });
  });

  it('answers 500 when the audit log cannot be written', async () => {
    await call('POST', '/tickets', { caller: GRANTOR, body: grant });
    getDatabase().exec('DROP TABLE operations');
    now = T0 + 45 * DAY;

    expect(await call('POST', '/tickets/0/claim', { caller: BENEFICIARY })).toEqual({
      status: 500,
      body: { error: 'Internal', message: 'Internal server error' },
    });
    const { body } = await call('GET', '/tickets/0');
    expect(body).toMatchObject({ claimed: '0', balance: '900' });
  });

  it('rejects malformed input with 400', async () => {
    expect(await call('GET', '/tickets/abc')).toEqual({
      status: 400,
      body: { error: 'InvalidArgument', message: 'Invalid ticket ID' },
    });
    expect(await call('POST', '/tickets', { caller: GRANTOR, raw: '{"asset":' })).toEqual({
      status: 400,
      body: { error: 'InvalidArgument', message: 'Malformed JSON body' },
    });
    expect(await call('POST', '/tickets', { caller: GRANTOR, body: { ...grant, cliffDays: 91 } })).toEqual({
      status: 400,
      body: { error: 'InvalidArgument', message: 'vestingDays must be at least cliffDays' },
    });
  });

  it('lists tickets by party', async () => {
    await call('POST', '/tickets', { caller: GRANTOR, body: grant });
    await call('POST', '/tickets', { caller: GRANTOR, body: { ...grant, beneficiary: '0xother' } });

    expect(await call('GET', `/grantors/${GRANTOR}/tickets`)).toEqual({ status: 200, body: { tickets: [0, 1] } });
    expect(await call('GET', '/beneficiaries/0xother/tickets')).toEqual({ status: 200, body: { tickets: [1] } });
  });

  describe('batch creation', () => {
    it('creates every ticket', async () => {
      const tickets = [grant, { ...grant, amount: '100' }];
      expect(await call('POST', '/tickets/batch', { caller: GRANTOR, body: { tickets } })).toEqual({
        status: 201,
        body: { ids: [0, 1] },
      });
    });

    it('enforces the configured batch size', async () => {
      const tickets = [grant, grant, grant, grant];
      expect(await call('POST', '/tickets/batch', { caller: GRANTOR, body: { tickets } })).toEqual({
        status: 400,
        body: { error: 'InvalidArgument', message: 'At most 3 tickets per batch' },
      });
    });

    it('names the offending entry', async () => {
      const tickets = [grant, { ...grant, amount: '0' }];
      expect(await call('POST', '/tickets/batch', { caller: GRANTOR, body: { tickets } })).toEqual({
        status: 400,
        body: { error: 'InvalidArgument', message: 'tickets[1]: amount must be greater than zero' },
      });
    });

    it('returns the ids created before a transfer failure', async () => {
      const tickets = [{ ...grant, amount: '4000' }, { ...grant, amount: '4000' }, { ...grant, amount: '4000' }];
      expect(await call('POST', '/tickets/batch', { caller: GRANTOR, body: { tickets } })).toEqual({
        status: 422,
        body: {
          error: 'TransferFailed',
          message: 'tickets[2]: could not escrow 4000 TKN from 0xgrantor',
          createdIds: [0, 1],
        },
      });
    });
  });

  describe('admin routes', () => {
    it('funds a holder through deposit', async () => {
      expect(await call('POST', '/balances/deposit', { body: { asset: 'TKN', holder: '0xcarol', amount: '250' } })).toEqual({
        status: 200,
        body: { asset: 'TKN', holder: '0xcarol', balance: '250' },
      });
      expect(await call('POST', '/balances/deposit', { body: { asset: 'TKN', holder: '0xcarol', amount: '0' } })).toEqual({
        status: 400,
        body: { error: 'InvalidArgument', message: 'amount must be a positive integer' },
      });
    });

    it('audits mutating requests', async () => {
      await call('POST', '/tickets', { caller: GRANTOR, body: grant });
      await call('POST', '/tickets/0/claim', { caller: '0xstranger' });

      const { status, body } = await call('GET', '/operations');
      expect(status).toBe(200);
      expect(body).toMatchObject({
        total: 2,
        operations: [
          { operation: 'claim', ticket_id: 0, caller: '0xstranger', status: 'failed', error_kind: 'Unauthorized' },
          { operation: 'create', ticket_id: 0, caller: GRANTOR, status: 'success', error_kind: null },
        ],
      });
    });

    it('summarizes the ledger', async () => {
      await call('POST', '/tickets', { caller: GRANTOR, body: grant });
      await call('POST', '/tickets', { caller: GRANTOR, body: { ...grant, irrevocable: true } });
      await call('POST', '/tickets/0/revoke', { caller: GRANTOR });

      expect(await call('GET', '/stats')).toEqual({
        status: 200,
        body: {
          total_tickets: 2,
          active_tickets: 1,
          revoked_tickets: 1,
          exhausted_tickets: 0,
          irrevocable_tickets: 1,
          total_events: 3,
          total_operations: 3,
          failed_operations: 0,
        },
      });
    });
  });
});

describe('rate limiting', () => {
  let server: Server;
  let baseUrl: string;
  let closeFreshDatabase: () => void;
  let resetFreshLimiter: () => void;

  beforeEach(async () => {
    vi.stubEnv('RATE_LIMIT_MAX_REQUESTS', '2');
    vi.resetModules();

    const database = await import('../src/server/database.js');
    const { createApp: createFreshApp } = await import('../src/server/app.js');
    const ledgerModule = await import('../src/server/ledger/index.js');
    const limiter = await import('../src/server/middleware/rate-limit.js');

    database.initializeDatabase(':memory:');
    closeFreshDatabase = database.closeDatabase;
    resetFreshLimiter = limiter.resetRateLimiter;

    const balances = new ledgerModule.BalanceBook();
    const ledger = new ledgerModule.VestingLedger({ store: new ledgerModule.SqliteTicketStore(), transfer: balances });
    ({ server, baseUrl } = await listenOnLoopback(createFreshApp({ ledger, balances, clock: () => T0 })));
  });

  afterEach(async () => {
    await stop(server);
    closeFreshDatabase();
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('answers 429 once a client exceeds the window', async () => {
    const claim = () => request(baseUrl, 'POST', '/tickets/0/claim', { caller: BENEFICIARY });

    expect((await claim()).status).toBe(404);
    expect((await claim()).status).toBe(404);
    expect(await claim()).toEqual({
      status: 429,
      body: {
        error: 'Too many requests',
        message: 'Rate limit exceeded. Maximum 2 requests per 60 seconds.',
        retryAfter: 60,
      },
    });

    resetFreshLimiter();
    expect((await claim()).status).toBe(404);
  });

  it('does not limit read-only routes', async () => {
    for (let attempt = 0; attempt < 4; attempt++) {
      expect((await request(baseUrl, 'GET', '/tickets/0')).status).toBe(404);
    }
    expect((await request(baseUrl, 'GET', '/health')).status).toBe(200);
  });
});
