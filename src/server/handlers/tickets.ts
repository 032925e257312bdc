/**
 * Ticket Handlers - HTTP surface over the vesting ledger
 */
import express, { type Request, type Response, type Router } from 'express';
import type { RequestMetadata } from '../types/logging.js';
import type { CreateTicketInput, LedgerEvent, Ticket } from '../types/ticket.js';
import { BatchInterruptedError, isLedgerError, type LedgerErrorKind } from '../ledger/errors.js';
import type { VestingLedger } from '../ledger/vesting-ledger.js';
import type { VestingProgress } from '../ledger/vesting-math.js';
import { rateLimiter } from '../middleware/rate-limit.js';
import { requireCaller } from '../middleware/logger.js';
import { logOperationStart, logOperationComplete } from '../services/logging.js';
import { LEDGER_CONFIG } from '../config.js';

/** Current time in unix seconds */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface TicketRouteContext {
  ledger: VestingLedger;
  clock: Clock;
  maxBatchSize?: number;
}

type ParseResult<T> = { valid: true; value: T } | { valid: false; error: string };

const STATUS_BY_KIND: Record<LedgerErrorKind, number> = {
  InvalidArgument: 400,
  Unauthorized: 403,
  NotFound: 404,
  AlreadyRevoked: 409,
  Irrevocable: 409,
  NoBalance: 409,
  TransferFailed: 422,
};

// ============================================================================
// INPUT PARSING
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseAmount(value: unknown): ParseResult<bigint> {
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return { valid: true, value: BigInt(value.trim()) };
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return { valid: true, value: BigInt(value) };
  }
  return { valid: false, error: 'amount must be a non-negative integer (decimal string)' };
}

function parseDays(value: unknown, field: string): ParseResult<number> {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return { valid: true, value };
  }
  return { valid: false, error: `${field} must be a non-negative integer` };
}

function parseAddress(value: unknown, field: string): ParseResult<string> {
  if (typeof value === 'string' && value.trim().length > 0) {
    return { valid: true, value: value.trim() };
  }
  return { valid: false, error: `${field} must be a non-empty string` };
}

export function parseCreateInput(body: unknown): ParseResult<CreateTicketInput> {
  if (!isRecord(body)) {
    return { valid: false, error: 'Request body must be a JSON object' };
  }

  const asset = parseAddress(body.asset, 'asset');
  if (!asset.valid) return asset;

  const beneficiary = parseAddress(body.beneficiary, 'beneficiary');
  if (!beneficiary.valid) return beneficiary;

  const cliffDays = parseDays(body.cliffDays, 'cliffDays');
  if (!cliffDays.valid) return cliffDays;

  const vestingDays = parseDays(body.vestingDays, 'vestingDays');
  if (!vestingDays.valid) return vestingDays;

  const amount = parseAmount(body.amount);
  if (!amount.valid) return amount;

  const irrevocable = body.irrevocable ?? false;
  if (typeof irrevocable !== 'boolean') {
    return { valid: false, error: 'irrevocable must be a boolean' };
  }

  return {
    valid: true,
    value: {
      asset: asset.value,
      beneficiary: beneficiary.value,
      cliffDays: cliffDays.value,
      vestingDays: vestingDays.value,
      amount: amount.value,
      irrevocable,
    },
  };
}

export function parseTicketId(raw: string): ParseResult<number> {
  if (!/^\d+$/.test(raw)) {
    return { valid: false, error: 'Invalid ticket ID' };
  }
  const id = parseInt(raw, 10);
  if (!Number.isSafeInteger(id)) {
    return { valid: false, error: 'Invalid ticket ID' };
  }
  return { valid: true, value: id };
}

// ============================================================================
// SERIALIZATION (bigint amounts travel as decimal strings)
// ============================================================================

export function serializeTicket(ticket: Ticket) {
  return {
    ...ticket,
    amount: ticket.amount.toString(),
    claimed: ticket.claimed.toString(),
    balance: ticket.balance.toString(),
  };
}

export function serializeEvent(event: LedgerEvent) {
  switch (event.type) {
    case 'TicketCreated':
    case 'Claimed':
      return { ...event, amount: event.amount.toString() };
    case 'Revoked':
      return { ...event, remainingBalance: event.remainingBalance.toString() };
  }
}

function serializeProgress(ticketId: number, progress: VestingProgress) {
  return {
    ticketId,
    ...progress,
    unlocked: progress.unlocked.toString(),
    claimable: progress.claimable.toString(),
  };
}

// ============================================================================
// RESPONSE HELPERS
// ============================================================================

export function sendError(res: Response, error: unknown): void {
  if (isLedgerError(error)) {
    res.status(STATUS_BY_KIND[error.kind]).json({
      error: error.kind,
      message: error.message,
      ...(error.createdIds ? { createdIds: error.createdIds } : {}),
    });
    return;
  }

  console.error('[Server] Unexpected error:', error);
  if (error instanceof BatchInterruptedError) {
    res.status(500).json({ error: 'Internal', message: 'Internal server error', createdIds: error.createdIds });
    return;
  }
  res.status(500).json({ error: 'Internal', message: 'Internal server error' });
}

/**
 * Close the audit record of a failed request; a failing audit write is only logged
 */
function recordFailure(operationId: number | undefined, startTime: number, error: unknown): void {
  if (operationId === undefined) return;
  try {
    logOperationComplete(operationId, startTime, { error });
  } catch (auditError) {
    console.error(`[Server] Could not complete audit record #${operationId}:`, auditError);
  }
}

function sendInvalid(res: Response, message: string): void {
  res.status(400).json({ error: 'InvalidArgument', message });
}

const ANONYMOUS: RequestMetadata = { session_id: 'unknown', ip_address: 'unknown', user_agent: 'unknown' };

export function requestMetadata(req: Request): RequestMetadata {
  return req.metadata ?? ANONYMOUS;
}

function callerOf(req: Request): string {
  return requestMetadata(req).caller ?? '';
}

// ============================================================================
// ROUTES
// ============================================================================

export function createTicketRoutes(context: TicketRouteContext): Router {
  const { ledger, clock } = context;
  const maxBatchSize = context.maxBatchSize ?? LEDGER_CONFIG.maxBatchSize;
  const router = express.Router();

  router.post('/tickets', rateLimiter, requireCaller, async (req, res) => {
    const parsed = parseCreateInput(req.body);
    if (!parsed.valid) {
      return sendInvalid(res, parsed.error);
    }

    const startTime = Date.now();
    let operationId: number | undefined;
    try {
      operationId = logOperationStart(requestMetadata(req), 'create');
      const id = await ledger.create(parsed.value, callerOf(req), clock());
      logOperationComplete(operationId, startTime, { ticketId: id });
      res.status(201).json({ id });
    } catch (error) {
      recordFailure(operationId, startTime, error);
      sendError(res, error);
    }
  });

  router.post('/tickets/batch', rateLimiter, requireCaller, async (req, res) => {
    const body: unknown = req.body;
    const rawTickets: unknown = isRecord(body) ? body.tickets : undefined;
    if (!Array.isArray(rawTickets)) {
      return sendInvalid(res, 'tickets must be an array');
    }
    if (rawTickets.length > maxBatchSize) {
      return sendInvalid(res, `At most ${maxBatchSize} tickets per batch`);
    }

    const inputs: CreateTicketInput[] = [];
    for (const [index, entry] of rawTickets.entries()) {
      const parsed = parseCreateInput(entry);
      if (!parsed.valid) {
        return sendInvalid(res, `tickets[${index}]: ${parsed.error}`);
      }
      inputs.push(parsed.value);
    }

    const startTime = Date.now();
    let operationId: number | undefined;
    try {
      operationId = logOperationStart(requestMetadata(req), 'create_batch');
      const ids = await ledger.createBatch(inputs, callerOf(req), clock());
      logOperationComplete(operationId, startTime);
      res.status(201).json({ ids });
    } catch (error) {
      recordFailure(operationId, startTime, error);
      sendError(res, error);
    }
  });

  router.get('/tickets/:id', (req, res) => {
    const id = parseTicketId(req.params.id);
    if (!id.valid) return sendInvalid(res, id.error);

    try {
      res.json(serializeTicket(ledger.getTicket(id.value)));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/tickets/:id/available', requireCaller, (req, res) => {
    const id = parseTicketId(req.params.id);
    if (!id.valid) return sendInvalid(res, id.error);

    try {
      const available = ledger.available(id.value, callerOf(req), clock());
      res.json({ ticketId: id.value, available: available.toString() });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/tickets/:id/cliff', requireCaller, (req, res) => {
    const id = parseTicketId(req.params.id);
    if (!id.valid) return sendInvalid(res, id.error);

    try {
      res.json({ ticketId: id.value, hasCliffed: ledger.hasCliffed(id.value, callerOf(req), clock()) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/tickets/:id/progress', requireCaller, (req, res) => {
    const id = parseTicketId(req.params.id);
    if (!id.valid) return sendInvalid(res, id.error);

    try {
      res.json(serializeProgress(id.value, ledger.progress(id.value, callerOf(req), clock())));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/tickets/:id/events', (req, res) => {
    const id = parseTicketId(req.params.id);
    if (!id.valid) return sendInvalid(res, id.error);

    try {
      res.json({ events: ledger.events(id.value).map(serializeEvent) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/tickets/:id/claim', rateLimiter, requireCaller, async (req, res) => {
    const id = parseTicketId(req.params.id);
    if (!id.valid) return sendInvalid(res, id.error);

    const startTime = Date.now();
    let operationId: number | undefined;
    try {
      operationId = logOperationStart(requestMetadata(req), 'claim', id.value);
      const claimed = await ledger.claim(id.value, callerOf(req), clock());
      logOperationComplete(operationId, startTime);
      res.json({ ticketId: id.value, claimed: claimed.toString() });
    } catch (error) {
      recordFailure(operationId, startTime, error);
      sendError(res, error);
    }
  });

  router.post('/tickets/:id/revoke', rateLimiter, requireCaller, async (req, res) => {
    const id = parseTicketId(req.params.id);
    if (!id.valid) return sendInvalid(res, id.error);

    const startTime = Date.now();
    let operationId: number | undefined;
    try {
      operationId = logOperationStart(requestMetadata(req), 'revoke', id.value);
      const returned = await ledger.revoke(id.value, callerOf(req), clock());
      logOperationComplete(operationId, startTime);
      res.json({ ticketId: id.value, returned: returned.toString() });
    } catch (error) {
      recordFailure(operationId, startTime, error);
      sendError(res, error);
    }
  });

  router.get('/grantors/:address/tickets', (req, res) => {
    res.json({ tickets: ledger.listByGrantor(req.params.address) });
  });

  router.get('/beneficiaries/:address/tickets', (req, res) => {
    res.json({ tickets: ledger.listByBeneficiary(req.params.address) });
  });

  return router;
}
