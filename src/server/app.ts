/**
 * Express application - wiring of middleware and routes.
 * Kept free of listen() so tests can mount it on an ephemeral server.
 */
import express from 'express';
import cookieParser from 'cookie-parser';
import { getLedgerStats, getOperations } from './database.js';
import { loggerMiddleware } from './middleware/logger.js';
import { createTicketRoutes, systemClock, type Clock } from './handlers/tickets.js';
import { createBalanceRoutes } from './handlers/balances.js';
import type { VestingLedger } from './ledger/vesting-ledger.js';
import type { BalanceBook } from './ledger/asset-transfer.js';

export interface AppContext {
  ledger: VestingLedger;
  balances: BalanceBook;
  clock?: Clock;
  maxBatchSize?: number;
}

// Admin routes are restricted to loopback callers
const ALLOWED_IPS = ['127.0.0.1', '::1', '::ffff:127.0.0.1'];

export function localhostOnly(req: express.Request, res: express.Response, next: express.NextFunction) {
  const ip = req.ip || req.socket.remoteAddress || '';
  if (!ALLOWED_IPS.includes(ip)) {
    return res.status(403).json({ error: 'Access denied' });
  }
  next();
}

export function createApp(context: AppContext): express.Express {
  const app = express();
  app.use(express.json({ limit: '100kb' }));
  app.use(cookieParser());
  app.use(loggerMiddleware);

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', unlockMode: context.ledger.mode });
  });

  app.use('/api', createTicketRoutes({
    ledger: context.ledger,
    clock: context.clock ?? systemClock,
    maxBatchSize: context.maxBatchSize,
  }));

  app.use('/api', createBalanceRoutes({
    balances: context.balances,
    adminOnly: localhostOnly,
  }));

  // Audit API endpoints (localhost only)
  app.get('/api/operations', localhostOnly, (req, res) => {
    const limit = Math.min(parseInt(String(req.query.limit ?? '')) || 50, 100);
    const offset = parseInt(String(req.query.offset ?? '')) || 0;
    res.json(getOperations(limit, offset));
  });

  app.get('/api/stats', localhostOnly, (_req, res) => {
    res.json(getLedgerStats());
  });

  // Malformed JSON bodies and other middleware failures
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'InvalidArgument', message: 'Malformed JSON body' });
    }
    console.error('[Server] Unhandled error:', err);
    res.status(500).json({ error: 'Internal', message: 'Internal server error' });
  });

  return app;
}
