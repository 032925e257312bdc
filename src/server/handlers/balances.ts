/**
 * Balance Handlers - funding and inspection of the custodial balance book
 */
import express, { type Router } from 'express';
import type { BalanceBook } from '../ledger/asset-transfer.js';
import { rateLimiter } from '../middleware/rate-limit.js';
import { logOperationStart, logOperationComplete } from '../services/logging.js';
import { parseAmount, requestMetadata } from './tickets.js';

export interface BalanceRouteContext {
  balances: BalanceBook;
  /** Guards the deposit route (localhost only in production) */
  adminOnly: express.RequestHandler;
}

export function createBalanceRoutes(context: BalanceRouteContext): Router {
  const { balances, adminOnly } = context;
  const router = express.Router();

  router.get('/balances/:asset/:holder', (req, res) => {
    const { asset, holder } = req.params;
    res.json({ asset, holder, balance: balances.balanceOf(asset, holder).toString() });
  });

  router.post('/balances/deposit', adminOnly, rateLimiter, (req, res) => {
    const { asset, holder, amount } = req.body ?? {};
    if (typeof asset !== 'string' || !asset.trim() || typeof holder !== 'string' || !holder.trim()) {
      return res.status(400).json({ error: 'InvalidArgument', message: 'asset and holder are required' });
    }
    const parsed = parseAmount(amount);
    if (!parsed.valid || parsed.value === 0n) {
      return res.status(400).json({ error: 'InvalidArgument', message: 'amount must be a positive integer' });
    }

    const startTime = Date.now();
    const operationId = logOperationStart(requestMetadata(req), 'deposit');
    const balance = balances.deposit(asset.trim(), holder.trim(), parsed.value);
    logOperationComplete(operationId, startTime);

    console.log(`[BalanceBook] Deposited ${parsed.value} ${asset.trim()} to ${holder.trim()}`);
    res.json({ asset: asset.trim(), holder: holder.trim(), balance: balance.toString() });
  });

  return router;
}
