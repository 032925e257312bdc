/**
 * Express Server - process entry point
 * Ledger wiring lives in app.ts; this file owns startup and shutdown.
 */
import 'dotenv/config';
import { initializeDatabase, closeDatabase } from './database.js';
import { createApp } from './app.js';
import { LEDGER_CONFIG, SERVER_CONFIG } from './config.js';
import { BalanceBook, SqliteTicketStore, VestingLedger } from './ledger/index.js';

function init() {
  console.log('[Server] Initializing database...');
  initializeDatabase(LEDGER_CONFIG.dbPath);

  const balances = new BalanceBook();
  const ledger = new VestingLedger({
    store: new SqliteTicketStore(),
    transfer: balances,
    unlockMode: LEDGER_CONFIG.unlockMode,
  });

  console.log(`[Server] Vesting ledger ready (unlock mode: ${ledger.mode})`);
  return createApp({ ledger, balances });
}

try {
  const app = init();
  const server = app.listen(SERVER_CONFIG.port, SERVER_CONFIG.host, () => {
    console.log(`[Server] Running on http://${SERVER_CONFIG.host}:${SERVER_CONFIG.port}`);
  });

  server.timeout = SERVER_CONFIG.timeout;
  server.keepAliveTimeout = SERVER_CONFIG.keepAliveTimeout;
  server.headersTimeout = SERVER_CONFIG.headersTimeout;

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down gracefully...`);
    server.close(() => {
      console.log('[Server] HTTP server closed');
      closeDatabase();
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
} catch (error) {
  console.error('[FATAL] Server initialization failed:', error);
  process.exit(1);
}
