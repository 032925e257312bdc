// ============================================================================
// BACKEND CONFIGURATION
// Server-side configuration with environment variable overrides
// ============================================================================

import type { UnlockMode } from './types/ticket.js';

function parseUnlockMode(value: string | undefined): UnlockMode | undefined {
  const mode = (value || 'linear').trim().toLowerCase();
  if (mode === 'linear' || mode === 'step') return mode;
  return undefined;
}

// ============================================================================
// LEDGER CONFIGURATION
// ============================================================================

const unlockMode = parseUnlockMode(process.env.LEDGER_UNLOCK_MODE);

export const LEDGER_CONFIG = {
  // 'linear' vests amount * days / vestingDays; 'step' unlocks whole periods only
  unlockMode: unlockMode ?? 'linear',

  dbPath: process.env.LEDGER_DB_PATH || 'data/ledger.db',

  maxBatchSize: parseInt(process.env.LEDGER_MAX_BATCH_SIZE || '100', 10),
} as const;

// ============================================================================
// SERVER CONFIGURATION
// ============================================================================

export const SERVER_CONFIG = {
  port: parseInt(process.env.PORT || '3001', 10),
  host: process.env.HOST || 'localhost',

  // Timeouts (in milliseconds)
  timeout: parseInt(process.env.SERVER_TIMEOUT_MS || '30000', 10),
  keepAliveTimeout: parseInt(process.env.KEEP_ALIVE_TIMEOUT_SEC || '65', 10) * 1000,
  headersTimeout: parseInt(process.env.HEADERS_TIMEOUT_SEC || '66', 10) * 1000,
} as const;

// ============================================================================
// RATE LIMITING CONFIGURATION
// ============================================================================

export const RATE_LIMIT_CONFIG = {
  windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
  maxRequests: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '120', 10),
  cleanupIntervalMs: parseInt(process.env.RATE_LIMIT_CLEANUP_MS || '600000', 10), // 10 minutes
} as const;

// ============================================================================
// VALIDATION
// ============================================================================

function validateConfig() {
  const errors: string[] = [];

  if (unlockMode === undefined) {
    errors.push('LEDGER_UNLOCK_MODE must be "linear" or "step"');
  }

  if (!LEDGER_CONFIG.dbPath.trim()) {
    errors.push('LEDGER_DB_PATH cannot be empty');
  }

  if (
    Number.isNaN(LEDGER_CONFIG.maxBatchSize) ||
    LEDGER_CONFIG.maxBatchSize < 1 ||
    LEDGER_CONFIG.maxBatchSize > 1000
  ) {
    errors.push('LEDGER_MAX_BATCH_SIZE must be between 1 and 1000');
  }

  if (Number.isNaN(SERVER_CONFIG.port) || SERVER_CONFIG.port < 1 || SERVER_CONFIG.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (Number.isNaN(RATE_LIMIT_CONFIG.maxRequests) || RATE_LIMIT_CONFIG.maxRequests < 1) {
    errors.push('RATE_LIMIT_MAX_REQUESTS must be at least 1');
  }

  if (Number.isNaN(RATE_LIMIT_CONFIG.windowMs) || RATE_LIMIT_CONFIG.windowMs < 1000) {
    errors.push('RATE_LIMIT_WINDOW_MS must be at least 1000');
  }

  if (errors.length > 0) {
    console.error('[Config] Validation errors:');
    errors.forEach(err => console.error(`  - ${err}`));
    throw new Error('Configuration validation failed');
  }
}

// Validate on module load
validateConfig();
