import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { LEDGER_CONFIG } from './config.js';
import type { LedgerEvent, LedgerEventType, Ticket } from './types/ticket.js';
import type { OperationRecord } from './types/logging.js';

const MEMORY_PATH = ':memory:';

let db: Database.Database | undefined;

export function initializeDatabase(dbPath: string = LEDGER_CONFIG.dbPath): Database.Database {
  if (db) {
    db.close();
  }

  if (dbPath !== MEMORY_PATH) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  createTables(db);
  console.log(`[Database] Initialized at ${dbPath}`);
  return db;
}

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized - call initializeDatabase() first');
  }
  return db;
}

/**
 * Run `fn` inside one SQLite transaction; any throw rolls every write back
 */
export function runInTransaction<T>(fn: () => T): T {
  return getDatabase().transaction(fn)();
}

function createTables(conn: Database.Database) {
  // TICKETS - One row per vesting grant, never deleted
  conn.exec(`
    CREATE TABLE IF NOT EXISTS tickets (
      id INTEGER PRIMARY KEY,
      asset TEXT NOT NULL,
      grantor TEXT NOT NULL,
      beneficiary TEXT NOT NULL,
      cliff_days INTEGER NOT NULL CHECK(cliff_days >= 0),
      vesting_days INTEGER NOT NULL CHECK(vesting_days >= cliff_days),
      amount TEXT NOT NULL,
      claimed TEXT NOT NULL DEFAULT '0',
      balance TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      last_claimed_at INTEGER,
      num_claims INTEGER NOT NULL DEFAULT 0,
      irrevocable INTEGER NOT NULL DEFAULT 0,
      is_revoked INTEGER NOT NULL DEFAULT 0,
      revoked_at INTEGER
    )
  `);

  // LEDGER_EVENTS - Ordered notifications, written with the mutation they describe
  conn.exec(`
    CREATE TABLE IF NOT EXISTS ledger_events (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      ticket_id INTEGER NOT NULL,
      event_type TEXT NOT NULL CHECK(event_type IN ('TicketCreated', 'Claimed', 'Revoked')),
      asset TEXT,
      amount TEXT NOT NULL,
      irrevocable INTEGER,
      occurred_at INTEGER NOT NULL,
      FOREIGN KEY (ticket_id) REFERENCES tickets(id)
    )
  `);

  // OPERATIONS - API audit log (one row per mutating request)
  conn.exec(`
    CREATE TABLE IF NOT EXISTS operations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL,
      ip_address TEXT,
      user_agent TEXT,
      caller TEXT,
      operation TEXT NOT NULL CHECK(operation IN ('create', 'create_batch', 'claim', 'revoke', 'deposit')),
      ticket_id INTEGER,
      created_at TEXT NOT NULL,
      completed_at TEXT,
      duration_ms INTEGER,
      status TEXT CHECK(status IN ('success', 'failed')),
      error_kind TEXT,
      error_message TEXT
    )
  `);

  // ASSET_BALANCES - Custodial balance book used as the default transfer backend
  conn.exec(`
    CREATE TABLE IF NOT EXISTS asset_balances (
      asset TEXT NOT NULL,
      holder TEXT NOT NULL,
      balance TEXT NOT NULL,
      PRIMARY KEY (asset, holder)
    )
  `);

  // Indexes
  conn.exec(`
    CREATE INDEX IF NOT EXISTS idx_tickets_grantor ON tickets(grantor);
    CREATE INDEX IF NOT EXISTS idx_tickets_beneficiary ON tickets(beneficiary);
    CREATE INDEX IF NOT EXISTS idx_events_ticket ON ledger_events(ticket_id);
    CREATE INDEX IF NOT EXISTS idx_operations_created ON operations(created_at);
    CREATE INDEX IF NOT EXISTS idx_operations_status ON operations(status);
  `);
}

// ============================================================================
// TICKETS TABLE
// ============================================================================

interface TicketRow {
  id: number;
  asset: string;
  grantor: string;
  beneficiary: string;
  cliff_days: number;
  vesting_days: number;
  amount: string;
  claimed: string;
  balance: string;
  created_at: number;
  last_claimed_at: number | null;
  num_claims: number;
  irrevocable: number;
  is_revoked: number;
  revoked_at: number | null;
}

function ticketFromRow(row: TicketRow): Ticket {
  return {
    id: row.id,
    asset: row.asset,
    grantor: row.grantor,
    beneficiary: row.beneficiary,
    cliffDays: row.cliff_days,
    vestingDays: row.vesting_days,
    amount: BigInt(row.amount),
    claimed: BigInt(row.claimed),
    balance: BigInt(row.balance),
    createdAt: row.created_at,
    lastClaimedAt: row.last_claimed_at,
    numClaims: row.num_claims,
    irrevocable: row.irrevocable === 1,
    isRevoked: row.is_revoked === 1,
    revokedAt: row.revoked_at,
  };
}

export function getNextTicketId(): number {
  const stmt = getDatabase().prepare<[], { next_id: number }>(
    'SELECT COALESCE(MAX(id) + 1, 0) as next_id FROM tickets'
  );
  const row = stmt.get();
  return row ? row.next_id : 0;
}

export function insertTicket(ticket: Ticket): void {
  const stmt = getDatabase().prepare(`
    INSERT INTO tickets (
      id, asset, grantor, beneficiary, cliff_days, vesting_days,
      amount, claimed, balance, created_at, last_claimed_at, num_claims,
      irrevocable, is_revoked, revoked_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  stmt.run(
    ticket.id,
    ticket.asset,
    ticket.grantor,
    ticket.beneficiary,
    ticket.cliffDays,
    ticket.vestingDays,
    ticket.amount.toString(),
    ticket.claimed.toString(),
    ticket.balance.toString(),
    ticket.createdAt,
    ticket.lastClaimedAt,
    ticket.numClaims,
    ticket.irrevocable ? 1 : 0,
    ticket.isRevoked ? 1 : 0,
    ticket.revokedAt
  );
}

/**
 * Persist the mutable fields of a ticket. Schedule, parties and amount are
 * fixed at creation and never rewritten.
 */
export function updateTicket(ticket: Ticket): void {
  const stmt = getDatabase().prepare(`
    UPDATE tickets SET
      claimed = ?, balance = ?, last_claimed_at = ?, num_claims = ?,
      is_revoked = ?, revoked_at = ?
    WHERE id = ?
  `);

  const result = stmt.run(
    ticket.claimed.toString(),
    ticket.balance.toString(),
    ticket.lastClaimedAt,
    ticket.numClaims,
    ticket.isRevoked ? 1 : 0,
    ticket.revokedAt,
    ticket.id
  );

  if (result.changes !== 1) {
    throw new Error(`Ticket ${ticket.id} does not exist`);
  }
}

export function getTicketById(id: number): Ticket | undefined {
  const stmt = getDatabase().prepare<[number], TicketRow>('SELECT * FROM tickets WHERE id = ?');
  const row = stmt.get(id);
  return row ? ticketFromRow(row) : undefined;
}

export function getTicketIdsByGrantor(grantor: string): number[] {
  const stmt = getDatabase().prepare<[string], { id: number }>(
    'SELECT id FROM tickets WHERE grantor = ? ORDER BY id'
  );
  return stmt.all(grantor).map(row => row.id);
}

export function getTicketIdsByBeneficiary(beneficiary: string): number[] {
  const stmt = getDatabase().prepare<[string], { id: number }>(
    'SELECT id FROM tickets WHERE beneficiary = ? ORDER BY id'
  );
  return stmt.all(beneficiary).map(row => row.id);
}

// ============================================================================
// LEDGER_EVENTS TABLE
// ============================================================================

interface LedgerEventRow {
  seq: number;
  ticket_id: number;
  event_type: LedgerEventType;
  asset: string | null;
  amount: string;
  irrevocable: number | null;
  occurred_at: number;
}

function eventFromRow(row: LedgerEventRow): LedgerEvent {
  switch (row.event_type) {
    case 'TicketCreated':
      return {
        type: 'TicketCreated',
        ticketId: row.ticket_id,
        asset: row.asset ?? '',
        amount: BigInt(row.amount),
        irrevocable: row.irrevocable === 1,
        at: row.occurred_at,
      };
    case 'Claimed':
      return {
        type: 'Claimed',
        ticketId: row.ticket_id,
        asset: row.asset ?? '',
        amount: BigInt(row.amount),
        at: row.occurred_at,
      };
    case 'Revoked':
      return {
        type: 'Revoked',
        ticketId: row.ticket_id,
        remainingBalance: BigInt(row.amount),
        at: row.occurred_at,
      };
  }
}

export function insertLedgerEvent(event: LedgerEvent): number {
  const stmt = getDatabase().prepare(`
    INSERT INTO ledger_events (ticket_id, event_type, asset, amount, irrevocable, occurred_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `);

  let asset: string | null = null;
  let amount: bigint;
  let irrevocable: number | null = null;

  switch (event.type) {
    case 'TicketCreated':
      asset = event.asset;
      amount = event.amount;
      irrevocable = event.irrevocable ? 1 : 0;
      break;
    case 'Claimed':
      asset = event.asset;
      amount = event.amount;
      break;
    case 'Revoked':
      amount = event.remainingBalance;
      break;
  }

  const result = stmt.run(event.ticketId, event.type, asset, amount.toString(), irrevocable, event.at);
  return Number(result.lastInsertRowid);
}

export function getLedgerEvents(ticketId: number): LedgerEvent[] {
  const stmt = getDatabase().prepare<[number], LedgerEventRow>(
    'SELECT * FROM ledger_events WHERE ticket_id = ? ORDER BY seq'
  );
  return stmt.all(ticketId).map(eventFromRow);
}

// ============================================================================
// OPERATIONS TABLE
// ============================================================================

export function insertOperation(record: Omit<OperationRecord, 'id'>): number {
  const stmt = getDatabase().prepare(`
    INSERT INTO operations (
      session_id, ip_address, user_agent, caller, operation, ticket_id,
      created_at, completed_at, duration_ms, status, error_kind, error_message
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const result = stmt.run(
    record.session_id,
    record.ip_address || null,
    record.user_agent || null,
    record.caller || null,
    record.operation,
    record.ticket_id ?? null,
    record.created_at,
    record.completed_at || null,
    record.duration_ms ?? null,
    record.status || null,
    record.error_kind || null,
    record.error_message || null
  );

  return Number(result.lastInsertRowid);
}

export function updateOperation(id: number, updates: Partial<OperationRecord>): void {
  const fields: string[] = [];
  const values: (string | number)[] = [];

  if (updates.ticket_id !== undefined) {
    fields.push('ticket_id = ?');
    values.push(updates.ticket_id);
  }
  if (updates.completed_at !== undefined) {
    fields.push('completed_at = ?');
    values.push(updates.completed_at);
  }
  if (updates.duration_ms !== undefined) {
    fields.push('duration_ms = ?');
    values.push(updates.duration_ms);
  }
  if (updates.status !== undefined) {
    fields.push('status = ?');
    values.push(updates.status);
  }
  if (updates.error_kind !== undefined) {
    fields.push('error_kind = ?');
    values.push(updates.error_kind);
  }
  if (updates.error_message !== undefined) {
    fields.push('error_message = ?');
    values.push(updates.error_message);
  }

  if (fields.length === 0) return;

  values.push(id);
  const stmt = getDatabase().prepare(`UPDATE operations SET ${fields.join(', ')} WHERE id = ?`);
  stmt.run(...values);
}

interface OperationRow {
  id: number;
  session_id: string;
  ip_address: string | null;
  user_agent: string | null;
  caller: string | null;
  operation: OperationRecord['operation'];
  ticket_id: number | null;
  created_at: string;
  completed_at: string | null;
  duration_ms: number | null;
  status: 'success' | 'failed' | null;
  error_kind: string | null;
  error_message: string | null;
}

export function getOperations(limit = 50, offset = 0): { operations: OperationRow[]; total: number } {
  const conn = getDatabase();
  const countRow = conn.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM operations').get();
  const total = countRow ? countRow.count : 0;

  const stmt = conn.prepare<[number, number], OperationRow>(`
    SELECT * FROM operations
    ORDER BY id DESC
    LIMIT ? OFFSET ?
  `);

  return { operations: stmt.all(limit, offset), total };
}

// ============================================================================
// ASSET_BALANCES TABLE
// ============================================================================

export function getAssetBalance(asset: string, holder: string): bigint {
  const stmt = getDatabase().prepare<[string, string], { balance: string }>(
    'SELECT balance FROM asset_balances WHERE asset = ? AND holder = ?'
  );
  const row = stmt.get(asset, holder);
  return row ? BigInt(row.balance) : 0n;
}

export function setAssetBalance(asset: string, holder: string, balance: bigint): void {
  const stmt = getDatabase().prepare(`
    INSERT INTO asset_balances (asset, holder, balance) VALUES (?, ?, ?)
    ON CONFLICT(asset, holder) DO UPDATE SET balance = excluded.balance
  `);
  stmt.run(asset, holder, balance.toString());
}

// ============================================================================
// QUERY FUNCTIONS (Read-only)
// ============================================================================

export interface LedgerStats {
  total_tickets: number;
  active_tickets: number;
  revoked_tickets: number;
  exhausted_tickets: number;
  irrevocable_tickets: number;
  total_events: number;
  total_operations: number;
  failed_operations: number;
}

export function getLedgerStats(): LedgerStats {
  const conn = getDatabase();

  const ticketStats = conn.prepare<[], {
    total: number;
    revoked: number | null;
    exhausted: number | null;
    irrevocable: number | null;
  }>(`
    SELECT
      COUNT(*) as total,
      SUM(CASE WHEN is_revoked = 1 THEN 1 ELSE 0 END) as revoked,
      SUM(CASE WHEN is_revoked = 0 AND balance = '0' THEN 1 ELSE 0 END) as exhausted,
      SUM(CASE WHEN irrevocable = 1 THEN 1 ELSE 0 END) as irrevocable
    FROM tickets
  `).get();

  const eventCount = conn.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM ledger_events').get();

  const operationStats = conn.prepare<[], { total: number; failed: number | null }>(`
    SELECT
      COUNT(*) as total,
      SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed
    FROM operations
  `).get();

  const total = ticketStats?.total ?? 0;
  const revoked = ticketStats?.revoked ?? 0;
  const exhausted = ticketStats?.exhausted ?? 0;

  return {
    total_tickets: total,
    active_tickets: total - revoked - exhausted,
    revoked_tickets: revoked,
    exhausted_tickets: exhausted,
    irrevocable_tickets: ticketStats?.irrevocable ?? 0,
    total_events: eventCount?.count ?? 0,
    total_operations: operationStats?.total ?? 0,
    failed_operations: operationStats?.failed ?? 0,
  };
}

// ============================================================================
// DATABASE MANAGEMENT
// ============================================================================

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = undefined;
    console.log('[Database] Connection closed');
  }
}
