// ============================================================================
// VESTING TICKET TYPES
// Shared by the ledger core, the SQLite store and the HTTP handlers
// ============================================================================

/**
 * How unlocked amounts are derived from elapsed days.
 * - 'linear': min(amount, floor(daysLapsed * amount / vestingDays))
 * - 'step':   floor(daysLapsed / vestingDays) * amount (all-or-nothing per period)
 */
export type UnlockMode = 'linear' | 'step';

/**
 * A single vesting grant. Amounts are base units of the asset.
 */
export interface Ticket {
  id: number;
  asset: string;
  grantor: string;
  beneficiary: string;
  cliffDays: number;
  vestingDays: number;
  amount: bigint;
  claimed: bigint;
  balance: bigint;
  createdAt: number; // unix seconds
  lastClaimedAt: number | null;
  numClaims: number;
  irrevocable: boolean;
  isRevoked: boolean;
  revokedAt: number | null;
}

/**
 * Parameters supplied by a grantor when opening a ticket
 */
export interface CreateTicketInput {
  asset: string;
  beneficiary: string;
  cliffDays: number;
  vestingDays: number;
  amount: bigint;
  irrevocable: boolean;
}

export type TicketCreatedEvent = {
  type: 'TicketCreated';
  ticketId: number;
  asset: string;
  amount: bigint;
  irrevocable: boolean;
  at: number;
};

export type ClaimedEvent = {
  type: 'Claimed';
  ticketId: number;
  asset: string;
  amount: bigint;
  at: number;
};

export type RevokedEvent = {
  type: 'Revoked';
  ticketId: number;
  remainingBalance: bigint;
  at: number;
};

export type LedgerEvent = TicketCreatedEvent | ClaimedEvent | RevokedEvent;

export type LedgerEventType = LedgerEvent['type'];
