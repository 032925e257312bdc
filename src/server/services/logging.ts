import { insertOperation, updateOperation } from '../database.js';
import { isLedgerError } from '../ledger/errors.js';
import type { OperationName, OperationRecord, RequestMetadata } from '../types/logging.js';

export type { RequestMetadata };

/**
 * Log the start of a ledger-mutating request
 */
export function logOperationStart(
  metadata: RequestMetadata,
  operation: OperationName,
  ticketId?: number
): number {
  const record: Omit<OperationRecord, 'id'> = {
    session_id: metadata.session_id,
    ip_address: metadata.ip_address,
    user_agent: metadata.user_agent,
    caller: metadata.caller,
    operation,
    ticket_id: ticketId,
    created_at: new Date().toISOString(),
  };
  return insertOperation(record);
}

/**
 * Log the completion of a request. `error` is whatever the operation threw.
 */
export function logOperationComplete(
  operationId: number,
  startTime: number,
  outcome: { ticketId?: number; error?: unknown } = {}
): void {
  const updates: Partial<OperationRecord> = {
    completed_at: new Date().toISOString(),
    duration_ms: Date.now() - startTime,
    status: outcome.error === undefined ? 'success' : 'failed',
    ticket_id: outcome.ticketId,
  };

  if (outcome.error !== undefined) {
    updates.error_kind = isLedgerError(outcome.error) ? outcome.error.kind : 'Internal';
    updates.error_message = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
  }

  updateOperation(operationId, updates);
}
