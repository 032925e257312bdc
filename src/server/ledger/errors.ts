export type LedgerErrorKind =
  | 'InvalidArgument'
  | 'NotFound'
  | 'Unauthorized'
  | 'AlreadyRevoked'
  | 'Irrevocable'
  | 'NoBalance'
  | 'TransferFailed';

export interface LedgerErrorOptions {
  ticketId?: number;
  /** Tickets a batch managed to record before failing */
  createdIds?: number[];
  cause?: unknown;
}

/**
 * Raised at the first violated precondition. Ledger state is untouched
 * whenever one of these escapes an operation.
 */
export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;
  readonly ticketId?: number;
  readonly createdIds?: number[];

  constructor(kind: LedgerErrorKind, message: string, options: LedgerErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'LedgerError';
    this.kind = kind;
    this.ticketId = options.ticketId;
    this.createdIds = options.createdIds;
  }
}

/**
 * A batch stopped on an unexpected failure after some of its tickets were
 * committed. `createdIds` lists the tickets that stay recorded.
 */
export class BatchInterruptedError extends Error {
  readonly createdIds: number[];

  constructor(message: string, createdIds: number[], cause: unknown) {
    super(message, { cause });
    this.name = 'BatchInterruptedError';
    this.createdIds = createdIds;
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
