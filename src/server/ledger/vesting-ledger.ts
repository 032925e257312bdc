/**
 * Vesting Ledger - create / claim / revoke over escrowed tickets
 *
 * Each mutating operation on a ticket holds that ticket's lock for its whole
 * duration, runs the external transfer first, and only then commits the ticket
 * mutation together with its event. A failed transfer leaves the ticket as it was.
 */
import { LEDGER_CUSTODY, type AssetTransfer } from './asset-transfer.js';
import { BatchInterruptedError, LedgerError } from './errors.js';
import { KeyedMutex } from './keyed-mutex.js';
import type { TicketStore } from './ticket-store.js';
import { claimable, hasCliffed, vestingProgress, type VestingProgress } from './vesting-math.js';
import type { CreateTicketInput, LedgerEvent, Ticket, UnlockMode } from '../types/ticket.js';

export type LedgerEventListener = (event: LedgerEvent) => void;

export interface VestingLedgerConfig {
  store: TicketStore;
  transfer: AssetTransfer;
  unlockMode?: UnlockMode;
  /** Called after each committed mutation, in commit order */
  onEvent?: LedgerEventListener;
}

const ZERO_ADDRESS = /^0x0+$/i;

// 100 years; schedule offsets in seconds stay exact
export const MAX_SCHEDULE_DAYS = 36_500;

function short(address: string): string {
  return address.length > 10 ? `${address.slice(0, 10)}…` : address;
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Returns the reason `input` cannot open a ticket, or undefined when it can
 */
export function checkCreateInput(input: CreateTicketInput, grantor: string): string | undefined {
  if (!grantor.trim()) return 'grantor is required';
  if (grantor.trim() === LEDGER_CUSTODY) return 'grantor cannot be the ledger custody account';
  if (!input.asset.trim()) return 'asset is required';
  if (!input.beneficiary.trim() || ZERO_ADDRESS.test(input.beneficiary.trim())) {
    return 'beneficiary must be a non-zero address';
  }
  if (input.beneficiary.trim() === LEDGER_CUSTODY) return 'beneficiary cannot be the ledger custody account';
  if (input.amount <= 0n) return 'amount must be greater than zero';
  if (!isNonNegativeInteger(input.cliffDays)) return 'cliffDays must be a non-negative integer';
  if (!isNonNegativeInteger(input.vestingDays)) return 'vestingDays must be a non-negative integer';
  if (input.vestingDays < input.cliffDays) return 'vestingDays must be at least cliffDays';
  if (input.vestingDays > MAX_SCHEDULE_DAYS) return `vestingDays must be at most ${MAX_SCHEDULE_DAYS}`;
  return undefined;
}

export class VestingLedger {
  private readonly store: TicketStore;
  private readonly transfer: AssetTransfer;
  private readonly unlockMode: UnlockMode;
  private readonly onEvent?: LedgerEventListener;
  private readonly locks = new KeyedMutex<number>();

  constructor(config: VestingLedgerConfig) {
    this.store = config.store;
    this.transfer = config.transfer;
    this.unlockMode = config.unlockMode ?? 'linear';
    this.onEvent = config.onEvent;
  }

  get mode(): UnlockMode {
    return this.unlockMode;
  }

  /**
   * Escrow `input.amount` from the grantor and open a ticket for the beneficiary
   */
  async create(input: CreateTicketInput, grantor: string, now: number): Promise<number> {
    const problem = checkCreateInput(input, grantor);
    if (problem) {
      throw new LedgerError('InvalidArgument', problem);
    }
    this.assertTimestamp(now);

    await this.runTransfer(
      () => this.transfer.transferIn(input.asset, grantor, input.amount),
      `escrow ${input.amount} ${input.asset} from ${short(grantor)}`
    );

    const draft: Omit<Ticket, 'id'> = {
      asset: input.asset,
      grantor,
      beneficiary: input.beneficiary,
      cliffDays: input.cliffDays,
      vestingDays: input.vestingDays,
      amount: input.amount,
      claimed: 0n,
      balance: input.amount,
      createdAt: now,
      lastClaimedAt: null,
      numClaims: 0,
      irrevocable: input.irrevocable,
      isRevoked: false,
      revokedAt: null,
    };

    const toEvent = (created: Ticket): LedgerEvent => ({
      type: 'TicketCreated',
      ticketId: created.id,
      asset: created.asset,
      amount: created.amount,
      irrevocable: created.irrevocable,
      at: now,
    });

    let ticket: Ticket;
    try {
      ticket = this.store.insert(draft, toEvent);
    } catch (error) {
      await this.compensate(
        () => this.transfer.transferOut(input.asset, grantor, input.amount),
        `return escrow of ${input.amount} ${input.asset} to ${short(grantor)}`
      );
      throw error;
    }

    console.log(
      `[Ledger] Ticket #${ticket.id} created: ${ticket.amount} ${ticket.asset} ` +
      `${short(grantor)} -> ${short(ticket.beneficiary)} ` +
      `(cliff ${ticket.cliffDays}d, vesting ${ticket.vestingDays}d${ticket.irrevocable ? ', irrevocable' : ''})`
    );

    this.emit(toEvent(ticket));

    return ticket.id;
  }

  /**
   * Create several tickets in order. Every entry is validated before the first
   * transfer; a later failure carries the ids already created.
   */
  async createBatch(inputs: CreateTicketInput[], grantor: string, now: number): Promise<number[]> {
    if (inputs.length === 0) {
      throw new LedgerError('InvalidArgument', 'batch is empty');
    }
    this.assertTimestamp(now);

    inputs.forEach((input, index) => {
      const problem = checkCreateInput(input, grantor);
      if (problem) {
        throw new LedgerError('InvalidArgument', `tickets[${index}]: ${problem}`);
      }
    });

    const ids: number[] = [];
    for (const input of inputs) {
      try {
        ids.push(await this.create(input, grantor, now));
      } catch (error) {
        if (error instanceof LedgerError) {
          throw new LedgerError(error.kind, `tickets[${ids.length}]: ${error.message}`, {
            createdIds: [...ids],
            cause: error,
          });
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new BatchInterruptedError(`tickets[${ids.length}]: ${reason}`, [...ids], error);
      }
    }
    return ids;
  }

  /**
   * Amount the beneficiary could claim now. Grantor or beneficiary only.
   */
  available(ticketId: number, caller: string, now: number): bigint {
    const ticket = this.requireTicket(ticketId);
    this.assertParty(ticket, caller);
    this.assertOpen(ticket);
    return claimable(ticket, now, this.unlockMode);
  }

  hasCliffed(ticketId: number, caller: string, now: number): boolean {
    const ticket = this.requireTicket(ticketId);
    this.assertParty(ticket, caller);
    return hasCliffed(ticket, now);
  }

  progress(ticketId: number, caller: string, now: number): VestingProgress {
    const ticket = this.requireTicket(ticketId);
    this.assertParty(ticket, caller);
    return vestingProgress(ticket, now, this.unlockMode);
  }

  /**
   * Pay out everything currently claimable to the beneficiary.
   * Resolves to 0n without moving anything when nothing is claimable yet.
   */
  async claim(ticketId: number, caller: string, now: number): Promise<bigint> {
    this.assertTimestamp(now);

    return this.locks.runExclusive(ticketId, async () => {
      const ticket = this.requireTicket(ticketId);
      if (caller !== ticket.beneficiary) {
        throw new LedgerError('Unauthorized', `only the beneficiary can claim ticket #${ticketId}`, { ticketId });
      }
      this.assertOpen(ticket);

      const amount = claimable(ticket, now, this.unlockMode);
      if (amount === 0n) {
        return 0n;
      }

      await this.runTransfer(
        () => this.transfer.transferOut(ticket.asset, caller, amount),
        `pay ${amount} ${ticket.asset} to ${short(caller)} for ticket #${ticketId}`,
        ticketId
      );

      const updated: Ticket = {
        ...ticket,
        claimed: ticket.claimed + amount,
        balance: ticket.balance - amount,
        lastClaimedAt: now,
        numClaims: ticket.numClaims + 1,
      };
      const event: LedgerEvent = { type: 'Claimed', ticketId, asset: ticket.asset, amount, at: now };

      await this.commit(updated, event, () => this.transfer.transferIn(ticket.asset, caller, amount));

      console.log(
        `[Ledger] Ticket #${ticketId} claimed ${amount} ${ticket.asset} ` +
        `(${updated.claimed}/${updated.amount}, claim ${updated.numClaims})`
      );
      this.emit(event);
      return amount;
    });
  }

  /**
   * Return the whole remaining balance to the grantor and close the ticket.
   * Resolves to the amount returned.
   */
  async revoke(ticketId: number, caller: string, now: number): Promise<bigint> {
    this.assertTimestamp(now);

    return this.locks.runExclusive(ticketId, async () => {
      const ticket = this.requireTicket(ticketId);
      if (caller !== ticket.grantor) {
        throw new LedgerError('Unauthorized', `only the grantor can revoke ticket #${ticketId}`, { ticketId });
      }
      if (ticket.irrevocable) {
        throw new LedgerError('Irrevocable', `ticket #${ticketId} is irrevocable`, { ticketId });
      }
      this.assertOpen(ticket);

      const remaining = ticket.balance;
      await this.runTransfer(
        () => this.transfer.transferOut(ticket.asset, ticket.grantor, remaining),
        `return ${remaining} ${ticket.asset} to ${short(ticket.grantor)} for ticket #${ticketId}`,
        ticketId
      );

      const updated: Ticket = { ...ticket, isRevoked: true, revokedAt: now, balance: 0n };
      const event: LedgerEvent = { type: 'Revoked', ticketId, remainingBalance: remaining, at: now };

      await this.commit(updated, event, () => this.transfer.transferIn(ticket.asset, ticket.grantor, remaining));

      console.log(`[Ledger] Ticket #${ticketId} revoked, ${remaining} ${ticket.asset} returned to grantor`);
      this.emit(event);
      return remaining;
    });
  }

  getTicket(ticketId: number): Ticket {
    return this.requireTicket(ticketId);
  }

  listByGrantor(grantor: string): number[] {
    return this.store.listByGrantor(grantor);
  }

  listByBeneficiary(beneficiary: string): number[] {
    return this.store.listByBeneficiary(beneficiary);
  }

  events(ticketId: number): LedgerEvent[] {
    this.requireTicket(ticketId);
    return this.store.events(ticketId);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requireTicket(ticketId: number): Ticket {
    const ticket = Number.isSafeInteger(ticketId) ? this.store.get(ticketId) : undefined;
    if (!ticket) {
      throw new LedgerError('NotFound', `ticket #${ticketId} does not exist`, { ticketId });
    }
    return ticket;
  }

  private assertParty(ticket: Ticket, caller: string): void {
    if (caller !== ticket.grantor && caller !== ticket.beneficiary) {
      throw new LedgerError('Unauthorized', `caller is not a party to ticket #${ticket.id}`, {
        ticketId: ticket.id,
      });
    }
  }

  private assertOpen(ticket: Ticket): void {
    if (ticket.isRevoked) {
      throw new LedgerError('AlreadyRevoked', `ticket #${ticket.id} was revoked`, { ticketId: ticket.id });
    }
    if (ticket.balance === 0n) {
      throw new LedgerError('NoBalance', `ticket #${ticket.id} has no balance left`, { ticketId: ticket.id });
    }
  }

  private assertTimestamp(now: number): void {
    if (!isNonNegativeInteger(now)) {
      throw new LedgerError('InvalidArgument', 'now must be a non-negative integer timestamp');
    }
  }

  private async runTransfer(
    transfer: () => Promise<boolean>,
    description: string,
    ticketId?: number
  ): Promise<void> {
    let moved: boolean;
    try {
      moved = await transfer();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LedgerError('TransferFailed', `could not ${description}: ${reason}`, { ticketId, cause: error });
    }

    if (!moved) {
      throw new LedgerError('TransferFailed', `could not ${description}`, { ticketId });
    }
  }

  /**
   * Write the mutation; if the write fails after the transfer went through,
   * move the funds back before surfacing the storage error.
   */
  private async commit(
    ticket: Ticket,
    event: LedgerEvent,
    reverse: () => Promise<boolean>
  ): Promise<void> {
    try {
      this.store.update(ticket, event);
    } catch (error) {
      await this.compensate(reverse, `reverse ${event.type} transfer for ticket #${ticket.id}`);
      throw error;
    }
  }

  private async compensate(reverse: () => Promise<boolean>, description: string): Promise<void> {
    try {
      const reversed = await reverse();
      if (reversed) {
        console.warn(`[Ledger] Storage write failed, did ${description}`);
      } else {
        console.error(`[Ledger] Storage write failed and could not ${description}`);
      }
    } catch (error) {
      console.error(`[Ledger] Storage write failed and could not ${description}:`, error);
    }
  }

  private emit(event: LedgerEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (error) {
      console.error(`[Ledger] Event listener failed on ${event.type} for ticket #${event.ticketId}:`, error);
    }
  }
}
