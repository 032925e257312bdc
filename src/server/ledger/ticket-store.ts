import {
  getLedgerEvents,
  getNextTicketId,
  getTicketById,
  getTicketIdsByBeneficiary,
  getTicketIdsByGrantor,
  insertLedgerEvent,
  insertTicket,
  runInTransaction,
  updateTicket,
} from '../database.js';
import type { LedgerEvent, Ticket } from '../types/ticket.js';

/**
 * Keyed ticket storage plus the grantor / beneficiary indexes.
 * Every write records its ledger event in the same atomic unit.
 */
export interface TicketStore {
  /** Allocates the next sequential id and stores the ticket */
  insert(draft: Omit<Ticket, 'id'>, toEvent: (ticket: Ticket) => LedgerEvent): Ticket;
  update(ticket: Ticket, event: LedgerEvent): void;
  get(id: number): Ticket | undefined;
  listByGrantor(grantor: string): number[];
  listByBeneficiary(beneficiary: string): number[];
  events(ticketId: number): LedgerEvent[];
}

export class SqliteTicketStore implements TicketStore {
  insert(draft: Omit<Ticket, 'id'>, toEvent: (ticket: Ticket) => LedgerEvent): Ticket {
    return runInTransaction(() => {
      const ticket: Ticket = { id: getNextTicketId(), ...draft };
      insertTicket(ticket);
      insertLedgerEvent(toEvent(ticket));
      return ticket;
    });
  }

  update(ticket: Ticket, event: LedgerEvent): void {
    runInTransaction(() => {
      updateTicket(ticket);
      insertLedgerEvent(event);
    });
  }

  get(id: number): Ticket | undefined {
    return getTicketById(id);
  }

  listByGrantor(grantor: string): number[] {
    return getTicketIdsByGrantor(grantor);
  }

  listByBeneficiary(beneficiary: string): number[] {
    return getTicketIdsByBeneficiary(beneficiary);
  }

  events(ticketId: number): LedgerEvent[] {
    return getLedgerEvents(ticketId);
  }
}
