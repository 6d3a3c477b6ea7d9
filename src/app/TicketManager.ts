// src/app/TicketManager.ts
import { MAX_TICKET_ID_LENGTH, Ticket } from '../types/models';
import { TimesheetStorage } from '../services/TimesheetStorage';
import { toIsoDate } from '../utils/dateUtils';
import { truncate } from '../utils/formatters';
import { Logger } from '../utils/logger';
import { validateTicketForm } from '../utils/validation';
import { Choice, Prompter } from './prompts';
import { StatusLevel } from './AppState';

const logger = new Logger('TicketManager');

export type Notify = (text: string, level?: StatusLevel) => void;

type ManageChoice =
  | { kind: 'ticket'; id: string }
  | { kind: 'search' }
  | { kind: 'toggleArchived' }
  | { kind: 'new' }
  | { kind: 'close' };

type TicketAction = 'edit' | 'archive' | 'delete' | 'back';

type SelectChoice =
  | { kind: 'ticket'; id: string }
  | { kind: 'search' }
  | { kind: 'new' }
  | { kind: 'cancel' };

function ticketLabel(ticket: Ticket, showStatus: boolean): string {
  const status = showStatus ? `  ${ticket.archived ? '[Archived]' : '[Active]'}` : '';
  return `${ticket.id.padEnd(MAX_TICKET_ID_LENGTH + 2)}${truncate(ticket.description, 40)}${status}`;
}

/**
 * Ticket management, creation and selection forms
 */
export class TicketManager {
  constructor(
    private readonly storage: TimesheetStorage,
    private readonly prompter: Prompter,
    private readonly notify: Notify,
    private readonly clock: () => Date = () => new Date()
  ) {}

  private findTickets(search: string, includeArchived: boolean): Ticket[] {
    return search
      ? this.storage.searchTickets(search, includeArchived)
      : this.storage.getAllTickets(includeArchived);
  }

  /**
   * Create a ticket, or edit the description of an existing one. Returns the saved ticket.
   */
  async editTicket(existing: Ticket | null = null): Promise<Ticket | null> {
    const id = existing
      ? existing.id
      : await this.prompter.input(`Ticket ID (max ${MAX_TICKET_ID_LENGTH} chars):`);
    const description = await this.prompter.input('Description:', { default: existing?.description });

    const result = validateTicketForm(
      { id, description },
      existing,
      ticketId => this.storage.getTicket(ticketId) !== null,
      toIsoDate(this.clock())
    );

    if (!result.success) {
      this.notify(result.error, 'error');
      return null;
    }

    this.storage.saveTicket(result.value);
    logger.info(`${existing ? 'Updated' : 'Created'} ticket ${result.value.id}`);
    this.notify(`Ticket ${result.value.id} saved`);
    return result.value;
  }

  toggleArchive(ticket: Ticket): void {
    if (ticket.archived) {
      this.storage.unarchiveTicket(ticket.id);
      this.notify(`Ticket ${ticket.id} unarchived`);
    } else {
      this.storage.archiveTicket(ticket.id);
      this.notify(`Ticket ${ticket.id} archived`);
    }
  }

  /**
   * Delete after confirmation; refused while allocations reference the ticket
   */
  async deleteTicket(ticket: Ticket): Promise<boolean> {
    if (!this.storage.canDeleteTicket(ticket.id)) {
      this.notify(`Cannot delete ${ticket.id}: has time allocations`, 'error');
      return false;
    }

    if (!(await this.prompter.confirm(`Delete ticket ${ticket.id}?`))) {
      return false;
    }

    const deleted = this.storage.deleteTicket(ticket.id);
    if (deleted) {
      this.notify(`Ticket ${ticket.id} deleted`);
    }
    return deleted;
  }

  /**
   * Browse, search, create, edit, archive and delete tickets until closed
   */
  async manage(): Promise<void> {
    let search = '';
    let showArchived = false;

    for (;;) {
      const tickets = this.findTickets(search, showArchived);
      const choices: Choice<ManageChoice>[] = [
        ...tickets.map(t => ({ name: ticketLabel(t, true), value: { kind: 'ticket', id: t.id } as const })),
        { name: search ? `Search: "${search}" (change)` : 'Search...', value: { kind: 'search' } },
        { name: showArchived ? 'Hide archived' : 'Show archived', value: { kind: 'toggleArchived' } },
        { name: 'New ticket', value: { kind: 'new' } },
        { name: 'Close', value: { kind: 'close' } },
      ];

      const choice = await this.prompter.select(`Tickets (${tickets.length})`, choices);

      switch (choice.kind) {
        case 'close':
          return;
        case 'search':
          search = (await this.prompter.input('Search:', { default: search })).trim();
          break;
        case 'toggleArchived':
          showArchived = !showArchived;
          break;
        case 'new':
          await this.editTicket();
          break;
        case 'ticket': {
          const ticket = this.storage.getTicket(choice.id);
          if (ticket) {
            await this.ticketActions(ticket);
          } else {
            this.notify('No ticket selected', 'warning');
          }
          break;
        }
      }
    }
  }

  private async ticketActions(ticket: Ticket): Promise<void> {
    const action = await this.prompter.select<TicketAction>(`${ticket.id}: ${ticket.description}`, [
      { name: 'Edit', value: 'edit' },
      { name: ticket.archived ? 'Unarchive' : 'Archive', value: 'archive' },
      { name: 'Delete', value: 'delete' },
      { name: 'Back', value: 'back' },
    ]);

    switch (action) {
      case 'edit':
        await this.editTicket(ticket);
        break;
      case 'archive':
        this.toggleArchive(ticket);
        break;
      case 'delete':
        await this.deleteTicket(ticket);
        break;
      case 'back':
        break;
    }
  }

  /**
   * Pick an active ticket, optionally filtering or creating one inline
   */
  async selectTicket(): Promise<Ticket | null> {
    let search = '';

    for (;;) {
      const tickets = this.findTickets(search, false);
      const choices: Choice<SelectChoice>[] = [
        ...tickets.map(t => ({ name: ticketLabel(t, false), value: { kind: 'ticket', id: t.id } as const })),
        { name: search ? `Search: "${search}" (change)` : 'Search...', value: { kind: 'search' } },
        { name: 'New ticket', value: { kind: 'new' } },
        { name: 'Cancel', value: { kind: 'cancel' } },
      ];

      const choice = await this.prompter.select('Select ticket', choices);

      switch (choice.kind) {
        case 'cancel':
          return null;
        case 'search':
          search = (await this.prompter.input('Search:', { default: search })).trim();
          break;
        case 'new': {
          const created = await this.editTicket();
          if (created) return created;
          break;
        }
        case 'ticket':
          return this.storage.getTicket(choice.id);
      }
    }
  }
}
