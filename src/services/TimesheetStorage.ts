// src/services/TimesheetStorage.ts
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import {
  Config,
  DEFAULT_CONFIG,
  isAdjustType,
  Ticket,
  TicketAllocation,
  TimeEntry,
} from '../types/models';
import { getMonthBounds, toIsoDate } from '../utils/dateUtils';
import { roundHours } from './hours';
import { Logger } from '../utils/logger';

const logger = new Logger('TimesheetStorage');

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS time_entries (
    date TEXT PRIMARY KEY,
    day_of_week TEXT NOT NULL,
    clock_in TEXT,
    lunch_minutes INTEGER,
    clock_out TEXT,
    adjustment_minutes INTEGER,
    adjust_type TEXT,
    comment TEXT
  );

  CREATE TABLE IF NOT EXISTS config (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tickets (
    id TEXT PRIMARY KEY,
    description TEXT NOT NULL,
    archived INTEGER DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS ticket_allocations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ticket_id TEXT NOT NULL,
    date TEXT NOT NULL,
    hours TEXT NOT NULL,
    entered_on_client INTEGER DEFAULT 0,
    FOREIGN KEY (ticket_id) REFERENCES tickets(id),
    UNIQUE(ticket_id, date)
  );

  CREATE INDEX IF NOT EXISTS idx_entries_date ON time_entries(date);
  CREATE INDEX IF NOT EXISTS idx_allocations_date ON ticket_allocations(date);
  CREATE INDEX IF NOT EXISTS idx_allocations_ticket ON ticket_allocations(ticket_id);
`;

interface TimeEntryRow {
  date: string;
  day_of_week: string;
  clock_in: string | null;
  lunch_minutes: number | null;
  clock_out: string | null;
  adjustment_minutes: number | null;
  adjust_type: string | null;
  comment: string | null;
}

interface TicketRow {
  id: string;
  description: string;
  archived: number | null;
  created_at: string | null;
}

interface AllocationRow {
  ticket_id: string;
  date: string;
  hours: string;
  entered_on_client: number | null;
}

interface ConfigRow {
  key: string;
  value: string;
}

export interface DatabaseInfo {
  path: string;
  exists: boolean;
  modified?: Date;
  sizeBytes?: number;
}

/**
 * SQLite persistence for entries, config, tickets and allocations.
 * Every operation opens its own connection and closes it before returning.
 */
export class TimesheetStorage {
  constructor(private readonly dbPath: string) {}

  get path(): string {
    return this.dbPath;
  }

  private withConnection<T>(fn: (db: Database.Database) => T): T {
    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    const db = new Database(this.dbPath);
    try {
      return fn(db);
    } finally {
      db.close();
    }
  }

  /**
   * Create tables if they don't exist and add columns introduced later
   */
  initDb(): void {
    this.withConnection(db => {
      db.exec(SCHEMA);

      const columns = db.prepare<[], { name: string }>('PRAGMA table_info(ticket_allocations)').all();
      if (!columns.some(c => c.name === 'entered_on_client')) {
        logger.info('Adding entered_on_client column to ticket_allocations');
        db.exec('ALTER TABLE ticket_allocations ADD COLUMN entered_on_client INTEGER DEFAULT 0');
      }
    });
    logger.debug(`Database ready at ${this.dbPath}`);
  }

  getDatabaseInfo(): DatabaseInfo {
    if (!fs.existsSync(this.dbPath)) {
      return { path: this.dbPath, exists: false };
    }
    const stats = fs.statSync(this.dbPath);
    return { path: this.dbPath, exists: true, modified: stats.mtime, sizeBytes: stats.size };
  }

  // ════════════════════════════════════════════════════════════════════
  // TIME ENTRIES
  // ════════════════════════════════════════════════════════════════════

  private rowToEntry(row: TimeEntryRow): TimeEntry {
    return {
      date: row.date,
      dayOfWeek: row.day_of_week,
      clockIn: row.clock_in || null,
      lunchMinutes: row.lunch_minutes || null,
      clockOut: row.clock_out || null,
      adjustmentMinutes: row.adjustment_minutes || null,
      adjustType: isAdjustType(row.adjust_type) ? row.adjust_type : null,
      comment: row.comment || null,
    };
  }

  /**
   * Insert or update a time entry
   */
  saveEntry(entry: TimeEntry): void {
    this.withConnection(db => {
      db.prepare(`
        INSERT OR REPLACE INTO time_entries
        (date, day_of_week, clock_in, lunch_minutes, clock_out, adjustment_minutes, adjust_type, comment)
        VALUES (@date, @dayOfWeek, @clockIn, @lunchMinutes, @clockOut, @adjustmentMinutes, @adjustType, @comment)
      `).run(entry);
    });
    logger.debug(`Saved entry ${entry.date}`);
  }

  getEntry(date: string): TimeEntry | null {
    const row = this.withConnection(db =>
      db.prepare<[string], TimeEntryRow>('SELECT * FROM time_entries WHERE date = ?').get(date)
    );
    return row ? this.rowToEntry(row) : null;
  }

  deleteEntry(date: string): void {
    this.withConnection(db => {
      db.prepare('DELETE FROM time_entries WHERE date = ?').run(date);
    });
    logger.debug(`Deleted entry ${date}`);
  }

  /**
   * Entries between two dates, inclusive, ordered by date
   */
  getEntriesRange(start: string, end: string): TimeEntry[] {
    const rows = this.withConnection(db =>
      db.prepare<[string, string], TimeEntryRow>('SELECT * FROM time_entries WHERE date >= ? AND date <= ? ORDER BY date')
        .all(start, end)
    );
    return rows.map(row => this.rowToEntry(row));
  }

  getMonthEntries(year: number, month: number): TimeEntry[] {
    const { start, end } = getMonthBounds(year, month);
    return this.getEntriesRange(toIsoDate(start), toIsoDate(end));
  }

  // ════════════════════════════════════════════════════════════════════
  // CONFIG
  // ════════════════════════════════════════════════════════════════════

  getConfig(): Config {
    const rows = this.withConnection(db =>
      db.prepare<[], ConfigRow>('SELECT key, value FROM config').all()
    );

    const config: Config = { ...DEFAULT_CONFIG };
    for (const row of rows) {
      switch (row.key) {
        case 'hourly_rate':
          config.hourlyRate = parseStoredNumber(row.value, DEFAULT_CONFIG.hourlyRate);
          break;
        case 'currency':
          config.currency = row.value;
          break;
        case 'standard_day_hours':
          config.standardDayHours = parseStoredNumber(row.value, DEFAULT_CONFIG.standardDayHours);
          break;
        case 'vat_rate':
          config.vatRate = parseStoredNumber(row.value, DEFAULT_CONFIG.vatRate);
          break;
        default:
          logger.warn(`Ignoring unknown config key '${row.key}'`);
      }
    }
    return config;
  }

  saveConfig(config: Config): void {
    this.withConnection(db => {
      const upsert = db.prepare('INSERT OR REPLACE INTO config (key, value) VALUES (?, ?)');
      db.transaction(() => {
        upsert.run('hourly_rate', String(config.hourlyRate));
        upsert.run('currency', config.currency);
        upsert.run('standard_day_hours', String(config.standardDayHours));
        upsert.run('vat_rate', String(config.vatRate));
      })();
    });
    logger.info(`Saved config: rate ${config.hourlyRate} ${config.currency}, day ${config.standardDayHours}h, VAT ${config.vatRate}`);
  }

  // ════════════════════════════════════════════════════════════════════
  // TICKETS
  // ════════════════════════════════════════════════════════════════════

  private rowToTicket(row: TicketRow): Ticket {
    return {
      id: row.id,
      description: row.description,
      archived: Boolean(row.archived),
      createdAt: row.created_at || null,
    };
  }

  /**
   * Insert or update a ticket; a missing creation date becomes today
   */
  saveTicket(ticket: Ticket, today: Date = new Date()): void {
    this.withConnection(db => {
      db.prepare(`
        INSERT OR REPLACE INTO tickets (id, description, archived, created_at)
        VALUES (?, ?, ?, ?)
      `).run(ticket.id, ticket.description, ticket.archived ? 1 : 0, ticket.createdAt ?? toIsoDate(today));
    });
    logger.debug(`Saved ticket ${ticket.id}`);
  }

  getTicket(ticketId: string): Ticket | null {
    const row = this.withConnection(db =>
      db.prepare<[string], TicketRow>('SELECT * FROM tickets WHERE id = ?').get(ticketId)
    );
    return row ? this.rowToTicket(row) : null;
  }

  getAllTickets(includeArchived: boolean = false): Ticket[] {
    const sql = includeArchived
      ? 'SELECT * FROM tickets ORDER BY id'
      : 'SELECT * FROM tickets WHERE archived = 0 ORDER BY id';
    const rows = this.withConnection(db => db.prepare<[], TicketRow>(sql).all());
    return rows.map(row => this.rowToTicket(row));
  }

  /**
   * Tickets whose id or description contains the query (case-insensitive)
   */
  searchTickets(query: string, includeArchived: boolean = false): Ticket[] {
    const pattern = `%${query}%`;
    const sql = includeArchived
      ? 'SELECT * FROM tickets WHERE id LIKE ? OR description LIKE ? ORDER BY id'
      : 'SELECT * FROM tickets WHERE (id LIKE ? OR description LIKE ?) AND archived = 0 ORDER BY id';
    const rows = this.withConnection(db => db.prepare<[string, string], TicketRow>(sql).all(pattern, pattern));
    return rows.map(row => this.rowToTicket(row));
  }

  canDeleteTicket(ticketId: string): boolean {
    const row = this.withConnection(db =>
      db.prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM ticket_allocations WHERE ticket_id = ?')
        .get(ticketId)
    );
    return (row?.count ?? 0) === 0;
  }

  /**
   * Delete a ticket. Returns false, deleting nothing, while allocations reference it.
   */
  deleteTicket(ticketId: string): boolean {
    if (!this.canDeleteTicket(ticketId)) {
      logger.warn(`Refusing to delete ticket ${ticketId}: it has allocations`);
      return false;
    }
    this.withConnection(db => {
      db.prepare('DELETE FROM tickets WHERE id = ?').run(ticketId);
    });
    logger.info(`Deleted ticket ${ticketId}`);
    return true;
  }

  archiveTicket(ticketId: string): void {
    this.withConnection(db => {
      db.prepare('UPDATE tickets SET archived = 1 WHERE id = ?').run(ticketId);
    });
  }

  unarchiveTicket(ticketId: string): void {
    this.withConnection(db => {
      db.prepare('UPDATE tickets SET archived = 0 WHERE id = ?').run(ticketId);
    });
  }

  // ════════════════════════════════════════════════════════════════════
  // TICKET ALLOCATIONS
  // ════════════════════════════════════════════════════════════════════

  private rowToAllocation(row: AllocationRow): TicketAllocation {
    return {
      ticketId: row.ticket_id,
      date: row.date,
      hours: parseStoredNumber(row.hours, 0),
      enteredOnClient: Boolean(row.entered_on_client),
    };
  }

  saveAllocation(allocation: TicketAllocation): void {
    this.withConnection(db => {
      db.prepare(`
        INSERT OR REPLACE INTO ticket_allocations (ticket_id, date, hours, entered_on_client)
        VALUES (?, ?, ?, ?)
      `).run(
        allocation.ticketId,
        allocation.date,
        allocation.hours.toFixed(2),
        allocation.enteredOnClient ? 1 : 0
      );
    });
    logger.debug(`Saved allocation ${allocation.ticketId} ${allocation.date} ${allocation.hours}h`);
  }

  getAllocation(ticketId: string, date: string): TicketAllocation | null {
    const row = this.withConnection(db =>
      db.prepare<[string, string], AllocationRow>('SELECT * FROM ticket_allocations WHERE ticket_id = ? AND date = ?')
        .get(ticketId, date)
    );
    return row ? this.rowToAllocation(row) : null;
  }

  getAllocationsForDate(date: string): TicketAllocation[] {
    const rows = this.withConnection(db =>
      db.prepare<[string], AllocationRow>('SELECT * FROM ticket_allocations WHERE date = ? ORDER BY ticket_id')
        .all(date)
    );
    return rows.map(row => this.rowToAllocation(row));
  }

  getAllocationsForRange(start: string, end: string): TicketAllocation[] {
    const rows = this.withConnection(db =>
      db.prepare<[string, string], AllocationRow>(`
        SELECT * FROM ticket_allocations
        WHERE date >= ? AND date <= ?
        ORDER BY date, ticket_id
      `).all(start, end)
    );
    return rows.map(row => this.rowToAllocation(row));
  }

  getAllocationsForMonth(year: number, month: number): TicketAllocation[] {
    const { start, end } = getMonthBounds(year, month);
    return this.getAllocationsForRange(toIsoDate(start), toIsoDate(end));
  }

  deleteAllocation(ticketId: string, date: string): void {
    this.withConnection(db => {
      db.prepare('DELETE FROM ticket_allocations WHERE ticket_id = ? AND date = ?').run(ticketId, date);
    });
    logger.debug(`Deleted allocation ${ticketId} ${date}`);
  }

  setEnteredOnClient(ticketId: string, date: string, entered: boolean): void {
    this.withConnection(db => {
      db.prepare('UPDATE ticket_allocations SET entered_on_client = ? WHERE ticket_id = ? AND date = ?')
        .run(entered ? 1 : 0, ticketId, date);
    });
  }

  getTotalAllocatedHours(date: string): number {
    const row = this.withConnection(db =>
      db.prepare<[string], { total: number }>(`
        SELECT COALESCE(SUM(CAST(hours AS REAL)), 0) AS total
        FROM ticket_allocations WHERE date = ?
      `).get(date)
    );
    return roundHours(row?.total ?? 0);
  }
}

function parseStoredNumber(value: string, fallback: number): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    logger.warn(`Stored value '${value}' is not a number, using ${fallback}`);
    return fallback;
  }
  return parsed;
}
