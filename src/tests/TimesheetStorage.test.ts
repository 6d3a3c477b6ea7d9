// src/tests/TimesheetStorage.test.ts
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TimesheetStorage } from '../services/TimesheetStorage';
import { emptyEntry } from '../services/hours';
import { DEFAULT_CONFIG, TimeEntry } from '../types/models';

describe('TimesheetStorage', () => {
  let tmpDir: string;
  let dbPath: string;
  let storage: TimesheetStorage;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'timesheet-test-'));
    dbPath = path.join(tmpDir, 'timesheet.db');
    storage = new TimesheetStorage(dbPath);
    storage.initDb();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function fullEntry(date: string): TimeEntry {
    return {
      ...emptyEntry(date),
      clockIn: '09:00',
      lunchMinutes: 30,
      clockOut: '17:30',
      comment: 'Normal day',
    };
  }

  describe('initDb', () => {
    it('should create the tables and indexes', () => {
      const db = new Database(dbPath, { readonly: true });
      const names = db.prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type IN ('table', 'index') ORDER BY name"
      ).all().map(r => r.name);
      db.close();

      expect(names).toEqual(expect.arrayContaining([
        'config',
        'idx_allocations_date',
        'idx_allocations_ticket',
        'idx_entries_date',
        'ticket_allocations',
        'tickets',
        'time_entries',
      ]));
    });

    it('should be safe to run twice', () => {
      storage.saveEntry(fullEntry('2026-01-27'));
      storage.initDb();
      expect(storage.getEntry('2026-01-27')).toEqual(fullEntry('2026-01-27'));
    });

    it('should add entered_on_client to an older allocations table', () => {
      const legacyPath = path.join(tmpDir, 'legacy.db');
      const db = new Database(legacyPath);
      db.exec(`
        CREATE TABLE ticket_allocations (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          ticket_id TEXT NOT NULL,
          date TEXT NOT NULL,
          hours TEXT NOT NULL,
          UNIQUE(ticket_id, date)
        )
      `);
      db.close();

      const legacy = new TimesheetStorage(legacyPath);
      legacy.initDb();
      legacy.saveTicket({ id: 'OLD', description: 'Legacy', archived: false, createdAt: '2025-01-01' });
      legacy.saveAllocation({ ticketId: 'OLD', date: '2025-01-02', hours: 2, enteredOnClient: true });

      expect(legacy.getAllocation('OLD', '2025-01-02')?.enteredOnClient).toBe(true);
    });
  });

  describe('time entries', () => {
    it('should save and retrieve a full entry', () => {
      storage.saveEntry(fullEntry('2026-01-27'));
      expect(storage.getEntry('2026-01-27')).toEqual(fullEntry('2026-01-27'));
    });

    it('should save an adjustment-only entry', () => {
      const entry: TimeEntry = { ...emptyEntry('2026-01-28'), adjustmentMinutes: 450, adjustType: 'L' };
      storage.saveEntry(entry);
      expect(storage.getEntry('2026-01-28')).toEqual(entry);
    });

    it('should return null for a missing date', () => {
      expect(storage.getEntry('2026-01-01')).toBeNull();
    });

    it('should replace an existing entry', () => {
      storage.saveEntry(fullEntry('2026-01-27'));
      storage.saveEntry({ ...fullEntry('2026-01-27'), clockOut: '18:00', comment: null });

      const entry = storage.getEntry('2026-01-27');
      expect(entry?.clockOut).toBe('18:00');
      expect(entry?.comment).toBeNull();
    });

    it('should return a range ordered by date', () => {
      storage.saveEntry(fullEntry('2026-01-29'));
      storage.saveEntry(fullEntry('2026-01-27'));
      storage.saveEntry(fullEntry('2026-02-02'));

      expect(storage.getEntriesRange('2026-01-27', '2026-01-31').map(e => e.date))
        .toEqual(['2026-01-27', '2026-01-29']);
      expect(storage.getMonthEntries(2026, 2).map(e => e.date)).toEqual(['2026-02-02']);
      expect(storage.getEntriesRange('2026-03-01', '2026-03-31')).toEqual([]);
    });

    it('should delete an entry', () => {
      storage.saveEntry(fullEntry('2026-01-27'));
      storage.deleteEntry('2026-01-27');
      expect(storage.getEntry('2026-01-27')).toBeNull();
    });
  });

  describe('config', () => {
    it('should return defaults when nothing is stored', () => {
      expect(storage.getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should save and reload every setting', () => {
      const config = { hourlyRate: 105.5, currency: 'EUR', standardDayHours: 8, vatRate: 0.21 };
      storage.saveConfig(config);
      expect(storage.getConfig()).toEqual(config);
    });
  });

  describe('tickets', () => {
    beforeEach(() => {
      storage.saveTicket({ id: 'WEB-1', description: 'Website rebuild', archived: false, createdAt: '2026-01-01' });
      storage.saveTicket({ id: 'OPS-2', description: 'Server patching', archived: false, createdAt: '2026-01-02' });
      storage.saveTicket({ id: 'OLD-3', description: 'Old website', archived: true, createdAt: '2025-06-01' });
    });

    it('should list active tickets by id, and archived ones on request', () => {
      expect(storage.getAllTickets().map(t => t.id)).toEqual(['OPS-2', 'WEB-1']);
      expect(storage.getAllTickets(true).map(t => t.id)).toEqual(['OLD-3', 'OPS-2', 'WEB-1']);
    });

    it('should search ids and descriptions case-insensitively', () => {
      expect(storage.searchTickets('website').map(t => t.id)).toEqual(['WEB-1']);
      expect(storage.searchTickets('website', true).map(t => t.id)).toEqual(['OLD-3', 'WEB-1']);
      expect(storage.searchTickets('ops').map(t => t.id)).toEqual(['OPS-2']);
    });

    it('should default the creation date to today', () => {
      storage.saveTicket({ id: 'NEW-4', description: 'New', archived: false, createdAt: null }, new Date(2026, 0, 27));
      expect(storage.getTicket('NEW-4')?.createdAt).toBe('2026-01-27');
    });

    it('should archive and unarchive', () => {
      storage.archiveTicket('WEB-1');
      expect(storage.getTicket('WEB-1')?.archived).toBe(true);
      storage.unarchiveTicket('WEB-1');
      expect(storage.getTicket('WEB-1')?.archived).toBe(false);
    });

    it('should refuse to delete a ticket with allocations until they are removed', () => {
      storage.saveAllocation({ ticketId: 'WEB-1', date: '2026-01-27', hours: 3, enteredOnClient: false });

      expect(storage.canDeleteTicket('WEB-1')).toBe(false);
      expect(storage.deleteTicket('WEB-1')).toBe(false);
      expect(storage.getTicket('WEB-1')).not.toBeNull();

      storage.deleteAllocation('WEB-1', '2026-01-27');
      expect(storage.deleteTicket('WEB-1')).toBe(true);
      expect(storage.getTicket('WEB-1')).toBeNull();
    });
  });

  describe('allocations', () => {
    beforeEach(() => {
      storage.saveTicket({ id: 'WEB-1', description: 'Website rebuild', archived: false, createdAt: '2026-01-01' });
      storage.saveTicket({ id: 'OPS-2', description: 'Server patching', archived: false, createdAt: '2026-01-02' });
    });

    it('should upsert by ticket and date', () => {
      storage.saveAllocation({ ticketId: 'WEB-1', date: '2026-01-27', hours: 3, enteredOnClient: false });
      storage.saveAllocation({ ticketId: 'WEB-1', date: '2026-01-27', hours: 4.25, enteredOnClient: false });

      expect(storage.getAllocationsForDate('2026-01-27')).toEqual([
        { ticketId: 'WEB-1', date: '2026-01-27', hours: 4.25, enteredOnClient: false },
      ]);
    });

    it('should sum hours for a date', () => {
      storage.saveAllocation({ ticketId: 'WEB-1', date: '2026-01-27', hours: 4.25, enteredOnClient: false });
      storage.saveAllocation({ ticketId: 'OPS-2', date: '2026-01-27', hours: 3.25, enteredOnClient: false });

      expect(storage.getTotalAllocatedHours('2026-01-27')).toBe(7.5);
      expect(storage.getTotalAllocatedHours('2026-01-28')).toBe(0);
    });

    it('should list a month ordered by date then ticket', () => {
      storage.saveAllocation({ ticketId: 'WEB-1', date: '2026-01-28', hours: 1, enteredOnClient: false });
      storage.saveAllocation({ ticketId: 'WEB-1', date: '2026-01-27', hours: 2, enteredOnClient: false });
      storage.saveAllocation({ ticketId: 'OPS-2', date: '2026-01-27', hours: 3, enteredOnClient: false });
      storage.saveAllocation({ ticketId: 'OPS-2', date: '2026-02-02', hours: 4, enteredOnClient: false });

      expect(storage.getAllocationsForMonth(2026, 1).map(a => `${a.date} ${a.ticketId}`)).toEqual([
        '2026-01-27 OPS-2',
        '2026-01-27 WEB-1',
        '2026-01-28 WEB-1',
      ]);
    });

    it('should set the entered-on-client flag', () => {
      storage.saveAllocation({ ticketId: 'WEB-1', date: '2026-01-27', hours: 2, enteredOnClient: false });
      storage.setEnteredOnClient('WEB-1', '2026-01-27', true);
      expect(storage.getAllocation('WEB-1', '2026-01-27')?.enteredOnClient).toBe(true);
    });
  });

  describe('getDatabaseInfo', () => {
    it('should report path, size and modification time', () => {
      const info = storage.getDatabaseInfo();
      expect(info.path).toBe(dbPath);
      expect(info.exists).toBe(true);
      expect(info.sizeBytes).toBeGreaterThan(0);
      expect(info.modified?.getTime()).toEqual(expect.any(Number));
    });

    it('should report a missing database', () => {
      const missing = new TimesheetStorage(path.join(tmpDir, 'none.db'));
      expect(missing.getDatabaseInfo()).toEqual({ path: path.join(tmpDir, 'none.db'), exists: false });
    });
  });
});
