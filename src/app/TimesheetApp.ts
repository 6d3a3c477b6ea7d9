// src/app/TimesheetApp.ts
import chalk from 'chalk';
import { format } from 'date-fns';
import { Config, Ticket, TicketAllocation } from '../types/models';
import { TimesheetStorage } from '../services/TimesheetStorage';
import { HolidayService } from '../services/HolidayService';
import { SummaryService, summarizeWeek } from '../services/SummaryService';
import { emptyEntry, hoursToMinutes, isBlankEntry, roundHours, workedHours } from '../services/hours';
import {
  companyYearLabel,
  fromIsoDate,
  getCompanyYearMonths,
  monthLabel,
  parseIsoDate,
  YearMonth,
} from '../utils/dateUtils';
import { formatHours } from '../utils/formatters';
import { Logger } from '../utils/logger';
import {
  asPromptValidator,
  parseAdjustType,
  parseAdjustmentHours,
  parseAllocationHours,
  parseClockTime,
  parseLunchMinutes,
  validateConfigForm,
  validateDayForm,
} from '../utils/validation';
import { AppState, StatusLevel } from './AppState';
import {
  availableCommands,
  ClipboardAction,
  Command,
  CommandContext,
  commandLabel,
  QuickAdjustType,
  quickAdjustLabel,
} from './commands';
import { Prompter } from './prompts';
import { TicketManager } from './TicketManager';
import { renderAllocationsView } from './views/allocations-view';
import { renderDayView } from './views/day-view';
import { renderMonthView } from './views/month-view';
import { renderWeekView } from './views/week-view';
import { renderYearView } from './views/year-view';

const logger = new Logger('TimesheetApp');

export interface TimesheetAppOptions {
  holidays?: HolidayService;
  clock?: () => Date;
}

const STATUS_STYLES: Record<StatusLevel, (text: string) => string> = {
  info: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
};

/**
 * Interactive controller: renders the current view, offers the commands that apply
 * to it and runs the chosen one, until quit.
 */
export class TimesheetApp {
  readonly state: AppState;
  private readonly holidays: HolidayService;
  private readonly summaries: SummaryService;
  private readonly tickets: TicketManager;
  private readonly clock: () => Date;
  private running = false;

  constructor(
    private readonly storage: TimesheetStorage,
    private readonly prompter: Prompter,
    options: TimesheetAppOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.storage.initDb();
    this.holidays = options.holidays ?? new HolidayService(storage);
    this.summaries = new SummaryService(storage);
    this.state = new AppState((start, end) => storage.getEntriesRange(start, end), this.clock());
    this.tickets = new TicketManager(storage, prompter, (text, level) => this.notify(text, level), this.clock);
  }

  get isRunning(): boolean {
    return this.running;
  }

  private notify(text: string, level: StatusLevel = 'info'): void {
    this.state.setStatus(text, level);
  }

  async run(): Promise<void> {
    this.running = true;
    logger.info(`Timesheet started with database ${this.storage.path}`);

    while (this.running) {
      this.prompter.render(this.renderLines());
      this.state.status = null;

      const command = await this.chooseCommand();
      await this.executeCommand(command);
    }

    logger.info('Timesheet closed');
  }

  commandContext(): CommandContext {
    return {
      viewMode: this.state.viewMode,
      hasClipboard: this.state.clipboard !== null,
      allocationCount: this.state.viewMode === 'day'
        ? this.storage.getAllocationsForDate(this.state.selectedDate).length
        : 0,
    };
  }

  private async chooseCommand(): Promise<Command> {
    const viewMode = this.state.viewMode;
    const choices = availableCommands(this.commandContext())
      .map(command => ({ name: commandLabel(command, viewMode), value: command }));
    return this.prompter.select('Command', choices, 20);
  }

  // ════════════════════════════════════════════════════════════════════
  // RENDERING
  // ════════════════════════════════════════════════════════════════════

  private ticketMap(): Map<string, Ticket> {
    return new Map(this.storage.getAllTickets(true).map(t => [t.id, t]));
  }

  renderLines(): string[] {
    const lines = this.renderView(this.storage.getConfig());
    const { status } = this.state;

    if (status) {
      lines.push('', STATUS_STYLES[status.level](status.text));
    }
    return lines;
  }

  private renderView(config: Config): string[] {
    const { state } = this;

    switch (state.viewMode) {
      case 'week':
        return this.renderWeek(config);
      case 'month':
        return renderMonthView(
          this.summaries.getMonthSummary(state.year, state.month, config),
          state.weekIndex,
          config,
          state.showMoney
        );
      case 'year':
        return renderYearView(
          this.summaries.getYearSummary(state.companyYear, config),
          { year: state.year, month: state.month },
          config,
          state.showMoney
        );
      case 'day':
        return renderDayView({
          entry: state.selectedEntry,
          allocations: this.storage.getAllocationsForDate(state.selectedDate),
          tickets: this.ticketMap(),
          config,
          showMoney: state.showMoney,
        });
      case 'allocations':
        return renderAllocationsView(
          state.year,
          state.month,
          this.storage.getAllocationsForMonth(state.year, state.month),
          this.ticketMap()
        );
    }
  }

  private renderWeek(config: Config): string[] {
    const { state } = this;
    const dates = state.weekDates();
    const allocated = new Map(dates.map(d => [d, this.storage.getTotalAllocatedHours(d)]));

    return renderWeekView({
      year: state.year,
      month: state.month,
      weekNumber: state.weekIndex + 1,
      weekCount: state.weeks.length,
      week: state.currentWeek,
      entries: dates.map(d => state.getEntry(d)),
      selectedDate: state.selectedDate,
      allocated,
      summary: summarizeWeek(state.currentWeek, state.cachedEntries, config),
      config,
      showMoney: state.showMoney,
    });
  }

  // ════════════════════════════════════════════════════════════════════
  // COMMANDS
  // ════════════════════════════════════════════════════════════════════

  /**
   * Run one command. Failures are logged and reported in the status line.
   */
  async executeCommand(command: Command): Promise<void> {
    try {
      await this.dispatch(command);
    } catch (error) {
      logger.error(`Command ${command.kind} failed`, error);
      this.notify(`Error: ${error instanceof Error ? error.message : String(error)}`, 'error');
    }
  }

  private async dispatch(command: Command): Promise<void> {
    const { state } = this;

    switch (command.kind) {
      case 'navigate':
        this.navigate(command.step === 'prev' ? -1 : 1);
        break;
      case 'moveCursor':
        state.moveCursor(command.delta);
        break;
      case 'goToday':
        state.goToToday(this.clock());
        break;
      case 'switchView':
        state.viewMode = command.view;
        break;
      case 'selectDay':
        await this.selectDay();
        break;
      case 'selectMonth':
        await this.selectMonth();
        break;
      case 'editDay':
        await this.editDay();
        break;
      case 'quickAdjust':
        await this.quickAdjust(command.adjustType);
        break;
      case 'clipboard':
        await this.clipboard(command.action);
        break;
      case 'populateHolidays':
        this.populateHolidays();
        break;
      case 'toggleMoney':
        state.showMoney = !state.showMoney;
        break;
      case 'addAllocation':
        await this.addAllocation();
        break;
      case 'editAllocation':
        await this.editAllocation();
        break;
      case 'deleteAllocation':
        await this.deleteAllocation();
        break;
      case 'toggleEnteredOnClient':
        await this.toggleEnteredOnClient();
        break;
      case 'manageTickets':
        await this.tickets.manage();
        break;
      case 'editConfig':
        await this.editConfig();
        break;
      case 'quit':
        this.running = false;
        break;
    }
  }

  private navigate(direction: -1 | 1): void {
    const { state } = this;
    const prev = direction < 0;

    switch (state.viewMode) {
      case 'week':
        if (prev) state.prevWeek(); else state.nextWeek();
        break;
      case 'month':
      case 'allocations':
        if (prev) state.prevMonth(); else state.nextMonth();
        break;
      case 'year':
        if (prev) state.prevYear(); else state.nextYear();
        break;
      case 'day':
        if (prev) state.prevDay(); else state.nextDay();
        break;
    }
  }

  private async selectDay(): Promise<void> {
    if (this.state.viewMode !== 'week') {
      const value = await this.prompter.input('Date (yyyy-mm-dd):', {
        default: this.state.selectedDate,
        validate: input => parseIsoDate(input.trim()) !== null || 'Date must be yyyy-mm-dd',
      });
      const date = parseIsoDate(value.trim());
      if (!date) {
        this.notify('Date must be yyyy-mm-dd', 'error');
        return;
      }
      this.state.goToDate(date);
    }
    this.state.viewMode = 'day';
  }

  /**
   * Month picker over the previous, current and next company years
   */
  private async selectMonth(): Promise<void> {
    const startYear = this.state.companyYear;
    const choices: Array<{ name: string; value: YearMonth }> = [];

    for (const year of [startYear - 1, startYear, startYear + 1]) {
      for (const ym of getCompanyYearMonths(year)) {
        choices.push({ name: `${monthLabel(ym.year, ym.month)}   (${companyYearLabel(year)})`, value: ym });
      }
    }

    const { year, month } = await this.prompter.select('Go to month', choices);
    this.state.goToMonth(year, month);
  }

  private async editDay(): Promise<void> {
    const entry = this.state.selectedEntry;
    const d = fromIsoDate(entry.date);

    logger.debug(`Editing ${entry.date}`);
    const title = `${entry.dayOfWeek} ${format(d, 'MMM dd, yyyy')}`;

    const clockIn = await this.prompter.input(`${title} - In (HH:MM):`, {
      default: entry.clockIn ?? '',
      validate: asPromptValidator(v => parseClockTime(v, 'Clock in')),
    });
    const lunch = await this.prompter.input('Lunch (minutes):', {
      default: entry.lunchMinutes ? String(entry.lunchMinutes) : '',
      validate: asPromptValidator(parseLunchMinutes),
    });
    const clockOut = await this.prompter.input('Out (HH:MM):', {
      default: entry.clockOut ?? '',
      validate: asPromptValidator(v => parseClockTime(v, 'Clock out')),
    });
    const adjustment = await this.prompter.input('Adjust (hours):', {
      default: entry.adjustmentMinutes ? formatHours(entry.adjustmentMinutes / 60) : '',
      validate: asPromptValidator(parseAdjustmentHours),
    });
    const adjustType = await this.prompter.input('Type (L/S/T/P):', {
      default: entry.adjustType ?? '',
      validate: asPromptValidator(parseAdjustType),
    });
    const comment = await this.prompter.input('Comment:', { default: entry.comment ?? '' });

    const result = validateDayForm(entry, { clockIn, lunch, clockOut, adjustment, adjustType, comment });
    if (!result.success) {
      this.notify(result.error, 'error');
      return;
    }

    this.storage.saveEntry(result.value);
    this.state.setEntry(result.value);
    this.notify(`Saved ${format(d, 'EEE MMM dd')}`);
  }

  /**
   * Record a full standard day of leave, sickness or training on the selected day,
   * then move to the next day
   */
  private async quickAdjust(adjustType: QuickAdjustType): Promise<void> {
    const entry = this.state.selectedEntry;
    const dateLabel = format(fromIsoDate(entry.date), 'MMM dd');

    if (!isBlankEntry(entry) && !(await this.prompter.confirm(`Overwrite existing entry for ${dateLabel}?`))) {
      return;
    }

    const config = this.storage.getConfig();
    const updated = {
      ...emptyEntry(entry.date),
      adjustmentMinutes: hoursToMinutes(config.standardDayHours),
      adjustType,
    };

    this.storage.saveEntry(updated);
    this.state.setEntry(updated);
    this.state.moveCursor(1);
    this.notify(`${quickAdjustLabel(adjustType)} recorded for ${dateLabel}`);
  }

  private async clipboard(action: ClipboardAction): Promise<void> {
    const { state } = this;
    const entry = state.selectedEntry;
    const dateLabel = format(fromIsoDate(entry.date), 'MMM dd');

    switch (action) {
      case 'copy':
      case 'cut':
        if (isBlankEntry(entry) && !entry.comment) {
          this.notify(`Nothing to ${action} on ${dateLabel}`, 'warning');
          return;
        }
        state.clipboard = entry;
        if (action === 'cut') {
          this.storage.deleteEntry(entry.date);
          state.removeEntry(entry.date);
          this.notify(`Cut ${dateLabel}`);
        } else {
          this.notify(`Copied ${dateLabel}`);
        }
        break;
      case 'paste': {
        const source = state.clipboard;
        if (!source) {
          this.notify('Clipboard is empty', 'warning');
          return;
        }
        if (!isBlankEntry(entry) && !(await this.prompter.confirm(`Overwrite existing entry for ${dateLabel}?`))) {
          return;
        }
        const pasted = { ...source, date: entry.date, dayOfWeek: entry.dayOfWeek };
        this.storage.saveEntry(pasted);
        state.setEntry(pasted);
        this.notify(`Pasted onto ${dateLabel}`);
        break;
      }
    }
  }

  private populateHolidays(): void {
    const { state } = this;
    const config = this.storage.getConfig();
    const count = this.holidays.populateHolidays(state.year, state.month, config.standardDayHours);
    state.reload();
    this.notify(count ? `Added ${count} holiday entries` : 'No new holidays to add');
  }

  // ════════════════════════════════════════════════════════════════════
  // ALLOCATIONS
  // ════════════════════════════════════════════════════════════════════

  private async chooseAllocation(message: string): Promise<TicketAllocation | null> {
    const allocations = this.storage.getAllocationsForDate(this.state.selectedDate);
    if (!allocations.length) {
      this.notify('No allocations for this day', 'warning');
      return null;
    }

    const tickets = this.ticketMap();
    const choices: Array<{ name: string; value: TicketAllocation | null }> = allocations.map(a => ({
      name: `${a.ticketId.padEnd(10)}${a.hours.toFixed(2).padStart(6)}h  ${tickets.get(a.ticketId)?.description ?? ''}`,
      value: a,
    }));
    choices.push({ name: 'Cancel', value: null });

    return this.prompter.select(message, choices);
  }

  /**
   * Ask for hours against a ticket on the selected day. Zero removes the allocation.
   */
  private async promptAllocationHours(ticket: Ticket, current: TicketAllocation | null): Promise<void> {
    const date = this.state.selectedDate;
    const worked = workedHours(this.state.getEntry(date));
    const allocatedElsewhere = this.storage.getTotalAllocatedHours(date) - (current?.hours ?? 0);
    const remaining = roundHours(worked - allocatedElsewhere);

    const message = `${current ? 'Edit' : 'Add'} allocation ${ticket.id}: ${ticket.description}` +
      (worked ? ` (remaining to allocate: ${remaining.toFixed(2)}h)` : '');

    const value = await this.prompter.input(`${message}\nHours:`, {
      default: current ? current.hours.toFixed(2) : '',
      validate: asPromptValidator(parseAllocationHours),
    });

    const hours = parseAllocationHours(value);
    if (!hours.success) {
      this.notify(hours.error, 'error');
      return;
    }

    if (hours.value === 0) {
      if (current) {
        this.storage.deleteAllocation(ticket.id, date);
        this.notify(`Removed allocation for ${ticket.id}`);
      }
      return;
    }

    this.storage.saveAllocation({
      ticketId: ticket.id,
      date,
      hours: hours.value,
      enteredOnClient: current?.enteredOnClient ?? false,
    });
    this.notify(`Allocated ${formatHours(hours.value)}h to ${ticket.id}`);
  }

  private async addAllocation(): Promise<void> {
    const ticket = await this.tickets.selectTicket();
    if (!ticket) return;

    const current = this.storage.getAllocation(ticket.id, this.state.selectedDate);
    await this.promptAllocationHours(ticket, current);
  }

  private async editAllocation(): Promise<void> {
    const allocation = await this.chooseAllocation('Edit allocation');
    if (!allocation) return;

    const ticket = this.storage.getTicket(allocation.ticketId);
    if (!ticket) {
      this.notify(`Ticket ${allocation.ticketId} not found`, 'error');
      return;
    }
    await this.promptAllocationHours(ticket, allocation);
  }

  private async deleteAllocation(): Promise<void> {
    const allocation = await this.chooseAllocation('Delete allocation');
    if (!allocation) return;

    if (!(await this.prompter.confirm(`Delete ${allocation.hours.toFixed(2)}h allocated to ${allocation.ticketId}?`))) {
      return;
    }
    this.storage.deleteAllocation(allocation.ticketId, allocation.date);
    this.notify(`Removed allocation for ${allocation.ticketId}`);
  }

  private async toggleEnteredOnClient(): Promise<void> {
    const allocation = await this.chooseAllocation('Toggle entered on client');
    if (!allocation) return;

    const entered = !allocation.enteredOnClient;
    this.storage.setEnteredOnClient(allocation.ticketId, allocation.date, entered);
    this.notify(`${allocation.ticketId} ${entered ? 'marked' : 'unmarked'} as entered on client`);
  }

  // ════════════════════════════════════════════════════════════════════
  // SETTINGS
  // ════════════════════════════════════════════════════════════════════

  private async editConfig(): Promise<void> {
    const config = this.storage.getConfig();

    const hourlyRate = await this.prompter.input('Hourly rate:', { default: String(config.hourlyRate) });
    const currency = await this.prompter.input('Currency:', { default: config.currency });
    const standardDayHours = await this.prompter.input('Standard day (hours):', { default: String(config.standardDayHours) });
    const vatRate = await this.prompter.input('VAT rate:', { default: String(config.vatRate) });

    const result = validateConfigForm({ hourlyRate, currency, standardDayHours, vatRate });
    if (!result.success) {
      this.notify(result.error, 'error');
      return;
    }

    this.storage.saveConfig(result.value);
    this.notify('Settings saved');
  }
}
