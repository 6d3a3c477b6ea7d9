// src/tests/commands.test.ts
import {
  availableCommands,
  Command,
  CommandContext,
  commandLabel,
  isCommandAvailable,
} from '../app/commands';

function context(overrides: Partial<CommandContext> = {}): CommandContext {
  return { viewMode: 'week', hasClipboard: false, allocationCount: 0, ...overrides };
}

function labels(ctx: CommandContext): string[] {
  return availableCommands(ctx).map(c => commandLabel(c, ctx.viewMode));
}

describe('commands', () => {
  describe('isCommandAvailable', () => {
    it('should only offer paste once something is on the clipboard', () => {
      const paste: Command = { kind: 'clipboard', action: 'paste' };
      expect(isCommandAvailable(paste, context())).toBe(false);
      expect(isCommandAvailable(paste, context({ hasClipboard: true }))).toBe(true);
      expect(isCommandAvailable(paste, context({ viewMode: 'month', hasClipboard: true }))).toBe(false);
    });

    it('should limit quick adjustments and cursor moves to the week view', () => {
      const leave: Command = { kind: 'quickAdjust', adjustType: 'L' };
      expect(isCommandAvailable(leave, context())).toBe(true);
      expect(isCommandAvailable(leave, context({ viewMode: 'day' }))).toBe(false);
      expect(isCommandAvailable({ kind: 'moveCursor', delta: 1 }, context({ viewMode: 'year' }))).toBe(false);
    });

    it('should need a selected allocation to edit or delete one', () => {
      const edit: Command = { kind: 'editAllocation' };
      expect(isCommandAvailable(edit, context({ viewMode: 'day' }))).toBe(false);
      expect(isCommandAvailable(edit, context({ viewMode: 'day', allocationCount: 2 }))).toBe(true);
      expect(isCommandAvailable(edit, context({ allocationCount: 2 }))).toBe(false);
      expect(isCommandAvailable({ kind: 'addAllocation' }, context({ viewMode: 'day' }))).toBe(true);
    });

    it('should not offer switching to the current view', () => {
      expect(isCommandAvailable({ kind: 'switchView', view: 'week' }, context())).toBe(false);
      expect(isCommandAvailable({ kind: 'switchView', view: 'year' }, context())).toBe(true);
    });

    it('should offer holidays in week and month views only', () => {
      const populate: Command = { kind: 'populateHolidays' };
      expect(isCommandAvailable(populate, context({ viewMode: 'month' }))).toBe(true);
      expect(isCommandAvailable(populate, context({ viewMode: 'allocations' }))).toBe(false);
    });
  });

  describe('availableCommands', () => {
    it('should list the week view menu in order', () => {
      expect(labels(context())).toEqual([
        '▲ Previous day',
        '▼ Next day',
        '◄ Previous week',
        'Next week ►',
        'Open selected day',
        'Edit day',
        'Quick leave day (L)',
        'Quick sick day (S)',
        'Quick training day (T)',
        'Copy day',
        'Cut day',
        'Go to month...',
        'Populate public holidays',
        'Go to today',
        'Month view',
        'Year view',
        'Day view',
        'Allocations view',
        'Toggle money',
        'Manage tickets',
        'Settings',
        'Quit',
      ]);
    });

    it('should name the navigation unit for each view', () => {
      expect(commandLabel({ kind: 'navigate', step: 'prev' }, 'allocations')).toBe('◄ Previous month');
      expect(commandLabel({ kind: 'navigate', step: 'next' }, 'year')).toBe('Next year ►');
      expect(commandLabel({ kind: 'selectDay' }, 'day')).toBe('Go to date...');
    });

    it('should offer allocation commands in the day view', () => {
      const dayLabels = labels(context({ viewMode: 'day', allocationCount: 1, hasClipboard: true }));
      expect(dayLabels).toEqual(expect.arrayContaining([
        'Add allocation',
        'Edit allocation',
        'Delete allocation',
        'Toggle entered on client',
        'Paste day',
      ]));
      expect(dayLabels).not.toContain('Go to month...');
      expect(dayLabels).not.toContain('Quick leave day (L)');
    });
  });
});
