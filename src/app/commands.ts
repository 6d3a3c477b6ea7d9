// src/app/commands.ts
import { AdjustType } from '../types/models';
import { ViewMode } from './AppState';

export type NavigationStep = 'prev' | 'next';

export type QuickAdjustType = Exclude<AdjustType, 'P'>;

export type ClipboardAction = 'copy' | 'cut' | 'paste';

export type Command =
  | { kind: 'navigate'; step: NavigationStep }
  | { kind: 'moveCursor'; delta: number }
  | { kind: 'goToday' }
  | { kind: 'switchView'; view: ViewMode }
  | { kind: 'selectDay' }
  | { kind: 'selectMonth' }
  | { kind: 'editDay' }
  | { kind: 'quickAdjust'; adjustType: QuickAdjustType }
  | { kind: 'clipboard'; action: ClipboardAction }
  | { kind: 'populateHolidays' }
  | { kind: 'toggleMoney' }
  | { kind: 'addAllocation' }
  | { kind: 'editAllocation' }
  | { kind: 'deleteAllocation' }
  | { kind: 'toggleEnteredOnClient' }
  | { kind: 'manageTickets' }
  | { kind: 'editConfig' }
  | { kind: 'quit' };

export type CommandKind = Command['kind'];

export interface CommandContext {
  viewMode: ViewMode;
  hasClipboard: boolean;
  allocationCount: number;   // allocations on the selected day
}

/**
 * Whether a command applies in the current view state
 */
export function isCommandAvailable(command: Command, context: CommandContext): boolean {
  const { viewMode } = context;

  switch (command.kind) {
    case 'navigate':
    case 'goToday':
    case 'selectDay':
    case 'toggleMoney':
    case 'manageTickets':
    case 'editConfig':
    case 'quit':
      return true;
    case 'switchView':
      return command.view !== viewMode;
    case 'moveCursor':
    case 'quickAdjust':
      return viewMode === 'week';
    case 'editDay':
      return viewMode === 'week' || viewMode === 'day';
    case 'clipboard':
      if (viewMode !== 'week' && viewMode !== 'day') return false;
      return command.action !== 'paste' || context.hasClipboard;
    case 'selectMonth':
      return viewMode !== 'day';
    case 'populateHolidays':
      return viewMode === 'week' || viewMode === 'month';
    case 'addAllocation':
      return viewMode === 'day';
    case 'editAllocation':
    case 'deleteAllocation':
    case 'toggleEnteredOnClient':
      return viewMode === 'day' && context.allocationCount > 0;
  }
}

const VIEW_LABELS: Record<ViewMode, string> = {
  week: 'Week view',
  month: 'Month view',
  year: 'Year view',
  day: 'Day view',
  allocations: 'Allocations view',
};

const NAVIGATION_UNITS: Record<ViewMode, string> = {
  week: 'week',
  month: 'month',
  year: 'year',
  day: 'day',
  allocations: 'month',
};

const QUICK_ADJUST_LABELS: Record<QuickAdjustType, string> = {
  L: 'Leave',
  S: 'Sick',
  T: 'Training',
};

export function commandLabel(command: Command, viewMode: ViewMode): string {
  switch (command.kind) {
    case 'navigate':
      return command.step === 'prev'
        ? `◄ Previous ${NAVIGATION_UNITS[viewMode]}`
        : `Next ${NAVIGATION_UNITS[viewMode]} ►`;
    case 'moveCursor':
      return command.delta < 0 ? '▲ Previous day' : '▼ Next day';
    case 'goToday':
      return 'Go to today';
    case 'switchView':
      return VIEW_LABELS[command.view];
    case 'selectDay':
      return viewMode === 'week' ? 'Open selected day' : 'Go to date...';
    case 'selectMonth':
      return 'Go to month...';
    case 'editDay':
      return 'Edit day';
    case 'quickAdjust':
      return `Quick ${QUICK_ADJUST_LABELS[command.adjustType].toLowerCase()} day (${command.adjustType})`;
    case 'clipboard':
      return { copy: 'Copy day', cut: 'Cut day', paste: 'Paste day' }[command.action];
    case 'populateHolidays':
      return 'Populate public holidays';
    case 'toggleMoney':
      return 'Toggle money';
    case 'addAllocation':
      return 'Add allocation';
    case 'editAllocation':
      return 'Edit allocation';
    case 'deleteAllocation':
      return 'Delete allocation';
    case 'toggleEnteredOnClient':
      return 'Toggle entered on client';
    case 'manageTickets':
      return 'Manage tickets';
    case 'editConfig':
      return 'Settings';
    case 'quit':
      return 'Quit';
  }
}

export function quickAdjustLabel(adjustType: QuickAdjustType): string {
  return QUICK_ADJUST_LABELS[adjustType];
}

/**
 * Every command in menu order
 */
export const ALL_COMMANDS: readonly Command[] = [
  { kind: 'moveCursor', delta: -1 },
  { kind: 'moveCursor', delta: 1 },
  { kind: 'navigate', step: 'prev' },
  { kind: 'navigate', step: 'next' },
  { kind: 'selectDay' },
  { kind: 'editDay' },
  { kind: 'quickAdjust', adjustType: 'L' },
  { kind: 'quickAdjust', adjustType: 'S' },
  { kind: 'quickAdjust', adjustType: 'T' },
  { kind: 'clipboard', action: 'copy' },
  { kind: 'clipboard', action: 'cut' },
  { kind: 'clipboard', action: 'paste' },
  { kind: 'addAllocation' },
  { kind: 'editAllocation' },
  { kind: 'deleteAllocation' },
  { kind: 'toggleEnteredOnClient' },
  { kind: 'selectMonth' },
  { kind: 'populateHolidays' },
  { kind: 'goToday' },
  { kind: 'switchView', view: 'week' },
  { kind: 'switchView', view: 'month' },
  { kind: 'switchView', view: 'year' },
  { kind: 'switchView', view: 'day' },
  { kind: 'switchView', view: 'allocations' },
  { kind: 'toggleMoney' },
  { kind: 'manageTickets' },
  { kind: 'editConfig' },
  { kind: 'quit' },
];

export function availableCommands(context: CommandContext): Command[] {
  return ALL_COMMANDS.filter(c => isCommandAvailable(c, context));
}
