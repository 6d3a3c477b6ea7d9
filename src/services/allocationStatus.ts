// src/services/allocationStatus.ts

import { roundHours } from './hours';

export type AllocationStatus =
  | 'none'          // nothing worked, nothing to allocate
  | 'unallocated'   // worked but no allocations
  | 'under'
  | 'over'
  | 'exact';

export const STATUS_SYMBOLS: Record<AllocationStatus, string> = {
  none: '-',
  unallocated: '?',
  under: '↓',
  over: '↑',
  exact: '✓',
};

export const STATUS_LABELS: Record<AllocationStatus, string> = {
  none: 'No hours',
  unallocated: 'Unallocated',
  under: 'Under',
  over: 'Over',
  exact: 'Exact',
};

export function classifyAllocation(worked: number, allocated: number): AllocationStatus {
  const w = roundHours(worked);
  const a = roundHours(allocated);

  if (w === 0) return 'none';
  if (a === 0) return 'unallocated';
  if (a < w) return 'under';
  if (a > w) return 'over';
  return 'exact';
}
