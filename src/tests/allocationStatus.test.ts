// src/tests/allocationStatus.test.ts
import {
  allocationPercentage,
  classifyAllocation,
  STATUS_SYMBOLS,
} from '../services/allocationStatus';

describe('allocationStatus', () => {
  describe('classifyAllocation', () => {
    it('should classify against 7.5 worked hours', () => {
      expect(classifyAllocation(7.5, 7.5)).toBe('exact');
      expect(classifyAllocation(7.5, 5)).toBe('under');
      expect(classifyAllocation(7.5, 10)).toBe('over');
      expect(classifyAllocation(7.5, 0)).toBe('unallocated');
    });

    it('should be neutral when nothing was worked, whatever is allocated', () => {
      expect(classifyAllocation(0, 0)).toBe('none');
      expect(classifyAllocation(0, 3)).toBe('none');
    });

    it('should compare at two decimal places', () => {
      expect(classifyAllocation(7.33, 7.3300001)).toBe('exact');
    });

    it('should map statuses to symbols', () => {
      expect(STATUS_SYMBOLS[classifyAllocation(7.5, 7.5)]).toBe('✓');
      expect(STATUS_SYMBOLS[classifyAllocation(7.5, 5)]).toBe('↓');
      expect(STATUS_SYMBOLS[classifyAllocation(7.5, 10)]).toBe('↑');
      expect(STATUS_SYMBOLS[classifyAllocation(7.5, 0)]).toBe('?');
      expect(STATUS_SYMBOLS[classifyAllocation(0, 0)]).toBe('-');
    });
  });

  describe('allocationPercentage', () => {
    it('should give the allocated share of worked hours', () => {
      expect(allocationPercentage(7.5, 3.75)).toBe(50);
      expect(allocationPercentage(0, 3)).toBe(0);
    });
  });
});
