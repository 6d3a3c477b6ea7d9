// src/tests/cli.test.ts
import { databaseInfoLines, formatSize } from '../cli/timesheet';

describe('timesheet CLI', () => {
  describe('formatSize', () => {
    it('should pick a readable unit', () => {
      expect(formatSize(512)).toBe('512 B');
      expect(formatSize(2048)).toBe('2.0 KB');
      expect(formatSize(5 * 1024 * 1024)).toBe('5.0 MB');
    });
  });

  describe('databaseInfoLines', () => {
    it('should report a database that does not exist yet', () => {
      expect(databaseInfoLines({ path: '/tmp/timesheet.db', exists: false })).toEqual([
        '  Path:      /tmp/timesheet.db',
        '  Status:    not created yet',
      ]);
    });

    it('should report modification time and size', () => {
      const info = {
        path: '/tmp/timesheet.db',
        exists: true,
        modified: new Date(2026, 0, 27, 9, 30, 5),
        sizeBytes: 12288,
      };
      expect(databaseInfoLines(info)).toEqual([
        '  Path:      /tmp/timesheet.db',
        '  Modified:  2026-01-27 09:30:05',
        '  Size:      12.0 KB (12288 bytes)',
      ]);
    });
  });
});
