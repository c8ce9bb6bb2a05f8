import { DAY_MS, formatDuration, parseDuration } from '../Duration';

describe('Duration', () => {
  describe('parseDuration', () => {
    it('should read numbers as seconds', () => {
      expect(parseDuration(3600)).toBe(3600000);
      expect(parseDuration(0)).toBe(0);
      expect(parseDuration('45')).toBe(45000);
    });

    it('should accept unit suffixes', () => {
      expect(parseDuration('90s')).toBe(90000);
      expect(parseDuration('30m')).toBe(1800000);
      expect(parseDuration('12h')).toBe(43200000);
      expect(parseDuration('14d')).toBe(14 * DAY_MS);
      expect(parseDuration('2w')).toBe(14 * DAY_MS);
      expect(parseDuration('1.5h')).toBe(5400000);
      expect(parseDuration(' 14 D ')).toBe(14 * DAY_MS);
    });

    it('should reject malformed durations', () => {
      expect(parseDuration(-1)).toBeUndefined();
      expect(parseDuration(Number.NaN)).toBeUndefined();
      expect(parseDuration('-1d')).toBeUndefined();
      expect(parseDuration('abc')).toBeUndefined();
      expect(parseDuration('10y')).toBeUndefined();
      expect(parseDuration('')).toBeUndefined();
    });
  });

  describe('formatDuration', () => {
    it('should use the largest whole unit', () => {
      expect(formatDuration(14 * DAY_MS)).toBe('2w');
      expect(formatDuration(3 * DAY_MS)).toBe('3d');
      expect(formatDuration(43200000)).toBe('12h');
      expect(formatDuration(1800000)).toBe('30m');
      expect(formatDuration(90000)).toBe('90s');
    });

    it('should fall back to milliseconds', () => {
      expect(formatDuration(0)).toBe('0ms');
      expect(formatDuration(1500)).toBe('1500ms');
    });
  });
});
