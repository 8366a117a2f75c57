import { ValidationError, parseDate, parseIntOption, parseOutcome, parseStatus, validateRunKey } from '../../../src/cli/validators';

describe('CLI validators', () => {
  describe('parseIntOption', () => {
    it('returns undefined when the option is absent', () => {
      expect(parseIntOption('max-iterations', undefined)).toBeUndefined();
    });

    it('parses integers at or above the minimum', () => {
      expect(parseIntOption('max-iterations', ' 12 ')).toBe(12);
      expect(parseIntOption('max-retries', '0', 0)).toBe(0);
    });

    it('rejects non-integers', () => {
      expect(() => parseIntOption('max-iterations', '1.5')).toThrow(new ValidationError('--max-iterations must be an integer, got "1.5"'));
      expect(() => parseIntOption('max-iterations', 'ten')).toThrow(ValidationError);
    });

    it('rejects values below the minimum', () => {
      expect(() => parseIntOption('max-iterations', '0')).toThrow('--max-iterations must be >= 1');
      expect(() => parseIntOption('max-retries', '-1', 0)).toThrow('--max-retries must be >= 0');
    });
  });

  describe('validateRunKey', () => {
    it('accepts safe keys', () => {
      expect(validateRunKey(' nightly-report_2026.01 ')).toBe('nightly-report_2026.01');
    });

    it.each(['', '../escape', '.hidden', 'with space', 'a/b'])('rejects %p', (key) => {
      expect(() => validateRunKey(key)).toThrow(ValidationError);
    });
  });

  describe('parseOutcome / parseStatus', () => {
    it('accepts known values', () => {
      expect(parseOutcome('retries_exhausted')).toBe('retries_exhausted');
      expect(parseStatus('failed')).toBe('failed');
      expect(parseOutcome(undefined)).toBeUndefined();
    });

    it('lists the valid values when rejecting', () => {
      expect(() => parseOutcome('done')).toThrow('Invalid outcome: "done". Expected one of: completed, partial, retries_exhausted, truncated');
      expect(() => parseStatus('paused')).toThrow('Invalid status: "paused". Expected one of: running, completed, failed');
    });
  });

  describe('parseDate', () => {
    it('parses ISO dates', () => {
      expect(parseDate('from', '2026-01-02')?.toISOString()).toBe('2026-01-02T00:00:00.000Z');
      expect(parseDate('from', undefined)).toBeUndefined();
    });

    it('rejects unparseable dates', () => {
      expect(() => parseDate('to', 'yesterday')).toThrow('--to must be a date, got "yesterday"');
    });
  });
});
