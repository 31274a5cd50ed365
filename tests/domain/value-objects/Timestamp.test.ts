import { Timestamp } from '../../../src/domain/value-objects/Timestamp';
import { InvalidArgumentError } from '../../../src/domain/errors/EntityStoreError';

describe('Timestamp', () => {
  describe('now', () => {
    it('should return the current time', () => {
      const before = Date.now();
      const now = Timestamp.now();
      const after = Date.now();

      expect(now.getTime()).toBeGreaterThanOrEqual(before);
      expect(now.getTime()).toBeLessThanOrEqual(after);
    });

    it('should move past a reference that is not behind the clock', () => {
      const future = new Date(Date.now() + 60000);

      expect(Timestamp.now(future).getTime()).toBe(future.getTime() + 1);
    });

    it('should use the clock when the reference is in the past', () => {
      const past = new Date(Date.now() - 60000);

      expect(Timestamp.now(past).getTime()).toBeGreaterThan(past.getTime() + 1);
    });
  });

  describe('parse', () => {
    it('should parse an ISO-8601 string in UTC', () => {
      expect(Timestamp.parse('2026-01-02T03:04:05.006Z', 'created_at').getTime()).toBe(
        Date.UTC(2026, 0, 2, 3, 4, 5, 6)
      );
    });

    it('should parse an ISO-8601 string with an offset', () => {
      expect(Timestamp.parse('2026-01-02T05:04:05.006+02:00', 'created_at').getTime()).toBe(
        Date.UTC(2026, 0, 2, 3, 4, 5, 6)
      );
    });

    it('should read a value without a zone as UTC', () => {
      expect(Timestamp.parse('2017-09-28T21:03:54.052298', 'created_at').getTime()).toBe(
        Date.UTC(2017, 8, 28, 21, 3, 54, 52)
      );
    });

    it('should reject days that do not exist', () => {
      expect(() => Timestamp.parse('2026-02-30T00:00:00Z', 'created_at')).toThrow(
        'created_at is not a calendar date: 2026-02-30T00:00:00Z'
      );
      expect(() => Timestamp.parse('2026-13-01T00:00:00', 'created_at')).toThrow(InvalidArgumentError);
    });

    it('should accept a leap day', () => {
      expect(Timestamp.parse('2028-02-29T12:00:00Z', 'created_at').getTime()).toBe(Date.UTC(2028, 1, 29, 12));
    });

    it('should reject values that are not strings', () => {
      expect(() => Timestamp.parse(42, 'created_at')).toThrow(InvalidArgumentError);
    });

    it('should reject strings that are not ISO-8601', () => {
      expect(() => Timestamp.parse('Jan 2 2026', 'updated_at')).toThrow(
        'updated_at must be an ISO-8601 string, got Jan 2 2026'
      );
    });

    it('should name the offending field', () => {
      let caught: unknown;
      try {
        Timestamp.parse('soon', 'updated_at');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidArgumentError);
      expect(caught).toMatchObject({ field: 'updated_at', code: 'INVALID_ARGUMENT' });
    });
  });

  describe('format', () => {
    it('should format as an ISO-8601 string', () => {
      expect(Timestamp.format(new Date(Date.UTC(2026, 0, 2, 3, 4, 5, 6)))).toBe('2026-01-02T03:04:05.006Z');
    });
  });
});
