import { isCalendarDate } from './calendar-date';

describe('Calendar date helpers', () => {
  describe('isCalendarDate', () => {
    it('should accept zero padded ISO dates', () => {
      expect(isCalendarDate('2024-01-01')).toBe(true);
      expect(isCalendarDate('1999-12-31')).toBe(true);
    });

    it('should respect leap years', () => {
      expect(isCalendarDate('2024-02-29')).toBe(true);
      expect(isCalendarDate('2000-02-29')).toBe(true);
      expect(isCalendarDate('2023-02-29')).toBe(false);
      expect(isCalendarDate('1900-02-29')).toBe(false);
    });

    it('should reject days and months out of range', () => {
      expect(isCalendarDate('2024-04-31')).toBe(false);
      expect(isCalendarDate('2024-13-01')).toBe(false);
      expect(isCalendarDate('2024-00-10')).toBe(false);
      expect(isCalendarDate('2024-01-00')).toBe(false);
    });

    it('should reject other formats', () => {
      expect(isCalendarDate('2024-1-5')).toBe(false);
      expect(isCalendarDate('2024-01-01T00:00:00Z')).toBe(false);
      expect(isCalendarDate('01.01.2024')).toBe(false);
      expect(isCalendarDate('')).toBe(false);
    });

    it('should reject non-string values', () => {
      expect(isCalendarDate(20240101)).toBe(false);
      expect(isCalendarDate(null)).toBe(false);
      expect(isCalendarDate(undefined)).toBe(false);
      expect(isCalendarDate(new Date('2024-01-01'))).toBe(false);
    });
  });
});
