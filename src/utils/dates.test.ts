import { describe, it, expect } from 'vitest';
import { daysUntil, formatMinutes, isCalendarDate, parseDueDate } from './dates.js';
import { TrackerError } from './errors.js';

describe('parseDueDate', () => {
  const reference = new Date(2025, 0, 15, 12, 0, 0);

  it('keeps ISO calendar dates as they are', () => {
    expect(parseDueDate('2025-03-01', reference)).toBe('2025-03-01');
  });

  it('treats blank input and TBD as no due date', () => {
    expect(parseDueDate('   ', reference)).toBeNull();
    expect(parseDueDate('tbd', reference)).toBeNull();
  });

  it('rejects dates that do not exist', () => {
    expect(() => parseDueDate('2025-02-30', reference)).toThrow(TrackerError);
  });

  it('resolves natural language relative to the reference date', () => {
    expect(parseDueDate('tomorrow', reference)).toBe('2025-01-16');
  });

  it('rejects text that is not a date', () => {
    expect(() => parseDueDate('xyzzy', reference)).toThrow('Could not understand due date "xyzzy"');
  });
});

describe('isCalendarDate', () => {
  it('accepts real dates only', () => {
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('2025-02-29')).toBe(false);
    expect(isCalendarDate('2025-1-5')).toBe(false);
  });
});

describe('daysUntil', () => {
  const reference = new Date(2025, 0, 15, 18, 30);

  it('counts whole days from the start of the reference day', () => {
    expect(daysUntil('2025-01-20', reference)).toBe(5);
    expect(daysUntil('2025-01-15', reference)).toBe(0);
    expect(daysUntil('2025-01-14', reference)).toBe(-1);
  });
});

describe('formatMinutes', () => {
  it('formats minutes and hours', () => {
    expect(formatMinutes(45)).toBe('45m');
    expect(formatMinutes(65)).toBe('1h 05m');
    expect(formatMinutes(120)).toBe('2h 00m');
  });
});
