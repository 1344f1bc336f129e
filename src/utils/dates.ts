import * as chrono from 'chrono-node';
import dayjs from 'dayjs';
import { TrackerError } from './errors.js';

export const DATE_FORMAT = 'YYYY-MM-DD';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function toDateKey(date: Date): string {
  return dayjs(date).format(DATE_FORMAT);
}

export function isCalendarDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = dayjs(value);
  // dayjs rolls 2025-02-30 over into March, so compare the round trip
  return parsed.isValid() && parsed.format(DATE_FORMAT) === value;
}

/**
 * Turn user input into a due date. Accepts YYYY-MM-DD or phrases such as
 * "next friday", resolved forward from the reference date. Blank input and
 * "TBD" mean no due date.
 */
export function parseDueDate(input: string, reference: Date = new Date()): string | null {
  const text = input.trim();
  if (text === '' || text.toUpperCase() === 'TBD') {
    return null;
  }

  if (ISO_DATE.test(text)) {
    if (!isCalendarDate(text)) {
      throw new TrackerError(`Not a valid calendar date: ${text}`, 'VALIDATION');
    }
    return text;
  }

  const parsed = chrono.parseDate(text, reference, { forwardDate: true });
  if (!parsed) {
    throw new TrackerError(`Could not understand due date "${text}"`, 'VALIDATION');
  }
  return toDateKey(parsed);
}

/**
 * Whole days from the reference date to a YYYY-MM-DD date; negative when overdue.
 */
export function daysUntil(date: string, reference: Date): number {
  return dayjs(date).diff(dayjs(reference).startOf('day'), 'day');
}

export function formatMinutes(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  if (hours === 0) return `${rest}m`;
  return `${hours}h ${String(rest).padStart(2, '0')}m`;
}
