import { ValidationError } from './errors.js';

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})/;
const MS_PER_DAY = 86_400_000;

function parseDayNumber(date: string): number | null {
  const match = ISO_DATE_RE.exec(date);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const time = Date.UTC(Number(year), Number(month) - 1, Number(day));
  // Date.UTC rolls 2024-02-30 over to March; reject anything that moved
  if (new Date(time).toISOString().slice(0, 10) !== match[0]) {
    return null;
  }
  return Math.floor(time / MS_PER_DAY);
}

/**
 * True when the string starts with a real YYYY-MM-DD calendar date
 */
export function isCalendarDate(date: string): boolean {
  return parseDayNumber(date) !== null;
}

/**
 * Parses the calendar date at the start of an ISO 8601 string into a UTC day number
 */
export function toDayNumber(date: string): number {
  const dayNumber = parseDayNumber(date);
  if (dayNumber === null) {
    throw new ValidationError(`Invalid calendar date: ${date}`);
  }
  return dayNumber;
}

/**
 * Absolute distance in whole calendar days between two ISO dates
 */
export function daysBetween(a: string, b: string): number {
  return Math.abs(toDayNumber(a) - toDayNumber(b));
}

/**
 * Normalises a date or timestamp to YYYY-MM-DD
 */
export function toCalendarDate(date: string): string {
  const match = ISO_DATE_RE.exec(date);
  if (!match || !isCalendarDate(date)) {
    throw new ValidationError(`Invalid calendar date: ${date}`);
  }
  return match[0];
}

export function compareDates(a: string, b: string): number {
  return toDayNumber(a) - toDayNumber(b);
}
