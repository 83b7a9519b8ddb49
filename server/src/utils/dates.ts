/**
 * Calendar-day helpers. Rental dates are whole days stored as UTC midnight;
 * only `localDay` looks at a time zone, to find which day "now" is.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

function pad2(n: number) {
  return n < 10 ? `0${n}` : String(n);
}

export function toDate(d: Date | string | number): Date {
  return d instanceof Date ? d : new Date(d);
}

/** Day bucket (UTC): "YYYY-MM-DD" */
export function dayBucket(d: Date | string | number): string {
  const dt = toDate(d);
  const y = dt.getUTCFullYear();
  const m = pad2(dt.getUTCMonth() + 1);
  const day = pad2(dt.getUTCDate());
  return `${y}-${m}-${day}`;
}

/**
 * The calendar day `at` falls on in `timeZone` (the server's zone when omitted),
 * as UTC midnight so it compares with parsed days.
 */
export function localDay(at: Date, timeZone?: string): Date {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "numeric",
    day: "numeric",
  }).formatToParts(at);
  const part = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((p) => p.type === type)?.value);
  return new Date(Date.UTC(part("year"), part("month") - 1, part("day")));
}

export function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export function toUtcMidnight(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}

/** Parse "YYYY-MM-DD" into UTC midnight; null for anything else (including 2025-02-30). */
export function parseDay(value: string): Date | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!m) return null;
  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return dayBucket(d) === value ? d : null;
}

/** Whole calendar days from `start` to `end` (negative when end precedes start). */
export function daysBetween(start: Date, end: Date): number {
  return Math.round((toUtcMidnight(end).getTime() - toUtcMidnight(start).getTime()) / DAY_MS);
}

/** Full years between birth date and `at`. */
export function ageInYears(birthDate: Date, at: Date): number {
  let years = at.getUTCFullYear() - birthDate.getUTCFullYear();
  const beforeBirthday =
    at.getUTCMonth() < birthDate.getUTCMonth() ||
    (at.getUTCMonth() === birthDate.getUTCMonth() && at.getUTCDate() < birthDate.getUTCDate());
  if (beforeBirthday) years -= 1;
  return years;
}
