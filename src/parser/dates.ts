const MS_PER_DAY = 24 * 60 * 60 * 1000;
const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

export function toIsoDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Recovers the date of a day heading such as "## Mon, 14.10.2019".
 * Every character that is not a digit is dropped; what is left must read DDMMYYYY.
 * @returns The date as YYYY-MM-DD, or null when the digits do not form a valid date.
 */
export function parseHeadingDate(line: string): string | null {
  const digits = line.replace(/[^0-9]/g, '');
  if (digits.length !== 8) {
    return null;
  }
  const day = Number(digits.slice(0, 2));
  const month = Number(digits.slice(2, 4));
  const year = Number(digits.slice(4, 8));
  if (!isValidCalendarDate(year, month, day)) {
    return null;
  }
  return toIsoDate(year, month, day);
}

/**
 * @returns HH:MM:00, or null when hour or minute is out of range.
 */
export function formatClockTime(hour: number, minute: number): string | null {
  if (!Number.isInteger(hour) || !Number.isInteger(minute) || hour < 0 || hour > 23 || minute < 0 || minute > 59) {
    return null;
  }
  return `${pad(hour)}:${pad(minute)}:00`;
}

// Calendar arithmetic below works on UTC midnights so local DST shifts never move a day.

export function utcDate(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function isoDateOf(date: Date): string {
  return toIsoDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/** DD.MM.YYYY, the form day headings use. */
export function formatDottedDate(date: Date): string {
  return `${pad(date.getUTCDate())}.${pad(date.getUTCMonth() + 1)}.${pad(date.getUTCFullYear(), 4)}`;
}

export function weekdayName(date: Date): string {
  return WEEKDAYS[date.getUTCDay()];
}

/** Monday of ISO week `week` in `year`. Week 1 is the week holding January 4th. */
export function isoWeekStart(year: number, week: number): Date {
  const jan4 = utcDate(year, 1, 4);
  const isoWeekday = jan4.getUTCDay() || 7;
  return addDays(jan4, (week - 1) * 7 - (isoWeekday - 1));
}

export function isoWeekNumber(date: Date): number {
  const isoWeekday = date.getUTCDay() || 7;
  const thursday = addDays(date, 4 - isoWeekday);
  const yearStart = utcDate(thursday.getUTCFullYear(), 1, 1);
  return Math.ceil(((thursday.getTime() - yearStart.getTime()) / MS_PER_DAY + 1) / 7);
}

export function isoWeeksInYear(year: number): number {
  return isoWeekNumber(utcDate(year, 12, 28));
}
