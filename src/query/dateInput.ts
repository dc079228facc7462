import * as chrono from 'chrono-node';
import { isValidCalendarDate, toIsoDate } from '../parser/dates';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DOTTED_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

/**
 * Turns a date given on the command line into YYYY-MM-DD.
 * Accepts YYYY-MM-DD, DD.MM.YYYY (the log's own format) and natural language
 * such as "last monday" or "2 weeks ago", interpreted relative to `referenceDate`.
 * @returns The date, or null when the text does not describe one.
 */
export function parseDateInput(text: string, referenceDate?: Date): string | null {
  const trimmed = text.trim();

  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    const [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
    return isValidCalendarDate(year, month, day) ? toIsoDate(year, month, day) : null;
  }

  const dotted = DOTTED_DATE.exec(trimmed);
  if (dotted) {
    const [day, month, year] = [Number(dotted[1]), Number(dotted[2]), Number(dotted[3])];
    return isValidCalendarDate(year, month, day) ? toIsoDate(year, month, day) : null;
  }

  const results = chrono.parse(trimmed, referenceDate);
  if (results.length === 0) {
    return null;
  }
  // chrono-node sorts results by likelihood; take the most probable one.
  const date = results[0].start.date();
  return toIsoDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
}
