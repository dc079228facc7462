import { addDays, formatDottedDate, isoWeekNumber, isoWeekStart, isoWeeksInYear, weekdayName } from '../parser/dates';
import { LineEnding, Tag } from '../parser/markers';
import { groupByBirthday } from '../roster/rosterParser';
import type { Person } from '../types/person';

export class TemplateOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateOptionsError';
  }
}

export interface TemplateOptions {
  year: number;
  /** First ISO week to generate. */
  week: number;
  /** Number of weeks to generate. */
  weeks: number;
  lineEnding: LineEnding;
  /** Adds a "Congratulate" todo on each of these people's birthdays. */
  birthdays?: Person[];
  /** People who may get a random "Call" todo. */
  callCandidates?: Person[];
  callProbability: number;
  /** Adds an empty "- TODO: " to days that would otherwise have no items. */
  placeholderTodo: boolean;
  random?: () => number;
}

function validate(options: TemplateOptions): void {
  if (!Number.isInteger(options.year) || options.year < 1000 || options.year > 9999) {
    throw new TemplateOptionsError(`Year must be a four digit number, got ${options.year}`);
  }
  const weeksInYear = isoWeeksInYear(options.year);
  if (!Number.isInteger(options.week) || options.week < 1 || options.week > weeksInYear) {
    throw new TemplateOptionsError(`Week must be within [1,${weeksInYear}] for ${options.year}, got ${options.week}`);
  }
  if (!Number.isInteger(options.weeks) || options.weeks < 1) {
    throw new TemplateOptionsError(`The number of weeks must be at least 1, got ${options.weeks}`);
  }
  if (options.callProbability < 0 || options.callProbability > 1) {
    throw new TemplateOptionsError(`Call probability must be within [0,1], got ${options.callProbability}`);
  }
}

function congratulation(person: Person, year: number): string {
  if (person.birthday.kind === 'unknownYear') {
    return `${Tag.ITEM}${Tag.TODO}: Congratulate ${person.name}`;
  }
  const age = year - Number(person.birthday.date.slice(0, 4));
  return `${Tag.ITEM}${Tag.TODO}: Congratulate ${person.name} (Age ${age})`;
}

/**
 * Produces blank week and day headings for a run of ISO weeks, in the layout the log parser reads:
 *
 * ```
 * # Week 42, 14.10.2019 - 20.10.2019
 *
 * ## Mon, 14.10.2019
 *
 * ## Tue, 15.10.2019
 * ```
 */
export function generateTemplate(options: TemplateOptions): string {
  validate(options);

  const random = options.random ?? Math.random;
  const birthdays = groupByBirthday(options.birthdays ?? []);
  const callCandidates = options.callCandidates ?? [];

  const firstDay = isoWeekStart(options.year, options.week);
  const lines: string[] = [];

  for (let offset = 0; offset < options.weeks * 7; offset++) {
    const day = addDays(firstDay, offset);

    // a heading every time a week begins
    if (offset % 7 === 0) {
      lines.push(`${Tag.WEEK}${isoWeekNumber(day)}, ${formatDottedDate(day)} - ${formatDottedDate(addDays(day, 6))}`, '');
    }

    lines.push(`${Tag.DAY}${weekdayName(day)}, ${formatDottedDate(day)}`);
    const items: string[] = [];

    const monthDay = `${String(day.getUTCMonth() + 1).padStart(2, '0')}-${String(day.getUTCDate()).padStart(2, '0')}`;
    for (const person of birthdays.get(monthDay) ?? []) {
      items.push(congratulation(person, day.getUTCFullYear()));
    }

    if (callCandidates.length > 0 && random() < options.callProbability) {
      const person = callCandidates[Math.min(Math.floor(random() * callCandidates.length), callCandidates.length - 1)];
      items.push(`${Tag.ITEM}${Tag.TODO}: Call ${person.name}`);
    }

    if (options.placeholderTodo && items.length === 0) {
      items.push(`${Tag.ITEM}${Tag.TODO}: `);
    }

    lines.push(...items, '');
  }

  return lines.join(options.lineEnding) + options.lineEnding;
}

