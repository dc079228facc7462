import fs from 'fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { isValidCalendarDate, toIsoDate } from '../parser/dates';
import type { Birthday, Person } from '../types/person';
import { birthdayDay, birthdayMonth } from '../types/person';

export class RosterFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RosterFormatError';
  }
}

const PRESENTS_HEADING = /^#+ Presents[ \t]*$/m;
const KNOWN_YEAR = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;
const UNKNOWN_YEAR = /^(\d{1,2})\.(\d{1,2})\.\?$/;

const birthdaysSchema = z.record(z.string({ invalid_type_error: 'birthday must be written as DD.MM.YYYY or DD.MM.?' }));
const presentsSchema = z.record(z.array(z.coerce.string()).nullable());

function loadSection<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, section: string): T {
  let raw: unknown;
  try {
    raw = yaml.load(text) ?? {};
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RosterFormatError(`The ${section} section is not valid YAML: ${reason}`);
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new RosterFormatError(`Invalid ${section} section: ${problems.join('; ')}`);
  }
  return result.data;
}

export function parseBirthday(name: string, value: string): Birthday {
  const trimmed = value.trim();

  const known = KNOWN_YEAR.exec(trimmed);
  if (known) {
    const [day, month, year] = [Number(known[1]), Number(known[2]), Number(known[3])];
    if (isValidCalendarDate(year, month, day)) {
      return { kind: 'knownYear', date: toIsoDate(year, month, day) };
    }
  }

  const unknown = UNKNOWN_YEAR.exec(trimmed);
  if (unknown) {
    const [day, month] = [Number(unknown[1]), Number(unknown[2])];
    // a leap year, so 29.02.? is accepted
    if (isValidCalendarDate(2000, month, day)) {
      return { kind: 'unknownYear', month, day };
    }
  }

  throw new RosterFormatError(`Failed to parse the birthday of ${name}: '${value}', please check the entry`);
}

/**
 * The birthday file holds people, their birthday (with or without year) and present ideas.
 * The first part maps a name to a birthday, the optional second part, after a "# Presents"
 * heading of any level, maps a name to a list of presents.
 *
 * ```
 * Alex: 19.01.2001
 * Bob Smith: 20.12.?
 *
 * ### Presents
 * Alex:
 * - Salad
 * ```
 */
export function parsePeople(text: string): Person[] {
  const presentsHeading = PRESENTS_HEADING.exec(text);
  const birthdaysText = presentsHeading ? text.slice(0, presentsHeading.index) : text;

  const birthdays = loadSection(birthdaysText, birthdaysSchema, 'birthday');
  const presents = new Map<string, string[] | null>(
    presentsHeading
      ? Object.entries(loadSection(text.slice(presentsHeading.index + presentsHeading[0].length), presentsSchema, 'presents'))
      : [],
  );

  return Object.entries(birthdays).map(([name, value]) => ({
    name,
    birthday: parseBirthday(name, value),
    presents: presents.get(name) ?? null,
  }));
}

/** Reads and parses a birthday file. */
export async function loadRosterFile(filePath: string): Promise<Person[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parsePeople(content);
}

/** People keyed by the MM-DD of their birthday. */
export function groupByBirthday(people: Person[]): Map<string, Person[]> {
  const byDay = new Map<string, Person[]>();
  for (const person of people) {
    const key = `${String(birthdayMonth(person.birthday)).padStart(2, '0')}-${String(birthdayDay(person.birthday)).padStart(2, '0')}`;
    const entries = byDay.get(key) ?? [];
    entries.push(person);
    byDay.set(key, entries);
  }
  return byDay;
}
