import fs from 'fs/promises';
import { parseArgs } from 'util';
import type { AppConfig } from './configLoader';
import { generateTemplate } from './generator/templateGenerator';
import { log, LogLevel } from './logger';
import { LogParser } from './parser/LogParser';
import { LINE_END_CRLF, LINE_END_LF, lineEndingFromSetting } from './parser/markers';
import { parseDateInput } from './query/dateInput';
import { DateRange, filterByDateRange, openTasks } from './query/recordFilters';
import { formatEvents, formatTasks } from './report/formatRecords';
import { loadRosterFile } from './roster/rosterParser';
import type { Person } from './types/person';

export const USAGE = `Usage:
  mdlog generate <week> [weeks] [--year <year>] [--birthday-file <file>] [-b|--generate-birthdays] [-c|--generate-calls]
  mdlog tasks <log file> [--open] [--from <date>] [--to <date>] [--json]
  mdlog events <log file> [--from <date>] [--to <date>] [--json]`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliContext {
  config: AppConfig;
  /** Receives everything meant for stdout. */
  write: (text: string) => void;
  /** Reference point for relative --from/--to dates and the default year. */
  now?: Date;
  random?: () => number;
}

/** `util.parseArgs` rejects unknown or malformed options with a TypeError carrying an ERR_PARSE_ARGS_* code. */
function isParseArgsError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS_');
}

function parseIntArg(name: string, value: string | undefined, fallback?: number): number {
  if (value === undefined) {
    if (fallback === undefined) {
      throw new UsageError(`Missing <${name}>`);
    }
    return fallback;
  }
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`<${name}> must be a whole number, got '${value}'`);
  }
  return Number(value);
}

function parseDateOption(name: string, value: string | undefined, now: Date): string | null {
  if (value === undefined) {
    return null;
  }
  const date = parseDateInput(value, now);
  if (date === null) {
    throw new UsageError(`--${name}: '${value}' is not a date`);
  }
  return date;
}

async function runGenerate(args: string[], ctx: CliContext): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      year: { type: 'string' },
      'birthday-file': { type: 'string' },
      'generate-birthdays': { type: 'boolean', short: 'b', default: false },
      'generate-calls': { type: 'boolean', short: 'c', default: false },
    },
  });

  const week = parseIntArg('week', positionals[0]);
  const weeks = parseIntArg('weeks', positionals[1], 1);
  const now = ctx.now ?? new Date();

  let year: number;
  if (values.year === undefined) {
    year = now.getFullYear();
    log(LogLevel.INFO, `No year provided, defaulting to ${year}`);
  } else {
    year = parseIntArg('year', values.year);
  }

  let people: Person[] = [];
  const includeBirthdays = values['generate-birthdays'] === true;
  const includeCalls = values['generate-calls'] === true;
  if (includeBirthdays || includeCalls) {
    const birthdayFile = values['birthday-file'] ?? ctx.config.generator.birthdayFile;
    people = await loadRosterFile(birthdayFile);
    log(LogLevel.DEBUG, `Loaded ${people.length} people from ${birthdayFile}`);
  }

  log(LogLevel.INFO, `Generating templates for ${weeks} weeks starting with week ${week} of year ${year}`);

  ctx.write(
    generateTemplate({
      year,
      week,
      weeks,
      lineEnding: ctx.config.parser.lineEnding === 'crlf' ? LINE_END_CRLF : LINE_END_LF,
      birthdays: includeBirthdays ? people : [],
      callCandidates: includeCalls ? people : [],
      callProbability: ctx.config.generator.callProbability,
      placeholderTodo: ctx.config.generator.placeholderTodo,
      random: ctx.random,
    }),
  );
  log(LogLevel.INFO, 'Done');
}

const rangeOptions = {
  from: { type: 'string' },
  to: { type: 'string' },
  json: { type: 'boolean', default: false },
} as const;

function dateRange(values: { from?: string; to?: string }, ctx: CliContext): DateRange {
  const now = ctx.now ?? new Date();
  return {
    from: parseDateOption('from', values.from, now),
    to: parseDateOption('to', values.to, now),
  };
}

async function loadLog(file: string | undefined, ctx: CliContext): Promise<{ parser: LogParser; logData: string }> {
  if (file === undefined) {
    throw new UsageError('Missing <log file>');
  }
  const logData = await fs.readFile(file, 'utf-8');
  const lineEnding = lineEndingFromSetting(ctx.config.parser.lineEnding, logData);
  log(LogLevel.DEBUG, `Parsing ${file} with ${lineEnding === LINE_END_CRLF ? 'CRLF' : 'LF'} line endings`);
  return {
    parser: LogParser.fromLineEnding(lineEnding, { invalidDates: ctx.config.parser.invalidDates }),
    logData,
  };
}

async function runTasks(args: string[], ctx: CliContext): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: { ...rangeOptions, open: { type: 'boolean', default: false } },
  });
  const range = dateRange(values, ctx);
  const { parser, logData } = await loadLog(positionals[0], ctx);

  let tasks = filterByDateRange(parser.parseTasks(logData), range);
  if (values.open) {
    tasks = openTasks(tasks);
  }
  ctx.write((values.json ? JSON.stringify(tasks, null, 2) : formatTasks(tasks)) + '\n');
}

async function runEvents(args: string[], ctx: CliContext): Promise<void> {
  const { values, positionals } = parseArgs({ args, allowPositionals: true, options: rangeOptions });
  const range = dateRange(values, ctx);
  const { parser, logData } = await loadLog(positionals[0], ctx);

  const events = filterByDateRange(parser.parseEvents(logData), range);
  ctx.write((values.json ? JSON.stringify(events, null, 2) : formatEvents(events)) + '\n');
}

/**
 * Runs one mdlog command.
 * @returns The process exit code.
 */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const [command, ...args] = argv;
  try {
    switch (command) {
      case 'generate':
        await runGenerate(args, ctx);
        break;
      case 'tasks':
        await runTasks(args, ctx);
        break;
      case 'events':
        await runEvents(args, ctx);
        break;
      case 'help':
      case '--help':
      case '-h':
        ctx.write(USAGE + '\n');
        break;
      default:
        throw new UsageError(command === undefined ? 'Missing command' : `Unknown command '${command}'`);
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    log(LogLevel.ERROR, message);
    if (error instanceof UsageError || isParseArgsError(error)) {
      log(LogLevel.ERROR, USAGE);
    }
    return 1;
  }
}
