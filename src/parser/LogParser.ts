import { log, LogLevel } from '../logger';
import type { LogEvent } from '../types/event';
import type { Subtask, Task } from '../types/task';
import { parseHeadingDate, formatClockTime } from './dates';
import { DateResolutionError, StructuralError } from './errors';
import { buildMarkers, LineEnding, MarkerSet, Tag } from './markers';
import { findAll, lineAt, lineNumberAt, lookupDayLine, lookupEndOfUnit } from './scan';

export interface LogParserOptions {
  /**
   * 'fail' aborts the whole call on a record without a resolvable date,
   * 'skip' drops that record and logs a warning.
   */
  invalidDates: 'fail' | 'skip';
}

const DEFAULT_OPTIONS: LogParserOptions = { invalidDates: 'fail' };

const MESSAGE_SEPARATOR = ': ';

interface ChildLine {
  text: string;
  offset: number;
}

/** Child lines lose their indentation and a leading "- ". */
function stripItemPrefix(line: string): string {
  const trimmed = line.trimStart();
  return trimmed.startsWith(Tag.ITEM) ? trimmed.slice(Tag.ITEM.length) : trimmed;
}

/** Everything after the first ": ", or null when the line has none. */
function messageAfterSeparator(line: string): string | null {
  const pos = line.indexOf(MESSAGE_SEPARATOR);
  return pos === -1 ? null : line.slice(pos + MESSAGE_SEPARATOR.length).trim();
}

/**
 * Extracts tasks and events from a week/day/item log.
 *
 * ```
 * ## Mon, 14.10.2019
 * - EVT 16:25: dentist
 *   - bring the x-rays
 * - TODO: write report
 *     - DONE: outline
 * ```
 *
 * Every record belongs to the nearest day heading above it. A record's unit ends at the next
 * top-level item, empty line, day heading or week heading, so the text needs a trailing
 * empty line or heading after its last item.
 */
export class LogParser {
  private readonly markers: MarkerSet;
  private readonly options: LogParserOptions;

  constructor(markers: MarkerSet, options: Partial<LogParserOptions> = {}) {
    this.markers = markers;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  static fromLineEnding(lineEnd: LineEnding, options: Partial<LogParserOptions> = {}): LogParser {
    return new LogParser(buildMarkers(lineEnd), options);
  }

  parseEvents(logData: string): LogEvent[] {
    const events: LogEvent[] = [];

    for (const markerPos of findAll(logData, this.markers.event)) {
      // skip the line ending in front of the item
      const start = markerPos + this.markers.lineEnd.length;
      const line = lineAt(logData, start, this.markers.lineEnd);

      const date = this.resolveDate(logData, start);
      if (date === null) {
        continue;
      }

      const { msg, time } = this.parseEventLine(logData, start, line.text);
      const end = lookupEndOfUnit(logData, start, this.markers.unitEnds);
      const notes = this.childLines(logData, line.end, end).map((child) => stripItemPrefix(child.text));

      events.push({ msg, notes, date, time });
    }

    return events;
  }

  parseTasks(logData: string): Task[] {
    const tasks: Task[] = [];

    const starts = [
      ...findAll(logData, this.markers.taskTodo).map((pos) => ({ pos, isDone: false })),
      ...findAll(logData, this.markers.taskDone).map((pos) => ({ pos, isDone: true })),
    ].sort((a, b) => a.pos - b.pos);

    for (const { pos, isDone } of starts) {
      const start = pos + this.markers.lineEnd.length;
      const line = lineAt(logData, start, this.markers.lineEnd);

      // search backwards from the task to find the day
      const date = this.resolveDate(logData, start);
      if (date === null) {
        continue;
      }

      const msg = messageAfterSeparator(line.text);
      if (msg === null) {
        throw new StructuralError(`Task line '${line.text}' has no '${MESSAGE_SEPARATOR}' before its message`, start, lineNumberAt(logData, start));
      }

      // search forward from the task to find where it ends
      const end = lookupEndOfUnit(logData, start, this.markers.unitEnds);

      const subtasks: Subtask[] = [];
      const notes: string[] = [];
      for (const childLine of this.childLines(logData, line.end, end)) {
        const child = stripItemPrefix(childLine.text);
        const hasTodo = child.includes(Tag.TODO);
        const hasDone = child.includes(Tag.DONE);

        if (hasTodo && hasDone) {
          log(LogLevel.WARN, `Found ${Tag.TODO} and ${Tag.DONE} in '${child}' (line ${lineNumberAt(logData, childLine.offset)}). A task can either be done or todo; the line is ignored.`);
        } else if (hasTodo || hasDone) {
          const subtaskMsg = messageAfterSeparator(child);
          if (subtaskMsg === null) {
            throw new StructuralError(`Subtask line '${child}' has no '${MESSAGE_SEPARATOR}' before its message`, childLine.offset, lineNumberAt(logData, childLine.offset));
          }
          subtasks.push({ msg: subtaskMsg, isDone: hasDone });
        } else {
          notes.push(child);
        }
      }

      // an open subtask keeps the task open
      const allSubtasksDone = subtasks.every((st) => st.isDone);

      tasks.push({ msg, subtasks, notes, date, isDone: isDone && allSubtasksDone });
    }

    return tasks;
  }

  /** Non-empty lines between the end of an item's own line and the end of its unit. */
  private childLines(logData: string, ownLineEnd: number, unitEnd: number): ChildLine[] {
    const lines: ChildLine[] = [];
    let offset = ownLineEnd + this.markers.lineEnd.length;
    while (offset < unitEnd) {
      const found = logData.indexOf(this.markers.lineEnd, offset);
      const lineEnd = found === -1 || found > unitEnd ? unitEnd : found;
      const text = logData.slice(offset, lineEnd);
      if (stripItemPrefix(text) !== '') {
        lines.push({ text, offset });
      }
      offset = lineEnd + this.markers.lineEnd.length;
    }
    return lines;
  }

  /**
   * `- EVT: msg` has no time; `- EVT HH:MM: msg` carries one and the message follows the second colon.
   */
  private parseEventLine(logData: string, start: number, line: string): Pick<LogEvent, 'msg' | 'time'> {
    const afterTag = line.slice((Tag.ITEM + Tag.EVT).length);

    if (afterTag.startsWith(':')) {
      return { msg: afterTag.slice(1).trimStart(), time: null };
    }

    const fail = (reason: string): never => {
      throw new StructuralError(`Event line '${line}' ${reason}`, start, lineNumberAt(logData, start));
    };

    const [hourText = '', minuteText = ''] = afterTag.trimStart().split(':');
    if (!/^\d{1,2}$/.test(hourText) || !/^\d{1,2}$/.test(minuteText)) {
      return fail('does not start with a HH:MM time');
    }
    const time = formatClockTime(Number(hourText), Number(minuteText));
    if (time === null) {
      return fail(`has an out of range time ${hourText}:${minuteText}`);
    }

    const firstColon = line.indexOf(':');
    const secondColon = line.indexOf(':', firstColon + 1);
    if (secondColon === -1) {
      return fail('has no message after its time');
    }
    return { msg: line.slice(secondColon + 1).trim(), time };
  }

  /**
   * @returns The YYYY-MM-DD date of the day heading above `start`, or null when the record is to be skipped.
   */
  private resolveDate(logData: string, start: number): string | null {
    try {
      const dayLine = lookupDayLine(logData, start, this.markers.day, this.markers.lineEnd);
      const date = parseHeadingDate(dayLine);
      if (date === null) {
        throw new DateResolutionError(`Day heading '${dayLine}' does not hold a valid DD.MM.YYYY date`, start, lineNumberAt(logData, start));
      }
      return date;
    } catch (error) {
      if (error instanceof DateResolutionError && this.options.invalidDates === 'skip') {
        log(LogLevel.WARN, `Skipping item: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
