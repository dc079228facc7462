import chalk from 'chalk';
import type { LogEvent } from '../types/event';
import type { Task } from '../types/task';

const INDENT = '    ';

function checkbox(isDone: boolean): string {
  return isDone ? chalk.green('[x]') : chalk.yellow('[ ]');
}

/**
 * One line per task, followed by its subtasks and notes:
 *
 * ```
 * 2019-10-15 [ ] d
 *     [x] d1
 *     - a note
 * ```
 */
export function formatTasks(tasks: Task[]): string {
  const lines: string[] = [];
  for (const task of tasks) {
    lines.push(`${chalk.dim(task.date)} ${checkbox(task.isDone)} ${task.msg}`);
    for (const subtask of task.subtasks) {
      lines.push(`${INDENT}${checkbox(subtask.isDone)} ${subtask.msg}`);
    }
    for (const note of task.notes) {
      lines.push(`${INDENT}- ${note}`);
    }
  }
  return lines.join('\n');
}

export function formatEvents(events: LogEvent[]): string {
  const lines: string[] = [];
  for (const event of events) {
    // HH:MM is enough on screen, seconds are always zero
    const when = event.time ? `${chalk.dim(event.date)} ${chalk.cyan(event.time.slice(0, 5))}` : chalk.dim(event.date);
    lines.push(`${when} ${event.msg}`);
    for (const note of event.notes) {
      lines.push(`${INDENT}- ${note}`);
    }
  }
  return lines.join('\n');
}
