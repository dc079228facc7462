import type { Task } from '../types/task';

export interface DateRange {
  from?: string | null; // YYYY-MM-DD, inclusive
  to?: string | null; // YYYY-MM-DD, inclusive
}

/** Keeps the records dated within the range. ISO dates compare correctly as strings. */
export function filterByDateRange<T extends { date: string }>(records: T[], range: DateRange): T[] {
  return records.filter((record) => {
    if (range.from && record.date < range.from) return false;
    if (range.to && record.date > range.to) return false;
    return true;
  });
}

export function openTasks(tasks: Task[]): Task[] {
  return tasks.filter((task) => !task.isDone);
}
