export interface Subtask {
  msg: string;
  isDone: boolean; // true for a DONE child line, false for TODO
}

export interface Task {
  msg: string; // Text after the first ": " of the task line, e.g. "d" for "- TODO: d"
  subtasks: Subtask[];
  notes: string[]; // Child lines without a TODO/DONE marker, in source order
  date: string; // YYYY-MM-DD, taken from the nearest preceding day heading
  // Only true when the task line is DONE and no subtask is still open
  isDone: boolean;
}
