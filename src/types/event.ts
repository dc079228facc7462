export interface LogEvent {
  msg: string;
  notes: string[];
  date: string; // YYYY-MM-DD
  time: string | null; // HH:MM:SS for "- EVT 16:25: ...", null for "- EVT: ..."
}
