export const LINE_END_LF = '\n';
export const LINE_END_CRLF = '\r\n';

export type LineEnding = typeof LINE_END_LF | typeof LINE_END_CRLF;

export const Tag = {
  ITEM: '- ',
  DAY: '## ',
  WEEK: '# Week ',
  // an item with no indentation in front of it
  TOPLEVEL: '',
  TODO: 'TODO',
  DONE: 'DONE',
  EVT: 'EVT',
} as const;

export interface MarkerSet {
  readonly lineEnd: LineEnding;
  readonly taskTodo: string;
  readonly taskDone: string;
  readonly event: string;
  readonly day: string;
  readonly unitEnds: readonly string[];
}

/**
 * Every marker the parser looks for, prefixed with the line ending in use.
 */
export function buildMarkers(lineEnd: LineEnding): MarkerSet {
  const day = lineEnd + Tag.DAY;
  return Object.freeze({
    lineEnd,
    taskTodo: lineEnd + Tag.ITEM + Tag.TODO,
    taskDone: lineEnd + Tag.ITEM + Tag.DONE,
    event: lineEnd + Tag.ITEM + Tag.EVT,
    day,
    unitEnds: Object.freeze([
      // the next top-level list item
      lineEnd + Tag.TOPLEVEL + Tag.ITEM,
      // an empty line
      lineEnd + lineEnd,
      // the next day
      day,
      // the beginning of a week
      lineEnd + Tag.WEEK,
    ]),
  });
}

export function detectLineEnding(text: string): LineEnding {
  return text.includes(LINE_END_CRLF) ? LINE_END_CRLF : LINE_END_LF;
}

export function lineEndingFromSetting(setting: 'auto' | 'lf' | 'crlf', text: string): LineEnding {
  switch (setting) {
    case 'lf':
      return LINE_END_LF;
    case 'crlf':
      return LINE_END_CRLF;
    default:
      return detectLineEnding(text);
  }
}
