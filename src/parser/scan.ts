import { DateResolutionError, StructuralError } from './errors';

export function lineNumberAt(text: string, offset: number): number {
  let line = 1;
  for (let i = text.indexOf('\n'); i !== -1 && i < offset; i = text.indexOf('\n', i + 1)) {
    line++;
  }
  return line;
}

/** Offsets of every non-overlapping occurrence of `needle`, in ascending order. */
export function findAll(text: string, needle: string): number[] {
  const offsets: number[] = [];
  let from = 0;
  for (;;) {
    const found = text.indexOf(needle, from);
    if (found === -1) {
      return offsets;
    }
    offsets.push(found);
    from = found + needle.length;
  }
}

export interface Line {
  text: string;
  end: number; // offset of the line ending, or text.length on the last line
}

export function lineAt(text: string, lineStart: number, lineEnd: string): Line {
  const found = text.indexOf(lineEnd, lineStart);
  const end = found === -1 ? text.length : found;
  return { text: text.slice(lineStart, end), end };
}

/**
 * A unit is a line plus the indented lines below it. It ends at whichever comes first:
 * the next top-level item, an empty line, the next day heading or the next week heading.
 * @returns The offset at which the unit starting at `from` ends.
 * @throws StructuralError when none of the terminators follows.
 */
export function lookupEndOfUnit(text: string, from: number, terminators: readonly string[]): number {
  let end = -1;
  for (const terminator of terminators) {
    const found = text.indexOf(terminator, from);
    if (found !== -1 && (end === -1 || found < end)) {
      end = found;
    }
  }
  if (end === -1) {
    throw new StructuralError(
      'Failed to find the end of the item; the text is truncated or lacks a trailing empty line',
      from,
      lineNumberAt(text, from),
    );
  }
  return end;
}

/**
 * Searches backwards from `before` for the closest day heading whose marker lies entirely before it.
 * @returns The heading line, without its leading line ending.
 * @throws DateResolutionError when no day heading precedes `before`.
 */
export function lookupDayLine(text: string, before: number, dayMarker: string, lineEnd: string): string {
  const searchFrom = before - dayMarker.length;
  const found = searchFrom < 0 ? -1 : text.lastIndexOf(dayMarker, searchFrom);
  if (found === -1) {
    throw new DateResolutionError('No day heading precedes this item', before, lineNumberAt(text, before));
  }
  return lineAt(text, found + lineEnd.length, lineEnd).text;
}
