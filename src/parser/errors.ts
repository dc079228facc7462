/**
 * Base class for everything the extraction engine throws.
 * `offset` is the character offset of the offending marker, `line` its 1-based line number.
 */
export class LogParseError extends Error {
  constructor(
    message: string,
    public readonly offset: number,
    public readonly line: number,
  ) {
    super(`${message} (line ${line})`);
    this.name = 'LogParseError';
  }
}

/** The text around a marker does not have the shape the marker promises, or a unit never ends. */
export class StructuralError extends LogParseError {
  constructor(message: string, offset: number, line: number) {
    super(message, offset, line);
    this.name = 'StructuralError';
  }
}

/** No day heading precedes a record, or the heading does not hold a valid DD.MM.YYYY date. */
export class DateResolutionError extends LogParseError {
  constructor(message: string, offset: number, line: number) {
    super(message, offset, line);
    this.name = 'DateResolutionError';
  }
}
