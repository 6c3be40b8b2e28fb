/**
 * Source positions attached to every token and error.
 */

/** One physical source line, without its terminator. */
export interface Line {
  readonly file: string;

  /** 1-based line number within `file`. */
  readonly lineNumber: number;

  readonly contents: string;
}

export interface Location {
  readonly file: string;

  /** 1-based line number. */
  readonly line: number;

  /** 0-based UTF-16 offset into the line's contents. */
  readonly column: number;
}

/**
 * Location plus a snapshot of the whole line, so a diagnostic can draw a
 * caret without going back to the source.
 */
export interface ErrorContext {
  readonly location: Location;
  readonly lineText: string;
}

export function locationAt(line: Line, column: number): Location {
  return { file: line.file, line: line.lineNumber, column };
}

export function errorContextAt(line: Line, column: number): ErrorContext {
  return { location: locationAt(line, column), lineText: line.contents };
}

/** `file:line:column`, with the column printed 1-based like most editors. */
export function formatLocation(location: Location): string {
  return `${location.file}:${location.line}:${location.column + 1}`;
}
