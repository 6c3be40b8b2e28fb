import type { Line } from './location.js';

/** One code point of the current line and where it starts. */
export interface CursorChar {
  column: number;
  char: string;
}

export interface LineCursor {
  /**
   * Pull the next line from the supplier and reset the position to 0.
   * Returns false once the supplier is exhausted; the current line is then an
   * empty sentinel one past the last real line.
   */
  advanceLine(): boolean;

  /** Next character of the current line, without consuming it. */
  peek(): CursorChar | undefined;

  /** Consume and return the next character of the current line. */
  next(): CursorChar | undefined;

  /** Offset of the next character, or the line length at end of line. */
  column(): number;

  /** Move to a column of the current line, forwards or back. */
  seek(column: number): void;

  /** The line being scanned. Replaced wholesale by advanceLine(). */
  readonly line: Line;

  /** True once advanceLine() has found no more lines. */
  readonly exhausted: boolean;
}

/**
 * Cursor over lines supplied by an iterable. Nothing is read until the first
 * advanceLine() call.
 */
export function createLineCursor(lines: Iterable<string>, file: string): LineCursor {
  const iterator = lines[Symbol.iterator]();
  let line: Line = { file, lineNumber: 0, contents: '' };
  let pos = 0;
  let exhausted = false;

  function advanceLine(): boolean {
    pos = 0;
    if (exhausted) return false;

    const result = iterator.next();
    if (result.done) {
      exhausted = true;
      line = { file, lineNumber: line.lineNumber + 1, contents: '' };
      return false;
    }

    line = { file, lineNumber: line.lineNumber + 1, contents: result.value };
    return true;
  }

  function peek(): CursorChar | undefined {
    const codePoint = line.contents.codePointAt(pos);
    if (codePoint === undefined) return undefined;
    return { column: pos, char: String.fromCodePoint(codePoint) };
  }

  function next(): CursorChar | undefined {
    const current = peek();
    if (current) pos += current.char.length;
    return current;
  }

  function column(): number {
    return pos;
  }

  function seek(column: number): void {
    pos = Math.max(0, Math.min(column, line.contents.length));
  }

  const cursor: LineCursor = {
    advanceLine,
    peek,
    next,
    column,
    seek,

    get line() { return line; },
    get exhausted() { return exhausted; },
  };

  return cursor;
}
