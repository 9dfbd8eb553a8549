/**
 * Source location types shared by every pipeline stage
 *
 * Offsets are UTF-16 code-unit indices into the CRLF-normalised input,
 * lines and columns are 1-based.
 */

export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

/**
 * Half-open range: `end` points one past the last character
 */
export interface SourceSpan {
  start: SourcePosition;
  end: SourcePosition;
}

export const ORIGIN: SourcePosition = Object.freeze({ line: 1, column: 1, offset: 0 });

/**
 * Position reached after consuming `text` from `start`
 */
export function advance(start: SourcePosition, text: string): SourcePosition {
  let { line, column } = start;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column, offset: start.offset + text.length };
}

/**
 * Position of a character on the same line as `start`
 */
export function shift(start: SourcePosition, columns: number): SourcePosition {
  return {
    line: start.line,
    column: start.column + columns,
    offset: start.offset + columns,
  };
}

export function spanOf(start: SourcePosition, text: string): SourceSpan {
  return { start, end: advance(start, text) };
}

export interface SourceLine {
  text: string;
  start: SourcePosition;
}

/**
 * Split `text` on `\n`, pairing each line with its start position
 */
export function splitLines(text: string, base: SourcePosition = ORIGIN): SourceLine[] {
  const lines: SourceLine[] = [];
  const parts = text.split('\n');
  let position = base;
  for (let i = 0; i < parts.length; i++) {
    lines.push({ text: parts[i], start: position });
    position = advance(position, i < parts.length - 1 ? parts[i] + '\n' : parts[i]);
  }
  return lines;
}

export function lineEnd(line: SourceLine): SourcePosition {
  return shift(line.start, line.text.length);
}
