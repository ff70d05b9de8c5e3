import type { SourcePosition, SourceSpan } from './ast.js';

/**
 * A program source as handed to the front end.
 */
export interface SourceFile {
  path: string;
  text: string;
}

/**
 * One source character with its position.
 */
export interface SourceChar {
  char: string;
  position: SourcePosition;
}

export function makeSourceFile(path: string, text: string): SourceFile {
  return { path, text };
}

/**
 * Walk `file.text` one code point at a time, tracking 1-based line/column.
 *
 * `\n` ends a line; every other code point (including `\r`) advances the column by one. `offset` stays in UTF-16
 * units.
 */
export function* scanSource(file: SourceFile): Generator<SourceChar> {
  let line = 1;
  let column = 1;
  let offset = 0;
  for (const char of file.text) {
    yield { char, position: { line, column, offset } };
    offset += char.length;
    if (char === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
}

/**
 * Span covering a single character at `position`.
 */
export function charSpan(file: SourceFile, position: SourcePosition): SourceSpan {
  return {
    file: file.path,
    start: position,
    end: { line: position.line, column: position.column + 1, offset: position.offset + 1 },
  };
}
