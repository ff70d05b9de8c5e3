import type { InstructionKind, Token } from './ast.js';
import { charSpan, scanSource } from './source.js';
import type { SourceFile } from './source.js';

/**
 * Map a source character to its instruction kind. Any other character is a comment.
 */
export function instructionKindOf(char: string): InstructionKind | undefined {
  switch (char) {
    case '>':
      return 'MoveRight';
    case '<':
      return 'MoveLeft';
    case '+':
      return 'Increment';
    case '-':
      return 'Decrement';
    case ',':
      return 'Read';
    case '.':
      return 'Write';
    case '[':
      return 'LoopStart';
    case ']':
      return 'LoopEnd';
    default:
      return undefined;
  }
}

/**
 * Source symbol of an instruction kind.
 */
export function instructionSymbol(kind: InstructionKind): string {
  switch (kind) {
    case 'MoveRight':
      return '>';
    case 'MoveLeft':
      return '<';
    case 'Increment':
      return '+';
    case 'Decrement':
      return '-';
    case 'Read':
      return ',';
    case 'Write':
      return '.';
    case 'LoopStart':
      return '[';
    case 'LoopEnd':
      return ']';
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

/**
 * Tokenize source text. Never fails: every character outside the instruction alphabet is dropped.
 */
export function tokenize(file: SourceFile): Token[] {
  const tokens: Token[] = [];
  for (const { char, position } of scanSource(file)) {
    const kind = instructionKindOf(char);
    if (kind === undefined) continue;
    tokens.push({ kind, index: tokens.length, span: charSpan(file, position) });
  }
  return tokens;
}
