import type { LoopPair, LoopPairing, Token } from './ast.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

function loopDiag(
  diagnostics: Diagnostic[],
  id: typeof DiagnosticIds.UnmatchedLoopEnd | typeof DiagnosticIds.UnmatchedLoopStart,
  token: Token,
  message: string,
): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: token.span.file,
    line: token.span.start.line,
    column: token.span.start.column,
    index: token.index,
  });
}

/**
 * Pair every `[` with its `]` in a single left-to-right pass over an explicit index stack.
 *
 * - An `]` with an empty stack stops the scan with one `UnmatchedLoopEnd` diagnostic.
 * - Any `[` left on the stack at the end yields one `UnmatchedLoopStart` diagnostic each, ascending by index.
 *
 * Returns `undefined` when a diagnostic was reported.
 */
export function resolveLoops(
  tokens: readonly Token[],
  diagnostics: Diagnostic[],
): LoopPairing | undefined {
  const partner = new Array<number>(tokens.length).fill(-1);
  const loopIds = new Array<number>(tokens.length).fill(-1);
  const pairs: LoopPair[] = [];
  const open: Array<{ token: Token; id: number }> = [];
  let nextId = 0;

  for (const token of tokens) {
    if (token.kind === 'LoopStart') {
      open.push({ token, id: nextId++ });
      continue;
    }
    if (token.kind !== 'LoopEnd') continue;

    const top = open.pop();
    if (!top) {
      loopDiag(
        diagnostics,
        DiagnosticIds.UnmatchedLoopEnd,
        token,
        `Unmatched "]" at instruction ${token.index}: no open "[" to close`,
      );
      return undefined;
    }
    const start = top.token.index;
    partner[start] = token.index;
    partner[token.index] = start;
    loopIds[start] = top.id;
    loopIds[token.index] = top.id;
    pairs.push({ id: top.id, start, end: token.index });
  }

  if (open.length > 0) {
    for (const { token } of open) {
      loopDiag(
        diagnostics,
        DiagnosticIds.UnmatchedLoopStart,
        token,
        `Unmatched "[" at instruction ${token.index}: loop is never closed`,
      );
    }
    return undefined;
  }

  pairs.sort((a, b) => a.id - b.id);
  return { pairs, partner, loopIds };
}
