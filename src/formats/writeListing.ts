import type { ProgramModel } from '../frontend/ast.js';
import { instructionSymbol } from '../frontend/lexer.js';
import type { ListingArtifact, WriteListingOptions } from './types.js';

function pad(n: number, width: number): string {
  return String(n).padStart(width, ' ');
}

/**
 * Create a deterministic `.lst` listing artifact.
 *
 * One line per instruction (`index  line:col  symbol  kind  [-> partner]`), then a loop-pair table.
 */
export function writeListing(program: ProgramModel, opts?: WriteListingOptions): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const { tokens, pairing } = program;
  const width = Math.max(1, String(Math.max(0, tokens.length - 1)).length);

  const lines: string[] = [];
  lines.push(`; tapecc listing: ${program.file}`);
  lines.push(`; instructions: ${tokens.length}, loops: ${pairing.pairs.length}`);
  lines.push('');

  for (const token of tokens) {
    const { line, column } = token.span.start;
    const loc = `${line}:${column}`.padEnd(9, ' ');
    let text = `${pad(token.index, width)}  ${loc} ${instructionSymbol(token.kind)}  ${token.kind}`;
    const partner = pairing.partner[token.index];
    if (partner !== undefined && partner >= 0) {
      text = `${text.padEnd(width + 24, ' ')} -> ${partner}`;
    }
    lines.push(text);
  }

  lines.push('');
  lines.push('; loops:');
  for (const pair of pairing.pairs) {
    lines.push(`; loop${pair.id} ${pair.start}..${pair.end}`);
  }

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
