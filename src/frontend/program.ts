import type { LoopPairing, ProgramModel, Token } from './ast.js';
import { resolveLoops } from './resolver.js';
import type { Diagnostic } from '../diagnostics/types.js';

function freezePairing(pairing: LoopPairing): LoopPairing {
  return Object.freeze({
    pairs: Object.freeze(pairing.pairs.map((p) => Object.freeze({ ...p }))),
    partner: Object.freeze([...pairing.partner]),
    loopIds: Object.freeze([...pairing.loopIds]),
  });
}

/**
 * Combine a token sequence with its resolved loop pairing into a frozen {@link ProgramModel}.
 *
 * Fails (returns `undefined`) only when loop resolution reports diagnostics.
 */
export function buildProgram(
  file: string,
  tokens: readonly Token[],
  diagnostics: Diagnostic[],
): ProgramModel | undefined {
  const pairing = resolveLoops(tokens, diagnostics);
  if (!pairing) return undefined;

  return Object.freeze({
    file,
    tokens: Object.freeze(tokens.map((t) => Object.freeze({ ...t }))),
    pairing: freezePairing(pairing),
  });
}

/**
 * Matching index of the loop boundary at `index`.
 *
 * Throws when `index` is not a loop boundary; a built program never asks for one that is not.
 */
export function partnerOf(program: ProgramModel, index: number): number {
  const target = program.pairing.partner[index];
  if (target === undefined || target < 0) {
    throw new Error(`Instruction ${index} is not a loop boundary`);
  }
  return target;
}

/**
 * Loop id of the loop boundary at `index`.
 */
export function loopIdOf(program: ProgramModel, index: number): number {
  const id = program.pairing.loopIds[index];
  if (id === undefined || id < 0) {
    throw new Error(`Instruction ${index} is not a loop boundary`);
  }
  return id;
}
