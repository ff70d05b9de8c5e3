/**
 * Front-end contracts: instruction kinds, tokens, loop pairing and the Program Model.
 *
 * This module defines types only. Construction lives in `lexer.ts`, `resolver.ts` and `program.ts`.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based character offset in the file. */
  offset: number;
}

/**
 * Source span with inclusive start and end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * The closed set of eight instruction kinds.
 */
export type InstructionKind =
  | 'MoveRight'
  | 'MoveLeft'
  | 'Increment'
  | 'Decrement'
  | 'Read'
  | 'Write'
  | 'LoopStart'
  | 'LoopEnd';

/**
 * One recognized instruction character in the source.
 */
export interface Token {
  readonly kind: InstructionKind;
  /** Position in the token sequence. Non-instruction characters are not counted. */
  readonly index: number;
  readonly span: SourceSpan;
}

/**
 * A matched `[`/`]` pair.
 */
export interface LoopPair {
  /** Loop id, numbered by the order of the LoopStart in the token sequence. */
  readonly id: number;
  readonly start: number;
  readonly end: number;
}

/**
 * Bidirectional loop pairing over instruction indices.
 *
 * `partner[i]` is the matching index for a LoopStart/LoopEnd at `i`, and `-1` for every other instruction.
 * `loopIds[i]` is the loop id of the pair a LoopStart/LoopEnd at `i` belongs to, and `-1` otherwise.
 */
export interface LoopPairing {
  readonly pairs: readonly LoopPair[];
  readonly partner: readonly number[];
  readonly loopIds: readonly number[];
}

/**
 * Validated program: token sequence plus loop pairing, frozen after construction.
 */
export interface ProgramModel {
  readonly file: string;
  readonly tokens: readonly Token[];
  readonly pairing: LoopPairing;
}
