import type { ProgramModel } from '../frontend/ast.js';

/**
 * One line inside an IR basic block.
 *
 * Comments carry the source instruction each group of IR lines was lowered from. Writers decide whether to keep them.
 */
export type IrLine = { kind: 'comment'; text: string } | { kind: 'instruction'; text: string };

/**
 * A labelled basic block. The last instruction line is always a terminator.
 */
export interface IrBlock {
  label: string;
  lines: IrLine[];
}

/**
 * In-memory LLVM module produced by lowering: one `main` function over a global tape.
 */
export interface EmittedModule {
  /** Module id and `source_filename`. */
  name: string;
  tapeLength: number;
  /** Global definitions, already rendered (e.g. the tape array). */
  globals: string[];
  /** External function declarations, already rendered. */
  declarations: string[];
  /** Blocks of `@main`, in emission order; the first is `entry`. */
  blocks: IrBlock[];
}

/**
 * Options for `.ll` writing.
 */
export interface WriteLlOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Keep per-instruction source comments in the output.
   */
  annotate?: boolean;
}

/**
 * Options for listing writing.
 */
export interface WriteListingOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory LLVM IR artifact.
 */
export interface LlArtifact {
  kind: 'll';
  path?: string;
  text: string;
}

/**
 * In-memory instruction listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = LlArtifact | ListingArtifact;

/**
 * Format writers used by the pipeline to turn the lowered module / program into artifacts.
 */
export interface FormatWriters {
  writeLl(module: EmittedModule, opts?: WriteLlOptions): LlArtifact;
  writeListing?(program: ProgramModel, opts?: WriteListingOptions): ListingArtifact;
}
