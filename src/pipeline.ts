import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type { ProgramModel } from './frontend/ast.js';
import type { Artifact, FormatWriters } from './formats/types.js';

/**
 * What a Read does when the input stream is exhausted.
 *
 * - `zero`: store 0 in the current cell.
 * - `unchanged`: leave the current cell as it was.
 * - `error`: fault.
 */
export type EofPolicy = 'zero' | 'unchanged' | 'error';

/** Conventional tape length for this language family. */
export const DEFAULT_TAPE_LENGTH = 30_000;

/** Largest tape the interpreter will allocate. */
export const MAX_TAPE_LENGTH = 2 ** 31 - 1;

/**
 * Tape machine settings shared by the code generator and the interpreter.
 */
export interface MachineOptions {
  /** Number of cells on the tape (default 30000). */
  tapeLength?: number;
  /** End-of-input policy for Read (default `zero`). */
  eof?: EofPolicy;
  /**
   * Emit tape-pointer bounds checks in generated IR (default `true`).
   *
   * The interpreter faults on out-of-range moves regardless of this flag.
   */
  boundsChecks?: boolean;
}

/**
 * Options that influence compilation behavior and which artifacts are produced.
 */
export interface CompilerOptions extends MachineOptions {
  /** Emit LLVM IR (`.ll`). Defaults to on. */
  emitLl?: boolean;
  /** Emit the instruction listing (`.lst`). Defaults to on. */
  emitListing?: boolean;
  /** Keep per-instruction source comments in `.ll`. */
  annotate?: boolean;
  /** LLVM module id; defaults to the entry file's base name. */
  moduleName?: string;
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 *
 * `program` is present whenever the front end succeeded.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  program?: ProgramModel;
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can stay in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;

/**
 * Resolve machine defaults and check ranges. Problems are reported as `InvalidOption` diagnostics.
 */
export function resolveMachineOptions(
  options: MachineOptions,
  file: string,
  diagnostics: Diagnostic[],
): Required<MachineOptions> | undefined {
  const tapeLength = options.tapeLength ?? DEFAULT_TAPE_LENGTH;
  if (!Number.isSafeInteger(tapeLength) || tapeLength < 1) {
    diagnostics.push({
      id: DiagnosticIds.InvalidOption,
      severity: 'error',
      message: `Tape length must be a positive integer (got ${String(tapeLength)})`,
      file,
    });
    return undefined;
  }
  if (tapeLength > MAX_TAPE_LENGTH) {
    diagnostics.push({
      id: DiagnosticIds.InvalidOption,
      severity: 'error',
      message: `Tape length must be at most ${MAX_TAPE_LENGTH} (got ${tapeLength})`,
      file,
    });
    return undefined;
  }
  return {
    tapeLength,
    eof: options.eof ?? 'zero',
    boundsChecks: options.boundsChecks ?? true,
  };
}
