import type { Diagnostic } from './diagnostics/types.js';
import { hasErrors } from './diagnostics/types.js';
import { loadProgram } from './compile.js';
import { parseProgram } from './frontend/parser.js';
import type { ProgramModel } from './frontend/ast.js';
import type { TapeIo } from './runtime/io.js';
import type { ExecuteOptions, ExecutionResult } from './runtime/interpreter.js';
import { execute } from './runtime/interpreter.js';

/**
 * Result of interpreting a program. `execution` is absent when the front end rejected the program.
 */
export interface RunResult {
  diagnostics: Diagnostic[];
  program?: ProgramModel;
  execution?: ExecutionResult;
}

function interpret(
  program: ProgramModel | undefined,
  diagnostics: Diagnostic[],
  io: TapeIo,
  options: ExecuteOptions,
): RunResult {
  if (!program || hasErrors(diagnostics)) return { diagnostics };
  const execution = execute(program, io, options);
  if (execution.fault) diagnostics.push(execution.fault);
  return { diagnostics, program, execution };
}

/**
 * Parse and interpret a source text already in memory.
 */
export function runSource(
  path: string,
  text: string,
  io: TapeIo,
  options: ExecuteOptions = {},
): RunResult {
  const diagnostics: Diagnostic[] = [];
  return interpret(parseProgram(path, text, diagnostics), diagnostics, io, options);
}

/**
 * Read, parse and interpret a program file.
 */
export async function run(
  entryFile: string,
  io: TapeIo,
  options: ExecuteOptions = {},
): Promise<RunResult> {
  const diagnostics: Diagnostic[] = [];
  const program = await loadProgram(entryFile, diagnostics);
  return interpret(program, diagnostics, io, options);
}
