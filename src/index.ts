export { compile, compileSource, loadProgram } from './compile.js';
export { run, runSource } from './run.js';
export type { RunResult } from './run.js';
export { DEFAULT_TAPE_LENGTH, MAX_TAPE_LENGTH } from './pipeline.js';
export type {
  CompileFn,
  CompileResult,
  CompilerOptions,
  EofPolicy,
  MachineOptions,
  PipelineDeps,
} from './pipeline.js';
export { DiagnosticIds, hasErrors } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export type {
  InstructionKind,
  LoopPair,
  LoopPairing,
  ProgramModel,
  SourcePosition,
  SourceSpan,
  Token,
} from './frontend/ast.js';
export { instructionKindOf, instructionSymbol, tokenize } from './frontend/lexer.js';
export { resolveLoops } from './frontend/resolver.js';
export { buildProgram, loopIdOf, partnerOf } from './frontend/program.js';
export { parseProgram } from './frontend/parser.js';
export { makeSourceFile } from './frontend/source.js';
export type { SourceFile } from './frontend/source.js';
export { emitProgram, FAULT_EXIT_STATUS } from './lowering/emit.js';
export type { EmitOptions } from './lowering/emit.js';
export { defaultFormatWriters } from './formats/index.js';
export { writeLl, escapeLlString } from './formats/writeLl.js';
export { writeListing } from './formats/writeListing.js';
export type * from './formats/types.js';
export { execute } from './runtime/interpreter.js';
export type { ExecuteOptions, ExecutionResult } from './runtime/interpreter.js';
export { BufferIo, createStdio } from './runtime/io.js';
export type { TapeIo } from './runtime/io.js';
export { createTape } from './runtime/tape.js';
export type { Tape } from './runtime/tape.js';
