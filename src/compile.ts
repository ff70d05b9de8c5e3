import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { ProgramModel } from './frontend/ast.js';
import { parseProgram } from './frontend/parser.js';
import type { Artifact } from './formats/types.js';
import { emitProgram } from './lowering/emit.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
import { resolveMachineOptions } from './pipeline.js';

/**
 * Read and parse one program file. Read failures are reported as `IoReadFailed`.
 */
export async function loadProgram(
  entryFile: string,
  diagnostics: Diagnostic[],
): Promise<ProgramModel | undefined> {
  const entryPath = resolve(entryFile);
  let sourceText: string;
  try {
    sourceText = await readFile(entryPath, 'utf8');
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read entry file: ${String(err)}`,
      file: entryPath,
    });
    return undefined;
  }
  return parseProgram(entryPath, sourceText, diagnostics);
}

/**
 * Compile an already-loaded source text. No filesystem access.
 */
export function compileSource(
  path: string,
  text: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  const diagnostics: Diagnostic[] = [];
  const program = parseProgram(path, text, diagnostics);
  if (!program) return { diagnostics, artifacts: [] };
  return lowerProgram(program, diagnostics, options, deps);
}

function lowerProgram(
  program: ProgramModel,
  diagnostics: Diagnostic[],
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  const machine = resolveMachineOptions(options, program.file, diagnostics);
  if (!machine || hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [], program };
  }

  const artifacts: Artifact[] = [];

  if (options.emitLl ?? true) {
    const lowered = emitProgram(program, diagnostics, {
      ...machine,
      moduleName: options.moduleName ?? basename(program.file),
    });
    if (!lowered || hasErrors(diagnostics)) {
      return { diagnostics, artifacts: [], program };
    }
    artifacts.push(deps.formats.writeLl(lowered, { annotate: options.annotate ?? false }));
  }

  if (options.emitListing ?? true) {
    if (deps.formats.writeListing) {
      artifacts.push(deps.formats.writeListing(program));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitListing=true but no listing writer is configured; skipping .lst artifact.',
        file: program.file,
      });
    }
  }

  return { diagnostics, artifacts, program };
}

/**
 * Compile a program starting from an entry file.
 *
 * - Structural errors stop the pipeline before lowering; no artifact is produced.
 * - Produces artifacts in-memory via `deps.formats` (the CLI writes them to disk).
 * - Defaults to emitting both `.ll` and `.lst` unless an emit flag turns one off.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const diagnostics: Diagnostic[] = [];
  const program = await loadProgram(entryFile, diagnostics);
  if (!program || hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }
  return lowerProgram(program, diagnostics, options, deps);
};
