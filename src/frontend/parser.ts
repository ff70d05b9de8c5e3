import type { ProgramModel } from './ast.js';
import { tokenize } from './lexer.js';
import { buildProgram } from './program.js';
import { makeSourceFile } from './source.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

/**
 * Run the whole front end over one source text: tokenize, resolve loops, build the Program Model.
 *
 * Problems are appended to `diagnostics`; `undefined` is returned when the program is not valid.
 */
export function parseProgram(
  path: string,
  text: string,
  diagnostics: Diagnostic[],
): ProgramModel | undefined {
  try {
    const file = makeSourceFile(path, text);
    return buildProgram(path, tokenize(file), diagnostics);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.InternalParseError,
      severity: 'error',
      message: `Internal error during parse: ${String(err)}`,
      file: path,
    });
    return undefined;
  }
}
