import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { ProgramModel, Token } from '../frontend/ast.js';
import { partnerOf } from '../frontend/program.js';
import type { MachineOptions } from '../pipeline.js';
import { resolveMachineOptions } from '../pipeline.js';
import type { TapeIo } from './io.js';
import type { Tape } from './tape.js';
import { createTape, currentCell, setCurrentCell } from './tape.js';

export interface ExecuteOptions extends MachineOptions {
  /** Initial cell values, copied onto the tape from cell 0. */
  initialCells?: ArrayLike<number>;
  /** Initial tape pointer (default 0). */
  pointer?: number;
}

/**
 * Final machine state. `fault` is set when execution stopped before the last instruction.
 */
export interface ExecutionResult {
  cells: Uint8Array;
  pointer: number;
  /** Number of instructions executed, including each re-check of a `[`. */
  steps: number;
  fault?: Diagnostic;
}

function faultAt(
  program: ProgramModel,
  token: Token,
  id: DiagnosticId,
  message: string,
): Diagnostic {
  return {
    id,
    severity: 'error',
    message: `${message} at instruction ${token.index}`,
    file: program.file,
    line: token.span.start.line,
    column: token.span.start.column,
    index: token.index,
  };
}

function setupFault(program: ProgramModel, message: string): Diagnostic {
  return { id: DiagnosticIds.InvalidOption, severity: 'error', message, file: program.file };
}

function prepareMachine(
  program: ProgramModel,
  options: ExecuteOptions,
): { machine: Required<MachineOptions>; tape: Tape } | Diagnostic {
  const setup: Diagnostic[] = [];
  const machine = resolveMachineOptions(options, program.file, setup);
  if (!machine) return setup[0] ?? setupFault(program, 'Invalid machine options');

  let tape: Tape;
  try {
    tape = createTape(machine.tapeLength, options.initialCells);
  } catch (err) {
    return setupFault(program, `Failed to allocate ${machine.tapeLength} tape cells: ${String(err)}`);
  }

  const pointer = options.pointer ?? 0;
  if (!Number.isSafeInteger(pointer) || pointer < 0 || pointer >= tape.cells.length) {
    return setupFault(
      program,
      `Initial tape pointer ${String(pointer)} is outside the tape (length ${tape.cells.length})`,
    );
  }
  tape.pointer = pointer;
  return { machine, tape };
}

function flushOutput(program: ProgramModel, io: TapeIo): Diagnostic | undefined {
  try {
    io.flush?.();
    return undefined;
  } catch (err) {
    return {
      id: DiagnosticIds.IoWriteFailed,
      severity: 'error',
      message: `Failed to flush output: ${String(err)}`,
      file: program.file,
    };
  }
}

/**
 * Execute a Program Model against a fresh tape.
 *
 * The instruction index and the tape pointer are the only state besides the tape. A `[` on a zero cell jumps past
 * its `]`; a `]` always jumps back to its `[`, which re-checks the cell. Execution ends one past the last
 * instruction, or at the first fault with the tape left as it was.
 */
export function execute(
  program: ProgramModel,
  io: TapeIo,
  options: ExecuteOptions = {},
): ExecutionResult {
  const prepared = prepareMachine(program, options);
  if ('id' in prepared) {
    return { cells: new Uint8Array(0), pointer: 0, steps: 0, fault: prepared };
  }
  const { machine, tape } = prepared;

  const { tokens } = program;
  let pc = 0;
  let steps = 0;
  let fault: Diagnostic | undefined;

  try {
    while (pc < tokens.length) {
      const token = tokens[pc];
      if (!token) break;
      steps++;

      switch (token.kind) {
        case 'MoveRight':
          if (tape.pointer + 1 >= tape.cells.length) {
            fault = faultAt(
              program,
              token,
              DiagnosticIds.TapeBoundsExceeded,
              `Tried to move past the end of the tape (length ${tape.cells.length})`,
            );
            break;
          }
          tape.pointer++;
          pc++;
          break;
        case 'MoveLeft':
          if (tape.pointer === 0) {
            fault = faultAt(
              program,
              token,
              DiagnosticIds.TapeBoundsExceeded,
              'Tried to move past the start of the tape',
            );
            break;
          }
          tape.pointer--;
          pc++;
          break;
        case 'Increment':
          setCurrentCell(tape, currentCell(tape) + 1);
          pc++;
          break;
        case 'Decrement':
          setCurrentCell(tape, currentCell(tape) - 1);
          pc++;
          break;
        case 'Read': {
          let byte: number | undefined;
          try {
            byte = io.readByte();
          } catch (err) {
            fault = faultAt(
              program,
              token,
              DiagnosticIds.InputReadFailed,
              `Failed to read input: ${String(err)}`,
            );
            break;
          }
          if (byte !== undefined) {
            setCurrentCell(tape, byte);
          } else if (machine.eof === 'zero') {
            setCurrentCell(tape, 0);
          } else if (machine.eof === 'error') {
            fault = faultAt(program, token, DiagnosticIds.InputExhausted, 'Read past end of input');
            break;
          }
          pc++;
          break;
        }
        case 'Write':
          try {
            io.writeByte(currentCell(tape));
          } catch (err) {
            fault = faultAt(
              program,
              token,
              DiagnosticIds.IoWriteFailed,
              `Failed to write output: ${String(err)}`,
            );
            break;
          }
          pc++;
          break;
        case 'LoopStart':
          pc = currentCell(tape) === 0 ? partnerOf(program, pc) + 1 : pc + 1;
          break;
        case 'LoopEnd':
          pc = partnerOf(program, pc);
          break;
        default: {
          const unreachable: never = token.kind;
          throw new Error(`Unhandled instruction kind ${String(unreachable)}`);
        }
      }

      if (fault) break;
    }
  } finally {
    const flushFault = flushOutput(program, io);
    if (!fault) fault = flushFault;
  }

  return {
    cells: tape.cells,
    pointer: tape.pointer,
    steps,
    ...(fault ? { fault } : {}),
  };
}
