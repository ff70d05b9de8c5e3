import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { ProgramModel, Token } from '../frontend/ast.js';
import { instructionSymbol } from '../frontend/lexer.js';
import { loopIdOf } from '../frontend/program.js';
import type { EmittedModule, IrBlock, IrLine } from '../formats/types.js';
import type { MachineOptions } from '../pipeline.js';

export interface EmitOptions extends Required<MachineOptions> {
  moduleName: string;
}

interface LoopLabels {
  cond: string;
  body: string;
  exit: string;
}

const FAULT_LABEL = 'fault';
/** Exit status of a generated program that hits a fault path. */
export const FAULT_EXIT_STATUS = 1;

/**
 * Lower a Program Model to an in-memory LLVM module.
 *
 * Layout:
 * - `@tape`: zero-initialized `[tapeLength x i8]` global.
 * - `%ptr`: `i64` stack slot holding the tape pointer.
 * - Per loop pair `k`: blocks `loopK.cond`, `loopK.body`, `loopK.exit`. All loop labels are allocated from the
 *   pairing before any instruction is lowered, so a `[` can branch to its exit block ahead of the body.
 * - `fault`: shared exit(1) block, only present when a bounds check or the `error` EOF policy branches to it.
 */
export function emitProgram(
  program: ProgramModel,
  diagnostics: Diagnostic[],
  options: EmitOptions,
): EmittedModule | undefined {
  const { tapeLength, eof, boundsChecks } = options;
  const tapeType = `[${tapeLength} x i8]`;

  const loopLabels: LoopLabels[] = program.pairing.pairs.map((pair) => ({
    cond: `loop${pair.id}.cond`,
    body: `loop${pair.id}.body`,
    exit: `loop${pair.id}.exit`,
  }));

  const blocks: IrBlock[] = [];
  let current: IrBlock = { label: 'entry', lines: [] };
  blocks.push(current);
  let tempCounter = 0;
  let faultUsed = false;

  const temp = (): string => `%t${tempCounter++}`;
  const emit = (text: string): void => {
    current.lines.push({ kind: 'instruction', text });
  };
  const comment = (text: string): void => {
    const line: IrLine = { kind: 'comment', text };
    current.lines.push(line);
  };
  const startBlock = (label: string): void => {
    current = { label, lines: [] };
    blocks.push(current);
  };
  const branchToFaultIf = (cond: string, okLabel: string): void => {
    faultUsed = true;
    emit(`br i1 ${cond}, label %${FAULT_LABEL}, label %${okLabel}`);
    startBlock(okLabel);
  };
  const labelsFor = (index: number): LoopLabels => {
    const labels = loopLabels[loopIdOf(program, index)];
    if (!labels) throw new Error(`No loop labels allocated for instruction ${index}`);
    return labels;
  };

  const cellPointer = (): string => {
    const pos = temp();
    const cell = temp();
    emit(`${pos} = load i64, ptr %ptr`);
    emit(`${cell} = getelementptr inbounds ${tapeType}, ptr @tape, i64 0, i64 ${pos}`);
    return cell;
  };

  const lowerMove = (token: Token, delta: 1 | -1): void => {
    const before = temp();
    const after = temp();
    emit(`${before} = load i64, ptr %ptr`);
    emit(`${after} = ${delta > 0 ? 'add' : 'sub'} i64 ${before}, 1`);
    if (boundsChecks) {
      const outside = temp();
      emit(
        delta > 0
          ? `${outside} = icmp sge i64 ${after}, ${tapeLength}`
          : `${outside} = icmp slt i64 ${after}, 0`,
      );
      branchToFaultIf(outside, `move${token.index}.ok`);
    }
    emit(`store i64 ${after}, ptr %ptr`);
  };

  const lowerAdd = (op: 'add' | 'sub'): void => {
    const cell = cellPointer();
    const value = temp();
    const next = temp();
    emit(`${value} = load i8, ptr ${cell}`);
    emit(`${next} = ${op} i8 ${value}, 1`);
    emit(`store i8 ${next}, ptr ${cell}`);
  };

  const lowerRead = (token: Token): void => {
    const cell = cellPointer();
    const ch = temp();
    const atEof = temp();
    emit(`${ch} = call i32 @getchar()`);
    emit(`${atEof} = icmp slt i32 ${ch}, 0`);
    if (eof === 'error') {
      branchToFaultIf(atEof, `read${token.index}.ok`);
      const byte = temp();
      emit(`${byte} = trunc i32 ${ch} to i8`);
      emit(`store i8 ${byte}, ptr ${cell}`);
      return;
    }
    let fallback = '0';
    if (eof === 'unchanged') {
      fallback = temp();
      emit(`${fallback} = load i8, ptr ${cell}`);
    }
    const byte = temp();
    const stored = temp();
    emit(`${byte} = trunc i32 ${ch} to i8`);
    emit(`${stored} = select i1 ${atEof}, i8 ${fallback}, i8 ${byte}`);
    emit(`store i8 ${stored}, ptr ${cell}`);
  };

  const lowerWrite = (): void => {
    const cell = cellPointer();
    const value = temp();
    const widened = temp();
    const ignored = temp();
    emit(`${value} = load i8, ptr ${cell}`);
    emit(`${widened} = zext i8 ${value} to i32`);
    emit(`${ignored} = call i32 @putchar(i32 ${widened})`);
  };

  const lowerLoopStart = (token: Token): void => {
    const labels = labelsFor(token.index);
    emit(`br label %${labels.cond}`);
    startBlock(labels.cond);
    const cell = cellPointer();
    const value = temp();
    const isZero = temp();
    emit(`${value} = load i8, ptr ${cell}`);
    emit(`${isZero} = icmp eq i8 ${value}, 0`);
    emit(`br i1 ${isZero}, label %${labels.exit}, label %${labels.body}`);
    startBlock(labels.body);
  };

  const lowerLoopEnd = (token: Token): void => {
    const labels = labelsFor(token.index);
    emit(`br label %${labels.cond}`);
    startBlock(labels.exit);
  };

  try {
    emit('%ptr = alloca i64');
    emit('store i64 0, ptr %ptr');

    for (const token of program.tokens) {
      const { line, column } = token.span.start;
      comment(`[${token.index}] ${instructionSymbol(token.kind)} ${line}:${column}`);
      switch (token.kind) {
        case 'MoveRight':
          lowerMove(token, 1);
          break;
        case 'MoveLeft':
          lowerMove(token, -1);
          break;
        case 'Increment':
          lowerAdd('add');
          break;
        case 'Decrement':
          lowerAdd('sub');
          break;
        case 'Read':
          lowerRead(token);
          break;
        case 'Write':
          lowerWrite();
          break;
        case 'LoopStart':
          lowerLoopStart(token);
          break;
        case 'LoopEnd':
          lowerLoopEnd(token);
          break;
        default: {
          const unreachable: never = token.kind;
          throw new Error(`Unhandled instruction kind ${String(unreachable)}`);
        }
      }
    }

    emit('ret i32 0');
    if (faultUsed) {
      startBlock(FAULT_LABEL);
      emit(`call void @exit(i32 ${FAULT_EXIT_STATUS})`);
      emit('unreachable');
    }
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.EmitError,
      severity: 'error',
      message: `Internal error during lowering: ${String(err)}`,
      file: program.file,
    });
    return undefined;
  }

  const declarations = ['declare i32 @getchar()', 'declare i32 @putchar(i32)'];
  if (faultUsed) declarations.push('declare void @exit(i32)');

  return {
    name: options.moduleName,
    tapeLength,
    globals: [`@tape = internal global ${tapeType} zeroinitializer`],
    declarations,
    blocks,
  };
}
