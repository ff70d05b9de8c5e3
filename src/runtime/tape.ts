/**
 * Execution-time tape: byte cells plus the tape pointer.
 */
export interface Tape {
  cells: Uint8Array;
  pointer: number;
}

/**
 * Allocate a zeroed tape of `length` cells, optionally seeded with `initial` from cell 0.
 */
export function createTape(length: number, initial?: ArrayLike<number>): Tape {
  const cells = new Uint8Array(length);
  if (initial) {
    cells.set(Array.from(initial, (v) => v & 0xff).slice(0, length));
  }
  return { cells, pointer: 0 };
}

export function currentCell(tape: Tape): number {
  return tape.cells[tape.pointer] ?? 0;
}

export function setCurrentCell(tape: Tape, value: number): void {
  tape.cells[tape.pointer] = value & 0xff;
}
