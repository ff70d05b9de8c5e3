import { readSync, writeSync } from 'node:fs';

/**
 * Byte-at-a-time I/O used by the interpreter.
 */
export interface TapeIo {
  /** Next input byte, or `undefined` at end of input. */
  readByte(): number | undefined;
  writeByte(byte: number): void;
  /** Push any buffered output to its destination. */
  flush?(): void;
}

/**
 * In-memory I/O over a fixed input; collects everything written.
 */
export class BufferIo implements TapeIo {
  private readonly input: Uint8Array;
  private position = 0;
  private readonly written: number[] = [];

  constructor(input: Uint8Array | string = new Uint8Array(0)) {
    this.input = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
  }

  readByte(): number | undefined {
    if (this.position >= this.input.length) return undefined;
    return this.input[this.position++];
  }

  writeByte(byte: number): void {
    this.written.push(byte & 0xff);
  }

  get output(): Uint8Array {
    return Uint8Array.from(this.written);
  }

  outputText(): string {
    return Buffer.from(this.written).toString('utf8');
  }
}

function isEndOfInput(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'EOF';
}

/**
 * Blocking I/O on the process's standard input/output descriptors.
 *
 * Output is unbuffered: each byte goes to `outputFd` as soon as it is written.
 */
export function createStdio(inputFd = 0, outputFd = 1): TapeIo {
  const one = Buffer.alloc(1);

  return {
    readByte(): number | undefined {
      let n: number;
      try {
        n = readSync(inputFd, one, 0, 1, null);
      } catch (err) {
        if (isEndOfInput(err)) return undefined;
        throw err;
      }
      return n === 0 ? undefined : one[0];
    },
    writeByte(byte: number): void {
      writeSync(outputFd, Buffer.of(byte & 0xff));
    },
  };
}
