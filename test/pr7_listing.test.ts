import { describe, expect, it } from 'vitest';

import { parseProgram } from '../src/frontend/parser.js';
import { writeListing } from '../src/formats/writeListing.js';

describe('PR7 instruction listing', () => {
  it('lists instructions with positions and loop partners', () => {
    const program = parseProgram('loop.b', '+[-]', [])!;
    expect(writeListing(program).text).toBe(
      [
        '; tapecc listing: loop.b',
        '; instructions: 4, loops: 1',
        '',
        '0  1:1       +  Increment',
        '1  1:2       [  LoopStart -> 3',
        '2  1:3       -  Decrement',
        '3  1:4       ]  LoopEnd   -> 1',
        '',
        '; loops:',
        '; loop0 1..3',
        '',
      ].join('\n'),
    );
  });

  it('right-aligns indices and honors the line ending', () => {
    const program = parseProgram('wide.b', '+'.repeat(11), [])!;
    const lines = writeListing(program, { lineEnding: '\r\n' }).text.split('\r\n');
    expect(lines[3]).toBe(' 0  1:1       +  Increment');
    expect(lines[12]).toBe(' 9  1:10      +  Increment');
  });

  it('lists an empty program', () => {
    const program = parseProgram('empty.b', 'nothing here', [])!;
    expect(writeListing(program).text).toBe(
      '; tapecc listing: empty.b\n; instructions: 0, loops: 0\n\n\n; loops:\n',
    );
  });
});
