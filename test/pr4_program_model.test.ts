import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { tokenize } from '../src/frontend/lexer.js';
import { parseProgram } from '../src/frontend/parser.js';
import { buildProgram, loopIdOf, partnerOf } from '../src/frontend/program.js';
import { makeSourceFile } from '../src/frontend/source.js';

describe('PR4 program model', () => {
  it('combines tokens and pairing into one frozen unit', () => {
    const diagnostics: Diagnostic[] = [];
    const program = parseProgram('model.b', '+[->+<]', diagnostics);
    expect(diagnostics).toEqual([]);
    expect(program).toBeDefined();

    expect(program!.file).toBe('model.b');
    expect(program!.tokens.map((t) => t.kind)).toEqual([
      'Increment',
      'LoopStart',
      'Decrement',
      'MoveRight',
      'Increment',
      'MoveLeft',
      'LoopEnd',
    ]);
    expect(Object.isFrozen(program)).toBe(true);
    expect(Object.isFrozen(program!.tokens)).toBe(true);
    expect(Object.isFrozen(program!.tokens[0])).toBe(true);
    expect(Object.isFrozen(program!.pairing.pairs)).toBe(true);
    expect(Object.isFrozen(program!.pairing.partner)).toBe(true);
  });

  it('does not alias the token array it was built from', () => {
    const tokens = tokenize(makeSourceFile('alias.b', '[]'));
    const program = buildProgram('alias.b', tokens, []);
    tokens.pop();
    expect(program?.tokens).toHaveLength(2);
  });

  it('answers partner and loop id lookups', () => {
    const program = parseProgram('model.b', '[[]]', []);
    expect(partnerOf(program!, 0)).toBe(3);
    expect(partnerOf(program!, 2)).toBe(1);
    expect(loopIdOf(program!, 3)).toBe(0);
    expect(loopIdOf(program!, 1)).toBe(1);
  });

  it('throws when asked for the partner of a non-loop instruction', () => {
    const program = parseProgram('model.b', '+[]', []);
    expect(() => partnerOf(program!, 0)).toThrow('Instruction 0 is not a loop boundary');
    expect(() => loopIdOf(program!, 9)).toThrow('Instruction 9 is not a loop boundary');
  });

  it('propagates resolver diagnostics and builds nothing', () => {
    const diagnostics: Diagnostic[] = [];
    expect(parseProgram('bad.b', '+]', diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.UnmatchedLoopEnd]);
  });
});
