import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { tokenize } from '../src/frontend/lexer.js';
import { resolveLoops } from '../src/frontend/resolver.js';
import { makeSourceFile } from '../src/frontend/source.js';

function resolveText(text: string) {
  const diagnostics: Diagnostic[] = [];
  const pairing = resolveLoops(tokenize(makeSourceFile('loops.b', text)), diagnostics);
  return { pairing, diagnostics };
}

describe('PR3 loop resolution', () => {
  it('pairs nested loops by index', () => {
    const { pairing, diagnostics } = resolveText('+[+[-]-]');
    expect(diagnostics).toEqual([]);
    expect(pairing?.pairs).toEqual([
      { id: 0, start: 1, end: 7 },
      { id: 1, start: 3, end: 5 },
    ]);
    expect(pairing?.partner).toEqual([-1, 7, -1, 5, -1, 3, -1, 1]);
    expect(pairing?.loopIds).toEqual([-1, 0, -1, 1, -1, 1, -1, 0]);
  });

  it('numbers sibling loops in source order', () => {
    const { pairing } = resolveText('[][[]]');
    expect(pairing?.pairs).toEqual([
      { id: 0, start: 0, end: 1 },
      { id: 1, start: 2, end: 5 },
      { id: 2, start: 3, end: 4 },
    ]);
  });

  it('accepts a program without loops', () => {
    const { pairing, diagnostics } = resolveText('+-<>,.');
    expect(diagnostics).toEqual([]);
    expect(pairing?.pairs).toEqual([]);
  });

  it('reports a lone "[" as UnmatchedLoopStart(0)', () => {
    const { pairing, diagnostics } = resolveText('[');
    expect(pairing).toBeUndefined();
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UnmatchedLoopStart,
        severity: 'error',
        message: 'Unmatched "[" at instruction 0: loop is never closed',
        file: 'loops.b',
        line: 1,
        column: 1,
        index: 0,
      },
    ]);
  });

  it('reports a lone "]" as UnmatchedLoopEnd(0)', () => {
    const { pairing, diagnostics } = resolveText(']');
    expect(pairing).toBeUndefined();
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UnmatchedLoopEnd,
        severity: 'error',
        message: 'Unmatched "]" at instruction 0: no open "[" to close',
        file: 'loops.b',
        line: 1,
        column: 1,
        index: 0,
      },
    ]);
  });

  it('stops at the first unmatched "]"', () => {
    const { diagnostics } = resolveText('[]]]');
    expect(diagnostics.map((d) => [d.id, d.index])).toEqual([[DiagnosticIds.UnmatchedLoopEnd, 2]]);
  });

  it('names every unclosed "[" in ascending order', () => {
    const { diagnostics } = resolveText('[[ [] \n [');
    expect(diagnostics.map((d) => [d.id, d.index, d.line, d.column])).toEqual([
      [DiagnosticIds.UnmatchedLoopStart, 0, 1, 1],
      [DiagnosticIds.UnmatchedLoopStart, 1, 1, 2],
      [DiagnosticIds.UnmatchedLoopStart, 4, 2, 2],
    ]);
  });

  it('counts only instructions when indexing past comment text', () => {
    const { diagnostics } = resolveText('comment here\n  ]');
    expect(diagnostics.map((d) => [d.index, d.line, d.column])).toEqual([[0, 2, 3]]);
  });

  it('produces properly nested pairs for generated well-bracketed sequences', () => {
    let seed = 7;
    const next = (): number => {
      seed = (seed * 48271) % 2147483647;
      return seed;
    };
    for (let round = 0; round < 40; round++) {
      let text = '';
      let depth = 0;
      const length = next() % 40;
      for (let i = 0; i < length; i++) {
        if (depth > 0 && next() % 2 === 0) {
          text += ']';
          depth--;
        } else {
          text += next() % 3 === 0 ? '+' : '[';
          if (text.endsWith('[')) depth++;
        }
      }
      text += ']'.repeat(depth);

      const { pairing, diagnostics } = resolveText(text);
      expect(diagnostics).toEqual([]);
      const pairs = pairing!.pairs;
      expect(pairs).toHaveLength([...text].filter((c) => c === '[').length);
      for (const p of pairs) {
        expect(p.end).toBeGreaterThan(p.start);
        expect(text[p.start]).toBe('[');
        expect(text[p.end]).toBe(']');
        for (const q of pairs) {
          const disjoint = p.end < q.start || q.end < p.start;
          const nested = (p.start < q.start && q.end < p.end) || (q.start < p.start && p.end < q.end);
          expect(p === q || disjoint || nested).toBe(true);
        }
      }
    }
  });
});
