import { describe, expect, it } from 'vitest';

import type { FuncDeclNode } from '../src/frontend/ast.js';
import { layoutFunction, liveStatementCount, stackArgOffset } from '../src/semantics/layout.js';
import { analyze } from './helpers/asm.js';

function layoutOf(text: string, name: string) {
  const { program, env } = analyze(text);
  const fn: FuncDeclNode | undefined = program.functions.find((f) => f.name === name);
  if (!fn) throw new Error(`no function ${name}`);
  return layoutFunction(fn, env);
}

describe('layoutFunction', () => {
  it('gives a function that reads nothing no frame', () => {
    const layout = layoutOf('k = 1;\nfun f(a) { return k + 2; }', 'f');
    expect(layout.frameSize).toBe(0);
    expect([...layout.slots]).toEqual([]);
    expect(layout.registerParams).toEqual([]);
    expect([...layout.reads]).toEqual([]);
  });

  it('stores every register parameter once anything is read', () => {
    const layout = layoutOf('fun f(a, b, c) { return b; }', 'f');
    expect(layout.frameSize).toBe(0x20);
    expect([...layout.slots]).toEqual([
      ['a', -0x8],
      ['b', -0x10],
      ['c', -0x18],
    ]);
    expect(layout.registerParams).toEqual([
      { name: 'a', index: 0, offset: -0x8 },
      { name: 'b', index: 1, offset: -0x10 },
      { name: 'c', index: 2, offset: -0x18 },
    ]);
    expect([...layout.reads]).toEqual(['b']);
  });

  it('places read locals after the parameters in first-assignment order', () => {
    const layout = layoutOf(
      'fun f(p) { y = 1; x = y; y = x + 2; unused = 4; return y; }',
      'f',
    );
    expect([...layout.slots]).toEqual([
      ['p', -0x8],
      ['y', -0x10],
      ['x', -0x18],
    ]);
    expect(layout.frameSize).toBe(0x20);
    expect([...layout.reads].sort()).toEqual(['x', 'y']);
  });

  it('drops chains of locals that never reach the return', () => {
    const layout = layoutOf('fun f() { a = 1; b = a; c = 2; return c; }', 'f');
    expect([...layout.slots]).toEqual([['c', -0x8]]);
    expect(layout.frameSize).toBe(0x10);
  });

  it('ignores reads after the first return', () => {
    const layout = layoutOf('fun f(a) { return 1; b = a; return b; }', 'f');
    expect(layout.liveCount).toBe(1);
    expect(layout.frameSize).toBe(0);
  });

  it('maps parameters past the eighth onto the caller stack', () => {
    const layout = layoutOf(
      'fun f(a, b, c, d, e, g, h, i, j, k) { return j + k; }',
      'f',
    );
    expect(layout.slots.get('i')).toBe(-0x40);
    expect(layout.slots.get('j')).toBe(0x20);
    expect(layout.slots.get('k')).toBe(0x10);
    expect(layout.registerParams.map((p) => p.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(layout.frameSize).toBe(0x40);
  });

  it('saves register parameters even when only a stack parameter is read', () => {
    const layout = layoutOf('fun f(a, b, c, d, e, g, h, i, j) { return j; }', 'f');
    expect(layout.frameSize).toBe(0x40);
    const none = layoutOf('fun f(a, b, c, d, e, g, h, i, j) { return 0; }', 'f');
    expect(none.frameSize).toBe(0);
    expect(none.slots.get('j')).toBe(0x10);
  });
});

describe('liveStatementCount', () => {
  it('counts up to and including the first return', () => {
    const { program } = analyze(
      'fun a() { x = 1; return x; y = 2; return y; }\nfun b() { z = 1; }\nfun c() {}',
    );
    expect(program.functions.map(liveStatementCount)).toEqual([2, 1, 0]);
  });
});

describe('stackArgOffset', () => {
  it('puts the last argument nearest the return address', () => {
    expect(stackArgOffset(9, 10)).toBe(0x10);
    expect(stackArgOffset(8, 10)).toBe(0x20);
    expect(stackArgOffset(8, 9)).toBe(0x10);
  });
});
