import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { ExprNode, ProgramNode } from '../src/frontend/ast.js';
import { parseProgram, parseSource } from '../src/frontend/parser.js';
import { sexpr } from './helpers/ast.js';

function parse(text: string): { program: ProgramNode | undefined; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const program = parseSource('test.dbl', text, diagnostics);
  return { program, diagnostics };
}

function returnedExpr(body: string): string {
  const { program, diagnostics } = parse(`fun f(a, b, c) { return ${body}; }`);
  expect(diagnostics).toEqual([]);
  const stmt = program?.functions[0]?.body[0];
  if (!stmt) throw new Error('expected a statement');
  return sexpr(stmt.value);
}

function parseError(text: string): Diagnostic | undefined {
  const { program, diagnostics } = parse(text);
  expect(program).toBeUndefined();
  expect(diagnostics).toHaveLength(1);
  expect(diagnostics[0]?.id).toBe(DiagnosticIds.ParseError);
  return diagnostics[0];
}

describe('parseSource', () => {
  it('collects constants and functions in source order', () => {
    const { program, diagnostics } = parse(
      'k = 2;\nfun one() { return 1; }\nm = -0.5;\nfun two(x) { y = x; return y; }\n',
    );
    expect(diagnostics).toEqual([]);
    expect(program?.constants.map((c) => [c.name, c.value])).toEqual([
      ['k', '2'],
      ['m', '-0.5'],
    ]);
    expect(program?.functions.map((f) => f.name)).toEqual(['one', 'two']);
    expect(program?.functions[1]?.params.map((p) => p.name)).toEqual(['x']);
    expect(program?.functions[1]?.body.map((s) => s.kind)).toEqual(['Assign', 'Return']);
  });

  it('accepts an empty program', () => {
    const { program, diagnostics } = parse('// nothing here\n');
    expect(diagnostics).toEqual([]);
    expect(program?.constants).toEqual([]);
    expect(program?.functions).toEqual([]);
  });

  it('accepts an empty function body', () => {
    const { program } = parse('fun main() {}');
    expect(program?.functions[0]?.body).toEqual([]);
  });

  it('binds * and / tighter than + and -', () => {
    expect(returnedExpr('1 + 2 * 3')).toBe('(+ 1 (* 2 3))');
    expect(returnedExpr('a / b - c')).toBe('(- (/ a b) c)');
  });

  it('associates operators of one level to the left', () => {
    expect(returnedExpr('a - b - c')).toBe('(- (- a b) c)');
    expect(returnedExpr('a / b * c')).toBe('(* (/ a b) c)');
  });

  it('keeps parentheses as group nodes', () => {
    expect(returnedExpr('(a + b) * c')).toBe('(* [(+ a b)] c)');
  });

  it('parses calls with zero, one and several arguments', () => {
    expect(returnedExpr('g()')).toBe('g()');
    expect(returnedExpr('g(a) + h(1, b * 2, k(c))')).toBe('(+ g(a) h(1, (* b 2), k(c)))');
  });

  it('reads a negative literal after an operator', () => {
    expect(returnedExpr('a * -2')).toBe('(* a -2)');
    expect(returnedExpr('a-2')).toBe('(- a 2)');
  });

  it('records spans covering the whole construct', () => {
    const { program } = parse('fun f() {\n  x = g(1,\n 2);\n  return x;\n}');
    const fn = program?.functions[0];
    const assign = fn?.body[0];
    expect(fn?.span.start).toMatchObject({ line: 1, column: 1 });
    expect(fn?.span.end).toMatchObject({ line: 5, column: 2 });
    expect(assign?.span.start).toMatchObject({ line: 2, column: 3 });
    const call: ExprNode | undefined = assign?.value;
    expect(call?.span.start).toMatchObject({ line: 2, column: 7 });
    expect(call?.span.end).toMatchObject({ line: 3, column: 4 });
  });

  it('reports a missing semicolon after a return expression', () => {
    const d = parseError('fun f() { return 1 }');
    expect(d?.message).toBe('Expected ";" after return expression, found "}".');
    expect([d?.line, d?.column]).toEqual([1, 20]);
  });

  it('reports a missing closing brace at end of input', () => {
    expect(parseError('fun f() { return 1;')?.message).toBe(
      'Expected statement, found end of input.',
    );
  });

  it('requires a number literal on the right of a constant', () => {
    expect(parseError('a = b;')?.message).toBe('Expected number literal, found "b".');
  });

  it('rejects a statement that starts with something else', () => {
    expect(parseError('fun f() { 1 = 2; }')?.message).toBe('Expected statement, found "1".');
  });

  it('rejects a stray token at the top level', () => {
    const d = parseError('x = 1;\nreturn x;');
    expect(d?.message).toBe('Expected constant or function declaration, found "return".');
    expect([d?.line, d?.column]).toEqual([2, 1]);
  });

  it('rejects an unclosed call', () => {
    expect(parseError('fun f() { return g(1; }')?.message).toBe(
      'Expected ")" after call arguments, found ";".',
    );
  });

  it('rejects an unclosed group', () => {
    expect(parseError('fun f() { return (1 + 2; }')?.message).toBe('Expected ")", found ";".');
  });

  it('rejects a missing operand', () => {
    expect(parseError('fun f() { return 1 + ; }')?.message).toBe(
      'Expected expression, found ";".',
    );
  });

  it('rejects a non-identifier parameter', () => {
    expect(parseError('fun f(1) { return 1; }')?.message).toBe(
      'Expected parameter name, found "1".',
    );
  });

  it('rejects a trailing comma in a parameter list', () => {
    expect(parseError('fun f(a,) { return a; }')?.message).toBe(
      'Expected parameter name, found ")".',
    );
  });

  it('reports a token stream without an end-of-input token', () => {
    const diagnostics: Diagnostic[] = [];
    expect(parseProgram('test.dbl', [], diagnostics)).toBeUndefined();
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.ParseError,
        severity: 'error',
        message: 'Token stream does not end with an end-of-input token.',
        file: 'test.dbl',
      },
    ]);
  });

  it('passes lexer diagnostics through', () => {
    const { program, diagnostics } = parse('x = 1 $ 2;');
    expect(program).toBeUndefined();
    expect(diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.LexError]);
  });
});
