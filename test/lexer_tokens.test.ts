import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { tokenize } from '../src/frontend/lexer.js';
import type { Token } from '../src/frontend/lexer.js';

function lex(text: string): { tokens: Token[] | undefined; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const tokens = tokenize('test.dbl', text, diagnostics);
  return { tokens, diagnostics };
}

function kindsAndTexts(text: string): string[] {
  const { tokens, diagnostics } = lex(text);
  expect(diagnostics).toEqual([]);
  return (tokens ?? []).map((t) => `${t.kind}:${t.text}`);
}

describe('tokenize', () => {
  it('splits a function declaration into keywords, identifiers and punctuation', () => {
    expect(kindsAndTexts('fun f(a, b) { return a; }')).toEqual([
      'keyword:fun',
      'ident:f',
      'punct:(',
      'ident:a',
      'punct:,',
      'ident:b',
      'punct:)',
      'punct:{',
      'keyword:return',
      'ident:a',
      'punct:;',
      'punct:}',
      'eof:',
    ]);
  });

  it('keeps number text verbatim', () => {
    expect(kindsAndTexts('w = 007.250;')).toEqual([
      'ident:w',
      'punct:=',
      'number:007.250',
      'punct:;',
      'eof:',
    ]);
  });

  it('treats "-" after an operand as the subtraction operator', () => {
    expect(kindsAndTexts('x-1')).toEqual(['ident:x', 'op:-', 'number:1', 'eof:']);
    expect(kindsAndTexts('(a)-3')).toEqual([
      'punct:(',
      'ident:a',
      'punct:)',
      'op:-',
      'number:3',
      'eof:',
    ]);
  });

  it('folds "-" into a number where an operand is expected', () => {
    expect(kindsAndTexts('y = -1.5;')).toEqual([
      'ident:y',
      'punct:=',
      'number:-1.5',
      'punct:;',
      'eof:',
    ]);
    expect(kindsAndTexts('return -2;')).toEqual([
      'keyword:return',
      'number:-2',
      'punct:;',
      'eof:',
    ]);
    expect(kindsAndTexts('f(1,-2)')).toEqual([
      'ident:f',
      'punct:(',
      'number:1',
      'punct:,',
      'number:-2',
      'punct:)',
      'eof:',
    ]);
  });

  it('recognizes all four arithmetic operators', () => {
    expect(kindsAndTexts('a+b*c/d')).toEqual([
      'ident:a',
      'op:+',
      'ident:b',
      'op:*',
      'ident:c',
      'op:/',
      'ident:d',
      'eof:',
    ]);
  });

  it('does not treat identifiers that start with a keyword as keywords', () => {
    expect(kindsAndTexts('funny returned')).toEqual(['ident:funny', 'ident:returned', 'eof:']);
  });

  it('skips line and block comments', () => {
    expect(kindsAndTexts('// header\nx = 1; /* a\n block */ y = 2;')).toEqual([
      'ident:x',
      'punct:=',
      'number:1',
      'punct:;',
      'ident:y',
      'punct:=',
      'number:2',
      'punct:;',
      'eof:',
    ]);
  });

  it('records 1-based line/column spans', () => {
    const { tokens } = lex('a\n  bb');
    const bb = tokens?.[1];
    expect(bb?.text).toBe('bb');
    expect(bb?.span.start).toEqual({ line: 2, column: 3, offset: 4 });
    expect(bb?.span.end).toEqual({ line: 2, column: 5, offset: 6 });
  });

  it('reports an unexpected character with its position and stops', () => {
    const { tokens, diagnostics } = lex('x = 1 $ 2;');
    expect(tokens).toBeUndefined();
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.LexError,
        severity: 'error',
        message: 'Unexpected character "$".',
        file: 'test.dbl',
        line: 1,
        column: 7,
      },
    ]);
  });

  it('rejects a second decimal point', () => {
    const { tokens, diagnostics } = lex('1.5.2');
    expect(tokens).toBeUndefined();
    expect(diagnostics.map((d) => [d.message, d.column])).toEqual([
      ['Unexpected character ".".', 4],
    ]);
  });

  it('reports an unterminated block comment', () => {
    const { tokens, diagnostics } = lex('x = 1;\n/* never closed');
    expect(tokens).toBeUndefined();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.message).toBe('Unterminated block comment.');
    expect(diagnostics[0]?.line).toBe(2);
    expect(diagnostics[0]?.column).toBe(1);
  });

  it('produces only eof for empty input', () => {
    expect(kindsAndTexts('  \n\t ')).toEqual(['eof:']);
  });
});
