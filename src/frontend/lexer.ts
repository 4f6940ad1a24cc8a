import type { SourceSpan } from './ast.js';
import type { SourceFile } from './source.js';
import { makeSourceFile, posAtOffset, span } from './source.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

export type TokenKind = 'ident' | 'number' | 'op' | 'punct' | 'keyword' | 'eof';

export interface Token {
  kind: TokenKind;
  /** Raw source text. Empty for `eof`. */
  text: string;
  span: SourceSpan;
}

const KEYWORDS = new Set(['fun', 'return']);
const OPERATORS = '+-*/';
const PUNCTUATION = '(){},;=';

const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*/;
const NUMBER_RE = /^-?[0-9]+(?:\.[0-9]+)?/;

function diag(diagnostics: Diagnostic[], file: SourceFile, offset: number, message: string): void {
  const where = posAtOffset(file, offset);
  diagnostics.push({
    id: DiagnosticIds.LexError,
    severity: 'error',
    message,
    file: file.path,
    line: where.line,
    column: where.column,
  });
}

/**
 * A leading `-` belongs to a number literal only where an operand may start.
 */
function operandExpected(prev: Token | undefined): boolean {
  if (!prev) return true;
  if (prev.kind === 'ident' || prev.kind === 'number') return false;
  return !(prev.kind === 'punct' && prev.text === ')');
}

/**
 * Split source text into tokens, ending with an `eof` token.
 *
 * Stops at the first unrecognized character and reports it; returns `undefined` in that case.
 */
export function tokenize(
  filePath: string,
  text: string,
  diagnostics: Diagnostic[],
): Token[] | undefined {
  const file = makeSourceFile(filePath, text);
  const out: Token[] = [];
  let i = 0;

  const push = (kind: TokenKind, len: number) => {
    out.push({ kind, text: text.slice(i, i + len), span: span(file, i, i + len) });
    i += len;
  };

  while (i < text.length) {
    const ch = text[i] ?? '';
    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const two = text.slice(i, i + 2);
    if (two === '//') {
      const nl = text.indexOf('\n', i);
      i = nl < 0 ? text.length : nl + 1;
      continue;
    }
    if (two === '/*') {
      const close = text.indexOf('*/', i + 2);
      if (close < 0) {
        diag(diagnostics, file, i, 'Unterminated block comment.');
        return undefined;
      }
      i = close + 2;
      continue;
    }

    const rest = text.slice(i);
    const num = NUMBER_RE.exec(rest);
    if (num && (num[0][0] !== '-' || operandExpected(out[out.length - 1]))) {
      push('number', num[0].length);
      continue;
    }
    const ident = IDENT_RE.exec(rest);
    if (ident) {
      push(KEYWORDS.has(ident[0]) ? 'keyword' : 'ident', ident[0].length);
      continue;
    }
    if (OPERATORS.includes(ch)) {
      push('op', 1);
      continue;
    }
    if (PUNCTUATION.includes(ch)) {
      push('punct', 1);
      continue;
    }

    diag(diagnostics, file, i, `Unexpected character "${ch}".`);
    return undefined;
  }

  out.push({ kind: 'eof', text: '', span: span(file, text.length, text.length) });
  return out;
}
