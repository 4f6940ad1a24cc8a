import type {
  BinaryOp,
  ConstDeclNode,
  ExprNode,
  FuncDeclNode,
  ParamNode,
  ProgramNode,
  SourceSpan,
  StatementNode,
} from './ast.js';
import type { Token } from './lexer.js';
import { tokenize } from './lexer.js';
import { joinSpans } from './source.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

function diag(diagnostics: Diagnostic[], at: SourceSpan, message: string): void {
  diagnostics.push({
    id: DiagnosticIds.ParseError,
    severity: 'error',
    message,
    file: at.file,
    line: at.start.line,
    column: at.start.column,
  });
}

function describeToken(t: Token): string {
  return t.kind === 'eof' ? 'end of input' : `"${t.text}"`;
}

/**
 * Parse a token stream (as produced by {@link tokenize}) into a program.
 *
 * Grammar:
 * ```
 * program      := (constantDecl | functionDecl)*
 * constantDecl := IDENT '=' NUMBER ';'
 * functionDecl := 'fun' IDENT '(' paramList? ')' '{' statement* '}'
 * statement    := IDENT '=' expr ';' | 'return' expr ';'
 * expr         := term (('+' | '-') term)*
 * term         := factor (('*' | '/') factor)*
 * factor       := NUMBER | IDENT | IDENT '(' argList? ')' | '(' expr ')'
 * ```
 *
 * No semantic checks happen here. Parsing stops at the first syntax error.
 */
export function parseProgram(
  filePath: string,
  tokens: Token[],
  diagnostics: Diagnostic[],
): ProgramNode | undefined {
  const end = tokens[tokens.length - 1];
  if (!end || end.kind !== 'eof') {
    diagnostics.push({
      id: DiagnosticIds.ParseError,
      severity: 'error',
      message: 'Token stream does not end with an end-of-input token.',
      file: filePath,
    });
    return undefined;
  }
  const eof: Token = end;
  let idx = 0;

  const peek = (): Token => tokens[idx] ?? eof;
  const next = (): Token => {
    const t = peek();
    if (t.kind !== 'eof') idx++;
    return t;
  };
  const is = (kind: Token['kind'], text?: string): boolean => {
    const t = peek();
    return t.kind === kind && (text === undefined || t.text === text);
  };
  const expect = (
    kind: Token['kind'],
    text: string | undefined,
    what: string,
  ): Token | undefined => {
    if (is(kind, text)) return next();
    const t = peek();
    diag(diagnostics, t.span, `Expected ${what}, found ${describeToken(t)}.`);
    return undefined;
  };

  function parseFactor(): ExprNode | undefined {
    const t = peek();
    if (t.kind === 'number') {
      next();
      return { kind: 'Literal', span: t.span, text: t.text };
    }
    if (t.kind === 'ident') {
      next();
      if (!is('punct', '(')) return { kind: 'Name', span: t.span, name: t.text };
      next();
      const args: ExprNode[] = [];
      if (!is('punct', ')')) {
        while (true) {
          const arg = parseExpr();
          if (!arg) return undefined;
          args.push(arg);
          if (!is('punct', ',')) break;
          next();
        }
      }
      const close = expect('punct', ')', '")" after call arguments');
      if (!close) return undefined;
      return { kind: 'Call', span: joinSpans(t.span, close.span), callee: t.text, args };
    }
    if (t.kind === 'punct' && t.text === '(') {
      next();
      const inner = parseExpr();
      if (!inner) return undefined;
      const close = expect('punct', ')', '")"');
      if (!close) return undefined;
      return { kind: 'Group', span: joinSpans(t.span, close.span), expr: inner };
    }
    diag(diagnostics, t.span, `Expected expression, found ${describeToken(t)}.`);
    return undefined;
  }

  function parseBinaryLevel(
    ops: readonly BinaryOp[],
    operand: () => ExprNode | undefined,
  ): ExprNode | undefined {
    let left = operand();
    if (!left) return undefined;
    while (true) {
      const t = peek();
      const op = ops.find((o) => t.kind === 'op' && t.text === o);
      if (!op) break;
      next();
      const right = operand();
      if (!right) return undefined;
      left = { kind: 'Binary', span: joinSpans(left.span, right.span), op, left, right };
    }
    return left;
  }

  function parseTerm(): ExprNode | undefined {
    return parseBinaryLevel(['*', '/'], parseFactor);
  }

  function parseExpr(): ExprNode | undefined {
    return parseBinaryLevel(['+', '-'], parseTerm);
  }

  function parseStatement(): StatementNode | undefined {
    const t = peek();
    if (t.kind === 'keyword' && t.text === 'return') {
      next();
      const value = parseExpr();
      if (!value) return undefined;
      const semi = expect('punct', ';', '";" after return expression');
      if (!semi) return undefined;
      return { kind: 'Return', span: joinSpans(t.span, semi.span), value };
    }
    if (t.kind === 'ident') {
      next();
      if (!expect('punct', '=', '"=" in assignment')) return undefined;
      const value = parseExpr();
      if (!value) return undefined;
      const semi = expect('punct', ';', '";" after assignment');
      if (!semi) return undefined;
      return { kind: 'Assign', span: joinSpans(t.span, semi.span), name: t.text, value };
    }
    diag(diagnostics, t.span, `Expected statement, found ${describeToken(t)}.`);
    return undefined;
  }

  function parseFunction(): FuncDeclNode | undefined {
    const funTok = next();
    const name = expect('ident', undefined, 'function name');
    if (!name) return undefined;
    if (!expect('punct', '(', '"(" after function name')) return undefined;

    const params: ParamNode[] = [];
    if (!is('punct', ')')) {
      while (true) {
        const p = expect('ident', undefined, 'parameter name');
        if (!p) return undefined;
        params.push({ kind: 'Param', span: p.span, name: p.text });
        if (!is('punct', ',')) break;
        next();
      }
    }
    if (!expect('punct', ')', '")" after parameters')) return undefined;
    if (!expect('punct', '{', '"{" to open function body')) return undefined;

    const body: StatementNode[] = [];
    while (!is('punct', '}')) {
      const stmt = parseStatement();
      if (!stmt) return undefined;
      body.push(stmt);
    }
    const close = next();
    return {
      kind: 'FuncDecl',
      span: joinSpans(funTok.span, close.span),
      name: name.text,
      params,
      body,
    };
  }

  function parseConstant(): ConstDeclNode | undefined {
    const name = next();
    if (!expect('punct', '=', '"=" after constant name')) return undefined;
    const value = expect('number', undefined, 'number literal');
    if (!value) return undefined;
    const semi = expect('punct', ';', '";" after constant');
    if (!semi) return undefined;
    return {
      kind: 'ConstDecl',
      span: joinSpans(name.span, semi.span),
      name: name.text,
      value: value.text,
    };
  }

  const constants: ConstDeclNode[] = [];
  const functions: FuncDeclNode[] = [];
  const first = peek();

  while (!is('eof')) {
    if (is('keyword', 'fun')) {
      const fn = parseFunction();
      if (!fn) return undefined;
      functions.push(fn);
      continue;
    }
    if (is('ident')) {
      const c = parseConstant();
      if (!c) return undefined;
      constants.push(c);
      continue;
    }
    const t = peek();
    diag(
      diagnostics,
      t.span,
      `Expected constant or function declaration, found ${describeToken(t)}.`,
    );
    return undefined;
  }

  return {
    kind: 'Program',
    span: joinSpans(first.span, peek().span),
    file: filePath,
    constants,
    functions,
  };
}

/**
 * Tokenize and parse source text in one step.
 */
export function parseSource(
  filePath: string,
  text: string,
  diagnostics: Diagnostic[],
): ProgramNode | undefined {
  const tokens = tokenize(filePath, text, diagnostics);
  if (!tokens) return undefined;
  return parseProgram(filePath, tokens, diagnostics);
}
