import type { Diagnostic } from '../diagnostics/types.js';
import type { SemanticError } from '../diagnostics/messages.js';
import { semanticErrorId, semanticErrorMessage } from '../diagnostics/messages.js';
import type {
  ExprNode,
  FuncDeclNode,
  ProgramNode,
  SourceSpan,
  StatementNode,
} from '../frontend/ast.js';
import { isReservedPoolName } from './naming.js';

export type LocalRole = 'param' | 'local';

/**
 * Symbol tables for a validated program. Read-only once {@link validateProgram} returns.
 */
export interface CompileEnv {
  /** Constant name -> literal text as written. */
  consts: Map<string, string>;

  /** Function name -> declaration (arity is `params.length`). */
  funcs: Map<string, FuncDeclNode>;

  /**
   * Function name -> (name -> role) for every parameter and assigned local in that function.
   */
  locals: Map<string, Map<string, LocalRole>>;
}

/**
 * First semantic failure, carried out of the nested walkers.
 */
class SemanticFailure extends Error {
  constructor(
    readonly error: SemanticError,
    readonly at: SourceSpan,
  ) {
    super(semanticErrorMessage(error));
    this.name = 'SemanticFailure';
  }
}

function fail(error: SemanticError, at: SourceSpan): never {
  throw new SemanticFailure(error, at);
}

function checkConstants(program: ProgramNode, consts: Map<string, string>): void {
  for (const c of program.constants) {
    if (consts.has(c.name)) fail({ kind: 'DuplicateConstant', name: c.name }, c.span);
    if (isReservedPoolName(c.name)) fail({ kind: 'ReservedConstantName', name: c.name }, c.span);
    consts.set(c.name, c.value);
  }
}

function checkFunctions(program: ProgramNode, env: CompileEnv): void {
  for (const f of program.functions) {
    if (env.funcs.has(f.name)) fail({ kind: 'DuplicateFunction', name: f.name }, f.span);
    if (env.consts.has(f.name)) {
      fail({ kind: 'FunctionCollidesWithConstant', name: f.name }, f.span);
    }
    env.funcs.set(f.name, f);
  }
}

function checkParams(fn: FuncDeclNode, env: CompileEnv): Map<string, LocalRole> {
  const scope = new Map<string, LocalRole>();
  for (const p of fn.params) {
    if (scope.has(p.name)) {
      fail({ kind: 'DuplicateArgument', fn: fn.name, name: p.name }, p.span);
    }
    if (env.consts.has(p.name)) {
      fail({ kind: 'ArgCollidesWithConstant', fn: fn.name, name: p.name }, p.span);
    }
    if (env.funcs.has(p.name)) {
      fail({ kind: 'ArgCollidesWithFunction', fn: fn.name, name: p.name }, p.span);
    }
    scope.set(p.name, 'param');
  }
  return scope;
}

function checkExpr(
  expr: ExprNode,
  fn: FuncDeclNode,
  scope: Map<string, LocalRole>,
  env: CompileEnv,
): void {
  switch (expr.kind) {
    case 'Literal':
      return;
    case 'Name':
      if (!scope.has(expr.name) && !env.consts.has(expr.name)) {
        fail({ kind: 'UnknownVariable', fn: fn.name, name: expr.name }, expr.span);
      }
      return;
    case 'Group':
      checkExpr(expr.expr, fn, scope, env);
      return;
    case 'Binary':
      checkExpr(expr.left, fn, scope, env);
      checkExpr(expr.right, fn, scope, env);
      return;
    case 'Call': {
      const callee = env.funcs.get(expr.callee);
      if (!callee) {
        fail({ kind: 'UnknownFunctionCall', fn: fn.name, name: expr.callee }, expr.span);
      }
      if (callee.params.length !== expr.args.length) {
        fail(
          {
            kind: 'ArityMismatch',
            fn: callee.name,
            caller: fn.name,
            expected: callee.params.length,
            got: expr.args.length,
          },
          expr.span,
        );
      }
      for (const arg of expr.args) checkExpr(arg, fn, scope, env);
      return;
    }
  }
}

function checkStatement(
  stmt: StatementNode,
  fn: FuncDeclNode,
  scope: Map<string, LocalRole>,
  env: CompileEnv,
): void {
  if (stmt.kind === 'Return') {
    checkExpr(stmt.value, fn, scope, env);
    return;
  }
  if (env.consts.has(stmt.name)) {
    fail({ kind: 'LocalCollidesWithConstant', name: stmt.name }, stmt.span);
  }
  if (env.funcs.has(stmt.name)) {
    fail({ kind: 'LocalCollidesWithFunction', name: stmt.name }, stmt.span);
  }
  // The target becomes visible only to later statements.
  checkExpr(stmt.value, fn, scope, env);
  if (!scope.has(stmt.name)) scope.set(stmt.name, 'local');
}

/**
 * Validate a parsed program and build its symbol tables.
 *
 * Checks run in a fixed order (constants, functions, parameters, `main` arity, bodies) and the
 * first violation stops validation: exactly one diagnostic is pushed and `undefined` is returned.
 */
export function validateProgram(
  program: ProgramNode,
  diagnostics: Diagnostic[],
): CompileEnv | undefined {
  const env: CompileEnv = { consts: new Map(), funcs: new Map(), locals: new Map() };
  try {
    checkConstants(program, env.consts);
    checkFunctions(program, env);
    for (const fn of program.functions) {
      env.locals.set(fn.name, checkParams(fn, env));
    }
    const main = env.funcs.get('main');
    if (main && main.params.length > 0) fail({ kind: 'MainHasArguments' }, main.span);

    for (const fn of program.functions) {
      const scope = env.locals.get(fn.name) ?? new Map<string, LocalRole>();
      for (const stmt of fn.body) checkStatement(stmt, fn, scope, env);
    }
  } catch (err) {
    if (!(err instanceof SemanticFailure)) throw err;
    diagnostics.push({
      id: semanticErrorId(err.error.kind),
      severity: 'error',
      message: err.message,
      file: err.at.file,
      line: err.at.start.line,
      column: err.at.start.column,
    });
    return undefined;
  }
  return env;
}
