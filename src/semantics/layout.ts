import type { ExprNode, FuncDeclNode } from '../frontend/ast.js';
import type { CompileEnv, LocalRole } from './env.js';

/** Arguments passed in `%xmm0`..`%xmm7`; the rest stay in the caller's spill area. */
export const REGISTER_ARG_COUNT = 8;

/** Bytes per frame slot (one double). */
const SLOT_SIZE = 8;

/** Bytes reserved on the machine stack for one spilled value; keeps `%rsp` 16-byte aligned. */
export const SPILL_SIZE = 0x10;

export interface RegisterParam {
  name: string;
  /** Argument register index (`%xmm<index>`). */
  index: number;
  /** `%rbp`-relative slot offset. */
  offset: number;
}

/**
 * Storage decisions for one function.
 */
export interface FrameLayout {
  /** Bytes reserved below `%rbp`; 0 when the function reads no parameter or local. */
  frameSize: number;
  /** Name -> `%rbp`-relative offset for every parameter and every local that is read. */
  slots: Map<string, number>;
  /** Parameters copied from argument registers into the frame on entry. */
  registerParams: RegisterParam[];
  /** Number of statements up to and including the first `return`. */
  liveCount: number;
  /** Parameters/locals whose value is read by code that is actually emitted. */
  reads: Set<string>;
}

/**
 * `%rbp`-relative offset of stack-passed argument `index` for a callee taking `arity` arguments.
 *
 * The caller spills arguments in order, so the last argument sits lowest; `0x10(%rbp)` is the first
 * byte above the saved `%rbp` and return address.
 */
export function stackArgOffset(index: number, arity: number): number {
  return 0x10 + SPILL_SIZE * (arity - 1 - index);
}

function roundUp(value: number, align: number): number {
  return Math.ceil(value / align) * align;
}

function collectReads(expr: ExprNode, scope: Map<string, LocalRole>, into: Set<string>): void {
  switch (expr.kind) {
    case 'Literal':
      return;
    case 'Name':
      if (scope.has(expr.name)) into.add(expr.name);
      return;
    case 'Group':
      collectReads(expr.expr, scope, into);
      return;
    case 'Binary':
      collectReads(expr.left, scope, into);
      collectReads(expr.right, scope, into);
      return;
    case 'Call':
      for (const arg of expr.args) collectReads(arg, scope, into);
      return;
  }
}

export function liveStatementCount(fn: FuncDeclNode): number {
  const firstReturn = fn.body.findIndex((s) => s.kind === 'Return');
  return firstReturn < 0 ? fn.body.length : firstReturn + 1;
}

/**
 * Compute which parameters/locals are read, and where each one lives.
 *
 * Only statements before the first `return` (and the return itself) count. An assignment keeps
 * its target alive only if something that is emitted reads the target, so chains of unused
 * locals are dropped together.
 */
export function layoutFunction(fn: FuncDeclNode, env: CompileEnv): FrameLayout {
  const scope = env.locals.get(fn.name) ?? new Map<string, LocalRole>();
  const liveCount = liveStatementCount(fn);
  const live = fn.body.slice(0, liveCount);

  const reads = new Set<string>();
  for (const stmt of live) {
    if (stmt.kind === 'Return') collectReads(stmt.value, scope, reads);
  }
  let before = -1;
  while (before !== reads.size) {
    before = reads.size;
    for (const stmt of live) {
      if (stmt.kind === 'Assign' && reads.has(stmt.name)) collectReads(stmt.value, scope, reads);
    }
  }

  const slots = new Map<string, number>();
  const registerParams: RegisterParam[] = [];
  const arity = fn.params.length;
  fn.params.forEach((p, index) => {
    if (index >= REGISTER_ARG_COUNT) slots.set(p.name, stackArgOffset(index, arity));
  });

  if (reads.size === 0) {
    return { frameSize: 0, slots, registerParams, liveCount, reads };
  }

  let used = 0;
  const nextSlot = (): number => {
    used += SLOT_SIZE;
    return -used;
  };
  fn.params.forEach((p, index) => {
    if (index >= REGISTER_ARG_COUNT) return;
    const offset = nextSlot();
    slots.set(p.name, offset);
    registerParams.push({ name: p.name, index, offset });
  });
  for (const stmt of live) {
    if (stmt.kind !== 'Assign' || slots.has(stmt.name) || !reads.has(stmt.name)) continue;
    slots.set(stmt.name, nextSlot());
  }

  return { frameSize: roundUp(used, 16), slots, registerParams, liveCount, reads };
}
