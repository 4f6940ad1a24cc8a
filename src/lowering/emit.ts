import type { BinaryOp, ExprNode, FuncDeclNode, ProgramNode } from '../frontend/ast.js';
import type { CompileEnv } from '../semantics/env.js';
import type { FrameLayout } from '../semantics/layout.js';
import { REGISTER_ARG_COUNT, SPILL_SIZE, layoutFunction } from '../semantics/layout.js';
import { poolEntryName } from '../semantics/naming.js';
import type { Instruction, Mnemonic, Operand } from '../x86_64/format.js';
import { imm, label, mem, reg, xmm } from '../x86_64/format.js';

/**
 * Where a data entry came from.
 */
export type DataOrigin = { kind: 'const' } | { kind: 'pool'; function: string };

/**
 * One `name: .double value` line of the data section.
 */
export interface DataEntry {
  name: string;
  /** Literal text exactly as written in the source. */
  value: string;
  origin: DataOrigin;
}

export interface EmittedFunction {
  name: string;
  arity: number;
  frameSize: number;
  instructions: Instruction[];
}

/**
 * Lowered program: functions in declaration order and the data section, sorted by name.
 */
export interface EmittedProgram {
  functions: EmittedFunction[];
  data: DataEntry[];
}

const ARITH: Record<BinaryOp, Mnemonic> = {
  '+': 'addsd',
  '-': 'subsd',
  '*': 'mulsd',
  '/': 'divsd',
};

/**
 * Code-unit order, so the data section does not depend on the host locale.
 */
function compareNames(a: DataEntry, b: DataEntry): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

function walkLiterals(expr: ExprNode, visit: (text: string) => void): void {
  switch (expr.kind) {
    case 'Literal':
      visit(expr.text);
      return;
    case 'Name':
      return;
    case 'Group':
      walkLiterals(expr.expr, visit);
      return;
    case 'Binary':
      walkLiterals(expr.left, visit);
      walkLiterals(expr.right, visit);
      return;
    case 'Call':
      for (const arg of expr.args) walkLiterals(arg, visit);
      return;
  }
}

function emitFunction(
  fn: FuncDeclNode,
  layout: FrameLayout,
  data: DataEntry[],
): EmittedFunction {
  const out: Instruction[] = [];
  let poolCounter = 0;

  const emit = (mnemonic: Mnemonic, ...operands: Operand[]) => {
    out.push({ mnemonic, operands });
  };
  const poolEntry = (text: string): string => {
    const name = poolEntryName(fn.name, poolCounter++);
    data.push({ name, value: text, origin: { kind: 'pool', function: fn.name } });
    return name;
  };
  const slot = (name: string): Operand => {
    const offset = layout.slots.get(name);
    if (offset === undefined) {
      throw new Error(`emitFunction: "${name}" has no storage slot in function "${fn.name}".`);
    }
    return mem('rbp', offset);
  };
  const pushAcc = () => {
    emit('sub', imm(SPILL_SIZE), reg('rsp'));
    emit('movsd', reg('xmm0'), mem('rsp', 0));
  };

  // Every value lands in %xmm0. Binary operands meet in %xmm0 (left) and %xmm1 (right).
  const evalExpr = (expr: ExprNode): void => {
    switch (expr.kind) {
      case 'Literal':
        emit('movsd', mem('rip', poolEntry(expr.text)), reg('xmm0'));
        return;
      case 'Name':
        if (layout.reads.has(expr.name)) {
          emit('movsd', slot(expr.name), reg('xmm0'));
        } else {
          emit('movsd', mem('rip', expr.name), reg('xmm0'));
        }
        return;
      case 'Group':
        evalExpr(expr.expr);
        return;
      case 'Binary':
        evalExpr(expr.left);
        pushAcc();
        evalExpr(expr.right);
        emit('movaps', reg('xmm0'), reg('xmm1'));
        emit('movsd', mem('rsp', 0), reg('xmm0'));
        emit('add', imm(SPILL_SIZE), reg('rsp'));
        emit(ARITH[expr.op], reg('xmm1'), reg('xmm0'));
        return;
      case 'Call': {
        const n = expr.args.length;
        for (const arg of expr.args) {
          evalExpr(arg);
          pushAcc();
        }
        for (let i = 0; i < Math.min(n, REGISTER_ARG_COUNT); i++) {
          emit('movsd', mem('rsp', SPILL_SIZE * (n - 1 - i)), reg(xmm(i)));
        }
        emit('callq', label(expr.callee));
        if (n > 0) emit('add', imm(SPILL_SIZE * n), reg('rsp'));
        return;
      }
    }
  };
  const skipExpr = (expr: ExprNode): void => {
    walkLiterals(expr, (text) => {
      poolEntry(text);
    });
  };

  emit('push', reg('rbp'));
  emit('mov', reg('rsp'), reg('rbp'));
  if (layout.frameSize > 0) {
    emit('sub', imm(layout.frameSize), reg('rsp'));
    for (const p of layout.registerParams) {
      emit('movsd', reg(xmm(p.index)), mem('rbp', p.offset));
    }
  }

  fn.body.forEach((stmt, i) => {
    if (i >= layout.liveCount) {
      skipExpr(stmt.value);
      return;
    }
    if (stmt.kind === 'Return') {
      evalExpr(stmt.value);
      return;
    }
    if (!layout.reads.has(stmt.name)) {
      skipExpr(stmt.value);
      return;
    }
    evalExpr(stmt.value);
    emit('movsd', reg('xmm0'), slot(stmt.name));
  });

  emit('leaveq');
  emit('retq');

  return { name: fn.name, arity: fn.params.length, frameSize: layout.frameSize, instructions: out };
}

/**
 * Lower a validated program to x86-64 instructions plus a sorted data section.
 *
 * Never fails for a program accepted by `validateProgram`. Literal occurrences become pool
 * entries named `_c_const_<function>_<n>` in source order, including literals in code that is
 * not emitted (assignments to locals nobody reads, statements after `return`).
 */
export function emitProgram(program: ProgramNode, env: CompileEnv): EmittedProgram {
  const data: DataEntry[] = [];
  for (const [name, value] of env.consts) {
    data.push({ name, value, origin: { kind: 'const' } });
  }

  const functions = program.functions.map((fn) =>
    emitFunction(fn, layoutFunction(fn, env), data),
  );

  return { functions, data: data.sort(compareNames) };
}
