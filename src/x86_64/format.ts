/**
 * x86-64 instruction model and AT&T-syntax formatting for the SSE2 subset emitted by the backend.
 */

export type GpRegister = 'rbp' | 'rsp' | 'rip';
export type XmmRegister = `xmm${0 | 1 | 2 | 3 | 4 | 5 | 6 | 7}`;
export type Register = GpRegister | XmmRegister;

export type Mnemonic =
  | 'push'
  | 'mov'
  | 'sub'
  | 'add'
  | 'movsd'
  | 'movaps'
  | 'addsd'
  | 'subsd'
  | 'mulsd'
  | 'divsd'
  | 'callq'
  | 'leaveq'
  | 'retq';

export type Operand =
  | { kind: 'Reg'; name: Register }
  | { kind: 'Imm'; value: number }
  /** `disp(%base)`; `disp` is a byte offset, or a symbol for `%rip`-relative data. */
  | { kind: 'Mem'; base: GpRegister; disp: number | string }
  | { kind: 'Label'; name: string };

export interface Instruction {
  mnemonic: Mnemonic;
  /** AT&T order: sources first, destination last. */
  operands: Operand[];
}

const XMM: readonly XmmRegister[] = [
  'xmm0',
  'xmm1',
  'xmm2',
  'xmm3',
  'xmm4',
  'xmm5',
  'xmm6',
  'xmm7',
];

export const reg = (name: Register): Operand => ({ kind: 'Reg', name });
export const imm = (value: number): Operand => ({ kind: 'Imm', value });
export const mem = (base: GpRegister, disp: number | string): Operand => ({
  kind: 'Mem',
  base,
  disp,
});
export const label = (name: string): Operand => ({ kind: 'Label', name });

export function xmm(index: number): XmmRegister {
  const r = XMM[index];
  if (!r) throw new Error(`No argument register %xmm${index}.`);
  return r;
}

/**
 * Signed lowercase hex as printed by objdump: `0x10`, `-0x8`.
 */
export function hex(n: number): string {
  return n < 0 ? `-0x${(-n).toString(16)}` : `0x${n.toString(16)}`;
}

export function formatOperand(op: Operand): string {
  switch (op.kind) {
    case 'Reg':
      return `%${op.name}`;
    case 'Imm':
      return `$${hex(op.value)}`;
    case 'Mem': {
      const disp = typeof op.disp === 'string' ? op.disp : op.disp === 0 ? '' : hex(op.disp);
      return `${disp}(%${op.base})`;
    }
    case 'Label':
      return op.name;
  }
}

/**
 * One indented line: mnemonic padded to 8 columns, then comma-separated operands.
 */
export function formatInstruction(instr: Instruction): string {
  if (instr.operands.length === 0) return `    ${instr.mnemonic}`;
  return `    ${instr.mnemonic.padEnd(8, ' ')}${instr.operands.map(formatOperand).join(',')}`;
}
