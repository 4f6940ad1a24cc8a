import type { EmittedProgram } from '../lowering/emit.js';
import { formatInstruction } from '../x86_64/format.js';
import type { AsmArtifact, WriteAsmOptions } from './types.js';

/**
 * Create a deterministic `.s` artifact: one block per function, then the data section.
 */
export function writeAsm(program: EmittedProgram, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';

  const lines: string[] = [];
  lines.push('.section .text');
  lines.push('.globl main');
  lines.push('');

  for (const fn of program.functions) {
    lines.push(`${fn.name}:`);
    for (const instr of fn.instructions) lines.push(formatInstruction(instr));
    lines.push('');
  }

  lines.push('');
  for (const entry of program.data) {
    lines.push(`${entry.name}: .double ${entry.value}`);
  }

  return { kind: 'asm', text: lines.join(lineEnding) + lineEnding };
}
