import type { DataEntry, EmittedProgram } from '../lowering/emit.js';
import { hex } from '../x86_64/format.js';
import type { MapArtifact, WriteMapOptions } from './types.js';

function originText(entry: DataEntry): string {
  return entry.origin.kind === 'const' ? 'const' : `pool ${entry.origin.function}`;
}

/**
 * Create a `.map` artifact listing function labels (with arity and frame size) and data entries.
 */
export function writeMap(program: EmittedProgram, opts?: WriteMapOptions): MapArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';

  const lines: string[] = [];
  lines.push('; dblc symbol map');
  lines.push('');
  lines.push('; functions:');
  for (const fn of program.functions) {
    lines.push(`func ${fn.name} arity=${fn.arity} frame=${hex(fn.frameSize)}`);
  }
  lines.push('');
  lines.push('; data:');
  for (const entry of program.data) {
    lines.push(`data ${entry.name} = ${entry.value} (${originText(entry)})`);
  }

  return { kind: 'map', text: lines.join(lineEnding) + lineEnding };
}
