import type { EmittedProgram } from '../lowering/emit.js';

/**
 * Options shared by the text writers.
 */
export interface WriteTextOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

export interface WriteAsmOptions extends WriteTextOptions {}

export interface WriteMapOptions extends WriteTextOptions {}

/**
 * AT&T assembly source (`.s`).
 */
export interface AsmArtifact {
  kind: 'asm';
  text: string;
}

/**
 * Human-readable symbol map (`.map`): function labels and data entries.
 */
export interface MapArtifact {
  kind: 'map';
  text: string;
}

/**
 * Any artifact a compile can produce.
 */
export type Artifact = AsmArtifact | MapArtifact;

export type WriteAsmFn = (program: EmittedProgram, opts?: WriteAsmOptions) => AsmArtifact;

export type WriteMapFn = (program: EmittedProgram, opts?: WriteMapOptions) => MapArtifact;

/**
 * Writer set injected into the pipeline. `writeMap` is optional.
 */
export interface FormatWriters {
  writeAsm: WriteAsmFn;
  writeMap?: WriteMapFn;
}
