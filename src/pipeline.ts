import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';

/**
 * Options that influence which artifacts are produced and how they are written.
 */
export interface CompilerOptions {
  /** Emit assembly (`.s`). Defaults to `true`. */
  emitAsm?: boolean;
  /** Emit a symbol map (`.map`). Defaults to `false`. */
  emitMap?: boolean;
  /** Line ending for text artifacts. Defaults to `\n`. */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 *
 * When `diagnostics` contains an error, it contains exactly one and `artifacts` is empty.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can stay pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;

/**
 * Success/failure view of a single in-memory compile.
 */
export type CompileOutcome =
  | { ok: true; assembly: string }
  | { ok: false; message: string; diagnostic: Diagnostic };
