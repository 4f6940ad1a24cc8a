import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type {
  CompileFn,
  CompileOutcome,
  CompilerOptions,
  CompileResult,
  PipelineDeps,
} from './pipeline.js';

import type { Artifact, AsmArtifact } from './formats/types.js';
import { defaultFormatWriters } from './formats/index.js';
import { parseSource } from './frontend/parser.js';
import { emitProgram } from './lowering/emit.js';
import { validateProgram } from './semantics/env.js';

function withDefaults(options: CompilerOptions): Required<CompilerOptions> {
  return {
    emitAsm: options.emitAsm ?? true,
    emitMap: options.emitMap ?? false,
    lineEnding: options.lineEnding ?? '\n',
  };
}

/**
 * Compile source text held in memory.
 *
 * Runs lexer, parser, validator and code generator in turn; the first stage that reports an error
 * stops the pipeline and no artifacts are produced.
 */
export function compileSource(
  text: string,
  options: CompilerOptions = {},
  deps: PipelineDeps = { formats: defaultFormatWriters },
  file = '<input>',
): CompileResult {
  const diagnostics: Diagnostic[] = [];

  const program = parseSource(file, text, diagnostics);
  if (!program || hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const env = validateProgram(program, diagnostics);
  if (!env || hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const emitted = emitProgram(program, env);
  const emit = withDefaults(options);
  const artifacts: Artifact[] = [];

  if (emit.emitAsm) {
    artifacts.push(deps.formats.writeAsm(emitted, { lineEnding: emit.lineEnding }));
  }
  if (emit.emitMap) {
    if (deps.formats.writeMap) {
      artifacts.push(deps.formats.writeMap(emitted, { lineEnding: emit.lineEnding }));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitMap=true but no map writer is configured; skipping .map artifact.',
        file,
      });
    }
  }

  return { diagnostics, artifacts };
}

/**
 * Compile a program starting from an entry file on disk.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);
  let text: string;
  try {
    text = await readFile(entryPath, 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read entry file: ${String(err)}`,
          file: entryPath,
        },
      ],
      artifacts: [],
    };
  }
  return compileSource(text, options, deps, entryPath);
};

/**
 * Compile source text to assembly, reducing the result to success or the single error message.
 */
export function compileToAssembly(text: string): CompileOutcome {
  const res = compileSource(text, { emitAsm: true, emitMap: false });
  const error = res.diagnostics.find((d) => d.severity === 'error');
  if (error) return { ok: false, message: error.message, diagnostic: error };

  const asm = res.artifacts.find((a): a is AsmArtifact => a.kind === 'asm');
  if (!asm) throw new Error('compileToAssembly: pipeline produced no assembly artifact');
  return { ok: true, assembly: asm.text };
}
