export { compile, compileSource, compileToAssembly } from './compile.js';
export type {
  CompileFn,
  CompileOutcome,
  CompileResult,
  CompilerOptions,
  PipelineDeps,
} from './pipeline.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds } from './diagnostics/types.js';
export type { SemanticError, SemanticErrorKind } from './diagnostics/messages.js';
export { semanticErrorMessage } from './diagnostics/messages.js';
export { tokenize } from './frontend/lexer.js';
export type { Token, TokenKind } from './frontend/lexer.js';
export { parseProgram, parseSource } from './frontend/parser.js';
export type * from './frontend/ast.js';
export { validateProgram } from './semantics/env.js';
export type { CompileEnv, LocalRole } from './semantics/env.js';
export { emitProgram } from './lowering/emit.js';
export type { DataEntry, EmittedFunction, EmittedProgram } from './lowering/emit.js';
export { defaultFormatWriters } from './formats/index.js';
export { writeAsm } from './formats/writeAsm.js';
export { writeMap } from './formats/writeMap.js';
export type { Artifact, AsmArtifact, FormatWriters, MapArtifact } from './formats/types.js';
