/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `DBL401`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 *
 * The `DBL4xx` range maps one-to-one onto the semantic error kinds; their message text is fixed
 * (see `./messages.ts`). Lexical and parse diagnostics carry free-form messages.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'DBL000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'DBL001',

  /** Unrecognized character sequence or unterminated comment. */
  LexError: 'DBL100',

  /** Token stream does not match the grammar. */
  ParseError: 'DBL200',

  /** Constant name declared more than once. */
  DuplicateConstant: 'DBL401',

  /** Function name declared more than once. */
  DuplicateFunction: 'DBL402',

  /** Constant name uses the reserved constant-pool naming scheme. */
  ReservedConstantName: 'DBL403',

  /** Function name already taken by a constant. */
  FunctionCollidesWithConstant: 'DBL404',

  /** Local variable name already taken by a constant. */
  LocalCollidesWithConstant: 'DBL405',

  /** Local variable name already taken by a function. */
  LocalCollidesWithFunction: 'DBL406',

  /** Parameter name already taken by a constant. */
  ArgCollidesWithConstant: 'DBL407',

  /** Parameter name already taken by a function. */
  ArgCollidesWithFunction: 'DBL408',

  /** Same parameter name listed twice in one function. */
  DuplicateArgument: 'DBL409',

  /** Identifier is neither a parameter, an earlier local, nor a constant. */
  UnknownVariable: 'DBL410',

  /** Call to a function that is not declared. */
  UnknownFunctionCall: 'DBL411',

  /** Call argument count differs from the callee's parameter count. */
  ArityMismatch: 'DBL412',

  /** `main` declared with parameters. */
  MainHasArguments: 'DBL413',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
