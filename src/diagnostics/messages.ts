import type { DiagnosticId } from './types.js';
import { DiagnosticIds } from './types.js';

/**
 * Semantic error kinds with the parameters each message takes.
 */
export type SemanticError =
  | { kind: 'DuplicateConstant'; name: string }
  | { kind: 'DuplicateFunction'; name: string }
  | { kind: 'ReservedConstantName'; name: string }
  | { kind: 'FunctionCollidesWithConstant'; name: string }
  | { kind: 'LocalCollidesWithConstant'; name: string }
  | { kind: 'LocalCollidesWithFunction'; name: string }
  | { kind: 'ArgCollidesWithConstant'; fn: string; name: string }
  | { kind: 'ArgCollidesWithFunction'; fn: string; name: string }
  | { kind: 'DuplicateArgument'; fn: string; name: string }
  | { kind: 'UnknownVariable'; fn: string; name: string }
  | { kind: 'UnknownFunctionCall'; fn: string; name: string }
  | { kind: 'ArityMismatch'; fn: string; caller: string; expected: number; got: number }
  | { kind: 'MainHasArguments' };

export type SemanticErrorKind = SemanticError['kind'];

export function semanticErrorId(kind: SemanticErrorKind): DiagnosticId {
  return DiagnosticIds[kind];
}

/**
 * Render the fixed message text for a semantic error.
 */
export function semanticErrorMessage(err: SemanticError): string {
  switch (err.kind) {
    case 'DuplicateConstant':
      return `constant '${err.name}' is defined twice`;
    case 'DuplicateFunction':
      return `function '${err.name}' is defined twice`;
    case 'ReservedConstantName':
      return `cant define constant '${err.name}' (do not define it manually)`;
    case 'FunctionCollidesWithConstant':
      return `cant define function '${err.name}': there is constant with that name`;
    case 'LocalCollidesWithConstant':
      return `cant create local variable with name '${err.name}': there is constant with that name`;
    case 'LocalCollidesWithFunction':
      return `cant create local variable with name '${err.name}': there is function with that name`;
    case 'ArgCollidesWithConstant':
      return (
        `cant create argument for '${err.fn}' with name '${err.name}': ` +
        `there is constant with that name`
      );
    case 'ArgCollidesWithFunction':
      return (
        `cant create argument for '${err.fn}' with name '${err.name}': ` +
        `there is function with that name`
      );
    case 'DuplicateArgument':
      return `redefinition of argument '${err.name}' in function '${err.fn}'`;
    case 'UnknownVariable':
      return `unknown variable '${err.name}' in function '${err.fn}'`;
    case 'UnknownFunctionCall':
      return `unknown function call '${err.name}' in '${err.fn}'`;
    case 'ArityMismatch':
      return (
        `invalid arguments count for function call '${err.fn}': ` +
        `expected ${err.expected}, but got ${err.got} (in function '${err.caller}')`
      );
    case 'MainHasArguments':
      return 'main function cant have any arguments';
  }
}
