/**
 * Frontend AST contracts for the dblc language.
 *
 * This module defines types/interfaces only (no parsing/semantics).
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the file text. */
  offset: number;
}

/**
 * Source span with inclusive start and end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * Parsed compilation unit: global constants and functions, each in source order.
 */
export interface ProgramNode extends BaseNode {
  kind: 'Program';
  file: string;
  constants: ConstDeclNode[];
  functions: FuncDeclNode[];
}

/**
 * Global constant: `name = number;`
 */
export interface ConstDeclNode extends BaseNode {
  kind: 'ConstDecl';
  name: string;
  /** Literal text exactly as written, sign included. */
  value: string;
}

export interface ParamNode extends BaseNode {
  kind: 'Param';
  name: string;
}

/**
 * Function declaration: `fun name(params) { body }`
 */
export interface FuncDeclNode extends BaseNode {
  kind: 'FuncDecl';
  name: string;
  params: ParamNode[];
  body: StatementNode[];
}

/**
 * Local assignment: `name = expr;`
 */
export interface AssignStmtNode extends BaseNode {
  kind: 'Assign';
  name: string;
  value: ExprNode;
}

/**
 * `return expr;`
 */
export interface ReturnStmtNode extends BaseNode {
  kind: 'Return';
  value: ExprNode;
}

export type StatementNode = AssignStmtNode | ReturnStmtNode;

export type BinaryOp = '+' | '-' | '*' | '/';

export interface LiteralExprNode extends BaseNode {
  kind: 'Literal';
  /** Numeric text exactly as written. */
  text: string;
}

export interface NameExprNode extends BaseNode {
  kind: 'Name';
  name: string;
}

export interface BinaryExprNode extends BaseNode {
  kind: 'Binary';
  op: BinaryOp;
  left: ExprNode;
  right: ExprNode;
}

export interface CallExprNode extends BaseNode {
  kind: 'Call';
  callee: string;
  args: ExprNode[];
}

/**
 * Parenthesized expression. Evaluates exactly like `expr`.
 */
export interface GroupExprNode extends BaseNode {
  kind: 'Group';
  expr: ExprNode;
}

export type ExprNode =
  | LiteralExprNode
  | NameExprNode
  | BinaryExprNode
  | CallExprNode
  | GroupExprNode;
