/**
 * EXPRESSION ENGINE — Types
 *
 * Restricted formula language used by derived metrics and alert rules.
 */

import { AppError } from '../../common/errors.js';

export type ExpressionValue = number | boolean;

/**
 * Values bound to declared variables. `null`/`undefined` means "declared but
 * no value available" and raises MISSING_VALUE when read.
 */
export type ExpressionScope = Readonly<Record<string, number | null | undefined>>;

export type ExpressionErrorKind =
  | 'SYNTAX'
  | 'UNKNOWN_SYMBOL'
  | 'NOT_CALLABLE'
  | 'TYPE'
  | 'ARITY'
  | 'MISSING_VALUE'
  | 'ARITHMETIC';

export class ExpressionError extends AppError {
  readonly kind: ExpressionErrorKind;
  readonly position?: number;

  constructor(kind: ExpressionErrorKind, message: string, position?: number) {
    super('EXPRESSION_ERROR', message, 400);
    this.kind = kind;
    this.position = position;
  }
}

// ═══════════════════════════════════════════════════════════════
// TOKENS
// ═══════════════════════════════════════════════════════════════

export type TokenKind = 'number' | 'identifier' | 'operator' | 'lparen' | 'rparen' | 'comma' | 'eof';

export interface Token {
  kind: TokenKind;
  text: string;
  pos: number;
}

// ═══════════════════════════════════════════════════════════════
// AST
// ═══════════════════════════════════════════════════════════════

export type ArithmeticOp = '+' | '-' | '*' | '/' | '%' | '**';
export type CompareOp = '<' | '<=' | '>' | '>=' | '==' | '!=';
export type LogicalOp = 'and' | 'or';
export type UnaryOp = '-' | '+' | 'not';

export type ExprNode =
  | { type: 'Number'; value: number }
  | { type: 'Boolean'; value: boolean }
  | { type: 'Identifier'; name: string; pos: number }
  | { type: 'Unary'; op: UnaryOp; operand: ExprNode }
  | { type: 'Binary'; op: ArithmeticOp; left: ExprNode; right: ExprNode }
  | { type: 'Compare'; first: ExprNode; rest: Array<{ op: CompareOp; operand: ExprNode }> }
  | { type: 'Logical'; op: LogicalOp; left: ExprNode; right: ExprNode }
  | { type: 'Call'; callee: string; args: ExprNode[]; pos: number };

export interface CompiledExpression {
  source: string;
  ast: ExprNode;
  /** Declared variables the expression actually reads, in first-use order. */
  variables: string[];
}

export interface EvaluateOptions {
  /**
   * `error` raises ARITHMETIC on division or modulo by zero;
   * `ieee` yields Infinity/NaN and lets the caller decide.
   */
  divisionByZero?: 'error' | 'ieee';
}
