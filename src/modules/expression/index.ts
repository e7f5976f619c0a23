/**
 * EXPRESSION ENGINE — Public API
 */

export * from './expression.types.js';
export { tokenize } from './expression.lexer.js';
export { parseExpression } from './expression.parser.js';
export {
  compileExpression,
  evaluate,
  evaluateExpression,
  isTruthy,
} from './expression.evaluator.js';
