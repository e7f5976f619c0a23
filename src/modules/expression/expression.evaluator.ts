/**
 * EXPRESSION ENGINE — Compiler & Evaluator
 *
 * compileExpression() parses once and resolves every identifier against an
 * explicit symbol table; evaluate() walks the tree with a scope of values.
 */

import { parseExpression } from './expression.parser.js';
import {
  ExpressionError,
  type ArithmeticOp,
  type CompareOp,
  type CompiledExpression,
  type EvaluateOptions,
  type ExprNode,
  type ExpressionScope,
  type ExpressionValue,
} from './expression.types.js';

// ═══════════════════════════════════════════════════════════════
// BUILT-IN FUNCTIONS
// ═══════════════════════════════════════════════════════════════

interface BuiltinFunction {
  minArgs: number;
  maxArgs: number;
  apply: (args: number[]) => number;
}

const FUNCTIONS: Readonly<Record<string, BuiltinFunction>> = {
  abs: { minArgs: 1, maxArgs: 1, apply: ([x]) => Math.abs(x) },
  min: { minArgs: 2, maxArgs: Infinity, apply: args => Math.min(...args) },
  max: { minArgs: 2, maxArgs: Infinity, apply: args => Math.max(...args) },
};

function lookupFunction(name: string): BuiltinFunction | undefined {
  return Object.hasOwn(FUNCTIONS, name) ? FUNCTIONS[name] : undefined;
}

// ═══════════════════════════════════════════════════════════════
// COMPILE
// ═══════════════════════════════════════════════════════════════

/**
 * Parses `source` and checks it against the declared variable names.
 * Throws ExpressionError (SYNTAX, UNKNOWN_SYMBOL, NOT_CALLABLE, TYPE, ARITY).
 */
export function compileExpression(source: string, variables: Iterable<string>): CompiledExpression {
  const declared = new Set(variables);
  const ast = parseExpression(source);
  const used: string[] = [];

  const check = (node: ExprNode): void => {
    switch (node.type) {
      case 'Number':
      case 'Boolean':
        return;

      case 'Identifier':
        if (declared.has(node.name)) {
          if (!used.includes(node.name)) used.push(node.name);
          return;
        }
        if (lookupFunction(node.name)) {
          throw new ExpressionError(
            'TYPE',
            `Function "${node.name}" must be called, not used as a value (position ${node.pos})`,
            node.pos
          );
        }
        throw new ExpressionError('UNKNOWN_SYMBOL', `Unknown name "${node.name}" at position ${node.pos}`, node.pos);

      case 'Unary':
        check(node.operand);
        return;

      case 'Binary':
      case 'Logical':
        check(node.left);
        check(node.right);
        return;

      case 'Compare':
        check(node.first);
        node.rest.forEach(r => check(r.operand));
        return;

      case 'Call': {
        const fn = lookupFunction(node.callee);
        if (!fn) {
          if (declared.has(node.callee)) {
            throw new ExpressionError('NOT_CALLABLE', `"${node.callee}" is not a function`, node.pos);
          }
          throw new ExpressionError('UNKNOWN_SYMBOL', `Unknown function "${node.callee}"`, node.pos);
        }
        if (node.args.length < fn.minArgs || node.args.length > fn.maxArgs) {
          const expected = fn.minArgs === fn.maxArgs ? `${fn.minArgs}` : `at least ${fn.minArgs}`;
          throw new ExpressionError(
            'ARITY',
            `${node.callee}() takes ${expected} argument(s), got ${node.args.length}`,
            node.pos
          );
        }
        node.args.forEach(check);
        return;
      }
    }
  };

  check(ast);
  return { source, ast, variables: used };
}

// ═══════════════════════════════════════════════════════════════
// EVALUATE
// ═══════════════════════════════════════════════════════════════

export function isTruthy(value: ExpressionValue): boolean {
  if (typeof value === 'boolean') return value;
  return value !== 0 && !Number.isNaN(value);
}

function toNumber(value: ExpressionValue): number {
  return typeof value === 'boolean' ? (value ? 1 : 0) : value;
}

function compare(op: CompareOp, a: number, b: number): boolean {
  switch (op) {
    case '<':
      return a < b;
    case '<=':
      return a <= b;
    case '>':
      return a > b;
    case '>=':
      return a >= b;
    case '==':
      return a === b;
    case '!=':
      return a !== b;
  }
}

function arithmetic(op: ArithmeticOp, a: number, b: number, strictDivision: boolean): number {
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      if (b === 0 && strictDivision) throw new ExpressionError('ARITHMETIC', 'Division by zero');
      return a / b;
    case '%':
      if (b === 0) {
        if (strictDivision) throw new ExpressionError('ARITHMETIC', 'Modulo by zero');
        return NaN;
      }
      // result takes the sign of the divisor
      return ((a % b) + b) % b;
    case '**':
      return a ** b;
  }
}

/**
 * Evaluates a compiled expression. `and`/`or` short-circuit and return the
 * deciding operand. Reading a declared name with no value throws MISSING_VALUE.
 */
export function evaluate(
  compiled: CompiledExpression,
  scope: ExpressionScope,
  options: EvaluateOptions = {}
): ExpressionValue {
  const strictDivision = options.divisionByZero === 'error';

  const walk = (node: ExprNode): ExpressionValue => {
    switch (node.type) {
      case 'Number':
      case 'Boolean':
        return node.value;

      case 'Identifier': {
        const value = Object.hasOwn(scope, node.name) ? scope[node.name] : undefined;
        if (value === null || value === undefined) {
          throw new ExpressionError('MISSING_VALUE', `No value for "${node.name}"`, node.pos);
        }
        return value;
      }

      case 'Unary': {
        const operand = walk(node.operand);
        if (node.op === 'not') return !isTruthy(operand);
        return node.op === '-' ? -toNumber(operand) : toNumber(operand);
      }

      case 'Binary':
        return arithmetic(node.op, toNumber(walk(node.left)), toNumber(walk(node.right)), strictDivision);

      case 'Compare': {
        let left = toNumber(walk(node.first));
        for (const { op, operand } of node.rest) {
          const right = toNumber(walk(operand));
          if (!compare(op, left, right)) return false;
          left = right;
        }
        return true;
      }

      case 'Logical': {
        const left = walk(node.left);
        if (node.op === 'and') return isTruthy(left) ? walk(node.right) : left;
        return isTruthy(left) ? left : walk(node.right);
      }

      case 'Call': {
        const fn = lookupFunction(node.callee);
        if (!fn) throw new ExpressionError('UNKNOWN_SYMBOL', `Unknown function "${node.callee}"`, node.pos);
        return fn.apply(node.args.map(arg => toNumber(walk(arg))));
      }
    }
  };

  return walk(compiled.ast);
}

/**
 * Compile-and-evaluate convenience. The scope's keys are the declared names.
 */
export function evaluateExpression(
  source: string,
  scope: ExpressionScope,
  options: EvaluateOptions = {}
): ExpressionValue {
  return evaluate(compileExpression(source, Object.keys(scope)), scope, options);
}
