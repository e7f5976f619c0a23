/**
 * Expression Engine Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ExpressionError,
  compileExpression,
  evaluate,
  evaluateExpression,
  tokenize,
  type ExpressionErrorKind,
} from '../index.js';

function errorKind(fn: () => unknown): ExpressionErrorKind | 'OTHER' | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof ExpressionError ? err.kind : 'OTHER';
  }
  return undefined;
}

describe('Expression Engine', () => {
  describe('tokenize', () => {
    it('should split numbers, names and two-char operators', () => {
      const tokens = tokenize('a**2 >= .5');
      expect(tokens.map(t => t.text)).toEqual(['a', '**', '2', '>=', '.5', '']);
      expect(tokens[4].pos).toBe(8);
    });

    it('should reject a lone "="', () => {
      expect(errorKind(() => tokenize('a = 1'))).toBe('SYNTAX');
    });
  });

  describe('arithmetic', () => {
    it('should compute a spread in basis points', () => {
      const result = evaluateExpression('(effr - iorb) * 100', { effr: 5.33, iorb: 5.4 });
      expect(typeof result).toBe('number');
      expect(result).toBeCloseTo(-7.0, 10);
    });

    it('should respect precedence', () => {
      expect(evaluateExpression('1 + 2 * 3', {})).toBe(7);
      expect(evaluateExpression('(1 + 2) * 3', {})).toBe(9);
      expect(evaluateExpression('10 - 4 - 3', {})).toBe(3);
    });

    it('should bind ** tighter than unary minus and associate it to the right', () => {
      expect(evaluateExpression('-2 ** 2', {})).toBe(-4);
      expect(evaluateExpression('2 ** 3 ** 2', {})).toBe(512);
      expect(evaluateExpression('2 ** -1', {})).toBe(0.5);
    });

    it('should take the sign of the divisor for modulo', () => {
      expect(evaluateExpression('-7 % 3', {})).toBe(2);
      expect(evaluateExpression('7 % 3', {})).toBe(1);
    });

    it('should accept scientific notation', () => {
      expect(evaluateExpression('1e-3 * 1000', {})).toBe(1);
    });

    it('should treat booleans as 0/1 in arithmetic', () => {
      expect(evaluateExpression('True + 1', {})).toBe(2);
      expect(evaluateExpression('false * 5', {})).toBe(0);
    });

    it('should follow IEEE semantics for division by zero by default', () => {
      expect(evaluateExpression('1 / 0', {})).toBe(Infinity);
      expect(Number.isNaN(evaluateExpression('0 / 0', {}))).toBe(true);
    });

    it('should raise ARITHMETIC for division by zero in strict mode', () => {
      const compiled = compileExpression('value / d1', ['value', 'd1']);
      expect(errorKind(() => evaluate(compiled, { value: 1, d1: 0 }, { divisionByZero: 'error' }))).toBe(
        'ARITHMETIC'
      );
    });
  });

  describe('functions', () => {
    it('should evaluate abs, min and max', () => {
      expect(evaluateExpression('abs(x)', { x: -3 })).toBe(3);
      expect(evaluateExpression('max(1, 4, 2)', {})).toBe(4);
      expect(evaluateExpression('min(x, 0)', { x: -1.5 })).toBe(-1.5);
    });

    it('should reject wrong arity at compile time', () => {
      expect(errorKind(() => compileExpression('abs(1, 2)', []))).toBe('ARITY');
      expect(errorKind(() => compileExpression('min(1)', []))).toBe('ARITY');
    });
  });

  describe('comparison and logic', () => {
    it('should chain comparisons', () => {
      expect(evaluateExpression('1 < 2 < 3', {})).toBe(true);
      expect(evaluateExpression('3 > 2 > 2', {})).toBe(false);
      expect(evaluateExpression('x == 2 != 3', { x: 2 })).toBe(true);
    });

    it('should return the deciding operand from and/or', () => {
      expect(evaluateExpression('0 or 5', {})).toBe(5);
      expect(evaluateExpression('2 and 3', {})).toBe(3);
      expect(evaluateExpression('0 && 3', {})).toBe(0);
      expect(evaluateExpression('4 || 0', {})).toBe(4);
    });

    it('should short-circuit before reading a missing value', () => {
      const compiled = compileExpression('0 and x > 1', ['x']);
      expect(evaluate(compiled, { x: null })).toBe(0);
    });

    it('should negate with not and !', () => {
      expect(evaluateExpression('not 0', {})).toBe(true);
      expect(evaluateExpression('!1', {})).toBe(false);
      expect(evaluateExpression('not x > 5 or x < 0', { x: 3 })).toBe(true);
    });
  });

  describe('compileExpression', () => {
    it('should list referenced variables in first-use order', () => {
      const compiled = compileExpression('b + a * b', ['a', 'b', 'c']);
      expect(compiled.variables).toEqual(['b', 'a']);
    });

    it('should reject unknown names', () => {
      expect(errorKind(() => compileExpression('foo + 1', ['bar']))).toBe('UNKNOWN_SYMBOL');
      expect(errorKind(() => compileExpression('__import__(1)', []))).toBe('UNKNOWN_SYMBOL');
    });

    it('should reject calling a variable', () => {
      expect(errorKind(() => compileExpression('effr(1)', ['effr']))).toBe('NOT_CALLABLE');
    });

    it('should reject a function used as a value', () => {
      expect(errorKind(() => compileExpression('abs + 1', []))).toBe('TYPE');
    });

    it('should reject malformed input', () => {
      expect(errorKind(() => compileExpression('1 +', []))).toBe('SYNTAX');
      expect(errorKind(() => compileExpression('(1 + 2', []))).toBe('SYNTAX');
      expect(errorKind(() => compileExpression('"text"', []))).toBe('SYNTAX');
      expect(errorKind(() => compileExpression('a.b', ['a', 'b']))).toBe('SYNTAX');
      expect(errorKind(() => compileExpression('1 2', []))).toBe('SYNTAX');
      expect(errorKind(() => compileExpression('   ', []))).toBe('SYNTAX');
    });
  });

  describe('evaluate', () => {
    it('should raise MISSING_VALUE for a declared name without a value', () => {
      const compiled = compileExpression('a + 1', ['a']);
      expect(errorKind(() => evaluate(compiled, { a: null }))).toBe('MISSING_VALUE');
      expect(errorKind(() => evaluate(compiled, {}))).toBe('MISSING_VALUE');
    });

    it('should reuse one compiled expression across scopes', () => {
      const compiled = compileExpression('value > 5', ['value']);
      expect(evaluate(compiled, { value: 5.2 })).toBe(true);
      expect(evaluate(compiled, { value: 4.9 })).toBe(false);
    });
  });
});
