/**
 * EXPRESSION ENGINE — Parser
 *
 * Recursive descent, lowest precedence first:
 *
 *   or        := and (('or' | '||') and)*
 *   and       := not (('and' | '&&') not)*
 *   not       := ('not' | '!') not | comparison
 *   comparison:= additive (cmpOp additive)*
 *   additive  := term (('+' | '-') term)*
 *   term      := unary (('*' | '/' | '%') unary)*
 *   unary     := ('-' | '+') unary | power
 *   power     := primary ('**' unary)?
 *   primary   := NUMBER | True | False | IDENT | IDENT '(' args ')' | '(' or ')'
 */

import { tokenize } from './expression.lexer.js';
import {
  ExpressionError,
  type ArithmeticOp,
  type CompareOp,
  type ExprNode,
  type Token,
} from './expression.types.js';

const COMPARE_OPS = new Set<string>(['<', '<=', '>', '>=', '==', '!=']);
const KEYWORDS = new Set(['and', 'or', 'not']);

function isCompareOp(text: string): text is CompareOp {
  return COMPARE_OPS.has(text);
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ExprNode {
    const node = this.parseOr();
    const tail = this.peek();
    if (tail.kind !== 'eof') {
      throw this.unexpected(tail);
    }
    return node;
  }

  // ─────────────────────────────────────────────────────────────
  // Token helpers
  // ─────────────────────────────────────────────────────────────

  private peek(): Token {
    return this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.index++;
    return token;
  }

  private matchOperator(...ops: string[]): string | null {
    const token = this.peek();
    if (token.kind === 'operator' && ops.includes(token.text)) {
      this.index++;
      return token.text;
    }
    return null;
  }

  private matchKeyword(...words: string[]): boolean {
    const token = this.peek();
    if (token.kind === 'identifier' && words.includes(token.text)) {
      this.index++;
      return true;
    }
    return false;
  }

  private expect(kind: Token['kind'], what: string): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      throw new ExpressionError(
        'SYNTAX',
        `Expected ${what} at position ${token.pos}, found ${describe(token)}`,
        token.pos
      );
    }
    return this.next();
  }

  private unexpected(token: Token): ExpressionError {
    return new ExpressionError('SYNTAX', `Unexpected ${describe(token)} at position ${token.pos}`, token.pos);
  }

  // ─────────────────────────────────────────────────────────────
  // Grammar
  // ─────────────────────────────────────────────────────────────

  private parseOr(): ExprNode {
    let left = this.parseAnd();
    while (this.matchKeyword('or') || this.matchOperator('||')) {
      left = { type: 'Logical', op: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExprNode {
    let left = this.parseNot();
    while (this.matchKeyword('and') || this.matchOperator('&&')) {
      left = { type: 'Logical', op: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ExprNode {
    if (this.matchKeyword('not') || this.matchOperator('!')) {
      return { type: 'Unary', op: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExprNode {
    const first = this.parseAdditive();
    const rest: Array<{ op: CompareOp; operand: ExprNode }> = [];

    for (;;) {
      const token = this.peek();
      if (token.kind !== 'operator' || !isCompareOp(token.text)) break;
      this.index++;
      rest.push({ op: token.text, operand: this.parseAdditive() });
    }

    return rest.length ? { type: 'Compare', first, rest } : first;
  }

  private parseAdditive(): ExprNode {
    let left = this.parseTerm();
    for (;;) {
      const op = this.matchOperator('+', '-');
      if (op !== '+' && op !== '-') return left;
      left = { type: 'Binary', op, left, right: this.parseTerm() };
    }
  }

  private parseTerm(): ExprNode {
    let left = this.parseUnary();
    for (;;) {
      const op = this.matchOperator('*', '/', '%');
      if (op !== '*' && op !== '/' && op !== '%') return left;
      const arith: ArithmeticOp = op;
      left = { type: 'Binary', op: arith, left, right: this.parseUnary() };
    }
  }

  private parseUnary(): ExprNode {
    const op = this.matchOperator('-', '+');
    if (op === '-' || op === '+') {
      return { type: 'Unary', op, operand: this.parseUnary() };
    }
    return this.parsePower();
  }

  private parsePower(): ExprNode {
    const base = this.parsePrimary();
    if (this.matchOperator('**')) {
      return { type: 'Binary', op: '**', left: base, right: this.parseUnary() };
    }
    return base;
  }

  private parsePrimary(): ExprNode {
    const token = this.next();

    switch (token.kind) {
      case 'number': {
        const value = Number(token.text);
        if (!Number.isFinite(value)) {
          throw new ExpressionError('SYNTAX', `Invalid number "${token.text}" at position ${token.pos}`, token.pos);
        }
        return { type: 'Number', value };
      }

      case 'identifier': {
        if (token.text === 'True' || token.text === 'true') return { type: 'Boolean', value: true };
        if (token.text === 'False' || token.text === 'false') return { type: 'Boolean', value: false };
        if (KEYWORDS.has(token.text)) throw this.unexpected(token);

        if (this.peek().kind === 'lparen') {
          this.next();
          return { type: 'Call', callee: token.text, args: this.parseArguments(), pos: token.pos };
        }
        return { type: 'Identifier', name: token.text, pos: token.pos };
      }

      case 'lparen': {
        const inner = this.parseOr();
        this.expect('rparen', '")"');
        return inner;
      }

      default:
        throw this.unexpected(token);
    }
  }

  private parseArguments(): ExprNode[] {
    const args: ExprNode[] = [];
    if (this.peek().kind === 'rparen') {
      this.next();
      return args;
    }

    for (;;) {
      args.push(this.parseOr());
      if (this.peek().kind === 'comma') {
        this.next();
        continue;
      }
      this.expect('rparen', '"," or ")"');
      return args;
    }
  }
}

function describe(token: Token): string {
  return token.kind === 'eof' ? 'end of expression' : `"${token.text}"`;
}

export function parseExpression(source: string): ExprNode {
  if (!source.trim()) {
    throw new ExpressionError('SYNTAX', 'Expression is empty', 0);
  }
  return new Parser(tokenize(source)).parse();
}
