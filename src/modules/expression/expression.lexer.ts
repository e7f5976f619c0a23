/**
 * EXPRESSION ENGINE — Lexer
 */

import { ExpressionError, type Token } from './expression.types.js';

const TWO_CHAR_OPERATORS = new Set(['**', '<=', '>=', '==', '!=', '&&', '||']);
const ONE_CHAR_OPERATORS = new Set(['+', '-', '*', '/', '%', '<', '>', '!']);

const NUMBER_RE = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*/;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source[pos];

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      pos++;
      continue;
    }

    const rest = source.slice(pos);

    const num = NUMBER_RE.exec(rest);
    if (num) {
      tokens.push({ kind: 'number', text: num[0], pos });
      pos += num[0].length;
      continue;
    }

    const ident = IDENTIFIER_RE.exec(rest);
    if (ident) {
      tokens.push({ kind: 'identifier', text: ident[0], pos });
      pos += ident[0].length;
      continue;
    }

    const two = rest.slice(0, 2);
    if (TWO_CHAR_OPERATORS.has(two)) {
      tokens.push({ kind: 'operator', text: two, pos });
      pos += 2;
      continue;
    }

    if (ONE_CHAR_OPERATORS.has(ch)) {
      tokens.push({ kind: 'operator', text: ch, pos });
      pos++;
      continue;
    }

    if (ch === '(') {
      tokens.push({ kind: 'lparen', text: ch, pos });
    } else if (ch === ')') {
      tokens.push({ kind: 'rparen', text: ch, pos });
    } else if (ch === ',') {
      tokens.push({ kind: 'comma', text: ch, pos });
    } else if (ch === '=') {
      throw new ExpressionError('SYNTAX', `Unexpected "=" at position ${pos} (use "==" to compare)`, pos);
    } else {
      throw new ExpressionError('SYNTAX', `Unexpected character "${ch}" at position ${pos}`, pos);
    }
    pos++;
  }

  tokens.push({ kind: 'eof', text: '', pos });
  return tokens;
}
