/**
 * @fileoverview Arithmetic expression evaluator
 *
 * Recursive descent over + - * / % ^, parentheses and unary signs.
 * Full-width and multiplication/division signs (×, ÷, （, ）) are accepted.
 */

import { ValidationError } from '../errors/AssistantErrors';

type Token =
  | { type: 'number'; value: number }
  | { type: 'operator'; value: '+' | '-' | '*' | '/' | '%' | '^' }
  | { type: 'paren'; value: '(' | ')' };

const OPERATORS = '+-*/%^';

function normalize(expression: string): string {
  return expression
    .replace(/×/g, '*')
    .replace(/÷/g, '/')
    .replace(/（/g, '(')
    .replace(/）/g, ')')
    .replace(/\*\*/g, '^');
}

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  const text = normalize(expression);
  let i = 0;

  while (i < text.length) {
    const char = text[i];
    if (/\s/.test(char)) {
      i++;
      continue;
    }
    if (/[0-9.]/.test(char)) {
      const match = /^\d*\.?\d+(?:e[+-]?\d+)?|^\d+\.?/i.exec(text.slice(i));
      if (!match) {
        throw invalid(expression, `unexpected '${char}'`);
      }
      tokens.push({ type: 'number', value: Number(match[0]) });
      i += match[0].length;
      continue;
    }
    if (char === '(' || char === ')') {
      tokens.push({ type: 'paren', value: char });
      i++;
      continue;
    }
    if (OPERATORS.includes(char)) {
      tokens.push({ type: 'operator', value: toOperator(char) });
      i++;
      continue;
    }
    throw invalid(expression, `unexpected '${char}'`);
  }

  if (tokens.length === 0) {
    throw invalid(expression, 'empty expression');
  }
  return tokens;
}

function toOperator(char: string): '+' | '-' | '*' | '/' | '%' | '^' {
  switch (char) {
    case '+':
    case '-':
    case '*':
    case '/':
    case '%':
    case '^':
      return char;
    default:
      throw ValidationError.create(`Unknown operator ${char}`, 'evaluate_expression');
  }
}

function invalid(expression: string, reason: string): ValidationError {
  return ValidationError.create(`Invalid expression "${expression}": ${reason}`, 'evaluate_expression', { expression });
}

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[], private readonly source: string) {}

  parse(): number {
    const value = this.expression();
    if (this.position < this.tokens.length) {
      throw invalid(this.source, 'trailing input');
    }
    return value;
  }

  // expression := term (('+' | '-') term)*
  private expression(): number {
    let value = this.term();
    for (let token = this.peek(); token?.type === 'operator' && (token.value === '+' || token.value === '-'); token = this.peek()) {
      this.position++;
      const right = this.term();
      value = token.value === '+' ? value + right : value - right;
    }
    return value;
  }

  // term := unary (('*' | '/' | '%') unary)*
  private term(): number {
    let value = this.unary();
    for (
      let token = this.peek();
      token?.type === 'operator' && (token.value === '*' || token.value === '/' || token.value === '%');
      token = this.peek()
    ) {
      this.position++;
      const right = this.unary();
      if ((token.value === '/' || token.value === '%') && right === 0) {
        throw invalid(this.source, 'division by zero');
      }
      value = token.value === '*' ? value * right : token.value === '/' ? value / right : value % right;
    }
    return value;
  }

  private unary(): number {
    const token = this.peek();
    if (token?.type === 'operator' && (token.value === '-' || token.value === '+')) {
      this.position++;
      const operand = this.unary();
      return token.value === '-' ? -operand : operand;
    }
    return this.power();
  }

  // Right associative: 2 ^ 3 ^ 2 = 2 ^ 9
  private power(): number {
    const base = this.primary();
    const token = this.peek();
    if (token?.type === 'operator' && token.value === '^') {
      this.position++;
      return Math.pow(base, this.unary());
    }
    return base;
  }

  private primary(): number {
    const token = this.peek();
    if (!token) {
      throw invalid(this.source, 'unexpected end');
    }
    this.position++;
    if (token.type === 'number') {
      return token.value;
    }
    if (token.type === 'paren' && token.value === '(') {
      const value = this.expression();
      const closing = this.peek();
      if (closing?.type !== 'paren' || closing.value !== ')') {
        throw invalid(this.source, 'missing )');
      }
      this.position++;
      return value;
    }
    throw invalid(this.source, `unexpected '${token.value}'`);
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }
}

/**
 * Evaluate an arithmetic expression. Throws ValidationError on syntax
 * errors, division by zero and non-finite results.
 */
export function evaluateExpression(expression: string): number {
  const result = new Parser(tokenize(expression), expression).parse();
  if (!Number.isFinite(result)) {
    throw invalid(expression, 'result is not finite');
  }
  return result;
}

/**
 * Integers print as-is; fractions are rounded to 10 decimal places
 */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  return String(parseFloat(value.toFixed(10)));
}
