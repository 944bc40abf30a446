/**
 * Condition evaluation for `if (...)`
 *
 * Two passes: variable substitution rewrites `$name` and bare `$` into
 * literals, then a restricted recursive-descent evaluator handles integer
 * arithmetic, comparisons, boolean logic and `(x, y)` pairs. No host code
 * is ever executed.
 */

import { ConditionError, errorMessage } from '../core/errors.js';
import type { VariableStore } from './types.js';
import { formatValue } from './variables.js';

/**
 * Runtime value: an integer (booleans are 1/0) or a position pair
 */
type EvalValue = number | readonly [number, number];

type TokenType = 'number' | 'word' | 'operator' | 'lparen' | 'rparen' | 'comma';

interface Token {
  type: TokenType;
  text: string;
  pos: number;
}

export type BinaryOperator = '+' | '-' | '*' | '/' | '//' | '%';

export type CompareOperator = '<' | '<=' | '>' | '>=' | '==' | '!=';

type Expr =
  | { kind: 'number'; value: number }
  | { kind: 'pair'; x: Expr; y: Expr }
  | { kind: 'unary'; op: '-' | '+' | '!'; operand: Expr }
  | { kind: 'binary'; op: BinaryOperator; left: Expr; right: Expr }
  | { kind: 'compare'; first: Expr; rest: { op: CompareOperator; right: Expr }[] }
  | { kind: 'logical'; op: 'and' | 'or'; left: Expr; right: Expr }
  | { kind: 'not'; operand: Expr };

const OPERATORS = [
  '//',
  '<=',
  '>=',
  '==',
  '!=',
  '&&',
  '||',
  '<',
  '>',
  '+',
  '-',
  '*',
  '/',
  '%',
  '!',
] as const;

const COMPARE_OPERATORS: readonly string[] = ['<', '<=', '>', '>=', '==', '!='];

/**
 * Result of evaluating an `if` condition
 */
export interface ConditionResult {
  value: boolean;
  /** Condition text after variable substitution */
  expression: string;
  /** Evaluation failure, in which case value is false */
  error: string | null;
}

/** Get character at position, or empty string if out of bounds */
function charAt(input: string, pos: number): string {
  return input[pos] ?? '';
}

/**
 * Replace `$name` with variable values and bare `$` with the last status
 *
 * Names are tried longest first so `$count` never resolves as `$c` + "ount".
 * A `$` that starts no defined name is the status token.
 */
export function substituteVariables(
  text: string,
  store: VariableStore
): string {
  const names = [...store.named.keys()].sort((a, b) => b.length - a.length);
  let result = '';
  let i = 0;

  while (i < text.length) {
    const char = charAt(text, i);
    if (char !== '$') {
      result += char;
      i++;
      continue;
    }

    const name = names.find((n) => text.startsWith(n, i + 1));
    const value = name === undefined ? undefined : store.named.get(name);
    if (name !== undefined && value) {
      result += formatValue(value);
      i += name.length + 1;
    } else {
      result += String(store.lastStatus);
      i++;
    }
  }

  return result;
}

/**
 * Split an expression into tokens
 */
function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const char = charAt(input, i);

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (/\d/.test(char)) {
      let end = i;
      while (/\d/.test(charAt(input, end))) end++;
      tokens.push({ type: 'number', text: input.slice(i, end), pos: i });
      i = end;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      let end = i;
      while (/\w/.test(charAt(input, end))) end++;
      tokens.push({ type: 'word', text: input.slice(i, end), pos: i });
      i = end;
      continue;
    }

    if (char === '(' || char === ')' || char === ',') {
      const type = char === '(' ? 'lparen' : char === ')' ? 'rparen' : 'comma';
      tokens.push({ type, text: char, pos: i });
      i++;
      continue;
    }

    const op = OPERATORS.find((candidate) => input.startsWith(candidate, i));
    if (!op) {
      throw new ConditionError(`Unexpected character '${char}' at position ${i}`);
    }
    tokens.push({ type: 'operator', text: op, pos: i });
    i += op.length;
  }

  return tokens;
}

/**
 * Recursive-descent parser, lowest precedence first:
 * or > and > not > comparison > additive > multiplicative > unary > primary
 */
class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Expr {
    if (this.tokens.length === 0) {
      throw new ConditionError('Empty expression');
    }
    const expr = this.parseOr();
    const extra = this.peek();
    if (extra) {
      throw new ConditionError(
        `Unexpected '${extra.text}' at position ${extra.pos}`
      );
    }
    return expr;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(): Token {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new ConditionError('Unexpected end of expression');
    }
    this.pos++;
    return token;
  }

  private matchText(...texts: string[]): string | null {
    const token = this.peek();
    if (token && (token.type === 'operator' || token.type === 'word')) {
      if (texts.includes(token.text)) {
        this.pos++;
        return token.text;
      }
    }
    return null;
  }

  private expect(type: TokenType, text: string): void {
    const token = this.next();
    if (token.type !== type) {
      throw new ConditionError(
        `Expected '${text}' at position ${token.pos}, got '${token.text}'`
      );
    }
  }

  private parseOr(): Expr {
    let left = this.parseAnd();
    while (this.matchText('||', 'or')) {
      left = { kind: 'logical', op: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expr {
    let left = this.parseNot();
    while (this.matchText('&&', 'and')) {
      left = { kind: 'logical', op: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Expr {
    if (this.matchText('not')) {
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const first = this.parseAdditive();
    const rest: { op: CompareOperator; right: Expr }[] = [];

    for (;;) {
      const op = this.matchText(...COMPARE_OPERATORS);
      if (!isCompareOperator(op)) break;
      rest.push({ op, right: this.parseAdditive() });
    }

    return rest.length === 0 ? first : { kind: 'compare', first, rest };
  }

  private parseAdditive(): Expr {
    let left = this.parseMultiplicative();
    for (;;) {
      const op = this.matchText('+', '-');
      if (op !== '+' && op !== '-') return left;
      left = { kind: 'binary', op, left, right: this.parseMultiplicative() };
    }
  }

  private parseMultiplicative(): Expr {
    let left = this.parseUnary();
    for (;;) {
      const op = this.matchText('*', '/', '//', '%');
      if (op !== '*' && op !== '/' && op !== '//' && op !== '%') return left;
      left = { kind: 'binary', op, left, right: this.parseUnary() };
    }
  }

  private parseUnary(): Expr {
    const op = this.matchText('-', '+', '!');
    if (op === '-' || op === '+' || op === '!') {
      return { kind: 'unary', op, operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expr {
    const token = this.next();

    switch (token.type) {
      case 'number': {
        const value = Number(token.text);
        if (!Number.isSafeInteger(value)) {
          throw new ConditionError(`Integer out of range: ${token.text}`);
        }
        return { kind: 'number', value };
      }
      case 'word': {
        const lower = token.text.toLowerCase();
        if (lower === 'true') return { kind: 'number', value: 1 };
        if (lower === 'false') return { kind: 'number', value: 0 };
        throw new ConditionError(
          `Unknown name '${token.text}' at position ${token.pos}`
        );
      }
      case 'lparen': {
        const inner = this.parseOr();
        if (this.peek()?.type === 'comma') {
          this.pos++;
          const y = this.parseOr();
          this.expect('rparen', ')');
          return { kind: 'pair', x: inner, y };
        }
        this.expect('rparen', ')');
        return inner;
      }
      default:
        throw new ConditionError(
          `Unexpected '${token.text}' at position ${token.pos}`
        );
    }
  }
}

function isCompareOperator(op: string | null): op is CompareOperator {
  return op !== null && COMPARE_OPERATORS.includes(op);
}

function isPair(value: EvalValue): value is readonly [number, number] {
  return typeof value !== 'number';
}

function toNumber(value: EvalValue, op: string): number {
  if (isPair(value)) {
    throw new ConditionError(`Operator '${op}' is not defined for positions`);
  }
  return value;
}

function truthy(value: EvalValue): boolean {
  return isPair(value) || value !== 0;
}

/**
 * Floor division and modulo, matching integer semantics where the
 * remainder takes the sign of the divisor
 */
function arithmetic(op: BinaryOperator, a: number, b: number): number {
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
    case '//':
    case '%':
      if (b === 0) {
        throw new ConditionError('Division by zero');
      }
      return op === '%' ? a - b * Math.floor(a / b) : Math.floor(a / b);
  }
}

function compare(op: CompareOperator, a: EvalValue, b: EvalValue): boolean {
  if (op === '==' || op === '!=') {
    const equal =
      isPair(a) && isPair(b)
        ? a[0] === b[0] && a[1] === b[1]
        : !isPair(a) && !isPair(b) && a === b;
    return op === '==' ? equal : !equal;
  }

  const x = toNumber(a, op);
  const y = toNumber(b, op);
  switch (op) {
    case '<':
      return x < y;
    case '<=':
      return x <= y;
    case '>':
      return x > y;
    case '>=':
      return x >= y;
  }
}

function evaluate(expr: Expr): EvalValue {
  switch (expr.kind) {
    case 'number':
      return expr.value;
    case 'pair':
      return [
        toNumber(evaluate(expr.x), ','),
        toNumber(evaluate(expr.y), ','),
      ];
    case 'unary': {
      const operand = evaluate(expr.operand);
      if (expr.op === '!') return truthy(operand) ? 0 : 1;
      const n = toNumber(operand, expr.op);
      return expr.op === '-' ? -n : n;
    }
    case 'not':
      return truthy(evaluate(expr.operand)) ? 0 : 1;
    case 'binary':
      return arithmetic(
        expr.op,
        toNumber(evaluate(expr.left), expr.op),
        toNumber(evaluate(expr.right), expr.op)
      );
    case 'compare': {
      // Chained: a < b < c means a < b and b < c
      let left = evaluate(expr.first);
      for (const { op, right } of expr.rest) {
        const value = evaluate(right);
        if (!compare(op, left, value)) return 0;
        left = value;
      }
      return 1;
    }
    case 'logical': {
      const left = truthy(evaluate(expr.left));
      if (expr.op === 'and' && !left) return 0;
      if (expr.op === 'or' && left) return 1;
      return truthy(evaluate(expr.right)) ? 1 : 0;
    }
  }
}

/**
 * Evaluate an already-substituted expression to a boolean
 * Throws ConditionError on malformed input
 */
export function evaluateExpression(expression: string): boolean {
  const tree = new Parser(tokenize(expression)).parse();
  return truthy(evaluate(tree));
}

/**
 * Substitute variables into a condition and evaluate it
 *
 * Never throws: a malformed condition comes back as false with the error
 * message set, for the caller to log.
 */
export function evaluateCondition(
  condition: string,
  store: VariableStore
): ConditionResult {
  const expression = substituteVariables(condition, store);
  try {
    return { value: evaluateExpression(expression), expression, error: null };
  } catch (error) {
    return { value: false, expression, error: errorMessage(error) };
  }
}
