/**
 * Guard expressions: the `when:` condition that gates a stage.
 *
 * Guards are parsed once at load time into a small AST and evaluated
 * against a {@link GuardContext} per run. Evaluation is pure: the same
 * expression and context always produce the same answer.
 *
 * Grammar (lowest to highest precedence):
 *
 *   or      := and ( '||' and )*
 *   and     := unary ( '&&' unary )*
 *   unary   := '!' unary | compare
 *   compare := primary ( ( '==' | '!=' | '<' | '<=' | '>' | '>=' | '=~' ) primary )?
 *   primary := STRING | INTEGER | 'true' | 'false' | IDENT | '(' or ')'
 *
 * Identifiers are `branch`, `build_number` and `env.NAME`.
 */

import { ConfigError, InvalidGuardError } from '../types/errors.js';

// ---------------------------------------------------------------------------
// AST
// ---------------------------------------------------------------------------

export type GuardValue = string | number | boolean;

export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | '=~';

export type GuardExpression =
  | { type: 'literal'; value: GuardValue }
  | { type: 'variable'; name: string }
  | { type: 'not'; operand: GuardExpression }
  | { type: 'logical'; op: '&&' | '||'; left: GuardExpression; right: GuardExpression }
  | { type: 'compare'; op: CompareOperator; left: GuardExpression; right: GuardExpression }
  | { type: 'match'; left: GuardExpression; pattern: RegExp };

/** Runtime values a guard may read. */
export interface GuardContext {
  branch?: string;
  buildNumber?: number;
  env: Readonly<Record<string, string>>;
}

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

type Token =
  | { kind: 'string'; value: string; pos: number }
  | { kind: 'number'; value: number; pos: number }
  | { kind: 'ident'; value: string; pos: number }
  | { kind: 'op'; value: string; pos: number }
  | { kind: 'eof'; pos: number };

const OPERATORS = ['==', '!=', '<=', '>=', '=~', '&&', '||', '<', '>', '!', '(', ')'];

const COMPARE_OPERATORS: readonly CompareOperator[] = ['==', '!=', '<', '<=', '>', '>=', '=~'];

class GuardSyntaxError extends Error {
  constructor(message: string, pos: number) {
    super(`${message} at position ${pos}`);
    this.name = 'GuardSyntaxError';
  }
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      let value = '';
      i++;
      while (i < source.length && source[i] !== ch) {
        if (source[i] === '\\' && i + 1 < source.length) {
          const next = source[i + 1];
          value += next === 'n' ? '\n' : next === 't' ? '\t' : next;
          i += 2;
        } else {
          value += source[i];
          i++;
        }
      }
      if (i >= source.length) {
        throw new GuardSyntaxError('Unterminated string', start);
      }
      i++;
      tokens.push({ kind: 'string', value, pos: start });
      continue;
    }

    if (/[0-9]/.test(ch)) {
      const start = i;
      while (i < source.length && /[0-9]/.test(source[i])) i++;
      tokens.push({ kind: 'number', value: parseInt(source.slice(start, i), 10), pos: start });
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      const start = i;
      while (i < source.length && /[A-Za-z0-9_.]/.test(source[i])) i++;
      tokens.push({ kind: 'ident', value: source.slice(start, i), pos: start });
      continue;
    }

    const op = OPERATORS.find((candidate) => source.startsWith(candidate, i));
    if (op === undefined) {
      throw new GuardSyntaxError(`Unexpected character "${ch}"`, i);
    }
    tokens.push({ kind: 'op', value: op, pos: i });
    i += op.length;
  }

  tokens.push({ kind: 'eof', pos: source.length });
  return tokens;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

const VARIABLE_PATTERN = /^(branch|build_number|env\.[A-Za-z_][A-Za-z0-9_]*)$/;

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): GuardExpression {
    const expr = this.parseOr();
    const next = this.peek();
    if (next.kind !== 'eof') {
      throw new GuardSyntaxError('Unexpected trailing input', next.pos);
    }
    return expr;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.kind !== 'eof') this.index++;
    return token;
  }

  private acceptOp(...ops: string[]): string | null {
    const token = this.peek();
    if (token.kind === 'op' && ops.includes(token.value)) {
      this.advance();
      return token.value;
    }
    return null;
  }

  private parseOr(): GuardExpression {
    let left = this.parseAnd();
    while (this.acceptOp('||') !== null) {
      left = { type: 'logical', op: '||', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): GuardExpression {
    let left = this.parseUnary();
    while (this.acceptOp('&&') !== null) {
      left = { type: 'logical', op: '&&', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): GuardExpression {
    if (this.acceptOp('!') !== null) {
      return { type: 'not', operand: this.parseUnary() };
    }
    return this.parseCompare();
  }

  private parseCompare(): GuardExpression {
    const left = this.parsePrimary();
    const opToken = this.peek();
    const opValue = opToken.kind === 'op' ? opToken.value : undefined;
    const op = COMPARE_OPERATORS.find((candidate) => candidate === opValue);
    if (op === undefined) {
      return left;
    }
    this.advance();

    const right = this.parsePrimary();
    if (op === '=~') {
      if (right.type !== 'literal' || typeof right.value !== 'string') {
        throw new GuardSyntaxError('Right side of =~ must be a string pattern', opToken.pos);
      }
      let pattern: RegExp;
      try {
        pattern = new RegExp(right.value);
      } catch {
        throw new GuardSyntaxError(`Invalid pattern "${right.value}"`, opToken.pos);
      }
      return { type: 'match', left, pattern };
    }

    return { type: 'compare', op, left, right };
  }

  private parsePrimary(): GuardExpression {
    const token = this.advance();
    switch (token.kind) {
      case 'string':
        return { type: 'literal', value: token.value };
      case 'number':
        return { type: 'literal', value: token.value };
      case 'ident':
        if (token.value === 'true') return { type: 'literal', value: true };
        if (token.value === 'false') return { type: 'literal', value: false };
        if (!VARIABLE_PATTERN.test(token.value)) {
          throw new GuardSyntaxError(`Unknown identifier "${token.value}"`, token.pos);
        }
        return { type: 'variable', name: token.value };
      case 'op':
        if (token.value === '(') {
          const inner = this.parseOr();
          if (this.acceptOp(')') === null) {
            throw new GuardSyntaxError('Expected ")"', this.peek().pos);
          }
          return inner;
        }
        throw new GuardSyntaxError(`Unexpected "${token.value}"`, token.pos);
      case 'eof':
        throw new GuardSyntaxError('Unexpected end of expression', token.pos);
    }
  }
}

/**
 * Parse guard source text.
 *
 * @throws ConfigError when the text is not a well-formed guard.
 */
export function parseGuard(source: string): GuardExpression {
  try {
    return new Parser(tokenize(source)).parse();
  } catch (err) {
    if (err instanceof GuardSyntaxError) {
      throw new ConfigError(`Invalid guard "${source}": ${err.message}`, [err.message]);
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

function lookup(name: string, ctx: GuardContext): GuardValue {
  if (name === 'branch') {
    if (ctx.branch === undefined) throw new InvalidGuardError(name);
    return ctx.branch;
  }
  if (name === 'build_number') {
    if (ctx.buildNumber === undefined) throw new InvalidGuardError(name);
    return ctx.buildNumber;
  }
  const key = name.slice('env.'.length);
  if (!Object.prototype.hasOwnProperty.call(ctx.env, key)) {
    throw new InvalidGuardError(name);
  }
  return ctx.env[key];
}

/** Strings are truthy unless empty, `"false"` or `"0"`. */
function truthy(value: GuardValue): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return value.length > 0 && value !== 'false' && value !== '0';
}

function equals(a: GuardValue, b: GuardValue): boolean {
  if (typeof a === typeof b) return a === b;
  return String(a) === String(b);
}

function compareNumbers(op: CompareOperator, a: GuardValue, b: GuardValue): boolean {
  const x = Number(a);
  const y = Number(b);
  if (Number.isNaN(x) || Number.isNaN(y)) return false;
  switch (op) {
    case '<':
      return x < y;
    case '<=':
      return x <= y;
    case '>':
      return x > y;
    default:
      return x >= y;
  }
}

function evaluateValue(expr: GuardExpression, ctx: GuardContext): GuardValue {
  switch (expr.type) {
    case 'literal':
      return expr.value;
    case 'variable':
      return lookup(expr.name, ctx);
    case 'not':
      return !truthy(evaluateValue(expr.operand, ctx));
    case 'logical': {
      const left = truthy(evaluateValue(expr.left, ctx));
      if (expr.op === '&&') return left && truthy(evaluateValue(expr.right, ctx));
      return left || truthy(evaluateValue(expr.right, ctx));
    }
    case 'match':
      return expr.pattern.test(String(evaluateValue(expr.left, ctx)));
    case 'compare': {
      const left = evaluateValue(expr.left, ctx);
      const right = evaluateValue(expr.right, ctx);
      if (expr.op === '==') return equals(left, right);
      if (expr.op === '!=') return !equals(left, right);
      return compareNumbers(expr.op, left, right);
    }
  }
}

/**
 * Evaluate a guard against a runtime context.
 *
 * @throws InvalidGuardError when the guard reads a variable the context
 *   does not define. `&&` and `||` short-circuit, so an unread operand
 *   never raises.
 */
export function evaluate(guard: string | GuardExpression, ctx: GuardContext): boolean {
  const expr = typeof guard === 'string' ? parseGuard(guard) : guard;
  return truthy(evaluateValue(expr, ctx));
}

/** Every variable name the expression mentions. */
export function referencedVariables(expr: GuardExpression): string[] {
  switch (expr.type) {
    case 'literal':
      return [];
    case 'variable':
      return [expr.name];
    case 'not':
      return referencedVariables(expr.operand);
    case 'match':
      return referencedVariables(expr.left);
    case 'logical':
    case 'compare':
      return [...referencedVariables(expr.left), ...referencedVariables(expr.right)];
  }
}

/** True when the guard reads no variables and folds to false. */
export function isStaticallyFalse(expr: GuardExpression): boolean {
  if (referencedVariables(expr).length > 0) return false;
  return !evaluate(expr, { env: {} });
}
