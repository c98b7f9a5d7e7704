// runtime/core/expressionEngine.ts

import type { Value, ValueObject } from '../../core/types.ts';
import { EvalError, ExpressionSyntaxError, UnknownIdentifierError } from './errors.ts';
import {
  deepEqual,
  getPath,
  isNumeric,
  isTruthy,
  isValueObject,
  splitPath,
  toNumber,
  toStr,
  toValue,
  typeName,
} from './value.ts';

export type ComparisonOp = '==' | '!=' | '>' | '<' | '>=' | '<=';
export type ArithmeticOp = '+' | '-' | '*' | '/' | '%';
export type LogicalOp = 'AND' | 'OR';

export type ExprAst =
  | { type: 'literal'; value: Value }
  | { type: 'variable'; parts: string[]; sigil: boolean }
  | { type: 'array'; items: ExprAst[] }
  | { type: 'object'; entries: Array<{ key: string; value: ExprAst }> }
  | { type: 'member'; object: ExprAst; property: ExprAst }
  | { type: 'unary'; op: '-' | 'NOT'; expr: ExprAst }
  | { type: 'binary'; op: ArithmeticOp | ComparisonOp; left: ExprAst; right: ExprAst }
  | { type: 'logical'; op: LogicalOp; left: ExprAst; right: ExprAst }
  | { type: 'call'; fn: string; args: ExprAst[] };

/**
 * Resolves variable paths for the evaluator.
 * Returns `undefined` when the first segment names nothing at all,
 * `null` when the root exists but a deeper segment is missing.
 */
export interface ExpressionScope {
  lookup(parts: readonly string[]): Value | undefined;
}

// -----------------------------
// Lexer
// -----------------------------

export type TokenType =
  | 'IDENT'
  | 'VAR'
  | 'STRING'
  | 'NUMBER'
  | 'OP'
  | 'LPAREN'
  | 'RPAREN'
  | 'LBRACKET'
  | 'RBRACKET'
  | 'LBRACE'
  | 'RBRACE'
  | 'COMMA'
  | 'COLON'
  | 'DOT'
  | 'EOF';

export interface Token {
  type: TokenType;
  value: string;
  start: number;
  end: number;
}

const PUNCTUATORS: Record<string, TokenType> = {
  '(': 'LPAREN',
  ')': 'RPAREN',
  '[': 'LBRACKET',
  ']': 'RBRACKET',
  '{': 'LBRACE',
  '}': 'RBRACE',
  ',': 'COMMA',
  ':': 'COLON',
};

const TWO_CHAR_OPS = new Set(['==', '!=', '<=', '>=', '&&', '||']);
const ONE_CHAR_OPS = new Set(['<', '>', '!', '+', '-', '*', '/', '%']);

class Lexer {
  private pos = 0;
  private readonly input: string;

  constructor(input: string) {
    this.input = input;
  }

  private get currentChar(): string | undefined {
    return this.pos < this.input.length ? this.input[this.pos] : undefined;
  }

  private advance(): void {
    this.pos += 1;
  }

  private skipWhitespace(): void {
    while (this.currentChar !== undefined && /\s/.test(this.currentChar)) {
      this.advance();
    }
  }

  private readWhile(predicate: (ch: string) => boolean): string {
    let result = '';
    while (this.currentChar !== undefined && predicate(this.currentChar)) {
      result += this.currentChar;
      this.advance();
    }
    return result;
  }

  private readString(quoteChar: string): string {
    const start = this.pos;
    let result = '';
    this.advance(); // opening quote

    while (this.currentChar !== undefined && this.currentChar !== quoteChar) {
      if (this.currentChar === '\\') {
        this.advance();
        const escaped = this.input.at(this.pos);
        if (escaped === undefined) break;
        result += escaped === 'n' ? '\n' : escaped === 't' ? '\t' : escaped;
        this.advance();
        continue;
      }
      result += this.currentChar;
      this.advance();
    }

    if (this.currentChar !== quoteChar) {
      throw new ExpressionSyntaxError('Unterminated string literal', start);
    }
    this.advance(); // closing quote
    return result;
  }

  private readNumber(): string {
    let result = this.readWhile(isDigit);
    if (this.currentChar === '.' && isDigit(this.input[this.pos + 1])) {
      this.advance();
      result += '.' + this.readWhile(isDigit);
    }
    return result;
  }

  next(): Token {
    this.skipWhitespace();
    const start = this.pos;
    const ch = this.currentChar;

    if (ch === undefined) {
      return { type: 'EOF', value: '', start, end: start };
    }

    const punct = PUNCTUATORS[ch];
    if (punct) {
      this.advance();
      return { type: punct, value: ch, start, end: this.pos };
    }

    const two = this.input.slice(this.pos, this.pos + 2);
    if (TWO_CHAR_OPS.has(two)) {
      this.pos += 2;
      return { type: 'OP', value: two, start, end: this.pos };
    }
    if (ONE_CHAR_OPS.has(ch)) {
      this.advance();
      return { type: 'OP', value: ch, start, end: this.pos };
    }

    if (ch === "'" || ch === '"') {
      const value = this.readString(ch);
      return { type: 'STRING', value, start, end: this.pos };
    }

    if (isDigit(ch)) {
      const value = this.readNumber();
      return { type: 'NUMBER', value, start, end: this.pos };
    }

    if (ch === '$') {
      this.advance();
      const value = this.readWhile(isIdentContinue);
      if (!value) {
        throw new ExpressionSyntaxError(`Expected variable name after '$' at position ${start}`, start);
      }
      return { type: 'VAR', value, start, end: this.pos };
    }

    if (ch === '.' && isIdentStart(this.input[this.pos + 1])) {
      this.advance();
      return { type: 'DOT', value: '.', start, end: this.pos };
    }

    if (isIdentStart(ch)) {
      const value = this.readWhile(isIdentContinue);
      return { type: 'IDENT', value, start, end: this.pos };
    }

    throw new ExpressionSyntaxError(`Unexpected character '${ch}' at position ${start}`, start);
  }
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isIdentStart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z_]/.test(ch);
}

function isIdentContinue(ch: string): boolean {
  return /[A-Za-z0-9_.]/.test(ch); // dots separate path segments
}

export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  const tokens: Token[] = [];
  for (;;) {
    const token = lexer.next();
    tokens.push(token);
    if (token.type === 'EOF') return tokens;
  }
}

// -----------------------------
// Parser
// -----------------------------

class Parser {
  private index = 0;
  private readonly tokens: Token[];

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  private current(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private peek(offset = 1): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  parseExpression(): ExprAst {
    const expr = this.parseOr();
    this.expect('EOF');
    return expr;
  }

  private parseOr(): ExprAst {
    let left = this.parseAnd();
    while (this.matchOp('||') || this.matchIdent('OR')) {
      const right = this.parseAnd();
      left = { type: 'logical', op: 'OR', left, right };
    }
    return left;
  }

  private parseAnd(): ExprAst {
    let left = this.parseNot();
    while (this.matchOp('&&') || this.matchIdent('AND')) {
      const right = this.parseNot();
      left = { type: 'logical', op: 'AND', left, right };
    }
    return left;
  }

  private parseNot(): ExprAst {
    if (this.matchOp('!') || this.matchIdent('NOT')) {
      const expr = this.parseNot();
      return { type: 'unary', op: 'NOT', expr };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExprAst {
    const left = this.parseAdditive();
    const token = this.current();
    if (token.type === 'OP' && isComparisonOp(token.value)) {
      this.index += 1;
      const right = this.parseAdditive();
      return { type: 'binary', op: token.value, left, right };
    }
    return left;
  }

  private parseAdditive(): ExprAst {
    let left = this.parseMultiplicative();
    for (;;) {
      const token = this.current();
      if (token.type === 'OP' && (token.value === '+' || token.value === '-')) {
        this.index += 1;
        const right = this.parseMultiplicative();
        left = { type: 'binary', op: token.value, left, right };
        continue;
      }
      return left;
    }
  }

  private parseMultiplicative(): ExprAst {
    let left = this.parseUnary();
    for (;;) {
      const token = this.current();
      if (token.type === 'OP' && (token.value === '*' || token.value === '/' || token.value === '%')) {
        this.index += 1;
        const right = this.parseUnary();
        left = { type: 'binary', op: token.value, left, right };
        continue;
      }
      return left;
    }
  }

  private parseUnary(): ExprAst {
    if (this.matchOp('-')) {
      const expr = this.parseUnary();
      if (expr.type === 'literal' && typeof expr.value === 'number') {
        return { type: 'literal', value: -expr.value };
      }
      return { type: 'unary', op: '-', expr };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): ExprAst {
    let expr = this.parsePrimary();
    for (;;) {
      if (this.current().type === 'DOT') {
        this.consume('DOT');
        const ident = this.consume('IDENT');
        for (const part of splitPath(ident.value)) {
          expr = { type: 'member', object: expr, property: { type: 'literal', value: part } };
        }
        continue;
      }
      if (this.current().type === 'LBRACKET') {
        this.consume('LBRACKET');
        const property = this.parseOr();
        this.consume('RBRACKET');
        expr = { type: 'member', object: expr, property };
        continue;
      }
      return expr;
    }
  }

  private parsePrimary(): ExprAst {
    const token = this.current();

    switch (token.type) {
      case 'LPAREN': {
        this.consume('LPAREN');
        const expr = this.parseOr();
        this.consume('RPAREN');
        return expr;
      }
      case 'LBRACKET':
        return this.parseArray();
      case 'LBRACE':
        return this.parseObject();
      case 'STRING':
        this.index += 1;
        return { type: 'literal', value: token.value };
      case 'NUMBER': {
        this.index += 1;
        const numValue = Number(token.value);
        if (Number.isNaN(numValue)) {
          throw new ExpressionSyntaxError(`Invalid number literal: ${token.value}`, token.start);
        }
        return { type: 'literal', value: numValue };
      }
      case 'VAR':
        this.index += 1;
        return { type: 'variable', parts: splitPath(token.value), sigil: true };
      case 'IDENT':
        return this.parseIdentifier(token);
      default:
        throw new ExpressionSyntaxError(
          `Unexpected token ${token.type}${token.value ? ` '${token.value}'` : ''} at position ${token.start}`,
          token.start,
        );
    }
  }

  private parseIdentifier(token: Token): ExprAst {
    const ident = token.value;
    const lower = ident.toLowerCase();
    this.index += 1;

    if (lower === 'always' || lower === 'true') return { type: 'literal', value: true };
    if (lower === 'false') return { type: 'literal', value: false };
    if (lower === 'null') return { type: 'literal', value: null };

    if (this.current().type === 'LPAREN' && !ident.includes('.')) {
      const fn = resolveFunctionName(ident);
      if (!fn) {
        throw new ExpressionSyntaxError(`Unknown function: ${ident}`, token.start);
      }
      this.consume('LPAREN');
      const args: ExprAst[] = [];
      if (this.current().type !== 'RPAREN') {
        args.push(this.parseOr());
        while (this.current().type === 'COMMA') {
          this.consume('COMMA');
          args.push(this.parseOr());
        }
      }
      this.consume('RPAREN');
      return { type: 'call', fn, args };
    }

    return { type: 'variable', parts: splitPath(ident), sigil: false };
  }

  private parseArray(): ExprAst {
    this.consume('LBRACKET');
    const items: ExprAst[] = [];
    while (this.current().type !== 'RBRACKET') {
      items.push(this.parseOr());
      if (this.current().type !== 'COMMA') break;
      this.consume('COMMA');
    }
    this.consume('RBRACKET');
    return { type: 'array', items };
  }

  private parseObject(): ExprAst {
    this.consume('LBRACE');
    const entries: Array<{ key: string; value: ExprAst }> = [];
    while (this.current().type !== 'RBRACE') {
      const keyToken = this.current();
      if (keyToken.type !== 'STRING' && keyToken.type !== 'IDENT') {
        throw new ExpressionSyntaxError(`Expected object key at position ${keyToken.start}`, keyToken.start);
      }
      this.index += 1;
      this.consume('COLON');
      entries.push({ key: keyToken.value, value: this.parseOr() });
      if (this.current().type !== 'COMMA') break;
      this.consume('COMMA');
    }
    this.consume('RBRACE');
    return { type: 'object', entries };
  }

  private matchIdent(expected: string): boolean {
    const token = this.current();
    if (token.type === 'IDENT' && token.value.toUpperCase() === expected && this.peek().type !== 'LPAREN') {
      this.index += 1;
      return true;
    }
    return false;
  }

  private matchOp(op: string): boolean {
    if (this.current().type === 'OP' && this.current().value === op) {
      this.index += 1;
      return true;
    }
    return false;
  }

  private consume(expected: TokenType): Token {
    const token = this.current();
    if (token.type !== expected) {
      throw new ExpressionSyntaxError(
        `Expected ${expected}, got ${token.type} at position ${token.start}`,
        token.start,
      );
    }
    this.index += 1;
    return token;
  }

  private expect(expected: TokenType): void {
    if (this.current().type !== expected) {
      throw new ExpressionSyntaxError(
        `Expected ${expected}, got ${this.current().type} at position ${this.current().start}`,
        this.current().start,
      );
    }
  }
}

function isComparisonOp(op: string): op is ComparisonOp {
  return op === '==' || op === '!=' || op === '<' || op === '>' || op === '<=' || op === '>=';
}

const PARSE_CACHE_LIMIT = 512;
const parseCache = new Map<string, ExprAst>();

/**
 * Parse an expression string into an AST. Throws ExpressionSyntaxError.
 */
export function parseExpression(input: string): ExprAst {
  const cached = parseCache.get(input);
  if (cached) return cached;

  const ast = new Parser(tokenize(input)).parseExpression();
  if (parseCache.size >= PARSE_CACHE_LIMIT) {
    const oldest = parseCache.keys().next();
    if (!oldest.done) parseCache.delete(oldest.value);
  }
  parseCache.set(input, ast);
  return ast;
}

// -----------------------------
// Evaluation
// -----------------------------

export function evaluate(expression: string | ExprAst, scope: ExpressionScope): Value {
  const ast = typeof expression === 'string' ? parseExpression(expression) : expression;
  return evaluateAst(ast, scope);
}

function evaluateAst(ast: ExprAst, scope: ExpressionScope): Value {
  switch (ast.type) {
    case 'literal':
      return ast.value;
    case 'variable': {
      const found = scope.lookup(ast.parts);
      if (found !== undefined) return found;
      if (ast.sigil) return null;
      throw new UnknownIdentifierError(ast.parts.join('.'));
    }
    case 'array':
      return ast.items.map((item) => evaluateAst(item, scope));
    case 'object': {
      const out: ValueObject = {};
      for (const entry of ast.entries) {
        out[entry.key] = evaluateAst(entry.value, scope);
      }
      return out;
    }
    case 'member': {
      const object = evaluateAst(ast.object, scope);
      const property = evaluateAst(ast.property, scope);
      return getPath(object, [toStr(property)]);
    }
    case 'unary': {
      const value = evaluateAst(ast.expr, scope);
      return ast.op === 'NOT' ? !isTruthy(value) : -toNumber(value);
    }
    case 'logical': {
      const left = evaluateAst(ast.left, scope);
      if (ast.op === 'AND') {
        return isTruthy(left) ? evaluateAst(ast.right, scope) : left;
      }
      return isTruthy(left) ? left : evaluateAst(ast.right, scope);
    }
    case 'binary': {
      const left = evaluateAst(ast.left, scope);
      const right = evaluateAst(ast.right, scope);
      return isComparisonOp(ast.op) ? compareValues(ast.op, left, right) : arithmetic(ast.op, left, right);
    }
    case 'call': {
      const fn = FUNCTIONS[ast.fn];
      if (!fn) throw new EvalError(`Unknown function: ${ast.fn}`);
      const args = ast.args.map((arg) => evaluateAst(arg, scope));
      if (args.length < fn.min || (fn.max !== undefined && args.length > fn.max)) {
        const expected = fn.max === fn.min ? `${fn.min}` : `${fn.min}..${fn.max ?? 'n'}`;
        throw new EvalError(`${ast.fn}() expects ${expected} arguments, got ${args.length}`);
      }
      return fn.apply(args);
    }
    default: {
      const exhaustive: never = ast;
      return exhaustive;
    }
  }
}

function compareValues(op: ComparisonOp, left: Value, right: Value): boolean {
  if (op === '==' || op === '!=') {
    const equal = isNumeric(left) && isNumeric(right)
      ? toNumber(left) === toNumber(right)
      : deepEqual(left, right);
    return op === '==' ? equal : !equal;
  }

  let cmp: number;
  if (isNumeric(left) && isNumeric(right)) {
    cmp = toNumber(left) - toNumber(right);
  } else if (typeof left === 'string' && typeof right === 'string') {
    cmp = left < right ? -1 : left > right ? 1 : 0;
  } else {
    throw new EvalError(`Cannot compare ${typeName(left)} ${op} ${typeName(right)}`);
  }

  switch (op) {
    case '>':
      return cmp > 0;
    case '<':
      return cmp < 0;
    case '>=':
      return cmp >= 0;
    case '<=':
      return cmp <= 0;
  }
}

function arithmetic(op: ArithmeticOp, left: Value, right: Value): Value {
  if (op === '+') {
    if (typeof left === 'string' || typeof right === 'string') {
      return toStr(left) + toStr(right);
    }
    if (Array.isArray(left)) {
      return Array.isArray(right) ? [...left, ...right] : [...left, right];
    }
    if (isValueObject(left) && isValueObject(right)) {
      return { ...left, ...right };
    }
    return toNumber(left) + toNumber(right);
  }

  const l = toNumber(left);
  const r = toNumber(right);
  switch (op) {
    case '-':
      return l - r;
    case '*':
      return l * r;
    case '/':
      if (r === 0) throw new EvalError('Division by zero');
      return l / r;
    case '%':
      if (r === 0) throw new EvalError('Division by zero');
      return l % r;
  }
}

// -----------------------------
// Builtin functions
// -----------------------------

interface ExpressionFunction {
  min: number;
  max?: number;
  apply(args: Value[]): Value;
}

function asList(value: Value, fn: string): Value[] {
  if (value === null) return [];
  if (Array.isArray(value)) return value;
  throw new EvalError(`${fn}() expects an array, got ${typeName(value)}`);
}

function numbersOf(args: Value[], fn: string): number[] {
  const items = args.length === 1 && Array.isArray(args[0]) ? args[0] : args;
  if (items.length === 0) throw new EvalError(`${fn}() of an empty list`);
  return items.map(toNumber);
}

const FUNCTION_ALIASES: Record<string, string> = {
  length: 'len',
  map: 'pluck',
  filter: 'where',
};

const FUNCTIONS: Record<string, ExpressionFunction> = {
  len: {
    min: 1,
    max: 1,
    apply: ([value]) => {
      if (value === null) return 0;
      if (typeof value === 'string' || Array.isArray(value)) return value.length;
      if (isValueObject(value)) return Object.keys(value).length;
      throw new EvalError(`len() of ${typeName(value)}`);
    },
  },
  append: {
    min: 2,
    max: 2,
    apply: ([list, item]) => (typeof list === 'string' ? list + toStr(item) : [...asList(list, 'append'), item]),
  },
  concat: {
    min: 1,
    apply: (args) => {
      if (args.some((arg) => typeof arg === 'string')) return args.map(toStr).join('');
      return args.flatMap((arg) => asList(arg, 'concat'));
    },
  },
  contains: {
    min: 2,
    max: 2,
    apply: ([haystack, needle]) => {
      if (Array.isArray(haystack)) return haystack.some((item) => deepEqual(item, needle));
      if (typeof haystack === 'string') return haystack.includes(toStr(needle));
      if (isValueObject(haystack)) return Object.prototype.hasOwnProperty.call(haystack, toStr(needle));
      return false;
    },
  },
  keys: {
    min: 1,
    max: 1,
    apply: ([value]) => (isValueObject(value) ? Object.keys(value) : asList(value, 'keys').map((_, i) => i)),
  },
  values: {
    min: 1,
    max: 1,
    apply: ([value]) => (isValueObject(value) ? Object.values(value) : asList(value, 'values')),
  },
  first: {
    min: 1,
    max: 1,
    apply: ([value]) => (typeof value === 'string' ? value.slice(0, 1) : asList(value, 'first')[0] ?? null),
  },
  last: {
    min: 1,
    max: 1,
    apply: ([value]) => {
      if (typeof value === 'string') return value.slice(-1);
      const list = asList(value, 'last');
      return list.length > 0 ? list[list.length - 1] : null;
    },
  },
  slice: {
    min: 2,
    max: 3,
    apply: ([value, start, end]) => {
      const s = toNumber(start);
      const e = end === undefined || end === null ? undefined : toNumber(end);
      return typeof value === 'string' ? value.slice(s, e) : asList(value, 'slice').slice(s, e);
    },
  },
  join: {
    min: 1,
    max: 2,
    apply: ([list, sep]) => asList(list, 'join').map(toStr).join(sep === undefined ? ',' : toStr(sep)),
  },
  split: {
    min: 2,
    max: 2,
    apply: ([value, sep]) => toStr(value).split(toStr(sep)),
  },
  upper: { min: 1, max: 1, apply: ([value]) => toStr(value).toUpperCase() },
  lower: { min: 1, max: 1, apply: ([value]) => toStr(value).toLowerCase() },
  trim: { min: 1, max: 1, apply: ([value]) => toStr(value).trim() },
  replace: {
    min: 3,
    max: 3,
    apply: ([value, from, to]) => toStr(value).split(toStr(from)).join(toStr(to)),
  },
  str: { min: 1, max: 1, apply: ([value]) => toStr(value) },
  num: { min: 1, max: 1, apply: ([value]) => toNumber(value) },
  int: { min: 1, max: 1, apply: ([value]) => Math.trunc(toNumber(value)) },
  bool: { min: 1, max: 1, apply: ([value]) => isTruthy(value) },
  not_empty: { min: 1, max: 1, apply: ([value]) => isTruthy(value) },
  json: { min: 1, max: 1, apply: ([value]) => JSON.stringify(value) },
  parse_json: {
    min: 1,
    max: 1,
    apply: ([value]) => {
      if (typeof value !== 'string') return value;
      try {
        const parsed: unknown = JSON.parse(value);
        return toValue(parsed);
      } catch (err) {
        throw new EvalError(`parse_json(): ${err instanceof Error ? err.message : String(err)}`);
      }
    },
  },
  default: {
    min: 2,
    max: 2,
    apply: ([value, fallback]) => (value === null ? fallback : value),
  },
  coalesce: {
    min: 1,
    apply: (args) => args.find((arg) => arg !== null) ?? null,
  },
  pluck: {
    min: 2,
    max: 2,
    apply: ([list, field]) => {
      const path = splitPath(toStr(field));
      return asList(list, 'pluck').map((item) => getPath(item, path));
    },
  },
  where: {
    min: 2,
    max: 3,
    apply: (args) => {
      const [list, field] = args;
      const path = splitPath(toStr(field));
      const matchValue = args.length === 3;
      return asList(list, 'where').filter((item) => {
        const value = getPath(item, path);
        return matchValue ? compareValues('==', value, args[2]) : isTruthy(value);
      });
    },
  },
  compact: {
    min: 1,
    max: 1,
    apply: ([list]) => asList(list, 'compact').filter((item) => item !== null),
  },
  range: {
    min: 1,
    max: 2,
    apply: (args) => {
      const start = args.length === 2 ? toNumber(args[0]) : 0;
      const end = toNumber(args.length === 2 ? args[1] : args[0]);
      const out: number[] = [];
      for (let i = start; i < end; i++) out.push(i);
      return out;
    },
  },
  min: { min: 1, apply: (args) => Math.min(...numbersOf(args, 'min')) },
  max: { min: 1, apply: (args) => Math.max(...numbersOf(args, 'max')) },
  abs: { min: 1, max: 1, apply: ([value]) => Math.abs(toNumber(value)) },
  round: {
    min: 1,
    max: 2,
    apply: ([value, digits]) => {
      const factor = 10 ** (digits === undefined ? 0 : toNumber(digits));
      return Math.round(toNumber(value) * factor) / factor;
    },
  },
  type: { min: 1, max: 1, apply: ([value]) => typeName(value) },
};

function resolveFunctionName(name: string): string | undefined {
  const has = (table: object, key: string) => Object.prototype.hasOwnProperty.call(table, key);
  const resolved = has(FUNCTION_ALIASES, name) ? FUNCTION_ALIASES[name] : name;
  return has(FUNCTIONS, resolved) ? resolved : undefined;
}

export function isKnownFunction(name: string): boolean {
  return resolveFunctionName(name) !== undefined;
}

/**
 * Scope over a plain object: every top-level key is a root.
 */
export function scopeFromObject(root: ValueObject): ExpressionScope {
  return {
    lookup(parts) {
      if (parts.length === 0 || !Object.prototype.hasOwnProperty.call(root, parts[0])) return undefined;
      return getPath(root[parts[0]], parts.slice(1));
    },
  };
}
