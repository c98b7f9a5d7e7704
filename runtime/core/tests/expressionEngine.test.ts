// runtime/core/tests/expressionEngine.test.ts

import { describe, it, expect } from 'vitest';
import { evaluate, parseExpression, scopeFromObject, tokenize } from '../expressionEngine.ts';
import { EvalError, ExpressionSyntaxError, UnknownIdentifierError } from '../errors.ts';

const scope = scopeFromObject({
  user: { name: 'Ada', region: 'EU', plan: 'pro' },
  items: [10, 20, 30],
  people: [
    { name: 'Ada', age: 36 },
    { name: 'Linus', age: 30 },
  ],
  n: 3,
  score: 0.9,
  text: 'My wifi is broken',
});

describe('expression engine', () => {
  it('treats "always" as true', () => {
    expect(evaluate('always', scope)).toBe(true);
  });

  it('follows arithmetic precedence', () => {
    expect(evaluate('1 + 2 * 3', scope)).toBe(7);
    expect(evaluate('(1 + 2) * 3', scope)).toBe(9);
    expect(evaluate('7 % 4 - 1', scope)).toBe(2);
    expect(evaluate('-$n + 1', scope)).toBe(-2);
  });

  it('overloads + for strings, arrays and objects', () => {
    expect(evaluate("'a' + 1", scope)).toBe('a1');
    expect(evaluate('[1, 2] + 3', scope)).toEqual([1, 2, 3]);
    expect(evaluate('[1] + [2]', scope)).toEqual([1, 2]);
    expect(evaluate('{a: 1} + {b: 2}', scope)).toEqual({ a: 1, b: 2 });
  });

  it('coerces numbers the way arithmetic expects', () => {
    expect(evaluate("'5' * 2", scope)).toBe(10);
    expect(evaluate('null + 1', scope)).toBe(1);
    expect(evaluate('true + 1', scope)).toBe(2);
    expect(() => evaluate('{} * 2', scope)).toThrow(EvalError);
    expect(() => evaluate('10 / 0', scope)).toThrow('Division by zero');
  });

  it('resolves sigil and bare variables', () => {
    expect(evaluate('$user.name', scope)).toBe('Ada');
    expect(evaluate('user.region', scope)).toBe('EU');
    expect(evaluate('$items.0', scope)).toBe(10);
    expect(evaluate('$items[1]', scope)).toBe(20);
    expect(evaluate('$people[1].name', scope)).toBe('Linus');
  });

  it('yields null for missing paths and unknown sigil roots', () => {
    expect(evaluate('$user.missing', scope)).toBeNull();
    expect(evaluate('$nothing.here', scope)).toBeNull();
  });

  it('rejects bare identifiers that name nothing', () => {
    expect(() => evaluate('nothing', scope)).toThrow(UnknownIdentifierError);
  });

  it('compares with numeric coercion and deep equality', () => {
    expect(evaluate("'1' == 1", scope)).toBe(true);
    expect(evaluate('[1, {a: 2}] == [1, {a: 2}]', scope)).toBe(true);
    expect(evaluate('$score > 0.5', scope)).toBe(true);
    expect(evaluate("'b' > 'a'", scope)).toBe(true);
    expect(evaluate("$user.region != 'US'", scope)).toBe(true);
    expect(() => evaluate('[1] > 1', scope)).toThrow('Cannot compare array > number');
  });

  it('short-circuits logical operators and returns operand values', () => {
    expect(evaluate("0 || 'fallback'", scope)).toBe('fallback');
    expect(evaluate('1 && 2', scope)).toBe(2);
    expect(evaluate("$score > 0.5 AND $user.region == 'EU'", scope)).toBe(true);
    expect(evaluate("$score > 0.5 and $user.region == 'US'", scope)).toBe(false);
    expect(evaluate("$score < 0.5 OR $user.plan == 'pro'", scope)).toBe(true);
    expect(evaluate("NOT ($user.region == 'US')", scope)).toBe(true);
    expect(evaluate('!0', scope)).toBe(true);
  });

  it('calls builtin functions', () => {
    expect(evaluate('len($items)', scope)).toBe(3);
    expect(evaluate('length($text)', scope)).toBe(17);
    expect(evaluate("contains($text, 'wifi')", scope)).toBe(true);
    expect(evaluate("upper('ab') + lower('CD')", scope)).toBe('ABcd');
    expect(evaluate("default($missing, 'x')", scope)).toBe('x');
    expect(evaluate('coalesce(null, null, 2)', scope)).toBe(2);
    expect(evaluate("pluck($people, 'name')", scope)).toEqual(['Ada', 'Linus']);
    expect(evaluate("where($people, 'age', 30)", scope)).toEqual([{ name: 'Linus', age: 30 }]);
    expect(evaluate('range(3)', scope)).toEqual([0, 1, 2]);
    expect(evaluate("join(['a', 'b'], '-')", scope)).toBe('a-b');
    expect(evaluate("split('a,b', ',')", scope)).toEqual(['a', 'b']);
    expect(evaluate('round(3.14159, 2)', scope)).toBe(3.14);
    expect(evaluate('max($items)', scope)).toBe(30);
    expect(evaluate('type([])', scope)).toBe('array');
    expect(evaluate("parse_json('{\"a\":1}')", scope)).toEqual({ a: 1 });
  });

  it('checks function arity at evaluation time', () => {
    expect(() => evaluate('len(1, 2)', scope)).toThrow('len() expects 1 arguments, got 2');
  });

  it('rejects unknown functions and malformed input at parse time', () => {
    expect(() => parseExpression('nope(1)')).toThrow(ExpressionSyntaxError);
    expect(() => parseExpression("'open")).toThrow('Unterminated string literal');
    expect(() => parseExpression('1 +')).toThrow(ExpressionSyntaxError);
    expect(() => parseExpression('weird stuff')).toThrow(ExpressionSyntaxError);
  });

  it('handles escapes inside string literals', () => {
    expect(evaluate("'it\\'s'", scope)).toBe("it's");
  });

  it('tokenizes variables with their source positions', () => {
    const tokens = tokenize('$a.b + 1');
    expect(tokens.map((t) => t.type)).toEqual(['VAR', 'OP', 'NUMBER', 'EOF']);
    expect(tokens[0]).toEqual({ type: 'VAR', value: 'a.b', start: 0, end: 4 });
  });
});
