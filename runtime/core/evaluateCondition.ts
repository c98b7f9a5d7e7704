// runtime/core/evaluateCondition.ts

import { evaluate, type ExpressionScope } from './expressionEngine.ts';
import { isTruthy } from './value.ts';

export type ConditionOutcome =
  | { ok: true; value: boolean }
  | { ok: false; error: unknown };

/**
 * Evaluate a condition string against a scope.
 *
 * Empty / undefined condition → true (no condition means "always").
 * The expression's value is reduced to its truthiness.
 */
export function evaluateCondition(expression: string | undefined | null, scope: ExpressionScope): boolean {
  if (!expression || expression.trim().length === 0) {
    return true;
  }
  return isTruthy(evaluate(expression.trim(), scope));
}

/**
 * Same as evaluateCondition, but reports failures instead of throwing.
 * Used for edge conditions, where a failing condition counts as false.
 */
export function tryEvaluateCondition(
  expression: string | undefined | null,
  scope: ExpressionScope,
): ConditionOutcome {
  try {
    return { ok: true, value: evaluateCondition(expression, scope) };
  } catch (error) {
    return { ok: false, error };
  }
}
