// runtime/core/variables.ts

import type { Value } from '../../core/types.ts';
import { EXPRESSION_KEYWORDS, isReservedRoot } from '../../core/constants.ts';
import { ExpressionSyntaxError, UnknownIdentifierError } from './errors.ts';
import { evaluate, parseExpression, tokenize, type ExprAst, type ExpressionScope, type Token } from './expressionEngine.ts';
import { splitPath, toStr } from './value.ts';

const TEMPLATE_RE = /\{\{\s*(\$?[A-Za-z_][A-Za-z0-9_.]*)\s*\}\}/g;
const TEMPLATE_ROOT_RE = /(\{\{\s*\$?)([A-Za-z_][A-Za-z0-9_]*)/g;
const LOOSE_VAR_RE = /\$([A-Za-z_][A-Za-z0-9_]*)/g;

const KEYWORDS: ReadonlySet<string> = new Set<string>(EXPRESSION_KEYWORDS);

/**
 * Evaluate a node argument. Text that is not an expression (prose, bare words)
 * is taken verbatim.
 */
export function evaluateArgument(source: string, scope: ExpressionScope): Value {
  let ast: ExprAst;
  try {
    ast = parseExpression(source);
  } catch (err) {
    if (err instanceof ExpressionSyntaxError) return source;
    throw err;
  }

  try {
    return evaluate(ast, scope);
  } catch (err) {
    if (err instanceof UnknownIdentifierError) return source;
    throw err;
  }
}

/**
 * Replace `{{ path }}` placeholders. Placeholders that resolve to nothing stay as written.
 */
export function renderTemplate(template: string, scope: ExpressionScope): string {
  return template.replace(TEMPLATE_RE, (placeholder, rawPath: string) => {
    const parts = splitPath(rawPath.startsWith('$') ? rawPath.slice(1) : rawPath);
    const value = scope.lookup(parts);
    return value === undefined || value === null ? placeholder : toStr(value);
  });
}

export interface NodeReference {
  id: string;
  rest: string[];
}

/**
 * Find the longest leading run of `parts` that names a node.
 * `["order", "payment", "charge", "output"]` matches node `order.payment.charge`.
 */
export function matchNodeReference(parts: readonly string[], hasNode: (id: string) => boolean): NodeReference | null {
  for (let n = parts.length; n >= 1; n--) {
    const id = parts.slice(0, n).join('.');
    if (hasNode(id)) {
      return { id, rest: parts.slice(n) };
    }
  }
  return null;
}

// -----------------------------
// Namespace rewrite (flow imports)
// -----------------------------

function shouldPrefix(root: string, localRoots: ReadonlySet<string>): boolean {
  return !isReservedRoot(root) && !KEYWORDS.has(root.toLowerCase()) && localRoots.has(root);
}

function rewriteTemplates(text: string, localRoots: ReadonlySet<string>, alias: string): string {
  return text.replace(TEMPLATE_ROOT_RE, (match, open: string, root: string) =>
    shouldPrefix(root, localRoots) ? `${open}${alias}.${root}` : match,
  );
}

function isReferenceToken(tokens: Token[], index: number): boolean {
  const token = tokens[index];
  if (token.type === 'VAR') return true;
  if (token.type !== 'IDENT') return false;

  const prev = tokens[index - 1];
  const next = tokens[index + 1];
  if (prev && prev.type === 'DOT') return false; // member access
  if (next && (next.type === 'LPAREN' || next.type === 'COLON')) return false; // function name / object key
  return true;
}

/**
 * Prefix every variable reference whose first segment is one of `localRoots`
 * with `alias.`. Reserved roots and string literal contents are left alone,
 * except for `{{ }}` placeholders inside literals.
 */
export function rewriteReferences(source: string, localRoots: ReadonlySet<string>, alias: string): string {
  let tokens: Token[];
  try {
    tokens = tokenize(source);
    parseExpression(source);
  } catch (err) {
    if (!(err instanceof ExpressionSyntaxError)) throw err;
    // Plain text: only explicit `$var` references and placeholders are references.
    const rewritten = source.replace(LOOSE_VAR_RE, (match, root: string) =>
      shouldPrefix(root, localRoots) ? `$${alias}.${root}` : match,
    );
    return rewriteTemplates(rewritten, localRoots, alias);
  }

  let out = '';
  let cursor = 0;
  tokens.forEach((token, index) => {
    let replacement: string | undefined;

    if (token.type === 'STRING') {
      const raw = source.slice(token.start, token.end);
      const templated = rewriteTemplates(raw, localRoots, alias);
      if (templated !== raw) replacement = templated;
    } else if (isReferenceToken(tokens, index)) {
      const root = splitPath(token.value)[0] ?? '';
      if (shouldPrefix(root, localRoots)) {
        replacement = `${token.type === 'VAR' ? '$' : ''}${alias}.${token.value}`;
      }
    }

    if (replacement !== undefined) {
      out += source.slice(cursor, token.start) + replacement;
      cursor = token.end;
    }
  });
  return out + source.slice(cursor);
}

/**
 * Root segments referenced by an expression (for validation).
 */
export function referencedRoots(source: string): string[] {
  let tokens: Token[];
  try {
    tokens = tokenize(source);
  } catch (err) {
    if (err instanceof ExpressionSyntaxError) return [];
    throw err;
  }
  const roots = new Set<string>();
  tokens.forEach((token, index) => {
    if (!isReferenceToken(tokens, index)) return;
    const root = splitPath(token.value)[0];
    if (root && !KEYWORDS.has(root.toLowerCase())) roots.add(root);
  });
  return [...roots];
}
