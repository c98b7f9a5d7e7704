// runtime/core/builtins/args.ts

import type { Value, ValueObject } from '../../../core/types.ts';
import { MissingArgumentError } from '../errors.ts';
import { isTruthy, isValueObject, toNumber, toStr } from '../value.ts';

function present(value: Value | undefined): value is Value {
  return value !== undefined && value !== null;
}

export function optionalString(args: ValueObject, name: string): string | undefined {
  const value = args[name];
  return present(value) ? toStr(value) : undefined;
}

export function requireString(args: ValueObject, tool: string, name: string): string {
  const value = optionalString(args, name);
  if (value === undefined) throw new MissingArgumentError(tool, name);
  return value;
}

export function optionalNumber(args: ValueObject, name: string): number | undefined {
  const value = args[name];
  return present(value) ? toNumber(value) : undefined;
}

export function optionalBoolean(args: ValueObject, name: string): boolean | undefined {
  const value = args[name];
  if (!present(value)) return undefined;
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
  }
  return isTruthy(value);
}

/**
 * Header maps come as objects or as JSON text.
 */
export function optionalStringMap(args: ValueObject, name: string): Record<string, string> | undefined {
  let value = args[name];
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch {
      return undefined;
    }
  }
  if (!isValueObject(value)) return undefined;
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== null) out[key] = toStr(entry);
  }
  return out;
}

/**
 * Strip one pair of matching quotes from raw argument text.
 */
export function unquote(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if ((first === '"' || first === "'") && trimmed.endsWith(first)) return trimmed.slice(1, -1);
  }
  return trimmed;
}
