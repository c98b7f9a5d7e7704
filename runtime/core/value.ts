// runtime/core/value.ts

import type { Value, ValueObject } from '../../core/types.ts';
import { EvalError } from './errors.ts';

export function isValueObject(value: Value | undefined): value is ValueObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * null, false, 0, "", [] and {} are falsy; everything else is truthy.
 */
export function isTruthy(value: Value): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return Object.keys(value).length > 0;
}

export function isNumeric(value: Value): boolean {
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 && Number.isFinite(Number(trimmed));
  }
  return false;
}

export function toNumber(value: Value): number {
  if (value === null) return 0;
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && isNumeric(value)) return Number(value.trim());
  throw new EvalError(`Cannot convert ${typeName(value)} ${toStr(value)} to a number`);
}

export function toStr(value: Value): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export function typeName(value: Value): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function deepEqual(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
  }
  if (isValueObject(a)) {
    if (!isValueObject(b)) return false;
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => key in b && deepEqual(a[key], b[key]));
  }
  return false;
}

/**
 * Convert foreign data (parsed JSON, YAML, API payloads) into a Value.
 */
export function toValue(input: unknown): Value {
  if (input === null || input === undefined) return null;
  if (typeof input === 'string' || typeof input === 'boolean') return input;
  if (typeof input === 'number') return Number.isFinite(input) ? input : null;
  if (typeof input === 'bigint') return Number(input);
  if (input instanceof Date) return input.toISOString();
  if (Array.isArray(input)) return input.map((item) => toValue(item));
  if (typeof input === 'object') {
    const out: ValueObject = {};
    for (const [key, val] of Object.entries(input)) {
      if (val === undefined || typeof val === 'function') continue;
      out[key] = toValue(val);
    }
    return out;
  }
  return null;
}

export function cloneValue<T extends Value>(value: T): T {
  return structuredClone(value);
}

/**
 * Walk `segments` into `value`. Arrays accept integer segments.
 * Missing segments yield null.
 */
export function getPath(value: Value, segments: readonly string[]): Value {
  let current: Value = value;
  for (const segment of segments) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index) || index < 0 || index >= current.length) return null;
      current = current[index];
    } else if (isValueObject(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, segment)) return null;
      current = current[segment];
    } else {
      return null;
    }
  }
  return current;
}

/**
 * Write `value` at `segments` below `target`, creating (or replacing non-object)
 * intermediate entries with objects.
 */
export function setPath(target: ValueObject, segments: readonly string[], value: Value): void {
  if (segments.length === 0) return;
  let current: ValueObject = target;
  for (const segment of segments.slice(0, -1)) {
    const next = current[segment];
    if (isValueObject(next)) {
      current = next;
    } else {
      const created: ValueObject = {};
      current[segment] = created;
      current = created;
    }
  }
  current[segments[segments.length - 1]] = value;
}

export function splitPath(path: string): string[] {
  return path.split('.').filter((part) => part.length > 0);
}
