// runtime/core/errors.ts

import type { ErrorCode, ErrorInfo, Value } from '../../core/types.ts';

/**
 * Base class of every error the compiler and engine raise.
 * `node` is filled in by the scheduler when the error escapes a node.
 */
export class FlowError extends Error {
  readonly code: ErrorCode;
  node: string | null;
  readonly details: Value;

  constructor(code: ErrorCode, message: string, options: { node?: string | null; details?: Value } = {}) {
    super(message);
    this.name = code;
    this.code = code;
    this.node = options.node ?? null;
    this.details = options.details ?? null;
  }

  toInfo(): ErrorInfo {
    return { code: this.code, message: this.message, node: this.node, details: this.details };
  }

  static fromInfo(info: ErrorInfo): FlowError {
    return new FlowError(info.code, info.message, { node: info.node, details: info.details });
  }
}

export class ParseError extends FlowError {
  readonly source?: string;

  constructor(message: string, source?: string, details: Value = null) {
    super('ParseError', source ? `${source}: ${message}` : message, { details });
    this.source = source;
  }
}

export class CircularImportError extends FlowError {
  readonly chain: string[];

  constructor(chain: string[]) {
    super('CircularImport', `Circular flow import: ${chain.join(' -> ')}`, { details: chain });
    this.chain = chain;
  }
}

export class EvalError extends FlowError {
  constructor(message: string, details: Value = null) {
    super('EvalError', message, { details });
  }
}

export class ExpressionSyntaxError extends EvalError {
  readonly position: number;

  constructor(message: string, position: number) {
    super(message, { position });
    this.position = position;
  }
}

// Bare identifier whose root resolves to nothing; argument evaluation falls back to the raw text.
export class UnknownIdentifierError extends EvalError {
  readonly identifier: string;

  constructor(identifier: string) {
    super(`Unknown identifier '${identifier}'`, { identifier });
    this.identifier = identifier;
  }
}

export class UnresolvedVariableError extends FlowError {
  constructor(expression: string, node?: string) {
    super('UnresolvedVariable', `Expression '${expression}' resolved to null`, {
      node,
      details: { expression },
    });
  }
}

export class MissingArgumentError extends FlowError {
  constructor(tool: string, argument: string) {
    super('MissingArgument', `Tool '${tool}' requires argument '${argument}'`, {
      details: { tool, argument },
    });
  }
}

export class ToolResolutionError extends FlowError {
  constructor(message: string, details: Value = null) {
    super('ToolResolutionError', message, { details });
  }
}

export class ToolTimeoutError extends FlowError {
  constructor(callId: string, timeoutMs: number) {
    super('ToolTimeout', `Client tool call ${callId} timed out after ${timeoutMs}ms`, {
      details: { callId, timeoutMs },
    });
  }
}

export class CallFailureError extends FlowError {
  constructor(message: string, details: Value = null) {
    super('CallFailure', message, { details });
  }
}

export class LoopLimitError extends FlowError {
  constructor(limit: number) {
    super('LoopLimitExceeded', `Loop exceeded ${limit} iterations`, { details: { limit } });
  }
}

export class RecursionLimitError extends FlowError {
  constructor(stack: string[], maxDepth: number) {
    const message = stack.length > maxDepth
      ? `Maximum workflow depth ${maxDepth} exceeded: ${stack.join(' -> ')}`
      : `Recursive workflow execution: ${stack.join(' -> ')}`;
    super('RecursionLimit', message, { details: stack });
  }
}

export class CancelledError extends FlowError {
  constructor(reason = 'Run cancelled') {
    super('Cancelled', reason);
  }
}

// -----------------------------
// Foreign error classification
// -----------------------------

export type ErrorClass = 'transient' | 'hard' | 'unknown';
export type FailureCode = 'timeout' | 'rate_limit' | 'network';

export interface CallErrorClassification {
  errorClass: ErrorClass;
  errorCode?: FailureCode;
}

function readField(err: unknown, key: string): unknown {
  if (err && typeof err === 'object' && key in err) {
    return Reflect.get(err, key);
  }
  return undefined;
}

/**
 * Classify an error thrown by a collaborator (model API, HTTP, tool server).
 * The engine never retries; the classification only travels in `details`.
 */
export function classifyCallError(err: unknown): CallErrorClassification {
  const msg = String(err instanceof Error ? err.message : readField(err, 'message') ?? err ?? '').toLowerCase();
  const code = String(readField(err, 'code') ?? '').toLowerCase();
  const status = String(readField(err, 'status') ?? readField(readField(err, 'response'), 'status') ?? '');

  if (status === '400' || status === '401' || status === '403') {
    return { errorClass: 'hard' };
  }

  if (status === '429' || msg.includes('429') || msg.includes('resource_exhausted')) {
    if (msg.includes('requests per day') || msg.includes('quota exceeded for metric')) {
      return { errorClass: 'hard', errorCode: 'rate_limit' };
    }
    return { errorClass: 'transient', errorCode: 'rate_limit' };
  }

  if (msg.includes('timeout') || code.includes('etimedout')) {
    return { errorClass: 'transient', errorCode: 'timeout' };
  }

  if (status === '503' || msg.includes('503') || msg.includes('unavailable')) {
    return { errorClass: 'transient', errorCode: 'network' };
  }
  if (msg.includes('fetch failed') || code.includes('econnreset') || code.includes('econnrefused')) {
    return { errorClass: 'transient', errorCode: 'network' };
  }

  return { errorClass: 'unknown' };
}

/**
 * Normalise anything thrown while executing `node` into an ErrorInfo.
 * Errors that already name a node keep it.
 */
export function toErrorInfo(err: unknown, node: string | null = null): ErrorInfo {
  if (err instanceof FlowError) {
    return { ...err.toInfo(), node: err.node ?? node };
  }

  const message = err instanceof Error ? err.message : String(err);
  const { errorClass, errorCode } = classifyCallError(err);
  const details: Value = errorCode ? { errorClass, errorCode } : { errorClass };
  return { code: 'CallFailure', message, node, details };
}
