// runtime/core/context.ts

import type { ErrorInfo, FlowEvent, NodeRecord, NodeStatus, Value, ValueObject } from '../../core/types.ts';
import { DEFAULTS } from '../../core/constants.ts';
import { RecursionLimitError } from './errors.ts';
import type { ExpressionScope } from './expressionEngine.ts';
import { noopSink, type EventSink } from './observer.ts';
import { cloneValue, getPath, isValueObject, setPath, splitPath, toValue } from './value.ts';
import { matchNodeReference } from './variables.ts';

export interface LoopScope {
  item: string | null;
  value: Value;
  index: number;
  first: boolean;
  last: boolean;
  count: number | null;
}

export interface ExecutionContextOptions {
  input?: Value;
  ctx?: ValueObject;
  sink?: EventSink;
  signal?: AbortSignal;
  maxDepth?: number;
  executionStack?: string[];
}

export interface ContextSnapshot {
  input: Value;
  ctx: ValueObject;
  reply: ValueObject;
  outputs: ValueObject;
}

function deepFreeze(value: Value): Value {
  if (Array.isArray(value)) {
    value.forEach(deepFreeze);
    Object.freeze(value);
  } else if (isValueObject(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

export function errorInfoToValue(info: ErrorInfo): ValueObject {
  return { code: info.code, message: info.message, node: info.node, details: info.details };
}

function freshReply(): ValueObject {
  return {
    content: null,
    output: '',
    tokens: 0,
    model: null,
    finish_reason: null,
    chat_id: null,
    status: null,
  };
}

interface LoopParent {
  context: ExecutionContext;
  scope: LoopScope;
}

/**
 * Run-scoped state shared by every node of a (merged) graph.
 *
 * Variable lookup order: reserved roots, loop bindings (innermost first),
 * node records (longest matching id), top-level `ctx` keys.
 *
 * Loop bodies see the run through {@link withLoop} views: ctx, reply and node
 * records stay shared, the loop bindings and `output` belong to the view.
 */
export class ExecutionContext implements ExpressionScope {
  readonly input: Value;
  readonly ctx: ValueObject;
  readonly reply: ValueObject;
  readonly sink: EventSink;
  readonly signal: AbortSignal;
  readonly maxDepth: number;

  private readonly records: Map<string, NodeRecord>;
  private readonly persisted: Set<string>;
  private readonly loops: readonly LoopScope[];
  private readonly executionStack: string[];
  private current: Value;

  constructor(options: ExecutionContextOptions = {}, parent?: LoopParent) {
    if (parent) {
      const base = parent.context;
      this.input = base.input;
      this.ctx = base.ctx;
      this.reply = base.reply;
      this.sink = base.sink;
      this.signal = base.signal;
      this.maxDepth = base.maxDepth;
      this.records = base.records;
      this.persisted = base.persisted;
      this.executionStack = base.executionStack;
      this.loops = [...base.loops, parent.scope];
      this.current = base.current;
      return;
    }
    this.input = deepFreeze(cloneValue(options.input ?? null));
    this.ctx = options.ctx ?? {};
    this.reply = freshReply();
    this.sink = options.sink ?? noopSink;
    this.signal = options.signal ?? new AbortController().signal;
    this.maxDepth = options.maxDepth ?? DEFAULTS.maxDepth;
    this.records = new Map();
    this.persisted = new Set();
    this.executionStack = options.executionStack ?? [];
    this.loops = [];
    this.current = null;
  }

  // -----------------------------
  // Lookup
  // -----------------------------

  lookup(parts: readonly string[]): Value | undefined {
    if (parts.length === 0) return undefined;
    const [root, ...rest] = parts;

    switch (root) {
      case 'input':
        return getPath(this.input, rest);
      case 'ctx':
        return getPath(this.ctx, rest);
      case 'output':
        return getPath(this.current, rest);
      case 'reply':
        return getPath(this.reply, rest);
      case 'loop': {
        const scope = this.loops[this.loops.length - 1];
        return scope ? getPath(loopMeta(scope), rest) : null;
      }
      case 'error':
        return getPath(this.ctx.error ?? null, rest);
    }

    for (let i = this.loops.length - 1; i >= 0; i--) {
      const scope = this.loops[i];
      if (scope.item === root) return getPath(scope.value, rest);
    }

    const ref = matchNodeReference(parts, (id) => this.records.has(id));
    if (ref) {
      return getPath(this.recordValue(ref.id), ref.rest);
    }

    if (Object.prototype.hasOwnProperty.call(this.ctx, root)) {
      return getPath(this.ctx[root], rest);
    }
    return undefined;
  }

  get currentOutput(): Value {
    return this.current;
  }

  // -----------------------------
  // Writes
  // -----------------------------

  /**
   * Dotted-path write. `reply.*` paths go to the reply metadata (a `reply.status`
   * write emits a status event), an optional `ctx.` prefix is dropped, everything
   * else lands in `ctx`.
   */
  set(path: string, value: Value, node: string | null = null): void {
    const parts = splitPath(path);
    if (parts.length === 0) return;

    if (parts[0] === 'reply' && parts.length > 1) {
      setPath(this.reply, parts.slice(1), value);
      if (parts.length === 2 && parts[1] === 'status' && typeof value === 'string') {
        this.emit({ type: 'status', node, status: value });
      }
      return;
    }

    setPath(this.ctx, parts[0] === 'ctx' ? parts.slice(1) : parts, value);
  }

  setReply(fields: ValueObject): void {
    Object.assign(this.reply, fields);
  }

  appendReplyOutput(text: string): void {
    const previous = this.reply.output;
    this.reply.output = (typeof previous === 'string' ? previous : '') + text;
  }

  raiseError(info: ErrorInfo): void {
    this.ctx.error = errorInfoToValue(info);
  }

  // -----------------------------
  // Node records
  // -----------------------------

  registerNode(id: string): void {
    this.records.set(id, { status: 'pending', output: null, error: null });
    this.persisted.delete(id);
  }

  hasNode(id: string): boolean {
    return this.records.has(id);
  }

  setStatus(id: string, status: NodeStatus): void {
    const record = this.records.get(id);
    if (record) record.status = status;
  }

  status(id: string): NodeStatus | undefined {
    return this.records.get(id)?.status;
  }

  recordOutput(id: string, value: Value, persist: boolean): void {
    const record = this.records.get(id);
    if (!record) return;
    record.status = 'done';
    if (persist) {
      record.output = value;
      this.persisted.add(id);
      this.current = value;
    }
  }

  recordError(id: string, info: ErrorInfo): void {
    const record = this.records.get(id);
    if (!record) return;
    record.status = 'failed';
    record.error = info;
  }

  private recordValue(id: string): Value {
    const record = this.records.get(id);
    if (!record) return null;
    return {
      status: record.status,
      output: record.output,
      error: record.error ? errorInfoToValue(record.error) : null,
    };
  }

  /** Persisted node outputs, keyed by node id. */
  outputs(): ValueObject {
    const out: ValueObject = {};
    for (const id of this.persisted) {
      const record = this.records.get(id);
      if (record) out[id] = record.output;
    }
    return out;
  }

  statuses(): Record<string, NodeStatus> {
    const out: Record<string, NodeStatus> = {};
    for (const [id, record] of this.records) out[id] = record.status;
    return out;
  }

  // -----------------------------
  // Loop scopes
  // -----------------------------

  /** A view of this run with `scope` as the innermost loop binding. */
  withLoop(scope: LoopScope): ExecutionContext {
    return new ExecutionContext({}, { context: this, scope });
  }

  // -----------------------------
  // Nested executions
  // -----------------------------

  /**
   * Push `identifier` on the execution stack shared with every forked context.
   * Re-entering an identifier already on the stack, or exceeding maxDepth, fails.
   */
  enterExecution(identifier: string): void {
    if (this.executionStack.includes(identifier) || this.executionStack.length >= this.maxDepth) {
      throw new RecursionLimitError([...this.executionStack, identifier], this.maxDepth);
    }
    this.executionStack.push(identifier);
  }

  exitExecution(identifier: string): void {
    const index = this.executionStack.lastIndexOf(identifier);
    if (index >= 0) this.executionStack.splice(index, 1);
  }

  get executionDepth(): number {
    return this.executionStack.length;
  }

  /** Isolated context for a runtime sub-workflow: fresh ctx, explicit input. */
  fork(input: Value, signal: AbortSignal = this.signal): ExecutionContext {
    return new ExecutionContext({
      input,
      sink: this.sink,
      signal,
      maxDepth: this.maxDepth,
      executionStack: this.executionStack,
    });
  }

  /** Copy the named ctx fields of a finished child context back into this one. */
  mergeReturned(child: ExecutionContext, fields: readonly string[]): void {
    for (const field of fields) {
      const parts = splitPath(field.startsWith('ctx.') ? field.slice(4) : field);
      const value = getPath(child.ctx, parts);
      if (value !== null) setPath(this.ctx, parts, cloneValue(value));
    }
  }

  emit(event: FlowEvent): void {
    this.sink.emit(event);
  }

  snapshot(): ContextSnapshot {
    return {
      input: this.input,
      ctx: toValueObject(cloneValue(this.ctx)),
      reply: toValueObject(cloneValue(this.reply)),
      outputs: this.outputs(),
    };
  }
}

function loopMeta(scope: LoopScope): ValueObject {
  return {
    index: scope.index,
    first: scope.first,
    last: scope.last,
    count: scope.count,
    item: scope.value,
  };
}

function toValueObject(value: Value): ValueObject {
  const converted = toValue(value);
  return isValueObject(converted) ? converted : {};
}
