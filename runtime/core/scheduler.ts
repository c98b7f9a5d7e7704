// runtime/core/scheduler.ts

import type { ErrorInfo, FlowEdge, FlowNode, NodeKind, NodeStatus, Subgraph, Value, ValueObject } from '../../core/types.ts';
import { DEFAULTS } from '../../core/constants.ts';
import { createLogger } from '../shared/logger.ts';
import type { ExecutionContext } from './context.ts';
import { CancelledError, EvalError, FlowError, LoopLimitError, UnresolvedVariableError, toErrorInfo } from './errors.ts';
import { evaluateCondition, tryEvaluateCondition } from './evaluateCondition.ts';
import { evaluate } from './expressionEngine.ts';
import { collectNodeIds, entryNodes, exitNodes, indexEdges, type EdgeIndex } from './graph.ts';
import { TransientOutput, evaluateCallArgs, type EngineServices } from './toolsRuntime.ts';
import { isValueObject, toStr, typeName } from './value.ts';

const log = createLogger('scheduler');

export interface SchedulerOptions {
  services: EngineServices;

  // 0 = unbounded
  maxConcurrency?: number;
  maxLoopIterations?: number;
}

export type SchedulerOutcome =
  | { ok: true; value: Value }
  | { ok: false; error: ErrorInfo };

type EdgeState = 'fired' | 'impossible';

type NodeOutcome =
  | { ok: true; value: Value; persist: boolean }
  | { ok: false; error: ErrorInfo };

interface Completion {
  id: string;
  outcome: NodeOutcome;
}

const ABORTED = Symbol('aborted');

function cancellationError(signal: AbortSignal): CancelledError {
  return signal.reason instanceof CancelledError ? signal.reason : new CancelledError();
}

/**
 * Runs one subgraph to completion on a shared context.
 *
 * Nodes start when any incoming edge fires (first trigger wins) and become
 * unreachable once every incoming edge is impossible. A failing node routes to
 * its first error edge; without one the run fails and in-flight nodes are aborted.
 * Loop bodies run through nested schedulers, one loop view of the context per
 * iteration.
 */
export class FlowScheduler {
  private readonly index: EdgeIndex;
  private readonly statuses = new Map<string, NodeStatus>();
  private readonly edgeStates = new Map<FlowEdge, EdgeState>();
  private readonly values = new Map<string, Value>();
  private readonly queue: string[] = [];
  private lastPersisted: Value = null;
  private readonly maxConcurrency: number;
  private readonly maxLoopIterations: number;

  constructor(
    private readonly graph: Subgraph,
    private readonly context: ExecutionContext,
    private readonly options: SchedulerOptions,
  ) {
    this.index = indexEdges(graph);
    this.maxConcurrency = options.maxConcurrency ?? DEFAULTS.maxConcurrency;
    this.maxLoopIterations = options.maxLoopIterations ?? DEFAULTS.maxLoopIterations;
  }

  async run(signal: AbortSignal = this.context.signal): Promise<SchedulerOutcome> {
    const controller = new AbortController();
    const forward = () => controller.abort(signal.reason);
    if (signal.aborted) {
      forward();
    } else {
      signal.addEventListener('abort', forward, { once: true });
    }
    try {
      return await this.execute(controller);
    } finally {
      signal.removeEventListener('abort', forward);
    }
  }

  // -----------------------------
  // Main loop
  // -----------------------------

  private async execute(controller: AbortController): Promise<SchedulerOutcome> {
    for (const id of collectNodeIds(this.graph)) this.context.registerNode(id);
    for (const id of this.graph.nodes.keys()) this.statuses.set(id, 'pending');

    const entries = new Set(entryNodes(this.graph));
    for (const id of this.graph.nodes.keys()) {
      if (entries.has(id)) {
        this.markReady(id);
      } else if ((this.index.incoming.get(id) ?? []).length === 0) {
        log.debug('Node has no incoming edges and is not an entry', { node: id });
        this.markUnreachable(id);
      }
    }

    const { signal } = controller;
    const aborted = new Promise<typeof ABORTED>((resolve) => {
      if (signal.aborted) resolve(ABORTED);
      else signal.addEventListener('abort', () => resolve(ABORTED), { once: true });
    });

    const inFlight = new Map<string, Promise<Completion>>();
    let failure: ErrorInfo | null = null;

    while (!signal.aborted) {
      while (this.queue.length > 0 && (this.maxConcurrency === 0 || inFlight.size < this.maxConcurrency)) {
        const id = this.queue.shift();
        if (id === undefined) break;
        inFlight.set(id, this.start(id, signal));
      }
      if (inFlight.size === 0) break;

      const settled = await Promise.race([aborted, ...inFlight.values()]);
      if (settled === ABORTED) break;

      inFlight.delete(settled.id);
      const terminal = this.complete(settled.id, settled.outcome);
      if (terminal) {
        failure = terminal;
        controller.abort(new CancelledError(`Run aborted after '${settled.id}' failed`));
      }
    }

    if (signal.aborted) {
      const cancelled = cancellationError(signal).toInfo();
      for (const id of inFlight.keys()) {
        this.statuses.set(id, 'failed');
        this.context.recordError(id, { ...cancelled, node: id });
        this.context.emit({ type: 'node_complete', node: id, status: 'failed' });
      }
      failure = failure ?? cancelled;
    }

    for (const [id, status] of this.statuses) {
      if (status === 'pending' || status === 'ready') {
        this.statuses.set(id, 'unreachable');
        this.context.setStatus(id, 'unreachable');
      }
    }

    if (failure) return { ok: false, error: failure };
    return { ok: true, value: this.result() };
  }

  private result(): Value {
    const done = exitNodes(this.graph).filter((id) => this.statuses.get(id) === 'done');
    if (done.length === 0) return this.lastPersisted;
    if (done.length === 1) return this.values.get(done[0]) ?? null;
    const out: ValueObject = {};
    for (const id of done) out[id] = this.values.get(id) ?? null;
    return out;
  }

  // -----------------------------
  // Node execution
  // -----------------------------

  private async start(id: string, signal: AbortSignal): Promise<Completion> {
    const node = this.graph.nodes.get(id);
    this.statuses.set(id, 'running');
    this.context.setStatus(id, 'running');
    log.debug('Node started', { node: id, kind: node?.kind.type ?? null });

    if (!node) {
      return { id, outcome: { ok: false, error: { code: 'EvalError', message: `Unknown node '${id}'`, node: id, details: null } } };
    }
    this.context.emit(node.kind.type === 'call'
      ? { type: 'node_start', node: id, target: node.kind.target }
      : { type: 'node_start', node: id });

    try {
      const result = await this.executeKind(node, node.kind, signal);
      return { id, outcome: { ok: true, ...result } };
    } catch (err) {
      return { id, outcome: { ok: false, error: toErrorInfo(err, id) } };
    }
  }

  private async executeKind(node: FlowNode, kind: NodeKind, signal: AbortSignal): Promise<{ value: Value; persist: boolean }> {
    switch (kind.type) {
      case 'literal':
        return { value: kind.value, persist: true };

      case 'call': {
        const { services } = this.options;
        const args = evaluateCallArgs(kind.args, this.context);
        const result = await services.dispatcher.dispatch(kind.target, args, {
          node: node.id,
          raw: kind.args,
          context: this.context,
          signal,
          services,
        });
        if (result instanceof TransientOutput) return { value: result.value, persist: false };
        return { value: result, persist: true };
      }

      case 'foreach':
        return { value: await this.runForeach(node, kind, signal), persist: true };

      case 'while':
        return { value: await this.runWhile(kind, signal), persist: true };
    }
  }

  private async runForeach(
    node: FlowNode,
    kind: Extract<NodeKind, { type: 'foreach' }>,
    signal: AbortSignal,
  ): Promise<Value[]> {
    const collection = evaluate(kind.collection, this.context);
    let items: Value[];
    if (Array.isArray(collection)) {
      items = collection;
    } else if (isValueObject(collection)) {
      items = Object.values(collection);
    } else if (collection === null) {
      throw new UnresolvedVariableError(kind.collection, node.id);
    } else {
      throw new EvalError(`Cannot iterate over ${typeName(collection)}`, { expression: kind.collection });
    }

    if (items.length > this.maxLoopIterations) {
      throw new LoopLimitError(this.maxLoopIterations);
    }

    const results: Value[] = [];
    for (let index = 0; index < items.length; index++) {
      if (signal.aborted) throw cancellationError(signal);
      const scope = this.context.withLoop({
        item: kind.item,
        value: items[index],
        index,
        first: index === 0,
        last: index === items.length - 1,
        count: items.length,
      });
      results.push(await this.runBody(kind.body, scope, signal));
    }
    return results;
  }

  private async runWhile(kind: Extract<NodeKind, { type: 'while' }>, signal: AbortSignal): Promise<Value[]> {
    const results: Value[] = [];
    for (let index = 0; ; index++) {
      if (signal.aborted) throw cancellationError(signal);
      if (!evaluateCondition(kind.condition, this.context)) break;
      if (index >= this.maxLoopIterations) {
        throw new LoopLimitError(this.maxLoopIterations);
      }
      const scope = this.context.withLoop({ item: null, value: null, index, first: index === 0, last: false, count: null });
      results.push(await this.runBody(kind.body, scope, signal));
    }
    return results;
  }

  private async runBody(body: Subgraph, scope: ExecutionContext, signal: AbortSignal): Promise<Value> {
    const inner = new FlowScheduler(body, scope, { ...this.options, maxConcurrency: 1 });
    const outcome = await inner.run(signal);
    if (!outcome.ok) throw FlowError.fromInfo(outcome.error);
    return outcome.value;
  }

  // -----------------------------
  // Completion & edge decisions
  // -----------------------------

  /**
   * Record a finished node and decide its outgoing edges.
   * Returns the error when the failure has no error edge to go to.
   */
  private complete(id: string, outcome: NodeOutcome): ErrorInfo | null {
    if (outcome.ok) {
      this.statuses.set(id, 'done');
      this.values.set(id, outcome.value);
      if (outcome.persist) this.lastPersisted = outcome.value;
      this.context.recordOutput(id, outcome.value, outcome.persist);
      this.context.emit({ type: 'node_complete', node: id, status: 'done', output: outcome.value });
      log.debug('Node done', { node: id, persisted: outcome.persist });
      this.apply(this.decideSuccess(id));
      return null;
    }

    this.statuses.set(id, 'failed');
    this.context.recordError(id, outcome.error);
    this.context.emit({ type: 'node_complete', node: id, status: 'failed' });
    log.debug('Node failed', { node: id, code: outcome.error.code, message: outcome.error.message });

    const edges = this.index.outgoing.get(id) ?? [];
    const handler = edges.find((edge) => edge.kind === 'error');
    if (!handler) {
      this.apply(new Map(edges.map((edge) => [edge, 'impossible'])));
      return outcome.error;
    }

    this.context.raiseError(outcome.error);
    log.debug('Routing failure to error edge', { node: id, to: handler.to });
    this.apply(new Map(edges.map((edge) => [edge, edge === handler ? 'fired' : 'impossible'])));
    return null;
  }

  private decideSuccess(id: string): Map<FlowEdge, EdgeState> {
    const decisions = new Map<FlowEdge, EdgeState>();
    const edges = this.index.outgoing.get(id) ?? [];
    const normal: FlowEdge[] = [];

    for (const edge of edges) {
      if (edge.kind === 'error') decisions.set(edge, 'impossible');
      else normal.push(edge);
    }

    const subject = this.graph.switches.get(id);
    if (subject === undefined) {
      this.decideConditional(id, normal, decisions);
      return decisions;
    }

    let label: string | null = null;
    try {
      label = toStr(evaluate(subject, this.context));
    } catch (err) {
      log.warn('Switch subject failed to evaluate; no case matches', {
        node: id,
        subject,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    let matched = false;
    const fallback: FlowEdge[] = [];
    for (const edge of normal) {
      if (edge.case === undefined) {
        fallback.push(edge);
      } else if (!matched && edge.case === label) {
        decisions.set(edge, 'fired');
        matched = true;
      } else {
        decisions.set(edge, 'impossible');
      }
    }
    log.debug('Switch decided', { node: id, subject: label, matched });

    if (matched) {
      for (const edge of fallback) decisions.set(edge, 'impossible');
    } else {
      this.decideConditional(id, fallback, decisions, true);
    }
    return decisions;
  }

  /**
   * Conditional edges fire when true. Unconditional edges fire only when none did;
   * with `singleDefault` (an unmatched switch) only the first of them fires.
   */
  private decideConditional(
    id: string,
    edges: FlowEdge[],
    decisions: Map<FlowEdge, EdgeState>,
    singleDefault = false,
  ): void {
    let anyFired = false;
    for (const edge of edges) {
      if (edge.condition === undefined) continue;
      const outcome = tryEvaluateCondition(edge.condition, this.context);
      if (!outcome.ok) {
        log.warn('Edge condition failed to evaluate; treating as false', {
          from: id,
          to: edge.to,
          condition: edge.condition,
          error: outcome.error instanceof Error ? outcome.error.message : String(outcome.error),
        });
      }
      const fired = outcome.ok && outcome.value;
      decisions.set(edge, fired ? 'fired' : 'impossible');
      anyFired = anyFired || fired;
    }
    for (const edge of edges) {
      if (edge.condition !== undefined) continue;
      decisions.set(edge, anyFired ? 'impossible' : 'fired');
      if (singleDefault) anyFired = true;
    }
  }

  private apply(decisions: Map<FlowEdge, EdgeState>): void {
    // Map iteration follows insertion order; re-walk the edge list to keep declaration order.
    for (const edge of this.graph.edges) {
      const state = decisions.get(edge);
      if (state !== undefined) this.settleEdge(edge, state);
    }
  }

  private settleEdge(edge: FlowEdge, state: EdgeState): void {
    if (this.edgeStates.has(edge)) return;
    this.edgeStates.set(edge, state);
    log.debug('Edge decided', { from: edge.from, to: edge.to, state });

    if (state === 'fired') {
      if (this.statuses.get(edge.to) === 'pending') this.markReady(edge.to);
      return;
    }

    const incoming = this.index.incoming.get(edge.to) ?? [];
    const allImpossible = incoming.every((e) => this.edgeStates.get(e) === 'impossible');
    if (allImpossible && this.statuses.get(edge.to) === 'pending') {
      this.markUnreachable(edge.to);
    }
  }

  private markReady(id: string): void {
    this.statuses.set(id, 'ready');
    this.context.setStatus(id, 'ready');
    this.queue.push(id);
  }

  private markUnreachable(id: string): void {
    this.statuses.set(id, 'unreachable');
    this.context.setStatus(id, 'unreachable');
    log.debug('Node unreachable', { node: id });
    for (const edge of this.index.outgoing.get(id) ?? []) {
      this.settleEdge(edge, 'impossible');
    }
  }
}
