// runtime/core/tests/scheduler.test.ts

import { describe, it, expect } from 'vitest';
import type { NodeKind, Value } from '../../../core/types.ts';
import { setContext } from '../builtins/system.ts';
import { CancelledError } from '../errors.ts';
import { transient, type BuiltinTool } from '../toolsRuntime.ts';
import { boom, call, echo, graphOf, literal, makeServices, runGraph, valueOf } from './helpers.ts';

function hang(onStart?: () => void): BuiltinTool {
  return {
    name: 'hang',
    execute({ signal }) {
      onStart?.();
      return new Promise<Value>((_resolve, reject) => {
        if (signal.aborted) reject(signal.reason);
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      });
    },
  };
}

describe('FlowScheduler', () => {
  it('runs a linear chain and returns the exit value', async () => {
    const graph = graphOf({
      nodes: { a: literal(1), b: call('echo', { value: '$a.output + 1' }) },
      edges: [{ from: 'a', to: 'b' }],
    });

    const { outcome, context, sink } = await runGraph(graph);

    expect(valueOf(outcome)).toBe(2);
    expect(context.outputs()).toEqual({ a: 1, b: 2 });
    expect(sink.events).toEqual([
      { type: 'node_start', node: 'a' },
      { type: 'node_complete', node: 'a', status: 'done', output: 1 },
      { type: 'node_start', node: 'b', target: 'echo' },
      { type: 'node_complete', node: 'b', status: 'done', output: 2 },
    ]);
  });

  it('starts a converging node once, on the first incoming edge', async () => {
    const graph = graphOf({
      nodes: {
        a: literal('x'),
        b: call('echo', { value: "'B'" }),
        c: call('echo', { value: "'C'" }),
        d: call('echo', { value: "'D'" }),
      },
      edges: [
        { from: 'a', to: 'b' },
        { from: 'a', to: 'c' },
        { from: 'b', to: 'd' },
        { from: 'c', to: 'd' },
      ],
    });

    const { outcome, context, sink } = await runGraph(graph);

    expect(valueOf(outcome)).toBe('D');
    expect(sink.ofType('node_start').filter((e) => e.node === 'd')).toHaveLength(1);
    expect(context.statuses()).toEqual({ a: 'done', b: 'done', c: 'done', d: 'done' });
  });

  it('returns an object keyed by id when several exits finish', async () => {
    const graph = graphOf({
      nodes: { start: literal(5), p: call('echo', { value: "'P'" }), q: call('echo', { value: "'Q'" }) },
      edges: [
        { from: 'start', to: 'p', condition: 'true' },
        { from: 'start', to: 'q', condition: '$start.output == 5' },
      ],
    });

    const { outcome } = await runGraph(graph);

    expect(valueOf(outcome)).toEqual({ p: 'P', q: 'Q' });
  });

  describe('conditional edges', () => {
    const graphFor = (value: number) =>
      graphOf({
        nodes: {
          a: literal(value),
          big: call('echo', { value: "'big'" }),
          small: call('echo', { value: "'small'" }),
          fallback: call('echo', { value: "'fallback'" }),
        },
        edges: [
          { from: 'a', to: 'big', condition: '$a.output > 3' },
          { from: 'a', to: 'small', condition: '$a.output <= 3 AND $a.output > 0' },
          { from: 'a', to: 'fallback' },
        ],
      });

    it('fires matching conditions and skips the unconditional default', async () => {
      const { outcome, context } = await runGraph(graphFor(5));

      expect(valueOf(outcome)).toBe('big');
      expect(context.status('small')).toBe('unreachable');
      expect(context.status('fallback')).toBe('unreachable');
    });

    it('takes the unconditional edge when no condition holds', async () => {
      const { outcome } = await runGraph(graphFor(0));
      expect(valueOf(outcome)).toBe('fallback');
    });

    it('treats a condition that fails to evaluate as false', async () => {
      const graph = graphOf({
        nodes: { a: literal(1), x: call('echo', { value: "'x'" }), y: call('echo', { value: "'y'" }) },
        edges: [
          { from: 'a', to: 'x', condition: 'nonexistent > 1' },
          { from: 'a', to: 'y' },
        ],
      });

      const { outcome, context } = await runGraph(graph);

      expect(valueOf(outcome)).toBe('y');
      expect(context.status('x')).toBe('unreachable');
    });
  });

  describe('switch routing', () => {
    const graphFor = (label: string) =>
      graphOf({
        nodes: {
          classify: literal(label),
          billing: call('echo', { value: "'B'" }),
          tech: call('echo', { value: "'T'" }),
          techFollowUp: call('echo', { value: "'T2'" }),
          other: call('echo', { value: "'O'" }),
        },
        edges: [
          { from: 'classify', to: 'billing', case: 'billing' },
          { from: 'classify', to: 'tech', case: 'tech' },
          { from: 'tech', to: 'techFollowUp' },
          { from: 'classify', to: 'other' },
        ],
        switches: { classify: '$classify.output' },
      });

    it('follows the matching case and prunes everything behind the others', async () => {
      const { outcome, context } = await runGraph(graphFor('billing'));

      expect(valueOf(outcome)).toBe('B');
      expect(context.statuses()).toEqual({
        classify: 'done',
        billing: 'done',
        tech: 'unreachable',
        techFollowUp: 'unreachable',
        other: 'unreachable',
      });
    });

    it('falls back to edges without a case when nothing matches', async () => {
      const { outcome, context } = await runGraph(graphFor('refund'));

      expect(valueOf(outcome)).toBe('O');
      expect(context.status('billing')).toBe('unreachable');
    });

    it('takes only the first default edge when nothing matches', async () => {
      const graph = graphOf({
        nodes: {
          classify: literal('refund'),
          billing: call('echo', { value: "'B'" }),
          first: call('echo', { value: "'first'" }),
          second: call('echo', { value: "'second'" }),
        },
        edges: [
          { from: 'classify', to: 'billing', case: 'billing' },
          { from: 'classify', to: 'first' },
          { from: 'classify', to: 'second' },
        ],
        switches: { classify: '$classify.output' },
      });

      const { outcome, context } = await runGraph(graph);

      expect(valueOf(outcome)).toBe('first');
      expect(context.status('second')).toBe('unreachable');
    });
  });

  describe('failures', () => {
    it('routes a failure to its error edge and exposes $error', async () => {
      const graph = graphOf({
        nodes: {
          fail: call('boom', { message: "'bad'" }),
          handler: call('echo', { value: '$error.message' }),
          next: call('echo', { value: "'next'" }),
        },
        edges: [
          { from: 'fail', to: 'handler', kind: 'error' },
          { from: 'fail', to: 'next' },
        ],
      });

      const { outcome, context } = await runGraph(graph);

      expect(valueOf(outcome)).toBe('bad');
      expect(context.ctx.error).toEqual({ code: 'CallFailure', message: 'bad', node: 'fail', details: null });
      expect(context.status('fail')).toBe('failed');
      expect(context.status('next')).toBe('unreachable');
    });

    it('fails the run when a failing node has no error edge', async () => {
      const graph = graphOf({
        nodes: { fail: call('boom', { message: "'bad'" }), next: call('echo', { value: '1' }) },
        edges: [{ from: 'fail', to: 'next' }],
      });

      const { outcome, context } = await runGraph(graph);

      expect(outcome).toEqual({
        ok: false,
        error: { code: 'CallFailure', message: 'bad', node: 'fail', details: null },
      });
      expect(context.status('next')).toBe('unreachable');
    });

    it('aborts in-flight nodes after a terminal failure', async () => {
      const services = makeServices({ builtins: [boom, hang()] });
      const graph = graphOf({ nodes: { slow: call('hang'), fail: call('boom') } });

      const { outcome, context } = await runGraph(graph, { services });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.node).toBe('fail');
      expect(context.status('slow')).toBe('failed');
    });

    it('reports unknown tools as ToolResolutionError', async () => {
      const graph = graphOf({ nodes: { a: call('nope') } });

      const { outcome } = await runGraph(graph);

      expect(outcome).toEqual({
        ok: false,
        error: { code: 'ToolResolutionError', message: "Unknown tool 'nope'", node: 'a', details: { tool: 'nope' } },
      });
    });
  });

  describe('foreach', () => {
    it('collects one result per item', async () => {
      const graph = graphOf({
        nodes: {
          items: literal([1, 2, 3]),
          each: {
            type: 'foreach',
            item: 'x',
            collection: '$items.output',
            body: graphOf({ nodes: { double: call('echo', { value: '$x * 10' }) } }),
          },
        },
        edges: [{ from: 'items', to: 'each' }],
      });

      const { outcome } = await runGraph(graph);

      expect(valueOf(outcome)).toEqual([10, 20, 30]);
    });

    it('exposes loop metadata and iterates object values', async () => {
      const graph = graphOf({
        nodes: {
          each: {
            type: 'foreach',
            item: 'entry',
            collection: "{a: 'first', b: 'second'}",
            body: graphOf({
              nodes: { meta: call('echo', { value: '{index: $loop.index, first: $loop.first, last: $loop.last, item: $entry}' }) },
            }),
          },
        },
      });

      const { outcome } = await runGraph(graph);

      expect(valueOf(outcome)).toEqual([
        { index: 0, first: true, last: false, item: 'first' },
        { index: 1, first: false, last: true, item: 'second' },
      ]);
    });

    it('fails on a null collection', async () => {
      const graph = graphOf({
        nodes: {
          each: { type: 'foreach', item: 'x', collection: '$missing', body: graphOf({ nodes: { a: literal(1) } }) },
        },
      });

      const { outcome } = await runGraph(graph);

      expect(outcome).toEqual({
        ok: false,
        error: {
          code: 'UnresolvedVariable',
          message: "Expression '$missing' resolved to null",
          node: 'each',
          details: { expression: '$missing' },
        },
      });
    });

    it('refuses to iterate scalars', async () => {
      const graph = graphOf({
        nodes: { each: { type: 'foreach', item: 'x', collection: '5', body: graphOf({ nodes: { a: literal(1) } }) } },
      });

      const { outcome } = await runGraph(graph);

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.code).toBe('EvalError');
      expect(outcome.error.message).toBe('Cannot iterate over number');
    });

    it('enforces the iteration limit', async () => {
      const graph = graphOf({
        nodes: { each: { type: 'foreach', item: 'x', collection: '[1, 2, 3]', body: graphOf({ nodes: { a: literal(1) } }) } },
      });

      const { outcome } = await runGraph(graph, { maxLoopIterations: 2 });

      expect(outcome).toEqual({
        ok: false,
        error: { code: 'LoopLimitExceeded', message: 'Loop exceeded 2 iterations', node: 'each', details: { limit: 2 } },
      });
    });

    it('keeps loop bindings apart when two loops run at once', async () => {
      const pause: BuiltinTool = {
        name: 'pause',
        execute: () => new Promise<Value>((resolve) => setTimeout(() => resolve(null), 2)),
      };
      const loopOver = (collection: string, prefix: string): NodeKind => ({
        type: 'foreach',
        item: 'n',
        collection,
        body: graphOf({
          nodes: { [`${prefix}Wait`]: call('pause'), [`${prefix}Pair`]: call('echo', { value: '[$loop.index, $n]' }) },
          edges: [{ from: `${prefix}Wait`, to: `${prefix}Pair` }],
        }),
      });
      const graph = graphOf({ nodes: { A: loopOver('[1, 2, 3]', 'a'), B: loopOver('[10, 20, 30]', 'b') } });

      const { outcome } = await runGraph(graph, { services: makeServices({ builtins: [echo, pause] }) });

      expect(valueOf(outcome)).toEqual({
        A: [[0, 1], [1, 2], [2, 3]],
        B: [[0, 10], [1, 20], [2, 30]],
      });
    });
  });

  describe('while', () => {
    it('repeats the body until the condition turns false', async () => {
      const services = makeServices({ builtins: [echo, setContext] });
      const graph = graphOf({
        nodes: {
          loop: {
            type: 'while',
            condition: 'count < 3',
            body: graphOf({ nodes: { inc: call('set_context', { path: 'count', value: '$count + 1' }) } }),
          },
        },
      });

      const { outcome, context } = await runGraph(graph, { services, ctx: { count: 0 } });

      expect(valueOf(outcome)).toEqual([null, null, null]);
      expect(context.ctx.count).toBe(3);
    });

    it('stops at the iteration limit', async () => {
      const graph = graphOf({
        nodes: { loop: { type: 'while', condition: 'true', body: graphOf({ nodes: { a: literal(1) } }) } },
      });

      const { outcome } = await runGraph(graph, { maxLoopIterations: 2 });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.code).toBe('LoopLimitExceeded');
      expect(outcome.error.node).toBe('loop');
    });
  });

  describe('concurrency', () => {
    function tracker() {
      const stats = { active: 0, peak: 0 };
      const tool: BuiltinTool = {
        name: 'track',
        async execute() {
          stats.active++;
          stats.peak = Math.max(stats.peak, stats.active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          stats.active--;
          return null;
        },
      };
      return { stats, tool };
    }

    const graph = () => graphOf({ nodes: { a: call('track'), b: call('track'), c: call('track') } });

    it('runs independent nodes in parallel by default', async () => {
      const { stats, tool } = tracker();
      await runGraph(graph(), { services: makeServices({ builtins: [tool] }) });
      expect(stats.peak).toBe(3);
    });

    it('honours maxConcurrency', async () => {
      const { stats, tool } = tracker();
      await runGraph(graph(), { services: makeServices({ builtins: [tool] }), maxConcurrency: 1 });
      expect(stats.peak).toBe(1);
    });
  });

  it('stops with Cancelled when the run signal aborts', async () => {
    const controller = new AbortController();
    const services = makeServices({ builtins: [hang(() => controller.abort(new CancelledError('stop')))] });
    const graph = graphOf({ nodes: { slow: call('hang') } });

    const { outcome, context } = await runGraph(graph, { services, signal: controller.signal });

    expect(outcome).toEqual({ ok: false, error: { code: 'Cancelled', message: 'stop', node: null, details: null } });
    expect(context.status('slow')).toBe('failed');
  });

  it('never starts nodes without incoming edges when an entry is declared', async () => {
    const graph = graphOf({
      nodes: { a: literal(1), stray: call('boom') },
      entry: ['a'],
    });

    const { outcome, context, sink } = await runGraph(graph);

    expect(valueOf(outcome)).toBe(1);
    expect(context.status('stray')).toBe('unreachable');
    expect(sink.ofType('node_start').map((e) => e.node)).toEqual(['a']);
  });

  it('keeps transient results out of the stored outputs', async () => {
    const quiet: BuiltinTool = { name: 'quiet', execute: async () => transient('shh') };
    const graph = graphOf({ nodes: { a: call('quiet') } });

    const { outcome, context } = await runGraph(graph, { services: makeServices({ builtins: [quiet] }) });

    expect(valueOf(outcome)).toBe('shh');
    expect(context.outputs()).toEqual({});
    expect(context.status('a')).toBe('done');
  });

  it('produces the same event sequence on every run', async () => {
    const graph = graphOf({
      nodes: { a: literal(2), b: call('echo', { value: '$a.output * 2' }), c: call('echo', { value: '$a.output * 3' }) },
      edges: [
        { from: 'a', to: 'b' },
        { from: 'a', to: 'c' },
      ],
    });

    const first = await runGraph(graph);
    const second = await runGraph(graph);

    expect(valueOf(first.outcome)).toEqual({ b: 4, c: 6 });
    expect(second.sink.events).toEqual(first.sink.events);
  });
});
