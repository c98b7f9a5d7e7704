// runtime/core/tests/context.test.ts

import { describe, it, expect } from 'vitest';
import { ExecutionContext } from '../context.ts';
import { RecursionLimitError } from '../errors.ts';
import { MemorySink } from '../observer.ts';

describe('ExecutionContext', () => {
  it('resolves reserved roots, node records and ctx keys', () => {
    const context = new ExecutionContext({ input: { text: 'hi' }, ctx: { user: 'ada' } });
    context.registerNode('fetch');
    context.recordOutput('fetch', { items: [1, 2] }, true);

    expect(context.lookup(['input', 'text'])).toBe('hi');
    expect(context.lookup(['ctx', 'user'])).toBe('ada');
    expect(context.lookup(['user'])).toBe('ada');
    expect(context.lookup(['fetch', 'status'])).toBe('done');
    expect(context.lookup(['fetch', 'output', 'items'])).toEqual([1, 2]);
    expect(context.lookup(['output', 'items'])).toEqual([1, 2]);
    expect(context.lookup(['nothing'])).toBeUndefined();
  });

  it('prefers the longest node id for dotted references', () => {
    const context = new ExecutionContext();
    context.registerNode('billing');
    context.registerNode('billing.charge');
    context.recordOutput('billing.charge', 'charged', true);

    expect(context.lookup(['billing', 'charge', 'output'])).toBe('charged');
  });

  it('lets loop bindings shadow node ids', () => {
    const context = new ExecutionContext();
    context.registerNode('row');
    context.recordOutput('row', 'node value', true);

    const body = context.withLoop({ item: 'row', value: { id: 7 }, index: 1, first: false, last: true, count: 2 });
    expect(body.lookup(['row', 'id'])).toBe(7);
    expect(body.lookup(['loop', 'index'])).toBe(1);
    expect(body.lookup(['loop', 'item'])).toEqual({ id: 7 });

    expect(context.lookup(['row', 'output'])).toBe('node value');
    expect(context.lookup(['loop', 'index'])).toBeNull();
  });

  it('shares ctx and node records with loop views but not the loop binding', () => {
    const context = new ExecutionContext({ ctx: { total: 0 } });
    const outer = context.withLoop({ item: 'x', value: 1, index: 0, first: true, last: false, count: 2 });
    const inner = outer.withLoop({ item: 'y', value: 'b', index: 3, first: false, last: true, count: 4 });

    inner.set('total', 5);
    inner.registerNode('step');
    inner.recordOutput('step', 'ran', true);

    expect(context.ctx).toEqual({ total: 5 });
    expect(context.lookup(['step', 'output'])).toBe('ran');
    expect(inner.lookup(['x'])).toBe(1);
    expect(inner.lookup(['loop', 'index'])).toBe(3);
    expect(outer.lookup(['loop', 'index'])).toBe(0);
    expect(outer.lookup(['y'])).toBeUndefined();
    expect(inner.currentOutput).toBe('ran');
    expect(context.currentOutput).toBeNull();
  });

  it('keeps transient outputs out of records and outputs()', () => {
    const context = new ExecutionContext();
    context.registerNode('quiet');
    context.recordOutput('quiet', 'x', false);

    expect(context.status('quiet')).toBe('done');
    expect(context.lookup(['quiet', 'output'])).toBeNull();
    expect(context.outputs()).toEqual({});
    expect(context.currentOutput).toBeNull();
  });

  it('freezes a copy of the input', () => {
    const input = { nested: { n: 1 } };
    const context = new ExecutionContext({ input });
    input.nested.n = 2;

    expect(context.lookup(['input', 'nested', 'n'])).toBe(1);
    expect(Object.isFrozen(context.input)).toBe(true);
  });

  it('writes ctx paths and reply fields', () => {
    const sink = new MemorySink();
    const context = new ExecutionContext({ sink });

    context.set('ctx.order.total', 12);
    context.set('order.currency', 'EUR');
    context.set('reply.status', 'thinking', 'plan');

    expect(context.ctx).toEqual({ order: { total: 12, currency: 'EUR' } });
    expect(context.reply.status).toBe('thinking');
    expect(sink.events).toEqual([{ type: 'status', node: 'plan', status: 'thinking' }]);
  });

  it('accumulates reply output', () => {
    const context = new ExecutionContext();
    context.appendReplyOutput('Hello');
    context.appendReplyOutput(' world');
    context.setReply({ tokens: 5 });

    expect(context.reply.output).toBe('Hello world');
    expect(context.reply.tokens).toBe(5);
  });

  it('exposes a raised error as $error', () => {
    const context = new ExecutionContext();
    context.raiseError({ code: 'CallFailure', message: 'bad', node: 'fetch', details: null });

    expect(context.lookup(['error', 'code'])).toBe('CallFailure');
    expect(context.ctx.error).toEqual({ code: 'CallFailure', message: 'bad', node: 'fetch', details: null });
  });

  describe('nested executions', () => {
    it('rejects re-entry of an identifier on the stack', () => {
      const context = new ExecutionContext({ maxDepth: 5 });
      context.enterExecution('agent:triage');

      expect(() => context.enterExecution('agent:triage')).toThrow(
        'Recursive workflow execution: agent:triage -> agent:triage',
      );
    });

    it('enforces the maximum depth', () => {
      const context = new ExecutionContext({ maxDepth: 2 });
      context.enterExecution('a');
      context.enterExecution('b');

      expect(() => context.enterExecution('c')).toThrow(RecursionLimitError);
      expect(() => context.enterExecution('c')).toThrow('Maximum workflow depth 2 exceeded: a -> b -> c');

      context.exitExecution('b');
      expect(context.executionDepth).toBe(1);
    });

    it('shares the stack with forked contexts but not the state', () => {
      const parent = new ExecutionContext({ ctx: { secret: 1 } });
      parent.enterExecution('a');
      const child = parent.fork({ message: 'hi' });

      expect(child.lookup(['input', 'message'])).toBe('hi');
      expect(child.ctx).toEqual({});
      expect(() => child.enterExecution('a')).toThrow(RecursionLimitError);
    });

    it('copies returned fields back from a child', () => {
      const parent = new ExecutionContext();
      const child = parent.fork(null);
      child.set('summary', 'done');
      child.set('nested.x', 1);

      parent.mergeReturned(child, ['ctx.summary', 'nested.x', 'missing']);

      expect(parent.ctx).toEqual({ summary: 'done', nested: { x: 1 } });
    });
  });

  it('snapshots detached copies', () => {
    const context = new ExecutionContext({ ctx: { a: [1] } });
    const snapshot = context.snapshot();
    context.set('a', [2]);

    expect(snapshot.ctx).toEqual({ a: [1] });
    expect(snapshot.reply.output).toBe('');
  });
});
