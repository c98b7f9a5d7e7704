import { describe, it, expect, vi } from 'vitest';
import type { AgentResource, FlowEvent } from '../../../core/types.ts';
import { CLIENT_TERMINAL_REPLY, chat, resolveCallState } from '../builtins/chat.ts';
import { ClientBridge } from '../clientBridge.ts';
import { ExecutionContext } from '../context.ts';
import { CallFailureError, EvalError } from '../errors.ts';
import type { ChatResponse } from '../models.ts';
import { MemorySink, callbackSink } from '../observer.ts';
import { ResourceRegistry } from '../resources.ts';
import { ToolDispatcher, TransientOutput, type WorkflowOutcome, type WorkflowRequest } from '../toolsRuntime.ts';
import { ScriptedModel, echo, finalReply, invoke, makeServices } from './helpers.ts';

function agent(slug: string, fields: Partial<AgentResource> = {}): AgentResource {
  return { slug, name: slug, model: 'agent-model', temperature: 0.2, ...fields };
}

function toolCalls(calls: Extract<ChatResponse, { kind: 'tool_calls' }>['calls'], tokens = 2): ChatResponse {
  return { kind: 'tool_calls', content: '', chatId: null, tokens, model: 'test-model', calls };
}

function resourcesWith(...agents: AgentResource[]): ResourceRegistry {
  const resources = new ResourceRegistry();
  for (const a of agents) resources.addAgent(a);
  return resources;
}

describe('resolveCallState', () => {
  it('defaults to context_visible', () => {
    expect(resolveCallState({})).toEqual({
      input: 'context_visible',
      output: 'context_visible',
      persist: true,
      stream: true,
    });
  });

  it('splits input and output halves', () => {
    expect(resolveCallState({ state: 'context_hidden:display_only' })).toEqual({
      input: 'context_hidden',
      output: 'display_only',
      persist: true,
      stream: true,
    });
    expect(resolveCallState({ state: 'display_only' })).toEqual({
      input: 'display_only',
      output: 'display_only',
      persist: false,
      stream: true,
    });
    expect(resolveCallState({ state: 'context_visible:silent' })).toMatchObject({ persist: true, stream: false });
  });

  it('treats stateless as silent', () => {
    expect(resolveCallState({ stateless: true, state: 'context_visible' })).toEqual({
      input: 'silent',
      output: 'silent',
      persist: false,
      stream: false,
    });
  });

  it('rejects unknown states', () => {
    expect(() => resolveCallState({ state: 'loud' })).toThrow(EvalError);
    expect(() => resolveCallState({ state: 'silent:loud' })).toThrow("Unknown chat state 'loud'");
  });
});

describe('chat builtin', () => {
  it('sends the agent settings and records reply metadata', async () => {
    const model = new ScriptedModel([finalReply('Hello there', { chatId: 'c1' })]);
    const services = makeServices({ model, resources: resourcesWith(agent('helper', { system_prompt: 'Be brief.' })) });
    const sink = new MemorySink();
    const context = new ExecutionContext({ sink });

    const result = await invoke(chat, { agent: 'helper', message: 'hi' }, { context, services });

    expect(result).toBe('Hello there');
    expect(model.requests).toEqual([
      {
        agent: 'helper',
        model: 'agent-model',
        temperature: 0.2,
        messages: [{ role: 'user', content: 'hi' }],
        tools: [],
        remember: true,
        responseFormat: 'text',
        systemPrompt: 'Be brief.',
      },
    ]);
    expect(context.reply).toEqual({
      content: 'Hello there',
      output: 'Hello there',
      tokens: 3,
      model: 'test-model',
      finish_reason: 'STOP',
      chat_id: 'c1',
      status: null,
    });
    expect(sink.ofType('content')).toEqual([
      { type: 'content', node: 'n', delta: 'Hello' },
      { type: 'content', node: 'n', delta: 'there' },
    ]);
  });

  it('continues the inherited conversation and accumulates tokens', async () => {
    const model = new ScriptedModel([finalReply('Again')]);
    const services = makeServices({ model });
    const context = new ExecutionContext();
    context.setReply({ chat_id: 'c9', tokens: 4, output: 'Earlier. ' });

    await invoke(chat, { message: 'more', state: 'context_hidden' }, { context, services });

    expect(model.requests[0]).toMatchObject({ agent: 'default', model: 'test-model', temperature: 0.7, chatId: 'c9' });
    expect(model.requests[0].messages).toEqual([{ role: 'user', content: 'more' }]);
    expect(context.reply.tokens).toBe(7);
    expect(context.reply.output).toBe('Earlier. Again');
    expect(context.reply.chat_id).toBe('c9');
  });

  it('keeps silent calls out of the reply', async () => {
    const model = new ScriptedModel([finalReply('{"label":"billing"}')]);
    const sink = new MemorySink();
    const context = new ExecutionContext({ sink });
    context.setReply({ chat_id: 'c9' });

    const result = await invoke(chat, { message: 'classify', state: 'silent', format: 'json' }, {
      context,
      services: makeServices({ model }),
    });

    expect(result).toBeInstanceOf(TransientOutput);
    expect(result instanceof TransientOutput ? result.value : null).toEqual({ label: 'billing' });
    expect(model.requests[0]).toMatchObject({ remember: false, responseFormat: 'json' });
    expect(model.requests[0].chatId).toBeUndefined();
    expect(context.reply.output).toBe('');
    expect(sink.events).toEqual([]);
  });

  it('streams display_only calls without persisting them', async () => {
    const model = new ScriptedModel([finalReply('shown once')]);
    const sink = new MemorySink();
    const context = new ExecutionContext({ sink });

    const result = await invoke(chat, { message: 'hi', stateless: 'false', state: 'display_only' }, {
      context,
      services: makeServices({ model }),
    });

    expect(result instanceof TransientOutput ? result.value : null).toBe('shown once');
    expect(sink.ofType('content').map((event) => event.delta)).toEqual(['shown', 'once']);
    expect(context.reply.output).toBe('');
  });

  it('uses an explicit chat_id even when not persisting', async () => {
    const model = new ScriptedModel([finalReply('ok')]);
    await invoke(chat, { message: 'hi', chat_id: 'abc', state: 'silent' }, { services: makeServices({ model }) });
    expect(model.requests[0]).toMatchObject({ chatId: 'abc', remember: false });
  });

  it('renders a linked system prompt and falls back to the inline one', async () => {
    const resources = resourcesWith(
      agent('linked', { system_prompt_slug: 'sys', system_prompt: 'fallback' }),
      agent('broken', { system_prompt_slug: 'missing', system_prompt: 'fallback' }),
    );
    resources.addPrompt({ slug: 'sys', content: 'You help {{ ctx.user }}', source: '/prompts/sys.md' });
    const model = new ScriptedModel([finalReply('a'), finalReply('b')]);
    const services = makeServices({ model, resources });
    const context = new ExecutionContext({ ctx: { user: 'Ada' } });

    await invoke(chat, { agent: 'linked', message: 'x', state: 'silent' }, { context, services });
    await invoke(chat, { agent: 'broken', message: 'x', state: 'silent' }, { context, services });

    expect(model.requests.map((r) => r.systemPrompt)).toEqual(['You help Ada', 'fallback']);
  });

  it('runs builtin tools and reports failures to the model', async () => {
    const model = new ScriptedModel([
      toolCalls([
        { id: 't1', name: 'echo', arguments: { value: 'pong' } },
        { id: 't2', name: 'boom', arguments: { message: 'nope' } },
      ]),
      finalReply('done'),
    ]);
    const context = new ExecutionContext();

    const result = await invoke(chat, { message: 'hi', state: 'context_hidden' }, { context, services: makeServices({ model }) });

    expect(result).toBe('done');
    expect(model.requests[1].messages).toEqual([
      { role: 'user', content: 'hi' },
      {
        role: 'assistant',
        content: '',
        toolCalls: [
          { id: 't1', name: 'echo', arguments: { value: 'pong' } },
          { id: 't2', name: 'boom', arguments: { message: 'nope' } },
        ],
      },
      { role: 'tool', toolCallId: 't1', name: 'echo', content: 'pong' },
      { role: 'tool', toolCallId: 't2', name: 'boom', content: 'Error: nope' },
    ]);
    expect(context.reply.tokens).toBe(5);
  });

  it('stops after too many tool rounds', async () => {
    const round = () => toolCalls([{ id: 't', name: 'echo', arguments: { value: 1 } }]);
    const model = new ScriptedModel([round(), round(), round(), round(), finalReply('never')]);

    const call = invoke(chat, { message: 'loop' }, { services: makeServices({ model }) });

    await expect(call).rejects.toThrow(CallFailureError);
    await expect(call).rejects.toThrow("Agent 'default' exceeded 3 tool rounds");
    expect(model.requests).toHaveLength(4);
  });

  it('ends the call when the client ran every tool itself', async () => {
    const bridge = new ClientBridge(1000);
    const context = new ExecutionContext({
      sink: callbackSink((event) => {
        if (event.type !== 'tool_call') return;
        bridge.resolve(
          event.callId,
          event.tools.map((tool) => ({ id: tool.id, name: tool.name, result: null, executed_on_client: true })),
        );
      }),
    });
    const model = new ScriptedModel([toolCalls([{ id: 't1', name: 'open_panel', arguments: {} }], 4)]);
    const services = makeServices({ model, dispatcher: new ToolDispatcher({ bridge }).register(echo) });

    const result = await invoke(chat, { message: 'show it' }, { context, services });

    expect(result).toBe(CLIENT_TERMINAL_REPLY);
    expect(context.reply).toMatchObject({ content: CLIENT_TERMINAL_REPLY, finish_reason: 'client_tools', tokens: 4 });
    expect(model.requests).toHaveLength(1);
  });

  it.each([
    ['an object', { executed_on_client: true }],
    ['JSON text', '{"executed_on_client":true}'],
  ])('reads the client-side marker from a result given as %s', async (_label, marker) => {
    const bridge = new ClientBridge(1000);
    const context = new ExecutionContext({
      sink: callbackSink((event) => {
        if (event.type !== 'tool_call') return;
        bridge.resolve(event.callId, [{ id: event.tools[0].id, name: 'open_panel', result: marker }]);
      }),
    });
    const model = new ScriptedModel([toolCalls([{ id: 't1', name: 'open_panel', arguments: {} }]), finalReply('second turn')]);
    const services = makeServices({ model, dispatcher: new ToolDispatcher({ bridge }).register(echo) });

    const result = await invoke(chat, { message: 'show it' }, { context, services });

    expect(result).toBe(CLIENT_TERMINAL_REPLY);
    expect(model.requests).toHaveLength(1);
  });

  it('sends identical client calls once and answers each of them', async () => {
    const bridge = new ClientBridge(1000);
    const batches: FlowEvent[] = [];
    const context = new ExecutionContext({
      sink: callbackSink((event) => {
        if (event.type !== 'tool_call') return;
        batches.push(event);
        bridge.resolve(event.callId, [{ id: event.tools[0].id, name: 'geo', result: { city: 'Utrecht' } }]);
      }),
    });
    const model = new ScriptedModel([
      toolCalls([
        { id: 'a', name: 'geo', arguments: { q: 1 } },
        { id: 'b', name: 'geo', arguments: { q: 1 } },
      ]),
      finalReply('ok'),
    ]);
    const services = makeServices({ model, dispatcher: new ToolDispatcher({ bridge }).register(echo) });

    await invoke(chat, { message: 'where', state: 'silent' }, { context, services });

    expect(batches).toHaveLength(1);
    expect(batches[0]).toMatchObject({ tools: [{ id: 'a', name: 'geo', arguments: { q: 1 } }] });
    expect(model.requests[1].messages.slice(2)).toEqual([
      { role: 'tool', toolCallId: 'a', name: 'geo', content: '{"city":"Utrecht"}' },
      { role: 'tool', toolCallId: 'b', name: 'geo', content: '{"city":"Utrecht"}' },
    ]);
    expect(bridge.pendingCalls).toEqual([]);
  });
});

describe('chat builtin with agent workflows', () => {
  const researcher = agent('researcher', {
    workflow: 'flows/research.yaml',
    returns: ['summary'],
    source: '/agents/researcher.agent.yaml',
  });

  it('runs the workflow and copies returned fields back', async () => {
    const runWorkflow = vi.fn(async (request: WorkflowRequest): Promise<WorkflowOutcome> => {
      const child = request.parent.fork(request.input);
      child.set('summary', 'short');
      child.set('scratch', 1);
      child.appendReplyOutput('child says hi');
      return { value: 'ignored', context: child };
    });
    const model = new ScriptedModel([]);
    const context = new ExecutionContext();
    const services = makeServices({ model, runWorkflow, resources: resourcesWith(researcher) });

    const result = await invoke(chat, { agent: 'researcher', message: 'go', workflow_timeout: 2 }, { context, services });

    expect(result).toBe('child says hi');
    expect(runWorkflow).toHaveBeenCalledTimes(1);
    expect(runWorkflow.mock.calls[0][0]).toMatchObject({
      path: '/agents/flows/research.yaml',
      input: { message: 'go' },
      identifier: 'researcher:flows/research.yaml',
      timeoutMs: 2000,
    });
    expect(context.ctx).toEqual({ summary: 'short' });
    expect(context.reply.output).toBe('child says hi');
    expect(model.requests).toEqual([]);
  });

  it('returns the workflow value when the child wrote no reply', async () => {
    const runWorkflow = async (request: WorkflowRequest): Promise<WorkflowOutcome> => ({
      value: { answer: 42 },
      context: request.parent.fork(request.input),
    });
    const services = makeServices({ runWorkflow, resources: resourcesWith(researcher) });

    const visible = await invoke(chat, { agent: 'researcher', message: 'go' }, { services });
    const silent = await invoke(chat, { agent: 'researcher', message: 'go', state: 'silent' }, { services });

    expect(visible).toEqual({ answer: 42 });
    expect(silent).toBeInstanceOf(TransientOutput);
    expect(silent instanceof TransientOutput ? silent.value : null).toEqual({ answer: 42 });
  });
});
