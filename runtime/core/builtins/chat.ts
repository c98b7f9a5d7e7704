// runtime/core/builtins/chat.ts

import { dirname, resolve } from 'node:path';
import type { AgentResource, ClientToolCall, ClientToolResult, Value, ValueObject } from '../../../core/types.ts';
import { CALL_STATES, DEFAULT_CALL_STATE, DEFAULTS, type CallState, type CallStateFlags } from '../../../core/constants.ts';
import { createLogger } from '../../shared/logger.ts';
import { tryParseJson } from '../../shared/parseJson.ts';
import { CallFailureError, CancelledError, EvalError } from '../errors.ts';
import type { ChatMessage, ModelToolCall } from '../models.ts';
import { TransientOutput, transient, type BuiltinCall, type BuiltinResult, type BuiltinTool } from '../toolsRuntime.ts';
import { isValueObject } from '../value.ts';
import { renderTemplate } from '../variables.ts';
import { optionalBoolean, optionalNumber, optionalString, requireString } from './args.ts';

const log = createLogger('chat');

export const CLIENT_TERMINAL_REPLY = 'Client tools executed on frontend.';

// -----------------------------
// State table
// -----------------------------

export interface ResolvedCallState extends CallStateFlags {
  input: CallState;
  output: CallState;
}

function isCallState(value: string): value is CallState {
  return Object.prototype.hasOwnProperty.call(CALL_STATES, value);
}

function parseState(text: string): CallState {
  const state = text.trim();
  if (!isCallState(state)) {
    throw new EvalError(`Unknown chat state '${state}'`, { state, known: Object.keys(CALL_STATES) });
  }
  return state;
}

/**
 * `state` is one state or `input:output`; persistence follows the input half,
 * streaming the output half. `stateless=true` means `silent`.
 */
export function resolveCallState(args: ValueObject): ResolvedCallState {
  if (optionalBoolean(args, 'stateless') === true) {
    return { input: 'silent', output: 'silent', ...CALL_STATES.silent };
  }
  const raw = optionalString(args, 'state') ?? DEFAULT_CALL_STATE;
  const separator = raw.indexOf(':');
  const input = parseState(separator === -1 ? raw : raw.slice(0, separator));
  const output = parseState(separator === -1 ? raw : raw.slice(separator + 1));
  return {
    input,
    output,
    persist: CALL_STATES[input].persist,
    stream: CALL_STATES[output].stream,
  };
}

// -----------------------------
// Helpers
// -----------------------------

function resolveSystemPrompt(call: BuiltinCall, agent: AgentResource | undefined): string | undefined {
  const explicit = optionalString(call.args, 'system_prompt');
  if (explicit !== undefined) return explicit;
  if (!agent) return undefined;

  if (agent.system_prompt_slug) {
    const prompt = call.services.resources.getPrompt(agent.system_prompt_slug);
    if (prompt) return renderTemplate(prompt.content, call.context);
    log.warn('Linked prompt not found; using inline system prompt', {
      agent: agent.slug,
      prompt: agent.system_prompt_slug,
    });
  }
  return agent.system_prompt;
}

function resolveChatId(call: BuiltinCall, persist: boolean): string | undefined {
  const explicit = optionalString(call.args, 'chat_id');
  if (explicit !== undefined && explicit.trim().length > 0) return explicit;
  if (!persist) return undefined;
  const inherited = call.context.reply.chat_id;
  return typeof inherited === 'string' && inherited.length > 0 ? inherited : undefined;
}

function toolContent(result: BuiltinResult): string {
  const value = result instanceof TransientOutput ? result.value : result;
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** The marker may sit on the envelope or inside the result, as an object or JSON text. */
function executedOnClient(result: ClientToolResult): boolean {
  if (result.executed_on_client === true) return true;
  const content = typeof result.result === 'string' ? tryParseJson(result.result) : result.result;
  return isValueObject(content) && content.executed_on_client === true;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

interface ToolRound {
  terminal: boolean;
  messages: ChatMessage[];
}

/**
 * Execute one round of model tool calls. Builtin and server tools run here; the rest
 * go to the client as one batch, de-duplicated by name and arguments.
 */
async function runToolCalls(calls: ModelToolCall[], call: BuiltinCall): Promise<ToolRound> {
  const { services, context, signal, node } = call;
  const answered = new Map<string, string>();
  const forClient: ModelToolCall[] = [];

  for (const toolCall of calls) {
    const route = services.dispatcher.route(toolCall.name);
    if (route === 'builtin' || route === 'server') {
      try {
        const result = await services.dispatcher.dispatch(toolCall.name, toolCall.arguments, { node, context, signal, services });
        answered.set(toolCall.id, toolContent(result));
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        log.warn('Tool call failed; reporting error to model', { node, tool: toolCall.name, error: errorMessage(err) });
        answered.set(toolCall.id, `Error: ${errorMessage(err)}`);
      }
    } else {
      forClient.push(toolCall);
    }
  }

  if (forClient.length > 0) {
    const canonical = new Map<string, ClientToolCall>();
    const keyOf = new Map<string, string>();
    for (const toolCall of forClient) {
      const key = `${toolCall.name}:${JSON.stringify(toolCall.arguments)}`;
      keyOf.set(toolCall.id, key);
      if (!canonical.has(key)) {
        canonical.set(key, { id: toolCall.id, name: toolCall.name, arguments: toolCall.arguments });
      }
    }

    const batch = [...canonical.values()];
    const results = await services.dispatcher.callClient(batch, { context, signal });
    log.debug('Client tool results received', { node, count: results.length });

    if (results.length > 0 && results.every(executedOnClient)) {
      return { terminal: true, messages: [] };
    }

    for (const toolCall of forClient) {
      const key = keyOf.get(toolCall.id);
      const target = key === undefined ? undefined : canonical.get(key);
      const result =
        results.find((r) => target !== undefined && r.id === target.id) ??
        results.find((r) => r.name === toolCall.name);
      answered.set(toolCall.id, result ? toolContent(result.result) : 'Error: the client returned no result');
    }
  }

  const messages: ChatMessage[] = calls.map((toolCall) => ({
    role: 'tool',
    toolCallId: toolCall.id,
    name: toolCall.name,
    content: answered.get(toolCall.id) ?? '',
  }));
  return { terminal: false, messages };
}

function finish(
  call: BuiltinCall,
  state: ResolvedCallState,
  format: 'text' | 'json',
  content: string,
  reply: ValueObject,
): BuiltinResult {
  const value: Value = format === 'json' ? tryParseJson(content) : content;
  if (!state.persist) return transient(value);

  const { context } = call;
  context.appendReplyOutput(content);
  const previous = context.reply.tokens;
  const tokens = typeof reply.tokens === 'number' ? reply.tokens : 0;
  context.setReply({
    ...reply,
    content,
    tokens: (typeof previous === 'number' ? previous : 0) + tokens,
  });
  return value;
}

// -----------------------------
// Agent workflows
// -----------------------------

async function runAgentWorkflow(
  call: BuiltinCall,
  agent: AgentResource,
  workflow: string,
  message: string,
  state: ResolvedCallState,
  format: 'text' | 'json',
): Promise<BuiltinResult> {
  const { args, context, services, signal } = call;
  const base = agent.source ? dirname(agent.source) : services.workdir;
  const timeoutSeconds = optionalNumber(args, 'workflow_timeout');

  log.info('Running agent workflow', { agent: agent.slug, workflow, timeoutSeconds: timeoutSeconds ?? null });
  const outcome = await services.runWorkflow({
    path: resolve(base, workflow),
    input: { message },
    parent: context,
    identifier: `${agent.slug}:${workflow}`,
    signal,
    ...(timeoutSeconds !== undefined ? { timeoutMs: timeoutSeconds * 1000 } : {}),
  });

  context.mergeReturned(outcome.context, agent.returns ?? []);

  const childOutput = outcome.context.reply.output;
  const text = typeof childOutput === 'string' && childOutput.length > 0 ? childOutput : null;
  if (text === null) {
    return state.persist ? outcome.value : transient(outcome.value);
  }
  return finish(call, state, format, text, {});
}

// -----------------------------
// Builtin
// -----------------------------

/**
 * `chat(agent=..., message=..., state=..., tools=..., format=...)`
 */
export const chat: BuiltinTool = {
  name: 'chat',
  required: ['message'],
  async execute(call) {
    const { tool, args, context, services, signal } = call;
    const node = call.node ?? tool;
    const message = requireString(args, tool, 'message');
    const state = resolveCallState(args);
    const format = (optionalString(args, 'format') ?? 'text').toLowerCase() === 'json' ? 'json' : 'text';
    const agentSlug = optionalString(args, 'agent') ?? 'default';
    const agent = services.resources.getAgent(agentSlug);

    if (agent?.workflow) {
      return runAgentWorkflow(call, agent, agent.workflow, message, state, format);
    }

    const systemPrompt = resolveSystemPrompt(call, agent);
    const tools = services.tools.resolveToolsForCall(args.tools, agent);
    const model = optionalString(args, 'model') ?? agent?.model ?? services.defaultModel;
    const temperature = optionalNumber(args, 'temperature') ?? agent?.temperature ?? DEFAULTS.agentTemperature;
    let chatId = resolveChatId(call, state.persist);

    let streamed = false;
    const onToken = state.stream
      ? (delta: string) => {
          streamed = true;
          context.emit({ type: 'content', node, delta });
        }
      : undefined;

    log.debug('Chat call', { node, agent: agentSlug, model, tools: tools.length, persist: state.persist, stream: state.stream });

    // Without persistence the model keeps no history, so every request carries the whole exchange.
    const transcript: ChatMessage[] = [];
    let pending: ChatMessage[] = [{ role: 'user', content: message }];
    let tokens = 0;
    let toolRounds = 0;

    for (;;) {
      const response = await services.model.chat(
        {
          agent: agentSlug,
          model,
          temperature,
          messages: state.persist && chatId !== undefined ? pending : [...transcript, ...pending],
          tools,
          remember: state.persist,
          responseFormat: format,
          ...(systemPrompt !== undefined ? { systemPrompt } : {}),
          ...(chatId !== undefined ? { chatId } : {}),
        },
        { signal, ...(onToken ? { onToken } : {}) },
      );
      tokens += response.tokens;
      if (response.chatId !== null) chatId = response.chatId;
      transcript.push(...pending);

      if (response.kind === 'final') {
        if (state.stream && !streamed && response.content) {
          context.emit({ type: 'content', node, delta: response.content });
        }
        return finish(call, state, format, response.content, {
          chat_id: chatId ?? null,
          tokens,
          model: response.model,
          finish_reason: response.finishReason,
        });
      }

      toolRounds++;
      if (toolRounds > services.limits.maxToolRounds) {
        throw new CallFailureError(`Agent '${agentSlug}' exceeded ${services.limits.maxToolRounds} tool rounds`, {
          agent: agentSlug,
          maxToolRounds: services.limits.maxToolRounds,
        });
      }
      log.info('Tool calls requested', { node, tools: response.calls.map((c) => c.name) });
      transcript.push({ role: 'assistant', content: response.content, toolCalls: response.calls });

      const round = await runToolCalls(response.calls, call);
      if (round.terminal) {
        return finish(call, state, 'text', CLIENT_TERMINAL_REPLY, {
          chat_id: chatId ?? null,
          tokens,
          model: response.model,
          finish_reason: 'client_tools',
        });
      }
      pending = round.messages;
    }
  },
};
