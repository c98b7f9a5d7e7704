// Shared fixtures for the engine tests.

import type { FlowEdge, FlowNode, NodeKind, Subgraph, Value, ValueObject } from '../../../core/types.ts';
import { ExecutionContext, type ExecutionContextOptions } from '../context.ts';
import { CallFailureError } from '../errors.ts';
import type { ChatCallOptions, ChatModel, ChatRequest, ChatResponse } from '../models.ts';
import { MemorySink } from '../observer.ts';
import { ResourceRegistry } from '../resources.ts';
import { FlowScheduler, type SchedulerOutcome } from '../scheduler.ts';
import { ToolRegistry } from '../toolRegistry.ts';
import { ToolDispatcher, type BuiltinResult, type BuiltinTool, type EngineServices } from '../toolsRuntime.ts';

export function call(target: string, args: Record<string, string> = {}): NodeKind {
  return { type: 'call', target, args };
}

export function literal(value: Value): NodeKind {
  return { type: 'literal', value };
}

export interface GraphSpec {
  nodes: Record<string, NodeKind>;
  edges?: Array<Partial<FlowEdge> & { from: string; to: string }>;
  entry?: string[];
  exit?: string[];
  switches?: Record<string, string>;
}

export function graphOf(spec: GraphSpec): Subgraph {
  const nodes = new Map<string, FlowNode>();
  for (const [id, kind] of Object.entries(spec.nodes)) nodes.set(id, { id, kind });
  return {
    nodes,
    edges: (spec.edges ?? []).map((edge): FlowEdge => ({ kind: 'normal', ...edge })),
    entry: spec.entry ?? [],
    exit: spec.exit ?? [],
    switches: new Map(Object.entries(spec.switches ?? {})),
  };
}

/**
 * Model that replays scripted responses and records every request.
 */
export class ScriptedModel implements ChatModel {
  readonly requests: ChatRequest[] = [];

  constructor(private readonly script: Array<ChatResponse | ((request: ChatRequest) => ChatResponse)>) {}

  async chat(request: ChatRequest, options: ChatCallOptions = {}): Promise<ChatResponse> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const next = this.script.shift();
    if (next === undefined) throw new CallFailureError('script exhausted');
    const response = typeof next === 'function' ? next(request) : next;
    if (response.kind === 'final' && options.onToken) {
      for (const word of response.content.split(' ')) options.onToken(word);
    }
    return response;
  }
}

export function finalReply(content: string, extra: Partial<Extract<ChatResponse, { kind: 'final' }>> = {}): ChatResponse {
  return { kind: 'final', content, chatId: null, tokens: 3, model: 'test-model', finishReason: 'STOP', ...extra };
}

/** Builtin returning its `value` argument. */
export const echo: BuiltinTool = {
  name: 'echo',
  async execute({ args }) {
    return args.value ?? null;
  },
};

/** Builtin that always fails with CallFailure. */
export const boom: BuiltinTool = {
  name: 'boom',
  async execute({ args }) {
    throw new CallFailureError(typeof args.message === 'string' ? args.message : 'boom');
  },
};

export interface ServiceOverrides extends Partial<EngineServices> {
  builtins?: BuiltinTool[];
}

export function makeServices(overrides: ServiceOverrides = {}): EngineServices {
  const { builtins = [echo, boom], ...rest } = overrides;
  const dispatcher = rest.dispatcher ?? new ToolDispatcher().register(...builtins);
  return {
    model: new ScriptedModel([]),
    tools: new ToolRegistry(),
    resources: new ResourceRegistry(),
    limits: { maxToolRounds: 3, clientToolTimeoutMs: 1000 },
    defaultModel: 'test-model',
    workdir: process.cwd(),
    fetch,
    runWorkflow: async () => {
      throw new CallFailureError('nested workflows are not wired in this test');
    },
    ...rest,
    dispatcher,
  };
}

export interface InvokeOptions {
  context?: ExecutionContext;
  services?: EngineServices;
  raw?: Record<string, string>;
}

/** Call a builtin directly, as node `n`. */
export function invoke(tool: BuiltinTool, args: ValueObject, options: InvokeOptions = {}): Promise<BuiltinResult> {
  const context = options.context ?? new ExecutionContext();
  return tool.execute({
    tool: tool.name,
    node: 'n',
    args,
    ...(options.raw ? { raw: options.raw } : {}),
    context,
    signal: context.signal,
    services: options.services ?? makeServices(),
  });
}

export interface RunGraphOptions extends ExecutionContextOptions {
  services?: EngineServices;
  maxConcurrency?: number;
  maxLoopIterations?: number;
}

export interface GraphRun {
  outcome: SchedulerOutcome;
  context: ExecutionContext;
  sink: MemorySink;
}

export async function runGraph(graph: Subgraph, options: RunGraphOptions = {}): Promise<GraphRun> {
  const { services = makeServices(), maxConcurrency, maxLoopIterations, ...contextOptions } = options;
  const sink = new MemorySink();
  const context = new ExecutionContext({ sink, ...contextOptions });
  const scheduler = new FlowScheduler(graph, context, {
    services,
    ...(maxConcurrency !== undefined ? { maxConcurrency } : {}),
    ...(maxLoopIterations !== undefined ? { maxLoopIterations } : {}),
  });
  const outcome = await scheduler.run();
  return { outcome, context, sink };
}

export function valueOf(outcome: SchedulerOutcome): Value {
  if (!outcome.ok) throw new Error(`run failed: ${outcome.error.code} ${outcome.error.message}`);
  return outcome.value;
}

export function objectOf(value: Value): ValueObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`expected an object, got ${JSON.stringify(value)}`);
  }
  return value;
}
