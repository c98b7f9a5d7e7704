// runtime/core/engine.ts

import { dirname } from 'node:path';
import type {
  ClientToolResult,
  ErrorInfo,
  FlowGraph,
  NodeStatus,
  ToolServerConfig,
  Value,
  ValueObject,
} from '../../core/types.ts';
import { DEFAULTS } from '../../core/constants.ts';
import { createLogger } from '../shared/logger.ts';
import type { RunConfig } from '../shared/runConfig.ts';
import { builtinTools } from './builtins/index.ts';
import { ClientBridge, type PendingToolCall } from './clientBridge.ts';
import { ExecutionContext } from './context.ts';
import { CancelledError, FlowError, ParseError } from './errors.ts';
import { mergeFlow, type UnitLoader } from './graphMerger.ts';
import { GeminiChatModel, type ChatModel } from './models.ts';
import { noopSink, type EventSink } from './observer.ts';
import { loadResources, type ResourceRegistry } from './resources.ts';
import { FlowScheduler } from './scheduler.ts';
import { SimulatedChatModel } from './simulatedModel.ts';
import { ToolRegistry } from './toolRegistry.ts';
import { JsonRpcToolServerClient, ToolServerRegistry, type ToolServerClient } from './toolServers.ts';
import { ToolDispatcher, type EngineServices, type WorkflowOutcome, type WorkflowRequest } from './toolsRuntime.ts';
import { hasValidationErrors, validateGraph, type ValidationIssue } from './validator.ts';

const log = createLogger('engine');

export interface EngineLimits {
  maxConcurrency: number;
  maxLoopIterations: number;
  maxDepth: number;
  maxToolRounds: number;
  clientToolTimeoutMs: number;
}

export interface FlowEngineOptions {
  model: ChatModel;
  limits?: Partial<EngineLimits>;
  defaultModel?: string;

  // Route unknown tools to a client through a ClientBridge.
  clientTools?: boolean;
  toolServers?: ToolServerRegistry;
  workdir?: string;
  fetch?: typeof fetch;
  sink?: EventSink;
  loader?: UnitLoader;
}

export interface CompiledFlow {
  graph: FlowGraph;
  resources: ResourceRegistry;
  tools: ToolRegistry;
  issues: ValidationIssue[];
}

export interface RunOptions {
  input?: Value;
  ctx?: ValueObject;
  signal?: AbortSignal;
  timeoutMs?: number;
  sink?: EventSink;
}

export type RunResult =
  | {
      ok: true;
      value: Value;
      outputs: ValueObject;
      statuses: Record<string, NodeStatus>;
      context: ExecutionContext;
    }
  | {
      ok: false;
      error: ErrorInfo;
      statuses: Record<string, NodeStatus>;
      context: ExecutionContext;
    };

interface LinkedAbort {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Abort signal that follows `parent` and, when `timeoutMs` is set, fires after that long.
 */
function linkAbort(parent: AbortSignal | undefined, timeoutMs: number | undefined): LinkedAbort {
  const controller = new AbortController();
  const onAbort = () => {
    controller.abort(parent?.reason instanceof CancelledError ? parent.reason : new CancelledError());
  };
  if (parent?.aborted) onAbort();
  else parent?.addEventListener('abort', onAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  if (timeoutMs !== undefined && timeoutMs > 0) {
    timer = setTimeout(() => controller.abort(new CancelledError(`Run timed out after ${timeoutMs}ms`)), timeoutMs);
  }

  return {
    signal: controller.signal,
    dispose() {
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Compiles flow files (merge, validate, load resources) and runs them.
 */
export class FlowEngine {
  readonly bridge: ClientBridge | undefined;
  private readonly dispatcher: ToolDispatcher;
  private readonly limits: EngineLimits;

  constructor(private readonly options: FlowEngineOptions) {
    this.limits = {
      maxConcurrency: options.limits?.maxConcurrency ?? DEFAULTS.maxConcurrency,
      maxLoopIterations: options.limits?.maxLoopIterations ?? DEFAULTS.maxLoopIterations,
      maxDepth: options.limits?.maxDepth ?? DEFAULTS.maxDepth,
      maxToolRounds: options.limits?.maxToolRounds ?? DEFAULTS.maxToolRounds,
      clientToolTimeoutMs: options.limits?.clientToolTimeoutMs ?? DEFAULTS.clientToolTimeoutMs,
    };
    this.bridge = options.clientTools ? new ClientBridge(this.limits.clientToolTimeoutMs) : undefined;
    this.dispatcher = new ToolDispatcher({
      ...(options.toolServers ? { servers: options.toolServers } : {}),
      ...(this.bridge ? { bridge: this.bridge } : {}),
      clientToolTimeoutMs: this.limits.clientToolTimeoutMs,
    }).register(...builtinTools());
  }

  // -----------------------------
  // Compile
  // -----------------------------

  /**
   * Merge the flow at `path` with its imports, validate it and load its resources.
   * Validation errors throw a ParseError carrying the issues; warnings are logged.
   */
  async compile(path: string): Promise<CompiledFlow> {
    const graph = await mergeFlow(path, this.options.loader ? { loader: this.options.loader } : {});
    const issues = validateGraph(graph);

    for (const issue of issues) {
      if (issue.level === 'warning') {
        log.warn('Flow validation warning', { source: graph.source, code: issue.code, message: issue.message });
      }
    }
    if (hasValidationErrors(issues)) {
      const errors = issues.filter((issue) => issue.level === 'error');
      throw new ParseError(
        errors.map((issue) => `[${issue.code}] ${issue.message}`).join('; '),
        graph.source,
        errors.map((issue) => ({ code: issue.code, message: issue.message, path: issue.path ?? null })),
      );
    }

    const resources = await loadResources(graph.resources, {
      defaultModel: this.options.defaultModel ?? DEFAULTS.model,
    });
    const tools = new ToolRegistry([...resources.toolBundles, ...(this.options.toolServers?.bundles() ?? [])]);

    log.debug('Compiled flow', {
      source: graph.source,
      nodes: graph.nodes.size,
      agents: resources.agents.size,
      prompts: resources.prompts.size,
      toolBundles: tools.slugs().length,
    });
    return { graph, resources, tools, issues };
  }

  // -----------------------------
  // Run
  // -----------------------------

  async run(flow: CompiledFlow, options: RunOptions = {}): Promise<RunResult> {
    const link = linkAbort(options.signal, options.timeoutMs);
    const context = new ExecutionContext({
      input: options.input ?? null,
      ...(options.ctx ? { ctx: options.ctx } : {}),
      sink: options.sink ?? this.options.sink ?? noopSink,
      signal: link.signal,
      maxDepth: this.limits.maxDepth,
    });

    log.info('Run started', { flow: flow.graph.metadata.slug, source: flow.graph.source });
    try {
      const result = await this.execute(flow, context);
      if (result.ok) {
        context.emit({ type: 'done', ok: true, value: result.value });
      } else {
        context.emit({ type: 'error', error: result.error });
        context.emit({ type: 'done', ok: false });
      }
      log.info('Run finished', {
        flow: flow.graph.metadata.slug,
        ok: result.ok,
        ...(result.ok ? {} : { code: result.error.code, node: result.error.node }),
      });
      return result;
    } finally {
      link.dispose();
    }
  }

  /** Compile and run in one step. */
  async runFile(path: string, options: RunOptions = {}): Promise<RunResult> {
    return this.run(await this.compile(path), options);
  }

  /**
   * Deliver results for a pending client tool call. False when the call is unknown,
   * already settled, or the engine has no client bridge.
   */
  resolveToolCall(callId: string, results: ClientToolResult[]): boolean {
    return this.bridge?.resolve(callId, results) ?? false;
  }

  get pendingToolCalls(): PendingToolCall[] {
    return this.bridge?.pendingCalls ?? [];
  }

  private async execute(flow: CompiledFlow, context: ExecutionContext): Promise<RunResult> {
    const scheduler = new FlowScheduler(flow.graph, context, {
      services: this.services(flow),
      maxConcurrency: this.limits.maxConcurrency,
      maxLoopIterations: this.limits.maxLoopIterations,
    });
    const outcome = await scheduler.run(context.signal);
    const statuses = context.statuses();

    if (!outcome.ok) {
      return { ok: false, error: outcome.error, statuses, context };
    }
    return { ok: true, value: outcome.value, outputs: context.outputs(), statuses, context };
  }

  private services(flow: CompiledFlow): EngineServices {
    return {
      model: this.options.model,
      tools: flow.tools,
      resources: flow.resources,
      dispatcher: this.dispatcher,
      limits: { maxToolRounds: this.limits.maxToolRounds, clientToolTimeoutMs: this.limits.clientToolTimeoutMs },
      defaultModel: this.options.defaultModel ?? DEFAULTS.model,
      workdir: this.options.workdir ?? dirname(flow.graph.source),
      fetch: this.options.fetch ?? fetch,
      runWorkflow: (request) => this.runWorkflow(request),
    };
  }

  /**
   * Nested run of an agent workflow: own context and scheduler, guarded by the
   * parent's execution stack.
   */
  private async runWorkflow(request: WorkflowRequest): Promise<WorkflowOutcome> {
    const { parent, identifier } = request;
    parent.enterExecution(identifier);
    const link = linkAbort(request.signal, request.timeoutMs);
    try {
      const flow = await this.compile(request.path);
      const child = parent.fork(request.input, link.signal);
      log.info('Nested workflow started', { identifier, depth: parent.executionDepth, source: flow.graph.source });

      const result = await this.execute(flow, child);
      if (!result.ok) throw FlowError.fromInfo(result.error);
      return { value: result.value, context: child };
    } finally {
      link.dispose();
      parent.exitExecution(identifier);
    }
  }
}

// -----------------------------
// Setup from configuration
// -----------------------------

export interface EngineSetup {
  config: RunConfig;
  toolServers?: readonly ToolServerConfig[];
  toolServerClient?: ToolServerClient;
  clientTools?: boolean;
  sink?: EventSink;
  workdir?: string;
}

/**
 * Engine for a resolved run configuration: the simulated model in sim mode,
 * Gemini otherwise, plus connected tool servers.
 */
export async function createEngine(setup: EngineSetup): Promise<FlowEngine> {
  const { config } = setup;

  let model: ChatModel;
  if (config.mode === 'sim') {
    model = new SimulatedChatModel(config.seed !== undefined ? { seed: config.seed } : {});
  } else {
    if (!config.apiKey) {
      throw new Error('No API key set. Set API_KEY or GEMINI_API_KEY, or use AGENTWEAVE_MODE=sim.');
    }
    model = new GeminiChatModel({ apiKey: config.apiKey });
  }

  let toolServers: ToolServerRegistry | undefined;
  if (setup.toolServers && setup.toolServers.length > 0) {
    toolServers = new ToolServerRegistry(setup.toolServerClient ?? new JsonRpcToolServerClient());
    await toolServers.connect(setup.toolServers);
  }

  log.debug('Engine created', { mode: config.mode, model: config.model, toolServers: toolServers?.keys().length ?? 0 });
  return new FlowEngine({
    model,
    defaultModel: config.model,
    limits: {
      maxConcurrency: config.maxConcurrency,
      maxLoopIterations: config.maxLoopIterations,
      maxDepth: config.maxDepth,
      maxToolRounds: config.maxToolRounds,
      clientToolTimeoutMs: config.clientToolTimeoutMs,
    },
    ...(setup.clientTools !== undefined ? { clientTools: setup.clientTools } : {}),
    ...(toolServers ? { toolServers } : {}),
    ...(setup.workdir !== undefined ? { workdir: setup.workdir } : {}),
    ...(setup.sink ? { sink: setup.sink } : {}),
  });
}
