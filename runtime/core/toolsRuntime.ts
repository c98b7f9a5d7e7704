// runtime/core/toolsRuntime.ts

import { randomUUID } from 'node:crypto';
import type { ClientToolCall, ClientToolResult, ToolDefinition, Value, ValueObject } from '../../core/types.ts';
import { createLogger } from '../shared/logger.ts';
import type { ClientBridge } from './clientBridge.ts';
import type { ExecutionContext } from './context.ts';
import { CallFailureError, MissingArgumentError, ToolResolutionError } from './errors.ts';
import type { ExpressionScope } from './expressionEngine.ts';
import type { ChatModel } from './models.ts';
import type { ResourceRegistry } from './resources.ts';
import type { ToolRegistry } from './toolRegistry.ts';
import type { ToolServerRegistry } from './toolServers.ts';
import { isValueObject, toStr, toValue } from './value.ts';
import { evaluateArgument } from './variables.ts';

const log = createLogger('tools');

// -----------------------------
// HTTP requests
// -----------------------------

export type ToolAuth =
  | { type: 'none' }
  | { type: 'bearer'; token?: string };

export interface HttpEndpoint {
  url: string;
  method?: string;
  auth?: ToolAuth;
  headers?: Record<string, string>;
}

export interface HttpExecutionOptions {
  /**
   * Optional operation, e.g. "search" → url + "/search"
   */
  operation?: string;

  /**
   * Payload for the request.
   * - GET/HEAD → query parameters (objects only)
   * - other methods → JSON body (strings are sent as is)
   */
  input?: Value;

  signal?: AbortSignal;
  fetch?: typeof fetch;
}

export interface HttpExecutionResult {
  ok: boolean;
  status: number;
  data: Value;
  error?: string;
  rawBody: string;
}

export interface HttpRequest {
  url: string;
  init: { method: string; headers: Record<string, string>; body?: string };
}

function bearer(token: string): string {
  return token.startsWith('Bearer ') ? token : `Bearer ${token}`;
}

/** Authorization header for a bearer endpoint; `none` and missing tokens send nothing. */
export function buildAuthHeaders(auth: ToolAuth | undefined): Record<string, string> {
  if (auth?.type !== 'bearer' || !auth.token) return {};
  return { Authorization: bearer(auth.token) };
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

/**
 * URL + init for an HTTP call.
 *
 * - Appends `operation` as a path segment
 * - Query params (GET/HEAD) or body (other methods)
 * - Injects auth headers, then explicit headers
 */
export function buildHttpRequest(endpoint: HttpEndpoint, options: HttpExecutionOptions = {}): HttpRequest {
  if (!endpoint.url) {
    throw new CallFailureError("HTTP request is missing 'url'");
  }

  const method = (endpoint.method || 'GET').toUpperCase();
  const op = options.operation;
  let url = endpoint.url;

  // "https://api/x" + "/search"
  if (op && op.trim().length > 0) {
    if (url.endsWith('/')) {
      url = url.slice(0, -1);
    }
    const opPath = op.startsWith('/') ? op.slice(1) : op;
    url = `${url}/${opPath}`;
  }

  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...buildAuthHeaders(endpoint.auth),
    ...(endpoint.headers ?? {}),
  };

  const input = options.input ?? null;
  let body: string | undefined;

  if (method === 'GET' || method === 'HEAD') {
    if (isValueObject(input)) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(input)) {
        if (value === null) continue;
        params.append(key, toStr(value));
      }
      const qs = params.toString();
      if (qs) {
        url += (url.includes('?') ? '&' : '?') + qs;
      }
    }
  } else if (typeof input === 'string') {
    if (!hasHeader(headers, 'Content-Type')) headers['Content-Type'] = 'text/plain; charset=utf-8';
    body = input;
  } else if (input !== null) {
    if (!hasHeader(headers, 'Content-Type')) headers['Content-Type'] = 'application/json';
    body = JSON.stringify(input);
  }

  const init: HttpRequest['init'] = { method, headers };
  if (body !== undefined) {
    init.body = body;
  }
  return { url, init };
}

function parseBody(rawBody: string): Value {
  if (!rawBody) return null;
  try {
    return toValue(JSON.parse(rawBody));
  } catch {
    return rawBody;
  }
}

/**
 * Perform the request; the body is parsed as JSON when possible, else kept as text.
 * Non-2xx responses are returned with ok=false rather than thrown.
 */
export async function executeHttpTool(
  endpoint: HttpEndpoint,
  options: HttpExecutionOptions = {},
): Promise<HttpExecutionResult> {
  const { url, init } = buildHttpRequest(endpoint, options);
  const fetchImpl = options.fetch ?? fetch;

  const response = await fetchImpl(url, { ...init, signal: options.signal });
  const rawBody = await response.text();
  const data = parseBody(rawBody);

  if (!response.ok) {
    return {
      ok: false,
      status: response.status,
      error: `HTTP ${response.status} ${response.statusText || ''}`.trim(),
      data,
      rawBody,
    };
  }

  return { ok: true, status: response.status, data, rawBody };
}

// -----------------------------
// Builtins
// -----------------------------

/**
 * A builtin result that completes the node without becoming its stored output.
 */
export class TransientOutput {
  constructor(readonly value: Value) {}
}

export type BuiltinResult = Value | TransientOutput;

export function transient(value: Value = null): TransientOutput {
  return new TransientOutput(value);
}

export interface WorkflowRequest {
  path: string;
  input: Value;
  parent: ExecutionContext;
  identifier: string;
  signal: AbortSignal;
  timeoutMs?: number;
}

export interface WorkflowOutcome {
  value: Value;
  context: ExecutionContext;
}

export interface EngineServices {
  model: ChatModel;
  tools: ToolRegistry;
  resources: ResourceRegistry;
  dispatcher: ToolDispatcher;
  limits: { maxToolRounds: number; clientToolTimeoutMs: number };
  defaultModel: string;

  // Base directory for relative file paths.
  workdir: string;
  fetch: typeof fetch;

  // Runs an agent workflow as a nested run; rejects with the child's error.
  runWorkflow(request: WorkflowRequest): Promise<WorkflowOutcome>;
}

export interface BuiltinCall {
  tool: string;
  node: string | null;
  args: ValueObject;

  // Argument source text, when the call comes from a graph node.
  raw?: Record<string, string>;
  context: ExecutionContext;
  signal: AbortSignal;
  services: EngineServices;
}

export interface BuiltinTool {
  readonly name: string;
  readonly required?: readonly string[];

  // Function schema offered to models when the builtin is part of a bundle.
  readonly schema?: ToolDefinition['function'];
  execute(call: BuiltinCall): Promise<BuiltinResult>;
}

export function evaluateCallArgs(args: Record<string, string>, scope: ExpressionScope): ValueObject {
  const out: ValueObject = {};
  for (const [name, source] of Object.entries(args)) {
    out[name] = evaluateArgument(source, scope);
  }
  return out;
}

// -----------------------------
// Dispatch
// -----------------------------

export type ToolRoute = 'builtin' | 'server' | 'client';

export interface DispatchOptions {
  node: string | null;
  raw?: Record<string, string>;
  context: ExecutionContext;
  signal: AbortSignal;
  services: EngineServices;
}

export interface ToolDispatcherOptions {
  servers?: ToolServerRegistry;

  // Without a bridge, tools that are neither builtin nor server tools do not resolve.
  bridge?: ClientBridge;
  clientToolTimeoutMs?: number;
}

/**
 * Resolves a tool name in order: builtin, external tool server (`namespace.tool`),
 * then the client bridge.
 */
export class ToolDispatcher {
  private readonly builtins = new Map<string, BuiltinTool>();

  constructor(private readonly options: ToolDispatcherOptions = {}) {}

  register(...tools: BuiltinTool[]): this {
    for (const tool of tools) this.builtins.set(tool.name, tool);
    return this;
  }

  builtinNames(): string[] {
    return [...this.builtins.keys()];
  }

  route(name: string): ToolRoute | null {
    if (this.builtins.has(name)) return 'builtin';
    if (this.options.servers?.has(name)) return 'server';
    if (this.options.bridge) return 'client';
    return null;
  }

  async dispatch(name: string, args: ValueObject, options: DispatchOptions): Promise<BuiltinResult> {
    const route = this.route(name);

    if (route === 'builtin') {
      const tool = this.builtins.get(name);
      if (tool) {
        for (const argument of tool.required ?? []) {
          if (args[argument] === undefined || args[argument] === null) {
            throw new MissingArgumentError(name, argument);
          }
        }
        return tool.execute({ tool: name, args, ...options });
      }
    }

    if (route === 'server' && this.options.servers) {
      return this.options.servers.call(name, args, options.signal);
    }

    if (route === 'client') {
      const call: ClientToolCall = { id: randomUUID(), name, arguments: args };
      const results = await this.callClient([call], options);
      const match = results.find((r) => r.id === call.id) ?? results.find((r) => r.name === name) ?? results[0];
      return match ? match.result : null;
    }

    throw new ToolResolutionError(`Unknown tool '${name}'`, { tool: name });
  }

  async callClient(calls: ClientToolCall[], options: Pick<DispatchOptions, 'context' | 'signal'>): Promise<ClientToolResult[]> {
    const { bridge } = this.options;
    if (!bridge) {
      throw new ToolResolutionError(`No client bridge for tools: ${calls.map((c) => c.name).join(', ')}`, {
        tools: calls.map((c) => c.name),
      });
    }
    log.debug('Routing tools to client', { tools: calls.map((c) => c.name) });
    return bridge.emitAndAwait(calls, {
      sink: options.context.sink,
      signal: options.signal,
      timeoutMs: this.options.clientToolTimeoutMs,
    });
  }
}
