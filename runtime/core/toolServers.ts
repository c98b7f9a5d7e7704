// runtime/core/toolServers.ts

import { z } from 'zod';
import type { ToolDefinition, ToolResource, ToolServerConfig, Value, ValueObject } from '../../core/types.ts';
import { createLogger } from '../shared/logger.ts';
import { CallFailureError, ToolResolutionError } from './errors.ts';
import { buildHttpRequest } from './toolsRuntime.ts';
import { isValueObject, toValue } from './value.ts';

const log = createLogger('tool-servers');

export interface RemoteTool {
  name: string;
  description?: string;
  inputSchema?: ValueObject;
}

/**
 * Transport to an external tool server; opaque request/response.
 */
export interface ToolServerClient {
  listTools(server: ToolServerConfig, signal?: AbortSignal): Promise<RemoteTool[]>;
  callTool(server: ToolServerConfig, name: string, args: ValueObject, signal?: AbortSignal): Promise<Value>;
}

export function serverNamespace(server: ToolServerConfig): string {
  return server.alias ?? server.name;
}

// -----------------------------
// JSON-RPC over HTTP
// -----------------------------

const RpcResponse = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number(), message: z.string() }).optional(),
});

const ListToolsResult = z.object({
  tools: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().optional(),
      inputSchema: z.record(z.unknown()).optional(),
    }),
  ),
});

const CallToolResult = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  isError: z.boolean().optional(),
});

/**
 * Speaks `tools/list` and `tools/call` as JSON-RPC POSTs to `${base_url}/messages`.
 */
export class JsonRpcToolServerClient implements ToolServerClient {
  private nextId = 1;

  constructor(private readonly fetchImpl: typeof fetch = fetch) {}

  private async rpc(server: ToolServerConfig, method: string, params: ValueObject, signal?: AbortSignal): Promise<unknown> {
    const { url, init } = buildHttpRequest(
      {
        url: server.base_url,
        method: 'POST',
        ...(server.token ? { auth: { type: 'bearer' as const, token: server.token } } : {}),
      },
      { operation: 'messages', input: { jsonrpc: '2.0', id: this.nextId++, method, params } },
    );

    const response = await this.fetchImpl(url, { ...init, signal });
    if (!response.ok) {
      throw new CallFailureError(`Tool server '${server.name}' answered HTTP ${response.status}`, {
        server: server.name,
        status: response.status,
      });
    }

    const parsed = RpcResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new CallFailureError(`Tool server '${server.name}' sent an invalid JSON-RPC response`, { server: server.name });
    }
    if (parsed.data.error) {
      throw new CallFailureError(`Tool server '${server.name}': ${parsed.data.error.message}`, {
        server: server.name,
        rpcCode: parsed.data.error.code,
      });
    }
    return parsed.data.result;
  }

  async listTools(server: ToolServerConfig, signal?: AbortSignal): Promise<RemoteTool[]> {
    const result = ListToolsResult.safeParse(await this.rpc(server, 'tools/list', {}, signal));
    if (!result.success) {
      throw new CallFailureError(`Tool server '${server.name}' sent an invalid tool list`, { server: server.name });
    }
    return result.data.tools.map((tool) => {
      const remote: RemoteTool = { name: tool.name };
      if (tool.description !== undefined) remote.description = tool.description;
      if (tool.inputSchema !== undefined) {
        const schema = toValue(tool.inputSchema);
        if (isValueObject(schema)) remote.inputSchema = schema;
      }
      return remote;
    });
  }

  async callTool(server: ToolServerConfig, name: string, args: ValueObject, signal?: AbortSignal): Promise<Value> {
    const raw = await this.rpc(server, 'tools/call', { name, arguments: args }, signal);
    const result = CallToolResult.safeParse(raw);
    if (!result.success) {
      return toValue(raw);
    }
    const text = result.data.content
      .map((part) => part.text ?? '')
      .filter((part) => part.length > 0)
      .join('\n');
    if (result.data.isError) {
      throw new CallFailureError(`Tool '${name}' failed on server '${server.name}': ${text}`, { server: server.name, tool: name });
    }
    return text;
  }
}

// -----------------------------
// Registry
// -----------------------------

interface RegisteredTool {
  server: ToolServerConfig;
  tool: RemoteTool;
}

/**
 * Tools of every connected server, keyed `namespace.tool`.
 */
export class ToolServerRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(private readonly client: ToolServerClient) {}

  /**
   * List the tools of each server. A server that cannot be reached is skipped.
   */
  async connect(servers: readonly ToolServerConfig[], signal?: AbortSignal): Promise<void> {
    for (const server of servers) {
      let tools: RemoteTool[];
      try {
        tools = await this.client.listTools(server, signal);
      } catch (err) {
        log.warn('Tool server unavailable', {
          server: server.name,
          error: err instanceof Error ? err.message : String(err),
        });
        continue;
      }
      const namespace = serverNamespace(server);
      for (const tool of tools) {
        this.tools.set(`${namespace}.${tool.name}`, { server, tool });
      }
      log.info('Connected tool server', { server: server.name, namespace, tools: tools.length });
    }
  }

  has(key: string): boolean {
    return this.tools.has(key);
  }

  keys(): string[] {
    return [...this.tools.keys()];
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.entries()].map(([key, { tool }]) => {
      const definition: ToolDefinition = { type: 'function', function: { name: key } };
      if (tool.description !== undefined) definition.function.description = tool.description;
      if (tool.inputSchema !== undefined) definition.function.parameters = tool.inputSchema;
      return definition;
    });
  }

  /**
   * One tool bundle per server namespace, so agents can reference server tools by slug.
   */
  bundles(): ToolResource[] {
    const byNamespace = new Map<string, ToolResource>();
    for (const definition of this.definitions()) {
      const key = definition.function.name;
      const entry = this.tools.get(key);
      if (!entry) continue;
      const namespace = serverNamespace(entry.server);
      let bundle = byNamespace.get(namespace);
      if (!bundle) {
        bundle = { slug: namespace, name: entry.server.name, tools: [] };
        byNamespace.set(namespace, bundle);
      }
      bundle.tools.push(definition);
    }
    return [...byNamespace.values()];
  }

  async call(key: string, args: ValueObject, signal?: AbortSignal): Promise<Value> {
    const entry = this.tools.get(key);
    if (!entry) {
      throw new ToolResolutionError(`Unknown server tool '${key}'`, { tool: key });
    }
    return this.client.callTool(entry.server, entry.tool.name, args, signal);
  }
}
