// JSON-like value carried by arguments, context entries and node outputs.
export type Value = null | boolean | number | string | Value[] | ValueObject;

export interface ValueObject {
  [key: string]: Value;
}

// -----------------------------
// Graph model
// -----------------------------

export type NodeKind =
  | { type: 'call'; target: string; args: Record<string, string> }
  | { type: 'literal'; value: Value }
  | { type: 'foreach'; item: string; collection: string; body: Subgraph }
  | { type: 'while'; condition: string; body: Subgraph };

export interface FlowNode {
  readonly id: string;
  readonly kind: NodeKind;
}

export type EdgeKind = 'normal' | 'error';

export interface FlowEdge {
  from: string;
  to: string;
  condition?: string;
  kind: EdgeKind;

  // Switch case label; only meaningful when `from` has a switch route.
  case?: string;
}

export interface Subgraph {
  nodes: Map<string, FlowNode>;
  edges: FlowEdge[];
  entry: string[];
  exit: string[];

  // source node id -> subject expression
  switches: Map<string, string>;
}

export interface ResourcePatterns {
  prompts: string[];
  agents: string[];
  tools: string[];
  modules: string[];
}

export interface FlowMetadata {
  slug: string;
  name: string;
  version: string;
  description?: string;
  author?: string;
}

export interface FlowGraph extends Subgraph {
  metadata: FlowMetadata;

  // absolute path of the unit this graph was loaded from
  source: string;
  resources: ResourcePatterns;

  // alias -> path relative to `source`; empty after merge
  flows: Record<string, string>;
}

export type NodeStatus = 'pending' | 'ready' | 'running' | 'done' | 'failed' | 'unreachable';

// -----------------------------
// Errors & results
// -----------------------------

export type ErrorCode =
  | 'ParseError'
  | 'CircularImport'
  | 'UnresolvedVariable'
  | 'MissingArgument'
  | 'EvalError'
  | 'ToolResolutionError'
  | 'ToolTimeout'
  | 'CallFailure'
  | 'LoopLimitExceeded'
  | 'RecursionLimit'
  | 'Cancelled';

export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  node: string | null;
  details: Value;
}

export interface NodeRecord {
  status: NodeStatus;
  output: Value;
  error: ErrorInfo | null;
}

// -----------------------------
// Resources
// -----------------------------

// OpenAI function-calling shape.
export interface ToolDefinition {
  type: 'function';
  function: {
    name: string;
    description?: string;
    parameters?: ValueObject;
  };
}

export interface ToolResource {
  slug: string;
  name: string;
  description?: string;
  tools: ToolDefinition[];
}

// Inline list, a single bundle reference ("@slug" or "slug"), or several slugs.
export type ToolSpec = ToolDefinition[] | string | string[];

export interface AgentResource {
  slug: string;
  name: string;
  description?: string;
  model: string;
  temperature: number;
  system_prompt?: string;
  system_prompt_slug?: string;
  tools?: ToolSpec;
  workflow?: string;
  returns?: string[];

  // absolute path of the agent file
  source?: string;
}

export interface PromptResource {
  slug: string;
  content: string;
  source?: string;
}

export interface ToolServerConfig {
  name: string;
  base_url: string;
  alias?: string;
  token?: string;
}

// -----------------------------
// Client bridge
// -----------------------------

export interface ClientToolCall {
  id: string;
  name: string;
  arguments: ValueObject;
}

export interface ClientToolResult {
  id?: string;
  name: string;
  result: Value;
  executed_on_client?: boolean;
}

// -----------------------------
// Observer events
// -----------------------------

export type FlowEvent =
  | { type: 'node_start'; node: string; target?: string }
  | { type: 'content'; node: string; delta: string }
  | { type: 'node_complete'; node: string; status: 'done' | 'failed'; output?: Value }
  | { type: 'status'; node: string | null; status: string }
  | { type: 'tool_call'; callId: string; tools: ClientToolCall[] }
  | { type: 'error'; error: ErrorInfo }
  | { type: 'done'; ok: boolean; value?: Value };
