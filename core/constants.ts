// Roots resolved against the execution context; never rewritten by the merger.
export const RESERVED_ROOTS = ['ctx', 'input', 'output', 'reply', 'loop', 'error'] as const;

export type ReservedRoot = (typeof RESERVED_ROOTS)[number];

export function isReservedRoot(name: string): name is ReservedRoot {
  return (RESERVED_ROOTS as readonly string[]).includes(name);
}

// Words the expression language gives meaning to on its own.
export const EXPRESSION_KEYWORDS = ['true', 'false', 'null', 'always', 'and', 'or', 'not'] as const;

export type CallState = 'context_visible' | 'context_hidden' | 'display_only' | 'silent';

export interface CallStateFlags {
  persist: boolean;
  stream: boolean;
}

export const CALL_STATES: Record<CallState, CallStateFlags> = {
  context_visible: { persist: true, stream: true },
  context_hidden: { persist: true, stream: false },
  display_only: { persist: false, stream: true },
  silent: { persist: false, stream: false },
};

export const DEFAULT_CALL_STATE: CallState = 'context_visible';

export const DEFAULTS = {
  clientToolTimeoutMs: 120_000,
  maxLoopIterations: 100,
  maxDepth: 10,
  maxToolRounds: 8,
  maxConcurrency: 0,
  model: 'gemini-2.5-flash',
  agentTemperature: 0.7,
  shellTimeoutMs: 30_000,
  maxConversations: 200,
} as const;

export const UNIT_EXTENSIONS = ['.yaml', '.yml', '.json'] as const;

export const PROJECT_CONFIG_FILES = ['agentweave.yaml', 'agentweave.yml', 'agentweave.json'] as const;

// Name of the builtin tool bundle that exposes the file and shell builtins to agents.
export const DEVTOOLS_BUNDLE = 'devtools';
