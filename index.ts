// Public API

export type * from './core/types.ts';
export { CALL_STATES, DEFAULTS, DEFAULT_CALL_STATE, RESERVED_ROOTS } from './core/constants.ts';
export type { CallState, CallStateFlags } from './core/constants.ts';

export { FlowEngine, createEngine } from './runtime/core/engine.ts';
export type { CompiledFlow, EngineLimits, EngineSetup, FlowEngineOptions, RunOptions, RunResult } from './runtime/core/engine.ts';
export { FlowScheduler } from './runtime/core/scheduler.ts';
export type { SchedulerOptions, SchedulerOutcome } from './runtime/core/scheduler.ts';
export { ExecutionContext } from './runtime/core/context.ts';
export type { ContextSnapshot, LoopScope } from './runtime/core/context.ts';

export { mergeFlow } from './runtime/core/graphMerger.ts';
export { loadUnit, parseUnit } from './runtime/core/sourceLoader.ts';
export { validateGraph, hasValidationErrors } from './runtime/core/validator.ts';
export type { ValidationIssue, ValidationLevel } from './runtime/core/validator.ts';

export { evaluate, parseExpression } from './runtime/core/expressionEngine.ts';
export type { ExprAst, ExpressionScope } from './runtime/core/expressionEngine.ts';
export { evaluateCondition } from './runtime/core/evaluateCondition.ts';
export { evaluateArgument, renderTemplate } from './runtime/core/variables.ts';

export { ResourceRegistry, loadResources } from './runtime/core/resources.ts';
export { ToolRegistry } from './runtime/core/toolRegistry.ts';
export { ToolDispatcher, TransientOutput, transient } from './runtime/core/toolsRuntime.ts';
export type { BuiltinCall, BuiltinTool, EngineServices } from './runtime/core/toolsRuntime.ts';
export { JsonRpcToolServerClient, ToolServerRegistry } from './runtime/core/toolServers.ts';
export type { RemoteTool, ToolServerClient } from './runtime/core/toolServers.ts';
export { ClientBridge } from './runtime/core/clientBridge.ts';
export type { PendingToolCall } from './runtime/core/clientBridge.ts';
export { builtinTools } from './runtime/core/builtins/index.ts';

export { GeminiChatModel } from './runtime/core/models.ts';
export type { ChatModel, ChatRequest, ChatResponse, ChatMessage } from './runtime/core/models.ts';
export { SimulatedChatModel } from './runtime/core/simulatedModel.ts';

export { MemorySink, callbackSink, fanOut, noopSink } from './runtime/core/observer.ts';
export type { EventSink } from './runtime/core/observer.ts';

export {
  FlowError,
  ParseError,
  CircularImportError,
  EvalError,
  UnresolvedVariableError,
  MissingArgumentError,
  ToolResolutionError,
  ToolTimeoutError,
  CallFailureError,
  LoopLimitError,
  RecursionLimitError,
  CancelledError,
  toErrorInfo,
} from './runtime/core/errors.ts';

export { resolveRunConfig } from './runtime/shared/runConfig.ts';
export type { RunConfig, RunMode } from './runtime/shared/runConfig.ts';
export { loadProjectConfig } from './runtime/shared/projectConfig.ts';
export { createLogger, setLogLevel, setLogTransport } from './runtime/shared/logger.ts';
