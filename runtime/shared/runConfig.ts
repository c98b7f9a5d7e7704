import { DEFAULTS } from "../../core/constants.ts";
import { isLogLevel, type LogLevel } from "./logger.ts";

export type RunMode = "real" | "sim";

export interface RunConfig {
  mode: RunMode;
  seed?: number;
  source: "AGENTWEAVE_MODE" | "MOCK_LLM" | "default";

  logLevel: LogLevel;
  model: string;
  apiKey?: string;
  maxConcurrency: number;
  clientToolTimeoutMs: number;
  maxLoopIterations: number;
  maxDepth: number;
  maxToolRounds: number;
}

function readInt(raw: string | undefined, fallback: number, min = 0): number {
  const text = String(raw ?? "").trim();
  if (text.length === 0) return fallback;
  const value = Number(text);
  return Number.isInteger(value) && value >= min ? value : fallback;
}

/**
 * Mode priority:
 * 1) AGENTWEAVE_MODE=sim|real
 * 2) AGENTWEAVE_MOCK_LLM=1 or MOCK_LLM=1 -> sim
 * 3) default -> real
 *
 * Seed:
 * - AGENTWEAVE_SEED=<number> (optional)
 *
 * Limits fall back to DEFAULTS when unset or not a valid integer.
 */
export function resolveRunConfig(env: NodeJS.ProcessEnv = process.env): RunConfig {
  const modeRaw = String(env.AGENTWEAVE_MODE ?? "").trim().toLowerCase();
  const mockRaw = String(env.AGENTWEAVE_MOCK_LLM ?? env.MOCK_LLM ?? "").trim().toLowerCase();
  const seedRaw = String(env.AGENTWEAVE_SEED ?? "").trim();
  const levelRaw = String(env.AGENTWEAVE_LOG_LEVEL ?? "").trim().toLowerCase();

  const seed =
    seedRaw.length > 0 && Number.isFinite(Number(seedRaw)) ? Number(seedRaw) : undefined;

  const apiKey = env.API_KEY || env.GEMINI_API_KEY || undefined;

  const shared = {
    seed,
    logLevel: isLogLevel(levelRaw) ? levelRaw : "info",
    model: String(env.AGENTWEAVE_MODEL ?? "").trim() || DEFAULTS.model,
    ...(apiKey ? { apiKey } : {}),
    maxConcurrency: readInt(env.AGENTWEAVE_MAX_CONCURRENCY, DEFAULTS.maxConcurrency),
    clientToolTimeoutMs: readInt(env.AGENTWEAVE_CLIENT_TOOL_TIMEOUT_MS, DEFAULTS.clientToolTimeoutMs, 1),
    maxLoopIterations: readInt(env.AGENTWEAVE_MAX_LOOP_ITERATIONS, DEFAULTS.maxLoopIterations, 1),
    maxDepth: readInt(env.AGENTWEAVE_MAX_DEPTH, DEFAULTS.maxDepth, 1),
    maxToolRounds: readInt(env.AGENTWEAVE_MAX_TOOL_ROUNDS, DEFAULTS.maxToolRounds, 1),
  } satisfies Omit<RunConfig, "mode" | "source">;

  if (modeRaw === "sim") return { mode: "sim", source: "AGENTWEAVE_MODE", ...shared };
  if (modeRaw === "real") return { mode: "real", source: "AGENTWEAVE_MODE", ...shared };

  if (mockRaw === "1" || mockRaw === "true") return { mode: "sim", source: "MOCK_LLM", ...shared };

  return { mode: "real", source: "default", ...shared };
}
