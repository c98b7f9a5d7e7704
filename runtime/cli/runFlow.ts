#!/usr/bin/env node
import { dirname, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { Value } from "../../core/types.ts";
import { createEngine } from "../core/engine.ts";
import { CancelledError, FlowError } from "../core/errors.ts";
import { callbackSink } from "../core/observer.ts";
import type { ValidationIssue } from "../core/validator.ts";
import { toValue } from "../core/value.ts";
import { setLogLevel } from "../shared/logger.ts";
import { loadProjectConfig } from "../shared/projectConfig.ts";
import { resolveRunConfig } from "../shared/runConfig.ts";

export const USAGE = [
  "Usage:",
  "  runFlow.ts run <flow.yaml|flow.json> [--input JSON] [--sim] [--seed N] [--timeout MS]",
  "  runFlow.ts check <flow.yaml|flow.json>",
  "",
  "Examples:",
  "  runFlow.ts run flows/support.yaml --input '{\"message\":\"hi\"}' --sim",
  "  runFlow.ts check flows/support.yaml",
].join("\n");

export class CliUsageError extends Error {}

export type CliCommand = "run" | "check";

export interface CliArgs {
  command: CliCommand;
  file: string;
  input: Value;
  sim: boolean;
  seed?: number;
  timeoutMs?: number;
}

function parseInput(text: string): Value {
  try {
    return toValue(JSON.parse(text));
  } catch {
    // not JSON: pass the text through as a plain string input
    return text;
  }
}

function parseNumberFlag(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isFinite(value)) {
    throw new CliUsageError(`${flag} expects a number`);
  }
  return value;
}

/**
 * Parse `process.argv.slice(2)`.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const [command, ...rest] = argv;
  if (command !== "run" && command !== "check") {
    throw new CliUsageError(command ? `Unknown command '${command}'` : "Missing command");
  }

  let file: string | undefined;
  let input: Value = null;
  let sim = false;
  let seed: number | undefined;
  let timeoutMs: number | undefined;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case "--input": {
        const text = rest[++i];
        if (text === undefined) throw new CliUsageError("--input expects a value");
        input = parseInput(text);
        break;
      }
      case "--sim":
        sim = true;
        break;
      case "--seed":
        seed = parseNumberFlag("--seed", rest[++i]);
        break;
      case "--timeout":
        timeoutMs = parseNumberFlag("--timeout", rest[++i]);
        break;
      default:
        if (arg.startsWith("--")) throw new CliUsageError(`Unknown option '${arg}'`);
        if (file !== undefined) throw new CliUsageError(`Unexpected argument '${arg}'`);
        file = arg;
    }
  }

  if (file === undefined) throw new CliUsageError("Missing flow file");
  return {
    command,
    file,
    input,
    sim,
    ...(seed !== undefined ? { seed } : {}),
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
  };
}

export function formatIssue(issue: Pick<ValidationIssue, "level" | "code" | "message" | "path">): string {
  const location = issue.path ? ` (${issue.path})` : "";
  return ` › [${issue.code}] ${issue.message}${location}`;
}

async function run() {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    console.error(`${err.message}\n\n${USAGE}`);
    process.exit(1);
  }

  const filePath = resolve(process.cwd(), args.file);
  const project = await loadProjectConfig(dirname(filePath));
  const config = resolveRunConfig({ ...project.config.env, ...process.env });
  setLogLevel(config.logLevel);

  // `check` never calls a model
  if (args.sim || args.command === "check") config.mode = "sim";
  if (args.seed !== undefined) config.seed = args.seed;

  let streaming = false;
  const engine = await createEngine({
    config,
    toolServers: project.config.tool_servers,
    sink: callbackSink((event) => {
      if (event.type === "content") {
        process.stdout.write(event.delta);
        streaming = true;
      } else if (event.type === "status") {
        console.error(`… ${event.status}`);
      }
    }),
  });

  const flow = await engine.compile(filePath);
  const warnings = flow.issues.filter((issue) => issue.level === "warning");

  if (args.command === "check") {
    console.log(`✔ ${flow.graph.metadata.name} v${flow.graph.metadata.version}: ${flow.graph.nodes.size} nodes, ${flow.graph.edges.length} edges`);
    for (const issue of warnings) console.log(formatIssue(issue));
    return;
  }

  console.error(`▶ Running ${flow.graph.metadata.name} v${flow.graph.metadata.version} (${config.mode} mode)`);

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new CancelledError("Interrupted")));

  const result = await engine.run(flow, {
    input: args.input,
    signal: controller.signal,
    ...(args.timeoutMs !== undefined ? { timeoutMs: args.timeoutMs } : {}),
  });
  if (streaming) process.stdout.write("\n");

  if (!result.ok) {
    const { error } = result;
    console.error(`✖ [${error.code}]${error.node ? ` ${error.node}:` : ""} ${error.message}`);
    process.exitCode = 1;
    return;
  }

  console.log(JSON.stringify(result.value, null, 2));
}

/** True when `moduleUrl` is the script node was started with. */
export function isEntryPoint(moduleUrl: string, script: string | undefined): boolean {
  return script !== undefined && moduleUrl === pathToFileURL(script).href;
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  run().catch((err) => {
    if (err instanceof FlowError) {
      console.error(`✖ [${err.code}] ${err.message}`);
      const details = Array.isArray(err.details) ? err.details : [];
      for (const detail of details) {
        if (detail && typeof detail === "object" && !Array.isArray(detail)) {
          console.error(`   ${JSON.stringify(detail)}`);
        }
      }
    } else {
      console.error("Unexpected error while running flow:", err);
    }
    process.exit(1);
  });
}
