import { describe, it, expect } from "vitest";
import { pathToFileURL } from "node:url";
import { CliUsageError, formatIssue, isEntryPoint, parseCliArgs } from "../runFlow.ts";

describe("parseCliArgs", () => {
  it("parses a run with every option", () => {
    expect(
      parseCliArgs(["run", "flows/support.yaml", "--input", '{"message":"hi"}', "--sim", "--seed", "7", "--timeout", "500"])
    ).toEqual({
      command: "run",
      file: "flows/support.yaml",
      input: { message: "hi" },
      sim: true,
      seed: 7,
      timeoutMs: 500,
    });
  });

  it("passes non-JSON input through as text", () => {
    expect(parseCliArgs(["run", "f.yaml", "--input", "hello there"]).input).toBe("hello there");
  });

  it("defaults to null input and no simulation", () => {
    expect(parseCliArgs(["check", "f.yaml"])).toEqual({ command: "check", file: "f.yaml", input: null, sim: false });
  });

  it("rejects bad usage", () => {
    expect(() => parseCliArgs([])).toThrow("Missing command");
    expect(() => parseCliArgs(["deploy", "f.yaml"])).toThrow("Unknown command 'deploy'");
    expect(() => parseCliArgs(["run"])).toThrow("Missing flow file");
    expect(() => parseCliArgs(["run", "a.yaml", "b.yaml"])).toThrow("Unexpected argument 'b.yaml'");
    expect(() => parseCliArgs(["run", "a.yaml", "--verbose"])).toThrow("Unknown option '--verbose'");
    expect(() => parseCliArgs(["run", "a.yaml", "--seed", "x"])).toThrow("--seed expects a number");
    expect(() => parseCliArgs(["run", "a.yaml", "--input"])).toThrow(CliUsageError);
  });
});

describe("formatIssue", () => {
  it("shows code, message and path", () => {
    expect(formatIssue({ level: "warning", code: "ORPHAN_NODE", message: "Node never runs.", path: "nodes.x" })).toBe(
      " › [ORPHAN_NODE] Node never runs. (nodes.x)"
    );
    expect(formatIssue({ level: "error", code: "NO_ENTRY", message: "Nothing starts." })).toBe(" › [NO_ENTRY] Nothing starts.");
  });
});

describe("isEntryPoint", () => {
  const script = "/opt/agentweave/runtime/cli/runFlow.ts";

  it("matches the script node was started with", () => {
    expect(isEntryPoint(pathToFileURL(script).href, script)).toBe(true);
  });

  it("stays false when the module is imported", () => {
    expect(isEntryPoint(pathToFileURL(script).href, "/opt/agentweave/node_modules/vitest/vitest.mjs")).toBe(false);
    expect(isEntryPoint(pathToFileURL(script).href, undefined)).toBe(false);
  });
});
