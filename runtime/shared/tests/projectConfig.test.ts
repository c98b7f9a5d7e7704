import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ParseError } from "../../core/errors.ts";
import { loadProjectConfig, parseProjectConfig } from "../projectConfig.ts";

describe("parseProjectConfig", () => {
  it("reads tool servers and env overrides", () => {
    const text = [
      "tool_servers:",
      "  - name: search",
      "    base_url: http://localhost:9000/rpc",
      "    alias: web",
      "env:",
      "  AGENTWEAVE_MODE: sim",
    ].join("\n");

    expect(parseProjectConfig(text, "/p/agentweave.yaml")).toEqual({
      tool_servers: [{ name: "search", base_url: "http://localhost:9000/rpc", alias: "web" }],
      env: { AGENTWEAVE_MODE: "sim" },
    });
  });

  it("treats an empty file as defaults", () => {
    expect(parseProjectConfig("", "/p/agentweave.yaml")).toEqual({ tool_servers: [], env: {} });
  });

  it("rejects invalid server entries", () => {
    expect(() => parseProjectConfig('{"tool_servers":[{"name":"x","base_url":"nope"}]}', "/p/agentweave.json")).toThrow(
      "/p/agentweave.json: tool_servers.0.base_url: Invalid url"
    );
  });

  it("wraps syntax errors", () => {
    expect(() => parseProjectConfig("{", "/p/agentweave.json")).toThrow(ParseError);
  });
});

describe("loadProjectConfig", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "agentweave-project-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns defaults when no config file exists", async () => {
    expect(await loadProjectConfig(dir)).toEqual({ config: { tool_servers: [], env: {} }, path: null });
  });

  it("picks the first config file in lookup order", async () => {
    await writeFile(join(dir, "agentweave.json"), '{"env":{"AGENTWEAVE_SEED":"1"}}');
    await writeFile(join(dir, "agentweave.yml"), "env:\n  AGENTWEAVE_SEED: '2'\n");

    const loaded = await loadProjectConfig(dir);

    expect(loaded.path).toBe(join(dir, "agentweave.yml"));
    expect(loaded.config.env).toEqual({ AGENTWEAVE_SEED: "2" });
  });
});
