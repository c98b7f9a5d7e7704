import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { PROJECT_CONFIG_FILES } from "../../core/constants.ts";
import { ParseError } from "../core/errors.ts";

export const ToolServerConfigSchema = z.object({
  name: z.string().min(1),
  base_url: z.string().url(),
  alias: z.string().min(1).optional(),
  token: z.string().optional(),
});

export const ProjectConfigSchema = z.object({
  tool_servers: z.array(ToolServerConfigSchema).default([]),
  env: z.record(z.string()).default({}),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export interface LoadedProjectConfig {
  config: ProjectConfig;
  path: string | null;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function parseProjectConfig(text: string, path: string): ProjectConfig {
  let raw: unknown;
  try {
    raw = path.endsWith(".json") ? JSON.parse(text) : parseYaml(text);
  } catch (err) {
    throw new ParseError(`invalid project config: ${err instanceof Error ? err.message : String(err)}`, path);
  }

  const result = ProjectConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const message = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ParseError(message, path);
  }
  return result.data;
}

/**
 * Look for agentweave.yaml / .yml / .json in `dir`. A missing file yields the defaults.
 */
export async function loadProjectConfig(dir: string): Promise<LoadedProjectConfig> {
  for (const name of PROJECT_CONFIG_FILES) {
    const path = join(dir, name);
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) continue;
      throw err;
    }
    return { config: parseProjectConfig(text, path), path };
  }
  return { config: ProjectConfigSchema.parse({}), path: null };
}
