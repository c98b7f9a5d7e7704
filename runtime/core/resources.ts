// runtime/core/resources.ts

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import fg from 'fast-glob';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type {
  AgentResource,
  PromptResource,
  ResourcePatterns,
  ToolResource,
  ValueObject,
} from '../../core/types.ts';
import { DEFAULTS } from '../../core/constants.ts';
import { createLogger } from '../shared/logger.ts';
import { ParseError } from './errors.ts';
import { isValueObject, toValue } from './value.ts';

const log = createLogger('resources');

// -----------------------------
// Schemas
// -----------------------------

function toValueObject(raw: Record<string, unknown>): ValueObject {
  const value = toValue(raw);
  return isValueObject(value) ? value : {};
}

export const ToolDefinitionSchema = z.object({
  type: z.literal('function').default('function'),
  function: z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    parameters: z.record(z.unknown()).transform(toValueObject).optional(),
  }),
});

export const ToolSpecSchema = z.union([
  z.array(ToolDefinitionSchema),
  z.string().min(1),
  z.array(z.string().min(1)),
]);

const ToolBundleSchema = z.union([
  z.object({
    slug: z.string().min(1).optional(),
    name: z.string().optional(),
    description: z.string().optional(),
    tools: z.array(ToolDefinitionSchema),
  }),
  z.array(ToolDefinitionSchema).transform((tools) => ({ tools, slug: undefined, name: undefined, description: undefined })),
]);

const AgentSchema = z.object({
  slug: z.string().min(1).optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).default(DEFAULTS.agentTemperature),
  system_prompt: z.string().optional(),
  system_prompt_slug: z.string().optional(),
  tools: ToolSpecSchema.optional(),
  workflow: z.string().optional(),
  returns: z.array(z.string()).optional(),
});

const PromptFrontMatter = z.object({
  slug: z.string().min(1).optional(),
});

// -----------------------------
// Registry
// -----------------------------

export class ResourceRegistry {
  readonly agents = new Map<string, AgentResource>();
  readonly prompts = new Map<string, PromptResource>();
  readonly toolBundles: ToolResource[] = [];
  readonly modules: string[] = [];

  addAgent(agent: AgentResource): void {
    if (this.agents.has(agent.slug)) log.warn('Agent slug defined twice; later file wins', { slug: agent.slug });
    this.agents.set(agent.slug, agent);
  }

  addPrompt(prompt: PromptResource): void {
    if (this.prompts.has(prompt.slug)) log.warn('Prompt slug defined twice; later file wins', { slug: prompt.slug });
    this.prompts.set(prompt.slug, prompt);
  }

  getAgent(slug: string): AgentResource | undefined {
    return this.agents.get(slug);
  }

  getPrompt(slug: string): PromptResource | undefined {
    return this.prompts.get(slug);
  }
}

// -----------------------------
// Parsing
// -----------------------------

function fileSlug(path: string): string {
  const name = basename(path);
  const dot = name.indexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}

function parseStructured(text: string, path: string): unknown {
  try {
    return extname(path).toLowerCase() === '.json' ? JSON.parse(text) : parseYaml(text);
  } catch (err) {
    throw new ParseError(err instanceof Error ? err.message : String(err), path);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export function parseAgent(text: string, path: string, defaultModel: string = DEFAULTS.model): AgentResource {
  const result = AgentSchema.safeParse(parseStructured(text, path));
  if (!result.success) throw new ParseError(formatIssues(result.error), path);

  const doc = result.data;
  const slug = doc.slug ?? fileSlug(path);
  const agent: AgentResource = {
    slug,
    name: doc.name ?? slug,
    model: doc.model ?? defaultModel,
    temperature: doc.temperature,
    source: path,
  };
  if (doc.description !== undefined) agent.description = doc.description;
  if (doc.system_prompt !== undefined) agent.system_prompt = doc.system_prompt;
  if (doc.system_prompt_slug !== undefined) agent.system_prompt_slug = doc.system_prompt_slug;
  if (doc.tools !== undefined) agent.tools = doc.tools;
  if (doc.workflow !== undefined) agent.workflow = doc.workflow;
  if (doc.returns !== undefined) agent.returns = doc.returns;
  return agent;
}

export function parseToolBundle(text: string, path: string): ToolResource {
  const result = ToolBundleSchema.safeParse(parseStructured(text, path));
  if (!result.success) throw new ParseError(formatIssues(result.error), path);

  const slug = result.data.slug ?? fileSlug(path);
  const bundle: ToolResource = { slug, name: result.data.name ?? slug, tools: result.data.tools };
  if (result.data.description !== undefined) bundle.description = result.data.description;
  return bundle;
}

const FRONT_MATTER_RE = /^---\r?\n([\s\S]*?)\r?\n---\r?\n?/;

/**
 * Prompt files are plain text with optional YAML front matter:
 *
 * ```
 * ---
 * slug: triage
 * ---
 * Classify {{ input.message }}
 * ```
 */
export function parsePrompt(text: string, path: string): PromptResource {
  const match = FRONT_MATTER_RE.exec(text);
  if (!match) return { slug: fileSlug(path), content: text, source: path };

  const result = PromptFrontMatter.safeParse(parseStructured(match[1], `${path}.yaml`) ?? {});
  if (!result.success) throw new ParseError(formatIssues(result.error), path);

  return {
    slug: result.data.slug ?? fileSlug(path),
    content: text.slice(match[0].length),
    source: path,
  };
}

// -----------------------------
// Loading
// -----------------------------

async function matchFiles(patterns: string[]): Promise<string[]> {
  if (patterns.filter((p) => !p.startsWith('!')).length === 0) return [];
  const files = await fg(patterns, { absolute: true, onlyFiles: true, unique: true });
  return files.sort();
}

export interface LoadResourcesOptions {
  defaultModel?: string;
}

/**
 * Load every prompt, agent and tool bundle matched by the (absolute) patterns of a merged graph.
 */
export async function loadResources(
  patterns: ResourcePatterns,
  options: LoadResourcesOptions = {},
): Promise<ResourceRegistry> {
  const registry = new ResourceRegistry();

  for (const path of await matchFiles(patterns.prompts)) {
    registry.addPrompt(parsePrompt(await readFile(path, 'utf-8'), path));
  }
  for (const path of await matchFiles(patterns.agents)) {
    registry.addAgent(parseAgent(await readFile(path, 'utf-8'), path, options.defaultModel));
  }
  for (const path of await matchFiles(patterns.tools)) {
    registry.toolBundles.push(parseToolBundle(await readFile(path, 'utf-8'), path));
  }
  registry.modules.push(...(await matchFiles(patterns.modules)));

  log.debug('Loaded resources', {
    prompts: registry.prompts.size,
    agents: registry.agents.size,
    toolBundles: registry.toolBundles.length,
    modules: registry.modules.length,
  });
  return registry;
}
