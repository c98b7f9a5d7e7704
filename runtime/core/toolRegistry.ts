// runtime/core/toolRegistry.ts

import type { AgentResource, ToolDefinition, ToolResource, ToolSpec, Value } from '../../core/types.ts';
import { createLogger } from '../shared/logger.ts';
import { devtoolsBundle } from './builtins/devtools.ts';
import { ToolResolutionError } from './errors.ts';
import { ToolDefinitionSchema } from './resources.ts';

const log = createLogger('tool-registry');

function stripRef(slug: string): string {
  return slug.startsWith('@') ? slug.slice(1) : slug;
}

/**
 * Named tool bundles. `devtools` is always present.
 */
export class ToolRegistry {
  private readonly bundles = new Map<string, ToolResource>();

  constructor(bundles: readonly ToolResource[] = []) {
    this.register(devtoolsBundle());
    for (const bundle of bundles) this.register(bundle);
  }

  register(bundle: ToolResource): void {
    if (this.bundles.has(bundle.slug)) {
      log.debug('Tool bundle replaced', { slug: bundle.slug });
    }
    this.bundles.set(bundle.slug, bundle);
  }

  has(slug: string): boolean {
    return this.bundles.has(stripRef(slug));
  }

  get(slug: string): ToolResource | undefined {
    return this.bundles.get(stripRef(slug));
  }

  slugs(): string[] {
    return [...this.bundles.keys()];
  }

  /**
   * Union of the named bundles. A tool name defined by several bundles takes the
   * definition of the last one listed.
   */
  resolveTools(slugs: readonly string[]): ToolDefinition[] {
    const byName = new Map<string, ToolDefinition>();
    for (const raw of slugs) {
      const slug = stripRef(raw);
      const bundle = this.bundles.get(slug);
      if (!bundle) {
        throw new ToolResolutionError(`Tool resource '${slug}' not found`, { slug, known: this.slugs() });
      }
      for (const tool of bundle.tools) byName.set(tool.function.name, tool);
    }
    return [...byName.values()];
  }

  resolveSpec(spec: ToolSpec): ToolDefinition[] {
    if (typeof spec === 'string') return this.resolveTools([spec]);
    if (spec.length === 0) return [];
    const slugs: string[] = [];
    const inline: ToolDefinition[] = [];
    for (const item of spec) {
      if (typeof item === 'string') slugs.push(item);
      else inline.push(item);
    }
    const byName = new Map(this.resolveTools(slugs).map((tool) => [tool.function.name, tool] as const));
    for (const tool of inline) byName.set(tool.function.name, tool);
    return [...byName.values()];
  }

  /**
   * Tools attached to one chat call: the call's inline list, else the call's bundle
   * reference(s), else the agent's defaults, else none.
   */
  resolveToolsForCall(callTools: Value | undefined, agent?: AgentResource): ToolDefinition[] {
    if (callTools !== undefined && callTools !== null && callTools !== '') {
      return this.resolveSpec(toToolSpec(callTools));
    }
    if (agent?.tools !== undefined) {
      return this.resolveSpec(agent.tools);
    }
    return [];
  }
}

/**
 * Interpret an evaluated `tools` argument: a slug string, a list of slugs, or a list
 * of inline tool definitions.
 */
export function toToolSpec(value: Value): ToolSpec {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    if (value.every((item): item is string => typeof item === 'string')) return value;
    const definitions: ToolDefinition[] = [];
    value.forEach((item, index) => {
      const parsed = ToolDefinitionSchema.safeParse(item);
      if (!parsed.success) {
        throw new ToolResolutionError(`Invalid inline tool definition at index ${index}`, {
          issues: parsed.error.issues.map((issue) => issue.message),
        });
      }
      definitions.push(parsed.data);
    });
    return definitions;
  }
  throw new ToolResolutionError(`Cannot use ${JSON.stringify(value)} as a tool list`);
}
