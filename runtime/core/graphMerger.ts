// runtime/core/graphMerger.ts

import { dirname, isAbsolute, resolve } from 'node:path';
import fg from 'fast-glob';
import type { FlowGraph, ResourcePatterns } from '../../core/types.ts';
import { createLogger } from '../shared/logger.ts';
import { CircularImportError, ParseError } from './errors.ts';
import { collectNodeIds, mapSubgraph } from './graph.ts';
import { assertEdgesResolve, loadUnit } from './sourceLoader.ts';
import { rewriteReferences } from './variables.ts';

const log = createLogger('merger');

const ALIAS_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type UnitLoader = (path: string) => Promise<FlowGraph>;

export interface MergeOptions {
  loader?: UnitLoader;
}

/**
 * Load `rootPath` and inline every `flows` import, recursively, into one flat graph.
 *
 * Imported node ids get the alias as prefix (chained for nested imports), references
 * to them inside the imported unit are rewritten the same way, and resource patterns
 * of all units are unioned (resolved against each unit's directory).
 */
export async function mergeFlow(rootPath: string, options: MergeOptions = {}): Promise<FlowGraph> {
  const load = options.loader ?? loadUnit;
  const merged = await mergeUnit(resolve(rootPath), [], load);
  log.debug('Merged flow', {
    source: merged.source,
    nodes: merged.nodes.size,
    edges: merged.edges.length,
  });
  return merged;
}

async function mergeUnit(path: string, chain: string[], load: UnitLoader): Promise<FlowGraph> {
  if (chain.includes(path)) {
    throw new CircularImportError([...chain, path]);
  }

  const unit = await load(path);
  const ancestry = [...chain, path];
  const dir = dirname(unit.source);

  const graph: FlowGraph = {
    ...unit,
    nodes: new Map(unit.nodes),
    edges: [...unit.edges],
    switches: new Map(unit.switches),
    resources: resolvePatterns(unit.resources, dir),
    flows: {},
  };

  for (const [alias, relativePath] of Object.entries(unit.flows)) {
    if (!ALIAS_RE.test(alias)) {
      throw new ParseError(`invalid flow alias '${alias}'`, unit.source);
    }
    if (graph.nodes.has(alias)) {
      throw new ParseError(`flow alias '${alias}' collides with a node id`, unit.source);
    }

    const child = await mergeUnit(resolve(dir, relativePath), ancestry, load);
    const localRoots = new Set([...collectNodeIds(child)].map((id) => id.split('.')[0]));

    const namespaced = mapSubgraph(
      child,
      (expression) => rewriteReferences(expression, localRoots, alias),
      (id) => `${alias}.${id}`,
    );

    for (const [id, node] of namespaced.nodes) {
      if (graph.nodes.has(id)) {
        throw new ParseError(`imported node '${id}' collides with an existing node`, unit.source);
      }
      graph.nodes.set(id, node);
    }
    graph.edges.push(...namespaced.edges);
    for (const [source, subject] of namespaced.switches) {
      graph.switches.set(source, subject);
    }
    graph.resources = unionPatterns(graph.resources, child.resources);

    log.debug('Spliced flow import', { alias, source: child.source, nodes: namespaced.nodes.size });
  }

  // Parent edges may name imported nodes, so they are only checked once every import is in.
  assertEdgesResolve(graph, 'unit', unit.source);
  return graph;
}

function resolvePattern(dir: string, pattern: string): string {
  const negated = pattern.startsWith('!');
  const body = negated ? pattern.slice(1) : pattern;
  const absolute = isAbsolute(body) ? body : `${fg.convertPathToPattern(dir)}/${body.replace(/^\.\//, '')}`;
  return negated ? `!${absolute}` : absolute;
}

function resolvePatterns(patterns: ResourcePatterns, dir: string): ResourcePatterns {
  return {
    prompts: patterns.prompts.map((p) => resolvePattern(dir, p)),
    agents: patterns.agents.map((p) => resolvePattern(dir, p)),
    tools: patterns.tools.map((p) => resolvePattern(dir, p)),
    modules: patterns.modules.map((p) => resolvePattern(dir, p)),
  };
}

export function unionPatterns(a: ResourcePatterns, b: ResourcePatterns): ResourcePatterns {
  const union = (x: string[], y: string[]) => [...new Set([...x, ...y])];
  return {
    prompts: union(a.prompts, b.prompts),
    agents: union(a.agents, b.agents),
    tools: union(a.tools, b.tools),
    modules: union(a.modules, b.modules),
  };
}
