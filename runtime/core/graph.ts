// runtime/core/graph.ts

import type { FlowEdge, FlowNode, NodeKind, ResourcePatterns, Subgraph } from '../../core/types.ts';

export function emptySubgraph(): Subgraph {
  return { nodes: new Map(), edges: [], entry: [], exit: [], switches: new Map() };
}

export function emptyResources(): ResourcePatterns {
  return { prompts: [], agents: [], tools: [], modules: [] };
}

export function isLoopKind(kind: NodeKind): kind is Extract<NodeKind, { type: 'foreach' | 'while' }> {
  return kind.type === 'foreach' || kind.type === 'while';
}

/**
 * Every node of the subgraph, loop bodies included (depth-first, declaration order).
 */
export function* walkNodes(graph: Subgraph): Generator<FlowNode> {
  for (const node of graph.nodes.values()) {
    yield node;
    if (isLoopKind(node.kind)) {
      yield* walkNodes(node.kind.body);
    }
  }
}

/**
 * Every subgraph, the given one first, then loop bodies.
 */
export function* walkSubgraphs(graph: Subgraph): Generator<Subgraph> {
  yield graph;
  for (const node of graph.nodes.values()) {
    if (isLoopKind(node.kind)) {
      yield* walkSubgraphs(node.kind.body);
    }
  }
}

export function collectNodeIds(graph: Subgraph): Set<string> {
  const ids = new Set<string>();
  for (const node of walkNodes(graph)) ids.add(node.id);
  return ids;
}

export interface EdgeIndex {
  incoming: Map<string, FlowEdge[]>;
  outgoing: Map<string, FlowEdge[]>;
}

export function indexEdges(graph: Subgraph): EdgeIndex {
  const incoming = new Map<string, FlowEdge[]>();
  const outgoing = new Map<string, FlowEdge[]>();
  for (const id of graph.nodes.keys()) {
    incoming.set(id, []);
    outgoing.set(id, []);
  }
  for (const edge of graph.edges) {
    incoming.get(edge.to)?.push(edge);
    outgoing.get(edge.from)?.push(edge);
  }
  return { incoming, outgoing };
}

/**
 * Declared entries, or every node without incoming edges.
 */
export function entryNodes(graph: Subgraph): string[] {
  if (graph.entry.length > 0) return [...graph.entry];
  const targets = new Set(graph.edges.map((edge) => edge.to));
  return [...graph.nodes.keys()].filter((id) => !targets.has(id));
}

/**
 * Declared exits, or every node without outgoing edges.
 */
export function exitNodes(graph: Subgraph): string[] {
  if (graph.exit.length > 0) return [...graph.exit];
  const sources = new Set(graph.edges.map((edge) => edge.from));
  return [...graph.nodes.keys()].filter((id) => !sources.has(id));
}

export interface ExpressionMapper {
  (expression: string): string;
}

/**
 * Copy of a node kind with every expression passed through `map`
 * (arguments, loop collection and condition, nested bodies).
 */
export function mapKindExpressions(
  kind: NodeKind,
  map: ExpressionMapper,
  renameId: (id: string) => string = (id) => id,
): NodeKind {
  switch (kind.type) {
    case 'call': {
      const args: Record<string, string> = {};
      for (const [key, source] of Object.entries(kind.args)) args[key] = map(source);
      return { type: 'call', target: kind.target, args };
    }
    case 'literal':
      return kind;
    case 'foreach':
      return { type: 'foreach', item: kind.item, collection: map(kind.collection), body: mapSubgraph(kind.body, map, renameId) };
    case 'while':
      return { type: 'while', condition: map(kind.condition), body: mapSubgraph(kind.body, map, renameId) };
  }
}

export function mapSubgraph(graph: Subgraph, map: ExpressionMapper, renameId: (id: string) => string = (id) => id): Subgraph {
  const nodes = new Map<string, FlowNode>();
  for (const node of graph.nodes.values()) {
    const id = renameId(node.id);
    nodes.set(id, { id, kind: mapKindExpressions(node.kind, map, renameId) });
  }

  const switches = new Map<string, string>();
  for (const [source, subject] of graph.switches) switches.set(renameId(source), map(subject));

  return {
    nodes,
    edges: graph.edges.map((edge) => ({
      ...edge,
      from: renameId(edge.from),
      to: renameId(edge.to),
      ...(edge.condition !== undefined ? { condition: map(edge.condition) } : {}),
    })),
    entry: graph.entry.map(renameId),
    exit: graph.exit.map(renameId),
    switches,
  };
}
