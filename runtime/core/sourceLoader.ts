// runtime/core/sourceLoader.ts

import { readFile } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { FlowEdge, FlowGraph, FlowNode, NodeKind, Subgraph, Value } from '../../core/types.ts';
import { isReservedRoot } from '../../core/constants.ts';
import { ParseError } from './errors.ts';
import { emptySubgraph, isLoopKind, walkNodes } from './graph.ts';
import { toValue } from './value.ts';

// -----------------------------
// Unit document schema
// -----------------------------

const NODE_ID_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const EDGE_ARROW_RE = /^\s*([A-Za-z_][A-Za-z0-9_.]*)\s*->\s*([A-Za-z_][A-Za-z0-9_.]*)\s*$/;

const StringList = z.union([z.string(), z.array(z.string())]);

const Expression = z.union([z.string(), z.number(), z.boolean()]);

const EdgeObject = z
  .object({
    from: z.string().min(1),
    to: z.string().min(1),
    when: Expression.optional(),
    case: Expression.optional(),
    on_error: z.boolean().optional(),
  })
  .strict();

const EdgeDoc = z.union([EdgeObject, z.string().regex(EDGE_ARROW_RE, 'expected "from -> to"')]);

interface EdgeDocShape {
  from: string;
  to: string;
  when?: string | number | boolean;
  case?: string | number | boolean;
  on_error?: boolean;
}

interface BodyDocShape {
  nodes: Record<string, NodeDocShape>;
  edges?: Array<EdgeDocShape | string>;
  entry?: string | string[];
  exit?: string | string[];
  switch?: Record<string, string | number | boolean>;
}

interface NodeDocShape {
  call?: string;
  args?: Record<string, unknown>;
  literal?: unknown;
  foreach?: { item: string; in?: unknown; body: BodyDocShape };
  while?: { condition: string | number | boolean; body: BodyDocShape };
}

const BodyDoc: z.ZodType<BodyDocShape> = z.lazy(() =>
  z
    .object({
      nodes: z.record(NodeDoc),
      edges: z.array(EdgeDoc).optional(),
      entry: StringList.optional(),
      exit: StringList.optional(),
      switch: z.record(Expression).optional(),
    })
    .strict(),
);

const NodeDoc: z.ZodType<NodeDocShape> = z.lazy(() =>
  z
    .object({
      call: z.string().min(1).optional(),
      args: z.record(z.unknown()).optional(),
      literal: z.unknown().optional(),
      foreach: z
        .object({
          item: z.string().regex(NODE_ID_RE, 'invalid loop variable name'),
          in: z.unknown(),
          body: BodyDoc,
        })
        .strict()
        .optional(),
      while: z.object({ condition: Expression, body: BodyDoc }).strict().optional(),
    })
    .strict()
    .superRefine((doc, ctx) => {
      const kinds = (['call', 'literal', 'foreach', 'while'] as const).filter((kind) => doc[kind] !== undefined);
      if (kinds.length !== 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: kinds.length === 0
            ? 'node needs one of call, literal, foreach, while'
            : `node mixes ${kinds.join(', ')}`,
        });
      }
      if (doc.args !== undefined && doc.call === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'args are only allowed on call nodes', path: ['args'] });
      }
      if (doc.foreach !== undefined && doc.foreach.in === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'foreach needs an "in" collection', path: ['foreach', 'in'] });
      }
    }),
);

export const UnitDocument = z.object({
  slug: z.string().optional(),
  name: z.string().optional(),
  version: z.union([z.string(), z.number()]).optional(),
  description: z.string().optional(),
  author: z.string().optional(),
  entry: StringList.optional(),
  exit: StringList.optional(),
  prompts: StringList.optional(),
  agents: StringList.optional(),
  tools: StringList.optional(),
  modules: StringList.optional(),
  flows: z.record(z.string()).optional(),
  nodes: z.record(NodeDoc).default({}),
  edges: z.array(EdgeDoc).default([]),
  switch: z.record(Expression).optional(),
});

export type UnitDocument = z.infer<typeof UnitDocument>;

// -----------------------------
// Conversion
// -----------------------------

function asList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Argument values are expression source; non-string values become their JSON text.
 */
export function toExpressionSource(raw: unknown): string {
  if (typeof raw === 'string') return raw;
  return JSON.stringify(toValue(raw));
}

function toEdge(doc: EdgeDocShape | string): FlowEdge {
  if (typeof doc === 'string') {
    const match = EDGE_ARROW_RE.exec(doc);
    // The schema already matched EDGE_ARROW_RE.
    return { from: match?.[1] ?? '', to: match?.[2] ?? '', kind: 'normal' };
  }
  const edge: FlowEdge = { from: doc.from, to: doc.to, kind: doc.on_error ? 'error' : 'normal' };
  if (doc.when !== undefined) edge.condition = String(doc.when);
  if (doc.case !== undefined) edge.case = String(doc.case);
  return edge;
}

function toKind(doc: NodeDocShape, path: string): NodeKind {
  if (doc.call !== undefined) {
    const args: Record<string, string> = {};
    for (const [key, raw] of Object.entries(doc.args ?? {})) args[key] = toExpressionSource(raw);
    return { type: 'call', target: doc.call, args };
  }
  if (doc.foreach !== undefined) {
    return {
      type: 'foreach',
      item: doc.foreach.item,
      collection: toExpressionSource(doc.foreach.in),
      body: toSubgraph(doc.foreach.body, `${path}.foreach.body`, true),
    };
  }
  if (doc.while !== undefined) {
    return {
      type: 'while',
      condition: String(doc.while.condition),
      body: toSubgraph(doc.while.body, `${path}.while.body`, true),
    };
  }
  const literal: Value = toValue(doc.literal);
  return { type: 'literal', value: literal };
}

function toSubgraph(doc: BodyDocShape, path: string, closed: boolean): Subgraph {
  const graph = emptySubgraph();

  for (const [id, nodeDoc] of Object.entries(doc.nodes)) {
    if (!NODE_ID_RE.test(id)) {
      throw new ParseError(`invalid node id '${id}' at ${path}.nodes`);
    }
    if (isReservedRoot(id)) {
      throw new ParseError(`node id '${id}' is a reserved name (${path}.nodes)`);
    }
    const node: FlowNode = { id, kind: toKind(nodeDoc, `${path}.nodes.${id}`) };
    graph.nodes.set(id, node);
  }

  graph.edges = (doc.edges ?? []).map(toEdge);
  graph.entry = asList(doc.entry);
  graph.exit = asList(doc.exit);
  for (const [source, subject] of Object.entries(doc.switch ?? {})) {
    graph.switches.set(source, String(subject));
  }

  // Loop bodies cannot see imported nodes, so their edges are checked right away.
  if (closed) {
    assertEdgesResolve(graph, path);
  }
  return graph;
}

/**
 * Every edge, entry, exit and switch route must name a node of the same subgraph.
 */
export function assertEdgesResolve(graph: Subgraph, path: string, source?: string): void {
  const known = (id: string) => graph.nodes.has(id);
  graph.edges.forEach((edge, index) => {
    for (const end of [edge.from, edge.to]) {
      if (!known(end)) {
        throw new ParseError(`edge ${edge.from} -> ${edge.to} references unknown node '${end}' (${path}.edges[${index}])`, source);
      }
    }
  });
  for (const [field, ids] of [['entry', graph.entry], ['exit', graph.exit]] as const) {
    for (const id of ids) {
      if (!known(id)) throw new ParseError(`${field} references unknown node '${id}' (${path})`, source);
    }
  }
  for (const id of graph.switches.keys()) {
    if (!known(id)) throw new ParseError(`switch references unknown node '${id}' (${path})`, source);
  }
}

function assertUniqueIds(graph: Subgraph, source: string): void {
  const seen = new Set<string>();
  for (const node of walkNodes(graph)) {
    if (seen.has(node.id)) {
      throw new ParseError(`duplicate node id '${node.id}'`, source);
    }
    seen.add(node.id);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export type UnitFormat = 'json' | 'yaml';

export function detectFormat(path: string): UnitFormat {
  return extname(path).toLowerCase() === '.json' ? 'json' : 'yaml';
}

/**
 * Parse and validate a unit document. `source` is used for error messages and
 * to resolve the unit's metadata defaults.
 */
export function parseUnit(text: string, format: UnitFormat, source: string): FlowGraph {
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(text) : parseYaml(text);
  } catch (err) {
    throw new ParseError(`Failed to parse ${format}: ${err instanceof Error ? err.message : String(err)}`, source);
  }

  const result = UnitDocument.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    throw new ParseError(formatIssues(result.error), source, issues);
  }

  return unitToGraph(result.data, source);
}

export function unitToGraph(doc: UnitDocument, source: string): FlowGraph {
  let graph: Subgraph;
  try {
    graph = toSubgraph(
      { nodes: doc.nodes, edges: doc.edges, entry: doc.entry, exit: doc.exit, switch: doc.switch },
      'unit',
      false,
    );
  } catch (err) {
    if (err instanceof ParseError && err.source === undefined) {
      throw new ParseError(err.message, source, err.details);
    }
    throw err;
  }
  assertUniqueIds(graph, source);

  for (const node of graph.nodes.values()) {
    if (isLoopKind(node.kind) && node.kind.body.nodes.size === 0) {
      throw new ParseError(`loop '${node.id}' has an empty body`, source);
    }
  }

  const slug = doc.slug ?? basename(source, extname(source));
  return {
    ...graph,
    metadata: {
      slug,
      name: doc.name ?? slug,
      version: doc.version === undefined ? '0.0.0' : String(doc.version),
      ...(doc.description !== undefined ? { description: doc.description } : {}),
      ...(doc.author !== undefined ? { author: doc.author } : {}),
    },
    source,
    resources: {
      prompts: asList(doc.prompts),
      agents: asList(doc.agents),
      tools: asList(doc.tools),
      modules: asList(doc.modules),
    },
    flows: doc.flows ?? {},
  };
}

export async function loadUnit(path: string): Promise<FlowGraph> {
  const source = resolve(path);
  let text: string;
  try {
    text = await readFile(source, 'utf-8');
  } catch (err) {
    throw new ParseError(`cannot read unit: ${err instanceof Error ? err.message : String(err)}`, source);
  }
  return parseUnit(text, detectFormat(source), source);
}
