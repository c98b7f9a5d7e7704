// runtime/core/validator.ts

import type { FlowEdge, Subgraph } from '../../core/types.ts';
import { isReservedRoot } from '../../core/constants.ts';
import { ExpressionSyntaxError } from './errors.ts';
import { parseExpression } from './expressionEngine.ts';
import { entryNodes, indexEdges } from './graph.ts';

/**
 * Basic validation types
 */

export type ValidationLevel = 'error' | 'warning';

export interface ValidationIssue {
  level: ValidationLevel;
  code: string;      // e.g. 'UNKNOWN_EDGE_TARGET', 'ORPHAN_NODE'
  message: string;   // human readable explanation
  path?: string;     // document-style path, e.g. "edges[2]" or "nodes.each.body.edges[0]"
}

/**
 * Main entry point. Checks a merged graph and every loop body in it.
 *
 * The loader already rejects most structural mistakes; this pass also covers
 * graphs built in code and reports the softer problems as warnings.
 */
export function validateGraph(graph: Subgraph): ValidationIssue[] {
  return validateSubgraph(graph, '');
}

function validateSubgraph(graph: Subgraph, prefix: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  issues.push(...validateEdges(graph, prefix));
  issues.push(...validateEntryExit(graph, prefix));
  issues.push(...validateSwitches(graph, prefix));
  issues.push(...validateErrorEdges(graph, prefix));
  issues.push(...validateNodes(graph, prefix));
  issues.push(...validateReachability(graph, prefix));

  for (const node of graph.nodes.values()) {
    if (node.kind.type === 'foreach' || node.kind.type === 'while') {
      issues.push(...validateSubgraph(node.kind.body, `${prefix}nodes.${node.id}.body.`));
    }
  }
  return issues;
}

/**
 * Helpers
 */

function syntaxError(source: string): string | null {
  try {
    parseExpression(source);
    return null;
  } catch (err) {
    if (err instanceof ExpressionSyntaxError) return err.message;
    throw err;
  }
}

function describeEdge(edge: FlowEdge): string {
  return `${edge.from} -> ${edge.to}`;
}

function validateEdges(graph: Subgraph, prefix: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  graph.edges.forEach((edge, index) => {
    const path = `${prefix}edges[${index}]`;

    if (!graph.nodes.has(edge.from)) {
      issues.push({
        level: 'error',
        code: 'UNKNOWN_EDGE_SOURCE',
        message: `Edge ${describeEdge(edge)} starts at unknown node "${edge.from}".`,
        path
      });
    }
    if (!graph.nodes.has(edge.to)) {
      issues.push({
        level: 'error',
        code: 'UNKNOWN_EDGE_TARGET',
        message: `Edge ${describeEdge(edge)} points to unknown node "${edge.to}".`,
        path
      });
    }

    if (edge.condition !== undefined) {
      const problem = syntaxError(edge.condition);
      if (problem) {
        issues.push({
          level: 'error',
          code: 'INVALID_CONDITION',
          message: `Edge ${describeEdge(edge)} has an invalid condition: ${problem}`,
          path: `${path}.when`
        });
      }
    }
  });

  return issues;
}

function validateEntryExit(graph: Subgraph, prefix: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const id of graph.entry) {
    if (!graph.nodes.has(id)) {
      issues.push({
        level: 'error',
        code: 'UNKNOWN_ENTRY',
        message: `Entry "${id}" does not match any node.`,
        path: `${prefix}entry`
      });
    }
  }
  for (const id of graph.exit) {
    if (!graph.nodes.has(id)) {
      issues.push({
        level: 'error',
        code: 'UNKNOWN_EXIT',
        message: `Exit "${id}" does not match any node.`,
        path: `${prefix}exit`
      });
    }
  }

  if (graph.nodes.size > 0 && entryNodes(graph).length === 0) {
    issues.push({
      level: 'error',
      code: 'NO_ENTRY',
      message: 'Every node has an incoming edge and no entry is declared; nothing can start.',
      path: `${prefix}entry`
    });
  }

  return issues;
}

function validateSwitches(graph: Subgraph, prefix: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const [source, subject] of graph.switches) {
    const problem = syntaxError(subject);
    if (problem) {
      issues.push({
        level: 'error',
        code: 'INVALID_SWITCH_SUBJECT',
        message: `Switch on "${source}" has an invalid subject: ${problem}`,
        path: `${prefix}switch.${source}`
      });
    }
  }

  graph.edges.forEach((edge, index) => {
    if (edge.case !== undefined && !graph.switches.has(edge.from)) {
      issues.push({
        level: 'warning',
        code: 'SWITCH_CASE_WITHOUT_ROUTE',
        message: `Edge ${describeEdge(edge)} has case "${edge.case}" but "${edge.from}" has no switch; the label is ignored.`,
        path: `${prefix}edges[${index}].case`
      });
    }
  });

  return issues;
}

function validateErrorEdges(graph: Subgraph, prefix: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const seen = new Set<string>();

  graph.edges.forEach((edge, index) => {
    if (edge.kind !== 'error') return;
    const path = `${prefix}edges[${index}]`;

    if (seen.has(edge.from)) {
      issues.push({
        level: 'warning',
        code: 'MULTIPLE_ERROR_EDGES',
        message: `Node "${edge.from}" has more than one error edge; only the first declared one fires.`,
        path
      });
    }
    seen.add(edge.from);

    if (edge.condition !== undefined) {
      issues.push({
        level: 'warning',
        code: 'ERROR_EDGE_CONDITION_IGNORED',
        message: `Error edge ${describeEdge(edge)} has a condition, which error routing ignores.`,
        path: `${path}.when`
      });
    }
  });

  return issues;
}

function validateNodes(graph: Subgraph, prefix: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const node of graph.nodes.values()) {
    const path = `${prefix}nodes.${node.id}`;

    if (node.kind.type === 'foreach') {
      const { item, collection } = node.kind;
      if (isReservedRoot(item) || graph.nodes.has(item)) {
        issues.push({
          level: 'error',
          code: 'INVALID_LOOP_ITEM',
          message: `Loop "${node.id}" binds "${item}", which is a reserved name or a node id.`,
          path: `${path}.foreach.item`
        });
      }
      const problem = syntaxError(collection);
      if (problem) {
        issues.push({
          level: 'error',
          code: 'INVALID_LOOP_COLLECTION',
          message: `Loop "${node.id}" has an invalid collection: ${problem}`,
          path: `${path}.foreach.in`
        });
      }
    }

    if (node.kind.type === 'while') {
      const problem = syntaxError(node.kind.condition);
      if (problem) {
        issues.push({
          level: 'error',
          code: 'INVALID_CONDITION',
          message: `Loop "${node.id}" has an invalid condition: ${problem}`,
          path: `${path}.while.condition`
        });
      }
    }
  }

  return issues;
}

/**
 * Reachability:
 * - With an explicit entry, other nodes without incoming edges never run: ORPHAN_NODE
 * - Nodes no edge path leads to from an entry: UNREACHABLE_FROM_ENTRY
 */
function validateReachability(graph: Subgraph, prefix: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const entries = entryNodes(graph).filter((id) => graph.nodes.has(id));
  if (entries.length === 0) {
    // Already reported as NO_ENTRY / UNKNOWN_ENTRY
    return issues;
  }

  const { incoming, outgoing } = indexEdges(graph);
  const reachable = new Set<string>(entries);
  const queue = [...entries];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const edge of outgoing.get(current) ?? []) {
      if (!reachable.has(edge.to) && graph.nodes.has(edge.to)) {
        reachable.add(edge.to);
        queue.push(edge.to);
      }
    }
  }

  for (const id of graph.nodes.keys()) {
    if (reachable.has(id)) continue;
    const orphan = (incoming.get(id) ?? []).length === 0;
    issues.push({
      level: 'warning',
      code: orphan ? 'ORPHAN_NODE' : 'UNREACHABLE_FROM_ENTRY',
      message: orphan
        ? `Node "${id}" has no incoming edges and is not an entry; it never runs.`
        : `Node "${id}" is never reached from the entry nodes.`,
      path: `${prefix}nodes.${id}`
    });
  }

  return issues;
}

/**
 * Small helper for consumers that only care about "is this safe to run?"
 */
export function hasValidationErrors(issues: ValidationIssue[]): boolean {
  return issues.some((issue) => issue.level === 'error');
}
