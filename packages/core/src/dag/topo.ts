/**
 * Topological utilities
 * Ordering, phases and the Pert critical path. Feedback edges are ignored.
 */

import type { WorkflowNode } from '@lattice/types';
import { CycleError } from '../errors';
import type { WorkflowGraph } from './graph';
import { getForwardDownstream, getForwardUpstream, getNode } from './graph';
import { findCycle } from './validate';

/**
 * Topological sort using Kahn's algorithm
 * Throws CycleError if a cycle remains after dropping feedback edges
 */
export function topoSort(graph: WorkflowGraph): string[] {
  const sorted: string[] = [];
  const inDegree = new Map<string, number>();
  const queue: string[] = [];

  for (const nodeId of graph.nodes.keys()) {
    const deps = getForwardUpstream(graph, nodeId);
    inDegree.set(nodeId, deps.length);
    if (deps.length === 0) {
      queue.push(nodeId);
    }
  }

  while (queue.length > 0) {
    const nodeId = queue.shift();
    if (nodeId === undefined) break;
    sorted.push(nodeId);

    for (const childId of getForwardDownstream(graph, nodeId)) {
      const remaining = (inDegree.get(childId) ?? 0) - 1;
      inDegree.set(childId, remaining);
      if (remaining === 0) {
        queue.push(childId);
      }
    }
  }

  if (sorted.length !== graph.nodes.size) {
    throw new CycleError(findCycle(graph) ?? []);
  }

  return sorted;
}

/**
 * Group nodes into phases; nodes within a phase have no edges between them
 */
export function computeExecutionPhases(graph: WorkflowGraph): string[][] {
  const phases: string[][] = [];
  const depths = computeNodeDepths(graph);

  for (const [nodeId, depth] of depths) {
    while (phases.length <= depth) {
      phases.push([]);
    }
    phases[depth].push(nodeId);
  }

  return phases;
}

/**
 * Depth of each node (longest forward path from a root)
 */
export function computeNodeDepths(graph: WorkflowGraph): Map<string, number> {
  const depths = new Map<string, number>();

  for (const nodeId of topoSort(graph)) {
    const deps = getForwardUpstream(graph, nodeId);

    if (deps.length === 0) {
      depths.set(nodeId, 0);
    } else {
      const maxParentDepth = Math.max(...deps.map((depId) => depths.get(depId) ?? 0));
      depths.set(nodeId, maxParentDepth + 1);
    }
  }

  return depths;
}

export interface CriticalPath {
  path: string[];
  cost: number;
}

/**
 * Longest cumulative-cost path from an entry node to a terminal node.
 * Cost of a path is the sum of its node costs. Ties keep the earliest-added
 * predecessor.
 */
export function computeCriticalPath(
  graph: WorkflowGraph,
  cost: (node: WorkflowNode) => number,
  entries: readonly string[] = graph.roots,
  terminals: readonly string[] = graph.terminals
): CriticalPath {
  const best = new Map<string, number>();
  const previous = new Map<string, string>();
  const entrySet = new Set(entries);

  for (const nodeId of topoSort(graph)) {
    const own = cost(getNode(graph, nodeId));
    let bestParent: string | undefined;
    let bestParentCost = -Infinity;

    for (const parentId of getForwardUpstream(graph, nodeId)) {
      const parentCost = best.get(parentId);
      if (parentCost !== undefined && parentCost > bestParentCost) {
        bestParent = parentId;
        bestParentCost = parentCost;
      }
    }

    if (bestParent !== undefined) {
      best.set(nodeId, bestParentCost + own);
      previous.set(nodeId, bestParent);
    } else if (entrySet.has(nodeId)) {
      best.set(nodeId, own);
    }
  }

  let end: string | undefined;
  let endCost = -Infinity;
  for (const nodeId of terminals) {
    const total = best.get(nodeId);
    if (total !== undefined && total > endCost) {
      end = nodeId;
      endCost = total;
    }
  }

  if (end === undefined) {
    return { path: [], cost: 0 };
  }

  const path: string[] = [end];
  let cursor = previous.get(end);
  while (cursor !== undefined) {
    path.unshift(cursor);
    cursor = previous.get(cursor);
  }

  return { path, cost: endCost };
}
