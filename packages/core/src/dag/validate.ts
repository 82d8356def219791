/**
 * Graph validation
 * Ensures a workflow graph is acyclic outside review loops and has no orphans
 */

import type { WorkflowGraph } from './graph';
import { getDownstream, getForwardDownstream } from './graph';

export interface ValidationError {
  code: 'NO_ROOTS' | 'CYCLE_DETECTED' | 'UNREACHABLE_NODE';
  message: string;
  node_id?: string;
  cycle?: string[];
}

type Color = 'WHITE' | 'GRAY' | 'BLACK';

/**
 * Validate structure of a built graph
 */
export function validateGraph(graph: WorkflowGraph): ValidationError[] {
  const errors: ValidationError[] = [];

  if (graph.nodes.size === 0) {
    return errors;
  }

  // Check 1: Must have at least one root
  if (graph.roots.length === 0) {
    errors.push({
      code: 'NO_ROOTS',
      message: 'Graph has nodes but no entry nodes',
    });
    return errors;
  }

  // Check 2: No cycles apart from feedback edges
  const cycle = findCycle(graph);
  if (cycle) {
    errors.push({
      code: 'CYCLE_DETECTED',
      message: `Cycle detected: ${cycle.join(' → ')}`,
      cycle,
    });
  }

  // Check 3: Every node reachable from a root
  errors.push(...findUnreachableNodes(graph));

  return errors;
}

/**
 * Detect a cycle using DFS with 3-color algorithm, ignoring feedback edges
 * WHITE = unvisited, GRAY = in current path, BLACK = fully processed
 */
export function findCycle(graph: WorkflowGraph): string[] | null {
  const color = new Map<string, Color>();
  const path: string[] = [];

  for (const nodeId of graph.nodes.keys()) {
    color.set(nodeId, 'WHITE');
  }

  for (const nodeId of graph.nodes.keys()) {
    if (color.get(nodeId) === 'WHITE') {
      const cycle = dfsVisit(graph, nodeId, color, path);
      if (cycle) {
        return cycle;
      }
    }
  }

  return null;
}

/**
 * DFS visit - returns cycle path if detected
 */
function dfsVisit(
  graph: WorkflowGraph,
  nodeId: string,
  color: Map<string, Color>,
  path: string[]
): string[] | null {
  color.set(nodeId, 'GRAY');
  path.push(nodeId);

  for (const childId of getForwardDownstream(graph, nodeId)) {
    const childColor = color.get(childId);

    if (childColor === 'GRAY') {
      // Back edge
      const cycleStart = path.indexOf(childId);
      return [...path.slice(cycleStart), childId];
    }

    if (childColor === 'WHITE') {
      const cycle = dfsVisit(graph, childId, color, path);
      if (cycle) {
        return cycle;
      }
    }
  }

  color.set(nodeId, 'BLACK');
  path.pop();
  return null;
}

/**
 * Find nodes that are not reachable from any root
 */
function findUnreachableNodes(graph: WorkflowGraph): ValidationError[] {
  const reachable = new Set<string>(graph.roots);
  const queue = [...graph.roots];

  while (queue.length > 0) {
    const nodeId = queue.shift();
    if (nodeId === undefined) break;

    for (const childId of getDownstream(graph, nodeId)) {
      if (!reachable.has(childId)) {
        reachable.add(childId);
        queue.push(childId);
      }
    }
  }

  const errors: ValidationError[] = [];
  for (const nodeId of graph.nodes.keys()) {
    if (!reachable.has(nodeId)) {
      errors.push({
        code: 'UNREACHABLE_NODE',
        message: `Node ${nodeId} is not reachable from any entry node`,
        node_id: nodeId,
      });
    }
  }

  return errors;
}

/**
 * Quick validation check - returns true if valid
 */
export function isValidGraph(graph: WorkflowGraph): boolean {
  return validateGraph(graph).length === 0;
}
