/**
 * Pipeline enumeration
 * Lazily walks every complete path through a workflow graph, depth first,
 * in the order nodes and edges were added
 */

import type { Pipeline, TechniqueInvocation, WorkflowNode } from '@lattice/types';
import type { WorkflowGraph } from '../dag/graph';
import { getDownstream, getEdgeData, getNode } from '../dag/graph';

export interface EdgeDecision {
  from: WorkflowNode;
  to: WorkflowNode;
  path: readonly WorkflowNode[];
}

export interface PathOptions {
  // Times a node may be re-entered on one path after its first visit
  maxRevisits?: number;

  // Consulted for prunable (agile) edges; false drops the branch
  evaluate?: (decision: EdgeDecision) => boolean;
}

interface Frame {
  node: WorkflowNode;
  successors: readonly string[];
  index: number;

  // A successor was blocked by the revisit bound
  blocked: boolean;

  // A successor was entered
  advanced: boolean;
}

/**
 * Enumerate pipelines from every root. Re-invoking yields the same sequence.
 *
 * A path ends naturally at a node without successors. A path that can only
 * continue by exceeding the revisit bound is yielded once with
 * truncated = true. Pruned branches yield nothing.
 */
export function* paths(graph: WorkflowGraph, options: PathOptions = {}): Generator<Pipeline> {
  const maxRevisits = options.maxRevisits ?? 1;
  if (!Number.isInteger(maxRevisits) || maxRevisits < 0) {
    throw new RangeError(`maxRevisits must be a non-negative integer, got ${maxRevisits}`);
  }

  for (const rootId of graph.roots) {
    const root = getNode(graph, rootId);
    const visits = new Map<string, number>([[rootId, 1]]);
    const path: WorkflowNode[] = [root];
    const stack: Frame[] = [frame(graph, root)];

    while (stack.length > 0) {
      const top = stack[stack.length - 1];

      if (top.successors.length === 0) {
        yield { nodes: [...path], truncated: false };
        leave(stack, path, visits);
        continue;
      }

      if (top.index >= top.successors.length) {
        if (top.blocked && !top.advanced) {
          yield { nodes: [...path], truncated: true };
        }
        leave(stack, path, visits);
        continue;
      }

      const nextId = top.successors[top.index];
      top.index += 1;

      const seen = visits.get(nextId) ?? 0;
      if (seen > maxRevisits) {
        top.blocked = true;
        continue;
      }

      const next = getNode(graph, nextId);
      if (options.evaluate && getEdgeData(graph, top.node.id, nextId).prunable) {
        if (!options.evaluate({ from: top.node, to: next, path: [...path] })) {
          continue;
        }
      }

      top.advanced = true;
      visits.set(nextId, seen + 1);
      path.push(next);
      stack.push(frame(graph, next));
    }
  }
}

function frame(graph: WorkflowGraph, node: WorkflowNode): Frame {
  return { node, successors: getDownstream(graph, node.id), index: 0, blocked: false, advanced: false };
}

function leave(stack: Frame[], path: WorkflowNode[], visits: Map<string, number>): void {
  const done = stack.pop();
  path.pop();
  if (done) {
    visits.set(done.node.id, (visits.get(done.node.id) ?? 1) - 1);
  }
}

/**
 * All simple paths from start to stop
 */
export function* walk(
  graph: WorkflowGraph,
  start: string,
  stop: string,
  path: readonly string[] = []
): Generator<string[]> {
  if (!graph.nodes.has(start)) {
    return;
  }
  const current = [...path, start];

  if (start === stop) {
    yield current;
    return;
  }

  for (const childId of getDownstream(graph, start)) {
    if (!current.includes(childId)) {
      yield* walk(graph, childId, stop, current);
    }
  }
}

export function countPaths(graph: WorkflowGraph, options: PathOptions = {}): number {
  let count = 0;
  for (const _pipeline of paths(graph, options)) {
    count += 1;
  }
  return count;
}

/**
 * What the execution layer runs for each node of a pipeline
 */
export function toInvocations(pipeline: Pipeline): TechniqueInvocation[] {
  return pipeline.nodes.map((node) => ({
    node_id: node.id,
    technique: node.technique,
    parameters: node.parameters,
    passthrough: node.passthrough,
  }));
}
