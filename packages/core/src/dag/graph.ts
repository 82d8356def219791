/**
 * Workflow graph representation
 * Nodes are technique instances, edges are permitted data-flow transitions
 */

import type { EdgeData, GraphEdge, WorkerSummary, WorkflowNode } from '@lattice/types';

/**
 * Immutable graph handed to traversal and export
 */
export interface WorkflowGraph {
  // All nodes, in the order they were added
  readonly nodes: ReadonlyMap<string, WorkflowNode>;

  // Adjacency list: node_id -> downstream node_ids
  readonly edges: ReadonlyMap<string, readonly string[]>;

  // Reverse adjacency list: node_id -> upstream node_ids
  readonly dependencies: ReadonlyMap<string, readonly string[]>;

  // Per-edge metadata keyed by edgeKey(from, to)
  readonly edgeData: ReadonlyMap<string, EdgeData>;

  // Entry nodes of the first worker
  readonly roots: readonly string[];

  // Terminal nodes of the last worker
  readonly terminals: readonly string[];

  readonly workers: readonly WorkerSummary[];
}

export function edgeKey(from: string, to: string): string {
  return `${from}->${to}`;
}

/**
 * Mutable graph under construction. Only builders and the linker hold one.
 */
export class GraphDraft {
  private readonly nodes = new Map<string, WorkflowNode>();
  private readonly edges = new Map<string, string[]>();
  private readonly dependencies = new Map<string, string[]>();
  private readonly edgeData = new Map<string, EdgeData>();

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  get size(): number {
    return this.nodes.size;
  }

  addNode(node: WorkflowNode): void {
    this.nodes.set(node.id, node);
    this.edges.set(node.id, []);
    this.dependencies.set(node.id, []);
  }

  /**
   * Add edge from -> to. Re-adding an existing edge merges its data.
   */
  connect(from: string, to: string, data: EdgeData = {}): void {
    const downstream = this.edges.get(from);
    const upstream = this.dependencies.get(to);
    if (!downstream || !upstream) {
      throw new Error(`Cannot connect ${from} → ${to}: unknown node`);
    }

    const key = edgeKey(from, to);
    const existing = this.edgeData.get(key);
    if (existing) {
      this.edgeData.set(key, { ...existing, ...data });
      return;
    }

    downstream.push(to);
    upstream.push(from);
    this.edgeData.set(key, { ...data });
  }

  addEdges(edges: readonly GraphEdge[]): void {
    for (const edge of edges) {
      this.connect(edge.from, edge.to, edge.data);
    }
  }

  /**
   * Snapshot the draft. Later changes to the draft do not leak into it.
   */
  freeze(
    roots: readonly string[],
    terminals: readonly string[],
    workers: readonly WorkerSummary[]
  ): WorkflowGraph {
    const edges = new Map<string, readonly string[]>();
    for (const [id, downstream] of this.edges) {
      edges.set(id, Object.freeze([...downstream]));
    }

    const dependencies = new Map<string, readonly string[]>();
    for (const [id, upstream] of this.dependencies) {
      dependencies.set(id, Object.freeze([...upstream]));
    }

    const edgeData = new Map<string, EdgeData>();
    for (const [key, data] of this.edgeData) {
      edgeData.set(key, Object.freeze({ ...data }));
    }

    return Object.freeze({
      nodes: new Map(this.nodes),
      edges,
      dependencies,
      edgeData,
      roots: Object.freeze([...roots]),
      terminals: Object.freeze([...terminals]),
      workers: Object.freeze([...workers]),
    });
  }
}

/**
 * Get downstream nodes (nodes this node feeds)
 */
export function getDownstream(graph: WorkflowGraph, nodeId: string): readonly string[] {
  return graph.edges.get(nodeId) || [];
}

/**
 * Get upstream nodes (nodes feeding this node)
 */
export function getUpstream(graph: WorkflowGraph, nodeId: string): readonly string[] {
  return graph.dependencies.get(nodeId) || [];
}

export function getEdgeData(graph: WorkflowGraph, from: string, to: string): EdgeData {
  return graph.edgeData.get(edgeKey(from, to)) || {};
}

/**
 * Downstream nodes reached without following a feedback edge
 */
export function getForwardDownstream(graph: WorkflowGraph, nodeId: string): string[] {
  return getDownstream(graph, nodeId).filter(
    (childId) => !getEdgeData(graph, nodeId, childId).feedback
  );
}

export function getForwardUpstream(graph: WorkflowGraph, nodeId: string): string[] {
  return getUpstream(graph, nodeId).filter(
    (parentId) => !getEdgeData(graph, parentId, nodeId).feedback
  );
}

/**
 * Check if node has no upstream nodes
 */
export function isRoot(graph: WorkflowGraph, nodeId: string): boolean {
  const deps = graph.dependencies.get(nodeId);
  return !deps || deps.length === 0;
}

export function getAllNodeIds(graph: WorkflowGraph): string[] {
  return Array.from(graph.nodes.keys());
}

export function getNode(graph: WorkflowGraph, nodeId: string): WorkflowNode {
  const node = graph.nodes.get(nodeId);
  if (!node) {
    throw new Error(`Node ${nodeId} is not in the graph`);
  }
  return node;
}

export function countEdges(graph: WorkflowGraph): number {
  return graph.edgeData.size;
}

/**
 * Copy every node and edge of a graph into a draft
 */
export function copyInto(draft: GraphDraft, graph: WorkflowGraph): void {
  for (const node of graph.nodes.values()) {
    draft.addNode(node);
  }
  for (const [from, downstream] of graph.edges) {
    for (const to of downstream) {
      draft.connect(from, to, getEdgeData(graph, from, to));
    }
  }
}
