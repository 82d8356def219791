/**
 * Graph types - nodes, edges and the pipelines traversed through them
 */

import type { Aggregation, Parameters } from './definition';

// =============================================================================
// NODES AND EDGES
// =============================================================================

export interface WorkflowNode {
  readonly id: string;           // "worker:step:technique", "#branch" when > 0
  readonly worker: string;
  readonly step: string;
  readonly ordinal: number;      // Step position within its worker
  readonly technique: string;
  readonly branch: number;
  readonly parameters: Readonly<Parameters>;
  readonly passthrough: boolean; // The "none" technique
}

export interface EdgeData {
  weight?: number;               // Pert: estimated cost of the target
  deliverable?: string;          // Kanban: step whose output crosses the edge
  prunable?: boolean;            // Agile: subject to the traversal callback
  feedback?: boolean;            // Review loop back to the first step
  handoff?: boolean;             // Worker-to-worker boundary
}

export interface GraphEdge {
  from: string;
  to: string;
  data: EdgeData;
}

export interface WorkerSummary {
  readonly name: string;
  readonly design: string;       // The design actually applied
  readonly aggregation: Aggregation;
  readonly entries: readonly string[];
  readonly terminals: readonly string[];
  readonly cyclic: boolean;
  readonly criticalPath?: readonly string[];
  readonly criticalPathCost?: number;
}

// =============================================================================
// TRAVERSAL RESULTS
// =============================================================================

export interface Pipeline {
  nodes: readonly WorkflowNode[];
  truncated: boolean;            // Cut at a revisit bound, not a natural end
}

/**
 * What the execution layer receives for one node
 */
export interface TechniqueInvocation {
  node_id: string;
  technique: string;
  parameters: Readonly<Parameters>;
  passthrough: boolean;
}

/**
 * Implemented outside the engine; results are opaque to it
 */
export type TechniqueExecutor<TResult = unknown> = (
  invocation: TechniqueInvocation,
  input: unknown
) => Promise<TResult>;

// =============================================================================
// EXPORT TYPES (diagnostics only)
// =============================================================================

export interface ExportedNode {
  id: string;
  label: string;
  worker: string;
  step: string;
  cluster: string;
}

export interface ExportedEdge {
  from: string;
  to: string;
  feedback: boolean;
}

export interface ExportedCluster {
  id: string;                    // "cluster_<rank>"
  label: string;                 // "worker: step"
  rank: number;
  nodes: string[];
}

export interface GraphExport {
  nodes: ExportedNode[];
  edges: ExportedEdge[];
  clusters: ExportedCluster[];
}
