/**
 * Design rule contract
 * A rule decides which techniques of a step become nodes and how the nodes of
 * consecutive steps are connected
 */

import type {
  Aggregation,
  GraphEdge,
  Parameters,
  WorkerSummary,
  WorkflowNode,
} from '@lattice/types';
import type { WorkflowGraph } from '../dag/graph';

/**
 * One step as seen by a rule while a worker is being built
 */
export interface StepLayer {
  worker: string;
  step: string;
  ordinal: number;
  techniques: readonly string[];
  parametersFor: (technique: string) => Readonly<Parameters>;
}

export type WorkerAnnotations = Partial<Pick<WorkerSummary, 'criticalPath' | 'criticalPathCost'>>;

export interface DesignRule {
  readonly design: string;
  readonly aggregation: Aggregation;

  // Steps may be appended after construction
  readonly incremental: boolean;

  select(layer: StepLayer): string[];
  connect(from: readonly WorkflowNode[], to: readonly WorkflowNode[]): GraphEdge[];
  annotate?(graph: WorkflowGraph, summary: WorkerSummary): WorkerAnnotations;
}

export interface DesignOptions {
  estimateCost?: (node: WorkflowNode) => number;
  isEfficient?: (technique: string, parameters: Readonly<Parameters>) => boolean;
}

export type DesignFactory = (options: DesignOptions) => DesignRule;

/**
 * Numeric "cost" parameter; pass-through nodes cost nothing
 */
export function defaultCost(node: WorkflowNode): number {
  if (node.passthrough) return 0;
  const cost = node.parameters.cost;
  return typeof cost === 'number' ? cost : 1;
}

/**
 * Techniques are efficient unless configured with efficient = false
 */
export function defaultEfficiency(_technique: string, parameters: Readonly<Parameters>): boolean {
  return parameters.efficient !== false;
}
