/**
 * Design rule variants
 */

import type { GraphEdge, WorkflowNode } from '@lattice/types';
import { computeCriticalPath } from '../dag/topo';
import type { DesignOptions, DesignRule, StepLayer } from './rule';
import { defaultCost, defaultEfficiency } from './rule';

/**
 * Every node of one layer feeds every node of the next
 */
export function crossProduct(
  from: readonly WorkflowNode[],
  to: readonly WorkflowNode[],
  data: (source: WorkflowNode, target: WorkflowNode) => GraphEdge['data'] = () => ({})
): GraphEdge[] {
  const edges: GraphEdge[] = [];
  for (const source of from) {
    for (const target of to) {
      edges.push({ from: source.id, to: target.id, data: data(source, target) });
    }
  }
  return edges;
}

const selectDefault = (layer: StepLayer): string[] => layer.techniques.slice(0, 1);

const selectAll = (layer: StepLayer): string[] => [...layer.techniques];

/**
 * One technique per step, chained linearly
 */
export function createWaterfallRule(): DesignRule {
  return {
    design: 'waterfall',
    aggregation: 'single',
    incremental: false,
    select: selectDefault,
    connect: (from, to) => crossProduct(from, to),
  };
}

/**
 * Waterfall topology; each edge names the deliverable crossing it
 */
export function createKanbanRule(): DesignRule {
  return {
    design: 'kanban',
    aggregation: 'single',
    incremental: false,
    select: selectDefault,
    connect: (from, to) => crossProduct(from, to, (source) => ({ deliverable: source.step })),
  };
}

/**
 * Every technique of every step; the best pipeline wins downstream
 */
export function createContestRule(): DesignRule {
  return {
    design: 'contest',
    aggregation: 'select-best',
    incremental: false,
    select: selectAll,
    connect: (from, to) => crossProduct(from, to),
  };
}

/**
 * Contest topology; pipeline results are averaged downstream
 */
export function createSurveyRule(): DesignRule {
  return {
    design: 'survey',
    aggregation: 'average-all',
    incremental: false,
    select: selectAll,
    connect: (from, to) => crossProduct(from, to),
  };
}

/**
 * Contest topology with cost-weighted edges and a tagged critical path
 */
export function createPertRule(options: DesignOptions = {}): DesignRule {
  const cost = options.estimateCost ?? defaultCost;

  return {
    design: 'pert',
    aggregation: 'select-best',
    incremental: false,
    select: selectAll,
    connect: (from, to) => crossProduct(from, to, (_source, target) => ({ weight: cost(target) })),
    annotate: (graph, summary) => {
      const critical = computeCriticalPath(graph, cost, summary.entries, summary.terminals);
      return { criticalPath: critical.path, criticalPathCost: critical.cost };
    },
  };
}

/**
 * Full candidate graph; edges past the first step are pruned while traversing
 */
export function createAgileRule(): DesignRule {
  return {
    design: 'agile',
    aggregation: 'select-best',
    incremental: false,
    select: selectAll,
    connect: (from, to) =>
      crossProduct(from, to, (source) => (source.ordinal >= 1 ? { prunable: true } : {})),
  };
}

/**
 * Contest without the techniques configured as resource-inefficient
 */
export function createLeanRule(options: DesignOptions = {}): DesignRule {
  const isEfficient = options.isEfficient ?? defaultEfficiency;

  return {
    design: 'lean',
    aggregation: 'select-best',
    incremental: false,
    select: (layer) =>
      layer.techniques.filter((technique) => isEfficient(technique, layer.parametersFor(technique))),
    connect: (from, to) => crossProduct(from, to),
  };
}

/**
 * Steps are appended one sprint at a time
 */
export function createScrumRule(): DesignRule {
  return {
    design: 'scrum',
    aggregation: 'select-best',
    incremental: true,
    select: selectAll,
    connect: (from, to) => crossProduct(from, to),
  };
}
