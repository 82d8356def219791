/**
 * Workflow assembly
 * definition -> catalogue -> one subgraph per worker -> linked workflow graph
 */

import type winston from 'winston';
import type { WorkflowDefinition } from '@lattice/types';
import { buildSubgraph } from '../dag/build';
import type { WorkflowGraph } from '../dag/graph';
import { countEdges } from '../dag/graph';
import { linkSubgraphs } from '../dag/link';
import { validateGraph } from '../dag/validate';
import { createDesignRegistry, resolveDesign, type DesignRegistry } from '../designs/registry';
import type { DesignOptions } from '../designs/rule';
import { CycleError, DesignError, WorkflowError } from '../errors';
import { createChildLogger } from '../logger';
import { Catalogue } from './catalogue';
import { validateStepReferences, validateUniqueWorkers } from './normalize';

export interface BuildWorkflowOptions {
  registry?: DesignRegistry;
  designOptions?: DesignOptions;
  logger?: winston.Logger;
}

export interface WorkflowBuild {
  graph: WorkflowGraph;
  subgraphs: WorkflowGraph[];
  catalogue: Catalogue;

  // Design fallbacks; construction continued with waterfall
  warnings: DesignError[];
}

export function buildWorkflow(
  definition: WorkflowDefinition,
  options: BuildWorkflowOptions = {}
): WorkflowBuild {
  const registry = options.registry ?? createDesignRegistry();
  const log = options.logger ?? createChildLogger({ component: 'workflow', project: definition.name });

  validateUniqueWorkers(definition);
  validateStepReferences(definition);
  const catalogue = Catalogue.fromDefinition(definition);

  const warnings: DesignError[] = [];
  const subgraphs: WorkflowGraph[] = [];

  for (const worker of definition.workers) {
    const { rule, warning } = resolveDesign(worker.design, registry, options.designOptions);
    if (warning) {
      warnings.push(warning);
      log.warn(warning.message, { worker: worker.name, design: worker.design });
    }

    const subgraph = buildSubgraph({
      catalogue,
      rule,
      worker: worker.name,
      steps: catalogue.stepsFor(worker.name, { allowEmpty: rule.incremental }),
      feedback: worker.feedback,
    });

    log.debug('Built worker subgraph', {
      worker: worker.name,
      design: rule.design,
      nodes: subgraph.nodes.size,
      edges: countEdges(subgraph),
    });
    subgraphs.push(subgraph);
  }

  const graph = linkSubgraphs(subgraphs);
  assertValid(graph);

  log.debug('Linked workflow graph', {
    workers: subgraphs.length,
    nodes: graph.nodes.size,
    edges: countEdges(graph),
  });

  return { graph, subgraphs, catalogue, warnings };
}

function assertValid(graph: WorkflowGraph): void {
  for (const error of validateGraph(graph)) {
    if (error.code === 'CYCLE_DETECTED') {
      throw new CycleError(error.cycle ?? []);
    }
    throw new WorkflowError(error.code, error.message, error);
  }
}
