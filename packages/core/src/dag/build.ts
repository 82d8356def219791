/**
 * Worker subgraph construction
 * Instantiates technique nodes step by step and lets the design rule connect them
 */

import {
  NONE_TECHNIQUE,
  type StepDefinition,
  type WorkerSummary,
  type WorkflowNode,
} from '@lattice/types';
import { ConfigurationError, CycleError } from '../errors';
import type { DesignRule, StepLayer } from '../designs/rule';
import type { Catalogue } from '../workflow/catalogue';
import { GraphDraft, copyInto, type WorkflowGraph } from './graph';
import { findCycle } from './validate';

export interface SubgraphOptions {
  catalogue: Catalogue;
  rule: DesignRule;
  worker: string;

  // Connect the last step back to the first (bounded review loop)
  feedback?: boolean;
}

export interface BuildSubgraphOptions extends SubgraphOptions {
  steps: readonly string[];
}

/**
 * Node id: worker:step:technique, with #branch when the identity repeats
 */
export function nodeId(worker: string, step: string, technique: string, branch = 0): string {
  const base = `${worker}:${step}:${technique}`;
  return branch > 0 ? `${base}#${branch}` : base;
}

export class SubgraphBuilder {
  private draft = new GraphDraft();
  private readonly layers: WorkflowNode[][] = [];

  constructor(private readonly options: SubgraphOptions) {}

  get stepCount(): number {
    return this.layers.length;
  }

  /**
   * Add the next step. A plain name is looked up in the catalogue; a step
   * definition brings its own candidate techniques. The step is staged on a
   * copy of the graph, so a failed append leaves the builder unchanged.
   */
  append(step: string | StepDefinition): this {
    const { catalogue, rule, worker } = this.options;
    const name = typeof step === 'string' ? step : step.name;
    const techniques = this.techniquesFor(step);

    const layer: StepLayer = {
      worker,
      step: name,
      ordinal: this.layers.length,
      techniques,
      parametersFor: (technique) => catalogue.parametersFor(technique),
    };

    const nodes = this.instantiate(layer, rule.select(layer));
    const previous = this.layers[this.layers.length - 1];

    const staged = new GraphDraft();
    copyInto(staged, this.draft.freeze([], [], []));
    for (const node of nodes) {
      staged.addNode(node);
    }
    if (previous) {
      staged.addEdges(rule.connect(previous, nodes));
    }

    const cycle = findCycle(staged.freeze([], [], []));
    if (cycle) {
      throw new CycleError(cycle);
    }

    this.draft = staged;
    this.layers.push(nodes);
    return this;
  }

  /**
   * Immutable graph of the steps appended so far
   */
  snapshot(): WorkflowGraph {
    const { rule, worker, feedback = false } = this.options;
    const entries = (this.layers[0] ?? []).map((node) => node.id);
    const terminals = (this.layers[this.layers.length - 1] ?? []).map((node) => node.id);

    const draft = new GraphDraft();
    copyInto(draft, this.draft.freeze(entries, terminals, []));

    const cyclic = feedback && this.layers.length > 0;
    if (cyclic) {
      for (const from of terminals) {
        for (const to of entries) {
          draft.connect(from, to, { feedback: true });
        }
      }
    }

    const summary: WorkerSummary = {
      name: worker,
      design: rule.design,
      aggregation: rule.aggregation,
      entries,
      terminals,
      cyclic,
    };
    const preliminary = draft.freeze(entries, terminals, [summary]);
    const annotations = rule.annotate && this.layers.length > 0
      ? rule.annotate(preliminary, summary)
      : {};

    return draft.freeze(entries, terminals, [{ ...summary, ...annotations }]);
  }

  private techniquesFor(step: string | StepDefinition): readonly string[] {
    const { catalogue } = this.options;
    if (typeof step === 'string') {
      return catalogue.techniquesFor(step);
    }

    if (step.techniques.length === 0) {
      throw new ConfigurationError(`Step ${step.name} has no techniques`);
    }
    return Array.from(new Set(step.techniques));
  }

  /**
   * One node per selected technique; an empty or none-only selection
   * collapses to a single pass-through node
   */
  private instantiate(layer: StepLayer, selected: readonly string[]): WorkflowNode[] {
    const { catalogue, worker } = this.options;
    const techniques = selected.every((t) => t === NONE_TECHNIQUE)
      ? [NONE_TECHNIQUE]
      : selected;

    const taken = new Set<string>();

    return techniques.map((technique): WorkflowNode => {
      let branch = 0;
      let id = nodeId(worker, layer.step, technique, branch);
      while (this.draft.has(id) || taken.has(id)) {
        branch += 1;
        id = nodeId(worker, layer.step, technique, branch);
      }
      taken.add(id);

      return Object.freeze({
        id,
        worker,
        step: layer.step,
        ordinal: layer.ordinal,
        technique,
        branch,
        parameters: technique === NONE_TECHNIQUE ? Object.freeze({}) : catalogue.parametersFor(technique),
        passthrough: technique === NONE_TECHNIQUE,
      });
    });
  }
}

/**
 * Build the subgraph of one worker from an ordered step sequence
 */
export function buildSubgraph(options: BuildSubgraphOptions): WorkflowGraph {
  const { steps, ...rest } = options;
  const builder = new SubgraphBuilder(rest);

  for (const step of steps) {
    builder.append(step);
  }

  return builder.snapshot();
}

/**
 * Builder for designs whose steps arrive after construction
 */
export function createIncrementalBuilder(options: SubgraphOptions): SubgraphBuilder {
  return new SubgraphBuilder(options);
}
