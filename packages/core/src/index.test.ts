/**
 * End-to-end tests: project input -> linked graph -> pipelines
 */

import { describe, it, expect } from 'vitest';
import type { Pipeline } from '@lattice/types';
import {
  ConfigurationError,
  CycleError,
  DesignError,
  buildWorkflow,
  countEdges,
  countPaths,
  createContestRule,
  createDesignRegistry,
  createLogger,
  crossProduct,
  getDownstream,
  getEdgeData,
  normalizeProject,
  paths,
  toAdjacency,
  validateGraph,
  type ProjectInput,
} from './index';

const quiet = createLogger({ silent: true });

const project = (input: Omit<ProjectInput, 'name'>) =>
  normalizeProject({ name: 'test', ...input });

const techniques = (pipeline: Pipeline) => pipeline.nodes.map((node) => node.technique);

// =============================================================================
// SINGLE WORKER
// =============================================================================

describe('Single worker designs', () => {
  it('contest over scale and split yields one pipeline per scaler', () => {
    const definition = project({
      workers: { analyst: { scale: ['minmax', 'robust'], split: ['kfold'] } },
      designs: { analyst: 'contest' },
    });
    const { graph } = buildWorkflow(definition, { logger: quiet });

    const pipelines = [...paths(graph)];
    expect(pipelines.map(techniques)).toEqual([
      ['minmax', 'kfold'],
      ['robust', 'kfold'],
    ]);
    expect(pipelines.every((p) => !p.truncated)).toBe(true);
  });

  it('waterfall yields exactly one pipeline of default techniques', () => {
    const definition = project({
      workers: {
        analyst: {
          scale: ['minmax', 'robust', 'normalize'],
          split: ['stratified_kfold', 'train_test'],
          model: ['xgboost', 'logit'],
        },
      },
    });
    const { graph } = buildWorkflow(definition, { logger: quiet });

    const pipelines = [...paths(graph)];
    expect(pipelines.length).toBe(1);
    expect(techniques(pipelines[0])).toEqual(['minmax', 'stratified_kfold', 'xgboost']);
  });

  it('contest yields the product of step sizes', () => {
    const definition = project({
      workers: {
        analyst: {
          scale: ['minmax', 'robust', 'normalize'],
          split: ['kfold', 'train_test'],
          encode: ['target', 'one_hot', 'james_stein', 'weight_of_evidence'],
        },
      },
      designs: { analyst: 'contest' },
    });
    const { graph } = buildWorkflow(definition, { logger: quiet });

    expect(countPaths(graph)).toBe(24);
  });

  it('a none-only step keeps the path count of the graph without it', () => {
    const withNone = project({
      workers: { analyst: { scale: ['a', 'b'], sample: ['none'], model: ['x', 'y', 'z'] } },
      designs: { analyst: 'contest' },
    });
    const without = project({
      workers: { analyst: { scale: ['a', 'b'], model: ['x', 'y', 'z'] } },
      designs: { analyst: 'contest' },
    });

    const a = buildWorkflow(withNone, { logger: quiet }).graph;
    const b = buildWorkflow(without, { logger: quiet }).graph;

    expect(countPaths(a)).toBe(6);
    expect(countPaths(a)).toBe(countPaths(b));

    const first = paths(a).next();
    expect(first.done).toBe(false);
    if (!first.done) {
      expect(first.value.nodes[1].passthrough).toBe(true);
    }
  });

  it('builds identical graphs from identical input', () => {
    const definition = project({
      workers: { analyst: { scale: ['minmax', 'robust'], model: ['logit', 'forest'] } },
      designs: { analyst: 'pert' },
    });

    const first = buildWorkflow(definition, { logger: quiet }).graph;
    const second = buildWorkflow(definition, { logger: quiet }).graph;

    expect([...first.nodes.keys()]).toEqual([...second.nodes.keys()]);
    expect(toAdjacency(first)).toEqual(toAdjacency(second));
    expect(first.workers).toEqual(second.workers);
  });
});

// =============================================================================
// LINKED WORKERS
// =============================================================================

describe('Linked workers', () => {
  it('connects every terminal of one worker to every entry of the next', () => {
    const definition = project({
      workers: { a: { prep: ['x', 'y'] }, b: { fit: ['p', 'q'] } },
      design: 'contest',
    });
    const { graph } = buildWorkflow(definition, { logger: quiet });

    expect(getDownstream(graph, 'a:prep:x')).toEqual(['b:fit:p', 'b:fit:q']);
    expect(getDownstream(graph, 'a:prep:y')).toEqual(['b:fit:p', 'b:fit:q']);
    expect(countEdges(graph)).toBe(4);
    expect(getEdgeData(graph, 'a:prep:y', 'b:fit:q').handoff).toBe(true);
    expect(graph.roots).toEqual(['a:prep:x', 'a:prep:y']);
    expect(graph.terminals).toEqual(['b:fit:p', 'b:fit:q']);
  });

  it('keeps the review loop inside the critic and truncates at the bound', () => {
    const definition = project({
      workers: {
        wrangler: { clean: ['none'] },
        analyst: { scale: ['minmax', 'robust'], model: ['logit', 'forest'] },
        critic: { explain: ['shap'], predict: ['holdout'], report: ['summary'] },
      },
      designs: { analyst: 'contest' },
      feedback: ['critic'],
    });
    const { graph } = buildWorkflow(definition, { logger: quiet });

    expect(validateGraph(graph)).toEqual([]);
    expect(graph.workers.map((w) => w.cyclic)).toEqual([false, false, true]);

    const once = [...paths(graph, { maxRevisits: 0 })];
    expect(once.length).toBe(4);
    expect(once.every((p) => p.truncated)).toBe(true);
    expect(techniques(once[0])).toEqual(['none', 'minmax', 'logit', 'shap', 'holdout', 'summary']);

    const twice = [...paths(graph)];
    expect(twice.length).toBe(4);
    expect(techniques(twice[3])).toEqual([
      'none', 'robust', 'forest', 'shap', 'holdout', 'summary', 'shap', 'holdout', 'summary',
    ]);
  });

  it('allows a scrum worker to start without steps', () => {
    const definition = project({
      workers: { a: { prep: ['x'] }, sprint: {} },
      designs: { sprint: 'scrum' },
    });
    const { graph, subgraphs } = buildWorkflow(definition, { logger: quiet });

    expect(graph.nodes.size).toBe(1);
    expect(subgraphs[1].nodes.size).toBe(0);
    expect(graph.workers.map((w) => w.name)).toEqual(['a', 'sprint']);
  });
});

// =============================================================================
// ERRORS AND WARNINGS
// =============================================================================

describe('Errors and warnings', () => {
  it('falls back to waterfall for an unrecognized design', () => {
    const definition = project({
      workers: { analyst: { scale: ['minmax', 'robust'], split: ['kfold'] } },
      designs: { analyst: 'foobar' },
    });

    const { graph, warnings } = buildWorkflow(definition, { logger: quiet });

    expect(warnings.length).toBe(1);
    expect(warnings[0]).toBeInstanceOf(DesignError);
    expect(warnings[0].design).toBe('foobar');
    expect(graph.workers[0].design).toBe('waterfall');
    expect(countPaths(graph)).toBe(1);
  });

  it('throws ConfigurationError for a worker without steps', () => {
    const definition = project({ workers: { wrangler: {} } });
    expect(() => buildWorkflow(definition, { logger: quiet })).toThrow(ConfigurationError);
    expect(() => buildWorkflow(definition, { logger: quiet })).toThrow('Worker wrangler has no steps');
  });

  it('throws ConfigurationError for techniques missing from the library', () => {
    const definition = project({
      workers: { analyst: { scale: ['minmax', 'robust'] } },
      techniques: { minmax: {} },
    });
    expect(() => buildWorkflow(definition, { logger: quiet })).toThrow(/unknown techniques: robust/);
  });

  it('throws CycleError when a design rule produces a cycle', () => {
    const registry = createDesignRegistry();
    registry.set('loopy', () => ({
      ...createContestRule(),
      design: 'loopy',
      connect: (from, to) => [...crossProduct(from, to), ...crossProduct(to, from)],
    }));

    const definition = project({
      workers: { analyst: { scale: ['minmax'], split: ['kfold'] } },
      designs: { analyst: 'loopy' },
    });

    expect(() => buildWorkflow(definition, { registry, logger: quiet })).toThrow(CycleError);
  });
});
