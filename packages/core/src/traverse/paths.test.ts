import { describe, it, expect } from 'vitest';
import type { Pipeline, TechniqueExecutor } from '@lattice/types';
import { buildSubgraph } from '../dag/build';
import { createContestRule, createWaterfallRule } from '../designs/variants';
import { createLogger } from '../logger';
import { Catalogue } from '../workflow/catalogue';
import { normalizeProject } from '../workflow/normalize';
import { buildWorkflow } from '../workflow/project';
import { countPaths, paths, toInvocations, walk } from './paths';

const catalogue = Catalogue.fromDefinition(
  normalizeProject({
    name: 'p',
    workers: {
      analyst: { scale: ['minmax', 'robust'], model: ['logit', 'forest'] },
      critic: { explain: ['shap'], predict: ['holdout'], report: ['summary'] },
      wrangler: { sample: ['none'], clean: ['dedupe'] },
    },
    parameters: { dedupe: { keep: 'first' } },
  })
);

const contest = buildSubgraph({
  catalogue,
  rule: createContestRule(),
  worker: 'analyst',
  steps: ['scale', 'model'],
});

const review = buildSubgraph({
  catalogue,
  rule: createWaterfallRule(),
  worker: 'critic',
  steps: ['explain', 'predict', 'report'],
  feedback: true,
});

const ids = (pipeline: Pipeline) => pipeline.nodes.map((node) => node.id);

describe('paths', () => {
  it('enumerates pipelines depth first in insertion order', () => {
    expect([...paths(contest)].map(ids)).toEqual([
      ['analyst:scale:minmax', 'analyst:model:logit'],
      ['analyst:scale:minmax', 'analyst:model:forest'],
      ['analyst:scale:robust', 'analyst:model:logit'],
      ['analyst:scale:robust', 'analyst:model:forest'],
    ]);
  });

  it('yields the same sequence when restarted', () => {
    const first = [...paths(contest)].map(ids);
    const second = [...paths(contest)].map(ids);
    expect(second).toEqual(first);
  });

  it('produces pipelines lazily', () => {
    const iterator = paths(contest);
    const first = iterator.next();
    expect(first.done).toBe(false);
    if (!first.done) {
      expect(ids(first.value)).toEqual(['analyst:scale:minmax', 'analyst:model:logit']);
    }
  });

  it('returns references to graph nodes', () => {
    const [pipeline] = [...paths(contest)];
    expect(pipeline.nodes[0]).toBe(contest.nodes.get('analyst:scale:minmax'));
  });

  it.each([
    [0, 3],
    [1, 6],
    [2, 9],
  ])('truncates a review loop with maxRevisits %i after %i nodes', (maxRevisits, length) => {
    const pipelines = [...paths(review, { maxRevisits })];
    expect(pipelines.length).toBe(1);
    expect(pipelines[0].truncated).toBe(true);
    expect(pipelines[0].nodes.length).toBe(length);
  });

  describe('review loop followed by another worker', () => {
    const { graph } = buildWorkflow(
      normalizeProject({
        name: 'p',
        workers: {
          critic: { explain: ['shap'], report: ['summary'] },
          publisher: { out: ['csv'] },
        },
        feedback: ['critic'],
      }),
      { logger: createLogger({ silent: true }) }
    );

    it('ends every pipeline at the last worker when the loop is closed', () => {
      const pipelines = [...paths(graph, { maxRevisits: 0 })];
      expect(pipelines.map((p) => [p.truncated, ...ids(p)])).toEqual([
        [false, 'critic:explain:shap', 'critic:report:summary', 'publisher:out:csv'],
      ]);
    });

    it('yields the looped and the direct pipeline within the bound', () => {
      const pipelines = [...paths(graph, { maxRevisits: 1 })];
      expect(pipelines.map((p) => [p.truncated, ...ids(p)])).toEqual([
        [
          false,
          'critic:explain:shap',
          'critic:report:summary',
          'critic:explain:shap',
          'critic:report:summary',
          'publisher:out:csv',
        ],
        [false, 'critic:explain:shap', 'critic:report:summary', 'publisher:out:csv'],
      ]);
    });
  });

  it('rejects a negative or fractional revisit bound', () => {
    expect(() => paths(contest, { maxRevisits: -1 }).next()).toThrow(RangeError);
    expect(() => paths(contest, { maxRevisits: 1.5 }).next()).toThrow(
      'maxRevisits must be a non-negative integer, got 1.5'
    );
  });

  it('consults evaluate only for prunable edges', () => {
    expect(countPaths(contest, { evaluate: () => false })).toBe(4);
  });
});

describe('walk', () => {
  it('lists simple paths between two nodes', () => {
    expect([...walk(contest, 'analyst:scale:robust', 'analyst:model:forest')]).toEqual([
      ['analyst:scale:robust', 'analyst:model:forest'],
    ]);
  });

  it('follows feedback edges without repeating a node', () => {
    expect([...walk(review, 'critic:report:summary', 'critic:predict:holdout')]).toEqual([
      ['critic:report:summary', 'critic:explain:shap', 'critic:predict:holdout'],
    ]);
  });

  it('yields nothing for an unknown start node', () => {
    expect([...walk(contest, 'analyst:scale:zscore', 'analyst:model:logit')]).toEqual([]);
  });

  it('yields nothing when stop is unreachable', () => {
    expect([...walk(contest, 'analyst:model:logit', 'analyst:scale:minmax')]).toEqual([]);
  });
});

describe('toInvocations', () => {
  const graph = buildSubgraph({
    catalogue,
    rule: createWaterfallRule(),
    worker: 'wrangler',
    steps: ['sample', 'clean'],
  });
  const [pipeline] = [...paths(graph)];

  it('maps each node to the unit an executor runs', () => {
    expect(toInvocations(pipeline)).toEqual([
      { node_id: 'wrangler:sample:none', technique: 'none', parameters: {}, passthrough: true },
      {
        node_id: 'wrangler:clean:dedupe',
        technique: 'dedupe',
        parameters: { keep: 'first' },
        passthrough: false,
      },
    ]);
  });

  it('lets an executor skip pass-through steps', async () => {
    const executed: string[] = [];
    const execute: TechniqueExecutor<string> = async (invocation, input) => {
      executed.push(invocation.node_id);
      return `${String(input)} > ${invocation.technique}`;
    };

    let result = 'raw';
    for (const invocation of toInvocations(pipeline)) {
      if (!invocation.passthrough) {
        result = await execute(invocation, result);
      }
    }

    expect(executed).toEqual(['wrangler:clean:dedupe']);
    expect(result).toBe('raw > dedupe');
  });
});
