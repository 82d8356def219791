/**
 * Worker linking
 * Joins per-worker subgraphs into one workflow graph
 */

import type { WorkerSummary } from '@lattice/types';
import { ConfigurationError } from '../errors';
import { GraphDraft, copyInto, type WorkflowGraph } from './graph';

/**
 * Link subgraphs in order. Every terminal node of one worker feeds every
 * entry node of the next, whatever the workers' own designs. Empty subgraphs
 * are skipped.
 */
export function linkSubgraphs(subgraphs: readonly WorkflowGraph[]): WorkflowGraph {
  const draft = new GraphDraft();
  const workers: WorkerSummary[] = [];
  let roots: readonly string[] = [];
  let terminals: readonly string[] = [];

  for (const subgraph of subgraphs) {
    workers.push(...subgraph.workers);

    if (subgraph.nodes.size === 0) {
      continue;
    }

    for (const nodeId of subgraph.nodes.keys()) {
      if (draft.has(nodeId)) {
        throw new ConfigurationError(`Node ${nodeId} appears in more than one worker`);
      }
    }
    copyInto(draft, subgraph);

    if (roots.length === 0) {
      roots = subgraph.roots;
    } else {
      for (const from of terminals) {
        for (const to of subgraph.roots) {
          draft.connect(from, to, { handoff: true });
        }
      }
    }
    terminals = subgraph.terminals;
  }

  return draft.freeze(roots, terminals, workers);
}
