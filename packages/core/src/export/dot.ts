/**
 * Graph export for diagnostics
 * Node/edge lists grouped into one cluster per worker step, and DOT text
 */

import type { ExportedCluster, GraphExport } from '@lattice/types';
import type { WorkflowGraph } from '../dag/graph';
import { getEdgeData } from '../dag/graph';

export function exportGraph(graph: WorkflowGraph): GraphExport {
  const clusters = new Map<string, ExportedCluster>();
  const result: GraphExport = { nodes: [], edges: [], clusters: [] };

  for (const node of graph.nodes.values()) {
    const key = `${node.worker}\u0000${node.ordinal}`;
    let cluster = clusters.get(key);
    if (!cluster) {
      cluster = {
        id: `cluster_${clusters.size}`,
        label: `${node.worker}: ${node.step}`,
        rank: clusters.size,
        nodes: [],
      };
      clusters.set(key, cluster);
      result.clusters.push(cluster);
    }
    cluster.nodes.push(node.id);

    result.nodes.push({
      id: node.id,
      label: node.technique,
      worker: node.worker,
      step: node.step,
      cluster: cluster.id,
    });
  }

  for (const [from, downstream] of graph.edges) {
    for (const to of downstream) {
      result.edges.push({ from, to, feedback: getEdgeData(graph, from, to).feedback === true });
    }
  }

  return result;
}

/**
 * Plain adjacency record: node_id -> downstream node_ids
 */
export function toAdjacency(graph: WorkflowGraph): Record<string, string[]> {
  const adjacency: Record<string, string[]> = {};
  for (const [id, downstream] of graph.edges) {
    adjacency[id] = [...downstream];
  }
  return adjacency;
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * DOT digraph, one ranked cluster per step; feedback edges are dashed
 */
export function toDot(graph: WorkflowGraph, name = 'workflow'): string {
  const exported = exportGraph(graph);
  const labels = new Map(exported.nodes.map((node) => [node.id, node.label]));
  const lines: string[] = [`digraph ${quote(name)} {`, '  rankdir=LR;'];

  for (const cluster of exported.clusters) {
    lines.push(`  subgraph ${cluster.id} {`);
    lines.push(`    label=${quote(cluster.label)};`);
    lines.push('    rank=same;');
    for (const id of cluster.nodes) {
      lines.push(`    ${quote(id)} [label=${quote(labels.get(id) ?? id)}];`);
    }
    lines.push('  }');
  }

  for (const edge of exported.edges) {
    const style = edge.feedback ? ' [style=dashed]' : '';
    lines.push(`  ${quote(edge.from)} -> ${quote(edge.to)}${style};`);
  }

  lines.push('}');
  return lines.join('\n');
}
