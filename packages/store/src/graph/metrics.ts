import type { GraphEdge, GraphMetrics, GraphNode } from './interface.js';

function round(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Summary statistics of a directed graph. Edges whose endpoints are not stored
 * nodes still count toward E and the degree of the endpoint that exists, but
 * never join components.
 */
export function computeGraphMetrics(nodes: readonly GraphNode[], edges: readonly GraphEdge[]): GraphMetrics {
  const n = nodes.length;
  const e = edges.length;

  const degree = new Map<string, number>(nodes.map(node => [node.id, 0]));
  const parent = new Map<string, string>(nodes.map(node => [node.id, node.id]));

  const find = (id: string): string => {
    let root = id;
    for (let next = parent.get(root); next !== undefined && next !== root; next = parent.get(root)) {
      root = next;
    }
    // path compression
    let current = id;
    while (current !== root) {
      const next = parent.get(current) ?? root;
      parent.set(current, root);
      current = next;
    }
    return root;
  };

  let numSelfloops = 0;
  for (const edge of edges) {
    if (edge.sourceId === edge.targetId) numSelfloops++;
    for (const endpoint of [edge.sourceId, edge.targetId]) {
      const d = degree.get(endpoint);
      if (d !== undefined) degree.set(endpoint, d + 1);
    }
    if (parent.has(edge.sourceId) && parent.has(edge.targetId)) {
      const a = find(edge.sourceId);
      const b = find(edge.targetId);
      if (a !== b) parent.set(a, b);
    }
  }

  const componentSizes = new Map<string, number>();
  for (const node of nodes) {
    const root = find(node.id);
    componentSizes.set(root, (componentSizes.get(root) ?? 0) + 1);
  }

  const degreeDistribution: Record<number, number> = {};
  for (const d of degree.values()) {
    degreeDistribution[d] = (degreeDistribution[d] ?? 0) + 1;
  }

  return {
    numNodes: n,
    numEdges: e,
    meanDegree: n === 0 ? 0 : round((2 * e) / n),
    edgeDensity: n < 2 ? 0 : round(e / (n * (n - 1))),
    numSelfloops,
    numConnectedComponents: componentSizes.size,
    sizesOfConnectedComponents: [...componentSizes.values()].sort((a, b) => b - a),
    degreeDistribution,
  };
}
