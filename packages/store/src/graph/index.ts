export type {
  GraphStore,
  GraphNode,
  GraphNodeInput,
  GraphEdge,
  GraphEdgeInput,
  EdgeKey,
  Connection,
  GraphData,
  GraphMetrics,
} from './interface.js';
export { SqliteGraphStore } from './store.js';
export { computeGraphMetrics } from './metrics.js';
export { toGraphNode } from './nodes.js';
