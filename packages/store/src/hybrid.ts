import { ConnectionGuard } from './db/connection.js';
import { CollectionManager } from './db/collections.js';
import { EmbeddingGateway } from './embedding/gateway.js';
import { createEmbeddingProvider, type EmbeddingProvider } from './embedding/index.js';
import { SqliteVectorStore } from './vector/store.js';
import { SqliteGraphStore } from './graph/store.js';
import { getConfig, type LoamConfig } from './utils/config.js';
import { createLogger } from './utils/logger.js';
import type { Row, SqlParam } from './db/connection.js';
import type { AnyDataPoint } from './models/data-point.js';
import type {
  BatchSearchOptions,
  ScoredResult,
  SearchOptions,
  StoredDataPoint,
  VectorStore,
} from './vector/interface.js';
import type {
  Connection,
  EdgeKey,
  GraphData,
  GraphEdge,
  GraphEdgeInput,
  GraphMetrics,
  GraphNode,
  GraphNodeInput,
  GraphStore,
} from './graph/interface.js';

const log = createLogger('hybrid');

export interface HybridStoreDeps {
  /** Overrides the provider built from `config.embedding`; null disables embedding. */
  embedding?: EmbeddingProvider | null;
}

/**
 * One database serving both vector collections and the graph. Both halves share
 * the same guarded connection.
 */
export class HybridStore implements VectorStore, GraphStore {
  readonly collections: CollectionManager;

  constructor(
    private readonly guard: ConnectionGuard,
    private readonly vectors: SqliteVectorStore,
    private readonly graph: SqliteGraphStore,
    collections: CollectionManager,
  ) {
    this.collections = collections;
  }

  // ============ Vector ============

  embedData(texts: readonly string[]): Promise<number[][]> {
    return this.vectors.embedData(texts);
  }

  hasCollection(name: string): Promise<boolean> {
    return this.vectors.hasCollection(name);
  }

  createCollection(name: string): Promise<void> {
    return this.vectors.createCollection(name);
  }

  createDataPoints(collection: string, points: readonly AnyDataPoint[]): Promise<void> {
    return this.vectors.createDataPoints(collection, points);
  }

  createVectorIndex(indexName: string, propertyName: string): Promise<void> {
    return this.vectors.createVectorIndex(indexName, propertyName);
  }

  indexDataPoints(indexName: string, propertyName: string, points: readonly AnyDataPoint[]): Promise<void> {
    return this.vectors.indexDataPoints(indexName, propertyName, points);
  }

  retrieve(collection: string, ids: readonly string[]): Promise<StoredDataPoint[]> {
    return this.vectors.retrieve(collection, ids);
  }

  search(collection: string, options: SearchOptions): Promise<ScoredResult[]> {
    return this.vectors.search(collection, options);
  }

  batchSearch(collection: string, queryTexts: readonly string[], options?: BatchSearchOptions): Promise<ScoredResult[][]> {
    return this.vectors.batchSearch(collection, queryTexts, options);
  }

  deleteDataPoints(collection: string, ids: readonly string[]): Promise<{ deleted: number }> {
    return this.vectors.deleteDataPoints(collection, ids);
  }

  // ============ Graph ============

  query(sql: string, params?: readonly SqlParam[]): Promise<Row[]> {
    return this.graph.query(sql, params);
  }

  hasNode(id: string): Promise<boolean> {
    return this.graph.hasNode(id);
  }

  addNode(node: GraphNodeInput): Promise<void> {
    return this.graph.addNode(node);
  }

  addNodes(nodes: readonly GraphNodeInput[]): Promise<void> {
    return this.graph.addNodes(nodes);
  }

  extractNode(id: string): Promise<GraphNode | null> {
    return this.graph.extractNode(id);
  }

  extractNodes(ids: readonly string[]): Promise<GraphNode[]> {
    return this.graph.extractNodes(ids);
  }

  deleteNode(id: string): Promise<void> {
    return this.graph.deleteNode(id);
  }

  deleteNodes(ids: readonly string[]): Promise<void> {
    return this.graph.deleteNodes(ids);
  }

  hasEdge(sourceId: string, targetId: string, relationshipName: string): Promise<boolean> {
    return this.graph.hasEdge(sourceId, targetId, relationshipName);
  }

  hasEdges(edges: readonly EdgeKey[]): Promise<boolean[]> {
    return this.graph.hasEdges(edges);
  }

  addEdge(sourceId: string, targetId: string, relationshipName: string, properties?: Record<string, unknown>): Promise<void> {
    return this.graph.addEdge(sourceId, targetId, relationshipName, properties);
  }

  addEdges(edges: readonly GraphEdgeInput[]): Promise<void> {
    return this.graph.addEdges(edges);
  }

  getEdges(nodeId: string): Promise<GraphEdge[]> {
    return this.graph.getEdges(nodeId);
  }

  getNeighbors(nodeId: string, relationshipName?: string): Promise<GraphNode[]> {
    return this.graph.getNeighbors(nodeId, relationshipName);
  }

  getPredecessors(nodeId: string, relationshipName?: string): Promise<GraphNode[]> {
    return this.graph.getPredecessors(nodeId, relationshipName);
  }

  getSuccessors(nodeId: string, relationshipName?: string): Promise<GraphNode[]> {
    return this.graph.getSuccessors(nodeId, relationshipName);
  }

  getConnections(nodeId: string): Promise<Connection[]> {
    return this.graph.getConnections(nodeId);
  }

  getDisconnectedNodes(): Promise<string[]> {
    return this.graph.getDisconnectedNodes();
  }

  removeConnectionToPredecessorsOf(nodeIds: readonly string[], relationshipName?: string): Promise<number> {
    return this.graph.removeConnectionToPredecessorsOf(nodeIds, relationshipName);
  }

  removeConnectionToSuccessorsOf(nodeIds: readonly string[], relationshipName?: string): Promise<number> {
    return this.graph.removeConnectionToSuccessorsOf(nodeIds, relationshipName);
  }

  getNodesetSubgraph(nodeType: string, nodeNames: readonly string[]): Promise<GraphData> {
    return this.graph.getNodesetSubgraph(nodeType, nodeNames);
  }

  getGraphData(): Promise<GraphData> {
    return this.graph.getGraphData();
  }

  getGraphMetrics(): Promise<GraphMetrics> {
    return this.graph.getGraphMetrics();
  }

  deleteGraph(): Promise<void> {
    return this.graph.deleteGraph();
  }

  // ============ Lifecycle ============

  /** Drop every collection and the graph. The store stays usable afterwards. */
  async prune(): Promise<void> {
    await this.vectors.prune();
    log.info('Store pruned');
  }

  async close(): Promise<void> {
    await this.guard.close();
  }
}

/** Wire a store from config. Tests pass a fake embedding provider through `deps`. */
export function createHybridStore(config: LoamConfig = getConfig(), deps: HybridStoreDeps = {}): HybridStore {
  const guard = ConnectionGuard.open(config.storage);
  const collections = new CollectionManager(guard);
  const provider = deps.embedding === undefined ? createEmbeddingProvider(config.embedding) : deps.embedding;
  const gateway = new EmbeddingGateway(provider);

  log.info({ dbPath: config.storage.dbPath, embedding: provider?.name ?? 'none' }, 'Hybrid store ready');
  return new HybridStore(
    guard,
    new SqliteVectorStore(guard, collections, gateway, config.search),
    new SqliteGraphStore(guard),
    collections,
  );
}
