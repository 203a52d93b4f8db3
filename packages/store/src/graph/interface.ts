import type { Row, SqlParam } from '../db/connection.js';
import type { JsonObject } from '../models/json.js';

export interface GraphNodeInput {
  id: string;
  type: string;
  name?: string;
  /** Nodeset tags */
  belongsToSet?: readonly string[];
  properties?: Record<string, unknown>;
}

export interface GraphNode {
  id: string;
  type: string;
  name: string;
  belongsToSet: string[];
  properties: JsonObject;
}

export interface GraphEdgeInput {
  sourceId: string;
  targetId: string;
  relationshipName: string;
  properties?: Record<string, unknown>;
}

export interface GraphEdge {
  sourceId: string;
  targetId: string;
  relationshipName: string;
  properties: JsonObject;
}

export type EdgeKey = readonly [sourceId: string, targetId: string, relationshipName: string];

export type Connection = [source: GraphNode, edge: GraphEdge, target: GraphNode];

export interface GraphData {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface GraphMetrics {
  numNodes: number;
  numEdges: number;
  /** 2E / N */
  meanDegree: number;
  /** E / (N (N - 1)) for a directed graph */
  edgeDensity: number;
  numSelfloops: number;
  /** Weakly connected components over stored nodes */
  numConnectedComponents: number;
  sizesOfConnectedComponents: number[];
  /** degree -> number of nodes with that degree */
  degreeDistribution: Record<number, number>;
}

export interface GraphStore {
  query(sql: string, params?: readonly SqlParam[]): Promise<Row[]>;

  hasNode(id: string): Promise<boolean>;
  addNode(node: GraphNodeInput): Promise<void>;
  addNodes(nodes: readonly GraphNodeInput[]): Promise<void>;
  extractNode(id: string): Promise<GraphNode | null>;
  extractNodes(ids: readonly string[]): Promise<GraphNode[]>;
  /** Edges of the node are left in place */
  deleteNode(id: string): Promise<void>;
  deleteNodes(ids: readonly string[]): Promise<void>;

  hasEdge(sourceId: string, targetId: string, relationshipName: string): Promise<boolean>;
  hasEdges(edges: readonly EdgeKey[]): Promise<boolean[]>;
  addEdge(sourceId: string, targetId: string, relationshipName: string, properties?: Record<string, unknown>): Promise<void>;
  addEdges(edges: readonly GraphEdgeInput[]): Promise<void>;
  getEdges(nodeId: string): Promise<GraphEdge[]>;

  getNeighbors(nodeId: string, relationshipName?: string): Promise<GraphNode[]>;
  getPredecessors(nodeId: string, relationshipName?: string): Promise<GraphNode[]>;
  getSuccessors(nodeId: string, relationshipName?: string): Promise<GraphNode[]>;
  getConnections(nodeId: string): Promise<Connection[]>;
  getDisconnectedNodes(): Promise<string[]>;
  removeConnectionToPredecessorsOf(nodeIds: readonly string[], relationshipName?: string): Promise<number>;
  removeConnectionToSuccessorsOf(nodeIds: readonly string[], relationshipName?: string): Promise<number>;

  getNodesetSubgraph(nodeType: string, nodeNames: readonly string[]): Promise<GraphData>;
  getGraphData(): Promise<GraphData>;
  getGraphMetrics(): Promise<GraphMetrics>;
  deleteGraph(): Promise<void>;
}
