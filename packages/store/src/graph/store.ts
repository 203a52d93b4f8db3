import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { chunk, placeholders } from '../utils/helpers.js';
import { toJsonObject } from '../utils/sanitize.js';
import { errorMessage } from '../errors.js';
import { JsonObjectSchema, type JsonObject } from '../models/json.js';
import { computeGraphMetrics } from './metrics.js';
import type { ConnectionGuard, Row, SqlParam, SqlStatement } from '../db/connection.js';
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
} from './interface.js';

const log = createLogger('graph');

const NODE_TABLE = '_graph_node';
const EDGE_TABLE = '_graph_edge';
const MAX_IDS_PER_STATEMENT = 500;

const SCHEMA: SqlStatement[] = [
  [`
    CREATE TABLE IF NOT EXISTS ${NODE_TABLE} (
      id             TEXT PRIMARY KEY,
      name           TEXT NOT NULL DEFAULT '',
      type           TEXT NOT NULL,
      belongs_to_set TEXT NOT NULL DEFAULT '[]',
      properties     TEXT NOT NULL DEFAULT '{}',
      created_at     DATETIME NOT NULL DEFAULT (datetime('now')),
      updated_at     DATETIME NOT NULL DEFAULT (datetime('now'))
    )
  `],
  [`
    CREATE TABLE IF NOT EXISTS ${EDGE_TABLE} (
      source_id         TEXT NOT NULL,
      target_id         TEXT NOT NULL,
      relationship_name TEXT NOT NULL,
      properties        TEXT NOT NULL DEFAULT '{}',
      created_at        DATETIME NOT NULL DEFAULT (datetime('now')),
      updated_at        DATETIME NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (source_id, target_id, relationship_name)
    )
  `],
  [`CREATE INDEX IF NOT EXISTS ${EDGE_TABLE}_target ON ${EDGE_TABLE}(target_id)`],
];

const UPSERT_NODE = `
  INSERT INTO ${NODE_TABLE} (id, name, type, belongs_to_set, properties)
  VALUES (?, ?, ?, ?, ?)
  ON CONFLICT(id) DO UPDATE SET
    name = excluded.name,
    type = excluded.type,
    belongs_to_set = excluded.belongs_to_set,
    properties = excluded.properties,
    updated_at = datetime('now')
`;

const UPSERT_EDGE = `
  INSERT INTO ${EDGE_TABLE} (source_id, target_id, relationship_name, properties)
  VALUES (?, ?, ?, ?)
  ON CONFLICT(source_id, target_id, relationship_name) DO UPDATE SET
    properties = excluded.properties,
    updated_at = datetime('now')
`;

const NODE_COLUMNS = 'n.id, n.name, n.type, n.belongs_to_set, n.properties';
const EDGE_COLUMNS = 'e.source_id, e.target_id, e.relationship_name, e.properties';

interface NodeRow {
  id: string;
  name: string;
  type: string;
  belongs_to_set: string;
  properties: string;
}

interface EdgeRow {
  source_id: string;
  target_id: string;
  relationship_name: string;
  properties: string;
}

const TagsSchema = z.array(z.string());

function parseJson<T>(schema: z.ZodType<T>, text: string, fallback: T, context: Record<string, unknown>): T {
  try {
    return schema.parse(JSON.parse(text));
  } catch (e) {
    log.warn({ ...context, error: errorMessage(e) }, 'Unreadable graph column, using empty value');
    return fallback;
  }
}

function toNode(row: NodeRow): GraphNode {
  return {
    id: row.id,
    name: row.name,
    type: row.type,
    belongsToSet: parseJson(TagsSchema, row.belongs_to_set, [], { node: row.id }),
    properties: parseJson<JsonObject>(JsonObjectSchema, row.properties, {}, { node: row.id }),
  };
}

function toEdge(row: EdgeRow): GraphEdge {
  return {
    sourceId: row.source_id,
    targetId: row.target_id,
    relationshipName: row.relationship_name,
    properties: parseJson<JsonObject>(JsonObjectSchema, row.properties, {}, {
      edge: [row.source_id, row.target_id, row.relationship_name],
    }),
  };
}

function nodeParams(node: GraphNodeInput): SqlParam[] {
  return [
    node.id,
    node.name ?? '',
    node.type,
    JSON.stringify([...(node.belongsToSet ?? [])]),
    JSON.stringify(toJsonObject(node.properties ?? {})),
  ];
}

function edgeParams(edge: GraphEdgeInput): SqlParam[] {
  return [edge.sourceId, edge.targetId, edge.relationshipName, JSON.stringify(toJsonObject(edge.properties ?? {}))];
}

/**
 * Graph primitives on two internal tables of the same database. Traversal is
 * single hop; edge endpoints are not required to exist as nodes.
 */
export class SqliteGraphStore implements GraphStore {
  constructor(private readonly guard: ConnectionGuard) {}

  async query(sql: string, params: readonly SqlParam[] = []): Promise<Row[]> {
    return this.guard.execute(sql, params);
  }

  // ============ Nodes ============

  async hasNode(id: string): Promise<boolean> {
    await this.ensureSchema();
    const row = await this.guard.executeOne(`SELECT 1 AS found FROM ${NODE_TABLE} WHERE id = ?`, [id]);
    return row !== null;
  }

  async addNode(node: GraphNodeInput): Promise<void> {
    await this.addNodes([node]);
  }

  async addNodes(nodes: readonly GraphNodeInput[]): Promise<void> {
    if (nodes.length === 0) return;
    await this.ensureSchema();
    await this.guard.executeTransaction(nodes.map((node): SqlStatement => [UPSERT_NODE, nodeParams(node)]));
    log.debug({ count: nodes.length }, 'Upserted nodes');
  }

  async extractNode(id: string): Promise<GraphNode | null> {
    const [node] = await this.extractNodes([id]);
    return node ?? null;
  }

  /** Stored nodes in the order of `ids`; unknown ids are skipped. */
  async extractNodes(ids: readonly string[]): Promise<GraphNode[]> {
    if (ids.length === 0) return [];
    await this.ensureSchema();

    const found = new Map<string, GraphNode>();
    for (const batch of chunk([...new Set(ids)], MAX_IDS_PER_STATEMENT)) {
      const rows = await this.guard.execute<NodeRow>(
        `SELECT ${NODE_COLUMNS} FROM ${NODE_TABLE} n WHERE n.id IN (${placeholders(batch.length)})`,
        batch,
      );
      for (const row of rows) found.set(row.id, toNode(row));
    }
    return ids.flatMap(id => found.get(id) ?? []);
  }

  async deleteNode(id: string): Promise<void> {
    await this.deleteNodes([id]);
  }

  async deleteNodes(ids: readonly string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.ensureSchema();
    const deleted = await this.guard.executeTransaction(
      chunk([...new Set(ids)], MAX_IDS_PER_STATEMENT).map((batch): SqlStatement => [
        `DELETE FROM ${NODE_TABLE} WHERE id IN (${placeholders(batch.length)})`,
        batch,
      ]),
    );
    log.debug({ requested: ids.length, deleted }, 'Deleted nodes');
  }

  // ============ Edges ============

  async hasEdge(sourceId: string, targetId: string, relationshipName: string): Promise<boolean> {
    await this.ensureSchema();
    const row = await this.guard.executeOne(
      `SELECT 1 AS found FROM ${EDGE_TABLE} WHERE source_id = ? AND target_id = ? AND relationship_name = ?`,
      [sourceId, targetId, relationshipName],
    );
    return row !== null;
  }

  async hasEdges(edges: readonly EdgeKey[]): Promise<boolean[]> {
    const results: boolean[] = [];
    for (const [sourceId, targetId, relationshipName] of edges) {
      results.push(await this.hasEdge(sourceId, targetId, relationshipName));
    }
    return results;
  }

  /** Adding an existing (source, target, relationship) triple replaces its properties. */
  async addEdge(sourceId: string, targetId: string, relationshipName: string, properties: Record<string, unknown> = {}): Promise<void> {
    await this.addEdges([{ sourceId, targetId, relationshipName, properties }]);
  }

  async addEdges(edges: readonly GraphEdgeInput[]): Promise<void> {
    if (edges.length === 0) return;
    await this.ensureSchema();
    await this.guard.executeTransaction(edges.map((edge): SqlStatement => [UPSERT_EDGE, edgeParams(edge)]));
    log.debug({ count: edges.length }, 'Upserted edges');
  }

  /** Every edge with the node at either end */
  async getEdges(nodeId: string): Promise<GraphEdge[]> {
    await this.ensureSchema();
    const rows = await this.guard.execute<EdgeRow>(
      `SELECT ${EDGE_COLUMNS} FROM ${EDGE_TABLE} e
       WHERE e.source_id = ? OR e.target_id = ?
       ORDER BY e.source_id, e.target_id, e.relationship_name`,
      [nodeId, nodeId],
    );
    return rows.map(toEdge);
  }

  // ============ Traversal ============

  async getPredecessors(nodeId: string, relationshipName?: string): Promise<GraphNode[]> {
    return this.hop('e.target_id = ? AND n.id = e.source_id', [nodeId], relationshipName);
  }

  async getSuccessors(nodeId: string, relationshipName?: string): Promise<GraphNode[]> {
    return this.hop('e.source_id = ? AND n.id = e.target_id', [nodeId], relationshipName);
  }

  async getNeighbors(nodeId: string, relationshipName?: string): Promise<GraphNode[]> {
    return this.hop(
      '((e.source_id = ? AND n.id = e.target_id) OR (e.target_id = ? AND n.id = e.source_id))',
      [nodeId, nodeId],
      relationshipName,
    );
  }

  /** `[source, edge, target]` for every edge touching the node whose endpoints both exist */
  async getConnections(nodeId: string): Promise<Connection[]> {
    const edges = await this.getEdges(nodeId);
    const nodes = await this.extractNodes(edges.flatMap(e => [e.sourceId, e.targetId]));
    const byId = new Map(nodes.map(node => [node.id, node]));

    return edges.flatMap((edge): Connection[] => {
      const source = byId.get(edge.sourceId);
      const target = byId.get(edge.targetId);
      return source && target ? [[source, edge, target]] : [];
    });
  }

  async getDisconnectedNodes(): Promise<string[]> {
    await this.ensureSchema();
    const rows = await this.guard.execute<{ id: string }>(`
      SELECT n.id FROM ${NODE_TABLE} n
      WHERE NOT EXISTS (
        SELECT 1 FROM ${EDGE_TABLE} e WHERE e.source_id = n.id OR e.target_id = n.id
      )
      ORDER BY n.id
    `);
    return rows.map(r => r.id);
  }

  /** Remove every incoming edge of the given nodes; returns the number removed. */
  async removeConnectionToPredecessorsOf(nodeIds: readonly string[], relationshipName?: string): Promise<number> {
    return this.removeEdgesAt('target_id', nodeIds, relationshipName);
  }

  /** Remove every outgoing edge of the given nodes; returns the number removed. */
  async removeConnectionToSuccessorsOf(nodeIds: readonly string[], relationshipName?: string): Promise<number> {
    return this.removeEdgesAt('source_id', nodeIds, relationshipName);
  }

  // ============ Whole graph ============

  /**
   * Nodes of the nodeset: anchors (`type = nodeType`, `name` in `nodeNames`)
   * plus every node tagged with one of `nodeNames`. Edges are those with both
   * endpoints inside the result.
   */
  async getNodesetSubgraph(nodeType: string, nodeNames: readonly string[]): Promise<GraphData> {
    if (nodeNames.length === 0) return { nodes: [], edges: [] };
    await this.ensureSchema();

    const names = [...new Set(nodeNames)];
    const inNames = placeholders(names.length);
    const selected = `
      SELECT n.id FROM ${NODE_TABLE} n
      WHERE (n.type = ? AND n.name IN (${inNames}))
         OR EXISTS (SELECT 1 FROM json_each(n.belongs_to_set) t WHERE t.value IN (${inNames}))
    `;
    const params: SqlParam[] = [nodeType, ...names, ...names];

    const nodeRows = await this.guard.execute<NodeRow>(
      `SELECT ${NODE_COLUMNS} FROM ${NODE_TABLE} n WHERE n.id IN (${selected}) ORDER BY n.id`,
      params,
    );
    const edgeRows = await this.guard.execute<EdgeRow>(
      `WITH selected AS (${selected})
       SELECT ${EDGE_COLUMNS} FROM ${EDGE_TABLE} e
       WHERE e.source_id IN (SELECT id FROM selected) AND e.target_id IN (SELECT id FROM selected)
       ORDER BY e.source_id, e.target_id, e.relationship_name`,
      params,
    );

    return { nodes: nodeRows.map(toNode), edges: edgeRows.map(toEdge) };
  }

  async getGraphData(): Promise<GraphData> {
    await this.ensureSchema();
    const nodeRows = await this.guard.execute<NodeRow>(`SELECT ${NODE_COLUMNS} FROM ${NODE_TABLE} n ORDER BY n.id`);
    const edgeRows = await this.guard.execute<EdgeRow>(
      `SELECT ${EDGE_COLUMNS} FROM ${EDGE_TABLE} e ORDER BY e.source_id, e.target_id, e.relationship_name`,
    );
    return { nodes: nodeRows.map(toNode), edges: edgeRows.map(toEdge) };
  }

  async getGraphMetrics(): Promise<GraphMetrics> {
    const { nodes, edges } = await this.getGraphData();
    return computeGraphMetrics(nodes, edges);
  }

  /** Drops node and edge storage only; vector collections are untouched. */
  async deleteGraph(): Promise<void> {
    await this.guard.executeTransaction([
      [`DROP TABLE IF EXISTS ${EDGE_TABLE}`],
      [`DROP TABLE IF EXISTS ${NODE_TABLE}`],
    ]);
    log.info('Graph deleted');
  }

  // Tables are recreated on demand, so the graph survives deleteGraph() and prune().
  private async ensureSchema(): Promise<void> {
    await this.guard.executeTransaction(SCHEMA);
  }

  private async hop(join: string, params: SqlParam[], relationshipName?: string): Promise<GraphNode[]> {
    await this.ensureSchema();
    const labelFilter = relationshipName === undefined ? '' : ' AND e.relationship_name = ?';
    const rows = await this.guard.execute<NodeRow>(
      `SELECT DISTINCT ${NODE_COLUMNS} FROM ${NODE_TABLE} n
       JOIN ${EDGE_TABLE} e ON ${join}${labelFilter}
       ORDER BY n.id`,
      relationshipName === undefined ? params : [...params, relationshipName],
    );
    return rows.map(toNode);
  }

  private async removeEdgesAt(column: 'source_id' | 'target_id', nodeIds: readonly string[], relationshipName?: string): Promise<number> {
    if (nodeIds.length === 0) return 0;
    await this.ensureSchema();
    const labelFilter = relationshipName === undefined ? '' : ' AND relationship_name = ?';

    const removed = await this.guard.executeTransaction(
      chunk([...new Set(nodeIds)], MAX_IDS_PER_STATEMENT).map((batch): SqlStatement => [
        `DELETE FROM ${EDGE_TABLE} WHERE ${column} IN (${placeholders(batch.length)})${labelFilter}`,
        relationshipName === undefined ? batch : [...batch, relationshipName],
      ]),
    );
    log.debug({ column, nodes: nodeIds.length, removed }, 'Removed edges');
    return removed;
  }
}
