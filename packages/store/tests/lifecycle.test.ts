import { describe, it, expect, afterEach } from 'vitest';
import { createHybridStore, type HybridStore } from '../src/hybrid.js';
import { defineDataPoint } from '../src/models/data-point.js';
import { toGraphNode } from '../src/graph/nodes.js';
import { EmbeddingUnavailableError, StoreClosedError } from '../src/errors.js';
import { setupTestStore, testConfig } from './setup.js';

const Entity = defineDataPoint<{ name: string; description: string }>('Entity', {
  indexFields: ['name'],
  embeddableFields: ['name', 'description'],
});

const ada = Entity.create({ name: 'Ada', description: 'mathematician' }, { id: 'e1', belongsToSet: ['people'] });
const bob = Entity.create({ name: 'Bob', description: 'builder' }, { id: 'e2', belongsToSet: ['people'] });

describe('Hybrid store lifecycle', () => {
  const { ctx } = setupTestStore({
    'Ada mathematician': [1, 0],
    'Bob builder': [0, 1],
    Ada: [1, 0],
    Bob: [0, 1],
  });

  it('should keep vectors and graph for the same entities side by side', async () => {
    await ctx.store.createCollection('Entity');
    await ctx.store.createDataPoints('Entity', [ada, bob]);
    await ctx.store.indexDataPoints('Entity', 'name', [ada, bob]);
    await ctx.store.addNodes([ada, bob].map(toGraphNode));
    await ctx.store.addEdge('e1', 'e2', 'works_with');

    const [hit] = await ctx.store.search('entity_name', { queryText: 'Bob', limit: 1 });
    expect(hit?.id).toBe('e2');
    expect(ids(await ctx.store.getSuccessors(hit?.id ?? ''))).toEqual([]);
    expect(ids(await ctx.store.getPredecessors('e2'))).toEqual(['e1']);
    expect(await ctx.store.collections.listCollections()).toEqual(['entity', 'entity_name']);
  });

  it('should run concurrent writes on both halves', async () => {
    await ctx.store.createCollection('entity');
    await Promise.all([
      ctx.store.createDataPoints('entity', [ada]),
      ctx.store.addNode(toGraphNode(ada)),
      ctx.store.createDataPoints('entity', [bob]),
      ctx.store.addNode(toGraphNode(bob)),
    ]);

    expect((await ctx.store.retrieve('entity', ['e1', 'e2'])).map(p => p.id)).toEqual(['e1', 'e2']);
    expect(ids((await ctx.store.getGraphData()).nodes)).toEqual(['e1', 'e2']);
  });

  describe('prune', () => {
    it('should drop every collection and the graph', async () => {
      await ctx.store.createCollection('entity');
      await ctx.store.createDataPoints('entity', [ada]);
      await ctx.store.addNode(toGraphNode(ada));

      await ctx.store.prune();

      expect(await ctx.store.hasCollection('entity')).toBe(false);
      expect(await ctx.store.query("SELECT name FROM sqlite_master WHERE type = 'table'")).toEqual([]);
      expect(await ctx.store.search('entity', { queryVector: [1, 0] })).toEqual([]);
    });

    it('should leave the store usable', async () => {
      await ctx.store.createCollection('entity');
      await ctx.store.prune();

      await ctx.store.createCollection('entity');
      await ctx.store.createDataPoints('entity', [ada]);
      await ctx.store.addNode(toGraphNode(ada));

      expect((await ctx.store.retrieve('entity', ['e1'])).map(p => p.id)).toEqual(['e1']);
      expect(await ctx.store.hasNode('e1')).toBe(true);
    });

    it('should succeed on an empty store', async () => {
      await expect(ctx.store.prune()).resolves.toBeUndefined();
    });
  });

  describe('close', () => {
    it('should refuse work after close', async () => {
      await ctx.store.createCollection('entity');
      await ctx.store.close();

      expect(await ctx.store.hasCollection('entity')).toBe(false);
      await expect(ctx.store.createCollection('entity')).rejects.toBeInstanceOf(StoreClosedError);
      await expect(ctx.store.addNode(toGraphNode(ada))).rejects.toBeInstanceOf(StoreClosedError);
    });
  });
});

describe('createHybridStore', () => {
  let store: HybridStore | null = null;

  afterEach(async () => {
    await store?.close();
    store = null;
  });

  it('should build the embedding engine from config', async () => {
    store = createHybridStore(testConfig());
    await expect(store.embedData(['x'])).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });
});

function ids(nodes: { id: string }[]): string[] {
  return nodes.map(n => n.id);
}
