export type { VectorStore, ScoredResult, StoredDataPoint, SearchOptions, BatchSearchOptions } from './interface.js';
export { SqliteVectorStore } from './store.js';
export { cosineSimilarity, rankBySimilarity, type Ranked } from './similarity.js';
