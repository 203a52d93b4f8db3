export { HybridStore, createHybridStore, type HybridStoreDeps } from './hybrid.js';
export * from './errors.js';
export * from './db/index.js';
export * from './embedding/index.js';
export * from './vector/index.js';
export * from './graph/index.js';
export { defineDataPoint, snapshotDataPoint, IndexedField, type DataPoint, type DataPointDescriptor, type DataPointModel, type AnyDataPoint, type CreateOptions } from './models/data-point.js';
export type { JsonValue, JsonObject, JsonPrimitive } from './models/json.js';
export * from './utils/index.js';
