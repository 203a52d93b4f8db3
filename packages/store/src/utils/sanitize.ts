/**
 * Shared sanitization utilities.
 *
 * Collection names are caller-controlled and end up in DDL, so they are
 * normalized to `[a-z][a-z0-9_-]*`, kept out of the `sqlite_` namespace and
 * always quoted. Payloads are walked into
 * plain JSON before they are stored.
 */
import { InvalidCollectionNameError } from '../errors.js';
import type { JsonObject, JsonValue } from '../models/json.js';

const MAX_COLLECTION_NAME_LENGTH = 63;
const CIRCULAR = '[Circular]';

/**
 * Normalize a caller-supplied collection name into a safe table identifier.
 * Lowercases, replaces anything outside `[a-z0-9_-]` with `_`, requires a
 * leading letter and refuses the engine's reserved `sqlite_` prefix.
 */
export function toCollectionName(raw: string): string {
  const name = raw.trim().toLowerCase().replace(/[^a-z0-9_-]/g, '_');
  if (name.length === 0) {
    throw new InvalidCollectionNameError(raw, 'name is empty');
  }
  if (!/^[a-z]/.test(name)) {
    throw new InvalidCollectionNameError(raw, 'name must start with a letter');
  }
  if (name.startsWith('sqlite_')) {
    throw new InvalidCollectionNameError(raw, 'names starting with sqlite_ are reserved');
  }
  if (name.length > MAX_COLLECTION_NAME_LENGTH) {
    throw new InvalidCollectionNameError(raw, `name exceeds ${MAX_COLLECTION_NAME_LENGTH} characters`);
  }
  return name;
}

/** Quote an identifier for SQLite */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Convert an arbitrary value into JSON-safe data.
 *
 * Dates become ISO strings, Maps become objects, Sets become arrays, bigints
 * become strings, non-finite numbers become null. Functions, symbols and
 * undefined are dropped from objects (null inside arrays). A reference back to
 * an object still being walked becomes "[Circular]"; shared but acyclic
 * references are copied.
 */
export function toJsonSafe(value: unknown): JsonValue {
  return walk(value, new Set<object>()) ?? null;
}

/** Same as toJsonSafe for a record, keeping the object shape in the type. */
export function toJsonObject(value: object): JsonObject {
  return walkEntries(Object.entries(value), new Set<object>([value]));
}

function walk(value: unknown, ancestors: Set<object>): JsonValue | undefined {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined;
  }
  if (value === null || typeof value !== 'object') return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (ancestors.has(value)) return CIRCULAR;

  ancestors.add(value);
  try {
    if (Array.isArray(value) || value instanceof Set) {
      return Array.from(value, (item: unknown) => walk(item, ancestors) ?? null);
    }
    if (value instanceof Map) {
      return walkEntries(Array.from(value, ([k, v]: [unknown, unknown]) => [String(k), v] as const), ancestors);
    }
    return walkEntries(Object.entries(value), ancestors);
  } finally {
    ancestors.delete(value);
  }
}

function walkEntries(entries: Iterable<readonly [string, unknown]>, ancestors: Set<object>): JsonObject {
  const out: JsonObject = {};
  for (const [key, item] of entries) {
    const safe = walk(item, ancestors);
    if (safe !== undefined) out[key] = safe;
  }
  return out;
}
