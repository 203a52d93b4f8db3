import { generateId } from '../utils/helpers.js';
import { toJsonObject } from '../utils/sanitize.js';
import { InvalidDataPointError } from '../errors.js';
import type { JsonObject } from './json.js';

/**
 * Declares which fields of an entity feed its embedding and which fields get
 * their own searchable collection (`<type>_<field>`).
 */
export interface DataPointDescriptor<T extends object> {
  /** Fields joined into the embedded text; defaults to the first index field */
  readonly embeddableFields?: readonly (keyof T & string)[];
  readonly indexFields: readonly (keyof T & string)[];
}

export interface DataPoint<T extends object = Record<string, unknown>> {
  readonly id: string;
  readonly type: string;
  readonly fields: Readonly<T>;
  /** Nodeset tags used to scope subgraph extraction */
  readonly belongsToSet: readonly string[];
  readonly indexFields: readonly string[];
  /** Text sent to the embedding engine when the point is stored */
  readonly embeddableText: string;
  /** Text of the first index field */
  readonly indexText: string;
}

export type AnyDataPoint = DataPoint<object>;

export interface CreateOptions {
  id?: string;
  belongsToSet?: readonly string[];
}

export interface DataPointModel<T extends object> {
  readonly type: string;
  readonly indexFields: readonly (keyof T & string)[];
  create(fields: T, options?: CreateOptions): DataPoint<T>;
}

function textOf(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    default:
      return '';
  }
}

/**
 * Define an entity type. Field names are checked against `T` at compile time
 * and the descriptor is resolved once, here, rather than looked up per point.
 */
export function defineDataPoint<T extends object>(type: string, descriptor: DataPointDescriptor<T>): DataPointModel<T> {
  const [primary] = descriptor.indexFields;
  if (primary === undefined) {
    throw new InvalidDataPointError(`Data point type ${type} declares no index fields`, { type });
  }
  const indexFields = [...descriptor.indexFields];
  const embeddableFields = descriptor.embeddableFields?.length ? [...descriptor.embeddableFields] : [primary];

  return {
    type,
    indexFields,
    create(fields: T, options: CreateOptions = {}): DataPoint<T> {
      const id = options.id ?? generateId();
      if (id.length === 0) {
        throw new InvalidDataPointError(`Data point of type ${type} has an empty id`, { type });
      }
      return {
        id,
        type,
        fields,
        belongsToSet: [...(options.belongsToSet ?? [])],
        indexFields,
        embeddableText: embeddableFields.map(f => textOf(fields[f])).filter(t => t.length > 0).join(' '),
        indexText: textOf(fields[primary]),
      };
    },
  };
}

/** JSON snapshot stored as a row's payload */
export function snapshotDataPoint(point: AnyDataPoint): JsonObject {
  return toJsonObject({
    ...point.fields,
    id: point.id,
    type: point.type,
    ...(point.belongsToSet.length > 0 ? { belongsToSet: point.belongsToSet } : {}),
  });
}

/** Collections created by indexDataPoints hold these: the point's id and one field's text. */
export const IndexedField = defineDataPoint<{ text: string }>('IndexedField', { indexFields: ['text'] });
