import type { AnyDataPoint } from '../models/data-point.js';
import type { GraphNodeInput } from './interface.js';

/**
 * Graph node for a data point: same id and type, its fields as properties.
 * The name is the point's `name` field when it has one, else its index text.
 */
export function toGraphNode(point: AnyDataPoint): GraphNodeInput {
  const fields: Record<string, unknown> = { ...point.fields };
  const name = fields.name;
  return {
    id: point.id,
    type: point.type,
    name: typeof name === 'string' ? name : point.indexText,
    belongsToSet: point.belongsToSet,
    properties: fields,
  };
}
