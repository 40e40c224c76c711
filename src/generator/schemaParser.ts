import type { SchemaNode, SchemaRegistry } from '../models/schema';
import { isJsonValue, isRecord } from '../models/schema';

/**
 * Convert a raw Swagger schema object into a SchemaNode.
 * Total: any input, however malformed, yields a node.
 */
export function parseSchema(raw: unknown): SchemaNode {
  if (!isRecord(raw)) return { kind: 'unknown' };

  // $ref wins over any sibling keys
  if ('$ref' in raw) {
    return typeof raw.$ref === 'string' ? { kind: 'ref', ref: raw.$ref } : { kind: 'unknown' };
  }

  const type = raw.type;
  if (type === undefined) return parseObject(raw);

  switch (type) {
    case 'string': {
      const values = Array.isArray(raw.enum) ? raw.enum.filter(isJsonValue) : [];
      return values.length > 0 ? { kind: 'string', enum: values } : { kind: 'string' };
    }
    case 'integer':
      return { kind: 'integer' };
    case 'number':
      return { kind: 'number' };
    case 'boolean':
      return { kind: 'boolean' };
    case 'array':
      return { kind: 'array', items: parseSchema(raw.items) };
    case 'object':
      return parseObject(raw);
    default:
      if ('properties' in raw) return parseObject(raw);
      return typeof type === 'string' ? { kind: 'unknown', declaredType: type } : { kind: 'unknown' };
  }
}

function parseObject(raw: Record<string, unknown>): SchemaNode {
  const props = isRecord(raw.properties) ? raw.properties : {};
  return {
    kind: 'object',
    properties: Object.entries(props).map(([name, child]): [string, SchemaNode] => [name, parseSchema(child)]),
    additionalProperties: 'additionalProperties' in raw,
  };
}

/** Parse every entry of a document's `definitions` map. */
export function buildSchemaRegistry(definitions: Record<string, unknown> | undefined): SchemaRegistry {
  const registry = new Map<string, SchemaNode>();
  for (const [name, raw] of Object.entries(definitions ?? {})) {
    registry.set(name, parseSchema(raw));
  }
  return registry;
}
