import type { JsonObject, JsonValue, SchemaNode, SchemaRegistry } from '../models/schema';
import type { DiagnosticSink } from '../models/errors';
import { resolveReference } from './refResolver';

/** Nodes nested deeper than this synthesize to an empty object. */
export const MAX_SYNTHESIS_DEPTH = 4;

export interface SynthesisContext {
  definitions: SchemaRegistry;
  report?: DiagnosticSink;
}

/**
 * Produce one representative value for a schema node.
 * Never throws; unresolvable or unsupported shapes become `{}`.
 */
export function synthesize(schema: SchemaNode, ctx: SynthesisContext, depth = 0): JsonValue {
  // Checked before references so self-referential chains terminate
  if (depth > MAX_SYNTHESIS_DEPTH) {
    ctx.report?.({
      code: 'depth-limit-reached',
      subject: schema.kind === 'ref' ? schema.ref : schema.kind,
      message: `Schema nesting exceeds depth ${MAX_SYNTHESIS_DEPTH}; emitting an empty object`,
    });
    return {};
  }

  switch (schema.kind) {
    case 'ref': {
      const resolved = resolveReference(schema.ref, ctx.definitions);
      if (!resolved.ok) {
        ctx.report?.({
          code: resolved.reason,
          subject: schema.ref,
          message: resolved.reason === 'unresolvable-reference'
            ? `No definition found for ${schema.ref}`
            : `Only #/definitions/<Name> references are supported: ${schema.ref}`,
        });
        return {};
      }
      return synthesize(resolved.schema, ctx, depth + 1);
    }
    case 'string':
      return schema.enum ? schema.enum[0] : 'string';
    case 'integer':
    case 'number':
      return 0;
    case 'boolean':
      return false;
    case 'array':
      return [synthesize(schema.items, ctx, depth + 1)];
    case 'object': {
      const obj: JsonObject = {};
      for (const [field, child] of schema.properties) {
        // `__proto__` must stay an own key
        Object.defineProperty(obj, field, {
          value: synthesize(child, ctx, depth + 1),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return obj;
    }
    case 'unknown':
      if (schema.declaredType !== undefined) {
        ctx.report?.({
          code: 'unsupported-schema-shape',
          subject: schema.declaredType,
          message: `Unsupported schema type "${schema.declaredType}"; emitting an empty object`,
        });
      }
      return {};
    default:
      return assertNever(schema);
  }
}

function assertNever(schema: never): JsonValue {
  throw new Error(`Unhandled schema node: ${JSON.stringify(schema)}`);
}
