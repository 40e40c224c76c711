import type { SchemaNode, SchemaRegistry } from '../models/schema';

const DEFINITIONS_PREFIX = '#/definitions/';

export type ResolveResult =
  | { ok: true; name: string; schema: SchemaNode }
  | { ok: false; reason: 'unsupported-reference-kind' | 'unresolvable-reference' };

/**
 * Resolve a `#/definitions/<Name>` reference against the registry.
 * Other reference shapes (external files, other roots, pointers into a
 * definition's body) are reported as unsupported rather than thrown.
 */
export function resolveReference(ref: string, registry: SchemaRegistry): ResolveResult {
  if (!ref.startsWith(DEFINITIONS_PREFIX)) {
    return { ok: false, reason: 'unsupported-reference-kind' };
  }
  const encoded = ref.substring(DEFINITIONS_PREFIX.length);
  if (encoded === '' || encoded.includes('/')) {
    return { ok: false, reason: 'unsupported-reference-kind' };
  }

  const name = encoded.replace(/~1/g, '/').replace(/~0/g, '~');
  const schema = registry.get(name);
  if (!schema) return { ok: false, reason: 'unresolvable-reference' };
  return { ok: true, name, schema };
}
