/**
 * Source document types: the subset of Swagger 2.0 the generator reads.
 * Only the top level is checked against a schema; everything below `paths`
 * and `definitions` is read node by node with type guards.
 */

import type { JsonValue, SchemaNode } from './schema';

export interface SwaggerInfo {
  title?: string;
  version?: string;
  description?: string;
}

export type SecurityRequirement = Record<string, string[]>;

export interface SwaggerDocument {
  swagger?: string;
  info?: SwaggerInfo;
  host?: string;
  basePath?: string;
  schemes?: string[];
  consumes?: string[];
  security?: SecurityRequirement[];
  definitions?: Record<string, unknown>;
  paths?: Record<string, Record<string, unknown>>;
}

// ── Parsed operations ────────────────────────────────────────────────

export const HTTP_METHODS = ['get', 'post', 'put', 'delete', 'patch', 'head', 'options', 'trace'] as const;
export type HttpMethod = typeof HTTP_METHODS[number];

/** Methods that carry a request body. */
export const BODY_METHODS: ReadonlySet<HttpMethod> = new Set<HttpMethod>(['post', 'put', 'patch']);

export type ParameterLocation = 'path' | 'query' | 'header' | 'body' | 'formData';

export interface Parameter {
  name: string;
  location: ParameterLocation;
  example?: JsonValue;
  /** Only body parameters carry a schema. */
  schema?: SchemaNode;
}

export interface Operation {
  path: string;
  method: HttpMethod;
  summary?: string;
  description?: string;
  parameters: Parameter[];
  consumes: string[];
  secured: boolean;
  tags: string[];
}
