/**
 * Schema model used by the sample synthesizer.
 * Raw Swagger schema objects are converted into this tagged variant once,
 * so the synthesizer can match on `kind` instead of probing loose JSON.
 */

// ── JSON values ──────────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

// ── Schema nodes ─────────────────────────────────────────────────────

export interface RefSchema { kind: 'ref'; ref: string; }
export interface StringSchema { kind: 'string'; enum?: JsonValue[]; }
export interface IntegerSchema { kind: 'integer'; }
export interface NumberSchema { kind: 'number'; }
export interface BooleanSchema { kind: 'boolean'; }
export interface ArraySchema { kind: 'array'; items: SchemaNode; }

export interface ObjectSchema {
  kind: 'object';
  /** Declared properties in document order. */
  properties: [string, SchemaNode][];
  additionalProperties: boolean;
}

export interface UnknownSchema {
  kind: 'unknown';
  /** The declared `type` when it was present but not recognised. */
  declaredType?: string;
}

export type SchemaNode =
  | RefSchema
  | StringSchema
  | IntegerSchema
  | NumberSchema
  | BooleanSchema
  | ArraySchema
  | ObjectSchema
  | UnknownSchema;

export type SchemaKind = SchemaNode['kind'];

/** Named definitions from the source document, parsed once per run. */
export type SchemaRegistry = ReadonlyMap<string, SchemaNode>;

// ── Guards ───────────────────────────────────────────────────────────

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  return value === null || ['string', 'number', 'boolean', 'object'].includes(typeof value);
}
