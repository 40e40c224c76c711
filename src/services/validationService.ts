import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import type { GeneratorConfigFile } from '../models/config';
import type { InsomniaCollection } from '../models/insomnia';
import { isRecord } from '../models/schema';
import type { SwaggerDocument } from '../models/swagger';
import collectionSchema from '../schemas/insomnia-collection.schema.json';
import configSchema from '../schemas/generator-config.schema.json';
import swaggerSchema from '../schemas/swagger-document.schema.json';

// ── Types ───────────────────────────────────────────────────────────

export interface ValidationError {
  path: string;
  message: string;
  hint?: string;
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: ValidationError[] };

// ── Validators ──────────────────────────────────────────────────────

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSwagger = ajv.compile<SwaggerDocument>(swaggerSchema);
const validateConfigFile = ajv.compile<GeneratorConfigFile>(configSchema);
const validateCollectionShape = ajv.compile<InsomniaCollection>(collectionSchema);

function runValidator<T>(validate: ValidateFunction<T>, value: unknown): ValidationResult<T> {
  if (validate(value)) return { ok: true, value };
  return { ok: false, errors: formatErrors(validate.errors) };
}

/** Loose check of the Swagger 2.0 top level; nested content is checked while parsing. */
export function validateSourceDocument(value: unknown): ValidationResult<SwaggerDocument> {
  return runValidator(validateSwagger, value);
}

export function validateConfig(value: unknown): ValidationResult<GeneratorConfigFile> {
  return runValidator(validateConfigFile, value);
}

/** Validate a collection against the bundled schema, then check that every meta id is unique. */
export function validateCollection(value: unknown): ValidationResult<InsomniaCollection> {
  const result = runValidator(validateCollectionShape, value);
  if (!result.ok) return result;

  const duplicates = findDuplicateIds(result.value);
  if (duplicates.length) {
    return {
      ok: false,
      errors: duplicates.map(id => ({
        path: '(meta.id)',
        message: `Duplicate id "${id}"`,
        hint: 'Every folder, request and environment needs its own id.',
      })),
    };
  }
  return result;
}

function findDuplicateIds(collection: InsomniaCollection): string[] {
  const ids = [
    collection.meta.id,
    collection.cookieJar.meta.id,
    collection.environments.meta.id,
    ...collection.environments.subEnvironments.map(e => e.meta.id),
    ...collection.collection.flatMap(f => [f.meta.id, ...f.children.map(r => r.meta.id)]),
  ];
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return Array.from(duplicates);
}

// ── Error formatting ────────────────────────────────────────────────

function formatErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return [];
  return errors.map(e => {
    const result: ValidationError = {
      path: e.instancePath || '(root)',
      message: e.message || 'unknown error',
    };
    const hint = generateHint(e);
    if (hint) result.hint = hint;
    return result;
  });
}

function generateHint(e: ErrorObject): string | undefined {
  const params: Record<string, unknown> = isRecord(e.params) ? e.params : {};
  switch (e.keyword) {
    case 'required':
      return `Add the missing property "${String(params.missingProperty)}" at this level.`;
    case 'type':
      return `Expected type "${String(params.type)}". Check the value is not quoted/unquoted incorrectly.`;
    case 'enum':
      return Array.isArray(params.allowedValues)
        ? `Must be one of: ${params.allowedValues.map(String).join(', ')}`
        : undefined;
    case 'additionalProperties':
      return `Remove or rename the unknown property "${String(params.additionalProperty)}".`;
    case 'pattern':
      return `Value must match pattern: ${String(params.pattern)}`;
    case 'minItems':
      return `Array must have at least ${String(params.limit)} item(s).`;
    case 'maxItems':
      return `Array must have at most ${String(params.limit)} item(s).`;
    case 'minLength':
      return `String must be at least ${String(params.limit)} character(s) long.`;
    default:
      return undefined;
  }
}

/** One line per error, for log output. */
export function describeErrors(errors: readonly ValidationError[]): string[] {
  return errors.map(e => `${e.path}: ${e.message}${e.hint ? ` (${e.hint})` : ''}`);
}
