import type { DiagnosticSink } from '../models/errors';
import { isJsonValue, isRecord } from '../models/schema';
import type { HttpMethod, Operation, Parameter, ParameterLocation, SwaggerDocument } from '../models/swagger';
import { HTTP_METHODS } from '../models/swagger';
import { parseSchema } from './schemaParser';

const PARAMETER_LOCATIONS: readonly ParameterLocation[] = ['path', 'query', 'header', 'body', 'formData'];

/**
 * Flatten `paths` into operations, in document order.
 * Operation objects without `responses` are not valid operations and are skipped.
 */
export function collectOperations(doc: SwaggerDocument, report?: DiagnosticSink): Operation[] {
  const operations: Operation[] = [];
  const defaultConsumes = stringList(doc.consumes);
  const defaultSecured = Array.isArray(doc.security) && doc.security.length > 0;

  for (const [pathStr, pathItem] of Object.entries(doc.paths ?? {})) {
    if (!isRecord(pathItem)) continue;
    const sharedParams = parseParameters(pathItem.parameters);

    for (const [key, op] of Object.entries(pathItem)) {
      const method = toHttpMethod(key);
      if (!method || !isRecord(op)) continue;

      if (!('responses' in op)) {
        report?.({
          code: 'malformed-operation',
          subject: `${method.toUpperCase()} ${pathStr}`,
          message: 'Operation has no responses and was skipped',
        });
        continue;
      }

      const consumes = stringList(op.consumes);
      operations.push({
        path: pathStr,
        method,
        ...(typeof op.summary === 'string' ? { summary: op.summary } : {}),
        ...(typeof op.description === 'string' ? { description: op.description } : {}),
        parameters: mergeParameters(sharedParams, parseParameters(op.parameters)),
        consumes: 'consumes' in op ? consumes : defaultConsumes,
        secured: Array.isArray(op.security) ? op.security.length > 0 : defaultSecured,
        tags: stringList(op.tags),
      });
    }
  }

  return operations;
}

function toHttpMethod(key: string): HttpMethod | undefined {
  const lower = key.toLowerCase();
  return HTTP_METHODS.find(m => m === lower);
}

// ── Parameters ──────────────────────────────────────────────────────

function parseParameters(raw: unknown): Parameter[] {
  if (!Array.isArray(raw)) return [];
  const params: Parameter[] = [];
  for (const p of raw) {
    const param = parseParameter(p);
    if (param) params.push(param);
  }
  return params;
}

function parseParameter(raw: unknown): Parameter | undefined {
  if (!isRecord(raw) || typeof raw.name !== 'string' || raw.name === '') return undefined;
  const location = PARAMETER_LOCATIONS.find(l => l === raw.in);
  if (!location) return undefined;

  const param: Parameter = { name: raw.name, location };
  const example = raw.example !== undefined ? raw.example : raw['x-example'];
  if (example !== undefined && isJsonValue(example)) param.example = example;
  if (location === 'body' && 'schema' in raw) param.schema = parseSchema(raw.schema);
  return param;
}

/** Path-item parameters first; an operation parameter replaces one with the same location and name. */
function mergeParameters(shared: Parameter[], own: Parameter[]): Parameter[] {
  const merged = new Map<string, Parameter>();
  for (const p of [...shared, ...own]) {
    merged.set(`${p.location}:${p.name}`, p);
  }
  return Array.from(merged.values());
}

// ── Utility ─────────────────────────────────────────────────────────

function stringList(raw: unknown): string[] {
  return Array.isArray(raw) ? raw.filter((v): v is string => typeof v === 'string') : [];
}
