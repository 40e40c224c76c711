import type { InsomniaRequest, KeyValueEntry, RequestBody, RequestSettings } from '../models/insomnia';
import type { JsonValue } from '../models/schema';
import type { Operation, Parameter } from '../models/swagger';
import { BODY_METHODS } from '../models/swagger';
import { API_KEY_VAR, BASE_URL_VAR, templateVar } from '../models/varPattern';
import { ID_PREFIX, requestSeed, stableId } from './identity';
import { synthesize, type SynthesisContext } from './sampleSynthesizer';

export const DEFAULT_MIME_TYPE = 'application/json';

const REQUEST_SETTINGS: RequestSettings = {
  renderRequestBody: true,
  encodeUrl: true,
  followRedirects: 'global',
  cookies: { send: true, store: true },
  rebuildPath: true,
};

export interface EmitContext extends SynthesisContext {
  /** created/modified value of every emitted request. */
  timestamp: number;
}

/**
 * Render one operation as an Insomnia request.
 * `idSeed` defaults to `{method}:{path}`; the assembler overrides it when the
 * same operation appears in more than one folder.
 */
export function emitRequest(
  op: Operation,
  sortKey: number,
  ctx: EmitContext,
  idSeed: string = requestSeed(op.method, op.path),
): InsomniaRequest {
  const description = op.description?.trim();
  const body = buildBody(op, ctx);
  const headers = buildHeaders(op, body);
  const parameters = op.parameters
    .filter(p => p.location === 'query')
    .map((p): KeyValueEntry => ({ name: p.name, disabled: true, value: exampleText(p.example) }));

  return {
    url: `${templateVar(BASE_URL_VAR)}${formatUrlPath(op.path, op.parameters)}`,
    name: op.summary ?? `${op.method.toUpperCase()} ${op.path}`,
    meta: {
      id: stableId(ID_PREFIX.request, idSeed),
      created: ctx.timestamp,
      modified: ctx.timestamp,
      isPrivate: false,
      ...(description ? { description } : {}),
      sortKey,
    },
    method: op.method.toUpperCase(),
    ...(body ? { body } : {}),
    ...(headers.length ? { headers } : {}),
    ...(parameters.length ? { parameters } : {}),
    settings: { ...REQUEST_SETTINGS, cookies: { ...REQUEST_SETTINGS.cookies } },
  };
}

// ── URL ─────────────────────────────────────────────────────────────

/** Replace `{name}` path placeholders with the parameter example or a template variable. */
export function formatUrlPath(pathStr: string, params: readonly Parameter[]): string {
  let urlPath = pathStr;
  for (const p of params) {
    if (p.location !== 'path') continue;
    const replacement = hasExample(p.example) ? exampleText(p.example) : templateVar(p.name);
    urlPath = urlPath.split(`{${p.name}}`).join(replacement);
  }
  return urlPath;
}

// ── Body & headers ──────────────────────────────────────────────────

function buildBody(op: Operation, ctx: SynthesisContext): RequestBody | undefined {
  if (!BODY_METHODS.has(op.method)) return undefined;
  const bodyParam = op.parameters.find(p => p.location === 'body');
  if (!bodyParam?.schema) return undefined;

  const sample = synthesize(bodyParam.schema, ctx);
  return {
    mimeType: op.consumes[0] || DEFAULT_MIME_TYPE,
    text: JSON.stringify(sample, null, 2),
  };
}

/** Content-Type, then header parameters, then Authorization, in one list. */
function buildHeaders(op: Operation, body: RequestBody | undefined): KeyValueEntry[] {
  const headers: KeyValueEntry[] = [];
  if (body) {
    headers.push({ name: 'Content-Type', disabled: false, value: body.mimeType });
  }
  for (const p of op.parameters) {
    if (p.location !== 'header') continue;
    const lower = p.name.toLowerCase();
    if (op.secured && lower === 'authorization') continue;
    if (body && lower === 'content-type') continue;
    headers.push({ name: p.name, disabled: true, value: exampleText(p.example) });
  }
  if (op.secured) {
    headers.push({ name: 'Authorization', disabled: false, value: templateVar(API_KEY_VAR) });
  }
  return headers;
}

// ── Examples ────────────────────────────────────────────────────────

function hasExample(example: JsonValue | undefined): boolean {
  return example !== undefined && example !== null && example !== '';
}

function exampleText(example: JsonValue | undefined): string {
  if (example === undefined || example === null) return '';
  return typeof example === 'object' ? JSON.stringify(example) : String(example);
}
