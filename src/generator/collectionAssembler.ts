import type { GeneratorConfig } from '../models/config';
import type { Diagnostic } from '../models/errors';
import { DiagnosticCollector } from '../models/errors';
import type { BaseEnvironment, CookieJar, InsomniaCollection, InsomniaFolder, InsomniaRequest } from '../models/insomnia';
import { COLLECTION_TYPE } from '../models/insomnia';
import type { SwaggerDocument } from '../models/swagger';
import { API_KEY_VAR, BASE_URL_VAR, templateVar } from '../models/varPattern';
import {
  COLLECTION_TIMESTAMP,
  ID_PREFIX,
  ITEM_TIMESTAMP,
  SEEDS,
  SortKeyCounter,
  folderSeed,
  requestSeed,
  stableId,
} from './identity';
import { DEFAULT_FALLBACK_TAG, DEFAULT_TAG_ORDER, groupOperations } from './operationGrouper';
import { emitRequest, type EmitContext } from './requestEmitter';
import { buildSchemaRegistry } from './schemaParser';
import { collectOperations } from './swaggerParser';

export const DEFAULT_CONFIG: GeneratorConfig = {
  tagOrder: [...DEFAULT_TAG_ORDER],
  fallbackTag: DEFAULT_FALLBACK_TAG,
  environment: {
    name: 'Default',
    apiKey: 'changeme',
    color: '#ff4a00',
  },
  timestamps: {
    collection: COLLECTION_TIMESTAMP,
    items: ITEM_TIMESTAMP,
  },
};

export interface AssembleStats {
  folders: number;
  requests: number;
  operations: number;
}

export interface AssembleResult {
  collection: InsomniaCollection;
  diagnostics: readonly Diagnostic[];
  stats: AssembleStats;
}

/**
 * Build the whole Insomnia collection for a source document.
 * Pure: the same document and config always give an identical collection.
 */
export function assembleCollection(doc: SwaggerDocument, config: GeneratorConfig = DEFAULT_CONFIG): AssembleResult {
  const collector = new DiagnosticCollector();
  const operations = collectOperations(doc, collector.report);
  const groups = groupOperations(operations, { tagOrder: config.tagOrder, fallbackTag: config.fallbackTag });

  const ctx: EmitContext = {
    definitions: buildSchemaRegistry(doc.definitions),
    report: collector.report,
    timestamp: config.timestamps.items,
  };
  const sortKeys = new SortKeyCounter(-config.timestamps.items);
  const usedSeeds = new Set<string>();

  const folders = groups.map((group): InsomniaFolder => {
    const meta = {
      id: stableId(ID_PREFIX.folder, folderSeed(group.tag)),
      created: config.timestamps.items,
      modified: config.timestamps.items,
      sortKey: sortKeys.take(),
    };

    const children = group.operations.map((op): InsomniaRequest =>
      emitRequest(op, sortKeys.take(), ctx, uniqueSeed(requestSeed(op.method, op.path), group.tag, usedSeeds)),
    );

    return {
      name: group.tag,
      meta,
      children,
      ...(group.secured ? { authentication: { type: 'bearer' as const, token: templateVar(API_KEY_VAR) } } : {}),
    };
  });

  const collection: InsomniaCollection = {
    type: COLLECTION_TYPE,
    name: config.collectionName ?? defaultCollectionName(doc),
    meta: {
      id: stableId(ID_PREFIX.collection, SEEDS.collection),
      created: config.timestamps.collection,
      modified: config.timestamps.collection,
    },
    collection: folders,
    cookieJar: buildCookieJar(config),
    environments: buildEnvironments(doc, config),
  };

  return {
    collection,
    diagnostics: collector.diagnostics,
    stats: {
      folders: folders.length,
      requests: folders.reduce((n, f) => n + f.children.length, 0),
      operations: operations.length,
    },
  };
}

/**
 * First use keeps the plain seed; a repeat in another folder gets `@tag`,
 * and further repeats (case-variant method keys) a counter on top.
 */
function uniqueSeed(base: string, tag: string, used: Set<string>): string {
  let seed = base;
  if (used.has(seed)) seed = `${base}@${tag}`;
  for (let n = 2; used.has(seed); n++) seed = `${base}@${tag}#${n}`;
  used.add(seed);
  return seed;
}

export function defaultCollectionName(doc: SwaggerDocument): string {
  return `${doc.info?.title || 'API'} (${doc.info?.version || 'unknown'})`;
}

// ── Cookie jar & environments ───────────────────────────────────────

function buildCookieJar(config: GeneratorConfig): CookieJar {
  return {
    name: 'Default Jar',
    meta: {
      id: stableId(ID_PREFIX.cookieJar, SEEDS.cookieJar),
      created: config.timestamps.collection + 2,
      modified: config.timestamps.collection + 2,
    },
  };
}

function buildEnvironments(doc: SwaggerDocument, config: GeneratorConfig): BaseEnvironment {
  const env = config.environment;
  return {
    name: 'Base Environment',
    meta: {
      id: stableId(ID_PREFIX.environment, SEEDS.baseEnvironment),
      created: config.timestamps.collection + 1,
      modified: config.timestamps.collection + 1,
      isPrivate: false,
    },
    data: {
      scheme: env.scheme ?? doc.schemes?.[0] ?? 'https',
      base_path: normalizeBasePath(env.basePath ?? doc.basePath ?? ''),
      [BASE_URL_VAR]: `${templateVar('scheme')}://${templateVar('host')}${templateVar('base_path')}`,
    },
    subEnvironments: [
      {
        name: env.name,
        meta: {
          id: stableId(ID_PREFIX.environment, SEEDS.subEnvironment),
          created: config.timestamps.items,
          modified: config.timestamps.items,
          isPrivate: false,
          sortKey: config.timestamps.items,
        },
        data: {
          host: env.host ?? doc.host ?? 'localhost',
          [API_KEY_VAR]: env.apiKey,
        },
        color: env.color,
      },
    ],
  };
}

/** `/` and trailing slashes are dropped so request paths can be appended directly. */
function normalizeBasePath(basePath: string): string {
  return basePath.replace(/\/+$/, '');
}
