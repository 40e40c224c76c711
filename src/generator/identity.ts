import { createHash } from 'crypto';

/** Collection-level timestamp base; the base environment and cookie jar are offset from it. */
export const COLLECTION_TIMESTAMP = 1749660438111;
/** Timestamp of every folder, request and sub-environment; its negation seeds the sort keys. */
export const ITEM_TIMESTAMP = 1749660554120;

export const ID_PREFIX = {
  collection: 'wrk',
  folder: 'fld',
  request: 'req',
  cookieJar: 'jar',
  environment: 'env',
} as const;

export const SEEDS = {
  collection: 'workspace-collection',
  cookieJar: 'default-cookie-jar',
  baseEnvironment: 'base-environment',
  subEnvironment: 'sub-environment',
} as const;

/** Deterministic Insomnia-style id: `<prefix>_<md5 hex of seed>`. */
export function stableId(prefix: string, seed: string): string {
  const digest = createHash('md5').update(seed, 'utf8').digest('hex');
  return `${prefix}_${digest}`;
}

export function requestSeed(method: string, path: string): string {
  return `${method}:${path}`;
}

export function folderSeed(tag: string): string {
  return `folder:${tag}`;
}

/**
 * Strictly decreasing sort keys. Each rendered item takes the current value,
 * so items read top-to-bottom in the client in emission order.
 */
export class SortKeyCounter {
  private _next: number;

  constructor(start: number) {
    this._next = start;
  }

  take(): number {
    return this._next--;
  }
}
