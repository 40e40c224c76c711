import type { Operation } from '../models/swagger';

export const DEFAULT_TAG_ORDER: readonly string[] = ['meta', 'chain', 'game'];
export const DEFAULT_FALLBACK_TAG = 'other';

export interface GroupingOptions {
  /** Tags rendered first, in this order, when present. */
  tagOrder: readonly string[];
  /** Folder for operations that declare no tags. */
  fallbackTag: string;
}

export interface FolderGroup {
  tag: string;
  operations: Operation[];
  /** True when any operation in the folder declares security. */
  secured: boolean;
}

/**
 * Partition operations into tag folders.
 * Preferred tags come first, then the rest in first-seen order; within a
 * folder operations are sorted by (path, method).
 */
export function groupOperations(
  operations: readonly Operation[],
  options: GroupingOptions = { tagOrder: DEFAULT_TAG_ORDER, fallbackTag: DEFAULT_FALLBACK_TAG },
): FolderGroup[] {
  const byTag = new Map<string, Operation[]>();

  for (const op of operations) {
    const tags = op.tags.length > 0 ? op.tags : [options.fallbackTag];
    for (const tag of new Set(tags)) {
      let bucket = byTag.get(tag);
      if (!bucket) {
        bucket = [];
        byTag.set(tag, bucket);
      }
      bucket.push(op);
    }
  }

  const ordered = [
    ...options.tagOrder.filter(t => byTag.has(t)),
    ...Array.from(byTag.keys()).filter(t => !options.tagOrder.includes(t)),
  ];

  return Array.from(new Set(ordered), tag => {
    const ops = [...(byTag.get(tag) ?? [])].sort(compareOperations);
    return { tag, operations: ops, secured: ops.some(op => op.secured) };
  });
}

/** Case-sensitive lexical order by path, then method. */
export function compareOperations(a: Operation, b: Operation): number {
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  if (a.method !== b.method) return a.method < b.method ? -1 : 1;
  return 0;
}
