import type { InsomniaCollection } from '../models/insomnia';
import { varPatternGlobal } from '../models/varPattern';

/** Extract all {{ _.variable }} names from a string. */
function extractVarNames(s: string, into: Set<string>): void {
  const re = varPatternGlobal();
  let m: RegExpExecArray | null;
  while ((m = re.exec(s)) !== null) into.add(m[1]);
}

/** Recursively scan all string values in an object/array. */
function scanAllStrings(obj: unknown, into: Set<string>): void {
  if (typeof obj === 'string') { extractVarNames(obj, into); return; }
  if (Array.isArray(obj)) { for (const item of obj) scanAllStrings(item, into); return; }
  if (obj && typeof obj === 'object') {
    for (const val of Object.values(obj)) scanAllStrings(val, into);
  }
}

/**
 * Variable names referenced by folders and requests (and by environment values)
 * that neither the base environment nor its sub-environments define.
 * Typically path parameters that had no example.
 */
export function findUndefinedVariables(collection: InsomniaCollection): string[] {
  const referenced = new Set<string>();
  scanAllStrings(collection.collection, referenced);
  scanAllStrings(collection.environments.data, referenced);

  const defined = new Set(Object.keys(collection.environments.data));
  for (const sub of collection.environments.subEnvironments) {
    scanAllStrings(sub.data, referenced);
    for (const key of Object.keys(sub.data)) defined.add(key);
  }

  return Array.from(referenced).filter(name => !defined.has(name)).sort();
}
