import * as fs from 'fs';
import { Document, Scalar, parse as parseYaml, visit } from 'yaml';
import type { InsomniaCollection } from '../models/insomnia';

/** Characters that force a double-quoted scalar. */
const YAML_SIGNIFICANT = /[:{}[\]&*?|>!%@`#,]/;

/**
 * Pick the output style for a string value.
 * Multi-line text is a literal block, `{{ template }}` values a folded block,
 * strings with YAML-significant characters are double-quoted, the rest plain.
 */
export function scalarStyle(value: string): Scalar.Type {
  if (value.includes('\n')) return Scalar.BLOCK_LITERAL;
  if (value.startsWith('{{')) return Scalar.BLOCK_FOLDED;
  if (needsQuoting(value)) return Scalar.QUOTE_DOUBLE;
  return Scalar.PLAIN;
}

export function needsQuoting(value: string): boolean {
  return value === '' || YAML_SIGNIFICANT.test(value) || value.startsWith('- ');
}

/** Serialize a collection document to YAML text. */
export function stringifyCollection(collection: InsomniaCollection): string {
  const doc = new Document(collection, { aliasDuplicateObjects: false });
  visit(doc, {
    Scalar(key, node) {
      if (key === 'key' || typeof node.value !== 'string') return;
      node.type = scalarStyle(node.value);
    },
  });
  return doc.toString({ lineWidth: 0, singleQuote: false });
}

export async function readYamlFile(filePath: string): Promise<unknown> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  return parseYaml(content);
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

export { parseYaml };
