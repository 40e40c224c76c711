import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { Scalar } from 'yaml';
import { assembleCollection } from '../src/generator/collectionAssembler';
import { parseSwaggerDocument } from '../src/services/documentLoader';
import { needsQuoting, parseYaml, scalarStyle, stringifyCollection } from '../src/services/yamlParser';

const FIXTURE = path.resolve(__dirname, 'fixtures', 'world-api.json');

function fixtureCollection() {
  return assembleCollection(parseSwaggerDocument(fs.readFileSync(FIXTURE, 'utf-8'))).collection;
}

describe('scalarStyle', () => {
  it.each([
    ['Health check', Scalar.PLAIN],
    ['application/json', Scalar.PLAIN],
    ['', Scalar.QUOTE_DOUBLE],
    ['#ff4a00', Scalar.QUOTE_DOUBLE],
    ['Note: read only', Scalar.QUOTE_DOUBLE],
    ['a, b', Scalar.QUOTE_DOUBLE],
    ['- item', Scalar.QUOTE_DOUBLE],
    ['line one\nline two', Scalar.BLOCK_LITERAL],
    ['{{ _.base_url }}/x', Scalar.BLOCK_FOLDED],
  ])('styles %j as %s', (value, style) => {
    expect(scalarStyle(value)).toBe(style);
  });
});

describe('needsQuoting', () => {
  it('quotes every YAML-significant character', () => {
    for (const ch of ':{}[]&*?|>!%@`#,') {
      expect(needsQuoting(`a${ch}b`)).toBe(true);
    }
  });

  it('leaves a dash without a following space alone', () => {
    expect(needsQuoting('-1 offset')).toBe(false);
    expect(needsQuoting('well-known')).toBe(false);
  });
});

describe('stringifyCollection', () => {
  it('round-trips to the same collection', () => {
    const collection = fixtureCollection();
    expect(parseYaml(stringifyCollection(collection))).toEqual(collection);
  });

  it('writes the document header first', () => {
    const lines = stringifyCollection(fixtureCollection()).split('\n');
    expect(lines.slice(0, 2)).toEqual(['type: collection.insomnia.rest/5.0', 'name: Sample World API (1.2.0)']);
  });

  it('renders templates as folded blocks and bodies as literal blocks', () => {
    const text = stringifyCollection(fixtureCollection());
    expect(text).toMatch(/^ +- url: >-$/m);
    expect(text).toMatch(/^ +\{\{ _\.base_url \}\}\/characters\/\{\{ _\.id \}\}$/m);
    expect(text).toMatch(/^ +text: \|-$/m);
    expect(text).toMatch(/^ +"kind": "crude",$/m);
  });

  it('quotes strings with YAML-significant characters', () => {
    const text = stringifyCollection(fixtureCollection());
    expect(text).toMatch(/^ +color: "#ff4a00"$/m);
    expect(text).toMatch(/^ +base_path: ""$/m);
    expect(text).toMatch(/^ +api_key: changeme$/m);
  });

  it('escapes backslashes and double quotes', () => {
    const collection = fixtureCollection();
    collection.name = 'Say "hi": C:\\temp';
    expect(stringifyCollection(collection).split('\n')[1]).toBe('name: "Say \\"hi\\": C:\\\\temp"');
  });

  it('quotes plain strings that would read back as other types', () => {
    const collection = fixtureCollection();
    collection.name = 'true';
    expect(stringifyCollection(collection).split('\n')[1]).toBe('name: "true"');
  });

  it('does not fold long lines', () => {
    const collection = fixtureCollection();
    collection.name = 'word '.repeat(40).trim();
    expect(stringifyCollection(collection).split('\n')[1]).toBe(`name: ${collection.name}`);
  });

  it('ends with a newline', () => {
    expect(stringifyCollection(fixtureCollection()).endsWith('\n')).toBe(true);
  });
});
