import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_CONFIG, assembleCollection, defaultCollectionName } from '../src/generator/collectionAssembler';
import { generateCollection } from '../src/generator';
import { stableId } from '../src/generator/identity';
import { validateCollection } from '../src/services/validationService';
import { resolveConfig } from '../src/services/configService';
import { parseSwaggerDocument } from '../src/services/documentLoader';
import type { SwaggerDocument } from '../src/models/swagger';

// ── Helpers ──────────────────────────────────────────────────────────

const FIXTURE = path.resolve(__dirname, 'fixtures', 'world-api.json');

function loadFixture(): SwaggerDocument {
  return parseSwaggerDocument(fs.readFileSync(FIXTURE, 'utf-8'), FIXTURE);
}

const ok = { 200: { description: 'ok' } };

// ── Tests ────────────────────────────────────────────────────────────

describe('assembleCollection', () => {

  describe('structure', () => {
    it('orders folders and requests', () => {
      const { collection } = assembleCollection(loadFixture());
      expect(collection.collection.map(f => [f.name, f.children.map(r => r.name)])).toEqual([
        ['meta', ['Chain configuration', 'Health check']],
        ['chain', ['List characters', 'Get character']],
        ['game', ['Update fuel']],
        ['other', ['Untagged']],
      ]);
    });

    it('assigns strictly decreasing sort keys in reading order', () => {
      const { collection } = assembleCollection(loadFixture());
      const keys = collection.collection.flatMap(f => [f.meta.sortKey, ...f.children.map(r => r.meta.sortKey)]);
      expect(keys).toEqual([
        -1749660554120, -1749660554121, -1749660554122,
        -1749660554123, -1749660554124, -1749660554125,
        -1749660554126, -1749660554127,
        -1749660554128, -1749660554129,
      ]);
    });

    it('derives folder and collection ids from fixed seeds', () => {
      const { collection } = assembleCollection(loadFixture());
      expect(collection.meta).toEqual({ id: 'wrk_197c0491e9228556d2de91e5f07b405f', created: 1749660438111, modified: 1749660438111 });
      expect(collection.collection[1].meta.id).toBe('fld_4aea9b637a0759c546634ebd070f0c34');
      expect(collection.collection[1].children[1].meta.id).toBe('req_d284e4e58c47c31e1f032018e6fcdcc0');
    });

    it('names the collection after the document title and version', () => {
      const { collection } = assembleCollection(loadFixture());
      expect(collection.type).toBe('collection.insomnia.rest/5.0');
      expect(collection.name).toBe('Sample World API (1.2.0)');
    });

    it('reports stats and diagnostics', () => {
      const { stats, diagnostics } = assembleCollection(loadFixture());
      expect(stats).toEqual({ folders: 4, requests: 6, operations: 6 });
      expect(diagnostics.map(d => `${d.code} ${d.subject}`)).toEqual(['malformed-operation POST /draft']);
    });
  });

  describe('requests', () => {
    it('renders the secured PATCH body request', () => {
      const { collection } = assembleCollection(loadFixture());
      const req = collection.collection[2].children[0];
      expect(req.url).toBe('{{ _.base_url }}/fuel/0x42');
      expect(req.method).toBe('PATCH');
      expect(req.body).toEqual({
        mimeType: 'application/json',
        text: '{\n  "kind": "crude",\n  "amount": 0,\n  "burning": false\n}',
      });
      expect(req.headers?.map(h => h.name)).toEqual(['Content-Type', 'Authorization']);
    });

    it('keeps a multi-line description without the trailing newline', () => {
      const { collection } = assembleCollection(loadFixture());
      expect(collection.collection[0].children[0].meta.description).toBe('Returns the chain config.\nIncludes contract addresses.');
    });
  });

  describe('authentication', () => {
    it('adds bearer auth only to folders with a secured operation', () => {
      const { collection } = assembleCollection(loadFixture());
      expect(collection.collection.map(f => f.authentication ?? null)).toEqual([
        null,
        null,
        { type: 'bearer', token: '{{ _.api_key }}' },
        null,
      ]);
    });

    it('secures a folder when one of several operations is secured', () => {
      const { collection } = assembleCollection({
        paths: {
          '/open': { get: { tags: ['game'], responses: ok } },
          '/locked': { post: { tags: ['game'], security: [{ Bearer: [] }], responses: ok } },
        },
      });
      const [folder] = collection.collection;
      expect(folder.authentication).toEqual({ type: 'bearer', token: '{{ _.api_key }}' });
      expect(folder.children.map(r => (r.headers ?? []).filter(h => h.name === 'Authorization').length)).toEqual([1, 0]);
    });
  });

  describe('multi-tag operations', () => {
    it('gives the repeated request a distinct id', () => {
      const { collection } = assembleCollection({
        paths: { '/characters/{id}': { get: { tags: ['chain', 'game'], responses: ok } } },
      });
      expect(collection.collection.map(f => f.children[0].meta.id)).toEqual([
        'req_d284e4e58c47c31e1f032018e6fcdcc0',
        'req_5c7aef97c5b5de0408cbd19ff52fcbfc',
      ]);
    });

    it('keeps ids unique for case-variant method keys', () => {
      const { collection } = assembleCollection({
        paths: { '/x': { get: { responses: ok }, GET: { responses: ok }, Get: { responses: ok } } },
      });
      expect(collection.collection[0].children.map(r => r.meta.id)).toEqual([
        stableId('req', 'get:/x'),
        stableId('req', 'get:/x@other'),
        stableId('req', 'get:/x@other#2'),
      ]);
      expect(validateCollection(collection).ok).toBe(true);
    });
  });

  describe('incomplete input', () => {
    it('drops parameters without a name and still validates', () => {
      const { collection } = assembleCollection({
        paths: {
          '/x': {
            get: {
              parameters: [{ name: '', in: 'query' }, { name: '', in: 'header' }, { name: 'page', in: 'query' }],
              responses: {},
            },
          },
        },
      });
      const request = collection.collection[0].children[0];
      expect(request.parameters).toEqual([{ name: 'page', disabled: true, value: '' }]);
      expect(request).not.toHaveProperty('headers');
      expect(validateCollection(collection).ok).toBe(true);
    });
  });

  describe('environments', () => {
    it('builds the base environment and one sub-environment from the document', () => {
      const { collection } = assembleCollection(loadFixture());
      const env = collection.environments;
      expect(env.name).toBe('Base Environment');
      expect(env.meta).toMatchObject({ created: 1749660438112, modified: 1749660438112, isPrivate: false });
      expect(env.data).toEqual({
        scheme: 'https',
        base_path: '',
        base_url: '{{ _.scheme }}://{{ _.host }}{{ _.base_path }}',
      });
      expect(env.subEnvironments).toHaveLength(1);
      expect(env.subEnvironments[0]).toMatchObject({
        name: 'Default',
        data: { host: 'api.example.test', api_key: 'changeme' },
        color: '#ff4a00',
      });
      expect(env.subEnvironments[0].meta.sortKey).toBe(1749660554120);
    });

    it('lets config override document connection values', () => {
      const config = resolveConfig(
        { environment: { scheme: 'http', basePath: '/v2/', apiKey: 'test-secret' } },
        { host: 'localhost:8080', environmentName: 'Local' },
      );
      const { collection } = assembleCollection(loadFixture(), config);
      expect(collection.environments.data.scheme).toBe('http');
      expect(collection.environments.data.base_path).toBe('/v2');
      expect(collection.environments.subEnvironments[0]).toMatchObject({
        name: 'Local',
        data: { host: 'localhost:8080', api_key: 'test-secret' },
      });
    });

    it('falls back to defaults for a bare document', () => {
      const { collection } = assembleCollection({});
      expect(collection.name).toBe('API (unknown)');
      expect(collection.collection).toEqual([]);
      expect(collection.environments.data.scheme).toBe('https');
      expect(collection.environments.subEnvironments[0].data.host).toBe('localhost');
    });

    it('places the cookie jar after the environment timestamp', () => {
      const { collection } = assembleCollection({});
      expect(collection.cookieJar.name).toBe('Default Jar');
      expect(collection.cookieJar.meta.created).toBe(1749660438113);
    });
  });

  describe('determinism', () => {
    it('produces byte-identical YAML on repeated runs', () => {
      const first = generateCollection(loadFixture(), DEFAULT_CONFIG).yaml;
      const second = generateCollection(loadFixture(), DEFAULT_CONFIG).yaml;
      expect(second).toBe(first);
    });

    it('uses configured timestamps as the sort key base', () => {
      const config = resolveConfig({ timestamps: { collection: 10, items: 500 } });
      const { collection } = assembleCollection(loadFixture(), config);
      expect(collection.meta.created).toBe(10);
      expect(collection.collection[0].meta).toMatchObject({ created: 500, sortKey: -500 });
    });
  });
});

describe('defaultCollectionName', () => {
  it('combines title and version', () => {
    expect(defaultCollectionName({ info: { title: 'Pets', version: '2' } })).toBe('Pets (2)');
  });
});
