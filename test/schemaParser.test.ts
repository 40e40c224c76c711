import { describe, it, expect } from 'vitest';
import { buildSchemaRegistry, parseSchema } from '../src/generator/schemaParser';

describe('parseSchema', () => {
  it('prefers $ref over sibling keys', () => {
    expect(parseSchema({ $ref: '#/definitions/A', type: 'string' })).toEqual({ kind: 'ref', ref: '#/definitions/A' });
  });

  it('parses nested objects in declaration order', () => {
    const node = parseSchema({
      type: 'object',
      properties: { b: { type: 'integer' }, a: { type: 'array', items: { type: 'boolean' } } },
    });
    expect(node).toEqual({
      kind: 'object',
      properties: [
        ['b', { kind: 'integer' }],
        ['a', { kind: 'array', items: { kind: 'boolean' } }],
      ],
      additionalProperties: false,
    });
  });

  it('marks additionalProperties', () => {
    expect(parseSchema({ type: 'object', additionalProperties: true })).toEqual({
      kind: 'object',
      properties: [],
      additionalProperties: true,
    });
  });

  it('keeps string enums', () => {
    expect(parseSchema({ type: 'string', enum: ['x', 'y'] })).toEqual({ kind: 'string', enum: ['x', 'y'] });
  });

  it('treats an unknown type with properties as an object', () => {
    expect(parseSchema({ type: 'record', properties: { id: { type: 'string' } } })).toEqual({
      kind: 'object',
      properties: [['id', { kind: 'string' }]],
      additionalProperties: false,
    });
  });

  it('records an unknown declared type', () => {
    expect(parseSchema({ type: 'file' })).toEqual({ kind: 'unknown', declaredType: 'file' });
  });

  it('ignores properties that are not an object', () => {
    expect(parseSchema({ type: 'object', properties: ['a'] })).toEqual({
      kind: 'object',
      properties: [],
      additionalProperties: false,
    });
  });
});

describe('buildSchemaRegistry', () => {
  it('parses every definition', () => {
    const registry = buildSchemaRegistry({ Id: { type: 'string' }, Count: { type: 'integer' } });
    expect(Array.from(registry.keys())).toEqual(['Id', 'Count']);
    expect(registry.get('Count')).toEqual({ kind: 'integer' });
  });

  it('is empty without definitions', () => {
    expect(buildSchemaRegistry(undefined).size).toBe(0);
  });
});
