import { describe, it, expect } from 'vitest';
import { SortKeyCounter, folderSeed, requestSeed, stableId } from '../src/generator/identity';

describe('stableId', () => {
  it('formats prefix and md5 digest of the seed', () => {
    expect(stableId('req', requestSeed('get', '/characters/{id}'))).toBe('req_d284e4e58c47c31e1f032018e6fcdcc0');
    expect(stableId('fld', folderSeed('chain'))).toBe('fld_4aea9b637a0759c546634ebd070f0c34');
    expect(stableId('wrk', 'workspace-collection')).toBe('wrk_197c0491e9228556d2de91e5f07b405f');
  });

  it('hashes the empty seed', () => {
    expect(stableId('x', '')).toBe('x_d41d8cd98f00b204e9800998ecf8427e');
  });

  it('is stable across calls', () => {
    expect(stableId('req', 'post:/a')).toBe(stableId('req', 'post:/a'));
    expect(stableId('req', 'post:/a')).not.toBe(stableId('req', 'put:/a'));
  });
});

describe('SortKeyCounter', () => {
  it('hands out strictly decreasing keys', () => {
    const counter = new SortKeyCounter(-100);
    expect([counter.take(), counter.take(), counter.take()]).toEqual([-100, -101, -102]);
    expect(counter.take()).toBe(-103);
  });
});
