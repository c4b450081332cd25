import { describe, it, expect } from '@jest/globals';
import { BoundedResultCache, cacheKey, fingerprint } from '../tools/access-cache';
import type { ToolResult } from '../tools/types';

const noData = (category: string): ToolResult => ({ status: 'no_data', tool: 'rating_distribution', categories: [category] });

describe('fingerprint', () => {
  it('ignores parameter order and category list order', () => {
    const a = fingerprint({
      tool: 'metrics_top_categories',
      parameters: { metric: 'nps', top_n: 3, order: 'top', categories: ['B', 'A'] },
    });
    const b = fingerprint({
      tool: 'metrics_top_categories',
      parameters: { categories: ['A', 'B'], order: 'top', top_n: 3, metric: 'nps' },
    });
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it('separates different parameters', () => {
    expect(fingerprint({ tool: 'rating_distribution', parameters: { category: 'A' } }))
      .not.toBe(fingerprint({ tool: 'rating_distribution', parameters: { category: 'B' } }));
  });

  it('treats an absent optional parameter like an undefined one', () => {
    expect(fingerprint({ tool: 'general_query', parameters: { query_type: 'summary_stats' } }))
      .toBe(fingerprint({ tool: 'general_query', parameters: { query_type: 'summary_stats', category: undefined } }));
  });
});

describe('cacheKey', () => {
  it('is generational in the access version', () => {
    expect(cacheKey(7, 2, 'abc')).toBe('7:2:abc');
    expect(cacheKey(7, 3, 'abc')).not.toBe(cacheKey(7, 2, 'abc'));
  });
});

describe('BoundedResultCache', () => {
  it('evicts the oldest insertion at capacity', () => {
    const cache = new BoundedResultCache(2);
    cache.set('a', noData('A'));
    cache.set('b', noData('B'));
    cache.set('c', noData('C'));

    expect(cache.size).toBe(2);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('c')).toEqual(noData('C'));
  });

  it('overwrites an existing key without evicting', () => {
    const cache = new BoundedResultCache(2);
    cache.set('a', noData('A'));
    cache.set('b', noData('B'));
    cache.set('a', noData('Z'));

    expect(cache.size).toBe(2);
    expect(cache.get('a')).toEqual(noData('Z'));
    expect(cache.get('b')).toEqual(noData('B'));
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new BoundedResultCache(0)).toThrow('Cache capacity must be a positive integer, got 0');
  });
});
