/**
 * Unit tests for FifoCache
 */

import { describe, it, expect, vi } from 'vitest';
import { FifoCache } from '../../../src/shared/utils/cache.js';

describe('FifoCache', () => {
  it('should count hits and misses', () => {
    const cache = new FifoCache<number>({ capacity: 3 });
    cache.set('a', 1);

    expect(cache.get('a')).toBe(1);
    expect(cache.get('b')).toBeUndefined();
    expect(cache.getStats()).toEqual({ size: 1, capacity: 3, hits: 1, misses: 1, evictions: 0 });
  });

  it('should evict the oldest entry when full', () => {
    const cache = new FifoCache<number>({ capacity: 5, evictionRatio: 0.2 });
    ['a', 'b', 'c', 'd', 'e', 'f'].forEach((key, i) => cache.set(key, i));

    expect(cache.keys()).toEqual(['b', 'c', 'd', 'e', 'f']);
    expect(cache.getStats().evictions).toBe(1);
  });

  it('should evict a fraction of capacity in one pass', () => {
    const cache = new FifoCache<number>({ capacity: 10, evictionRatio: 0.2 });
    for (let i = 0; i <= 10; i++) {
      cache.set(`k${i}`, i);
    }

    expect(cache.keys()).toEqual(['k2', 'k3', 'k4', 'k5', 'k6', 'k7', 'k8', 'k9', 'k10']);
    expect(cache.getStats()).toMatchObject({ size: 9, evictions: 2 });
  });

  it('should keep the insertion slot when updating a key', () => {
    const cache = new FifoCache<string>({ capacity: 3 });
    cache.set('a', '1');
    cache.set('b', '2');
    cache.set('c', '3');
    cache.set('a', 'updated');
    cache.set('d', '4');

    expect(cache.keys()).toEqual(['b', 'c', 'd']);
    expect(cache.has('a')).toBe(false);
  });

  it('should compute a missing value once', () => {
    const cache = new FifoCache<string>({ capacity: 3 });
    const compute = vi.fn((key: string) => key.toUpperCase());

    expect(cache.getOrCompute('x', compute)).toBe('X');
    expect(cache.getOrCompute('x', compute)).toBe('X');
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('should not cache a computation that throws', () => {
    const cache = new FifoCache<string>({ capacity: 3 });
    expect(() =>
      cache.getOrCompute('bad', () => {
        throw new Error('nope');
      })
    ).toThrow('nope');
    expect(cache.has('bad')).toBe(false);
  });

  it('should reset entries and stats on clear', () => {
    const cache = new FifoCache<number>({ capacity: 2 });
    cache.set('a', 1);
    cache.get('a');
    cache.clear();

    expect(cache.getStats()).toEqual({ size: 0, capacity: 2, hits: 0, misses: 0, evictions: 0 });
  });

  it('should reject an invalid capacity', () => {
    expect(() => new FifoCache({ capacity: 0 })).toThrow(RangeError);
  });
});
