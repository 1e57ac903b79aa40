/**
 * LazyResultCache Tests
 *
 * Covers pull-on-demand, cache replay, concurrent callers sharing one pull,
 * and error propagation from the source.
 */

import { describe, it, expect } from 'vitest';
import { LazyResultCache } from '../lazy-result-cache.js';
import { IndexOutOfRangeError, ValidationError } from '../errors.js';

/**
 * Source over `values` that counts how often it was pulled
 */
function countingSource<T>(values: readonly T[]): { source: AsyncGenerator<T>; pulls: () => number } {
  let pulls = 0;
  async function* generate(): AsyncGenerator<T> {
    for (const value of values) {
      pulls += 1;
      yield value;
    }
  }
  return { source: generate(), pulls: () => pulls };
}

// =============================================================================
// Index access
// =============================================================================

describe('LazyResultCache index access', () => {
  it('should pull only up to the requested index', async () => {
    const { source, pulls } = countingSource(['a', 'b', 'c', 'd', 'e']);
    const cache = new LazyResultCache(source);

    expect(await cache.at(2)).toBe('c');
    expect(pulls()).toBe(3);
    expect(cache.cachedCount).toBe(3);
    expect(cache.complete).toBe(false);
  });

  it('should serve cached indexes without pulling', async () => {
    const { source, pulls } = countingSource([1, 2, 3]);
    const cache = new LazyResultCache(source);

    await cache.at(1);
    expect(await cache.at(0)).toBe(1);
    expect(await cache.at(1)).toBe(2);
    expect(pulls()).toBe(2);
  });

  it('should drain the source for a negative index', async () => {
    const cache = new LazyResultCache(countingSource([1, 2, 3]).source);

    expect(await cache.at(-1)).toBe(3);
    expect(cache.complete).toBe(true);
  });

  it('should throw IndexOutOfRangeError past the end', async () => {
    const cache = new LazyResultCache(countingSource([1, 2]).source);

    await expect(cache.at(5)).rejects.toBeInstanceOf(IndexOutOfRangeError);
    await expect(cache.at(-3)).rejects.toThrow('Index -3 is out of range for a result of 2 records');
  });

  it('should reject a non-integer index', async () => {
    const cache = new LazyResultCache(countingSource([1]).source);

    await expect(cache.at(0.5)).rejects.toBeInstanceOf(ValidationError);
  });
});

// =============================================================================
// Slicing, length and emptiness
// =============================================================================

describe('LazyResultCache slicing', () => {
  it('should pull only up to the slice stop', async () => {
    const { source, pulls } = countingSource([0, 1, 2, 3, 4, 5, 6, 7]);
    const cache = new LazyResultCache(source);

    expect(await cache.slice(2, 5)).toEqual([2, 3, 4]);
    expect(pulls()).toBe(5);
  });

  it('should take every step-th element', async () => {
    const cache = new LazyResultCache(countingSource([0, 1, 2, 3, 4, 5, 6]).source);

    expect(await cache.slice(1, 7, 2)).toEqual([1, 3, 5]);
  });

  it('should drain the source for an open or negative bound', async () => {
    const cache = new LazyResultCache(countingSource([0, 1, 2, 3]).source);

    expect(await cache.slice(-2)).toEqual([2, 3]);
    expect(cache.complete).toBe(true);
  });

  it('should return a short slice when the source ends early', async () => {
    const cache = new LazyResultCache(countingSource([0, 1]).source);

    expect(await cache.slice(0, 10)).toEqual([0, 1]);
  });

  it('should reject a zero step', async () => {
    const cache = new LazyResultCache(countingSource([0]).source);

    await expect(cache.slice(0, 1, 0)).rejects.toThrow('step must be a positive integer, got 0');
  });

  it('should pull at most one element for isEmpty', async () => {
    const { source, pulls } = countingSource([9, 8, 7]);
    const cache = new LazyResultCache(source);

    expect(await cache.isEmpty()).toBe(false);
    expect(pulls()).toBe(1);
  });

  it('should report an empty source as empty', async () => {
    const cache = new LazyResultCache(countingSource<number>([]).source);

    expect(await cache.isEmpty()).toBe(true);
    expect(await cache.length()).toBe(0);
  });

  it('should count every element for length', async () => {
    const cache = new LazyResultCache(countingSource(['x', 'y', 'z']).source);

    expect(await cache.length()).toBe(3);
    expect(await cache.toArray()).toEqual(['x', 'y', 'z']);
  });
});

// =============================================================================
// Iteration
// =============================================================================

describe('LazyResultCache iteration', () => {
  it('should replay cached elements before pulling the rest', async () => {
    const { source, pulls } = countingSource([1, 2, 3, 4]);
    const cache = new LazyResultCache(source);
    await cache.at(1);

    const seen: number[] = [];
    for await (const value of cache) {
      seen.push(value);
    }

    expect(seen).toEqual([1, 2, 3, 4]);
    expect(pulls()).toBe(4);
  });

  it('should give each iteration its own cursor', async () => {
    const cache = new LazyResultCache(countingSource(['a', 'b', 'c']).source);
    const first = cache.iterate();
    const second = cache.iterate();

    expect((await first.next()).value).toBe('a');
    expect((await first.next()).value).toBe('b');
    expect((await second.next()).value).toBe('a');
    expect((await first.next()).value).toBe('c');
    expect((await first.next()).done).toBe(true);
    expect((await second.next()).value).toBe('b');
  });

  it('should accept a bare async iterator', async () => {
    const values = [5, 6];
    let position = 0;
    const iterator: AsyncIterator<number> = {
      next: async () =>
        position < values.length ? { done: false, value: values[position++] } : { done: true, value: undefined },
    };

    expect(await new LazyResultCache(iterator).toArray()).toEqual([5, 6]);
  });
});

// =============================================================================
// Concurrency and errors
// =============================================================================

describe('LazyResultCache concurrency', () => {
  it('should share one pull between concurrent callers', async () => {
    const { source, pulls } = countingSource([10, 20, 30]);
    const cache = new LazyResultCache(source);

    const [a, b] = await Promise.all([cache.at(0), cache.at(0)]);

    expect(a).toBe(10);
    expect(b).toBe(10);
    expect(pulls()).toBe(1);
  });

  it('should never pull past the end when callers race to drain', async () => {
    const { source, pulls } = countingSource([1, 2, 3]);
    const cache = new LazyResultCache(source);

    const [left, right] = await Promise.all([cache.toArray(), cache.toArray()]);

    expect(left).toEqual([1, 2, 3]);
    expect(right).toEqual([1, 2, 3]);
    expect(pulls()).toBe(3);
  });

  it('should rethrow a source failure to every later caller', async () => {
    async function* failing(): AsyncGenerator<number> {
      yield 1;
      throw new Error('page request failed');
    }
    const cache = new LazyResultCache(failing());

    expect(await cache.at(0)).toBe(1);
    await expect(cache.at(1)).rejects.toThrow('page request failed');
    await expect(cache.toArray()).rejects.toThrow('page request failed');
    expect(await cache.at(0)).toBe(1);
  });
});
