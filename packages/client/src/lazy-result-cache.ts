/**
 * LazyResultCache - a caching view over a single-pass async source.
 *
 * Elements are pulled from the source at most once and only as far as some
 * caller has asked for. Index access, slicing and any number of iterations
 * are served from the cache up to its high-water mark.
 *
 * @example
 * ```typescript
 * const result = new LazyResultCache(pages());
 * await result.at(3);        // pulls elements 0..3
 * await result.at(1);        // cached, no pull
 * await result.slice(0, 10); // pulls 4..9
 * for await (const item of result) { ... } // replays, then pulls the rest
 * ```
 *
 * @packageDocumentation
 */

import { IndexOutOfRangeError, ValidationError, ValidationErrorCode } from './errors.js';

function assertInteger(name: string, value: number | undefined): void {
  if (value !== undefined && !Number.isInteger(value)) {
    throw new ValidationError(ValidationErrorCode.INVALID_ARGUMENT, `${name} must be an integer, got ${value}`);
  }
}

function isAsyncIterable<T>(source: AsyncIterable<T> | AsyncIterator<T>): source is AsyncIterable<T> {
  return typeof Reflect.get(source, Symbol.asyncIterator) === 'function';
}

/**
 * @public
 * @since 0.1.0
 */
export class LazyResultCache<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly source: AsyncIterator<T>;
  private exhausted = false;
  private failure: { error: unknown } | null = null;
  private pending: Promise<boolean> | null = null;

  constructor(source: AsyncIterable<T> | AsyncIterator<T>) {
    this.source = isAsyncIterable(source) ? source[Symbol.asyncIterator]() : source;
  }

  /** Number of elements pulled so far */
  get cachedCount(): number {
    return this.items.length;
  }

  /** Whether the source has been drained */
  get complete(): boolean {
    return this.exhausted;
  }

  // ===========================================================================
  // Pulling
  // ===========================================================================

  /**
   * Pull the next element. Callers arriving while a pull is in flight share
   * it, so the source never sees two `next()` calls for one position.
   *
   * @returns false once the source is exhausted
   */
  private pullOne(): Promise<boolean> {
    if (this.pending === null) {
      this.pending = this.advance().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async advance(): Promise<boolean> {
    if (this.failure) {
      throw this.failure.error;
    }
    if (this.exhausted) {
      return false;
    }

    let result: IteratorResult<T>;
    try {
      result = await this.source.next();
    } catch (error) {
      this.failure = { error };
      throw error;
    }

    if (result.done) {
      this.exhausted = true;
      return false;
    }
    this.items.push(result.value);
    return true;
  }

  /**
   * Pull until `index` is cached
   * @returns false when the source ends first
   */
  private async ensure(index: number): Promise<boolean> {
    while (this.items.length <= index) {
      if (!(await this.pullOne())) {
        return this.items.length > index;
      }
    }
    return true;
  }

  private async fill(): Promise<void> {
    let more = !this.exhausted;
    while (more) {
      more = await this.pullOne();
    }
  }

  // ===========================================================================
  // Access
  // ===========================================================================

  /**
   * Element at `index`. A negative index counts from the end and drains the
   * source first.
   *
   * @throws IndexOutOfRangeError past either end
   */
  async at(index: number): Promise<T> {
    assertInteger('index', index);

    if (index < 0) {
      await this.fill();
      const resolved = this.items.length + index;
      if (resolved < 0) {
        throw new IndexOutOfRangeError(index, this.items.length);
      }
      return this.items[resolved];
    }

    if (!(await this.ensure(index))) {
      throw new IndexOutOfRangeError(index, this.items.length);
    }
    return this.items[index];
  }

  /**
   * Plain array of the elements in `[start, stop)`, taking every `step`-th.
   * Pulls up to `stop`; an absent or negative bound drains the source and
   * resolves from the end like `Array.prototype.slice`.
   */
  async slice(start?: number, stop?: number, step = 1): Promise<T[]> {
    assertInteger('start', start);
    assertInteger('stop', stop);
    if (!Number.isInteger(step) || step < 1) {
      throw new ValidationError(ValidationErrorCode.INVALID_ARGUMENT, `step must be a positive integer, got ${step}`);
    }

    if (stop === undefined || stop < 0 || (start !== undefined && start < 0)) {
      await this.fill();
    } else if (stop > 0) {
      await this.ensure(stop - 1);
    }

    const selected = this.items.slice(start, stop);
    return step === 1 ? selected : selected.filter((_, position) => position % step === 0);
  }

  /**
   * Drains the source and returns the element count
   */
  async length(): Promise<number> {
    await this.fill();
    return this.items.length;
  }

  /**
   * Pulls at most one element
   */
  async isEmpty(): Promise<boolean> {
    return !(await this.ensure(0));
  }

  async toArray(): Promise<T[]> {
    await this.fill();
    return [...this.items];
  }

  /**
   * A fresh cursor: replays cached elements, then pulls past the
   * high-water mark.
   */
  async *iterate(): AsyncGenerator<T, void, undefined> {
    let position = 0;
    for (;;) {
      if (position < this.items.length) {
        yield this.items[position];
        position += 1;
        continue;
      }
      const more = await this.pullOne();
      if (!more && position >= this.items.length) {
        return;
      }
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    return this.iterate();
  }
}
