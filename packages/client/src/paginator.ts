/**
 * Paginator
 *
 * Turns a window and a chunk size into the sequence of offset/limit page
 * requests that covers it, and drops records seen twice when the remote set
 * shifts between two requests.
 *
 * Offsets here are 0-based; the request mapping converts them for the wire.
 *
 * @packageDocumentation
 */

import { ValidationError, ValidationErrorCode } from './errors.js';
import type { StructuredLogger } from './logging.js';
import type { Window } from './types.js';

// =============================================================================
// Windows
// =============================================================================

export const UNBOUNDED_WINDOW: Window = Object.freeze({ start: 0, stop: null });

/**
 * A window is sliced once its start moved or its stop was set
 */
export function isSliced(window: Window): boolean {
  return window.start !== 0 || window.stop !== null;
}

/**
 * Number of records the window can hold, `null` when unbounded
 */
export function windowSize(window: Window): number | null {
  return window.stop === null ? null : window.stop - window.start;
}

function assertBound(name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value)) {
    throw new ValidationError(ValidationErrorCode.INVALID_SLICE, `Slice ${name} must be an integer, got ${value}`);
  }
  if (value < 0) {
    throw new ValidationError(ValidationErrorCode.INVALID_SLICE, `Negative slice ${name} (${value}) is not supported`);
  }
}

/**
 * Narrow `existing` by a slice taken relative to it. Successive slices
 * converge on their intersection: `[0, 10)` then `[2, 5)` gives `[2, 5)`.
 *
 * @throws ValidationError on negative bounds or when `stop <= start`
 */
export function composeWindow(existing: Window, start?: number, stop?: number): Window {
  assertBound('start', start);
  assertBound('stop', stop);
  if (stop !== undefined && stop <= (start ?? 0)) {
    throw new ValidationError(
      ValidationErrorCode.INVALID_SLICE,
      `Slice stop (${stop}) must be greater than start (${start ?? 0})`
    );
  }

  let nextStop = existing.stop;
  if (stop !== undefined) {
    nextStop = existing.stop !== null ? Math.min(existing.stop, existing.start + stop) : existing.start + stop;
  }

  let nextStart = existing.start;
  if (start !== undefined) {
    nextStart = nextStop !== null ? Math.min(nextStop, existing.start + start) : existing.start + start;
  }

  return Object.freeze({ start: nextStart, stop: nextStop });
}

// =============================================================================
// Statistics
// =============================================================================

/**
 * Counters of one query execution
 */
export interface PaginationStats {
  pagesRequested: number;
  recordsReceived: number;
  duplicatesDropped: number;
}

export function createPaginationStats(): PaginationStats {
  return { pagesRequested: 0, recordsReceived: 0, duplicatesDropped: 0 };
}

// =============================================================================
// Paging
// =============================================================================

/**
 * One page request, 0-based
 */
export interface PageRequest {
  /** Position of the request in the sequence */
  index: number;
  offset: number;
  limit: number;
}

export interface PaginateOptions {
  window: Window;
  chunkSize: number;
  /** Updated as pages arrive */
  stats?: PaginationStats;
  logger?: StructuredLogger;
}

/**
 * Issue page requests until the window is covered.
 *
 * Request `i` asks for `offset = window.start + i * chunkSize` and
 * `limit = min(chunkSize, window.stop - offset)`. Paging ends on an empty
 * page, on a page shorter than its limit, or once the window is full. The
 * only page that can come back empty is the probe after a run of full
 * pages over an unbounded window.
 */
export async function* paginate<P extends { records: readonly unknown[] }>(
  fetchPage: (request: PageRequest) => Promise<P>,
  options: PaginateOptions
): AsyncGenerator<P, void, undefined> {
  const { window, chunkSize, logger } = options;
  const stats = options.stats ?? createPaginationStats();

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ValidationError(ValidationErrorCode.INVALID_ARGUMENT, `Chunk size must be a positive integer, got ${chunkSize}`);
  }

  const size = windowSize(window);
  let received = 0;

  for (let index = 0; size === null || received < size; index += 1) {
    const offset = window.start + index * chunkSize;
    const limit = window.stop === null ? chunkSize : Math.min(chunkSize, window.stop - offset);

    const page = await fetchPage({ index, offset, limit });
    const count = page.records.length;
    stats.pagesRequested += 1;
    stats.recordsReceived += count;
    logger?.debug('Page {index} returned {count} of {limit} records', { index, offset, limit, count });

    if (count === 0) {
      break;
    }
    yield page;
    received += count;
    if (count < limit) {
      break;
    }
  }

  logger?.debug('Pagination finished after {pagesRequested} pages', { ...stats });
}

/**
 * Flatten pages, dropping any record whose key was already yielded in this
 * execution.
 */
export async function* dedupeRecords<R>(
  pages: AsyncIterable<{ records: readonly R[] }>,
  keyOf: (record: R) => string,
  options: { stats?: PaginationStats; logger?: StructuredLogger } = {}
): AsyncGenerator<R, void, undefined> {
  const seen = new Set<string>();
  for await (const page of pages) {
    for (const record of page.records) {
      const key = keyOf(record);
      if (seen.has(key)) {
        if (options.stats) {
          options.stats.duplicatesDropped += 1;
        }
        options.logger?.debug('Dropped duplicate record {key}', { key });
        continue;
      }
      seen.add(key);
      yield record;
    }
  }
}
