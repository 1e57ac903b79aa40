/**
 * Query builder
 *
 * Immutable, chainable description of a query over one model. Every
 * mutator returns a new builder over a new frozen {@link QuerySpec}; the
 * query runs when a terminal operation is first called, at most once per
 * builder value.
 *
 * @example
 * ```typescript
 * const adults = people
 *   .query()
 *   .find({ age__gte: 18 })
 *   .omit({ status: 'archived' })
 *   .orderBy('-age', 'name')
 *   .prefetch('pets', { limit: 10 });
 *
 * for await (const person of adults.slice(0, 100)) {
 *   console.log(person.get('name'));
 * }
 * ```
 *
 * @packageDocumentation
 */

import { DEFAULT_CLIENT_CONFIG, type ScriptInput, type ScriptsInput, type SortKey } from '@recordset/shared-types';
import { resolveCriteria, type CriteriaInput } from './criteria.js';
import { IndexOutOfRangeError, ValidationError, ValidationErrorCode } from './errors.js';
import type { FieldDefinitions, FieldInput, ModelSchema, PortalDefinitions } from './field-catalog.js';
import { LazyResultCache } from './lazy-result-cache.js';
import {
  UNBOUNDED_WINDOW,
  composeWindow,
  createPaginationStats,
  dedupeRecords,
  isSliced,
  paginate,
  type PaginationStats,
} from './paginator.js';
import { PortalPrefetchCoordinator } from './portal-prefetch.js';
import { RecordHandle, type DeleteOptions, type SaveOptions } from './record.js';
import type { QueryClause, QuerySpec, RecordsBackend } from './types.js';

// =============================================================================
// Types
// =============================================================================

/** A field name, or a field name prefixed with `-` for descending order */
export type OrderField<N extends string> = N | `-${N}`;

export interface PrefetchOptions {
  /** 0-based offset of the first related row; defaults to 0 */
  offset?: number;
  /** Maximum related rows to read; unbounded when absent */
  limit?: number;
}

/**
 * Empty spec: no clauses, no sort, unbounded window
 */
export function createQuerySpec(chunkSize: number = DEFAULT_CLIENT_CONFIG.defaultChunkSize): QuerySpec {
  return Object.freeze({
    clauses: Object.freeze([]),
    sort: Object.freeze([]),
    window: UNBOUNDED_WINDOW,
    chunkSize,
    prefetch: Object.freeze({}),
    scripts: Object.freeze({}),
  });
}

function script(name: string, param: string | undefined): ScriptInput {
  if (name.length === 0) {
    throw new ValidationError(ValidationErrorCode.INVALID_ARGUMENT, 'Script name cannot be empty');
  }
  return param === undefined ? { name } : { name, param };
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(ValidationErrorCode.INVALID_ARGUMENT, `${name} must be a positive integer, got ${value}`);
  }
}

// =============================================================================
// Query Result
// =============================================================================

/**
 * Records of one query execution, pulled page by page as they are demanded
 *
 * @public
 * @since 0.1.0
 */
export class QueryResult<F extends FieldDefinitions, P extends PortalDefinitions> extends LazyResultCache<
  RecordHandle<F, P>
> {
  /** Counters of the pages read so far */
  readonly stats: PaginationStats;
  readonly spec: QuerySpec;

  constructor(source: AsyncIterable<RecordHandle<F, P>>, stats: PaginationStats, spec: QuerySpec) {
    super(source);
    this.stats = stats;
    this.spec = spec;
  }
}

// =============================================================================
// Query Builder
// =============================================================================

/**
 * @public
 * @since 0.1.0
 */
export class QueryBuilder<F extends FieldDefinitions, P extends PortalDefinitions>
  implements AsyncIterable<RecordHandle<F, P>>
{
  readonly spec: QuerySpec;
  private readonly model: ModelSchema<F, P>;
  private readonly backend: RecordsBackend;
  private result: QueryResult<F, P> | null = null;

  constructor(model: ModelSchema<F, P>, backend: RecordsBackend, spec: QuerySpec = createQuerySpec(backend.defaultChunkSize)) {
    this.model = model;
    this.backend = backend;
    this.spec = spec;
  }

  private derive(changes: Partial<QuerySpec>): QueryBuilder<F, P> {
    return new QueryBuilder(this.model, this.backend, Object.freeze({ ...this.spec, ...changes }));
  }

  /**
   * @throws ValidationError with code QUERY_SLICED once the window was sliced
   */
  private mutate(operation: string, changes: () => Partial<QuerySpec>): QueryBuilder<F, P> {
    if (isSliced(this.spec.window)) {
      throw new ValidationError(ValidationErrorCode.QUERY_SLICED, `Cannot call ${operation}() on a sliced query`, {
        context: { layout: this.model.layout },
      });
    }
    return this.derive(changes());
  }

  private clause(omit: boolean, criteria: CriteriaInput<keyof F & string>): QueryClause {
    const fields = resolveCriteria(this.model.catalog, Object.entries(criteria), this.backend.codec);
    if (Object.keys(fields).length === 0) {
      throw new ValidationError(
        ValidationErrorCode.INVALID_ARGUMENT,
        `${omit ? 'omit' : 'find'}() needs at least one criterion`
      );
    }
    return Object.freeze({ omit, fields: Object.freeze(fields) });
  }

  // ===========================================================================
  // Mutators
  // ===========================================================================

  /**
   * Add a request clause matching `criteria`. Clauses are OR'd by the remote.
   */
  find(criteria: CriteriaInput<keyof F & string>): QueryBuilder<F, P> {
    return this.mutate('find', () => ({
      clauses: Object.freeze([...this.spec.clauses, this.clause(false, criteria)]),
    }));
  }

  /**
   * Add a clause excluding the records matching `criteria`
   */
  omit(criteria: CriteriaInput<keyof F & string>): QueryBuilder<F, P> {
    return this.mutate('omit', () => ({
      clauses: Object.freeze([...this.spec.clauses, this.clause(true, criteria)]),
    }));
  }

  /**
   * Replace the sort order; `'-field'` sorts descending
   */
  orderBy(...fields: OrderField<keyof F & string>[]): QueryBuilder<F, P> {
    return this.mutate('orderBy', () => {
      const sort = fields.map((field): SortKey => {
        const descending = field.startsWith('-');
        const name = descending ? field.slice(1) : field;
        return { fieldName: this.model.catalog.resolve(name), sortOrder: descending ? 'descend' : 'ascend' };
      });
      return { sort: Object.freeze(sort) };
    });
  }

  /**
   * Records requested per page
   */
  chunkSize(size: number): QueryBuilder<F, P> {
    return this.mutate('chunkSize', () => {
      assertPositiveInteger('Chunk size', size);
      return { chunkSize: size };
    });
  }

  /**
   * Read a portal's first related rows along with each parent page
   *
   * @throws ValidationError with code UNKNOWN_PORTAL
   */
  prefetch(portal: keyof P & string, options: PrefetchOptions = {}): QueryBuilder<F, P> {
    return this.mutate('prefetch', () => {
      this.model.portal(portal);
      const offset = options.offset ?? 0;
      if (!Number.isInteger(offset) || offset < 0) {
        throw new ValidationError(
          ValidationErrorCode.INVALID_ARGUMENT,
          `Prefetch offset must be a non-negative integer, got ${offset}`
        );
      }
      if (options.limit !== undefined) {
        assertPositiveInteger('Prefetch limit', options.limit);
      }
      const spec = options.limit === undefined ? { offset } : { offset, limit: options.limit };
      return { prefetch: Object.freeze({ ...this.spec.prefetch, [portal]: Object.freeze(spec) }) };
    });
  }

  /**
   * Layout whose fields the remote returns; the query still runs on the
   * model's layout
   */
  responseLayout(layout: string): QueryBuilder<F, P> {
    return this.mutate('responseLayout', () => {
      if (layout.length === 0) {
        throw new ValidationError(ValidationErrorCode.INVALID_ARGUMENT, 'Response layout cannot be empty');
      }
      return { responseLayout: layout };
    });
  }

  private withScript(operation: string, key: keyof ScriptsInput, name: string, param?: string): QueryBuilder<F, P> {
    return this.mutate(operation, () => ({ scripts: Object.freeze({ ...this.spec.scripts, [key]: script(name, param) }) }));
  }

  /** Script run before the request */
  preRequestScript(name: string, param?: string): QueryBuilder<F, P> {
    return this.withScript('preRequestScript', 'prerequest', name, param);
  }

  /** Script run before the sort */
  preSortScript(name: string, param?: string): QueryBuilder<F, P> {
    return this.withScript('preSortScript', 'presort', name, param);
  }

  /** Script run after the request */
  afterScript(name: string, param?: string): QueryBuilder<F, P> {
    return this.withScript('afterScript', 'after', name, param);
  }

  /**
   * Narrow the query to `[start, stop)` of the current window. Slices
   * compose: `slice(0, 10).slice(2, 5)` selects `[2, 5)`.
   *
   * @throws ValidationError with code INVALID_SLICE on negative bounds or
   *   when `stop <= start`
   */
  slice(start?: number, stop?: number): QueryBuilder<F, P> {
    return this.derive({ window: composeWindow(this.spec.window, start, stop) });
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Run the query. The result is created once per builder and pulls pages
   * only as records are demanded.
   */
  execute(): QueryResult<F, P> {
    if (this.result === null) {
      this.result = this.run();
    }
    return this.result;
  }

  private run(): QueryResult<F, P> {
    const { spec, model, backend } = this;
    const stats = createPaginationStats();
    const logger = backend.logger.child({ layout: model.layout });
    const coordinator = new PortalPrefetchCoordinator({
      backend,
      layout: model.layout,
      portals: model.portals(),
      prefetch: spec.prefetch,
      responseLayout: spec.responseLayout,
      logger,
    });
    const portals = coordinator.portalRequests();

    const pages = paginate(
      ({ index, offset, limit }) =>
        backend.readPage({
          layout: model.layout,
          query: spec.clauses,
          sort: spec.sort,
          offset,
          limit,
          portals,
          responseLayout: spec.responseLayout,
          // Scripts run once per execution, with the first page
          scripts: index === 0 ? spec.scripts : undefined,
        }),
      { window: spec.window, chunkSize: spec.chunkSize, stats, logger }
    );
    const records = dedupeRecords(pages, (record) => record.recordId, { stats, logger });

    async function* handles(): AsyncGenerator<RecordHandle<F, P>, void, undefined> {
      for await (const raw of records) {
        yield new RecordHandle(model, backend, raw, coordinator);
      }
    }

    return new QueryResult(handles(), stats, spec);
  }

  /**
   * Number of matching records in the window. Reads every page.
   */
  count(): Promise<number> {
    return this.execute().length();
  }

  toArray(): Promise<RecordHandle<F, P>[]> {
    return this.execute().toArray();
  }

  /**
   * Record at `index` of the window. A non-negative index reads only that
   * record, unless this builder's result already holds it; a negative one
   * reads the whole result.
   *
   * @throws IndexOutOfRangeError past either end
   */
  async at(index: number): Promise<RecordHandle<F, P>> {
    if (!Number.isInteger(index)) {
      throw new ValidationError(ValidationErrorCode.INVALID_ARGUMENT, `index must be an integer, got ${index}`);
    }
    if (index < 0 || (this.result !== null && this.result.cachedCount > index)) {
      return this.execute().at(index);
    }
    const [record] = await this.slice(index, index + 1).execute().toArray();
    if (record === undefined) {
      throw new IndexOutOfRangeError(index);
    }
    return record;
  }

  /**
   * First record of the window, `null` when there is none
   */
  async first(): Promise<RecordHandle<F, P> | null> {
    const [record] = await this.slice(0, 1).execute().toArray();
    return record ?? null;
  }

  [Symbol.asyncIterator](): AsyncGenerator<RecordHandle<F, P>, void, undefined> {
    return this.execute().iterate();
  }

  // ===========================================================================
  // Bulk Operations
  // ===========================================================================

  /**
   * Apply `values` to every matching record and save each one
   *
   * @returns number of records saved
   */
  async update(values: FieldInput<F>, options: SaveOptions = {}): Promise<number> {
    const records = await this.toArray();
    for (const record of records) {
      record.assign(values);
      await record.save(options);
    }
    return records.length;
  }

  /**
   * Delete every matching record
   *
   * @returns number of records deleted
   */
  async delete(options: DeleteOptions = {}): Promise<number> {
    const records = await this.toArray();
    for (const record of records) {
      await record.delete(options);
    }
    return records.length;
  }
}
