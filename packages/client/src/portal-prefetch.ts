/**
 * Portal prefetch
 *
 * Related (portal) records of a parent record, read page by page through the
 * same paginator as the parent query. A prefetched portal rides along in the
 * parent page request, so its first page is already embedded in the parent;
 * later pages, and every page of a portal that was not prefetched, are read
 * with get-record calls scoped to the parent.
 *
 * @packageDocumentation
 */

import type { FieldType, FieldValue, ModId, PortalRequest, RecordId, WireValue } from '@recordset/shared-types';
import type { Codec } from './codecs.js';
import { ValidationError } from './errors.js';
import type { FieldDefinitions, PortalSchema } from './field-catalog.js';
import { LazyResultCache } from './lazy-result-cache.js';
import type { StructuredLogger } from './logging.js';
import { UNBOUNDED_WINDOW, createPaginationStats, dedupeRecords, paginate } from './paginator.js';
import type { PrefetchSpec, RawPortalRecord, RawRecord, RecordsBackend, Window } from './types.js';

// =============================================================================
// Related Record
// =============================================================================

/**
 * A related row, decoding only the fields declared on its portal
 *
 * @public
 * @since 0.1.0
 */
export class RelatedRecord<F extends FieldDefinitions> {
  readonly recordId: RecordId;
  readonly modId: ModId;
  readonly portal: PortalSchema;
  private readonly fields: F;
  private readonly wire: Record<string, WireValue>;
  private readonly codec: Codec;

  /**
   * @throws ValidationError with code DECODE_FAILED when a declared field
   *   does not decode
   */
  constructor(portal: PortalSchema, fields: F, raw: RawPortalRecord, codec: Codec) {
    this.recordId = raw.recordId;
    this.modId = raw.modId;
    this.portal = portal;
    this.fields = fields;
    this.wire = raw.fields;
    this.codec = codec;
    this.toObject();
  }

  private wireValue(field: string): WireValue | undefined {
    return this.wire[this.portal.catalog.resolve(field)];
  }

  get<K extends keyof F & string>(field: K): FieldValue<F[K]['type']> {
    const wire = this.wireValue(field);
    if (wire === undefined) {
      return null;
    }
    return this.decode<F[K]['type']>(field, this.fields[field].type, wire);
  }

  /**
   * Declared fields by name; a field absent from the response reads as `null`
   */
  toObject(): Record<string, FieldValue> {
    const result: Record<string, FieldValue> = {};
    for (const name of this.portal.catalog.names()) {
      const wire = this.wireValue(name);
      result[name] = wire === undefined ? null : this.decode(name, this.portal.catalog.typeOf(name), wire);
    }
    return result;
  }

  private decode<T extends FieldType>(name: string, type: T, wire: WireValue): FieldValue<T> {
    try {
      return this.codec.decode<T>(type, wire);
    } catch (error) {
      if (error instanceof ValidationError) {
        error.withContext({ field: name, recordId: this.recordId, metadata: { portal: this.portal.name } });
      }
      throw error;
    }
  }
}

// =============================================================================
// Related Collection
// =============================================================================

/**
 * Lazy, re-iterable view of one parent's related records. Views of the same
 * portal on the same parent share their fetched rows.
 *
 * @public
 * @since 0.1.0
 */
export class RelatedCollection<F extends FieldDefinitions> implements AsyncIterable<RelatedRecord<F>> {
  readonly portal: PortalSchema;
  private readonly fields: F;
  private readonly source: LazyResultCache<RawPortalRecord>;
  private readonly codec: Codec;

  constructor(portal: PortalSchema, fields: F, source: LazyResultCache<RawPortalRecord>, codec: Codec) {
    this.portal = portal;
    this.fields = fields;
    this.source = source;
    this.codec = codec;
  }

  /** Related rows read so far */
  get cachedCount(): number {
    return this.source.cachedCount;
  }

  get complete(): boolean {
    return this.source.complete;
  }

  private wrap(raw: RawPortalRecord): RelatedRecord<F> {
    return new RelatedRecord(this.portal, this.fields, raw, this.codec);
  }

  async at(index: number): Promise<RelatedRecord<F>> {
    return this.wrap(await this.source.at(index));
  }

  async slice(start?: number, stop?: number, step?: number): Promise<RelatedRecord<F>[]> {
    const rows = await this.source.slice(start, stop, step);
    return rows.map((row) => this.wrap(row));
  }

  length(): Promise<number> {
    return this.source.length();
  }

  isEmpty(): Promise<boolean> {
    return this.source.isEmpty();
  }

  async toArray(): Promise<RelatedRecord<F>[]> {
    const rows = await this.source.toArray();
    return rows.map((row) => this.wrap(row));
  }

  async *iterate(): AsyncGenerator<RelatedRecord<F>, void, undefined> {
    for await (const row of this.source) {
      yield this.wrap(row);
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<RelatedRecord<F>, void, undefined> {
    return this.iterate();
  }
}

// =============================================================================
// Coordinator
// =============================================================================

export interface PortalPrefetchOptions {
  backend: RecordsBackend;
  /** Layout of the parent records */
  layout: string;
  /** Portals declared on the model */
  portals: readonly PortalSchema[];
  /** Prefetch specs by declared portal name */
  prefetch?: Readonly<Record<string, PrefetchSpec>>;
  responseLayout?: string;
  logger?: StructuredLogger;
}

interface PrefetchPlan {
  portal: PortalSchema;
  window: Window;
}

/**
 * Window of related rows a prefetch spec selects
 */
export function prefetchWindow(spec: PrefetchSpec): Window {
  return { start: spec.offset, stop: spec.limit === undefined ? null : spec.offset + spec.limit };
}

/**
 * Plans the portal part of parent page requests and builds the related-row
 * source of every portal of every parent record. One coordinator serves one
 * query execution.
 *
 * @public
 * @since 0.1.0
 */
export class PortalPrefetchCoordinator {
  private readonly options: PortalPrefetchOptions;
  private readonly plans = new Map<string, PrefetchPlan>();

  constructor(options: PortalPrefetchOptions) {
    this.options = options;
    const prefetch = options.prefetch ?? {};
    for (const portal of options.portals) {
      const spec = prefetch[portal.name];
      if (spec !== undefined) {
        this.plans.set(portal.name, { portal, window: prefetchWindow(spec) });
      }
    }
  }

  /**
   * Portal directives for the parent page request. Each asks for exactly the
   * first page the related paginator would request.
   */
  portalRequests(): PortalRequest[] {
    return [...this.plans.values()].map(({ portal, window }) => ({
      name: portal.remote,
      offset: window.start,
      limit: window.stop === null ? portal.chunkSize : Math.min(portal.chunkSize, window.stop - window.start),
    }));
  }

  isPrefetched(portal: string): boolean {
    return this.plans.has(portal);
  }

  /**
   * Source of `parent`'s related rows for `portal`, deduplicated by related
   * record id. Nothing is requested until the source is first read.
   */
  sourceFor(parent: RawRecord, portal: PortalSchema): LazyResultCache<RawPortalRecord> {
    const plan = this.plans.get(portal.name);
    const embedded = plan ? (parent.portalData[portal.remote] ?? []) : null;
    return new LazyResultCache(this.related(parent.recordId, portal, plan?.window ?? UNBOUNDED_WINDOW, embedded));
  }

  private async *related(
    parentId: RecordId,
    portal: PortalSchema,
    window: Window,
    embedded: RawPortalRecord[] | null
  ): AsyncGenerator<RawPortalRecord, void, undefined> {
    const { backend, layout, responseLayout } = this.options;
    const logger = this.options.logger?.child({ portal: portal.name, recordId: parentId });
    const stats = createPaginationStats();

    const pages = paginate<{ records: RawPortalRecord[] }>(
      async ({ index, offset, limit }) => {
        if (index === 0 && embedded !== null) {
          return { records: embedded };
        }
        const page = await backend.getRecord({
          layout,
          recordId: parentId,
          responseLayout,
          portals: [{ name: portal.remote, offset, limit }],
        });
        const [record] = page.records;
        return { records: record === undefined ? [] : (record.portalData[portal.remote] ?? []) };
      },
      { window, chunkSize: portal.chunkSize, stats, logger }
    );

    yield* dedupeRecords(pages, (row) => row.recordId, { stats, logger });
  }
}
