/**
 * Core types shared by the query engine, the client and the records layer.
 *
 * @packageDocumentation
 */

import type {
  ModId,
  PortalRequest,
  RecordId,
  ScriptsInput,
  SortKey,
  WireValue,
} from '@recordset/shared-types';
import type { Codec } from './codecs.js';
import type { StructuredLogger } from './logging.js';

// =============================================================================
// Transport
// =============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/**
 * One HTTP exchange. `path` is relative to the server URL and already
 * carries its query string.
 */
export interface TransportRequest {
  method: HttpMethod;
  path: string;
  headers?: Record<string, string>;
  /** Serialized as JSON when present */
  body?: unknown;
}

/**
 * Sends one request and returns the decoded JSON body, whatever the HTTP
 * status. The remote reports its own errors inside the body.
 *
 * @public
 * @since 0.1.0
 */
export interface Transport {
  send(request: TransportRequest): Promise<unknown>;
}

// =============================================================================
// Raw Records
// =============================================================================

/**
 * A related (portal) row as received. `fields` keeps the remote keys,
 * usually of the form `table::field`.
 */
export interface RawPortalRecord {
  recordId: RecordId;
  modId: ModId;
  fields: Record<string, WireValue>;
}

export interface PortalDataInfo {
  portalObjectName?: string;
  database?: string;
  table?: string;
  foundCount?: number;
  returnedCount?: number;
}

/**
 * A record as received in a page
 */
export interface RawRecord {
  recordId: RecordId;
  modId: ModId;
  fieldData: Record<string, WireValue>;
  portalData: Record<string, RawPortalRecord[]>;
  portalDataInfo: PortalDataInfo[];
}

export interface DataInfo {
  database?: string;
  layout?: string;
  table?: string;
  totalRecordCount?: number;
  foundCount?: number;
  returnedCount?: number;
}

export interface ScriptOutcome {
  result?: string;
  error?: string;
}

/**
 * Results of the scripts run around a request, keyed by the moment they ran
 */
export interface ScriptResults {
  prerequest?: ScriptOutcome;
  presort?: ScriptOutcome;
  after?: ScriptOutcome;
}

/**
 * One bounded response for one offset/limit request
 */
export interface Page {
  records: RawRecord[];
  dataInfo?: DataInfo;
  scriptResults: ScriptResults;
}

// =============================================================================
// Query Specification
// =============================================================================

/**
 * Half-open `[start, stop)` range of a result, 0-based. `stop` is `null`
 * when the window is unbounded.
 */
export interface Window {
  readonly start: number;
  readonly stop: number | null;
}

/**
 * One request clause: remote field name to rendered criterion text.
 * Clauses of one query are OR'd by the remote; `omit` clauses exclude.
 */
export interface QueryClause {
  readonly omit: boolean;
  readonly fields: Readonly<Record<string, string>>;
}

export interface PrefetchSpec {
  /** 0-based offset of the first related row */
  readonly offset: number;
  /** Maximum number of related rows to read; unbounded when absent */
  readonly limit?: number;
}

/**
 * Everything a query needs to run. Immutable; builders copy on write.
 */
export interface QuerySpec {
  readonly clauses: readonly QueryClause[];
  readonly sort: readonly SortKey[];
  readonly window: Window;
  readonly chunkSize: number;
  readonly prefetch: Readonly<Record<string, PrefetchSpec>>;
  readonly responseLayout?: string;
  readonly scripts: Readonly<ScriptsInput>;
}

// =============================================================================
// Operation Inputs and Results
// =============================================================================

interface LayoutRequest {
  layout: string;
  scripts?: ScriptsInput;
}

/**
 * Reads a range of records. `offset` is 0-based.
 */
export interface GetRecordsRequest extends LayoutRequest {
  offset?: number;
  limit?: number;
  sort?: readonly SortKey[];
  portals?: readonly PortalRequest[];
  responseLayout?: string;
}

/**
 * Reads the records matching `query`. `offset` is 0-based.
 */
export interface FindRequest extends GetRecordsRequest {
  query: readonly QueryClause[];
}

export interface GetRecordRequest extends LayoutRequest {
  recordId: RecordId;
  portals?: readonly PortalRequest[];
  responseLayout?: string;
}

/**
 * Rows to add to or change in a portal, keyed by portal name. Rows with a
 * `recordId` edit existing related records.
 */
export type PortalWrite = Record<string, Array<Record<string, WireValue>>>;

export interface CreateRecordRequest extends LayoutRequest {
  fieldData: Record<string, WireValue>;
  portalData?: PortalWrite;
}

export interface EditRecordRequest extends LayoutRequest {
  recordId: RecordId;
  fieldData: Record<string, WireValue>;
  /** When set, the remote rejects the edit if the record changed since */
  modId?: ModId;
  portalData?: PortalWrite;
}

export interface DeleteRecordRequest extends LayoutRequest {
  recordId: RecordId;
}

export interface DuplicateRecordRequest extends LayoutRequest {
  recordId: RecordId;
}

export interface CreateRecordResult {
  recordId: RecordId;
  modId: ModId;
  scriptResults: ScriptResults;
}

export interface EditRecordResult {
  modId: ModId;
  scriptResults: ScriptResults;
}

export interface DeleteRecordResult {
  scriptResults: ScriptResults;
}

/**
 * The record operations the query engine and record handles call. The
 * client implements it; tests substitute an in-memory table.
 */
export interface RecordsBackend {
  readonly codec: Codec;
  readonly logger: StructuredLogger;
  /** Records per page when a query sets no chunk size */
  readonly defaultChunkSize: number;
  /**
   * One page of a query: a find when `query` has clauses, a plain range read
   * otherwise. "No records match" reads as an empty page.
   */
  readPage(request: FindRequest): Promise<Page>;
  getRecord(request: GetRecordRequest): Promise<Page>;
  createRecord(request: CreateRecordRequest): Promise<CreateRecordResult>;
  editRecord(request: EditRecordRequest): Promise<EditRecordResult>;
  deleteRecord(request: DeleteRecordRequest): Promise<DeleteRecordResult>;
  /** Copy a record; the result names the new record */
  duplicateRecord(request: DuplicateRecordRequest): Promise<CreateRecordResult>;
}
