/**
 * @recordset/client - lazy, paginated data access for layout-based record
 * databases served over HTTP/JSON
 *
 * @packageDocumentation
 */

// =============================================================================
// Client
// =============================================================================

export { RecordsetClient, type RecordsetClientConfig } from './client.js';
export { ModelManager, type CreateOptions } from './model.js';

// =============================================================================
// Models and Records
// =============================================================================

export {
  field,
  defineModel,
  validateFieldName,
  ModelSchema,
  PortalSchema,
  StaticFieldCatalog,
  DEFAULT_PORTAL_CHUNK_SIZE,
  RESERVED_FIELD_NAMES,
  type FieldCatalog,
  type FieldDefinition,
  type FieldDefinitions,
  type FieldInput,
  type FieldOptions,
  type ModelDefinition,
  type PortalDefinition,
  type PortalDefinitions,
} from './field-catalog.js';
export { RecordHandle, type SaveOptions, type DeleteOptions, type DuplicateOptions } from './record.js';
export {
  RelatedCollection,
  RelatedRecord,
  PortalPrefetchCoordinator,
  prefetchWindow,
  type PortalPrefetchOptions,
} from './portal-prefetch.js';

// =============================================================================
// Queries
// =============================================================================

export {
  QueryBuilder,
  QueryResult,
  createQuerySpec,
  type OrderField,
  type PrefetchOptions,
} from './query-builder.js';
export {
  Criteria,
  Criterion,
  escapeFindText,
  parseCriteriaEntry,
  resolveCriteria,
  type ComparisonOperand,
  type CriteriaInput,
  type CriterionOperator,
  type CriterionOptions,
  type ShorthandOperator,
  type ShorthandValue,
  type TextOperand,
} from './criteria.js';
export {
  paginate,
  dedupeRecords,
  composeWindow,
  isSliced,
  windowSize,
  createPaginationStats,
  UNBOUNDED_WINDOW,
  type PageRequest,
  type PaginateOptions,
  type PaginationStats,
} from './paginator.js';
export { LazyResultCache } from './lazy-result-cache.js';

// =============================================================================
// Session
// =============================================================================

export {
  SessionController,
  type SessionControllerOptions,
  type SessionState,
  type SessionStateChange,
  type EnsureLoggedInOptions,
} from './session.js';
export {
  UsernamePasswordLogin,
  OAuthLogin,
  CloudTokenLogin,
  tokenFromLoginEnvelope,
  type CloudTokenLoginOptions,
  type DataSource,
  type LoginRequest,
  type OAuthLoginOptions,
  type SessionBackend,
  type SessionProvider,
  type UsernamePasswordLoginOptions,
} from './session-providers.js';

// =============================================================================
// Wire
// =============================================================================

export { FetchTransport, type FetchTransportOptions } from './transport.js';
export {
  TableCodec,
  defaultCodec,
  DEFAULT_FIELD_CODECS,
  formatDate,
  formatTimestamp,
  parseDate,
  parseTimestamp,
  type Codec,
  type FieldCodec,
  type FieldCodecTable,
} from './codecs.js';
export {
  parseEnvelope,
  parseResponse,
  firstError,
  extractScriptResults,
  assertValidConfig,
  ResponseEnvelopeSchema,
  RecordsResponseSchema,
  ClientConfigSchema,
} from './schemas.js';
export { DEFAULT_PAGE_LIMIT } from './request-params.js';
export type {
  Transport,
  TransportRequest,
  HttpMethod,
  Page,
  RawRecord,
  RawPortalRecord,
  PortalDataInfo,
  DataInfo,
  ScriptOutcome,
  ScriptResults,
  Window,
  QueryClause,
  PrefetchSpec,
  QuerySpec,
  RecordsBackend,
  GetRecordsRequest,
  FindRequest,
  GetRecordRequest,
  PortalWrite,
  CreateRecordRequest,
  EditRecordRequest,
  DeleteRecordRequest,
  DuplicateRecordRequest,
  CreateRecordResult,
  EditRecordResult,
  DeleteRecordResult,
} from './types.js';

// =============================================================================
// Errors and Logging
// =============================================================================

export {
  RecordsetError,
  ValidationError,
  IndexOutOfRangeError,
  SessionError,
  RemoteBusinessError,
  TransportError,
  UnexpectedError,
  ErrorCategory,
  ValidationErrorCode,
  SessionErrorCode,
  TransportErrorCode,
  toRecordsetError,
  maskUrl,
  type ErrorContext,
  type SerializedError,
  type ErrorLogEntry,
} from './errors.js';
export {
  createLogger,
  createDefaultClientLogger,
  ConsoleSink,
  JsonSink,
  NoOpSink,
  MemorySink,
  RedactingSink,
  LogLevel,
  SENSITIVE_LOG_FIELDS,
  type LogEntry,
  type LogSink,
  type LoggerConfig,
  type StructuredLogger,
} from './logging.js';
