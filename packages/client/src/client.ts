/**
 * RecordsetClient - facade over transport, session and models
 *
 * @example
 * ```typescript
 * import { RecordsetClient, UsernamePasswordLogin, defineModel, field } from '@recordset/client';
 *
 * const client = new RecordsetClient({
 *   url: 'https://db.example.com',
 *   database: 'Contacts',
 *   session: new UsernamePasswordLogin({ username: 'api', password: process.env.DB_PASSWORD ?? '' }),
 * });
 *
 * const people = client.model(defineModel({ layout: 'People', fields: { name: field.text() } }));
 * const first = await people.query().find({ name__startswith: 'Ad' }).first();
 * ```
 *
 * @packageDocumentation
 */

import {
  DEFAULT_CLIENT_CONFIG,
  RemoteCode,
  type ResponseEnvelope,
  type WireValue,
} from '@recordset/shared-types';
import { defaultCodec, type Codec } from './codecs.js';
import { RemoteBusinessError, type ErrorContext } from './errors.js';
import type { FieldDefinitions, ModelSchema, PortalDefinitions } from './field-catalog.js';
import { createDefaultClientLogger, type StructuredLogger } from './logging.js';
import { ModelManager } from './model.js';
import {
  createRecordBody,
  deleteRecordQuery,
  duplicateRecordBody,
  editRecordBody,
  findBody,
  findPath,
  getRecordQuery,
  getRecordsQuery,
  globalsBody,
  globalsPath,
  performScriptQuery,
  recordPath,
  recordsPath,
  scriptPath,
  sessionPath,
  withQuery,
  type ApiLocation,
} from './request-params.js';
import {
  CreateRecordResponseSchema,
  EditRecordResponseSchema,
  assertValidConfig,
  extractScriptResults,
  firstError,
  parseEnvelope,
  parseResponse,
  toPage,
} from './schemas.js';
import { SessionController, type SessionState } from './session.js';
import type { LoginRequest, SessionBackend, SessionProvider } from './session-providers.js';
import { FetchTransport } from './transport.js';
import type {
  CreateRecordRequest,
  CreateRecordResult,
  DeleteRecordRequest,
  DeleteRecordResult,
  DuplicateRecordRequest,
  EditRecordRequest,
  EditRecordResult,
  FindRequest,
  GetRecordRequest,
  GetRecordsRequest,
  Page,
  RecordsBackend,
  ScriptOutcome,
  ScriptResults,
  Transport,
  TransportRequest,
} from './types.js';

// =============================================================================
// Configuration
// =============================================================================

/**
 * @public
 * @since 0.1.0
 */
export interface RecordsetClientConfig {
  /** Server URL, such as `https://db.example.com` */
  url: string;
  database: string;
  session: SessionProvider;
  /** Defaults to `v1` */
  apiVersion?: string;
  /** Per-request timeout of the default transport; defaults to 30000 */
  timeoutMs?: number;
  /** Minimum delay between two login attempts; defaults to 1000, `null` disables the guard */
  loginCooldownMs?: number | null;
  /** Defaults to `952` */
  invalidTokenCode?: string;
  /** When false, call {@link RecordsetClient.login} before any authenticated call; defaults to true */
  autoManageSession?: boolean;
  /** Records per page when a query sets no chunk size; defaults to 1000 */
  defaultChunkSize?: number;
  transport?: Transport;
  logger?: StructuredLogger;
  codec?: Codec;
  /** Runs after every successful login; calls made from it use the new session */
  onNewSession?: (client: RecordsetClient) => void | Promise<void>;
}

// =============================================================================
// Client
// =============================================================================

/**
 * @public
 * @since 0.1.0
 */
export class RecordsetClient implements RecordsBackend, SessionBackend {
  readonly codec: Codec;
  readonly logger: StructuredLogger;
  readonly defaultChunkSize: number;
  private readonly location: ApiLocation;
  private readonly transport: Transport;
  private readonly session: SessionController;

  /**
   * @throws ValidationError with code INVALID_CONFIG
   */
  constructor(config: RecordsetClientConfig) {
    assertValidConfig(config);

    this.location = { version: config.apiVersion ?? DEFAULT_CLIENT_CONFIG.apiVersion, database: config.database };
    this.codec = config.codec ?? defaultCodec;
    this.logger = config.logger ?? createDefaultClientLogger();
    this.defaultChunkSize = config.defaultChunkSize ?? DEFAULT_CLIENT_CONFIG.defaultChunkSize;
    this.transport =
      config.transport ??
      new FetchTransport({
        baseUrl: config.url,
        timeoutMs: config.timeoutMs ?? DEFAULT_CLIENT_CONFIG.timeoutMs,
        logger: this.logger.child({ component: 'transport' }),
      });

    const onNewSession = config.onNewSession;
    this.session = new SessionController({
      provider: config.session,
      backend: this,
      loginCooldownMs: config.loginCooldownMs,
      invalidTokenCode: config.invalidTokenCode,
      autoManage: config.autoManageSession,
      logger: this.logger.child({ component: 'session' }),
      onNewSession: onNewSession ? () => onNewSession(this) : undefined,
    });
  }

  get sessionState(): SessionState {
    return this.session.state;
  }

  // ===========================================================================
  // Session
  // ===========================================================================

  /**
   * Open a session now, without waiting for the first authenticated call
   */
  login(): Promise<void> {
    return this.session.ensureLoggedIn({ bypassRetryGuard: true });
  }

  /**
   * @returns false when no session was active
   */
  logout(): Promise<boolean> {
    return this.session.logout();
  }

  /** @internal */
  async openSession(request: LoginRequest): Promise<ResponseEnvelope> {
    return this.exchange({
      method: 'POST',
      path: sessionPath(this.location),
      headers: request.headers,
      body: request.body,
    });
  }

  /** @internal */
  async closeSession(token: string): Promise<ResponseEnvelope> {
    return this.exchange({ method: 'DELETE', path: sessionPath(this.location, token) });
  }

  // ===========================================================================
  // Plumbing
  // ===========================================================================

  private async exchange(request: TransportRequest, context?: ErrorContext): Promise<ResponseEnvelope> {
    return parseEnvelope(await this.transport.send(request), context);
  }

  /**
   * Authenticated call: session handling, envelope validation, and a
   * RemoteBusinessError for any error code
   */
  private async call(request: TransportRequest, context: ErrorContext): Promise<Record<string, unknown>> {
    const envelope = await this.session.callWithAutoRetry((token) =>
      this.exchange({ ...request, headers: { ...request.headers, Authorization: `Bearer ${token}` } }, context)
    );
    const error = firstError(envelope.messages);
    if (error) {
      throw new RemoteBusinessError(error, envelope.messages, { context });
    }
    return envelope.response;
  }

  // ===========================================================================
  // Record Operations
  // ===========================================================================

  /**
   * A range of records in layout order. `offset` is 0-based.
   *
   * @throws RemoteBusinessError for any error code, including "no records match"
   */
  async getRecords(request: GetRecordsRequest): Promise<Page> {
    const context = { layout: request.layout };
    const response = await this.call(
      { method: 'GET', path: withQuery(recordsPath(this.location, request.layout), getRecordsQuery(request)) },
      context
    );
    return toPage(response, context);
  }

  /**
   * Records matching `request.query`. `offset` is 0-based.
   *
   * @throws RemoteBusinessError for any error code, including "no records match"
   */
  async find(request: FindRequest): Promise<Page> {
    const context = { layout: request.layout };
    const response = await this.call(
      { method: 'POST', path: findPath(this.location, request.layout), body: findBody(request) },
      context
    );
    return toPage(response, context);
  }

  async getRecord(request: GetRecordRequest): Promise<Page> {
    const context = { layout: request.layout, recordId: request.recordId };
    const response = await this.call(
      {
        method: 'GET',
        path: withQuery(recordPath(this.location, request.layout, request.recordId), getRecordQuery(request)),
      },
      context
    );
    return toPage(response, context);
  }

  /**
   * One page of a query. "No records match" reads as an empty page.
   */
  async readPage(request: FindRequest): Promise<Page> {
    try {
      return request.query.length > 0 ? await this.find(request) : await this.getRecords(request);
    } catch (error) {
      if (error instanceof RemoteBusinessError && error.remoteCode === RemoteCode.NO_RECORDS_MATCH) {
        return { records: [], scriptResults: {} };
      }
      throw error;
    }
  }

  async createRecord(request: CreateRecordRequest): Promise<CreateRecordResult> {
    const context = { layout: request.layout };
    const response = await this.call(
      { method: 'POST', path: recordsPath(this.location, request.layout), body: createRecordBody(request) },
      context
    );
    const body = parseResponse(CreateRecordResponseSchema, response, context);
    return { recordId: body.recordId, modId: body.modId, scriptResults: extractScriptResults(response) };
  }

  /**
   * @throws RemoteBusinessError with remote code `306` when `modId` is set
   *   and the record changed since
   */
  async editRecord(request: EditRecordRequest): Promise<EditRecordResult> {
    const context = { layout: request.layout, recordId: request.recordId };
    const response = await this.call(
      {
        method: 'PATCH',
        path: recordPath(this.location, request.layout, request.recordId),
        body: editRecordBody(request),
      },
      context
    );
    const body = parseResponse(EditRecordResponseSchema, response, context);
    return { modId: body.modId, scriptResults: extractScriptResults(response) };
  }

  async deleteRecord(request: DeleteRecordRequest): Promise<DeleteRecordResult> {
    const context = { layout: request.layout, recordId: request.recordId };
    const response = await this.call(
      {
        method: 'DELETE',
        path: withQuery(recordPath(this.location, request.layout, request.recordId), deleteRecordQuery(request)),
      },
      context
    );
    return { scriptResults: extractScriptResults(response) };
  }

  /**
   * Copy a record on its layout. The copy gets a new record id and mod id.
   */
  async duplicateRecord(request: DuplicateRecordRequest): Promise<CreateRecordResult> {
    const context = { layout: request.layout, recordId: request.recordId };
    const response = await this.call(
      {
        method: 'POST',
        path: recordPath(this.location, request.layout, request.recordId),
        body: duplicateRecordBody(request),
      },
      context
    );
    const body = parseResponse(CreateRecordResponseSchema, response, context);
    return { recordId: body.recordId, modId: body.modId, scriptResults: extractScriptResults(response) };
  }

  /**
   * Run a script in the context of `layout`, outside any record operation.
   *
   * @returns the script's result and error code
   * @throws RemoteBusinessError when the remote cannot run the script
   */
  async performScript(layout: string, name: string, param?: string): Promise<ScriptOutcome> {
    const context = { layout, metadata: { script: name } };
    const response = await this.call(
      { method: 'GET', path: withQuery(scriptPath(this.location, layout, name), performScriptQuery(param)) },
      context
    );
    return extractScriptResults(response).after ?? {};
  }

  /**
   * Set global field values for the session. Keys are full remote names
   * (`table::field`).
   */
  async setGlobals(globalFields: Record<string, WireValue>): Promise<ScriptResults> {
    const response = await this.call(
      { method: 'PATCH', path: globalsPath(this.location), body: globalsBody(globalFields) },
      {}
    );
    return extractScriptResults(response);
  }

  // ===========================================================================
  // Models
  // ===========================================================================

  /**
   * Bind a model declared with `defineModel` to this client
   */
  model<F extends FieldDefinitions, P extends PortalDefinitions>(schema: ModelSchema<F, P>): ModelManager<F, P> {
    return new ModelManager(schema, this);
  }
}
