/**
 * Login providers
 *
 * A provider knows how to open a session (which headers, which body) and
 * hands the request to a {@link SessionBackend}, usually the client itself.
 *
 * @packageDocumentation
 */

import type { ResponseEnvelope } from '@recordset/shared-types';
import { RemoteBusinessError } from './errors.js';
import { LoginResponseSchema, firstError, parseResponse } from './schemas.js';

// =============================================================================
// Interfaces
// =============================================================================

/**
 * Headers and body of a session-open request
 */
export interface LoginRequest {
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

/**
 * The unauthenticated session calls
 *
 * @public
 * @since 0.1.0
 */
export interface SessionBackend {
  openSession(request: LoginRequest): Promise<ResponseEnvelope>;
  closeSession(token: string): Promise<ResponseEnvelope>;
}

/**
 * Obtains a session token
 *
 * @public
 * @since 0.1.0
 */
export interface SessionProvider {
  login(backend: SessionBackend): Promise<string>;
}

/**
 * Credentials of an external data source the remote opens alongside the
 * main database
 */
export interface DataSource {
  database: string;
  username: string;
  password: string;
}

// =============================================================================
// Token Extraction
// =============================================================================

/**
 * @throws RemoteBusinessError when the envelope carries an error code
 * @throws TransportError when the response has no token
 */
export function tokenFromLoginEnvelope(envelope: ResponseEnvelope): string {
  const error = firstError(envelope.messages);
  if (error) {
    throw new RemoteBusinessError(error, envelope.messages);
  }
  return parseResponse(LoginResponseSchema, envelope.response).token;
}

function loginBody(dataSources: readonly DataSource[] | undefined): Record<string, unknown> {
  if (!dataSources || dataSources.length === 0) {
    return {};
  }
  return {
    fmDataSource: dataSources.map(({ database, username, password }) => ({ database, username, password })),
  };
}

// =============================================================================
// Providers
// =============================================================================

export interface UsernamePasswordLoginOptions {
  username: string;
  password: string;
  dataSources?: readonly DataSource[];
}

/**
 * Basic authentication with an account name and password
 *
 * @example
 * ```typescript
 * const session = new UsernamePasswordLogin({ username: 'admin', password: process.env.DB_PASSWORD ?? '' });
 * ```
 *
 * @public
 * @since 0.1.0
 */
export class UsernamePasswordLogin implements SessionProvider {
  private readonly options: UsernamePasswordLoginOptions;

  constructor(options: UsernamePasswordLoginOptions) {
    this.options = options;
  }

  async login(backend: SessionBackend): Promise<string> {
    const credentials = Buffer.from(`${this.options.username}:${this.options.password}`, 'utf8').toString('base64');
    const envelope = await backend.openSession({
      headers: { Authorization: `Basic ${credentials}` },
      body: loginBody(this.options.dataSources),
    });
    return tokenFromLoginEnvelope(envelope);
  }
}

export interface OAuthLoginOptions {
  requestId: string;
  identifier: string;
  dataSources?: readonly DataSource[];
}

/**
 * Login with the request id and identifier of a completed OAuth exchange
 *
 * @public
 * @since 0.1.0
 */
export class OAuthLogin implements SessionProvider {
  private readonly options: OAuthLoginOptions;

  constructor(options: OAuthLoginOptions) {
    this.options = options;
  }

  async login(backend: SessionBackend): Promise<string> {
    const envelope = await backend.openSession({
      headers: {
        'X-FM-Data-OAuth-Request-Id': this.options.requestId,
        'X-FM-Data-OAuth-Identifier': this.options.identifier,
      },
      body: loginBody(this.options.dataSources),
    });
    return tokenFromLoginEnvelope(envelope);
  }
}

export interface CloudTokenLoginOptions {
  /** Returns a current identity token; called on every login */
  identityToken: () => string | Promise<string>;
  dataSources?: readonly DataSource[];
}

/**
 * Login with an identity token from a hosted identity service. Obtaining the
 * token is left to the caller.
 *
 * @public
 * @since 0.1.0
 */
export class CloudTokenLogin implements SessionProvider {
  private readonly options: CloudTokenLoginOptions;

  constructor(options: CloudTokenLoginOptions) {
    this.options = options;
  }

  async login(backend: SessionBackend): Promise<string> {
    const identityToken = await this.options.identityToken();
    const envelope = await backend.openSession({
      headers: { Authorization: `FMID ${identityToken}` },
      body: loginBody(this.options.dataSources),
    });
    return tokenFromLoginEnvelope(envelope);
  }
}
