/**
 * Recordset Error Hierarchy
 *
 * Every failure the client surfaces extends RecordsetError, which provides:
 * - a machine-readable code
 * - a category for coarse handling
 * - timestamp and optional context
 * - serialization for logs and RPC-style reporting
 *
 * @packageDocumentation
 */

import type { RemoteMessage } from '@recordset/shared-types';

// =============================================================================
// Error Context
// =============================================================================

/**
 * Context that can be attached to any error
 */
export interface ErrorContext {
  /** Layout the failing request targeted */
  layout?: string;
  /** Record involved */
  recordId?: string;
  /** Declared field involved */
  field?: string;
  /** Request path (never carries the session token) */
  path?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Serialized error format
 */
export interface SerializedError {
  name: string;
  code: string;
  message: string;
  timestamp: number;
  context?: ErrorContext;
  stack?: string;
  cause?: SerializedError;
}

/**
 * Log entry format for structured logging
 */
export interface ErrorLogEntry {
  level: 'error' | 'warn';
  /** ISO timestamp */
  timestamp: string;
  error: {
    name: string;
    code: string;
    message: string;
    stack?: string;
  };
  metadata: Record<string, unknown>;
}

// =============================================================================
// Error Categories and Codes
// =============================================================================

/**
 * High-level error categories
 */
export enum ErrorCategory {
  /** Malformed query construction or configuration; never reaches the network */
  VALIDATION = 'VALIDATION',
  /** Login failures and session lifecycle errors */
  SESSION = 'SESSION',
  /** Error codes reported by the remote service */
  REMOTE = 'REMOTE',
  /** Network, timeout and decoding failures */
  TRANSPORT = 'TRANSPORT',
  /** Unexpected states */
  INTERNAL = 'INTERNAL',
}

export enum ValidationErrorCode {
  INVALID_OPERAND = 'VALIDATION_INVALID_OPERAND',
  UNKNOWN_OPERATOR = 'VALIDATION_UNKNOWN_OPERATOR',
  UNKNOWN_FIELD = 'VALIDATION_UNKNOWN_FIELD',
  UNKNOWN_PORTAL = 'VALIDATION_UNKNOWN_PORTAL',
  INVALID_FIELD_NAME = 'VALIDATION_INVALID_FIELD_NAME',
  QUERY_SLICED = 'VALIDATION_QUERY_SLICED',
  INVALID_SLICE = 'VALIDATION_INVALID_SLICE',
  INVALID_ARGUMENT = 'VALIDATION_INVALID_ARGUMENT',
  INDEX_OUT_OF_RANGE = 'VALIDATION_INDEX_OUT_OF_RANGE',
  DECODE_FAILED = 'VALIDATION_DECODE_FAILED',
  INVALID_CONFIG = 'VALIDATION_INVALID_CONFIG',
}

export enum SessionErrorCode {
  LOGIN_FAILED = 'SESSION_LOGIN_FAILED',
  LOGIN_RETRIED_TOO_FAST = 'SESSION_LOGIN_RETRIED_TOO_FAST',
  INVALID_TOKEN = 'SESSION_INVALID_TOKEN',
  NO_SESSION = 'SESSION_NO_SESSION',
}

export enum TransportErrorCode {
  NETWORK_ERROR = 'TRANSPORT_NETWORK_ERROR',
  TIMEOUT = 'TRANSPORT_TIMEOUT',
  HTTP_ERROR = 'TRANSPORT_HTTP_ERROR',
  DECODE_ERROR = 'TRANSPORT_DECODE_ERROR',
}

// =============================================================================
// URL Masking Utility
// =============================================================================

/**
 * Masks sensitive data in a URL for safe logging and error messages.
 *
 * Removes or masks:
 * - Password in userinfo (user:password@host)
 * - Query parameters that may contain tokens
 * - The session token segment of session paths
 *
 * @internal
 */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);

    if (parsed.password) {
      parsed.password = '***';
    }

    const sensitiveParams = ['token', 'key', 'secret', 'password', 'auth', 'api_key', 'access_token'];
    for (const param of sensitiveParams) {
      if (parsed.searchParams.has(param)) {
        parsed.searchParams.set(param, '***');
      }
    }

    parsed.pathname = maskSessionPath(parsed.pathname);
    return parsed.toString();
  } catch {
    const match = url.match(/^(\w+:\/\/)([^/?#]+)/);
    if (match) {
      return `${match[1]}${match[2]}/***`;
    }
    return maskSessionPath(url);
  }
}

/**
 * `/sessions/<token>` becomes `/sessions/***`.
 * @internal
 */
export function maskSessionPath(path: string): string {
  return path.replace(/(\/sessions\/)[^/?#]+/, '$1***');
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class for all recordset errors
 *
 * @example
 * ```typescript
 * try {
 *   await people.query().find({ name: 'Ada' }).toArray();
 * } catch (error) {
 *   if (error instanceof RecordsetError) {
 *     console.log(error.code);          // 'SESSION_LOGIN_FAILED'
 *     console.log(error.isRetryable()); // false
 *     logger.error(error.message, error);
 *   }
 * }
 * ```
 */
export abstract class RecordsetError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  /** Error category for consistent handling */
  abstract readonly category: ErrorCategory;

  /** Timestamp when error occurred */
  readonly timestamp: number;

  context?: ErrorContext;

  constructor(message: string, options?: { cause?: unknown; context?: ErrorContext }) {
    super(message, { cause: options?.cause });
    this.timestamp = Date.now();
    this.context = options?.context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * The core never retries on its own; callers may consult this to decide.
   */
  isRetryable(): boolean {
    return false;
  }

  toJSON(): SerializedError {
    const result: SerializedError = {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };

    if (this.context) {
      result.context = this.context;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause instanceof RecordsetError) {
      result.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      result.cause = {
        name: this.cause.name,
        code: 'UNKNOWN',
        message: this.cause.message,
        timestamp: this.timestamp,
        stack: this.cause.stack,
      };
    }

    return result;
  }

  toLogEntry(): ErrorLogEntry {
    return {
      level: 'error',
      timestamp: new Date(this.timestamp).toISOString(),
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        stack: this.stack,
      },
      metadata: {
        category: this.category,
        ...this.context,
      },
    };
  }

  /**
   * Merge additional context into the error
   */
  withContext(context: ErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }
}

// =============================================================================
// Validation Error
// =============================================================================

/**
 * Malformed query construction, configuration or field access.
 *
 * Raised synchronously while building a query, before any network call.
 *
 * @public
 * @since 0.1.0
 */
export class ValidationError extends RecordsetError {
  readonly code: ValidationErrorCode;
  readonly category = ErrorCategory.VALIDATION;

  constructor(code: ValidationErrorCode, message: string, options?: { cause?: unknown; context?: ErrorContext }) {
    super(message, options);
    this.name = 'ValidationError';
    this.code = code;
  }
}

/**
 * Index access past either end of a result.
 *
 * @public
 * @since 0.1.0
 */
export class IndexOutOfRangeError extends ValidationError {
  readonly index: number;

  constructor(index: number, length?: number) {
    super(
      ValidationErrorCode.INDEX_OUT_OF_RANGE,
      length === undefined
        ? `Index ${index} is out of range`
        : `Index ${index} is out of range for a result of ${length} records`
    );
    this.name = 'IndexOutOfRangeError';
    this.index = index;
  }
}

// =============================================================================
// Session Error
// =============================================================================

/**
 * Login failure, too-fast login retry, terminal invalid token, or an
 * authenticated call without a session while auto-management is off.
 *
 * @public
 * @since 0.1.0
 */
export class SessionError extends RecordsetError {
  readonly code: SessionErrorCode;
  readonly category = ErrorCategory.SESSION;

  /** Remote message behind the failure, when there is one */
  readonly remote?: RemoteMessage;

  constructor(
    code: SessionErrorCode,
    message: string,
    options?: { cause?: unknown; context?: ErrorContext; remote?: RemoteMessage }
  ) {
    super(message, options);
    this.name = 'SessionError';
    this.code = code;
    this.remote = options?.remote;
  }
}

// =============================================================================
// Remote Business Error
// =============================================================================

/**
 * A non-zero, non-invalid-token message code returned by the remote.
 *
 * Common codes:
 * - `101` - Record is missing
 * - `306` - Record modification id does not match
 * - `401` - No records match the request
 *
 * @example
 * ```typescript
 * try {
 *   await record.save({ checkModId: true });
 * } catch (error) {
 *   if (error instanceof RemoteBusinessError && error.remoteCode === '306') {
 *     await record.refresh();
 *   }
 * }
 * ```
 *
 * @public
 * @since 0.1.0
 */
export class RemoteBusinessError extends RecordsetError {
  readonly code = 'REMOTE_ERROR';
  readonly category = ErrorCategory.REMOTE;

  /** Code of the first error message */
  readonly remoteCode: string;

  /** Every message of the response, including non-error ones */
  readonly messages: RemoteMessage[];

  constructor(error: RemoteMessage, messages: RemoteMessage[] = [error], options?: { context?: ErrorContext }) {
    super(`Remote returned error ${error.code}: ${error.message}`, options);
    this.name = 'RemoteBusinessError';
    this.remoteCode = error.code;
    this.messages = messages;
  }
}

// =============================================================================
// Transport Error
// =============================================================================

/**
 * Network failure, timeout, non-JSON response or an envelope that does not
 * match the expected shape.
 *
 * @public
 * @since 0.1.0
 */
export class TransportError extends RecordsetError {
  readonly code: TransportErrorCode;
  readonly category = ErrorCategory.TRANSPORT;

  /** HTTP status, when a response was received */
  readonly status?: number;

  /** Request URL with sensitive parts masked */
  readonly url?: string;

  constructor(
    code: TransportErrorCode,
    message: string,
    options?: { cause?: unknown; context?: ErrorContext; status?: number; url?: string }
  ) {
    const maskedUrl = options?.url ? maskUrl(options.url) : undefined;
    super(maskedUrl ? `${message} (url: ${maskedUrl})` : message, options);
    this.name = 'TransportError';
    this.code = code;
    this.status = options?.status;
    this.url = maskedUrl;
  }

  override isRetryable(): boolean {
    return this.code === TransportErrorCode.NETWORK_ERROR || this.code === TransportErrorCode.TIMEOUT;
  }
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Wraps anything thrown by foreign code in a RecordsetError.
 */
export class UnexpectedError extends RecordsetError {
  readonly code = 'INTERNAL_UNEXPECTED';
  readonly category = ErrorCategory.INTERNAL;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnexpectedError';
  }
}

export function toRecordsetError(error: unknown): RecordsetError {
  if (error instanceof RecordsetError) {
    return error;
  }
  if (error instanceof Error) {
    return new UnexpectedError(error.message, { cause: error });
  }
  return new UnexpectedError(String(error));
}
