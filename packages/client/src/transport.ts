/**
 * HTTP transport over the global `fetch`.
 *
 * @packageDocumentation
 */

import { TransportError, TransportErrorCode } from './errors.js';
import type { StructuredLogger } from './logging.js';
import type { Transport, TransportRequest } from './types.js';

export type { Transport, TransportRequest } from './types.js';

/**
 * @public
 * @since 0.1.0
 */
export interface FetchTransportOptions {
  /** Server URL; request paths are appended to it */
  baseUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Headers added to every request */
  headers?: Record<string, string>;
  /** Replacement for the global fetch */
  fetch?: typeof fetch;
  logger?: StructuredLogger;
}

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Default {@link Transport}: JSON in, JSON out.
 *
 * Bodies are parsed as JSON for any HTTP status, since the remote reports
 * business errors in the body. A non-JSON body becomes a TransportError
 * (`HTTP_ERROR` for a failing status, `DECODE_ERROR` otherwise), as do
 * network failures (`NETWORK_ERROR`) and timeouts (`TIMEOUT`).
 *
 * @public
 * @since 0.1.0
 */
export class FetchTransport implements Transport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: typeof fetch;
  private readonly logger?: StructuredLogger;

  constructor(options: FetchTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.headers = options.headers ?? {};
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger;
  }

  async send(request: TransportRequest): Promise<unknown> {
    const url = `${this.baseUrl}${request.path}`;
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.headers,
      ...request.headers,
    };
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await this.fetchFn(url, {
        method: request.method,
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError(TransportErrorCode.TIMEOUT, `Request timed out after ${this.timeoutMs}ms`, {
          cause: error,
          url,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(TransportErrorCode.NETWORK_ERROR, `Request failed: ${reason}`, { cause: error, url });
    } finally {
      clearTimeout(timeoutId);
    }

    this.logger?.debug('HTTP {method} answered {status}', { method: request.method, status });

    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      if (!ok) {
        throw new TransportError(TransportErrorCode.HTTP_ERROR, `HTTP ${status} with a non-JSON body`, {
          cause: error,
          status,
          url,
        });
      }
      throw new TransportError(TransportErrorCode.DECODE_ERROR, 'Response body is not valid JSON', {
        cause: error,
        status,
        url,
      });
    }
  }
}
