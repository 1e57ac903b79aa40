/**
 * Session Controller
 *
 * Owns the session token and its lifecycle:
 *
 * ```
 * no_session -> logging_in -> active -> invalidated -> logging_in -> active | failed
 * ```
 *
 * Every login goes through one in-flight promise, so overlapping callers
 * never start two logins. Authenticated calls run through
 * {@link SessionController.callWithAutoRetry}, which re-logs in once when the
 * remote rejects the token.
 *
 * @packageDocumentation
 */

import { DEFAULT_CLIENT_CONFIG, type RemoteMessage } from '@recordset/shared-types';
import { RemoteBusinessError, SessionError, SessionErrorCode } from './errors.js';
import { createLogger, NoOpSink, type StructuredLogger } from './logging.js';
import { firstError } from './schemas.js';
import type { SessionBackend, SessionProvider } from './session-providers.js';

// =============================================================================
// Types
// =============================================================================

export type SessionState = 'no_session' | 'logging_in' | 'active' | 'invalidated' | 'failed';

/**
 * State change event
 */
export interface SessionStateChange {
  previousState: SessionState;
  currentState: SessionState;
  timestamp: number;
  trigger: string;
}

export interface SessionControllerOptions {
  provider: SessionProvider;
  backend: SessionBackend;
  /** Minimum delay between two login attempts; `null` disables the guard */
  loginCooldownMs?: number | null;
  /** Remote code meaning "token invalid or expired" */
  invalidTokenCode?: string;
  /** When false, authenticated calls never log in on their own */
  autoManage?: boolean;
  /** Clock in milliseconds */
  now?: () => number;
  logger?: StructuredLogger;
  /** Runs after every successful login, with the new session already active */
  onNewSession?: () => void | Promise<void>;
}

export interface EnsureLoggedInOptions {
  /** Skip the too-fast-retry guard */
  bypassRetryGuard?: boolean;
}

interface Envelope {
  messages: readonly RemoteMessage[];
}

// =============================================================================
// Controller
// =============================================================================

/**
 * @public
 * @since 0.1.0
 */
export class SessionController {
  private currentState: SessionState = 'no_session';
  private token: string | null = null;
  private lastLoginAttempt: number | null = null;
  private inflight: Promise<void> | null = null;
  private readonly listeners: Set<(event: SessionStateChange) => void> = new Set();

  private readonly provider: SessionProvider;
  private readonly backend: SessionBackend;
  private readonly loginCooldownMs: number | null;
  private readonly invalidTokenCode: string;
  private readonly autoManage: boolean;
  private readonly now: () => number;
  private readonly logger: StructuredLogger;
  private readonly onNewSession?: () => void | Promise<void>;

  /**
   * Valid state transitions map
   */
  private static readonly VALID_TRANSITIONS: Map<SessionState, SessionState[]> = new Map([
    ['no_session', ['logging_in']],
    ['logging_in', ['active', 'failed']],
    ['active', ['invalidated', 'no_session', 'failed']],
    ['invalidated', ['logging_in', 'no_session']],
    ['failed', ['logging_in', 'no_session']],
  ]);

  constructor(options: SessionControllerOptions) {
    this.provider = options.provider;
    this.backend = options.backend;
    this.loginCooldownMs =
      options.loginCooldownMs === undefined ? DEFAULT_CLIENT_CONFIG.loginCooldownMs : options.loginCooldownMs;
    this.invalidTokenCode = options.invalidTokenCode ?? DEFAULT_CLIENT_CONFIG.invalidTokenCode;
    this.autoManage = options.autoManage ?? DEFAULT_CLIENT_CONFIG.autoManageSession;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ sink: new NoOpSink() });
    this.onNewSession = options.onNewSession;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get isActive(): boolean {
    return this.currentState === 'active';
  }

  /**
   * Subscribe to state changes
   * @returns unsubscribe function
   */
  onStateChange(listener: (event: SessionStateChange) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private transition(next: SessionState, trigger: string): void {
    const previous = this.currentState;
    if (previous === next) return;
    const valid = SessionController.VALID_TRANSITIONS.get(previous);
    if (!valid?.includes(next)) {
      this.logger.warn('Ignored session transition {from} -> {to}', { from: previous, to: next, trigger });
      return;
    }

    this.currentState = next;
    this.logger.debug('Session {from} -> {to}', { from: previous, to: next, trigger });
    const event: SessionStateChange = { previousState: previous, currentState: next, timestamp: this.now(), trigger };
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  // ===========================================================================
  // Login
  // ===========================================================================

  /**
   * Log in unless a session is active. Concurrent callers share one login.
   *
   * @throws SessionError LOGIN_RETRIED_TOO_FAST when a login would start
   *   within the cooldown of the previous attempt
   * @throws SessionError LOGIN_FAILED when the remote rejects the login
   */
  async ensureLoggedIn(options: EnsureLoggedInOptions = {}): Promise<void> {
    if (this.currentState === 'active') {
      return;
    }
    if (this.inflight === null) {
      this.assertNotTooFast(options.bypassRetryGuard ?? false);
      this.inflight = this.login().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private assertNotTooFast(bypass: boolean): void {
    if (bypass || this.loginCooldownMs === null || this.lastLoginAttempt === null) {
      return;
    }
    const elapsed = this.now() - this.lastLoginAttempt;
    if (elapsed <= this.loginCooldownMs) {
      throw new SessionError(
        SessionErrorCode.LOGIN_RETRIED_TOO_FAST,
        `Login retried ${elapsed} ms after the previous attempt; wait at least ${this.loginCooldownMs} ms`
      );
    }
  }

  private async login(): Promise<void> {
    this.transition('logging_in', 'login');
    try {
      this.token = await this.provider.login(this.backend);
      this.transition('active', 'login succeeded');
      if (this.onNewSession) {
        await this.onNewSession();
      }
    } catch (error) {
      this.token = null;
      this.transition('failed', 'login failed');
      this.logger.warn('Login failed: {reason}', { reason: error instanceof Error ? error.message : String(error) });
      throw this.loginFailure(error);
    } finally {
      this.lastLoginAttempt = this.now();
    }
  }

  private loginFailure(error: unknown): unknown {
    if (error instanceof RemoteBusinessError) {
      return new SessionError(SessionErrorCode.LOGIN_FAILED, `Login failed: ${error.message}`, {
        cause: error,
        remote: error.messages.find((message) => message.code === error.remoteCode),
      });
    }
    return error;
  }

  // ===========================================================================
  // Authenticated Calls
  // ===========================================================================

  private invalidTokenMessage(envelope: Envelope): RemoteMessage | undefined {
    const error = firstError(envelope.messages);
    return error?.code === this.invalidTokenCode ? error : undefined;
  }

  private requireToken(): string {
    if (this.currentState !== 'active' || this.token === null) {
      throw new SessionError(SessionErrorCode.NO_SESSION, 'No active session; log in first');
    }
    return this.token;
  }

  /**
   * Wait until a session is active and return its token. Another call may
   * invalidate the session and start a new login between the wait and the
   * read, so the state is checked again after every login.
   */
  private async activeToken(options: EnsureLoggedInOptions = {}): Promise<string> {
    for (;;) {
      await this.ensureLoggedIn(options);
      if (this.currentState === 'active' && this.token !== null) {
        return this.token;
      }
    }
  }

  /**
   * Invalidate the session, but only if `token` is still the current one.
   * A caller holding a token that was already replaced does nothing.
   */
  private markInvalidated(token: string): void {
    if (this.currentState === 'active' && this.token === token) {
      this.token = null;
      this.transition('invalidated', 'token rejected');
    }
  }

  /**
   * Run `op` with the current token. When the remote answers with the
   * invalid-token code, log in again and run `op` once more.
   *
   * Any other envelope, success or business error, is returned unchanged;
   * thrown errors propagate without a re-login.
   *
   * @throws SessionError INVALID_TOKEN when the token is rejected twice
   * @throws SessionError NO_SESSION when auto-management is off and no
   *   session is active
   */
  async callWithAutoRetry<E extends Envelope>(op: (token: string) => Promise<E>): Promise<E> {
    if (!this.autoManage) {
      const token = this.requireToken();
      const envelope = await op(token);
      if (this.invalidTokenMessage(envelope)) {
        this.markInvalidated(token);
      }
      return envelope;
    }

    const token = await this.activeToken({ bypassRetryGuard: true });
    const envelope = await op(token);
    if (!this.invalidTokenMessage(envelope)) {
      return envelope;
    }

    this.markInvalidated(token);
    this.logger.debug('Session token rejected, logging in again');
    const retryToken = await this.activeToken();
    const retried = await op(retryToken);
    const rejected = this.invalidTokenMessage(retried);
    if (rejected) {
      this.markInvalidated(retryToken);
      throw new SessionError(
        SessionErrorCode.INVALID_TOKEN,
        `Session token rejected after a new login: ${rejected.code}: ${rejected.message}`,
        { remote: rejected }
      );
    }
    return retried;
  }

  // ===========================================================================
  // Logout
  // ===========================================================================

  /**
   * Close the active session on the remote and forget the token.
   * An invalid-token answer counts as closed.
   *
   * @returns false when no session was active
   * @throws RemoteBusinessError for any other error code
   */
  async logout(): Promise<boolean> {
    if (this.currentState !== 'active' || this.token === null) {
      return false;
    }

    const token = this.token;
    try {
      const envelope = await this.backend.closeSession(token);
      const error = firstError(envelope.messages);
      if (error && error.code !== this.invalidTokenCode) {
        throw new RemoteBusinessError(error, envelope.messages);
      }
    } finally {
      this.token = null;
      this.transition('no_session', 'logout');
    }
    return true;
  }

  /**
   * Drop the current token. The next authenticated call logs in again.
   */
  invalidate(): void {
    if (this.token !== null) {
      this.markInvalidated(this.token);
    }
  }
}
