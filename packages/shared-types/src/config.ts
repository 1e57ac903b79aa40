/**
 * Runtime Configuration for @recordset/shared-types
 *
 * Holds the client defaults and the runtime validation mode. Kept apart from
 * the pure type definitions in index.ts.
 *
 * The dev-mode flag is process-wide state: it controls whether the branded
 * id factories validate their input.
 *
 * @module config
 */

// =============================================================================
// Client Defaults
// =============================================================================

/**
 * Default values for the optional client settings.
 *
 * @public
 * @since 0.1.0
 */
export interface ClientDefaults {
  /** Remote API version segment in every path */
  apiVersion: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Minimum delay between two login attempts; `null` disables the guard */
  loginCooldownMs: number | null;
  /** Remote message code that means "token invalid or expired" */
  invalidTokenCode: string;
  /** Whether authenticated calls log in and re-login on their own */
  autoManageSession: boolean;
  /** Records requested per page when a query sets no chunk size */
  defaultChunkSize: number;
}

/**
 * @public
 * @since 0.1.0
 */
export const DEFAULT_CLIENT_CONFIG: Readonly<ClientDefaults> = {
  apiVersion: 'v1',
  timeoutMs: 30000,
  loginCooldownMs: 1000,
  invalidTokenCode: '952',
  autoManageSession: true,
  defaultChunkSize: 1000,
} as const;

// =============================================================================
// Runtime Mode Configuration
// =============================================================================

let _devMode = true;

/**
 * Set development mode for enabling runtime validation
 */
export function setDevMode(enabled: boolean): void {
  _devMode = enabled;
}

/**
 * Check if development mode is enabled
 */
export function isDevMode(): boolean {
  return _devMode;
}
