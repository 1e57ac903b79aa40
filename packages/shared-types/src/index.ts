/**
 * @recordset/shared-types - Shared vocabulary for the recordset packages
 *
 * This package provides the canonical type definitions for:
 * - record identity (branded record and modification ids)
 * - the remote response envelope and its message codes
 * - sort, script and portal request inputs
 * - field types and the values they decode to
 *
 * ## Stability
 *
 * Exports are marked with stability annotations:
 *
 * - **stable**: No breaking changes in minor versions.
 * - **experimental**: May change in any version.
 *
 * @packageDocumentation
 */

// =============================================================================
// Runtime Configuration (re-exported from config.ts)
// =============================================================================

/**
 * @public
 * @stability stable
 */
export {
  type ClientDefaults,
  DEFAULT_CLIENT_CONFIG,
  setDevMode,
  isDevMode,
} from './config.js';

import { isDevMode } from './config.js';

// =============================================================================
// Branded Types
// =============================================================================

declare const RecordIdBrand: unique symbol;
declare const ModIdBrand: unique symbol;

/**
 * Branded type for remote record identifiers.
 *
 * The remote assigns record ids; they are stable for the lifetime of a record
 * and are the key used to deduplicate records across pages.
 *
 * @example
 * ```typescript
 * import { createRecordId, type RecordId } from '@recordset/shared-types';
 *
 * const id: RecordId = createRecordId('42');
 * ```
 *
 * @public
 * @stability stable
 */
export type RecordId = string & { readonly [RecordIdBrand]: never };

/**
 * Branded type for modification ids.
 *
 * The remote bumps a record's mod id on every write. Sending the last seen
 * mod id with an edit makes the remote reject the edit if someone else wrote
 * the record in between.
 *
 * @public
 * @stability stable
 */
export type ModId = string & { readonly [ModIdBrand]: never };

function normalizeId(kind: string, id: string | number): string {
  const value = typeof id === 'number' ? String(id) : id;
  if (isDevMode()) {
    if (typeof value !== 'string') {
      throw new Error(`${kind} must be a string or a number`);
    }
    if (value.trim().length === 0) {
      throw new Error(`${kind} cannot be empty`);
    }
  }
  return value;
}

/**
 * Create a typed RecordId.
 * @throws Error if id is empty or whitespace-only (in dev mode)
 * @public
 * @stability stable
 */
export function createRecordId(id: string | number): RecordId {
  return normalizeId('RecordId', id) as RecordId;
}

/**
 * Create a typed ModId.
 * @throws Error if id is empty or whitespace-only (in dev mode)
 * @public
 * @stability stable
 */
export function createModId(id: string | number): ModId {
  return normalizeId('ModId', id) as ModId;
}

/**
 * @public
 * @stability stable
 */
export function isValidRecordId(value: unknown): value is RecordId {
  return typeof value === 'string' && value.trim().length > 0;
}

// =============================================================================
// Response Envelope
// =============================================================================

/**
 * One entry of the `messages` list the remote attaches to every response.
 *
 * @public
 * @stability stable
 */
export interface RemoteMessage {
  /** Numeric code rendered as a string; `'0'` means success */
  code: string;
  message: string;
}

/**
 * Every remote response has this shape. `response` is empty (`{}`) when the
 * call failed.
 *
 * @public
 * @stability stable
 */
export interface ResponseEnvelope<T = Record<string, unknown>> {
  response: T;
  messages: RemoteMessage[];
}

/**
 * Message codes the client interprets.
 *
 * @public
 * @stability stable
 */
export const RemoteCode = {
  /** Success */
  OK: '0',
  /** Record is missing */
  RECORD_MISSING: '101',
  /** Record modification id does not match */
  MOD_ID_MISMATCH: '306',
  /** No records match the request */
  NO_RECORDS_MATCH: '401',
  /** Invalid or expired session token */
  INVALID_TOKEN: '952',
} as const;

export type RemoteCodeValue = (typeof RemoteCode)[keyof typeof RemoteCode];

// =============================================================================
// Request Inputs
// =============================================================================

/**
 * @public
 * @stability stable
 */
export type SortOrder = 'ascend' | 'descend';

/**
 * One sort key, in the shape the remote accepts.
 *
 * @public
 * @stability stable
 */
export interface SortKey {
  /** Remote field name */
  fieldName: string;
  sortOrder: SortOrder;
}

/**
 * @public
 * @stability stable
 */
export interface ScriptInput {
  name: string;
  param?: string;
}

/**
 * Scripts the remote runs around a request: before the request, before the
 * sort, and after the request.
 *
 * @public
 * @stability stable
 */
export interface ScriptsInput {
  prerequest?: ScriptInput;
  presort?: ScriptInput;
  after?: ScriptInput;
}

/**
 * Related-collection (portal) directive of a record request.
 * `offset` is 0-based here; the request mapping converts it.
 *
 * @public
 * @stability stable
 */
export interface PortalRequest {
  name: string;
  offset?: number;
  limit?: number;
}

// =============================================================================
// Field Types
// =============================================================================

/**
 * Field types the wire codec knows.
 *
 * @public
 * @stability stable
 */
export type FieldType = 'text' | 'number' | 'boolean' | 'date' | 'timestamp';

/**
 * The TypeScript value a field of each type decodes to.
 *
 * @public
 * @stability stable
 */
export interface FieldValueMap {
  text: string;
  number: number;
  boolean: boolean;
  date: Date;
  timestamp: Date;
}

/**
 * A decoded field value. Empty remote values decode to `null`.
 *
 * @public
 * @stability stable
 */
export type FieldValue<T extends FieldType = FieldType> = FieldValueMap[T] | null;

/**
 * Values as they travel on the wire.
 *
 * @public
 * @stability stable
 */
export type WireValue = string | number;

/**
 * @public
 * @stability stable
 */
export const FIELD_TYPES: readonly FieldType[] = ['text', 'number', 'boolean', 'date', 'timestamp'];

/**
 * @public
 * @stability stable
 */
export function isFieldType(value: unknown): value is FieldType {
  return FIELD_TYPES.some((type) => type === value);
}
