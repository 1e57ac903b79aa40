/**
 * Zod Schemas
 *
 * Runtime validation for every payload the remote returns, and for the
 * client configuration.
 */

import { z, ZodError } from 'zod';
import { createModId, createRecordId, type RemoteMessage } from '@recordset/shared-types';
import {
  ValidationError,
  ValidationErrorCode,
  TransportError,
  TransportErrorCode,
  type ErrorContext,
} from './errors.js';
import type { Page, RawPortalRecord, ScriptOutcome, ScriptResults } from './types.js';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Scalar values as the remote sends them
 */
export const WireValueSchema = z.union([z.string(), z.number()]);

const IdSchema = z.union([z.string().trim().min(1), z.number().int().nonnegative()]).transform((value) => String(value));

export const RecordIdSchema = IdSchema.transform((value) => createRecordId(value));

export const ModIdSchema = IdSchema.transform((value) => createModId(value));

// =============================================================================
// Envelope Schemas
// =============================================================================

/**
 * One entry of the `messages` list. Codes arrive as strings; numbers are
 * accepted and normalized.
 */
export const RemoteMessageSchema = z.object({
  code: z.union([z.string(), z.number()]).transform((value) => String(value)),
  message: z.string().default(''),
});

/**
 * Every response has this shape
 */
export const ResponseEnvelopeSchema = z.object({
  response: z.record(z.string(), z.unknown()).default({}),
  messages: z.array(RemoteMessageSchema).min(1),
});

export type ValidatedEnvelope = z.infer<typeof ResponseEnvelopeSchema>;

// =============================================================================
// Response Body Schemas
// =============================================================================

export const LoginResponseSchema = z.object({
  token: z.string().min(1),
});

export const DataInfoSchema = z
  .object({
    database: z.string(),
    layout: z.string(),
    table: z.string(),
    totalRecordCount: z.number().int(),
    foundCount: z.number().int(),
    returnedCount: z.number().int(),
  })
  .partial();

export const PortalDataInfoSchema = z
  .object({
    portalObjectName: z.string(),
    database: z.string(),
    table: z.string(),
    foundCount: z.number().int(),
    returnedCount: z.number().int(),
  })
  .partial();

/**
 * A related row: `recordId`, `modId` and `table::field` keyed values
 */
export const PortalRecordSchema = z
  .object({
    recordId: RecordIdSchema,
    modId: ModIdSchema,
  })
  .catchall(WireValueSchema)
  .transform(({ recordId, modId, ...fields }): RawPortalRecord => ({ recordId, modId, fields }));

export const RecordDataSchema = z.object({
  recordId: RecordIdSchema,
  modId: ModIdSchema,
  fieldData: z.record(z.string(), WireValueSchema),
  portalData: z.record(z.string(), z.array(PortalRecordSchema)).default({}),
  portalDataInfo: z.array(PortalDataInfoSchema).default([]),
});

export const RecordsResponseSchema = z.object({
  dataInfo: DataInfoSchema.optional(),
  data: z.array(RecordDataSchema).default([]),
});

export const CreateRecordResponseSchema = z.object({
  recordId: RecordIdSchema,
  modId: ModIdSchema,
});

export const EditRecordResponseSchema = z.object({
  modId: ModIdSchema,
});

// =============================================================================
// Validation Functions
// =============================================================================

/**
 * Human-readable description of validation issues
 */
export function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validate a decoded response body as an envelope.
 *
 * @throws TransportError with code DECODE_ERROR if the shape does not match
 */
export function parseEnvelope(data: unknown, context?: ErrorContext): ValidatedEnvelope {
  const result = ResponseEnvelopeSchema.safeParse(data);
  if (!result.success) {
    throw new TransportError(TransportErrorCode.DECODE_ERROR, `Invalid response envelope: ${formatIssues(result.error)}`, {
      cause: result.error,
      context,
    });
  }
  return result.data;
}

/**
 * Validate the `response` member of an envelope against an operation's schema.
 *
 * @throws TransportError with code DECODE_ERROR if the shape does not match
 */
export function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, response: unknown, context?: ErrorContext): T {
  const result = schema.safeParse(response);
  if (!result.success) {
    throw new TransportError(TransportErrorCode.DECODE_ERROR, `Invalid response body: ${formatIssues(result.error)}`, {
      cause: result.error,
      context,
    });
  }
  return result.data;
}

/**
 * First message whose code is not the success code, if any
 */
export function firstError(messages: readonly RemoteMessage[]): RemoteMessage | undefined {
  return messages.find((message) => message.code !== '0');
}

/**
 * Convert a records response into a page
 */
export function toPage(response: Record<string, unknown>, context?: ErrorContext): Page {
  const body = parseResponse(RecordsResponseSchema, response, context);
  return {
    records: body.data,
    dataInfo: body.dataInfo,
    scriptResults: extractScriptResults(response),
  };
}

function scriptOutcome(response: Record<string, unknown>, suffix: string): ScriptOutcome | undefined {
  const result = response[`scriptResult${suffix}`];
  const error = response[`scriptError${suffix}`];
  if (result === undefined && error === undefined) {
    return undefined;
  }
  const outcome: ScriptOutcome = {};
  if (result !== undefined) {
    outcome.result = String(result);
  }
  if (error !== undefined) {
    outcome.error = String(error);
  }
  return outcome;
}

/**
 * Script results and errors the remote reports next to the response data
 */
export function extractScriptResults(response: Record<string, unknown>): ScriptResults {
  const results: ScriptResults = {};
  const prerequest = scriptOutcome(response, '.prerequest');
  const presort = scriptOutcome(response, '.presort');
  const after = scriptOutcome(response, '');
  if (prerequest) results.prerequest = prerequest;
  if (presort) results.presort = presort;
  if (after) results.after = after;
  return results;
}

// =============================================================================
// Configuration Schema
// =============================================================================

function hasMethod(value: unknown, name: string): boolean {
  return typeof value === 'object' && value !== null && name in value && typeof Reflect.get(value, name) === 'function';
}

/**
 * Shape check of the client configuration. Collaborator objects are
 * checked for the methods the client calls on them.
 */
export const ClientConfigSchema = z.object({
  url: z.string().url(),
  database: z.string().min(1),
  session: z.custom<unknown>((value) => hasMethod(value, 'login'), { message: 'session must provide login()' }),
  apiVersion: z.string().regex(/^v\w+$/).optional(),
  timeoutMs: z.number().int().positive().optional(),
  loginCooldownMs: z.number().int().nonnegative().nullable().optional(),
  invalidTokenCode: z.string().min(1).optional(),
  autoManageSession: z.boolean().optional(),
  defaultChunkSize: z.number().int().positive().optional(),
  transport: z.custom<unknown>((value) => hasMethod(value, 'send'), { message: 'transport must provide send()' }).optional(),
  logger: z.custom<unknown>((value) => hasMethod(value, 'child'), { message: 'logger must provide child()' }).optional(),
  codec: z
    .custom<unknown>((value) => hasMethod(value, 'encode') && hasMethod(value, 'decode'), {
      message: 'codec must provide encode() and decode()',
    })
    .optional(),
  onNewSession: z.custom<unknown>((value) => typeof value === 'function', { message: 'onNewSession must be a function' }).optional(),
});

/**
 * @throws ValidationError with code INVALID_CONFIG
 */
export function assertValidConfig(config: unknown): void {
  const result = ClientConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ValidationError(ValidationErrorCode.INVALID_CONFIG, `Invalid client configuration: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
}
