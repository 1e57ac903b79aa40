/**
 * Request mapping
 *
 * Paths, query strings and bodies of the remote's record endpoints. Offsets
 * are 0-based on input and 1-based on the wire.
 *
 * @packageDocumentation
 */

import type { PortalRequest, ScriptsInput, SortKey } from '@recordset/shared-types';
import type {
  CreateRecordRequest,
  DeleteRecordRequest,
  DuplicateRecordRequest,
  EditRecordRequest,
  FindRequest,
  GetRecordRequest,
  GetRecordsRequest,
  QueryClause,
} from './types.js';

/** Records per request when an operation sets no limit */
export const DEFAULT_PAGE_LIMIT = 100;

// =============================================================================
// Paths
// =============================================================================

export interface ApiLocation {
  version: string;
  database: string;
}

function databasePath(location: ApiLocation): string {
  return `/fmi/data/${encodeURIComponent(location.version)}/databases/${encodeURIComponent(location.database)}`;
}

export function sessionPath(location: ApiLocation, token?: string): string {
  const base = `${databasePath(location)}/sessions`;
  return token === undefined ? base : `${base}/${encodeURIComponent(token)}`;
}

export function recordsPath(location: ApiLocation, layout: string): string {
  return `${databasePath(location)}/layouts/${encodeURIComponent(layout)}/records`;
}

export function recordPath(location: ApiLocation, layout: string, recordId: string): string {
  return `${recordsPath(location, layout)}/${encodeURIComponent(recordId)}`;
}

export function findPath(location: ApiLocation, layout: string): string {
  return `${databasePath(location)}/layouts/${encodeURIComponent(layout)}/_find`;
}

export function scriptPath(location: ApiLocation, layout: string, script: string): string {
  return `${databasePath(location)}/layouts/${encodeURIComponent(layout)}/script/${encodeURIComponent(script)}`;
}

export function globalsPath(location: ApiLocation): string {
  return `${databasePath(location)}/globals`;
}

/**
 * Append `params` as a query string; the path is returned as is when there
 * are none
 */
export function withQuery(path: string, params: Record<string, string>): string {
  const query = new URLSearchParams(params).toString();
  return query.length > 0 ? `${path}?${query}` : path;
}

// =============================================================================
// Shared Parameters
// =============================================================================

/**
 * `script`, `script.param`, `script.prerequest`, `script.prerequest.param`,
 * `script.presort`, `script.presort.param`
 */
export function scriptParams(scripts: ScriptsInput | undefined): Record<string, string> {
  const params: Record<string, string> = {};
  if (!scripts) return params;

  const add = (prefix: string, script: ScriptsInput[keyof ScriptsInput]): void => {
    if (!script) return;
    params[prefix] = script.name;
    if (script.param !== undefined) {
      params[`${prefix}.param`] = script.param;
    }
  };
  add('script', scripts.after);
  add('script.prerequest', scripts.prerequest);
  add('script.presort', scripts.presort);
  return params;
}

function sortList(sort: readonly SortKey[] | undefined): SortKey[] | undefined {
  if (!sort || sort.length === 0) return undefined;
  return sort.map(({ fieldName, sortOrder }) => ({ fieldName, sortOrder }));
}

/**
 * Portal directives of a query string: `portal` as a JSON list, then
 * `_offset.<name>` (1-based) and `_limit.<name>`
 */
export function portalQueryParams(portals: readonly PortalRequest[] | undefined): Record<string, string> {
  const params: Record<string, string> = {};
  if (!portals || portals.length === 0) return params;

  params.portal = JSON.stringify(portals.map((portal) => portal.name));
  for (const portal of portals) {
    if (portal.offset !== undefined) params[`_offset.${portal.name}`] = String(portal.offset + 1);
    if (portal.limit !== undefined) params[`_limit.${portal.name}`] = String(portal.limit);
  }
  return params;
}

/**
 * Portal directives of a find body: `portal` as a list, then
 * `offset.<name>` (1-based) and `limit.<name>`
 */
export function portalBodyParams(portals: readonly PortalRequest[] | undefined): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  if (!portals || portals.length === 0) return params;

  params.portal = portals.map((portal) => portal.name);
  for (const portal of portals) {
    if (portal.offset !== undefined) params[`offset.${portal.name}`] = String(portal.offset + 1);
    if (portal.limit !== undefined) params[`limit.${portal.name}`] = String(portal.limit);
  }
  return params;
}

// =============================================================================
// Operations
// =============================================================================

export function getRecordsQuery(request: GetRecordsRequest): Record<string, string> {
  const params: Record<string, string> = {
    _offset: String((request.offset ?? 0) + 1),
    _limit: String(request.limit ?? DEFAULT_PAGE_LIMIT),
  };
  if (request.responseLayout !== undefined) params['layout.response'] = request.responseLayout;
  const sort = sortList(request.sort);
  if (sort) params._sort = JSON.stringify(sort);
  return { ...params, ...portalQueryParams(request.portals), ...scriptParams(request.scripts) };
}

function clauseBody(clause: QueryClause): Record<string, string> {
  return { ...clause.fields, omit: clause.omit ? 'true' : 'false' };
}

export function findBody(request: FindRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    query: request.query.map(clauseBody),
    offset: String((request.offset ?? 0) + 1),
    limit: String(request.limit ?? DEFAULT_PAGE_LIMIT),
  };
  const sort = sortList(request.sort);
  if (sort) body.sort = sort;
  if (request.responseLayout !== undefined) body['layout.response'] = request.responseLayout;
  return { ...body, ...portalBodyParams(request.portals), ...scriptParams(request.scripts) };
}

export function getRecordQuery(request: GetRecordRequest): Record<string, string> {
  const params: Record<string, string> = {};
  if (request.responseLayout !== undefined) params['layout.response'] = request.responseLayout;
  return { ...params, ...portalQueryParams(request.portals), ...scriptParams(request.scripts) };
}

export function createRecordBody(request: CreateRecordRequest): Record<string, unknown> {
  const body: Record<string, unknown> = { fieldData: request.fieldData };
  if (request.portalData !== undefined) body.portalData = request.portalData;
  return { ...body, ...scriptParams(request.scripts) };
}

export function editRecordBody(request: EditRecordRequest): Record<string, unknown> {
  const body: Record<string, unknown> = { fieldData: request.fieldData };
  if (request.modId !== undefined) body.modId = request.modId;
  if (request.portalData !== undefined) body.portalData = request.portalData;
  return { ...body, ...scriptParams(request.scripts) };
}

export function duplicateRecordBody(request: DuplicateRecordRequest): Record<string, unknown> {
  return scriptParams(request.scripts);
}

export function performScriptQuery(param: string | undefined): Record<string, string> {
  return param === undefined ? {} : { 'script.param': param };
}

export function deleteRecordQuery(request: DeleteRecordRequest): Record<string, string> {
  return scriptParams(request.scripts);
}

export function globalsBody(globalFields: Record<string, string | number>): Record<string, unknown> {
  return { globalFields };
}
