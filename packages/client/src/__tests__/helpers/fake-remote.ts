/**
 * In-process stand-in for the remote record API.
 *
 * Serves sessions, range reads, finds, single-record reads and writes from
 * in-memory tables, and records every request it answers. Tests mutate the
 * tables between requests through `onRequest`.
 */

import { createRecordId, type RecordId, type WireValue } from '@recordset/shared-types';
import type { Transport, TransportRequest } from '../../types.js';

export interface FakePortalRow {
  recordId: string;
  modId: string;
  fields: Record<string, WireValue>;
}

export interface FakeRecord {
  recordId: RecordId;
  modId: string;
  fieldData: Record<string, WireValue>;
  portals: Record<string, FakePortalRow[]>;
}

interface Message {
  code: string;
  message: string;
}

interface Envelope {
  response: Record<string, unknown>;
  messages: Message[];
}

interface PortalSelection {
  name: string;
  offset: number;
  limit: number;
}

export interface FakeRemoteOptions {
  username?: string;
  password?: string;
}

const DEFAULT_PORTAL_LIMIT = 50;
const DEFAULT_LIMIT = 100;

function ok(response: Record<string, unknown> = {}): Envelope {
  return { response, messages: [{ code: '0', message: 'OK' }] };
}

function fail(code: string, message: string): Envelope {
  return { response: {}, messages: [{ code, message }] };
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

function asWireRecord(value: unknown): Record<string, WireValue> {
  const result: Record<string, WireValue> = {};
  for (const [key, item] of Object.entries(asRecord(value))) {
    if (typeof item === 'string' || typeof item === 'number') {
      result[key] = item;
    }
  }
  return result;
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value.map((item: unknown) => item) : [];
}

function unescape(text: string): string {
  return text.replace(/\\(.)/g, '$1');
}

function endsWithWildcard(text: string): boolean {
  return text.endsWith('*') && !text.endsWith('\\*');
}

function compare(a: WireValue, b: string): number {
  const left = Number(a);
  const right = Number(b);
  if (String(a).length > 0 && b.length > 0 && Number.isFinite(left) && Number.isFinite(right)) {
    return left - right;
  }
  return String(a).localeCompare(b);
}

/**
 * Whether a stored value satisfies one rendered criterion
 */
export function matchesCriterion(value: WireValue | undefined, criterion: string): boolean {
  const text = value === undefined ? '' : String(value);
  if (criterion === '*') return text.length > 0;
  if (criterion === '=' || criterion === '==') return text.length === 0;

  if (criterion.startsWith('==')) {
    let pattern = criterion.slice(2);
    const leading = pattern.startsWith('*');
    if (leading) pattern = pattern.slice(1);
    const trailing = endsWithWildcard(pattern);
    if (trailing) pattern = pattern.slice(0, -1);
    const literal = unescape(pattern);
    if (leading && trailing) return text.includes(literal);
    if (leading) return text.endsWith(literal);
    if (trailing) return text.startsWith(literal);
    return text === literal;
  }
  if (value === undefined || text.length === 0) return false;
  if (criterion.startsWith('>=')) return compare(value, unescape(criterion.slice(2))) >= 0;
  if (criterion.startsWith('<=')) return compare(value, unescape(criterion.slice(2))) <= 0;
  if (criterion.startsWith('>')) return compare(value, unescape(criterion.slice(1))) > 0;
  if (criterion.startsWith('<')) return compare(value, unescape(criterion.slice(1))) < 0;

  const range = criterion.split('...');
  if (range.length === 2) {
    return compare(value, unescape(range[0])) >= 0 && compare(value, unescape(range[1])) <= 0;
  }
  return text.startsWith(unescape(criterion));
}

export class FakeRemote implements Transport {
  readonly requests: TransportRequest[] = [];
  readonly layouts = new Map<string, FakeRecord[]>();
  readonly tokens = new Set<string>();
  readonly globals: Record<string, WireValue> = {};
  /** Scripts callable by name; each returns its script result */
  readonly scripts = new Map<string, (param: string | undefined) => string>();
  loginCount = 0;
  /** Number of upcoming logins to reject */
  failLogins = 0;
  /** Runs before each request is answered */
  onRequest?: (request: TransportRequest, remote: FakeRemote) => void;

  private readonly username: string;
  private readonly password: string;
  private nextToken = 1;
  private nextRecordId = 1;
  private nextPortalRowId = 1000;

  constructor(options: FakeRemoteOptions = {}) {
    this.username = options.username ?? 'admin';
    this.password = options.password ?? 'test-secret';
  }

  // ===========================================================================
  // Fixtures
  // ===========================================================================

  table(layout: string): FakeRecord[] {
    let records = this.layouts.get(layout);
    if (!records) {
      records = [];
      this.layouts.set(layout, records);
    }
    return records;
  }

  addRecord(
    layout: string,
    fieldData: Record<string, WireValue>,
    portals: Record<string, Array<Record<string, WireValue>>> = {}
  ): FakeRecord {
    const record: FakeRecord = {
      recordId: createRecordId(this.nextRecordId++),
      modId: '1',
      fieldData: { ...fieldData },
      portals: {},
    };
    for (const [name, rows] of Object.entries(portals)) {
      record.portals[name] = rows.map((fields) => ({ recordId: String(this.nextPortalRowId++), modId: '1', fields }));
    }
    this.table(layout).push(record);
    return record;
  }

  /** Insert at the front of a table, shifting every offset by one */
  prependRecord(layout: string, fieldData: Record<string, WireValue>): FakeRecord {
    const record = this.addRecord(layout, fieldData);
    const records = this.table(layout);
    records.pop();
    records.unshift(record);
    return record;
  }

  /** Forget every issued token, as the remote does when sessions time out */
  expireSessions(): void {
    this.tokens.clear();
  }

  /** Requests whose path (without query string) contains `fragment` */
  requestsTo(fragment: string): TransportRequest[] {
    return this.requests.filter((request) => request.path.split('?')[0].includes(fragment));
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  async send(request: TransportRequest): Promise<unknown> {
    this.requests.push(request);
    this.onRequest?.(request, this);
    return this.answer(request);
  }

  private answer(request: TransportRequest): Envelope {
    const url = new URL(request.path, 'http://remote.test');
    const segments = url.pathname
      .split('/')
      .filter((segment) => segment.length > 0)
      .map((segment) => decodeURIComponent(segment));
    const rest = segments.slice(5);

    if (rest[0] === 'sessions') {
      return this.sessions(request, rest[1]);
    }

    const authorization = request.headers?.Authorization ?? '';
    const token = authorization.startsWith('Bearer ') ? authorization.slice('Bearer '.length) : '';
    if (!this.tokens.has(token)) {
      return fail('952', 'Invalid data access token');
    }

    if (rest[0] === 'globals' && request.method === 'PATCH') {
      Object.assign(this.globals, asWireRecord(asRecord(request.body).globalFields));
      return ok();
    }

    const layout = rest[1];
    if (rest[0] !== 'layouts' || layout === undefined) {
      return fail('3', 'Unsupported command');
    }
    if (rest[2] === 'script' && rest[3] !== undefined && request.method === 'GET') {
      return this.runScript(rest[3], url.searchParams.get('script.param') ?? undefined);
    }
    if (rest[2] === '_find' && request.method === 'POST') {
      return this.find(layout, asRecord(request.body));
    }
    if (rest[2] === 'records' && rest[3] === undefined) {
      if (request.method === 'GET') return this.getRecords(layout, url.searchParams);
      if (request.method === 'POST') return this.create(layout, asRecord(request.body));
    }
    const recordId = rest[3];
    if (rest[2] === 'records' && recordId !== undefined) {
      if (request.method === 'GET') return this.getRecord(layout, recordId, url.searchParams);
      if (request.method === 'POST') return this.duplicate(layout, recordId, asRecord(request.body));
      if (request.method === 'PATCH') return this.edit(layout, recordId, asRecord(request.body));
      if (request.method === 'DELETE') return this.remove(layout, recordId, url.searchParams);
    }
    return fail('3', 'Unsupported command');
  }

  private sessions(request: TransportRequest, token: string | undefined): Envelope {
    if (request.method === 'DELETE' && token !== undefined) {
      if (!this.tokens.delete(token)) {
        return fail('952', 'Invalid data access token');
      }
      return ok();
    }

    this.loginCount += 1;
    const expected = `Basic ${Buffer.from(`${this.username}:${this.password}`).toString('base64')}`;
    if (this.failLogins > 0 || request.headers?.Authorization !== expected) {
      this.failLogins = Math.max(0, this.failLogins - 1);
      return fail('212', 'Invalid user account and/or password; please try again');
    }
    const issued = `token-${this.nextToken++}`;
    this.tokens.add(issued);
    return ok({ token: issued });
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  private sorted(layout: string, sort: unknown): FakeRecord[] {
    const records = [...this.table(layout)];
    const keys = asList(sort).map((key) => asRecord(key));
    if (keys.length === 0) return records;
    return records.sort((a, b) => {
      for (const key of keys) {
        const field = String(key.fieldName);
        const direction = key.sortOrder === 'descend' ? -1 : 1;
        const order = compare(a.fieldData[field] ?? '', String(b.fieldData[field] ?? ''));
        if (order !== 0) return order * direction;
      }
      return 0;
    });
  }

  private serialize(record: FakeRecord, portals: PortalSelection[] | null): Record<string, unknown> {
    const selection =
      portals ?? Object.keys(record.portals).map((name) => ({ name, offset: 0, limit: DEFAULT_PORTAL_LIMIT }));
    const portalData: Record<string, unknown[]> = {};
    for (const { name, offset, limit } of selection) {
      const rows = record.portals[name] ?? [];
      portalData[name] = rows
        .slice(offset, offset + limit)
        .map((row) => ({ recordId: row.recordId, modId: row.modId, ...row.fields }));
    }
    return {
      recordId: record.recordId,
      modId: record.modId,
      fieldData: { ...record.fieldData },
      portalData,
      portalDataInfo: [],
    };
  }

  private page(
    layout: string,
    records: FakeRecord[],
    offset: number,
    limit: number,
    portals: PortalSelection[] | null,
    scripts: Record<string, unknown>
  ): Envelope {
    const selected = records.slice(offset, offset + limit);
    if (selected.length === 0) {
      return fail('401', 'No records match the request');
    }
    return ok({
      dataInfo: {
        database: 'Contacts',
        layout,
        table: layout,
        totalRecordCount: this.table(layout).length,
        foundCount: records.length,
        returnedCount: selected.length,
      },
      data: selected.map((record) => this.serialize(record, portals)),
      ...this.scriptResults(scripts),
    });
  }

  private portalSelection(names: unknown, read: (key: string) => unknown): PortalSelection[] | null {
    const list = asList(names).map(String);
    if (list.length === 0) return null;
    return list.map((name) => ({
      name,
      offset: Number(read(`offset.${name}`) ?? '1') - 1,
      limit: Number(read(`limit.${name}`) ?? String(DEFAULT_PORTAL_LIMIT)),
    }));
  }

  private getRecords(layout: string, params: URLSearchParams): Envelope {
    const offset = Number(params.get('_offset') ?? '1') - 1;
    const limit = Number(params.get('_limit') ?? String(DEFAULT_LIMIT));
    const sort: unknown = JSON.parse(params.get('_sort') ?? '[]');
    const portalNames: unknown = JSON.parse(params.get('portal') ?? '[]');
    const portals = this.portalSelection(portalNames, (key) => params.get(`_${key}`) ?? undefined);
    return this.page(layout, this.sorted(layout, sort), offset, limit, portals, Object.fromEntries(params));
  }

  private find(layout: string, body: Record<string, unknown>): Envelope {
    const clauses = asList(body.query).map((clause) => asRecord(clause));
    const matches = (record: FakeRecord, clause: Record<string, unknown>): boolean =>
      Object.entries(clause)
        .filter(([field]) => field !== 'omit')
        .every(([field, criterion]) => matchesCriterion(record.fieldData[field], String(criterion)));

    const includes = clauses.filter((clause) => clause.omit !== 'true');
    const omits = clauses.filter((clause) => clause.omit === 'true');
    const found = this.sorted(layout, body.sort).filter(
      (record) =>
        (includes.length === 0 || includes.some((clause) => matches(record, clause))) &&
        !omits.some((clause) => matches(record, clause))
    );

    const offset = Number(body.offset ?? '1') - 1;
    const limit = Number(body.limit ?? String(DEFAULT_LIMIT));
    const portals = this.portalSelection(body.portal, (key) => body[key]);
    return this.page(layout, found, offset, limit, portals, body);
  }

  private getRecord(layout: string, recordId: string, params: URLSearchParams): Envelope {
    const record = this.table(layout).find((candidate) => candidate.recordId === recordId);
    if (!record) {
      return fail('101', 'Record is missing');
    }
    const portalNames: unknown = JSON.parse(params.get('portal') ?? '[]');
    const portals = this.portalSelection(portalNames, (key) => params.get(`_${key}`) ?? undefined);
    return ok({
      dataInfo: { database: 'Contacts', layout, table: layout, totalRecordCount: 1, foundCount: 1, returnedCount: 1 },
      data: [this.serialize(record, portals)],
      ...this.scriptResults(Object.fromEntries(params)),
    });
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  private create(layout: string, body: Record<string, unknown>): Envelope {
    const record = this.addRecord(layout, asWireRecord(body.fieldData));
    return ok({ recordId: record.recordId, modId: record.modId, ...this.scriptResults(body) });
  }

  private duplicate(layout: string, recordId: string, body: Record<string, unknown>): Envelope {
    const original = this.table(layout).find((candidate) => candidate.recordId === recordId);
    if (!original) {
      return fail('101', 'Record is missing');
    }
    const copy = this.addRecord(layout, original.fieldData);
    return ok({ recordId: copy.recordId, modId: copy.modId, ...this.scriptResults(body) });
  }

  private runScript(name: string, param: string | undefined): Envelope {
    const script = this.scripts.get(name);
    if (!script) {
      return fail('104', 'Script is missing');
    }
    return ok({ scriptResult: script(param), scriptError: '0' });
  }

  private edit(layout: string, recordId: string, body: Record<string, unknown>): Envelope {
    const record = this.table(layout).find((candidate) => candidate.recordId === recordId);
    if (!record) {
      return fail('101', 'Record is missing');
    }
    if (body.modId !== undefined && body.modId !== record.modId) {
      return fail('306', 'Record modification id does not match');
    }
    Object.assign(record.fieldData, asWireRecord(body.fieldData));
    record.modId = String(Number(record.modId) + 1);
    return ok({ modId: record.modId, ...this.scriptResults(body) });
  }

  private remove(layout: string, recordId: string, params: URLSearchParams): Envelope {
    const records = this.table(layout);
    const index = records.findIndex((candidate) => candidate.recordId === recordId);
    if (index === -1) {
      return fail('101', 'Record is missing');
    }
    records.splice(index, 1);
    return ok(this.scriptResults(Object.fromEntries(params)));
  }

  /**
   * Every requested script "returns" its parameter, or `done`
   */
  private scriptResults(source: Record<string, unknown>): Record<string, string> {
    const results: Record<string, string> = {};
    for (const [key, suffix] of [
      ['script', ''],
      ['script.prerequest', '.prerequest'],
      ['script.presort', '.presort'],
    ] as const) {
      const name = source[key];
      if (typeof name === 'string') {
        const param = source[`${key}.param`];
        results[`scriptResult${suffix}`] = typeof param === 'string' ? param : 'done';
      }
    }
    return results;
  }
}
