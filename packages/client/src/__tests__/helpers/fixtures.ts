/**
 * Shared models and client wiring for the tests that run against FakeRemote
 */

import { RecordsetClient, type RecordsetClientConfig } from '../../client.js';
import { defineModel, field } from '../../field-catalog.js';
import { createLogger, MemorySink } from '../../logging.js';
import { UsernamePasswordLogin } from '../../session-providers.js';
import type { TransportRequest } from '../../types.js';
import { FakeRemote } from './fake-remote.js';

export const Person = defineModel({
  layout: 'People',
  fields: {
    name: field.text(),
    age: field.number(),
    active: field.boolean(),
    born: field.date({ remote: 'Birth Date' }),
  },
  portals: {
    pets: { table: 'Pets', chunkSize: 2, fields: { kind: field.text(), adopted: field.date() } },
  },
});

export interface Harness {
  remote: FakeRemote;
  client: RecordsetClient;
  sink: MemorySink;
}

/**
 * Client over a fresh FakeRemote, with the login cooldown off
 */
export function connect(overrides: Partial<RecordsetClientConfig> = {}): Harness {
  const remote = new FakeRemote();
  const sink = new MemorySink();
  const client = new RecordsetClient({
    url: 'https://db.example.com',
    database: 'Contacts',
    session: new UsernamePasswordLogin({ username: 'admin', password: 'test-secret' }),
    transport: remote,
    logger: createLogger({ sink, level: 'debug' }),
    loginCooldownMs: null,
    ...overrides,
  });
  return { remote, client, sink };
}

/**
 * Adds people named `p1` ... `pN` with ages 10, 20, ... and returns their names
 */
export function seedPeople(remote: FakeRemote, count: number): string[] {
  const names: string[] = [];
  for (let index = 1; index <= count; index += 1) {
    const name = `p${index}`;
    remote.addRecord('People', { name, age: index * 10, active: index % 2, 'Birth Date': '' });
    names.push(name);
  }
  return names;
}

/** Query string parameters of a recorded request */
export function queryOf(request: TransportRequest): URLSearchParams {
  return new URL(request.path, 'http://remote.test').searchParams;
}

/** Body of a recorded request as a plain record */
export function bodyOf(request: TransportRequest): Record<string, unknown> {
  const body = request.body;
  if (typeof body !== 'object' || body === null) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

function pathOf(request: TransportRequest): string {
  return request.path.split('?')[0];
}

/** Get-records (range read) requests on a layout */
export function rangeReads(remote: FakeRemote, layout = 'People'): TransportRequest[] {
  return remote.requests.filter(
    (request) => request.method === 'GET' && pathOf(request).endsWith(`/layouts/${layout}/records`)
  );
}

/** Get-record requests on a layout */
export function recordReads(remote: FakeRemote, layout = 'People'): TransportRequest[] {
  return remote.requests.filter(
    (request) => request.method === 'GET' && pathOf(request).includes(`/layouts/${layout}/records/`)
  );
}

/** Find requests on a layout */
export function findRequests(remote: FakeRemote, layout = 'People'): TransportRequest[] {
  return remote.requests.filter((request) => pathOf(request).endsWith(`/layouts/${layout}/_find`));
}
