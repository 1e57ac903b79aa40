/**
 * Structured Logger Tests
 *
 * Levels, message templates, child context, error details and the
 * redacting sink the client installs by default.
 *
 * @packageDocumentation
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  compareLogLevels,
  createLogger,
  isLogLevel,
  JsonSink,
  MemorySink,
  RedactingSink,
  SENSITIVE_LOG_FIELDS,
  type StructuredLogger,
} from '../logging.js';
import { TransportError, TransportErrorCode } from '../errors.js';

// =============================================================================
// Structured Fields
// =============================================================================

describe('Structured Logger - entries', () => {
  let sink: MemorySink;
  let logger: StructuredLogger;

  beforeEach(() => {
    sink = new MemorySink();
    logger = createLogger({ sink, level: 'debug', traceId: 'trace-1' });
  });

  it('should fill message placeholders from the context', () => {
    logger.debug('Page {index} returned {count} of {limit} records', { index: 1, offset: 2, limit: 2, count: 1 });

    expect(sink.entries[0].message).toBe('Page 1 returned 1 of 2 records');
    expect(sink.entries[0].context).toEqual({ index: 1, offset: 2, limit: 2, count: 1 });
    expect(sink.entries[0].traceId).toBe('trace-1');
  });

  it('should leave unknown placeholders as written', () => {
    logger.info('Session {from} -> {to}', { from: 'active' });

    expect(sink.messages()).toEqual(['Session active -> {to}']);
  });

  it('should evaluate lazy messages only when the level is enabled', () => {
    let evaluated = 0;
    logger.setLevel('warn');

    logger.debug(() => {
      evaluated += 1;
      return 'skipped';
    });
    logger.warn(() => {
      evaluated += 1;
      return 'kept';
    });

    expect(evaluated).toBe(1);
    expect(sink.messages()).toEqual(['kept']);
  });

  it('should include error name, code and message', () => {
    const error = new TransportError(TransportErrorCode.TIMEOUT, 'Request timed out after 5ms');

    logger.error('Request failed', error, { path: '/sessions' });

    expect(sink.entries[0].error).toMatchObject({
      name: 'TransportError',
      code: 'TRANSPORT_TIMEOUT',
      message: 'Request timed out after 5ms',
    });
    expect(sink.entries[0].context).toEqual({ path: '/sessions' });
  });

  it('should merge child context under call context', () => {
    const child = logger.child({ component: 'session', layout: 'People' });

    child.debug('Login', { layout: 'Pets' });

    expect(sink.entries[0].context).toEqual({ component: 'session', layout: 'Pets' });
    expect(child.getTraceId()).toBe('trace-1');
  });

  it('should replace circular references and dates in context', () => {
    const loop: Record<string, unknown> = { name: 'loop' };
    loop.self = loop;

    logger.info('Circular', { loop, at: new Date(Date.UTC(2024, 0, 2)) });

    expect(sink.entries[0].context).toEqual({
      loop: { name: 'loop', self: '[Circular]' },
      at: '2024-01-02T00:00:00.000Z',
    });
  });
});

// =============================================================================
// Levels
// =============================================================================

describe('Structured Logger - levels', () => {
  it('should recognize and order levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(compareLogLevels('debug', 'error')).toBeLessThan(0);
    expect(compareLogLevels('warn', 'warn')).toBe(0);
  });

  it('should drop entries below the configured level', () => {
    const sink = new MemorySink();
    const logger = createLogger({ sink, level: 'info' });

    logger.debug('hidden');
    logger.info('shown');

    expect(sink.messages()).toEqual(['shown']);
    expect(logger.getLevel()).toBe('info');
  });
});

// =============================================================================
// Sinks
// =============================================================================

describe('RedactingSink', () => {
  it('should redact sensitive keys at any depth and patterns in strings', () => {
    const memory = new MemorySink();
    const logger = createLogger({
      level: 'debug',
      sink: new RedactingSink(memory, { redactFields: [...SENSITIVE_LOG_FIELDS], redactPatterns: [/token-\d+/g] }),
    });

    logger.info('Issued token-7', { headers: { Authorization: 'Bearer token-7' }, password: 'test-secret', layout: 'People' });

    expect(memory.entries[0].message).toBe('Issued [REDACTED]');
    expect(memory.entries[0].context).toEqual({
      headers: { Authorization: '[REDACTED]' },
      password: '[REDACTED]',
      layout: 'People',
    });
  });
});

describe('JsonSink', () => {
  it('should write one JSON document per entry', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'info', traceId: 'trace-2', sink: new JsonSink({ write: (json) => lines.push(json) }) });

    logger.warn('Ignored session transition');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 'warn', message: 'Ignored session transition', traceId: 'trace-2' });
  });
});
