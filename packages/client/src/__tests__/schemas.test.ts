/**
 * Response Schema Tests
 */

import { describe, it, expect } from 'vitest';
import { TransportError, TransportErrorCode } from '../errors.js';
import {
  EditRecordResponseSchema,
  extractScriptResults,
  firstError,
  parseEnvelope,
  parseResponse,
  toPage,
} from '../schemas.js';

describe('parseEnvelope', () => {
  it('should normalize numeric message codes and default the response', () => {
    expect(parseEnvelope({ messages: [{ code: 0, message: 'OK' }] })).toEqual({
      response: {},
      messages: [{ code: '0', message: 'OK' }],
    });
  });

  it('should reject a body without messages', () => {
    try {
      parseEnvelope({ response: {} }, { layout: 'People' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.code).toBe(TransportErrorCode.DECODE_ERROR);
        expect(error.context).toEqual({ layout: 'People' });
      }
    }
  });
});

describe('firstError', () => {
  it('should skip success messages', () => {
    expect(firstError([{ code: '0', message: 'OK' }])).toBeUndefined();
    expect(
      firstError([
        { code: '0', message: 'OK' },
        { code: '401', message: 'No records match the request' },
      ])
    ).toEqual({ code: '401', message: 'No records match the request' });
  });
});

describe('toPage', () => {
  it('should split related rows into ids and table-qualified fields', () => {
    const page = toPage({
      dataInfo: { layout: 'People', foundCount: 1 },
      data: [
        {
          recordId: 7,
          modId: '3',
          fieldData: { name: 'Ada' },
          portalData: { pets: [{ recordId: '1000', modId: '1', 'Pets::kind': 'cat' }] },
        },
      ],
      scriptResult: 'done',
    });

    expect(page.records).toEqual([
      {
        recordId: '7',
        modId: '3',
        fieldData: { name: 'Ada' },
        portalData: { pets: [{ recordId: '1000', modId: '1', fields: { 'Pets::kind': 'cat' } }] },
        portalDataInfo: [],
      },
    ]);
    expect(page.dataInfo).toEqual({ layout: 'People', foundCount: 1 });
    expect(page.scriptResults).toEqual({ after: { result: 'done' } });
  });

  it('should reject a record without a record id', () => {
    expect(() => toPage({ data: [{ modId: '1', fieldData: {} }] })).toThrow(TransportError);
  });
});

describe('extractScriptResults', () => {
  it('should collect results and errors of every script slot', () => {
    expect(
      extractScriptResults({
        'scriptResult.prerequest': 'ready',
        'scriptError.prerequest': '0',
        'scriptError.presort': '104',
        scriptResult: 42,
      })
    ).toEqual({
      prerequest: { result: 'ready', error: '0' },
      presort: { error: '104' },
      after: { result: '42' },
    });
  });
});

describe('parseResponse', () => {
  it('should validate an operation body', () => {
    expect(parseResponse(EditRecordResponseSchema, { modId: 4 })).toEqual({ modId: '4' });
    expect(() => parseResponse(EditRecordResponseSchema, { modId: '' })).toThrow('Invalid response body: modId');
  });
});
