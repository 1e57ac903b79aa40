/**
 * Wire codec for the scalar field types.
 *
 * Wire forms:
 * - text: string (numbers are accepted and stringified on decode)
 * - number: JSON number, or a numeric string on decode
 * - boolean: `1` / `0`
 * - date: `MM/DD/YYYY`
 * - timestamp: `MM/DD/YYYY HH:mm:ss`, decoding also accepts a 12-hour clock
 *   with an `AM` / `PM` suffix
 *
 * The empty string is the wire form of "no value" for every type. Dates use
 * local time components.
 *
 * @packageDocumentation
 */

import type { FieldType, FieldValue, FieldValueMap, WireValue } from '@recordset/shared-types';
import { ValidationError, ValidationErrorCode } from './errors.js';

/**
 * Converts between typed field values and wire values
 *
 * @public
 * @since 0.1.0
 */
export interface Codec {
  encode<T extends FieldType>(type: T, value: FieldValue<T>): WireValue;
  decode<T extends FieldType>(type: T, wire: WireValue): FieldValue<T>;
}

/**
 * Encoder and decoder of one field type. Neither sees the empty value.
 */
export interface FieldCodec<T extends FieldType> {
  encode(value: FieldValueMap[T]): WireValue;
  decode(wire: WireValue): FieldValueMap[T];
}

export type FieldCodecTable = { [T in FieldType]: FieldCodec<T> };

// =============================================================================
// Formatting Helpers
// =============================================================================

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function decodeFailed(type: FieldType, wire: WireValue): ValidationError {
  return new ValidationError(ValidationErrorCode.DECODE_FAILED, `Cannot decode ${JSON.stringify(wire)} as ${type}`);
}

function assertValidDate(type: FieldType, value: Date): void {
  if (Number.isNaN(value.getTime())) {
    throw new ValidationError(ValidationErrorCode.INVALID_OPERAND, `Cannot encode an invalid Date as ${type}`);
  }
}

/**
 * `MM/DD/YYYY` from local date components
 */
export function formatDate(value: Date): string {
  return `${pad(value.getMonth() + 1)}/${pad(value.getDate())}/${pad(value.getFullYear(), 4)}`;
}

/**
 * `MM/DD/YYYY HH:mm:ss` from local components
 */
export function formatTimestamp(value: Date): string {
  return `${formatDate(value)} ${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`;
}

const DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const TIMESTAMP_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4}) (\d{1,2}):(\d{2}):(\d{2})(?: ?([AaPp][Mm]))?$/;

function buildDate(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Date | null {
  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  // Reject overflow such as 02/31 rolling into March
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

export function parseDate(text: string): Date | null {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) return null;
  return buildDate(Number(match[3]), Number(match[1]), Number(match[2]));
}

export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) return null;

  let hours = Number(match[4]);
  const meridiem = match[7]?.toUpperCase();
  if (meridiem !== undefined) {
    if (hours < 1 || hours > 12) return null;
    hours = (hours % 12) + (meridiem === 'PM' ? 12 : 0);
  }
  const minutes = Number(match[5]);
  const seconds = Number(match[6]);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  return buildDate(Number(match[3]), Number(match[1]), Number(match[2]), hours, minutes, seconds);
}

// =============================================================================
// Field Codecs
// =============================================================================

export const textCodec: FieldCodec<'text'> = {
  encode: (value) => value,
  decode: (wire) => String(wire),
};

export const numberCodec: FieldCodec<'number'> = {
  encode(value) {
    if (!Number.isFinite(value)) {
      throw new ValidationError(ValidationErrorCode.INVALID_OPERAND, `Cannot encode ${value} as number`);
    }
    return value;
  },
  decode(wire) {
    const value = typeof wire === 'number' ? wire : Number(wire.trim());
    if (!Number.isFinite(value)) {
      throw decodeFailed('number', wire);
    }
    return value;
  },
};

export const booleanCodec: FieldCodec<'boolean'> = {
  encode: (value) => (value ? 1 : 0),
  decode(wire) {
    const text = String(wire).trim();
    if (text === '1') return true;
    if (text === '0') return false;
    throw decodeFailed('boolean', wire);
  },
};

export const dateCodec: FieldCodec<'date'> = {
  encode(value) {
    assertValidDate('date', value);
    return formatDate(value);
  },
  decode(wire) {
    const date = typeof wire === 'string' ? parseDate(wire) : null;
    if (!date) {
      throw decodeFailed('date', wire);
    }
    return date;
  },
};

export const timestampCodec: FieldCodec<'timestamp'> = {
  encode(value) {
    assertValidDate('timestamp', value);
    return formatTimestamp(value);
  },
  decode(wire) {
    const date = typeof wire === 'string' ? parseTimestamp(wire) : null;
    if (!date) {
      throw decodeFailed('timestamp', wire);
    }
    return date;
  },
};

export const DEFAULT_FIELD_CODECS: Readonly<FieldCodecTable> = Object.freeze({
  text: textCodec,
  number: numberCodec,
  boolean: booleanCodec,
  date: dateCodec,
  timestamp: timestampCodec,
});

// =============================================================================
// Table Codec
// =============================================================================

/**
 * {@link Codec} dispatching to one {@link FieldCodec} per type.
 * `null` encodes to the empty string and the empty string decodes to `null`.
 *
 * @example
 * ```typescript
 * const codec = new TableCodec({ boolean: { encode: (v) => (v ? 'yes' : 'no'), decode: (w) => w === 'yes' } });
 * ```
 *
 * @public
 * @since 0.1.0
 */
export class TableCodec implements Codec {
  private readonly table: FieldCodecTable;

  constructor(overrides: Partial<FieldCodecTable> = {}) {
    this.table = { ...DEFAULT_FIELD_CODECS, ...overrides };
  }

  encode<T extends FieldType>(type: T, value: FieldValue<T>): WireValue {
    if (value === null) {
      return '';
    }
    return this.table[type].encode(value);
  }

  decode<T extends FieldType>(type: T, wire: WireValue): FieldValue<T> {
    if (wire === '') {
      return null;
    }
    return this.table[type].decode(wire);
  }
}

export const defaultCodec: Codec = new TableCodec();
