/**
 * Find criteria
 *
 * A criterion pairs an operator with its operands and renders to the text
 * the remote's find request takes for one field:
 *
 * | operator   | text       |
 * |------------|------------|
 * | exact      | `==v`      |
 * | startswith | `==v*`     |
 * | endswith   | `==*v`     |
 * | contains   | `==*v*`    |
 * | gt / gte   | `>v` `>=v` |
 * | lt / lte   | `<v` `<=v` |
 * | range      | `a...b`    |
 * | empty      | `==`       |
 * | blank      | `=`        |
 * | notempty   | `*`        |
 * | raw        | as given   |
 *
 * Operands are checked when the criterion is built, so a malformed query
 * fails before any request is sent.
 *
 * @packageDocumentation
 */

import type { FieldType } from '@recordset/shared-types';
import type { Codec } from './codecs.js';
import { ValidationError, ValidationErrorCode } from './errors.js';
import type { FieldCatalog } from './field-catalog.js';

// =============================================================================
// Operands
// =============================================================================

/** Operand of the text operators */
export type TextOperand = string | number | boolean | Date;

/** Operand of the comparison operators */
export type ComparisonOperand = string | number | Date;

export type CriterionOperator =
  | 'exact'
  | 'startswith'
  | 'endswith'
  | 'contains'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'range'
  | 'raw'
  | 'empty'
  | 'notempty'
  | 'blank';

/** Operators reachable through the `field__operator` shorthand */
export type ShorthandOperator = Exclude<CriterionOperator, 'empty' | 'notempty' | 'blank'>;

export interface CriterionOptions {
  /** Backslash-escape the remote's find operators inside operands */
  escape?: boolean;
}

function invalidOperand(operator: CriterionOperator, value: unknown, expected: string): ValidationError {
  if (value === null || value === undefined) {
    return new ValidationError(
      ValidationErrorCode.INVALID_OPERAND,
      `'${operator}' needs ${expected}, got ${String(value)}; use Criteria.empty() or Criteria.blank() to match missing values`
    );
  }
  const kind = value instanceof Date ? 'invalid Date' : Array.isArray(value) ? 'array' : typeof value;
  return new ValidationError(ValidationErrorCode.INVALID_OPERAND, `'${operator}' needs ${expected}, got ${kind}`);
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

export function isComparisonOperand(value: unknown): value is ComparisonOperand {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value)) || isValidDate(value);
}

export function isTextOperand(value: unknown): value is TextOperand {
  return isComparisonOperand(value) || typeof value === 'boolean';
}

function textOperand(operator: CriterionOperator, value: unknown): TextOperand {
  if (!isTextOperand(value)) {
    throw invalidOperand(operator, value, 'a string, finite number, boolean or Date');
  }
  return value;
}

function comparisonOperand(operator: CriterionOperator, value: unknown): ComparisonOperand {
  if (!isComparisonOperand(value)) {
    throw invalidOperand(operator, value, 'a string, finite number or Date');
  }
  return value;
}

// =============================================================================
// Escaping and Rendering
// =============================================================================

const FIND_OPERATOR_CHARACTERS = /[@*#?!=<>"]/g;

/**
 * Prefix each of `@ * # ? ! = < > "` with a backslash
 */
export function escapeFindText(text: string): string {
  return text.replace(FIND_OPERATOR_CHARACTERS, (character) => `\\${character}`);
}

/**
 * What a criterion needs to know about the field it is applied to
 */
export interface RenderContext {
  fieldType: FieldType;
  codec: Codec;
}

function operandText(value: TextOperand, context: RenderContext): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (typeof value === 'boolean') return value ? '1' : '0';
  const wire = context.fieldType === 'date' ? context.codec.encode('date', value) : context.codec.encode('timestamp', value);
  return String(wire);
}

// =============================================================================
// Criterion
// =============================================================================

/**
 * One (operator, operands) pair. Build with the {@link Criteria} helpers.
 *
 * @public
 * @since 0.1.0
 */
export class Criterion {
  readonly operator: CriterionOperator;
  readonly operands: readonly TextOperand[];
  readonly escape: boolean;

  private constructor(operator: CriterionOperator, operands: readonly TextOperand[], escape: boolean) {
    this.operator = operator;
    this.operands = Object.freeze([...operands]);
    this.escape = escape;
    Object.freeze(this);
  }

  /** @internal */
  static create(operator: CriterionOperator, operands: readonly TextOperand[], escape: boolean): Criterion {
    return new Criterion(operator, operands, escape);
  }

  /**
   * Find-request text of this criterion for a field
   */
  render(context: RenderContext): string {
    const text = (index: number): string => {
      const rendered = operandText(this.operands[index], context);
      return this.escape ? escapeFindText(rendered) : rendered;
    };

    switch (this.operator) {
      case 'exact':
        return `==${text(0)}`;
      case 'startswith':
        return `==${text(0)}*`;
      case 'endswith':
        return `==*${text(0)}`;
      case 'contains':
        return `==*${text(0)}*`;
      case 'gt':
        return `>${text(0)}`;
      case 'gte':
        return `>=${text(0)}`;
      case 'lt':
        return `<${text(0)}`;
      case 'lte':
        return `<=${text(0)}`;
      case 'range':
        return `${text(0)}...${text(1)}`;
      case 'raw':
        return text(0);
      case 'empty':
        return '==';
      case 'blank':
        return '=';
      case 'notempty':
        return '*';
    }
  }
}

function textCriterion(operator: CriterionOperator) {
  return (value: TextOperand, options: CriterionOptions = {}): Criterion =>
    Criterion.create(operator, [textOperand(operator, value)], options.escape ?? true);
}

function comparisonCriterion(operator: CriterionOperator) {
  return (value: ComparisonOperand, options: CriterionOptions = {}): Criterion =>
    Criterion.create(operator, [comparisonOperand(operator, value)], options.escape ?? true);
}

/**
 * Criterion helpers
 *
 * @example
 * ```typescript
 * people.query().find({
 *   name: Criteria.startsWith('Ad'),
 *   age: Criteria.range(18, 65),
 *   email: Criteria.notEmpty(),
 * });
 * ```
 *
 * @public
 * @since 0.1.0
 */
export const Criteria = {
  exact: textCriterion('exact'),
  startsWith: textCriterion('startswith'),
  endsWith: textCriterion('endswith'),
  contains: textCriterion('contains'),
  gt: comparisonCriterion('gt'),
  gte: comparisonCriterion('gte'),
  lt: comparisonCriterion('lt'),
  lte: comparisonCriterion('lte'),

  range(from: ComparisonOperand, to: ComparisonOperand, options: CriterionOptions = {}): Criterion {
    return Criterion.create('range', [comparisonOperand('range', from), comparisonOperand('range', to)], options.escape ?? true);
  },

  /** Text passed to the remote unchanged unless `escape` is set */
  raw(text: string, options: CriterionOptions = {}): Criterion {
    if (typeof text !== 'string') {
      throw invalidOperand('raw', text, 'a string');
    }
    return Criterion.create('raw', [text], options.escape ?? false);
  },

  empty: (): Criterion => Criterion.create('empty', [], false),
  notEmpty: (): Criterion => Criterion.create('notempty', [], false),
  blank: (): Criterion => Criterion.create('blank', [], false),
} as const;

// =============================================================================
// Shorthand Resolution
// =============================================================================

function rangeFromShorthand(value: unknown): Criterion {
  if (!Array.isArray(value)) {
    throw invalidOperand('range', value, 'a [from, to] pair');
  }
  if (value.length !== 2) {
    throw new ValidationError(
      ValidationErrorCode.INVALID_OPERAND,
      `'range' needs exactly two bounds, got ${value.length}`
    );
  }
  const from: unknown = value[0];
  const to: unknown = value[1];
  return Criteria.range(comparisonOperand('range', from), comparisonOperand('range', to));
}

/**
 * Builders of the `field__operator` shorthand, keyed by suffix
 */
const SHORTHAND_OPERATORS: Readonly<Record<ShorthandOperator, (value: unknown) => Criterion>> = {
  exact: (value) => Criteria.exact(textOperand('exact', value)),
  startswith: (value) => Criteria.startsWith(textOperand('startswith', value)),
  endswith: (value) => Criteria.endsWith(textOperand('endswith', value)),
  contains: (value) => Criteria.contains(textOperand('contains', value)),
  gt: (value) => Criteria.gt(comparisonOperand('gt', value)),
  gte: (value) => Criteria.gte(comparisonOperand('gte', value)),
  lt: (value) => Criteria.lt(comparisonOperand('lt', value)),
  lte: (value) => Criteria.lte(comparisonOperand('lte', value)),
  range: rangeFromShorthand,
  raw: (value) => {
    if (typeof value !== 'string') {
      throw invalidOperand('raw', value, 'a string');
    }
    return Criteria.raw(value);
  },
};

function isShorthandOperator(value: string): value is ShorthandOperator {
  return Object.prototype.hasOwnProperty.call(SHORTHAND_OPERATORS, value);
}

/**
 * Split a criteria key into field and criterion. A plain key with a plain
 * operand means `exact`.
 */
export function parseCriteriaEntry(key: string, value: unknown): { field: string; criterion: Criterion } {
  if (value instanceof Criterion) {
    return { field: key, criterion: value };
  }

  const separator = key.indexOf('__');
  if (separator === -1) {
    return { field: key, criterion: SHORTHAND_OPERATORS.exact(value) };
  }

  const field = key.slice(0, separator);
  const operator = key.slice(separator + 2);
  if (!isShorthandOperator(operator)) {
    throw new ValidationError(ValidationErrorCode.UNKNOWN_OPERATOR, `Unknown query operator '${operator}' on '${key}'`, {
      context: { field },
    });
  }
  return { field, criterion: SHORTHAND_OPERATORS[operator](value) };
}

/**
 * Resolve criteria entries against a catalog into one request clause's
 * remote field name to criterion text map.
 *
 * @throws ValidationError for unknown fields or operators, bad operands, or
 *   two criteria on one field
 */
export function resolveCriteria(
  catalog: FieldCatalog,
  entries: Iterable<readonly [string, unknown]>,
  codec: Codec
): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [key, value] of entries) {
    const { field, criterion } = parseCriteriaEntry(key, value);
    const remote = catalog.resolve(field);
    if (Object.prototype.hasOwnProperty.call(fields, remote)) {
      throw new ValidationError(
        ValidationErrorCode.INVALID_ARGUMENT,
        `Field '${field}' has more than one criterion in one clause; use Criteria.range or a second find()`,
        { context: { field } }
      );
    }
    fields[remote] = criterion.render({ fieldType: catalog.typeOf(field), codec });
  }
  return fields;
}

// =============================================================================
// Typed Input
// =============================================================================

/** Operand accepted by a `field__operator` key */
export type ShorthandValue = TextOperand | readonly [ComparisonOperand, ComparisonOperand];

/**
 * Criteria of one `find` / `omit` call over the field names `N`
 */
export type CriteriaInput<N extends string = string> = { readonly [K in N]?: Criterion | TextOperand } & {
  readonly [K in `${N}__${ShorthandOperator}`]?: ShorthandValue;
};
