/**
 * Find Criteria Tests
 *
 * Rendering of every operator, operand escaping, shorthand keys, and
 * construction-time operand checks.
 */

import { describe, it, expect } from 'vitest';
import { Criteria, escapeFindText, parseCriteriaEntry, resolveCriteria, type RenderContext } from '../criteria.js';
import { defaultCodec } from '../codecs.js';
import { ValidationError, ValidationErrorCode } from '../errors.js';
import { StaticFieldCatalog, field } from '../field-catalog.js';

const text: RenderContext = { fieldType: 'text', codec: defaultCodec };

// =============================================================================
// Rendering
// =============================================================================

describe('Criterion rendering', () => {
  it('should render the text operators', () => {
    expect(Criteria.exact('Ada').render(text)).toBe('==Ada');
    expect(Criteria.startsWith('Ad').render(text)).toBe('==Ad*');
    expect(Criteria.endsWith('da').render(text)).toBe('==*da');
    expect(Criteria.contains('d').render(text)).toBe('==*d*');
  });

  it('should render the comparison operators', () => {
    expect(Criteria.gt(5).render(text)).toBe('>5');
    expect(Criteria.gte(5).render(text)).toBe('>=5');
    expect(Criteria.lt('m').render(text)).toBe('<m');
    expect(Criteria.lte(0.5).render(text)).toBe('<=0.5');
    expect(Criteria.range(1, 10).render(text)).toBe('1...10');
  });

  it('should render the operand-less operators', () => {
    expect(Criteria.empty().render(text)).toBe('==');
    expect(Criteria.blank().render(text)).toBe('=');
    expect(Criteria.notEmpty().render(text)).toBe('*');
  });

  it('should render booleans as 1 and 0', () => {
    expect(Criteria.exact(true).render(text)).toBe('==1');
    expect(Criteria.exact(false).render(text)).toBe('==0');
  });

  it('should render dates in the wire format of the field type', () => {
    const when = new Date(2024, 0, 5, 9, 30, 0);

    expect(Criteria.gte(when).render({ fieldType: 'date', codec: defaultCodec })).toBe('>=01/05/2024');
    expect(Criteria.gte(when).render({ fieldType: 'timestamp', codec: defaultCodec })).toBe('>=01/05/2024 09:30:00');
  });

  it('should escape find operators inside operands', () => {
    expect(Criteria.startsWith('a*b').render(text)).toBe('==a\\*b*');
    expect(Criteria.exact('x@y.z').render(text)).toBe('==x\\@y.z');
  });

  it('should leave operands alone when escaping is off', () => {
    expect(Criteria.exact('a*b', { escape: false }).render(text)).toBe('==a*b');
  });

  it('should pass raw text through unescaped by default', () => {
    expect(Criteria.raw('>5').render(text)).toBe('>5');
    expect(Criteria.raw('>5', { escape: true }).render(text)).toBe('\\>5');
  });

  it('should escape every find operator character', () => {
    expect(escapeFindText('@*#?!=<>"')).toBe('\\@\\*\\#\\?\\!\\=\\<\\>\\"');
  });
});

// =============================================================================
// Shorthand keys
// =============================================================================

describe('parseCriteriaEntry', () => {
  it('should read a plain key as exact', () => {
    const { field: name, criterion } = parseCriteriaEntry('name', 'Ada');

    expect(name).toBe('name');
    expect(criterion.operator).toBe('exact');
  });

  it('should split field and operator on the double underscore', () => {
    const { field: name, criterion } = parseCriteriaEntry('age__gte', 18);

    expect(name).toBe('age');
    expect(criterion.render(text)).toBe('>=18');
  });

  it('should take a pair for range', () => {
    expect(parseCriteriaEntry('age__range', [18, 65]).criterion.render(text)).toBe('18...65');
  });

  it('should keep a criterion object as given', () => {
    const criterion = Criteria.notEmpty();

    expect(parseCriteriaEntry('email', criterion).criterion).toBe(criterion);
  });

  it('should reject an unknown operator', () => {
    try {
      parseCriteriaEntry('name__like', 'x');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe(ValidationErrorCode.UNKNOWN_OPERATOR);
        expect(error.message).toBe("Unknown query operator 'like' on 'name__like'");
      }
    }
  });

  it('should point null operands at the empty criteria', () => {
    expect(() => parseCriteriaEntry('name', null)).toThrow(
      "'exact' needs a string, finite number, boolean or Date, got null; use Criteria.empty() or Criteria.blank() to match missing values"
    );
  });

  it('should reject operands of the wrong kind', () => {
    expect(() => parseCriteriaEntry('age__gt', true)).toThrow("'gt' needs a string, finite number or Date, got boolean");
    expect(() => parseCriteriaEntry('age__range', [1, 2, 3])).toThrow("'range' needs exactly two bounds, got 3");
    expect(() => parseCriteriaEntry('age__range', 4)).toThrow("'range' needs a [from, to] pair, got number");
    expect(() => parseCriteriaEntry('name__raw', 4)).toThrow("'raw' needs a string, got number");
    expect(() => parseCriteriaEntry('when', new Date('nope'))).toThrow(
      "'exact' needs a string, finite number, boolean or Date, got invalid Date"
    );
  });
});

// =============================================================================
// Catalog resolution
// =============================================================================

describe('resolveCriteria', () => {
  const catalog = new StaticFieldCatalog("layout 'People'", {
    name: field.text(),
    born: field.date({ remote: 'Birth Date' }),
  });

  it('should map fields to remote names and render by field type', () => {
    const clause = resolveCriteria(
      catalog,
      [
        ['name__startswith', 'Ad'],
        ['born__gte', new Date(2000, 0, 1)],
      ],
      defaultCodec
    );

    expect(clause).toEqual({ name: '==Ad*', 'Birth Date': '>=01/01/2000' });
  });

  it('should reject an undeclared field', () => {
    expect(() => resolveCriteria(catalog, [['nope', 1]], defaultCodec)).toThrow(
      "Field 'nope' is not declared on layout 'People'"
    );
  });

  it('should reject two criteria on one field in one clause', () => {
    expect(() =>
      resolveCriteria(
        catalog,
        [
          ['born__gte', new Date(2000, 0, 1)],
          ['born__lte', new Date(2010, 0, 1)],
        ],
        defaultCodec
      )
    ).toThrow("Field 'born' has more than one criterion in one clause; use Criteria.range or a second find()");
  });
});
