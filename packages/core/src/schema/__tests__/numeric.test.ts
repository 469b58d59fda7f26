import { describe, it, expect } from 'vitest';
import { compileReport, compiled, report } from './fixtures.js';

const NOT_MET = 'special requirements for field not met';
const EMPTY_RANGE =
  '#: malformed field: range between the lower and upper limits does not contain any values\n';

describe('integer and real schemas', () => {
  describe('range validity', () => {
    it('accepts a single-point inclusive range', () => {
      expect(compileReport('type: integer\nminimum: 10\nmaximum: 10')).toBe('');
      expect(compileReport('type: real\nminimum: 10\nmaximum: 10')).toBe('');
    });

    it('rejects an exclusive range around a single point', () => {
      expect(
        compileReport('type: integer\nexclusiveMinimum: 10\nexclusiveMaximum: 10')
      ).toBe(EMPTY_RANGE);
    });

    it('rejects 10 < x < 11 for integers but not for reals', () => {
      expect(
        compileReport('type: integer\nexclusiveMinimum: 10\nexclusiveMaximum: 11')
      ).toBe(EMPTY_RANGE);
      expect(
        compileReport('type: real\nexclusiveMinimum: 10\nexclusiveMaximum: 11')
      ).toBe('');
    });

    it('rejects inverted limits', () => {
      expect(compileReport('type: real\nminimum: 2.5\nmaximum: 1.0')).toBe(
        EMPTY_RANGE
      );
    });
  });

  describe('compile', () => {
    it('rejects both forms of the same limit', () => {
      expect(
        compileReport('type: integer\nminimum: 1\nexclusiveMinimum: 0')
      ).toBe(
        '#: malformed field: minimum and exclusiveMinimum cannot both be specified\n'
      );
      expect(compileReport('type: real\nmaximum: 1\nexclusiveMaximum: 2')).toBe(
        '#: malformed field: maximum and exclusiveMaximum cannot both be specified\n'
      );
    });

    it('requires a positive multipleOf', () => {
      expect(compileReport('type: integer\nmultipleOf: 0')).toBe(
        '#.multipleOf: malformed field: multipleOf must be greater than zero\n'
      );
      expect(compileReport('type: real\nmultipleOf: -0.5')).toBe(
        '#.multipleOf: malformed field: multipleOf must be greater than zero\n'
      );
    });

    it('takes only integer limits for integer schemas', () => {
      expect(compileReport('type: integer\nminimum: 1.5')).toBe(
        '#.minimum: wrong type, expected integer got real\n'
      );
      expect(compileReport('type: real\nminimum: 1')).toBe('');
    });

    it('rejects keywords of other types', () => {
      expect(compileReport('type: integer\nminLength: 1')).toBe(
        "#: field 'minLength' is not specified in the schema\n"
      );
    });
  });

  describe('validate', () => {
    it('requires the exact numeric kind', () => {
      expect(report(compiled('type: integer'), '10.0')).toBe(
        '#: wrong type, expected integer got real\n'
      );
      expect(report(compiled('type: real'), '10')).toBe(
        '#: wrong type, expected real got integer\n'
      );
    });

    it('checks inclusive and exclusive limits', () => {
      const inclusive = compiled('type: integer\nminimum: 10\nmaximum: 10');
      const exclusive = compiled(
        'type: real\nexclusiveMinimum: 0\nexclusiveMaximum: 1'
      );

      expect(report(inclusive, '10')).toBe('');
      expect(report(inclusive, '11')).toBe(
        `#: ${NOT_MET}: value violates upper limit constraint\n`
      );
      expect(report(exclusive, '0.0')).toBe(
        `#: ${NOT_MET}: value violates lower limit constraint\n`
      );
      expect(report(exclusive, '0.5')).toBe('');
      expect(report(exclusive, '1.0')).toBe(
        `#: ${NOT_MET}: value violates upper limit constraint\n`
      );
    });

    it('checks multipleOf', () => {
      const schema = compiled('type: integer\nmultipleOf: 3');

      expect(report(schema, '-9')).toBe('');
      expect(report(schema, '10')).toBe(
        `#: ${NOT_MET}: value must be a multiple of the multipleOf field\n`
      );
    });

    it('compares integers beyond the double range exactly', () => {
      const schema = compiled('type: integer\nminimum: 12345678901234567890');

      expect(report(schema, '12345678901234567890')).toBe('');
      expect(report(schema, '12345678901234567889')).toBe(
        `#: ${NOT_MET}: value violates lower limit constraint\n`
      );
    });
  });
});

describe('boolean schema', () => {
  it('accepts only booleans', () => {
    const schema = compiled('type: boolean');

    expect(report(schema, 'false')).toBe('');
    expect(report(schema, '"true"')).toBe(
      '#: wrong type, expected boolean got string\n'
    );
  });

  it('takes no keywords besides type', () => {
    expect(compileReport('type: boolean\ndefault: true')).toBe(
      "#: field 'default' is not specified in the schema\n"
    );
  });
});
