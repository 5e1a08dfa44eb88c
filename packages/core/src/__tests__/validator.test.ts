import { describe, expect, it } from 'vitest';
import { MissingPlanError } from '../errors.js';
import { parseString } from '../parser.js';
import { TapValidator, validate } from '../validator.js';

describe('TapValidator', () => {
  describe('verdict precedence', () => {
    it('accepts a skipped document whatever it holds', () => {
      expect(validate(parseString('1..2 # skip not today\nnot ok 1\nBail out! no\n'))).toBe(true);
    });

    it('rejects any bailout', () => {
      expect(validate(parseString('1..1\nok 1\nBail out! late\n'))).toBe(false);
    });

    it('accepts failures marked SKIP but not TODO', () => {
      expect(validate(parseString('1..2\nok 1\nnot ok 2 # SKIP no db\n'))).toBe(true);
      expect(validate(parseString('1..2\nok 1\nnot ok 2 # TODO later\n'))).toBe(false);
    });

    it('raises without a plan', () => {
      expect(() => validate(parseString('ok 1\n'))).toThrow(MissingPlanError);
    });
  });

  describe('range matching', () => {
    it('reports an explicit number outside the plan', () => {
      const doc = parseString('1..3\nok 1\nok 2\nok 5\n');
      expect(validate(doc)).toBe(false);
      expect(() => new TapValidator(doc).check()).toThrow(
        'Invalid test numbering: test number 5 is outside of plan 1..3',
      );
    });

    it('reports missing numbers', () => {
      expect(() => new TapValidator(parseString('1..3\nok 1\nok 2\n')).check()).toThrow(
        'Invalid test numbering: plan 1..3 is missing test number 3',
      );
      expect(() => new TapValidator(parseString('1..4\nok 1\nok 2\n')).check()).toThrow(
        'Invalid test numbering: plan 1..4 is missing test numbers 3, 4',
      );
    });

    it('resolves implicit numbers from the plan start', () => {
      const validator = new TapValidator(parseString('3..5\nok\nok\nok\n'));
      expect(validator.enumeration()).toEqual([3, 4, 5]);
      expect(validator.allExist()).toBe(true);
      expect(validator.valid()).toBe(true);
    });

    it('ignores plan placement', () => {
      expect(validate(parseString('1..2\nok\nok\n'))).toBe(true);
      expect(validate(parseString('ok\nok\n1..2\n'))).toBe(true);
    });
  });

  describe('mode', () => {
    it('can be stricter than the document', () => {
      const doc = parseString('1..2\nok 1\nok 1\n', { lenient: true });
      expect(new TapValidator(doc).valid()).toBe(true);
      expect(new TapValidator(doc, { lenient: false }).valid()).toBe(false);
    });
  });

  it('is idempotent', () => {
    const doc = parseString('1..2\nok\nnot ok\n');
    expect(doc.valid()).toBe(false);
    expect(doc.valid()).toBe(false);
    expect(doc.results().map((result) => result.number)).toEqual([undefined, undefined]);
  });

  it('lists missing numbers of a huge plan without walking it', () => {
    const listed = Array.from({ length: 20 }, (_, i) => i + 2).join(', ');
    expect(() => new TapValidator(parseString('1..10000000000\nok 1\n')).check()).toThrow(
      `Invalid test numbering: plan 1..10000000000 is missing test numbers ${listed}, … (9999999999 in total)`,
    );
  });
});
