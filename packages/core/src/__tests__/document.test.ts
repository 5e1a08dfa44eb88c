import { describe, expect, it } from 'vitest';
import { TapDocument } from '../document.js';
import { MissingPlanError, TapError } from '../errors.js';
import { parseString } from '../parser.js';
import { AbortMarker, TestResult } from '../result.js';

function documentOf(plan: [number, number] | undefined, ...results: TestResult[]): TapDocument {
  const doc = new TapDocument();
  if (plan) doc.addPlan(plan[0], plan[1]);
  for (const result of results) doc.addResult(result);
  return doc;
}

describe('TestResult', () => {
  it('renders its line', () => {
    expect(new TestResult(true, 1, 'works').line()).toBe('ok 1 - works');
    expect(new TestResult(false).line()).toBe('not ok');
    expect(new TestResult(undefined, 2).line()).toBe('not ok 2');
  });

  it('parses and renders directives', () => {
    const result = new TestResult(false, 3, 'slow');
    result.directive = 'skip no db';
    expect(result.directive).toBe('SKIP no db');
    expect(result.skip).toBe(true);
    expect(result.passing).toBe(true);
    expect(result.line()).toBe('not ok 3 - slow # SKIP no db');
  });

  it('does not pass a failing TODO', () => {
    expect(new TestResult(false).addTodo('later').passing).toBe(false);
  });

  it('rejects invalid numbers', () => {
    expect(() => new TestResult(true, -1)).toThrow(RangeError);
    const result = new TestResult(true);
    expect(() => {
      result.number = 1.5;
    }).toThrow('Test number must be a non-negative integer, got 1.5');
  });

  it('copies deeply', () => {
    const result = new TestResult(true, 1).addData({ kind: 'structured', value: { n: 1 } }).addSkip('x');
    const copy = result.copy();
    copy.addTodo('y');
    copy.addData({ kind: 'text', text: '# more' });
    expect(result.directive).toBe('SKIP x');
    expect(result.data).toHaveLength(1);
  });
});

describe('AbortMarker', () => {
  it('trims its reason', () => {
    expect(new AbortMarker('  db down ', ['detail']).format()).toEqual(['Bail out! db down', 'detail']);
    expect(new AbortMarker().format()).toEqual(['Bail out!']);
  });
});

describe('TapDocument', () => {
  describe('plan', () => {
    it('is required for length and validity', () => {
      const doc = documentOf(undefined, new TestResult(true));
      expect(doc.actualLength()).toBe(1);
      expect(() => doc.length()).toThrow(MissingPlanError);
      expect(() => doc.valid()).toThrow('Document cannot be validated. Document requires plan.');
      expect(() => doc.enumeration()).toThrow(MissingPlanError);
    });

    it('can be declared only once', () => {
      const doc = documentOf([1, 2]);
      expect(() => doc.addPlan(1, 3)).toThrow('Plan read twice: document already has plan 1..2');
    });

    it('renders a skip reason', () => {
      const doc = documentOf([1, 2]);
      doc.setSkip('no db');
      expect(doc.planLine()).toBe('1..2 # SKIP no db');
      doc.setSkip(true);
      expect(doc.planLine()).toBe('1..2 # SKIP');
      doc.setSkip(false);
      expect(doc.planLine()).toBe('1..2');
    });
  });

  describe('boundary', () => {
    it('accepts 1..0 without entries', () => {
      expect(documentOf([1, 0]).valid()).toBe(true);
    });

    it('rejects 1..0 with an entry unless skipped', () => {
      const doc = documentOf([1, 0], new TestResult(true));
      expect(doc.valid()).toBe(false);
      doc.setSkip('nothing to run');
      expect(doc.valid()).toBe(true);
    });
  });

  describe('actual range', () => {
    it('differs from the plan when results are missing', () => {
      const doc = documentOf([1, 50], new TestResult(true, 1, 'first'), new TestResult(true, 25, 'second'));
      expect(doc.length()).toBe(50);
      expect(doc.actualLength()).toBe(2);
      expect(doc.actualRange()).toEqual([1, 25]);
      expect(doc.actualPlanLine()).toBe('1..25');
      expect(doc.valid()).toBe(false);
    });

    it('handles a large run', () => {
      const doc = documentOf([1, 500_000]);
      for (let i = 0; i < 500_000; i++) doc.addResult(new TestResult(true));
      expect(doc.valid()).toBe(true);
      expect(doc.actualPlanLine()).toBe('1..500000');
    });

    it('is 1..0 without results', () => {
      expect(documentOf([1, 3]).actualRange()).toEqual([1, 0]);
    });
  });

  describe('lookup by number', () => {
    const doc = documentOf([1, 3], new TestResult(true, 1, 'a'), new TestResult(true, 3, 'c'));

    it('finds results by number', () => {
      expect(doc.at(3)?.description).toBe('c');
      expect(doc.at(2)).toBeUndefined();
      expect(doc.has(1)).toBe(true);
      expect(doc.has(2)).toBe(false);
    });

    it('raises outside the plan', () => {
      expect(() => doc.at(4)).toThrow('No test with number 4 in plan 1..3');
    });

    it('resolves implicit numbers', () => {
      const implicit = documentOf([1, 2], new TestResult(true, undefined, 'a'), new TestResult(true, undefined, 'b'));
      const result = implicit.at(2);
      expect(result?.number).toBe(2);
      expect(result?.description).toBe('b');
      expect(implicit.results()[1].number).toBeUndefined();
    });

    it('lists every planned slot', () => {
      expect([...doc.planned()].map(([number, result]) => [number, result?.description])).toEqual([
        [1, 'a'],
        [2, undefined],
        [3, 'c'],
      ]);
    });
  });

  describe('enumeration cache', () => {
    it('is dropped when an entry is appended', () => {
      const doc = documentOf([1, 3], new TestResult(true), new TestResult(true));
      expect(doc.enumeration()).toEqual([1, 2]);
      expect(doc.valid()).toBe(false);
      doc.addResult(new TestResult(true));
      expect(doc.enumeration()).toEqual([1, 2, 3]);
      expect(doc.valid()).toBe(true);
    });
  });

  describe('counters', () => {
    it('counts unknown outcomes as failed', () => {
      const doc = documentOf([1, 3], new TestResult(true), new TestResult(false), new TestResult(undefined));
      expect(doc.countFailed()).toBe(2);
      expect([...doc.failed()].map((result) => result.ok)).toEqual([false, undefined]);
    });
  });

  describe('iteration', () => {
    it('surfaces a bailout at its position', () => {
      const doc = documentOf([1, 2], new TestResult(true, 1));
      doc.addAbort(new AbortMarker('stop'));
      doc.addResult(new TestResult(true, 2));
      expect([...doc.events()].map((event) => event.type)).toEqual(['result', 'aborted']);
      expect(doc.bailout()?.reason).toBe('stop');
    });

    it('yields nothing for a skipped document', () => {
      const doc = documentOf([1, 1], new TestResult(true));
      doc.setSkip('later');
      expect([...doc.events()]).toEqual([{ type: 'end' }]);
      expect([...doc]).toEqual([]);
    });
  });

  describe('copies', () => {
    it('share no state', () => {
      const doc = documentOf([1, 2], new TestResult(true, 1, 'a'));
      const copy = doc.copy();
      copy.addResult(new TestResult(true, 2, 'b'));
      expect(doc.actualLength()).toBe(1);
      expect(copy.valid()).toBe(true);
    });

    it('are not affected by edits of returned entries', () => {
      const doc = documentOf([1, 1], new TestResult(true, 1, 'a'));
      const [entry] = doc.entries;
      if (entry.kind === 'result') entry.description = 'changed';
      expect(doc.results()[0].description).toBe('a');
    });
  });

  describe('serialization', () => {
    it('renders an empty document as nothing', () => {
      expect(new TapDocument().toString()).toBe('');
    });

    it('renders version, header and plan', () => {
      const doc = new TapDocument();
      doc.addVersionLine();
      doc.addHeaderLine('# suite');
      doc.addPlan(1, 1);
      doc.addResult(new TestResult(true, 1, 'a'));
      expect(doc.toString()).toBe('TAP version 13\n# suite\n1..1\nok 1 - a\n');
    });

    it('rejects a multi-line header line', () => {
      expect(() => new TapDocument().addHeaderLine('a\nb')).toThrow(TapError);
    });

    it('round-trips through its JSON state', () => {
      const doc = parseString('TAP version 13\n1..2\nok 1 - a\n  ---\n  n: 1\n  ...\nnot ok 2 # TODO b\n');
      const restored = TapDocument.fromJSON(JSON.parse(JSON.stringify(doc.toJSON())));
      expect(restored.toString()).toBe(doc.toString());
      expect(restored.valid()).toBe(doc.valid());
    });

    it('rejects an invalid state', () => {
      expect(() => TapDocument.fromJSON({})).toThrow('Invalid document state at version: Required');
    });

    it('round-trips text', () => {
      const text = '1..3\nok 1 - a\nnot ok 2 - b # TODO later\nok 3 # SKIP no db\n';
      const doc = parseString(text);
      const again = parseString(doc.toString());
      const tuples = (d: TapDocument) => d.results().map((r) => [r.ok, r.number, r.description]);
      expect(tuples(again)).toEqual(tuples(doc));
      expect(again.valid()).toBe(doc.valid());
      expect(doc.toString()).toBe(text);
    });
  });
});
