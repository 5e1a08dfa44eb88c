import { describe, expect, it } from 'vitest';
import { harness } from '../harness.js';
import { parseString } from '../parser.js';

const row = (label: string, outcome: string) => `${label}${'.'.repeat(23 - label.length)}${outcome}`;

describe('harness', () => {
  it('reports a successful run', () => {
    expect(harness(parseString('1..2\nok 1\nok 2\n'))).toBe(
      [row('test 1', 'ok'), row('test 2', 'ok'), 'All tests successful.', ''].join('\n'),
    );
  });

  it('lists failed tests', () => {
    expect(harness(parseString('1..2\nok 1 - first check\nnot ok 2 - second check\n'))).toBe(
      [
        'first check............ok',
        'second check...........not ok',
        'FAILED tests 2',
        'Failed 1/2 tests, 50.00% okay',
        '',
      ].join('\n'),
    );
  });

  it('lists missing tests', () => {
    expect(harness(parseString('1..3\nok 1\nnot ok 2\n'))).toBe(
      [
        row('test 1', 'ok'),
        row('test 2', 'not ok'),
        'FAILED tests 2',
        'Missing tests 3',
        'Failed 2/3 tests, 33.33% okay',
        '',
      ].join('\n'),
    );
  });

  it('stops at a bailout', () => {
    expect(harness(parseString('1..1\nok 1 - works\nBail out! disk full\n'))).toBe(
      [row('works', 'ok'), 'Bail out! disk full', 'DIED. FAILED tests none', 'Failed 0/1 tests, 100.00% okay', ''].join(
        '\n',
      ),
    );
  });

  it('reports a skipped run', () => {
    expect(harness(parseString('1..0 # skip no db\n'))).toBe('All tests skipped: skip no db\n');
  });

  it('summarizes the gaps of a huge plan', () => {
    const listed = Array.from({ length: 20 }, (_, i) => i + 2).join(', ');
    expect(harness(parseString('1..10000000000\nok 1\n'))).toBe(
      [
        row('test 1', 'ok'),
        `Missing tests ${listed}, … (9999999999 in total)`,
        'Failed 9999999999/10000000000 tests, 0.00% okay',
        '',
      ].join('\n'),
    );
  });
});
