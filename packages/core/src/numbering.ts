// ============================================================================
// @tapline/core — Plan Ranges & Test Number Enumeration
// ============================================================================
//
// A plan `first..last` is stored as (first, length). `1..0` is the
// "explicitly zero tests" plan; any other decreasing range also has length
// zero and renders as `first..first-1`.
//
// The enumeration maps each result, in document order, to a concrete test
// number:
//
//   declared   [1, 3, _, 8]   →  [1, 3, 4, 8]
//   declared   [1, 3, _, 2]   →  [1, 3, 4, 2]   (lenient; strict raises)
//   declared   [_, _, 2]      →  [1, 2, 3]      (lenient; strict raises)
// ============================================================================

import { InvalidNumberingError } from './errors.js';

/** Inclusive `[first, last]` pair. */
export type Range = readonly [first: number, last: number];

/**
 * The declared range of test numbers of a document (its plan).
 */
export class Numbering {
  readonly first: number;
  private size: number;

  constructor(first: number, last: number) {
    if (!Number.isInteger(first) || !Number.isInteger(last) || first < 0 || last < 0) {
      throw new RangeError(`Plan bounds must be non-negative integers, got ${first}..${last}`);
    }
    this.first = first;
    this.size = last < first ? 0 : last - first + 1;
  }

  /** A plan `1..tests`. */
  static ofLength(tests: number): Numbering {
    return new Numbering(1, tests);
  }

  get length(): number {
    return this.size;
  }

  get last(): number {
    return this.first + this.size - 1;
  }

  /** Is `first..last` a decreasing range other than `1..0`? */
  static isDecreasing(first: number, last: number): boolean {
    return last < first && !(first === 1 && last === 0);
  }

  range(): Range {
    return [this.first, this.last];
  }

  contains(number: number): boolean {
    return this.first <= number && number < this.first + this.size;
  }

  /** Extend the plan by one test. */
  grow(): void {
    this.size += 1;
  }

  /** Every number of the range, in order, produced on demand. */
  *numbers(): Generator<number, void, undefined> {
    for (let number = this.first; number <= this.last; number++) yield number;
  }

  /** The same number of tests, starting at 1. */
  normalized(): string {
    return `1..${this.size}`;
  }

  copy(): Numbering {
    const copy = new Numbering(this.first, this.first);
    copy.size = this.size;
    return copy;
  }

  toString(): string {
    return `${this.first}..${this.last}`;
  }
}

/**
 * Resolve a concrete test number for every entry.
 *
 * Single left-to-right pass. A cursor starting at `first` hands out numbers
 * for absent entries and never moves backward; an explicit number moves it
 * past itself. A number already taken (explicitly or by an earlier absent
 * entry) is a conflict: strict mode raises, lenient mode gives the later
 * entry the next free number. Strict mode also rejects an explicit number
 * below a number that was already handed out implicitly.
 *
 * @throws {InvalidNumberingError} On a conflict in strict mode
 */
export function enumerate(
  numbers: ReadonlyArray<number | undefined>,
  first = 1,
  lenient = false,
): number[] {
  const taken = new Set<number>();
  const sequence: number[] = [];
  let cursor = first;
  let highestImplicit: number | undefined;

  const nextFree = (): number => {
    while (taken.has(cursor)) cursor += 1;
    const number = cursor;
    cursor += 1;
    return number;
  };

  for (const declared of numbers) {
    let number: number;

    if (declared === undefined) {
      number = nextFree();
      highestImplicit = number;
    } else if (taken.has(declared)) {
      if (!lenient) {
        throw new InvalidNumberingError(`test number ${declared} was already used`, declared);
      }
      number = nextFree();
    } else {
      if (!lenient && highestImplicit !== undefined && declared < highestImplicit) {
        throw new InvalidNumberingError(
          `test number ${declared} comes after number ${highestImplicit} was assigned implicitly`,
          declared,
        );
      }
      number = declared;
      if (declared >= cursor) cursor = declared + 1;
    }

    taken.add(number);
    sequence.push(number);
  }

  return sequence;
}

/**
 * Check that declared numbers can fit the plan at all.
 *
 * @throws {InvalidNumberingError} If there are more entries than the plan
 * allows, or an explicit number lies outside the range
 */
export function checkRange(numbers: ReadonlyArray<number | undefined>, numbering: Numbering): void {
  if (numbers.length > numbering.length) {
    throw new InvalidNumberingError(
      `${numbers.length} tests provided, plan ${numbering} allows ${numbering.length}`,
    );
  }

  for (const number of numbers) {
    if (number !== undefined && !numbering.contains(number)) {
      throw new InvalidNumberingError(`test number ${number} is outside of plan ${numbering}`, number);
    }
  }
}

/**
 * Does `enumeration` contain every number of `numbering` exactly once?
 * Numbers outside the range are ignored.
 */
export function coversRange(enumeration: readonly number[], numbering: Numbering): boolean {
  const seen = new Set<number>();
  for (const number of enumeration) {
    if (!numbering.contains(number)) continue;
    if (seen.has(number)) return false;
    seen.add(number);
  }
  return seen.size === numbering.length;
}

/**
 * Planned numbers no entry resolved to. `count` is exact; `numbers` holds at
 * most `limit` of them, lowest first. Runs in the size of `enumeration`, not
 * the size of the plan.
 */
export function missingNumbers(
  enumeration: readonly number[],
  numbering: Numbering,
  limit = 20,
): { count: number; numbers: number[] } {
  const covered = [...new Set(enumeration.filter((n) => numbering.contains(n)))].sort((a, b) => a - b);
  const numbers: number[] = [];
  let next = numbering.first;

  for (const number of [...covered, numbering.last + 1]) {
    while (next < number && numbers.length < limit) {
      numbers.push(next);
      next += 1;
    }
    if (numbers.length >= limit) break;
    next = number + 1;
  }

  return { count: numbering.length - covered.length, numbers };
}
