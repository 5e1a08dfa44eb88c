// ============================================================================
// @tapline/core — Validation
// ============================================================================
//
// Verdict, in order of precedence:
//   1. no plan                    → MissingPlanError
//   2. document skipped           → valid
//   3. any bailout                → invalid
//   4. every planned number resolved exactly once, no explicit number
//      outside the plan, and every result ok or SKIP  → valid
//
// Plan placement (before or after the results) plays no part.
// ============================================================================

import type { TapDocument } from './document.js';
import { InvalidNumberingError, MissingPlanError } from './errors.js';
import { type Numbering, checkRange, coversRange, enumerate, missingNumbers } from './numbering.js';

export interface ValidatorOptions {
  /** Defaults to the document's own mode. */
  lenient?: boolean;
}

/**
 * `3, 4` or, past the listed ones, `3, 4, … (12 in total)`.
 */
export function formatMissing(count: number, numbers: readonly number[]): string {
  const listed = numbers.join(', ');
  return count > numbers.length ? `${listed}, … (${count} in total)` : listed;
}

/**
 * Judges whether a document represents a successful test run.
 */
export class TapValidator {
  readonly lenient: boolean;

  private readonly numbering: Numbering;
  private readonly numbers: Array<number | undefined>;
  private readonly skip: boolean;
  private readonly bailed: boolean;
  private readonly allPassing: boolean;
  private resolved: number[] | undefined;

  /**
   * @throws {MissingPlanError} If the document has no plan
   */
  constructor(doc: TapDocument, options: ValidatorOptions = {}) {
    const plan = doc.plan;
    if (!plan) throw new MissingPlanError();

    this.lenient = options.lenient ?? doc.lenient;
    this.numbering = plan;
    this.skip = doc.skip;
    this.bailed = doc.bailed();

    const results = doc.results();
    this.numbers = results.map((result) => result.number);
    this.allPassing = results.every((result) => result.passing);
  }

  /**
   * Resolved test numbers.
   *
   * @throws {InvalidNumberingError} If the numbers cannot be reconciled with
   * the plan
   */
  enumeration(): number[] {
    if (!this.resolved) {
      checkRange(this.numbers, this.numbering);
      this.resolved = enumerate(this.numbers, this.numbering.first, this.lenient);
    }
    return [...this.resolved];
  }

  /** Does every planned number resolve exactly once? */
  allExist(): boolean {
    return coversRange(this.enumeration(), this.numbering);
  }

  /**
   * Raise the first numbering problem found, if any. Unlike `valid`, this
   * says what is wrong; failing results and bailouts are not reported.
   *
   * @throws {InvalidNumberingError}
   */
  check(): void {
    this.enumeration();
    if (!this.allExist()) {
      const { count, numbers } = missingNumbers(this.enumeration(), this.numbering);
      throw new InvalidNumberingError(
        `plan ${this.numbering} is missing test number${count === 1 ? '' : 's'} ${formatMissing(count, numbers)}`,
      );
    }
  }

  valid(): boolean {
    if (this.skip) return true;
    if (this.bailed) return false;

    try {
      return this.allExist() && this.allPassing;
    } catch (err) {
      if (err instanceof InvalidNumberingError) return false;
      throw err;
    }
  }
}

/**
 * Does `doc` represent a successful test run?
 *
 * @throws {MissingPlanError} If the document has no plan
 */
export function validate(doc: TapDocument, options: ValidatorOptions = {}): boolean {
  return new TapValidator(doc, options).valid();
}
