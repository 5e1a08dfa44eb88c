// ============================================================================
// @tapline/core — Document Builder
// ============================================================================

import type { DataItem } from './data.js';
import { TapDocument } from './document.js';
import { TapError } from './errors.js';
import { Numbering } from './numbering.js';
import { AbortMarker, TestResult } from './result.js';

export type PlanSpec = { first: number; last: number } | { tests: number };

export interface WriterPlanOptions {
  /** Non-empty when the whole suite was skipped. */
  skip?: string;
  /** Emit a `TAP version` line. */
  version?: number;
}

export interface TestcaseOptions {
  skip?: string | boolean;
  todo?: string | boolean;
  /** Structured values attached as `---` … `...` blocks. */
  data?: unknown[];
}

type Step =
  | { kind: 'result'; result: TestResult }
  | { kind: 'abort'; marker: AbortMarker }
  | { kind: 'comment'; line: string }
  | { kind: 'data'; value: unknown };

/**
 * Collects results and comments, then builds a TapDocument. Nothing is
 * shared between writers; each caller owns its own.
 *
 * @example
 * ```ts
 * const text = new TapWriter()
 *   .plan({ tests: 2 })
 *   .ok('1 + 1 == 2')
 *   .notOk('2 + 2 == 5', { todo: 'fix arithmetic' })
 *   .toString();
 * // 1..2
 * // ok 1 - 1 + 1 == 2
 * // not ok 2 - 2 + 2 == 5 # TODO fix arithmetic
 * ```
 */
export class TapWriter {
  private planRange: { first: number; last: number } | undefined;
  private skipReason = '';
  private versionNumber: number | undefined;
  private readonly steps: Step[] = [];

  /**
   * Declare the plan. Without one, the plan covers exactly the results written.
   *
   * @throws {TapError} If a plan was already declared
   */
  plan(spec: PlanSpec, options: WriterPlanOptions = {}): this {
    if (this.planRange) {
      throw new TapError('Only one plan per document allowed');
    }
    this.planRange = 'tests' in spec ? { first: 1, last: spec.tests } : { first: spec.first, last: spec.last };
    this.skipReason = options.skip ?? '';
    this.versionNumber = options.version;
    return this;
  }

  testcase(ok: boolean, description = '', options: TestcaseOptions = {}): this {
    const result = new TestResult(ok, undefined, description);
    if (options.skip) result.addSkip(options.skip === true ? '' : options.skip);
    if (options.todo) result.addTodo(options.todo === true ? '' : options.todo);
    this.steps.push({ kind: 'result', result });
    for (const value of options.data ?? []) this.steps.push({ kind: 'data', value });
    return this;
  }

  ok(description = '', options: TestcaseOptions = {}): this {
    return this.testcase(true, description, options);
  }

  notOk(description = '', options: TestcaseOptions = {}): this {
    return this.testcase(false, description, options);
  }

  /** A `# comment` line at the current position. */
  comment(text: string): this {
    for (const line of text.split(/\r?\n/)) {
      this.steps.push({ kind: 'comment', line: `# ${line}`.trimEnd() });
    }
    return this;
  }

  /**
   * Attach a structured value to the most recent result.
   *
   * @throws {TapError} If no result was written yet, or a bailout followed it
   */
  data(value: unknown): this {
    const entries = this.steps.filter((step) => step.kind === 'result' || step.kind === 'abort');
    if (entries.at(-1)?.kind !== 'result') {
      throw new TapError('Structured data needs a preceding test result');
    }
    this.steps.push({ kind: 'data', value });
    return this;
  }

  bailout(reason = '', lines: readonly string[] = []): this {
    this.steps.push({ kind: 'abort', marker: new AbortMarker(reason, lines) });
    return this;
  }

  build(): TapDocument {
    const doc = new TapDocument();
    if (this.versionNumber !== undefined) doc.addVersionLine(this.versionNumber);

    const implicit = Numbering.ofLength(0);
    let number = this.planRange?.first ?? 1;
    let target: TestResult | AbortMarker | undefined;
    const entries: Array<TestResult | AbortMarker> = [];
    let text: string[] = [];

    const flushText = () => {
      if (text.length === 0) return;
      if (target instanceof TestResult) {
        target.addData({ kind: 'text', text: text.join('\n') });
      } else if (target instanceof AbortMarker) {
        target.lines.push(...text);
      } else {
        for (const line of text) doc.addHeaderLine(line);
      }
      text = [];
    };

    for (const step of this.steps) {
      switch (step.kind) {
        case 'comment':
          text.push(step.line);
          break;
        case 'data': {
          flushText();
          const item: DataItem = { kind: 'structured', value: step.value };
          if (target instanceof TestResult) target.addData(item);
          break;
        }
        case 'result':
          flushText();
          target = step.result.copy();
          target.number = number;
          number += 1;
          implicit.grow();
          entries.push(target);
          break;
        case 'abort':
          flushText();
          target = step.marker.copy();
          entries.push(target);
          break;
      }
    }
    flushText();

    const { first, last } = this.planRange ?? { first: implicit.first, last: implicit.last };
    doc.addPlan(first, last);
    if (this.skipReason) doc.setSkip(this.skipReason);
    for (const entry of entries) doc.addEntry(entry);
    return doc;
  }

  toString(): string {
    return this.build().toString();
  }
}
