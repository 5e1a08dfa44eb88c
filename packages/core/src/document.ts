// ============================================================================
// @tapline/core — TAP Document
// ============================================================================
//
// A document is metadata (version, header lines, plan, skip flag) plus an
// append-only list of entries. Test numbers are resolved lazily: the
// enumeration is computed on first use and dropped by every mutation.
//
// Terminology:
//   plan / range      the declared numbers, e.g. 1..50
//   actual            what the entries really hold:
//
//     1..50
//     ok 1 first
//     ok 25 second       → length 50, actual length 2
// ============================================================================

import { z } from 'zod';
import { type DataCodec, type DataItem, yamlCodec } from './data.js';
import { BailoutError, MissingPlanError, ParseError, TapError, fragment } from './errors.js';
import { Numbering, type Range, checkRange, enumerate } from './numbering.js';
import {
  AbortMarker,
  type AbortMarkerState,
  type Entry,
  TestResult,
  type TestResultState,
  isAbortMarker,
  isTestResult,
} from './result.js';
import { TapValidator } from './validator.js';

export interface DocumentOptions {
  version?: number;
  /** Skip the whole document; a string is the reason. */
  skip?: boolean | string;
  /** Resolve numbering conflicts (true) or raise on them (false). */
  lenient?: boolean;
  codec?: DataCodec;
}

export interface PlanOptions {
  /** Plan comment; one containing "skip" also marks the document skipped. */
  comment?: string;
  /** Render the plan before the entries (default) or after them. */
  atBeginning?: boolean;
}

/**
 * One step of walking a document. A walk ends with either `end` or
 * `aborted`; nothing follows an `aborted` event.
 */
export type EntryEvent =
  | { type: 'result'; result: TestResult }
  | { type: 'aborted'; marker: AbortMarker }
  | { type: 'end' };

export type EntryState =
  | ({ kind: 'result' } & TestResultState)
  | ({ kind: 'abort' } & AbortMarkerState);

/** Plain JSON form of a document, see `toJSON` / `fromJSON`. */
export interface DocumentState {
  version: number;
  versionWritten: boolean;
  header: string[];
  plan: { first: number; last: number } | null;
  planComment: string;
  planAtBeginning: boolean;
  skip: boolean;
  skipComment: string;
  lenient: boolean;
  entries: EntryState[];
}

const dataItemSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), text: z.string() }),
  z.object({ kind: z.literal('structured'), value: z.unknown() }),
]);

const entrySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('result'),
    ok: z.boolean().nullable(),
    number: z.number().int().nonnegative().nullable(),
    description: z.string(),
    directives: z.array(z.object({ kind: z.enum(['skip', 'todo']), reason: z.string() })),
    data: z.array(dataItemSchema),
  }),
  z.object({
    kind: z.literal('abort'),
    reason: z.string(),
    lines: z.array(z.string()),
  }),
]);

const documentSchema = z.object({
  version: z.number().int().nonnegative(),
  versionWritten: z.boolean(),
  header: z.array(z.string()),
  plan: z
    .object({ first: z.number().int().nonnegative(), last: z.number().int().nonnegative() })
    .nullable(),
  planComment: z.string(),
  planAtBeginning: z.boolean(),
  skip: z.boolean(),
  skipComment: z.string(),
  lenient: z.boolean(),
  entries: z.array(entrySchema),
});

/**
 * An in-memory TAP document.
 *
 * @example
 * ```ts
 * const doc = new TapDocument();
 * doc.addPlan(1, 2);
 * doc.addResult(new TestResult(true, 1, 'first'));
 * doc.addResult(new TestResult(false, 2, 'second'));
 * doc.valid();        // false
 * doc.countFailed();  // 1
 * ```
 */
export class TapDocument {
  static readonly DEFAULT_VERSION = 13;

  readonly lenient: boolean;
  readonly codec: DataCodec;

  private versionNumber: number;
  private versionLine = false;
  private headerLines: string[] = [];
  private numbering: Numbering | undefined;
  private planComment = '';
  private planFirst = true;
  private skipped = false;
  private skipReason = '';
  private entryList: Entry[] = [];
  private cachedEnumeration: number[] | undefined;

  constructor(options: DocumentOptions = {}) {
    this.versionNumber = options.version ?? TapDocument.DEFAULT_VERSION;
    this.lenient = options.lenient ?? true;
    this.codec = options.codec ?? yamlCodec;
    if (options.skip !== undefined) this.setSkip(options.skip);
  }

  // -------------------------------------------------------------------------
  // Metadata
  // -------------------------------------------------------------------------

  get version(): number {
    return this.versionNumber;
  }

  /** Was a `TAP version` line read (or requested for output)? */
  get versionWritten(): boolean {
    return this.versionLine;
  }

  setVersion(version: number = TapDocument.DEFAULT_VERSION): void {
    if (!Number.isInteger(version) || version < 0) {
      throw new RangeError(`TAP version must be a non-negative integer, got ${version}`);
    }
    this.versionNumber = version;
  }

  /** Set the version and render a `TAP version` line. */
  addVersionLine(version: number = TapDocument.DEFAULT_VERSION): void {
    this.setVersion(version);
    this.versionLine = true;
  }

  get skip(): boolean {
    return this.skipped;
  }

  get skipComment(): string {
    return this.skipReason;
  }

  /**
   * Mark the whole document as skipped. `false` or an empty string clears
   * the flag.
   */
  setSkip(reason: boolean | string = true): void {
    if (typeof reason === 'boolean') {
      this.skipped = reason;
      this.skipReason = '';
    } else {
      this.skipped = reason.length > 0;
      this.skipReason = reason;
    }
  }

  /** Lines before the first entry (comments, usually). */
  get header(): readonly string[] {
    return this.headerLines;
  }

  addHeaderLine(line: string): void {
    if (/[\r\n]/.test(line)) {
      throw new TapError(`Header line must be a single line: "${fragment(line)}"`);
    }
    this.headerLines.push(line);
  }

  /**
   * Declare the plan.
   *
   * @throws {ParseError} If the document already has a plan
   */
  addPlan(first: number, last: number, options: PlanOptions = {}): void {
    if (this.numbering) {
      throw new ParseError(`Plan read twice: document already has plan ${this.numbering}`);
    }
    const comment = (options.comment ?? '').trim();
    if (/[\r\n]/.test(comment)) {
      throw new TapError('Plan comment must not contain a newline');
    }

    this.numbering = new Numbering(first, last);
    this.planFirst = options.atBeginning ?? true;
    if (/skip/i.test(comment)) {
      this.setSkip(comment);
    } else {
      this.planComment = comment;
    }
    this.invalidate();
  }

  hasPlan(): boolean {
    return this.numbering !== undefined;
  }

  /** Does the plan render before the entries? */
  get planAtBeginning(): boolean {
    return this.planFirst;
  }

  // -------------------------------------------------------------------------
  // Entries
  // -------------------------------------------------------------------------

  addResult(result: TestResult): void {
    this.entryList.push(result.copy());
    this.invalidate();
  }

  addAbort(marker: AbortMarker): void {
    this.entryList.push(marker.copy());
    this.invalidate();
  }

  addEntry(entry: Entry): void {
    switch (entry.kind) {
      case 'result':
        this.addResult(entry);
        break;
      case 'abort':
        this.addAbort(entry);
        break;
    }
  }

  /** Copies of all entries in document order. */
  get entries(): Entry[] {
    return this.entryList.map((entry) => entry.copy());
  }

  /** Copies of all test results in document order, numbers as declared. */
  results(): TestResult[] {
    return this.entryList.filter(isTestResult).map((result) => result.copy());
  }

  lastEntry(): Entry | undefined {
    return this.entryList.at(-1)?.copy();
  }

  /**
   * Append data items to the most recent entry, which must be a result.
   * @internal used by the parser while flushing buffered lines
   */
  attachData(items: readonly DataItem[]): void {
    const last = this.entryList.at(-1);
    if (!last || !isTestResult(last)) {
      throw new TapError('Data can only be attached to a test result');
    }
    last.addData(...items);
    this.invalidate();
  }

  /**
   * Append free-text lines to the most recent entry, which must be a bailout.
   * @internal used by the parser while flushing buffered lines
   */
  attachLines(lines: readonly string[]): void {
    const last = this.entryList.at(-1);
    if (!last || !isAbortMarker(last)) {
      throw new TapError('Lines can only be attached to a bailout');
    }
    last.lines.push(...lines);
    this.invalidate();
  }

  // -------------------------------------------------------------------------
  // Plan & numbering
  // -------------------------------------------------------------------------

  private requirePlan(): Numbering {
    if (!this.numbering) throw new MissingPlanError();
    return this.numbering;
  }

  private invalidate(): void {
    this.cachedEnumeration = undefined;
  }

  /** Copy of the plan, if one was declared. */
  get plan(): Numbering | undefined {
    return this.numbering?.copy();
  }

  /** Number of tests the plan declares. */
  length(): number {
    return this.requirePlan().length;
  }

  /** Number of test results actually present. */
  actualLength(): number {
    return this.entryList.filter(isTestResult).length;
  }

  range(): Range {
    return this.requirePlan().range();
  }

  /** Lowest and highest resolved number; `[1, 0]` without results. */
  actualRange(): Range {
    const enumeration = this.enumeration();
    if (enumeration.length === 0) return [1, 0];
    let lowest = enumeration[0];
    let highest = enumeration[0];
    for (const number of enumeration) {
      if (number < lowest) lowest = number;
      if (number > highest) highest = number;
    }
    return [lowest, highest];
  }

  /** The plan line, e.g. `1..3 # SKIP no database`. */
  planLine(): string {
    const [first, last] = this.range();
    return this.renderPlan(first, last);
  }

  /** A plan line covering the actual range. */
  actualPlanLine(): string {
    const [first, last] = this.actualRange();
    return this.renderPlan(first, last);
  }

  private renderPlan(first: number, last: number): string {
    const plan = `${first}..${last}`;
    if (this.skipped) {
      const comment = this.skipReason.trim();
      if (!comment) return `${plan} # SKIP`;
      if (!/skip/i.test(comment)) return `${plan} # SKIP ${comment}`;
      return `${plan} # ${comment}`;
    }
    return this.planComment ? `${plan} # ${this.planComment}` : plan;
  }

  /**
   * Concrete test number of every result, in document order.
   *
   * @throws {MissingPlanError} Without a plan
   * @throws {InvalidNumberingError} If the numbers cannot fit the plan, or on
   * a numbering conflict in strict mode
   */
  enumeration(): number[] {
    if (!this.cachedEnumeration) {
      const numbering = this.requirePlan();
      const numbers = this.entryList.filter(isTestResult).map((result) => result.number);
      checkRange(numbers, numbering);
      this.cachedEnumeration = enumerate(numbers, numbering.first, this.lenient);
    }
    return [...this.cachedEnumeration];
  }

  /**
   * Result with test number `number`, carrying that number, or `undefined`
   * when the plan has the slot but no result fills it.
   *
   * @throws {RangeError} If `number` lies outside the plan
   */
  at(number: number): TestResult | undefined {
    const numbering = this.requirePlan();
    if (!numbering.contains(number)) {
      throw new RangeError(`No test with number ${number} in plan ${numbering}`);
    }
    const index = this.enumeration().indexOf(number);
    if (index === -1) return undefined;

    const result = this.entryList.filter(isTestResult)[index].copy();
    result.number = number;
    return result;
  }

  /** Does a result resolve to `number`? */
  has(number: number): boolean {
    return this.enumeration().includes(number);
  }

  // -------------------------------------------------------------------------
  // Summary
  // -------------------------------------------------------------------------

  /** Results that are not `ok` (unknown outcomes included). */
  countFailed(): number {
    return this.entryList.filter((e) => isTestResult(e) && e.ok !== true).length;
  }

  countTodo(): number {
    return this.entryList.filter((e) => isTestResult(e) && e.todo).length;
  }

  countSkip(): number {
    return this.entryList.filter((e) => isTestResult(e) && e.skip).length;
  }

  /** Did the run bail out at some point? */
  bailed(): boolean {
    return this.entryList.some(isAbortMarker);
  }

  /** The first bailout of the document. */
  bailout(): AbortMarker | undefined {
    return this.entryList.find(isAbortMarker)?.copy();
  }

  bailoutMessage(): string | undefined {
    return this.entryList.find(isAbortMarker)?.reason;
  }

  /**
   * Does this document represent a successful test run?
   *
   * @throws {MissingPlanError} Without a plan
   */
  valid(): boolean {
    return new TapValidator(this).valid();
  }

  // -------------------------------------------------------------------------
  // Iteration
  // -------------------------------------------------------------------------

  /**
   * Walk the entries. A skipped document ends immediately; a bailout ends
   * the walk with an `aborted` event at its position.
   */
  *events(): Generator<EntryEvent, void, undefined> {
    if (!this.skipped) {
      for (const entry of this.entryList) {
        switch (entry.kind) {
          case 'result':
            yield { type: 'result', result: entry.copy() };
            break;
          case 'abort':
            yield { type: 'aborted', marker: entry.copy() };
            return;
        }
      }
    }
    yield { type: 'end' };
  }

  /**
   * Results in document order.
   *
   * @throws {BailoutError} When the walk reaches a bailout
   */
  *[Symbol.iterator](): Generator<TestResult, void, undefined> {
    for (const event of this.events()) {
      switch (event.type) {
        case 'result':
          yield event.result;
          break;
        case 'aborted':
          throw new BailoutError(event.marker);
        case 'end':
          return;
      }
    }
  }

  /** Results that are not `ok`; bailouts are ignored. */
  *failed(): Generator<TestResult, void, undefined> {
    if (this.skipped) return;
    for (const entry of this.entryList) {
      if (isTestResult(entry) && entry.ok !== true) yield entry.copy();
    }
  }

  /**
   * One `[number, result]` pair per planned number; `result` is undefined
   * where the document has no result for that number.
   */
  *planned(): Generator<[number, TestResult | undefined], void, undefined> {
    if (this.skipped) return;
    const numbering = this.requirePlan();
    const results = this.entryList.filter(isTestResult);
    const positions = new Map<number, number>();
    this.enumeration().forEach((number, index) => {
      if (!positions.has(number)) positions.set(number, index);
    });

    for (const number of numbering.numbers()) {
      const index = positions.get(number);
      if (index === undefined) {
        yield [number, undefined];
        continue;
      }
      const result = results[index].copy();
      result.number = number;
      yield [number, result];
    }
  }

  // -------------------------------------------------------------------------
  // Copy & serialization
  // -------------------------------------------------------------------------

  copy(): TapDocument {
    return TapDocument.fromJSON(this.toJSON(), { codec: this.codec });
  }

  /** Render as TAP text. */
  toString(): string {
    const lines: string[] = [];
    if (this.versionLine) lines.push(`TAP version ${this.versionNumber}`);
    lines.push(...this.headerLines);
    if (this.numbering && this.planFirst) lines.push(this.planLine());
    for (const entry of this.entryList) {
      lines.push(...(isTestResult(entry) ? entry.format(this.codec) : entry.format()));
    }
    if (this.numbering && !this.planFirst) lines.push(this.planLine());
    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  toJSON(): DocumentState {
    return {
      version: this.versionNumber,
      versionWritten: this.versionLine,
      header: [...this.headerLines],
      plan: this.numbering ? { first: this.numbering.first, last: this.numbering.last } : null,
      planComment: this.planComment,
      planAtBeginning: this.planFirst,
      skip: this.skipped,
      skipComment: this.skipReason,
      lenient: this.lenient,
      entries: this.entryList.map(
        (entry): EntryState =>
          isTestResult(entry) ? { kind: 'result', ...entry.toJSON() } : { kind: 'abort', ...entry.toJSON() },
      ),
    };
  }

  /**
   * Rebuild a document from `toJSON` output.
   *
   * @throws {TapError} If `state` is not a document state
   */
  static fromJSON(state: unknown, options: { codec?: DataCodec } = {}): TapDocument {
    const parsed = documentSchema.safeParse(state);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new TapError(`Invalid document state at ${issue.path.join('.') || '$'}: ${issue.message}`);
    }

    const data = parsed.data;
    const doc = new TapDocument({ version: data.version, lenient: data.lenient, codec: options.codec });
    doc.versionLine = data.versionWritten;
    doc.headerLines = [...data.header];
    if (data.plan) {
      doc.numbering = new Numbering(data.plan.first, data.plan.last);
    }
    doc.planComment = data.planComment;
    doc.planFirst = data.planAtBeginning;
    doc.skipped = data.skip;
    doc.skipReason = data.skipComment;

    for (const entry of data.entries) {
      if (entry.kind === 'abort') {
        doc.entryList.push(new AbortMarker(entry.reason, entry.lines));
        continue;
      }
      doc.entryList.push(
        TestResult.fromJSON({
          ok: entry.ok,
          number: entry.number,
          description: entry.description,
          directives: entry.directives,
          data: entry.data.map(
            (item): DataItem =>
              item.kind === 'text' ? { kind: 'text', text: item.text } : { kind: 'structured', value: item.value },
          ),
        }),
      );
    }
    return doc;
  }
}
