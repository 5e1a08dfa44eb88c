// ============================================================================
// @tapline/core — Document Entries
// ============================================================================

import { type DataCodec, type DataItem, copyDataItems, formatDataItems, yamlCodec } from './data.js';
import { type Directive, formatDirectives, parseDirectives } from './directive.js';

/** Plain JSON form of a test result. */
export interface TestResultState {
  ok: boolean | null;
  number: number | null;
  description: string;
  directives: Directive[];
  data: DataItem[];
}

/** Plain JSON form of a bailout. */
export interface AbortMarkerState {
  reason: string;
  lines: string[];
}

function assertTestNumber(number: number): void {
  if (!Number.isInteger(number) || number < 0) {
    throw new RangeError(`Test number must be a non-negative integer, got ${number}`);
  }
}

/**
 * One `ok` / `not ok` line and the data attached to it.
 */
export class TestResult {
  readonly kind = 'result' as const;

  /** `undefined` means the outcome is unknown. */
  ok: boolean | undefined;
  description: string;
  private declaredNumber: number | undefined;
  private directiveList: Directive[] = [];
  private items: DataItem[] = [];

  constructor(ok?: boolean, number?: number, description = '') {
    this.ok = ok;
    this.description = description;
    if (number !== undefined) assertTestNumber(number);
    this.declaredNumber = number;
  }

  get number(): number | undefined {
    return this.declaredNumber;
  }

  set number(value: number | undefined) {
    if (value !== undefined) assertTestNumber(value);
    this.declaredNumber = value;
  }

  get directives(): readonly Directive[] {
    return this.directiveList;
  }

  /** Directive clause as written after `#`, e.g. `SKIP no network`. */
  get directive(): string {
    return formatDirectives(this.directiveList);
  }

  /** Replace all directives by parsing `text`. */
  set directive(text: string) {
    this.directiveList = parseDirectives(text);
  }

  get skip(): boolean {
    return this.directiveList.some((d) => d.kind === 'skip');
  }

  get todo(): boolean {
    return this.directiveList.some((d) => d.kind === 'todo');
  }

  get skipReasons(): string[] {
    return this.directiveList.filter((d) => d.kind === 'skip').map((d) => d.reason);
  }

  get todoReasons(): string[] {
    return this.directiveList.filter((d) => d.kind === 'todo').map((d) => d.reason);
  }

  addSkip(reason = ''): this {
    this.directiveList.push({ kind: 'skip', reason: reason.trim() });
    return this;
  }

  addTodo(reason = ''): this {
    this.directiveList.push({ kind: 'todo', reason: reason.trim() });
    return this;
  }

  get data(): readonly DataItem[] {
    return this.items;
  }

  /** Replace attached data with a copy of `items`. */
  set data(items: readonly DataItem[]) {
    this.items = copyDataItems(items);
  }

  addData(...items: DataItem[]): this {
    this.items.push(...copyDataItems(items));
    return this;
  }

  /** Is this result a pass for validation purposes? */
  get passing(): boolean {
    return this.ok === true || this.skip;
  }

  copy(): TestResult {
    const copy = new TestResult(this.ok, this.declaredNumber, this.description);
    copy.directiveList = this.directiveList.map((d) => ({ ...d }));
    copy.items = copyDataItems(this.items);
    return copy;
  }

  /** The result line alone, without attached data. */
  line(): string {
    let out = this.ok ? 'ok' : 'not ok';
    if (this.declaredNumber !== undefined) out += ` ${this.declaredNumber}`;
    if (this.description) out += ` - ${this.description}`;
    const directive = this.directive;
    if (directive) out += ` # ${directive}`;
    return out;
  }

  /** Result line followed by its data lines. */
  format(codec: DataCodec = yamlCodec): string[] {
    return [this.line(), ...formatDataItems(this.items, codec)];
  }

  toString(): string {
    return `${this.format().join('\n')}\n`;
  }

  toJSON(): TestResultState {
    return {
      ok: this.ok ?? null,
      number: this.declaredNumber ?? null,
      description: this.description,
      directives: this.directiveList.map((d) => ({ ...d })),
      data: copyDataItems(this.items),
    };
  }

  static fromJSON(state: TestResultState): TestResult {
    const result = new TestResult(state.ok ?? undefined, state.number ?? undefined, state.description);
    result.directiveList = state.directives.map((d) => ({ ...d }));
    result.items = copyDataItems(state.data);
    return result;
  }
}

/**
 * A `Bail out!` line: testing stopped early.
 */
export class AbortMarker {
  readonly kind = 'abort' as const;

  reason: string;
  /** Further free-text lines that followed the bailout. */
  lines: string[];

  constructor(reason = '', lines: readonly string[] = []) {
    this.reason = reason.trim();
    this.lines = [...lines];
  }

  copy(): AbortMarker {
    return new AbortMarker(this.reason, this.lines);
  }

  format(): string[] {
    return [`Bail out! ${this.reason}`.trimEnd(), ...this.lines];
  }

  toString(): string {
    return `${this.format().join('\n')}\n`;
  }

  toJSON(): AbortMarkerState {
    return { reason: this.reason, lines: [...this.lines] };
  }
}

/** Anything a document holds, in document order. */
export type Entry = TestResult | AbortMarker;

export function isTestResult(entry: Entry): entry is TestResult {
  return entry.kind === 'result';
}

export function isAbortMarker(entry: Entry): entry is AbortMarker {
  return entry.kind === 'abort';
}
