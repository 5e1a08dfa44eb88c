// ============================================================================
// @tapline/core — Structural Parser
// ============================================================================
//
// States:  BeforeVersion ──version──▶ AfterVersion ──plan|result|abort──▶ Body
//
//   version   only as the very first line
//   plan      exactly once; placement (before/after results) is recorded
//   result    flushes buffered data, appends a TestResult
//   abort     flushes buffered data, appends an AbortMarker
//   data      buffered until the next structural token (or end of input)
//   warning   lenient: logged and dropped; strict: ParseError
//
// Buffered data goes to the most recent entry, or to the header when there
// is no entry yet.
// ============================================================================

import { type ParseOptions, type ResolvedParseOptions, resolveParseOptions } from './config.js';
import { parseDataLines } from './data.js';
import { TapDocument } from './document.js';
import { ParseError, fragment } from './errors.js';
import { Numbering } from './numbering.js';
import { AbortMarker, TestResult } from './result.js';
import { type Token, TapTokenizer, tokenizeLine } from './tokenizer.js';

export enum ParserState {
  BeforeVersion = 0,
  AfterVersion = 1,
  Body = 2,
}

/**
 * Assembles a TapDocument from a token stream.
 *
 * @example
 * ```ts
 * const doc = new TapParser({ lenient: false }).parse(['1..1', 'ok 1 - works']);
 * doc.valid(); // true
 * ```
 */
export class TapParser {
  private readonly options: ResolvedParseOptions;

  private doc = new TapDocument();
  private state = ParserState.BeforeVersion;
  private planSeen = false;
  private lineNumber = 0;
  private pending: string[] = [];
  private pendingStart = 0;

  constructor(options: ParseOptions = {}) {
    this.options = resolveParseOptions(options);
  }

  /**
   * Parse physical lines (or tokens already produced by a TapTokenizer).
   *
   * @throws {ParseError} On structural violations and, in strict mode, on
   * lines that look like TAP but do not match its syntax
   */
  parse(input: Iterable<string> | TapTokenizer): TapDocument {
    this.reset();

    if (input instanceof TapTokenizer) {
      for (const token of input) this.consume(token);
    } else {
      for (const line of input) this.consume(tokenizeLine(line.replace(/\r?\n$/, '')));
    }
    this.flush();

    const { doc } = this;
    this.reset();
    return doc;
  }

  private reset(): void {
    this.doc = new TapDocument({ lenient: this.options.lenient, codec: this.options.codec });
    this.state = ParserState.BeforeVersion;
    this.planSeen = false;
    this.lineNumber = 0;
    this.pending = [];
    this.pendingStart = 0;
  }

  private consume(token: Token): void {
    this.lineNumber += 1;

    switch (token.kind) {
      case 'version':
        this.onVersion(token.version);
        break;
      case 'plan':
        this.onPlan(token.first, token.last, token.comment);
        break;
      case 'result':
        this.flush();
        this.doc.addResult(this.buildResult(token));
        this.state = ParserState.Body;
        break;
      case 'abort':
        this.flush();
        this.doc.addAbort(new AbortMarker(token.reason));
        this.state = ParserState.Body;
        break;
      case 'data':
        if (this.pending.length === 0) this.pendingStart = this.lineNumber;
        this.pending.push(token.line);
        break;
      case 'warning':
        this.warn(token.message);
        break;
      default: {
        const unknown: never = token;
        throw new ParseError(`Unknown token ${JSON.stringify(unknown)}`);
      }
    }
  }

  private onVersion(version: number): void {
    const first =
      this.state === ParserState.BeforeVersion && this.pending.length === 0 && this.doc.header.length === 0;
    if (!first) {
      throw new ParseError('Unexpected version line. Version must be first line.', {
        line: this.lineNumber,
        fragment: `TAP version ${version}`,
      });
    }
    this.doc.addVersionLine(version);
    this.state = ParserState.AfterVersion;
  }

  private onPlan(first: number, last: number, comment: string): void {
    this.flush();
    if (this.planSeen) {
      throw new ParseError(`Plan read twice: "${fragment(`${first}..${last}`)}"`, { line: this.lineNumber });
    }
    if (Numbering.isDecreasing(first, last)) {
      this.warn(`Plan ${first}..${last} defines a decreasing range`);
    }

    // a comment mentioning "skip" marks the whole document skipped
    this.doc.addPlan(first, last, { comment, atBeginning: this.state <= ParserState.AfterVersion });

    this.planSeen = true;
    this.state = ParserState.Body;
  }

  private buildResult(token: Extract<Token, { kind: 'result' }>): TestResult {
    const result = new TestResult(token.ok, token.number, token.description);
    if (token.directive) {
      try {
        result.directive = token.directive;
      } catch (err) {
        if (err instanceof ParseError) {
          throw new ParseError(err.message, { line: this.lineNumber, fragment: token.directive });
        }
        throw err;
      }
    }
    return result;
  }

  /**
   * Attach buffered data lines to the most recent entry, or to the header.
   */
  private flush(): void {
    if (this.pending.length === 0) return;
    const lines = this.pending;
    this.pending = [];

    const last = this.doc.lastEntry();
    if (last === undefined) {
      for (const line of lines) this.doc.addHeaderLine(line);
      return;
    }

    switch (last.kind) {
      case 'result':
        this.doc.attachData(parseDataLines(lines, this.options.codec, this.pendingStart));
        break;
      case 'abort':
        this.doc.attachLines(lines);
        break;
    }
  }

  private warn(message: string): void {
    if (!this.options.lenient) {
      throw new ParseError(message, { line: this.lineNumber });
    }
    this.options.logger.warn(message, { line: this.lineNumber });
  }
}

/**
 * Parse TAP text into a document.
 */
export function parseString(text: string, options: ParseOptions = {}): TapDocument {
  const tokenizer = new TapTokenizer().pushText(text);
  return new TapParser(options).parse(tokenizer);
}

/**
 * Parse a sequence of physical lines into a document.
 */
export function parseLines(lines: Iterable<string>, options: ParseOptions = {}): TapDocument {
  return new TapParser(options).parse(lines);
}
