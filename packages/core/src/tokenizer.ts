// ============================================================================
// @tapline/core — Line Tokenizer
// ============================================================================
//
// Every physical line becomes exactly one token. Rules are tried in order:
//
//   version   TAP version 13
//   plan      1..4 [# comment]
//   result    (ok|not ok) [number] [- description] [# SKIP|TODO ...]
//   abort     Bail out! reason
//   data      anything else, verbatim
//
// A line that failed rules 1–4 but starts like one of them (`bail out`
// without the bang, say) becomes a
// `warning` token so the parser can decide between logging and raising.
// The tokenizer itself never throws.
// ============================================================================

import { fragment } from './errors.js';

export type LookalikeKind = 'version line' | 'plan' | 'test line' | 'bailout';

export type Token =
  | { kind: 'version'; version: number }
  | { kind: 'plan'; first: number; last: number; comment: string }
  | {
      kind: 'result';
      ok: boolean;
      number: number | undefined;
      description: string;
      directive: string;
    }
  | { kind: 'abort'; reason: string }
  | { kind: 'data'; line: string }
  | { kind: 'warning'; lookalike: LookalikeKind; line: string; message: string };

export type TokenKind = Token['kind'];

const VERSION_PATTERN = /^TAP version (\d+)\s*$/i;
const PLAN_PATTERN = /^(\d+)\.\.(\d+)\s*(#.*)?$/;
const RESULT_PATTERN = /^(not\s+)?ok(?:\s+(\d+))?(?:\s+(.*?))?\s*$/i;
const DIRECTIVE_START = /(?:^|\s)#\s*(?=skip|todo)/i;
const ABORT_PATTERN = /^Bail out!(.*)$/i;

const LOOKALIKES: ReadonlyArray<[RegExp, LookalikeKind]> = [
  [/^tap version/, 'version line'],
  [/^\d+\.\./, 'plan'],
  [/^not ok\s/, 'test line'],
  [/^ok\s/, 'test line'],
  [/^bail out/, 'bailout'],
];

function stripComment(comment: string | undefined): string {
  return (comment ?? '').replace(/^\s*#/, '').trim();
}

function stripDescription(text: string): string {
  return text.trim().replace(/^-(\s+|$)/, '').trim();
}

function resultToken(match: RegExpExecArray): Token {
  const rest = match[3] ?? '';
  const directiveAt = DIRECTIVE_START.exec(rest);
  const description = directiveAt ? rest.slice(0, directiveAt.index) : rest;
  const directive = directiveAt ? rest.slice(directiveAt.index + directiveAt[0].length) : '';

  return {
    kind: 'result',
    ok: match[1] === undefined,
    number: match[2] !== undefined ? Number(match[2]) : undefined,
    description: stripDescription(description),
    directive: directive.trim(),
  };
}

/**
 * Classify one physical line (without its line terminator).
 */
export function tokenizeLine(line: string): Token {
  const version = VERSION_PATTERN.exec(line);
  if (version) {
    return { kind: 'version', version: Number(version[1]) };
  }

  const plan = PLAN_PATTERN.exec(line);
  if (plan) {
    return {
      kind: 'plan',
      first: Number(plan[1]),
      last: Number(plan[2]),
      comment: stripComment(plan[3]),
    };
  }

  const result = RESULT_PATTERN.exec(line);
  if (result) {
    return resultToken(result);
  }

  const abort = ABORT_PATTERN.exec(line);
  if (abort) {
    return { kind: 'abort', reason: abort[1].trim() };
  }

  const normalized = line.trim().toLowerCase();
  for (const [pattern, lookalike] of LOOKALIKES) {
    if (pattern.test(normalized)) {
      return {
        kind: 'warning',
        lookalike,
        line,
        message: `Line "${fragment(line.trim())}" looks like a ${lookalike}, but does not match syntax`,
      };
    }
  }

  return { kind: 'data', line };
}

/**
 * Split text into physical lines, accepting `\n` and `\r\n`.
 * A final line terminator does not start another line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Queue of tokens in arrival order.
 *
 * @example
 * ```ts
 * const tokenizer = new TapTokenizer();
 * tokenizer.pushText('1..1\nok 1 - works\n');
 * for (const token of tokenizer) console.log(token.kind);
 * // plan
 * // result
 * ```
 */
export class TapTokenizer implements IterableIterator<Token> {
  private readonly queue: Token[] = [];
  private head = 0;

  push(line: string): this {
    this.queue.push(tokenizeLine(line.replace(/\r?\n$/, '')));
    return this;
  }

  pushLines(lines: Iterable<string>): this {
    for (const line of lines) this.push(line);
    return this;
  }

  pushText(text: string): this {
    return this.pushLines(splitLines(text));
  }

  /** Tokens queued but not consumed yet. */
  get pending(): number {
    return this.queue.length - this.head;
  }

  next(): IteratorResult<Token> {
    if (this.head >= this.queue.length) {
      return { done: true, value: undefined };
    }
    const value = this.queue[this.head];
    this.head += 1;
    return { done: false, value };
  }

  [Symbol.iterator](): IterableIterator<Token> {
    return this;
  }
}

/**
 * Tokenize a whole text.
 */
export function tokenize(text: string): Token[] {
  return splitLines(text).map(tokenizeLine);
}
