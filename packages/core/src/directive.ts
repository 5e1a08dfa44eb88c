// ============================================================================
// @tapline/core — SKIP / TODO Directives
// ============================================================================
//
// The text after `#` on a result line is a list of segments, each opened by
// a SKIP or TODO keyword:
//
//   # SKIP no network TODO port to v2
//     → [{ kind: 'skip', reason: 'no network' }, { kind: 'todo', reason: 'port to v2' }]
//
// Only the first word may carry a suffix (`SKIPPED`, `TODO:`); later
// keywords must stand alone so that a reason can mention "skipping".
// ============================================================================

import { ParseError, fragment } from './errors.js';

export type DirectiveKind = 'skip' | 'todo';

export interface Directive {
  kind: DirectiveKind;
  reason: string;
}

const LEADING_KEYWORD = /^(skip|todo)/i;
const KEYWORD = /^(skip|todo):?$/i;

function keywordOf(word: string, first: boolean): DirectiveKind | undefined {
  const match = (first ? LEADING_KEYWORD : KEYWORD).exec(word);
  return match ? (match[1].toLowerCase() === 'skip' ? 'skip' : 'todo') : undefined;
}

/**
 * Parse the directive clause of a result line (with or without its `#`).
 * Empty text yields no directives.
 *
 * @throws {ParseError} If the text does not start with SKIP or TODO
 */
export function parseDirectives(text: string): Directive[] {
  const source = text.replace(/^[#\s]+/, '').trimEnd();
  if (source.length === 0) return [];

  const words = source.split(/\s+/);
  const directives: Directive[] = [];
  let current: { kind: DirectiveKind; words: string[] } | undefined;

  for (const [index, word] of words.entries()) {
    const kind = keywordOf(word, index === 0);
    if (kind !== undefined) {
      if (current) directives.push({ kind: current.kind, reason: current.words.join(' ') });
      current = { kind, words: [] };
      // `SKIPPED:` or `TODO:` keep nothing; `skip-network` keeps the tail
      const rest = word.slice(4).replace(/^(ped|ping)?:?/i, '');
      if (rest.length > 0) current.words.push(rest);
    } else if (current) {
      current.words.push(word);
    } else {
      throw new ParseError(`Directive must start with SKIP or TODO, got "${fragment(source)}"`);
    }
  }

  if (current) directives.push({ kind: current.kind, reason: current.words.join(' ') });
  return directives;
}

/**
 * Render directives as they appear after `#`, in list order.
 */
export function formatDirectives(directives: readonly Directive[]): string {
  return directives
    .map(({ kind, reason }) => (reason ? `${kind.toUpperCase()} ${reason}` : kind.toUpperCase()))
    .join(' ');
}
