// ============================================================================
// @tapline/core — Merging Documents
// ============================================================================

import { TapDocument } from './document.js';
import { enumerate } from './numbering.js';

/**
 * Resolved number of every result. The input's plan only supplies the
 * start; results outside it are kept.
 */
function resolveNumbers(doc: TapDocument): number[] {
  return enumerate(
    doc.results().map((result) => result.number),
    doc.plan?.first ?? 1,
    doc.lenient,
  );
}

/**
 * Combine documents in argument order.
 *
 * The first document's results keep their numbers; results of every later
 * document are shifted past the highest number used so far, so numbers
 * never collide. The merged plan spans all resolved numbers and only the
 * first bailout survives.
 *
 * @example
 * ```ts
 * const merged = merge(parseString('1..2\nok 1\nok 2\n'), parseString('1..3\nok 1\nok 2\nok 3\n'));
 * merged.planLine(); // '1..5'
 * ```
 *
 * @throws {InvalidNumberingError} On a numbering conflict in a strict input
 */
export function merge(...docs: TapDocument[]): TapDocument {
  if (docs.length === 0) {
    throw new TypeError('merge() needs at least one document');
  }

  const version = Math.max(...docs.map((doc) => doc.version));
  const merged = new TapDocument({
    version,
    lenient: docs.every((doc) => doc.lenient),
    codec: docs[0].codec,
  });
  if (docs.some((doc) => doc.versionWritten)) merged.addVersionLine(version);

  for (const doc of docs) {
    for (const line of doc.header) merged.addHeaderLine(line);
  }

  let offset = 0;
  let lowest = Number.POSITIVE_INFINITY;
  let highest = 0;
  let bailedOut = false;

  docs.forEach((doc, index) => {
    const numbers = resolveNumbers(doc);
    let position = 0;

    for (const entry of doc.entries) {
      if (entry.kind === 'abort') {
        if (!bailedOut) merged.addAbort(entry);
        bailedOut = true;
        continue;
      }

      const number = numbers[position] + offset;
      position += 1;
      if (index > 0) entry.number = number;

      lowest = Math.min(lowest, number);
      highest = Math.max(highest, number);
      merged.addResult(entry);
    }

    offset = highest;
  });

  const [first, last] = lowest === Number.POSITIVE_INFINITY ? [1, 0] : [lowest, highest];
  merged.addPlan(first, last, { atBeginning: docs.every((doc) => doc.planAtBeginning) });

  if (docs.every((doc) => doc.skip)) {
    const comments = docs.map((doc) => doc.skipComment).filter((comment) => comment.length > 0);
    merged.setSkip(comments.length > 0 ? comments.join('; ') : true);
  }

  return merged;
}
