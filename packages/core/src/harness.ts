// ============================================================================
// @tapline/core — Harness Report
// ============================================================================
//
// A plain-text summary in the style of the classic test harness:
//
//   first check............ok
//   second check...........not ok
//   FAILED tests 2
//   Failed 1/2 tests, 50.00% okay
// ============================================================================

import type { TapDocument } from './document.js';
import { missingNumbers } from './numbering.js';
import { formatMissing } from './validator.js';

const LABEL_WIDTH = 23;

function percentOkay(total: number, failed: number): string {
  if (total === 0) return '100.00';
  return (((total - failed) / total) * 100).toFixed(2);
}

/**
 * Render the harness report of a document.
 *
 * @throws {MissingPlanError} If the document has no plan
 * @throws {InvalidNumberingError} If its numbers cannot be resolved
 */
export function harness(doc: TapDocument): string {
  const enumeration = doc.enumeration();
  const { plan } = doc;
  const lines: string[] = [];
  const failed: number[] = [];
  let position = 0;

  for (const event of doc.events()) {
    switch (event.type) {
      case 'result': {
        const { result } = event;
        const number = enumeration[position];
        position += 1;
        const label = result.description || `test ${number}`;
        lines.push(`${label.padEnd(LABEL_WIDTH, '.')}${result.ok ? 'ok' : 'not ok'}`);
        if (!result.passing) failed.push(number);
        break;
      }
      case 'aborted':
        lines.push(`Bail out! ${event.marker.reason}`.trimEnd());
        lines.push(`DIED. FAILED tests ${failed.length > 0 ? failed.join(', ') : 'none'}`);
        lines.push(`Failed ${failed.length}/${doc.length()} tests, ${percentOkay(doc.length(), failed.length)}% okay`);
        break;
      case 'end':
        if (doc.skip) {
          lines.push(doc.skipComment ? `All tests skipped: ${doc.skipComment}` : 'All tests skipped.');
        } else if (doc.valid()) {
          lines.push('All tests successful.');
        } else {
          const missing = plan ? missingNumbers(enumeration, plan) : { count: 0, numbers: [] };
          if (failed.length > 0) lines.push(`FAILED tests ${failed.join(', ')}`);
          if (missing.count > 0) lines.push(`Missing tests ${formatMissing(missing.count, missing.numbers)}`);
          const count = failed.length + missing.count;
          lines.push(`Failed ${count}/${doc.length()} tests, ${percentOkay(doc.length(), count)}% okay`);
        }
        break;
    }
  }

  return `${lines.join('\n')}\n`;
}
