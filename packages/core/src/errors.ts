// ============================================================================
// @tapline/core — Error Types
// ============================================================================

import type { AbortMarker } from './result.js';

const FRAGMENT_LENGTH = 20;

/**
 * Shorten a piece of offending input for an error message.
 */
export function fragment(text: string): string {
  return text.length > FRAGMENT_LENGTH ? `${text.slice(0, FRAGMENT_LENGTH)}…` : text;
}

/**
 * Base error class for all tapline errors.
 */
export class TapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TapError';
  }
}

// ---------------------------------------------------------------------------
// Parse Errors
// ---------------------------------------------------------------------------

/**
 * Thrown on structural violations: version not first, plan declared twice,
 * unterminated data blocks, or (strict mode) lookalike lines.
 */
export class ParseError extends TapError {
  public readonly line?: number;
  public readonly fragment?: string;

  constructor(message: string, options?: { line?: number; fragment?: string }) {
    super(options?.line !== undefined ? `${message} (line ${options.line})` : message);
    this.name = 'ParseError';
    this.line = options?.line;
    this.fragment = options?.fragment;
  }
}

/**
 * Thrown when length, enumeration or validity is requested from a document
 * that never declared a plan.
 */
export class MissingPlanError extends ParseError {
  constructor(message = 'Document cannot be validated. Document requires plan.') {
    super(message);
    this.name = 'MissingPlanError';
  }
}

/**
 * Thrown when the declared range and the test numbers cannot be reconciled.
 */
export class InvalidNumberingError extends ParseError {
  public readonly number?: number;

  constructor(message: string, number?: number) {
    super(`Invalid test numbering: ${message}`);
    this.name = 'InvalidNumberingError';
    this.number = number;
  }
}

// ---------------------------------------------------------------------------
// Bailout
// ---------------------------------------------------------------------------

/**
 * Raised by the result iterator of a document when it reaches a
 * `Bail out!` line. The tagged event stream reports the same condition
 * without throwing.
 */
export class BailoutError extends TapError {
  public readonly marker: AbortMarker;

  constructor(marker: AbortMarker) {
    super(`Bail out! ${marker.reason}`.trimEnd());
    this.name = 'BailoutError';
    this.marker = marker;
  }
}
