// ============================================================================
// @tapline/core — Public API
// ============================================================================

// Parsing
export { TapParser, ParserState, parseString, parseLines } from './parser.js';
export { TapTokenizer, tokenize, tokenizeLine, splitLines } from './tokenizer.js';
export type { Token, TokenKind, LookalikeKind } from './tokenizer.js';

// Document model
export { TapDocument } from './document.js';
export type { DocumentOptions, PlanOptions, EntryEvent, EntryState, DocumentState } from './document.js';
export { TestResult, AbortMarker, isTestResult, isAbortMarker } from './result.js';
export type { Entry, TestResultState, AbortMarkerState } from './result.js';
export { parseDirectives, formatDirectives } from './directive.js';
export type { Directive, DirectiveKind } from './directive.js';

// Numbering
export { Numbering, enumerate, checkRange, coversRange, missingNumbers } from './numbering.js';
export type { Range } from './numbering.js';

// Attached data
export { yamlCodec, parseDataLines, formatDataItems, copyDataItems } from './data.js';
export type { DataItem, DataCodec } from './data.js';

// Validation, merging, reporting
export { TapValidator, formatMissing, validate } from './validator.js';
export type { ValidatorOptions } from './validator.js';
export { merge } from './merge.js';
export { harness } from './harness.js';
export { TapWriter } from './writer.js';
export type { PlanSpec, WriterPlanOptions, TestcaseOptions } from './writer.js';

// Configuration
export { resolveParseOptions } from './config.js';
export type { ParseOptions, ResolvedParseOptions } from './config.js';

// Errors
export {
  TapError,
  ParseError,
  MissingPlanError,
  InvalidNumberingError,
  BailoutError,
  fragment,
} from './errors.js';

// Logging
export {
  logger,
  onLog,
  setLogLevel,
  getLogLevel,
  isDebugEnabled,
} from './logger.js';
export type { Logger, LogLevel, LogEntry, LogCallback } from './logger.js';
