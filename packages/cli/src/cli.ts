// ============================================================================
// @tapline/cli — TAP stream toolbox
// ============================================================================
// Commands:
//   tapline validate <file.tap…> [--strict]   → one verdict per file
//   tapline merge    <file.tap…> [--strict]   → merged document on stdout
//   tapline summary  <file.tap>   [--strict]   → harness report
//   tapline json     <file.tap>   [--strict]   → document state as JSON
//
// Exit codes: 0 valid, 1 invalid, 2 bailed out, 3 unreadable or unparseable.
// With several files the most severe code wins.
// ============================================================================

import {
  type Logger,
  type ParseOptions,
  type TapDocument,
  TapError,
  harness,
  merge,
  parseString,
} from '@tapline/core';

export const EXIT_VALID = 0;
export const EXIT_INVALID = 1;
export const EXIT_BAILED = 2;
export const EXIT_ERROR = 3;

export interface CliIo {
  readFile(path: string): string;
  stdout(text: string): void;
  stderr(text: string): void;
  /** Colorize verdicts with ANSI escapes. */
  color?: boolean;
}

const FLAGS = new Set(['--strict', '--help', '--color', '--no-color']);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// ── ANSI Color Helpers ──────────────────────────────────────────────────────
const ANSI = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  brightGreen: '\x1b[92m',
};

function usage(): string {
  return `
  tapline ─ Test Anything Protocol toolbox

  Usage:
    tapline validate <file.tap…>     Judge each run (exit 0 valid, 1 invalid, 2 bailed out, 3 error)
    tapline merge    <file.tap…>     Print the merged document
    tapline summary  <file.tap>      Print a harness report
    tapline json     <file.tap>      Print the document state as JSON

  Options:
    --strict             Raise on ambiguous input instead of repairing it
    --color / --no-color Force or disable colored verdicts

  Environment Variables:
    TAPLINE_STRICT=1     Same as --strict
    TAPLINE_DEBUG=1      Verbose logging
`;
}

/**
 * Run one CLI invocation and return its exit code.
 */
export function runCli(argv: readonly string[], io: CliIo): number {
  const hasFlag = (name: string): boolean => argv.includes(`--${name}`);
  const [command, ...files] = argv.filter((arg) => !FLAGS.has(arg));

  const useColor = hasFlag('no-color') ? false : hasFlag('color') || io.color === true;
  const clr = (color: string, text: string): string => (useColor ? `${color}${text}${ANSI.reset}` : text);
  const pass = (text: string) => clr(ANSI.brightGreen, text);
  const fail = (text: string) => clr(ANSI.red, text);
  const warn = (text: string) => clr(ANSI.yellow, text);

  if (command === undefined || hasFlag('help')) {
    io.stdout(usage());
    return command === undefined && !hasFlag('help') ? EXIT_ERROR : EXIT_VALID;
  }

  const logger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: (message, data) => {
      const line = typeof data?.line === 'number' ? ` (line ${data.line})` : '';
      io.stderr(`${warn('warning')}: ${message}${line}\n`);
    },
    error: (message) => io.stderr(`${fail('error')}: ${message}\n`),
  };
  const options: ParseOptions = hasFlag('strict') ? { lenient: false, logger } : { logger };

  const load = (file: string): TapDocument | undefined => {
    try {
      return parseString(io.readFile(file), options);
    } catch (err) {
      io.stderr(`${file}: ${fail('error')}: ${errorMessage(err)}\n`);
      return undefined;
    }
  };

  const verdict = (doc: TapDocument): number => {
    if (doc.skip) return EXIT_VALID;
    if (doc.bailed()) return EXIT_BAILED;
    return doc.valid() ? EXIT_VALID : EXIT_INVALID;
  };

  const requireFiles = (count: 'one' | 'many'): boolean => {
    if (files.length === 0 || (count === 'one' && files.length > 1)) {
      io.stderr(`Usage: tapline ${command} ${count === 'one' ? '<file.tap>' : '<file.tap…>'}\n`);
      return false;
    }
    return true;
  };

  switch (command) {
    case 'validate': {
      if (!requireFiles('many')) return EXIT_ERROR;
      let code = EXIT_VALID;
      for (const file of files) {
        const doc = load(file);
        if (!doc) {
          code = Math.max(code, EXIT_ERROR);
          continue;
        }
        try {
          const result = verdict(doc);
          if (result === EXIT_VALID) {
            io.stdout(`${file}: ${pass(doc.skip ? 'skipped' : 'valid')}\n`);
          } else if (result === EXIT_BAILED) {
            io.stdout(`${file}: ${fail('bailed out')} ${doc.bailoutMessage() ?? ''}`.trimEnd() + '\n');
          } else {
            io.stdout(
              `${file}: ${fail('invalid')} (${doc.countFailed()} failed, ${doc.actualLength()}/${doc.length()} present)\n`,
            );
          }
          code = Math.max(code, result);
        } catch (err) {
          // a missing plan or unresolvable numbering makes the run invalid
          if (!(err instanceof TapError)) throw err;
          io.stdout(`${file}: ${fail('invalid')} ${err.message}\n`);
          code = Math.max(code, EXIT_INVALID);
        }
      }
      return code;
    }

    case 'merge': {
      if (!requireFiles('many')) return EXIT_ERROR;
      const docs: TapDocument[] = [];
      for (const file of files) {
        const doc = load(file);
        if (!doc) return EXIT_ERROR;
        docs.push(doc);
      }
      try {
        io.stdout(merge(...docs).toString());
        return EXIT_VALID;
      } catch (err) {
        if (!(err instanceof TapError)) throw err;
        io.stderr(`${fail('error')}: ${err.message}\n`);
        return EXIT_ERROR;
      }
    }

    case 'summary': {
      if (!requireFiles('one')) return EXIT_ERROR;
      const doc = load(files[0]);
      if (!doc) return EXIT_ERROR;
      try {
        io.stdout(harness(doc));
        return verdict(doc);
      } catch (err) {
        if (!(err instanceof TapError)) throw err;
        io.stderr(`${files[0]}: ${fail('error')}: ${err.message}\n`);
        return EXIT_ERROR;
      }
    }

    case 'json': {
      if (!requireFiles('one')) return EXIT_ERROR;
      const doc = load(files[0]);
      if (!doc) return EXIT_ERROR;
      io.stdout(`${JSON.stringify(doc.toJSON(), null, 2)}\n`);
      return EXIT_VALID;
    }

    default:
      io.stderr(`Unknown command: ${command}\n${usage()}`);
      return EXIT_ERROR;
  }
}
