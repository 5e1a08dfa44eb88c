/**
 * tapline parser configuration
 */

import process from 'node:process';
import { z } from 'zod';
import { type DataCodec, yamlCodec } from './data.js';
import { TapError } from './errors.js';
import { type Logger, logger as moduleLogger } from './logger.js';

/**
 * Options accepted by the parser and the document model.
 */
export interface ParseOptions {
  /** Repair and log (true) or raise (false) on ambiguous input. */
  lenient?: boolean;
  /** Receives lenient-mode warnings. */
  logger?: Logger;
  /** Decoder for `---` … `...` blocks. */
  codec?: DataCodec;
}

export type ResolvedParseOptions = Required<ParseOptions>;

const flagSchema = z
  .enum(['1', '0', 'true', 'false', ''])
  .optional()
  .transform((value) => value === '1' || value === 'true');

const envSchema = z.object({
  TAPLINE_STRICT: flagSchema,
});

function strictFromEnv(env: Record<string, string | undefined>): boolean {
  const parsed = envSchema.safeParse({ TAPLINE_STRICT: env.TAPLINE_STRICT });
  if (!parsed.success) {
    throw new TapError(
      `Invalid TAPLINE_STRICT value "${env.TAPLINE_STRICT}": expected 1, 0, true or false`,
    );
  }
  return parsed.data.TAPLINE_STRICT;
}

/**
 * Fill in defaults. `lenient` defaults to true unless `TAPLINE_STRICT` is set.
 *
 * @throws {TapError} If `lenient` is not given and `TAPLINE_STRICT` holds an
 * unsupported value
 */
export function resolveParseOptions(
  options: ParseOptions = {},
  env: Record<string, string | undefined> = process.env,
): ResolvedParseOptions {
  return {
    lenient: options.lenient ?? !strictFromEnv(env),
    logger: options.logger ?? moduleLogger,
    codec: options.codec ?? yamlCodec,
  };
}
