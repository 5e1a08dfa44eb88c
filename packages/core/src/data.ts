// ============================================================================
// @tapline/core — Attached Data
// ============================================================================
//
// Lines following a result are attached to it. Plain lines are kept
// verbatim; lines between `---` and `...` form a structured block that is
// handed to a DataCodec (YAML by default).
//
//   ok 1 - fetch user
//     # plain diagnostic          → { kind: 'text' }
//     ---                         ┐
//     status: 500                 │ → { kind: 'structured', value: {...} }
//     ...                         ┘
// ============================================================================

import yaml from 'js-yaml';
import { ParseError, fragment } from './errors.js';

/** One item attached to a test result. */
export type DataItem =
  | { kind: 'text'; text: string }
  | { kind: 'structured'; value: unknown };

/**
 * Maps the text of a structured block to a value and back.
 */
export interface DataCodec {
  decode(text: string): unknown;
  encode(value: unknown): string;
}

export const yamlCodec: DataCodec = {
  decode(text: string): unknown {
    return yaml.load(text) ?? null;
  },
  encode(value: unknown): string {
    return yaml.dump(value);
  },
};

const BLOCK_START = '---';
const BLOCK_END = '...';
const BLOCK_INDENT = '  ';

function leadingWhitespace(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Split a run of buffered data lines into data items.
 *
 * @param lines - Raw lines in arrival order
 * @param codec - Decoder for structured blocks
 * @param firstLine - 1-based line number of `lines[0]`, for error messages
 * @throws {ParseError} On an unterminated block or a block the codec rejects
 */
export function parseDataLines(
  lines: readonly string[],
  codec: DataCodec,
  firstLine?: number,
): DataItem[] {
  const items: DataItem[] = [];
  let text: string[] = [];
  let block: string[] | undefined;
  let blockIndent = 0;
  let blockStart = 0;

  const lineOf = (index: number): number | undefined =>
    firstLine === undefined ? undefined : firstLine + index;

  const flushText = () => {
    if (text.length > 0) {
      items.push({ kind: 'text', text: text.join('\n') });
      text = [];
    }
  };

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const trimmed = line.trim();
    if (block === undefined) {
      if (trimmed === BLOCK_START) {
        flushText();
        block = [];
        blockIndent = leadingWhitespace(line);
        blockStart = index;
      } else {
        text.push(line);
      }
    } else if (trimmed === BLOCK_END) {
      items.push({ kind: 'structured', value: decodeBlock(block, codec, lineOf(blockStart)) });
      block = undefined;
    } else {
      block.push(dedent(line, blockIndent));
    }
  }

  if (block !== undefined) {
    throw new ParseError(`Unterminated data block starting at "${fragment(lines[blockStart].trim())}"`, {
      line: lineOf(blockStart),
    });
  }
  flushText();
  return items;
}

function dedent(line: string, indent: number): string {
  const cut = Math.min(indent, leadingWhitespace(line));
  return line.slice(cut);
}

function decodeBlock(lines: readonly string[], codec: DataCodec, line: number | undefined): unknown {
  const source = lines.join('\n');
  try {
    return codec.decode(source);
  } catch (err) {
    const reason = err instanceof Error ? err.message.split('\n')[0] : String(err);
    throw new ParseError(
      `Cannot decode data block "${fragment(source.trim())}": ${reason}`,
      { line, fragment: fragment(source) },
    );
  }
}

/**
 * Render data items as the lines that follow a result line.
 */
export function formatDataItems(items: readonly DataItem[], codec: DataCodec): string[] {
  const out: string[] = [];
  for (const item of items) {
    switch (item.kind) {
      case 'text':
        out.push(...item.text.split('\n'));
        break;
      case 'structured': {
        out.push(`${BLOCK_INDENT}${BLOCK_START}`);
        const body = codec.encode(item.value).replace(/\n$/, '');
        for (const line of body.split('\n')) {
          out.push(line.length > 0 ? `${BLOCK_INDENT}${line}` : line);
        }
        out.push(`${BLOCK_INDENT}${BLOCK_END}`);
        break;
      }
    }
  }
  return out;
}

/**
 * Deep-copy a list of data items; nothing is shared with the input.
 */
export function copyDataItems(items: readonly DataItem[]): DataItem[] {
  return items.map((item): DataItem =>
    item.kind === 'text'
      ? { kind: 'text', text: item.text }
      : { kind: 'structured', value: structuredClone(item.value) },
  );
}
