import { describe, expect, it } from 'vitest';
import { type DataCodec, type DataItem, copyDataItems, formatDataItems, parseDataLines, yamlCodec } from '../data.js';
import { ParseError } from '../errors.js';

const jsonCodec: DataCodec = {
  decode: (text) => JSON.parse(text),
  encode: (value) => JSON.stringify(value),
};

describe('parseDataLines', () => {
  it('joins consecutive plain lines into one item', () => {
    expect(parseDataLines(['  # note', '  more'], yamlCodec)).toEqual([{ kind: 'text', text: '  # note\n  more' }]);
  });

  it('decodes an indented structured block', () => {
    expect(parseDataLines(['  ---', '  message: boom', '  severity: fail', '  ...'], yamlCodec)).toEqual([
      { kind: 'structured', value: { message: 'boom', severity: 'fail' } },
    ]);
  });

  it('keeps text around a block in order', () => {
    expect(parseDataLines(['# a', '  ---', '  n: 1', '  ...', '# b'], yamlCodec)).toEqual([
      { kind: 'text', text: '# a' },
      { kind: 'structured', value: { n: 1 } },
      { kind: 'text', text: '# b' },
    ]);
  });

  it('decodes an empty block as null', () => {
    expect(parseDataLines(['---', '...'], yamlCodec)).toEqual([{ kind: 'structured', value: null }]);
  });

  it('uses the given codec', () => {
    expect(parseDataLines(['---', '{"a": [1, 2]}', '...'], jsonCodec)).toEqual([
      { kind: 'structured', value: { a: [1, 2] } },
    ]);
  });

  it('raises on an unterminated block', () => {
    let caught: unknown;
    try {
      parseDataLines(['  ---', '  a: 1'], yamlCodec, 4);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toMatchObject({ line: 4, message: 'Unterminated data block starting at "---" (line 4)' });
  });

  it('raises when the codec rejects a block', () => {
    expect(() => parseDataLines(['---', '{"a": ', '...'], jsonCodec, 2)).toThrow(ParseError);
    expect(() => parseDataLines(['---', '{"a": ', '...'], jsonCodec, 2)).toThrow(/^Cannot decode data block "\{"a":"/);
  });
});

describe('formatDataItems', () => {
  it('renders text verbatim and blocks indented', () => {
    const items: DataItem[] = [
      { kind: 'text', text: '# x' },
      { kind: 'structured', value: { a: 1 } },
    ];
    expect(formatDataItems(items, yamlCodec)).toEqual(['# x', '  ---', '  a: 1', '  ...']);
  });

  it('renders nested values', () => {
    const items: DataItem[] = [{ kind: 'structured', value: { got: [1, 2] } }];
    expect(formatDataItems(items, yamlCodec)).toEqual(['  ---', '  got:', '    - 1', '    - 2', '  ...']);
  });
});

describe('copyDataItems', () => {
  it('shares nothing with the input', () => {
    const value = { nested: { n: 1 } };
    const copy = copyDataItems([{ kind: 'structured', value }]);
    value.nested.n = 2;
    expect(copy).toEqual([{ kind: 'structured', value: { nested: { n: 1 } } }]);
  });
});
