import { describe, it, expect } from 'vitest';
import {
  splitDirectiveEntries,
  tokenizeDirectiveLine,
  tokenizeEntry,
  unquote,
} from '../../../src/lib/directives/tokenizer.js';

describe('Directive tokenizer', () => {
  it('should split entries on top-level commas only', () => {
    expect(splitDirectiveEntries('decoder, encoder(json), rename = "a, b"')).toEqual([
      'decoder',
      'encoder(json)',
      'rename = "a, b"',
    ]);
  });

  it('should drop empty entries', () => {
    expect(splitDirectiveEntries(' decoder,, ')).toEqual(['decoder']);
  });

  it('should tokenize bare, assigned and call-style entries', () => {
    expect(tokenizeDirectiveLine('decoder, type_tag = "kind", encoder(json)')).toEqual([
      { key: 'decoder', quoted: false, raw: 'decoder' },
      { key: 'type_tag', value: 'kind', quoted: true, raw: 'type_tag = "kind"' },
      { key: 'encoder', value: 'json', quoted: false, raw: 'encoder(json)' },
    ]);
  });

  it('should keep parentheses inside an assigned value', () => {
    expect(tokenizeEntry('decoder_with = "codecs.date()"')).toEqual({
      key: 'decoder_with',
      value: 'codecs.date()',
      quoted: true,
      raw: 'decoder_with = "codecs.date()"',
    });
  });

  it('should resolve escapes in quoted values', () => {
    expect(unquote('"say \\"hi\\""')).toEqual({ text: 'say "hi"', quoted: true });
    expect(unquote(' bare ')).toEqual({ text: 'bare', quoted: false });
  });
});
