import { describe, it, expect } from 'vitest';
import {
  extractDirectiveLines,
  parseFieldDirectives,
  parseFileDirectives,
  parseTypeDirectives,
} from '../../../src/lib/directives/parser.js';
import { foldFieldDirectives, foldTypeDirectives } from '../../../src/lib/directives/fold.js';

describe('Directive parser', () => {
  it('should only read lines carrying the marker', () => {
    const text = ['Documentation line', 'weave!: decoder', 'see xweave!: ignored'].join('\n');
    expect(extractDirectiveLines(text, 'weave!:')).toEqual(['decoder']);
  });

  it('should parse type directives', () => {
    const parsed = parseTypeDirectives('weave!: decoder, encoder(JSON), camelCase, type_tag = "kind"');
    expect(parsed.diagnostics).toEqual([]);
    expect(parsed.directives).toEqual([
      { kind: 'decoder' },
      { kind: 'encoder', backend: 'json' },
      { kind: 'naming', strategy: 'camel_case' },
      { kind: 'type_tag', field: 'kind' },
    ]);
  });

  it('should report unknown keys as diagnostics', () => {
    const parsed = parseTypeDirectives('weave!: decoder, colour');
    expect(parsed.directives).toEqual([{ kind: 'decoder' }]);
    expect(parsed.diagnostics).toEqual([
      {
        level: 'type',
        key: 'colour',
        raw: 'colour',
        reason: 'unknown-key',
        message: 'Unknown type directive `colour`',
      },
    ]);
  });

  it('should reject directives used at the wrong level', () => {
    const parsed = parseFieldDirectives('weave!: decoder');
    expect(parsed.directives).toEqual([]);
    expect(parsed.diagnostics[0]?.reason).toBe('wrong-level');
    expect(parsed.diagnostics[0]?.message).toBe(
      'Directive `decoder` is not allowed at field level (allowed: type)',
    );
  });

  it('should reject invalid values', () => {
    const parsed = parseTypeDirectives('weave!: separate_encoder_decoder = maybe, no_type_tag = x');
    expect(parsed.directives).toEqual([]);
    expect(parsed.diagnostics.map((d) => d.message)).toEqual([
      '`separate_encoder_decoder` expects true or false, got `maybe`',
      '`no_type_tag` takes no value',
    ]);
  });

  it('should only accept output directives at file level', () => {
    const parsed = parseFileDirectives('weave-file!: output_dir = "@/gen", decoder_fn = "decode_{type_snake}"');
    expect(parsed.diagnostics).toEqual([]);
    expect(parsed.directives).toEqual([
      { kind: 'output_dir', directory: '@/gen' },
      { kind: 'decoder_fn', pattern: 'decode_{type_snake}' },
    ]);
  });

  it('should not read type markers as file markers', () => {
    expect(parseFileDirectives('weave!: output_dir = "gen"').directives).toEqual([]);
  });
});

describe('Directive folding', () => {
  it('should keep distinct encoders in request order and let later settings win', () => {
    const info = foldTypeDirectives(
      parseTypeDirectives(
        ['weave!: encoder(json), type_tag = "a"', 'weave!: encoder(json), type_tag = "b", output_dir = "gen"'].join('\n'),
      ).directives,
    );
    expect(info.encoders).toEqual(['json']);
    expect(info.typeTag).toBe('b');
    expect(info.decoder).toBe(false);
    expect(info.output).toEqual({ directory: 'gen' });
  });

  it('should let the optional family beat the required family', () => {
    const info = foldFieldDirectives(
      parseFieldDirectives('weave!: optional, required, rename = "user_id"').directives,
    );
    expect(info).toEqual({ marker: 'optional', rename: 'user_id' });
  });

  it('should treat must_exist as required', () => {
    expect(foldFieldDirectives(parseFieldDirectives('weave!: must_exist').directives).marker).toBe('required');
  });
});
