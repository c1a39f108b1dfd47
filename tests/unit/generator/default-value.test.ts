import { describe, it, expect } from 'vitest';
import { DefaultValueSynthesizer, panicPlaceholder } from '../../../src/lib/generator/default-value.js';
import { contextFor, parseModule } from '../../helpers/modules.js';

const MODELS = parseModule(`
import gleam/option.{type Option}
import app/shared/address

pub type Tree {
  Node(value: Int, children: List(Tree))
  Leaf
}

pub type Loop {
  Loop(next: Loop)
}

pub type Mixed {
  Mixed(
    note: Option(String),
    pair: #(Int, Bool),
    home: address.Address,
    other: Unknown,
    handler: fn(Int) -> Int,
    gone: address.Missing,
  )
}
`);

const SHARED = parseModule(
  `
pub type Address {
  Address(street: String, number: Int)
}
`,
  'app/shared/address',
);

function defaultFor(typeName: string) {
  const ctx = contextFor([MODELS, SHARED], typeName);
  return { ctx, value: new DefaultValueSynthesizer(ctx).forType(ctx.decl) };
}

describe('Default value synthesizer', () => {
  it('should build a value from the first constructor', () => {
    expect(defaultFor('Tree').value).toBe('Node(value: 0, children: [])');
  });

  it('should break cycles with a panic placeholder', () => {
    expect(defaultFor('Loop').value).toBe('Loop(next: panic as "No default value for Loop")');
  });

  it('should cover options, tuples, other modules and unknown types', () => {
    const { ctx, value } = defaultFor('Mixed');
    expect(value).toBe(
      [
        'Mixed(note: option.None',
        'pair: #(0, False)',
        'home: app_shared_address.Address(street: "", number: 0)',
        'other: panic as "No default value for Unknown"',
        'handler: panic as "No default value for function type"',
        'gone: panic as "No default value for app.shared.address.Missing")',
      ].join(', '),
    );
    expect(ctx.usesOptionHelpers).toBe(true);
    expect(ctx.imports.has('app/shared/address')).toBe(true);
  });

  it('should escape the placeholder subject', () => {
    expect(panicPlaceholder('a "quoted" type')).toBe('panic as "No default value for a \\"quoted\\" type"');
  });
});
