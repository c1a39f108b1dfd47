import { describe, it, expect } from 'vitest';
import {
  constructorTag,
  expectedVariants,
  planEncoding,
  unknownVariantMessage,
} from '../../../src/lib/generator/encoding-planner.js';
import type { ConstructorDecl } from '../../../src/types/data-model.js';

const field = { label: 'x', type: { kind: 'named' as const, name: 'Int', args: [] }, isOption: false, marker: 'default' as const };

const unit = (name: string): ConstructorDecl => ({ name, fields: [] });
const withField = (name: string): ConstructorDecl => ({ name, fields: [field] });

describe('Encoding planner', () => {
  it('should encode all-zero-field types as plain strings', () => {
    expect(planEncoding([unit('Active'), unit('Inactive')], false)).toBe('plain-string');
    expect(planEncoding([unit('Only')], false)).toBe('plain-string');
    expect(planEncoding([unit('Active'), unit('Inactive')], true)).toBe('plain-string');
  });

  it('should tag multi-constructor types with fields', () => {
    expect(planEncoding([withField('Circle'), unit('Empty')], false)).toBe('object-with-type-tag');
  });

  it('should leave single constructors and disabled tags untagged', () => {
    expect(planEncoding([withField('User')], false)).toBe('object-with-no-type-tag');
    expect(planEncoding([withField('Circle'), unit('Empty')], true)).toBe('object-with-no-type-tag');
  });

  it('should derive tags in snake case', () => {
    expect(constructorTag(unit('PendingReview'))).toBe('pending_review');
  });

  it('should describe the expected variants', () => {
    expect(expectedVariants([unit('Square'), unit('Circle'), unit('Circle')])).toBe('one of circle, square');
    expect(expectedVariants([unit('Only')])).toBe('only');
    expect(expectedVariants([])).toBe('value');
  });

  it('should fill in the type name of a custom message', () => {
    expect(unknownVariantMessage('Shape', 'unknown {type} variant', [unit('Circle')])).toBe('unknown Shape variant');
    expect(unknownVariantMessage('Shape', undefined, [unit('Circle')])).toBe('circle');
  });
});
