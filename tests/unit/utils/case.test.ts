import { describe, it, expect } from 'vitest';
import {
  toSnakeCase,
  toPascalCase,
  toCamelCase,
  escapeGleamString,
  moduleAlias,
  lastSegment,
} from '../../../src/utils/case.js';

describe('Case conversions', () => {
  it('should convert PascalCase to snake_case', () => {
    expect(toSnakeCase('UserProfile')).toBe('user_profile');
    expect(toSnakeCase('Active')).toBe('active');
    expect(toSnakeCase('HTTPStatus')).toBe('h_t_t_p_status');
  });

  it('should convert snake_case to PascalCase', () => {
    expect(toPascalCase('user_profile')).toBe('UserProfile');
    expect(toPascalCase('models')).toBe('Models');
  });

  it('should convert snake_case to camelCase', () => {
    expect(toCamelCase('created_at')).toBe('createdAt');
    expect(toCamelCase('field_0')).toBe('field0');
    expect(toCamelCase('Name')).toBe('name');
  });

  it('should escape Gleam string literals', () => {
    expect(escapeGleamString('say "hi"\\\n')).toBe('say \\"hi\\"\\\\\\n');
  });

  it('should derive import aliases from module paths', () => {
    expect(moduleAlias('app/models')).toBe('app_models');
    expect(moduleAlias('')).toBe('module');
    expect(lastSegment('app/models/user')).toBe('user');
  });
});
