import { describe, it, expect } from 'vitest';
import { BUILTIN_PREDICATES, PredicateRegistry } from '../../../src/lib/schema/predicates.js';
import { SchemaDefinitionError } from '../../../src/utils/errors.js';

describe('Predicates', () => {
  it.each([
    ['email', 'sample@example.com', true],
    ['email', 'sample@', false],
    ['phone', '+1 (555) 123-4567', true],
    ['phone', '12-34', false],
    ['url', 'https://example.com/path', true],
    ['url', 'example.com', false],
    ['uuid', '0B0F7C52-5A9E-4E48-9D5C-2F3F3C9A1B11', true],
    ['uuid', 'not-a-uuid', false],
    ['non_blank', 'x', true],
    ['non_blank', '   ', false],
  ])('%s(%s) should be %s', (name, value, expected) => {
    const predicate = BUILTIN_PREDICATES.get(name);
    expect(predicate?.(value)).toBe(expected);
  });

  it('should reject non-string values', () => {
    expect(BUILTIN_PREDICATES.get('email')?.(42)).toBe(false);
  });

  it('should register custom predicates next to the built-ins', () => {
    const registry = new PredicateRegistry();
    registry.register('positive', (value) => typeof value === 'number' && value > 0);

    expect(registry.has('positive')).toBe(true);
    expect(registry.get('positive')?.(3)).toBe(true);
    expect(registry.names()).toEqual(['email', 'non_blank', 'phone', 'positive', 'url', 'uuid']);
  });

  it('should reject an empty predicate name', () => {
    expect(() => new PredicateRegistry().register('', () => true)).toThrow(SchemaDefinitionError);
  });
});
