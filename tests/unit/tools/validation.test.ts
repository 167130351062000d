/**
 * Unit tests for tool argument validation.
 */

import { describe, it, expect } from 'vitest';
import { ToolArguments, normalizeKey, validateArguments } from '../../../src/tools/utils.js';
import type { ToolSchema } from '../../../src/tools/index.js';

const schema: ToolSchema = {
  name: 'example',
  description: 'Example tool',
  parameters: [
    { name: 'key', type: 'string', required: true, description: 'A key' },
    { name: 'count', type: 'integer', required: true, description: 'A count' },
    { name: 'status', type: 'string', required: false, enum: ['all', 'pending'], description: 'A filter' },
    { name: 'loud', type: 'boolean', required: false, description: 'A flag' },
  ],
};

describe('validateArguments', () => {
  describe('required fields', () => {
    it('returns error when required field is missing', () => {
      expect(validateArguments(schema, { count: 1 })).toBe('key is required.');
    });

    it('returns error when required field is null', () => {
      expect(validateArguments(schema, { key: null, count: 1 })).toBe('key is required.');
    });

    it('passes when required fields are present', () => {
      expect(validateArguments(schema, { key: 'a', count: 1 })).toBeNull();
    });

    it('skips optional fields that are absent', () => {
      expect(validateArguments(schema, { key: 'a', count: 1, status: null })).toBeNull();
    });
  });

  describe('type checking', () => {
    it('rejects number where string expected', () => {
      expect(validateArguments(schema, { key: 123, count: 1 })).toBe('key must be a string.');
    });

    it('rejects blank required strings', () => {
      expect(validateArguments(schema, { key: '   ', count: 1 })).toBe('key must be a non-empty string.');
    });

    it('rejects non-integer numbers', () => {
      expect(validateArguments(schema, { key: 'a', count: 1.5 })).toBe('count must be an integer.');
    });

    it('rejects numeric strings where integer expected', () => {
      expect(validateArguments(schema, { key: 'a', count: '7' })).toBe('count must be an integer.');
    });

    it('rejects values outside the enum', () => {
      expect(validateArguments(schema, { key: 'a', count: 1, status: 'done' })).toBe(
        'status must be one of: all, pending.'
      );
    });

    it('rejects non-boolean flags', () => {
      expect(validateArguments(schema, { key: 'a', count: 1, loud: 'yes' })).toBe('loud must be a boolean.');
    });
  });

  it('rejects input that is not an object', () => {
    expect(validateArguments(schema, 'key=a')).toBe('arguments must be an object.');
    expect(validateArguments(schema, [1, 2])).toBe('arguments must be an object.');
    expect(validateArguments(schema, null)).toBe('arguments must be an object.');
  });

  it('ignores undeclared fields', () => {
    expect(validateArguments(schema, { key: 'a', count: 1, extra: true })).toBeNull();
  });
});

describe('ToolArguments', () => {
  it('reads validated values', () => {
    const args = new ToolArguments({ key: 'color', count: 3 });

    expect(args.string('key')).toBe('color');
    expect(args.integer('count')).toBe(3);
    expect(args.optionalString('status')).toBeUndefined();
    expect(args.keys()).toEqual(['key', 'count']);
  });

  it('throws when a handler reads an undeclared type', () => {
    const args = new ToolArguments({ count: 3 });

    expect(() => args.string('count')).toThrow(TypeError);
  });
});

describe('normalizeKey', () => {
  it('trims, collapses whitespace and lower-cases', () => {
    expect(normalizeKey('  Favorite   Color ')).toBe('favorite color');
  });
});
