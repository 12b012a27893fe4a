/**
 * Unit Tests for Validation Helper Functions
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { ImageCodecError, parseIntEnv, validateInput, ValidationError } from '../../../src/utils/validation.js';

const Input = z.object({ name: z.string().min(1), size: z.number().default(3) });

describe('validateInput', () => {
  it('should return validated data with defaults', () => {
    expect(validateInput(Input, { name: 'doc' })).toEqual({ name: 'doc', size: 3 });
  });

  it('should throw ValidationError for invalid input', () => {
    expect(() => validateInput(Input, { name: '' })).toThrow(ValidationError);
  });

  it('should include field path in error message', () => {
    expect(() => validateInput(Input, { name: '' })).toThrow('name:');
  });
});

describe('parseIntEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back when unset or empty', () => {
    vi.stubEnv('TEST_INT_ENV', '');
    expect(parseIntEnv('TEST_INT_ENV', 7)).toBe(7);
  });

  it('parses integers', () => {
    vi.stubEnv('TEST_INT_ENV', '42');
    expect(parseIntEnv('TEST_INT_ENV', 7)).toBe(42);
  });

  it('throws on non-numeric values', () => {
    vi.stubEnv('TEST_INT_ENV', 'many');
    expect(() => parseIntEnv('TEST_INT_ENV', 7)).toThrow('Invalid numeric env var TEST_INT_ENV: "many"');
  });
});

describe('ImageCodecError', () => {
  it('keeps the cause', () => {
    const cause = new Error('inner');
    const error = new ImageCodecError('outer', cause);
    expect(error.name).toBe('ImageCodecError');
    expect(error.cause).toBe(cause);
  });
});
