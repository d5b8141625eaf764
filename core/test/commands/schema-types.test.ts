import { describe, it, expect } from 'vitest';
import { FloatBounds, IntegerBounds, StringBounds } from '../../src/lib/commands/schema-types.js';
import { ConfigurationError } from '../../src/lib/errors/errors.js';

describe('IntegerBounds', () => {
  it('should keep ordered bounds', () => {
    const bounds = new IntegerBounds({ minValue: 1, maxValue: 10 });
    expect(bounds.kind).toBe('integer');
    expect(bounds.minValue).toBe(1);
    expect(bounds.maxValue).toBe(10);
  });

  it('should accept equal and one-sided bounds', () => {
    expect(new IntegerBounds({ minValue: 5, maxValue: 5 }).maxValue).toBe(5);
    expect(new IntegerBounds({ minValue: -3 }).maxValue).toBeUndefined();
  });

  it('should reject min greater than max', () => {
    expect(() => new IntegerBounds({ minValue: 10, maxValue: 1 })).toThrow(ConfigurationError);
    expect(() => new IntegerBounds({ minValue: 10, maxValue: 1 })).toThrow(
      'IntegerBounds: minValue (10) cannot be greater than maxValue (1)',
    );
  });

  it('should reject non-integer bounds', () => {
    expect(() => new IntegerBounds({ minValue: 1.5 })).toThrow('IntegerBounds: minValue must be an integer, got 1.5');
  });
});

describe('FloatBounds', () => {
  it('should allow fractional bounds', () => {
    const bounds = new FloatBounds({ minValue: 0.5, maxValue: 2.25 });
    expect(bounds.kind).toBe('float');
    expect(bounds.maxValue).toBe(2.25);
  });

  it('should reject min greater than max', () => {
    expect(() => new FloatBounds({ minValue: 1.1, maxValue: 1.0 })).toThrow(
      'FloatBounds: minValue (1.1) cannot be greater than maxValue (1)',
    );
  });

  it('should reject NaN and infinite bounds', () => {
    expect(() => new FloatBounds({ minValue: Number.NaN })).toThrow('FloatBounds: minValue must be a finite number, got NaN');
    expect(() => new FloatBounds({ maxValue: Number.POSITIVE_INFINITY })).toThrow(
      'FloatBounds: maxValue must be a finite number, got Infinity',
    );
    expect(() => new FloatBounds({ minValue: Number.NEGATIVE_INFINITY, maxValue: 1 })).toThrow(ConfigurationError);
  });
});

describe('StringBounds', () => {
  it('should keep length bounds', () => {
    const bounds = new StringBounds({ minLength: 3, maxLength: 10 });
    expect(bounds.kind).toBe('string');
    expect([bounds.minLength, bounds.maxLength]).toEqual([3, 10]);
  });

  it('should reject min length greater than max length', () => {
    expect(() => new StringBounds({ minLength: 11, maxLength: 10 })).toThrow(
      'StringBounds: minLength (11) cannot be greater than maxLength (10)',
    );
  });

  it('should reject negative lengths', () => {
    expect(() => new StringBounds({ minLength: -1 })).toThrow(ConfigurationError);
  });
});
