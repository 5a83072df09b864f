import { describe, it, expect } from 'vitest';
import { ValidationError, Validator } from '@icepanel/utils';

describe('Validator', () => {
  describe('integer', () => {
    it('should parse whole numbers from strings', () => {
      expect(Validator.integer('Rate', ' 42 ')).toBe(42);
      expect(Validator.integer('Rate', 7)).toBe(7);
    });

    it('should reject fractions, words and blanks', () => {
      expect(() => Validator.integer('Rate', '2.5')).toThrow('Rate must be a whole number (got "2.5")');
      expect(() => Validator.integer('Rate', 'fast')).toThrow(ValidationError);
      expect(() => Validator.integer('Rate', '')).toThrow(ValidationError);
    });

    it('should check the range when given', () => {
      expect(Validator.integer('Delay', '200', { min: 200, max: 1000 })).toBe(200);
      expect(() => Validator.integer('Delay', '1001', { min: 200, max: 1000 })).toThrow(
        'Delay must be between 200 and 1000 (got 1001)',
      );
    });
  });

  it('should reject blank strings in nonEmpty', () => {
    expect(Validator.nonEmpty('Command', '  ls  ')).toBe('ls');
    expect(() => Validator.nonEmpty('Command', '   ')).toThrow('Command must not be empty');
  });

  it('should narrow oneOf to the allowed value', () => {
    expect(Validator.oneOf('AM/PM', 'PM', ['AM', 'PM'] as const)).toBe('PM');
    expect(() => Validator.oneOf('AM/PM', 'XM', ['AM', 'PM'] as const)).toThrow(
      'AM/PM must be one of: AM, PM (got "XM")',
    );
  });

  it('should recognise plain objects only as records', () => {
    expect(Validator.isRecord({ a: 1 })).toBe(true);
    expect(Validator.isRecord([])).toBe(false);
    expect(Validator.isRecord(null)).toBe(false);
  });
});
