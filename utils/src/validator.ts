import { ValidationError } from './error-handler.js';

export interface IntegerRange {
  min: number;
  max: number;
}

export class Validator {
  /**
   * Parse a whole number from user input and check it against an inclusive
   * range.
   */
  static integer(name: string, value: string | number, range?: IntegerRange): number {
    const parsed = typeof value === 'number' ? value : Number(value.trim());

    if (!Number.isInteger(parsed) || (typeof value === 'string' && value.trim() === '')) {
      throw new ValidationError(`${name} must be a whole number (got "${value}")`, { name, value });
    }
    if (range) {
      Validator.inRange(name, parsed, range);
    }
    return parsed;
  }

  static inRange(name: string, value: number, range: IntegerRange): number {
    if (value < range.min || value > range.max) {
      throw new ValidationError(
        `${name} must be between ${range.min} and ${range.max} (got ${value})`,
        { name, value, ...range },
      );
    }
    return value;
  }

  static nonEmpty(name: string, value: string | undefined): string {
    const trimmed = value?.trim() ?? '';
    if (!trimmed) {
      throw new ValidationError(`${name} must not be empty`, { name });
    }
    return trimmed;
  }

  static oneOf<T extends string>(name: string, value: string, allowed: readonly T[]): T {
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new ValidationError(`${name} must be one of: ${allowed.join(', ')} (got "${value}")`, {
        name,
        value,
      });
    }
    return match;
  }

  static isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
