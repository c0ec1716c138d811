/**
 * Environment Parsing
 *
 * Helpers for turning raw environment variables into typed configuration.
 * Invalid values fail fast at startup with a DomainError naming the variable.
 */

import { DomainError, DomainErrorCode } from '../error-handling/errors.js';

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

export interface IntegerBounds {
  min?: number;
  max?: number;
}

export function parseInteger(
  name: string,
  value: string | undefined,
  defaultValue: number,
  bounds: IntegerBounds = {}
): number {
  if (value === undefined || value.trim() === '') return defaultValue;

  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new DomainError(`Invalid integer for ${name}: ${value}`, 500, undefined, DomainErrorCode.VALIDATION_ERROR);
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (bounds.min !== undefined && parsed < bounds.min) {
    throw new DomainError(
      `${name} value ${parsed} is below minimum ${bounds.min}`,
      500,
      undefined,
      DomainErrorCode.VALIDATION_ERROR
    );
  }
  if (bounds.max !== undefined && parsed > bounds.max) {
    throw new DomainError(
      `${name} value ${parsed} is above maximum ${bounds.max}`,
      500,
      undefined,
      DomainErrorCode.VALIDATION_ERROR
    );
  }
  return parsed;
}
