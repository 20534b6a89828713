import { ApiError } from '@/api/middleware/error.handler.js';

/**
 * Raw query parameters as Express parses them
 */
export type RawQuery = Record<string, unknown>;

/**
 * Read a single-valued query parameter.
 * Absent and empty (after trimming) are both undefined; repeated
 * parameters and nested objects are rejected. With `trim` off a
 * non-blank value is returned as given.
 */
export function readSingle(raw: RawQuery, parameter: string, trim: boolean = true): string | undefined {
  const value = raw[parameter];

  if (value === undefined) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw ApiError.invalidFilter(
      parameter,
      `Parameter '${parameter}' must be given at most once as a plain value`,
      Array.isArray(value) ? value.map(String) : [String(value)],
      []
    );
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  return trim ? trimmed : value;
}

/**
 * Parse a base-10 integer within [min, max]
 */
export function readBoundedInteger(
  raw: RawQuery,
  parameter: string,
  min: number,
  max: number,
  fallback: number
): number {
  const value = readSingle(raw, parameter);

  if (value === undefined) {
    return fallback;
  }

  const parsed = /^[+-]?\d+$/.test(value) ? parseInt(value, 10) : NaN;

  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw ApiError.invalidFilter(
      parameter,
      `Parameter '${parameter}' must be an integer between ${min} and ${max}, got '${value}'`,
      [value],
      [`${min}..${max}`]
    );
  }

  return parsed;
}

/**
 * Parse a boolean flag: "true"/"1" and "false"/"0"
 */
export function readFlag(raw: RawQuery, parameter: string): boolean | undefined {
  const value = readSingle(raw, parameter);

  if (value === undefined) {
    return undefined;
  }

  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw ApiError.invalidFilter(
        parameter,
        `Parameter '${parameter}' must be a boolean, got '${value}'`,
        [value],
        ['true', 'false', '1', '0']
      );
  }
}

/**
 * Match a value against a closed vocabulary (case-sensitive)
 */
export function readEnum<T extends string>(
  raw: RawQuery,
  parameter: string,
  accepted: readonly T[]
): T | undefined {
  const value = readSingle(raw, parameter, false);

  if (value === undefined) {
    return undefined;
  }

  const match = accepted.find(candidate => candidate === value);
  if (match === undefined) {
    throw ApiError.invalidFilter(
      parameter,
      `Invalid ${parameter} '${value}'. Accepted values: ${accepted.join(', ')}`,
      [value],
      accepted
    );
  }

  return match;
}
