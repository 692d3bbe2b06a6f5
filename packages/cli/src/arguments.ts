/**
 * Argument parsers for commander options
 * @module @kubesim/cli/arguments
 */

import { InvalidArgumentError } from 'commander';

/**
 * Parse a number greater than zero (fractional CPU allowed)
 */
export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a number greater than 0.');
  }
  return parsed;
}

/**
 * Parse an integer of at least 1
 */
export function parsePositiveInteger(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError('Must be an integer of at least 1.');
  }
  return Number(value);
}

/**
 * Split a command line on whitespace
 */
export function parseCommand(value: string): string[] {
  const parts = value.trim().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length === 0) {
    throw new InvalidArgumentError('Must not be empty.');
  }
  return parts;
}

/**
 * Build a query string from defined values
 */
export function queryString(params: Record<string, string | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.set(key, value);
    }
  }
  const encoded = search.toString();
  return encoded ? `?${encoded}` : '';
}
