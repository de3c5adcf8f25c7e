import { BOOLEAN_TRUE_VALUES, REBALANCE_STRATEGIES } from './config.constants';
import type { RebalanceStrategy } from '../coordinator/interfaces';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ports, counts and timeouts are all integers
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses an optional integer; unset or empty yields `undefined` instead of a default.
 */
export function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return parseNumberWithDefault(value.trim(), 0);
}

/**
 * Parses a string environment variable with a default value.
 *
 * Returns the provided value if present, otherwise returns the default.
 * Used for optional string configuration values.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Splits a comma-separated variable into trimmed, non-empty entries.
 *
 * @example
 * ```
 * SHP_WORKER_HOSTS=db-a.internal, db-b.internal
 * // Returns: ['db-a.internal', 'db-b.internal']
 * ```
 */
export function parseCommaList(value: string | undefined): string[] {
  if (!value || !value.trim()) {
    return [];
  }

  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Parses a rebalance strategy name; unset yields `undefined` so the strategy is chosen per run.
 *
 * @throws {Error} If the value is not one of the engine's strategies
 */
export function parseRebalanceStrategy(value: string | undefined): RebalanceStrategy | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  const match = REBALANCE_STRATEGIES.find((strategy) => strategy === normalized);
  if (!match) {
    throw new Error(
      `Invalid rebalance strategy: "${value}". Must be one of: ${REBALANCE_STRATEGIES.join(', ')}`,
    );
  }
  return match;
}
