/**
 * Validation utilities for CLI arguments and environment variables
 */

/**
 * Parse a string to a positive integer with validation
 *
 * @param value - String value to parse
 * @param defaultValue - Returned when the input is undefined or empty
 * @param name - Parameter name for error messages
 * @throws Error if value is not a positive integer
 */
export function parsePositiveInt<T>(
  value: string | undefined,
  defaultValue: T,
  name: string
): number | T {
  if (!value) return defaultValue;

  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: "${value}". Expected a positive integer.`);
  }
  return parsed;
}

/**
 * Parse a string to a finite number (negative values allowed)
 *
 * @throws Error if value is not a finite number
 */
export function parseFiniteNumber<T>(
  value: string | undefined,
  defaultValue: T,
  name: string
): number | T {
  if (!value) return defaultValue;

  const parsed = Number(value.trim());
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new Error(`Invalid ${name}: "${value}". Expected a number.`);
  }
  return parsed;
}
