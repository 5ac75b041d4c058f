/**
 * Option parsing shared by the commands.
 *
 * @module cli/options
 */

/**
 * Invalid command-line usage; commands exit with USAGE_ERROR.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parse a whole-number option no smaller than `min`.
 *
 * @throws UsageError naming the option
 */
export function parseIntegerOption(name: string, value: string, min: number): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new UsageError(`--${name} must be a whole number, got "${value}"`);
  }
  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed) || parsed < min) {
    throw new UsageError(`--${name} must be at least ${min}, got ${value}`);
  }
  return parsed;
}
