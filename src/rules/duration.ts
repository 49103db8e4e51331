/**
 * Duration strings for `max_age`.
 *
 * Accepted form is a single `<non-negative integer><unit>` segment. Supported
 * units live in DURATION_UNITS; adding a unit (e.g. `d`) only needs a new
 * entry there, parsing and formatting pick it up.
 */

export const DURATION_UNITS = {
  h: 3600,
  m: 60,
  s: 1,
} as const satisfies Record<string, number>;

export type DurationUnit = keyof typeof DURATION_UNITS;

const DURATION_PATTERN = /^(\d+)([a-z]+)$/;

function isDurationUnit(unit: string): unit is DurationUnit {
  return Object.prototype.hasOwnProperty.call(DURATION_UNITS, unit);
}

/**
 * Parses a duration string into whole seconds.
 * Returns null when the string is not a supported duration.
 */
export function parseDuration(value: string): number | null {
  const match = DURATION_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, amount, unit] = match;
  if (!isDurationUnit(unit)) {
    return null;
  }

  const seconds = Number(amount) * DURATION_UNITS[unit];
  return Number.isSafeInteger(seconds) ? seconds : null;
}

/**
 * Formats seconds with the largest unit that divides them evenly.
 * 604800 -> "168h", 5400 -> "90m", 0 -> "0s".
 */
export function formatDuration(seconds: number): string {
  if (seconds > 0) {
    for (const [unit, size] of Object.entries(DURATION_UNITS)) {
      if (seconds % size === 0) {
        return `${seconds / size}${unit}`;
      }
    }
  }
  return `${seconds}s`;
}
