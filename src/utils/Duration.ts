const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;

const UNIT_MS: Record<string, number> = {
  s: SECOND_MS,
  m: MINUTE_MS,
  h: HOUR_MS,
  d: DAY_MS,
  w: WEEK_MS
};

/**
 * Parse a duration into milliseconds
 * Numbers are seconds; strings take a unit suffix: "90s", "30m", "12h", "14d", "2w"
 */
export function parseDuration(input: number | string): number | undefined {
  if (typeof input === 'number') {
    return Number.isFinite(input) && input >= 0 ? Math.floor(input * SECOND_MS) : undefined;
  }

  const match = input.trim().match(/^(\d+(?:\.\d+)?)\s*([smhdw])?$/i);
  if (!match) {
    return undefined;
  }

  const unit = (match[2] ?? 's').toLowerCase();
  return Math.floor(parseFloat(match[1]) * UNIT_MS[unit]);
}

/**
 * Format milliseconds using the largest whole unit, e.g. 259200000 -> "3d"
 */
export function formatDuration(ms: number): string {
  const units: Array<[string, number]> = [['w', WEEK_MS], ['d', DAY_MS], ['h', HOUR_MS], ['m', MINUTE_MS], ['s', SECOND_MS]];

  for (const [unit, size] of units) {
    if (ms >= size && ms % size === 0) {
      return `${ms / size}${unit}`;
    }
  }

  return `${ms}ms`;
}

export { DAY_MS };
