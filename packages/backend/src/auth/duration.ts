const UNIT_MS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
} as const;

type DurationUnit = keyof typeof UNIT_MS;

const DURATION_FORMAT = /^(\d+)(ms|s|m|h|d|w)$/;

function isDurationUnit(unit: string): unit is DurationUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_MS, unit);
}

/**
 * Parse a duration such as `15m` or `7d` into milliseconds
 */
export function parseDuration(text: string): number {
  const match = DURATION_FORMAT.exec(text);
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined || !isDurationUnit(unit)) {
    throw new Error(`Invalid duration format: ${text}`);
  }
  return parseInt(amount, 10) * UNIT_MS[unit];
}

export function isValidDuration(text: string): boolean {
  return DURATION_FORMAT.test(text);
}
