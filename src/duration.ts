const DURATION_REGEX = /^(\d+)(ms|s|m|h)$/;

const UNIT_MULTIPLIERS = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
} as const;

type DurationUnit = keyof typeof UNIT_MULTIPLIERS;

function isDurationUnit(value: string): value is DurationUnit {
  return Object.hasOwn(UNIT_MULTIPLIERS, value);
}

export class DurationParseError extends Error {
  constructor(value: unknown) {
    const display = typeof value === "string" ? value : String(value);
    super(`Invalid duration "${display}": expected a whole number followed by ms, s, m or h`);
    this.name = "DurationParseError";
  }
}

export function parseDurationToMilliseconds(value: string): number {
  const match = DURATION_REGEX.exec(value.trim());

  if (!match) {
    throw new DurationParseError(value);
  }

  const [, numeric, unit] = match;
  const amount = Number.parseInt(numeric, 10);

  if (!Number.isSafeInteger(amount) || !isDurationUnit(unit)) {
    throw new DurationParseError(value);
  }

  return amount * UNIT_MULTIPLIERS[unit];
}

/** Largest whole unit that represents the value exactly, e.g. 15000 is `15s`. */
export function formatMillisecondsToDuration(value: number): string {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new TypeError("Duration must be a non-negative integer number of milliseconds");
  }

  if (value === 0) {
    return "0ms";
  }

  for (const unit of ["h", "m", "s"] as const) {
    const multiplier = UNIT_MULTIPLIERS[unit];
    if (value % multiplier === 0) {
      return `${value / multiplier}${unit}`;
    }
  }

  return `${value}ms`;
}
