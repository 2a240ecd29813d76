import type { AvailabilitySnapshot, DomainStats, ProbeStatus } from "./domain";

/**
 * Integer percentage of `up` over `total`, rounded to the nearest integer
 * with exact ties (x.5) going to the even neighbour: 1/8 is 12, 3/8 is 38.
 * Works on integers only, so no floating point error can move a tie.
 */
export function availabilityPercentage(up: number, total: number): number {
  if (!Number.isSafeInteger(total) || total <= 0) {
    throw new RangeError(`total must be a positive integer, received ${total}`);
  }

  if (!Number.isSafeInteger(up) || up < 0 || up > total) {
    throw new RangeError(`up must be an integer between 0 and ${total}, received ${up}`);
  }

  const numerator = 100 * up;
  const quotient = Math.floor(numerator / total);
  const twiceRemainder = 2 * (numerator - quotient * total);

  if (twiceRemainder > total) {
    return quotient + 1;
  }

  if (twiceRemainder < total) {
    return quotient;
  }

  return quotient % 2 === 0 ? quotient : quotient + 1;
}

/**
 * Cumulative up/total counters per domain for the lifetime of the process.
 * Counters only grow; there is no reset and no removal.
 */
export class AvailabilityAggregator {
  private readonly stats = new Map<string, DomainStats>();

  record(domain: string, status: ProbeStatus): void {
    let entry = this.stats.get(domain);

    if (!entry) {
      entry = { up: 0, total: 0 };
      this.stats.set(domain, entry);
    }

    entry.total += 1;

    if (status === "UP") {
      entry.up += 1;
    }
  }

  /** Percentages for every domain observed so far, in first-seen order. */
  snapshot(): AvailabilitySnapshot {
    const snapshot = new Map<string, number>();

    for (const [domain, { up, total }] of this.stats) {
      snapshot.set(domain, availabilityPercentage(up, total));
    }

    return snapshot;
  }

  statsFor(domain: string): Readonly<DomainStats> | undefined {
    const entry = this.stats.get(domain);
    return entry ? { ...entry } : undefined;
  }

  get size(): number {
    return this.stats.size;
  }
}
