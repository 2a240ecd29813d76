import { describe, expect, it } from "vitest";

import { AvailabilityAggregator, availabilityPercentage } from "../aggregator";

describe("availabilityPercentage", () => {
  it("rounds to the nearest integer", () => {
    expect(availabilityPercentage(3, 4)).toBe(75);
    expect(availabilityPercentage(1, 3)).toBe(33);
    expect(availabilityPercentage(2, 3)).toBe(67);
  });

  it("rounds exact halves to the even neighbour", () => {
    expect(availabilityPercentage(1, 8)).toBe(12);
    expect(availabilityPercentage(3, 8)).toBe(38);
    expect(availabilityPercentage(5, 8)).toBe(62);
    expect(availabilityPercentage(1, 200)).toBe(0);
    expect(availabilityPercentage(3, 200)).toBe(2);
  });

  it("covers the full range", () => {
    expect(availabilityPercentage(0, 7)).toBe(0);
    expect(availabilityPercentage(7, 7)).toBe(100);
  });

  it("rejects a zero total", () => {
    expect(() => availabilityPercentage(0, 0)).toThrow(RangeError);
  });

  it("rejects more successes than probes", () => {
    expect(() => availabilityPercentage(5, 4)).toThrow(RangeError);
  });
});

describe("AvailabilityAggregator", () => {
  it("accumulates up and total counters per domain", () => {
    const aggregator = new AvailabilityAggregator();

    aggregator.record("example.com", "UP");
    aggregator.record("example.com", "DOWN");
    aggregator.record("example.com", "UP");
    aggregator.record("example.com", "UP");

    expect(aggregator.statsFor("example.com")).toEqual({ up: 3, total: 4 });
    expect(aggregator.snapshot().get("example.com")).toBe(75);
  });

  it("reports domains in first-seen order", () => {
    const aggregator = new AvailabilityAggregator();

    aggregator.record("zeta.org", "DOWN");
    aggregator.record("alpha.com", "UP");
    aggregator.record("zeta.org", "UP");

    expect([...aggregator.snapshot()]).toEqual([
      ["zeta.org", 50],
      ["alpha.com", 100],
    ]);
  });

  it("never reports a domain without probes", () => {
    const aggregator = new AvailabilityAggregator();

    expect(aggregator.size).toBe(0);
    expect(aggregator.snapshot().size).toBe(0);
    expect(aggregator.statsFor("example.com")).toBeUndefined();
  });

  it("returns copies of its counters", () => {
    const aggregator = new AvailabilityAggregator();
    aggregator.record("example.com", "UP");

    const stats = aggregator.statsFor("example.com");
    aggregator.record("example.com", "DOWN");

    expect(stats).toEqual({ up: 1, total: 1 });
    expect(aggregator.statsFor("example.com")).toEqual({ up: 1, total: 2 });
  });
});
