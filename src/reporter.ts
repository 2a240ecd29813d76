import type { AvailabilitySnapshot } from "./domain";

export const CYCLE_SEPARATOR = "---";

export interface TextSink {
  write(chunk: string): unknown;
}

export function formatAvailabilityLine(domain: string, percentage: number): string {
  return `${domain} has ${percentage}% availability percentage`;
}

/** One line per domain in snapshot order, then the cycle separator. */
export function formatAvailabilityReport(snapshot: AvailabilitySnapshot): string[] {
  const lines: string[] = [];

  for (const [domain, percentage] of snapshot) {
    lines.push(formatAvailabilityLine(domain, percentage));
  }

  lines.push(CYCLE_SEPARATOR);
  return lines;
}

export class Reporter {
  constructor(private readonly output: TextSink = process.stdout) {}

  report(snapshot: AvailabilitySnapshot): void {
    this.output.write(`${formatAvailabilityReport(snapshot).join("\n")}\n`);
  }
}
