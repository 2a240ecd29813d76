import type { ProbeNetworkError } from "./errors";

export type ProbeStatus = "UP" | "DOWN";

export interface EndpointDefinition {
  /** Human readable name of the endpoint. Falls back to the URL when absent. */
  readonly name: string;
  /** Target that is probed every cycle. */
  readonly url: string;
  /** Upper-cased HTTP method, `GET` unless the record sets one. */
  readonly method: string;
  /** Static request headers. Empty when the record defines none. */
  readonly headers: Readonly<Record<string, string>>;
  /** Payload serialized as JSON on every probe. */
  readonly body?: unknown;
}

export type EndpointsConfig = readonly EndpointDefinition[];

export interface ProbeResult {
  endpointName: string;
  url: string;
  status: ProbeStatus;
  /** HTTP status code when a response was received. */
  httpStatus?: number;
  /** Reason for a DOWN classification. */
  error?: ProbeNetworkError;
  latencyMs: number;
  checkedAt: Date;
}

export interface DomainStats {
  up: number;
  total: number;
}

/** Domain key to integer availability percentage, in first-seen order. */
export type AvailabilitySnapshot = ReadonlyMap<string, number>;

export interface CliParameters {
  /** Path to the endpoints YAML file. */
  configPath: string;
  /** Delay between the end of one sweep and the start of the next, in milliseconds. */
  intervalMs: number;
  /** Timeout for a single probe request in milliseconds. */
  timeoutMs: number;
  /** Location of the append-only log file. */
  logFile: string;
}
