import type { Dispatcher } from "undici";

import { AvailabilityAggregator } from "./aggregator";
import { loadEndpointsConfig, type LoadedConfig } from "./config";
import type { AvailabilitySnapshot, EndpointDefinition, EndpointsConfig, ProbeResult } from "./domain";
import { extractDomain } from "./domain-key";
import type { Logger } from "./logging";
import { DEFAULT_PROBE_TIMEOUT_MS, checkHealth, type CheckHealthOptions } from "./prober";
import { Reporter } from "./reporter";
import { Scheduler, type SleepFn } from "./scheduler";

export const DEFAULT_INTERVAL_MS = 15_000;

export type ProbeFn = (
  endpoint: EndpointDefinition,
  options: CheckHealthOptions,
) => Promise<ProbeResult>;

export interface EndpointMonitorOptions {
  endpoints: EndpointsConfig;
  logger: Logger;
  aggregator?: AvailabilityAggregator;
  reporter?: Reporter;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  probe?: ProbeFn;
}

/** Runs sweeps over the configured endpoints and reports after each one. */
export class EndpointMonitor {
  readonly aggregator: AvailabilityAggregator;
  private readonly endpoints: EndpointsConfig;
  private readonly logger: Logger;
  private readonly reporter: Reporter;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly probe: ProbeFn;

  constructor(options: EndpointMonitorOptions) {
    this.endpoints = options.endpoints;
    this.logger = options.logger;
    this.aggregator = options.aggregator ?? new AvailabilityAggregator();
    this.reporter = options.reporter ?? new Reporter();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
    this.probe = options.probe ?? checkHealth;
  }

  /**
   * Probes every endpoint once, strictly in configuration order, then prints
   * the cumulative availability. An abort mid-sweep ends the sweep without
   * recording the interrupted probe and without reporting; the result is
   * then `undefined`.
   */
  async runCycle(signal?: AbortSignal): Promise<AvailabilitySnapshot | undefined> {
    for (const endpoint of this.endpoints) {
      if (signal?.aborted) {
        return undefined;
      }

      const domain = extractDomain(endpoint.url);
      const result = await this.probe(endpoint, {
        timeoutMs: this.timeoutMs,
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
        ...(signal ? { signal } : {}),
      });

      if (signal?.aborted) {
        return undefined;
      }

      this.aggregator.record(domain, result.status);

      if (result.status === "DOWN") {
        this.logger.warn(
          `${endpoint.name} is DOWN: ${result.error?.message ?? "unknown failure"}`,
        );
      }
    }

    const snapshot = this.aggregator.snapshot();
    this.reporter.report(snapshot);
    return snapshot;
  }
}

export interface RunMonitorOptions {
  configPath: string;
  logger: Logger;
  intervalMs?: number;
  timeoutMs?: number;
  reporter?: Reporter;
  dispatcher?: Dispatcher;
  probe?: ProbeFn;
  sleep?: SleepFn;
  /** Stop after this many sweeps. Runs until aborted when omitted. */
  maxCycles?: number;
  signal?: AbortSignal;
}

export interface MonitorOutcome {
  cycles: number;
  snapshot: AvailabilitySnapshot;
  interrupted: boolean;
}

function logLoadedConfig(config: LoadedConfig, logger: Logger): void {
  if (config.validationError) {
    const details = config.validationError.issues
      .map((issue) => `${issue.pointer}: ${issue.message}`)
      .join("; ");
    logger.error(`SchemaValidationError: ${details}`);
  }

  for (const { index, reason } of config.skipped) {
    logger.warn(`Skipping config[${index}] from monitoring: ${reason}`);
  }

  if (config.endpoints.length === 0) {
    logger.warn("No endpoints to monitor.");
  }
}

/**
 * Loads the configuration once, then sweeps, reports and sleeps until the
 * signal aborts. Read and parse failures reject before the first sweep;
 * schema violations are only logged.
 */
export async function runMonitor(options: RunMonitorOptions): Promise<MonitorOutcome> {
  const { logger, signal } = options;

  logger.info("Starting endpoint monitor.");
  logger.info(`Loading config file ${options.configPath}.`);

  const config = await loadEndpointsConfig(options.configPath);

  logger.info("Validating YAML schema.");
  logLoadedConfig(config, logger);

  const monitor = new EndpointMonitor({
    endpoints: config.endpoints,
    logger,
    ...(options.reporter ? { reporter: options.reporter } : {}),
    ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
    ...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
    ...(options.probe ? { probe: options.probe } : {}),
  });

  const scheduler = new Scheduler({
    intervalMs: options.intervalMs ?? DEFAULT_INTERVAL_MS,
    ...(options.sleep ? { sleep: options.sleep } : {}),
    ...(options.maxCycles !== undefined ? { maxCycles: options.maxCycles } : {}),
    ...(signal ? { signal } : {}),
  });

  logger.info(`Monitoring ${config.endpoints.length} endpoint(s).`);

  const cycles = await scheduler.run(async () => {
    await monitor.runCycle(signal);
  });

  return {
    cycles,
    snapshot: monitor.aggregator.snapshot(),
    interrupted: signal?.aborted ?? false,
  };
}
