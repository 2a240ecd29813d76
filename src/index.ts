export { AvailabilityAggregator, availabilityPercentage } from "./aggregator";
export * from "./config";
export type {
  AvailabilitySnapshot,
  CliParameters,
  DomainStats,
  EndpointDefinition,
  EndpointsConfig,
  ProbeResult,
  ProbeStatus,
} from "./domain";
export { extractDomain } from "./domain-key";
export { DurationParseError, formatMillisecondsToDuration, parseDurationToMilliseconds } from "./duration";
export * from "./errors";
export * from "./exit-codes";
export * from "./http";
export * from "./logging";
export {
  DEFAULT_INTERVAL_MS,
  EndpointMonitor,
  runMonitor,
  type EndpointMonitorOptions,
  type MonitorOutcome,
  type ProbeFn,
  type RunMonitorOptions,
} from "./monitor";
export {
  DEFAULT_PROBE_TIMEOUT_MS,
  checkHealth,
  classifyStatusCode,
  type CheckHealthOptions,
} from "./prober";
export {
  CYCLE_SEPARATOR,
  Reporter,
  formatAvailabilityLine,
  formatAvailabilityReport,
  type TextSink,
} from "./reporter";
export {
  Scheduler,
  sleepWithSignal,
  type CycleHandler,
  type SchedulerOptions,
  type SchedulerState,
  type SleepFn,
} from "./scheduler";
