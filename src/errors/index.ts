export type {
  ConfigErrorOptions,
  EndpointMonitorErrorOptions,
  ErrorContext,
  InternalErrorOptions,
  UsageErrorOptions,
} from "./base";
export {
  ConfigError,
  EndpointMonitorError,
  InternalError,
  UsageError,
  formatErrorMessageWithContext,
} from "./base";
export type { ProbeErrorContext, ProbeFailureKind, ProbeNetworkErrorOptions } from "./probe";
export { ProbeNetworkError } from "./probe";
