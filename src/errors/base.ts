import {
  EXIT_CODE_CONFIG_ERROR,
  EXIT_CODE_INTERNAL_ERROR,
  EXIT_CODE_USAGE_ERROR,
  type ExitCode,
} from "../exit-codes";

export interface ErrorContext {
  endpointName?: string;
  url?: string;
  path?: string;
}

export interface EndpointMonitorErrorOptions {
  exitCode: ExitCode;
  context?: ErrorContext;
  cause?: unknown;
  name?: string;
}

export function formatErrorMessageWithContext(message: string, context?: ErrorContext): string {
  if (!context) {
    return message;
  }

  const details: string[] = [];

  if (typeof context.endpointName === "string" && context.endpointName.length > 0) {
    details.push(`endpoint=${context.endpointName}`);
  }

  if (typeof context.url === "string" && context.url.length > 0) {
    details.push(`url=${context.url}`);
  }

  if (typeof context.path === "string" && context.path.length > 0) {
    details.push(`path=${context.path}`);
  }

  if (details.length === 0) {
    return message;
  }

  return `${message} (${details.join(", ")})`;
}

export class EndpointMonitorError extends Error {
  readonly exitCode: ExitCode;
  readonly context?: ErrorContext;

  constructor(message: string, options: EndpointMonitorErrorOptions) {
    const formatted = formatErrorMessageWithContext(message, options.context);
    super(formatted, options.cause === undefined ? undefined : { cause: options.cause });

    this.exitCode = options.exitCode;
    this.context = options.context;
    this.name = options.name ?? new.target.name;
  }
}

export interface UsageErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

export class UsageError extends EndpointMonitorError {
  constructor(message: string, options: UsageErrorOptions = {}) {
    super(message, {
      exitCode: EXIT_CODE_USAGE_ERROR,
      context: options.context,
      cause: options.cause,
      name: "UsageError",
    });
  }
}

export interface ConfigErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

/** Configuration could not be turned into a monitoring run. Always fatal. */
export class ConfigError extends EndpointMonitorError {
  constructor(message: string, options: ConfigErrorOptions = {}) {
    super(message, {
      exitCode: EXIT_CODE_CONFIG_ERROR,
      context: options.context,
      cause: options.cause,
      name: "ConfigError",
    });
  }
}

export interface InternalErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

export class InternalError extends EndpointMonitorError {
  constructor(message: string, options: InternalErrorOptions = {}) {
    super(message, {
      exitCode: EXIT_CODE_INTERNAL_ERROR,
      context: options.context,
      cause: options.cause,
      name: "InternalError",
    });
  }
}
