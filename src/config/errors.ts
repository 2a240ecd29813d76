import { ConfigError } from "../errors";

export class ConfigReadError extends ConfigError {
  readonly path: string;

  constructor(path: string, message: string, options: { cause?: unknown } = {}) {
    super(`Unable to read endpoints configuration at ${path}: ${message}`, options);
    this.name = "ConfigReadError";
    this.path = path;
  }
}

export class ConfigParseError extends ConfigError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(`Unable to parse endpoints configuration: ${message}`, options);
    this.name = "ConfigParseError";
  }
}

export interface SchemaIssue {
  /** Location of the offending value, e.g. `config[1].url`. */
  pointer: string;
  message: string;
}

/**
 * Raised for a configuration that parses but does not match the endpoint
 * schema. Advisory: callers log it and keep monitoring.
 */
export class SchemaValidationError extends Error {
  readonly issues: readonly SchemaIssue[];

  constructor(issues: readonly SchemaIssue[]) {
    super(issues.map((issue) => `${issue.pointer}: ${issue.message}`).join("\n"));
    this.name = "SchemaValidationError";
    this.issues = issues;
  }
}
