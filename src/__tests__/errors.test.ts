import { describe, expect, it } from "vitest";

import {
  ConfigError,
  ConfigParseError,
  ConfigReadError,
  EXIT_CODE_CONFIG_ERROR,
  EXIT_CODE_INTERNAL_ERROR,
  EXIT_CODE_USAGE_ERROR,
  InternalError,
  ProbeNetworkError,
  SchemaValidationError,
  UsageError,
  formatErrorMessageWithContext,
} from "../index";

describe("error hierarchy", () => {
  it("formats error messages with provided context", () => {
    const message = formatErrorMessageWithContext("Request failed", {
      endpointName: "api",
      url: "https://api.example.com/health",
    });

    expect(message).toBe("Request failed (endpoint=api, url=https://api.example.com/health)");
  });

  it("leaves messages without context untouched", () => {
    expect(formatErrorMessageWithContext("Request failed", {})).toBe("Request failed");
  });

  it("omits an empty url from the context", () => {
    expect(formatErrorMessageWithContext("Request failed", { endpointName: "api", url: "" })).toBe(
      "Request failed (endpoint=api)",
    );
  });

  it("captures exit codes per error family", () => {
    expect(new UsageError("Invalid flag").exitCode).toBe(EXIT_CODE_USAGE_ERROR);
    expect(new ConfigError("Broken").exitCode).toBe(EXIT_CODE_CONFIG_ERROR);
    expect(new InternalError("Oops").exitCode).toBe(EXIT_CODE_INTERNAL_ERROR);
  });

  it("treats read and parse failures as fatal configuration errors", () => {
    const readError = new ConfigReadError("missing.yaml", "ENOENT");
    const parseError = new ConfigParseError("bad indentation");

    expect(readError).toBeInstanceOf(ConfigError);
    expect(readError.exitCode).toBe(EXIT_CODE_CONFIG_ERROR);
    expect(readError.message).toBe(
      "Unable to read endpoints configuration at missing.yaml: ENOENT",
    );
    expect(parseError).toBeInstanceOf(ConfigError);
    expect(parseError.message).toBe("Unable to parse endpoints configuration: bad indentation");
  });

  it("keeps schema violations outside the fatal hierarchy", () => {
    const error = new SchemaValidationError([
      { pointer: "config[0]", message: "Each endpoint must define a URL" },
      { pointer: "config[1].method", message: "Method must be a string" },
    ]);

    expect(error).not.toBeInstanceOf(ConfigError);
    expect(error.message).toBe(
      "config[0]: Each endpoint must define a URL\nconfig[1].method: Method must be a string",
    );
  });

  it("describes probe failures with the endpoint and URL", () => {
    const cause = new Error("connect ECONNREFUSED");
    const error = new ProbeNetworkError(
      "network",
      "Request failed",
      { endpointName: "auth", url: new URL("https://auth.example.com/health") },
      { cause },
    );

    expect(error.kind).toBe("network");
    expect(error.url).toBe("https://auth.example.com/health");
    expect(error.message).toBe(
      "Request failed (endpoint=auth, url=https://auth.example.com/health)",
    );
    expect(error.cause).toBe(cause);
  });
});
