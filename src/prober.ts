import { performance } from "node:perf_hooks";
import type { Dispatcher } from "undici";

import type { EndpointDefinition, ProbeResult, ProbeStatus } from "./domain";
import { ProbeNetworkError } from "./errors";
import { RequestTimeoutError, httpRequest } from "./http";

export const DEFAULT_PROBE_TIMEOUT_MS = 500;

const HTTP_SUCCESS_MIN = 200;
const HTTP_SUCCESS_MAX_EXCLUSIVE = 300;

const HTTP_METHODS = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "CONNECT",
  "OPTIONS",
  "TRACE",
  "PATCH",
] as const satisfies readonly Dispatcher.HttpMethod[];

type SupportedMethod = (typeof HTTP_METHODS)[number];

function isSupportedMethod(value: string): value is SupportedMethod {
  return HTTP_METHODS.some((method) => method === value);
}

export interface CheckHealthOptions {
  /** Upper bound for the request, 500ms unless overridden. */
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  /** Aborts an in-flight probe, e.g. on shutdown. */
  signal?: AbortSignal;
  now?: () => number;
  clock?: () => Date;
}

export function classifyStatusCode(statusCode: number): ProbeStatus {
  return statusCode >= HTTP_SUCCESS_MIN && statusCode < HTTP_SUCCESS_MAX_EXCLUSIVE
    ? "UP"
    : "DOWN";
}

function hasHeader(headers: Readonly<Record<string, string>>, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

function buildRequestPayload(endpoint: EndpointDefinition): {
  headers: Record<string, string>;
  body?: string;
} {
  const headers = { ...endpoint.headers };

  if (endpoint.body === undefined) {
    return { headers };
  }

  if (!hasHeader(headers, "content-type")) {
    headers["content-type"] = "application/json";
  }

  return { headers, body: JSON.stringify(endpoint.body) };
}

function describeFailure(endpoint: EndpointDefinition, error: unknown): ProbeNetworkError {
  const context = { endpointName: endpoint.name, url: endpoint.url };

  if (error instanceof RequestTimeoutError) {
    return new ProbeNetworkError("timeout", error.message, context, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProbeNetworkError("network", `Request failed: ${message}`, context, { cause: error });
}

/**
 * Sends exactly one request for the endpoint and classifies the outcome.
 * Resolves with DOWN for every failure; it never rejects.
 */
export async function checkHealth(
  endpoint: EndpointDefinition,
  options: CheckHealthOptions = {},
): Promise<ProbeResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const now = options.now ?? (() => performance.now());
  const checkedAt = options.clock?.() ?? new Date();
  const startedAt = now();

  const base = { endpointName: endpoint.name, url: endpoint.url, checkedAt };

  try {
    const { method } = endpoint;
    if (!isSupportedMethod(method)) {
      throw new TypeError(`Unsupported HTTP method: ${method}`);
    }

    const { headers, body } = buildRequestPayload(endpoint);
    const response = await httpRequest({
      url: endpoint.url,
      method,
      headers,
      ...(body !== undefined ? { body } : {}),
      timeoutMs,
      bodyTimeout: timeoutMs,
      ...(options.signal ? { signal: options.signal } : {}),
      ...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
    });

    await response.body.dump();

    const httpStatus = response.statusCode;
    const status = classifyStatusCode(httpStatus);
    const latencyMs = now() - startedAt;

    if (status === "UP") {
      return { ...base, status, httpStatus, latencyMs };
    }

    const error = new ProbeNetworkError(
      "status",
      `Unexpected HTTP status ${httpStatus}`,
      { endpointName: endpoint.name, url: endpoint.url, httpStatus },
    );

    return { ...base, status, httpStatus, error, latencyMs };
  } catch (error) {
    return {
      ...base,
      status: "DOWN",
      error: describeFailure(endpoint, error),
      latencyMs: now() - startedAt,
    };
  }
}
