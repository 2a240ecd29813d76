import { promises as fs } from "node:fs";
import { parse } from "yaml";

import type { EndpointDefinition, EndpointsConfig } from "../domain";
import { ConfigParseError, ConfigReadError, type SchemaValidationError } from "./errors";
import { validateEndpointsConfig } from "./validator";

export const DEFAULT_METHOD = "GET";

/** A record left out of the sweep because it cannot be probed. */
export interface SkippedRecord {
  index: number;
  reason: string;
}

export interface LoadedConfig {
  endpoints: EndpointsConfig;
  /** Schema violations found in the document. Advisory only. */
  validationError?: SchemaValidationError;
  skipped: SkippedRecord[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") {
    return false;
  }

  const prototype = Object.getPrototypeOf(value) as object | null;
  return prototype === Object.prototype || prototype === null;
}

/** Header values are sent exactly as written; non-string values are dropped. */
function normalizeHeaders(value: unknown): Record<string, string> {
  if (!isPlainObject(value)) {
    return {};
  }

  const headers: Record<string, string> = {};

  for (const [name, headerValue] of Object.entries(value)) {
    if (typeof headerValue === "string") {
      headers[name] = headerValue;
    }
  }

  return headers;
}

function normalizeMethod(value: unknown): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    return DEFAULT_METHOD;
  }

  return value.trim().toUpperCase();
}

/**
 * Resolves defaults once so the prober never checks for absent fields.
 *
 * Records without a string `url` have nothing to probe and no domain to be
 * grouped under, so they are excluded from the sweep. Every other schema
 * violation is tolerated: mistyped optional fields fall back to their
 * defaults and the record is probed as usual.
 */
export function normalizeEndpoints(records: readonly unknown[]): {
  endpoints: EndpointsConfig;
  skipped: SkippedRecord[];
} {
  const endpoints: EndpointDefinition[] = [];
  const skipped: SkippedRecord[] = [];

  records.forEach((record, index) => {
    if (!isPlainObject(record)) {
      skipped.push({ index, reason: "record is not a mapping" });
      return;
    }

    const { url } = record;

    if (typeof url !== "string" || url.trim().length === 0) {
      skipped.push({ index, reason: "record has no url" });
      return;
    }

    const target = url.trim();
    const endpoint: EndpointDefinition = {
      name: typeof record.name === "string" && record.name.length > 0 ? record.name : target,
      url: target,
      method: normalizeMethod(record.method),
      headers: Object.freeze(normalizeHeaders(record.headers)),
      ...(record.body !== undefined && record.body !== null ? { body: record.body } : {}),
    };

    endpoints.push(Object.freeze(endpoint));
  });

  return { endpoints: Object.freeze(endpoints), skipped };
}

export function parseEndpointsDocument(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown parse error";
    throw new ConfigParseError(message, { cause: error });
  }
}

export function buildEndpointsConfig(document: unknown): LoadedConfig {
  const validationError = validateEndpointsConfig(document);

  if (!Array.isArray(document)) {
    throw new ConfigParseError("expected a list of endpoint definitions at the top level");
  }

  const { endpoints, skipped } = normalizeEndpoints(document);

  return validationError ? { endpoints, skipped, validationError } : { endpoints, skipped };
}

export async function readEndpointsFile(path: string): Promise<string> {
  try {
    return await fs.readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown read error";
    throw new ConfigReadError(path, message, { cause: error });
  }
}

export async function loadEndpointsConfig(path: string): Promise<LoadedConfig> {
  const content = await readEndpointsFile(path);
  return buildEndpointsConfig(parseEndpointsDocument(content));
}
