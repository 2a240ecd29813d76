import Ajv, { type ErrorObject } from "ajv";
import ajvErrors from "ajv-errors";
import addFormats from "ajv-formats";

import { SchemaValidationError, type SchemaIssue } from "./errors";
import { endpointsConfigSchema } from "./schema";
import type { RawEndpointsFile } from "./types";

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  messages: true,
});

addFormats(ajv);
ajvErrors(ajv, { singleError: false });

const validateFn = ajv.compile<RawEndpointsFile>(endpointsConfigSchema);

function toPointer(instancePath: string): string {
  if (!instancePath) {
    return "config";
  }

  const segments = instancePath
    .split("/")
    .filter(Boolean)
    .map((segment) => segment.replaceAll("~1", "/").replaceAll("~0", "~"));

  return `config${segments
    .map((segment) => (/^\d+$/.test(segment) ? `[${segment}]` : `.${segment}`))
    .join("")}`;
}

function toIssues(errors: ErrorObject[]): SchemaIssue[] {
  return errors.map((error) => ({
    pointer: toPointer(error.instancePath),
    message: error.message ?? "is invalid",
  }));
}

/**
 * Checks a parsed document against the endpoint schema. Returns the
 * violations instead of throwing: a bad record never stops monitoring.
 */
export function validateEndpointsConfig(payload: unknown): SchemaValidationError | undefined {
  if (validateFn(payload)) {
    return undefined;
  }

  return new SchemaValidationError(toIssues(validateFn.errors ?? []));
}
