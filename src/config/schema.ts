import type { Schema } from "ajv";

export const endpointsConfigSchema = {
  $id: "urn:endpoint-monitor:schemas:endpoints-config",
  type: "array",
  errorMessage: {
    type: "The configuration must be a list of endpoint definitions",
  },
  items: {
    type: "object",
    required: ["name", "url"],
    properties: {
      name: {
        type: "string",
        errorMessage: {
          type: "Endpoint name must be a string",
        },
      },
      url: {
        type: "string",
        format: "uri",
        errorMessage: {
          type: "Endpoint URL must be a string",
          format: "Endpoint URL must be a valid URI",
        },
      },
      method: {
        type: "string",
        errorMessage: {
          type: "Method must be a string",
        },
      },
      headers: {
        type: "object",
        additionalProperties: {
          type: "string",
          errorMessage: {
            type: "Header values must be strings",
          },
        },
        errorMessage: {
          type: "Headers must be a mapping of names to values",
        },
      },
      body: {
        type: "string",
        errorMessage: {
          type: "Body must be a string",
        },
      },
    },
    errorMessage: {
      type: "Each endpoint must be a mapping",
      required: {
        name: "Each endpoint must define a name",
        url: "Each endpoint must define a URL",
      },
    },
  },
} as const satisfies Schema & { errorMessage?: unknown };
