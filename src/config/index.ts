export { ConfigParseError, ConfigReadError, SchemaValidationError } from "./errors";
export type { SchemaIssue } from "./errors";
export {
  DEFAULT_METHOD,
  buildEndpointsConfig,
  loadEndpointsConfig,
  normalizeEndpoints,
  parseEndpointsDocument,
  readEndpointsFile,
} from "./loader";
export type { LoadedConfig, SkippedRecord } from "./loader";
export { endpointsConfigSchema } from "./schema";
export type { RawEndpointRecord, RawEndpointsFile } from "./types";
export { validateEndpointsConfig } from "./validator";
