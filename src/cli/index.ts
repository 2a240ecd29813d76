export { CliFlagError } from "./errors";
export { DEFAULT_CLI_PARAMETERS, parseCliFlags } from "./flags";
export { PROGRAM_NAME, USAGE_LINE, renderCliHelp } from "./help";
