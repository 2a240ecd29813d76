import { formatMillisecondsToDuration } from "../duration";
import { DEFAULT_CLI_PARAMETERS } from "./flags";

export const PROGRAM_NAME = "endpoint-monitor";

export const USAGE_LINE = `Usage: ${PROGRAM_NAME} <config_file_path>`;

const OPTIONS = [
  {
    flag: "--interval <duration>",
    description: `Pause between probe cycles, e.g. 15s, 1m (default: ${formatMillisecondsToDuration(
      DEFAULT_CLI_PARAMETERS.intervalMs,
    )}).`,
  },
  {
    flag: "--timeout <duration>",
    description: `Maximum time for a single probe request (default: ${formatMillisecondsToDuration(
      DEFAULT_CLI_PARAMETERS.timeoutMs,
    )}).`,
  },
  {
    flag: "--log-file <path>",
    description: `Append lifecycle events to this file (default: ${DEFAULT_CLI_PARAMETERS.logFile}).`,
  },
  {
    flag: "-h, --help",
    description: "Show this help message and exit.",
  },
  {
    flag: "-v, --version",
    description: "Print the version and exit.",
  },
] as const;

export function renderCliHelp(): string {
  const width = Math.max(...OPTIONS.map((option) => option.flag.length));
  const lines = [
    USAGE_LINE,
    "",
    "Probe every endpoint listed in the YAML file, then print the cumulative",
    "availability of each registrable domain. Repeats until interrupted.",
    "",
    "Options:",
    ...OPTIONS.map((option) => `  ${option.flag.padEnd(width)}  ${option.description}`),
  ];

  return `${lines.join("\n")}\n`;
}
