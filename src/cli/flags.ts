import type { CliParameters } from "../domain";
import { DurationParseError, parseDurationToMilliseconds } from "../duration";
import { DEFAULT_LOG_FILE } from "../logging";
import { DEFAULT_INTERVAL_MS } from "../monitor";
import { DEFAULT_PROBE_TIMEOUT_MS } from "../prober";
import { CliFlagError } from "./errors";

export const DEFAULT_CLI_PARAMETERS: Omit<CliParameters, "configPath"> = {
  intervalMs: DEFAULT_INTERVAL_MS,
  timeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
  logFile: DEFAULT_LOG_FILE,
};

const VALUE_FLAGS = ["--interval", "--timeout", "--log-file"] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(value: string): value is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === value);
}

function splitInlineValue(token: string): { flag: string; inline?: string } {
  const separatorIndex = token.indexOf("=");

  if (separatorIndex === -1) {
    return { flag: token };
  }

  return { flag: token.slice(0, separatorIndex), inline: token.slice(separatorIndex + 1) };
}

function parseDurationFlag(value: string, flag: string, { allowZero }: { allowZero: boolean }): number {
  let milliseconds: number;

  try {
    milliseconds = parseDurationToMilliseconds(value);
  } catch (error) {
    if (error instanceof DurationParseError) {
      throw new CliFlagError(`Flag ${flag}: ${error.message}`);
    }

    throw error;
  }

  if (!allowZero && milliseconds === 0) {
    throw new CliFlagError(`Flag ${flag} must be greater than zero`);
  }

  return milliseconds;
}

/**
 * Parses `<config_file_path> [--interval <duration>] [--timeout <duration>]
 * [--log-file <path>]`. Exactly one positional argument is accepted.
 */
export function parseCliFlags(argv: readonly string[]): CliParameters {
  const positionals: string[] = [];
  const result: Omit<CliParameters, "configPath"> = { ...DEFAULT_CLI_PARAMETERS };
  let flagsEnded = false;

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (flagsEnded || !token.startsWith("--")) {
      positionals.push(token);
      continue;
    }

    if (token === "--") {
      flagsEnded = true;
      continue;
    }

    const { flag, inline } = splitInlineValue(token);

    if (!isValueFlag(flag)) {
      throw new CliFlagError(`Unknown flag: ${flag}`);
    }

    let value = inline;
    if (value === undefined) {
      value = argv[index + 1];
      index += 1;
    }

    if (value === undefined || value.length === 0) {
      throw new CliFlagError(`Flag ${flag} requires a value`);
    }

    switch (flag) {
      case "--interval":
        result.intervalMs = parseDurationFlag(value, flag, { allowZero: true });
        break;
      case "--timeout":
        result.timeoutMs = parseDurationFlag(value, flag, { allowZero: false });
        break;
      case "--log-file":
        result.logFile = value;
        break;
      default: {
        const exhaustiveCheck: never = flag;
        throw new CliFlagError(`Unknown flag: ${String(exhaustiveCheck)}`);
      }
    }
  }

  if (positionals.length !== 1) {
    throw new CliFlagError(
      positionals.length === 0
        ? "A config file path is required"
        : `Expected exactly one config file path, received ${positionals.length}`,
    );
  }

  return { ...result, configPath: positionals[0] };
}
