#!/usr/bin/env node
import process from "node:process";
import { Agent } from "undici";

import packageJson from "../package.json";
import { CliFlagError, PROGRAM_NAME, USAGE_LINE, parseCliFlags, renderCliHelp } from "./cli";
import type { CliParameters } from "./domain";
import { EndpointMonitorError, InternalError } from "./errors";
import { EXIT_CODE_INTERNAL_ERROR, EXIT_CODE_OK, type ExitCode } from "./exit-codes";
import { DEFAULT_LOG_FILE, createFileLogger, type Logger } from "./logging";
import { runMonitor } from "./monitor";

const VERSION_FLAGS = new Set(["--version", "-v"]);
const HELP_FLAGS = new Set(["--help", "-h"]);
const STOP_SIGNALS = ["SIGINT", "SIGTERM"] as const;

const STOPPED_MESSAGE = "Monitoring stopped by user.";

interface CliOutcome {
  code: ExitCode;
}

function printVersion(): CliOutcome {
  const version = typeof packageJson.version === "string" ? packageJson.version : "0.0.0";
  process.stdout.write(`${PROGRAM_NAME} ${version}\n`);
  return { code: EXIT_CODE_OK };
}

function printHelp(): CliOutcome {
  process.stdout.write(renderCliHelp());
  return { code: EXIT_CODE_OK };
}

/** The usage line is printed first; logging it is best-effort. */
async function reportUsageError(error: CliFlagError): Promise<CliOutcome> {
  process.stderr.write(`${error.message}\n${USAGE_LINE}\n`);

  let logger: Logger;

  try {
    logger = createFileLogger({ path: DEFAULT_LOG_FILE });
  } catch (logError) {
    if (logError instanceof InternalError) {
      process.stderr.write(`${logError.message}\n`);
      return { code: error.exitCode };
    }

    throw logError;
  }

  logger.error(`${error.message}. ${USAGE_LINE}`);
  await logger.close();

  return { code: error.exitCode };
}

function describeError(error: unknown): { message: string; code: ExitCode } {
  if (error instanceof EndpointMonitorError) {
    return { message: error.message, code: error.exitCode };
  }

  if (error instanceof Error) {
    return { message: error.message, code: EXIT_CODE_INTERNAL_ERROR };
  }

  return { message: `Unexpected error: ${String(error)}`, code: EXIT_CODE_INTERNAL_ERROR };
}

async function monitor(argv: readonly string[]): Promise<CliOutcome> {
  let parameters: CliParameters;

  try {
    parameters = parseCliFlags(argv);
  } catch (error) {
    if (error instanceof CliFlagError) {
      return reportUsageError(error);
    }

    throw error;
  }

  const logger: Logger = createFileLogger({ path: parameters.logFile });
  const dispatcher = new Agent();
  const controller = new AbortController();
  const onSignal = () => {
    controller.abort();
  };

  for (const signal of STOP_SIGNALS) {
    process.once(signal, onSignal);
  }

  try {
    await runMonitor({
      configPath: parameters.configPath,
      intervalMs: parameters.intervalMs,
      timeoutMs: parameters.timeoutMs,
      logger,
      dispatcher,
      signal: controller.signal,
    });

    if (controller.signal.aborted) {
      logger.error(`Interrupted: ${STOPPED_MESSAGE}`);
      process.stdout.write(`\n${STOPPED_MESSAGE}\n`);
    }

    return { code: EXIT_CODE_OK };
  } catch (error) {
    const { message, code } = describeError(error);
    logger.error(message);
    process.stderr.write(`${message}\n`);
    return { code };
  } finally {
    for (const signal of STOP_SIGNALS) {
      process.off(signal, onSignal);
    }

    await dispatcher.close();
    await logger.close();
  }
}

async function main(): Promise<CliOutcome> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.some((token) => VERSION_FLAGS.has(token))) {
    return printVersion();
  }

  if (rawArgs.some((token) => HELP_FLAGS.has(token))) {
    return printHelp();
  }

  try {
    return await monitor(rawArgs);
  } catch (error) {
    const { message, code } = describeError(error);
    process.stderr.write(`${message}\n`);
    return { code };
  }
}

main().then(
  (outcome) => {
    process.exitCode = outcome.code;
  },
  (error: unknown) => {
    process.stderr.write(`Unexpected error: ${String(error)}\n`);
    process.exitCode = EXIT_CODE_INTERNAL_ERROR;
  },
);
