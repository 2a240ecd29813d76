import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { MemoryLogger, createFileLogger, formatLogLine, formatLogTimestamp } from "../logger";

const FIXED_DATE = new Date(2024, 0, 2, 3, 4, 5);

describe("formatLogLine", () => {
  it("pads the level to eight characters", () => {
    expect(formatLogTimestamp(FIXED_DATE)).toBe("2024-01-02 03:04:05");
    expect(formatLogLine({ level: "INFO", message: "Starting.", timestamp: FIXED_DATE })).toBe(
      "2024-01-02 03:04:05 INFO     Starting.",
    );
    expect(formatLogLine({ level: "WARNING", message: "Slow.", timestamp: FIXED_DATE })).toBe(
      "2024-01-02 03:04:05 WARNING  Slow.",
    );
  });
});

describe("createFileLogger", () => {
  it("creates the log directory and appends one line per event", async () => {
    const root = mkdtempSync(path.join(tmpdir(), "endpoint-monitor-logs-"));
    const filePath = path.join(root, "nested", "logs", "endpoint_monitor.log");

    const first = createFileLogger({ path: filePath, clock: () => FIXED_DATE });
    first.info("Starting endpoint monitor.");
    first.error("SchemaValidationError: config[0]: Each endpoint must define a URL");
    await first.close();

    const second = createFileLogger({ path: filePath, clock: () => FIXED_DATE });
    second.warn("shop is DOWN: timeout");
    await second.close();

    expect(readFileSync(filePath, "utf8")).toBe(
      [
        "2024-01-02 03:04:05 INFO     Starting endpoint monitor.",
        "2024-01-02 03:04:05 ERROR    SchemaValidationError: config[0]: Each endpoint must define a URL",
        "2024-01-02 03:04:05 WARNING  shop is DOWN: timeout",
        "",
      ].join("\n"),
    );
  });

  it("ignores events logged after close", async () => {
    const root = mkdtempSync(path.join(tmpdir(), "endpoint-monitor-logs-"));
    const filePath = path.join(root, "monitor.log");

    const logger = createFileLogger({ path: filePath, clock: () => FIXED_DATE });
    logger.info("before");
    await logger.close();
    logger.info("after");
    await logger.close();

    expect(readFileSync(filePath, "utf8")).toBe("2024-01-02 03:04:05 INFO     before\n");
  });
});

describe("MemoryLogger", () => {
  it("captures entries by level", () => {
    const logger = new MemoryLogger(() => FIXED_DATE);

    logger.info("one");
    logger.warn("two");
    logger.error("three");

    expect(logger.messages()).toEqual(["one", "two", "three"]);
    expect(logger.messages("WARNING")).toEqual(["two"]);
    expect(logger.entries[2]).toEqual({ level: "ERROR", message: "three", timestamp: FIXED_DATE });
  });
});
