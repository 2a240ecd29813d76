import { describe, expect, it } from "vitest";

import { USAGE_LINE, renderCliHelp } from "../index";

describe("renderCliHelp", () => {
  it("starts with the usage line and lists every option", () => {
    const help = renderCliHelp();
    const lines = help.split("\n");

    expect(lines[0]).toBe(USAGE_LINE);
    expect(USAGE_LINE).toBe("Usage: endpoint-monitor <config_file_path>");
    expect(help.endsWith("\n")).toBe(true);

    for (const flag of ["--interval", "--timeout", "--log-file", "--help", "--version"]) {
      expect(help).toContain(flag);
    }
  });

  it("shows the built-in defaults", () => {
    const help = renderCliHelp();

    expect(help).toContain("(default: 15s)");
    expect(help).toContain("(default: 500ms)");
    expect(help).toContain("(default: logs/endpoint_monitor.log)");
  });
});
