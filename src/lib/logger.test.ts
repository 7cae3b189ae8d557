import pino from "pino";
import { describe, expect, test } from "vitest";
import { createLoggerOptions, normalizeLogLevel } from "./logger";

describe("normalizeLogLevel", () => {
  test("accepts pino level names in any case", () => {
    expect(normalizeLogLevel("DEBUG")).toBe("debug");
    expect(normalizeLogLevel(" info ")).toBe("info");
    expect(normalizeLogLevel("silent")).toBe("silent");
  });

  test("maps syslog-style aliases", () => {
    expect(normalizeLogLevel("WARNING")).toBe("warn");
    expect(normalizeLogLevel("critical")).toBe("fatal");
  });

  test("returns undefined for unknown or missing levels", () => {
    expect(normalizeLogLevel("verbose")).toBeUndefined();
    expect(normalizeLogLevel("")).toBeUndefined();
    expect(normalizeLogLevel(undefined)).toBeUndefined();
  });
});

describe("createLoggerOptions", () => {
  test("serializes errors logged under the error key", () => {
    const lines: string[] = [];
    const log = pino(createLoggerOptions("info"), {
      write(line: string) {
        lines.push(line);
      },
    });

    log.error({ instance: "loki:http://loki.test:3100", error: new Error("boom") }, "check failed");

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? "{}");
    expect(entry).toMatchObject({
      level: 50,
      msg: "check failed",
      instance: "loki:http://loki.test:3100",
      error: { type: "Error", message: "boom" },
    });
    expect(entry).toHaveProperty("error.stack", expect.stringContaining("Error: boom"));
  });

  test("applies the requested level", () => {
    const lines: string[] = [];
    const log = pino(createLoggerOptions("warn"), {
      write(line: string) {
        lines.push(line);
      },
    });

    log.info("hidden");
    log.warn("shown");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ msg: "shown" });
  });
});
