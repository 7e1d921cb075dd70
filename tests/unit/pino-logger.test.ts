/**
 * Logger Tests
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { SystemLibraryProbe } from "../../src/core/provision/system-probe.js";
import { getLogger, initializeLogging, isLoggingInitialized } from "../../src/shared/pino-logger.js";
import { LINUX_X64, RecordingProcessRunner, TEST_IDENTITY } from "../utils/test-infrastructure.js";

describe("pino logger", () => {
  afterEach(() => {
    initializeLogging({ level: "silent", format: "json" });
  });

  it("should cache one child logger per module", () => {
    expect(getLogger("test-module")).toBe(getLogger("test-module"));
    expect(getLogger("test-module")).not.toBe(getLogger("other-module"));
  });

  it("should apply the configured level to existing module loggers", () => {
    const logger = getLogger("level-module");

    initializeLogging({ level: "warn", format: "json" });

    expect(isLoggingInitialized()).toBe(true);
    expect(logger.level).toBe("warn");
    expect(getLogger("fresh-module").level).toBe("warn");
  });

  it("should route module records through the logger installed by a format change", async () => {
    const probe = new SystemLibraryProbe(TEST_IDENTITY, LINUX_X64, new RecordingProcessRunner(), {});
    await probe.probe();

    const nodeEnv = process.env["NODE_ENV"] ?? "test";
    // keeps the pretty format off the pino-pretty worker
    vi.stubEnv("NODE_ENV", "production");
    initializeLogging({ level: "silent", format: "pretty" });
    initializeLogging({ level: "debug", format: "json" });
    vi.stubEnv("NODE_ENV", nodeEnv);

    const stderrWrite = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    await probe.probe();
    const lines = stderrWrite.mock.calls.map(([chunk]) => String(chunk));
    stderrWrite.mockRestore();

    const record = lines.find((line) => line.includes("pkg-config did not find the library"));
    expect(record).toBeDefined();
    expect(record).toContain('"module":"system-probe"');
    expect(record).toContain('"level":20');
  });
});
