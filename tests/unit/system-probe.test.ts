/**
 * System Probe Tests
 * pkg-config parsing and the MSVC PATH scan
 */

import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { linkLib, linkSearch } from "../../src/core/provision/linker-directives.js";
import { SystemLibraryProbe, parsePkgConfigLibs } from "../../src/core/provision/system-probe.js";
import {
  LINUX_X64,
  RecordingProcessRunner,
  TEST_IDENTITY,
  WINDOWS_X64,
  createTempWorkspace,
  removeTempWorkspace,
  writeFixture,
} from "../utils/test-infrastructure.js";

describe("parsePkgConfigLibs", () => {
  it("should map -L to search paths and -l to dynamic links", () => {
    expect(parsePkgConfigLibs("-L/opt/tf/lib -ltensorflow -pthread -Wl,--as-needed\n")).toEqual([
      linkSearch("/opt/tf/lib"),
      linkLib("tensorflow"),
    ]);
  });

  it("should ignore bare flags without a value", () => {
    expect(parsePkgConfigLibs("-L -l")).toEqual([]);
  });
});

describe("SystemLibraryProbe", () => {
  let runner: RecordingProcessRunner;
  let workspace: string;

  beforeEach(async () => {
    runner = new RecordingProcessRunner();
    workspace = await createTempWorkspace();
  });

  afterEach(async () => {
    await removeTempWorkspace(workspace);
  });

  it("should ask pkg-config for the library", async () => {
    runner.onOutput("pkg-config", () => "-ltensorflow\n");

    const hit = await new SystemLibraryProbe(TEST_IDENTITY, LINUX_X64, runner, {}).probe();

    expect(hit).toEqual({ source: "pkg-config", directives: [linkLib("tensorflow")] });
    expect(runner.commands[0]?.getArgs()).toEqual(["--libs", "tensorflow"]);
  });

  it("should treat a failing pkg-config as a miss", async () => {
    expect(await new SystemLibraryProbe(TEST_IDENTITY, LINUX_X64, runner, {}).probe()).toBeNull();
  });

  it("should treat output without a library as a miss", async () => {
    runner.onOutput("pkg-config", () => "-L/usr/lib\n");

    expect(await new SystemLibraryProbe(TEST_IDENTITY, LINUX_X64, runner, {}).probe()).toBeNull();
  });

  it("should find an import library on PATH for the MSVC ABI", async () => {
    const libDir = join(workspace, "tf");
    await writeFixture(join(libDir, "tensorflow.lib"), "import");

    const hit = await new SystemLibraryProbe(TEST_IDENTITY, WINDOWS_X64, runner, {
      PATH: `${join(workspace, "empty")};${libDir}`,
    }).probe();

    expect(hit).toEqual({
      source: "search-path",
      directives: [linkLib("tensorflow"), linkSearch(libDir)],
    });
    expect(runner.commands).toHaveLength(0);
  });

  it("should fall back to pkg-config when PATH has no import library", async () => {
    const hit = await new SystemLibraryProbe(TEST_IDENTITY, WINDOWS_X64, runner, {
      PATH: join(workspace, "empty"),
    }).probe();

    expect(hit).toBeNull();
    expect(runner.programs()).toEqual(["pkg-config"]);
  });
});
