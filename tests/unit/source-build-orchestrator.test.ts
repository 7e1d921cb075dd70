/**
 * Source Build Orchestrator Tests
 * Drives the state machine with a recording process runner
 */

import { mkdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SubprocessFailedError, UnsupportedToolVersionError } from "../../src/core/provision/errors.js";
import { pathExists } from "../../src/core/provision/fs-utils.js";
import { linkLib, linkSearch } from "../../src/core/provision/linker-directives.js";
import {
  CLONE_MARKER,
  CONFIGURE_MARKER,
  SourceBuildOrchestrator,
} from "../../src/core/provision/source-build-orchestrator.js";
import {
  LINUX_X64,
  RecordingProcessRunner,
  TEST_IDENTITY,
  createTempWorkspace,
  removeTempWorkspace,
  writeFixture,
} from "../utils/test-infrastructure.js";

describe("SourceBuildOrchestrator", () => {
  let workspace: string;
  let manifestDir: string;
  let outDir: string;
  let runner: RecordingProcessRunner;

  function createOrchestrator(buildToolFlags: string[] = []): SourceBuildOrchestrator {
    return new SourceBuildOrchestrator({
      identity: TEST_IDENTITY,
      platform: LINUX_X64,
      outDir,
      manifestDir,
      numJobs: 4,
      buildToolFlags,
      runner,
    });
  }

  /**
   * Fake tools: git creates the checkout, bazel build leaves outputs in bazel-bin
   */
  function installFakeToolchain(orchestrator: SourceBuildOrchestrator, version = "Build label: 2.0.0"): void {
    runner
      .onOutput("bazel", () => `${version}\nBuild target: bazel-out/bazel.jar\n`)
      .onRun("git", async () => {
        await mkdir(join(orchestrator.sourceDir, ".git"), { recursive: true });
      })
      .onRun("bazel", async () => {
        const bin = join(orchestrator.sourceDir, "bazel-bin", "tensorflow");
        await writeFixture(join(bin, "libtensorflow.so"), "built primary");
        await writeFixture(join(bin, "libtensorflow_framework.so"), "built framework");
      });
  }

  beforeEach(async () => {
    workspace = await createTempWorkspace();
    manifestDir = join(workspace, "project");
    outDir = join(workspace, "out");
    runner = new RecordingProcessRunner();
  });

  afterEach(async () => {
    await removeTempWorkspace(workspace);
  });

  it("should derive the source and library directories from the tag", () => {
    const orchestrator = createOrchestrator();

    expect(orchestrator.sourceDir).toBe(join(manifestDir, "target", "source-v2.2.0"));
    expect(orchestrator.libDir).toBe(join(outDir, "lib-v2.2.0"));
    expect(orchestrator.bazelOutputPath("tensorflow:libtensorflow")).toBe(
      join(orchestrator.sourceDir, "bazel-bin", "tensorflow", "libtensorflow.so"),
    );
  });

  it("should run every step of a fresh build in order", async () => {
    const orchestrator = createOrchestrator(["--config=monolithic"]);
    installFakeToolchain(orchestrator);

    const result = await orchestrator.run();

    expect(result.states).toEqual([
      "detect",
      "version-gate",
      "clone",
      "configure",
      "compile",
      "install",
      "emit",
    ]);
    expect(runner.programs()).toEqual(["bazel", "git", "bash", "bazel"]);
    expect(result.toolVersion).toEqual({ minimum: "0.5.4", observed: "2.0.0" });

    const [, clone, configure, compile] = runner.commands;
    expect(clone?.getArgs()).toEqual([
      "clone",
      "--branch=v2.2.0",
      "--recursive",
      "https://github.com/tensorflow/tensorflow.git",
      orchestrator.sourceDir,
    ]);
    expect(configure?.getCwd()).toBe(orchestrator.sourceDir);
    expect(configure?.getEnv()).toEqual({ TF_NEED_CUDA: "0" });
    expect(configure?.getArgs()).toEqual(["-c", "yes ''|./configure"]);
    expect(compile?.getCwd()).toBe(orchestrator.sourceDir);
    expect(compile?.getArgs()).toEqual([
      "build",
      "--jobs=4",
      "--compilation_mode=opt",
      "--copt=-march=native",
      "--config=monolithic",
      "tensorflow:libtensorflow.so",
    ]);

    expect(await pathExists(join(orchestrator.sourceDir, CONFIGURE_MARKER))).toBe(true);
    expect(await readFile(join(orchestrator.libDir, "libtensorflow.so"), "utf8")).toBe("built primary");
    expect(await readFile(join(orchestrator.libDir, "libtensorflow_framework.so"), "utf8")).toBe(
      "built framework",
    );
    expect(result.directives).toEqual([
      linkLib("tensorflow_framework"),
      linkLib("tensorflow"),
      linkSearch(orchestrator.libDir),
    ]);
  });

  it("should not clone or configure again when the markers exist", async () => {
    const orchestrator = createOrchestrator();
    installFakeToolchain(orchestrator);
    await mkdir(join(orchestrator.sourceDir, ".git"), { recursive: true });
    await writeFixture(join(orchestrator.sourceDir, CONFIGURE_MARKER), "");

    const result = await orchestrator.run();

    expect(runner.programs()).toEqual(["bazel", "bazel"]);
    expect(result.states).toContain("compile");
  });

  it("should emit immediately when both libraries are already built", async () => {
    const orchestrator = createOrchestrator();
    await writeFixture(join(orchestrator.libDir, "libtensorflow.so"), "primary");
    await writeFixture(join(orchestrator.libDir, "libtensorflow_framework.so"), "framework");

    const result = await orchestrator.run();

    expect(result.states).toEqual(["detect", "emit"]);
    expect(runner.commands).toHaveLength(0);
    expect(result.directives).toHaveLength(3);
  });

  it("should stop before cloning when the build tool is too old", async () => {
    const orchestrator = createOrchestrator();
    installFakeToolchain(orchestrator, "Build label: 0.5.0");

    await expect(orchestrator.run()).rejects.toThrow(
      "bazel must be installed at version 0.5.4 or greater (installed version 0.5.0 is less than required version 0.5.4)",
    );
    expect(runner.programs()).toEqual(["bazel"]);
    expect(await pathExists(orchestrator.sourceDir)).toBe(false);
  });

  it("should treat a missing build tool as an unsupported version", async () => {
    const orchestrator = createOrchestrator();

    await expect(orchestrator.run()).rejects.toBeInstanceOf(UnsupportedToolVersionError);
    expect(runner.programs()).toEqual(["bazel"]);
  });

  it("should ask configure for CUDA on GPU builds", async () => {
    const orchestrator = new SourceBuildOrchestrator({
      identity: TEST_IDENTITY,
      platform: { ...LINUX_X64, accelerator: "gpu" },
      outDir,
      manifestDir,
      numJobs: 1,
      buildToolFlags: [],
      runner,
    });
    installFakeToolchain(orchestrator);

    await orchestrator.run();

    const configure = runner.commands.find((command) => command.program === "bash");
    expect(configure?.getEnv()).toEqual({ TF_NEED_CUDA: "1" });
  });

  it("should not mark the tree configured when configure fails", async () => {
    const orchestrator = createOrchestrator();
    installFakeToolchain(orchestrator);
    const failure = new SubprocessFailedError(`"bash" "-c" "yes ''|./configure"`, 1);
    runner.onRun("bash", () => {
      throw failure;
    });

    await expect(orchestrator.run()).rejects.toBe(failure);
    expect(await pathExists(join(orchestrator.sourceDir, CONFIGURE_MARKER))).toBe(false);
    expect(runner.programs()).toEqual(["bazel", "git", "bash"]);
  });

  it("should stop after a failed clone without configuring", async () => {
    const orchestrator = createOrchestrator();
    installFakeToolchain(orchestrator);
    runner.onRun("git", () => {
      throw new SubprocessFailedError('"git" "clone"', 128);
    });

    await expect(orchestrator.run()).rejects.toBeInstanceOf(SubprocessFailedError);
    expect(await pathExists(join(orchestrator.sourceDir, CLONE_MARKER))).toBe(false);
    expect(await pathExists(join(orchestrator.sourceDir, CONFIGURE_MARKER))).toBe(false);
    expect(runner.programs()).toEqual(["bazel", "git"]);
  });
});
