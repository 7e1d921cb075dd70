/**
 * Source Build Orchestrator
 *
 * detect -> version-gate -> clone -> configure -> compile -> install -> emit
 *
 * Each step checks its marker or artifact before doing work, so an
 * interrupted build resumes where it stopped. Markers are written only after
 * the step succeeded. Configure is never re-run once marked: it runs
 * `bazel clean`, which would throw away a resumable compile.
 */

import { join } from "node:path";
import { sharedLibraryFileName, sharedLibrarySuffix } from "../../shared/binary-utils.js";
import { getLogger } from "../../shared/pino-logger.js";
import type { ProcessRunner } from "../../shared/process-runner.js";
import { SubprocessFailedError, UnsupportedToolVersionError } from "./errors.js";
import { ensureDir, pathExists, replaceFile, writeFileChecked } from "./fs-utils.js";
import { linkLib, linkSearch } from "./linker-directives.js";
import type {
  ArtifactRole,
  InstalledArtifact,
  LibraryIdentity,
  PlatformDescriptor,
  ProvisionResult,
} from "./types.js";
import { type VersionRequirement, checkToolVersion } from "./version-comparator.js";

// Looked up on every call: initializeLogging may replace the root logger
function ensureLogger() {
  return getLogger("source-build");
}

export type SourceBuildState =
  | "detect"
  | "version-gate"
  | "clone"
  | "configure"
  | "compile"
  | "install"
  | "emit";

export const CONFIGURE_MARKER = ".native-configured";
export const CLONE_MARKER = ".git";

export interface SourceBuildOptions {
  identity: LibraryIdentity;
  platform: PlatformDescriptor;
  /** host scratch dir; libraries land in `<outDir>/lib-<tag>` */
  outDir: string;
  /** sources are cloned to `<manifestDir>/target/source-<tag>` */
  manifestDir: string;
  numJobs: number;
  /** extra bazel flags, already whitespace-split */
  buildToolFlags: readonly string[];
  runner: ProcessRunner;
  buildTool?: string;
}

export interface SourceBuildResult extends ProvisionResult {
  /** states entered, in order */
  states: SourceBuildState[];
  toolVersion?: VersionRequirement;
}

export class SourceBuildOrchestrator {
  readonly sourceDir: string;
  readonly libDir: string;
  private readonly buildTool: string;

  constructor(private readonly options: SourceBuildOptions) {
    const { tag } = options.identity;
    this.sourceDir = join(options.manifestDir, "target", `source-${tag}`);
    this.libDir = join(options.outDir, `lib-${tag}`);
    this.buildTool = options.buildTool ?? "bazel";
  }

  artifacts(): InstalledArtifact[] {
    const { identity, platform } = this.options;
    return [
      {
        path: join(this.libDir, sharedLibraryFileName(platform.os, identity.frameworkName)),
        role: "framework",
      },
      { path: join(this.libDir, sharedLibraryFileName(platform.os, identity.name)), role: "primary" },
    ];
  }

  /**
   * bazel target with the platform's shared-library suffix
   */
  qualifiedTarget(target: string): string {
    return `${target}${sharedLibrarySuffix(this.options.platform.os)}`;
  }

  /**
   * Where bazel leaves a target's output: `tensorflow:libfoo.so` ->
   * `<source>/bazel-bin/tensorflow/libfoo.so`
   */
  bazelOutputPath(target: string): string {
    return join(this.sourceDir, "bazel-bin", this.qualifiedTarget(target).replace(/:/g, "/"));
  }

  async run(): Promise<SourceBuildResult> {
    const states: SourceBuildState[] = [];
    let toolVersion: VersionRequirement | undefined;
    let state: SourceBuildState | null = "detect";

    while (state) {
      states.push(state);
      ensureLogger().info({ state, sourceDir: this.sourceDir, libDir: this.libDir }, "Entering state");

      switch (state) {
        case "detect":
          state = (await this.detect()) ? "emit" : "version-gate";
          break;
        case "version-gate":
          toolVersion = await this.checkBuildTool();
          state = "clone";
          break;
        case "clone":
          await this.clone();
          state = "configure";
          break;
        case "configure":
          await this.configure();
          state = "compile";
          break;
        case "compile":
          await this.compile();
          state = "install";
          break;
        case "install":
          await this.install();
          state = "emit";
          break;
        case "emit":
          state = null;
          break;
      }
    }

    return {
      strategy: "source",
      directives: [
        linkLib(this.options.identity.frameworkName),
        linkLib(this.options.identity.name),
        linkSearch(this.libDir),
      ],
      artifacts: this.artifacts(),
      states,
      toolVersion,
    };
  }

  /**
   * @returns true when both libraries are already in the lib dir
   */
  private async detect(): Promise<boolean> {
    await ensureDir(this.libDir);
    const present = (
      await Promise.all(this.artifacts().map((artifact) => pathExists(artifact.path)))
    ).every(Boolean);
    if (present) {
      ensureLogger().info({ libDir: this.libDir }, "Libraries already built, not building");
    }
    return present;
  }

  private async checkBuildTool(): Promise<VersionRequirement> {
    const minimum = this.options.identity.minBuildToolVersion;
    let output: string;
    try {
      output = await this.options.runner.output(this.buildTool, (command) => command.arg("version"));
    } catch (error) {
      if (error instanceof SubprocessFailedError) {
        throw new UnsupportedToolVersionError(
          this.buildTool,
          minimum,
          `\`${this.buildTool} version\` could not be run`,
          undefined,
          error,
        );
      }
      throw error;
    }

    const requirement = checkToolVersion(output, minimum, this.buildTool);
    ensureLogger().info(requirement, "Build tool version accepted");
    return requirement;
  }

  private async clone(): Promise<void> {
    if (await pathExists(join(this.sourceDir, CLONE_MARKER))) {
      ensureLogger().info({ sourceDir: this.sourceDir }, "Source tree already cloned");
      return;
    }

    const { repository, tag } = this.options.identity;
    await this.options.runner.run("git", (command) =>
      command
        .arg("clone")
        .arg(`--branch=${tag}`)
        .arg("--recursive")
        .arg(repository)
        .arg(this.sourceDir),
    );
  }

  private async configure(): Promise<void> {
    const marker = join(this.sourceDir, CONFIGURE_MARKER);
    if (await pathExists(marker)) {
      ensureLogger().info({ marker }, "Source tree already configured");
      return;
    }

    const needCuda = this.options.platform.accelerator === "gpu" ? "1" : "0";
    await this.options.runner.run("bash", (command) =>
      command
        .cwd(this.sourceDir)
        .env("TF_NEED_CUDA", needCuda)
        .arg("-c")
        .arg("yes ''|./configure"),
    );
    await writeFileChecked(marker, "");
  }

  private async compile(): Promise<void> {
    const { numJobs, buildToolFlags, identity } = this.options;
    await this.options.runner.run(this.buildTool, (command) =>
      command
        .cwd(this.sourceDir)
        .arg("build")
        .arg(`--jobs=${numJobs}`)
        .arg("--compilation_mode=opt")
        .arg("--copt=-march=native")
        .args(buildToolFlags)
        .arg(this.qualifiedTarget(identity.target)),
    );
  }

  private async install(): Promise<void> {
    const { identity } = this.options;
    const outputs: Record<ArtifactRole, string> = {
      framework: this.bazelOutputPath(identity.frameworkTarget),
      primary: this.bazelOutputPath(identity.target),
    };

    for (const artifact of this.artifacts()) {
      const from = outputs[artifact.role];
      ensureLogger().info({ from, to: artifact.path }, "Copying build output");
      await replaceFile(from, artifact.path);
    }
  }
}
