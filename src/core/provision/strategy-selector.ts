/**
 * Strategy Selector - entry point of the provisioning pipeline
 *
 * 1. System probe: already installed -> emit its directives and stop
 * 2. x86_64 on linux/macos/windows without a forced source build -> prebuilt
 * 3. Anything else -> build from source
 */

import type { ProvisionConfig } from "../../shared/config.js";
import { getLogger } from "../../shared/pino-logger.js";
import { NodeProcessRunner, type ProcessRunner } from "../../shared/process-runner.js";
import { type FetchFn, RemoteArtifactLocator, defaultFetch } from "./artifact-locator.js";
import { pathExists } from "./fs-utils.js";
import { type DirectiveSink, StreamDirectiveSink } from "./linker-directives.js";
import { describePlatform } from "./platform.js";
import { PrebuiltInstaller } from "./prebuilt-installer.js";
import { SourceBuildOrchestrator } from "./source-build-orchestrator.js";
import { SystemLibraryProbe } from "./system-probe.js";
import {
  type CacheLayout,
  DEFAULT_LIBRARY_IDENTITY,
  type InstalledArtifact,
  type LibraryIdentity,
  PREBUILT_ARCH,
  PREBUILT_OPERATING_SYSTEMS,
  type PlatformDescriptor,
  type ProvisionResult,
} from "./types.js";

// Looked up on every call: initializeLogging may replace the root logger
function ensureLogger() {
  return getLogger("strategy-selector");
}

export type DispatchStrategy = "prebuilt" | "source";

function isPrebuiltOs(os: string): boolean {
  return PREBUILT_OPERATING_SYSTEMS.some((supported) => supported === os);
}

export function selectStrategy(platform: PlatformDescriptor, forceSource: boolean): DispatchStrategy {
  if (!forceSource && platform.arch === PREBUILT_ARCH && isPrebuiltOs(platform.os)) {
    return "prebuilt";
  }
  return "source";
}

export interface ProvisionerDependencies {
  runner?: ProcessRunner;
  fetch?: FetchFn;
  sink?: DirectiveSink;
  identity?: LibraryIdentity;
}

export interface ProvisionPlan {
  platform: PlatformDescriptor;
  strategy: DispatchStrategy;
  forced: boolean;
  layout: CacheLayout;
  /** prebuilt only */
  expectedFileName?: string;
  /** source only */
  sourceDir?: string;
}

export interface ArtifactStatus extends InstalledArtifact {
  strategy: DispatchStrategy;
  present: boolean;
}

export class NativeLibraryProvisioner {
  readonly identity: LibraryIdentity;
  private readonly runner: ProcessRunner;
  private readonly fetchImpl: FetchFn;
  private readonly sink: DirectiveSink;

  constructor(
    private readonly config: ProvisionConfig,
    private readonly platform: PlatformDescriptor,
    dependencies: ProvisionerDependencies = {},
  ) {
    this.identity = dependencies.identity ?? DEFAULT_LIBRARY_IDENTITY;
    this.runner = dependencies.runner ?? new NodeProcessRunner();
    this.fetchImpl = dependencies.fetch ?? defaultFetch;
    this.sink = dependencies.sink ?? new StreamDirectiveSink(config.directivePrefix);
  }

  get downloadDir(): string {
    return this.config.downloadDir ?? this.config.outDir;
  }

  /**
   * Run the whole pipeline and emit the resulting directives
   */
  async provision(): Promise<ProvisionResult> {
    const log = ensureLogger();
    log.info({ platform: describePlatform(this.platform) }, "Provisioning native library");

    const result = await this.acquire();
    for (const directive of result.directives) {
      this.sink.emit(directive);
    }
    log.info({ strategy: result.strategy, artifacts: result.artifacts.length }, "Provisioning complete");
    return result;
  }

  /**
   * Decide the dispatch strategy without probing, downloading or building
   */
  plan(): ProvisionPlan {
    const strategy = selectStrategy(this.platform, this.config.forceSource);
    const forced = this.config.forceSource;

    if (strategy === "prebuilt") {
      const expectedFileName = this.createLocator().expectedFileName(this.platform);
      return {
        platform: this.platform,
        strategy,
        forced,
        layout: this.createPrebuiltInstaller().layoutFor(expectedFileName),
        expectedFileName,
      };
    }

    const orchestrator = this.createSourceBuild();
    return {
      platform: this.platform,
      strategy,
      forced,
      layout: {
        downloadDir: this.downloadDir,
        libDir: orchestrator.libDir,
        outputDir: orchestrator.libDir,
      },
      sourceDir: orchestrator.sourceDir,
    };
  }

  /**
   * Which expected libraries are already on disk, for both strategies
   */
  async status(): Promise<ArtifactStatus[]> {
    const candidates: Array<{ strategy: DispatchStrategy; artifacts: InstalledArtifact[] }> = [
      {
        strategy: "prebuilt",
        artifacts: this.createPrebuiltInstaller().expectedArtifacts(this.config.outDir),
      },
      { strategy: "source", artifacts: this.createSourceBuild().artifacts() },
    ];

    const statuses: ArtifactStatus[] = [];
    for (const { strategy, artifacts } of candidates) {
      for (const artifact of artifacts) {
        statuses.push({ ...artifact, strategy, present: await pathExists(artifact.path) });
      }
    }
    return statuses;
  }

  async locate(): Promise<string> {
    return await this.createLocator().locate(this.platform);
  }

  createLocator(): RemoteArtifactLocator {
    return new RemoteArtifactLocator(this.identity, this.fetchImpl);
  }

  createPrebuiltInstaller(): PrebuiltInstaller {
    return new PrebuiltInstaller({
      identity: this.identity,
      platform: this.platform,
      downloadDir: this.downloadDir,
      outputDir: this.config.outDir,
      fetch: this.fetchImpl,
      locator: this.createLocator(),
    });
  }

  createSourceBuild(): SourceBuildOrchestrator {
    return new SourceBuildOrchestrator({
      identity: this.identity,
      platform: this.platform,
      outDir: this.config.outDir,
      manifestDir: this.config.manifestDir,
      numJobs: this.config.numJobs,
      buildToolFlags: this.config.buildToolFlags,
      runner: this.runner,
    });
  }

  private async acquire(): Promise<ProvisionResult> {
    const log = ensureLogger();

    if (!this.config.skipSystemProbe) {
      const hit = await new SystemLibraryProbe(this.identity, this.platform, this.runner).probe();
      if (hit) {
        log.info({ source: hit.source }, `Returning early because ${this.identity.name} was already found`);
        return { strategy: "system", directives: hit.directives, artifacts: [] };
      }
    }

    const strategy = selectStrategy(this.platform, this.config.forceSource);
    log.info({ strategy, forced: this.config.forceSource }, "Selected acquisition strategy");

    if (strategy === "prebuilt") {
      return await this.createPrebuiltInstaller().install();
    }

    return await this.createSourceBuild().run();
  }
}
