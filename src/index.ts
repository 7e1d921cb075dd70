/**
 * tf-native-provisioner public API
 */

export {
  ArchiveCorruptError,
  ArtifactNotFoundError,
  ConfigurationError,
  DownloadFailedError,
  FilesystemError,
  ProvisionError,
  SubprocessFailedError,
  UnsupportedToolVersionError,
  VersionParseError,
} from "./core/provision/errors.js";
export type { ProvisionErrorCode, ProvisionStage } from "./core/provision/errors.js";
export { createArchiveExtractor, TarGzExtractor, ZipExtractor } from "./core/provision/archive-extractor.js";
export type { ArchiveExtractor, ArchiveKind } from "./core/provision/archive-extractor.js";
export { parseBucketListing, RemoteArtifactLocator, selectNewest } from "./core/provision/artifact-locator.js";
export type { FetchFn } from "./core/provision/artifact-locator.js";
export {
  CollectingDirectiveSink,
  DEFAULT_DIRECTIVE_PREFIX,
  formatDiagnostic,
  formatDirective,
  StreamDirectiveSink,
} from "./core/provision/linker-directives.js";
export type { DirectiveSink } from "./core/provision/linker-directives.js";
export { describePlatform, detectPlatform } from "./core/provision/platform.js";
export type { PlatformOptions } from "./core/provision/platform.js";
export { PrebuiltInstaller } from "./core/provision/prebuilt-installer.js";
export { SourceBuildOrchestrator } from "./core/provision/source-build-orchestrator.js";
export type { SourceBuildResult, SourceBuildState } from "./core/provision/source-build-orchestrator.js";
export { NativeLibraryProvisioner, selectStrategy } from "./core/provision/strategy-selector.js";
export type {
  ArtifactStatus,
  DispatchStrategy,
  ProvisionerDependencies,
  ProvisionPlan,
} from "./core/provision/strategy-selector.js";
export { parsePkgConfigLibs, SystemLibraryProbe } from "./core/provision/system-probe.js";
export { DEFAULT_LIBRARY_IDENTITY } from "./core/provision/types.js";
export type {
  AcquisitionStrategy,
  InstalledArtifact,
  LibraryIdentity,
  LinkerDirective,
  PlatformDescriptor,
  ProvisionResult,
} from "./core/provision/types.js";
export { checkToolVersion, compareVersions, parseToolVersion } from "./core/provision/version-comparator.js";
export { loadProvisionConfig } from "./shared/config.js";
export type { ConfigOverrides, ProvisionConfig } from "./shared/config.js";
export { NodeProcessRunner } from "./shared/process-runner.js";
export type { ProcessRunner } from "./shared/process-runner.js";
