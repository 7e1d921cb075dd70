/**
 * Types for native library provisioning
 */

export type Abi = "gnu" | "msvc";

export type Accelerator = "cpu" | "gpu";

/**
 * Host platform, derived once at startup and read-only afterwards.
 * `os` is "linux" | "macos" | "windows" for supported hosts and the raw
 * Node platform name otherwise; `arch` uses toolchain names ("x86_64").
 */
export interface PlatformDescriptor {
  readonly os: string;
  readonly arch: string;
  readonly abi: Abi;
  readonly accelerator: Accelerator;
}

/**
 * Fixed identity of the library being provisioned
 */
export interface LibraryIdentity {
  readonly name: string;
  readonly frameworkName: string;
  /** bazel target, without the shared-library suffix */
  readonly target: string;
  readonly frameworkTarget: string;
  readonly repository: string;
  /** git tag; not always `v` + release version */
  readonly tag: string;
  readonly minBuildToolVersion: string;
  readonly listingUrl: string;
  readonly archivePrefix: string;
  /** only zip entries under this prefix are extracted */
  readonly zipEntryPrefix: string;
}

export const DEFAULT_LIBRARY_IDENTITY: LibraryIdentity = Object.freeze({
  name: "tensorflow",
  frameworkName: "tensorflow_framework",
  target: "tensorflow:libtensorflow",
  frameworkTarget: "tensorflow:libtensorflow_framework",
  repository: "https://github.com/tensorflow/tensorflow.git",
  tag: "v2.2.0",
  minBuildToolVersion: "0.5.4",
  listingUrl: "https://storage.googleapis.com/libtensorflow-nightly",
  archivePrefix: "libtensorflow",
  zipEntryPrefix: "lib",
});

export const PREBUILT_ARCH = "x86_64";

export const PREBUILT_OPERATING_SYSTEMS = ["linux", "macos", "windows"] as const;

/**
 * One object in a remote bucket listing. `generation` is an opaque ordering
 * key the store assigns monotonically; it is not a timestamp.
 */
export interface RemoteObject {
  key: string;
  generation: bigint;
}

export type RemoteObjectIndex = RemoteObject[];

/**
 * Where a strategy keeps its files. Directories are created on first use.
 */
export interface CacheLayout {
  /** archives and their unpacked trees */
  downloadDir: string;
  /** directory the libraries are taken from */
  libDir: string;
  /** directory handed to the linker */
  outputDir: string;
}

export type ArtifactRole = "primary" | "framework";

export interface InstalledArtifact {
  path: string;
  role: ArtifactRole;
}

export type LinkerDirective =
  | { kind: "link-lib"; linkage: "dylib"; name: string }
  | { kind: "link-search"; path: string };

export type AcquisitionStrategy = "system" | "prebuilt" | "source";

export interface ProvisionResult {
  strategy: AcquisitionStrategy;
  directives: LinkerDirective[];
  artifacts: InstalledArtifact[];
}
