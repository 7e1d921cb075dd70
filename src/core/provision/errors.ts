/**
 * Error taxonomy for native library provisioning
 *
 * Every error here is fatal: nothing in the pipeline catches and retries it.
 * A negative system probe is not an error and has no class.
 */

export type ProvisionStage =
  | "config"
  | "probe"
  | "locate"
  | "download"
  | "extract"
  | "install"
  | "version-gate"
  | "subprocess"
  | "filesystem";

export type ProvisionErrorCode =
  | "CONFIGURATION"
  | "ARTIFACT_NOT_FOUND"
  | "DOWNLOAD_FAILED"
  | "ARCHIVE_CORRUPT"
  | "UNSUPPORTED_TOOL_VERSION"
  | "VERSION_PARSE"
  | "SUBPROCESS_FAILED"
  | "FILESYSTEM";

export class ProvisionError extends Error {
  public readonly code: ProvisionErrorCode;
  public readonly stage: ProvisionStage;
  public override readonly cause?: Error;

  constructor(message: string, code: ProvisionErrorCode, stage: ProvisionStage, cause?: Error) {
    super(message);
    this.name = "ProvisionError";
    this.code = code;
    this.stage = stage;
    this.cause = cause;
  }
}

export class ConfigurationError extends ProvisionError {
  constructor(message: string) {
    super(message, "CONFIGURATION", "config");
    this.name = "ConfigurationError";
  }
}

export class ArtifactNotFoundError extends ProvisionError {
  constructor(
    public readonly expectedFileName: string,
    public readonly listingUrl: string,
  ) {
    super(
      `Unable to find a prebuilt build matching ${expectedFileName} in ${listingUrl}`,
      "ARTIFACT_NOT_FOUND",
      "locate",
    );
    this.name = "ArtifactNotFoundError";
  }
}

export class DownloadFailedError extends ProvisionError {
  public readonly url: string;
  public readonly status?: number;

  constructor(
    message: string,
    url: string,
    options: { stage?: ProvisionStage; status?: number; cause?: Error } = {},
  ) {
    super(message, "DOWNLOAD_FAILED", options.stage ?? "download", options.cause);
    this.name = "DownloadFailedError";
    this.url = url;
    this.status = options.status;
  }
}

export class ArchiveCorruptError extends ProvisionError {
  constructor(
    public readonly archivePath: string,
    reason: string,
    cause?: Error,
  ) {
    super(`Unable to extract ${archivePath}: ${reason}`, "ARCHIVE_CORRUPT", "extract", cause);
    this.name = "ArchiveCorruptError";
  }
}

export class VersionParseError extends ProvisionError {
  constructor(message: string) {
    super(message, "VERSION_PARSE", "version-gate");
    this.name = "VersionParseError";
  }
}

export class UnsupportedToolVersionError extends ProvisionError {
  constructor(
    public readonly tool: string,
    public readonly minimum: string,
    reason: string,
    public readonly observed?: string,
    cause?: Error,
  ) {
    super(
      `${tool} must be installed at version ${minimum} or greater (${reason})`,
      "UNSUPPORTED_TOOL_VERSION",
      "version-gate",
      cause,
    );
    this.name = "UnsupportedToolVersionError";
  }
}

export class SubprocessFailedError extends ProvisionError {
  constructor(
    public readonly commandLine: string,
    public readonly exitCode: number | null,
    cause?: Error,
  ) {
    const detail =
      exitCode === null
        ? cause
          ? `: ${cause.message}`
          : ""
        : ` (exit status ${exitCode})`;
    super(`failed to execute ${commandLine}${detail}`, "SUBPROCESS_FAILED", "subprocess", cause);
    this.name = "SubprocessFailedError";
  }
}

export class FilesystemError extends ProvisionError {
  constructor(
    public readonly operation: string,
    public readonly path: string,
    cause?: Error,
  ) {
    super(
      `${operation} failed for ${path}${cause ? `: ${cause.message}` : ""}`,
      "FILESYSTEM",
      "filesystem",
      cause,
    );
    this.name = "FilesystemError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
