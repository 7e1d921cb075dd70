/**
 * Downloader/Installer for prebuilt nightly builds
 *
 * download (skipped when the cache file exists) -> extract (skipped when the
 * expected libraries are already unpacked) -> copy lib/ into the output dir
 */

import { createWriteStream } from "node:fs";
import { rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { sharedLibraryFileName } from "../../shared/binary-utils.js";
import { getLoggerWithContext } from "../../shared/pino-logger.js";
import { type ArchiveExtractor, createArchiveExtractor } from "./archive-extractor.js";
import { type FetchFn, RemoteArtifactLocator, defaultFetch } from "./artifact-locator.js";
import { DownloadFailedError, toError } from "./errors.js";
import {
  allExist,
  ensureDir,
  listFiles,
  pathExists,
  renameChecked,
  replaceFile,
} from "./fs-utils.js";
import { linkLib, linkSearch } from "./linker-directives.js";
import type {
  CacheLayout,
  InstalledArtifact,
  LibraryIdentity,
  LinkerDirective,
  PlatformDescriptor,
  ProvisionResult,
} from "./types.js";

export interface PrebuiltInstallerOptions {
  identity: LibraryIdentity;
  platform: PlatformDescriptor;
  /** where archives are cached and unpacked */
  downloadDir: string;
  /** directory handed to the linker */
  outputDir: string;
  fetch?: FetchFn;
  locator?: RemoteArtifactLocator;
  extractor?: ArchiveExtractor;
}

/**
 * Last path segment of a URL: `https://host/a/b.tar.gz` -> `b.tar.gz`
 */
export function shortFileName(url: string): string {
  const path = new URL(url).pathname;
  return decodeURIComponent(path.slice(path.lastIndexOf("/") + 1));
}

export function stripSuffix(value: string, suffix: string): string {
  return value.endsWith(suffix) ? value.slice(0, value.length - suffix.length) : value;
}

export class PrebuiltInstaller {
  private readonly fetchImpl: FetchFn;
  private readonly locator: RemoteArtifactLocator;
  private readonly extractor: ArchiveExtractor;

  constructor(private readonly options: PrebuiltInstallerOptions) {
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.locator = options.locator ?? new RemoteArtifactLocator(options.identity, this.fetchImpl);
    this.extractor = options.extractor ?? createArchiveExtractor(options.platform, options.identity);
  }

  /**
   * Expected shared libraries inside an unpacked lib/ directory.
   * There is no framework library on the MSVC ABI.
   */
  expectedArtifacts(libDir: string): InstalledArtifact[] {
    const { identity, platform } = this.options;
    const artifacts: InstalledArtifact[] = [];
    if (platform.abi !== "msvc") {
      artifacts.push({
        path: join(libDir, sharedLibraryFileName(platform.os, identity.frameworkName)),
        role: "framework",
      });
    }
    artifacts.push({
      path: join(libDir, sharedLibraryFileName(platform.os, identity.name)),
      role: "primary",
    });
    return artifacts;
  }

  /**
   * Cache layout for an archive file name such as `libtensorflow-cpu-linux-x86_64.tar.gz`
   */
  layoutFor(fileName: string): CacheLayout {
    const { downloadDir, outputDir } = this.options;
    const baseName = stripSuffix(fileName, this.extractor.extension);
    return { downloadDir, libDir: join(downloadDir, baseName, "lib"), outputDir };
  }

  async install(): Promise<ProvisionResult> {
    const url = await this.locator.locate(this.options.platform);
    return await this.installFromUrl(url);
  }

  async installFromUrl(url: string): Promise<ProvisionResult> {
    const { identity, platform } = this.options;
    const log = getLoggerWithContext("prebuilt-installer", { url });

    const fileName = shortFileName(url);
    const { downloadDir, libDir, outputDir } = this.layoutFor(fileName);

    await ensureDir(downloadDir);
    const archivePath = join(downloadDir, fileName);
    await this.download(url, archivePath);

    const unpackedDir = dirname(libDir);
    const expected = this.expectedArtifacts(libDir);

    if (await allExist(expected.map((artifact) => artifact.path))) {
      log.info({ libDir }, "Libraries already extracted, skipping extraction");
    } else {
      await this.extractor.extract(archivePath, unpackedDir);
    }

    await ensureDir(outputDir);
    for (const file of await listFiles(libDir)) {
      const destination = join(outputDir, file);
      log.debug({ from: join(libDir, file), to: destination }, "Copying library");
      await replaceFile(join(libDir, file), destination);
    }

    const directives: LinkerDirective[] = [];
    if (platform.abi !== "msvc") {
      directives.push(linkLib(identity.frameworkName));
    }
    directives.push(linkLib(identity.name), linkSearch(outputDir));

    return {
      strategy: "prebuilt",
      directives,
      artifacts: expected.map((artifact) => ({
        path: join(outputDir, basename(artifact.path)),
        role: artifact.role,
      })),
    };
  }

  /**
   * Fetch `url` into `target` unless it already exists. Existence is the
   * only cache check; the body lands in `<target>.part` first so a failed
   * transfer never leaves a file behind that looks complete.
   *
   * @returns whether a network fetch happened
   */
  async download(url: string, target: string): Promise<boolean> {
    const log = getLoggerWithContext("prebuilt-installer", { url });
    if (await pathExists(target)) {
      log.info({ target }, "Archive already downloaded");
      return false;
    }

    log.info({ target }, "Downloading prebuilt archive");
    const fetchImpl = this.fetchImpl;

    let response: Response;
    try {
      response = await fetchImpl(url);
    } catch (error) {
      throw new DownloadFailedError(`Failed to download ${url}`, url, { cause: toError(error) });
    }

    if (response.status !== 200) {
      throw new DownloadFailedError(`Unexpected response code ${response.status} for ${url}`, url, {
        status: response.status,
      });
    }

    const body = response.body;
    if (!body) {
      throw new DownloadFailedError(`Empty response body for ${url}`, url, {
        status: response.status,
      });
    }

    const partial = `${target}.part`;
    await ensureDir(dirname(target));
    try {
      await pipeline(Readable.fromWeb(body), createWriteStream(partial));
    } catch (error) {
      await rm(partial, { force: true });
      throw new DownloadFailedError(`Transfer of ${url} was interrupted`, url, {
        cause: toError(error),
      });
    }
    await renameChecked(partial, target);
    log.info({ target }, "Download complete");
    return true;
  }
}
