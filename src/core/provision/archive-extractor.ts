/**
 * Archive extraction for prebuilt artifacts: gzip tarballs everywhere except
 * the MSVC ABI, which ships zip files
 */

import { dirname, resolve, sep } from "node:path";
import AdmZip from "adm-zip";
import { extract as extractTar } from "tar";
import { getLogger } from "../../shared/pino-logger.js";
import { ArchiveCorruptError, toError } from "./errors.js";
import { ensureDir, writeFileChecked } from "./fs-utils.js";
import type { LibraryIdentity, PlatformDescriptor } from "./types.js";

// Looked up on every call: initializeLogging may replace the root logger
function ensureLogger() {
  return getLogger("archive-extractor");
}

export type ArchiveKind = "tar.gz" | "zip";

export interface ArchiveExtractor {
  readonly kind: ArchiveKind;
  readonly extension: string;
  extract(archivePath: string, destination: string): Promise<void>;
}

export class TarGzExtractor implements ArchiveExtractor {
  readonly kind = "tar.gz";
  readonly extension = ".tar.gz";

  async extract(archivePath: string, destination: string): Promise<void> {
    await ensureDir(destination);
    ensureLogger().info({ archivePath, destination }, "Extracting tarball");

    try {
      // strict: an unrecognised archive is an error, not a warning
      await extractTar({ file: archivePath, cwd: destination, strict: true });
    } catch (error) {
      const cause = toError(error);
      throw new ArchiveCorruptError(archivePath, cause.message, cause);
    }
  }
}

/**
 * Extracts only entries whose name starts with `entryPrefix`, so headers,
 * licences and the like are not scattered into the cache.
 */
export class ZipExtractor implements ArchiveExtractor {
  readonly kind = "zip";
  readonly extension = ".zip";

  constructor(private readonly entryPrefix: string) {}

  async extract(archivePath: string, destination: string): Promise<void> {
    let entries: ReturnType<AdmZip["getEntries"]>;
    try {
      entries = new AdmZip(archivePath).getEntries();
    } catch (error) {
      const cause = toError(error);
      throw new ArchiveCorruptError(archivePath, cause.message, cause);
    }

    await ensureDir(destination);
    const root = resolve(destination);
    let extracted = 0;

    for (const entry of entries) {
      if (!entry.entryName.startsWith(this.entryPrefix)) {
        continue;
      }

      const outputPath = resolve(root, entry.entryName);
      if (!outputPath.startsWith(`${root}${sep}`)) {
        throw new ArchiveCorruptError(
          archivePath,
          `entry ${entry.entryName} resolves outside ${destination}`,
        );
      }

      if (entry.isDirectory) {
        await ensureDir(outputPath);
        continue;
      }

      await ensureDir(dirname(outputPath));
      let data: Buffer;
      try {
        data = entry.getData();
      } catch (error) {
        const cause = toError(error);
        throw new ArchiveCorruptError(archivePath, cause.message, cause);
      }
      await writeFileChecked(outputPath, data);
      extracted++;
    }

    ensureLogger().info(
      { archivePath, destination, extracted, prefix: this.entryPrefix },
      "Extracted zip entries",
    );
  }
}

export function archiveKind(platform: PlatformDescriptor): ArchiveKind {
  return platform.abi === "msvc" ? "zip" : "tar.gz";
}

export function archiveExtension(platform: PlatformDescriptor): string {
  return archiveKind(platform) === "zip" ? ".zip" : ".tar.gz";
}

export function createArchiveExtractor(
  platform: PlatformDescriptor,
  identity: LibraryIdentity,
): ArchiveExtractor {
  return archiveKind(platform) === "zip"
    ? new ZipExtractor(identity.zipEntryPrefix)
    : new TarGzExtractor();
}
