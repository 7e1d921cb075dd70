/**
 * Archive Extractor Tests
 * Real tarballs and zips built in-process under a temp workspace
 */

import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  TarGzExtractor,
  ZipExtractor,
  archiveKind,
  createArchiveExtractor,
} from "../../src/core/provision/archive-extractor.js";
import { ArchiveCorruptError } from "../../src/core/provision/errors.js";
import { pathExists } from "../../src/core/provision/fs-utils.js";
import {
  LINUX_X64,
  TEST_IDENTITY,
  WINDOWS_X64,
  createTarballFixture,
  createTempWorkspace,
  removeTempWorkspace,
  writeZipFixture,
  writeZipWithRawEntryName,
} from "../utils/test-infrastructure.js";

describe("archive extraction", () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
  });

  afterEach(async () => {
    await removeTempWorkspace(workspace);
  });

  describe("TarGzExtractor", () => {
    it("should unpack every entry of a gzip tarball", async () => {
      const archive = join(workspace, "libtensorflow-cpu-linux-x86_64.tar.gz");
      await writeFile(
        archive,
        await createTarballFixture(workspace, {
          "lib/libtensorflow.so": "primary",
          "lib/libtensorflow_framework.so": "framework",
          "include/tensorflow/c/c_api.h": "header",
        }),
      );

      const destination = join(workspace, "unpacked");
      await new TarGzExtractor().extract(archive, destination);

      expect(await readFile(join(destination, "lib", "libtensorflow.so"), "utf8")).toBe("primary");
      expect(await readFile(join(destination, "lib", "libtensorflow_framework.so"), "utf8")).toBe("framework");
      expect(await pathExists(join(destination, "include", "tensorflow", "c", "c_api.h"))).toBe(true);
    });

    it("should report an unreadable tarball as ArchiveCorruptError", async () => {
      const archive = join(workspace, "broken.tar.gz");
      await writeFile(archive, "this is not an archive\n".repeat(100));

      await expect(new TarGzExtractor().extract(archive, join(workspace, "out"))).rejects.toBeInstanceOf(
        ArchiveCorruptError,
      );
    });
  });

  describe("ZipExtractor", () => {
    it("should only extract entries under the configured prefix", async () => {
      const archive = join(workspace, "libtensorflow-cpu-windows-x86_64.zip");
      writeZipFixture(archive, {
        "lib/tensorflow.dll": "dll",
        "lib/tensorflow.lib": "import",
        "include/tensorflow/c/c_api.h": "header",
        "LICENSE": "license",
      });

      const destination = join(workspace, "unpacked");
      await new ZipExtractor("lib").extract(archive, destination);

      expect(await readFile(join(destination, "lib", "tensorflow.dll"), "utf8")).toBe("dll");
      expect(await readFile(join(destination, "lib", "tensorflow.lib"), "utf8")).toBe("import");
      expect(await pathExists(join(destination, "include"))).toBe(false);
      expect(await pathExists(join(destination, "LICENSE"))).toBe(false);
    });

    it("should reject an entry that resolves outside the destination", async () => {
      const archive = join(workspace, "escape.zip");
      writeZipWithRawEntryName(archive, "lib/../../x.dll", "payload");
      const destination = join(workspace, "nested", "unpacked");

      const pending = new ZipExtractor("lib").extract(archive, destination);

      await expect(pending).rejects.toBeInstanceOf(ArchiveCorruptError);
      await expect(pending).rejects.toThrow(`entry lib/../../x.dll resolves outside ${destination}`);
      expect(await pathExists(join(workspace, "nested", "x.dll"))).toBe(false);
      expect(await pathExists(join(workspace, "x.dll"))).toBe(false);
    });

    it("should report a file that is not a zip as ArchiveCorruptError", async () => {
      const archive = join(workspace, "broken.zip");
      await writeFile(archive, "definitely not a zip");

      await expect(new ZipExtractor("lib").extract(archive, join(workspace, "out"))).rejects.toThrow(
        `Unable to extract ${archive}`,
      );
    });
  });

  describe("createArchiveExtractor", () => {
    it("should use zip on the MSVC ABI and gzip tarballs elsewhere", () => {
      expect(archiveKind(WINDOWS_X64)).toBe("zip");
      expect(archiveKind(LINUX_X64)).toBe("tar.gz");
      expect(createArchiveExtractor(WINDOWS_X64, TEST_IDENTITY)).toBeInstanceOf(ZipExtractor);
      expect(createArchiveExtractor(LINUX_X64, TEST_IDENTITY).extension).toBe(".tar.gz");
    });
  });
});
