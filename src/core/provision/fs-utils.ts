/**
 * Filesystem helpers that report failures as FilesystemError
 */

import { access, copyFile, mkdir, readdir, rename, rm, writeFile } from "node:fs/promises";
import { FilesystemError, toError } from "./errors.js";

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function allExist(paths: readonly string[]): Promise<boolean> {
  for (const path of paths) {
    if (!(await pathExists(path))) {
      return false;
    }
  }
  return true;
}

/**
 * Create a directory and its parents; an existing directory is fine
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch (error) {
    throw new FilesystemError("create directory", path, toError(error));
  }
}

/**
 * Copy `source` over `destination`, removing any existing file first
 * (replace, never merge)
 */
export async function replaceFile(source: string, destination: string): Promise<void> {
  if (await pathExists(destination)) {
    try {
      await rm(destination, { force: true });
    } catch (error) {
      throw new FilesystemError("remove file", destination, toError(error));
    }
  }

  try {
    await copyFile(source, destination);
  } catch (error) {
    throw new FilesystemError(`copy from ${source}`, destination, toError(error));
  }
}

export async function writeFileChecked(path: string, data: Uint8Array | string): Promise<void> {
  try {
    await writeFile(path, data);
  } catch (error) {
    throw new FilesystemError("write file", path, toError(error));
  }
}

export async function renameChecked(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    throw new FilesystemError(`rename from ${from}`, to, toError(error));
  }
}

/**
 * Names of the regular files (or links to them) directly inside `dir`
 */
export async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() || entry.isSymbolicLink())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    throw new FilesystemError("read directory", dir, toError(error));
  }
}
