/**
 * System probe: is the library already installed where the linker can find
 * it? A miss is a normal outcome (returns null), never an error.
 */

import { delimiter, join } from "node:path";
import { importLibraryFileName } from "../../shared/binary-utils.js";
import { getLogger } from "../../shared/pino-logger.js";
import type { ProcessRunner } from "../../shared/process-runner.js";
import { SubprocessFailedError } from "./errors.js";
import { pathExists } from "./fs-utils.js";
import { linkLib, linkSearch } from "./linker-directives.js";
import type { LibraryIdentity, LinkerDirective, PlatformDescriptor } from "./types.js";

// Looked up on every call: initializeLogging may replace the root logger
function ensureLogger() {
  return getLogger("system-probe");
}

export interface ProbeHit {
  source: "search-path" | "pkg-config";
  directives: LinkerDirective[];
}

/**
 * Turn `pkg-config --libs` output into directives: `-L<dir>` becomes a
 * search path, `-l<name>` a dynamic link. Other flags are ignored.
 */
export function parsePkgConfigLibs(output: string): LinkerDirective[] {
  const directives: LinkerDirective[] = [];
  for (const token of output.trim().split(/\s+/)) {
    if (token.startsWith("-L") && token.length > 2) {
      directives.push(linkSearch(token.slice(2)));
    } else if (token.startsWith("-l") && token.length > 2) {
      directives.push(linkLib(token.slice(2)));
    }
  }
  return directives;
}

export class SystemLibraryProbe {
  constructor(
    private readonly identity: LibraryIdentity,
    private readonly platform: PlatformDescriptor,
    private readonly runner: ProcessRunner,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async probe(): Promise<ProbeHit | null> {
    if (this.platform.abi === "msvc") {
      const hit = await this.probeSearchPath();
      if (hit) return hit;
    }
    return await this.probePkgConfig();
  }

  /**
   * MSVC only: look for `<name>.lib` in each PATH entry
   */
  async probeSearchPath(): Promise<ProbeHit | null> {
    const fileName = importLibraryFileName(this.identity.name);
    const separator = this.platform.os === "windows" ? ";" : delimiter;
    const entries = (this.env["PATH"] ?? this.env["Path"] ?? "").split(separator).filter(Boolean);

    for (const dir of entries) {
      if (await pathExists(join(dir, fileName))) {
        ensureLogger().info({ dir, fileName }, "Found import library on PATH");
        return {
          source: "search-path",
          directives: [linkLib(this.identity.name), linkSearch(dir)],
        };
      }
    }
    return null;
  }

  async probePkgConfig(): Promise<ProbeHit | null> {
    let output: string;
    try {
      output = await this.runner.output("pkg-config", (command) =>
        command.arg("--libs").arg(this.identity.name),
      );
    } catch (error) {
      if (error instanceof SubprocessFailedError) {
        ensureLogger().debug({ error: error.message }, "pkg-config did not find the library");
        return null;
      }
      throw error;
    }

    const directives = parsePkgConfigLibs(output);
    if (!directives.some((directive) => directive.kind === "link-lib")) {
      ensureLogger().debug({ output }, "pkg-config returned no libraries");
      return null;
    }

    ensureLogger().info({ directives }, "Found library via pkg-config");
    return { source: "pkg-config", directives };
  }
}
