/**
 * Platform detection: Node's platform/arch names mapped to the toolchain
 * names used by remote artifact naming and bazel
 */

import type { Abi, Accelerator, PlatformDescriptor } from "./types.js";

export interface PlatformOptions {
  platform?: string;
  arch?: string;
  abi?: Abi;
  accelerator?: Accelerator;
}

export function normalizeOs(platform: string): string {
  switch (platform) {
    case "darwin":
      return "macos";
    case "win32":
      return "windows";
    default:
      return platform;
  }
}

export function normalizeArch(arch: string): string {
  switch (arch) {
    case "x64":
      return "x86_64";
    case "arm64":
      return "aarch64";
    case "ia32":
      return "x86";
    default:
      return arch;
  }
}

export function detectPlatform(options: PlatformOptions = {}): PlatformDescriptor {
  const os = normalizeOs(options.platform ?? process.platform);
  const descriptor: PlatformDescriptor = {
    os,
    arch: normalizeArch(options.arch ?? process.arch),
    abi: options.abi ?? (os === "windows" ? "msvc" : "gnu"),
    accelerator: options.accelerator ?? "cpu",
  };
  return Object.freeze(descriptor);
}

/**
 * OS token in nightly artifact names; macOS builds are published as "darwin"
 */
export function remoteOsToken(os: string): string {
  return os === "macos" ? "darwin" : os;
}

export function describePlatform(platform: PlatformDescriptor): string {
  return `${platform.os}/${platform.arch} (${platform.abi}, ${platform.accelerator})`;
}
