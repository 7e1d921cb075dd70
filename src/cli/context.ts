/**
 * Shared CLI plumbing: global options -> config -> provisioner, and the
 * translation of fatal errors into diagnostics
 */

import type { Command, OptionValues } from "commander";
import { ProvisionError, UnsupportedToolVersionError } from "../core/provision/errors.js";
import { formatDiagnostic } from "../core/provision/linker-directives.js";
import { detectPlatform } from "../core/provision/platform.js";
import {
  NativeLibraryProvisioner,
  type ProvisionerDependencies,
} from "../core/provision/strategy-selector.js";
import type { Abi, PlatformDescriptor } from "../core/provision/types.js";
import { type ConfigOverrides, type ProvisionConfig, loadProvisionConfig } from "../shared/config.js";
import { type LogLevel, initializeLogging } from "../shared/pino-logger.js";

export interface CliContext {
  config: ProvisionConfig;
  platform: PlatformDescriptor;
  provisioner: NativeLibraryProvisioner;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function isAbi(value: string): value is Abi {
  return value === "gnu" || value === "msvc";
}

function isLogLevel(value: string): value is LogLevel {
  return ["debug", "info", "warn", "error", "silent"].includes(value);
}

/**
 * Only flags the user actually passed become overrides; everything else
 * falls through to the environment.
 */
export function toConfigOverrides(options: OptionValues): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const outDir = optionalString(options["outDir"]);
  if (outDir) overrides.outDir = outDir;
  const manifestDir = optionalString(options["manifestDir"]);
  if (manifestDir) overrides.manifestDir = manifestDir;
  const downloadDir = optionalString(options["downloadDir"]);
  if (downloadDir) overrides.downloadDir = downloadDir;

  if (options["fromSource"] === true) overrides.forceSource = true;
  if (options["gpu"] === true) overrides.accelerator = "gpu";
  if (options["probe"] === false) overrides.skipSystemProbe = true;

  const abi = optionalString(options["abi"]);
  if (abi && isAbi(abi)) overrides.abi = abi;
  const logLevel = optionalString(options["logLevel"]);
  if (logLevel && isLogLevel(logLevel)) overrides.logLevel = logLevel;

  return overrides;
}

export function createContext(
  command: Command,
  dependencies: ProvisionerDependencies = {},
  env: NodeJS.ProcessEnv = process.env,
): CliContext {
  const config = loadProvisionConfig(env, toConfigOverrides(command.optsWithGlobals()));
  initializeLogging(config.logging);

  const platform = detectPlatform({ abi: config.abi, accelerator: config.accelerator });
  const provisioner = new NativeLibraryProvisioner(config, platform, dependencies);
  return { config, platform, provisioner };
}

/**
 * stderr lines (and, for a too-old build tool, the stdout diagnostic the
 * host build surfaces) describing a fatal error
 */
export function describeFailure(
  error: unknown,
  directivePrefix: string,
): { stdout: string[]; stderr: string[] } {
  if (error instanceof UnsupportedToolVersionError) {
    return {
      stdout: [formatDiagnostic(error.message, directivePrefix)],
      stderr: [`[${error.stage}] ${error.message}`],
    };
  }

  if (error instanceof ProvisionError) {
    const stderr = [`[${error.stage}] ${error.message}`];
    if (error.cause && !error.message.includes(error.cause.message)) {
      stderr.push(`  caused by: ${error.cause.message}`);
    }
    return { stdout: [], stderr };
  }

  return { stdout: [], stderr: [error instanceof Error ? error.message : String(error)] };
}

export function reportFailure(error: unknown, directivePrefix: string): void {
  const { stdout, stderr } = describeFailure(error, directivePrefix);
  for (const line of stdout) {
    process.stdout.write(`${line}\n`);
  }
  for (const line of stderr) {
    console.error(line);
  }
}
