/**
 * Environment-driven configuration for the provisioner
 * CLI flags are applied on top as overrides
 */

import { cpus } from "node:os";
import { join, resolve } from "node:path";
import { ConfigurationError } from "../core/provision/errors.js";
import { DEFAULT_DIRECTIVE_PREFIX } from "../core/provision/linker-directives.js";
import type { Abi, Accelerator } from "../core/provision/types.js";
import type { LogFormat, LogLevel, LoggingConfig } from "./pino-logger.js";

export interface ProvisionConfig {
  forceSource: boolean;
  /** cache override; falls back to outDir */
  downloadDir?: string;
  buildToolFlags: string[];
  accelerator: Accelerator;
  /** unset means "derive from the host platform" */
  abi?: Abi;
  skipSystemProbe: boolean;
  directivePrefix: string;
  outDir: string;
  manifestDir: string;
  numJobs: number;
  logging: LoggingConfig;
}

export interface ConfigOverrides {
  forceSource?: boolean;
  downloadDir?: string;
  accelerator?: Accelerator;
  abi?: Abi;
  skipSystemProbe?: boolean;
  outDir?: string;
  manifestDir?: string;
  logLevel?: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function getEnvVar(env: NodeJS.ProcessEnv, key: string, defaultValue?: string): string {
  const value = env[key];
  if (value === undefined || value === "") {
    if (defaultValue === undefined) {
      throw new ConfigurationError(`Required environment variable ${key} is not set`);
    }
    return defaultValue;
  }
  return value;
}

function getEnvNumber(env: NodeJS.ProcessEnv, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new ConfigurationError(`Environment variable ${key} must be a positive number`);
  }
  return parsed;
}

function getEnvBoolean(env: NodeJS.ProcessEnv, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  return value.toLowerCase() === "true";
}

function getEnvChoice<T extends string>(
  env: NodeJS.ProcessEnv,
  key: string,
  choices: readonly T[],
): T | undefined {
  const value = env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  const match = choices.find((choice) => choice === value.toLowerCase());
  if (!match) {
    throw new ConfigurationError(`Environment variable ${key} must be one of: ${choices.join(", ")}`);
  }
  return match;
}

/**
 * Split extra build tool flags on whitespace; no quoting is honoured
 */
export function splitFlags(value: string): string[] {
  return value.split(/\s+/).filter(Boolean);
}

export function loadProvisionConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): ProvisionConfig {
  const manifestDir = resolve(overrides.manifestDir ?? getEnvVar(env, "MANIFEST_DIR", process.cwd()));
  const outDir = resolve(
    overrides.outDir ?? getEnvVar(env, "OUT_DIR", join(manifestDir, "target", "tf-provision")),
  );
  const downloadDir = overrides.downloadDir ?? env["TF_DOWNLOAD_DIR"];

  const format: LogFormat =
    getEnvChoice<LogFormat>(env, "TF_PROVISION_LOG_FORMAT", ["json", "pretty"]) ?? "json";

  return {
    forceSource: overrides.forceSource ?? getEnvBoolean(env, "TF_BUILD_FROM_SRC", false),
    downloadDir: downloadDir ? resolve(downloadDir) : undefined,
    buildToolFlags: splitFlags(getEnvVar(env, "TF_BAZEL_OPTS", "")),
    accelerator:
      overrides.accelerator ??
      getEnvChoice<Accelerator>(env, "TF_ACCELERATOR", ["cpu", "gpu"]) ??
      "cpu",
    abi: overrides.abi ?? getEnvChoice<Abi>(env, "TF_TARGET_ABI", ["gnu", "msvc"]),
    skipSystemProbe: overrides.skipSystemProbe ?? getEnvBoolean(env, "TF_SKIP_SYSTEM_PROBE", false),
    directivePrefix: getEnvVar(env, "TF_DIRECTIVE_PREFIX", DEFAULT_DIRECTIVE_PREFIX),
    outDir,
    manifestDir,
    numJobs: getEnvNumber(env, "NUM_JOBS", Math.max(1, cpus().length)),
    logging: {
      level: overrides.logLevel ?? getEnvChoice(env, "TF_PROVISION_LOG_LEVEL", LOG_LEVELS) ?? "info",
      format,
    },
  };
}
