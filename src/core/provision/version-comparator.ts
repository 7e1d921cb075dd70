/**
 * Parse and gate the version reported by the external build tool
 */

import semver from "semver";
import { UnsupportedToolVersionError, VersionParseError } from "./errors.js";

export const BUILD_LABEL = "Build label:";

export interface VersionRequirement {
  minimum: string;
  observed: string;
}

/**
 * Extract the version from free-form `bazel version` output.
 *
 * Takes the first token after the label on the first line that starts with
 * it; a single trailing hyphen ("1.0.0-") is dropped before validation.
 */
export function parseToolVersion(output: string, label: string = BUILD_LABEL): string {
  const line = output.split(/\r?\n/).find((candidate) => candidate.startsWith(label));
  if (line === undefined) {
    throw new VersionParseError(`Did not find "${label}" in build tool version output`);
  }

  let token = line.slice(label.length).trim().split(/\s+/)[0] ?? "";
  if (token.endsWith("-")) {
    token = token.slice(0, -1);
  }

  const version = semver.valid(token);
  if (!version) {
    throw new VersionParseError(`"${token}" is not a valid major.minor.patch version`);
  }
  return version;
}

export function compareVersions(left: string, right: string): -1 | 0 | 1 {
  return semver.compare(left, right);
}

/**
 * @throws UnsupportedToolVersionError when the output cannot be parsed or the
 * observed version is below `minimum`
 */
export function checkToolVersion(
  output: string,
  minimum: string,
  tool = "bazel",
): VersionRequirement {
  let observed: string;
  try {
    observed = parseToolVersion(output);
  } catch (error) {
    if (error instanceof VersionParseError) {
      throw new UnsupportedToolVersionError(tool, minimum, error.message, undefined, error);
    }
    throw error;
  }

  if (compareVersions(observed, minimum) < 0) {
    throw new UnsupportedToolVersionError(
      tool,
      minimum,
      `installed version ${observed} is less than required version ${minimum}`,
      observed,
    );
  }

  return { minimum, observed };
}
