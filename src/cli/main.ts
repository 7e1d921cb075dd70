/**
 * CLI entry: parse argv, and on a fatal error report it and exit 1
 */

import { DEFAULT_DIRECTIVE_PREFIX } from "../core/provision/linker-directives.js";
import type { ProvisionerDependencies } from "../core/provision/strategy-selector.js";
import { reportFailure } from "./context.js";
import { createProgram } from "./program.js";

export async function main(
  argv: readonly string[] = process.argv,
  dependencies: ProvisionerDependencies = {},
): Promise<void> {
  try {
    await createProgram(dependencies).parseAsync([...argv]);
  } catch (error) {
    reportFailure(error, process.env["TF_DIRECTIVE_PREFIX"] || DEFAULT_DIRECTIVE_PREFIX);
    process.exit(1);
  }
}
