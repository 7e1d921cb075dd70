/**
 * Root command for tf-provision
 *
 * `provision` is the default command so a host build script can call the
 * binary without arguments and read directives from stdout.
 */

import { dirname } from "node:path";
import { Command, Option } from "commander";
import { ensureDir, writeFileChecked } from "../core/provision/fs-utils.js";
import type { ProvisionerDependencies } from "../core/provision/strategy-selector.js";
import { buildConfig } from "../shared/build-config.js";
import { getLogger } from "../shared/pino-logger.js";
import { createPlanCommand } from "./commands/plan.js";
import { createStatusCommand } from "./commands/status.js";
import { createContext } from "./context.js";

function createProvisionCommand(dependencies: ProvisionerDependencies): Command {
  const command = new Command("provision");

  command
    .description("Probe, download or build the library and print linker directives")
    .option("--manifest <file>", "Also write the result as JSON to this file")
    .action(async (options: { manifest?: string }) => {
      const { provisioner } = createContext(command, dependencies);
      const result = await provisioner.provision();

      if (options.manifest) {
        await ensureDir(dirname(options.manifest));
        await writeFileChecked(options.manifest, `${JSON.stringify(result, null, 2)}\n`);
        getLogger("cli").info({ manifest: options.manifest }, "Wrote provisioning manifest");
      }
    });

  return command;
}

function createLocateCommand(dependencies: ProvisionerDependencies): Command {
  const command = new Command("locate");

  command
    .description("Print the URL of the newest prebuilt archive for this platform")
    .action(async () => {
      const { provisioner } = createContext(command, dependencies);
      console.log(await provisioner.locate());
    });

  return command;
}

export function createProgram(dependencies: ProvisionerDependencies = {}): Command {
  const program = new Command()
    .name(buildConfig.execName)
    .description(`${buildConfig.displayName} - acquire libtensorflow for a native build`)
    .version(buildConfig.version)
    .option("--out-dir <dir>", "Scratch/output directory (default: $OUT_DIR)")
    .option("--manifest-dir <dir>", "Project root; sources are cloned below it (default: $MANIFEST_DIR)")
    .option("--download-dir <dir>", "Cache directory for downloaded archives (default: $TF_DOWNLOAD_DIR)")
    .option("--from-source", "Skip prebuilt archives and build from source")
    .option("--gpu", "Use the GPU build of the library")
    .option("--no-probe", "Do not look for a system-installed library")
    .addOption(new Option("--abi <abi>", "Target ABI").choices(["gnu", "msvc"]))
    .addOption(
      new Option("--log-level <level>", "Log level").choices(["debug", "info", "warn", "error", "silent"]),
    );

  program.addCommand(createProvisionCommand(dependencies), { isDefault: true });
  program.addCommand(createPlanCommand(dependencies));
  program.addCommand(createLocateCommand(dependencies));
  program.addCommand(createStatusCommand(dependencies));

  return program;
}
