/**
 * Plan command
 * Shows the platform, the strategy that would be used and where files go,
 * without probing, downloading or building
 */

import chalk from "chalk";
import { Command } from "commander";
import { describePlatform } from "../../core/provision/platform.js";
import type { ProvisionerDependencies } from "../../core/provision/strategy-selector.js";
import { createContext } from "../context.js";

export function createPlanCommand(dependencies: ProvisionerDependencies = {}): Command {
  const command = new Command("plan");

  command
    .description("Show which acquisition strategy would be used on this host")
    .option("--json", "Print the plan as JSON")
    .action((options: { json?: boolean }) => {
      const { provisioner } = createContext(command, dependencies);
      const plan = provisioner.plan();

      if (options.json) {
        console.log(JSON.stringify(plan, null, 2));
        return;
      }

      console.log(chalk.bold(`\n${provisioner.identity.name} acquisition plan\n`));
      console.log(`${chalk.bold("Platform:".padEnd(12))} ${describePlatform(plan.platform)}`);
      console.log(
        `${chalk.bold("Strategy:".padEnd(12))} ${chalk.green(plan.strategy)}${
          plan.forced ? chalk.yellow(" (forced)") : ""
        }`,
      );
      if (plan.expectedFileName) {
        console.log(`${chalk.bold("Artifact:".padEnd(12))} ${plan.expectedFileName}`);
      }
      if (plan.sourceDir) {
        console.log(`${chalk.bold("Sources:".padEnd(12))} ${plan.sourceDir}`);
      }
      console.log(`${chalk.bold("Cache:".padEnd(12))} ${plan.layout.downloadDir}`);
      console.log(`${chalk.bold("Libraries:".padEnd(12))} ${plan.layout.libDir}`);
      console.log(`${chalk.bold("Output:".padEnd(12))} ${plan.layout.outputDir}`);
      console.log(chalk.gray("\nA system-installed library (pkg-config) takes precedence at provision time.\n"));
    });

  return command;
}
