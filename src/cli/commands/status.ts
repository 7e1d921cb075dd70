/**
 * Status command
 * Reports which expected libraries are already on disk
 */

import chalk from "chalk";
import { Command } from "commander";
import type { ProvisionerDependencies } from "../../core/provision/strategy-selector.js";
import { createContext } from "../context.js";

export function createStatusCommand(dependencies: ProvisionerDependencies = {}): Command {
  const command = new Command("status");

  command.description("Show which provisioned libraries already exist").action(async () => {
    const { provisioner } = createContext(command, dependencies);
    const statuses = await provisioner.status();

    console.log(chalk.blue("\nProvisioned libraries:\n"));
    for (const status of statuses) {
      const state = status.present ? chalk.green("✓ present") : chalk.yellow("✗ missing");
      console.log(`${chalk.bold(status.strategy.padEnd(10))} ${status.role.padEnd(10)} ${state}  ${status.path}`);
    }
    console.log("");
  });

  return command;
}
