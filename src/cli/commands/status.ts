/**
 * status command - Show pending config changes
 */

import chalk from "chalk";
import { createLogger } from "../../utils/logger.js";
import { openProjectConfig, type GlobalOptions } from "../settings.js";
import { printHeading, printSummary } from "./format.js";

const logger = createLogger("status");

export interface StatusOptions extends GlobalOptions {
  verbose?: boolean;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  logger.info({ options }, "Checking status");

  const config = await openProjectConfig(options);

  printHeading("Project Config Status");
  console.log(`  Root file:  ${chalk.dim(config.rootFile)}`);
  console.log(`  Files:      ${config.useConfigFile ? "enabled" : chalk.yellow("disabled")}`);

  const pending = await config.isUpdatePending();
  console.log();

  if (!pending && !options.verbose) {
    console.log(chalk.green("  Stored config is up to date"));
    return;
  }

  if (options.verbose) {
    const changes = await config.getPendingChanges();
    for (const category of ["removed", "changed", "added"] as const) {
      for (const changePath of changes[category]) {
        console.log(`  ${chalk.dim(category.padEnd(8))} ${changePath}`);
      }
    }
    if (changes.removed.length + changes.changed.length + changes.added.length === 0) {
      console.log(chalk.green("  Stored config is up to date"));
    }
    return;
  }

  console.log(chalk.yellow("  Pending changes found"));
  printSummary(await config.getPendingChangeSummary());
  console.log();
  console.log(chalk.dim("  Run"), chalk.white("projconfig apply"), chalk.dim("to apply them."));
}
