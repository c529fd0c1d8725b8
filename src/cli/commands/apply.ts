/**
 * apply command - Apply pending config changes and persist the result
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/logger.js";
import { openProjectConfig, type GlobalOptions } from "../settings.js";
import { formatDuration, formatEventKind, printHeading } from "./format.js";

const logger = createLogger("apply");

export interface ApplyCommandOptions extends GlobalOptions {
  force?: boolean;
}

export async function applyCommand(options: ApplyCommandOptions): Promise<void> {
  logger.info({ options }, "Applying config changes");

  const config = await openProjectConfig(options);

  printHeading("Applying Project Config");

  const spinner = ora("Looking for pending changes...").start();
  config.events.on("config:item", ({ kind, path }) => {
    spinner.text = `${kind} ${path}`;
  });

  try {
    const result = await config.applyPendingChanges({ force: options.force });

    if (result.skipped) {
      spinner.info("No config files changed since the last run (use --force to diff anyway)");
      return;
    }

    spinner.text = "Saving...";
    const flushed = await config.flush();
    spinner.succeed(`Applied ${result.report.fired.length} changes in ${formatDuration(result.durationMs)}`);

    for (const { kind, path } of result.report.fired) {
      console.log(`  ${formatEventKind(kind)} ${path}`);
    }
    if (flushed.filesWritten.length > 0) {
      console.log();
      for (const file of flushed.filesWritten) {
        console.log(chalk.dim(`  wrote ${file}`));
      }
    }
  } catch (error) {
    spinner.fail("Failed to apply config changes");
    throw error;
  }
}
