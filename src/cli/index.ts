#!/usr/bin/env node

/**
 * projconfig CLI
 * Inspect and apply project config changes from the command line
 */

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { statusCommand } from "./commands/status.js";
import { applyCommand } from "./commands/apply.js";
import { getCommand } from "./commands/get.js";
import { setCommand } from "./commands/set.js";
import { removeCommand } from "./commands/remove.js";
import { rebuildCommand } from "./commands/rebuild.js";
import { watchCommand } from "./commands/watch.js";
import type { GlobalOptions } from "./settings.js";
import { isProjectConfigError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return parsed;
}

const program = new Command();

program
  .name("projconfig")
  .description("Keep a project's stored config in sync with its YAML config files")
  .version("0.1.0")
  .option("-r, --root <dir>", "Project root directory", process.cwd())
  .option("-c, --config-dir <dir>", "Config directory, relative to the root")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

// =============================================================================
// Commands
// =============================================================================

program
  .command("status")
  .description("Show pending config changes")
  .option("-v, --verbose", "List every changed path instead of a summary")
  .action((options: { verbose?: boolean }) => statusCommand({ ...globals(), ...options }));

program
  .command("apply")
  .description("Apply pending config changes")
  .option("-f, --force", "Diff even when no config file changed since the last run")
  .action((options: { force?: boolean }) => applyCommand({ ...globals(), ...options }));

program
  .command("get")
  .description("Print a config value")
  .argument("<path>", "Dot-delimited config path")
  .option("-d, --desired", "Read from the config files instead of the stored config")
  .option("--json", "Print as JSON")
  .action((configPath: string, options: { desired?: boolean; json?: boolean }) =>
    getCommand(configPath, { ...globals(), ...options })
  );

program
  .command("set")
  .description("Set a config value (YAML syntax) and apply it")
  .argument("<path>", "Dot-delimited config path")
  .argument("<value>", "New value")
  .action((configPath: string, value: string) => setCommand(configPath, value, globals()));

program
  .command("remove")
  .description("Remove a config value and apply the removal")
  .argument("<path>", "Dot-delimited config path")
  .action((configPath: string) => removeCommand(configPath, globals()));

program
  .command("rebuild")
  .description("Rewrite the root config file from the stored config")
  .action(() => rebuildCommand(globals()));

program
  .command("watch")
  .description("Apply config changes whenever a config file changes")
  .option("--debounce <ms>", "Debounce interval in milliseconds", parseInteger)
  .option("--poll", "Poll for changes (network drives)")
  .action((options: { debounce?: number; poll?: boolean }) => watchCommand({ ...globals(), ...options }));

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${isProjectConfigError(error) ? error.toString() : error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
