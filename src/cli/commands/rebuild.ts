/**
 * rebuild command - Rewrite the root config file from the stored snapshot
 */

import chalk from "chalk";
import { createLogger } from "../../utils/logger.js";
import { openProjectConfig, type GlobalOptions } from "../settings.js";

const logger = createLogger("rebuild");

export async function rebuildCommand(options: GlobalOptions): Promise<void> {
  logger.info({ options }, "Rebuilding root config file");

  const config = await openProjectConfig(options);
  if (!config.useConfigFile) {
    console.log(chalk.yellow("Config files are disabled; nothing to rebuild."));
    return;
  }

  await config.regenerateConfigFileFromStoredConfig();
  await config.flush();

  console.log(chalk.green(`Rebuilt ${config.rootFile}`));
}
