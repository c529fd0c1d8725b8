/**
 * remove command - Delete a value and apply the removal
 */

import chalk from "chalk";
import { createLogger } from "../../utils/logger.js";
import { openProjectConfig, type GlobalOptions } from "../settings.js";

const logger = createLogger("remove");

export async function removeCommand(configPath: string, options: GlobalOptions): Promise<void> {
  logger.info({ path: configPath }, "Removing config value");

  const config = await openProjectConfig(options);
  await config.remove(configPath);
  await config.flush();

  console.log(chalk.green(`Removed ${configPath}`));
}
