/**
 * set command - Write a value and apply it immediately
 */

import chalk from "chalk";
import { YamlDocumentParser } from "../../core/parser/yaml-parser.js";
import { createLogger } from "../../utils/logger.js";
import { openProjectConfig, type GlobalOptions } from "../settings.js";

const logger = createLogger("set");

export async function setCommand(configPath: string, rawValue: string, options: GlobalOptions): Promise<void> {
  // YAML syntax, so `true`, `42` and `[a, b]` keep their types
  const value = new YamlDocumentParser().parseValue(rawValue);
  logger.info({ path: configPath, value }, "Setting config value");

  const config = await openProjectConfig(options);
  await config.save(configPath, value);
  await config.flush();

  console.log(chalk.green(`Saved ${configPath}`));
}
