/**
 * get command - Print a config value
 */

import chalk from "chalk";
import { openProjectConfig, type GlobalOptions } from "../settings.js";
import { YamlDocumentParser } from "../../core/parser/yaml-parser.js";
import { isConfigTree } from "../../core/tree/path-tree.js";

export interface GetOptions extends GlobalOptions {
  desired?: boolean;
  json?: boolean;
}

export async function getCommand(configPath: string, options: GetOptions): Promise<void> {
  const config = await openProjectConfig(options);
  const value = await config.get(configPath, options.desired ?? false);

  if (options.json) {
    console.log(JSON.stringify(value, null, 2));
    return;
  }

  if (value === null) {
    console.log(chalk.dim(`${configPath} is not set`));
    return;
  }

  if (isConfigTree(value)) {
    process.stdout.write(new YamlDocumentParser().serialize(value));
    return;
  }

  console.log(Array.isArray(value) ? JSON.stringify(value) : String(value));
}
