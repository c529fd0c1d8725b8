/**
 * Loads engine settings for the CLI from `.projconfig/settings.json`,
 * letting command-line flags override the file.
 */

import { ConfigurationError, ErrorCode } from "../core/errors.js";
import { createProjectConfig, type ProjectConfigService } from "../core/project-config/index.js";
import { readFileOrNull } from "../utils/fs.js";
import { createLogger } from "../utils/logger.js";
import { getSettingsPath } from "../utils/paths.js";
import { SettingsFileSchema, type EngineSettingsInput, type SettingsFile } from "../utils/validation.js";
import * as path from "node:path";

const logger = createLogger("settings");

export interface GlobalOptions {
  root: string;
  configDir?: string;
}

export async function readSettingsFile(rootDir: string): Promise<SettingsFile> {
  const settingsPath = getSettingsPath(rootDir);
  const contents = await readFileOrNull(settingsPath);
  if (contents === null) {
    logger.debug({ settingsPath }, "No settings file, using defaults");
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`Settings file ${settingsPath} is not valid JSON`, ErrorCode.CONFIG_INVALID, {
      settingsPath,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const result = SettingsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Settings file ${settingsPath} is invalid: ${result.error.issues.map((issue) => issue.message).join("; ")}`,
      ErrorCode.CONFIG_SETTINGS_INVALID,
      { settingsPath, issues: result.error.issues }
    );
  }
  return result.data;
}

export async function loadSettings(options: GlobalOptions): Promise<EngineSettingsInput> {
  const rootDir = path.resolve(options.root);
  const fromFile = await readSettingsFile(rootDir);

  return {
    ...fromFile,
    rootDir,
    ...(options.configDir ? { configDir: options.configDir } : {}),
  };
}

export async function openProjectConfig(options: GlobalOptions): Promise<ProjectConfigService> {
  return createProjectConfig(await loadSettings(options));
}
