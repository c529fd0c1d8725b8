/**
 * Project directory layout
 */

import * as path from "node:path";

export const STATE_DIR = ".projconfig";
export const SETTINGS_FILE = "settings.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getStateDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, STATE_DIR);
}

export function getSettingsPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getStateDir(projectRoot), SETTINGS_FILE);
}
