/**
 * File System Utilities
 * Thin async wrappers used by the file-backed collaborators
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fsPromises.mkdir(dirPath, { recursive: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "EEXIST") {
      throw error;
    }
  }
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads a UTF-8 file, returning null when it does not exist
 */
export async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fsPromises.readFile(filePath, { encoding: "utf-8" });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Last modification time in milliseconds since epoch, or null when missing
 */
export async function getLastModified(filePath: string): Promise<number | null> {
  try {
    const stats = await fsPromises.stat(filePath);
    return stats.mtimeMs;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Write content to a file, creating parent directories if needed
 */
export async function writeFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, content);
}

/**
 * Whether `candidate` resolves to a location inside `root` (or is `root` itself)
 */
export function isPathContained(root: string, candidate: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(candidate));
  if (relative === "") return true;
  if (relative === ".." || relative.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(relative);
}
