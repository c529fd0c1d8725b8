/**
 * Node File System
 *
 * IFileSystem implementation over node:fs.
 *
 * @module
 */

import type { IFileSystem } from "../interfaces/IFileSystem.js";
import {
  fileExists,
  getLastModified,
  isPathContained,
  readFileOrNull,
  writeFile,
} from "../../utils/fs.js";

export class NodeFileSystem implements IFileSystem {
  exists(filePath: string): Promise<boolean> {
    return fileExists(filePath);
  }

  lastModified(filePath: string): Promise<number | null> {
    return getLastModified(filePath);
  }

  read(filePath: string): Promise<string | null> {
    return readFileOrNull(filePath);
  }

  write(filePath: string, contents: string): Promise<void> {
    return writeFile(filePath, contents);
  }

  isContained(root: string, candidate: string): boolean {
    return isPathContained(root, candidate);
  }
}
