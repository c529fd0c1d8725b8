/**
 * IFileSystem - File access used by the file-backed configuration
 *
 * @module
 */

export interface IFileSystem {
  exists(filePath: string): Promise<boolean>;

  /**
   * Modification time in ms since epoch, or null when the file is missing
   */
  lastModified(filePath: string): Promise<number | null>;

  /**
   * File contents, or null when the file is missing
   */
  read(filePath: string): Promise<string | null>;

  /**
   * Writes a file, creating parent directories as needed
   */
  write(filePath: string, contents: string): Promise<void>;

  /**
   * Whether `candidate` stays inside `root`
   */
  isContained(root: string, candidate: string): boolean;
}
