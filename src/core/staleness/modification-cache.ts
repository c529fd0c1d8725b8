/**
 * Modification Cache
 *
 * Remembers the modification time of every config file seen by the last
 * pass. If no file changed since, the diff can be skipped. The cache is
 * advisory: callers that cannot rule out out-of-band edits should force a
 * full diff instead.
 *
 * @module
 */

import type { IFileSystem } from "../interfaces/IFileSystem.js";
import type { IStalenessCache, ModifiedTimes } from "../interfaces/IStalenessCache.js";
import { THIRTY_DAYS_MS } from "../../utils/validation.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("modification-cache");

export const MODIFIED_TIMES_CACHE_KEY = "project.config.files";

export interface ModificationCacheOptions {
  cache: IStalenessCache;
  fileSystem: IFileSystem;
  /** Default: 30 days */
  ttlMs?: number;
  /** Default: "project.config.files" */
  key?: string;
}

/**
 * Compares cached modification times against the file system.
 *
 * Stale when: nothing is cached, a listed file that exists on disk has no
 * cached time, a cached file is gone, or a file was modified after its
 * cached time.
 */
export async function areFilesModified(
  cached: ModifiedTimes | undefined,
  fileList: readonly string[],
  fileSystem: IFileSystem
): Promise<boolean> {
  if (!cached || Object.keys(cached).length === 0) {
    return true;
  }

  for (const file of fileList) {
    if (!Object.prototype.hasOwnProperty.call(cached, file) && (await fileSystem.exists(file))) {
      return true;
    }
  }

  for (const [file, modified] of Object.entries(cached)) {
    const current = await fileSystem.lastModified(file);
    if (current === null || current > modified) {
      return true;
    }
  }

  return false;
}

export class ModificationCache {
  private readonly cache: IStalenessCache;
  private readonly fileSystem: IFileSystem;
  private readonly ttlMs: number;
  private readonly key: string;

  constructor(options: ModificationCacheOptions) {
    this.cache = options.cache;
    this.fileSystem = options.fileSystem;
    this.ttlMs = options.ttlMs ?? THIRTY_DAYS_MS;
    this.key = options.key ?? MODIFIED_TIMES_CACHE_KEY;
  }

  /**
   * Whether any config file changed since the last persisted snapshot.
   * A fresh result renews the cached entry's lifetime.
   */
  async isStale(fileList: readonly string[]): Promise<boolean> {
    const cached = await this.cache.get(this.key);
    const stale = await areFilesModified(cached, fileList, this.fileSystem);

    if (!stale && cached) {
      await this.cache.set(this.key, cached, this.ttlMs);
    }

    logger.debug({ stale, fileCount: fileList.length }, "Checked config file modification times");
    return stale;
  }

  /**
   * Current modification times of the listed files; missing files are left out
   */
  async snapshot(fileList: readonly string[]): Promise<ModifiedTimes> {
    const times: ModifiedTimes = {};
    for (const file of fileList) {
      const modified = await this.fileSystem.lastModified(file);
      if (modified !== null) {
        times[file] = modified;
      }
    }
    return times;
  }

  /**
   * Snapshots the listed files and stores the result
   */
  async persist(fileList: readonly string[]): Promise<ModifiedTimes> {
    const times = await this.snapshot(fileList);
    await this.cache.set(this.key, times, this.ttlMs);
    return times;
  }
}
