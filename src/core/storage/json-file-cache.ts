/**
 * Staleness cache persisted to a JSON file, so the CLI can skip diffing
 * across invocations.
 *
 * @module
 */

import { z } from "zod";
import type { IStalenessCache, ModifiedTimes } from "../interfaces/IStalenessCache.js";
import { readFileOrNull, writeFile } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import { ModifiedTimesSchema } from "../../utils/validation.js";

const logger = createLogger("json-file-cache");

const CacheFileSchema = z.record(
  z.object({
    value: ModifiedTimesSchema,
    expiresAt: z.number(),
  })
);

type CacheFile = z.infer<typeof CacheFileSchema>;

export class JsonFileCache implements IStalenessCache {
  constructor(private readonly filePath: string) {}

  async get(key: string): Promise<ModifiedTimes | undefined> {
    const entries = await this.load();
    const entry = entries[key];
    if (!entry || entry.expiresAt <= Date.now()) {
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: ModifiedTimes, ttlMs: number): Promise<void> {
    const entries = await this.load();
    entries[key] = { value, expiresAt: Date.now() + ttlMs };
    await writeFile(this.filePath, JSON.stringify(entries, null, 2));
  }

  private async load(): Promise<CacheFile> {
    const contents = await readFileOrNull(this.filePath);
    if (contents === null) return {};

    try {
      const result = CacheFileSchema.safeParse(JSON.parse(contents));
      if (result.success) return result.data;
      logger.warn({ filePath: this.filePath }, "Ignoring cache file with unexpected shape");
    } catch (error) {
      logger.warn({ filePath: this.filePath, err: error }, "Ignoring unreadable cache file");
    }
    return {};
  }
}
