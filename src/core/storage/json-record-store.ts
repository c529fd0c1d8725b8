/**
 * JSON File Record Store
 *
 * Keeps the stored snapshot and the config map as two JSON files in a data
 * directory.
 *
 * @module
 */

import * as path from "node:path";
import type { IRecordStore } from "../interfaces/IRecordStore.js";
import { readFileOrNull, writeFile } from "../../utils/fs.js";
import { ErrorCode, PersistenceError } from "../errors.js";

export const SNAPSHOT_FILE = "snapshot.json";
export const CONFIG_MAP_FILE = "config-map.json";

export class JsonFileRecordStore implements IRecordStore {
  constructor(private readonly dataDir: string) {}

  loadSnapshot(): Promise<string | null> {
    return this.read(SNAPSHOT_FILE);
  }

  saveSnapshot(payload: string): Promise<void> {
    return this.write(SNAPSHOT_FILE, payload);
  }

  loadConfigMap(): Promise<string | null> {
    return this.read(CONFIG_MAP_FILE);
  }

  saveConfigMap(payload: string): Promise<void> {
    return this.write(CONFIG_MAP_FILE, payload);
  }

  private async read(fileName: string): Promise<string | null> {
    const target = path.join(this.dataDir, fileName);
    try {
      return await readFileOrNull(target);
    } catch (error) {
      throw new PersistenceError(`Failed to read ${fileName}`, ErrorCode.PERSISTENCE_READ_FAILED, {
        target,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async write(fileName: string, payload: string): Promise<void> {
    const target = path.join(this.dataDir, fileName);
    try {
      await writeFile(target, payload);
    } catch (error) {
      throw new PersistenceError(`Failed to write ${fileName}`, ErrorCode.PERSISTENCE_WRITE_FAILED, {
        target,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
