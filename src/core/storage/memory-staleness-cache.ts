/**
 * In-process staleness cache with per-entry expiry
 *
 * Suitable for long-running processes and tests; contents do not survive a
 * restart.
 */

import type { IStalenessCache, ModifiedTimes } from "../interfaces/IStalenessCache.js";

interface CacheEntry {
  value: ModifiedTimes;
  expiresAt: number;
}

export class MemoryStalenessCache implements IStalenessCache {
  private readonly entries = new Map<string, CacheEntry>();

  async get(key: string): Promise<ModifiedTimes | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (Date.now() > entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return { ...entry.value };
  }

  async set(key: string, value: ModifiedTimes, ttlMs: number): Promise<void> {
    this.entries.set(key, { value: { ...value }, expiresAt: Date.now() + ttlMs });
  }
}
