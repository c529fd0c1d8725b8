/**
 * IStalenessCache - Expiring key/value cache for file modification times
 *
 * @module
 */

/**
 * File path to modification time (ms since epoch)
 */
export type ModifiedTimes = Record<string, number>;

export interface IStalenessCache {
  /**
   * @returns the cached value, or undefined on a miss or after expiry
   */
  get(key: string): Promise<ModifiedTimes | undefined>;

  set(key: string, value: ModifiedTimes, ttlMs: number): Promise<void>;
}
