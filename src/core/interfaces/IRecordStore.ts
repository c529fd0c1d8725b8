/**
 * IRecordStore - Persistence for the stored snapshot and the config map
 *
 * Payloads are opaque serialized strings; the engine owns their format.
 *
 * @module
 */

export interface IRecordStore {
  /**
   * @returns the serialized snapshot, or null when nothing was saved yet
   */
  loadSnapshot(): Promise<string | null>;

  saveSnapshot(payload: string): Promise<void>;

  /**
   * @returns the serialized config map, or null when nothing was saved yet
   */
  loadConfigMap(): Promise<string | null>;

  saveConfigMap(payload: string): Promise<void>;
}
