/**
 * In-memory record store for tests and embedded use
 */

import type { IRecordStore } from "../interfaces/IRecordStore.js";

export class MemoryRecordStore implements IRecordStore {
  snapshot: string | null;
  configMap: string | null;

  constructor(initial: { snapshot?: string | null; configMap?: string | null } = {}) {
    this.snapshot = initial.snapshot ?? null;
    this.configMap = initial.configMap ?? null;
  }

  async loadSnapshot(): Promise<string | null> {
    return this.snapshot;
  }

  async saveSnapshot(payload: string): Promise<void> {
    this.snapshot = payload;
  }

  async loadConfigMap(): Promise<string | null> {
    return this.configMap;
  }

  async saveConfigMap(payload: string): Promise<void> {
    this.configMap = payload;
  }
}
