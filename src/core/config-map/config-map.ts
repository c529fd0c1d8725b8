/**
 * Config Map
 *
 * Routing table from top-level config node to the file that owns it, so a
 * write lands in the right document without re-scanning every import.
 *
 * @module
 */

import type { IRecordStore } from "../interfaces/IRecordStore.js";
import type { ConfigTree } from "../../types/index.js";
import { ConfigMapSchema, parsePayload, type ConfigMapData } from "../../utils/validation.js";
import { IMPORTS_KEY } from "../imports/import-resolver.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("config-map");

export class ConfigMap {
  private nodes: ConfigMapData | null = null;
  private dirty = false;

  constructor(private readonly store: IRecordStore) {}

  /**
   * Loads the persisted map on first use. An unreadable payload counts as an
   * empty map; it is rebuilt on the next full pass.
   */
  async hydrate(): Promise<ConfigMapData> {
    if (this.nodes !== null) return this.nodes;

    const payload = await this.store.loadConfigMap();
    if (payload === null) {
      this.nodes = {};
      return this.nodes;
    }

    try {
      this.nodes = parsePayload(ConfigMapSchema, payload, "config map");
    } catch (error) {
      logger.warn({ err: error }, "Discarding unreadable config map");
      this.nodes = {};
    }
    return this.nodes;
  }

  /**
   * Records (or overwrites) the owning file of a top-level node
   */
  async mapNode(node: string, file: string): Promise<void> {
    const nodes = await this.hydrate();
    nodes[node] = file;
    this.dirty = true;
  }

  /**
   * Owning file of a node, or `defaultFile` when it is unmapped
   */
  async resolve(node: string, defaultFile: string): Promise<string> {
    const nodes = await this.hydrate();
    return nodes[node] ?? defaultFile;
  }

  async isMapped(node: string): Promise<boolean> {
    const nodes = await this.hydrate();
    return Object.prototype.hasOwnProperty.call(nodes, node);
  }

  /**
   * Rebuilds the whole map from the file list. Later files win on
   * conflicting top-level keys; the imports key is never mapped.
   */
  regenerate(files: readonly string[], documents: ReadonlyMap<string, ConfigTree>): ConfigMapData {
    const nodes: ConfigMapData = {};
    for (const file of files) {
      const document = documents.get(file);
      if (!document) continue;
      for (const key of Object.keys(document)) {
        nodes[key] = file;
      }
    }
    delete nodes[IMPORTS_KEY];

    this.nodes = nodes;
    this.dirty = true;
    return nodes;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  toJSON(): ConfigMapData {
    return { ...(this.nodes ?? {}) };
  }

  /**
   * Writes the map to the record store and clears the dirty flag
   */
  async persist(): Promise<void> {
    const nodes = await this.hydrate();
    await this.store.saveConfigMap(JSON.stringify(nodes));
    this.dirty = false;
  }
}
