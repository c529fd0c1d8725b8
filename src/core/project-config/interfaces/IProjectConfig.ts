/**
 * IProjectConfig Interface
 *
 * Path-level API over the project configuration: read and write values,
 * detect pending changes in the config files and apply them to the stored
 * snapshot while notifying subscribed handlers.
 *
 * @module
 */

import type {
  ChangeSet,
  ConfigEventHandler,
  ConfigEventKind,
  ConfigValue,
  PendingChangeSummary,
} from "../../../types/index.js";
import type { EventBus } from "../../../utils/events.js";
import type { ProjectConfigEvents } from "../../events/project-config-events.js";
import type { IDocumentParser } from "../../interfaces/IDocumentParser.js";
import type { IFileSystem } from "../../interfaces/IFileSystem.js";
import type { IRecordStore } from "../../interfaces/IRecordStore.js";
import type { IStalenessCache } from "../../interfaces/IStalenessCache.js";
import type { PassReport } from "../../reconcile/reconcile-pass.js";

// =============================================================================
// Results
// =============================================================================

export interface ApplyOptions {
  /** Diff even when no config file changed since the last pass */
  force?: boolean;
}

export interface ApplyResult {
  /** True when the pass was skipped because no config file changed */
  skipped: boolean;
  changes: ChangeSet;
  report: PassReport;
  durationMs: number;
}

export interface FlushResult {
  filesWritten: string[];
  snapshotSaved: boolean;
  configMapSaved: boolean;
  modifiedTimesSaved: boolean;
}

// =============================================================================
// Core Interface
// =============================================================================

/**
 * @example
 * ```typescript
 * const config = createProjectConfig({ rootDir: process.cwd() });
 *
 * config.onAdd("plugins.{uid}", async (event) => {
 *   await plugins.install(event.tokenMatches[0], event.newValue);
 * });
 *
 * if (await config.isUpdatePending()) {
 *   await config.applyPendingChanges();
 *   await config.flush();
 * }
 * ```
 */
export interface IProjectConfig {
  // === Values ===

  /**
   * Value at `path` in the stored snapshot, or in the config files when
   * `fromDesired` is set. Missing paths yield null.
   */
  get(path: string, fromDesired?: boolean): Promise<ConfigValue | null>;

  /**
   * Writes a value to the config files (or the in-memory desired tree when
   * files are disabled) and processes the path. `null` deletes.
   */
  save(path: string, value: ConfigValue | null): Promise<void>;

  remove(path: string): Promise<void>;

  // === Reconciliation ===

  applyPendingChanges(options?: ApplyOptions): Promise<ApplyResult>;

  isUpdatePending(): Promise<boolean>;

  getPendingChanges(): Promise<ChangeSet>;

  getPendingChangeSummary(): Promise<PendingChangeSummary>;

  /**
   * Processes a single path within the current pass
   */
  processConfigChanges(path: string): Promise<void>;

  // === Handlers ===

  subscribe<TData = void>(
    kind: ConfigEventKind,
    pattern: string,
    handler: ConfigEventHandler<TData>,
    data: TData
  ): () => void;

  onAdd<TData = void>(pattern: string, handler: ConfigEventHandler<TData>, data: TData): () => void;

  onUpdate<TData = void>(pattern: string, handler: ConfigEventHandler<TData>, data: TData): () => void;

  onRemove<TData = void>(pattern: string, handler: ConfigEventHandler<TData>, data: TData): () => void;

  // === Persistence ===

  /**
   * Rewrites the root config file from the stored snapshot
   */
  regenerateConfigFileFromStoredConfig(): Promise<void>;

  /**
   * Caches the current modification times of every config file
   */
  updateParsedConfigTimes(): Promise<void>;

  /**
   * Writes everything marked dirty since the last flush
   */
  flush(): Promise<FlushResult>;

  isDirty(): boolean;

  readonly events: EventBus<ProjectConfigEvents>;

  /** Absolute path of the root config file */
  readonly rootFile: string;
}

// =============================================================================
// Dependencies
// =============================================================================

export interface ProjectConfigDependencies {
  fileSystem: IFileSystem;
  parser: IDocumentParser;
  recordStore: IRecordStore;
  stalenessCache: IStalenessCache;
}
