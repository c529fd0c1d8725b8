/**
 * Project Config Service
 *
 * Owns the stored snapshot, the desired tree read from the config files
 * and the bookkeeping around them. Writes are kept in memory and marked
 * dirty until `flush()`.
 *
 * @module
 */

import * as path from "node:path";
import type {
  ChangeSet,
  ConfigEventHandler,
  ConfigEventKind,
  ConfigTree,
  ConfigValue,
  PendingChangeSummary,
} from "../../../types/index.js";
import type {
  ApplyOptions,
  ApplyResult,
  FlushResult,
  IProjectConfig,
  ProjectConfigDependencies,
} from "../interfaces/IProjectConfig.js";
import type { IDocumentParser } from "../../interfaces/IDocumentParser.js";
import type { IFileSystem } from "../../interfaces/IFileSystem.js";
import type { IRecordStore } from "../../interfaces/IRecordStore.js";
import type { EngineSettings, EngineSettingsInput } from "../../../utils/validation.js";
import { ConfigTreeSchema, parseEngineSettings, parsePayload } from "../../../utils/validation.js";
import { EventBus } from "../../../utils/events.js";
import { createLogger } from "../../../utils/logger.js";
import { ConfigMap } from "../../config-map/config-map.js";
import { DATE_MODIFIED_KEY, diffTrees, emptyChangeSet, isChangeSetEmpty } from "../../diff/diff-engine.js";
import { EventRegistry } from "../../events/event-registry.js";
import type { ProjectConfigEvents } from "../../events/project-config-events.js";
import { ImportResolver } from "../../imports/import-resolver.js";
import { YamlDocumentParser } from "../../parser/yaml-parser.js";
import { ReconcilePass } from "../../reconcile/reconcile-pass.js";
import { ModificationCache } from "../../staleness/modification-cache.js";
import { JsonFileCache } from "../../storage/json-file-cache.js";
import { JsonFileRecordStore } from "../../storage/json-record-store.js";
import { NodeFileSystem } from "../../storage/node-file-system.js";
import { cloneTree, deleteValue, getValue, pruneEmpty, setValue } from "../../tree/path-tree.js";
import { splitPath, summaryPath } from "../../tree/path.js";

const logger = createLogger("project-config");

export const MODIFIED_TIMES_FILE = "modified-times.json";

/**
 * Settings with every directory made absolute
 */
export interface ResolvedSettings extends EngineSettings {
  configDir: string;
  dataDir: string;
  rootFile: string;
}

export function resolveSettings(input: EngineSettingsInput): ResolvedSettings {
  const settings = parseEngineSettings(input);
  const rootDir = path.resolve(settings.rootDir);
  const configDir = path.resolve(rootDir, settings.configDir);

  return {
    ...settings,
    rootDir,
    configDir,
    dataDir: path.resolve(rootDir, settings.dataDir),
    rootFile: path.join(configDir, settings.configFilename),
  };
}

function unixTimestamp(): number {
  return Math.floor(Date.now() / 1000);
}

// =============================================================================
// Service
// =============================================================================

export class ProjectConfigService implements IProjectConfig {
  readonly events: EventBus<ProjectConfigEvents>;
  readonly rootFile: string;

  private readonly settings: ResolvedSettings;
  private readonly fileSystem: IFileSystem;
  private readonly parser: IDocumentParser;
  private readonly recordStore: IRecordStore;
  private readonly resolver: ImportResolver;
  private readonly configMap: ConfigMap;
  private readonly modificationCache: ModificationCache;
  private readonly registry = new EventRegistry();
  private readonly pass: ReconcilePass;

  private stored: ConfigTree | null = null;
  /** Merged config files, or the edited copy of the snapshot without files */
  private desired: ConfigTree | null = null;

  private readonly modifiedFiles = new Set<string>();
  private storedDirty = false;
  private timesDirty = false;
  private timestampUpdated = false;

  constructor(settings: ResolvedSettings, dependencies: ProjectConfigDependencies) {
    this.settings = settings;
    this.rootFile = settings.rootFile;
    this.fileSystem = dependencies.fileSystem;
    this.parser = dependencies.parser;
    this.recordStore = dependencies.recordStore;

    this.resolver = new ImportResolver({
      fileSystem: dependencies.fileSystem,
      parser: dependencies.parser,
      containmentRoot: settings.configDir,
      importPolicy: settings.importPolicy,
    });
    this.configMap = new ConfigMap(dependencies.recordStore);
    this.modificationCache = new ModificationCache({
      cache: dependencies.stalenessCache,
      fileSystem: dependencies.fileSystem,
      ttlMs: settings.cacheTtlMs,
    });

    this.events = new EventBus<ProjectConfigEvents>();
    this.pass = new ReconcilePass({
      registry: this.registry,
      events: this.events,
      state: {
        readStored: () => this.requireStored(),
        readDesired: () => this.desired ?? {},
        markStoredDirty: () => {
          this.storedDirty = true;
        },
      },
    });
  }

  get useConfigFile(): boolean {
    return this.settings.useConfigFile;
  }

  // ===========================================================================
  // Values
  // ===========================================================================

  async get(configPath: string, fromDesired = false): Promise<ConfigValue | null> {
    const tree = fromDesired ? await this.loadDesired() : await this.loadStored();
    const value = getValue(tree, configPath);
    return value === null ? null : cloneTree(value);
  }

  async save(configPath: string, value: ConfigValue | null): Promise<void> {
    const [topNode] = splitPath(configPath);
    if (topNode === undefined) return;

    await this.loadStored();

    if (!this.timestampUpdated) {
      this.timestampUpdated = true;
      await this.save(DATE_MODIFIED_KEY, unixTimestamp());
    }

    if (this.useConfigFile) {
      const target = await this.locateNode(topNode);
      const document = cloneTree(await this.resolver.load(target));
      this.writeValue(document, configPath, value);
      this.resolver.cache(target, document);
      this.modifiedFiles.add(target);
      this.desired = null;
    } else {
      this.writeValue(await this.loadDesired(), configPath, value);
    }

    logger.debug({ path: configPath, deleted: value === null }, "Saved config value");

    this.pass.forget(configPath);
    await this.processConfigChanges(configPath);
  }

  async remove(configPath: string): Promise<void> {
    await this.save(configPath, null);
  }

  // ===========================================================================
  // Reconciliation
  // ===========================================================================

  async applyPendingChanges(options: ApplyOptions = {}): Promise<ApplyResult> {
    const startTime = Date.now();
    await this.loadStored();

    if (this.useConfigFile && !options.force && !(await this.filesModified())) {
      logger.info("No config files changed since the last pass");
      return {
        skipped: true,
        changes: emptyChangeSet(),
        report: { processed: [], fired: [] },
        durationMs: Date.now() - startTime,
      };
    }

    logger.info("Looking for pending changes");
    this.refreshDesired();
    const changes = await this.getPendingChanges();

    if (this.useConfigFile) {
      const resolved = await this.resolver.resolve(this.rootFile);
      this.configMap.regenerate(resolved.files, resolved.documents);
      this.timesDirty = true;
    }

    this.pass.reset();
    const report = await this.pass.run(changes);
    // Later processConfigChanges calls start from a clean slate
    this.pass.reset();
    const durationMs = Date.now() - startTime;

    logger.info(
      {
        removed: changes.removed.length,
        changed: changes.changed.length,
        added: changes.added.length,
        events: report.fired.length,
        durationMs,
      },
      "Applied pending config changes"
    );
    this.events.emit("config:applied", { changes, eventCount: report.fired.length, durationMs });

    return { skipped: false, changes, report, durationMs };
  }

  async isUpdatePending(): Promise<boolean> {
    if (!this.useConfigFile) {
      return false;
    }

    if (!(await this.fileSystem.exists(this.rootFile))) {
      logger.info({ rootFile: this.rootFile }, "Root config file missing, regenerating from the stored snapshot");
      await this.regenerateConfigFileFromStoredConfig();
      await this.flush();
    }

    if (await this.filesModified()) {
      this.refreshDesired();
      if (!isChangeSetEmpty(await this.getPendingChanges())) {
        return true;
      }
      await this.updateParsedConfigTimes();
    }

    return false;
  }

  async getPendingChanges(): Promise<ChangeSet> {
    const stored = await this.loadStored();
    const desired = await this.loadDesired();
    return diffTrees(desired, stored);
  }

  async getPendingChangeSummary(): Promise<PendingChangeSummary> {
    const changes = await this.getPendingChanges();
    return {
      added: summarize(changes.added),
      changed: summarize(changes.changed),
      removed: summarize(changes.removed),
    };
  }

  async processConfigChanges(configPath: string): Promise<void> {
    await this.loadStored();
    await this.loadDesired();
    await this.pass.processPath(configPath);
    if (this.useConfigFile) {
      this.timesDirty = true;
    }
  }

  // ===========================================================================
  // Handlers
  // ===========================================================================

  subscribe<TData = void>(
    kind: ConfigEventKind,
    pattern: string,
    handler: ConfigEventHandler<TData>,
    data: TData
  ): () => void {
    return this.registry.subscribe(kind, pattern, handler, data);
  }

  onAdd<TData = void>(pattern: string, handler: ConfigEventHandler<TData>, data: TData): () => void {
    return this.subscribe("add", pattern, handler, data);
  }

  onUpdate<TData = void>(pattern: string, handler: ConfigEventHandler<TData>, data: TData): () => void {
    return this.subscribe("update", pattern, handler, data);
  }

  onRemove<TData = void>(pattern: string, handler: ConfigEventHandler<TData>, data: TData): () => void {
    return this.subscribe("remove", pattern, handler, data);
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  async regenerateConfigFileFromStoredConfig(): Promise<void> {
    const stored = await this.loadStored();

    // The regenerated root file replaces the whole file set
    this.resolver.invalidate();
    this.modifiedFiles.clear();
    this.resolver.cache(this.rootFile, cloneTree(stored));
    this.modifiedFiles.add(this.rootFile);
    this.desired = null;
    this.timesDirty = true;
  }

  async updateParsedConfigTimes(): Promise<void> {
    if (!this.useConfigFile) return;

    const { files } = await this.resolver.resolve(this.rootFile);
    await this.modificationCache.persist(files);
    this.timesDirty = false;
  }

  async flush(): Promise<FlushResult> {
    const result: FlushResult = {
      filesWritten: [],
      snapshotSaved: false,
      configMapSaved: false,
      modifiedTimesSaved: false,
    };

    if (this.useConfigFile) {
      for (const file of this.modifiedFiles) {
        const document = pruneEmpty(cloneTree(this.resolver.getDocument(file) ?? {}));
        await this.fileSystem.write(file, this.parser.serialize(document));
        result.filesWritten.push(file);
      }

      if (this.configMap.isDirty()) {
        const resolved = await this.resolver.resolve(this.rootFile);
        this.configMap.regenerate(resolved.files, resolved.documents);
        await this.configMap.persist();
        result.configMapSaved = true;
      }
    }
    this.modifiedFiles.clear();

    if (this.storedDirty && this.stored !== null) {
      await this.recordStore.saveSnapshot(JSON.stringify(this.stored));
      this.storedDirty = false;
      result.snapshotSaved = true;
    }

    if (this.timesDirty && this.useConfigFile) {
      await this.updateParsedConfigTimes();
      result.modifiedTimesSaved = true;
    }
    this.timesDirty = false;
    this.timestampUpdated = false;

    logger.debug({ ...result }, "Flushed config changes");
    this.events.emit("config:flushed", result);
    return result;
  }

  isDirty(): boolean {
    return (
      this.storedDirty ||
      this.modifiedFiles.size > 0 ||
      (this.useConfigFile && (this.configMap.isDirty() || this.timesDirty))
    );
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async loadStored(): Promise<ConfigTree> {
    if (this.stored !== null) return this.stored;

    const payload = await this.recordStore.loadSnapshot();
    this.stored = payload === null ? {} : parsePayload(ConfigTreeSchema, payload, "config snapshot");
    return this.stored;
  }

  private requireStored(): ConfigTree {
    if (this.stored === null) {
      this.stored = {};
    }
    return this.stored;
  }

  private async loadDesired(): Promise<ConfigTree> {
    if (this.desired !== null) return this.desired;

    if (this.useConfigFile) {
      const resolved = await this.resolver.resolve(this.rootFile);
      this.desired = this.resolver.merge(resolved.files);
    } else {
      this.desired = cloneTree(await this.loadStored());
    }
    return this.desired;
  }

  /**
   * Drops cached documents so the next read sees the files on disk. Kept
   * while unflushed edits exist, which would otherwise be lost.
   */
  private refreshDesired(): void {
    if (!this.useConfigFile || this.modifiedFiles.size > 0) return;
    this.resolver.invalidate();
    this.desired = null;
  }

  private async filesModified(): Promise<boolean> {
    const { files } = await this.resolver.resolve(this.rootFile);
    return this.modificationCache.isStale(files);
  }

  /**
   * File that owns a top-level node. Unknown nodes go to the root file and
   * are mapped there.
   */
  private async locateNode(topNode: string): Promise<string> {
    if (await this.configMap.isMapped(topNode)) {
      return this.configMap.resolve(topNode, this.rootFile);
    }

    const { files, documents } = await this.resolver.resolve(this.rootFile);
    let owner = this.rootFile;
    for (const file of files) {
      const document = documents.get(file);
      if (document && Object.prototype.hasOwnProperty.call(document, topNode)) {
        owner = file;
      }
    }

    await this.configMap.mapNode(topNode, owner);
    return owner;
  }

  private writeValue(tree: ConfigTree, configPath: string, value: ConfigValue | null): void {
    if (value === null) {
      deleteValue(tree, configPath);
    } else {
      setValue(tree, configPath, cloneTree(value));
    }
  }
}

/**
 * Unique first-two-segment paths, sorted. Single-segment paths are left out.
 */
function summarize(paths: readonly string[]): string[] {
  const summary = new Set<string>();
  for (const changePath of paths) {
    const prefix = summaryPath(changePath);
    if (prefix !== null) {
      summary.add(prefix);
    }
  }
  return [...summary].sort();
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Creates a service backed by YAML files and JSON records under the data
 * directory. Any collaborator can be replaced.
 */
export function createProjectConfig(
  input: EngineSettingsInput,
  overrides: Partial<ProjectConfigDependencies> = {}
): ProjectConfigService {
  const settings = resolveSettings(input);

  return new ProjectConfigService(settings, {
    fileSystem: overrides.fileSystem ?? new NodeFileSystem(),
    parser: overrides.parser ?? new YamlDocumentParser(),
    recordStore: overrides.recordStore ?? new JsonFileRecordStore(settings.dataDir),
    stalenessCache:
      overrides.stalenessCache ?? new JsonFileCache(path.join(settings.dataDir, MODIFIED_TIMES_FILE)),
  });
}
