/**
 * Config Watcher
 *
 * Watches the config directory and hands debounced batches of YAML file
 * changes to a handler, one batch at a time.
 *
 * @module
 */

import * as path from "node:path";
import { watch, type FSWatcher } from "chokidar";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("config-watcher");

// =============================================================================
// Types
// =============================================================================

export type FileChangeType = "add" | "change" | "unlink";

export interface FileChangeEvent {
  type: FileChangeType;
  /** Absolute path to the file */
  filePath: string;
  timestamp: number;
}

export interface FileChangeBatch {
  events: FileChangeEvent[];
  /** Deduplicated files that were added or changed */
  filesChanged: string[];
  filesRemoved: string[];
  timestamp: number;
}

export type BatchHandler = (batch: FileChangeBatch) => Promise<void>;

export interface ConfigWatcherOptions {
  /** Directory holding the config files */
  configDir: string;
  /** File extensions that count as config files (default: .yaml, .yml) */
  extensions?: string[];
  /** Debounce interval in ms (default: 300) */
  debounceMs?: number;
  /** Whether to use polling (useful for network drives) */
  usePolling?: boolean;
  /** Polling interval in ms (default: 1000) */
  pollInterval?: number;
  onBatch?: BatchHandler;
  onError?: (error: Error) => void;
  onReady?: () => void;
}

export type WatcherState = "stopped" | "starting" | "watching" | "processing" | "stopping";

const DEFAULT_EXTENSIONS = [".yaml", ".yml"];

// =============================================================================
// ConfigWatcher Implementation
// =============================================================================

/**
 * @example
 * ```typescript
 * const watcher = new ConfigWatcher({
 *   configDir,
 *   onBatch: async () => {
 *     const config = createProjectConfig({ rootDir });
 *     await config.applyPendingChanges();
 *     await config.flush();
 *   },
 * });
 *
 * await watcher.start();
 * ```
 */
export class ConfigWatcher {
  private readonly configDir: string;
  private readonly extensions: string[];
  private readonly debounceMs: number;
  private readonly usePolling: boolean;
  private readonly pollInterval: number;
  private readonly onBatch: BatchHandler | undefined;
  private readonly onError: ((error: Error) => void) | undefined;
  private readonly onReady: (() => void) | undefined;

  private watcher: FSWatcher | null = null;
  private state: WatcherState = "stopped";
  private eventBuffer: FileChangeEvent[] = [];
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private processing: Promise<void> | null = null;

  constructor(options: ConfigWatcherOptions) {
    this.configDir = path.resolve(options.configDir);
    this.extensions = options.extensions ?? DEFAULT_EXTENSIONS;
    this.debounceMs = options.debounceMs ?? 300;
    this.usePolling = options.usePolling ?? false;
    this.pollInterval = options.pollInterval ?? 1000;
    this.onBatch = options.onBatch;
    this.onError = options.onError;
    this.onReady = options.onReady;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  async start(): Promise<void> {
    if (this.state !== "stopped") {
      return;
    }

    this.state = "starting";
    logger.debug({ configDir: this.configDir }, "Starting config watcher");

    const watcher = watch(this.configDir, {
      persistent: true,
      ignoreInitial: true,
      usePolling: this.usePolling,
      interval: this.pollInterval,
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 50,
      },
    });
    this.watcher = watcher;

    watcher.on("add", (filePath) => this.handleEvent("add", filePath));
    watcher.on("change", (filePath) => this.handleEvent("change", filePath));
    watcher.on("unlink", (filePath) => this.handleEvent("unlink", filePath));

    watcher.on("error", (error: unknown) => {
      logger.error({ err: error }, "Watcher error");
      this.onError?.(error instanceof Error ? error : new Error(String(error)));
    });

    return new Promise<void>((resolve) => {
      watcher.on("ready", () => {
        this.state = "watching";
        logger.info({ configDir: this.configDir }, "Config watcher ready");
        this.onReady?.();
        resolve();
      });
    });
  }

  /**
   * Stops watching. Buffered events are processed first.
   */
  async stop(): Promise<void> {
    if (this.state === "stopped" || this.state === "stopping") {
      return;
    }

    this.state = "stopping";
    await this.flush();

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }

    this.state = "stopped";
    logger.info("Config watcher stopped");
  }

  getState(): WatcherState {
    return this.state;
  }

  getPendingEventCount(): number {
    return this.eventBuffer.length;
  }

  /**
   * Processes buffered events now instead of waiting for the debounce
   */
  async flush(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    await this.processBatch();
  }

  /**
   * Whether a path is a config file this watcher reports
   */
  isConfigFile(filePath: string): boolean {
    return this.extensions.includes(path.extname(filePath).toLowerCase());
  }

  // ===========================================================================
  // Private Event Handling
  // ===========================================================================

  private handleEvent(type: FileChangeType, filePath: string): void {
    if (!this.isConfigFile(filePath)) {
      return;
    }

    logger.debug({ type, filePath }, "Config file change detected");
    this.eventBuffer.push({ type, filePath: path.resolve(filePath), timestamp: Date.now() });
    this.scheduleProcessing(this.debounceMs);
  }

  private scheduleProcessing(delayMs: number): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.processBatch().catch((error: unknown) => {
        logger.error({ err: error }, "Error processing batch");
        this.onError?.(error instanceof Error ? error : new Error(String(error)));
      });
    }, delayMs);
  }

  /**
   * Runs batches one after another; events arriving during a run wait for
   * the next one.
   */
  private async processBatch(): Promise<void> {
    while (this.processing) {
      // A failed run is reported by the call that started it
      await this.processing.catch(() => undefined);
    }
    if (this.eventBuffer.length === 0) {
      return;
    }

    const events = this.eventBuffer;
    this.eventBuffer = [];
    const run = this.runBatch(buildBatch(events));
    this.processing = run;

    try {
      await run;
    } finally {
      this.processing = null;
    }
  }

  private async runBatch(batch: FileChangeBatch): Promise<void> {
    const previousState = this.state;
    this.state = "processing";

    try {
      logger.info(
        {
          changedCount: batch.filesChanged.length,
          removedCount: batch.filesRemoved.length,
          eventCount: batch.events.length,
        },
        "Processing config file changes"
      );
      if (this.onBatch) {
        await this.onBatch(batch);
      }
    } finally {
      this.state = previousState === "processing" ? "watching" : previousState;
    }
  }
}

/**
 * Keeps the latest event per file and splits files into changed and removed
 */
export function buildBatch(events: FileChangeEvent[]): FileChangeBatch {
  const latest = new Map<string, FileChangeEvent>();
  for (const event of events) {
    const existing = latest.get(event.filePath);
    if (!existing || event.timestamp >= existing.timestamp) {
      latest.set(event.filePath, event);
    }
  }

  const filesChanged: string[] = [];
  const filesRemoved: string[] = [];
  for (const [filePath, event] of latest) {
    if (event.type === "unlink") {
      filesRemoved.push(filePath);
    } else {
      filesChanged.push(filePath);
    }
  }

  return { events, filesChanged, filesRemoved, timestamp: Date.now() };
}
