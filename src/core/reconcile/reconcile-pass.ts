/**
 * Reconcile Pass
 *
 * Walks a change set and converges the stored tree towards the desired
 * tree one path at a time, dispatching add/update/remove events on the way.
 *
 * @module
 */

import type { ChangeSet, ConfigEventKind, ConfigTree, ConfigValue } from "../../types/index.js";
import type { EventBus } from "../../utils/events.js";
import type { EventRegistry } from "../events/event-registry.js";
import type { ProjectConfigEvents } from "../events/project-config-events.js";
import { cloneTree, deleteValue, getValue, isAbsent, setValue, valuesEqual } from "../tree/path-tree.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("reconcile");

// =============================================================================
// Types
// =============================================================================

/**
 * The trees a pass reads and writes. Both are read again for every path so
 * the owner may swap the desired tree between calls.
 */
export interface ReconcileState {
  readStored(): ConfigTree;
  readDesired(): ConfigTree;
  markStoredDirty(): void;
}

export interface FiredEvent {
  kind: ConfigEventKind;
  path: string;
}

export interface PassReport {
  /** Paths visited, whether or not an event fired */
  processed: string[];
  fired: FiredEvent[];
}

/**
 * Order in which change categories settle
 */
export const CATEGORY_ORDER = ["removed", "changed", "added"] as const;

/**
 * Event kind for an old/new pair, or null when nothing changed
 */
export function classifyChange(
  oldValue: ConfigValue | null,
  newValue: ConfigValue | null
): ConfigEventKind | null {
  const hadValue = !isAbsent(oldValue);
  const hasValue = !isAbsent(newValue);

  if (hadValue && !hasValue) return "remove";
  if (!hadValue && hasValue) return "add";
  if (hadValue && hasValue && !valuesEqual(oldValue, newValue)) return "update";
  return null;
}

// =============================================================================
// Pass
// =============================================================================

export interface ReconcilePassOptions {
  state: ReconcileState;
  registry: EventRegistry;
  events?: EventBus<ProjectConfigEvents>;
}

export class ReconcilePass {
  private readonly state: ReconcileState;
  private readonly registry: EventRegistry;
  private readonly events: EventBus<ProjectConfigEvents> | undefined;
  private processed = new Set<string>();
  private fired: FiredEvent[] = [];

  constructor(options: ReconcilePassOptions) {
    this.state = options.state;
    this.registry = options.registry;
    this.events = options.events;
  }

  /**
   * Starts a new pass: every path may be processed again
   */
  reset(): void {
    this.processed = new Set();
    this.fired = [];
  }

  /**
   * Allows `path` to be processed again within the current pass
   */
  forget(path: string): void {
    this.processed.delete(path);
  }

  isProcessed(path: string): boolean {
    return this.processed.has(path);
  }

  /**
   * Processes every path of the change set: removals first, then changes,
   * then additions, each deepest first.
   */
  async run(changes: ChangeSet): Promise<PassReport> {
    for (const category of CATEGORY_ORDER) {
      for (const path of changes[category]) {
        await this.processPath(path);
      }
    }
    return this.report();
  }

  /**
   * Processes a single path once per pass. Handlers are awaited in
   * registration order before the new value is written to the stored tree.
   *
   * @returns The event kind fired, or null when skipped or unchanged
   */
  async processPath(path: string): Promise<ConfigEventKind | null> {
    if (this.processed.has(path)) {
      return null;
    }
    this.processed.add(path);

    const oldValue = getValue(this.state.readStored(), path);
    const newValue = getValue(this.state.readDesired(), path);
    const kind = classifyChange(oldValue, newValue);

    if (kind === null) {
      return null;
    }

    logger.debug({ kind, path }, "Config item changed");
    this.fired.push({ kind, path });
    this.events?.emit("config:item", { kind, path, oldValue, newValue });

    for (const invocation of this.registry.match(kind, path)) {
      if (invocation.type === "reprocess") {
        await this.processPath(invocation.path);
        continue;
      }

      await invocation.binding.invoke({
        kind,
        path,
        oldValue: oldValue === null ? null : cloneTree(oldValue),
        newValue: newValue === null ? null : cloneTree(newValue),
        tokenMatches: invocation.tokens,
      });
    }

    if (kind === "remove" || newValue === null) {
      deleteValue(this.state.readStored(), path);
    } else {
      setValue(this.state.readStored(), path, cloneTree(newValue));
    }
    this.state.markStoredDirty();

    return kind;
  }

  /**
   * Progress of the current pass so far
   */
  report(): PassReport {
    return { processed: [...this.processed], fired: [...this.fired] };
  }
}
