/**
 * Progress events published on the engine's event bus
 */

import type { ChangeSet, ConfigEventKind, ConfigValue } from "../../types/index.js";
import { EventBus } from "../../utils/events.js";

export interface ConfigItemEvent {
  kind: ConfigEventKind;
  path: string;
  oldValue: ConfigValue | null;
  newValue: ConfigValue | null;
}

export interface ConfigAppliedEvent {
  changes: ChangeSet;
  eventCount: number;
  durationMs: number;
}

export interface ConfigFlushedEvent {
  filesWritten: string[];
  snapshotSaved: boolean;
  configMapSaved: boolean;
  modifiedTimesSaved: boolean;
}

export interface ProjectConfigEvents {
  "config:item": ConfigItemEvent;
  "config:applied": ConfigAppliedEvent;
  "config:flushed": ConfigFlushedEvent;
}

export function createProjectConfigEventBus(): EventBus<ProjectConfigEvents> {
  return new EventBus<ProjectConfigEvents>();
}
