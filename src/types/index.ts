/**
 * Shared types for projconfig
 */

// =============================================================================
// Config Values
// =============================================================================

/**
 * Leaf scalar stored in a config document
 */
export type ConfigScalar = string | number | boolean | null;

/**
 * Any value that may appear in a config tree. Lists are atomic leaves:
 * they are compared structurally and never descended into.
 */
export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigTree;

/**
 * Nested mapping from key to value or subtree
 */
export interface ConfigTree {
  [key: string]: ConfigValue;
}

/**
 * Flattened view of a tree: dot-delimited leaf path to leaf value
 */
export type LeafMap = Map<string, ConfigValue>;

// =============================================================================
// Change Detection
// =============================================================================

export type ChangeCategory = "added" | "changed" | "removed";

/**
 * Immediate-parent paths that differ between the desired and stored trees,
 * each list deduplicated and ordered deepest first.
 */
export interface ChangeSet {
  added: string[];
  changed: string[];
  removed: string[];
}

/**
 * Category to unique first-two-segment paths
 */
export type PendingChangeSummary = Record<ChangeCategory, string[]>;

// =============================================================================
// Events
// =============================================================================

export type ConfigEventKind = "add" | "update" | "remove";

/**
 * Payload delivered to change handlers
 */
export interface ConfigEvent<TData = unknown> {
  kind: ConfigEventKind;
  /** Path the event was fired for */
  path: string;
  oldValue: ConfigValue | null;
  newValue: ConfigValue | null;
  /** Values captured by `{uid}` tokens, in declaration order */
  tokenMatches: string[];
  /** Opaque data supplied at subscription time */
  data: TData;
}

export type ConfigEventHandler<TData = unknown> = (
  event: ConfigEvent<TData>
) => void | Promise<void>;
