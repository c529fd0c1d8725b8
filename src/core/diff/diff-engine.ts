/**
 * Diff Engine
 *
 * Compares the desired tree with the stored tree leaf by leaf and reports
 * the immediate parent of every difference. Sibling leaves under one parent
 * collapse into a single entry.
 *
 * @module
 */

import type { ChangeSet, ConfigTree } from "../../types/index.js";
import { flattenTree, omitKeys, valuesEqual } from "../tree/path-tree.js";
import { immediateParent, sortDeepestFirst } from "../tree/path.js";
import { IMPORTS_KEY } from "../imports/import-resolver.js";

export const DATE_MODIFIED_KEY = "dateModified";

/**
 * Top-level keys that never take part in change detection
 */
export const VOLATILE_KEYS: readonly string[] = [DATE_MODIFIED_KEY, IMPORTS_KEY];

export function emptyChangeSet(): ChangeSet {
  return { added: [], changed: [], removed: [] };
}

/**
 * Computes the change set that moves `stored` towards `desired`.
 * Each list is deduplicated and ordered deepest first.
 */
export function diffTrees(desired: ConfigTree, stored: ConfigTree): ChangeSet {
  const desiredLeaves = flattenTree(omitKeys(desired, VOLATILE_KEYS));
  const remaining = flattenTree(omitKeys(stored, VOLATILE_KEYS));

  const added = new Set<string>();
  const changed = new Set<string>();

  for (const [path, value] of desiredLeaves) {
    const parent = immediateParent(path);

    if (!remaining.has(path)) {
      // A null leaf is as absent as a missing one
      if (value !== null) {
        added.add(parent);
      }
    } else if (!valuesEqual(remaining.get(path), value)) {
      changed.add(parent);
    }

    remaining.delete(path);
  }

  const removed = new Set<string>();
  for (const [path, value] of remaining) {
    if (value !== null) {
      removed.add(immediateParent(path));
    }
  }

  return {
    added: sortDeepestFirst([...added]),
    changed: sortDeepestFirst([...changed]),
    removed: sortDeepestFirst([...removed]),
  };
}

export function isChangeSetEmpty(changes: ChangeSet): boolean {
  return countChanges(changes) === 0;
}

export function countChanges(changes: ChangeSet): number {
  return changes.added.length + changes.changed.length + changes.removed.length;
}
