/**
 * PathTree Operations
 *
 * Get, set, delete and flatten on nested config trees addressed by
 * dot-delimited paths. Every function mutates only the tree it is given.
 *
 * @module
 */

import cloneDeep from "lodash/cloneDeep.js";
import isEqual from "lodash/isEqual.js";
import type { ConfigTree, ConfigValue, LeafMap } from "../../types/index.js";
import { joinPath, splitPath } from "./path.js";

// =============================================================================
// Guards
// =============================================================================

/**
 * Whether a value is a subtree (a plain mapping, not a list)
 */
export function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Null, undefined and empty subtrees all count as "nothing here".
 */
export function isAbsent(value: ConfigValue | null | undefined): boolean {
  if (value === null || value === undefined) return true;
  return isConfigTree(value) && Object.keys(value).length === 0;
}

/**
 * Structural equality
 */
export function valuesEqual(a: ConfigValue | null | undefined, b: ConfigValue | null | undefined): boolean {
  return isEqual(a ?? null, b ?? null);
}

export function cloneTree<T extends ConfigValue>(value: T): T {
  return cloneDeep(value);
}

// =============================================================================
// Path Access
// =============================================================================

/**
 * Reads the value at `path`. Missing segments, or a scalar where a subtree
 * was expected, yield null.
 */
export function getValue(tree: ConfigTree, path: string | readonly string[]): ConfigValue | null {
  const segments = typeof path === "string" ? splitPath(path) : path;
  let current: ConfigValue = tree;

  for (const segment of segments) {
    if (!isConfigTree(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return null;
    }
    const next: ConfigValue | undefined = current[segment];
    if (next === undefined) return null;
    current = next;
  }

  return current;
}

/**
 * Writes `value` at `path`, creating intermediate subtrees. Whatever was at
 * an intermediate segment is replaced when it is not a subtree.
 */
export function setValue(tree: ConfigTree, path: string | readonly string[], value: ConfigValue): void {
  const segments = typeof path === "string" ? splitPath(path) : path;
  const parent = ensureParent(tree, segments);
  const last = segments[segments.length - 1];
  if (last === undefined) return;
  parent[last] = value;
}

/**
 * Removes the value at `path`. No-op when any segment is missing.
 */
export function deleteValue(tree: ConfigTree, path: string | readonly string[]): void {
  const segments = typeof path === "string" ? splitPath(path) : path;
  let current: ConfigTree = tree;

  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i];
    if (segment === undefined) return;
    const next = current[segment];
    if (!isConfigTree(next)) return;
    current = next;
  }

  const last = segments[segments.length - 1];
  if (last !== undefined) {
    delete current[last];
  }
}

function ensureParent(tree: ConfigTree, segments: readonly string[]): ConfigTree {
  let current = tree;
  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i];
    if (segment === undefined) break;
    const next = current[segment];
    if (isConfigTree(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
      current[segment] = created;
      current = created;
    }
  }
  return current;
}

// =============================================================================
// Whole-Tree Transforms
// =============================================================================

/**
 * Walks the tree and returns its leaves keyed by path. Empty subtrees have no
 * leaves and are not emitted.
 */
export function flattenTree(tree: ConfigTree): LeafMap {
  const leaves: LeafMap = new Map();

  const walk = (node: ConfigTree, prefix: string[]): void => {
    for (const [key, value] of Object.entries(node)) {
      const segments = [...prefix, key];
      if (isConfigTree(value)) {
        walk(value, segments);
      } else {
        leaves.set(joinPath(segments), value);
      }
    }
  };

  walk(tree, []);
  return leaves;
}

/**
 * Rebuilds a tree from a leaf map
 */
export function unflattenTree(leaves: LeafMap): ConfigTree {
  const tree: ConfigTree = {};
  for (const [path, value] of leaves) {
    setValue(tree, path, cloneTree(value));
  }
  return tree;
}

/**
 * Removes empty subtrees in place, bottom-up
 */
export function pruneEmpty(tree: ConfigTree): ConfigTree {
  for (const [key, value] of Object.entries(tree)) {
    if (isConfigTree(value)) {
      pruneEmpty(value);
      if (Object.keys(value).length === 0) {
        delete tree[key];
      }
    }
  }
  return tree;
}

/**
 * Shallow copy of the tree without the given top-level keys
 */
export function omitKeys(tree: ConfigTree, keys: readonly string[]): ConfigTree {
  const result: ConfigTree = {};
  for (const [key, value] of Object.entries(tree)) {
    if (!keys.includes(key)) {
      result[key] = value;
    }
  }
  return result;
}
