/**
 * Config path helpers
 *
 * A path is a non-empty list of segments joined with `.`. Segments cannot
 * contain the delimiter; there is no escaping.
 */

import { InvalidPathError } from "../errors.js";

export const PATH_DELIMITER = ".";

/**
 * Splits a dot-delimited path into its segments.
 *
 * @throws InvalidPathError if the path is empty or has an empty segment
 */
export function splitPath(path: string): string[] {
  if (path.length === 0) {
    throw new InvalidPathError(path, "path is empty");
  }
  const segments = path.split(PATH_DELIMITER);
  if (segments.some((segment) => segment.length === 0)) {
    throw new InvalidPathError(path, "path contains an empty segment");
  }
  return segments;
}

export function joinPath(segments: readonly string[]): string {
  return segments.join(PATH_DELIMITER);
}

/**
 * Number of segments in a path
 */
export function pathDepth(path: string): number {
  return path.split(PATH_DELIMITER).length;
}

/**
 * The path with its last segment dropped. A single-segment path is its own
 * immediate parent.
 */
export function immediateParent(path: string): string {
  const index = path.lastIndexOf(PATH_DELIMITER);
  return index === -1 ? path : path.slice(0, index);
}

/**
 * First segment of a path, i.e. the top-level node that owns it
 */
export function topLevelNode(path: string): string {
  const index = path.indexOf(PATH_DELIMITER);
  return index === -1 ? path : path.slice(0, index);
}

/**
 * First two segments of a path, or null for single-segment paths
 */
export function summaryPath(path: string): string | null {
  const segments = path.split(PATH_DELIMITER);
  if (segments.length < 2) return null;
  return joinPath(segments.slice(0, 2));
}

/**
 * Sorts paths deepest first. Paths of equal depth keep their relative order.
 */
export function sortDeepestFirst(paths: readonly string[]): string[] {
  return paths
    .map((path, index) => ({ path, index, depth: pathDepth(path) }))
    .sort((a, b) => b.depth - a.depth || a.index - b.index)
    .map(({ path }) => path);
}
