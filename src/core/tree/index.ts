/**
 * Tree Module
 *
 * Nested config trees and dot-delimited paths.
 */

export * from "./path.js";
export * from "./path-tree.js";
