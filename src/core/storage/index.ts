/**
 * Storage Module
 *
 * Concrete collaborators: file system access, record stores and staleness
 * caches.
 */

export * from "./node-file-system.js";
export * from "./json-record-store.js";
export * from "./memory-record-store.js";
export * from "./memory-staleness-cache.js";
export * from "./json-file-cache.js";
