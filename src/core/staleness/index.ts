/**
 * Staleness Module
 */

export * from "./modification-cache.js";
