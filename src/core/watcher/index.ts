/**
 * Watcher Module
 */

export * from "./config-watcher.js";
