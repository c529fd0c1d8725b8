/**
 * Shared utilities
 */

export * from "./logger.js";
export * from "./fs.js";
export * from "./paths.js";
export * from "./events.js";
export * from "./validation.js";
