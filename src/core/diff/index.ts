/**
 * Diff Module
 */

export * from "./diff-engine.js";
