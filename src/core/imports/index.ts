/**
 * Import Resolution Module
 */

export * from "./import-resolver.js";
