/**
 * Core module - reconciliation engine shared by the CLI and library users
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./tree/index.js";
export * from "./parser/index.js";
export * from "./storage/index.js";
export * from "./imports/index.js";
export * from "./config-map/index.js";
export * from "./staleness/index.js";
export * from "./diff/index.js";
export * from "./events/index.js";
export * from "./reconcile/index.js";
export * from "./watcher/index.js";
export * from "./project-config/index.js";

// Re-export interfaces
export type {
  IDocumentParser,
  IFileSystem,
  IRecordStore,
  IStalenessCache,
  ModifiedTimes,
} from "./interfaces/index.js";

// Re-export types
export * from "../types/index.js";
