/**
 * Core Interfaces Module
 *
 * Contracts for the collaborators the reconciliation engine depends on.
 * These interfaces enable:
 * - Testability via in-memory implementations
 * - Replaceability of concrete implementations
 * - Clear contracts between modules
 *
 * @module
 */

export type { IDocumentParser } from "./IDocumentParser.js";
export type { IFileSystem } from "./IFileSystem.js";
export type { IRecordStore } from "./IRecordStore.js";
export type { IStalenessCache, ModifiedTimes } from "./IStalenessCache.js";
