/**
 * Import Resolver
 *
 * Loads the root config document and, depth first, every document it
 * imports. Produces the ordered file list and the merged desired tree.
 *
 * @module
 */

import * as path from "node:path";
import type { IDocumentParser } from "../interfaces/IDocumentParser.js";
import type { IFileSystem } from "../interfaces/IFileSystem.js";
import type { ConfigTree } from "../../types/index.js";
import type { ImportPolicy } from "../../utils/validation.js";
import { PathSafetyError } from "../errors.js";
import { cloneTree } from "../tree/path-tree.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("import-resolver");

/**
 * Key holding the list of imported files, relative to the importing file
 */
export const IMPORTS_KEY = "imports";

// =============================================================================
// Types
// =============================================================================

export interface ImportResolverOptions {
  fileSystem: IFileSystem;
  parser: IDocumentParser;
  /** Imports must resolve inside this directory */
  containmentRoot: string;
  /** Default: "skip" */
  importPolicy?: ImportPolicy;
}

export interface ResolvedImports {
  /** Root first, then imports in depth-first order */
  files: string[];
  documents: Map<string, ConfigTree>;
}

// =============================================================================
// Import Resolver
// =============================================================================

/**
 * @example
 * ```typescript
 * const resolver = new ImportResolver({ fileSystem, parser, containmentRoot: configDir });
 * const { files } = await resolver.resolve(path.join(configDir, "project.yaml"));
 * const desired = resolver.merge(files);
 * ```
 */
export class ImportResolver {
  private readonly fileSystem: IFileSystem;
  private readonly parser: IDocumentParser;
  private readonly containmentRoot: string;
  private readonly importPolicy: ImportPolicy;

  /** Parsed documents, kept for the resolver's lifetime */
  private readonly parsed = new Map<string, ConfigTree>();
  private resolved: ResolvedImports | null = null;

  constructor(options: ImportResolverOptions) {
    this.fileSystem = options.fileSystem;
    this.parser = options.parser;
    this.containmentRoot = path.resolve(options.containmentRoot);
    this.importPolicy = options.importPolicy ?? "skip";
  }

  /**
   * Parses a document once; later calls return the memoised tree.
   * A missing file is an empty document.
   *
   * @throws ParseError if the document is malformed
   */
  async load(filePath: string): Promise<ConfigTree> {
    const cached = this.parsed.get(filePath);
    if (cached) return cached;

    const contents = await this.fileSystem.read(filePath);
    const document = contents === null ? {} : this.parser.parse(contents, filePath);

    if (contents === null) {
      logger.debug({ filePath }, "Config file missing, using an empty document");
    }

    this.parsed.set(filePath, document);
    return document;
  }

  /**
   * Resolves the import graph below `rootFile`. The result is memoised until
   * `invalidate()` is called.
   *
   * @throws ParseError if any document is malformed
   * @throws PathSafetyError if an import escapes the root and the policy is "error"
   */
  async resolve(rootFile: string): Promise<ResolvedImports> {
    if (this.resolved && this.resolved.files[0] === rootFile) {
      return this.resolved;
    }

    const files: string[] = [];
    const visit = async (filePath: string): Promise<void> => {
      if (files.includes(filePath)) {
        logger.debug({ filePath }, "Config file already imported, skipping");
        return;
      }
      files.push(filePath);

      const document = await this.load(filePath);
      const directory = path.dirname(filePath);

      for (const entry of this.readImports(document, filePath)) {
        const target = path.join(directory, entry);
        if (!this.fileSystem.isContained(this.containmentRoot, target)) {
          this.rejectImport(entry, filePath);
          continue;
        }
        await visit(target);
      }
    };

    await visit(rootFile);

    const documents = new Map<string, ConfigTree>();
    for (const file of files) {
      documents.set(file, await this.load(file));
    }

    this.resolved = { files, documents };
    logger.debug({ rootFile, fileCount: files.length }, "Resolved config imports");
    return this.resolved;
  }

  /**
   * Merges already-loaded documents in order. Later files replace earlier
   * top-level keys wholesale; nested keys are not merged.
   */
  merge(files: readonly string[]): ConfigTree {
    const merged: ConfigTree = {};
    for (const file of files) {
      const document = this.parsed.get(file);
      if (!document) continue;
      for (const [key, value] of Object.entries(document)) {
        merged[key] = cloneTree(value);
      }
    }
    return merged;
  }

  /**
   * Memoised document, if it was loaded
   */
  getDocument(filePath: string): ConfigTree | undefined {
    return this.parsed.get(filePath);
  }

  /**
   * Replaces a memoised document, e.g. after an in-memory edit
   */
  cache(filePath: string, document: ConfigTree): void {
    this.parsed.set(filePath, document);
    if (this.resolved?.files.includes(filePath)) {
      this.resolved.documents.set(filePath, document);
    }
  }

  /**
   * Drops memoised documents and the resolved file list
   */
  invalidate(): void {
    this.parsed.clear();
    this.resolved = null;
  }

  private readImports(document: ConfigTree, filePath: string): string[] {
    const imports = document[IMPORTS_KEY];
    if (imports === undefined || imports === null) return [];

    if (!Array.isArray(imports)) {
      logger.warn({ filePath }, "Ignoring imports that are not a list");
      return [];
    }

    const entries: string[] = [];
    for (const entry of imports) {
      if (typeof entry === "string" && entry.length > 0) {
        entries.push(entry);
      } else {
        logger.warn({ filePath, entry }, "Ignoring import entry that is not a file name");
      }
    }
    return entries;
  }

  private rejectImport(importPath: string, filePath: string): void {
    if (this.importPolicy === "error") {
      throw new PathSafetyError(`Import "${importPath}" in ${filePath} escapes ${this.containmentRoot}`, {
        importPath,
        root: this.containmentRoot,
        filePath,
      });
    }
    logger.warn({ importPath, filePath, root: this.containmentRoot }, "Skipping import outside the config root");
  }
}
