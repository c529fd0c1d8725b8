/**
 * IDocumentParser - Config document codec
 *
 * Turns document text into a config tree and back. The engine does not care
 * about the concrete format as long as scalars and nesting round-trip.
 *
 * @module
 */

import type { ConfigTree, ConfigValue } from "../../types/index.js";

/**
 * @example
 * ```typescript
 * const parser = new YamlDocumentParser();
 * const tree = parser.parse("system:\n  name: Acme\n", "config/project.yaml");
 * const text = parser.serialize(tree);
 * ```
 */
export interface IDocumentParser {
  /**
   * Parse a whole document. An empty document is an empty tree.
   * @param filePath - Used only for error reporting
   * @throws ParseError if the text is malformed or not a mapping
   */
  parse(contents: string, filePath?: string): ConfigTree;

  /**
   * Parse a single value, e.g. one given on the command line
   * @throws ParseError if the text is malformed
   */
  parseValue(contents: string): ConfigValue;

  /**
   * Serialize a tree into document text
   */
  serialize(tree: ConfigTree): string;
}
