/**
 * YAML Document Parser
 *
 * IDocumentParser implementation backed by the `yaml` package.
 *
 * @module
 */

import { parse, parseDocument, stringify, YAMLParseError } from "yaml";
import type { IDocumentParser } from "../interfaces/IDocumentParser.js";
import type { ConfigTree, ConfigValue } from "../../types/index.js";
import { ErrorCode, ParseError } from "../errors.js";
import { isConfigTree } from "../tree/path-tree.js";
import { PATH_DELIMITER } from "../tree/path.js";

export interface YamlDocumentParserOptions {
  /** Indentation used when serializing (default: 2) */
  indent?: number;
}

/**
 * Parses and dumps YAML config documents.
 *
 * Only plain data survives: mappings become trees, sequences become lists,
 * and scalars stay strings, numbers, booleans or null.
 */
export class YamlDocumentParser implements IDocumentParser {
  private readonly indent: number;

  constructor(options: YamlDocumentParserOptions = {}) {
    this.indent = options.indent ?? 2;
  }

  parse(contents: string, filePath?: string): ConfigTree {
    const document = parseDocument(contents);

    const [firstError] = document.errors;
    if (firstError) {
      throw toParseError(firstError, filePath);
    }

    const value = toConfigValue(document.toJS(), filePath);
    if (value === null) {
      return {};
    }
    if (!isConfigTree(value)) {
      throw new ParseError("Config document must be a mapping at the top level", ErrorCode.PARSE_NOT_A_MAPPING, {
        filePath,
      });
    }
    return value;
  }

  parseValue(contents: string): ConfigValue {
    try {
      return toConfigValue(parse(contents));
    } catch (error) {
      if (error instanceof YAMLParseError) {
        throw toParseError(error);
      }
      throw error;
    }
  }

  serialize(tree: ConfigTree): string {
    return stringify(tree, { indent: this.indent });
  }
}

function toParseError(error: YAMLParseError, filePath?: string): ParseError {
  const position = error.linePos?.[0];
  return new ParseError(error.message, ErrorCode.PARSE_SYNTAX_ERROR, {
    filePath,
    line: position?.line,
    column: position?.col,
    yamlCode: error.code,
  });
}

/**
 * Narrows a parsed YAML value to a config value. Mapping keys become path
 * segments, so they may not contain the delimiter; mappings inside lists
 * are atomic and exempt.
 */
function toConfigValue(raw: unknown, filePath?: string, insideList = false): ConfigValue {
  if (raw === null || raw === undefined) return null;

  switch (typeof raw) {
    case "string":
    case "number":
    case "boolean":
      return raw;
  }

  if (Array.isArray(raw)) {
    return raw.map((item: unknown) => toConfigValue(item, filePath, true));
  }

  if (typeof raw === "object" && !(raw instanceof Map) && !(raw instanceof Set)) {
    const tree: ConfigTree = {};
    for (const [key, value] of Object.entries(raw)) {
      if (!insideList && key.includes(PATH_DELIMITER)) {
        throw new ParseError(`Config key "${key}" may not contain "${PATH_DELIMITER}"`, ErrorCode.PARSE_INVALID_KEY, {
          filePath,
          key,
        });
      }
      tree[key] = toConfigValue(value, filePath, insideList);
    }
    return tree;
  }

  throw new ParseError(`Unsupported value of type ${typeof raw} in config document`, ErrorCode.PARSE_FAILED, {
    filePath,
  });
}
