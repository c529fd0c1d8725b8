/**
 * YamlDocumentParser Tests
 */

import { describe, it, expect } from "vitest";
import { ErrorCode, ParseError } from "../../errors.js";
import { YamlDocumentParser } from "../yaml-parser.js";

describe("YamlDocumentParser", () => {
  const parser = new YamlDocumentParser();

  describe("parse", () => {
    it("should parse nested mappings, lists and scalars", () => {
      const tree = parser.parse(
        ["system:", "  name: Demo", "  live: true", "  retries: 3", "tags:", "  - a", "  - b", "empty: ~"].join("\n")
      );

      expect(tree).toEqual({
        system: { name: "Demo", live: true, retries: 3 },
        tags: ["a", "b"],
        empty: null,
      });
    });

    it("should treat an empty document as an empty tree", () => {
      expect(parser.parse("")).toEqual({});
      expect(parser.parse("# only a comment\n")).toEqual({});
    });

    it("should reject a document that is not a mapping", () => {
      try {
        parser.parse("- a\n- b\n", "/tmp/list.yaml");
        expect.unreachable("parse should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(ParseError);
        if (error instanceof ParseError) {
          expect(error.code).toBe(ErrorCode.PARSE_NOT_A_MAPPING);
          expect(error.filePath).toBe("/tmp/list.yaml");
        }
      }
    });

    it("should reject mapping keys that contain a dot", () => {
      try {
        parser.parse("plugins:\n  seo.v2:\n    enabled: true\n", "/tmp/dotted.yaml");
        expect.unreachable("parse should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(ParseError);
        if (error instanceof ParseError) {
          expect(error.code).toBe(ErrorCode.PARSE_INVALID_KEY);
          expect(error.message).toBe('Config key "seo.v2" may not contain "."');
          expect(error.filePath).toBe("/tmp/dotted.yaml");
        }
      }
    });

    it("should accept dotted keys inside list items", () => {
      expect(parser.parse("hosts:\n  - example.test: 1\n")).toEqual({ hosts: [{ "example.test": 1 }] });
    });

    it("should report syntax errors with a location", () => {
      try {
        parser.parse("a: [1, 2\nb: 3\n", "/tmp/broken.yaml");
        expect.unreachable("parse should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(ParseError);
        if (error instanceof ParseError) {
          expect(error.code).toBe(ErrorCode.PARSE_SYNTAX_ERROR);
          expect(error.filePath).toBe("/tmp/broken.yaml");
          expect(error.line).toBeGreaterThan(0);
        }
      }
    });
  });

  describe("parseValue", () => {
    it("should keep YAML scalar types", () => {
      expect(parser.parseValue("true")).toBe(true);
      expect(parser.parseValue("42")).toBe(42);
      expect(parser.parseValue("hello")).toBe("hello");
      expect(parser.parseValue("[a, b]")).toEqual(["a", "b"]);
      expect(parser.parseValue("{x: 1}")).toEqual({ x: 1 });
    });
  });

  describe("serialize", () => {
    it("should round-trip a tree", () => {
      const tree = { plugins: { seo: { enabled: true, weight: 1.5, tags: ["x"] } }, name: "Demo" };
      expect(parser.parse(parser.serialize(tree))).toEqual(tree);
    });

    it("should indent with two spaces by default", () => {
      expect(parser.serialize({ a: { b: 1 } })).toBe("a:\n  b: 1\n");
    });
  });
});
