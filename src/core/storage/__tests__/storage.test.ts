/**
 * Storage Collaborator Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { JsonFileRecordStore, SNAPSHOT_FILE } from "../json-record-store.js";
import { MemoryRecordStore } from "../memory-record-store.js";
import { MemoryStalenessCache } from "../memory-staleness-cache.js";
import { JsonFileCache } from "../json-file-cache.js";
import { NodeFileSystem } from "../node-file-system.js";

describe("Storage", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "projconfig-storage-"));
  });

  afterEach(async () => {
    vi.useRealTimers();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("JsonFileRecordStore", () => {
    it("should return null before anything is saved", async () => {
      const store = new JsonFileRecordStore(path.join(tempDir, "data"));
      expect(await store.loadSnapshot()).toBeNull();
      expect(await store.loadConfigMap()).toBeNull();
    });

    it("should save payloads into the data directory", async () => {
      const dataDir = path.join(tempDir, "data");
      const store = new JsonFileRecordStore(dataDir);

      await store.saveSnapshot('{"a":1}');
      await store.saveConfigMap('{"a":"/cfg/project.yaml"}');

      expect(await store.loadSnapshot()).toBe('{"a":1}');
      expect(await store.loadConfigMap()).toBe('{"a":"/cfg/project.yaml"}');
      expect(await fs.readFile(path.join(dataDir, SNAPSHOT_FILE), "utf-8")).toBe('{"a":1}');
    });
  });

  describe("MemoryRecordStore", () => {
    it("should start from the initial payloads", async () => {
      const store = new MemoryRecordStore({ snapshot: "{}" });
      expect(await store.loadSnapshot()).toBe("{}");
      expect(await store.loadConfigMap()).toBeNull();

      await store.saveConfigMap('{"x":"y"}');
      expect(store.configMap).toBe('{"x":"y"}');
    });
  });

  describe("MemoryStalenessCache", () => {
    it("should hand out copies", async () => {
      const cache = new MemoryStalenessCache();
      const times = { "/cfg/project.yaml": 100 };
      await cache.set("files", times, 60_000);
      times["/cfg/project.yaml"] = 200;

      const cached = await cache.get("files");
      expect(cached).toEqual({ "/cfg/project.yaml": 100 });
    });

    it("should expire entries after their TTL", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));

      const cache = new MemoryStalenessCache();
      await cache.set("files", { "/cfg/project.yaml": 100 }, 1000);

      vi.setSystemTime(new Date("2026-01-01T00:00:01Z"));
      expect(await cache.get("files")).toEqual({ "/cfg/project.yaml": 100 });

      vi.setSystemTime(new Date("2026-01-01T00:00:01.500Z"));
      expect(await cache.get("files")).toBeUndefined();
    });
  });

  describe("JsonFileCache", () => {
    it("should persist entries across instances", async () => {
      const filePath = path.join(tempDir, "cache", "times.json");
      await new JsonFileCache(filePath).set("files", { "/cfg/a.yaml": 5 }, 60_000);

      expect(await new JsonFileCache(filePath).get("files")).toEqual({ "/cfg/a.yaml": 5 });
    });

    it("should drop expired entries", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));

      const filePath = path.join(tempDir, "times.json");
      const cache = new JsonFileCache(filePath);
      await cache.set("files", { "/cfg/a.yaml": 5 }, 1000);

      vi.setSystemTime(new Date("2026-01-01T00:00:02Z"));
      expect(await cache.get("files")).toBeUndefined();
    });

    it("should ignore a corrupt cache file", async () => {
      const filePath = path.join(tempDir, "times.json");
      await fs.writeFile(filePath, "not json");

      expect(await new JsonFileCache(filePath).get("files")).toBeUndefined();
    });
  });

  describe("NodeFileSystem", () => {
    it("should read missing files as null and create parents on write", async () => {
      const fileSystem = new NodeFileSystem();
      const target = path.join(tempDir, "nested", "dir", "file.yaml");

      expect(await fileSystem.read(target)).toBeNull();
      expect(await fileSystem.lastModified(target)).toBeNull();

      await fileSystem.write(target, "a: 1\n");
      expect(await fileSystem.exists(target)).toBe(true);
      expect(await fileSystem.read(target)).toBe("a: 1\n");
      expect(await fileSystem.lastModified(target)).toBeGreaterThan(0);
    });

    it("should check containment", () => {
      const fileSystem = new NodeFileSystem();
      expect(fileSystem.isContained("/cfg", "/cfg/sub/a.yaml")).toBe(true);
      expect(fileSystem.isContained("/cfg", "/cfg/..other.yaml")).toBe(true);
      expect(fileSystem.isContained("/cfg", "/etc/passwd")).toBe(false);
      expect(fileSystem.isContained("/cfg", "/cfg/../secret.yaml")).toBe(false);
    });
  });
});
