/**
 * ModificationCache Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { ModificationCache, MODIFIED_TIMES_CACHE_KEY } from "../modification-cache.js";
import { MemoryStalenessCache } from "../../storage/memory-staleness-cache.js";
import { NodeFileSystem } from "../../storage/node-file-system.js";

describe("ModificationCache", () => {
  let tempDir: string;
  let fileA: string;
  let fileB: string;
  let store: MemoryStalenessCache;
  let cache: ModificationCache;

  const setModified = async (filePath: string, seconds: number): Promise<void> => {
    await fs.utimes(filePath, seconds, seconds);
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "projconfig-mtime-"));
    fileA = path.join(tempDir, "a.yaml");
    fileB = path.join(tempDir, "b.yaml");
    await fs.writeFile(fileA, "a: 1\n");
    await fs.writeFile(fileB, "b: 1\n");
    await setModified(fileA, 1_700_000_000);
    await setModified(fileB, 1_700_000_000);

    store = new MemoryStalenessCache();
    cache = new ModificationCache({ cache: store, fileSystem: new NodeFileSystem() });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should be stale when nothing is cached", async () => {
    expect(await cache.isStale([fileA])).toBe(true);
  });

  it("should not be stale right after persisting", async () => {
    await cache.persist([fileA, fileB]);

    expect(await cache.isStale([fileA, fileB])).toBe(false);
  });

  it("should be stale when a file was modified after the snapshot", async () => {
    await cache.persist([fileA, fileB]);
    await setModified(fileB, 1_700_000_100);

    expect(await cache.isStale([fileA, fileB])).toBe(true);
  });

  it("should be stale when a cached file disappeared", async () => {
    await cache.persist([fileA, fileB]);
    await fs.rm(fileB);

    expect(await cache.isStale([fileA])).toBe(true);
  });

  it("should be stale when an existing file is missing from the cache", async () => {
    await cache.persist([fileA]);

    expect(await cache.isStale([fileA, fileB])).toBe(true);
  });

  it("should not require an entry for listed files that do not exist", async () => {
    const missing = path.join(tempDir, "missing.yaml");
    await cache.persist([fileA, missing]);

    expect(await cache.snapshot([fileA, missing])).toEqual({ [fileA]: 1_700_000_000_000 });
    expect(await cache.isStale([fileA, missing])).toBe(false);
  });

  it("should store snapshots under the configured key", async () => {
    await cache.persist([fileA]);

    expect(await store.get(MODIFIED_TIMES_CACHE_KEY)).toEqual({ [fileA]: 1_700_000_000_000 });
  });

  it("should renew the cached entry when the files are unchanged", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
    const shortLived = new ModificationCache({ cache: store, fileSystem: new NodeFileSystem(), ttlMs: 1000 });
    await shortLived.persist([fileA]);

    vi.setSystemTime(new Date("2026-01-01T00:00:00.800Z"));
    expect(await shortLived.isStale([fileA])).toBe(false);

    vi.setSystemTime(new Date("2026-01-01T00:00:01.500Z"));
    expect(await store.get(MODIFIED_TIMES_CACHE_KEY)).toEqual({ [fileA]: 1_700_000_000_000 });
  });
});
