/**
 * ReconcilePass Tests
 */

import { describe, it, expect } from "vitest";
import type { ChangeSet, ConfigEvent, ConfigTree } from "../../../types/index.js";
import { classifyChange, ReconcilePass, type ReconcileState } from "../reconcile-pass.js";
import { EventRegistry } from "../../events/event-registry.js";
import { createProjectConfigEventBus, type ConfigItemEvent } from "../../events/project-config-events.js";
import { diffTrees } from "../../diff/diff-engine.js";

interface Harness {
  pass: ReconcilePass;
  registry: EventRegistry;
  stored: ConfigTree;
  dirtyCount: () => number;
}

function createHarness(stored: ConfigTree, desired: ConfigTree): Harness {
  const registry = new EventRegistry();
  let dirty = 0;
  const state: ReconcileState = {
    readStored: () => stored,
    readDesired: () => desired,
    markStoredDirty: () => {
      dirty++;
    },
  };
  return { pass: new ReconcilePass({ state, registry }), registry, stored, dirtyCount: () => dirty };
}

describe("classifyChange", () => {
  it("should classify old/new pairs", () => {
    expect(classifyChange(1, null)).toBe("remove");
    expect(classifyChange(null, 1)).toBe("add");
    expect(classifyChange(1, 2)).toBe("update");
    expect(classifyChange({ a: 1 }, { a: 1 })).toBeNull();
    expect(classifyChange(null, null)).toBeNull();
    expect(classifyChange({}, null)).toBeNull();
    expect(classifyChange({ a: 1 }, {})).toBe("remove");
  });
});

describe("ReconcilePass", () => {
  it("should fire an update with old and new values and write the new value", async () => {
    const { pass, registry, stored, dirtyCount } = createHarness({ x: { y: 1 } }, { x: { y: 2 } });
    const events: ConfigEvent[] = [];
    registry.subscribe("update", "x", (event) => {
      events.push(event);
    });

    const report = await pass.run(diffTrees({ x: { y: 2 } }, { x: { y: 1 } }));

    expect(report.fired).toEqual([{ kind: "update", path: "x" }]);
    expect(events).toHaveLength(1);
    expect(events[0]?.oldValue).toEqual({ y: 1 });
    expect(events[0]?.newValue).toEqual({ y: 2 });
    expect(stored).toEqual({ x: { y: 2 } });
    expect(dirtyCount()).toBe(1);
  });

  it("should fire one add for a new subtree and let a handler process nested paths", async () => {
    const desired: ConfigTree = { a: { b: 1 } };
    const { pass, registry, stored } = createHarness({}, desired);
    registry.subscribe("add", "a", async () => {
      await pass.processPath("a.b");
    });

    const report = await pass.run(diffTrees(desired, {}));

    expect(report.fired).toEqual([
      { kind: "add", path: "a" },
      { kind: "add", path: "a.b" },
    ]);
    expect(stored).toEqual({ a: { b: 1 } });
  });

  it("should fire a remove with the old value", async () => {
    const { pass, registry, stored } = createHarness({ a: 1 }, {});
    const events: ConfigEvent[] = [];
    registry.subscribe("remove", "a", (event) => {
      events.push(event);
    });

    await pass.run(diffTrees({}, { a: 1 }));

    expect(events.map(({ kind, oldValue, newValue }) => ({ kind, oldValue, newValue }))).toEqual([
      { kind: "remove", oldValue: 1, newValue: null },
    ]);
    expect(stored).toEqual({});
  });

  it("should process each path once per pass", async () => {
    const desired: ConfigTree = { a: { b: 1 } };
    const { pass, registry } = createHarness({ a: 1 }, desired);
    let calls = 0;
    registry.subscribe("update", "a", async () => {
      calls++;
      await pass.processPath("a");
    });

    const changes = diffTrees(desired, { a: 1 });
    expect(changes.removed).toEqual(["a"]);
    expect(changes.added).toEqual(["a"]);

    const report = await pass.run(changes);

    expect(calls).toBe(1);
    expect(report.fired).toEqual([{ kind: "update", path: "a" }]);
  });

  it("should process deepest paths first within a category", async () => {
    const desired: ConfigTree = { a: { b: { c: { d: 1 }, e: 2 } } };
    const { pass } = createHarness({}, desired);
    const changes: ChangeSet = { added: ["a.b.c", "a.b"], changed: [], removed: [] };

    const report = await pass.run(changes);

    expect(report.processed).toEqual(["a.b.c", "a.b"]);
  });

  it("should settle removals before changes before additions", async () => {
    const stored: ConfigTree = { old: 1, kept: { v: 1 } };
    const desired: ConfigTree = { kept: { v: 2 }, fresh: 1 };
    const { pass } = createHarness(stored, desired);

    const report = await pass.run(diffTrees(desired, stored));

    expect(report.fired).toEqual([
      { kind: "remove", path: "old" },
      { kind: "update", path: "kept" },
      { kind: "add", path: "fresh" },
    ]);
  });

  it("should reprocess the matched prefix when a change is deeper than the pattern", async () => {
    const stored: ConfigTree = { plugins: { abc123: { enabled: true, settings: { color: "red" } } } };
    const desired: ConfigTree = { plugins: { abc123: { enabled: true, settings: { color: "blue" } } } };
    const { pass, registry } = createHarness(stored, desired);
    const received: Array<{ path: string; tokens: string[] }> = [];
    registry.subscribe("update", "plugins.{uid}", (event) => {
      received.push({ path: event.path, tokens: event.tokenMatches });
    });

    const changes = diffTrees(desired, stored);
    expect(changes.changed).toEqual(["plugins.abc123.settings"]);

    const report = await pass.run(changes);

    expect(received).toEqual([{ path: "plugins.abc123", tokens: ["abc123"] }]);
    expect(report.fired).toEqual([
      { kind: "update", path: "plugins.abc123.settings" },
      { kind: "update", path: "plugins.abc123" },
    ]);
    expect(stored).toEqual(desired);
  });

  it("should allow a forgotten path to be processed again", async () => {
    const stored: ConfigTree = {};
    const desired: ConfigTree = { a: 1 };
    const { pass } = createHarness(stored, desired);

    expect(await pass.processPath("a")).toBe("add");
    desired.a = 2;
    expect(await pass.processPath("a")).toBeNull();

    pass.forget("a");
    expect(await pass.processPath("a")).toBe("update");
    expect(stored).toEqual({ a: 2 });
  });

  it("should skip unchanged paths without writing", async () => {
    const { pass, dirtyCount } = createHarness({ a: 1 }, { a: 1 });

    expect(await pass.processPath("a")).toBeNull();
    expect(dirtyCount()).toBe(0);
  });

  it("should give handlers copies of the values", async () => {
    const desired: ConfigTree = { a: { list: [1] } };
    const { pass, registry, stored } = createHarness({}, desired);
    registry.subscribe("add", "a", (event) => {
      if (event.newValue !== null && typeof event.newValue === "object" && !Array.isArray(event.newValue)) {
        event.newValue.list = [99];
      }
    });

    await pass.processPath("a");

    expect(stored).toEqual({ a: { list: [1] } });
    expect(desired).toEqual({ a: { list: [1] } });
  });

  it("should publish every fired event on the event bus", async () => {
    const registry = new EventRegistry();
    const events = createProjectConfigEventBus();
    const items: ConfigItemEvent[] = [];
    events.on("config:item", (item) => items.push(item));
    const stored: ConfigTree = {};
    const pass = new ReconcilePass({
      registry,
      events,
      state: { readStored: () => stored, readDesired: () => ({ a: 1 }), markStoredDirty: () => undefined },
    });

    await pass.processPath("a");

    expect(items).toEqual([{ kind: "add", path: "a", oldValue: null, newValue: 1 }]);
  });

  it("should start over after reset", async () => {
    const { pass } = createHarness({}, { a: 1 });
    await pass.processPath("a");

    pass.reset();

    expect(pass.isProcessed("a")).toBe(false);
    expect(pass.report()).toEqual({ processed: [], fired: [] });
  });
});
