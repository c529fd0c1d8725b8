import { describe, it, expect } from "vitest";
import { EventBus } from "../events.js";

interface TestEvents {
  tick: { count: number };
  done: { ok: boolean };
}

describe("EventBus", () => {
  it("should deliver payloads to subscribers in order", () => {
    const bus = new EventBus<TestEvents>();
    const seen: string[] = [];

    bus.on("tick", ({ count }) => seen.push(`a${count}`));
    bus.on("tick", ({ count }) => seen.push(`b${count}`));
    bus.emit("tick", { count: 1 });

    expect(seen).toEqual(["a1", "b1"]);
    expect(bus.listenerCount("tick")).toBe(2);
    expect(bus.listenerCount("done")).toBe(0);
  });

  it("should stop delivering after unsubscribe", () => {
    const bus = new EventBus<TestEvents>();
    const seen: number[] = [];

    const off = bus.on("tick", ({ count }) => seen.push(count));
    bus.emit("tick", { count: 1 });
    off();
    bus.emit("tick", { count: 2 });

    expect(seen).toEqual([1]);
  });

  it("should deliver a once handler a single time", () => {
    const bus = new EventBus<TestEvents>();
    const seen: boolean[] = [];

    bus.once("done", ({ ok }) => seen.push(ok));
    bus.emit("done", { ok: true });
    bus.emit("done", { ok: false });

    expect(seen).toEqual([true]);
  });

  it("should drop every handler on clear", () => {
    const bus = new EventBus<TestEvents>();
    bus.on("tick", () => undefined);
    bus.on("done", () => undefined);

    bus.clear();

    expect(bus.listenerCount("tick")).toBe(0);
    expect(bus.listenerCount("done")).toBe(0);
  });
});
