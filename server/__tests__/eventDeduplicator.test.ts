import { describe, it, expect } from "vitest";
import { EventDeduplicator } from "../services/eventDeduplicator";

describe("EventDeduplicator", () => {
  it("reports an event the second time it is seen", () => {
    const dedupe = new EventDeduplicator();

    expect(dedupe.isDuplicate("Ev1")).toBe(false);
    expect(dedupe.isDuplicate("Ev1")).toBe(true);
    expect(dedupe.isDuplicate("Ev2")).toBe(false);
  });

  it("matches on any of several keys", () => {
    const dedupe = new EventDeduplicator();

    expect(dedupe.isDuplicate("Ev1", "ts:C1:1.2")).toBe(false);
    expect(dedupe.isDuplicate("Ev9", "ts:C1:1.2")).toBe(true);
  });

  it("treats blank or missing keys as new", () => {
    const dedupe = new EventDeduplicator();

    expect(dedupe.isDuplicate(undefined, "  ")).toBe(false);
    expect(dedupe.isDuplicate(undefined, "  ")).toBe(false);
    expect(dedupe.size).toBe(0);
  });

  it("forgets events after the TTL", () => {
    let now = 0;
    const dedupe = new EventDeduplicator({ ttlMs: 1000, now: () => now });

    dedupe.isDuplicate("Ev1");
    now = 999;
    expect(dedupe.isDuplicate("Ev1")).toBe(true);
    now = 2000;
    expect(dedupe.isDuplicate("Ev1")).toBe(false);
  });

  it("evicts the oldest entries when full", () => {
    const dedupe = new EventDeduplicator({ maxEntries: 2, now: () => 0 });

    dedupe.isDuplicate("Ev1");
    dedupe.isDuplicate("Ev2");
    dedupe.isDuplicate("Ev3");

    expect(dedupe.size).toBe(2);
    expect(dedupe.isDuplicate("Ev1")).toBe(false);
  });
});
