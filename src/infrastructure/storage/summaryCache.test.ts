/**
 * Tests for the in-memory summary cache
 */
import { describe, expect, it } from "vitest";
import { InMemorySummaryCache } from "./summaryCache";
import { CacheConsistencyError } from "../../domain/entities";

const now = () => new Date("2024-01-02T03:04:05.000Z");

describe("InMemorySummaryCache", () => {
  it("should store and return summaries", () => {
    const cache = new InMemorySummaryCache({ now });
    cache.put("fp-1", "one");

    expect(cache.get("fp-1")).toBe("one");
    expect(cache.get("fp-2")).toBeUndefined();
    expect(cache.size).toBe(1);
  });

  it("should accept the same value twice", () => {
    const cache = new InMemorySummaryCache({ now });
    cache.put("fp-1", "one");
    cache.put("fp-1", "one");

    expect(cache.size).toBe(1);
  });

  it("should refuse a different value for a stored fingerprint", () => {
    const cache = new InMemorySummaryCache({ now });
    cache.put("fp-1", "one");

    expect(() => cache.put("fp-1", "uno")).toThrow(CacheConsistencyError);
    expect(cache.get("fp-1")).toBe("one");
  });

  it("should prune entries that are not live", () => {
    const cache = new InMemorySummaryCache({ now });
    cache.put("fp-1", "one");
    cache.put("fp-2", "two");
    cache.put("fp-3", "three");

    expect(cache.prune(new Set(["fp-2"]))).toBe(2);
    expect(cache.entries().map(([key]) => key)).toEqual(["fp-2"]);
  });

  it("should produce a sorted snapshot", () => {
    const cache = new InMemorySummaryCache({ now });
    cache.put("fp-b", "b");
    cache.put("fp-a", "a");

    const snapshot = cache.toSnapshot({ "z.py::z": "fp-b", "a.py::a": "fp-a" });

    expect(JSON.stringify(snapshot)).toBe(
      JSON.stringify({
        version: "1.0.0",
        entries: {
          "fp-a": { summary: "a", generatedAt: "2024-01-02T03:04:05.000Z" },
          "fp-b": { summary: "b", generatedAt: "2024-01-02T03:04:05.000Z" },
        },
        nodes: { "a.py::a": "fp-a", "z.py::z": "fp-b" },
      })
    );
  });

  it("should round-trip through a snapshot", () => {
    const cache = new InMemorySummaryCache({ now });
    cache.put("fp-1", "one");

    const restored = InMemorySummaryCache.fromSnapshot(cache.toSnapshot({}));

    expect(restored.entries()).toEqual(cache.entries());
  });
});
