import { describe, expect, it } from "vitest";

import { AnalysisCache } from "../analysisCache";

describe("AnalysisCache", () => {
  it("returns values until they expire", () => {
    let now = 1_000;
    const cache = new AnalysisCache<string>(() => now);

    cache.set("analysis:1", "cached", 500);
    expect(cache.get("analysis:1")).toBe("cached");

    now = 1_501;
    expect(cache.get("analysis:1")).toBeNull();
    expect(cache.size).toBe(0);
  });

  it("invalidates by key prefix", () => {
    const cache = new AnalysisCache<number>();
    cache.set("analysis:1", 1, 60_000);
    cache.set("analysis:2", 2, 60_000);
    cache.set("other", 3, 60_000);

    cache.invalidate("analysis:");

    expect(cache.get("analysis:1")).toBeNull();
    expect(cache.get("analysis:2")).toBeNull();
    expect(cache.get("other")).toBe(3);
  });
});
