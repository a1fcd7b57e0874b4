import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ScrollPlanCache, cacheKey, loadStore } from "../../src/plan/cache.js";
import type { ScrollPlan } from "../../src/types.js";

let dir: string;
let file: string;

const plan: ScrollPlan = {
  moreScrollCount: 8,
  moreElementY: 3000,
  domainScrollCount: 2,
  domainElementY: 1593,
  domainPage: 4,
  viewportHeight: 1334,
  gestureDistance: 400,
  calculated: true,
};

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "scroll-pilot-cache-"));
  file = join(dir, "plans.json");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("ScrollPlanCache", () => {
  it("returns absent for an unknown pair and persists the reset counter", async () => {
    const cache = await ScrollPlanCache.open(file, { refreshInterval: 10 });
    expect(await cache.get("coffee", "example.com")).toBeUndefined();

    const stored = JSON.parse(await readFile(file, "utf-8"));
    expect(stored).toEqual({ cache: {}, useCount: { [cacheKey("coffee", "example.com")]: 0 } });
  });

  it("returns the plan right after set", async () => {
    const cache = await ScrollPlanCache.open(file, { refreshInterval: 10 });
    await cache.set("coffee", "example.com", plan);
    expect(await cache.get("coffee", "example.com")).toEqual(plan);
    expect(cache.count("coffee", "example.com")).toBe(1);
  });

  it("expires a plan after refreshInterval uses", async () => {
    const cache = await ScrollPlanCache.open(file, { refreshInterval: 10 });

    expect(await cache.get("coffee", "example.com")).toBeUndefined();
    await cache.set("coffee", "example.com", plan);

    for (let i = 0; i < 9; i++) {
      expect(await cache.get("coffee", "example.com")).toEqual(plan);
      await cache.increment("coffee", "example.com");
    }
    expect(cache.count("coffee", "example.com")).toBe(10);
    expect(await cache.get("coffee", "example.com")).toBeUndefined();
    expect(cache.count("coffee", "example.com")).toBe(0);

    // Stale stays stale until a fresh plan is stored.
    expect(await cache.get("coffee", "example.com")).toBeUndefined();
  });

  it("keeps pairs apart even when a field contains a separator-like character", async () => {
    const cache = await ScrollPlanCache.open(file, { refreshInterval: 10 });
    await cache.set("a|b", "c", plan);
    await cache.set("a", "b|c", { ...plan, domainPage: 1 });

    expect(cacheKey("a|b", "c")).not.toBe(cacheKey("a", "b|c"));
    expect((await cache.get("a|b", "c"))?.domainPage).toBe(4);
    expect((await cache.get("a", "b|c"))?.domainPage).toBe(1);
  });

  it("reloads identical plans and counters from disk", async () => {
    const first = await ScrollPlanCache.open(file, { refreshInterval: 10 });
    await first.set("coffee", "example.com", plan);
    await first.increment("coffee", "example.com");
    await first.set("tea", "example.org/shop", { ...plan, domainScrollCount: -1, domainPage: null });

    const second = await ScrollPlanCache.open(file, { refreshInterval: 10 });
    expect(second.snapshot()).toEqual(first.snapshot());
    expect(second.count("coffee", "example.com")).toBe(2);
    expect(await second.get("tea", "example.org/shop")).toEqual({ ...plan, domainScrollCount: -1, domainPage: null });
  });

  it("starts empty when the store is corrupt", async () => {
    await writeFile(file, "{ definitely not json");
    const cache = await ScrollPlanCache.open(file, { refreshInterval: 10 });
    expect(cache.size).toBe(0);
    expect(await cache.get("coffee", "example.com")).toBeUndefined();
  });

  it("starts empty when the store does not match the schema", async () => {
    await writeFile(file, JSON.stringify({ cache: { k: { moreScrollCount: "many" } }, useCount: {} }));
    expect(await loadStore(file)).toEqual({ cache: {}, useCount: {} });
  });

  it("keeps the store consistent under concurrent writes", async () => {
    const cache = await ScrollPlanCache.open(file, { refreshInterval: 10 });
    await Promise.all([
      cache.set("q1", "example.com", plan),
      cache.set("q2", "example.com", plan),
      cache.set("q3", "example.com", plan),
    ]);
    const reloaded = await loadStore(file);
    expect(Object.keys(reloaded.cache).sort()).toEqual(
      [cacheKey("q1", "example.com"), cacheKey("q2", "example.com"), cacheKey("q3", "example.com")].sort(),
    );
  });
});
