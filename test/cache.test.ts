import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Cache } from "../src/utils/cache.js";

describe("Cache", () => {
  let cache: Cache<string>;

  beforeEach(() => {
    cache = new Cache<string>({ ttlMs: 1000, maxEntries: 3 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("stores and retrieves values", () => {
    cache.set("a", "1");
    expect(cache.get("a")).toBe("1");
    expect(cache.get("missing")).toBeUndefined();
  });

  it("expires entries after the TTL", () => {
    vi.useFakeTimers();
    cache.set("a", "1");
    vi.advanceTimersByTime(999);
    expect(cache.get("a")).toBe("1");
    vi.advanceTimersByTime(2);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("evicts the least recently used entry at capacity", () => {
    cache.set("a", "1");
    cache.set("b", "2");
    cache.set("c", "3");
    cache.get("a");
    cache.set("d", "4");

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe("1");
    expect(cache.get("d")).toBe("4");
    expect(cache.getStats().evictions).toBe(1);
  });

  it("overwriting a key does not evict others", () => {
    cache.set("a", "1");
    cache.set("b", "2");
    cache.set("c", "3");
    cache.set("a", "updated");

    expect(cache.size).toBe(3);
    expect(cache.get("a")).toBe("updated");
    expect(cache.getStats().evictions).toBe(0);
  });

  it("counts hits and misses", () => {
    cache.set("a", "1");
    cache.get("a");
    cache.get("a");
    cache.get("b");
    expect(cache.getStats()).toEqual({ size: 1, hits: 2, misses: 1, evictions: 0, shared: 0 });
  });

  it("delete() and clear() remove entries", () => {
    cache.set("a", "1");
    cache.set("b", "2");
    expect(cache.delete("a")).toBe(true);
    expect(cache.delete("a")).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  describe("key", () => {
    it("normalises case and whitespace in strings", () => {
      expect(Cache.key("  USB   hub ", 5)).toBe(Cache.key("usb hub", 5));
    });

    it("distinguishes parts", () => {
      expect(Cache.key("usb hub", 5)).not.toBe(Cache.key("usb hub", 10));
      expect(Cache.key("ab", "c")).not.toBe(Cache.key("a", "bc"));
      expect(Cache.key("usb hub")).toHaveLength(16);
    });
  });

  describe("load", () => {
    it("calls the loader once and caches its value", async () => {
      const loader = vi.fn(async () => "loaded");

      await expect(cache.load("k", loader)).resolves.toBe("loaded");
      await expect(cache.load("k", loader)).resolves.toBe("loaded");

      expect(loader).toHaveBeenCalledTimes(1);
    });

    it("shares a load already in flight", async () => {
      let resolve: (value: string) => void = () => {};
      const loader = vi.fn(
        () =>
          new Promise<string>((r) => {
            resolve = r;
          }),
      );

      const first = cache.load("k", loader);
      const second = cache.load("k", loader);
      resolve("once");

      await expect(Promise.all([first, second])).resolves.toEqual(["once", "once"]);
      expect(loader).toHaveBeenCalledTimes(1);
      expect(cache.getStats().shared).toBe(1);
    });

    it("does not cache failures", async () => {
      const loader = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Error("down")).mockResolvedValueOnce("up");

      await expect(cache.load("k", loader)).rejects.toThrow("down");
      await expect(cache.load("k", loader)).resolves.toBe("up");
      expect(loader).toHaveBeenCalledTimes(2);
    });
  });
});
