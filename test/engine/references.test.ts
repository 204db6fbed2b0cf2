import { describe, expect, it } from "vitest";
import {
  parseReferences,
  resolveFirst,
  resolveProduct,
  resolveProducts,
  resolveReferences,
  resolveUrl,
  selectUrl,
} from "../../src/engine/references.js";
import type { TaskOutput } from "../../src/engine/types.js";
import { custom, scrapeOutput, searchOutput } from "../helpers.js";

describe("parseReferences", () => {
  it("parses a single reference", () => {
    expect(parseReferences("task:0")).toEqual([{ raw: "task:0", index: 0 }]);
  });

  it("parses comma-separated references in order", () => {
    expect(parseReferences("task:3, task:1").map((r) => r.index)).toEqual([3, 1]);
  });

  it("returns nothing for empty or missing expressions", () => {
    expect(parseReferences(undefined)).toEqual([]);
    expect(parseReferences(null)).toEqual([]);
    expect(parseReferences("")).toEqual([]);
    expect(parseReferences(" , ,")).toEqual([]);
  });

  it("marks malformed references instead of throwing", () => {
    expect(parseReferences("task:x")).toEqual([{ raw: "task:x", index: null }]);
    expect(parseReferences("task0")).toEqual([{ raw: "task0", index: null }]);
    expect(parseReferences("task:-1")).toEqual([{ raw: "task:-1", index: null }]);
    expect(parseReferences("task:1.5")).toEqual([{ raw: "task:1.5", index: null }]);
  });

  it("tolerates whitespace around the index", () => {
    expect(parseReferences(" task: 4 ")).toEqual([{ raw: "task: 4", index: 4 }]);
  });

  it("keeps valid references next to malformed ones", () => {
    expect(parseReferences("task:1,bogus,task:2").map((r) => r.index)).toEqual([1, null, 2]);
  });
});

describe("resolving references", () => {
  const results: TaskOutput[] = [
    searchOutput(["http://a", "http://b", "http://c"]),
    scrapeOutput("Desk Lamp", "http://a"),
    { kind: "scrape", productData: null, url: "http://b", error: "blocked" },
    scrapeOutput("Floor Lamp", "http://c"),
  ];

  it("returns exactly the referenced results in reference order", () => {
    const resolved = resolveReferences(results, "task:0,task:2");
    expect(resolved).toHaveLength(2);
    expect(resolved[0]).toBe(results[0]);
    expect(resolved[1]).toBe(results[2]);
    expect(resolved).not.toContain(results[1]);
  });

  it("resolves absent and malformed references to undefined", () => {
    expect(resolveReferences(results, "task:9,task:x,task:1")).toEqual([undefined, undefined, results[1]]);
  });

  it("resolveFirst uses only the first reference", () => {
    expect(resolveFirst(results, "task:1,task:3")).toBe(results[1]);
    expect(resolveFirst(results, undefined)).toBeUndefined();
  });

  it("resolveProduct returns product data of a scrape", () => {
    expect(resolveProduct(results, "task:1")?.title).toBe("Desk Lamp");
    expect(resolveProduct(results, "task:0")).toBeNull();
    expect(resolveProduct(results, "task:2")).toBeNull();
  });

  it("resolveProducts skips references without product data", () => {
    const titles = resolveProducts(results, "task:1,task:2,task:7,task:3").map((p) => p.title);
    expect(titles).toEqual(["Desk Lamp", "Floor Lamp"]);
  });
});

describe("selectUrl", () => {
  const search = searchOutput(["http://a", "http://b", "http://c"]);

  it("picks the element at urlIndex", () => {
    expect(selectUrl(search, 0)).toBe("http://a");
    expect(selectUrl(search, 2)).toBe("http://c");
  });

  it("falls back to element 0 when urlIndex is out of range", () => {
    expect(selectUrl(search, 3)).toBe("http://a");
    expect(selectUrl(search, -1)).toBe("http://a");
    expect(selectUrl(search, 0.5)).toBe("http://a");
  });

  it("falls back to primaryUrl when the list is empty", () => {
    expect(selectUrl(searchOutput([], { primaryUrl: "http://primary" }))).toBe("http://primary");
    expect(selectUrl(searchOutput([]))).toBeNull();
  });

  it("uses the url of a scrape output", () => {
    expect(selectUrl(scrapeOutput("Lamp", "http://lamp"), 4)).toBe("http://lamp");
  });

  it("returns null for outputs without URLs", () => {
    expect(selectUrl(undefined)).toBeNull();
    expect(selectUrl(custom("note"))).toBeNull();
  });

  it("resolveUrl follows fromTask and urlIndex", () => {
    const results = [search];
    expect(resolveUrl(results, { fromTask: "task:0", urlIndex: 1 })).toBe("http://b");
    expect(resolveUrl(results, { fromTask: "task:0", urlIndex: 0 })).toBe("http://a");
    expect(resolveUrl(results, { fromTask: "task:4", urlIndex: 0 })).toBeNull();
    expect(resolveUrl(results, { urlIndex: 0 })).toBeNull();
  });
});
