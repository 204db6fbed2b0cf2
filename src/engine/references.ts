import type { Task } from "../planner/types.js";
import type { ProductData } from "../schemas.js";
import type { TaskOutput } from "./types.js";

export type TaskReference = {
  /** The reference as written, trimmed. */
  raw: string;
  /** Index of the referenced task, or null when the reference is malformed. */
  index: number | null;
};

type Results = readonly Readonly<TaskOutput>[];

const INDEX_PATTERN = /^\d+$/;

/**
 * Split a `from_task` expression into references. Malformed entries (no
 * colon, non-numeric index) come back with `index: null` instead of throwing,
 * so one bad reference can't take the run down. Empty segments are dropped.
 */
export function parseReferences(expr: string | undefined | null): TaskReference[] {
  if (!expr) return [];
  return expr
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((raw) => {
      const colon = raw.indexOf(":");
      if (colon === -1) return { raw, index: null };
      const key = raw.slice(colon + 1).trim();
      if (!INDEX_PATTERN.test(key)) return { raw, index: null };
      const index = Number(key);
      return { raw, index: Number.isSafeInteger(index) ? index : null };
    });
}

/** Look up a referenced output. Absent or malformed references resolve to undefined. */
export function lookupResult(results: Results, ref: TaskReference): Readonly<TaskOutput> | undefined {
  if (ref.index === null) return undefined;
  return results[ref.index];
}

/** Every referenced output, in reference order, with absent entries left as undefined. */
export function resolveReferences(results: Results, expr: string | undefined | null): Array<Readonly<TaskOutput> | undefined> {
  return parseReferences(expr).map((ref) => lookupResult(results, ref));
}

/** The first reference's output, the common case for single-subject actions. */
export function resolveFirst(results: Results, expr: string | undefined | null): Readonly<TaskOutput> | undefined {
  const [first] = parseReferences(expr);
  return first ? lookupResult(results, first) : undefined;
}

/** The list-valued field of an output, if it exposes one. */
function listOf(output: Readonly<TaskOutput>): readonly string[] | undefined {
  return output.kind === "search" ? output.productUrls : undefined;
}

/** Conventional single-value URL fields, in order of preference. */
function singleUrlOf(output: Readonly<TaskOutput>): string | null {
  switch (output.kind) {
    case "search":
      return output.primaryUrl;
    case "scrape":
      return output.url;
    default:
      return null;
  }
}

/**
 * Pick one URL from a prior output. Applies `urlIndex` when in range,
 * otherwise element 0; an empty list falls back to the output's single
 * `primaryUrl`/`url` field.
 */
export function selectUrl(output: Readonly<TaskOutput> | undefined, urlIndex = 0): string | null {
  if (!output) return null;
  const list = listOf(output);
  if (list && list.length > 0) {
    if (Number.isInteger(urlIndex) && urlIndex >= 0 && urlIndex < list.length) {
      return list[urlIndex];
    }
    return list[0];
  }
  return singleUrlOf(output);
}

/** Resolve the URL a reference-following task (e.g. scrape) should work on. */
export function resolveUrl(results: Results, task: Pick<Task, "fromTask" | "urlIndex">): string | null {
  return selectUrl(resolveFirst(results, task.fromTask), task.urlIndex);
}

export function productDataOf(output: Readonly<TaskOutput> | undefined): ProductData | null {
  if (output?.kind !== "scrape") return null;
  return output.productData ?? null;
}

/** Product data from the task's first reference, or null when there is none. */
export function resolveProduct(results: Results, expr: string | undefined | null): ProductData | null {
  return productDataOf(resolveFirst(results, expr));
}

/**
 * Product data from every reference that yields some, in reference order.
 * Never throws; the caller decides whether the count is enough.
 */
export function resolveProducts(results: Results, expr: string | undefined | null): ProductData[] {
  const products: ProductData[] = [];
  for (const output of resolveReferences(results, expr)) {
    const data = productDataOf(output);
    if (data) products.push(data);
  }
  return products;
}
