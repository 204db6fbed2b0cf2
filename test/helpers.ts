import type { z } from "zod";
import type {
  HandlerContext,
  RunStateView,
  ScrapeOutput,
  SearchOutput,
  TaskHandler,
  TaskOutput,
} from "../src/engine/types.js";
import type { Task, TaskAction } from "../src/planner/types.js";
import type { ProductData, SearchResult } from "../src/schemas.js";
import { parseJsonResponse, type CompleteOptions, type LlmClient } from "../src/services/llm.js";

export function product(title: string | null, extra?: Partial<ProductData>): ProductData {
  return { title, features: [], images: [], ...extra };
}

export function searchOutput(urls: string[], extra?: Partial<SearchOutput>): SearchOutput {
  return {
    kind: "search",
    searchResults: urls.map((url) => ({ url, title: url, content: "" })),
    productUrls: urls,
    primaryUrl: urls[0] ?? null,
    resultsCount: urls.length,
    ...extra,
  };
}

export function scrapeOutput(title: string | null, url: string, extra?: Partial<ProductData>): ScrapeOutput {
  return { kind: "scrape", productData: product(title, { url, ...extra }), url };
}

export function searchResult(url: string, title = "", extra?: Partial<SearchResult>): SearchResult {
  return { url, title, content: "", ...extra };
}

/** A handler around a plain function, without the FunctionHandler timeout wrapper. */
export function handler(
  action: TaskAction,
  run: (state: RunStateView, task: Task, ctx: HandlerContext) => TaskOutput | Promise<TaskOutput>,
): TaskHandler {
  return { action, run: async (state, task, ctx) => run(state, task, ctx) };
}

export function custom(action: TaskAction, data: Record<string, unknown> = {}): TaskOutput {
  return { kind: "custom", action, data };
}

export function testContext(overrides?: Partial<HandlerContext>): HandlerContext & { reports: Array<[string, string]> } {
  const reports: Array<[string, string]> = [];
  return {
    runId: "run-test",
    deepResearch: false,
    taskIndex: 0,
    signal: new AbortController().signal,
    report: (status, message) => {
      reports.push([status, message]);
    },
    ...overrides,
    reports,
  };
}

type Reply = string | Error | ((prompt: string, opts?: CompleteOptions) => string);

/** Scripted LLM: answers each call with the next reply, recording every prompt. */
export class FakeLlm implements LlmClient {
  readonly calls: Array<{ prompt: string; opts?: CompleteOptions }> = [];
  private replies: Reply[];

  constructor(...replies: Reply[]) {
    this.replies = replies;
  }

  async complete(prompt: string, opts?: CompleteOptions): Promise<string> {
    this.calls.push({ prompt, opts });
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) throw new Error("FakeLlm has no reply configured");
    if (reply instanceof Error) throw reply;
    return typeof reply === "function" ? reply(prompt, opts) : reply;
  }

  async completeJson<T extends z.ZodTypeAny>(prompt: string, schema: T, opts?: CompleteOptions): Promise<z.output<T>> {
    return parseJsonResponse(await this.complete(prompt, { ...opts, json: true }), schema);
  }
}
