import { describe, expect, it } from "vitest";
import { createRunState, recordResult, viewOf } from "../../src/engine/run-state.js";
import type { RunStateView, TaskOutput } from "../../src/engine/types.js";
import {
  createCompareHandler,
  createScrapeHandler,
  createSearchHandler,
  createSentimentHandler,
  createSummarizeHandler,
} from "../../src/handlers/index.js";
import { createPlan } from "../../src/planner/plan.js";
import type { Task } from "../../src/planner/types.js";
import type { SearchResult } from "../../src/schemas.js";
import { PageScraper, type PageFetcher } from "../../src/services/scraper.js";
import type { SearchClient, SearchOptions } from "../../src/services/search.js";
import { FakeLlm, scrapeOutput, searchOutput, searchResult, testContext } from "../helpers.js";

function stateOf(outputs: TaskOutput[], opts?: { query?: string; deepResearch?: boolean }): RunStateView {
  const state = createRunState(opts?.query ?? "usb microphone", {
    deepResearch: opts?.deepResearch,
    plan: createPlan({ intent: "product_research", tasks: outputs.map(() => ({ action: "search" })) }),
  });
  outputs.forEach((output, i) => recordResult(state, i, output));
  return viewOf(state);
}

function task(action: string, extra?: Partial<Task>): Task {
  return { action, urlIndex: 0, ...extra };
}

class FakeSearch implements SearchClient {
  readonly queries: string[] = [];

  constructor(private results: SearchResult[] | Error) {}

  async search(query: string, _opts?: SearchOptions): Promise<SearchResult[]> {
    this.queries.push(query);
    if (this.results instanceof Error) throw this.results;
    return this.results;
  }
}

class FakeFetcher implements PageFetcher {
  readonly urls: string[] = [];

  constructor(private html: string | Error) {}

  async fetch(url: string): Promise<string> {
    this.urls.push(url);
    if (this.html instanceof Error) throw this.html;
    return this.html;
  }
}

const PRODUCT_PAGE = `<html><head><title>Trail Runner 3</title>
<meta property="og:image" content="https://img.test/shoe.jpg"></head>
<body><p>Price: $89.99</p><p>4.6 out of 5 stars</p><p>1,024 ratings</p></body></html>`;

const SENTIMENT_JSON = JSON.stringify({
  overall: "positive",
  score: 0.8,
  positivePercentage: 70,
  neutralPercentage: 20,
  negativePercentage: 10,
  keyPositiveThemes: ["clear sound"],
  keyNegativeThemes: [],
  confidence: 0.9,
  analysisSummary: "Buyers like it.",
});

describe("search handler", () => {
  it("keeps only product pages when there are some", async () => {
    const client = new FakeSearch([
      searchResult("https://blog.test/best-mics", "Best mics"),
      searchResult("https://www.amazon.com/Mic-X/dp/B0TEST", "Mic X"),
    ]);
    const ctx = testContext();

    const output = await createSearchHandler(client).run(stateOf([]), task("search", { query: "mic x" }), ctx);

    expect(client.queries).toEqual(["mic x"]);
    expect(output).toMatchObject({
      kind: "search",
      productUrls: ["https://www.amazon.com/Mic-X/dp/B0TEST"],
      primaryUrl: "https://www.amazon.com/Mic-X/dp/B0TEST",
      resultsCount: 1,
    });
    expect(output.kind === "search" && output.searchResults).toHaveLength(2);
    expect(ctx.reports).toEqual([
      ["searching", "Searching web for: mic x"],
      ["completed", "Found 1 product URLs"],
    ]);
  });

  it("keeps every result URL when none is a product page", async () => {
    const client = new FakeSearch([searchResult("https://a.test/1"), searchResult("https://b.test/2")]);

    const output = await createSearchHandler(client).run(stateOf([]), task("search"), testContext());

    expect(client.queries).toEqual(["usb microphone"]);
    expect(output).toMatchObject({ productUrls: ["https://a.test/1", "https://b.test/2"], resultsCount: 2 });
  });

  it("returns an empty search output on failure", async () => {
    const output = await createSearchHandler(new FakeSearch(new Error("rate limited"))).run(
      stateOf([]),
      task("search", { query: "q" }),
      testContext(),
    );
    expect(output).toEqual({
      kind: "search",
      searchResults: [],
      productUrls: [],
      primaryUrl: null,
      resultsCount: 0,
      error: "rate limited",
    });
  });

  it("fails its task when no client is configured", async () => {
    const output = await createSearchHandler(null).run(stateOf([]), task("search", { query: "q" }), testContext());
    expect(output.error).toBe("Search client is not configured (set TAVILY_API_KEY)");
  });
});

describe("scrape handler", () => {
  it("scrapes the URL chosen by fromTask and urlIndex", async () => {
    const fetcher = new FakeFetcher(PRODUCT_PAGE);
    const handler = createScrapeHandler(new PageScraper({ fetcher }));
    const state = stateOf([searchOutput(["http://shop.test/a", "http://shop.test/b"])]);

    const output = await handler.run(state, task("scrape", { fromTask: "task:0", urlIndex: 1 }), testContext());

    expect(fetcher.urls).toEqual(["http://shop.test/b"]);
    expect(output).toEqual({
      kind: "scrape",
      url: "http://shop.test/b",
      productData: {
        url: "http://shop.test/b",
        title: "Trail Runner 3",
        price: "$89.99",
        rating: 4.6,
        reviewCount: 1024,
        features: [],
        images: ["https://img.test/shoe.jpg"],
      },
    });
  });

  it("prefers a URL in the task's query", async () => {
    const fetcher = new FakeFetcher(PRODUCT_PAGE);
    const state = stateOf([searchOutput(["http://shop.test/a"])]);

    await createScrapeHandler(new PageScraper({ fetcher })).run(
      state,
      task("scrape", { query: "look at https://shop.test/direct", fromTask: "task:0" }),
      testContext(),
    );

    expect(fetcher.urls).toEqual(["https://shop.test/direct"]);
  });

  it("reports a missing URL", async () => {
    const fetcher = new FakeFetcher(PRODUCT_PAGE);
    const output = await createScrapeHandler(new PageScraper({ fetcher })).run(
      stateOf([searchOutput([])]),
      task("scrape", { fromTask: "task:0" }),
      testContext(),
    );
    expect(output).toEqual({ kind: "scrape", productData: null, url: null, error: "No URL provided" });
    expect(fetcher.urls).toEqual([]);
  });

  it("keeps the URL when the page cannot be fetched", async () => {
    const handler = createScrapeHandler(new PageScraper({ fetcher: new FakeFetcher(new Error("403 Forbidden")) }));
    const output = await handler.run(stateOf([searchOutput(["http://shop.test/a"])]), task("scrape", { fromTask: "task:0" }), testContext());
    expect(output).toEqual({ kind: "scrape", productData: null, url: "http://shop.test/a", error: "403 Forbidden" });
  });

  it("fails its task when no scraper is configured", async () => {
    const output = await createScrapeHandler(null).run(
      stateOf([searchOutput(["http://shop.test/a"])]),
      task("scrape", { fromTask: "task:0" }),
      testContext(),
    );
    expect(output).toEqual({ kind: "scrape", productData: null, url: null, error: "Page scraper is not configured" });
  });
});

describe("summarize handler", () => {
  const scraped = scrapeOutput("Studio Mic", "http://shop.test/mic", { rawHtml: "<html>secret markup</html>" });

  it("summarizes the referenced product without its HTML", async () => {
    const llm = new FakeLlm("  ## Studio Mic\nGreat for podcasts.  ");

    const output = await createSummarizeHandler(llm).run(
      stateOf([scraped], { deepResearch: true }),
      task("summarize", { fromTask: "task:0" }),
      testContext(),
    );

    expect(output).toEqual({ kind: "summarize", summary: "## Studio Mic\nGreat for podcasts." });
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0].prompt).toContain('"title": "Studio Mic"');
    expect(llm.calls[0].prompt).not.toContain("secret markup");
    expect(llm.calls[0].opts).toMatchObject({ task: "summarize", deep: true, temperature: 0.7 });
  });

  it("needs product data", async () => {
    const llm = new FakeLlm("unused");
    const output = await createSummarizeHandler(llm).run(stateOf([searchOutput([])]), task("summarize", { fromTask: "task:0" }), testContext());
    expect(output).toEqual({ kind: "summarize", summary: null, error: "No product data" });
    expect(llm.calls).toHaveLength(0);
  });

  it("fails its task when the model fails", async () => {
    const output = await createSummarizeHandler(new FakeLlm(new Error("quota exceeded"))).run(
      stateOf([scraped]),
      task("summarize", { fromTask: "task:0" }),
      testContext(),
    );
    expect(output).toEqual({ kind: "summarize", summary: null, error: "quota exceeded" });
  });

  it("fails its task without an LLM client", async () => {
    const output = await createSummarizeHandler(null).run(stateOf([scraped]), task("summarize", { fromTask: "task:0" }), testContext());
    expect(output.error).toBe("LLM client is not configured (set GEMINI_API_KEY)");
  });
});

describe("sentiment handler", () => {
  const scraped = scrapeOutput("Studio Mic", "http://shop.test/mic", { rating: 4.4, reviewCount: 120 });

  it("returns the parsed analysis with rating and review count", async () => {
    const llm = new FakeLlm("```json\n" + SENTIMENT_JSON + "\n```");

    const output = await createSentimentHandler(llm).run(stateOf([scraped]), task("sentiment", { fromTask: "task:0" }), testContext());

    expect(output).toEqual({
      kind: "sentiment",
      sentiment: JSON.parse(SENTIMENT_JSON),
      rating: 4.4,
      reviewCount: 120,
    });
    expect(llm.calls[0].opts).toMatchObject({ task: "sentiment", temperature: 0.5, json: true });
  });

  it("fails its task on an unparsable reply", async () => {
    const output = await createSentimentHandler(new FakeLlm("I cannot help with that")).run(
      stateOf([scraped]),
      task("sentiment", { fromTask: "task:0" }),
      testContext(),
    );
    expect(output).toEqual({ kind: "sentiment", sentiment: null, error: "LLM response contained no JSON object" });
  });

  it("fails its task on a reply that breaks the schema", async () => {
    const output = await createSentimentHandler(new FakeLlm('{"overall": "ecstatic"}')).run(
      stateOf([scraped]),
      task("sentiment", { fromTask: "task:0" }),
      testContext(),
    );
    expect(output.kind).toBe("sentiment");
    expect(output.error).toMatch(/^overall: /);
  });
});

describe("compare handler", () => {
  it("compares every referenced product", async () => {
    const llm = new FakeLlm("| Feature | A | B |");
    const state = stateOf([
      searchOutput(["http://a", "http://b"]),
      scrapeOutput("Mic A", "http://a"),
      scrapeOutput("Mic B", "http://b"),
    ]);

    const output = await createCompareHandler(llm).run(state, task("compare", { fromTask: "task:1,task:2" }), testContext());

    expect(output).toEqual({
      kind: "compare",
      comparison: "| Feature | A | B |",
      productsCompared: ["Mic A", "Mic B"],
      comparisonCount: 2,
    });
    expect(llm.calls[0].opts).toMatchObject({ task: "compare", temperature: 0.6, maxTokens: 3000 });
  });

  it("needs at least two products", async () => {
    const llm = new FakeLlm("unused");
    const state = stateOf([scrapeOutput("Mic A", "http://a"), { kind: "scrape", productData: null, url: "http://b", error: "blocked" }]);

    const output = await createCompareHandler(llm).run(state, task("compare", { fromTask: "task:0,task:1" }), testContext());

    expect(output).toEqual({ kind: "compare", comparison: null, error: "Insufficient products for comparison" });
    expect(llm.calls).toHaveLength(0);
  });
});
