import { getConfig } from "../config.js";
import { ConfigError, isEngineError, UpstreamError } from "../errors.js";
import { parseOrThrow, SearchResponseSchema, type SearchResult } from "../schemas.js";
import { Cache } from "../utils/cache.js";
import { log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";

export type SearchOptions = {
  maxResults?: number;
  signal?: AbortSignal;
};

export interface SearchClient {
  search(query: string, opts?: SearchOptions): Promise<SearchResult[]>;
}

const PRODUCT_URL_PATTERNS: readonly RegExp[] = [
  /amazon\.com\/(?:.*\/)?(?:dp|gp\/product)\//i,
  /bestbuy\.com\/site\//i,
  /walmart\.com\/ip\//i,
  /target\.com\/p\//i,
  /ebay\.com\/itm\//i,
];

/** Whether a URL looks like a retailer's product detail page. */
export function isProductUrl(url: string): boolean {
  return PRODUCT_URL_PATTERNS.some((p) => p.test(url));
}

/** Product page URLs among search results, in result order. */
export function extractProductUrls(results: readonly SearchResult[]): string[] {
  return results.map((r) => r.url).filter((url) => url && isProductUrl(url));
}

export type TavilySearchClientOptions = {
  apiKey?: string;
  endpoint?: string;
  /** Pass false to disable result caching. */
  cache?: Cache<SearchResult[]> | false;
};

/** Web search over the Tavily API, restricted to `search.includeDomains`. */
export class TavilySearchClient implements SearchClient {
  private apiKey: string;
  private endpoint: string;
  private cache: Cache<SearchResult[]> | null;

  constructor(opts?: TavilySearchClientOptions) {
    const cfg = getConfig();
    this.apiKey = opts?.apiKey ?? cfg.search.apiKey;
    this.endpoint = opts?.endpoint ?? cfg.search.endpoint;
    if (!this.apiKey) {
      throw new ConfigError("TAVILY_API_KEY is required but not configured");
    }
    if (opts?.cache === false || !cfg.cache.enabled) {
      this.cache = null;
    } else {
      this.cache = opts?.cache ?? new Cache({ ttlMs: cfg.cache.ttlMs, maxEntries: cfg.cache.maxEntries });
    }
  }

  async search(query: string, opts?: SearchOptions): Promise<SearchResult[]> {
    const cfg = getConfig();
    const maxResults = opts?.maxResults ?? cfg.search.maxResults;
    const key = Cache.key(query, maxResults, cfg.search.searchDepth);

    const fetchResults = () =>
      withRetry(() => this.request(query, maxResults, opts?.signal), {
        label: "Search request",
        signal: opts?.signal,
        shouldRetry: (err) => (err instanceof UpstreamError ? err.retryable : !isEngineError(err)),
      });
    const results = this.cache ? await this.cache.load(key, fetchResults) : await fetchResults();

    log.info("Search complete", { query, results: results.length });
    return results;
  }

  private async request(query: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]> {
    const cfg = getConfig();
    const signals = [AbortSignal.timeout(cfg.timeouts.search)];
    if (signal) signals.push(signal);

    const res = await fetch(this.endpoint, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        api_key: this.apiKey,
        query,
        search_depth: cfg.search.searchDepth,
        max_results: maxResults,
        include_domains: cfg.search.includeDomains,
        include_images: true,
      }),
      signal: AbortSignal.any(signals),
    });

    if (!res.ok) {
      const detail = await res.text().catch(() => "");
      throw new UpstreamError(`Search API returned ${res.status}${detail ? `: ${detail.slice(0, 200)}` : ""}`, {
        status: res.status,
      });
    }

    const body: unknown = await res.json();
    return parseOrThrow(SearchResponseSchema, body).results;
  }
}
