import { ConfigError } from "../errors.js";
import type { SearchOutput } from "../engine/types.js";
import { extractProductUrls, type SearchClient } from "../services/search.js";
import { FunctionHandler } from "./function-handler.js";

function failed(error: string): SearchOutput {
  return { kind: "search", searchResults: [], productUrls: [], primaryUrl: null, resultsCount: 0, error };
}

/**
 * `search`: web search for the task's query (or the run's). When no result is
 * a recognised product page every result URL is kept, so a following scrape
 * still has candidates.
 */
export function createSearchHandler(client: SearchClient | null | undefined): FunctionHandler {
  return new FunctionHandler({
    action: "search",
    description: "Search the web for product pages",
    onError: failed,
    fn: async (state, task, ctx) => {
      if (!client) {
        throw new ConfigError("Search client is not configured (set TAVILY_API_KEY)");
      }
      const query = task.query || state.query;
      ctx.report("searching", `Searching web for: ${query}`);

      const searchResults = await client.search(query, { signal: ctx.signal });
      const productUrls = extractProductUrls(searchResults);
      const urls = productUrls.length > 0 ? productUrls : searchResults.map((r) => r.url).filter(Boolean);

      ctx.report("completed", `Found ${urls.length} product URLs`);
      return {
        kind: "search",
        searchResults,
        productUrls: urls,
        primaryUrl: urls[0] ?? null,
        resultsCount: urls.length,
      };
    },
  });
}
