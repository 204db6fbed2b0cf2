import { getConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { resolveUrl } from "../engine/references.js";
import type { ScrapeOutput } from "../engine/types.js";
import { findUrl } from "../planner/plan.js";
import type { PageScraper } from "../services/scraper.js";
import { createLogger, errorMessage } from "../utils/logger.js";
import { FunctionHandler } from "./function-handler.js";

const logger = createLogger("scrape");

/**
 * `scrape`: extract product data from a page. The URL comes from the task's
 * query, else from the referenced task's output (honouring `urlIndex`).
 */
export function createScrapeHandler(scraper: PageScraper | null | undefined): FunctionHandler {
  return new FunctionHandler({
    action: "scrape",
    description: "Extract product data from a product page",
    timeout: getConfig().timeouts.scrape + getConfig().timeouts.llm,
    onError: (error): ScrapeOutput => ({ kind: "scrape", productData: null, url: null, error }),
    fn: async (state, task, ctx): Promise<ScrapeOutput> => {
      const url = (task.query ? findUrl(task.query) : null) ?? resolveUrl(state.taskResults, task);
      if (!url) {
        logger.warn("No URL to scrape", { taskIndex: ctx.taskIndex, fromTask: task.fromTask ?? null });
        ctx.report("error", "No URL provided");
        return { kind: "scrape", productData: null, url: null, error: "No URL provided" };
      }
      if (!scraper) {
        throw new ConfigError("Page scraper is not configured");
      }

      ctx.report("scraping", `Scraping product page: ${url}`);
      try {
        const productData = await scraper.scrape(url, { signal: ctx.signal });
        ctx.report("completed", `Scraped: ${productData.title ?? url}`);
        return { kind: "scrape", productData, url };
      } catch (err) {
        const error = errorMessage(err);
        logger.error("Scrape failed", { url, error });
        ctx.report("error", `Scrape failed: ${error}`);
        return { kind: "scrape", productData: null, url, error };
      }
    },
  });
}
