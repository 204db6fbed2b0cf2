import { HandlerRegistry } from "../engine/registry.js";
import type { TaskHandler } from "../engine/types.js";
import type { LlmClient } from "../services/llm.js";
import type { PageScraper } from "../services/scraper.js";
import type { SearchClient } from "../services/search.js";
import { createCompareHandler } from "./compare.js";
import { createFinalReportHandler } from "./final-report.js";
import { createScrapeHandler } from "./scrape.js";
import { createSearchHandler } from "./search.js";
import { createSentimentHandler } from "./sentiment.js";
import { createSummarizeHandler } from "./summarize.js";

export { FunctionHandler, type FunctionHandlerOptions, type HandlerFunction } from "./function-handler.js";
export { createCompareHandler, createFinalReportHandler, createScrapeHandler, createSearchHandler, createSentimentHandler, createSummarizeHandler };

/** Collaborators of the built-in handlers. A missing one fails its tasks, not the run. */
export type HandlerServices = {
  search?: SearchClient | null;
  scraper?: PageScraper | null;
  llm?: LlmClient | null;
};

export function createDefaultHandlers(services: HandlerServices): TaskHandler[] {
  return [
    createSearchHandler(services.search),
    createScrapeHandler(services.scraper),
    createSummarizeHandler(services.llm),
    createSentimentHandler(services.llm),
    createCompareHandler(services.llm),
    createFinalReportHandler(services.llm),
  ];
}

/** A registry holding one handler for each built-in action. */
export function createDefaultRegistry(services: HandlerServices): HandlerRegistry {
  return new HandlerRegistry(createDefaultHandlers(services));
}
