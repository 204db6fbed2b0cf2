import { getConfig } from "./config.js";
import { ResearchEngine } from "./engine/engine.js";
import type { ReportSink } from "./engine/types.js";
import { createDefaultRegistry, type HandlerServices } from "./handlers/index.js";
import { LlmPlanner } from "./planner/planner.js";
import { createLlmClient } from "./services/llm.js";
import { PageScraper } from "./services/scraper.js";
import { TavilySearchClient } from "./services/search.js";
import { log } from "./utils/logger.js";

export type EngineSetupOptions = {
  /** Override any collaborator; the rest are built from config. */
  services?: HandlerServices;
  sink?: ReportSink;
};

/** Services built from the current config. Missing API keys leave the matching service null. */
export function createServices(overrides?: HandlerServices): Required<HandlerServices> {
  const cfg = getConfig();
  const llm = overrides?.llm !== undefined ? overrides.llm : createLlmClient();
  const search =
    overrides?.search !== undefined ? overrides.search : cfg.search.apiKey ? new TavilySearchClient() : null;
  const scraper = overrides?.scraper !== undefined ? overrides.scraper : new PageScraper({ llm });

  if (!llm) log.warn("GEMINI_API_KEY not set: planning falls back and LLM tasks will fail");
  if (!search) log.warn("TAVILY_API_KEY not set: search tasks will fail");
  return { llm, search, scraper };
}

/** A research engine with the built-in handlers and the LLM planner. */
export function createResearchEngine(opts?: EngineSetupOptions): ResearchEngine {
  const services = createServices(opts?.services);
  return new ResearchEngine({
    planner: new LlmPlanner({ llm: services.llm }),
    registry: createDefaultRegistry(services),
    sink: opts?.sink,
  });
}
