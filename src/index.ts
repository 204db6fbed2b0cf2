// Config
export { getConfig, configure, resetConfig, defaults, configFromEnv } from "./config.js";
export type { EngineConfig, DeepPartial } from "./config.js";

// Errors
export {
  EngineError,
  ParseError,
  ValidationError,
  ConfigError,
  TimeoutError,
  UpstreamError,
  isEngineError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  PlannedTaskSchema,
  PlanResponseSchema,
  ProductDataSchema,
  SentimentSchema,
  SearchResultSchema,
  ResearchRequestSchema,
} from "./schemas.js";
export type { PlanResponse, ProductData, SentimentAnalysis, SearchResult, ResearchRequest } from "./schemas.js";

// Plans
export { TASK_ACTIONS } from "./planner/types.js";
export type { BuiltinAction, TaskAction, Task, Plan, PlanInput, TaskInput, PlanningService, OrderViolation } from "./planner/types.js";
export { createPlan, fallbackPlan, findUrl, checkPlanOrder, planSummary, FALLBACK_REASONING } from "./planner/plan.js";
export { LlmPlanner } from "./planner/planner.js";
export type { PlannerOptions } from "./planner/planner.js";

// Engine
export { ResearchEngine } from "./engine/engine.js";
export type { ResearchEngineOptions, ResearchOptions } from "./engine/engine.js";
export { Dispatcher } from "./engine/dispatcher.js";
export type { DispatchOptions } from "./engine/dispatcher.js";
export { HandlerRegistry } from "./engine/registry.js";
export { createRunState, recordResult, snapshot, totalTasks } from "./engine/run-state.js";
export {
  parseReferences,
  resolveReferences,
  resolveFirst,
  selectUrl,
  resolveUrl,
  resolveProduct,
  resolveProducts,
} from "./engine/references.js";
export type { TaskReference } from "./engine/references.js";
export { computeProgress, describeTask, describeStep } from "./engine/progress.js";
export { extractFinalOutput, incompleteReport } from "./engine/finalize.js";
export type * from "./engine/types.js";

// Handlers
export {
  FunctionHandler,
  createDefaultHandlers,
  createDefaultRegistry,
  createSearchHandler,
  createScrapeHandler,
  createSummarizeHandler,
  createSentimentHandler,
  createCompareHandler,
  createFinalReportHandler,
} from "./handlers/index.js";
export type { FunctionHandlerOptions, HandlerFunction, HandlerServices } from "./handlers/index.js";
export { createResearchEngine, createServices } from "./setup.js";
export type { EngineSetupOptions } from "./setup.js";

// Services
export { GeminiClient, createLlmClient, extractJson, parseJsonResponse, SYSTEM_INSTRUCTIONS } from "./services/llm.js";
export type { LlmClient, LlmTask, CompleteOptions } from "./services/llm.js";
export { TavilySearchClient, extractProductUrls, isProductUrl } from "./services/search.js";
export type { SearchClient, SearchOptions } from "./services/search.js";
export { HttpPageFetcher, PageScraper } from "./services/scraper.js";
export type { PageFetcher, PageScraperOptions } from "./services/scraper.js";

// Persistence
export { ReportStore } from "./persistence/store.js";
export type { ReportSummary } from "./persistence/store.js";

// UI
export { ResearchServer, syncResponse } from "./ui/server.js";
export type { ResearchServerOptions } from "./ui/server.js";
export { attachStreamSocket, STREAM_PATH } from "./ui/ws-stream.js";
export type { SSEEvent, StreamMessage, StreamRunner, SyncResearchResponse } from "./ui/types.js";

// Utils
export { log, setLogLevel, createLogger } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
export { Cache } from "./utils/cache.js";
export type { CacheOptions, CacheEntry } from "./utils/cache.js";
