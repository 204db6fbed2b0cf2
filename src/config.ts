import type { LogLevel } from "./utils/logger.js";

export type EngineConfig = {
  llm: {
    apiKey: string;
    model: string;
    plannerModel: string;
    deepResearchModel: string;
    temperature: number;
    maxTokens: number;
  };
  search: {
    apiKey: string;
    endpoint: string;
    maxResults: number;
    searchDepth: "basic" | "advanced";
    includeDomains: string[];
  };
  timeouts: {
    handlerDefault: number;
    search: number;
    scrape: number;
    llm: number;
    report: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  limits: {
    scrapeTextChars: number;
    reportContextChars: number;
    reportMaxChars: number;
    evidenceUrls: number;
    maxPlanTasks: number;
  };
  cache: {
    enabled: boolean;
    ttlMs: number;
    maxEntries: number;
  };
  planning: {
    /** Reject planner output whose references are not strictly backwards. */
    strictOrder: boolean;
  };
  server: {
    port: number;
    host: string;
  };
  persistence: {
    dbPath?: string;
  };
  logLevel: LogLevel;
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends unknown[] ? T[P] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: EngineConfig = {
  llm: {
    apiKey: "",
    model: "gemini-2.5-flash",
    plannerModel: "gemini-2.5-flash",
    deepResearchModel: "gemini-2.5-pro",
    temperature: 0.7,
    maxTokens: 8192,
  },
  search: {
    apiKey: "",
    endpoint: "https://api.tavily.com/search",
    maxResults: 5,
    searchDepth: "advanced",
    includeDomains: ["amazon.com", "bestbuy.com", "walmart.com", "target.com", "ebay.com"],
  },
  timeouts: {
    handlerDefault: 60_000,
    search: 30_000,
    scrape: 45_000,
    llm: 120_000,
    report: 180_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1_000,
    maxDelayMs: 8_000,
  },
  limits: {
    scrapeTextChars: 8_000,
    reportContextChars: 50_000,
    reportMaxChars: 50_000,
    evidenceUrls: 10,
    maxPlanTasks: 25,
  },
  cache: {
    enabled: true,
    ttlMs: 10 * 60 * 1000, // 10 minutes
    maxEntries: 200,
  },
  planning: {
    strictOrder: false,
  },
  server: {
    port: 8000,
    host: "127.0.0.1",
  },
  persistence: {},
  logLevel: "info",
};

let current: EngineConfig = structuredClone(DEFAULTS);

function isPlainObject(val: unknown): val is Record<string, unknown> {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const key of Object.keys(overrides)) {
    const val = overrides[key];
    const existing = result[key];
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function merge(base: EngineConfig, overrides: DeepPartial<EngineConfig>): EngineConfig {
  return deepMerge(base, overrides) as EngineConfig;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<EngineConfig>): void {
  current = merge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<EngineConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<EngineConfig> = Object.freeze(structuredClone(DEFAULTS));

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Map environment variables onto config overrides. Unset or unparsable
 * variables are left out so the defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DeepPartial<EngineConfig> {
  const logLevel = LOG_LEVELS.find((l) => l === env.LOG_LEVEL?.toLowerCase());
  return {
    llm: {
      apiKey: env.GEMINI_API_KEY,
      model: env.LLM_MODEL || undefined,
      plannerModel: env.PLANNER_MODEL || undefined,
      deepResearchModel: env.DEEP_RESEARCH_MODEL || undefined,
      temperature: toNumber(env.LLM_TEMPERATURE),
      maxTokens: toNumber(env.MAX_TOKENS),
    },
    search: {
      apiKey: env.TAVILY_API_KEY,
    },
    server: {
      port: toNumber(env.PORT),
      host: env.HOST || undefined,
    },
    persistence: {
      dbPath: env.REPORTS_DB || undefined,
    },
    logLevel,
  };
}
