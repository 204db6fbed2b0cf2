import { GoogleGenAI } from "@google/genai";
import type { z } from "zod";
import { getConfig } from "../config.js";
import { ConfigError, ParseError, UpstreamError } from "../errors.js";
import { parseOrThrow } from "../schemas.js";
import { log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";

export type LlmTask = "summarize" | "sentiment" | "compare" | "extract" | "plan" | "report";

export const SYSTEM_INSTRUCTIONS: Readonly<Record<LlmTask, string>> = {
  summarize:
    "You are an expert product analyst. Write concise, informative summaries that cover key features, " +
    "value proposition and target audience. Stay objective and factual.",
  sentiment:
    "You are a sentiment analysis expert. Judge overall sentiment from product data and reviews, name the " +
    "recurring themes and give percentage breakdowns. Be data-driven and specific.",
  compare:
    "You are a product comparison expert. Compare products across features, price, quality and value, and " +
    "recommend options for different use cases. Use tables for side-by-side comparisons.",
  extract:
    "You are a data extraction expert. Extract structured product information from page text. " +
    "Use null for anything the page does not state.",
  plan:
    "You are a research planner. Break product research questions into a short, ordered list of tasks. " +
    "Respond with JSON only.",
  report:
    "You are a senior product research analyst. Write well-structured markdown reports grounded only in " +
    "the evidence provided, citing source URLs.",
};

export type CompleteOptions = {
  /** Explicit model; otherwise `llm.model`, or `llm.deepResearchModel` when `deep` is set. */
  model?: string;
  deep?: boolean;
  temperature?: number;
  maxTokens?: number;
  /** Explicit system instruction; otherwise the one for `task`. */
  system?: string;
  task?: LlmTask;
  /** Ask the model for a JSON response body. */
  json?: boolean;
  signal?: AbortSignal;
};

export interface LlmClient {
  complete(prompt: string, opts?: CompleteOptions): Promise<string>;
  /** Complete and validate the response as JSON against `schema`. */
  completeJson<T extends z.ZodTypeAny>(prompt: string, schema: T, opts?: CompleteOptions): Promise<z.output<T>>;
}

/**
 * Pull a JSON value out of model output. Models wrap JSON in markdown fences
 * or surround it with prose, so fall back to the outermost `{...}`.
 */
export function extractJson(raw: string): unknown {
  const stripped = raw
    .replace(/^\s*```(?:json)?\s*\n?/, "")
    .replace(/\n?```\s*$/, "")
    .trim();

  try {
    return JSON.parse(stripped);
  } catch {
    const match = raw.match(/\{[\s\S]*\}/);
    if (!match) {
      throw new ParseError("LLM response contained no JSON object");
    }
    try {
      return JSON.parse(match[0]);
    } catch (err) {
      throw new ParseError("LLM returned invalid JSON", { cause: err });
    }
  }
}

/** Parse model output as JSON and validate it. */
export function parseJsonResponse<T extends z.ZodTypeAny>(raw: string, schema: T): z.output<T> {
  return parseOrThrow(schema, extractJson(raw));
}

export type GeminiClientOptions = {
  /** Default: `llm.apiKey` from config. */
  apiKey?: string;
};

/** `LlmClient` on the Gemini API. */
export class GeminiClient implements LlmClient {
  private ai: GoogleGenAI;

  constructor(opts?: GeminiClientOptions) {
    const apiKey = opts?.apiKey ?? getConfig().llm.apiKey;
    if (!apiKey) {
      throw new ConfigError("GEMINI_API_KEY is required but not configured");
    }
    this.ai = new GoogleGenAI({ apiKey });
  }

  async complete(prompt: string, opts?: CompleteOptions): Promise<string> {
    const cfg = getConfig();
    const model = opts?.model ?? (opts?.deep ? cfg.llm.deepResearchModel : cfg.llm.model);
    const systemInstruction = opts?.system ?? (opts?.task ? SYSTEM_INSTRUCTIONS[opts.task] : undefined);
    const signals = [AbortSignal.timeout(cfg.timeouts.llm)];
    if (opts?.signal) signals.push(opts.signal);

    return withRetry(
      async () => {
        const start = Date.now();
        const response = await this.ai.models.generateContent({
          model,
          contents: prompt,
          config: {
            systemInstruction,
            temperature: opts?.temperature ?? cfg.llm.temperature,
            maxOutputTokens: opts?.maxTokens ?? cfg.llm.maxTokens,
            responseMimeType: opts?.json ? "application/json" : undefined,
            abortSignal: AbortSignal.any(signals),
          },
        });
        const text = response.text;
        if (!text) {
          throw new UpstreamError(`${model} returned an empty response`);
        }
        log.debug("LLM call complete", { model, task: opts?.task, durationMs: Date.now() - start, chars: text.length });
        return text;
      },
      {
        label: `LLM call (${model})`,
        signal: opts?.signal,
        shouldRetry: () => !opts?.signal?.aborted,
      },
    );
  }

  async completeJson<T extends z.ZodTypeAny>(prompt: string, schema: T, opts?: CompleteOptions): Promise<z.output<T>> {
    const raw = await this.complete(prompt, { ...opts, json: true });
    return parseJsonResponse(raw, schema);
  }
}

/** A Gemini client when an API key is configured, otherwise null. */
export function createLlmClient(apiKey = getConfig().llm.apiKey): LlmClient | null {
  return apiKey ? new GeminiClient({ apiKey }) : null;
}
