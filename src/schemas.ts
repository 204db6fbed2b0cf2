import { z } from "zod";
import { ValidationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Planner output
// ---------------------------------------------------------------------------

const ACTION_ALIASES: Record<string, string> = {
  final_report: "finalize",
  report: "finalize",
};

export const PlannedTaskSchema = z
  .object({
    action: z
      .string()
      .trim()
      .min(1, "task action is required")
      .transform((a) => ACTION_ALIASES[a.toLowerCase()] ?? a.toLowerCase()),
    query: z.string().nullish(),
    from_task: z.string().nullish(),
    // out-of-range indexes are clamped when the URL is selected; unusable ones mean the first URL
    url_index: z.coerce.number().int().nonnegative().catch(0),
    description: z.string().nullish(),
  })
  .transform((t) => ({
    action: t.action,
    query: t.query ?? undefined,
    fromTask: t.from_task ?? undefined,
    urlIndex: t.url_index,
    description: t.description ?? undefined,
  }));

export const PlanResponseSchema = z.object({
  intent: z.string().trim().min(1, "plan intent is required"),
  tasks: z.array(PlannedTaskSchema).min(1, "plan must contain at least one task"),
  reasoning: z.string().nullish().transform((r) => r ?? undefined),
});

export type PlanResponse = z.infer<typeof PlanResponseSchema>;

// ---------------------------------------------------------------------------
// Structured LLM outputs
// ---------------------------------------------------------------------------

export const ProductDataSchema = z.object({
  url: z.string().nullish(),
  title: z.string().nullish(),
  price: z.string().nullish(),
  rating: z.number().min(0).max(5).nullish(),
  reviewCount: z.number().int().min(0).nullish(),
  features: z.array(z.string()).default([]),
  description: z.string().nullish(),
  availability: z.string().nullish(),
  brand: z.string().nullish(),
  category: z.string().nullish(),
  images: z.array(z.string()).default([]),
});

export type ProductData = z.infer<typeof ProductDataSchema> & {
  /** Page HTML kept for debugging; removed before report synthesis. */
  rawHtml?: string;
};

export const SentimentSchema = z.object({
  overall: z.enum(["positive", "neutral", "negative"]),
  score: z.number().min(0).max(1),
  positivePercentage: z.number().int().min(0).max(100),
  neutralPercentage: z.number().int().min(0).max(100),
  negativePercentage: z.number().int().min(0).max(100),
  keyPositiveThemes: z.array(z.string()).default([]),
  keyNegativeThemes: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1),
  analysisSummary: z.string(),
});

export type SentimentAnalysis = z.infer<typeof SentimentSchema>;

// ---------------------------------------------------------------------------
// Search API
// ---------------------------------------------------------------------------

export const SearchResultSchema = z
  .object({
    url: z.string(),
    title: z.string().nullish().transform((t) => t ?? ""),
    content: z.string().nullish().transform((c) => c ?? ""),
    score: z.number().nullish().transform((s) => s ?? undefined),
    image: z.string().nullish().transform((i) => i ?? undefined),
  })
  .passthrough();

export type SearchResult = z.infer<typeof SearchResultSchema>;

export const SearchResponseSchema = z.object({
  results: z.array(SearchResultSchema).default([]),
});

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export const ResearchRequestSchema = z.object({
  query: z
    .string({ required_error: "query is required", invalid_type_error: "query must be a string" })
    .trim()
    .min(1, "query must not be empty"),
  deepResearch: z.boolean().default(false),
  sessionId: z.string().min(1).optional(),
});

export type ResearchRequest = z.infer<typeof ResearchRequestSchema>;

/** Parse with a schema, throwing a ValidationError that lists every issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", msg);
  }
  return result.data;
}
