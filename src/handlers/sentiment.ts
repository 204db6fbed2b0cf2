import { getConfig } from "../config.js";
import { resolveProduct } from "../engine/references.js";
import type { SentimentOutput } from "../engine/types.js";
import { SentimentSchema } from "../schemas.js";
import type { LlmClient } from "../services/llm.js";
import { FunctionHandler } from "./function-handler.js";
import { forPrompt, productTitle, requireLlm } from "./product.js";

function sentimentPrompt(product: object): string {
  return `Analyze the sentiment for this product from the available information.

Product data:
${JSON.stringify(product, null, 2)}

Consider rating and review count, features and description, price positioning, availability and
overall value.

Respond with a JSON object:
{
  "overall": "positive" | "neutral" | "negative",
  "score": number from 0.0 to 1.0 (1.0 most positive),
  "positivePercentage": integer,
  "neutralPercentage": integer,
  "negativePercentage": integer,
  "keyPositiveThemes": [3-5 strings],
  "keyNegativeThemes": [3-5 strings],
  "confidence": number from 0.0 to 1.0,
  "analysisSummary": string
}
The three percentages must sum to 100.`;
}

/** `sentiment`: structured sentiment analysis of one scraped product. */
export function createSentimentHandler(llm: LlmClient | null | undefined): FunctionHandler {
  return new FunctionHandler({
    action: "sentiment",
    description: "Analyze sentiment for a scraped product",
    timeout: getConfig().timeouts.llm,
    onError: (error): SentimentOutput => ({ kind: "sentiment", sentiment: null, error }),
    fn: async (state, task, ctx): Promise<SentimentOutput> => {
      const product = resolveProduct(state.taskResults, task.fromTask);
      if (!product) {
        ctx.report("error", "No product data for sentiment analysis");
        return { kind: "sentiment", sentiment: null, error: "No product data" };
      }

      const client = requireLlm(llm);
      ctx.report("analyzing", `Analyzing sentiment for: ${productTitle(product)}`);
      const sentiment = await client.completeJson(sentimentPrompt(forPrompt(product)), SentimentSchema, {
        task: "sentiment",
        temperature: 0.5,
        signal: ctx.signal,
      });

      ctx.report("completed", `Sentiment analysis completed: ${sentiment.overall}`);
      return {
        kind: "sentiment",
        sentiment,
        rating: product.rating ?? null,
        reviewCount: product.reviewCount ?? null,
      };
    },
  });
}
