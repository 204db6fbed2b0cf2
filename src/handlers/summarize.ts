import { getConfig } from "../config.js";
import { resolveProduct } from "../engine/references.js";
import type { SummarizeOutput } from "../engine/types.js";
import type { LlmClient } from "../services/llm.js";
import { FunctionHandler } from "./function-handler.js";
import { forPrompt, productTitle, requireLlm } from "./product.js";

function summaryPrompt(product: object): string {
  return `Analyze this product and write a summary.

Product information:
${JSON.stringify(product, null, 2)}

Cover:
1. **Overview**: a short introduction to the product
2. **Key Features**: the 3-5 most important features
3. **Value Proposition**: what sets it apart
4. **Target Audience**: who benefits most
5. **Pros & Cons**: a balanced assessment

Format as markdown with clear sections, 300-400 words.`;
}

/** `summarize`: markdown summary of one scraped product. */
export function createSummarizeHandler(llm: LlmClient | null | undefined): FunctionHandler {
  return new FunctionHandler({
    action: "summarize",
    description: "Summarize a scraped product",
    timeout: getConfig().timeouts.llm,
    onError: (error): SummarizeOutput => ({ kind: "summarize", summary: null, error }),
    fn: async (state, task, ctx): Promise<SummarizeOutput> => {
      const product = resolveProduct(state.taskResults, task.fromTask);
      if (!product) {
        ctx.report("error", "No product data to summarize");
        return { kind: "summarize", summary: null, error: "No product data" };
      }

      const client = requireLlm(llm);
      ctx.report("summarizing", `Generating summary for: ${productTitle(product)}`);
      const summary = await client.complete(summaryPrompt(forPrompt(product)), {
        task: "summarize",
        deep: state.deepResearch,
        temperature: 0.7,
        signal: ctx.signal,
      });

      ctx.report("completed", `Summary generated for: ${productTitle(product)}`);
      return { kind: "summarize", summary: summary.trim() };
    },
  });
}
