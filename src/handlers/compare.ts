import { getConfig } from "../config.js";
import { resolveProducts } from "../engine/references.js";
import type { CompareOutput } from "../engine/types.js";
import type { LlmClient } from "../services/llm.js";
import { FunctionHandler } from "./function-handler.js";
import { forPrompt, productTitle, requireLlm } from "./product.js";

function comparePrompt(products: object[]): string {
  return `Compare these products.

Products:
${JSON.stringify(products, null, 2)}

Include:
1. **Feature Comparison Matrix**: a table of key features, noting what is unique to each
2. **Price Analysis**: prices, value for money, best budget and best premium option
3. **Quality Assessment**: ratings and review counts, reliability indicators
4. **Use Case Recommendations**: best for budget, premium features, overall value
5. **Pros & Cons** for each product
6. **Final Verdict**: a clear recommendation with reasoning

Format as markdown with tables where useful.`;
}

/** `compare`: side-by-side comparison of every product referenced by `fromTask`. */
export function createCompareHandler(llm: LlmClient | null | undefined): FunctionHandler {
  return new FunctionHandler({
    action: "compare",
    description: "Compare several scraped products",
    timeout: getConfig().timeouts.llm,
    onError: (error): CompareOutput => ({ kind: "compare", comparison: null, error }),
    fn: async (state, task, ctx): Promise<CompareOutput> => {
      const products = resolveProducts(state.taskResults, task.fromTask);
      if (products.length < 2) {
        ctx.report("error", `Need at least 2 products to compare, got ${products.length}`);
        return { kind: "compare", comparison: null, error: "Insufficient products for comparison" };
      }

      const client = requireLlm(llm);
      ctx.report("comparing", `Comparing ${products.length} products`);
      const comparison = await client.complete(comparePrompt(products.map(forPrompt)), {
        task: "compare",
        deep: state.deepResearch,
        temperature: 0.6,
        maxTokens: 3000,
        signal: ctx.signal,
      });

      const productsCompared = products.map(productTitle);
      ctx.report("completed", `Compared: ${productsCompared.join(", ")}`);
      return {
        kind: "compare",
        comparison: comparison.trim(),
        productsCompared,
        comparisonCount: products.length,
      };
    },
  });
}
