import { getConfig } from "../config.js";
import type { FinalReportOutput, RunStateView, TaskOutput } from "../engine/types.js";
import type { LlmClient } from "../services/llm.js";
import { truncate } from "../services/text.js";
import { createLogger } from "../utils/logger.js";
import { FunctionHandler } from "./function-handler.js";
import { forPrompt, isValidProduct, requireLlm } from "./product.js";

const logger = createLogger("finalize");

export type Evidence = {
  urls: string[];
  /** Product name to image URL. */
  images: Record<string, string>;
};

/** Source URLs and product images across all results, deduplicated in task order. */
export function collectEvidence(results: readonly Readonly<TaskOutput>[], maxUrls: number): Evidence {
  const urls = new Set<string>();
  const images: Record<string, string> = {};

  for (const output of results) {
    if (output.kind === "search") {
      for (const r of output.searchResults) {
        if (r.url) urls.add(r.url);
        if (r.title && r.image) images[r.title] = r.image;
      }
    } else if (output.kind === "scrape") {
      if (output.url) urls.add(output.url);
      const product = output.productData;
      if (product && product.images.length > 0) {
        images[product.title || "Product"] = product.images[0];
      }
    }
  }

  return { urls: [...urls].slice(0, maxUrls), images };
}

/** Results as sent to the model: page HTML dropped from product data. */
function cleanResults(results: readonly Readonly<TaskOutput>[]): unknown[] {
  return results.map((output) =>
    output.kind === "scrape" && output.productData ? { ...output, productData: forPrompt(output.productData) } : output,
  );
}

type ScrapeSummary = { valid: number; failed: Array<{ url: string | null; title: string | null }> };

function summarizeScrapes(results: readonly Readonly<TaskOutput>[]): ScrapeSummary {
  const summary: ScrapeSummary = { valid: 0, failed: [] };
  for (const output of results) {
    if (output.kind !== "scrape" || !output.productData) continue;
    if (isValidProduct(output.productData)) {
      summary.valid++;
    } else {
      summary.failed.push({ url: output.url, title: output.productData.title ?? null });
    }
  }
  return summary;
}

/** Report for comparisons that could not gather two usable products. */
export function insufficientDataReport(query: string, scrapes: ScrapeSummary): string {
  const lines = [
    "# Research Failed: Insufficient Product Data",
    "",
    `**Query:** ${query}`,
    "",
    `**Issue:** This research compares several products, but only ${scrapes.valid} product(s) could be scraped successfully.`,
    "",
    "**Failed Scrapes:**",
  ];
  if (scrapes.failed.length === 0) {
    lines.push("- None");
  } else {
    for (const f of scrapes.failed) {
      lines.push(`- **URL:** ${f.url ?? "N/A"}`, `  **Reason:** ${f.title || "Unknown error"}`);
    }
  }
  lines.push(
    "",
    "**Recommendations:**",
    "1. Try again later; retailer blocking is often temporary",
    "2. Search for the products on other retailers",
    "3. Enable deep research mode",
    "",
    scrapes.valid > 0
      ? `Successfully scraped ${scrapes.valid} product(s), but a comparison needs at least 2.`
      : "No products could be scraped successfully.",
  );
  return lines.join("\n");
}

function reportPrompt(state: RunStateView, resultsJson: string, evidence: Evidence): string {
  const date = new Date().toLocaleDateString("en-US", { year: "numeric", month: "long", day: "numeric" });
  const sources = evidence.urls.length > 0 ? evidence.urls.map((u) => `- ${u}`).join("\n") : "- No URLs available";
  const images = Object.entries(evidence.images)
    .map(([name, url]) => `- ${name}: ${url}`)
    .join("\n");
  const length = state.deepResearch ? "1100-2000 words" : "700-1600 words";

  return `Current date: ${date}

Research query: ${state.query}
Research intent: ${state.plan?.intent ?? "unknown"}

Task results:
${resultsJson}

Sources:
${sources}
${images ? `\nProduct images (embed with markdown image syntax where relevant):\n${images}\n` : ""}
Write a research report answering the query from the task results above.

**Formatting:**
- Markdown, with bullet points for lists and tables for comparisons
- Total length: ${length}
- End with a References section listing every source URL
- Leave out any section you have no data for`;
}

/** `finalize`: synthesize every result so far into the final markdown report. */
export function createFinalReportHandler(llm: LlmClient | null | undefined): FunctionHandler {
  return new FunctionHandler({
    action: "finalize",
    description: "Synthesize the final research report",
    timeout: getConfig().timeouts.report,
    onError: (error): FinalReportOutput => ({ kind: "finalize", finalReport: null, error }),
    fn: async (state, _task, ctx): Promise<FinalReportOutput> => {
      const limits = getConfig().limits;
      ctx.report("generating_report", "Synthesizing all results into final report...");

      const scrapes = summarizeScrapes(state.taskResults);
      if (state.plan?.intent === "product_comparison" && scrapes.valid < 2) {
        logger.warn("Insufficient data for comparison", { valid: scrapes.valid, failed: scrapes.failed.length });
        ctx.report("completed", "Insufficient product data for comparison");
        return { kind: "finalize", finalReport: insufficientDataReport(state.query, scrapes) };
      }

      const evidence = collectEvidence(state.taskResults, limits.evidenceUrls);
      const resultsJson = truncate(
        JSON.stringify(cleanResults(state.taskResults), null, 2),
        limits.reportContextChars,
        "\n... [truncated]",
      );

      const client = requireLlm(llm);
      const report = await client.complete(reportPrompt(state, resultsJson, evidence), {
        task: "report",
        deep: state.deepResearch,
        temperature: 0.7,
        maxTokens: 18_000,
        signal: ctx.signal,
      });

      let finalReport = report.trim();
      if (finalReport.length > limits.reportMaxChars) {
        logger.warn("Report too long, truncating", { chars: finalReport.length });
        finalReport = truncate(finalReport, limits.reportMaxChars, "\n\n[Report truncated due to excessive length]");
      }

      ctx.report("completed", "Final report generated");
      return { kind: "finalize", finalReport };
    },
  });
}
