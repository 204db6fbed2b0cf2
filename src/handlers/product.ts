import { ConfigError } from "../errors.js";
import type { ProductData } from "../schemas.js";
import type { LlmClient } from "../services/llm.js";

const FAILED_TITLE_MARKERS = ["access denied", "captcha", "error", "blocked", "unknown product"];

/** Product data as sent to a model: everything but the page HTML. */
export function forPrompt(product: ProductData): Omit<ProductData, "rawHtml"> {
  const { rawHtml: _rawHtml, ...rest } = product;
  return rest;
}

export function productTitle(product: ProductData): string {
  return product.title || "Unknown Product";
}

/** A scrape that landed on a real product page, not a block or error page. */
export function isValidProduct(product: ProductData): boolean {
  const title = product.title?.toLowerCase() ?? "";
  return title.length > 0 && !FAILED_TITLE_MARKERS.some((m) => title.includes(m));
}

export function requireLlm(llm: LlmClient | null | undefined): LlmClient {
  if (!llm) {
    throw new ConfigError("LLM client is not configured (set GEMINI_API_KEY)");
  }
  return llm;
}
