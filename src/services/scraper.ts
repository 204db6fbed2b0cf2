import { getConfig } from "../config.js";
import { isEngineError, UpstreamError } from "../errors.js";
import { ProductDataSchema, type ProductData } from "../schemas.js";
import { log, errorMessage } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { LlmClient } from "./llm.js";
import { extractImages, extractPrice, extractRating, extractReviewCount, extractTitle, pageText, truncate } from "./text.js";

export type FetchOptions = {
  signal?: AbortSignal;
};

export interface PageFetcher {
  /** HTML body of the page at `url`. */
  fetch(url: string, opts?: FetchOptions): Promise<string>;
}

const BROWSER_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
};

/** Plain HTTP page fetcher; sends browser-like headers and gives up after `timeouts.scrape`. */
export class HttpPageFetcher implements PageFetcher {
  async fetch(url: string, opts?: FetchOptions): Promise<string> {
    return withRetry(
      async () => {
        const signals = [AbortSignal.timeout(getConfig().timeouts.scrape)];
        if (opts?.signal) signals.push(opts.signal);
        const res = await fetch(url, { headers: BROWSER_HEADERS, redirect: "follow", signal: AbortSignal.any(signals) });
        if (!res.ok) {
          throw new UpstreamError(`Fetching ${url} returned ${res.status}`, { status: res.status });
        }
        return res.text();
      },
      {
        label: `Fetch ${url}`,
        signal: opts?.signal,
        shouldRetry: (err) => (err instanceof UpstreamError ? err.retryable : !isEngineError(err)),
      },
    );
  }
}

export type PageScraperOptions = {
  fetcher?: PageFetcher;
  /** Structured extraction model; regex extraction alone when null. */
  llm?: LlmClient | null;
  /** Keep the page HTML on the product data (`rawHtml`). */
  keepHtml?: boolean;
};

export type ScrapeOptions = {
  signal?: AbortSignal;
};

function extractionPrompt(url: string, text: string): string {
  return `Extract product information from this page.

URL: ${url}

Page text:
${text}

Return a JSON object with these fields (null when the page doesn't say):
- title: product name
- price: price as shown, including currency symbol
- rating: average star rating from 0 to 5
- reviewCount: number of reviews or ratings
- features: list of key features
- description: short product description
- availability: stock status
- brand
- category
- images: product image URLs`;
}

/** Turns a product page into `ProductData`. */
export class PageScraper {
  private fetcher: PageFetcher;
  private llm: LlmClient | null;
  private keepHtml: boolean;

  constructor(opts?: PageScraperOptions) {
    this.fetcher = opts?.fetcher ?? new HttpPageFetcher();
    this.llm = opts?.llm ?? null;
    this.keepHtml = opts?.keepHtml ?? false;
  }

  async scrape(url: string, opts?: ScrapeOptions): Promise<ProductData> {
    const html = await this.fetcher.fetch(url, { signal: opts?.signal });
    const text = truncate(pageText(html), getConfig().limits.scrapeTextChars, "");

    let extracted: ProductData | null = null;
    if (this.llm) {
      try {
        extracted = await this.llm.completeJson(extractionPrompt(url, text), ProductDataSchema, {
          task: "extract",
          temperature: 0.1,
          signal: opts?.signal,
        });
      } catch (err) {
        log.warn("LLM extraction failed, using pattern extraction", { url, error: errorMessage(err) });
      }
    }

    const product: ProductData = {
      ...(extracted ?? { features: [], images: [] }),
      url,
      title: extracted?.title || extractTitle(html),
      price: extracted?.price || extractPrice(text),
      rating: extracted?.rating ?? extractRating(text),
      reviewCount: extracted?.reviewCount ?? extractReviewCount(text),
    };
    if (product.images.length === 0) product.images = extractImages(html);
    if (this.keepHtml) product.rawHtml = html;

    log.info("Scraped product page", { url, title: product.title ?? null });
    return product;
  }
}
