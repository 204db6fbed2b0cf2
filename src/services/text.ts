const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&apos;": "'",
  "&nbsp;": " ",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|apos|nbsp|#39);/g, (m) => ENTITIES[m] ?? m);
}

/** Visible text of an HTML page: scripts, styles and tags removed, whitespace collapsed. */
export function pageText(html: string): string {
  const text = html
    .replace(/<(script|style|noscript|svg|template)\b[^>]*>[\s\S]*?<\/\1>/gi, " ")
    .replace(/<!--[\s\S]*?-->/g, " ")
    .replace(/<[^>]+>/g, " ");
  return decodeEntities(text).replace(/\s+/g, " ").trim();
}

/** First dollar amount, e.g. `$1,299.00`. */
export function extractPrice(text: string): string | null {
  return text.match(/\$\d[\d,]*(?:\.\d+)?/)?.[0] ?? null;
}

/** Star rating on a 0-5 scale, from "4.5 out of 5" or "4.5/5", else a bare decimal. */
export function extractRating(text: string): number | null {
  const explicit = text.match(/(\d+(?:\.\d+)?)\s*(?:out of|\/)\s*5\b/i);
  if (explicit) {
    const rating = Number(explicit[1]);
    if (rating >= 0 && rating <= 5) return rating;
  }
  const bare = text.match(/\b([0-5]\.\d+)\b/);
  return bare ? Number(bare[1]) : null;
}

/** Review count from "1,234 ratings" or "87 customer reviews". */
export function extractReviewCount(text: string): number | null {
  const match = text.match(/(\d[\d,]*)\s+(?:global\s+|customer\s+)?(?:ratings|reviews)\b/i);
  if (!match) return null;
  const count = Number.parseInt(match[1].replace(/,/g, ""), 10);
  return Number.isNaN(count) ? null : count;
}

function metaContent(html: string, property: string): string | null {
  const pattern = new RegExp(`<meta[^>]+(?:property|name)=["']${property}["'][^>]*content=["']([^"']*)["']`, "i");
  const value = html.match(pattern)?.[1];
  return value ? decodeEntities(value).trim() : null;
}

/** Page title: `og:title`, else the `<title>` element. */
export function extractTitle(html: string): string | null {
  const og = metaContent(html, "og:title");
  if (og) return og;
  const title = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i)?.[1];
  const cleaned = title ? decodeEntities(title).replace(/\s+/g, " ").trim() : "";
  return cleaned || null;
}

export function extractImages(html: string): string[] {
  const image = metaContent(html, "og:image");
  return image ? [image] : [];
}

export function truncate(text: string, maxLength: number, suffix = "..."): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength) + suffix;
}
