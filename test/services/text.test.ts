import { describe, expect, it } from "vitest";
import {
  decodeEntities,
  extractImages,
  extractPrice,
  extractRating,
  extractReviewCount,
  extractTitle,
  pageText,
  truncate,
} from "../../src/services/text.js";

describe("pageText", () => {
  it("drops scripts, styles, comments and tags", () => {
    const html = `<html><head><style>p { color: red }</style><script>var x = "<b>";</script></head>
      <body><!-- nav --><h1>Desk&nbsp;Lamp</h1>
      <p>Warm &amp; bright</p></body></html>`;
    expect(pageText(html)).toBe("Desk Lamp Warm & bright");
  });
});

describe("decodeEntities", () => {
  it("decodes common entities and leaves others", () => {
    expect(decodeEntities("&lt;5 &quot;in&quot; &#39;x&#39; &copy;")).toBe(`<5 "in" 'x' &copy;`);
  });
});

describe("extractPrice", () => {
  it("finds the first dollar amount", () => {
    expect(extractPrice("was $1,299.00, now $999")).toBe("$1,299.00");
    expect(extractPrice("price on request")).toBeNull();
  });
});

describe("extractRating", () => {
  it("reads explicit ratings", () => {
    expect(extractRating("Rated 4.7 out of 5 stars")).toBe(4.7);
    expect(extractRating("Score: 3/5")).toBe(3);
  });

  it("falls back to a bare decimal", () => {
    expect(extractRating("stars 4.2 (88)")).toBe(4.2);
  });

  it("returns null when there is no rating", () => {
    expect(extractRating("no reviews yet")).toBeNull();
  });
});

describe("extractReviewCount", () => {
  it("parses counts with separators and qualifiers", () => {
    expect(extractReviewCount("12,345 global ratings")).toBe(12345);
    expect(extractReviewCount("87 customer reviews")).toBe(87);
    expect(extractReviewCount("Be the first to review")).toBeNull();
  });
});

describe("extractTitle", () => {
  it("prefers og:title", () => {
    const html = `<title>Shop | Lamp</title><meta property="og:title" content="Lamp &amp; Shade">`;
    expect(extractTitle(html)).toBe("Lamp & Shade");
  });

  it("falls back to the title element", () => {
    expect(extractTitle("<title>\n  Desk   Lamp\n</title>")).toBe("Desk Lamp");
    expect(extractTitle("<p>untitled</p>")).toBeNull();
  });
});

describe("extractImages", () => {
  it("returns the og:image", () => {
    expect(extractImages(`<meta name="og:image" content="https://img.test/l.jpg" />`)).toEqual(["https://img.test/l.jpg"]);
    expect(extractImages("<img src=x>")).toEqual([]);
  });
});

describe("truncate", () => {
  it("appends the suffix only when cut", () => {
    expect(truncate("short", 10)).toBe("short");
    expect(truncate("abcdefghij", 4)).toBe("abcd...");
    expect(truncate("abcdefghij", 4, " [more]")).toBe("abcd [more]");
  });
});
