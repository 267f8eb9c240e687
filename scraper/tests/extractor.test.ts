import { JSDOM } from "jsdom";
import { describe, expect, it } from "vitest";
import { extractStaticContent, formatExtracted } from "../src/extractor";

const URL = "https://example.com/post";

function extract(html: string) {
  return extractStaticContent(JSDOM, html, URL);
}

describe("extractStaticContent", () => {
  it("strips non-content elements and reads the main region", () => {
    const html =
      "<html><head><title> Sample Page </title><style>.x{color:red}</style></head>" +
      "<body><nav>Menu</nav><main><h1>Heading</h1><p>First paragraph.</p>" +
      "<script>var x = 1;</script><noscript>Enable scripts</noscript></main>" +
      "<footer>Footer</footer></body></html>";

    expect(extract(html)).toEqual({
      title: "Sample Page",
      text: "Heading\nFirst paragraph.",
    });
  });

  it("prefers main over article", () => {
    const html = "<body><article>Article text</article><main>Main text</main></body>";
    expect(extract(html).text).toBe("Main text");
  });

  it("prefers article over role=main", () => {
    const html = '<body><div role="main">Role text</div><article>Article text</article></body>';
    expect(extract(html).text).toBe("Article text");
  });

  it("uses an element with role=main when there is no landmark", () => {
    const html = '<body><div role="main"><p>Inside</p></div><p>Outside</p></body>';
    expect(extract(html).text).toBe("Inside");
  });

  it("falls back to the body", () => {
    const html = "<body><p>One</p><iframe src=\"/ad\"></iframe><p>Two</p></body>";
    expect(extract(html)).toEqual({ title: "", text: "One\nTwo" });
  });
});

describe("formatExtracted", () => {
  it("prepends the title as a heading", () => {
    expect(formatExtracted({ title: "Notes", text: "Body" })).toBe("# Notes\n\nBody");
  });

  it("returns the text alone without a title", () => {
    expect(formatExtracted({ title: "", text: "Body" })).toBe("Body");
  });
});
