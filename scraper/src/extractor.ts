import type { JSDOM } from "jsdom";

export const NON_CONTENT_TAGS = [
  "script",
  "style",
  "nav",
  "footer",
  "iframe",
  "noscript",
] as const;

// Tried in order; the document body is the fallback.
export const CONTENT_REGION_SELECTORS = [
  "main",
  "article",
  '[role="main"]',
] as const;

export interface ExtractedContent {
  title: string;
  text: string;
}

export function formatExtracted({ title, text }: ExtractedContent): string {
  return title ? `# ${title}\n\n${text}` : text;
}

export function stripNonContent(document: Document): void {
  for (const tag of NON_CONTENT_TAGS) {
    document.querySelectorAll(tag).forEach((element) => element.remove());
  }
}

export function selectContentRegion(document: Document): Element | null {
  for (const selector of CONTENT_REGION_SELECTORS) {
    const region = document.querySelector(selector);
    if (region) {
      return region;
    }
  }
  return document.body;
}

/**
 * Text of every text node under `root`, one per line. Markup from the parser
 * is not laid out, so block boundaries are approximated by node boundaries.
 */
export function collectText(root: Node): string {
  const parts: string[] = [];
  const visit = (node: Node): void => {
    if (node.nodeType === node.TEXT_NODE) {
      parts.push(node.nodeValue ?? "");
      return;
    }
    node.childNodes.forEach(visit);
  };
  visit(root);
  return parts.join("\n");
}

export function extractStaticContent(
  JSDOMClass: typeof JSDOM,
  html: string,
  url: string
): ExtractedContent {
  const dom = new JSDOMClass(html, { url });
  try {
    const document = dom.window.document;
    stripNonContent(document);

    const region = selectContentRegion(document) ?? document.documentElement;
    return {
      title: document.title.trim(),
      text: collectText(region),
    };
  } finally {
    dom.window.close();
  }
}

export interface InPageExtractionArgs {
  tags: string[];
  selectors: string[];
}

/**
 * Runs inside the rendered page, so it must not reference anything outside
 * its own body.
 */
export function extractRenderedText({ tags, selectors }: InPageExtractionArgs): string {
  for (const tag of tags) {
    document.querySelectorAll(tag).forEach((element) => element.remove());
  }

  const title = (document.title || "").trim();
  let region: HTMLElement | null = null;
  for (const selector of selectors) {
    region = document.querySelector<HTMLElement>(selector);
    if (region) break;
  }

  const root = region ?? document.body;
  const text = root ? root.innerText : "";
  return title ? `# ${title}\n\n${text}` : text;
}
