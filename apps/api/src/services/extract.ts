import { JSDOM, VirtualConsole } from "jsdom";
import { Readability, isProbablyReaderable } from "@mozilla/readability";

const NON_CONTENT = "script, style, noscript, nav, footer, header, meta, iframe, svg, template";

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * HTML to plain text:
 * - Readability when the page looks like an article
 * - otherwise the body text with non-content elements removed
 *
 * Output is whitespace-collapsed and cut to `maxChars`.
 */
export function htmlToText(html: string, url: string, maxChars: number): string {
  // CSS parse noise and script errors are irrelevant for text extraction.
  const virtualConsole = new VirtualConsole();

  const dom = new JSDOM(html, { url, virtualConsole });
  const doc = dom.window.document;

  for (const el of Array.from(doc.querySelectorAll(NON_CONTENT))) el.remove();

  let text = "";
  if (isProbablyReaderable(doc)) {
    // Readability mutates its input, so it gets its own copy.
    const copy = new JSDOM(doc.documentElement.outerHTML, { url, virtualConsole }).window.document;
    const article = new Readability(copy).parse();
    text = article?.textContent ?? "";
  }
  if (!text.trim()) text = doc.body?.textContent ?? "";

  return collapseWhitespace(text).slice(0, maxChars);
}
