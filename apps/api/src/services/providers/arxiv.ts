import { JSDOM } from "jsdom";
import { httpFetch } from "../http";
import type { SearchResult } from "../../types/routing";
import { outcomeOf, readBody, withQuery, type FetchLike, type SearchProvider } from "./provider";

const SUMMARY_CHARS = 300;

function textOf(el: Element | undefined): string {
  return (el?.textContent ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Parse an arXiv Atom feed. Entries without a title are skipped.
 */
export function parseArxivFeed(xml: string, providerName: string): SearchResult[] {
  const dom = new JSDOM(xml, { contentType: "text/xml" });
  const entries = Array.from(dom.window.document.getElementsByTagName("entry"));

  const results: SearchResult[] = [];
  for (const entry of entries) {
    const title = textOf(entry.getElementsByTagName("title")[0]);
    if (!title) continue;

    const id = textOf(entry.getElementsByTagName("id")[0]).replace(/^http:\/\//, "https://");
    results.push({
      title,
      url: id || undefined,
      snippet: textOf(entry.getElementsByTagName("summary")[0]).slice(0, SUMMARY_CHARS),
      providerName,
      resultKind: "web"
    });
  }
  return results;
}

export class ArxivProvider implements SearchProvider {
  readonly name = "arXiv";

  constructor(private opts: { fetchImpl?: FetchLike; endpoint?: string } = {}) {}

  async search(query: string, limit: number, signal: AbortSignal) {
    const url = withQuery(this.opts.endpoint ?? "https://export.arxiv.org/api/query", {
      search_query: `all:${query}`,
      start: 0,
      max_results: limit,
      sortBy: "submittedDate",
      sortOrder: "descending"
    });

    const res = await (this.opts.fetchImpl ?? httpFetch)(url, { signal });
    const xml = await readBody(res);

    return outcomeOf(parseArxivFeed(xml, this.name).slice(0, limit));
  }
}
