import { JSDOM } from "jsdom";
import { z } from "zod";
import { httpFetch } from "../http";
import {
  BROWSER_HEADERS,
  fetchJson,
  outcomeOf,
  withQuery,
  type FetchLike,
  type SearchProvider
} from "./provider";

const WikiSearchSchema = z.object({
  query: z
    .object({
      search: z.array(z.object({ title: z.string(), snippet: z.string().default("") })).default([])
    })
    .default({})
});

/** Search-match highlighting and entities to plain text. */
export function stripMarkup(html: string): string {
  return (JSDOM.fragment(html).textContent ?? "").replace(/\s+/g, " ").trim();
}

export function wikiUrl(title: string): string {
  return `https://en.wikipedia.org/wiki/${title.replace(/ /g, "_")}`;
}

export class WikipediaProvider implements SearchProvider {
  readonly name = "Wikipedia";

  constructor(private opts: { fetchImpl?: FetchLike; endpoint?: string } = {}) {}

  async search(query: string, limit: number, signal: AbortSignal) {
    const url = withQuery(this.opts.endpoint ?? "https://en.wikipedia.org/w/api.php", {
      action: "query",
      format: "json",
      list: "search",
      srsearch: query,
      srlimit: limit,
      srwhat: "text"
    });

    const data = await fetchJson(
      this.opts.fetchImpl ?? httpFetch,
      url,
      { headers: BROWSER_HEADERS, signal },
      WikiSearchSchema
    );

    return outcomeOf(
      data.query.search.slice(0, limit).map((r) => ({
        title: r.title,
        url: wikiUrl(r.title),
        snippet: stripMarkup(r.snippet),
        providerName: this.name,
        resultKind: "web" as const
      }))
    );
  }
}
