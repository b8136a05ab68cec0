import { z } from "zod";
import { httpFetch } from "../http";
import { declined, fetchJson, outcomeOf, withQuery, type FetchLike, type SearchProvider } from "./provider";

const GoogleResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().nullish(),
        link: z.string().nullish(),
        snippet: z.string().nullish()
      })
    )
    .default([])
});

/** Google Custom Search JSON API; needs both an API key and an engine id. */
export class GoogleProvider implements SearchProvider {
  readonly name = "Google";

  constructor(
    private opts: {
      apiKey?: string;
      engineId?: string;
      fetchImpl?: FetchLike;
      endpoint?: string;
    }
  ) {}

  async search(query: string, limit: number, signal: AbortSignal) {
    const { apiKey, engineId } = this.opts;
    if (!apiKey || !engineId) return declined("GOOGLE_API_KEY / GOOGLE_SEARCH_ENGINE_ID not set");

    const url = withQuery(this.opts.endpoint ?? "https://www.googleapis.com/customsearch/v1", {
      q: query,
      key: apiKey,
      cx: engineId,
      num: Math.min(limit, 10)
    });

    const data = await fetchJson(this.opts.fetchImpl ?? httpFetch, url, { signal }, GoogleResponseSchema);

    return outcomeOf(
      data.items.slice(0, limit).map((item) => ({
        title: item.title || "No title",
        url: item.link || undefined,
        snippet: item.snippet ?? "",
        providerName: this.name,
        resultKind: "web" as const
      }))
    );
  }
}
