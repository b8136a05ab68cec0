import { z } from "zod";
import { httpFetch } from "../http";
import {
  BROWSER_HEADERS,
  declined,
  fetchJson,
  outcomeOf,
  withQuery,
  type FetchLike,
  type SearchProvider
} from "./provider";
import { stripMarkup } from "./wikipedia";

const BingResponseSchema = z.object({
  webPages: z
    .object({
      value: z
        .array(
          z.object({
            name: z.string().nullish(),
            url: z.string().nullish(),
            snippet: z.string().nullish()
          })
        )
        .default([])
    })
    .default({})
});

export class BingProvider implements SearchProvider {
  readonly name = "Bing";

  constructor(private opts: { apiKey?: string; fetchImpl?: FetchLike; endpoint?: string }) {}

  async search(query: string, limit: number, signal: AbortSignal) {
    const { apiKey } = this.opts;
    if (!apiKey) return declined("BING_SEARCH_KEY is not set");

    const url = withQuery(this.opts.endpoint ?? "https://api.bing.microsoft.com/v7.0/search", {
      q: query,
      count: limit,
      textDecorations: "true",
      textFormat: "HTML"
    });

    const data = await fetchJson(
      this.opts.fetchImpl ?? httpFetch,
      url,
      { headers: { ...BROWSER_HEADERS, "Ocp-Apim-Subscription-Key": apiKey }, signal },
      BingResponseSchema
    );

    return outcomeOf(
      data.webPages.value.slice(0, limit).map((item) => ({
        title: item.name || "No title",
        url: item.url || undefined,
        snippet: stripMarkup(item.snippet ?? ""),
        providerName: this.name,
        resultKind: "web" as const
      }))
    );
  }
}
